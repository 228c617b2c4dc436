/**
 * Table Management Operations
 *
 * Listing and creating the accounts table. A real deployment usually creates
 * the table out of band; these exist mainly for DynamoDB Local.
 */

import {
  CreateTableCommand,
  ListTablesCommand,
  ResourceInUseException,
} from '@aws-sdk/client-dynamodb';
import type { DynamoDBConnection } from '../client/connection.js';
import {
  ACCOUNT_NAME_ATTRIBUTE,
  LIST_TABLES_LIMIT,
  PROVISIONED_CAPACITY_UNITS,
} from '../types/account.js';

/**
 * Description of a table returned by {@link createTable}.
 */
export interface CreatedTable {
  tableName: string;
  status?: string;
  arn?: string;
}

/**
 * Lists table names known to the backend.
 *
 * Only the first page is read, so at most {@link LIST_TABLES_LIMIT} names
 * are returned.
 *
 * @example
 * ```typescript
 * const names = await listTables(connection);
 * // ['Accounts']
 * ```
 */
export async function listTables(connection: DynamoDBConnection): Promise<string[]> {
  const response = await connection.client.send(
    new ListTablesCommand({
      Limit: LIST_TABLES_LIMIT,
    })
  );

  return response.TableNames ?? [];
}

/**
 * Exact, case-sensitive membership test.
 */
export function tableExists(names: readonly string[], target: string): boolean {
  return names.includes(target);
}

/**
 * Creates the accounts table with `AccountName` (string) as its hash key and
 * fixed provisioned throughput.
 *
 * Fails with ResourceInUseException when the table already exists; check
 * with {@link tableExists} first, or use {@link ensureTable}.
 */
export async function createTable(
  connection: DynamoDBConnection,
  tableName: string
): Promise<CreatedTable> {
  const response = await connection.client.send(
    new CreateTableCommand({
      TableName: tableName,
      AttributeDefinitions: [
        {
          AttributeName: ACCOUNT_NAME_ATTRIBUTE,
          AttributeType: 'S',
        },
      ],
      KeySchema: [
        {
          AttributeName: ACCOUNT_NAME_ATTRIBUTE,
          KeyType: 'HASH',
        },
      ],
      ProvisionedThroughput: {
        ReadCapacityUnits: PROVISIONED_CAPACITY_UNITS,
        WriteCapacityUnits: PROVISIONED_CAPACITY_UNITS,
      },
    })
  );

  return {
    tableName: response.TableDescription?.TableName ?? tableName,
    status: response.TableDescription?.TableStatus,
    arn: response.TableDescription?.TableArn,
  };
}

/**
 * Creates the table unless it already exists.
 *
 * The listing covers only the first page of names, so a table listed beyond
 * it is recognised by the ResourceInUseException from CreateTable.
 *
 * @returns true if the table was created by this call
 */
export async function ensureTable(
  connection: DynamoDBConnection,
  tableName: string
): Promise<boolean> {
  const names = await listTables(connection);
  if (tableExists(names, tableName)) {
    return false;
  }

  try {
    await createTable(connection, tableName);
  } catch (error) {
    if (error instanceof ResourceInUseException) {
      return false;
    }
    throw error;
  }
  return true;
}
