/**
 * Account Query Operation
 *
 * Looks an account up by its partition key.
 */

import { QueryCommand } from '@aws-sdk/lib-dynamodb';
import type { DynamoDBConnection } from '../client/connection.js';
import type { Account } from '../types/account.js';
import { ACCOUNT_NAME_ATTRIBUTE, FIND_ACCOUNT_LIMIT } from '../types/account.js';
import { decodeAccount } from '../codec/account.js';
import { DataIntegrityError } from '../error/categories.js';

/**
 * Finds an account by exact name with a strongly consistent read.
 *
 * @returns The account, or undefined when no row matches
 * @throws {DataIntegrityError} If more than one row matches the name
 * @throws {SerializationError} If the stored payload cannot be decoded
 *
 * @example
 * ```typescript
 * const account = await findAccount(connection, 'Accounts', 'Foo');
 * if (account) {
 *   console.log(account.description);
 * }
 * ```
 */
export async function findAccount(
  connection: DynamoDBConnection,
  tableName: string,
  name: string
): Promise<Account | undefined> {
  const response = await connection.documentClient.send(
    new QueryCommand({
      TableName: tableName,
      KeyConditionExpression: '#pk = :pk',
      ExpressionAttributeNames: {
        '#pk': ACCOUNT_NAME_ATTRIBUTE,
      },
      ExpressionAttributeValues: {
        ':pk': name,
      },
      ConsistentRead: true,
      Limit: FIND_ACCOUNT_LIMIT,
    })
  );

  const items = response.Items ?? [];
  const count = response.Count ?? items.length;

  if (count === 0 || items.length === 0) {
    return undefined;
  }
  if (count > 1 || items.length > 1) {
    throw new DataIntegrityError(tableName, name, Math.max(count, items.length));
  }

  return decodeAccount(items[0]);
}
