/**
 * Account Scan Operation
 */

import { ScanCommand } from '@aws-sdk/lib-dynamodb';
import type { DynamoDBConnection } from '../client/connection.js';
import type { Account } from '../types/account.js';
import { LIST_ACCOUNTS_LIMIT } from '../types/account.js';
import { decodeAccount } from '../codec/account.js';

/**
 * Result of {@link listAccounts}.
 */
export interface AccountPage {
  /** Decoded accounts, in backend order */
  accounts: Account[];
  /** True when the scan stopped at its limit, so the backend may hold more rows */
  truncated: boolean;
}

/**
 * Reads one page of accounts with a strongly consistent scan.
 *
 * Pagination is not followed. A scan that stops at
 * {@link LIST_ACCOUNTS_LIMIT} rows is flagged as `truncated`; DynamoDB
 * reports this even when exactly that many rows exist.
 *
 * @throws {SerializationError} If any stored payload cannot be decoded
 */
export async function listAccounts(
  connection: DynamoDBConnection,
  tableName: string
): Promise<AccountPage> {
  const response = await connection.documentClient.send(
    new ScanCommand({
      TableName: tableName,
      ConsistentRead: true,
      Limit: LIST_ACCOUNTS_LIMIT,
    })
  );

  return {
    accounts: (response.Items ?? []).map((item) => decodeAccount(item)),
    truncated: response.LastEvaluatedKey !== undefined,
  };
}
