/**
 * Account PutItem Operation
 */

import { PutCommand } from '@aws-sdk/lib-dynamodb';
import type { DynamoDBConnection } from '../client/connection.js';
import type { Account } from '../types/account.js';
import { encodeAccount } from '../codec/account.js';

/**
 * Writes an account, replacing any existing row with the same name.
 *
 * @throws {SerializationError} If the account cannot be encoded
 *
 * @example
 * ```typescript
 * await putAccount(connection, 'Accounts', {
 *   name: 'Foo',
 *   key: '123456',
 *   description: 'My first account',
 * });
 * ```
 */
export async function putAccount(
  connection: DynamoDBConnection,
  tableName: string,
  account: Account
): Promise<void> {
  const item = encodeAccount(account);

  await connection.documentClient.send(
    new PutCommand({
      TableName: tableName,
      Item: item,
    })
  );
}
