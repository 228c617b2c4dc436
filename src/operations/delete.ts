/**
 * Account DeleteItem Operation
 */

import { DeleteCommand } from '@aws-sdk/lib-dynamodb';
import type { DynamoDBConnection } from '../client/connection.js';
import { ACCOUNT_NAME_ATTRIBUTE } from '../types/account.js';

/**
 * Deletes the account with the given name. Deleting a name that is not
 * stored succeeds.
 */
export async function deleteAccount(
  connection: DynamoDBConnection,
  tableName: string,
  name: string
): Promise<void> {
  await connection.documentClient.send(
    new DeleteCommand({
      TableName: tableName,
      Key: {
        [ACCOUNT_NAME_ATTRIBUTE]: name,
      },
    })
  );
}
