/**
 * Account payload codec.
 *
 * Converts between {@link Account} records and the document-level row shape
 * written to the table. The document client performs the attribute-value
 * marshalling; this module owns the row layout and validates both directions.
 */

import { z } from 'zod';
import type { Account, AccountItem } from '../types/account.js';
import {
  ACCOUNT_DATA_ATTRIBUTE,
  ACCOUNT_NAME_ATTRIBUTE,
  ACCOUNT_PAYLOAD_FIELD,
} from '../types/account.js';
import { SerializationError } from '../error/categories.js';

/**
 * Schema for a serialized account.
 */
export const AccountSchema = z.object({
  name: z.string().min(1),
  key: z.string(),
  description: z.string(),
});

const AccountRowSchema = z.object({
  [ACCOUNT_DATA_ATTRIBUTE]: z.object({
    [ACCOUNT_PAYLOAD_FIELD]: AccountSchema,
  }),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Builds the row for an account.
 *
 * @throws {SerializationError} If the account does not match {@link AccountSchema}
 */
export function encodeAccount(account: Account): AccountItem {
  const result = AccountSchema.safeParse(account);
  if (!result.success) {
    throw new SerializationError(`Cannot encode account: ${describeIssues(result.error)}`, {
      direction: 'encode',
      issues: result.error.issues,
    });
  }

  const { name, key, description } = result.data;
  return {
    [ACCOUNT_NAME_ATTRIBUTE]: name,
    [ACCOUNT_DATA_ATTRIBUTE]: {
      [ACCOUNT_PAYLOAD_FIELD]: { name, key, description },
    },
  };
}

/**
 * Reads the account out of a stored row.
 *
 * @throws {SerializationError} If the row carries no valid payload
 */
export function decodeAccount(item: unknown): Account {
  const result = AccountRowSchema.safeParse(item);
  if (!result.success) {
    throw new SerializationError(`Cannot decode account: ${describeIssues(result.error)}`, {
      direction: 'decode',
      issues: result.error.issues,
    });
  }

  const { name, key, description } = result.data[ACCOUNT_DATA_ATTRIBUTE][ACCOUNT_PAYLOAD_FIELD];
  return { name, key, description };
}
