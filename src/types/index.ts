/**
 * Account store type definitions.
 */

export type { Account, AccountItem } from './account.js';
export {
  ACCOUNTS_TABLE,
  ACCOUNT_NAME_ATTRIBUTE,
  ACCOUNT_DATA_ATTRIBUTE,
  ACCOUNT_PAYLOAD_FIELD,
  LIST_TABLES_LIMIT,
  LIST_ACCOUNTS_LIMIT,
  FIND_ACCOUNT_LIMIT,
  PROVISIONED_CAPACITY_UNITS,
} from './account.js';
