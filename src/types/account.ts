/**
 * Account entity and its persisted table layout.
 *
 * Each row is keyed by the account name; the full record travels as a nested
 * map under `Data.object`, so `name` appears both as the partition key and
 * inside the payload.
 */

// ============================================================================
// Entity
// ============================================================================

/**
 * A stored account.
 */
export interface Account {
  /** Unique account name (partition key) */
  name: string;
  /** Opaque secret or token value */
  key: string;
  /** Free text */
  description: string;
}

// ============================================================================
// Table Layout
// ============================================================================

/** Default table name. */
export const ACCOUNTS_TABLE = 'Accounts';

/** Partition key attribute name. */
export const ACCOUNT_NAME_ATTRIBUTE = 'AccountName';

/** Attribute holding the payload map. */
export const ACCOUNT_DATA_ATTRIBUTE = 'Data';

/** Field inside {@link ACCOUNT_DATA_ATTRIBUTE} holding the serialized account. */
export const ACCOUNT_PAYLOAD_FIELD = 'object';

/**
 * Document-level shape of a stored row.
 */
export type AccountItem = {
  [ACCOUNT_NAME_ATTRIBUTE]: string;
  [ACCOUNT_DATA_ATTRIBUTE]: {
    [ACCOUNT_PAYLOAD_FIELD]: Account;
  };
};

// ============================================================================
// Request Limits
// ============================================================================

/** Page size for ListTables. */
export const LIST_TABLES_LIMIT = 10;

/** Maximum rows returned by a single account scan. */
export const LIST_ACCOUNTS_LIMIT = 100;

/** Maximum rows returned by an account lookup. */
export const FIND_ACCOUNT_LIMIT = 1;

/** Provisioned read and write capacity units for a created table. */
export const PROVISIONED_CAPACITY_UNITS = 10;
