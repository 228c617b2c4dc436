/**
 * Account Store Operations
 *
 * Single-request operations against the accounts table.
 */

export type { CreatedTable } from './tables.js';
export { listTables, tableExists, createTable, ensureTable } from './tables.js';
export { putAccount } from './put.js';
export { findAccount } from './query.js';
export type { AccountPage } from './scan.js';
export { listAccounts } from './scan.js';
export { deleteAccount } from './delete.js';
