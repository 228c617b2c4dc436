/**
 * Account Store
 *
 * Stores `Account` records in a DynamoDB table, against DynamoDB Local or the
 * AWS service.
 *
 * @module account-store
 */

export const VERSION = '0.1.0';

// ============================================================================
// Types
// ============================================================================

export type { Account, AccountItem } from './types/index.js';
export {
  ACCOUNTS_TABLE,
  ACCOUNT_NAME_ATTRIBUTE,
  ACCOUNT_DATA_ATTRIBUTE,
  ACCOUNT_PAYLOAD_FIELD,
} from './types/index.js';

// ============================================================================
// Configuration
// ============================================================================

export type {
  AccountStoreConfig,
  ConnectionMode,
  CredentialsConfig,
  Environment,
} from './config/index.js';
export {
  AccountStoreConfigBuilder,
  configForMode,
  localConfig,
  remoteConfig,
  loadConfigFromEnv,
  validateConfig,
} from './config/index.js';

// ============================================================================
// Error Handling
// ============================================================================

export * from './error/index.js';

// ============================================================================
// Observability
// ============================================================================

export type { Logger, LogLevel, LogContext } from './observability/index.js';
export { ConsoleLogger, NoopLogger } from './observability/index.js';

// ============================================================================
// Codec
// ============================================================================

export { encodeAccount, decodeAccount } from './codec/index.js';

// ============================================================================
// Client
// ============================================================================

export type { ConnectionOptions, OpenDatabaseOptions } from './client/index.js';
export { DynamoDBConnection, openDatabase, AccountStore } from './client/index.js';

export * from './operations/index.js';
