/**
 * Account Store Configuration
 *
 * Configuration interfaces and utilities for the account store connection.
 */

export type { AccountStoreConfig, ConnectionMode, CredentialsConfig } from './config.js';
export {
  AccountStoreConfigBuilder,
  configForMode,
  localConfig,
  remoteConfig,
  isStaticCredentials,
  isProfileCredentials,
} from './config.js';
export {
  DEFAULT_REGION,
  DEFAULT_PROFILE,
  LOCAL_ENDPOINT,
  DEFAULT_LOG_LEVEL,
} from './defaults.js';
export type { Environment } from './environment.js';
export { loadConfigFromEnv } from './environment.js';
export { validateConfig, isConfigurationError } from './validation.js';
