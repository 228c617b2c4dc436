/**
 * Environment variable loading for account store configuration.
 * @module config/environment
 */

import type { AccountStoreConfig, ConnectionMode } from './config.js';
import { configForMode } from './config.js';
import { isLogLevel } from '../observability/logging.js';
import { ConfigurationError } from '../error/categories.js';

export type Environment = Record<string, string | undefined>;

/**
 * Loads configuration for a connection mode, overridden from environment variables.
 *
 * Supported environment variables:
 * - AWS_REGION / AWS_DEFAULT_REGION: AWS region
 * - DYNAMODB_ENDPOINT: Custom DynamoDB endpoint (e.g., 'http://localhost:8000')
 * - AWS_PROFILE: Shared credentials profile (remote mode only)
 * - ACCOUNTS_TABLE_NAME: Accounts table name
 * - LOG_LEVEL: trace | debug | info | warn | error
 *
 * @returns Configuration populated from the mode preset and environment
 * @throws {ConfigurationError} If LOG_LEVEL names an unknown level
 */
export function loadConfigFromEnv(
  mode: ConnectionMode,
  env: Environment = process.env
): AccountStoreConfig {
  const config = configForMode(mode);

  const region = getEnv(env, 'AWS_REGION') ?? getEnv(env, 'AWS_DEFAULT_REGION');
  if (region) {
    config.region = region;
  }

  const endpoint = getEnv(env, 'DYNAMODB_ENDPOINT');
  if (endpoint) {
    config.endpoint = endpoint;
  }

  // Local mode keeps its placeholder credentials
  const profile = getEnv(env, 'AWS_PROFILE');
  if (profile && mode === 'remote') {
    config.credentials = { type: 'profile', profileName: profile };
  }

  const tableName = getEnv(env, 'ACCOUNTS_TABLE_NAME');
  if (tableName) {
    config.tableName = tableName;
  }

  const logLevel = getEnv(env, 'LOG_LEVEL');
  if (logLevel) {
    const normalized = logLevel.toLowerCase();
    if (!isLogLevel(normalized)) {
      throw new ConfigurationError(`Invalid LOG_LEVEL: ${logLevel}`);
    }
    config.logLevel = normalized;
  }

  return config;
}

/**
 * Gets a non-empty environment variable value.
 */
function getEnv(env: Environment, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}
