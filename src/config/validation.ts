/**
 * Configuration validation for the account store connection.
 * @module config/validation
 */

import type { AccountStoreConfig, CredentialsConfig } from './config.js';
import { isStaticCredentials, isProfileCredentials } from './config.js';
import { isLogLevel } from '../observability/logging.js';
import { ConfigurationError } from '../error/categories.js';

/**
 * Validates account store configuration.
 *
 * @throws {ConfigurationError} If configuration is invalid
 */
export function validateConfig(config: AccountStoreConfig): void {
  validateRegion(config.region);

  if (config.endpoint !== undefined) {
    validateEndpoint(config.endpoint);
  }

  if (config.credentials !== undefined) {
    validateCredentials(config.credentials);
  }

  validateTableName(config.tableName);

  if (!isLogLevel(config.logLevel)) {
    throw new ConfigurationError(`Invalid log level: ${config.logLevel}`);
  }
}

/**
 * Validates AWS region format.
 */
function validateRegion(region: string): void {
  if (region.trim().length === 0) {
    throw new ConfigurationError('Region must be a non-empty string');
  }

  // e.g. us-east-1, eu-central-1
  const regionPattern = /^[a-z]{2}-[a-z]+-\d+$/;
  if (!regionPattern.test(region)) {
    throw new ConfigurationError(
      `Invalid region format: ${region}. Expected format like 'us-east-1' or 'eu-central-1'`
    );
  }
}

/**
 * Validates endpoint URL.
 */
function validateEndpoint(endpoint: string): void {
  if (endpoint.trim().length === 0) {
    throw new ConfigurationError('Endpoint must be a non-empty string');
  }

  let url: URL;
  try {
    url = new URL(endpoint);
  } catch {
    throw new ConfigurationError(`Invalid endpoint URL: ${endpoint}`);
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigurationError('Endpoint URL must use http: or https: protocol');
  }
}

/**
 * Validates credentials configuration.
 */
function validateCredentials(credentials: CredentialsConfig): void {
  if (isStaticCredentials(credentials)) {
    if (credentials.accessKeyId.trim().length === 0) {
      throw new ConfigurationError('Static credentials require non-empty accessKeyId');
    }
    if (credentials.secretAccessKey.trim().length === 0) {
      throw new ConfigurationError('Static credentials require non-empty secretAccessKey');
    }
  } else if (isProfileCredentials(credentials)) {
    if (credentials.profileName.trim().length === 0) {
      throw new ConfigurationError('Profile credentials require non-empty profileName');
    }
  }
}

/**
 * Validates a DynamoDB table name: 3 to 255 of [a-zA-Z0-9_.-].
 */
function validateTableName(tableName: string): void {
  if (!/^[a-zA-Z0-9_.-]{3,255}$/.test(tableName)) {
    throw new ConfigurationError(`Invalid table name: ${tableName}`);
  }
}

/**
 * Type guard to check if an error is a ConfigurationError.
 */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}
