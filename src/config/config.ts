/**
 * Configuration types and interfaces for the account store connection.
 * @module config
 */

import type { LogLevel } from '../observability/logging.js';
import { ACCOUNTS_TABLE } from '../types/account.js';
import {
  DEFAULT_LOG_LEVEL,
  DEFAULT_PROFILE,
  DEFAULT_REGION,
  LOCAL_ACCESS_KEY_ID,
  LOCAL_ENDPOINT,
  LOCAL_SECRET_ACCESS_KEY,
} from './defaults.js';

/**
 * Selects between DynamoDB Local and the AWS service.
 */
export type ConnectionMode = 'local' | 'remote';

/**
 * Credentials configuration with support for multiple authentication methods.
 */
export type CredentialsConfig =
  | { type: 'static'; accessKeyId: string; secretAccessKey: string; sessionToken?: string }
  | { type: 'profile'; profileName: string }
  | { type: 'environment' };

/**
 * Main configuration interface for the account store connection.
 */
export interface AccountStoreConfig {
  /**
   * AWS region where DynamoDB is located.
   * @example 'eu-central-1'
   */
  region: string;

  /**
   * Custom endpoint URL.
   * @example 'http://127.0.0.1:8000' for DynamoDB Local
   */
  endpoint?: string;

  /**
   * Credentials configuration for authentication. When omitted the AWS SDK
   * default provider chain is used.
   */
  credentials?: CredentialsConfig;

  /**
   * Name of the accounts table.
   */
  tableName: string;

  /**
   * Minimum level written by the default console logger.
   */
  logLevel: LogLevel;
}

/**
 * Helper to check if credentials are static.
 */
export function isStaticCredentials(
  credentials: CredentialsConfig
): credentials is Extract<CredentialsConfig, { type: 'static' }> {
  return credentials.type === 'static';
}

/**
 * Helper to check if credentials use a profile.
 */
export function isProfileCredentials(
  credentials: CredentialsConfig
): credentials is Extract<CredentialsConfig, { type: 'profile' }> {
  return credentials.type === 'profile';
}

/**
 * Configuration for DynamoDB Local: fixed loopback endpoint, placeholder
 * credentials. DynamoDB Local does not check them, but the SDK signs every
 * request.
 */
export function localConfig(): AccountStoreConfig {
  return {
    region: DEFAULT_REGION,
    endpoint: LOCAL_ENDPOINT,
    credentials: {
      type: 'static',
      accessKeyId: LOCAL_ACCESS_KEY_ID,
      secretAccessKey: LOCAL_SECRET_ACCESS_KEY,
    },
    tableName: ACCOUNTS_TABLE,
    logLevel: DEFAULT_LOG_LEVEL,
  };
}

/**
 * Configuration for the AWS service, authenticating with a named profile from
 * the shared credentials file.
 */
export function remoteConfig(profileName: string = DEFAULT_PROFILE): AccountStoreConfig {
  return {
    region: DEFAULT_REGION,
    credentials: { type: 'profile', profileName },
    tableName: ACCOUNTS_TABLE,
    logLevel: DEFAULT_LOG_LEVEL,
  };
}

/**
 * Returns the preset configuration for a connection mode.
 */
export function configForMode(mode: ConnectionMode): AccountStoreConfig {
  return mode === 'local' ? localConfig() : remoteConfig();
}

/**
 * Fluent builder for creating AccountStoreConfig objects.
 */
export class AccountStoreConfigBuilder {
  private config: AccountStoreConfig;

  constructor(base: AccountStoreConfig = remoteConfig()) {
    this.config = { ...base };
  }

  /**
   * Sets the AWS region.
   */
  withRegion(region: string): this {
    this.config.region = region;
    return this;
  }

  /**
   * Sets the custom endpoint URL.
   */
  withEndpoint(endpoint: string): this {
    this.config.endpoint = endpoint;
    return this;
  }

  /**
   * Sets static credentials.
   */
  withStaticCredentials(
    accessKeyId: string,
    secretAccessKey: string,
    sessionToken?: string
  ): this {
    this.config.credentials = {
      type: 'static',
      accessKeyId,
      secretAccessKey,
      sessionToken,
    };
    return this;
  }

  /**
   * Sets profile-based credentials.
   */
  withProfileCredentials(profileName: string): this {
    this.config.credentials = {
      type: 'profile',
      profileName,
    };
    return this;
  }

  /**
   * Uses the SDK default credential chain.
   */
  withEnvironmentCredentials(): this {
    this.config.credentials = { type: 'environment' };
    return this;
  }

  /**
   * Sets the accounts table name.
   */
  withTableName(tableName: string): this {
    this.config.tableName = tableName;
    return this;
  }

  /**
   * Sets the console log level.
   */
  withLogLevel(logLevel: LogLevel): this {
    this.config.logLevel = logLevel;
    return this;
  }

  /**
   * Builds the configuration.
   */
  build(): AccountStoreConfig {
    return { ...this.config };
  }

  /**
   * Creates a builder from an existing config.
   */
  static from(config: AccountStoreConfig): AccountStoreConfigBuilder {
    return new AccountStoreConfigBuilder(config);
  }
}
