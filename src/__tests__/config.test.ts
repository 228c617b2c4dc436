/**
 * Tests for configuration presets, builder, environment loading and validation
 */

import { describe, it, expect } from 'vitest';
import {
  AccountStoreConfigBuilder,
  configForMode,
  localConfig,
  remoteConfig,
  loadConfigFromEnv,
  validateConfig,
  isConfigurationError,
} from '../config/index.js';
import { ConfigurationError } from '../error/index.js';

describe('presets', () => {
  it('should point local mode at DynamoDB Local with placeholder credentials', () => {
    expect(localConfig()).toEqual({
      region: 'eu-central-1',
      endpoint: 'http://127.0.0.1:8000',
      credentials: { type: 'static', accessKeyId: 'local', secretAccessKey: 'local' },
      tableName: 'Accounts',
      logLevel: 'info',
    });
  });

  it('should use the home-cloud profile in remote mode', () => {
    const config = remoteConfig();

    expect(config.endpoint).toBeUndefined();
    expect(config.region).toBe('eu-central-1');
    expect(config.credentials).toEqual({ type: 'profile', profileName: 'home-cloud' });
  });

  it('should select the preset by mode', () => {
    expect(configForMode('local')).toEqual(localConfig());
    expect(configForMode('remote')).toEqual(remoteConfig());
  });

  it('should return independent copies', () => {
    const first = localConfig();
    first.tableName = 'Changed';

    expect(localConfig().tableName).toBe('Accounts');
  });
});

describe('AccountStoreConfigBuilder', () => {
  it('should start from the remote preset', () => {
    expect(new AccountStoreConfigBuilder().build()).toEqual(remoteConfig());
  });

  it('should override fields fluently', () => {
    const config = AccountStoreConfigBuilder.from(localConfig())
      .withRegion('us-east-1')
      .withEndpoint('http://localhost:8001')
      .withStaticCredentials('test', 'test-secret')
      .withTableName('Ledger')
      .withLogLevel('debug')
      .build();

    expect(config).toEqual({
      region: 'us-east-1',
      endpoint: 'http://localhost:8001',
      credentials: {
        type: 'static',
        accessKeyId: 'test',
        secretAccessKey: 'test-secret',
        sessionToken: undefined,
      },
      tableName: 'Ledger',
      logLevel: 'debug',
    });
  });

  it('should switch credential sources', () => {
    const builder = new AccountStoreConfigBuilder();

    expect(builder.withProfileCredentials('work').build().credentials).toEqual({
      type: 'profile',
      profileName: 'work',
    });
    expect(builder.withEnvironmentCredentials().build().credentials).toEqual({
      type: 'environment',
    });
  });

  it('should not share state with the base config', () => {
    const base = localConfig();
    AccountStoreConfigBuilder.from(base).withTableName('Other').build();

    expect(base.tableName).toBe('Accounts');
  });
});

describe('loadConfigFromEnv', () => {
  it('should return the preset when nothing is set', () => {
    expect(loadConfigFromEnv('local', {})).toEqual(localConfig());
    expect(loadConfigFromEnv('remote', {})).toEqual(remoteConfig());
  });

  it('should apply overrides', () => {
    const config = loadConfigFromEnv('remote', {
      AWS_REGION: 'us-west-2',
      DYNAMODB_ENDPOINT: 'https://dynamodb.example.test',
      AWS_PROFILE: 'work',
      ACCOUNTS_TABLE_NAME: 'Accounts_v2',
      LOG_LEVEL: 'DEBUG',
    });

    expect(config).toEqual({
      region: 'us-west-2',
      endpoint: 'https://dynamodb.example.test',
      credentials: { type: 'profile', profileName: 'work' },
      tableName: 'Accounts_v2',
      logLevel: 'debug',
    });
  });

  it('should fall back to AWS_DEFAULT_REGION', () => {
    expect(loadConfigFromEnv('local', { AWS_DEFAULT_REGION: 'ap-southeast-2' }).region).toBe(
      'ap-southeast-2'
    );
  });

  it('should keep placeholder credentials in local mode', () => {
    const config = loadConfigFromEnv('local', { AWS_PROFILE: 'work' });

    expect(config.credentials).toEqual(localConfig().credentials);
  });

  it('should ignore blank values', () => {
    expect(loadConfigFromEnv('local', { ACCOUNTS_TABLE_NAME: '   ' }).tableName).toBe('Accounts');
  });

  it('should reject an unknown log level', () => {
    expect(() => loadConfigFromEnv('local', { LOG_LEVEL: 'loud' })).toThrow(
      new ConfigurationError('Invalid LOG_LEVEL: loud')
    );
  });
});

describe('validateConfig', () => {
  it('should accept both presets', () => {
    expect(() => validateConfig(localConfig())).not.toThrow();
    expect(() => validateConfig(remoteConfig())).not.toThrow();
  });

  it('should reject a malformed region', () => {
    expect(() => validateConfig({ ...localConfig(), region: 'Frankfurt' })).toThrow(
      "Invalid region format: Frankfurt. Expected format like 'us-east-1' or 'eu-central-1'"
    );
  });

  it('should reject a non-http endpoint', () => {
    expect(() => validateConfig({ ...localConfig(), endpoint: 'ftp://127.0.0.1' })).toThrow(
      'Endpoint URL must use http: or https: protocol'
    );
    expect(() => validateConfig({ ...localConfig(), endpoint: 'not a url' })).toThrow(
      'Invalid endpoint URL: not a url'
    );
  });

  it('should reject empty static credentials', () => {
    const config = AccountStoreConfigBuilder.from(localConfig())
      .withStaticCredentials('test', ' ')
      .build();

    expect(() => validateConfig(config)).toThrow(
      'Static credentials require non-empty secretAccessKey'
    );
  });

  it('should reject an empty profile name', () => {
    const config = new AccountStoreConfigBuilder().withProfileCredentials('').build();

    expect(() => validateConfig(config)).toThrow('Profile credentials require non-empty profileName');
  });

  it('should enforce DynamoDB table naming', () => {
    expect(() => validateConfig({ ...localConfig(), tableName: 'ab' })).toThrow(
      'Invalid table name: ab'
    );
    expect(() => validateConfig({ ...localConfig(), tableName: 'Accounts/2' })).toThrow(
      'Invalid table name: Accounts/2'
    );
    expect(() => validateConfig({ ...localConfig(), tableName: 'my-table.v_1' })).not.toThrow();
  });

  it('should throw ConfigurationError', () => {
    try {
      validateConfig({ ...localConfig(), region: '' });
      expect.unreachable();
    } catch (error) {
      expect(isConfigurationError(error)).toBe(true);
    }
  });
});
