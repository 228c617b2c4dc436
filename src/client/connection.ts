/**
 * DynamoDB Connection
 *
 * Owns the AWS SDK clients for one process run. Opened once, passed to every
 * operation, and closed on shutdown.
 */

import {
  DynamoDBClient as AWSDynamoDBClient,
  type DynamoDBClientConfig,
} from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { fromIni } from '@aws-sdk/credential-providers';

import type { AccountStoreConfig, ConnectionMode } from '../config/config.js';
import { configForMode } from '../config/config.js';
import { validateConfig } from '../config/validation.js';
import { ConnectionClosedError } from '../error/categories.js';
import type { Logger } from '../observability/logging.js';
import { ConsoleLogger } from '../observability/logging.js';

/**
 * Options for {@link DynamoDBConnection.open}.
 */
export interface ConnectionOptions {
  /** Defaults to a ConsoleLogger at the configured level */
  logger?: Logger;
  /** HTTP handler passed to the SDK client, e.g. an in-process test backend */
  requestHandler?: DynamoDBClientConfig['requestHandler'];
}

/**
 * An open connection to DynamoDB or DynamoDB Local.
 */
export class DynamoDBConnection {
  readonly config: AccountStoreConfig;
  readonly logger: Logger;
  private readonly awsClient: AWSDynamoDBClient;
  private readonly docClient: DynamoDBDocumentClient;
  private closed = false;

  private constructor(config: AccountStoreConfig, logger: Logger, options: ConnectionOptions) {
    this.config = config;
    this.logger = logger;

    const awsConfig: DynamoDBClientConfig = {
      region: config.region,
      endpoint: config.endpoint,
    };

    if (options.requestHandler) {
      awsConfig.requestHandler = options.requestHandler;
    }

    if (config.credentials) {
      switch (config.credentials.type) {
        case 'static':
          awsConfig.credentials = {
            accessKeyId: config.credentials.accessKeyId,
            secretAccessKey: config.credentials.secretAccessKey,
            sessionToken: config.credentials.sessionToken,
          };
          break;
        case 'profile':
          awsConfig.credentials = fromIni({
            profile: config.credentials.profileName,
          });
          break;
        case 'environment':
          // AWS SDK default provider chain
          break;
      }
    }

    this.awsClient = new AWSDynamoDBClient(awsConfig);
    this.docClient = DynamoDBDocumentClient.from(this.awsClient, {
      marshallOptions: {
        removeUndefinedValues: true,
        convertClassInstanceToMap: true,
      },
      unmarshallOptions: {
        wrapNumbers: false,
      },
    });
  }

  /**
   * Opens a connection.
   *
   * Validates the configuration and builds the SDK clients. Credentials are
   * resolved by the SDK on the first request.
   *
   * @throws {ConfigurationError} If the configuration is invalid
   *
   * @example
   * ```typescript
   * const connection = DynamoDBConnection.open(localConfig());
   * try {
   *   const store = new AccountStore(connection);
   *   await store.put({ name: 'Foo', key: '123456', description: 'My first account' });
   * } finally {
   *   connection.close();
   * }
   * ```
   */
  static open(config: AccountStoreConfig, options: ConnectionOptions = {}): DynamoDBConnection {
    validateConfig(config);
    const connection = new DynamoDBConnection(
      config,
      options.logger ?? new ConsoleLogger(config.logLevel),
      options
    );

    connection.logger.info('DynamoDB connection opened', {
      region: config.region,
      endpoint: config.endpoint,
      credentials: config.credentials?.type ?? 'default',
    });

    return connection;
  }

  /**
   * Low-level client, for table management commands.
   *
   * @throws {ConnectionClosedError} If the connection has been closed
   */
  get client(): AWSDynamoDBClient {
    this.assertOpen();
    return this.awsClient;
  }

  /**
   * Document client, for item commands. Shares the low-level client's
   * configuration and middleware stack.
   *
   * @throws {ConnectionClosedError} If the connection has been closed
   */
  get documentClient(): DynamoDBDocumentClient {
    this.assertOpen();
    return this.docClient;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Releases the SDK clients. Safe to call more than once.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.awsClient.destroy();
    this.logger.info('DynamoDB connection closed');
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new ConnectionClosedError();
    }
  }
}

/**
 * Options for {@link openDatabase}.
 */
export interface OpenDatabaseOptions extends ConnectionOptions {
  /** Replaces fields of the mode preset */
  overrides?: Partial<AccountStoreConfig>;
}

/**
 * Opens a connection to DynamoDB Local (`isLocal`) or to the AWS service.
 *
 * @throws {ConfigurationError} If the resulting configuration is invalid
 */
export function openDatabase(isLocal: boolean, options: OpenDatabaseOptions = {}): DynamoDBConnection {
  const mode: ConnectionMode = isLocal ? 'local' : 'remote';
  const { overrides, ...connectionOptions } = options;
  return DynamoDBConnection.open({ ...configForMode(mode), ...overrides }, connectionOptions);
}
