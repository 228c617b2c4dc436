/**
 * Account store demonstration.
 *
 * Runs a fixed script of operations against the accounts table and reports
 * what it read back.
 */

import { AccountStore } from '../client/store.js';
import { DynamoDBConnection, type ConnectionOptions } from '../client/connection.js';
import type { ConnectionMode } from '../config/config.js';
import type { Environment } from '../config/environment.js';
import { loadConfigFromEnv } from '../config/environment.js';
import { mapAwsError } from '../error/mapper.js';
import type { Logger } from '../observability/logging.js';
import { ConsoleLogger } from '../observability/logging.js';
import type { Account } from '../types/account.js';

export const FIRST_ACCOUNT: Account = {
  name: 'Foo',
  key: '123456',
  description: 'My first account',
};

export const SECOND_ACCOUNT: Account = {
  name: 'Fum',
  key: '654321',
  description: 'My second account',
};

/**
 * What the demo observed.
 */
export interface DemoReport {
  mode: ConnectionMode;
  /** Whether the demo created the table (local mode only) */
  tableCreated: boolean;
  found: Account | undefined;
  afterPuts: Account[];
  afterDelete: Account[];
}

export interface DemoOptions {
  mode: ConnectionMode;
  logger: Logger;
}

/**
 * `local` when the first argument is exactly `local`, otherwise `remote`.
 */
export function parseMode(argv: readonly string[]): ConnectionMode {
  return argv[0] === 'local' ? 'local' : 'remote';
}

/**
 * Runs the demo script against a store.
 */
export async function runDemo(store: AccountStore, options: DemoOptions): Promise<DemoReport> {
  const { mode, logger } = options;

  let tableCreated = false;
  if (mode === 'local') {
    tableCreated = await store.ensureTable();
  }

  await store.put(FIRST_ACCOUNT);
  const found = await store.find(FIRST_ACCOUNT.name);
  logger.info('Find account', { name: FIRST_ACCOUNT.name, account: found ?? null });

  await store.put(SECOND_ACCOUNT);
  const afterPuts = await store.list();
  logger.info('Accounts', { accounts: afterPuts });

  await store.delete(FIRST_ACCOUNT.name);
  const afterDelete = await store.list();
  logger.info('Accounts after delete', { accounts: afterDelete });

  return { mode, tableCreated, found, afterPuts, afterDelete };
}

/**
 * Options for {@link main}.
 */
export interface MainOptions {
  env?: Environment;
  logger?: Logger;
  requestHandler?: ConnectionOptions['requestHandler'];
}

/**
 * Loads configuration, runs the demo and closes the connection.
 *
 * @returns Process exit code
 */
export async function main(argv: readonly string[], options: MainOptions = {}): Promise<number> {
  const mode = parseMode(argv);
  let logger: Logger = options.logger ?? new ConsoleLogger();
  let connection: DynamoDBConnection | undefined;

  try {
    const config = loadConfigFromEnv(mode, options.env);
    logger = options.logger ?? new ConsoleLogger(config.logLevel);
    connection = DynamoDBConnection.open(config, {
      logger,
      requestHandler: options.requestHandler,
    });
    await runDemo(new AccountStore(connection), { mode, logger });
    return 0;
  } catch (error) {
    logger.error('Account store demo failed', mapAwsError(error).toJSON());
    return 1;
  } finally {
    connection?.close();
  }
}
