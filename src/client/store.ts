/**
 * Account Store
 *
 * Table-scoped facade over the account operations. Every SDK failure is
 * mapped to a typed {@link AccountStoreError} and rejected to the caller;
 * nothing here ends the process.
 */

import type { DynamoDBConnection } from './connection.js';
import type { Account } from '../types/account.js';
import type { AccountStoreError } from '../error/error.js';
import { mapAwsError } from '../error/mapper.js';
import type { Logger, LogContext } from '../observability/logging.js';
import { logError, logOperation } from '../observability/logging.js';
import {
  listTables,
  tableExists,
  createTable,
  ensureTable,
  type CreatedTable,
} from '../operations/tables.js';
import { putAccount } from '../operations/put.js';
import { findAccount } from '../operations/query.js';
import { listAccounts } from '../operations/scan.js';
import { deleteAccount } from '../operations/delete.js';

/**
 * CRUD access to the accounts table over an open connection.
 */
export class AccountStore {
  private readonly connection: DynamoDBConnection;
  private readonly tableName: string;
  private readonly logger: Logger;

  /**
   * @param tableName - Defaults to the connection's configured table
   */
  constructor(connection: DynamoDBConnection, tableName?: string) {
    this.connection = connection;
    this.tableName = tableName ?? connection.config.tableName;
    this.logger = connection.logger;
  }

  /**
   * Gets the table name.
   */
  get name(): string {
    return this.tableName;
  }

  /**
   * Lists up to 10 table names.
   */
  async listTables(): Promise<string[]> {
    return this.execute('ListTables', () => listTables(this.connection), (names) => ({
      count: names.length,
    }));
  }

  /**
   * Checks whether this store's table appears in the first page of table names.
   */
  async tableExists(): Promise<boolean> {
    const names = await this.listTables();
    return tableExists(names, this.tableName);
  }

  /**
   * Creates the table. Rejects with ResourceInUseError if it already exists.
   */
  async createTable(): Promise<CreatedTable> {
    const created = await this.execute(
      'CreateTable',
      () => createTable(this.connection, this.tableName),
      (table) => ({ status: table.status })
    );
    this.logger.info('Table created', { tableName: created.tableName, status: created.status });
    return created;
  }

  /**
   * Creates the table unless it is already listed.
   *
   * @returns true if the table was created
   */
  async ensureTable(): Promise<boolean> {
    return this.execute('EnsureTable', () => ensureTable(this.connection, this.tableName), (created) => ({
      created,
    }));
  }

  /**
   * Writes an account, replacing any stored account with the same name.
   *
   * @example
   * ```typescript
   * const store = new AccountStore(connection);
   * await store.put({ name: 'Foo', key: '123456', description: 'My first account' });
   * ```
   */
  async put(account: Account): Promise<void> {
    await this.execute('PutItem', () => putAccount(this.connection, this.tableName, account), () => ({
      name: account.name,
    }));
  }

  /**
   * Finds an account by name.
   *
   * @returns The account, or undefined if it is not stored
   */
  async find(name: string): Promise<Account | undefined> {
    return this.execute('Query', () => findAccount(this.connection, this.tableName, name), (account) => ({
      name,
      found: account !== undefined,
    }));
  }

  /**
   * Lists up to 100 accounts, in no particular order.
   */
  async list(): Promise<Account[]> {
    const page = await this.execute('Scan', () => listAccounts(this.connection, this.tableName), (result) => ({
      count: result.accounts.length,
      truncated: result.truncated,
    }));

    if (page.truncated) {
      this.logger.warn('Scan returned a partial result', {
        tableName: this.tableName,
        returned: page.accounts.length,
      });
    }

    return page.accounts;
  }

  /**
   * Deletes an account by name. Absent names are not an error.
   */
  async delete(name: string): Promise<void> {
    await this.execute('DeleteItem', () => deleteAccount(this.connection, this.tableName, name), () => ({
      name,
    }));
  }

  /**
   * Runs an operation, logging its outcome and mapping failures.
   */
  private async execute<R>(
    operation: string,
    fn: () => Promise<R>,
    describe: (result: R) => LogContext
  ): Promise<R> {
    const start = Date.now();
    let result: R;
    try {
      result = await fn();
    } catch (error) {
      const mapped: AccountStoreError = mapAwsError(error).inOperation(operation, this.tableName);
      logError(this.logger, operation, this.tableName, mapped);
      throw mapped;
    }

    logOperation(this.logger, operation, this.tableName, Date.now() - start, describe(result));
    return result;
  }
}
