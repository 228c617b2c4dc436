/**
 * Tests for table listing and creation
 */

import { describe, it, expect, afterEach } from 'vitest';
import { AccountStore } from '../client/index.js';
import type { DynamoDBConnection } from '../client/index.js';
import { AccessDeniedError, ResourceInUseError } from '../error/index.js';
import { createTable, ensureTable, listTables, tableExists } from '../operations/index.js';
import { createTestConnection, InMemoryDynamoDB } from '../testing/index.js';
import { recordingLogger } from './helpers.js';

describe('table operations', () => {
  let connection: DynamoDBConnection | undefined;

  afterEach(() => {
    connection?.close();
    connection = undefined;
  });

  function open(backend: InMemoryDynamoDB) {
    const logger = recordingLogger();
    const opened = createTestConnection({ backend, logger }).connection;
    connection = opened;
    return { connection: opened, logger };
  }

  describe('tableExists', () => {
    it('should match names exactly', () => {
      expect(tableExists(['Accounts', 'Other'], 'Accounts')).toBe(true);
      expect(tableExists(['Accounts'], 'accounts')).toBe(false);
      expect(tableExists([], 'Accounts')).toBe(false);
    });
  });

  describe('listTables', () => {
    it('should list existing tables', async () => {
      const backend = new InMemoryDynamoDB().createTable('Accounts', 'AccountName');
      const { connection } = open(backend);

      expect(await listTables(connection)).toEqual(['Accounts']);
      expect(backend.getRequests('ListTables')[0].input).toEqual({ Limit: 10 });
    });

    it('should return an empty list when there are no tables', async () => {
      const { connection } = open(new InMemoryDynamoDB());

      expect(await listTables(connection)).toEqual([]);
    });

    it('should read only the first page of ten names', async () => {
      const backend = new InMemoryDynamoDB();
      for (let i = 0; i < 12; i++) {
        backend.createTable(`Table${String(i).padStart(2, '0')}`, 'id');
      }
      const { connection } = open(backend);

      const names = await listTables(connection);

      expect(names).toHaveLength(10);
      expect(names[0]).toBe('Table00');
      expect(names[9]).toBe('Table09');
    });
  });

  describe('createTable', () => {
    it('should create the table keyed by AccountName with 10/10 throughput', async () => {
      const backend = new InMemoryDynamoDB();
      const { connection } = open(backend);

      const created = await createTable(connection, 'Accounts');

      expect(created).toEqual({
        tableName: 'Accounts',
        status: 'ACTIVE',
        arn: 'arn:aws:dynamodb:eu-central-1:000000000000:table/Accounts',
      });
      expect(backend.tableNames()).toEqual(['Accounts']);
      expect(backend.getRequests('CreateTable')[0].input).toEqual({
        TableName: 'Accounts',
        AttributeDefinitions: [{ AttributeName: 'AccountName', AttributeType: 'S' }],
        KeySchema: [{ AttributeName: 'AccountName', KeyType: 'HASH' }],
        ProvisionedThroughput: { ReadCapacityUnits: 10, WriteCapacityUnits: 10 },
      });
    });

    it('should fail when the table exists', async () => {
      const backend = new InMemoryDynamoDB().createTable('Accounts', 'AccountName');
      const { connection } = open(backend);
      const store = new AccountStore(connection);

      await expect(store.createTable()).rejects.toBeInstanceOf(ResourceInUseError);
      await expect(store.createTable()).rejects.toThrow('Table already exists: Accounts');
    });

    it('should log the created table', async () => {
      const { connection, logger } = open(new InMemoryDynamoDB());

      await new AccountStore(connection).createTable();

      expect(logger.info).toHaveBeenCalledWith('Table created', {
        tableName: 'Accounts',
        status: 'ACTIVE',
      });
    });
  });

  describe('ensureTable', () => {
    it('should create a missing table once', async () => {
      const backend = new InMemoryDynamoDB();
      const { connection } = open(backend);

      expect(await ensureTable(connection, 'Accounts')).toBe(true);
      expect(await ensureTable(connection, 'Accounts')).toBe(false);
      expect(backend.getRequests('CreateTable')).toHaveLength(1);
      expect(backend.getRequests('ListTables')).toHaveLength(2);
    });

    it('should recognise a table listed beyond the first page', async () => {
      const backend = new InMemoryDynamoDB();
      for (let i = 0; i < 10; i++) {
        backend.createTable(`A${i}`, 'id');
      }
      backend.createTable('Accounts', 'AccountName');
      const { connection } = open(backend);
      const store = new AccountStore(connection);

      expect(await store.tableExists()).toBe(false);
      expect(await store.ensureTable()).toBe(false);
      expect(backend.getRequests('CreateTable')).toHaveLength(1);
      expect(backend.tableNames()).toHaveLength(11);
    });

    it('should still fail on other creation errors', async () => {
      const backend = new InMemoryDynamoDB().failOnce(
        'CreateTable',
        'AccessDeniedException',
        'User is not authorized'
      );
      const { connection } = open(backend);

      await expect(new AccountStore(connection).ensureTable()).rejects.toBeInstanceOf(
        AccessDeniedError
      );
    });

    it('should leave an existing table alone', async () => {
      const backend = new InMemoryDynamoDB().createTable('Accounts', 'AccountName');
      const { connection } = open(backend);
      const store = new AccountStore(connection);

      expect(await store.tableExists()).toBe(true);
      expect(await store.ensureTable()).toBe(false);
      expect(backend.getRequests('CreateTable')).toHaveLength(0);
    });
  });
});
