/**
 * Tests for structured logging
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConsoleLogger, isLogLevel, logError, logOperation } from '../observability/index.js';
import { ResourceNotFoundError } from '../error/index.js';
import { recordingLogger } from './helpers.js';

describe('ConsoleLogger', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-02T03:04:05.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('should write a timestamped line with JSON context', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    new ConsoleLogger().info('Opened', { region: 'eu-central-1' });

    expect(log).toHaveBeenCalledWith('[2026-01-02T03:04:05.000Z] [INFO] Opened {"region":"eu-central-1"}');
  });

  it('should route levels to the matching console method', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = new ConsoleLogger();
    logger.warn('Partial');
    logger.error('Failed');

    expect(warn).toHaveBeenCalledWith('[2026-01-02T03:04:05.000Z] [WARN] Partial');
    expect(error).toHaveBeenCalledWith('[2026-01-02T03:04:05.000Z] [ERROR] Failed');
  });

  it('should drop messages below the minimum level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

    new ConsoleLogger('info').debug('Hidden');
    new ConsoleLogger('trace').trace('Shown');

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith('[2026-01-02T03:04:05.000Z] [TRACE] Shown');
  });
});

describe('isLogLevel', () => {
  it('should accept known lowercase levels', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('WARN')).toBe(false);
    expect(isLogLevel('verbose')).toBe(false);
  });
});

describe('log helpers', () => {
  it('should log a completed operation at debug level', () => {
    const logger = recordingLogger();

    logOperation(logger, 'Scan', 'Accounts', 12, { count: 3 });

    expect(logger.debug).toHaveBeenCalledWith('Scan succeeded', {
      operation: 'Scan',
      tableName: 'Accounts',
      durationMs: 12,
      count: 3,
    });
  });

  it('should log a failure with its code', () => {
    const logger = recordingLogger();

    logError(logger, 'Query', 'Missing', new ResourceNotFoundError('Requested resource not found'));

    expect(logger.error).toHaveBeenCalledWith('Query failed', {
      operation: 'Query',
      tableName: 'Missing',
      errorName: 'ResourceNotFoundError',
      errorCode: 'ResourceNotFoundException',
      errorMessage: 'Requested resource not found',
      retryable: false,
    });
  });
});
