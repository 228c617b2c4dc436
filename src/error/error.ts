/**
 * Root of the account store error hierarchy.
 *
 * The SDK error behind a failure travels as the standard `cause`. When a
 * failure comes out of {@link AccountStore}, the error also records which
 * operation was running against which table.
 */

/**
 * Constructor options for {@link AccountStoreError}.
 */
export interface AccountStoreErrorOptions {
  /** e.g. 'ProvisionedThroughputExceededException', 'SerializationError' */
  code: string;
  message: string;
  httpStatusCode?: number;
  /** Whether the failed request may succeed if sent again */
  isRetryable?: boolean;
  /** Underlying SDK or network error */
  cause?: Error;
  details?: Record<string, unknown>;
}

/**
 * The store operation a failure belongs to.
 */
export interface OperationContext {
  operation: string;
  tableName: string;
}

export class AccountStoreError extends Error {
  readonly code: string;
  readonly httpStatusCode?: number;
  readonly isRetryable: boolean;
  readonly details?: Record<string, unknown>;
  private context?: OperationContext;

  constructor(options: AccountStoreErrorOptions) {
    super(options.message, { cause: options.cause });
    this.name = 'AccountStoreError';
    this.code = options.code;
    this.httpStatusCode = options.httpStatusCode;
    this.isRetryable = options.isRetryable ?? false;
    this.details = options.details;
  }

  /**
   * The underlying error, when it is an Error.
   */
  get originalError(): Error | undefined {
    return this.cause instanceof Error ? this.cause : undefined;
  }

  get operation(): string | undefined {
    return this.context?.operation;
  }

  get tableName(): string | undefined {
    return this.context?.tableName;
  }

  /**
   * Records the operation that failed. The first recorded operation is kept
   * when an error passes through more than one layer.
   */
  inOperation(operation: string, tableName: string): this {
    if (!this.context) {
      this.context = { operation, tableName };
    }
    return this;
  }

  toString(): string {
    const where = this.context ? ` in ${this.context.operation} on ${this.context.tableName}` : '';
    const status = this.httpStatusCode ? ` (HTTP ${this.httpStatusCode})` : '';
    const retry = this.isRetryable ? ' [retryable]' : '';
    return `[${this.code}] ${this.message}${where}${status}${retry}`;
  }

  toJSON(): Record<string, unknown> {
    const cause = this.originalError;
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      httpStatusCode: this.httpStatusCode,
      isRetryable: this.isRetryable,
      operation: this.context?.operation,
      tableName: this.context?.tableName,
      details: this.details,
      cause: cause ? { name: cause.name, message: cause.message } : undefined,
    };
  }
}
