import { AccountStoreError } from './error.js';

/**
 * Error thrown when the client is misconfigured
 * (e.g., invalid table name, invalid region, invalid credentials)
 */
export class ConfigurationError extends AccountStoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: 'ConfigurationError',
      message,
      isRetryable: false,
      details,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Error for operations attempted after the connection was closed
 */
export class ConnectionClosedError extends AccountStoreError {
  constructor() {
    super({
      code: 'ConnectionClosed',
      message: 'Connection has been closed',
      isRetryable: false,
    });
    this.name = 'ConnectionClosedError';
  }
}

/**
 * Error thrown when authentication fails
 */
export class AuthenticationError extends AccountStoreError {
  constructor(message: string, httpStatusCode?: number, cause?: Error) {
    super({
      code: 'AuthenticationError',
      message,
      httpStatusCode: httpStatusCode ?? 401,
      isRetryable: false,
      cause,
    });
    this.name = 'AuthenticationError';
  }
}

/**
 * Error for missing credentials
 */
export class CredentialsNotFoundError extends AuthenticationError {
  constructor(message = 'AWS credentials not found. Please configure credentials.', cause?: Error) {
    super(message, undefined, cause);
    this.name = 'CredentialsNotFoundError';
  }
}

/**
 * Error for access denied
 */
export class AccessDeniedError extends AuthenticationError {
  constructor(message: string, cause?: Error) {
    super(message, 403, cause);
    this.name = 'AccessDeniedError';
  }
}

/**
 * Error thrown when the service rejects a request as malformed
 */
export class ValidationError extends AccountStoreError {
  constructor(message: string, httpStatusCode?: number, cause?: Error) {
    super({
      code: 'ValidationException',
      message,
      httpStatusCode: httpStatusCode ?? 400,
      isRetryable: false,
      cause,
    });
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when throughput limits are exceeded
 */
export class ThroughputError extends AccountStoreError {
  constructor(message: string, code: string, cause?: Error) {
    super({
      code,
      message,
      httpStatusCode: 400,
      isRetryable: true,
      cause,
    });
    this.name = 'ThroughputError';
  }
}

/**
 * Error for provisioned throughput exceeded
 */
export class ProvisionedThroughputExceededError extends ThroughputError {
  constructor(message = 'Provisioned throughput exceeded', cause?: Error) {
    super(message, 'ProvisionedThroughputExceededException', cause);
    this.name = 'ProvisionedThroughputExceededError';
  }
}

/**
 * Error for request limit exceeded
 */
export class RequestLimitExceededError extends ThroughputError {
  constructor(message = 'Request rate limit exceeded', cause?: Error) {
    super(message, 'RequestLimitExceeded', cause);
    this.name = 'RequestLimitExceededError';
  }
}

/**
 * Error for throttling
 */
export class ThrottlingExceptionError extends ThroughputError {
  constructor(message = 'Request throttled', cause?: Error) {
    super(message, 'ThrottlingException', cause);
    this.name = 'ThrottlingExceptionError';
  }
}

/**
 * Error thrown for service-level issues
 */
export class ServiceError extends AccountStoreError {
  constructor(
    message: string,
    code: string,
    httpStatusCode?: number,
    cause?: Error,
    isRetryable = true
  ) {
    super({
      code,
      message,
      httpStatusCode,
      isRetryable,
      cause,
    });
    this.name = 'ServiceError';
  }
}

/**
 * Error for internal server error
 */
export class InternalServerError extends ServiceError {
  constructor(message = 'Internal server error occurred', cause?: Error) {
    super(message, 'InternalServerError', 500, cause);
    this.name = 'InternalServerError';
  }
}

/**
 * Error for service unavailable
 */
export class ServiceUnavailableError extends ServiceError {
  constructor(message = 'Service temporarily unavailable', cause?: Error) {
    super(message, 'ServiceUnavailable', 503, cause);
    this.name = 'ServiceUnavailableError';
  }
}

/**
 * Error for a table or index that does not exist
 */
export class ResourceNotFoundError extends ServiceError {
  constructor(message: string, cause?: Error) {
    super(message, 'ResourceNotFoundException', 400, cause, false);
    this.name = 'ResourceNotFoundError';
  }
}

/**
 * Error for a table that already exists or is being created or deleted
 */
export class ResourceInUseError extends ServiceError {
  constructor(message: string, cause?: Error) {
    super(message, 'ResourceInUseException', 400, cause, false);
    this.name = 'ResourceInUseError';
  }
}

/**
 * Error thrown when an account payload cannot be encoded or decoded
 */
export class SerializationError extends AccountStoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: 'SerializationError',
      message,
      isRetryable: false,
      details,
    });
    this.name = 'SerializationError';
  }
}

/**
 * Error thrown when a partition key lookup matches more than one row
 */
export class DataIntegrityError extends AccountStoreError {
  constructor(tableName: string, name: string, count: number) {
    super({
      code: 'DataIntegrityError',
      message: `Expected at most one row for account '${name}' in table ${tableName}, found ${count}`,
      isRetryable: false,
      details: { tableName, name, count },
    });
    this.name = 'DataIntegrityError';
  }
}
