/**
 * Error mapping utilities for converting AWS SDK errors to appropriate AccountStoreError instances.
 */

import { AccountStoreError } from './error.js';
import {
  AuthenticationError,
  CredentialsNotFoundError,
  AccessDeniedError,
  ValidationError,
  ProvisionedThroughputExceededError,
  RequestLimitExceededError,
  ThrottlingExceptionError,
  InternalServerError,
  ServiceUnavailableError,
  ResourceNotFoundError,
  ResourceInUseError,
} from './categories.js';

/**
 * AWS SDK error interface
 */
interface AwsError extends Error {
  code?: string;
  statusCode?: number;
  $metadata?: {
    httpStatusCode?: number;
    requestId?: string;
  };
  $fault?: 'client' | 'server';
}

/**
 * Type guard to check if error is an AWS SDK error
 */
function isAwsError(error: unknown): error is AwsError {
  return error instanceof Error;
}

/**
 * Maps AWS SDK errors to appropriate AccountStoreError instances
 */
export function mapAwsError(error: unknown): AccountStoreError {
  if (error instanceof AccountStoreError) {
    return error;
  }

  if (!isAwsError(error)) {
    return new AccountStoreError({
      code: 'UnknownError',
      message: String(error),
      isRetryable: false,
    });
  }

  const errorCode = error.code || error.name || 'UnknownError';
  const message = error.message;
  const httpStatusCode = error.$metadata?.httpStatusCode ?? error.statusCode;

  switch (errorCode) {
    // Authentication errors
    case 'CredentialsProviderError':
    case 'CredentialsNotFound':
    case 'MissingAuthenticationTokenException':
      return new CredentialsNotFoundError(message, error);

    case 'AccessDeniedException':
    case 'UnauthorizedException':
      return new AccessDeniedError(message, error);

    case 'UnrecognizedClientException':
    case 'InvalidSignatureException':
    case 'SignatureDoesNotMatchException':
    case 'ExpiredTokenException':
      return new AuthenticationError(message, httpStatusCode, error);

    // Validation errors
    case 'ValidationException':
      return new ValidationError(message, httpStatusCode, error);

    // Throughput errors
    case 'ProvisionedThroughputExceededException':
      return new ProvisionedThroughputExceededError(message, error);

    case 'RequestLimitExceeded':
      return new RequestLimitExceededError(message, error);

    case 'ThrottlingException':
      return new ThrottlingExceptionError(message, error);

    // Service errors
    case 'InternalServerError':
    case 'InternalFailure':
      return new InternalServerError(message, error);

    case 'ServiceUnavailable':
    case 'ServiceUnavailableException':
      return new ServiceUnavailableError(message, error);

    case 'ResourceNotFoundException':
      return new ResourceNotFoundError(message, error);

    case 'ResourceInUseException':
      return new ResourceInUseError(message, error);

    // Network/timeout errors - retryable
    case 'TimeoutError':
    case 'RequestTimeout':
    case 'RequestTimeoutException':
    case 'ECONNREFUSED':
    case 'ECONNRESET':
      return new AccountStoreError({
        code: errorCode,
        message: message || 'Request timeout',
        httpStatusCode: httpStatusCode ?? 408,
        isRetryable: true,
        cause: error,
      });

    default:
      return mapByStatusOrFault(error, errorCode, message, httpStatusCode);
  }
}

/**
 * Maps errors based on HTTP status code or fault type
 */
function mapByStatusOrFault(
  error: AwsError,
  errorCode: string,
  message: string,
  httpStatusCode?: number
): AccountStoreError {
  if (httpStatusCode) {
    switch (httpStatusCode) {
      case 400:
        return new ValidationError(message, httpStatusCode, error);
      case 401:
        return new AuthenticationError(message, httpStatusCode, error);
      case 403:
        return new AccessDeniedError(message, error);
      case 408:
      case 429:
        return new AccountStoreError({
          code: errorCode,
          message,
          httpStatusCode,
          isRetryable: true,
          cause: error,
        });
      case 500:
        return new InternalServerError(message, error);
      case 503:
        return new ServiceUnavailableError(message, error);
    }
  }

  return new AccountStoreError({
    code: errorCode,
    message: message || 'An error occurred',
    httpStatusCode,
    isRetryable: error.$fault === 'server',
    cause: error,
  });
}
