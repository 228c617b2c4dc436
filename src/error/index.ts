/**
 * Account Store Error Handling
 *
 * Error classes and error handling utilities for account store operations.
 */

export type { AccountStoreErrorOptions, OperationContext } from './error.js';
export { AccountStoreError } from './error.js';

// Error categories
export {
  ConfigurationError,
  ConnectionClosedError,
  AuthenticationError,
  CredentialsNotFoundError,
  AccessDeniedError,
  ValidationError,
  ThroughputError,
  ProvisionedThroughputExceededError,
  RequestLimitExceededError,
  ThrottlingExceptionError,
  ServiceError,
  InternalServerError,
  ServiceUnavailableError,
  ResourceNotFoundError,
  ResourceInUseError,
  SerializationError,
  DataIntegrityError,
} from './categories.js';

// Error mapping
export { mapAwsError } from './mapper.js';
