/**
 * Default configuration values for the account store connection.
 * @module config/defaults
 */

import type { LogLevel } from '../observability/logging.js';

/**
 * Default AWS region, for both DynamoDB Local and the service.
 */
export const DEFAULT_REGION = 'eu-central-1';

/**
 * DynamoDB Local endpoint.
 */
export const LOCAL_ENDPOINT = 'http://127.0.0.1:8000';

/**
 * Shared credentials file profile used for the service.
 */
export const DEFAULT_PROFILE = 'home-cloud';

/**
 * Placeholder credentials sent to DynamoDB Local.
 */
export const LOCAL_ACCESS_KEY_ID = 'local';
export const LOCAL_SECRET_ACCESS_KEY = 'local';

export const DEFAULT_LOG_LEVEL: LogLevel = 'info';
