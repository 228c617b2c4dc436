/**
 * Account Store Client
 */

export type { ConnectionOptions, OpenDatabaseOptions } from './connection.js';
export { DynamoDBConnection, openDatabase } from './connection.js';
export { AccountStore } from './store.js';
