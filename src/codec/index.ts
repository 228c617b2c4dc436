export { AccountSchema, encodeAccount, decodeAccount } from './account.js';
