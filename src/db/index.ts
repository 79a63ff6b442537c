/**
 * Database module exports
 */

export { SqliteSyncStore } from './SqliteSyncStore.js';
export { SCHEMA_SQL } from './schema.js';
