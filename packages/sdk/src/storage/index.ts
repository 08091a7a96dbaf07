/**
 * Storage module - handles all local database operations
 * @module storage
 */

export * from './schema.js';
export * from './init.js';
export * from './payloads.js';
export * from './entity-store.js';
