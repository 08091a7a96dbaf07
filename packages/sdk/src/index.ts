/**
 * Household Sync SDK
 *
 * A local-first record store for household data (tasks, calendar events,
 * points ledger) with delta synchronization against an authority.
 *
 * @packageDocumentation
 */

// Errors and logging
export * from './errors.js';
export * from './logger.js';

// Storage
export * from './storage/index.js';

// Outbox
export * from './outbox/index.js';

// Conflicts
export * from './resolver/index.js';
export * from './conflicts/index.js';

// Network
export * from './network/index.js';

// Transport
export * from './transport/index.js';

// Sync
export * from './sync/index.js';

// Client
export * from './client/index.js';

// Version
export const VERSION = '0.1.0' as const;
