/**
 * Error taxonomy for the sync engine
 * @module errors
 */

/**
 * Stable error codes, safe to match on across package boundaries
 */
export type SyncErrorCode =
  | 'VALIDATION'
  | 'TRANSIENT_TRANSPORT'
  | 'CONNECTIVITY_LOST'
  | 'PERMANENT_REJECTION'
  | 'STORAGE_CORRUPTION'
  | 'CYCLE_IN_PROGRESS'
  | 'NOT_FOUND';

/**
 * Base class for every error raised by the engine
 */
export class SyncEngineError extends Error {
  readonly code: SyncErrorCode;

  constructor(code: SyncErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A single field-level validation problem
 */
export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Malformed payload or illegal local write. Never queued.
 */
export class ValidationError extends SyncEngineError {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super('VALIDATION', message);
    this.issues = issues;
  }
}

/**
 * The authority could not be reached or answered with something unusable.
 * Entries that were sent are retried with backoff.
 */
export class TransientTransportError extends SyncEngineError {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super('TRANSIENT_TRANSPORT', message, { cause: options.cause });
    this.status = options.status;
  }
}

/**
 * Connectivity dropped or the cycle timed out mid-flight.
 * Nothing from the exchange is applied.
 */
export class ConnectivityLostError extends SyncEngineError {
  constructor(message = 'Connectivity lost during sync', options?: { cause?: unknown }) {
    super('CONNECTIVITY_LOST', message, options);
  }
}

/**
 * The authority refused a change for good (rule violation)
 */
export class PermanentRejectionError extends SyncEngineError {
  readonly entityId: string;

  constructor(entityId: string, reason: string) {
    super('PERMANENT_REJECTION', reason);
    this.entityId = entityId;
  }
}

/**
 * Persisted data can no longer be read. Halts sync for the collection.
 */
export class StorageCorruptionError extends SyncEngineError {
  readonly collection: string;
  readonly documentId?: string;

  constructor(collection: string, message: string, documentId?: string) {
    super('STORAGE_CORRUPTION', message);
    this.collection = collection;
    this.documentId = documentId;
  }
}

export class CycleInProgressError extends SyncEngineError {
  constructor(message = 'A sync cycle is in progress') {
    super('CYCLE_IN_PROGRESS', message);
  }
}

export class NotFoundError extends SyncEngineError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}

/**
 * Render any thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
