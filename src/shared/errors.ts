/**
 * Error taxonomy for the usage store.
 *
 * Write paths (record, reportTokens) catch every TallyError and log it;
 * read paths and startup let them propagate.
 */

export type TallyErrorCode = 'STORAGE' | 'VALIDATION' | 'MIGRATION';

export class TallyError extends Error {
  readonly code: TallyErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: TallyErrorCode,
    message: string,
    options?: { cause?: unknown; details?: Record<string, unknown> },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'TallyError';
    this.code = code;
    this.details = options?.details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The SQLite file could not be opened, read or written, or the handle was
 * already closed.
 */
export class StorageError extends TallyError {
  constructor(message: string, options?: { cause?: unknown; details?: Record<string, unknown> }) {
    super('STORAGE', message, options);
    this.name = 'StorageError';
  }
}

/**
 * Caller input was rejected: unknown primitive type, bad counts, or a
 * token report for a name that was never recorded.
 */
export class ValidationError extends TallyError {
  constructor(message: string, options?: { cause?: unknown; details?: Record<string, unknown> }) {
    super('VALIDATION', message, options);
    this.name = 'ValidationError';
  }
}

/**
 * The schema is newer than this build understands, or a migration step
 * failed. Nothing from the failed run is kept.
 */
export class MigrationError extends TallyError {
  constructor(message: string, options?: { cause?: unknown; details?: Record<string, unknown> }) {
    super('MIGRATION', message, options);
    this.name = 'MigrationError';
  }
}

/**
 * Runs a store operation and rethrows driver failures as StorageError.
 * TallyErrors raised inside pass through unchanged.
 */
export function wrapStorage<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof TallyError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new StorageError(`${operation} failed: ${message}`, { cause: err });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
