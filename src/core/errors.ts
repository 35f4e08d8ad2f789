/**
 * core/errors.ts
 *
 * Typed error hierarchy. Every throw site uses one of these.
 * The `code` property is what shows up in TweakError.code inside batch
 * reports and in the JSON-RPC error `data.errorCode`.
 */

import { TweakError } from './types';

export class TweakBaseError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype); // fix instanceof in TS
  }
}

/** Message of anything caught, whether or not it is an Error. */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Convert anything caught into the serializable envelope used in results.
 * Foreign errors (a bug in a tweak, a thrown string) become EXECUTION_ERROR.
 */
export function toTweakError(e: unknown): TweakError {
  if (e instanceof TweakBaseError) {
    return { code: e.code, message: e.message, details: e.details };
  }
  return {
    code: 'EXECUTION_ERROR',
    message: errorMessage(e)
  };
}

// ---------------------------------------------------------------------------
// Execution errors (Windows API layer)
// ---------------------------------------------------------------------------

/** The underlying OS call failed. */
export class ExecutionError extends TweakBaseError {
  constructor(operation: string, message: string, details?: Record<string, unknown>) {
    super(message, 'EXECUTION_ERROR', { operation, ...details });
  }
}

/** Access denied by the OS, usually a permissions issue. */
export class AccessDeniedError extends TweakBaseError {
  constructor(resource: string) {
    super(`Access denied: "${resource}"`, 'ACCESS_DENIED', { resource });
  }
}

/** A PowerShell invocation ran past its deadline. */
export class TimeoutError extends TweakBaseError {
  constructor(operation: string, timeoutMs: number) {
    super(
      `Operation "${operation}" exceeded timeout of ${timeoutMs}ms`,
      'TIMEOUT',
      { operation, timeoutMs }
    );
  }
}

// ---------------------------------------------------------------------------
// Catalog errors
// ---------------------------------------------------------------------------

/** A selection or a record entry names an id the catalog does not define. */
export class UnknownTweakError extends TweakBaseError {
  constructor(tweakId: string) {
    super(`Unknown tweak: "${tweakId}"`, 'UNKNOWN_TWEAK', { tweakId });
  }
}

/** A recorded id now belongs to a one-way tweak, so there is no undo to run. */
export class NotReversibleError extends TweakBaseError {
  constructor(tweakId: string) {
    super(`Tweak "${tweakId}" is not reversible`, 'NOT_REVERSIBLE', { tweakId });
  }
}

/** The tweak catalog could not be loaded. Fatal at startup. */
export class CatalogError extends TweakBaseError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CATALOG_INVALID', details);
  }
}

/** config/settings.json failed validation. Fatal at startup. */
export class ConfigError extends TweakBaseError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_INVALID', details);
  }
}

// ---------------------------------------------------------------------------
// Persistence errors
// ---------------------------------------------------------------------------

/** The applied-tweaks record could not be written. Stops the current batch. */
export class PersistenceError extends TweakBaseError {
  constructor(filePath: string, cause: string, details?: Record<string, unknown>) {
    super(
      `Could not persist applied-tweaks record "${filePath}": ${cause}`,
      'PERSISTENCE_FAILURE',
      { filePath, ...details }
    );
  }
}

/** The record exists but cannot be trusted. Fatal at startup. */
export class RecordCorruptError extends TweakBaseError {
  constructor(filePath: string, reason: string) {
    super(
      `Applied-tweaks record "${filePath}" is corrupt: ${reason}`,
      'RECORD_CORRUPT',
      { filePath, reason }
    );
  }
}

// ---------------------------------------------------------------------------
// Batch control
// ---------------------------------------------------------------------------

/** Reported for every id left unattempted after a persistence failure. */
export class BatchAbortedError extends TweakBaseError {
  constructor(tweakId: string, causeCode: string) {
    super(
      `Tweak "${tweakId}" was not attempted: batch stopped after ${causeCode}`,
      'BATCH_ABORTED',
      { tweakId, causeCode }
    );
  }
}
