import { InvalidEventDataError, StorageUnavailableError, isReconciliationError } from '../../domain/index.js';

// SQLSTATE codes worth retrying: serialization/deadlock, admin shutdown,
// too many connections. Class 08 (connection exceptions) is matched by prefix.
const TRANSIENT_SQLSTATES = new Set(['40001', '40P01', '57P01', '57P02', '57P03', '53300']);

// Socket-level and postgres.js connection codes.
const TRANSIENT_CLIENT_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
  'CONNECT_TIMEOUT',
]);

function readCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** Walks the `cause` chain: drivers and ORMs wrap the socket error. */
export function isTransientStorageError(err: unknown, depth = 0): boolean {
  const code = readCode(err);
  if (code !== undefined && (code.startsWith('08') || TRANSIENT_SQLSTATES.has(code) || TRANSIENT_CLIENT_CODES.has(code))) {
    return true;
  }
  if (depth < 5 && err instanceof Error && err.cause !== undefined) {
    return isTransientStorageError(err.cause, depth + 1);
  }
  return false;
}

/** SQLSTATE class 22: a value the column cannot hold. Retrying cannot help. */
export function isDataException(err: unknown): boolean {
  return readCode(err)?.startsWith('22') ?? false;
}

/**
 * Maps database failures onto the pipeline's error kinds:
 * transient ones to `StorageUnavailableError` (retried), data exceptions
 * to `InvalidEventDataError` (the handle fails, the entry is acknowledged).
 * Other errors pass through unchanged.
 */
export function toStorageError(err: unknown): unknown {
  if (isReconciliationError(err)) return err;

  const detail = err instanceof Error ? err.message : String(err);
  if (isTransientStorageError(err)) {
    return new StorageUnavailableError(`Storage unavailable: ${detail}`, err);
  }
  if (isDataException(err)) {
    return new InvalidEventDataError(`Rejected by storage: ${detail}`);
  }
  return err;
}
