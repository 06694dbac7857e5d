import { describe, it, expect } from 'vitest';
import { InvalidEventDataError, MalformedEventError, StorageUnavailableError } from '../../src/domain/index.js';
import { isTransientStorageError, toStorageError } from '../../src/infrastructure/db/storage-errors.js';

const withCode = (message: string, code: string) => Object.assign(new Error(message), { code });

describe('isTransientStorageError', () => {
  it.each(['ECONNREFUSED', 'CONNECTION_CLOSED', '08006', '08001', '40001', '40P01', '57P01', '53300'])(
    'treats %s as transient',
    (code) => {
      expect(isTransientStorageError(withCode('failed', code))).toBe(true);
    },
  );

  it.each(['23505', '42P01', '22P02'])('treats %s as permanent', (code) => {
    expect(isTransientStorageError(withCode('failed', code))).toBe(false);
  });

  it('follows the cause chain', () => {
    const wrapped = new Error('query failed', { cause: withCode('read ECONNRESET', 'ECONNRESET') });

    expect(isTransientStorageError(wrapped)).toBe(true);
  });

  it('ignores values without a code', () => {
    expect(isTransientStorageError(new Error('plain'))).toBe(false);
    expect(isTransientStorageError('ECONNREFUSED')).toBe(false);
  });
});

describe('toStorageError', () => {
  it('wraps transient errors', () => {
    const original = withCode('connect ECONNREFUSED 127.0.0.1:5432', 'ECONNREFUSED');
    const mapped = toStorageError(original);

    if (!(mapped instanceof StorageUnavailableError)) throw new Error('expected a StorageUnavailableError');
    expect(mapped.kind).toBe('StorageUnavailable');
    expect(mapped.message).toBe('Storage unavailable: connect ECONNREFUSED 127.0.0.1:5432');
    expect(mapped.cause).toBe(original);
  });

  it('turns a value the column cannot hold into invalid event data', () => {
    const mapped = toStorageError(withCode('integer out of range', '22003'));

    if (!(mapped instanceof InvalidEventDataError)) throw new Error('expected an InvalidEventDataError');
    expect(mapped.kind).toBe('InvalidEventData');
    expect(mapped.message).toBe('Rejected by storage: integer out of range');
  });

  it('passes other errors through unchanged', () => {
    const unique = withCode('duplicate key', '23505');
    const malformed = new MalformedEventError(['user: Required']);

    expect(toStorageError(unique)).toBe(unique);
    expect(toStorageError(malformed)).toBe(malformed);
  });
});
