import { classifyStoreError, errorCode, errorMessage, READ_ONLY_MESSAGE, StoreError, toErrorResult } from './errors';

function sqliteError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('classifyStoreError', () => {
  it('should map read-only and permission codes to permission_denied', () => {
    expect(classifyStoreError(sqliteError('attempt to write a readonly database', 'SQLITE_READONLY')).kind)
      .toBe('permission_denied');
    expect(classifyStoreError(sqliteError('database moved', 'SQLITE_READONLY_DBMOVED')).kind)
      .toBe('permission_denied');
    expect(classifyStoreError(sqliteError('permission denied', 'EACCES')).kind).toBe('permission_denied');
  });

  it('should map constraint codes to constraint_violation', () => {
    const error = classifyStoreError(sqliteError('NOT NULL constraint failed: expenses.date', 'SQLITE_CONSTRAINT_NOTNULL'));
    expect(error.kind).toBe('constraint_violation');
    expect(error.message).toBe('NOT NULL constraint failed: expenses.date');
  });

  it('should not guess from the message alone', () => {
    expect(classifyStoreError(new Error('attempt to write a readonly database')).kind).toBe('other');
    expect(classifyStoreError(sqliteError('database is locked', 'SQLITE_BUSY')).kind).toBe('other');
  });

  it('should read code and message from errors of another realm', () => {
    // Native modules under a sandboxed runner throw errors that fail instanceof Error
    const foreign = { name: 'SqliteError', message: 'attempt to write a readonly database', code: 'SQLITE_READONLY' };
    const error = classifyStoreError(foreign);
    expect(error.kind).toBe('permission_denied');
    expect(error.message).toBe('attempt to write a readonly database');
  });

  it('should keep the original error as cause', () => {
    const original = sqliteError('disk full', 'SQLITE_FULL');
    expect(classifyStoreError(original).cause).toBe(original);
  });

  it('should wrap non-Error values', () => {
    const error = classifyStoreError('boom');
    expect(error).toBeInstanceOf(StoreError);
    expect(error.message).toBe('boom');
  });

  it('should pass StoreErrors through unchanged', () => {
    const error = new StoreError('not_found', 'missing');
    expect(classifyStoreError(error)).toBe(error);
  });
});

describe('toErrorResult', () => {
  it('should use the read-only message for permission failures', () => {
    expect(toErrorResult(sqliteError('attempt to write a readonly database', 'SQLITE_READONLY'), 'Database error'))
      .toEqual({ status: 'error', kind: 'permission_denied', message: READ_ONLY_MESSAGE });
  });

  it('should prefix other failures with the operation', () => {
    expect(toErrorResult(new Error('no such column: amnt'), 'Error updating expense')).toEqual({
      status: 'error',
      kind: 'other',
      message: 'Error updating expense: no such column: amnt'
    });
  });
});

describe('errorCode and errorMessage', () => {
  it('should accept any object carrying the fields', () => {
    expect(errorCode({ code: 'ENOENT' })).toBe('ENOENT');
    expect(errorMessage({ message: 'no such file' })).toBe('no such file');
  });

  it('should ignore values without them', () => {
    expect(errorCode(null)).toBeUndefined();
    expect(errorCode({ code: 2 })).toBeUndefined();
    expect(errorMessage(42)).toBe('42');
  });
});
