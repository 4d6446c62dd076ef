import { ErrorResult, StoreErrorKind } from './types';

export class StoreError extends Error {
  readonly kind: StoreErrorKind;

  constructor(kind: StoreErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreError';
    this.kind = kind;
  }
}

const PERMISSION_CODES = ['SQLITE_READONLY', 'SQLITE_PERM', 'SQLITE_AUTH', 'EACCES', 'EPERM', 'EROFS'];

// Checked by shape: errors thrown by native modules may come from another realm
// (Jest's sandbox among them), where instanceof Error is false
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

// Extended SQLite codes keep their primary code as prefix (SQLITE_READONLY_DBMOVED)
export function classifyStoreError(error: unknown): StoreError {
  if (error instanceof StoreError) return error;

  const code = errorCode(error);
  let kind: StoreErrorKind = 'other';
  if (code && PERMISSION_CODES.some(p => code === p || code.startsWith(`${p}_`))) {
    kind = 'permission_denied';
  } else if (code && code.startsWith('SQLITE_CONSTRAINT')) {
    kind = 'constraint_violation';
  }

  return new StoreError(kind, errorMessage(error), { cause: error });
}

export const READ_ONLY_MESSAGE = 'Database is in read-only mode. Check file permissions.';

/**
 * Converts a caught failure into the result shape returned by every tool.
 * `prefix` names the operation, e.g. "Error listing expenses".
 */
export function toErrorResult(error: unknown, prefix: string): ErrorResult {
  const storeError = classifyStoreError(error);
  if (storeError.kind === 'permission_denied') {
    return { status: 'error', kind: storeError.kind, message: READ_ONLY_MESSAGE };
  }
  return { status: 'error', kind: storeError.kind, message: `${prefix}: ${storeError.message}` };
}

export function notFound(expenseId: number): ErrorResult {
  return { status: 'error', kind: 'not_found', message: `Expense ${expenseId} not found` };
}
