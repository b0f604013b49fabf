import {
  ContentionError,
  CoreError,
  DependencyUnavailableError,
  DuplicateRecordError,
} from '../utils/errors';

const CONTENTION_CODES = new Set(['ER_LOCK_DEADLOCK', 'ER_LOCK_WAIT_TIMEOUT']);

const UNAVAILABLE_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'PROTOCOL_CONNECTION_LOST',
  'ER_CON_COUNT_ERROR',
  'POOL_CLOSED',
]);

const errorCode = (error: unknown): string | undefined => {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
};

/**
 * Maps mysql2 driver failures onto the core error taxonomy. Errors that are
 * already part of the taxonomy pass through untouched.
 */
export const translateMysqlError = (error: unknown, table = 'unknown'): Error => {
  if (error instanceof CoreError || error instanceof DuplicateRecordError) {
    return error;
  }

  const code = errorCode(error);
  if (code === 'ER_DUP_ENTRY') {
    return new DuplicateRecordError(table, error);
  }
  if (code && CONTENTION_CODES.has(code)) {
    return new ContentionError('Row lock conflict, retry the request', error);
  }
  if (code && UNAVAILABLE_CODES.has(code)) {
    return new DependencyUnavailableError('Ledger store is unreachable', error);
  }
  return error instanceof Error ? error : new Error(String(error));
};
