import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  ContentionError,
  DependencyUnavailableError,
  DuplicateRecordError,
  NotFoundError,
} from '../utils/errors';
import { translateMysqlError } from './mysqlErrors';

function driverError(code: string, message = code): Error {
  return Object.assign(new Error(message), { code });
}

describe('translateMysqlError', () => {
  it('turns duplicate keys into duplicate-record errors for the table', () => {
    const translated = translateMysqlError(driverError('ER_DUP_ENTRY'), 'DRAWING_EXECUTIONS');
    assert.ok(translated instanceof DuplicateRecordError);
    assert.strictEqual(translated.table, 'DRAWING_EXECUTIONS');
  });

  it('treats deadlocks and lock timeouts as retryable contention', () => {
    for (const code of ['ER_LOCK_DEADLOCK', 'ER_LOCK_WAIT_TIMEOUT']) {
      const translated = translateMysqlError(driverError(code));
      assert.ok(translated instanceof ContentionError);
      assert.strictEqual(translated.retryable, true);
    }
  });

  it('treats lost connections as an unavailable dependency', () => {
    const cause = driverError('ECONNREFUSED', 'connect ECONNREFUSED 127.0.0.1:3306');
    const translated = translateMysqlError(cause);
    assert.ok(translated instanceof DependencyUnavailableError);
    assert.strictEqual(translated.status, 503);
    assert.strictEqual(translated.cause, cause);
  });

  it('passes core errors through untouched', () => {
    const original = new NotFoundError('Drawing', 1);
    assert.strictEqual(translateMysqlError(original), original);
  });

  it('wraps non-errors and leaves unknown driver errors alone', () => {
    const unknown = driverError('ER_PARSE_ERROR', 'You have an error in your SQL syntax');
    assert.strictEqual(translateMysqlError(unknown), unknown);
    const wrapped = translateMysqlError('socket closed');
    assert.ok(wrapped instanceof Error);
    assert.strictEqual(wrapped.message, 'socket closed');
  });
});
