/**
 * error 工具测试
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { formatError, isNamedError } from '../../src/utils/error/index.js';

describe('formatError', () => {
  it('formats the common error shapes', () => {
    assert.equal(formatError(null), '未知错误');
    assert.equal(formatError(undefined), '未知错误');
    assert.equal(formatError('plain'), 'plain');
    assert.equal(formatError(new Error('boom')), 'boom');
    assert.equal(formatError({ code: 'E_CONN' }), 'E_CONN');
    assert.equal(formatError({ msg: '', message: 'from message' }), 'from message');
    assert.equal(formatError({ a: 1 }), '{"a":1}');
    assert.equal(formatError(42), '42');
  });
});

describe('isNamedError', () => {
  it('matches errors by name', () => {
    const err = Object.assign(new Error('x'), { name: 'TimeoutError' });
    assert.equal(isNamedError(err, 'TimeoutError'), true);
    assert.equal(isNamedError(err, 'ConfigValidationError'), false);
    assert.equal(isNamedError({ name: 'TimeoutError' }, 'TimeoutError'), false);
  });
});
