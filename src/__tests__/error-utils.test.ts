/**
 * Tests for getErrorMessage and the error taxonomy
 */

import { describe, it, expect } from 'vitest';
import { getErrorMessage } from '../shared/utils/error.js';
import {
  DocumentNotFoundError,
  EmptyOracleResponseError,
  ExecutionExhaustedError,
  OracleError,
} from '../core/models/index.js';

describe('getErrorMessage', () => {
  it('should extract message from Error instances', () => {
    expect(getErrorMessage(new Error('test error'))).toBe('test error');
    expect(getErrorMessage(new TypeError('type error'))).toBe('type error');
  });

  it('should stringify non-Error values', () => {
    expect(getErrorMessage('string error')).toBe('string error');
    expect(getErrorMessage(42)).toBe('42');
    expect(getErrorMessage(undefined)).toBe('undefined');
    expect(getErrorMessage({ code: 'ERR' })).toBe('[object Object]');
  });
});

describe('error taxonomy', () => {
  it('should classify an empty oracle reply as an OracleError of kind empty', () => {
    const err = new EmptyOracleResponseError();

    expect(err).toBeInstanceOf(OracleError);
    expect(err.kind).toBe('empty');
    expect(err.name).toBe('EmptyOracleResponseError');
    expect(getErrorMessage(err)).toBe('Oracle returned an empty response');
  });

  it('should default oracle failures to transport and keep the cause', () => {
    const cause = new Error('socket hang up');
    const err = new OracleError('Anthropic request failed', undefined, { cause });

    expect(err.kind).toBe('transport');
    expect(err.cause).toBe(cause);
  });

  it('should carry counters and the last code on exhaustion', () => {
    const counters = { validationAttempts: 0, validatorCorrections: 0, errorRetries: 3 };
    const err = new ExecutionExhaustedError('boom', { trace: 'Traceback', counters, code: 'x = 1 / 0' });

    expect(err.counters.errorRetries).toBe(3);
    expect(err.code).toBe('x = 1 / 0');
    expect(err.trace).toBe('Traceback');
  });

  it('should record why no document was found', () => {
    const err = new DocumentNotFoundError('missing_path', 'File not found: /tmp/a.docx', '/tmp/a.docx');

    expect(err.reason).toBe('missing_path');
    expect(err.path).toBe('/tmp/a.docx');
  });
});
