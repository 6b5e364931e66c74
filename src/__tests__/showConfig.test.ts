/**
 * Tests for the `config` command handlers
 */

import { describe, expect, it } from 'vitest';
import { maskSecret, setConfig } from '../features/config/index.js';
import { loadGlobalConfig } from '../infra/config/index.js';

describe('maskSecret', () => {
  it('should report an unset value', () => {
    expect(maskSecret(undefined)).toBe('(not set)');
    expect(maskSecret('')).toBe('(not set)');
  });

  it('should fully mask short values', () => {
    expect(maskSecret('short')).toBe('********');
    expect(maskSecret('12345678')).toBe('********');
  });

  it('should keep the first four and last two characters of longer values', () => {
    expect(maskSecret('test-secret-key')).toBe('test...ey');
  });
});

describe('setConfig', () => {
  it('should persist the value so the next load sees it', () => {
    setConfig('execution_timeout_ms', '5000');

    expect(loadGlobalConfig().executionTimeoutMs).toBe(5000);
  });
});
