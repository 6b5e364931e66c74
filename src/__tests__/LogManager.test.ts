import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('chalk', () => {
  const passthrough = (value: string) => value;
  const bold = Object.assign((value: string) => value, {
    cyan: (value: string) => value,
  });

  return {
    default: {
      gray: passthrough,
      blue: passthrough,
      yellow: passthrough,
      red: passthrough,
      green: passthrough,
      white: passthrough,
      bold,
    },
  };
});

import { LogManager } from '../shared/ui/LogManager.js';
import { error, info, setLogLevel, status, warn } from '../shared/ui/index.js';

describe('LogManager', () => {
  beforeEach(() => {
    // Given: no singleton state shared between tests
    LogManager.resetInstance();
    vi.restoreAllMocks();
  });

  it('should filter by info level as debug=false, info=true, error=true', () => {
    // Given: level info
    const manager = LogManager.getInstance();
    manager.setLogLevel('info');

    // When
    const debugResult = manager.shouldLog('debug');
    const infoResult = manager.shouldLog('info');
    const errorResult = manager.shouldLog('error');

    // Then
    expect(debugResult).toBe(false);
    expect(infoResult).toBe(true);
    expect(errorResult).toBe(true);
  });

  it('should reflect level change after setLogLevel', () => {
    // Given: the initial level (info)
    const manager = LogManager.getInstance();

    // When
    manager.setLogLevel('warn');

    // Then: info is suppressed, warn is shown
    expect(manager.shouldLog('info')).toBe(false);
    expect(manager.shouldLog('warn')).toBe(true);
    expect(manager.getLogLevel()).toBe('warn');
  });

  it('should clear singleton state when resetInstance is called', () => {
    // Given: an instance switched to error
    const first = LogManager.getInstance();
    first.setLogLevel('error');
    expect(first.shouldLog('info')).toBe(false);

    // When
    LogManager.resetInstance();
    const second = LogManager.getInstance();

    // Then: the new instance is back at the default level
    expect(second.shouldLog('info')).toBe(true);
  });
});

describe('console helpers', () => {
  beforeEach(() => {
    LogManager.resetInstance();
    vi.restoreAllMocks();
  });

  it('should print info and status lines at the default level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    info('Processing notes.docx');
    status('Validation', 'passed');

    expect(log.mock.calls).toEqual([['Processing notes.docx'], ['Validation: passed']]);
  });

  it('should suppress everything below the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const errorLog = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('error');

    info('hidden');
    warn('hidden too');
    error('Execution failed');

    expect(log).not.toHaveBeenCalled();
    expect(errorLog).toHaveBeenCalledWith('Execution failed');
  });
});
