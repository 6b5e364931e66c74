/**
 * Tests for CodeRunner
 *
 * runProcess is mocked; these tests cover how process results become
 * execution outcomes.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';

const { mockRunProcess } = vi.hoisted(() => ({
  mockRunProcess: vi.fn(),
}));

vi.mock('../infra/runtime/process.js', () => ({
  runProcess: mockRunProcess,
}));

import { CodeRunner, WorkdirLock, javascriptRuntime, pythonRuntime } from '../infra/runtime/index.js';
import type { ProcessResult } from '../infra/runtime/index.js';

const bindings = { targetFilePath: '/docs/budget.xlsx', outputDir: '/docs', codesDir: '/home/u/.docmend/codes' };

function processResult(overrides: Partial<ProcessResult>): ProcessResult {
  return {
    exitCode: 0,
    signal: null,
    stdout: '',
    stderr: '',
    timedOut: false,
    overflowed: false,
    durationMs: 5,
    ...overrides,
  };
}

function createRunner(runtime = pythonRuntime) {
  return new CodeRunner({ runtime, scriptsDir: '/scripts', timeoutMs: 50, lock: new WorkdirLock() });
}

describe('CodeRunner', () => {
  beforeEach(() => {
    mockRunProcess.mockReset();
  });

  it('should feed the code unchanged to the Python loader with the bindings in the environment', async () => {
    // Given
    mockRunProcess.mockResolvedValue(processResult({ stdout: 'saved\n' }));

    // When
    const outcome = await createRunner().run('print("hi")', bindings);

    // Then
    expect(outcome).toEqual({ ok: true, stdout: 'saved\n', stderr: '', durationMs: 5 });
    const [command, args, options] = mockRunProcess.mock.calls[0] ?? [];
    expect(command).toBe('python3');
    expect(args[0]).toBe('-c');
    expect(args[1]).toContain("'TARGET_FILE_PATH': os.environ['TARGET_FILE_PATH']");
    expect(args[1]).toContain("exec(compile(source, name, 'exec'), scope)");
    expect(options).toEqual({
      cwd: '/docs',
      env: {
        TARGET_FILE_PATH: '/docs/budget.xlsx',
        OUTPUT_DIR: '/docs',
        CODES_DIR: '/home/u/.docmend/codes',
        PYTHONIOENCODING: 'utf-8',
      },
      input: 'print("hi")\n',
      timeoutMs: 50,
    });
  });

  it('should declare the JavaScript globals on the first line of the code', async () => {
    mockRunProcess.mockResolvedValue(processResult({}));

    await createRunner(javascriptRuntime).run('console.log(TARGET_FILE_PATH);\nfinish();', bindings);

    const [command, args, options] = mockRunProcess.mock.calls[0] ?? [];
    expect(command).toBe('node');
    expect(args).toEqual(['-']);
    expect(options).toMatchObject({
      input:
        'globalThis.TARGET_FILE_PATH = process.env.TARGET_FILE_PATH; ' +
        'globalThis.OUTPUT_DIR = process.env.OUTPUT_DIR; ' +
        'globalThis.CODES_DIR = process.env.CODES_DIR; ' +
        'console.log(TARGET_FILE_PATH);\nfinish();\n',
      env: { NODE_PATH: '/scripts/node_modules' },
    });
  });

  it('should use the last stderr line as the failure message', async () => {
    const stderr = 'Traceback (most recent call last):\n  File "<generated>", line 9, in <module>\nKeyError: \'Q3\'\n';
    mockRunProcess.mockResolvedValue(processResult({ exitCode: 1, stderr, stdout: 'partial' }));

    const outcome = await createRunner().run('x', bindings);

    expect(outcome).toEqual({
      ok: false,
      message: "KeyError: 'Q3'",
      trace: stderr,
      stdout: 'partial',
      exitCode: 1,
      timedOut: false,
      durationMs: 5,
    });
  });

  it('should report a timeout', async () => {
    mockRunProcess.mockResolvedValue(processResult({ exitCode: null, signal: 'SIGTERM', timedOut: true }));

    const outcome = await createRunner().run('x', bindings);

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.message).toBe('Execution timed out after 50ms');
    expect(outcome.trace).toBe('Execution timed out after 50ms');
    expect(outcome.timedOut).toBe(true);
  });

  it('should report output overflow', async () => {
    mockRunProcess.mockResolvedValue(processResult({ exitCode: null, signal: 'SIGTERM', overflowed: true }));

    const outcome = await createRunner().run('x', bindings);

    expect(outcome.ok ? '' : outcome.message).toBe('Execution output exceeded the buffer limit');
  });

  it('should describe silent signal and exit-code failures', async () => {
    mockRunProcess
      .mockResolvedValueOnce(processResult({ exitCode: null, signal: 'SIGKILL' }))
      .mockResolvedValueOnce(processResult({ exitCode: 3 }));
    const runner = createRunner();

    const killed = await runner.run('x', bindings);
    const exited = await runner.run('x', bindings);

    expect(killed.ok ? '' : killed.message).toBe('Process terminated by signal SIGKILL');
    expect(exited.ok ? '' : exited.message).toBe('Process exited with code 3');
  });

  it('should report an interpreter that cannot be started', async () => {
    mockRunProcess.mockRejectedValue(new Error('spawn python3 ENOENT'));

    const outcome = await createRunner().run('x', bindings);

    expect(outcome).toMatchObject({
      ok: false,
      message: 'Failed to start python3: spawn python3 ENOENT',
      exitCode: null,
      timedOut: false,
    });
  });
});
