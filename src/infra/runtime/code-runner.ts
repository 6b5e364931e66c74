/**
 * Code runner
 *
 * Executes a code unit with the configured interpreter. The runtime's program
 * text is fed on stdin, with the document's directory as cwd.
 */

import { dirname } from 'node:path';
import type { ExecutionBindings, ExecutionOutcome } from '../../core/models/index.js';
import { DEFAULT_EXECUTION_TIMEOUT_MS } from '../../shared/constants.js';
import { createLogger, getErrorMessage, lastNonEmptyLine } from '../../shared/utils/index.js';
import type { ScriptRuntime } from './profiles.js';
import { runProcess, type ProcessResult } from './process.js';
import { WorkdirLock } from './workdir-lock.js';

const log = createLogger('code-runner');

/** Anything that can execute a code unit against bindings */
export interface CodeExecutor {
  run(code: string, bindings: ExecutionBindings): Promise<ExecutionOutcome>;
}

export interface CodeRunnerOptions {
  runtime: ScriptRuntime;
  /** Directory holding packages installed for generated code */
  scriptsDir: string;
  interpreter?: string;
  timeoutMs?: number;
  lock?: WorkdirLock;
}

function describeFailure(result: ProcessResult, timeoutMs: number): string {
  if (result.timedOut) {
    return `Execution timed out after ${timeoutMs}ms`;
  }
  if (result.overflowed) {
    return 'Execution output exceeded the buffer limit';
  }
  const line = lastNonEmptyLine(result.stderr);
  if (line) {
    return line;
  }
  if (result.signal) {
    return `Process terminated by signal ${result.signal}`;
  }
  return `Process exited with code ${String(result.exitCode)}`;
}

export class CodeRunner implements CodeExecutor {
  private readonly runtime: ScriptRuntime;
  private readonly scriptsDir: string;
  private readonly interpreter: string;
  private readonly timeoutMs: number;
  private readonly lock: WorkdirLock;

  constructor(options: CodeRunnerOptions) {
    this.runtime = options.runtime;
    this.scriptsDir = options.scriptsDir;
    this.interpreter = options.interpreter ?? options.runtime.defaultInterpreter;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_EXECUTION_TIMEOUT_MS;
    this.lock = options.lock ?? WorkdirLock.getInstance();
  }

  async run(code: string, bindings: ExecutionBindings): Promise<ExecutionOutcome> {
    const cwd = dirname(bindings.targetFilePath);
    return this.lock.withDirectory(cwd, (dir) => this.execute(code, bindings, dir));
  }

  private async execute(code: string, bindings: ExecutionBindings, cwd: string): Promise<ExecutionOutcome> {
    const startedAt = Date.now();
    log.debug('Executing code unit', { interpreter: this.interpreter, cwd, length: code.length });

    let result: ProcessResult;
    try {
      result = await runProcess(this.interpreter, this.runtime.runArgs, {
        cwd,
        env: this.runtime.env(bindings, this.scriptsDir),
        input: `${this.runtime.program(code)}\n`,
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      const message = `Failed to start ${this.interpreter}: ${getErrorMessage(error)}`;
      log.error(message);
      return {
        ok: false,
        message,
        trace: message,
        stdout: '',
        exitCode: null,
        timedOut: false,
        durationMs: Date.now() - startedAt,
      };
    }

    if (result.exitCode === 0 && !result.timedOut && !result.overflowed) {
      log.debug('Execution succeeded', { durationMs: result.durationMs });
      return { ok: true, stdout: result.stdout, stderr: result.stderr, durationMs: result.durationMs };
    }

    const message = describeFailure(result, this.timeoutMs);
    log.debug('Execution failed', { message, exitCode: result.exitCode, timedOut: result.timedOut });
    return {
      ok: false,
      message,
      trace: result.stderr || message,
      stdout: result.stdout,
      exitCode: result.exitCode,
      timedOut: result.timedOut,
      durationMs: result.durationMs,
    };
  }
}
