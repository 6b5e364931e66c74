/**
 * Child process helper
 *
 * Spawns a command, optionally feeds it stdin, collects bounded output and
 * enforces a timeout (SIGTERM, then SIGKILL after a grace period).
 * The promise rejects only when the process cannot be spawned; non-zero
 * exits, signals and timeouts are reported in the result.
 */

import { spawn } from 'node:child_process';
import { createLogger } from '../../shared/utils/index.js';

const log = createLogger('process');

const DEFAULT_MAX_BUFFER_BYTES = 10 * 1024 * 1024;
const FORCE_KILL_DELAY_MS = 2_000;

export interface RunProcessOptions {
  cwd?: string;
  env?: Record<string, string>;
  input?: string;
  timeoutMs: number;
  maxBufferBytes?: number;
}

export interface ProcessResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** Output exceeded the buffer limit and the process was killed */
  overflowed: boolean;
  durationMs: number;
}

export function runProcess(
  command: string,
  args: readonly string[],
  options: RunProcessOptions,
): Promise<ProcessResult> {
  const startedAt = Date.now();
  const maxBufferBytes = options.maxBufferBytes ?? DEFAULT_MAX_BUFFER_BYTES;

  return new Promise<ProcessResult>((resolve, reject) => {
    const child = spawn(command, [...args], {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let outputBytes = 0;
    let settled = false;
    let timedOut = false;
    let overflowed = false;
    let killTimer: ReturnType<typeof setTimeout> | undefined;

    const terminate = (): void => {
      if (killTimer !== undefined) return;
      child.kill('SIGTERM');
      killTimer = setTimeout(() => {
        if (!settled) {
          child.kill('SIGKILL');
        }
      }, FORCE_KILL_DELAY_MS);
      killTimer.unref?.();
    };

    const timeoutTimer = setTimeout(() => {
      timedOut = true;
      log.debug('Process timed out', { command, timeoutMs: options.timeoutMs });
      terminate();
    }, options.timeoutMs);
    timeoutTimer.unref?.();

    const cleanup = (): void => {
      clearTimeout(timeoutTimer);
      if (killTimer !== undefined) {
        clearTimeout(killTimer);
      }
    };

    const append = (target: 'stdout' | 'stderr', text: string): void => {
      if (overflowed) return;
      outputBytes += Buffer.byteLength(text);
      if (outputBytes > maxBufferBytes) {
        overflowed = true;
        log.debug('Process output exceeded buffer limit', { command, maxBufferBytes });
        terminate();
        return;
      }
      if (target === 'stdout') {
        stdout += text;
      } else {
        stderr += text;
      }
    };

    // A character may span two chunks
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => append('stdout', chunk));
    child.stderr.on('data', (chunk: string) => append('stderr', chunk));

    // The child may exit before consuming stdin (EPIPE)
    child.stdin.on('error', (error: NodeJS.ErrnoException) => {
      log.debug('stdin write failed', { command, code: error.code });
    });

    child.on('error', (error: NodeJS.ErrnoException) => {
      if (settled) return;
      settled = true;
      cleanup();
      reject(error);
    });

    child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      if (settled) return;
      settled = true;
      cleanup();
      resolve({
        exitCode: code,
        signal,
        stdout,
        stderr,
        timedOut,
        overflowed,
        durationMs: Date.now() - startedAt,
      });
    });

    child.stdin.end(options.input ?? '');
  });
}
