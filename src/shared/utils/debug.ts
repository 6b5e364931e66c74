/**
 * Debug logger
 *
 * Appends timestamped lines to a debug log file when debug logging is
 * enabled. Modules obtain a named logger with createLogger().
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

export interface DebugConfig {
  enabled: boolean;
  logFile?: string;
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

let debugEnabled = false;
let debugLogFile: string | null = null;

export function initDebugLogger(config: DebugConfig): void {
  debugEnabled = config.enabled;
  debugLogFile = config.logFile ?? null;
  if (debugEnabled && debugLogFile) {
    mkdirSync(dirname(debugLogFile), { recursive: true });
  }
}

export function resetDebugLogger(): void {
  debugEnabled = false;
  debugLogFile = null;
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

function formatData(data: unknown): string {
  if (data === undefined) return '';
  if (typeof data === 'string') return ` ${data}`;
  try {
    return ` ${JSON.stringify(data)}`;
  } catch {
    return ` ${String(data)}`;
  }
}

function write(level: LogLevel, name: string, message: string, data: unknown): void {
  if (!debugEnabled || !debugLogFile) {
    return;
  }
  const line = `${new Date().toISOString()} [${level}] [${name}] ${message}${formatData(data)}\n`;
  appendFileSync(debugLogFile, line, 'utf-8');
}

export function createLogger(name: string): Logger {
  return {
    debug: (message, data) => write('DEBUG', name, message, data),
    info: (message, data) => write('INFO', name, message, data),
    warn: (message, data) => write('WARN', name, message, data),
    error: (message, data) => write('ERROR', name, message, data),
  };
}
