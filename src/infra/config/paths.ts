/**
 * Locations of docmend's on-disk state.
 *
 * Everything lives under ~/.docmend unless DOCMEND_HOME points elsewhere.
 */

import { existsSync, mkdirSync } from 'node:fs';
import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';
import { CONFIG_DIR_NAME } from '../../shared/constants.js';

export function getGlobalConfigDir(): string {
  return process.env.DOCMEND_HOME || join(homedir(), CONFIG_DIR_NAME);
}

export function getGlobalConfigPath(): string {
  return join(getGlobalConfigDir(), 'config.yaml');
}

export function getDefaultCodesDir(): string {
  return join(getGlobalConfigDir(), 'codes');
}

export function getDefaultArchiveDir(): string {
  return join(getGlobalConfigDir(), 'archive');
}

export function getDefaultWorkDir(): string {
  return join(tmpdir(), 'docmend');
}

/** Install prefix for packages fetched on behalf of generated JavaScript */
export function getScriptsDir(): string {
  return join(getGlobalConfigDir(), 'packages');
}

export function getDebugLogPath(): string {
  return join(getGlobalConfigDir(), 'logs', 'debug.log');
}

export function getHistoryDir(): string {
  return join(getGlobalConfigDir(), 'history');
}

export function getSessionStatePath(): string {
  return join(getGlobalConfigDir(), 'session-state.json');
}

export function ensureDir(dir: string): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}
