/**
 * Session state
 *
 * Remembers the last processed document so a follow-up request can omit
 * the file.
 */

import { existsSync, readFileSync, renameSync, unlinkSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod/v4';
import { ensureDir, getSessionStatePath } from './paths.js';

const SessionStateSchema = z.object({
  lastFile: z.string().min(1),
  task: z.string().optional(),
  timestamp: z.string(),
});

export type SessionState = z.infer<typeof SessionStateSchema>;

/** Write via a temporary sibling and rename */
export function writeFileAtomic(path: string, content: string): void {
  const tempPath = `${path}.${process.pid}.tmp`;
  writeFileSync(tempPath, content, 'utf-8');
  renameSync(tempPath, path);
}

/**
 * Load session state from file
 * Returns null if the file doesn't exist or is not valid state
 */
export function loadSessionState(): SessionState | null {
  const path = getSessionStatePath();
  if (!existsSync(path)) {
    return null;
  }
  try {
    const result = SessionStateSchema.safeParse(JSON.parse(readFileSync(path, 'utf-8')));
    return result.success ? result.data : null;
  } catch {
    return null;
  }
}

export function saveSessionState(state: SessionState): void {
  const path = getSessionStatePath();
  ensureDir(dirname(path));
  writeFileAtomic(path, JSON.stringify(state, null, 2));
}

export function clearSessionState(): void {
  const path = getSessionStatePath();
  if (existsSync(path)) {
    unlinkSync(path);
  }
}

/** Remembers the last file a request worked on */
export interface LastFileRegistry {
  get(): string | null;
  set(path: string, task?: string): void;
}

export const sessionLastFileRegistry: LastFileRegistry = {
  get: () => loadSessionState()?.lastFile ?? null,
  set: (lastFile, task) => saveSessionState({ lastFile, task, timestamp: new Date().toISOString() }),
};
