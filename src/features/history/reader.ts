/**
 * History reader and retention purge.
 */

import { existsSync, readdirSync, readFileSync, unlinkSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod/v4';
import { createLogger } from '../../shared/utils/index.js';

const log = createLogger('history');

const HistoryEntrySchema = z.object({
  timestamp: z.string(),
  task: z.string(),
  documentPath: z.string(),
  success: z.boolean(),
  message: z.string(),
  validation: z.string(),
  totalCorrections: z.number(),
  durationMs: z.number(),
});

export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;

function listHistoryFiles(historyDir: string): string[] {
  if (!existsSync(historyDir)) return [];
  return readdirSync(historyDir).filter((file) => file.endsWith('.jsonl')).sort();
}

/** Most recent entries first; unreadable lines are skipped */
export function readHistory(historyDir: string, limit = 20): HistoryEntry[] {
  const entries: HistoryEntry[] = [];
  for (const file of listHistoryFiles(historyDir).reverse()) {
    const lines = readFileSync(join(historyDir, file), 'utf-8').split('\n').filter((line) => line.trim());
    for (const line of lines.reverse()) {
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch {
        log.warn('Skipping malformed history line', { file });
        continue;
      }
      const parsed = HistoryEntrySchema.safeParse(raw);
      if (!parsed.success) {
        log.warn('Skipping invalid history entry', { file });
        continue;
      }
      entries.push(parsed.data);
      if (entries.length >= limit) {
        return entries;
      }
    }
  }
  return entries;
}

/**
 * Delete history files older than the retention period.
 * @returns Deleted file names
 */
export function purgeHistory(historyDir: string, retentionDays: number, now: Date): string[] {
  const cutoff = new Date(now.getTime() - retentionDays * 24 * 60 * 60 * 1000).toISOString().slice(0, 10);
  const deleted: string[] = [];
  for (const file of listHistoryFiles(historyDir)) {
    if (file.replace('.jsonl', '') < cutoff) {
      unlinkSync(join(historyDir, file));
      deleted.push(file);
    }
  }
  return deleted;
}
