/**
 * History writer: JSONL append-only with date-based rotation.
 *
 * Writes to ~/.docmend/history/YYYY-MM-DD.jsonl when history is enabled.
 * Does nothing when disabled.
 */

import { appendFileSync, existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import type { ProcessingResult } from '../../core/models/index.js';
import type { ResultRecorder } from '../../core/orchestrator/index.js';

/** A result as stored on disk: document bytes are replaced by the file name */
export interface HistoryRecord extends Omit<ProcessingResult, 'artifact'> {
  timestamp: string;
  artifactName?: string;
}

export function toHistoryRecord(result: ProcessingResult, timestamp: string): HistoryRecord {
  const { artifact, ...rest } = result;
  return { timestamp, ...rest, artifactName: artifact?.fileName };
}

export class HistoryWriter implements ResultRecorder {
  private static instance: HistoryWriter | null = null;

  private enabled = false;
  private historyDir: string | null = null;

  private constructor() {}

  static getInstance(): HistoryWriter {
    if (!HistoryWriter.instance) {
      HistoryWriter.instance = new HistoryWriter();
    }
    return HistoryWriter.instance;
  }

  static resetInstance(): void {
    HistoryWriter.instance = null;
  }

  /**
   * @param enabled Whether results are recorded
   * @param historyDir Absolute path to the history directory (e.g. ~/.docmend/history)
   */
  init(enabled: boolean, historyDir: string): void {
    this.enabled = enabled;
    this.historyDir = historyDir;

    if (this.enabled && !existsSync(this.historyDir)) {
      mkdirSync(this.historyDir, { recursive: true });
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  record(result: ProcessingResult): void {
    this.write(toHistoryRecord(result, new Date().toISOString()));
  }

  /** Append a record to its day's JSONL file */
  write(record: HistoryRecord): void {
    if (!this.enabled || !this.historyDir) {
      return;
    }
    const filePath = join(this.historyDir, `${record.timestamp.slice(0, 10)}.jsonl`);
    appendFileSync(filePath, JSON.stringify(record) + '\n', 'utf-8');
  }
}

export function initHistoryWriter(enabled: boolean, historyDir: string): void {
  HistoryWriter.getInstance().init(enabled, historyDir);
}

export function resetHistoryWriter(): void {
  HistoryWriter.resetInstance();
}
