/**
 * `docmend history` command handler
 */

import { getHistoryDir } from '../../infra/config/index.js';
import { header, info, status, success } from '../../shared/ui/index.js';
import { preview } from '../../shared/utils/index.js';
import { purgeHistory, readHistory } from './reader.js';

export function showHistory(limit: number): void {
  const entries = readHistory(getHistoryDir(), limit);
  if (entries.length === 0) {
    info('No history recorded yet.');
    return;
  }
  header(`Last ${entries.length} request${entries.length === 1 ? '' : 's'}`);
  for (const entry of entries) {
    status(entry.timestamp, `${entry.success ? 'OK ' : 'ERR'} ${entry.validation} ${entry.documentPath}`);
    info(`  ${preview(entry.task, 80)} (corrections: ${entry.totalCorrections})`);
  }
}

export function purgeOldHistory(retentionDays: number): void {
  const deleted = purgeHistory(getHistoryDir(), retentionDays, new Date());
  success(`Deleted ${deleted.length} history file${deleted.length === 1 ? '' : 's'}`);
}
