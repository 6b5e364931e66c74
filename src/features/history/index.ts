export {
  HistoryWriter,
  initHistoryWriter,
  resetHistoryWriter,
  toHistoryRecord,
  type HistoryRecord,
} from './writer.js';
export { readHistory, purgeHistory, type HistoryEntry } from './reader.js';
export { showHistory, purgeOldHistory } from './showHistory.js';
