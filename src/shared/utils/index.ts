/**
 * Utility barrel exports
 */

export { getErrorMessage } from './error.js';
export { truncate, preview, lastNonEmptyLine } from './text.js';
export {
  createLogger,
  initDebugLogger,
  resetDebugLogger,
  isDebugEnabled,
  type Logger,
  type DebugConfig,
} from './debug.js';
