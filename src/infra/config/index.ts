/**
 * Configuration - barrel exports
 */

export * from './paths.js';
export * from './global/index.js';
export {
  loadSessionState,
  saveSessionState,
  clearSessionState,
  writeFileAtomic,
  sessionLastFileRegistry,
  type SessionState,
  type LastFileRegistry,
} from './sessionState.js';
