/**
 * Global configuration - barrel exports
 */

export {
  GlobalConfigSchema,
  getConfigKeys,
  loadGlobalConfig,
  invalidateGlobalConfigCache,
  setConfigValue,
  type GlobalConfig,
  type RawGlobalConfig,
} from './globalConfig.js';
