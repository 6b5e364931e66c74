/**
 * Config feature exports
 */

export { showConfig, setConfig, listConfigKeys, maskSecret } from './showConfig.js';
