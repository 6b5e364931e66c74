/**
 * `docmend config` command handlers
 */

import {
  getConfigKeys,
  getGlobalConfigPath,
  loadGlobalConfig,
  setConfigValue,
} from '../../infra/config/index.js';
import { header, info, status, success } from '../../shared/ui/index.js';

export function maskSecret(value: string | undefined): string {
  if (!value) return '(not set)';
  return value.length <= 8 ? '********' : `${value.slice(0, 4)}...${value.slice(-2)}`;
}

export function showConfig(): void {
  const config = loadGlobalConfig();
  header('docmend configuration');
  status('File', getGlobalConfigPath());
  status('provider', config.provider);
  status('model', config.model);
  status('anthropic_api_key', maskSecret(config.anthropicApiKey));
  status('runtime', config.runtime);
  status('interpreter', config.interpreter ?? '(runtime default)');
  status('stream', String(config.stream));
  status('oracle_timeout_ms', String(config.oracleTimeoutMs));
  status('oracle_max_retries', String(config.oracleMaxRetries));
  status('execution_timeout_ms', String(config.executionTimeoutMs));
  status('install_timeout_ms', String(config.installTimeoutMs));
  status('codes_dir', config.codesDir);
  status('archive_dir', config.archiveDir);
  status('work_dir', config.workDir);
  status('log_level', config.logLevel);
  status('debug', String(config.debug));
  status('history', String(config.history));
}

export function setConfig(key: string, value: string): void {
  setConfigValue(key, value);
  success(`Set ${key} in ${getGlobalConfigPath()}`);
}

export function listConfigKeys(): void {
  info(getConfigKeys().join('\n'));
}
