/**
 * Global configuration
 *
 * Loads ~/.docmend/config.yaml, validates it, fills defaults and applies
 * environment overrides. Keys are snake_case on disk and camelCase in code.
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod/v4';
import { ConfigError } from '../../../core/models/index.js';
import {
  DEFAULT_EXECUTION_TIMEOUT_MS,
  DEFAULT_INSTALL_TIMEOUT_MS,
  DEFAULT_MODEL,
  DEFAULT_ORACLE_MAX_RETRIES,
  DEFAULT_ORACLE_TIMEOUT_MS,
} from '../../../shared/constants.js';
import type { UiLogLevel } from '../../../shared/ui/LogManager.js';
import { getErrorMessage } from '../../../shared/utils/index.js';
import type { OracleProvider, StreamMode } from '../../oracle/index.js';
import type { RuntimeName } from '../../runtime/index.js';
import {
  ensureDir,
  getDefaultArchiveDir,
  getDefaultCodesDir,
  getDefaultWorkDir,
  getGlobalConfigDir,
  getGlobalConfigPath,
} from '../paths.js';

const ProviderSchema = z.enum(['anthropic', 'mock']);
const RuntimeSchema = z.enum(['python', 'javascript']);
const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const GlobalConfigSchema = z.object({
  provider: ProviderSchema.optional(),
  model: z.string().min(1).optional(),
  anthropic_api_key: z.string().min(1).optional(),
  oracle_timeout_ms: z.number().int().positive().optional(),
  oracle_max_retries: z.number().int().min(0).optional(),
  stream: z.union([z.literal('auto'), z.boolean()]).optional(),
  runtime: RuntimeSchema.optional(),
  interpreter: z.string().min(1).optional(),
  execution_timeout_ms: z.number().int().positive().optional(),
  install_timeout_ms: z.number().int().positive().optional(),
  codes_dir: z.string().min(1).optional(),
  archive_dir: z.string().min(1).optional(),
  work_dir: z.string().min(1).optional(),
  log_level: LogLevelSchema.optional(),
  debug: z.boolean().optional(),
  history: z.boolean().optional(),
});

export type RawGlobalConfig = z.infer<typeof GlobalConfigSchema>;

export interface GlobalConfig {
  provider: OracleProvider;
  model: string;
  anthropicApiKey?: string;
  oracleTimeoutMs: number;
  oracleMaxRetries: number;
  stream: StreamMode;
  runtime: RuntimeName;
  /** Interpreter override; the runtime's default when unset */
  interpreter?: string;
  executionTimeoutMs: number;
  installTimeoutMs: number;
  codesDir: string;
  archiveDir: string;
  workDir: string;
  logLevel: UiLogLevel;
  debug: boolean;
  history: boolean;
}

interface ConfigFile {
  /** Validated keys, in schema order */
  data: RawGlobalConfig;
  /** The same keys in file order */
  entries: Record<string, unknown>;
}

function readConfigFile(): ConfigFile {
  const path = getGlobalConfigPath();
  if (!existsSync(path)) {
    return { data: {}, entries: {} };
  }
  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Failed to parse ${path}: ${getErrorMessage(error)}`);
  }
  if (parsed === null || parsed === undefined) {
    return { data: {}, entries: {} };
  }
  const result = GlobalConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration in ${path}: ${issues}`);
  }
  const data: Record<string, unknown> = result.data;
  const entries = Object.fromEntries(
    Object.keys(parsed).filter((key) => key in data).map((key) => [key, data[key]]),
  );
  return { data: result.data, entries };
}

function envEnum<T extends string>(schema: z.ZodType<T>, name: string): T | undefined {
  const value = process.env[name];
  if (!value) return undefined;
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(`Invalid ${name}: ${value}`);
  }
  return result.data;
}

function normalize(raw: RawGlobalConfig): GlobalConfig {
  const env = process.env;
  return {
    provider: envEnum(ProviderSchema, 'DOCMEND_PROVIDER') ?? raw.provider ?? 'anthropic',
    model: env.DOCMEND_MODEL || raw.model || DEFAULT_MODEL,
    anthropicApiKey: env.DOCMEND_ANTHROPIC_API_KEY || env.ANTHROPIC_API_KEY || raw.anthropic_api_key,
    oracleTimeoutMs: raw.oracle_timeout_ms ?? DEFAULT_ORACLE_TIMEOUT_MS,
    oracleMaxRetries: raw.oracle_max_retries ?? DEFAULT_ORACLE_MAX_RETRIES,
    stream: raw.stream ?? 'auto',
    runtime: envEnum(RuntimeSchema, 'DOCMEND_RUNTIME') ?? raw.runtime ?? 'python',
    interpreter: raw.interpreter,
    executionTimeoutMs: raw.execution_timeout_ms ?? DEFAULT_EXECUTION_TIMEOUT_MS,
    installTimeoutMs: raw.install_timeout_ms ?? DEFAULT_INSTALL_TIMEOUT_MS,
    codesDir: raw.codes_dir ?? getDefaultCodesDir(),
    archiveDir: raw.archive_dir ?? getDefaultArchiveDir(),
    workDir: raw.work_dir ?? getDefaultWorkDir(),
    logLevel: envEnum(LogLevelSchema, 'DOCMEND_LOG_LEVEL') ?? raw.log_level ?? 'info',
    debug: raw.debug ?? false,
    history: raw.history ?? true,
  };
}

let cachedConfig: GlobalConfig | null = null;

export function loadGlobalConfig(): GlobalConfig {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = normalize(readConfigFile().data);
  return cachedConfig;
}

export function invalidateGlobalConfigCache(): void {
  cachedConfig = null;
}

/** Keys accepted by `docmend config set` */
export function getConfigKeys(): string[] {
  return Object.keys(GlobalConfigSchema.shape);
}

/** Coerce a command-line string to the YAML scalar it spells */
function coerceScalar(value: string): unknown {
  try {
    const parsed: unknown = parseYaml(value);
    return parsed === null ? value : parsed;
  } catch {
    return value;
  }
}

/** Validate and persist one key of the config file */
export function setConfigValue(key: string, value: string): RawGlobalConfig {
  if (!getConfigKeys().includes(key)) {
    throw new ConfigError(`Unknown config key: ${key}`);
  }
  const next: Record<string, unknown> = { ...readConfigFile().entries, [key]: coerceScalar(value) };
  const result = GlobalConfigSchema.safeParse(next);
  if (!result.success) {
    throw new ConfigError(`Invalid value for ${key}: ${value}`);
  }
  ensureDir(getGlobalConfigDir());
  writeFileSync(getGlobalConfigPath(), stringifyYaml(next, { indent: 2 }), 'utf-8');
  invalidateGlobalConfigCache();
  return result.data;
}
