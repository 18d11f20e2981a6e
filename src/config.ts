/**
 * Environment configuration loader with Zod validation
 *
 * All options are read from DBCHAT_* environment variables; anything unset
 * falls back to the schema default.
 */

import { z } from 'zod';
import { LogLevelSchema } from './logging/levels.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;

export const LlmProviderSchema = z.enum(['openrouter', 'anthropic']);

/**
 * Configuration schema with validation rules
 */
export const ConfigSchema = z.object({
  logLevel: LogLevelSchema.default('info'),

  // Orchestration loop
  maxSteps: z.number().int().min(1).max(100).default(10),
  historyMaxMessages: z.number().int().min(2).default(40),
  historyMaxTokens: z.number().int().min(1).optional(),
  toolTimeoutMs: z.number().int().min(1).default(30000),

  // Memory
  memoryBackend: z.enum(['memory', 'file']).default('file'),
  memoryDir: z.string().min(1).default('.dbchat/threads'),
  storageRetries: z.number().int().min(0).max(10).default(2),
  storageRetryDelayMs: z.number().int().min(0).default(100),
  degradeOnStorageFailure: z.boolean().default(false),

  // Artifacts
  exportDir: z.string().min(1).default('exports'),
  artifactTtlMs: z.number().int().min(1).default(DAY_MS),
  downloadBaseUrl: z.string().min(1).default('/downloads'),
  cleanupIntervalMs: z.number().int().min(1000).default(HOUR_MS),

  // Database
  databaseUrl: z.string().optional(),
  databaseSchema: z.string().min(1).default('public'),
  sqlMaxRows: z.number().int().min(1).default(200),
  csvMaxRows: z.number().int().min(1).default(100000),
  columnGlossaryPath: z.string().optional(),

  // Reasoning
  llm: z
    .object({
      provider: LlmProviderSchema.default('openrouter'),
      model: z.string().optional(),
    })
    .default({}),

  // Telemetry
  telemetryEnabled: z.boolean().default(false),
  otelEndpoint: z.string().optional(),
});

/**
 * Configuration type inferred from schema
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse a boolean from environment variable string
 */
function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Parse an integer from environment variable string
 */
function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

function parseString(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Drop undefined entries so schema defaults apply
 */
function compact(input: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, v]) => v !== undefined));
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const llm = compact({
    provider: parseString(env['DBCHAT_LLM_PROVIDER']),
    model: parseString(env['DBCHAT_LLM_MODEL']),
  });

  const configInput = compact({
    logLevel: parseString(env['DBCHAT_LOG_LEVEL']),
    maxSteps: parseInteger(env['DBCHAT_MAX_STEPS']),
    historyMaxMessages: parseInteger(env['DBCHAT_HISTORY_MAX_MESSAGES']),
    historyMaxTokens: parseInteger(env['DBCHAT_HISTORY_MAX_TOKENS']),
    toolTimeoutMs: parseInteger(env['DBCHAT_TOOL_TIMEOUT_MS']),
    memoryBackend: parseString(env['DBCHAT_MEMORY_BACKEND']),
    memoryDir: parseString(env['DBCHAT_MEMORY_DIR']),
    storageRetries: parseInteger(env['DBCHAT_STORAGE_RETRIES']),
    storageRetryDelayMs: parseInteger(env['DBCHAT_STORAGE_RETRY_DELAY_MS']),
    degradeOnStorageFailure: parseBoolean(env['DBCHAT_DEGRADE_ON_STORAGE_FAILURE']),
    exportDir: parseString(env['DBCHAT_EXPORT_DIR']),
    artifactTtlMs: parseInteger(env['DBCHAT_ARTIFACT_TTL_MS']),
    downloadBaseUrl: parseString(env['DBCHAT_DOWNLOAD_BASE_URL']),
    cleanupIntervalMs: parseInteger(env['DBCHAT_CLEANUP_INTERVAL_MS']),
    databaseUrl: parseString(env['DBCHAT_DATABASE_URL']) ?? parseString(env['DATABASE_URL']),
    databaseSchema: parseString(env['DBCHAT_DATABASE_SCHEMA']),
    sqlMaxRows: parseInteger(env['DBCHAT_SQL_MAX_ROWS']),
    csvMaxRows: parseInteger(env['DBCHAT_CSV_MAX_ROWS']),
    columnGlossaryPath: parseString(env['DBCHAT_COLUMN_GLOSSARY_PATH']),
    llm: Object.keys(llm).length > 0 ? llm : undefined,
    telemetryEnabled: parseBoolean(env['DBCHAT_TELEMETRY_ENABLED']),
    otelEndpoint: parseString(env['OTEL_EXPORTER_OTLP_ENDPOINT']),
  });

  return ConfigSchema.parse(configInput);
}

/**
 * Singleton config instance
 */
let config: Config | null = null;

/**
 * Get the current configuration (singleton)
 * Loads from environment on first call
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Force reload configuration from environment
 */
export function reloadConfig(): Config {
  config = loadConfig();
  return config;
}

/**
 * Reset config singleton (for testing)
 */
export function resetConfig(): void {
  config = null;
}
