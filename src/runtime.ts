/**
 * Runtime wiring
 *
 * Builds every collaborator of the agent from configuration. Tests and
 * embedding callers replace individual pieces through overrides. Cleanup
 * handlers run in registration order on close().
 */

import type { LanguageModelV1 } from 'ai';
import { ArtifactPublisher } from './artifacts/publisher.js';
import { ArtifactSweeper } from './artifacts/cleanup.js';
import { ConversationAgent } from './agent/agent.js';
import { createLanguageModel } from './agent/llm-provider.js';
import { LlmReasoner } from './agent/llm-reasoner.js';
import { buildSystemPrompt, formatDate } from './agent/prompts.js';
import type { Reasoner } from './agent/reasoner.js';
import type { Config } from './config.js';
import { loadColumnGlossary, type ColumnGlossary } from './database/column-glossary.js';
import { PostgresSqlClient, type SqlClient } from './database/sql-client.js';
import { ConfigurationError, describeError } from './errors.js';
import { FileMemoryStore } from './memory/file-store.js';
import { InMemoryMemoryStore } from './memory/in-memory-store.js';
import type { MemoryStore } from './memory/types.js';
import { StructuredLogger } from './observability/logger.js';
import { AgentMetrics } from './observability/metrics.js';
import { TelemetryManager } from './observability/telemetry.js';
import { InMemoryTurnTraceStore, type TurnTraceStore } from './observability/turn-trace.js';
import { registerDatabaseTools } from './tools/builtin.js';
import { ToolExecutor } from './tools/executor.js';
import { ToolRegistry } from './tools/registry.js';

// =============================================================================
// Types
// =============================================================================

export interface RuntimeOverrides {
  logger?: StructuredLogger;
  sqlClient?: SqlClient;
  memory?: MemoryStore;
  reasoner?: Reasoner;
  /** Used to build the default reasoner instead of the configured provider */
  model?: LanguageModelV1;
  glossary?: ColumnGlossary;
  traces?: TurnTraceStore;
  /** Extra tools, registered after the built-in ones and before the registry is frozen */
  registerTools?: (registry: ToolRegistry) => void;
  /** Start the periodic artifact sweeper (default: true) */
  startSweeper?: boolean;
}

export interface ToolRuntime {
  config: Config;
  logger: StructuredLogger;
  telemetry: TelemetryManager;
  metrics: AgentMetrics;
  sqlClient: SqlClient;
  glossary: ColumnGlossary | undefined;
  registry: ToolRegistry;
  executor: ToolExecutor;
  publisher: ArtifactPublisher;
  sweeper: ArtifactSweeper;
  close(): Promise<void>;
}

export interface AgentRuntime extends ToolRuntime {
  memory: MemoryStore;
  traces: TurnTraceStore;
  agent: ConversationAgent;
}

// =============================================================================
// Factories
// =============================================================================

export function createMemoryStore(config: Pick<Config, 'memoryBackend' | 'memoryDir'>): MemoryStore {
  return config.memoryBackend === 'file'
    ? new FileMemoryStore({ directory: config.memoryDir })
    : new InMemoryMemoryStore();
}

export function createSqlClient(config: Pick<Config, 'databaseUrl' | 'databaseSchema' | 'toolTimeoutMs'>): SqlClient {
  if (!config.databaseUrl) {
    throw new ConfigurationError('No database configured: set DBCHAT_DATABASE_URL (or DATABASE_URL)');
  }
  return PostgresSqlClient.fromUrl(config.databaseUrl, {
    schema: config.databaseSchema,
    statementTimeoutMs: config.toolTimeoutMs,
  });
}

/**
 * Build the tool side of the runtime: database, artifacts and a frozen
 * registry with its executor. Enough for listing and calling tools directly.
 */
export async function createToolRuntime(config: Config, overrides: RuntimeOverrides = {}): Promise<ToolRuntime> {
  const cleanups: Array<{ name: string; cleanup: () => Promise<void> }> = [];

  const logger =
    overrides.logger ??
    new StructuredLogger({ name: 'dbchat', minLevel: config.logLevel, output: (line) => console.error(line) });

  const telemetry = new TelemetryManager({
    enabled: config.telemetryEnabled,
    ...(config.otelEndpoint !== undefined ? { endpoint: config.otelEndpoint } : {}),
  });
  await telemetry.start();

  const metrics = new AgentMetrics(telemetry.getMeter());

  const sqlClient = overrides.sqlClient ?? createSqlClient(config);
  if (!overrides.sqlClient) {
    cleanups.push({ name: 'database', cleanup: () => sqlClient.close() });
  }

  const glossary =
    overrides.glossary ?? (config.columnGlossaryPath ? await loadColumnGlossary(config.columnGlossaryPath) : undefined);

  const publisher = new ArtifactPublisher({
    directory: config.exportDir,
    ttlMs: config.artifactTtlMs,
    baseUrl: config.downloadBaseUrl,
    logger: logger.child('artifacts'),
  });

  const sweeper = new ArtifactSweeper({
    directory: publisher.getDirectory(),
    ttlMs: config.artifactTtlMs,
    intervalMs: config.cleanupIntervalMs,
    logger: logger.child('sweeper'),
  });
  if (overrides.startSweeper ?? true) {
    sweeper.start();
  }
  cleanups.push({ name: 'sweeper', cleanup: async () => sweeper.stop() });

  const registry = new ToolRegistry();
  registerDatabaseTools(registry, {
    sqlClient,
    publisher,
    sqlMaxRows: config.sqlMaxRows,
    csvMaxRows: config.csvMaxRows,
    glossary,
  });
  overrides.registerTools?.(registry);
  registry.freeze();

  const executor = new ToolExecutor(registry, {
    timeoutMs: config.toolTimeoutMs,
    logger: logger.child('executor'),
    metrics,
  });

  // Telemetry shuts down last
  cleanups.push({ name: 'telemetry', cleanup: () => telemetry.shutdown() });

  let closed = false;
  const close = async (): Promise<void> => {
    if (closed) {
      return;
    }
    closed = true;
    for (const { name, cleanup } of cleanups) {
      try {
        await cleanup();
      } catch (error) {
        logger.error('Cleanup failed', { component: name, error: describeError(error) });
      }
    }
  };

  return { config, logger, telemetry, metrics, sqlClient, glossary, registry, executor, publisher, sweeper, close };
}

/**
 * Build the full agent runtime on top of the tool runtime
 */
export async function createAgentRuntime(config: Config, overrides: RuntimeOverrides = {}): Promise<AgentRuntime> {
  const tools = await createToolRuntime(config, overrides);
  const { logger, sqlClient, glossary, registry, executor, metrics } = tools;

  try {
    const reasoner =
      overrides.reasoner ??
      new LlmReasoner({
        model: overrides.model ?? (await createLanguageModel(config.llm)),
        systemPrompt: () =>
          buildSystemPrompt({
            dialect: sqlClient.dialect,
            topK: config.sqlMaxRows,
            today: formatDate(new Date()),
            columnMeanings: glossary !== undefined,
          }),
        logger: logger.child('reasoner'),
      });

    const memory = overrides.memory ?? createMemoryStore(config);
    const traces = overrides.traces ?? new InMemoryTurnTraceStore();

    const agent = new ConversationAgent({
      memory,
      registry,
      reasoner,
      executor,
      maxSteps: config.maxSteps,
      historyWindow: { maxMessages: config.historyMaxMessages, maxTokens: config.historyMaxTokens },
      storageRetries: config.storageRetries,
      storageRetryDelayMs: config.storageRetryDelayMs,
      degradeOnStorageFailure: config.degradeOnStorageFailure,
      logger: logger.child('agent'),
      metrics,
      traces,
    });

    logger.info('Agent runtime ready', {
      tools: registry.names(),
      memoryBackend: overrides.memory ? 'custom' : config.memoryBackend,
      dialect: sqlClient.dialect,
      telemetry: tools.telemetry.isStarted(),
    });

    return { ...tools, memory, traces, agent };
  } catch (error) {
    await tools.close();
    throw error;
  }
}
