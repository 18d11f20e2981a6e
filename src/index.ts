/**
 * dbchat agent - public exports
 */

// Runtime
export * from './runtime.js';

// Configuration
export { ConfigSchema, LlmProviderSchema, loadConfig, getConfig, reloadConfig, resetConfig, type Config } from './config.js';

// Errors
export * from './errors.js';

// Agent
export * from './agent/agent.js';
export * from './agent/assembler.js';
export * from './agent/fingerprint.js';
export * from './agent/history-window.js';
export * from './agent/llm-provider.js';
export * from './agent/llm-reasoner.js';
export * from './agent/prompts.js';
export * from './agent/reasoner.js';
export * from './agent/state.js';

// Memory
export * from './memory/types.js';
export * from './memory/in-memory-store.js';
export * from './memory/file-store.js';
export * from './memory/retry.js';
export * from './memory/thread-lock.js';

// Tools
export * from './tools/types.js';
export * from './tools/registry.js';
export * from './tools/executor.js';
export * from './tools/builtin.js';

// Artifacts
export * from './artifacts/types.js';
export * from './artifacts/publisher.js';
export * from './artifacts/cleanup.js';

// Database
export * from './database/sql-client.js';
export * from './database/column-glossary.js';

// Observability
export * from './observability/logger.js';
export * from './observability/metrics.js';
export * from './observability/telemetry.js';
export * from './observability/tracing.js';
export * from './observability/turn-trace.js';
