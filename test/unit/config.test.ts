import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConfigSchema, loadConfig, getConfig, reloadConfig, resetConfig } from '../../src/config.js';

describe('Config', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    resetConfig();
    Object.keys(process.env).forEach((key) => {
      if (key.startsWith('DBCHAT_') || key.startsWith('OTEL_') || key === 'DATABASE_URL') {
        delete process.env[key];
      }
    });
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    resetConfig();
  });

  describe('ConfigSchema', () => {
    it('should provide default values when no input given', () => {
      const config = ConfigSchema.parse({});
      expect(config.logLevel).toBe('info');
      expect(config.maxSteps).toBe(10);
      expect(config.historyMaxMessages).toBe(40);
      expect(config.historyMaxTokens).toBeUndefined();
      expect(config.toolTimeoutMs).toBe(30000);
      expect(config.memoryBackend).toBe('file');
      expect(config.storageRetries).toBe(2);
      expect(config.degradeOnStorageFailure).toBe(false);
      expect(config.artifactTtlMs).toBe(24 * 60 * 60 * 1000);
      expect(config.downloadBaseUrl).toBe('/downloads');
      expect(config.databaseSchema).toBe('public');
      expect(config.sqlMaxRows).toBe(200);
      expect(config.llm).toEqual({ provider: 'openrouter' });
      expect(config.telemetryEnabled).toBe(false);
    });

    it('should reject a step limit below one', () => {
      expect(ConfigSchema.safeParse({ maxSteps: 0 }).success).toBe(false);
    });

    it('should reject an unknown memory backend', () => {
      expect(ConfigSchema.safeParse({ memoryBackend: 'redis' }).success).toBe(false);
    });

    it('should reject an unknown LLM provider', () => {
      expect(ConfigSchema.safeParse({ llm: { provider: 'other' } }).success).toBe(false);
    });
  });

  describe('loadConfig', () => {
    it('should read numeric options from the environment', () => {
      const config = loadConfig({
        DBCHAT_MAX_STEPS: '5',
        DBCHAT_HISTORY_MAX_MESSAGES: '12',
        DBCHAT_HISTORY_MAX_TOKENS: '4000',
        DBCHAT_TOOL_TIMEOUT_MS: '1500',
      });
      expect(config.maxSteps).toBe(5);
      expect(config.historyMaxMessages).toBe(12);
      expect(config.historyMaxTokens).toBe(4000);
      expect(config.toolTimeoutMs).toBe(1500);
    });

    it('should ignore unparseable numbers and fall back to defaults', () => {
      const config = loadConfig({ DBCHAT_MAX_STEPS: 'many' });
      expect(config.maxSteps).toBe(10);
    });

    it('should parse booleans', () => {
      expect(loadConfig({ DBCHAT_DEGRADE_ON_STORAGE_FAILURE: 'true' }).degradeOnStorageFailure).toBe(true);
      expect(loadConfig({ DBCHAT_DEGRADE_ON_STORAGE_FAILURE: '1' }).degradeOnStorageFailure).toBe(true);
      expect(loadConfig({ DBCHAT_DEGRADE_ON_STORAGE_FAILURE: 'no' }).degradeOnStorageFailure).toBe(false);
    });

    it('should prefer DBCHAT_DATABASE_URL over DATABASE_URL', () => {
      expect(loadConfig({ DATABASE_URL: 'postgres://fallback/db' }).databaseUrl).toBe('postgres://fallback/db');
      expect(
        loadConfig({ DATABASE_URL: 'postgres://fallback/db', DBCHAT_DATABASE_URL: 'postgres://primary/db' })
          .databaseUrl
      ).toBe('postgres://primary/db');
    });

    it('should read the LLM provider and model', () => {
      const config = loadConfig({ DBCHAT_LLM_PROVIDER: 'anthropic', DBCHAT_LLM_MODEL: 'test-model' });
      expect(config.llm).toEqual({ provider: 'anthropic', model: 'test-model' });
    });

    it('should treat empty strings as unset', () => {
      const config = loadConfig({ DBCHAT_MEMORY_DIR: '', DBCHAT_LOG_LEVEL: '' });
      expect(config.memoryDir).toBe('.dbchat/threads');
      expect(config.logLevel).toBe('info');
    });

    it('should throw on an invalid log level', () => {
      expect(() => loadConfig({ DBCHAT_LOG_LEVEL: 'verbose' })).toThrow();
    });
  });

  describe('singleton', () => {
    it('should cache the configuration until reloaded', () => {
      process.env['DBCHAT_MAX_STEPS'] = '3';
      const first = getConfig();
      process.env['DBCHAT_MAX_STEPS'] = '7';
      expect(getConfig()).toBe(first);
      expect(getConfig().maxSteps).toBe(3);
      expect(reloadConfig().maxSteps).toBe(7);
    });
  });
});
