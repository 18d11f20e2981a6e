import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { trace } from '@opentelemetry/api';
import { StructuredLogger, createSilentLogger, type LogEntry } from '../../../src/observability/logger.js';
import { isAtLeast, parseLogLevel } from '../../../src/logging/levels.js';

// =============================================================================
// Test Setup
// =============================================================================

const originalEnv = { ...process.env };

function parseEntry(output: ReturnType<typeof vi.fn>, call: number = 0): LogEntry {
  const line: unknown = output.mock.calls[call]?.[0];
  if (typeof line !== 'string') {
    throw new Error(`No log line at call ${call}`);
  }
  return JSON.parse(line);
}

// =============================================================================
// Levels
// =============================================================================

describe('log levels', () => {
  it('should parse level names case-insensitively', () => {
    expect(parseLogLevel('WARNING')).toBe('warning');
    expect(parseLogLevel('debug')).toBe('debug');
  });

  it('should reject unknown level names', () => {
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });

  it('should order levels by severity', () => {
    expect(isAtLeast('error', 'warning')).toBe(true);
    expect(isAtLeast('warning', 'warning')).toBe(true);
    expect(isAtLeast('info', 'warning')).toBe(false);
  });
});

// =============================================================================
// StructuredLogger Tests
// =============================================================================

describe('StructuredLogger', () => {
  beforeEach(() => {
    delete process.env['DBCHAT_LOG_LEVEL'];
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  describe('constructor', () => {
    it('should create with default options', () => {
      const logger = new StructuredLogger();
      expect(logger.getName()).toBeUndefined();
      expect(logger.getLevel()).toBe('info');
    });

    it('should read DBCHAT_LOG_LEVEL from environment', () => {
      process.env['DBCHAT_LOG_LEVEL'] = 'warning';
      expect(new StructuredLogger().getLevel()).toBe('warning');
    });

    it('should prefer options.minLevel over environment', () => {
      process.env['DBCHAT_LOG_LEVEL'] = 'warning';
      expect(new StructuredLogger({ minLevel: 'debug' }).getLevel()).toBe('debug');
    });

    it('should ignore an invalid DBCHAT_LOG_LEVEL', () => {
      process.env['DBCHAT_LOG_LEVEL'] = 'loud';
      expect(new StructuredLogger().getLevel()).toBe('info');
    });
  });

  describe('JSON output format', () => {
    it('should include required fields', () => {
      const output = vi.fn();
      const logger = new StructuredLogger({ name: 'agent', output });

      logger.info('Turn finished', { steps: 2 });

      const entry = parseEntry(output);
      expect(entry.level).toBe('info');
      expect(entry.message).toBe('Turn finished');
      expect(entry.logger).toBe('agent');
      expect(entry.data).toEqual({ steps: 2 });
      expect(entry.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    });

    it('should omit logger and data when not provided', () => {
      const output = vi.fn();
      new StructuredLogger({ output }).info('Plain');

      const entry = parseEntry(output);
      expect(entry.logger).toBeUndefined();
      expect(entry.data).toBeUndefined();
    });

    it('should flatten Error values in data', () => {
      const output = vi.fn();
      new StructuredLogger({ output }).error('Failed', { error: new TypeError('bad input'), attempt: 1 });

      expect(parseEntry(output).data).toEqual({ error: { name: 'TypeError', message: 'bad input' }, attempt: 1 });
    });

    it('should flatten an Error passed as data', () => {
      const output = vi.fn();
      new StructuredLogger({ output }).error('Failed', new Error('boom'));

      expect(parseEntry(output).data).toEqual({ name: 'Error', message: 'boom' });
    });
  });

  describe('level filtering', () => {
    it('should drop messages below the minimum level', () => {
      const output = vi.fn();
      const logger = new StructuredLogger({ minLevel: 'warning', output });

      logger.debug('no');
      logger.info('no');
      logger.notice('no');
      logger.warning('yes');
      logger.error('yes');

      expect(output).toHaveBeenCalledTimes(2);
      expect(parseEntry(output, 0).level).toBe('warning');
      expect(parseEntry(output, 1).level).toBe('error');
    });

    it('should route each convenience method to its level', () => {
      const output = vi.fn();
      const logger = new StructuredLogger({ minLevel: 'debug', output });

      logger.critical('c');
      logger.alert('a');
      logger.emergency('e');

      expect([0, 1, 2].map((call) => parseEntry(output, call).level)).toEqual(['critical', 'alert', 'emergency']);
    });
  });

  describe('trace correlation', () => {
    it('should omit trace ids without an active span', () => {
      const output = vi.fn();
      new StructuredLogger({ output }).info('No span');

      const entry = parseEntry(output);
      expect(entry.traceId).toBeUndefined();
      expect(entry.spanId).toBeUndefined();
    });

    it('should omit trace ids for a non-recording span', () => {
      const output = vi.fn();
      const logger = new StructuredLogger({ output });

      // Without a registered SDK the API hands out spans with invalid ids
      trace.getTracer('test').startActiveSpan('noop', (span) => {
        logger.info('Inside span');
        span.end();
      });

      expect(parseEntry(output).traceId).toBeUndefined();
    });
  });

  describe('child loggers', () => {
    it('should join names with a dot and inherit level and output', () => {
      const output = vi.fn();
      const child = new StructuredLogger({ name: 'dbchat', minLevel: 'notice', output }).child('agent');

      expect(child.getName()).toBe('dbchat.agent');
      expect(child.getLevel()).toBe('notice');

      child.notice('hello');
      expect(parseEntry(output).logger).toBe('dbchat.agent');
    });

    it('should use the child name alone when the parent has none', () => {
      expect(new StructuredLogger().child('tools').getName()).toBe('tools');
    });
  });

  describe('createSilentLogger', () => {
    it('should never write', () => {
      const logger = createSilentLogger('quiet');
      expect(logger.getName()).toBe('quiet');
      expect(logger.shouldLog('alert')).toBe(false);
      expect(logger.shouldLog('emergency')).toBe(true);
    });
  });
});
