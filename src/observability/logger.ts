/**
 * Structured JSON logging with OpenTelemetry correlation
 *
 * Every line is a self-contained JSON object (NDJSON) carrying an RFC 5424
 * level, the component name and, when a span is active, its trace/span ids.
 */

import { trace, context } from '@opentelemetry/api';
import { isAtLeast, parseLogLevel, type LogLevel } from '../logging/levels.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Structured log entry format
 */
export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  /** RFC 5424 level name */
  level: string;
  message: string;
  /** Logger name/component */
  logger?: string;
  traceId?: string;
  spanId?: string;
  data?: unknown;
}

export interface StructuredLoggerOptions {
  /** Logger name/component identifier */
  name?: string;
  /** Minimum log level (default: DBCHAT_LOG_LEVEL env or 'info') */
  minLevel?: LogLevel;
  /** Output function (default: console.log) */
  output?: (json: string) => void;
}

// =============================================================================
// Helper Functions
// =============================================================================

function getDefaultLogLevel(): LogLevel {
  return parseLogLevel(process.env['DBCHAT_LOG_LEVEL']) ?? 'info';
}

const INVALID_TRACE_ID = '00000000000000000000000000000000';
const INVALID_SPAN_ID = '0000000000000000';

function getTraceContext(): { traceId?: string; spanId?: string } {
  const span = trace.getSpan(context.active());
  if (!span) {
    return {};
  }

  const spanContext = span.spanContext();
  if (spanContext.traceId === INVALID_TRACE_ID || spanContext.spanId === INVALID_SPAN_ID) {
    return {};
  }

  return {
    traceId: spanContext.traceId,
    spanId: spanContext.spanId,
  };
}

/**
 * Errors serialize to `{}` with JSON.stringify; flatten them so the message survives.
 */
function normalizeData(data: unknown): unknown {
  if (data instanceof Error) {
    return { name: data.name, message: data.message };
  }
  if (data !== null && typeof data === 'object' && !Array.isArray(data)) {
    const normalized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      normalized[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
    }
    return normalized;
  }
  return data;
}

// =============================================================================
// StructuredLogger Class
// =============================================================================

/**
 * Structured JSON logger with OpenTelemetry trace correlation.
 *
 * @example
 * ```typescript
 * const logger = new StructuredLogger({ name: 'agent' });
 *
 * logger.info('Turn completed', { threadId: 'thread-1', steps: 3 });
 * // {"timestamp":"...","level":"info","message":"Turn completed","logger":"agent","data":{"threadId":"thread-1","steps":3}}
 *
 * const toolLogger = logger.child('tools');
 * toolLogger.debug('Dispatching', { tool: 'sql_db_query' });
 * ```
 */
export class StructuredLogger {
  private readonly name: string | undefined;
  private readonly minLevel: LogLevel;
  private readonly output: (json: string) => void;

  constructor(options: StructuredLoggerOptions = {}) {
    this.name = options.name;
    this.minLevel = options.minLevel ?? getDefaultLogLevel();
    this.output = options.output ?? console.log;
  }

  // ===========================================================================
  // Level Checking
  // ===========================================================================

  shouldLog(level: LogLevel): boolean {
    return isAtLeast(level, this.minLevel);
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  getName(): string | undefined {
    return this.name;
  }

  // ===========================================================================
  // Core Logging
  // ===========================================================================

  log(level: LogLevel, message: string, data?: unknown): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    if (this.name !== undefined) {
      entry.logger = this.name;
    }

    const traceContext = getTraceContext();
    if (traceContext.traceId) {
      entry.traceId = traceContext.traceId;
    }
    if (traceContext.spanId) {
      entry.spanId = traceContext.spanId;
    }

    if (data !== undefined) {
      entry.data = normalizeData(data);
    }

    this.output(JSON.stringify(entry));
  }

  // ===========================================================================
  // Convenience Methods (RFC 5424 Levels)
  // ===========================================================================

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  notice(message: string, data?: unknown): void {
    this.log('notice', message, data);
  }

  warning(message: string, data?: unknown): void {
    this.log('warning', message, data);
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  critical(message: string, data?: unknown): void {
    this.log('critical', message, data);
  }

  alert(message: string, data?: unknown): void {
    this.log('alert', message, data);
  }

  emergency(message: string, data?: unknown): void {
    this.log('emergency', message, data);
  }

  // ===========================================================================
  // Child Loggers
  // ===========================================================================

  /**
   * Create a child logger whose name is `<parent>.<childName>`.
   * The child inherits the parent's min level and output function.
   */
  child(childName: string): StructuredLogger {
    const newName = this.name ? `${this.name}.${childName}` : childName;
    return new StructuredLogger({
      name: newName,
      minLevel: this.minLevel,
      output: this.output,
    });
  }
}

/**
 * Logger that discards everything; used where a collaborator is constructed without one.
 */
export function createSilentLogger(name?: string): StructuredLogger {
  return new StructuredLogger({
    ...(name !== undefined ? { name } : {}),
    minLevel: 'emergency',
    output: () => undefined,
  });
}

export { type LogLevel } from '../logging/levels.js';
