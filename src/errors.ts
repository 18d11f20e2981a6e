/**
 * Agent Error Taxonomy
 *
 * - ValidationError / ToolExecutionError: tool-level, absorbed into the
 *   conversation as tool results so the model can correct course
 * - StorageError / ReasoningError: fatal to a turn, reported to the caller
 *   as a distinct outcome status
 * - RegistryFrozenError / ConfigurationError: programming and setup errors
 */

// =============================================================================
// Error Codes
// =============================================================================

export const ERROR_CODES = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  UNKNOWN_TOOL: 'UNKNOWN_TOOL',
  TOOL_FAILURE: 'TOOL_FAILURE',
  TOOL_TIMEOUT: 'TOOL_TIMEOUT',
  STORAGE_ERROR: 'STORAGE_ERROR',
  REASONING_ERROR: 'REASONING_ERROR',
  REGISTRY_FROZEN: 'REGISTRY_FROZEN',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base class for every error raised by the agent.
 * Carries a stable code and optional structured data for logs and tool results.
 */
export class AgentError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly data?: unknown
  ) {
    super(message);
    this.name = 'AgentError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Plain-object form for logs and tool payloads. Never includes the stack.
   */
  toJSON(): { code: ErrorCode; message: string; data?: unknown } {
    const result: { code: ErrorCode; message: string; data?: unknown } = {
      code: this.code,
      message: this.message,
    };
    if (this.data !== undefined) {
      result.data = this.data;
    }
    return result;
  }
}

// =============================================================================
// Specific Error Classes
// =============================================================================

/**
 * Tool arguments did not match the tool's input schema.
 */
export class ValidationError extends AgentError {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(ERROR_CODES.VALIDATION_ERROR, message, { issues });
    this.name = 'ValidationError';
  }
}

/**
 * Raised by tool handlers for expected failures (bad SQL, unknown table, empty data).
 * The executor turns it into a `failure` result carrying `details`.
 */
export class ToolExecutionError extends AgentError {
  constructor(
    public readonly toolName: string,
    message: string,
    public readonly details?: unknown
  ) {
    super(ERROR_CODES.TOOL_FAILURE, message, details);
    this.name = 'ToolExecutionError';
  }
}

/**
 * Memory store unavailable or corrupt.
 * `retryable` is false when retrying cannot help (e.g. an unparseable record).
 */
export class StorageError extends AgentError {
  constructor(
    message: string,
    public readonly retryable: boolean = true,
    options?: { cause?: unknown }
  ) {
    super(ERROR_CODES.STORAGE_ERROR, message, { retryable });
    this.name = 'StorageError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * The reasoning capability failed or returned something unusable.
 */
export class ReasoningError extends AgentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ERROR_CODES.REASONING_ERROR, message);
    this.name = 'ReasoningError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class RegistryFrozenError extends AgentError {
  constructor(toolName: string) {
    super(
      ERROR_CODES.REGISTRY_FROZEN,
      `Cannot register tool '${toolName}': registry is read-only after initialization`,
      { toolName }
    );
    this.name = 'RegistryFrozenError';
  }
}

export class ConfigurationError extends AgentError {
  constructor(message: string, data?: unknown) {
    super(ERROR_CODES.CONFIGURATION_ERROR, message, data);
    this.name = 'ConfigurationError';
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Extract a message from any thrown value without exposing stack traces.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}

/**
 * Wrap any thrown value as a StorageError, keeping existing ones intact.
 */
export function toStorageError(error: unknown, action: string): StorageError {
  if (error instanceof StorageError) {
    return error;
  }
  return new StorageError(`${action}: ${describeError(error)}`, true, { cause: error });
}

// =============================================================================
// Type Guards
// =============================================================================

export function isAgentError(error: unknown): error is AgentError {
  return error instanceof AgentError;
}
