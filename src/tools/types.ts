/**
 * Tool contracts shared by the registry, the executor and the agent loop.
 */

import type { z } from 'zod';
import type { Artifact } from '../artifacts/types.js';
import type { ValidationError } from '../errors.js';
import type { StructuredLogger } from '../observability/logger.js';

// =============================================================================
// Calls and Results
// =============================================================================

/**
 * One tool invocation requested by the reasoning step.
 */
export interface ToolCall {
  /** Unique within the thread */
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export type ToolResultStatus = 'success' | 'failure' | 'timeout';

export interface ToolErrorDetail {
  code: string;
  message: string;
  details?: unknown;
}

export interface ToolResult {
  /** Back-reference to the originating ToolCall */
  callId: string;
  toolName: string;
  status: ToolResultStatus;
  data?: unknown;
  artifact?: Artifact;
  error?: ToolErrorDetail;
  durationMs: number;
  /** True when the result was replayed from the per-turn failure cache */
  cached?: boolean;
}

// =============================================================================
// Definitions
// =============================================================================

/**
 * - pure: no side effects, safe to retry or abandon
 * - external-write: creates files; must publish idempotently keyed by call id
 */
export type SideEffectClass = 'pure' | 'external-write';

/**
 * What a handler returns. `artifact` is only set once the file is durable.
 */
export interface ToolOutput {
  data?: unknown;
  artifact?: Artifact;
}

export interface ToolContext {
  callId: string;
  toolName: string;
  /** Aborted on timeout for pure tools; never aborted for external-write tools */
  signal: AbortSignal;
  logger: StructuredLogger;
}

export type ToolHandler<S extends z.ZodTypeAny> = (
  args: z.output<S>,
  context: ToolContext
) => Promise<ToolOutput>;

export interface ToolDefinition<S extends z.ZodTypeAny = z.ZodTypeAny> {
  /** lowercase_with_underscores */
  name: string;
  /** Shown to the reasoning capability */
  description: string;
  inputSchema: S;
  sideEffect: SideEffectClass;
  /** Set false for tools whose result varies between identical calls (default: true) */
  deterministic?: boolean;
  /** Overrides the executor's default timeout */
  timeoutMs?: number;
  handler: ToolHandler<S>;
}

/**
 * Catalog entry handed to the reasoning capability (no handler).
 */
export interface ToolSpec {
  name: string;
  description: string;
  inputSchema: z.ZodTypeAny;
  sideEffect: SideEffectClass;
  deterministic: boolean;
}

export type PreparedInvocation =
  | { ok: true; invoke: (context: ToolContext) => Promise<ToolOutput> }
  | { ok: false; error: ValidationError };

/**
 * Registered tool. `prepare` validates arguments once and binds the parsed
 * input, so the handler only ever sees schema-conforming values.
 */
export interface ToolDescriptor extends ToolSpec {
  timeoutMs: number | undefined;
  prepare(args: unknown): PreparedInvocation;
}
