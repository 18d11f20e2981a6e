/**
 * Tool Execution with Validation
 *
 * `execute` never throws: unknown tools, invalid arguments, handler errors and
 * timeouts all come back as ToolResult data for the reasoning step to act on.
 */

import { ERROR_CODES, ToolExecutionError, describeError, isAgentError } from '../errors.js';
import { createSilentLogger, type StructuredLogger } from '../observability/logger.js';
import type { AgentMetrics } from '../observability/metrics.js';
import { withSpan } from '../observability/tracing.js';
import type { ToolRegistry } from './registry.js';
import type { ToolCall, ToolContext, ToolDescriptor, ToolOutput, ToolResult } from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface ToolExecutorOptions {
  /** Default timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  logger?: StructuredLogger;
  metrics?: AgentMetrics;
}

const TIMED_OUT = Symbol('timed-out');

// =============================================================================
// Tool Executor
// =============================================================================

/**
 * Executes registered tools with validation, a bounded timeout and failure
 * classification.
 */
export class ToolExecutor {
  private readonly registry: ToolRegistry;
  private readonly timeoutMs: number;
  private readonly logger: StructuredLogger;
  private readonly metrics: AgentMetrics | undefined;

  constructor(registry: ToolRegistry, options: ToolExecutorOptions = {}) {
    this.registry = registry;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.logger = options.logger ?? createSilentLogger('executor');
    this.metrics = options.metrics;
  }

  getDefaultTimeoutMs(): number {
    return this.timeoutMs;
  }

  /**
   * Execute one tool call
   */
  async execute(call: ToolCall): Promise<ToolResult> {
    const result = await withSpan(
      `tool ${call.name}`,
      { 'tool.name': call.name, 'tool.call_id': call.id },
      async (span) => {
        const outcome = await this.run(call);
        span.setAttribute('tool.status', outcome.status);
        return outcome;
      }
    );

    this.metrics?.recordToolCall(call.name, result.status, result.durationMs);
    this.logger.log(result.status === 'success' ? 'debug' : 'notice', 'Tool call finished', {
      tool: call.name,
      callId: call.id,
      status: result.status,
      durationMs: result.durationMs,
      error: result.error?.message,
    });
    return result;
  }

  private async run(call: ToolCall): Promise<ToolResult> {
    const startedAt = Date.now();

    const tool = this.registry.resolve(call.name);
    if (!tool) {
      return {
        callId: call.id,
        toolName: call.name,
        status: 'failure',
        error: {
          code: ERROR_CODES.UNKNOWN_TOOL,
          message: `Unknown tool: ${call.name}`,
          details: { availableTools: this.registry.names() },
        },
        durationMs: Date.now() - startedAt,
      };
    }

    // Invalid arguments never reach the handler
    const prepared = tool.prepare(call.arguments);
    if (!prepared.ok) {
      return {
        callId: call.id,
        toolName: call.name,
        status: 'failure',
        error: {
          code: prepared.error.code,
          message: prepared.error.message,
          details: { issues: prepared.error.issues },
        },
        durationMs: Date.now() - startedAt,
      };
    }

    try {
      const output = await this.invokeWithTimeout(tool, call, prepared.invoke);
      if (output === TIMED_OUT) {
        const timeoutMs = tool.timeoutMs ?? this.timeoutMs;
        return {
          callId: call.id,
          toolName: call.name,
          status: 'timeout',
          error: {
            code: ERROR_CODES.TOOL_TIMEOUT,
            message: `Tool execution timed out after ${timeoutMs}ms`,
            details: { timeoutMs },
          },
          durationMs: Date.now() - startedAt,
        };
      }

      const result: ToolResult = {
        callId: call.id,
        toolName: call.name,
        status: 'success',
        data: output.data,
        durationMs: Date.now() - startedAt,
      };
      if (output.artifact) {
        result.artifact = output.artifact;
      }
      return result;
    } catch (error) {
      let details: unknown;
      if (error instanceof ToolExecutionError) {
        details = error.details;
      } else if (isAgentError(error)) {
        details = error.data;
      }
      return {
        callId: call.id,
        toolName: call.name,
        status: 'failure',
        error: {
          code: ERROR_CODES.TOOL_FAILURE,
          message: describeError(error),
          ...(details !== undefined ? { details } : {}),
        },
        durationMs: Date.now() - startedAt,
      };
    }
  }

  /**
   * Race the handler against the timeout. On timeout, pure tools are told to
   * stop through their signal; external-write tools are left to finish their
   * publish in the background and only their late outcome is logged.
   */
  private async invokeWithTimeout(
    tool: ToolDescriptor,
    call: ToolCall,
    invoke: (context: ToolContext) => Promise<ToolOutput>
  ): Promise<ToolOutput | typeof TIMED_OUT> {
    const timeoutMs = tool.timeoutMs ?? this.timeoutMs;
    const controller = new AbortController();
    const context: ToolContext = {
      callId: call.id,
      toolName: call.name,
      signal: controller.signal,
      logger: this.logger.child(call.name),
    };

    const execution = invoke(context);

    let timeoutId: NodeJS.Timeout | undefined;
    const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
      timeoutId = setTimeout(() => resolve(TIMED_OUT), timeoutMs);
    });

    try {
      const outcome = await Promise.race([execution, timeout]);
      if (outcome === TIMED_OUT) {
        if (tool.sideEffect === 'pure') {
          controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
        }
        this.observeLateSettlement(tool, call, execution);
      }
      return outcome;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private observeLateSettlement(
    tool: ToolDescriptor,
    call: ToolCall,
    execution: Promise<ToolOutput>
  ): void {
    void execution.then(
      (output) => {
        this.logger.notice('Tool finished after its timeout; result discarded', {
          tool: tool.name,
          callId: call.id,
          sideEffect: tool.sideEffect,
          artifact: output.artifact?.fileName,
        });
      },
      (error: unknown) => {
        this.logger.warning('Tool failed after its timeout', {
          tool: tool.name,
          callId: call.id,
          error: describeError(error),
        });
      }
    );
  }
}
