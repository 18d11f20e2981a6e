/**
 * Conversation Agent
 *
 * Runs one user turn through the state machine: load the thread, ask the
 * reasoner for the next action, dispatch at most one tool call per step,
 * feed the result back, and stop on an answer, the step limit, a reasoning
 * or storage failure, or cancellation. Turns on one thread are serialized;
 * turns on different threads run in parallel.
 */

import { randomUUID } from 'node:crypto';
import { describeError, toStorageError } from '../errors.js';
import { withStorageRetry } from '../memory/retry.js';
import { KeyedMutex } from '../memory/thread-lock.js';
import { createMessage, type MemoryStore, type Message, type NewMessage } from '../memory/types.js';
import { createSilentLogger, type StructuredLogger } from '../observability/logger.js';
import type { AgentMetrics } from '../observability/metrics.js';
import { withSpan } from '../observability/tracing.js';
import { traceEntryFor, type TurnTraceEntry, type TurnTraceStore } from '../observability/turn-trace.js';
import { ToolExecutor } from '../tools/executor.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ToolCall, ToolResult, ToolResultStatus, ToolSpec } from '../tools/types.js';
import { assembleResponse, RESPONSE_TEXTS, type AssembledResponse, type TurnStatus } from './assembler.js';
import { fingerprintCall } from './fingerprint.js';
import { selectHistoryWindow, type HistoryWindowOptions } from './history-window.js';
import type { Decision, ProposedToolCall, Reasoner } from './reasoner.js';
import { TurnStateMachine, type AgentState } from './state.js';

// =============================================================================
// Types
// =============================================================================

export interface ConversationAgentOptions {
  memory: MemoryStore;
  registry: ToolRegistry;
  reasoner: Reasoner;
  /** Built from the registry when omitted */
  executor?: ToolExecutor;
  /** Maximum reasoning steps per turn (default: 10) */
  maxSteps?: number;
  historyWindow?: HistoryWindowOptions;
  /** Retries of retryable storage failures (default: 2) */
  storageRetries?: number;
  storageRetryDelayMs?: number;
  /** Continue without history when it cannot be loaded (default: false) */
  degradeOnStorageFailure?: boolean;
  logger?: StructuredLogger;
  metrics?: AgentMetrics;
  traces?: TurnTraceStore;
}

export interface RunTurnOptions {
  /** Observed at step boundaries; an in-flight tool call is never interrupted */
  signal?: AbortSignal;
}

export interface TurnStep {
  step: number;
  action: 'answer' | 'tool_call';
  toolName?: string;
  callId?: string;
  status?: ToolResultStatus;
  cached?: boolean;
}

export type TurnWarning = 'memory_degraded';

export interface TurnOutcome {
  turnId: string;
  threadId: string;
  status: TurnStatus;
  response: AssembledResponse;
  steps: TurnStep[];
  /** States entered during the turn, starting and ending with AWAITING_INPUT */
  states: AgentState[];
  /** Real handler executions; cache replays are not counted */
  toolInvocations: number;
  warnings: TurnWarning[];
  error?: { kind: 'storage_error' | 'reasoning_error'; message: string };
}

// =============================================================================
// Per-turn State
// =============================================================================

class TurnContext {
  readonly turnId = randomUUID();
  readonly machine = new TurnStateMachine();
  readonly startedAt = new Date();
  readonly results: ToolResult[] = [];
  readonly steps: TurnStep[] = [];
  readonly entries: TurnTraceEntry[] = [];
  readonly warnings = new Set<TurnWarning>();
  readonly failureCache = new Map<string, ToolResult>();
  readonly usedCallIds = new Set<string>();
  history: Message[] = [];
  persistent = true;
  reasoningSteps = 0;
  toolInvocations = 0;

  constructor(
    readonly threadId: string,
    readonly signal: AbortSignal
  ) {}

  adoptHistory(messages: Message[]): void {
    this.history = [...messages];
    for (const message of messages) {
      if (message.toolCall) {
        this.usedCallIds.add(message.toolCall.id);
      }
    }
  }

  /**
   * Proposed id when it is present and unused in the thread, a fresh one otherwise
   */
  claimCallId(proposed: string | undefined): string {
    const id = proposed && !this.usedCallIds.has(proposed) ? proposed : `call_${randomUUID()}`;
    this.usedCallIds.add(id);
    return id;
  }
}

/**
 * JSON rendering of a tool result for the conversation. BigInt values
 * (some drivers return them) are written as strings.
 */
export function renderToolContent(result: ToolResult): string {
  const payload: Record<string, unknown> = { status: result.status };
  if (result.data !== undefined) {
    payload['data'] = result.data;
  }
  if (result.artifact) {
    const { kind, fileName, url, expiresAt } = result.artifact;
    payload['artifact'] = { kind, fileName, url, expiresAt };
  }
  if (result.error) {
    payload['error'] = result.error;
  }
  if (result.cached) {
    payload['cached'] = true;
  }
  return JSON.stringify(payload, (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value));
}

// =============================================================================
// Conversation Agent
// =============================================================================

export class ConversationAgent {
  private readonly memory: MemoryStore;
  private readonly registry: ToolRegistry;
  private readonly reasoner: Reasoner;
  private readonly executor: ToolExecutor;
  private readonly maxSteps: number;
  private readonly historyWindow: HistoryWindowOptions;
  private readonly storageRetries: number;
  private readonly storageRetryDelayMs: number;
  private readonly degradeOnStorageFailure: boolean;
  private readonly logger: StructuredLogger;
  private readonly metrics: AgentMetrics | undefined;
  private readonly traces: TurnTraceStore | undefined;
  private readonly threadLock = new KeyedMutex();
  private readonly catalog: ToolSpec[];

  constructor(options: ConversationAgentOptions) {
    this.memory = options.memory;
    this.registry = options.registry.freeze();
    this.reasoner = options.reasoner;
    this.logger = options.logger ?? createSilentLogger('agent');
    this.metrics = options.metrics;
    this.traces = options.traces;
    this.executor =
      options.executor ??
      new ToolExecutor(this.registry, {
        logger: this.logger.child('executor'),
        ...(this.metrics ? { metrics: this.metrics } : {}),
      });
    this.maxSteps = options.maxSteps ?? 10;
    this.historyWindow = options.historyWindow ?? { maxMessages: 40 };
    this.storageRetries = options.storageRetries ?? 2;
    this.storageRetryDelayMs = options.storageRetryDelayMs ?? 100;
    this.degradeOnStorageFailure = options.degradeOnStorageFailure ?? false;
    this.catalog = this.registry.catalog();
  }

  getCatalog(): ToolSpec[] {
    return [...this.catalog];
  }

  /**
   * Process one user message. Never throws: every failure is reported
   * through the outcome's status.
   */
  async runTurn(threadId: string, text: string, options: RunTurnOptions = {}): Promise<TurnOutcome> {
    const signal = options.signal ?? new AbortController().signal;
    return this.threadLock.runExclusive(threadId, () =>
      withSpan('agent.turn', { 'thread.id': threadId }, async (span) => {
        const outcome = await this.runLocked(new TurnContext(threadId, signal), text);
        span.setAttribute('turn.status', outcome.status);
        span.setAttribute('turn.tool_invocations', outcome.toolInvocations);
        return outcome;
      })
    );
  }

  /**
   * Persisted history of a thread, read under the thread's lock
   */
  async getHistory(threadId: string): Promise<Message[]> {
    return this.threadLock.runExclusive(threadId, () =>
      withStorageRetry(`load thread ${threadId}`, () => this.memory.load(threadId), this.retryOptions())
    );
  }

  // ===========================================================================
  // Turn
  // ===========================================================================

  private async runLocked(turn: TurnContext, text: string): Promise<TurnOutcome> {
    turn.machine.transition('REASONING');

    try {
      turn.adoptHistory(
        await withStorageRetry(`load thread ${turn.threadId}`, () => this.memory.load(turn.threadId), this.retryOptions())
      );
    } catch (error) {
      const storageError = toStorageError(error, `load thread ${turn.threadId}`);
      if (!this.degradeOnStorageFailure) {
        this.logger.error('History unavailable; turn aborted', { threadId: turn.threadId, error: storageError.message });
        return this.finish(turn, 'storage_error', undefined, { kind: 'storage_error', message: storageError.message });
      }
      this.logger.warning('History unavailable; continuing without memory', {
        threadId: turn.threadId,
        error: storageError.message,
      });
      this.enterMemoryless(turn);
    }

    await this.append(turn, { role: 'user', content: text });

    for (let step = 1; ; step++) {
      if (step > this.maxSteps) {
        this.logger.notice('Step limit reached', { threadId: turn.threadId, maxSteps: this.maxSteps });
        await this.append(turn, { role: 'assistant', content: RESPONSE_TEXTS.step_limit_exceeded });
        return this.finish(turn, 'step_limit_exceeded');
      }
      if (turn.signal.aborted) {
        return this.finish(turn, 'cancelled');
      }

      turn.reasoningSteps = step;
      let decision: Decision;
      try {
        decision = await this.reasoner.decide({
          threadId: turn.threadId,
          history: selectHistoryWindow(turn.history, this.historyWindow),
          catalog: this.catalog,
          step,
          signal: turn.signal,
        });
      } catch (error) {
        if (turn.signal.aborted) {
          return this.finish(turn, 'cancelled');
        }
        this.logger.error('Reasoning failed', { threadId: turn.threadId, step, error: describeError(error) });
        await this.append(turn, { role: 'assistant', content: RESPONSE_TEXTS.reasoning_error });
        return this.finish(turn, 'reasoning_error', undefined, {
          kind: 'reasoning_error',
          message: describeError(error),
        });
      }

      if (decision.type === 'answer') {
        turn.steps.push({ step, action: 'answer' });
        await this.append(turn, { role: 'assistant', content: decision.text });
        return this.finish(turn, 'completed', decision.text);
      }

      // Cancellation boundary between REASONING and DISPATCHING_TOOL
      if (turn.signal.aborted) {
        return this.finish(turn, 'cancelled');
      }

      turn.machine.transition('DISPATCHING_TOOL');
      const call = this.toToolCall(turn, decision.call);
      await this.append(turn, {
        role: 'assistant',
        content: decision.text ?? '',
        toolCall: { id: call.id, name: call.name, arguments: call.arguments },
      });

      const result = await this.dispatch(turn, call);
      turn.results.push(result);
      turn.steps.push({
        step,
        action: 'tool_call',
        toolName: call.name,
        callId: call.id,
        status: result.status,
        ...(result.cached ? { cached: true } : {}),
      });
      await this.append(turn, {
        role: 'tool',
        content: renderToolContent(result),
        toolResult: { callId: call.id, toolName: call.name, status: result.status },
      });

      turn.machine.transition('REASONING');
    }
  }

  private toToolCall(turn: TurnContext, proposed: ProposedToolCall): ToolCall {
    return { id: turn.claimCallId(proposed.id), name: proposed.name, arguments: proposed.arguments };
  }

  /**
   * Execute a call unless an identical deterministic call already failed in
   * this turn, in which case the earlier result is replayed.
   */
  private async dispatch(turn: TurnContext, call: ToolCall): Promise<ToolResult> {
    const deterministic = this.registry.resolve(call.name)?.deterministic ?? true;
    const fingerprint = fingerprintCall(call.name, call.arguments);

    const cached = deterministic ? turn.failureCache.get(fingerprint) : undefined;
    if (cached) {
      this.metrics?.recordCacheHit(call.name);
      this.logger.info('Repeated failing call answered from cache', { tool: call.name, callId: call.id });
      return { ...cached, callId: call.id, durationMs: 0, cached: true };
    }

    turn.toolInvocations++;
    const result = await this.executor.execute(call);
    if (result.status !== 'success' && deterministic) {
      turn.failureCache.set(fingerprint, result);
    }
    return result;
  }

  // ===========================================================================
  // Memory
  // ===========================================================================

  private retryOptions(): { retries: number; delayMs: number; logger: StructuredLogger } {
    return { retries: this.storageRetries, delayMs: this.storageRetryDelayMs, logger: this.logger };
  }

  private enterMemoryless(turn: TurnContext): void {
    turn.persistent = false;
    turn.warnings.add('memory_degraded');
  }

  /**
   * Add a message to the turn's context and, unless the turn is memoryless,
   * to the store. A failed append switches the turn to memoryless mode so
   * the persisted log never has gaps.
   */
  private async append(turn: TurnContext, input: NewMessage): Promise<void> {
    const message = createMessage(input);
    turn.history.push(message);

    if (turn.persistent) {
      try {
        await withStorageRetry(
          `append to thread ${turn.threadId}`,
          () => this.memory.append(turn.threadId, message),
          this.retryOptions()
        );
      } catch (error) {
        this.logger.warning('Append failed; continuing without memory', {
          threadId: turn.threadId,
          error: describeError(error),
        });
        this.enterMemoryless(turn);
      }
    }
    turn.entries.push(traceEntryFor(message, turn.persistent));
  }

  // ===========================================================================
  // Termination
  // ===========================================================================

  private async finish(
    turn: TurnContext,
    status: TurnStatus,
    answer?: string,
    error?: TurnOutcome['error']
  ): Promise<TurnOutcome> {
    turn.machine.transition('TERMINATING');
    const response = assembleResponse({ status, answer, results: turn.results });
    turn.machine.transition('AWAITING_INPUT');

    const finishedAt = new Date();
    const durationMs = finishedAt.getTime() - turn.startedAt.getTime();
    const warnings = [...turn.warnings];

    this.metrics?.recordTurn(status, durationMs, turn.reasoningSteps);
    this.logger.info('Turn finished', {
      threadId: turn.threadId,
      turnId: turn.turnId,
      status,
      steps: turn.reasoningSteps,
      toolInvocations: turn.toolInvocations,
      durationMs,
      warnings,
    });

    if (this.traces) {
      try {
        await this.traces.record({
          turnId: turn.turnId,
          threadId: turn.threadId,
          status,
          startedAt: turn.startedAt.toISOString(),
          finishedAt: finishedAt.toISOString(),
          steps: turn.reasoningSteps,
          entries: turn.entries,
          warnings,
        });
      } catch (traceError) {
        this.logger.warning('Failed to record turn trace', { turnId: turn.turnId, error: describeError(traceError) });
      }
    }

    const outcome: TurnOutcome = {
      turnId: turn.turnId,
      threadId: turn.threadId,
      status,
      response,
      steps: turn.steps,
      states: turn.machine.getVisited(),
      toolInvocations: turn.toolInvocations,
      warnings,
    };
    if (error) {
      outcome.error = error;
    }
    return outcome;
  }
}
