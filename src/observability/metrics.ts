/**
 * Agent Metrics Collection
 *
 * - Turns by terminal status, turn latency and reasoning steps per turn
 * - Tool invocations by tool and result status, tool latency
 * - Dedup cache hits
 */

import type { Meter, Counter, Histogram, Attributes } from '@opentelemetry/api';

// =============================================================================
// Types
// =============================================================================

export interface MetricsSummary {
  turns: {
    total: number;
    byStatus: Record<string, number>;
    steps: number;
  };
  tools: {
    total: number;
    byTool: Record<string, number>;
    byStatus: Record<string, number>;
    cacheHits: number;
  };
}

// =============================================================================
// Constants
// =============================================================================

/** Histogram bucket boundaries for durations in milliseconds */
export const DURATION_BUCKETS = [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000];

export const METRIC_NAMES = {
  TURNS_TOTAL: 'dbchat.turns.total',
  TURNS_DURATION: 'dbchat.turns.duration',
  TURN_STEPS: 'dbchat.turns.steps',
  TOOL_CALLS_TOTAL: 'dbchat.tool_calls.total',
  TOOL_CALLS_DURATION: 'dbchat.tool_calls.duration',
  TOOL_CACHE_HITS: 'dbchat.tool_calls.cache_hits',
} as const;

// =============================================================================
// AgentMetrics
// =============================================================================

/**
 * Records agent metrics through an OpenTelemetry meter and keeps in-process
 * tallies for `getMetrics()` (CLI `info`, tests).
 *
 * @example
 * ```typescript
 * const metrics = new AgentMetrics(telemetry.getMeter());
 * metrics.recordToolCall('sql_db_query', 'success', 42);
 * metrics.recordTurn('completed', 1800, 3);
 * ```
 */
export class AgentMetrics {
  private readonly turnsCounter: Counter;
  private readonly turnsDuration: Histogram;
  private readonly turnSteps: Histogram;
  private readonly toolCallsCounter: Counter;
  private readonly toolCallsDuration: Histogram;
  private readonly cacheHitsCounter: Counter;

  private turnsTotal = 0;
  private turnsByStatus: Record<string, number> = {};
  private stepsTotal = 0;
  private toolCallsTotal = 0;
  private toolCallsByTool: Record<string, number> = {};
  private toolCallsByStatus: Record<string, number> = {};
  private cacheHits = 0;

  constructor(meter: Meter) {
    this.turnsCounter = meter.createCounter(METRIC_NAMES.TURNS_TOTAL, {
      description: 'Completed agent turns by terminal status',
      unit: '1',
    });
    this.turnsDuration = meter.createHistogram(METRIC_NAMES.TURNS_DURATION, {
      description: 'Wall-clock duration of agent turns',
      unit: 'ms',
      advice: { explicitBucketBoundaries: DURATION_BUCKETS },
    });
    this.turnSteps = meter.createHistogram(METRIC_NAMES.TURN_STEPS, {
      description: 'Reasoning steps taken per turn',
      unit: '1',
      advice: { explicitBucketBoundaries: [1, 2, 3, 5, 8, 13, 21] },
    });
    this.toolCallsCounter = meter.createCounter(METRIC_NAMES.TOOL_CALLS_TOTAL, {
      description: 'Tool executions by tool and result status',
      unit: '1',
    });
    this.toolCallsDuration = meter.createHistogram(METRIC_NAMES.TOOL_CALLS_DURATION, {
      description: 'Duration of tool executions',
      unit: 'ms',
      advice: { explicitBucketBoundaries: DURATION_BUCKETS },
    });
    this.cacheHitsCounter = meter.createCounter(METRIC_NAMES.TOOL_CACHE_HITS, {
      description: 'Repeated failing tool calls answered from the per-turn cache',
      unit: '1',
    });
  }

  recordTurn(status: string, durationMs: number, steps: number): void {
    const attributes: Attributes = { status };
    this.turnsCounter.add(1, attributes);
    this.turnsDuration.record(durationMs, attributes);
    this.turnSteps.record(steps, attributes);

    this.turnsTotal++;
    this.turnsByStatus[status] = (this.turnsByStatus[status] ?? 0) + 1;
    this.stepsTotal += steps;
  }

  recordToolCall(toolName: string, status: string, durationMs: number): void {
    const attributes: Attributes = { tool: toolName, status };
    this.toolCallsCounter.add(1, attributes);
    this.toolCallsDuration.record(durationMs, attributes);

    this.toolCallsTotal++;
    this.toolCallsByTool[toolName] = (this.toolCallsByTool[toolName] ?? 0) + 1;
    this.toolCallsByStatus[status] = (this.toolCallsByStatus[status] ?? 0) + 1;
  }

  recordCacheHit(toolName: string): void {
    this.cacheHitsCounter.add(1, { tool: toolName });
    this.cacheHits++;
  }

  /**
   * Internally tracked values, not the exported OpenTelemetry data.
   */
  getMetrics(): MetricsSummary {
    return {
      turns: {
        total: this.turnsTotal,
        byStatus: { ...this.turnsByStatus },
        steps: this.stepsTotal,
      },
      tools: {
        total: this.toolCallsTotal,
        byTool: { ...this.toolCallsByTool },
        byStatus: { ...this.toolCallsByStatus },
        cacheHits: this.cacheHits,
      },
    };
  }

  resetMetrics(): void {
    this.turnsTotal = 0;
    this.turnsByStatus = {};
    this.stepsTotal = 0;
    this.toolCallsTotal = 0;
    this.toolCallsByTool = {};
    this.toolCallsByStatus = {};
    this.cacheHits = 0;
  }
}
