import { describe, it, expect, beforeEach, vi } from 'vitest';
import { metrics } from '@opentelemetry/api';
import { AgentMetrics, DURATION_BUCKETS, METRIC_NAMES } from '../../../src/observability/metrics.js';
import { TelemetryManager } from '../../../src/observability/telemetry.js';

// =============================================================================
// Constants Tests
// =============================================================================

describe('Metrics Constants', () => {
  it('should export metric names under the dbchat prefix', () => {
    expect(METRIC_NAMES.TURNS_TOTAL).toBe('dbchat.turns.total');
    expect(METRIC_NAMES.TOOL_CALLS_TOTAL).toBe('dbchat.tool_calls.total');
    expect(METRIC_NAMES.TOOL_CACHE_HITS).toBe('dbchat.tool_calls.cache_hits');
  });

  it('should export ascending duration buckets', () => {
    expect([...DURATION_BUCKETS].sort((a, b) => a - b)).toEqual(DURATION_BUCKETS);
  });
});

// =============================================================================
// AgentMetrics Tests
// =============================================================================

describe('AgentMetrics', () => {
  let agentMetrics: AgentMetrics;

  beforeEach(() => {
    // Disabled telemetry hands out the API's no-op meter
    agentMetrics = new AgentMetrics(new TelemetryManager({ enabled: false }).getMeter());
  });

  describe('recordTurn', () => {
    it('should tally turns by status and sum steps', () => {
      agentMetrics.recordTurn('completed', 120, 3);
      agentMetrics.recordTurn('completed', 80, 1);
      agentMetrics.recordTurn('step_limit_exceeded', 900, 10);

      const summary = agentMetrics.getMetrics();
      expect(summary.turns.total).toBe(3);
      expect(summary.turns.byStatus).toEqual({ completed: 2, step_limit_exceeded: 1 });
      expect(summary.turns.steps).toBe(14);
    });
  });

  describe('recordToolCall', () => {
    it('should tally calls by tool and by status', () => {
      agentMetrics.recordToolCall('sql_db_query', 'success', 12);
      agentMetrics.recordToolCall('sql_db_query', 'failure', 3);
      agentMetrics.recordToolCall('create_chart', 'timeout', 30000);

      const summary = agentMetrics.getMetrics();
      expect(summary.tools.total).toBe(3);
      expect(summary.tools.byTool).toEqual({ sql_db_query: 2, create_chart: 1 });
      expect(summary.tools.byStatus).toEqual({ success: 1, failure: 1, timeout: 1 });
    });
  });

  describe('recordCacheHit', () => {
    it('should count cache hits separately from tool calls', () => {
      agentMetrics.recordCacheHit('sql_db_query');

      const summary = agentMetrics.getMetrics();
      expect(summary.tools.cacheHits).toBe(1);
      expect(summary.tools.total).toBe(0);
    });
  });

  describe('getMetrics', () => {
    it('should return copies that do not change with later records', () => {
      agentMetrics.recordToolCall('sql_db_query', 'success', 1);
      const snapshot = agentMetrics.getMetrics();
      agentMetrics.recordToolCall('sql_db_query', 'success', 1);

      expect(snapshot.tools.byTool['sql_db_query']).toBe(1);
    });
  });

  describe('resetMetrics', () => {
    it('should clear every tally', () => {
      agentMetrics.recordTurn('completed', 1, 1);
      agentMetrics.recordToolCall('sql_db_query', 'success', 1);
      agentMetrics.recordCacheHit('sql_db_query');

      agentMetrics.resetMetrics();

      expect(agentMetrics.getMetrics()).toEqual({
        turns: { total: 0, byStatus: {}, steps: 0 },
        tools: { total: 0, byTool: {}, byStatus: {}, cacheHits: 0 },
      });
    });
  });

  describe('instruments', () => {
    it('should create its counters and histograms on the given meter', () => {
      const meter = metrics.getMeter('test');
      const createCounter = vi.spyOn(meter, 'createCounter');
      const createHistogram = vi.spyOn(meter, 'createHistogram');

      new AgentMetrics(meter);

      expect(createCounter.mock.calls.map((call) => call[0])).toEqual([
        METRIC_NAMES.TURNS_TOTAL,
        METRIC_NAMES.TOOL_CALLS_TOTAL,
        METRIC_NAMES.TOOL_CACHE_HITS,
      ]);
      expect(createHistogram.mock.calls.map((call) => call[0])).toEqual([
        METRIC_NAMES.TURNS_DURATION,
        METRIC_NAMES.TURN_STEPS,
        METRIC_NAMES.TOOL_CALLS_DURATION,
      ]);
    });
  });
});
