import { describe, it, expect, vi } from 'vitest';
import type { TurnOutcome } from '../../../src/agent/agent.js';
import {
  describeArtifact,
  describeMessage,
  describeStep,
  describeThread,
  parseReplInput,
  parseToolArguments,
  printOutcome,
} from '../../../src/commands/format.js';
import { createMessage } from '../../../src/memory/types.js';

describe('parseReplInput', () => {
  it('should ignore blank lines', () => {
    expect(parseReplInput('   ')).toBeUndefined();
  });

  it('should treat plain text as a message', () => {
    expect(parseReplInput('  How many customers?  ')).toEqual({ type: 'message', text: 'How many customers?' });
  });

  it('should recognize commands case-insensitively', () => {
    expect(parseReplInput('/QUIT')).toEqual({ type: 'quit' });
    expect(parseReplInput('/exit')).toEqual({ type: 'quit' });
    expect(parseReplInput('/tools')).toEqual({ type: 'tools' });
    expect(parseReplInput('/history')).toEqual({ type: 'history' });
    expect(parseReplInput('/threads')).toEqual({ type: 'threads' });
  });

  it('should take an optional thread id for /new', () => {
    expect(parseReplInput('/new')).toEqual({ type: 'new' });
    expect(parseReplInput('/new sales-review')).toEqual({ type: 'new', threadId: 'sales-review' });
  });

  it('should report unknown commands', () => {
    expect(parseReplInput('/help me')).toEqual({ type: 'unknown', command: '/help' });
  });
});

describe('parseToolArguments', () => {
  it('should default to an empty object', () => {
    expect(parseToolArguments(undefined)).toEqual({});
    expect(parseToolArguments('  ')).toEqual({});
  });

  it('should parse a JSON object', () => {
    expect(parseToolArguments('{"query":"SELECT 1"}')).toEqual({ query: 'SELECT 1' });
  });

  it('should reject invalid JSON and non-objects', () => {
    expect(() => parseToolArguments('{')).toThrow(/^Arguments must be valid JSON: /);
    expect(() => parseToolArguments('[1]')).toThrow('Arguments must be a JSON object');
    expect(() => parseToolArguments('null')).toThrow('Arguments must be a JSON object');
  });
});

describe('plain text descriptions', () => {
  it('should describe an artifact', () => {
    expect(
      describeArtifact({
        kind: 'csv',
        fileName: 'sales_abc.csv',
        location: '/tmp/sales_abc.csv',
        url: '/downloads/sales_abc.csv',
        callId: 'c1',
        createdAt: '2026-01-01T00:00:00.000Z',
        expiresAt: '2026-01-02T00:00:00.000Z',
      })
    ).toBe('csv: /downloads/sales_abc.csv (expires 2026-01-02T00:00:00.000Z)');
  });

  it('should describe steps', () => {
    expect(describeStep({ step: 3, action: 'answer' })).toBe('3. answer');
    expect(describeStep({ step: 1, action: 'tool_call', toolName: 'sql_db_query', status: 'failure', cached: true })).toBe(
      '1. sql_db_query -> failure (cached)'
    );
  });

  it('should describe a thread', () => {
    expect(
      describeThread({ id: 'sales', createdAt: 'a', lastActiveAt: '2026-01-01T00:00:00.000Z', messageCount: 4 })
    ).toBe('sales  4 messages, last active 2026-01-01T00:00:00.000Z');
  });

  it('should label messages by role, tool call and tool result', () => {
    expect(describeMessage(createMessage({ role: 'user', content: 'Hi' }))).toBe('[user] Hi');
    expect(
      describeMessage(
        createMessage({
          role: 'assistant',
          content: '',
          toolCall: { id: 'c1', name: 'sql_db_query', arguments: { query: 'SELECT 1' } },
        })
      )
    ).toBe('[assistant -> sql_db_query] {"query":"SELECT 1"}');
    expect(
      describeMessage(
        createMessage({
          role: 'tool',
          content: '{"status":"timeout"}',
          toolResult: { callId: 'c1', toolName: 'sql_db_query', status: 'timeout' },
        })
      )
    ).toBe('[tool sql_db_query (timeout)] {"status":"timeout"}');
  });

  it('should shorten long content', () => {
    expect(describeMessage(createMessage({ role: 'user', content: 'abcdef' }), 3)).toBe('[user] abc...');
  });
});

describe('printOutcome', () => {
  const outcome: TurnOutcome = {
    turnId: 'turn-1',
    threadId: 't1',
    status: 'completed',
    response: { text: 'Three sales.', artifacts: [] },
    steps: [
      { step: 1, action: 'tool_call', toolName: 'sql_db_query', callId: 'c1', status: 'success' },
      { step: 2, action: 'answer' },
    ],
    states: ['AWAITING_INPUT', 'REASONING', 'DISPATCHING_TOOL', 'REASONING', 'TERMINATING', 'AWAITING_INPUT'],
    toolInvocations: 1,
    warnings: ['memory_degraded'],
  };

  const printed = () => vi.mocked(console.log).mock.calls.map((args) => String(args[0]));

  it('should print the answer and warnings', () => {
    printOutcome(outcome, false);

    const lines = printed();
    expect(lines).toHaveLength(2);
    expect(lines[0]).toContain('Assistant: Three sales.');
    expect(lines[1]).toContain('warning: memory_degraded');
  });

  it('should print steps and states when verbose', () => {
    printOutcome(outcome, true);

    const lines = printed();
    expect(lines[0]).toContain('1. sql_db_query -> success');
    expect(lines[1]).toContain('2. answer');
    expect(lines[2]).toContain('states: AWAITING_INPUT -> REASONING -> DISPATCHING_TOOL');
  });
});
