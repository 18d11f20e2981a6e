/**
 * Per-turn audit records
 *
 * One trace per turn: its thread, terminal status, timing and the messages
 * it appended (or would have appended, in memoryless mode).
 */

import type { Message } from '../memory/types.js';

export interface TurnTraceEntry {
  messageId: string;
  role: Message['role'];
  /** Tool requested by an assistant message, or answered by a tool message */
  toolName?: string;
  callId?: string;
  persisted: boolean;
}

export interface TurnTrace {
  turnId: string;
  threadId: string;
  status: string;
  startedAt: string;
  finishedAt: string;
  steps: number;
  entries: TurnTraceEntry[];
  warnings: string[];
}

export interface TurnTraceStore {
  record(trace: TurnTrace): Promise<void>;
  /** Most recent first */
  list(threadId?: string, limit?: number): Promise<TurnTrace[]>;
}

export function traceEntryFor(message: Message, persisted: boolean): TurnTraceEntry {
  const entry: TurnTraceEntry = { messageId: message.id, role: message.role, persisted };
  if (message.toolCall) {
    entry.toolName = message.toolCall.name;
    entry.callId = message.toolCall.id;
  } else if (message.toolResult) {
    entry.toolName = message.toolResult.toolName;
    entry.callId = message.toolResult.callId;
  }
  return entry;
}

/**
 * Bounded ring of recent traces
 */
export class InMemoryTurnTraceStore implements TurnTraceStore {
  private readonly traces: TurnTrace[] = [];

  constructor(private readonly capacity: number = 500) {}

  async record(trace: TurnTrace): Promise<void> {
    this.traces.push(trace);
    if (this.traces.length > this.capacity) {
      this.traces.splice(0, this.traces.length - this.capacity);
    }
  }

  async list(threadId?: string, limit: number = 50): Promise<TurnTrace[]> {
    if (limit <= 0) {
      return [];
    }
    return this.traces
      .filter((trace) => threadId === undefined || trace.threadId === threadId)
      .slice(-limit)
      .reverse();
  }

  size(): number {
    return this.traces.length;
  }
}
