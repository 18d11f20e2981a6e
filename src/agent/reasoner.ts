/**
 * Reasoning capability contract
 *
 * The loop asks for the next action given the history window and the tool
 * catalog; the reasoner answers with final text or exactly one tool call.
 */

import type { Message } from '../memory/types.js';
import type { ToolSpec } from '../tools/types.js';

export interface ReasoningRequest {
  threadId: string;
  /** Bounded prompt view of the thread, oldest first */
  history: readonly Message[];
  catalog: readonly ToolSpec[];
  /** 1-based reasoning step within the turn */
  step: number;
  signal: AbortSignal;
}

/**
 * A tool call as proposed by the reasoner. The loop assigns a fresh id when
 * `id` is missing or already used in the thread.
 */
export interface ProposedToolCall {
  id?: string | undefined;
  name: string;
  arguments: Record<string, unknown>;
}

export type Decision =
  | { type: 'answer'; text: string }
  | { type: 'tool_call'; call: ProposedToolCall; text?: string | undefined };

export interface Reasoner {
  /**
   * @throws any error; the loop reports it as a reasoning failure
   */
  decide(request: ReasoningRequest): Promise<Decision>;
}
