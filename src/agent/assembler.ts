/**
 * Response assembly
 *
 * Pure function of a turn's terminal state. Artifacts are taken only from
 * successful tool results, which the executor builds after the publisher
 * confirmed the file is durable.
 */

import type { Artifact } from '../artifacts/types.js';
import type { ToolResult } from '../tools/types.js';

export type TurnStatus = 'completed' | 'step_limit_exceeded' | 'cancelled' | 'storage_error' | 'reasoning_error';

export interface TerminalState {
  status: TurnStatus;
  /** Final answer text; only meaningful for `completed` */
  answer?: string | undefined;
  /** Tool results of this turn, in execution order */
  results: readonly ToolResult[];
}

export interface AssembledResponse {
  text: string;
  artifacts: Artifact[];
}

export const RESPONSE_TEXTS = {
  step_limit_exceeded:
    'I could not complete this request within the allowed number of steps. ' +
    'Try narrowing the question or breaking it into smaller parts.',
  cancelled: 'The request was cancelled.',
  storage_error: 'The conversation history is currently unavailable, so I cannot answer safely. Please try again later.',
  reasoning_error: 'I apologize, but I encountered an error while processing your request. Please try again.',
} as const satisfies Record<Exclude<TurnStatus, 'completed'>, string>;

function collectArtifacts(results: readonly ToolResult[]): Artifact[] {
  const seen = new Set<string>();
  const artifacts: Artifact[] = [];
  for (const result of results) {
    if (result.status !== 'success' || !result.artifact || seen.has(result.artifact.location)) {
      continue;
    }
    seen.add(result.artifact.location);
    artifacts.push(result.artifact);
  }
  return artifacts;
}

export function assembleResponse(terminal: TerminalState): AssembledResponse {
  switch (terminal.status) {
    case 'completed':
      return { text: terminal.answer ?? '', artifacts: collectArtifacts(terminal.results) };
    case 'step_limit_exceeded':
      return { text: RESPONSE_TEXTS.step_limit_exceeded, artifacts: collectArtifacts(terminal.results) };
    default:
      return { text: RESPONSE_TEXTS[terminal.status], artifacts: [] };
  }
}
