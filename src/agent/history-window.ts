/**
 * Prompt-view truncation of a thread's history. The persisted log is never
 * touched; only what the reasoner sees is bounded.
 */

import type { Message } from '../memory/types.js';

export interface HistoryWindowOptions {
  /** Most recent messages kept */
  maxMessages: number;
  /** Approximate token budget (about four characters per token) */
  maxTokens?: number | undefined;
}

export function estimateTokens(message: Message): number {
  let characters = message.content.length;
  if (message.toolCall) {
    characters += message.toolCall.name.length + JSON.stringify(message.toolCall.arguments).length;
  }
  return Math.ceil(characters / 4);
}

/**
 * Newest-first selection within both limits. The most recent message is
 * always kept, and the window never starts with a tool message whose call
 * was cut off.
 */
export function selectHistoryWindow(messages: readonly Message[], options: HistoryWindowOptions): Message[] {
  const maxMessages = Math.max(1, options.maxMessages);
  const selected: Message[] = [];
  let tokens = 0;

  for (let index = messages.length - 1; index >= 0 && selected.length < maxMessages; index--) {
    const message = messages[index];
    if (!message) {
      continue;
    }
    const cost = estimateTokens(message);
    if (selected.length > 0 && options.maxTokens !== undefined && tokens + cost > options.maxTokens) {
      break;
    }
    tokens += cost;
    selected.unshift(message);
  }

  while (selected.length > 1 && selected[0]?.role === 'tool') {
    selected.shift();
  }
  return selected;
}
