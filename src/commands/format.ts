/**
 * Input parsing and output formatting for the command line
 */

import chalk from 'chalk';
import type { TurnOutcome, TurnStep } from '../agent/agent.js';
import type { Artifact } from '../artifacts/types.js';
import type { Message, ThreadInfo } from '../memory/types.js';

// =============================================================================
// REPL Input
// =============================================================================

export type ReplInput =
  | { type: 'message'; text: string }
  | { type: 'quit' }
  | { type: 'tools' }
  | { type: 'history' }
  | { type: 'threads' }
  | { type: 'new'; threadId?: string }
  | { type: 'unknown'; command: string };

/**
 * Classify one line typed in the chat REPL; undefined for blank lines
 */
export function parseReplInput(line: string): ReplInput | undefined {
  const trimmed = line.trim();
  if (trimmed === '') {
    return undefined;
  }
  if (!trimmed.startsWith('/')) {
    return { type: 'message', text: trimmed };
  }

  const [command = '', argument] = trimmed.split(/\s+/, 2);
  switch (command.toLowerCase()) {
    case '/quit':
    case '/exit':
    case '/q':
      return { type: 'quit' };
    case '/tools':
      return { type: 'tools' };
    case '/history':
      return { type: 'history' };
    case '/threads':
      return { type: 'threads' };
    case '/new':
      return argument ? { type: 'new', threadId: argument } : { type: 'new' };
    default:
      return { type: 'unknown', command };
  }
}

/**
 * Parse the JSON argument object of `dbchat call`
 * @throws Error when the text is not a JSON object
 */
export function parseToolArguments(json: string | undefined): Record<string, unknown> {
  if (json === undefined || json.trim() === '') {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new Error(`Arguments must be valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error('Arguments must be a JSON object');
  }
  return Object.fromEntries(Object.entries(parsed));
}

// =============================================================================
// Plain Text
// =============================================================================

export function describeArtifact(artifact: Artifact): string {
  return `${artifact.kind}: ${artifact.url} (expires ${artifact.expiresAt})`;
}

export function describeStep(step: TurnStep): string {
  if (step.action === 'answer') {
    return `${step.step}. answer`;
  }
  const cached = step.cached ? ' (cached)' : '';
  return `${step.step}. ${step.toolName ?? '?'} -> ${step.status ?? '?'}${cached}`;
}

export function describeThread(thread: ThreadInfo): string {
  return `${thread.id}  ${thread.messageCount} messages, last active ${thread.lastActiveAt}`;
}

export function describeMessage(message: Message, maxLength: number = 200): string {
  let label: string = message.role;
  if (message.toolCall) {
    label = `assistant -> ${message.toolCall.name}`;
  } else if (message.toolResult) {
    label = `tool ${message.toolResult.toolName} (${message.toolResult.status})`;
  }
  const content =
    message.toolCall && message.content === '' ? JSON.stringify(message.toolCall.arguments) : message.content;
  const shortened = content.length > maxLength ? `${content.slice(0, maxLength)}...` : content;
  return `[${label}] ${shortened}`;
}

// =============================================================================
// Console Output
// =============================================================================

export function printOutcome(outcome: TurnOutcome, verbose: boolean): void {
  if (verbose) {
    for (const step of outcome.steps) {
      console.log(chalk.magenta(describeStep(step)));
    }
    console.log(chalk.gray(`states: ${outcome.states.join(' -> ')}`));
  }

  const color = outcome.status === 'completed' ? chalk.green : chalk.yellow;
  console.log(color(`\nAssistant: ${outcome.response.text}\n`));

  for (const artifact of outcome.response.artifacts) {
    console.log(chalk.cyan(`  ${describeArtifact(artifact)}`));
  }
  for (const warning of outcome.warnings) {
    console.log(chalk.yellow(`  warning: ${warning}`));
  }
  if (outcome.error) {
    console.log(chalk.red(`  ${outcome.error.kind}: ${outcome.error.message}`));
  }
}
