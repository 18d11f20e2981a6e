/**
 * Conversation memory model
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';

// =============================================================================
// Schemas
// =============================================================================

export const MessageRoleSchema = z.enum(['user', 'assistant', 'tool']);

export type MessageRole = z.infer<typeof MessageRoleSchema>;

export const ToolCallDescriptorSchema = z.object({
  id: z.string(),
  name: z.string(),
  arguments: z.record(z.unknown()),
});

export const ToolResultReferenceSchema = z.object({
  callId: z.string(),
  toolName: z.string(),
  status: z.enum(['success', 'failure', 'timeout']),
});

/**
 * Persisted message. Tool messages carry the JSON-rendered tool payload as
 * `content` and a reference to the call they answer.
 */
export const MessageSchema = z.object({
  id: z.string(),
  role: MessageRoleSchema,
  content: z.string(),
  toolCall: ToolCallDescriptorSchema.optional(),
  toolResult: ToolResultReferenceSchema.optional(),
  createdAt: z.string(),
});

export type Message = Readonly<z.infer<typeof MessageSchema>>;

export type ToolCallDescriptor = z.infer<typeof ToolCallDescriptorSchema>;
export type ToolResultReference = z.infer<typeof ToolResultReferenceSchema>;

export interface ThreadInfo {
  id: string;
  createdAt: string;
  lastActiveAt: string;
  messageCount: number;
}

// =============================================================================
// Memory Store Contract
// =============================================================================

/**
 * Ordered, append-only message log per thread.
 *
 * - `load` of an unknown thread returns [] (not an error)
 * - `append` is atomic per call; appends to one thread are applied in call order
 * - unavailability surfaces as StorageError
 */
export interface MemoryStore {
  load(threadId: string): Promise<Message[]>;
  append(threadId: string, message: Message): Promise<void>;
  getThread(threadId: string): Promise<ThreadInfo | undefined>;
  listThreads(): Promise<ThreadInfo[]>;
}

// =============================================================================
// Factories
// =============================================================================

export interface NewMessage {
  role: MessageRole;
  content: string;
  toolCall?: ToolCallDescriptor;
  toolResult?: ToolResultReference;
}

/**
 * Create an immutable message with a fresh id and timestamp
 */
export function createMessage(input: NewMessage, now: Date = new Date()): Message {
  const message: z.infer<typeof MessageSchema> = {
    id: randomUUID(),
    role: input.role,
    content: input.content,
    createdAt: now.toISOString(),
  };
  if (input.toolCall) {
    message.toolCall = Object.freeze({
      ...input.toolCall,
      arguments: Object.freeze({ ...input.toolCall.arguments }),
    });
  }
  if (input.toolResult) {
    message.toolResult = Object.freeze({ ...input.toolResult });
  }
  return Object.freeze(message);
}

/**
 * Derive thread metadata from its ordered messages
 */
export function summarizeThread(threadId: string, messages: readonly Message[]): ThreadInfo | undefined {
  const first = messages[0];
  const last = messages[messages.length - 1];
  if (!first || !last) {
    return undefined;
  }
  return {
    id: threadId,
    createdAt: first.createdAt,
    lastActiveAt: last.createdAt,
    messageCount: messages.length,
  };
}

/**
 * Most recently active first
 */
export function sortThreads(threads: ThreadInfo[]): ThreadInfo[] {
  return [...threads].sort((a, b) => b.lastActiveAt.localeCompare(a.lastActiveAt));
}
