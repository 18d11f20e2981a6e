/**
 * LLM-backed reasoning capability
 *
 * Uses the AI SDK's generateText for exactly one model step. Tools are
 * declared without `execute` and without client-side validation: the loop
 * dispatches the chosen call itself, and argument errors reach the model as
 * tool results instead of failing the step.
 */

import {
  generateText,
  jsonSchema,
  NoSuchToolError,
  tool,
  zodSchema,
  type CoreMessage,
  type GenerateTextResult,
  type LanguageModelV1,
  type TextPart,
  type Tool,
  type ToolCallPart,
} from 'ai';
import { ReasoningError, describeError } from '../errors.js';
import type { Message } from '../memory/types.js';
import { createSilentLogger, type StructuredLogger } from '../observability/logger.js';
import type { ToolSpec } from '../tools/types.js';
import type { Decision, Reasoner, ReasoningRequest } from './reasoner.js';

export interface LlmReasonerOptions {
  model: LanguageModelV1;
  /** Fixed system prompt, or one built per request */
  systemPrompt: string | ((request: ReasoningRequest) => string);
  temperature?: number;
  maxTokens?: number;
  logger?: StructuredLogger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function parseToolContent(content: string): unknown {
  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch {
    return content;
  }
}

/**
 * Convert stored messages to AI SDK messages. Tool calls and tool results are
 * only emitted in matched pairs; an assistant call whose result is missing
 * keeps just its text.
 */
export function toCoreMessages(history: readonly Message[]): CoreMessage[] {
  const requested = new Set<string>();
  const answered = new Set<string>();
  for (const message of history) {
    if (message.toolCall) requested.add(message.toolCall.id);
    if (message.toolResult) answered.add(message.toolResult.callId);
  }

  const messages: CoreMessage[] = [];
  for (const message of history) {
    switch (message.role) {
      case 'user':
        messages.push({ role: 'user', content: message.content });
        break;
      case 'assistant': {
        const call = message.toolCall;
        if (call && answered.has(call.id)) {
          const parts: Array<TextPart | ToolCallPart> = [];
          if (message.content) {
            parts.push({ type: 'text', text: message.content });
          }
          parts.push({ type: 'tool-call', toolCallId: call.id, toolName: call.name, args: call.arguments });
          messages.push({ role: 'assistant', content: parts });
        } else if (message.content) {
          messages.push({ role: 'assistant', content: message.content });
        }
        break;
      }
      case 'tool': {
        const reference = message.toolResult;
        if (reference && requested.has(reference.callId)) {
          messages.push({
            role: 'tool',
            content: [
              {
                type: 'tool-result',
                toolCallId: reference.callId,
                toolName: reference.toolName,
                result: parseToolContent(message.content),
                isError: reference.status !== 'success',
              },
            ],
          });
        }
        break;
      }
    }
  }
  return messages;
}

/**
 * Tool declarations for the model. The JSON schema is derived from the zod
 * input schema but arguments are not validated here.
 */
export function toModelTools(catalog: readonly ToolSpec[]): Record<string, Tool> {
  const tools: Record<string, Tool> = {};
  for (const spec of catalog) {
    tools[spec.name] = tool({
      description: spec.description,
      parameters: jsonSchema<Record<string, unknown>>(zodSchema(spec.inputSchema).jsonSchema),
    });
  }
  return tools;
}

export class LlmReasoner implements Reasoner {
  private readonly options: LlmReasonerOptions;
  private readonly logger: StructuredLogger;

  constructor(options: LlmReasonerOptions) {
    this.options = options;
    this.logger = options.logger ?? createSilentLogger('reasoner');
  }

  async decide(request: ReasoningRequest): Promise<Decision> {
    const system =
      typeof this.options.systemPrompt === 'function' ? this.options.systemPrompt(request) : this.options.systemPrompt;

    let result: GenerateTextResult<Record<string, Tool>, never>;
    try {
      result = await generateText({
        model: this.options.model,
        system,
        messages: toCoreMessages(request.history),
        tools: toModelTools(request.catalog),
        maxSteps: 1,
        temperature: this.options.temperature ?? 0,
        ...(this.options.maxTokens !== undefined ? { maxTokens: this.options.maxTokens } : {}),
        abortSignal: request.signal,
      });
    } catch (error) {
      // Unknown tool names still go to the executor, which answers UNKNOWN_TOOL
      if (NoSuchToolError.isInstance(error)) {
        this.logger.notice('Model called an unknown tool', { tool: error.toolName, step: request.step });
        return { type: 'tool_call', call: { name: error.toolName, arguments: {} } };
      }
      throw new ReasoningError(`Model request failed: ${describeError(error)}`, { cause: error });
    }

    this.logger.debug('Model step finished', {
      step: request.step,
      finishReason: result.finishReason,
      toolCalls: result.toolCalls.length,
      usage: result.usage,
    });

    const [first, ...rest] = result.toolCalls;
    if (first) {
      if (rest.length > 0) {
        this.logger.warning('Model requested parallel tool calls; only the first is dispatched', {
          dispatched: first.toolName,
          dropped: rest.map((call) => call.toolName),
        });
      }
      const args: unknown = first.args;
      return {
        type: 'tool_call',
        call: { id: first.toolCallId, name: first.toolName, arguments: isRecord(args) ? args : {} },
        text: result.text,
      };
    }

    if (result.text.trim() === '') {
      throw new ReasoningError(`Model returned an empty response (finish reason: ${result.finishReason})`);
    }
    return { type: 'answer', text: result.text };
  }
}
