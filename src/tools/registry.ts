/**
 * Tool Registration and Lookup
 *
 * Tools are registered once at process start. `freeze()` then makes the
 * registry read-only, so lookups during turns need no coordination.
 */

import { z } from 'zod';
import { RegistryFrozenError, ValidationError } from '../errors.js';
import type { ToolDefinition, ToolDescriptor, ToolSpec, PreparedInvocation } from './types.js';

// =============================================================================
// Zod Schemas for Validation
// =============================================================================

/**
 * Tool name validation pattern (lowercase_with_underscores)
 */
export const ToolNamePattern = /^[a-z][a-z0-9_]*$/;

export const ToolNameSchema = z.string().regex(
  ToolNamePattern,
  'Tool name must be lowercase with underscores, starting with a letter'
);

/**
 * Render zod issues as `path: message` lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

// =============================================================================
// Tool Registry
// =============================================================================

/**
 * Registry for tool definitions, in registration order.
 */
export class ToolRegistry {
  private readonly tools: Map<string, ToolDescriptor> = new Map();
  private readonly toolOrder: string[] = [];
  private frozen = false;

  /**
   * Register a new tool
   * @throws RegistryFrozenError after freeze(); Error on invalid or duplicate definitions
   */
  register<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): void {
    if (this.frozen) {
      throw new RegistryFrozenError(definition.name);
    }

    const nameValidation = ToolNameSchema.safeParse(definition.name);
    if (!nameValidation.success) {
      throw new Error(`Invalid tool name '${definition.name}': ${formatIssues(nameValidation.error).join('; ')}`);
    }

    if (this.tools.has(definition.name)) {
      throw new Error(`Tool already registered: ${definition.name}`);
    }

    if (definition.description.trim() === '') {
      throw new Error(`Tool '${definition.name}' must have a description`);
    }

    if (!(definition.inputSchema instanceof z.ZodType)) {
      throw new Error(`Tool '${definition.name}' must have a zod inputSchema`);
    }

    if (typeof definition.handler !== 'function') {
      throw new Error(`Tool '${definition.name}' must have a handler function`);
    }

    const { inputSchema, handler } = definition;

    const descriptor: ToolDescriptor = Object.freeze({
      name: definition.name,
      description: definition.description,
      inputSchema,
      sideEffect: definition.sideEffect,
      deterministic: definition.deterministic ?? true,
      timeoutMs: definition.timeoutMs,
      prepare(args: unknown): PreparedInvocation {
        const parsed = inputSchema.safeParse(args);
        if (!parsed.success) {
          return {
            ok: false,
            error: new ValidationError(`Invalid arguments for tool '${definition.name}'`, formatIssues(parsed.error)),
          };
        }
        const input: z.output<S> = parsed.data;
        return {
          ok: true,
          invoke: async (context) => handler(input, context),
        };
      },
    });

    this.tools.set(definition.name, descriptor);
    this.toolOrder.push(definition.name);
  }

  /**
   * Make the registry read-only. Idempotent.
   */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Look up a tool; undefined means NotFound.
   */
  resolve(name: string): ToolDescriptor | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return [...this.toolOrder];
  }

  size(): number {
    return this.tools.size;
  }

  /**
   * Tool catalog for the reasoning capability, without handlers
   */
  catalog(): ToolSpec[] {
    return this.toolOrder
      .map((name) => this.tools.get(name))
      .filter((tool): tool is ToolDescriptor => tool !== undefined)
      .map((tool) => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema,
        sideEffect: tool.sideEffect,
        deterministic: tool.deterministic,
      }));
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Minimal JSON Schema shape, used for display (CLI `tools --verbose`)
 */
export interface JsonSchema {
  type?: string;
  description?: string;
  properties?: Record<string, JsonSchema>;
  required?: string[];
  items?: JsonSchema;
  enum?: unknown[];
  const?: unknown;
  anyOf?: JsonSchema[];
  nullable?: boolean;
  default?: unknown;
}

/**
 * Convert a Zod schema to JSON Schema (basic conversion covering the
 * constructs tool schemas use)
 */
export function zodToJsonSchema(schema: z.ZodTypeAny): JsonSchema {
  const converted = convert(schema);
  if (schema.description !== undefined && converted.description === undefined) {
    converted.description = schema.description;
  }
  return converted;
}

function convert(schema: z.ZodTypeAny): JsonSchema {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodEffects) {
    const inner = schema instanceof z.ZodOptional ? schema.unwrap() : schema.innerType();
    return zodToJsonSchema(inner);
  }
  if (schema instanceof z.ZodNullable) {
    return { ...zodToJsonSchema(schema.unwrap()), nullable: true };
  }
  if (schema instanceof z.ZodDefault) {
    return { ...zodToJsonSchema(schema.removeDefault()), default: schema._def.defaultValue() };
  }
  if (schema instanceof z.ZodObject) {
    const shape: Record<string, z.ZodTypeAny> = schema.shape;
    const properties: Record<string, JsonSchema> = {};
    const required: string[] = [];
    for (const [key, value] of Object.entries(shape)) {
      properties[key] = zodToJsonSchema(value);
      if (!value.isOptional()) {
        required.push(key);
      }
    }
    const result: JsonSchema = { type: 'object', properties };
    if (required.length > 0) {
      result.required = required;
    }
    return result;
  }
  if (schema instanceof z.ZodArray) {
    return { type: 'array', items: zodToJsonSchema(schema.element) };
  }
  if (schema instanceof z.ZodEnum) {
    return { type: 'string', enum: [...schema.options] };
  }
  if (schema instanceof z.ZodLiteral) {
    return { const: schema.value };
  }
  if (schema instanceof z.ZodUnion || schema instanceof z.ZodDiscriminatedUnion) {
    const options: z.ZodTypeAny[] = [...schema.options];
    return { anyOf: options.map((option) => zodToJsonSchema(option)) };
  }
  if (schema instanceof z.ZodRecord) {
    return { type: 'object' };
  }
  if (schema instanceof z.ZodString) {
    return { type: 'string' };
  }
  if (schema instanceof z.ZodNumber) {
    return { type: schema.isInt ? 'integer' : 'number' };
  }
  if (schema instanceof z.ZodBoolean) {
    return { type: 'boolean' };
  }
  return {};
}
