/**
 * Tool Registration and Lookup
 *
 * Static mapping from tool name to handler and parameter schema. Tools are
 * registered once at startup; the registry never throws while a turn runs.
 */

import { z } from 'zod';
import {
  ConfigurationError,
  createToolErrorResult,
  createToolSuccessResult,
  errorMessage,
  ToolExecutionError,
  type ToolResult,
} from '../errors.js';

// =============================================================================
// JSON Schema Types
// =============================================================================

export type JsonSchemaTypeName = 'string' | 'number' | 'integer' | 'boolean' | 'object' | 'array' | 'null';

/**
 * The JSON Schema subset used for tool parameters. Structurally a JSON
 * Schema draft-07 document, so it can be handed to function-calling APIs
 * as is.
 */
export interface JsonSchema {
  type?: JsonSchemaTypeName;
  description?: string;
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean;
  items?: JsonSchema;
  enum?: string[];
  minimum?: number;
  maximum?: number;
  minLength?: number;
  maxLength?: number;
  minItems?: number;
  maxItems?: number;
}

// =============================================================================
// Tool Definition
// =============================================================================

/**
 * What a backend is told about a tool
 */
export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly parameterSchema: JsonSchema;
}

/**
 * Context passed to a handler for one invocation
 */
export interface ToolContext {
  /** Aborted on cancellation or when the executor's timeout fires */
  signal: AbortSignal;
}

/**
 * A handler receives the raw argument JSON and decodes it itself. It resolves
 * with an error result instead of rejecting.
 */
export type ToolHandler = (argumentsJSON: string, context: ToolContext) => Promise<ToolResult>;

export interface RegisteredTool extends ToolDefinition {
  readonly handler: ToolHandler;
}

/**
 * A tier's tool subset: every registered tool, or the named ones
 */
export type ToolSubset = 'all' | readonly string[];

/**
 * Function-calling APIs accept up to 64 characters from this set
 */
export const ToolNamePattern = /^[a-zA-Z][a-zA-Z0-9_]{0,63}$/;

export const ToolNameSchema = z
  .string()
  .regex(ToolNamePattern, 'Tool name must start with a letter and contain only letters, digits and underscores');

// =============================================================================
// Typed Tool Helper
// =============================================================================

export interface TypedToolSpec<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  /** Arguments schema; also the source of the advertised JSON Schema */
  args: S;
  /** Performs the side effect and returns the text the model sees */
  run: (args: z.output<S>, context: ToolContext) => Promise<string>;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Build a registered tool from a zod arguments schema and a run function.
 *
 * Decode failures, validation failures and anything `run` throws become an
 * error result; the returned handler never rejects. A ToolExecutionError's
 * message is used verbatim, anything else is prefixed with the tool name.
 */
export function defineTool<S extends z.ZodTypeAny>(spec: TypedToolSpec<S>): RegisteredTool {
  const handler: ToolHandler = async (argumentsJSON, context) => {
    let raw: unknown;
    try {
      raw = argumentsJSON.trim() === '' ? {} : JSON.parse(argumentsJSON);
    } catch {
      return createToolErrorResult('Invalid arguments: not valid JSON', spec.name);
    }

    const parsed = spec.args.safeParse(raw);
    if (!parsed.success) {
      return createToolErrorResult(`Invalid arguments: ${formatIssues(parsed.error)}`, spec.name);
    }

    try {
      return createToolSuccessResult(await spec.run(parsed.data, context));
    } catch (error) {
      // Domain failures are worded for the model already
      if (error instanceof ToolExecutionError) {
        return createToolErrorResult(error.message);
      }
      return createToolErrorResult(errorMessage(error), spec.name);
    }
  };

  return {
    name: spec.name,
    description: spec.description,
    parameterSchema: zodToJsonSchema(spec.args),
    handler,
  };
}

// =============================================================================
// Tool Registry
// =============================================================================

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();
  private readonly order: string[] = [];

  /**
   * @throws ConfigurationError on an invalid or duplicate name or an empty
   * description
   */
  register(tool: RegisteredTool): void {
    const nameValidation = ToolNameSchema.safeParse(tool.name);
    if (!nameValidation.success) {
      throw new ConfigurationError(`Invalid tool name '${tool.name}'`, {
        reason: formatIssues(nameValidation.error),
      });
    }

    if (this.tools.has(tool.name)) {
      throw new ConfigurationError(`Tool already registered: ${tool.name}`);
    }

    if (tool.description.trim() === '') {
      throw new ConfigurationError(`Tool '${tool.name}' must have a description`);
    }

    this.tools.set(tool.name, tool);
    this.order.push(tool.name);
  }

  registerAll(tools: readonly RegisteredTool[]): void {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Registered names in registration order
   */
  names(): string[] {
    return [...this.order];
  }

  size(): number {
    return this.tools.size;
  }

  /**
   * Resolve a subset to concrete names in registration order.
   *
   * @throws ConfigurationError when the subset names an unregistered tool
   */
  resolveSubset(subset: ToolSubset): string[] {
    if (subset === 'all') {
      return this.names();
    }
    const unknown = subset.filter((name) => !this.tools.has(name));
    if (unknown.length > 0) {
      throw new ConfigurationError(`Unknown tools in subset: ${unknown.join(', ')}`, { unknown });
    }
    const wanted = new Set(subset);
    return this.order.filter((name) => wanted.has(name));
  }

  /**
   * Definitions (without handlers) for a subset, in registration order
   */
  definitions(subset: ToolSubset = 'all'): ToolDefinition[] {
    return this.resolveSubset(subset)
      .map((name) => this.tools.get(name))
      .filter((tool): tool is RegisteredTool => tool !== undefined)
      .map(({ name, description, parameterSchema }) => ({ name, description, parameterSchema }));
  }

  /**
   * Run a tool by name. Unknown names and handler rejections resolve to
   * error results.
   */
  async execute(name: string, argumentsJSON: string, context: ToolContext): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      return createToolErrorResult(`unknown tool: ${name}`);
    }

    try {
      return await tool.handler(argumentsJSON, context);
    } catch (error) {
      return createToolErrorResult(errorMessage(error), name);
    }
  }
}

// =============================================================================
// Zod to JSON Schema
// =============================================================================

function withDescription(schema: JsonSchema, description: string | undefined): JsonSchema {
  return description ? { ...schema, description } : schema;
}

/**
 * Convert the zod constructs used by tool argument schemas to JSON Schema.
 * Unsupported constructs become an unconstrained schema.
 */
export function zodToJsonSchema(schema: z.ZodTypeAny): JsonSchema {
  const description = schema.description;

  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return withDescription(zodToJsonSchema(schema.unwrap()), description);
  }
  if (schema instanceof z.ZodDefault) {
    return withDescription(zodToJsonSchema(schema.removeDefault()), description);
  }
  if (schema instanceof z.ZodEffects) {
    return withDescription(zodToJsonSchema(schema.innerType()), description);
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

    const result: JsonSchema = { type: 'object', properties, additionalProperties: false };
    if (required.length > 0) {
      result.required = required;
    }
    return withDescription(result, description);
  }

  if (schema instanceof z.ZodString) {
    const result: JsonSchema = { type: 'string' };
    if (schema.minLength !== null) {
      result.minLength = schema.minLength;
    }
    if (schema.maxLength !== null) {
      result.maxLength = schema.maxLength;
    }
    return withDescription(result, description);
  }

  if (schema instanceof z.ZodNumber) {
    const result: JsonSchema = { type: schema.isInt ? 'integer' : 'number' };
    if (schema.minValue !== null) {
      result.minimum = schema.minValue;
    }
    if (schema.maxValue !== null) {
      result.maximum = schema.maxValue;
    }
    return withDescription(result, description);
  }

  if (schema instanceof z.ZodBoolean) {
    return withDescription({ type: 'boolean' }, description);
  }

  if (schema instanceof z.ZodArray) {
    const result: JsonSchema = { type: 'array', items: zodToJsonSchema(schema.element) };
    if (schema._def.minLength !== null) {
      result.minItems = schema._def.minLength.value;
    }
    if (schema._def.maxLength !== null) {
      result.maxItems = schema._def.maxLength.value;
    }
    return withDescription(result, description);
  }

  if (schema instanceof z.ZodEnum) {
    const values: string[] = [...schema.options];
    return withDescription({ type: 'string', enum: values }, description);
  }

  return withDescription({}, description);
}
