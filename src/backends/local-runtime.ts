/**
 * Local Model Runtime
 *
 * The session-style surface the on-device adapter drives: instructions plus
 * a transcript in, text or typed tool invocations out. Failures surface as
 * thrown errors whose messages the adapter classifies.
 */

import { generateText, jsonSchema, tool, type CoreMessage, type LanguageModelV1, type Tool } from 'ai';
import type { z } from 'zod';
import type { JsonSchema } from '../tools/registry.js';

// =============================================================================
// Types
// =============================================================================

export interface NativeTool {
  name: string;
  description: string;
  /** Canonical parameter schema */
  parameters: JsonSchema;
  /** Native argument type rebuilt from `parameters` */
  schema: z.ZodTypeAny;
}

export interface TranscriptToolCall {
  id: string;
  name: string;
  args: unknown;
}

export type TranscriptEntry =
  | { kind: 'prompt'; text: string }
  | { kind: 'response'; text: string }
  | { kind: 'toolCalls'; calls: TranscriptToolCall[] }
  | { kind: 'toolOutput'; id: string; name: string; text: string };

export interface LocalRuntimeRequest {
  instructions: string;
  transcript: TranscriptEntry[];
  tools: NativeTool[];
  signal: AbortSignal;
}

export interface ToolInvocation {
  name: string;
  args: unknown;
}

export type LocalRuntimeResponse =
  | { kind: 'text'; text: string }
  | { kind: 'invocations'; invocations: ToolInvocation[] };

export interface LocalModelRuntime {
  respond(request: LocalRuntimeRequest): Promise<LocalRuntimeResponse>;
}

// =============================================================================
// AI SDK Runtime
// =============================================================================

function toCoreMessages(request: LocalRuntimeRequest): CoreMessage[] {
  const messages: CoreMessage[] = [];
  if (request.instructions !== '') {
    messages.push({ role: 'system', content: request.instructions });
  }

  for (const entry of request.transcript) {
    switch (entry.kind) {
      case 'prompt':
        messages.push({ role: 'user', content: entry.text });
        break;
      case 'response':
        messages.push({ role: 'assistant', content: entry.text });
        break;
      case 'toolCalls':
        messages.push({
          role: 'assistant',
          content: entry.calls.map((call) => ({
            type: 'tool-call' as const,
            toolCallId: call.id,
            toolName: call.name,
            args: call.args,
          })),
        });
        break;
      case 'toolOutput':
        messages.push({
          role: 'tool',
          content: [{ type: 'tool-result', toolCallId: entry.id, toolName: entry.name, result: entry.text }],
        });
        break;
    }
  }
  return messages;
}

/**
 * Runs the transcript against a locally served model through the AI SDK.
 * Tools are declared from their JSON Schema only; the adapter validates
 * arguments against the native types.
 */
export class AiSdkLocalRuntime implements LocalModelRuntime {
  constructor(private readonly model: LanguageModelV1) {}

  async respond(request: LocalRuntimeRequest): Promise<LocalRuntimeResponse> {
    const tools: Record<string, Tool> = {};
    for (const nativeTool of request.tools) {
      tools[nativeTool.name] = tool({
        description: nativeTool.description,
        parameters: jsonSchema(nativeTool.parameters),
      });
    }

    const result = await generateText({
      model: this.model,
      messages: toCoreMessages(request),
      ...(request.tools.length > 0 ? { tools, toolChoice: 'auto' as const } : {}),
      maxSteps: 1,
      maxRetries: 0,
      abortSignal: request.signal,
    });

    if (result.finishReason === 'content-filter') {
      throw new Error('Response rejected by content policy');
    }

    if (result.toolCalls.length > 0) {
      return {
        kind: 'invocations',
        invocations: result.toolCalls.map((call) => ({ name: call.toolName, args: call.args })),
      };
    }
    return { kind: 'text', text: result.text };
  }
}
