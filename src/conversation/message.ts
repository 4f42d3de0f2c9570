/**
 * Conversation message model
 *
 * Messages are immutable once created; corrections are made by appending.
 * The zod schemas validate persisted log lines on load.
 */

import { z } from 'zod';

// =============================================================================
// Types
// =============================================================================

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

/**
 * A model-issued request to invoke a named tool
 */
export interface ToolCallRequest {
  /** Opaque id assigned by the backend (or generated in-process) */
  readonly id: string;
  readonly name: string;
  /** Raw JSON text of the arguments, exactly as the model produced it */
  readonly argumentsJSON: string;
}

export interface SystemMessage {
  readonly role: 'system';
  readonly content: string;
  readonly timestamp: string;
}

export interface UserMessage {
  readonly role: 'user';
  readonly content: string;
  readonly timestamp: string;
}

/**
 * Assistant reply. `content` is null only when the message requests tools.
 */
export interface AssistantMessage {
  readonly role: 'assistant';
  readonly content: string | null;
  readonly toolCalls?: readonly ToolCallRequest[] | undefined;
  readonly timestamp: string;
}

/**
 * Tool response, paired with the assistant message whose toolCalls carry
 * `toolCallId`.
 */
export interface ToolMessage {
  readonly role: 'tool';
  readonly content: string;
  readonly toolCallId: string;
  readonly name: string;
  readonly timestamp: string;
}

export type Message = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

// =============================================================================
// Constructors
// =============================================================================

function now(): string {
  return new Date().toISOString();
}

export function systemMessage(content: string): SystemMessage {
  return { role: 'system', content, timestamp: now() };
}

export function userMessage(content: string): UserMessage {
  return { role: 'user', content, timestamp: now() };
}

export function assistantText(content: string): AssistantMessage {
  return { role: 'assistant', content, timestamp: now() };
}

export function assistantToolCalls(
  toolCalls: readonly ToolCallRequest[],
  content: string | null = null
): AssistantMessage {
  return { role: 'assistant', content, toolCalls, timestamp: now() };
}

export function toolMessage(call: ToolCallRequest, content: string): ToolMessage {
  return { role: 'tool', content, toolCallId: call.id, name: call.name, timestamp: now() };
}

// =============================================================================
// Guards
// =============================================================================

export function isToolMessage(message: Message): message is ToolMessage {
  return message.role === 'tool';
}

/**
 * True for assistant messages carrying at least one tool call
 */
export function requestsTools(
  message: Message
): message is AssistantMessage & { toolCalls: readonly ToolCallRequest[] } {
  return message.role === 'assistant' && message.toolCalls !== undefined && message.toolCalls.length > 0;
}

/**
 * Text of the most recent user message, if any
 */
export function latestUserText(messages: readonly Message[]): string | undefined {
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i];
    if (message?.role === 'user') {
      return message.content;
    }
  }
  return undefined;
}

// =============================================================================
// Zod Schemas
// =============================================================================

export const ToolCallRequestSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  argumentsJSON: z.string(),
});

const TimestampSchema = z.string().datetime();

export const MessageSchema = z
  .discriminatedUnion('role', [
    z.object({ role: z.literal('system'), content: z.string(), timestamp: TimestampSchema }),
    z.object({ role: z.literal('user'), content: z.string(), timestamp: TimestampSchema }),
    z.object({
      role: z.literal('assistant'),
      content: z.string().nullable(),
      toolCalls: z.array(ToolCallRequestSchema).optional(),
      timestamp: TimestampSchema,
    }),
    z.object({
      role: z.literal('tool'),
      content: z.string(),
      toolCallId: z.string().min(1),
      name: z.string().min(1),
      timestamp: TimestampSchema,
    }),
  ])
  .superRefine((message, ctx) => {
    if (message.role === 'assistant' && message.content === null && !message.toolCalls?.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'assistant content may only be null when the message requests tools',
        path: ['content'],
      });
    }
  });
