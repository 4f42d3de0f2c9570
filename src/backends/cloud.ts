/**
 * Cloud Backend Adapter
 *
 * Sends the window straight to a chat-completion model's `doGenerate`. The
 * model's tool calls come back as requests with their raw argument text;
 * names and arguments are checked by the tool registry, never here.
 */

import type {
  LanguageModelV1FunctionTool,
  LanguageModelV1Message,
  LanguageModelV1Prompt,
  LanguageModelV1TextPart,
  LanguageModelV1ToolCallPart,
} from '@ai-sdk/provider';
import { APICallError, JSONParseError, TypeValidationError, type LanguageModelV1 } from 'ai';
import type { Message, ToolCallRequest } from '../conversation/message.js';
import { BackendFailureError, errorMessage, isAbortError, type BackendFailureKind } from '../errors.js';
import { createSilentLogger, type StructuredLogger } from '../observability/logger.js';
import type { ToolDefinition } from '../tools/registry.js';
import { isComplexRequest, selectTimeout } from './complexity.js';
import { withDeadline, withRetries, type Deadline } from './retry.js';
import {
  failureOutcome,
  textOutcome,
  toolCallsOutcome,
  type BackendAdapter,
  type BackendOutcome,
  type SendRequest,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface CloudAdapterOptions {
  model: LanguageModelV1;
  /** Adapter id referenced by capability tiers (default: 'cloud') */
  id?: string | undefined;
  /** Timeout for simple requests (default: 30000) */
  timeoutMs?: number | undefined;
  /** Timeout for complex requests (default: 300000) */
  complexTimeoutMs?: number | undefined;
  /** Always use the complex timeout */
  reasoningModel?: boolean | undefined;
  /** Attempts per send for Timeout and BackendUnavailable (default: 2) */
  maxAttempts?: number | undefined;
  retryDelayMs?: number | undefined;
  logger?: StructuredLogger | undefined;
}

// =============================================================================
// Wire Translation
// =============================================================================

function parseArguments(argumentsJSON: string): unknown {
  if (argumentsJSON.trim() === '') {
    return {};
  }
  try {
    return JSON.parse(argumentsJSON);
  } catch {
    return {};
  }
}

function toToolCallPart(call: ToolCallRequest): LanguageModelV1ToolCallPart {
  return {
    type: 'tool-call',
    toolCallId: call.id,
    toolName: call.name,
    args: parseArguments(call.argumentsJSON),
  };
}

/**
 * Translate a window into the model prompt format
 */
export function toModelPrompt(window: readonly Message[]): LanguageModelV1Prompt {
  return window.map((message): LanguageModelV1Message => {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };
      case 'user':
        return { role: 'user', content: [{ type: 'text', text: message.content }] };
      case 'assistant': {
        const parts: Array<LanguageModelV1TextPart | LanguageModelV1ToolCallPart> = [];
        if (message.content) {
          parts.push({ type: 'text', text: message.content });
        }
        parts.push(...(message.toolCalls ?? []).map(toToolCallPart));
        return { role: 'assistant', content: parts };
      }
      case 'tool':
        return {
          role: 'tool',
          content: [
            {
              type: 'tool-result',
              toolCallId: message.toolCallId,
              toolName: message.name,
              result: message.content,
            },
          ],
        };
    }
  });
}

/**
 * Declare tools as JSON-schema function definitions
 */
export function toFunctionTools(definitions: readonly ToolDefinition[]): LanguageModelV1FunctionTool[] {
  return definitions.map((definition): LanguageModelV1FunctionTool => ({
    type: 'function',
    name: definition.name,
    description: definition.description,
    parameters: definition.parameterSchema,
  }));
}

// =============================================================================
// Failure Classification
// =============================================================================

const CONTENT_POLICY_PATTERN = /content[_ ]?(policy|filter|management)|safety system/i;

/**
 * Map anything the model call throws to a failure kind
 */
export function classifyCloudError(error: unknown, deadline?: Deadline): BackendFailureKind {
  if (deadline?.timedOut()) {
    return 'Timeout';
  }

  if (APICallError.isInstance(error)) {
    const status = error.statusCode;
    if (status === 408 || status === 504) {
      return 'Timeout';
    }
    if (CONTENT_POLICY_PATTERN.test(error.message) || CONTENT_POLICY_PATTERN.test(error.responseBody ?? '')) {
      return 'ContentFiltered';
    }
    return 'BackendUnavailable';
  }

  // the provider could not read the response body
  if (JSONParseError.isInstance(error) || TypeValidationError.isInstance(error)) {
    return 'MalformedResponse';
  }

  return 'BackendUnavailable';
}

// =============================================================================
// CloudAdapter
// =============================================================================

export class CloudAdapter implements BackendAdapter {
  readonly id: string;
  private readonly model: LanguageModelV1;
  private readonly timeoutMs: number;
  private readonly complexTimeoutMs: number;
  private readonly reasoningModel: boolean;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly logger: StructuredLogger;

  constructor(options: CloudAdapterOptions) {
    this.id = options.id ?? 'cloud';
    this.model = options.model;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.complexTimeoutMs = options.complexTimeoutMs ?? 300000;
    this.reasoningModel = options.reasoningModel ?? false;
    this.maxAttempts = options.maxAttempts ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.logger = options.logger ?? createSilentLogger();
  }

  async send(request: SendRequest): Promise<BackendOutcome> {
    const timeoutMs = selectTimeout(request.window, {
      timeoutMs: this.timeoutMs,
      complexTimeoutMs: this.complexTimeoutMs,
      reasoningModel: this.reasoningModel,
    });

    this.logger.debug('Sending to cloud model', {
      tier: request.tierLabel,
      modelId: this.model.modelId,
      messages: request.window.length,
      tools: request.tools.length,
      timeoutMs,
      complex: isComplexRequest(request.window),
    });

    return withRetries(
      () => this.attempt(request, timeoutMs),
      {
        maxAttempts: this.maxAttempts,
        delayMs: this.retryDelayMs,
        isRetryable: (failure) => failure.failure === 'Timeout' || failure.failure === 'BackendUnavailable',
      },
      { signal: request.signal, logger: this.logger }
    );
  }

  private async attempt(request: SendRequest, timeoutMs: number): Promise<BackendOutcome> {
    const deadline = withDeadline(timeoutMs, request.signal);
    try {
      return await this.generate(request, deadline);
    } catch (error) {
      if (request.signal?.aborted && !deadline.timedOut()) {
        return failureOutcome('BackendUnavailable', 'cancelled');
      }
      if (error instanceof BackendFailureError) {
        return failureOutcome(error.kind, error.message);
      }
      const kind = classifyCloudError(error, deadline);
      const message = kind === 'Timeout' && isAbortError(error) ? `timed out after ${timeoutMs}ms` : errorMessage(error);
      this.logger.warning('Cloud request failed', { tier: request.tierLabel, failure: kind, message });
      return failureOutcome(kind, message);
    } finally {
      deadline.dispose();
    }
  }

  private async generate(request: SendRequest, deadline: Deadline): Promise<BackendOutcome> {
    const result = await this.model.doGenerate({
      inputFormat: 'messages',
      mode:
        request.tools.length > 0
          ? { type: 'regular', tools: toFunctionTools(request.tools), toolChoice: { type: 'auto' } }
          : { type: 'regular' },
      prompt: toModelPrompt(request.window),
      abortSignal: deadline.signal,
    });

    if (result.finishReason === 'content-filter') {
      throw new BackendFailureError('ContentFiltered', 'response blocked by content filter');
    }

    const text = result.text ?? '';
    const calls = result.toolCalls ?? [];

    if (calls.length > 0) {
      const toolCalls: ToolCallRequest[] = [];
      for (const call of calls) {
        if (call.toolName.trim() === '') {
          throw new BackendFailureError('MalformedResponse', 'tool call without a name');
        }
        // unknown names and unreadable arguments are answered by the registry
        toolCalls.push({ id: call.toolCallId, name: call.toolName, argumentsJSON: call.args });
      }
      return toolCallsOutcome(toolCalls, text.trim() === '' ? null : text);
    }

    if (text.trim() === '') {
      throw new BackendFailureError('MalformedResponse', 'empty response');
    }

    return textOutcome(text);
  }
}
