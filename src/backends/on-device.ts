/**
 * On-Device Backend Adapter
 *
 * Drives a local model runtime through the same contract as the cloud
 * adapter. Tool definitions are bound to native argument types, invocation
 * arguments are validated and re-encoded as JSON, and call ids are minted
 * here because local runtimes do not issue them.
 */

import { randomUUID } from 'node:crypto';
import type { Message, ToolCallRequest } from '../conversation/message.js';
import { errorMessage, type BackendFailureKind } from '../errors.js';
import { createSilentLogger, type StructuredLogger } from '../observability/logger.js';
import type { ToolDefinition } from '../tools/registry.js';
import { selectTimeout } from './complexity.js';
import { jsonSchemaToZod } from './json-schema-zod.js';
import type { LocalModelRuntime, LocalRuntimeResponse, NativeTool, TranscriptEntry } from './local-runtime.js';
import { abortable, withDeadline, withRetries } from './retry.js';
import {
  failureOutcome,
  textOutcome,
  toolCallsOutcome,
  type BackendAdapter,
  type BackendOutcome,
  type FailureOutcome,
  type SendRequest,
} from './types.js';

// =============================================================================
// Failure Patterns
// =============================================================================

/** Runtime error messages worth another attempt */
export const RETRYABLE_ERROR_PATTERNS = [
  'inference provider crashed',
  'ipc error',
  'underlying connection interrupted',
  'sensitive',
  'canceled session',
  'session generation error',
  'tool execution',
  'session error',
  'content policy',
  'safety',
] as const;

/** The subset of retryable errors that mean the content was rejected */
export const CONTENT_FILTER_PATTERNS = ['sensitive', 'content policy', 'safety'] as const;

/** Replies that are refusals rather than answers */
export const REFUSAL_PATTERNS: readonly RegExp[] = [
  /i['’]?m sorry,? (but )?i (cannot|can['’]?t) fulfill/i,
  /i can['’]?t help with that/i,
  /i cannot assist/i,
];

const REFUSAL_MESSAGE = 'model declined the request';

export function isRetryableLocalError(message: string): boolean {
  const lowered = message.toLowerCase();
  return RETRYABLE_ERROR_PATTERNS.some((pattern) => lowered.includes(pattern));
}

export function classifyLocalError(message: string): BackendFailureKind {
  const lowered = message.toLowerCase();
  if (CONTENT_FILTER_PATTERNS.some((pattern) => lowered.includes(pattern))) {
    return 'ContentFiltered';
  }
  return 'BackendUnavailable';
}

export function isRefusal(text: string): boolean {
  return REFUSAL_PATTERNS.some((pattern) => pattern.test(text));
}

// =============================================================================
// Translation
// =============================================================================

function parseArguments(argumentsJSON: string): unknown {
  try {
    return argumentsJSON.trim() === '' ? {} : JSON.parse(argumentsJSON);
  } catch {
    return {};
  }
}

/**
 * Split a window into session instructions (the system message) and a
 * transcript of everything after it.
 */
export function toTranscript(window: readonly Message[]): { instructions: string; transcript: TranscriptEntry[] } {
  let instructions = '';
  const transcript: TranscriptEntry[] = [];

  for (const message of window) {
    switch (message.role) {
      case 'system':
        instructions = message.content;
        break;
      case 'user':
        transcript.push({ kind: 'prompt', text: message.content });
        break;
      case 'assistant':
        if (message.content) {
          transcript.push({ kind: 'response', text: message.content });
        }
        if (message.toolCalls && message.toolCalls.length > 0) {
          transcript.push({
            kind: 'toolCalls',
            calls: message.toolCalls.map((call) => ({
              id: call.id,
              name: call.name,
              args: parseArguments(call.argumentsJSON),
            })),
          });
        }
        break;
      case 'tool':
        transcript.push({ kind: 'toolOutput', id: message.toolCallId, name: message.name, text: message.content });
        break;
    }
  }

  return { instructions, transcript };
}

export function toNativeTools(definitions: readonly ToolDefinition[]): NativeTool[] {
  return definitions.map((definition) => ({
    name: definition.name,
    description: definition.description,
    parameters: definition.parameterSchema,
    schema: jsonSchemaToZod(definition.parameterSchema),
  }));
}

// =============================================================================
// OnDeviceAdapter
// =============================================================================

export interface OnDeviceAdapterOptions {
  runtime: LocalModelRuntime;
  /** Adapter id referenced by capability tiers (default: 'on-device') */
  id?: string | undefined;
  /** Timeout for simple requests (default: 120000) */
  timeoutMs?: number | undefined;
  /** Timeout for complex requests (default: 300000) */
  complexTimeoutMs?: number | undefined;
  /** Attempts per send for crash-class failures (default: 3) */
  maxAttempts?: number | undefined;
  /** Fixed pause between attempts (default: 1000) */
  retryDelayMs?: number | undefined;
  logger?: StructuredLogger | undefined;
}

export class OnDeviceAdapter implements BackendAdapter {
  readonly id: string;
  private readonly runtime: LocalModelRuntime;
  private readonly timeoutMs: number;
  private readonly complexTimeoutMs: number;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly logger: StructuredLogger;

  constructor(options: OnDeviceAdapterOptions) {
    this.id = options.id ?? 'on-device';
    this.runtime = options.runtime;
    this.timeoutMs = options.timeoutMs ?? 120000;
    this.complexTimeoutMs = options.complexTimeoutMs ?? 300000;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.logger = options.logger ?? createSilentLogger();
  }

  async send(request: SendRequest): Promise<BackendOutcome> {
    const timeoutMs = selectTimeout(request.window, {
      timeoutMs: this.timeoutMs,
      complexTimeoutMs: this.complexTimeoutMs,
    });
    const { instructions, transcript } = toTranscript(request.window);
    const tools = toNativeTools(request.tools);

    this.logger.debug('Sending to local model', {
      tier: request.tierLabel,
      transcript: transcript.length,
      tools: tools.length,
      timeoutMs,
    });

    return withRetries(
      async () => {
        const deadline = withDeadline(timeoutMs, request.signal);
        try {
          const response = await abortable(
            this.runtime.respond({ instructions, transcript, tools, signal: deadline.signal }),
            deadline.signal
          );
          return this.toOutcome(response, tools);
        } catch (error) {
          if (deadline.timedOut()) {
            return failureOutcome('Timeout', `timed out after ${timeoutMs}ms`);
          }
          if (request.signal?.aborted) {
            return failureOutcome('BackendUnavailable', 'cancelled');
          }
          const message = errorMessage(error);
          const kind = classifyLocalError(message);
          this.logger.warning('Local model request failed', { tier: request.tierLabel, failure: kind, message });
          return failureOutcome(kind, message);
        } finally {
          deadline.dispose();
        }
      },
      {
        maxAttempts: this.maxAttempts,
        delayMs: this.retryDelayMs,
        isRetryable: (failure: FailureOutcome) =>
          failure.failure !== 'Timeout' && isRetryableLocalError(failure.message),
      },
      { signal: request.signal, logger: this.logger }
    );
  }

  private toOutcome(response: LocalRuntimeResponse, tools: readonly NativeTool[]): BackendOutcome {
    if (response.kind === 'text') {
      if (isRefusal(response.text)) {
        return failureOutcome('ContentFiltered', REFUSAL_MESSAGE);
      }
      if (response.text.trim() === '') {
        return failureOutcome('MalformedResponse', 'empty response');
      }
      return textOutcome(response.text);
    }

    if (response.invocations.length === 0) {
      return failureOutcome('MalformedResponse', 'no tool invocations in response');
    }

    const toolCalls: ToolCallRequest[] = [];
    for (const invocation of response.invocations) {
      const nativeTool = tools.find((candidate) => candidate.name === invocation.name);
      let args: unknown = invocation.args ?? {};

      // Unknown names pass through; the registry answers them
      if (nativeTool) {
        const parsed = nativeTool.schema.safeParse(args);
        if (!parsed.success) {
          const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
          return failureOutcome(
            'MalformedResponse',
            `invalid arguments for ${invocation.name}: ${issues.join('; ')}`
          );
        }
        args = parsed.data;
      }

      toolCalls.push({ id: `call_${randomUUID()}`, name: invocation.name, argumentsJSON: JSON.stringify(args) });
    }

    return toolCallsOutcome(toolCalls);
  }
}
