/**
 * Tool Execution with Timeout and Cancellation
 *
 * Dispatches the tool calls of one assistant turn. Calls run concurrently;
 * results come back in request order. Every failure mode (unknown tool,
 * invalid arguments, handler error, timeout, cancellation) is a ToolResult.
 */

import type { ToolCallRequest } from '../conversation/message.js';
import { createToolErrorResult, errorMessage, type ToolResult } from '../errors.js';
import { createSilentLogger, type StructuredLogger } from '../observability/logger.js';
import type { MetricsCollector } from '../observability/metrics.js';
import type { ToolRegistry } from './registry.js';

// =============================================================================
// Types
// =============================================================================

export interface ToolExecutorOptions {
  /** Per-call timeout in milliseconds (default: 30000) */
  timeoutMs?: number | undefined;
  logger?: StructuredLogger | undefined;
  metrics?: MetricsCollector | undefined;
}

/**
 * One executed call, paired with the request it answers
 */
export interface ExecutedToolCall {
  call: ToolCallRequest;
  result: ToolResult;
  durationMs: number;
}

export interface ExecuteOptions {
  /** Aborts every in-flight handler */
  signal?: AbortSignal | undefined;
  /** Names offered to the model; any other name is answered as unknown */
  allowed?: ReadonlySet<string> | undefined;
}

const TIMEOUT_MESSAGE = 'Tool execution timeout';
const CANCELLED_MESSAGE = 'Tool execution cancelled';

// =============================================================================
// ToolExecutor
// =============================================================================

export class ToolExecutor {
  private readonly registry: ToolRegistry;
  private readonly timeoutMs: number;
  private readonly logger: StructuredLogger;
  private readonly metrics: MetricsCollector | undefined;

  constructor(registry: ToolRegistry, options: ToolExecutorOptions = {}) {
    this.registry = registry;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.logger = options.logger ?? createSilentLogger();
    this.metrics = options.metrics;
  }

  getTimeoutMs(): number {
    return this.timeoutMs;
  }

  /**
   * Execute a batch concurrently. The returned array is in request order,
   * whatever order the handlers finish in.
   */
  async executeAll(calls: readonly ToolCallRequest[], options: ExecuteOptions = {}): Promise<ExecutedToolCall[]> {
    this.logger.debug('Dispatching tool calls', {
      count: calls.length,
      tools: calls.map((call) => call.name),
    });
    return Promise.all(calls.map((call) => this.execute(call, options)));
  }

  /**
   * Execute one call. Never rejects.
   */
  async execute(call: ToolCallRequest, options: ExecuteOptions = {}): Promise<ExecutedToolCall> {
    const startTime = Date.now();
    let result: ToolResult;

    try {
      result =
        options.allowed && !options.allowed.has(call.name)
          ? createToolErrorResult(`unknown tool: ${call.name}`)
          : await this.executeWithTimeout(call, options.signal);
    } catch (error) {
      const message = errorMessage(error);
      if (message === TIMEOUT_MESSAGE) {
        result = createToolErrorResult(`timed out after ${this.timeoutMs}ms`, call.name);
      } else if (message === CANCELLED_MESSAGE) {
        result = createToolErrorResult('cancelled', call.name);
      } else {
        result = createToolErrorResult(message, call.name);
      }
    }

    const durationMs = Date.now() - startTime;
    this.metrics?.recordToolCall(call.name, result.isError ? 'error' : 'ok');

    if (result.isError) {
      this.logger.warning('Tool call failed', {
        tool: call.name,
        toolCallId: call.id,
        durationMs,
        error: result.text,
      });
    } else {
      this.logger.info('Tool call completed', { tool: call.name, toolCallId: call.id, durationMs });
    }

    return { call, result, durationMs };
  }

  /**
   * Race the handler against the timeout and the external abort signal. The
   * handler's own signal aborts on either.
   */
  private async executeWithTimeout(call: ToolCallRequest, signal?: AbortSignal): Promise<ToolResult> {
    if (signal?.aborted) {
      throw new Error(CANCELLED_MESSAGE);
    }

    const handlerController = new AbortController();
    let onTimeout = (): void => undefined;
    let onCancel = (): void => undefined;
    const interrupted = new Promise<never>((_, reject) => {
      onTimeout = () => {
        handlerController.abort();
        reject(new Error(TIMEOUT_MESSAGE));
      };
      onCancel = () => {
        handlerController.abort();
        reject(new Error(CANCELLED_MESSAGE));
      };
    });

    const timeoutId = setTimeout(onTimeout, this.timeoutMs);
    signal?.addEventListener('abort', onCancel, { once: true });

    try {
      return await Promise.race([
        this.registry.execute(call.name, call.argumentsJSON, { signal: handlerController.signal }),
        interrupted,
      ]);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onCancel);
    }
  }
}
