/**
 * Orchestrator
 *
 * Drives one user message to a terminal outcome:
 *
 *   Idle → AwaitingSend → ExecutingTools → AwaitingSend … → Terminal
 *
 * The turn is built in a draft and committed to the Conversation Store only
 * when it succeeds. Failure and cancellation discard the draft, so the store
 * is always at a turn boundary with every tool call answered.
 */

import type { BackendAdapter, BackendOutcome } from '../backends/types.js';
import {
  assistantText,
  assistantToolCalls,
  toolMessage,
  userMessage,
  type Message,
} from '../conversation/message.js';
import type { ConversationStore } from '../conversation/store.js';
import {
  ConfigurationError,
  describeFailure,
  TurnInProgressError,
  type BackendFailureKind,
  type TurnFailureKind,
} from '../errors.js';
import { createSilentLogger, type StructuredLogger } from '../observability/logger.js';
import type { MetricsCollector, SendOutcome } from '../observability/metrics.js';
import { withSpan } from '../observability/tracing.js';
import { ToolExecutor } from '../tools/executor.js';
import type { ToolRegistry } from '../tools/registry.js';
import { DEFAULT_LADDER, DegradationController, validateLadder, type CapabilityTier } from './degradation.js';

// =============================================================================
// Types
// =============================================================================

export type OrchestratorState = 'idle' | 'awaiting_send' | 'executing_tools';

export type TurnResult =
  | { kind: 'success'; text: string; tier: string }
  | { kind: 'failure'; error: TurnFailureKind; message: string }
  | { kind: 'cancelled' };

/**
 * Progress notifications for a presentation layer
 */
export type OrchestratorEvent =
  | { type: 'send'; tier: string; attempt: number }
  | { type: 'degraded'; from: string; to: string; reason: BackendFailureKind }
  | { type: 'tool_result'; tool: string; isError: boolean; durationMs: number };

export interface OrchestratorOptions {
  store: ConversationStore;
  registry: ToolRegistry;
  /** Adapters keyed by their `id`; every tier's backend must be present */
  adapters: readonly BackendAdapter[];
  ladder?: readonly CapabilityTier[] | undefined;
  /** Messages kept in a window besides the system message (default: 10) */
  maxRecent?: number | undefined;
  /** Tool rounds allowed per turn (default: 5) */
  maxToolRounds?: number | undefined;
  /** Per-call tool timeout when no executor is given (default: 30000) */
  toolTimeoutMs?: number | undefined;
  executor?: ToolExecutor | undefined;
  logger?: StructuredLogger | undefined;
  metrics?: MetricsCollector | undefined;
  onEvent?: ((event: OrchestratorEvent) => void) | undefined;
}

export interface SendOptions {
  /** Cancels the turn, like cancel() */
  signal?: AbortSignal | undefined;
}

const SEND_OUTCOME: Record<BackendOutcome['kind'], SendOutcome> = {
  text: 'text',
  tool_calls: 'tool_calls',
  failure: 'failure',
};

// =============================================================================
// Orchestrator
// =============================================================================

export class Orchestrator {
  private readonly store: ConversationStore;
  private readonly registry: ToolRegistry;
  private readonly adapters: ReadonlyMap<string, BackendAdapter>;
  private readonly degradation: DegradationController;
  private readonly executor: ToolExecutor;
  private readonly maxRecent: number;
  private readonly maxToolRounds: number;
  private readonly logger: StructuredLogger;
  private readonly metrics: MetricsCollector | undefined;
  private readonly onEvent: ((event: OrchestratorEvent) => void) | undefined;

  private state: OrchestratorState = 'idle';
  private controller: AbortController | undefined;

  /**
   * @throws ConfigurationError when the ladder does not fit the registry
   * and adapters
   */
  constructor(options: OrchestratorOptions) {
    this.store = options.store;
    this.registry = options.registry;
    this.logger = options.logger ?? createSilentLogger();
    this.metrics = options.metrics;
    this.onEvent = options.onEvent;
    this.maxRecent = options.maxRecent ?? 10;
    this.maxToolRounds = options.maxToolRounds ?? 5;

    if (this.maxRecent < 1 || this.maxToolRounds < 1) {
      throw new ConfigurationError('maxRecent and maxToolRounds must be at least 1');
    }

    const adapters = new Map<string, BackendAdapter>();
    for (const adapter of options.adapters) {
      if (adapters.has(adapter.id)) {
        throw new ConfigurationError(`Duplicate backend adapter id: ${adapter.id}`);
      }
      adapters.set(adapter.id, adapter);
    }
    this.adapters = adapters;

    const ladder = options.ladder ?? DEFAULT_LADDER;
    validateLadder(ladder, { registry: this.registry, backendIds: adapters.keys() });

    this.degradation = new DegradationController(ladder, {
      logger: this.logger.child('degradation'),
      metrics: this.metrics,
    });
    this.executor =
      options.executor ??
      new ToolExecutor(this.registry, {
        timeoutMs: options.toolTimeoutMs,
        logger: this.logger.child('tools'),
        metrics: this.metrics,
      });
  }

  getState(): OrchestratorState {
    return this.state;
  }

  isBusy(): boolean {
    return this.controller !== undefined;
  }

  getLadder(): readonly CapabilityTier[] {
    return this.degradation.getLadder();
  }

  /**
   * Run one turn for a user message.
   *
   * @throws TurnInProgressError while another turn is in flight
   */
  async send(text: string, options: SendOptions = {}): Promise<TurnResult> {
    if (this.controller) {
      throw new TurnInProgressError();
    }

    const controller = new AbortController();
    this.controller = controller;
    const onExternalAbort = (): void => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', onExternalAbort, { once: true });
    }

    const startTime = Date.now();
    this.logger.info('Turn started', { length: text.length, history: this.store.size() });

    try {
      const result = await withSpan('focus.turn', { 'turn.input_length': text.length }, async (span) => {
        const turnResult = await this.runTurn(text, controller.signal);
        span.setAttribute('turn.outcome', turnResult.kind);
        if (turnResult.kind === 'success') {
          span.setAttribute('turn.tier', turnResult.tier);
        }
        return turnResult;
      });

      const durationMs = Date.now() - startTime;
      this.metrics?.recordTurn(result.kind, durationMs);
      this.logTurnResult(result, durationMs);
      return result;
    } finally {
      options.signal?.removeEventListener('abort', onExternalAbort);
      this.controller = undefined;
      this.state = 'idle';
    }
  }

  /**
   * Abort the in-flight turn, if any. Nothing from it is committed.
   */
  cancel(): void {
    if (this.controller && !this.controller.signal.aborted) {
      this.logger.info('Turn cancelled');
      this.controller.abort();
    }
  }

  /**
   * Reset the conversation to its system message.
   *
   * @throws TurnInProgressError while a turn is in flight
   */
  async clearHistory(): Promise<void> {
    if (this.controller) {
      throw new TurnInProgressError();
    }
    await this.store.reset();
  }

  // ===========================================================================
  // State machine
  // ===========================================================================

  private async runTurn(text: string, signal: AbortSignal): Promise<TurnResult> {
    const draft: Message[] = [userMessage(text)];
    let tier = this.degradation.begin();
    let toolRounds = 0;

    for (;;) {
      if (signal.aborted) {
        return { kind: 'cancelled' };
      }

      this.state = 'awaiting_send';
      const outcome = await this.sendAtTier(tier, draft, signal);
      if (signal.aborted) {
        return { kind: 'cancelled' };
      }

      switch (outcome.kind) {
        case 'text': {
          draft.push(assistantText(outcome.text));
          await this.store.commit(draft);
          return { kind: 'success', text: outcome.text, tier: tier.label };
        }

        case 'tool_calls': {
          if (toolRounds >= this.maxToolRounds) {
            this.logger.error('Tool round limit reached', { maxToolRounds: this.maxToolRounds, tier: tier.label });
            return this.failure('RecursionLimitExceeded');
          }
          toolRounds++;

          draft.push(assistantToolCalls(outcome.toolCalls, outcome.text));
          this.state = 'executing_tools';

          const allowed = new Set(this.registry.resolveSubset(tier.toolSubset));
          const executed = await this.executor.executeAll(outcome.toolCalls, { signal, allowed });
          if (signal.aborted) {
            return { kind: 'cancelled' };
          }

          for (const { call, result, durationMs } of executed) {
            draft.push(toolMessage(call, result.text));
            this.onEvent?.({ type: 'tool_result', tool: call.name, isError: result.isError, durationMs });
          }
          break;
        }

        case 'failure': {
          const next = this.degradation.advance(outcome.failure);
          if (!next) {
            return this.failure('AllTiersExhausted');
          }
          this.onEvent?.({ type: 'degraded', from: tier.label, to: next.label, reason: outcome.failure });
          tier = next;
          break;
        }
      }
    }
  }

  private async sendAtTier(tier: CapabilityTier, draft: readonly Message[], signal: AbortSignal): Promise<BackendOutcome> {
    const adapter = this.adapters.get(tier.backendId);
    if (!adapter) {
      throw new ConfigurationError(`No backend adapter for tier '${tier.label}': ${tier.backendId}`);
    }

    const window = this.store.window(this.maxRecent, draft);
    const tools = this.registry.definitions(tier.toolSubset);
    this.onEvent?.({ type: 'send', tier: tier.label, attempt: this.degradation.attempts() });

    const outcome = await withSpan(
      'focus.backend.send',
      { 'backend.id': adapter.id, 'backend.tier': tier.label, 'backend.window': window.length },
      async (span) => {
        const result = await adapter.send({ window, tools, tierLabel: tier.label, signal });
        span.setAttribute('backend.outcome', result.kind);
        return result;
      }
    );

    this.metrics?.recordSend(tier.label, SEND_OUTCOME[outcome.kind]);
    if (outcome.kind === 'failure') {
      this.logger.warning('Backend send failed', {
        tier: tier.label,
        failure: outcome.failure,
        message: outcome.message,
      });
    } else {
      this.logger.debug('Backend send completed', {
        tier: tier.label,
        outcome: outcome.kind,
        ...(outcome.kind === 'tool_calls' ? { tools: outcome.toolCalls.map((call) => call.name) } : {}),
      });
    }
    return outcome;
  }

  private failure(error: TurnFailureKind): TurnResult {
    return { kind: 'failure', error, message: describeFailure(error) };
  }

  private logTurnResult(result: TurnResult, durationMs: number): void {
    switch (result.kind) {
      case 'success':
        this.logger.info('Turn completed', { tier: result.tier, durationMs });
        break;
      case 'failure':
        this.logger.error('Turn failed', { error: result.error, durationMs });
        break;
      case 'cancelled':
        this.logger.info('Turn discarded after cancellation', { durationMs });
        break;
    }
  }
}
