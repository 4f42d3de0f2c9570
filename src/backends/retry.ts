/**
 * Bounded retries and per-call deadlines for backend adapters
 */

import { createSilentLogger, type StructuredLogger } from '../observability/logger.js';
import type { BackendOutcome, FailureOutcome } from './types.js';

// =============================================================================
// Deadline
// =============================================================================

export interface Deadline {
  /** Aborts when the timeout fires or the parent signal aborts */
  readonly signal: AbortSignal;
  /** True when the abort came from the timeout, not the parent */
  timedOut(): boolean;
  dispose(): void;
}

/**
 * Derive a signal that aborts after `timeoutMs` or when `parent` aborts.
 * Call dispose() once the guarded call settles.
 */
export function withDeadline(timeoutMs: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  let expired = false;

  const timeoutId = setTimeout(() => {
    expired = true;
    controller.abort();
  }, timeoutMs);

  const onParentAbort = (): void => controller.abort();
  if (parent?.aborted) {
    controller.abort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      clearTimeout(timeoutId);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Settle with `promise`, or reject with an AbortError as soon as `signal`
 * aborts, for calls that do not observe the signal themselves.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(abortError());
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(abortError());
    signal.addEventListener('abort', onAbort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

function abortError(): Error {
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}

/**
 * Resolve after `ms`, or as soon as `signal` aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timeoutId);
      resolve();
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

// =============================================================================
// Retries
// =============================================================================

export interface RetryPolicy {
  /** Total attempts, including the first */
  maxAttempts: number;
  /** Fixed pause between attempts */
  delayMs: number;
  isRetryable: (failure: FailureOutcome) => boolean;
}

export interface RetryOptions {
  signal?: AbortSignal | undefined;
  logger?: StructuredLogger | undefined;
}

/**
 * Run `attempt` until it yields a non-failure outcome, a non-retryable
 * failure, the attempt budget runs out, or the signal aborts. The last
 * outcome is returned as is.
 */
export async function withRetries(
  attempt: (attemptNumber: number) => Promise<BackendOutcome>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<BackendOutcome> {
  const logger = options.logger ?? createSilentLogger();
  const maxAttempts = Math.max(1, policy.maxAttempts);

  let outcome = await attempt(1);
  for (let attemptNumber = 2; attemptNumber <= maxAttempts; attemptNumber++) {
    if (outcome.kind !== 'failure' || !policy.isRetryable(outcome) || options.signal?.aborted) {
      return outcome;
    }

    logger.warning('Backend attempt failed, retrying', {
      attempt: attemptNumber - 1,
      maxAttempts,
      failure: outcome.failure,
      message: outcome.message,
      delayMs: policy.delayMs,
    });

    await sleep(policy.delayMs, options.signal);
    if (options.signal?.aborted) {
      return outcome;
    }
    outcome = await attempt(attemptNumber);
  }
  return outcome;
}
