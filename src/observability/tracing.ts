/**
 * Span helpers over the OpenTelemetry API
 *
 * Without an SDK registered the API hands out no-op tracers, so spans cost
 * nothing until an application installs one.
 */

import { SpanStatusCode, trace, type Attributes, type Span } from '@opentelemetry/api';

export const TRACER_NAME = 'focus-orchestrator';

/**
 * Run `fn` inside an active span. The span is ended in every case; a
 * rejection marks it as an error and is rethrown.
 *
 * @example
 * ```typescript
 * const result = await withSpan('focus.turn', { 'turn.tier': 'cloud-full' }, async (span) => {
 *   span.setAttribute('turn.outcome', 'success');
 *   return runTurn();
 * });
 * ```
 */
export async function withSpan<T>(name: string, attributes: Attributes, fn: (span: Span) => Promise<T>): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : 'Unknown error',
      });
      span.recordException(error instanceof Error ? error : new Error(String(error)));
      throw error;
    } finally {
      span.end();
    }
  });
}
