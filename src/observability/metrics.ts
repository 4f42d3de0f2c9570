/**
 * Orchestrator Metrics Collection
 *
 * Provides metrics for monitoring the chat loop:
 * - Turn outcomes and latency
 * - Backend sends per tier and outcome
 * - Tier degradations
 * - Tool calls per tool and status
 */

import { metrics, type Meter, type Counter, type Histogram, type Attributes } from '@opentelemetry/api';

// =============================================================================
// Types
// =============================================================================

export type TurnOutcome = 'success' | 'failure' | 'cancelled';
export type SendOutcome = 'text' | 'tool_calls' | 'failure';
export type ToolCallStatus = 'ok' | 'error';

export interface MetricsSummary {
  turns: {
    total: number;
    byOutcome: Record<string, number>;
  };
  sends: {
    total: number;
    byTier: Record<string, number>;
    byOutcome: Record<string, number>;
  };
  degradations: {
    total: number;
    byReason: Record<string, number>;
  };
  toolCalls: {
    total: number;
    byTool: Record<string, number>;
    errors: number;
  };
}

// =============================================================================
// Constants
// =============================================================================

/** Histogram bucket boundaries for turn duration in milliseconds */
export const DURATION_BUCKETS = [50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000, 60000, 300000];

export const METRIC_NAMES = {
  TURNS_TOTAL: 'focus.turns.total',
  TURNS_DURATION: 'focus.turns.duration',
  SENDS_TOTAL: 'focus.backend.sends.total',
  DEGRADATIONS_TOTAL: 'focus.tiers.degradations.total',
  TOOL_CALLS_TOTAL: 'focus.tools.calls.total',
} as const;

function increment(record: Record<string, number>, key: string): void {
  record[key] = (record[key] ?? 0) + 1;
}

// =============================================================================
// MetricsCollector
// =============================================================================

/**
 * Records orchestrator metrics through an OpenTelemetry meter and keeps an
 * in-process summary for tests and the chat `/stats` command.
 *
 * @example
 * ```typescript
 * const collector = createMetricsCollector();
 * collector.recordSend('cloud-full', 'tool_calls');
 * collector.recordTurn('success', 812);
 * ```
 */
export class MetricsCollector {
  private readonly turnsCounter: Counter;
  private readonly turnsDuration: Histogram;
  private readonly sendsCounter: Counter;
  private readonly degradationsCounter: Counter;
  private readonly toolCallsCounter: Counter;

  private summary: MetricsSummary = MetricsCollector.emptySummary();

  constructor(meter: Meter) {
    this.turnsCounter = meter.createCounter(METRIC_NAMES.TURNS_TOTAL, {
      description: 'Completed chat turns by outcome',
      unit: '1',
    });

    this.turnsDuration = meter.createHistogram(METRIC_NAMES.TURNS_DURATION, {
      description: 'Duration of chat turns in milliseconds',
      unit: 'ms',
      advice: {
        explicitBucketBoundaries: DURATION_BUCKETS,
      },
    });

    this.sendsCounter = meter.createCounter(METRIC_NAMES.SENDS_TOTAL, {
      description: 'Backend sends by tier and outcome',
      unit: '1',
    });

    this.degradationsCounter = meter.createCounter(METRIC_NAMES.DEGRADATIONS_TOTAL, {
      description: 'Moves down the capability ladder',
      unit: '1',
    });

    this.toolCallsCounter = meter.createCounter(METRIC_NAMES.TOOL_CALLS_TOTAL, {
      description: 'Tool invocations by tool and status',
      unit: '1',
    });
  }

  recordTurn(outcome: TurnOutcome, durationMs: number): void {
    const attributes: Attributes = { outcome };
    this.turnsCounter.add(1, attributes);
    this.turnsDuration.record(durationMs, attributes);

    this.summary.turns.total++;
    increment(this.summary.turns.byOutcome, outcome);
  }

  recordSend(tier: string, outcome: SendOutcome): void {
    this.sendsCounter.add(1, { tier, outcome });

    this.summary.sends.total++;
    increment(this.summary.sends.byTier, tier);
    increment(this.summary.sends.byOutcome, outcome);
  }

  /**
   * @param from - Label of the tier that failed
   * @param reason - Failure kind reported by the adapter
   */
  recordDegradation(from: string, reason: string): void {
    this.degradationsCounter.add(1, { from, reason });

    this.summary.degradations.total++;
    increment(this.summary.degradations.byReason, reason);
  }

  recordToolCall(tool: string, status: ToolCallStatus): void {
    this.toolCallsCounter.add(1, { tool, status });

    this.summary.toolCalls.total++;
    increment(this.summary.toolCalls.byTool, tool);
    if (status === 'error') {
      this.summary.toolCalls.errors++;
    }
  }

  /**
   * Internally tracked values, not read back from OpenTelemetry.
   */
  getMetrics(): MetricsSummary {
    return {
      turns: { total: this.summary.turns.total, byOutcome: { ...this.summary.turns.byOutcome } },
      sends: {
        total: this.summary.sends.total,
        byTier: { ...this.summary.sends.byTier },
        byOutcome: { ...this.summary.sends.byOutcome },
      },
      degradations: {
        total: this.summary.degradations.total,
        byReason: { ...this.summary.degradations.byReason },
      },
      toolCalls: {
        total: this.summary.toolCalls.total,
        byTool: { ...this.summary.toolCalls.byTool },
        errors: this.summary.toolCalls.errors,
      },
    };
  }

  resetMetrics(): void {
    this.summary = MetricsCollector.emptySummary();
  }

  private static emptySummary(): MetricsSummary {
    return {
      turns: { total: 0, byOutcome: {} },
      sends: { total: 0, byTier: {}, byOutcome: {} },
      degradations: { total: 0, byReason: {} },
      toolCalls: { total: 0, byTool: {}, errors: 0 },
    };
  }
}

// =============================================================================
// Formatting
// =============================================================================

function breakdown(record: Record<string, number>): string {
  const parts = Object.entries(record).map(([key, count]) => `${key} ${count}`);
  return parts.length > 0 ? ` (${parts.join(', ')})` : '';
}

/**
 * One line per metric family, for the chat `/stats` command
 */
export function formatMetricsSummary(summary: MetricsSummary): string[] {
  return [
    `Turns: ${summary.turns.total}${breakdown(summary.turns.byOutcome)}`,
    `Sends: ${summary.sends.total}${breakdown(summary.sends.byTier)}`,
    `Degradations: ${summary.degradations.total}${breakdown(summary.degradations.byReason)}`,
    `Tool calls: ${summary.toolCalls.total}, ${summary.toolCalls.errors} failed${breakdown(summary.toolCalls.byTool)}`,
  ];
}

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Creates a MetricsCollector on the globally registered meter provider.
 * Without an SDK registered, the OpenTelemetry API hands out no-op
 * instruments and only the in-process summary is kept.
 */
export function createMetricsCollector(meterName = 'focus-orchestrator'): MetricsCollector {
  return new MetricsCollector(metrics.getMeter(meterName));
}
