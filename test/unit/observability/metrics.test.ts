import { describe, it, expect, vi, beforeEach } from 'vitest';
import { metrics as otelMetrics, type Meter } from '@opentelemetry/api';
import {
  MetricsCollector,
  createMetricsCollector,
  formatMetricsSummary,
  DURATION_BUCKETS,
  METRIC_NAMES,
} from '../../../src/observability/metrics.js';

// =============================================================================
// Constants Tests
// =============================================================================

describe('Metrics Constants', () => {
  it('should export metric names', () => {
    expect(METRIC_NAMES.TURNS_TOTAL).toBe('focus.turns.total');
    expect(METRIC_NAMES.TURNS_DURATION).toBe('focus.turns.duration');
    expect(METRIC_NAMES.SENDS_TOTAL).toBe('focus.backend.sends.total');
    expect(METRIC_NAMES.DEGRADATIONS_TOTAL).toBe('focus.tiers.degradations.total');
    expect(METRIC_NAMES.TOOL_CALLS_TOTAL).toBe('focus.tools.calls.total');
  });

  it('should export ascending duration buckets', () => {
    expect([...DURATION_BUCKETS].sort((a, b) => a - b)).toEqual(DURATION_BUCKETS);
  });
});

// =============================================================================
// MetricsCollector Tests
// =============================================================================

describe('MetricsCollector', () => {
  let collector: MetricsCollector;

  beforeEach(() => {
    collector = createMetricsCollector('test');
  });

  it('should start empty', () => {
    expect(collector.getMetrics()).toEqual({
      turns: { total: 0, byOutcome: {} },
      sends: { total: 0, byTier: {}, byOutcome: {} },
      degradations: { total: 0, byReason: {} },
      toolCalls: { total: 0, byTool: {}, errors: 0 },
    });
  });

  it('should count turns by outcome', () => {
    collector.recordTurn('success', 120);
    collector.recordTurn('success', 80);
    collector.recordTurn('cancelled', 5);

    expect(collector.getMetrics().turns).toEqual({ total: 3, byOutcome: { success: 2, cancelled: 1 } });
  });

  it('should count sends by tier and outcome', () => {
    collector.recordSend('cloud-full', 'failure');
    collector.recordSend('on-device-full', 'tool_calls');
    collector.recordSend('on-device-full', 'text');

    expect(collector.getMetrics().sends).toEqual({
      total: 3,
      byTier: { 'cloud-full': 1, 'on-device-full': 2 },
      byOutcome: { failure: 1, tool_calls: 1, text: 1 },
    });
  });

  it('should count degradations by reason', () => {
    collector.recordDegradation('cloud-full', 'Timeout');
    collector.recordDegradation('on-device-full', 'MalformedResponse');

    expect(collector.getMetrics().degradations).toEqual({
      total: 2,
      byReason: { Timeout: 1, MalformedResponse: 1 },
    });
  });

  it('should count tool calls and errors', () => {
    collector.recordToolCall('addTaskToList', 'ok');
    collector.recordToolCall('markTaskComplete', 'error');

    expect(collector.getMetrics().toolCalls).toEqual({
      total: 2,
      byTool: { addTaskToList: 1, markTaskComplete: 1 },
      errors: 1,
    });
  });

  it('should return a copy of the summary', () => {
    const snapshot = collector.getMetrics();
    collector.recordTurn('failure', 10);

    expect(snapshot.turns.total).toBe(0);
  });

  it('should reset the summary', () => {
    collector.recordTurn('success', 10);
    collector.resetMetrics();

    expect(collector.getMetrics().turns.total).toBe(0);
  });

  it('should forward records to OpenTelemetry instruments', () => {
    const add = vi.fn();
    const record = vi.fn();
    const meter = {
      createCounter: vi.fn(() => ({ add })),
      createHistogram: vi.fn(() => ({ record })),
    } as unknown as Meter;

    const custom = new MetricsCollector(meter);
    custom.recordTurn('success', 250);
    custom.recordSend('cloud-full', 'text');

    expect(meter.createHistogram).toHaveBeenCalledWith(
      METRIC_NAMES.TURNS_DURATION,
      expect.objectContaining({ unit: 'ms', advice: { explicitBucketBoundaries: DURATION_BUCKETS } })
    );
    expect(add).toHaveBeenCalledWith(1, { outcome: 'success' });
    expect(add).toHaveBeenCalledWith(1, { tier: 'cloud-full', outcome: 'text' });
    expect(record).toHaveBeenCalledWith(250, { outcome: 'success' });
  });

  it('should take its meter from the global provider', () => {
    const spy = vi.spyOn(otelMetrics, 'getMeter');
    createMetricsCollector();
    expect(spy).toHaveBeenCalledWith('focus-orchestrator');
  });
});

// =============================================================================
// Formatting Tests
// =============================================================================

describe('formatMetricsSummary', () => {
  it('prints totals with their breakdowns', () => {
    const collector = createMetricsCollector('format-test');
    collector.recordSend('cloud-full', 'failure');
    collector.recordDegradation('cloud-full', 'Timeout');
    collector.recordSend('on-device-full', 'text');
    collector.recordToolCall('getTasks', 'ok');
    collector.recordToolCall('getTasks', 'error');

    expect(formatMetricsSummary(collector.getMetrics())).toEqual([
      'Turns: 0',
      'Sends: 2 (cloud-full 1, on-device-full 1)',
      'Degradations: 1 (Timeout 1)',
      'Tool calls: 2, 1 failed (getTasks 2)',
    ]);
  });
});
