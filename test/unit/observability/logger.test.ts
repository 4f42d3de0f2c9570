import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { trace, TraceFlags, type Span, type SpanContext } from '@opentelemetry/api';
import {
  StructuredLogger,
  createSilentLogger,
  type LogEntry,
  type LogLevel,
} from '../../../src/observability/logger.js';

// =============================================================================
// Test Setup
// =============================================================================

const originalEnv = { ...process.env };

function createMockSpan(traceId: string, spanId: string): Span {
  return {
    spanContext: (): SpanContext => ({
      traceId,
      spanId,
      traceFlags: TraceFlags.SAMPLED,
      isRemote: false,
    }),
  } as unknown as Span;
}

function capture(minLevel: LogLevel = 'debug', name?: string) {
  const lines: string[] = [];
  const logger = new StructuredLogger({ name, minLevel, output: (line) => lines.push(line) });
  const entries = (): LogEntry[] => lines.map((line) => JSON.parse(line) as LogEntry);
  return { logger, lines, entries };
}

// =============================================================================
// StructuredLogger Tests
// =============================================================================

describe('StructuredLogger', () => {
  beforeEach(() => {
    delete process.env['FOCUS_LOG_LEVEL'];
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  describe('constructor', () => {
    it('should create with default options', () => {
      const logger = new StructuredLogger();
      expect(logger.getName()).toBeUndefined();
      expect(logger.getLevel()).toBe('info');
    });

    it('should read FOCUS_LOG_LEVEL from environment', () => {
      process.env['FOCUS_LOG_LEVEL'] = 'WARNING';
      expect(new StructuredLogger().getLevel()).toBe('warning');
    });

    it('should ignore an unknown FOCUS_LOG_LEVEL', () => {
      process.env['FOCUS_LOG_LEVEL'] = 'chatty';
      expect(new StructuredLogger().getLevel()).toBe('info');
    });

    it('should prefer options.minLevel over environment', () => {
      process.env['FOCUS_LOG_LEVEL'] = 'warning';
      expect(new StructuredLogger({ minLevel: 'debug' }).getLevel()).toBe('debug');
    });

    it('should write to stderr by default', () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      new StructuredLogger({ minLevel: 'info' }).info('hello');
      expect(spy).toHaveBeenCalledTimes(1);
    });
  });

  describe('filtering', () => {
    it('should log at and above the minimum level', () => {
      const { logger, entries } = capture('warning');

      logger.debug('d');
      logger.info('i');
      logger.notice('n');
      logger.warning('w');
      logger.error('e');
      logger.critical('c');

      expect(entries().map((e) => e.level)).toEqual(['warning', 'error', 'critical']);
    });

    it('should answer shouldLog by severity', () => {
      const logger = new StructuredLogger({ minLevel: 'notice', output: () => undefined });
      expect(logger.shouldLog('error')).toBe(true);
      expect(logger.shouldLog('notice')).toBe(true);
      expect(logger.shouldLog('info')).toBe(false);
    });
  });

  describe('entries', () => {
    it('should write one JSON line per entry', () => {
      const { logger, entries } = capture('debug', 'orchestrator');

      logger.info('Turn started', { length: 12 });

      const [entry] = entries();
      expect(entry).toMatchObject({ level: 'info', message: 'Turn started', logger: 'orchestrator', data: { length: 12 } });
      expect(entry?.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    });

    it('should omit name and data when absent', () => {
      const { logger, entries } = capture();

      logger.info('bare');

      expect(Object.keys(entries()[0] ?? {}).sort()).toEqual(['level', 'message', 'timestamp']);
    });

    it('should add trace context from the active span', () => {
      vi.spyOn(trace, 'getSpan').mockReturnValue(
        createMockSpan('0af7651916cd43dd8448eb211c80319c', 'b7ad6b7169203331')
      );
      const { logger, entries } = capture();

      logger.info('traced');

      expect(entries()[0]).toMatchObject({
        traceId: '0af7651916cd43dd8448eb211c80319c',
        spanId: 'b7ad6b7169203331',
      });
    });

    it('should skip an invalid span context', () => {
      vi.spyOn(trace, 'getSpan').mockReturnValue(createMockSpan('0'.repeat(32), '0'.repeat(16)));
      const { logger, entries } = capture();

      logger.info('untraced');

      expect(entries()[0]?.traceId).toBeUndefined();
    });
  });

  describe('child', () => {
    it('should join names with a dot and share level and sink', () => {
      const { logger, entries } = capture('notice', 'focus');
      const child = logger.child('orchestrator').child('tools');

      child.info('hidden');
      child.notice('shown');

      expect(child.getName()).toBe('focus.orchestrator.tools');
      expect(child.getLevel()).toBe('notice');
      expect(entries()).toHaveLength(1);
      expect(entries()[0]?.logger).toBe('focus.orchestrator.tools');
    });

    it('should use the child name alone under an unnamed parent', () => {
      const { logger } = capture();
      expect(logger.child('tools').getName()).toBe('tools');
    });
  });

  describe('createSilentLogger', () => {
    it('should write nothing below emergency', () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const logger = createSilentLogger();

      logger.critical('nope');
      logger.child('x').error('nope');

      expect(spy).not.toHaveBeenCalled();
    });
  });
});
