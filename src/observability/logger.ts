/**
 * Structured JSON logging with OpenTelemetry correlation
 *
 * Every component gets a named child logger; lines are NDJSON on stderr so
 * they never interleave with the chat transcript on stdout.
 */

import { trace, context } from '@opentelemetry/api';
import { LOG_LEVEL_PRIORITY, parseLogLevel, type LogLevel } from '../logging/levels.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Structured log entry format
 */
export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Dotted component name, e.g. `orchestrator.degradation` */
  logger?: string;
  traceId?: string;
  spanId?: string;
  data?: unknown;
}

export interface StructuredLoggerOptions {
  name?: string | undefined;
  /** Minimum level (default: FOCUS_LOG_LEVEL or 'info') */
  minLevel?: LogLevel | undefined;
  /** Line sink (default: console.error) */
  output?: ((json: string) => void) | undefined;
}

// =============================================================================
// Helper Functions
// =============================================================================

function getTraceContext(): { traceId?: string; spanId?: string } {
  const span = trace.getSpan(context.active());
  if (!span) {
    return {};
  }

  const spanContext = span.spanContext();
  if (!trace.isSpanContextValid(spanContext)) {
    return {};
  }

  return {
    traceId: spanContext.traceId,
    spanId: spanContext.spanId,
  };
}

// =============================================================================
// StructuredLogger Class
// =============================================================================

/**
 * Structured JSON logger with OpenTelemetry trace correlation.
 *
 * @example
 * ```typescript
 * const logger = new StructuredLogger({ name: 'orchestrator' });
 * logger.info('Turn started', { tier: 'cloud-full' });
 *
 * const toolsLogger = logger.child('tools');
 * toolsLogger.debug('Dispatching', { count: 2 });
 * ```
 */
export class StructuredLogger {
  private readonly name: string | undefined;
  private readonly minLevel: LogLevel;
  private readonly output: (json: string) => void;

  constructor(options: StructuredLoggerOptions = {}) {
    this.name = options.name;
    this.minLevel = options.minLevel ?? parseLogLevel(process.env['FOCUS_LOG_LEVEL']);
    this.output = options.output ?? ((line: string) => console.error(line));
  }

  shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[this.minLevel];
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  getName(): string | undefined {
    return this.name;
  }

  log(level: LogLevel, message: string, data?: unknown): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    if (this.name !== undefined) {
      entry.logger = this.name;
    }

    const traceContext = getTraceContext();
    if (traceContext.traceId) {
      entry.traceId = traceContext.traceId;
    }
    if (traceContext.spanId) {
      entry.spanId = traceContext.spanId;
    }

    if (data !== undefined) {
      entry.data = data;
    }

    this.output(JSON.stringify(entry));
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  notice(message: string, data?: unknown): void {
    this.log('notice', message, data);
  }

  warning(message: string, data?: unknown): void {
    this.log('warning', message, data);
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  critical(message: string, data?: unknown): void {
    this.log('critical', message, data);
  }

  /**
   * Create a child logger named `<parent>.<childName>`, sharing level and sink.
   */
  child(childName: string): StructuredLogger {
    return new StructuredLogger({
      name: this.name ? `${this.name}.${childName}` : childName,
      minLevel: this.minLevel,
      output: this.output,
    });
  }
}

/**
 * A logger that drops everything. Default for library classes constructed
 * without one.
 */
export function createSilentLogger(): StructuredLogger {
  return new StructuredLogger({ minLevel: 'emergency', output: () => undefined });
}

export { type LogLevel } from '../logging/levels.js';
