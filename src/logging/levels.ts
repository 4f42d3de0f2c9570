/**
 * Log levels
 *
 * RFC 5424 severities shared by the structured logger and configuration.
 */

import { z } from 'zod';

/**
 * Lower number = more severe.
 */
export const LOG_LEVEL_PRIORITY = {
  emergency: 0,
  alert: 1,
  critical: 2,
  error: 3,
  warning: 4,
  notice: 5,
  info: 6,
  debug: 7,
} as const;

export const LogLevelSchema = z.enum([
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'critical',
  'alert',
  'emergency',
]);

export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Parse a level name, falling back when it is missing or unknown
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  if (value === undefined || value === '') {
    return fallback;
  }
  const result = LogLevelSchema.safeParse(value.toLowerCase());
  return result.success ? result.data : fallback;
}
