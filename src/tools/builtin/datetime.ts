/**
 * Current Date/Time Tool
 */

import { z } from 'zod';
import type { Clock } from '../../services/clock.js';
import { defineTool, type RegisteredTool } from '../registry.js';

export interface DateTimeToolOptions {
  /** IANA zone used for formatting (default: the process's zone) */
  timeZone?: string | undefined;
  locale?: string | undefined;
}

/**
 * e.g. "Monday, March 4, 2024 at 9:05 AM"
 */
export function formatDateTime(date: Date, options: DateTimeToolOptions = {}): string {
  const formatter = new Intl.DateTimeFormat(options.locale ?? 'en-US', {
    dateStyle: 'full',
    timeStyle: 'short',
    ...(options.timeZone ? { timeZone: options.timeZone } : {}),
  });
  return formatter.format(date);
}

export function createDateTimeTool(clock: Clock, options: DateTimeToolOptions = {}): RegisteredTool {
  return defineTool({
    name: 'getCurrentDateTime',
    description: 'Gets the current date and time',
    args: z.object({}),
    run: async () => `Current date and time: ${formatDateTime(clock.now(), options)}`,
  });
}
