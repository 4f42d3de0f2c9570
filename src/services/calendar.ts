/**
 * Calendar boundary for today's events, and an in-memory implementation.
 *
 * Event times are minutes since local midnight. Tools parse the loose time
 * strings models produce ("9:00 AM", "14:30", "3pm") with parseTimeOfDay.
 */

import { randomUUID } from 'node:crypto';

export interface CalendarEvent {
  readonly id: string;
  readonly summary: string;
  readonly description?: string | undefined;
  readonly start: number;
  readonly end: number;
}

export interface NewCalendarEvent {
  summary: string;
  description?: string | undefined;
  start: number;
  end: number;
}

export interface CalendarClient {
  createEvent(event: NewCalendarEvent): Promise<CalendarEvent>;
  /** Sorted by start time */
  listTodaysEvents(): Promise<readonly CalendarEvent[]>;
  /** @returns false when no event has this summary and start */
  updateEventTime(summary: string, originalStart: number, newStart: number, newEnd: number): Promise<boolean>;
  /** @returns false when no event has this summary and start */
  deleteEvent(summary: string, start: number): Promise<boolean>;
}

const TIME_PATTERN = /^(\d{1,2})(?::(\d{2}))?\s*([ap])\.?\s*m\.?$|^(\d{1,2}):(\d{2})$/i;

/**
 * Parse a time of day into minutes since midnight.
 *
 * @returns null for anything that is not a valid 12- or 24-hour time
 */
export function parseTimeOfDay(text: string): number | null {
  const match = TIME_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }

  const [, hour12, minute12, meridiem, hour24, minute24] = match;

  if (meridiem !== undefined && hour12 !== undefined) {
    const hour = Number(hour12);
    const minute = minute12 === undefined ? 0 : Number(minute12);
    if (hour < 1 || hour > 12 || minute > 59) {
      return null;
    }
    const base = hour % 12;
    return (meridiem.toLowerCase() === 'p' ? base + 12 : base) * 60 + minute;
  }

  const hour = Number(hour24);
  const minute = Number(minute24);
  if (hour > 23 || minute > 59) {
    return null;
  }
  return hour * 60 + minute;
}

/**
 * Format minutes since midnight as "9:05 AM"
 */
export function formatTimeOfDay(minutes: number): string {
  const hour24 = Math.floor(minutes / 60);
  const minute = minutes % 60;
  const hour12 = hour24 % 12 === 0 ? 12 : hour24 % 12;
  const meridiem = hour24 < 12 ? 'AM' : 'PM';
  return `${hour12}:${String(minute).padStart(2, '0')} ${meridiem}`;
}

function sameSummary(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

export class InMemoryCalendarClient implements CalendarClient {
  private events: CalendarEvent[] = [];

  constructor(initial: readonly NewCalendarEvent[] = []) {
    for (const event of initial) {
      this.events.push({ id: randomUUID(), ...event });
    }
  }

  async createEvent(event: NewCalendarEvent): Promise<CalendarEvent> {
    const created: CalendarEvent = { id: randomUUID(), ...event };
    this.events.push(created);
    return created;
  }

  async listTodaysEvents(): Promise<readonly CalendarEvent[]> {
    return [...this.events].sort((a, b) => a.start - b.start);
  }

  async updateEventTime(summary: string, originalStart: number, newStart: number, newEnd: number): Promise<boolean> {
    const index = this.indexOf(summary, originalStart);
    const existing = this.events[index];
    if (!existing) {
      return false;
    }
    this.events[index] = { ...existing, start: newStart, end: newEnd };
    return true;
  }

  async deleteEvent(summary: string, start: number): Promise<boolean> {
    const index = this.indexOf(summary, start);
    if (index === -1) {
      return false;
    }
    this.events.splice(index, 1);
    return true;
  }

  private indexOf(summary: string, start: number): number {
    return this.events.findIndex((event) => event.start === start && sameSummary(event.summary, summary));
  }
}
