/**
 * Calendar Tools
 *
 * Create, list, move and delete today's events. Times arrive as loose
 * strings and are parsed before reaching the calendar client.
 */

import { z } from 'zod';
import { ToolExecutionError } from '../../errors.js';
import { formatTimeOfDay, parseTimeOfDay, type CalendarClient, type CalendarEvent } from '../../services/calendar.js';
import { defineTool, type RegisteredTool } from '../registry.js';

const timeOfDay = (description: string) => z.string().min(1).describe(description);

export const CreateEventInputSchema = z.object({
  summary: z.string().trim().min(1).describe('The title or summary of the event'),
  description: z.string().optional().describe('An optional longer description for the event'),
  startTimeToday: timeOfDay("The start time for today's event (e.g., '9:00 AM', '14:30')"),
  endTimeToday: timeOfDay("The end time for today's event (e.g., '10:30 AM', '15:00')"),
});

export const DeleteEventInputSchema = z.object({
  summary: z.string().trim().min(1).describe('The title or summary of the event to delete'),
  startTimeToday: timeOfDay("The original start time of the event to delete (e.g., '9:00 AM', '14:30')"),
});

export const UpdateEventTimeInputSchema = z.object({
  summary: z.string().trim().min(1).describe('The title or summary of the event to update'),
  originalStartTimeToday: timeOfDay("The original start time of the event being updated (e.g., '9:00 AM')"),
  newStartTimeToday: timeOfDay("The new start time for the event (e.g., '10:00 AM', '15:30')"),
  newEndTimeToday: timeOfDay("The new end time for the event (e.g., '11:00 AM', '16:00')"),
});

function requireTime(text: string, field: string): number {
  const minutes = parseTimeOfDay(text);
  if (minutes === null) {
    throw new ToolExecutionError(`Invalid time for ${field}: '${text}'. Use a time like '9:00 AM' or '14:30'.`);
  }
  return minutes;
}

function requireOrdered(start: number, end: number): void {
  if (end <= start) {
    throw new ToolExecutionError('The end time must be after the start time.');
  }
}

export function formatEventList(events: readonly CalendarEvent[]): string {
  if (events.length === 0) {
    return 'You have no calendar events scheduled for today.';
  }
  const lines = events
    .map((event) => `• ${event.summary} (${formatTimeOfDay(event.start)} - ${formatTimeOfDay(event.end)})`)
    .join('\n');
  return `Today's calendar events (${events.length} total):\n${lines}`;
}

export function createCalendarTools(calendar: CalendarClient): RegisteredTool[] {
  return [
    defineTool({
      name: 'createCalendarEvent',
      description: "Creates a new event on the user's calendar for today",
      args: CreateEventInputSchema,
      run: async ({ summary, description, startTimeToday, endTimeToday }) => {
        const start = requireTime(startTimeToday, 'startTimeToday');
        const end = requireTime(endTimeToday, 'endTimeToday');
        requireOrdered(start, end);

        await calendar.createEvent({ summary, description, start, end });
        return `Created calendar event: '${summary}' from ${formatTimeOfDay(start)} to ${formatTimeOfDay(end)}`;
      },
    }),

    defineTool({
      name: 'getTodaysCalendarEvents',
      description: "Gets the list of events scheduled on the user's calendar for today",
      args: z.object({}),
      run: async () => formatEventList(await calendar.listTodaysEvents()),
    }),

    defineTool({
      name: 'deleteCalendarEvent',
      description:
        "Deletes a specific event from the user's calendar for today, identified by its summary and start time",
      args: DeleteEventInputSchema,
      run: async ({ summary, startTimeToday }) => {
        const start = requireTime(startTimeToday, 'startTimeToday');
        if (!(await calendar.deleteEvent(summary, start))) {
          throw new ToolExecutionError(
            `Could not find a calendar event '${summary}' starting at ${formatTimeOfDay(start)}`
          );
        }
        return `Deleted calendar event: '${summary}' at ${formatTimeOfDay(start)}`;
      },
    }),

    defineTool({
      name: 'updateCalendarEventTime',
      description: "Updates the start and/or end time of a specific event on the user's calendar for today",
      args: UpdateEventTimeInputSchema,
      run: async ({ summary, originalStartTimeToday, newStartTimeToday, newEndTimeToday }) => {
        const original = requireTime(originalStartTimeToday, 'originalStartTimeToday');
        const start = requireTime(newStartTimeToday, 'newStartTimeToday');
        const end = requireTime(newEndTimeToday, 'newEndTimeToday');
        requireOrdered(start, end);

        if (!(await calendar.updateEventTime(summary, original, start, end))) {
          throw new ToolExecutionError(
            `Could not find a calendar event '${summary}' starting at ${formatTimeOfDay(original)}`
          );
        }
        return (
          `Updated '${summary}' from ${formatTimeOfDay(original)} to ` +
          `${formatTimeOfDay(start)} - ${formatTimeOfDay(end)}`
        );
      },
    }),
  ];
}
