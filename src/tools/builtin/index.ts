/**
 * Built-in tool set
 *
 * Collaborators are injected here once; each tool closes over the ones it
 * needs.
 */

import type { CalendarClient } from '../../services/calendar.js';
import type { Clock } from '../../services/clock.js';
import type { HealthSummaryProvider } from '../../services/health.js';
import type { ScratchpadStore } from '../../services/scratchpad.js';
import type { TaskStore } from '../../services/tasks.js';
import type { RegisteredTool, ToolRegistry } from '../registry.js';
import { createCalendarTools } from './calendar.js';
import { createDateTimeTool, type DateTimeToolOptions } from './datetime.js';
import { createHealthTool } from './health.js';
import { createScratchpadTools } from './scratchpad.js';
import { createTaskTools } from './tasks.js';

export interface ToolDependencies {
  tasks: TaskStore;
  calendar: CalendarClient;
  scratchpad: ScratchpadStore;
  clock: Clock;
  health: HealthSummaryProvider;
  dateTime?: DateTimeToolOptions | undefined;
}

/**
 * Every built-in tool, in registration order
 */
export function createBuiltinTools(deps: ToolDependencies): RegisteredTool[] {
  return [
    ...createTaskTools(deps.tasks),
    createDateTimeTool(deps.clock, deps.dateTime),
    ...createCalendarTools(deps.calendar),
    ...createScratchpadTools(deps.scratchpad),
    createHealthTool(deps.health),
  ];
}

export function registerBuiltinTools(registry: ToolRegistry, deps: ToolDependencies): void {
  registry.registerAll(createBuiltinTools(deps));
}

/**
 * Tool subsets for the lower capability tiers. Local models get fewer tools
 * as they fail, since long tool lists are a common cause of failure there.
 */
export const TOOL_SUBSETS = {
  onDeviceFull: [
    'addTaskToList',
    'listCurrentTasks',
    'removeTaskFromList',
    'markTaskComplete',
    'updateTaskPriorities',
    'updateTaskEstimatedDuration',
    'updateTaskDifficulty',
    'updateTaskCategory',
    'updateTaskProjectOrPath',
    'breakDownTask',
    'getCurrentDateTime',
    'createCalendarEvent',
    'getTodaysCalendarEvents',
    'deleteCalendarEvent',
    'updateCalendarEventTime',
    'getScratchpad',
    'updateScratchpad',
  ],
  essential: [
    'addTaskToList',
    'listCurrentTasks',
    'markTaskComplete',
    'removeTaskFromList',
    'getCurrentDateTime',
    'getScratchpad',
  ],
  minimal: ['listCurrentTasks', 'addTaskToList'],
} as const satisfies Record<string, readonly string[]>;

export { createCalendarTools } from './calendar.js';
export { createDateTimeTool } from './datetime.js';
export { createHealthTool } from './health.js';
export { createScratchpadTools } from './scratchpad.js';
export { createTaskTools } from './tasks.js';
