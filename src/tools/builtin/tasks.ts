/**
 * Task List Tools
 *
 * Add, list, remove, complete, reprioritise and annotate tasks, and break a
 * large task into small steps. Output strings are what the model sees.
 */

import { z } from 'zod';
import { ToolExecutionError } from '../../errors.js';
import { DifficultySchema, type Task, type TaskStore } from '../../services/tasks.js';
import { defineTool, type RegisteredTool } from '../registry.js';

// =============================================================================
// Constants
// =============================================================================

/** Longer lists are cut off to keep tool output small */
export const MAX_TASKS_LISTED = 10;

// =============================================================================
// Input Schemas
// =============================================================================

const taskDescription = z.string().trim().min(1, 'taskDescription is required');

export const AddTaskInputSchema = z.object({
  taskDescription: taskDescription.describe('The task description to add'),
  category: z.string().optional().describe('Optional category for the task, e.g. Research, Teaching, Life'),
  projectOrPath: z.string().optional().describe('Optional project or path for the task'),
});

export const TaskReferenceInputSchema = z.object({
  taskDescription: taskDescription.describe('The exact description of the task'),
});

export const UpdatePrioritiesInputSchema = z.object({
  orderedTaskDescriptions: z
    .array(z.string().min(1))
    .min(1)
    .describe('Task descriptions ordered from highest priority (index 0) to lowest'),
});

export const UpdateDurationInputSchema = z.object({
  taskDescription: taskDescription.describe('The description of the task whose duration needs to be updated'),
  estimatedDuration: z
    .string()
    .min(1)
    .describe("The estimated duration for the task (e.g., '~15 mins', '1 hour', 'quick')"),
});

export const UpdateDifficultyInputSchema = z.object({
  taskDescription: taskDescription.describe('The description of the task whose difficulty needs to be updated'),
  difficulty: DifficultySchema.describe('The estimated difficulty level: Low, Medium, High'),
});

export const UpdateCategoryInputSchema = z.object({
  taskDescription: taskDescription.describe('The description of the task to categorize'),
  category: z.string().describe('The category name to assign. Provide an empty string to clear the category'),
});

export const UpdateProjectInputSchema = z.object({
  taskDescription: taskDescription.describe('The description of the task to assign to a project/path'),
  projectOrPath: z
    .string()
    .describe('The project/path name to assign. Provide an empty string to clear the project/path'),
});

export const BreakDownTaskInputSchema = z.object({
  originalTaskDescription: z.string().trim().min(1).describe('The description of the large task to break down'),
  subtasks: z
    .array(z.string().trim().min(1))
    .min(1)
    .describe('Smaller, actionable subtasks, each completable in 15-30 minutes'),
  replaceOriginal: z
    .boolean()
    .optional()
    .describe('Whether to replace the original task with the subtasks (true) or keep both (false). Default is true'),
});

// =============================================================================
// Formatting
// =============================================================================

function notFound(description: string): ToolExecutionError {
  return new ToolExecutionError(`Could not find task with description: '${description}'`);
}

/**
 * Numbered list with completion markers, capped at MAX_TASKS_LISTED
 */
export function formatTaskList(tasks: readonly Task[]): string {
  if (tasks.length === 0) {
    return 'You have no tasks in your list.';
  }

  const shown = tasks.slice(0, MAX_TASKS_LISTED);
  const lines = shown
    .map((task, index) => `${index + 1}. ${task.isDone ? '[COMPLETED]' : '[TODO]'} ${task.text}`)
    .join('\n');

  if (tasks.length > MAX_TASKS_LISTED) {
    return (
      `You have ${tasks.length} tasks (showing first ${MAX_TASKS_LISTED}):\n${lines}\n\n` +
      `...and ${tasks.length - MAX_TASKS_LISTED} more tasks.`
    );
  }
  return `You have ${tasks.length} tasks:\n${lines}`;
}

// =============================================================================
// Tool Definitions
// =============================================================================

export function createTaskTools(tasks: TaskStore): RegisteredTool[] {
  return [
    defineTool({
      name: 'addTaskToList',
      description: "Creates a new task in the user's task list",
      args: AddTaskInputSchema,
      run: async ({ taskDescription, category, projectOrPath }) => {
        const created = await tasks.add({ text: taskDescription, category, projectOrPath });
        return `Created task: '${created.text}'`;
      },
    }),

    defineTool({
      name: 'listCurrentTasks',
      description: 'Gets the current task list for the user',
      args: z.object({}),
      run: async () => formatTaskList(await tasks.list()),
    }),

    defineTool({
      name: 'removeTaskFromList',
      description: "Removes a specific task from the user's to-do list based on its description",
      args: TaskReferenceInputSchema,
      run: async ({ taskDescription }) => {
        if (!(await tasks.remove(taskDescription))) {
          throw notFound(taskDescription);
        }
        return `Removed task: '${taskDescription}'`;
      },
    }),

    defineTool({
      name: 'markTaskComplete',
      description:
        "Marks a specific task as complete on the user's to-do list based on its description. Does NOT remove the task.",
      args: TaskReferenceInputSchema,
      run: async ({ taskDescription }) => {
        if (!(await tasks.complete(taskDescription))) {
          throw notFound(taskDescription);
        }
        return `Marked task as complete: '${taskDescription}'`;
      },
    }),

    defineTool({
      name: 'updateTaskPriorities',
      description: 'Updates the priority order of tasks in the to-do list',
      args: UpdatePrioritiesInputSchema,
      run: async ({ orderedTaskDescriptions }) => {
        if (!(await tasks.reprioritise(orderedTaskDescriptions))) {
          throw new ToolExecutionError('Could not update task priorities. Some tasks may not have been found.');
        }
        return `Updated task priorities. New order: ${orderedTaskDescriptions.join(', ')}`;
      },
    }),

    defineTool({
      name: 'updateTaskEstimatedDuration',
      description: 'Updates the estimated duration for a specific task on the to-do list',
      args: UpdateDurationInputSchema,
      run: async ({ taskDescription, estimatedDuration }) => {
        if (!(await tasks.update(taskDescription, { estimatedDuration }))) {
          throw notFound(taskDescription);
        }
        return `Updated duration for '${taskDescription}' to '${estimatedDuration}'`;
      },
    }),

    defineTool({
      name: 'updateTaskDifficulty',
      description: 'Updates the estimated difficulty (Low, Medium, High) for a specific task',
      args: UpdateDifficultyInputSchema,
      run: async ({ taskDescription, difficulty }) => {
        if (!(await tasks.update(taskDescription, { difficulty }))) {
          throw notFound(taskDescription);
        }
        return `Updated difficulty for '${taskDescription}' to '${difficulty}'`;
      },
    }),

    defineTool({
      name: 'updateTaskCategory',
      description: 'Sets or clears the category (e.g., Research, Teaching, Life) for a specific task',
      args: UpdateCategoryInputSchema,
      run: async ({ taskDescription, category }) => {
        const value = category.trim() === '' ? null : category.trim();
        if (!(await tasks.update(taskDescription, { category: value }))) {
          throw notFound(taskDescription);
        }
        const action = value === null ? 'cleared' : `set to '${value}'`;
        return `Category ${action} for task: '${taskDescription}'`;
      },
    }),

    defineTool({
      name: 'updateTaskProjectOrPath',
      description:
        "Sets or clears the specific project or path (e.g., 'Paper XYZ', 'LEAD 552') for a task within its category",
      args: UpdateProjectInputSchema,
      run: async ({ taskDescription, projectOrPath }) => {
        const value = projectOrPath.trim() === '' ? null : projectOrPath.trim();
        if (!(await tasks.update(taskDescription, { projectOrPath: value }))) {
          throw notFound(taskDescription);
        }
        const action = value === null ? 'cleared' : `set to '${value}'`;
        return `Project/path ${action} for task: '${taskDescription}'`;
      },
    }),

    defineTool({
      name: 'breakDownTask',
      description:
        'Breaks down a large, complex task into smaller, more manageable subtasks. ' +
        'Each subtask should be actionable and completable in 15-30 minutes.',
      args: BreakDownTaskInputSchema,
      run: async ({ originalTaskDescription, subtasks, replaceOriginal }) => {
        const replace = replaceOriginal ?? true;
        if (!(await tasks.breakDown(originalTaskDescription, subtasks, replace))) {
          throw new ToolExecutionError(`Could not find the original task: '${originalTaskDescription}'`);
        }
        const action = replace ? 'replaced with' : 'broken down into';
        const bullets = subtasks.map((subtask) => `• ${subtask}`).join('\n');
        return `Task '${originalTaskDescription}' ${action} ${subtasks.length} subtasks:\n\n${bullets}`;
      },
    }),
  ];
}
