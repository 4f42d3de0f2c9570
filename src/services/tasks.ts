/**
 * Task store boundary and in-memory implementation
 *
 * Tasks are addressed by their description text, the way the assistant
 * refers to them in conversation. Matching ignores case and surrounding
 * whitespace.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { systemClock, type Clock } from './clock.js';

export const DifficultySchema = z.enum(['Low', 'Medium', 'High']);
export type Difficulty = z.infer<typeof DifficultySchema>;

export interface Task {
  readonly id: string;
  readonly text: string;
  readonly isDone: boolean;
  /** 1 is the most important; unset until the list is reprioritised */
  readonly priority?: number | undefined;
  /** Free text, e.g. "~15 mins" */
  readonly estimatedDuration?: string | undefined;
  readonly difficulty?: Difficulty | undefined;
  readonly category?: string | undefined;
  readonly projectOrPath?: string | undefined;
  readonly dateCreated: string;
}

export interface NewTask {
  text: string;
  category?: string | undefined;
  projectOrPath?: string | undefined;
}

/**
 * Metadata changes. `null` clears a field; an absent key leaves it alone.
 */
export interface TaskChanges {
  estimatedDuration?: string | null | undefined;
  difficulty?: Difficulty | null | undefined;
  category?: string | null | undefined;
  projectOrPath?: string | null | undefined;
}

export interface TaskStore {
  list(): Promise<readonly Task[]>;
  add(task: NewTask): Promise<Task>;
  /** @returns false when no task matches */
  remove(description: string): Promise<boolean>;
  /** @returns false when no task matches */
  complete(description: string): Promise<boolean>;
  /**
   * Put the named tasks first, in the given order, and number their
   * priorities from 1. Nothing changes unless every description matches.
   */
  reprioritise(orderedDescriptions: readonly string[]): Promise<boolean>;
  /** @returns false when no task matches */
  update(description: string, changes: TaskChanges): Promise<boolean>;
  /**
   * Add subtasks next to the matching task, replacing it when `replace` is
   * set. Subtasks inherit category and project.
   */
  breakDown(description: string, subtasks: readonly string[], replace: boolean): Promise<boolean>;
}

function normalise(text: string): string {
  return text.trim().toLowerCase();
}

/**
 * Whether a description addresses this task, by the store's matching rules
 */
export function matchesDescription(task: Task, description: string): boolean {
  return normalise(task.text) === normalise(description);
}

type MutableTask = { -readonly [K in keyof Task]: Task[K] };

export interface InMemoryTaskStoreOptions {
  clock?: Clock | undefined;
  /** Descriptions of tasks present at start */
  initial?: readonly string[] | undefined;
}

export class InMemoryTaskStore implements TaskStore {
  private readonly clock: Clock;
  private tasks: MutableTask[] = [];

  constructor(options: InMemoryTaskStoreOptions = {}) {
    this.clock = options.clock ?? systemClock;
    for (const text of options.initial ?? []) {
      this.tasks.push(this.create({ text }));
    }
  }

  async list(): Promise<readonly Task[]> {
    return this.tasks.map((task) => ({ ...task }));
  }

  async add(task: NewTask): Promise<Task> {
    const created = this.create(task);
    this.tasks.push(created);
    return { ...created };
  }

  async remove(description: string): Promise<boolean> {
    const index = this.indexOf(description);
    if (index === -1) {
      return false;
    }
    this.tasks.splice(index, 1);
    return true;
  }

  async complete(description: string): Promise<boolean> {
    const task = this.find(description);
    if (!task) {
      return false;
    }
    task.isDone = true;
    return true;
  }

  async reprioritise(orderedDescriptions: readonly string[]): Promise<boolean> {
    const ordered: MutableTask[] = [];
    for (const description of orderedDescriptions) {
      const task = this.find(description);
      if (!task || ordered.includes(task)) {
        return false;
      }
      ordered.push(task);
    }

    ordered.forEach((task, index) => {
      task.priority = index + 1;
    });
    const rest = this.tasks.filter((task) => !ordered.includes(task));
    this.tasks = [...ordered, ...rest];
    return true;
  }

  async update(description: string, changes: TaskChanges): Promise<boolean> {
    const task = this.find(description);
    if (!task) {
      return false;
    }
    if (changes.estimatedDuration !== undefined) {
      task.estimatedDuration = changes.estimatedDuration ?? undefined;
    }
    if (changes.difficulty !== undefined) {
      task.difficulty = changes.difficulty ?? undefined;
    }
    if (changes.category !== undefined) {
      task.category = changes.category ?? undefined;
    }
    if (changes.projectOrPath !== undefined) {
      task.projectOrPath = changes.projectOrPath ?? undefined;
    }
    return true;
  }

  async breakDown(description: string, subtasks: readonly string[], replace: boolean): Promise<boolean> {
    const index = this.indexOf(description);
    const original = this.tasks[index];
    if (!original) {
      return false;
    }

    const created = subtasks.map((text) =>
      this.create({ text, category: original.category, projectOrPath: original.projectOrPath })
    );
    if (replace) {
      this.tasks.splice(index, 1, ...created);
    } else {
      this.tasks.splice(index + 1, 0, ...created);
    }
    return true;
  }

  private create(task: NewTask): MutableTask {
    return {
      id: randomUUID(),
      text: task.text.trim(),
      isDone: false,
      category: task.category,
      projectOrPath: task.projectOrPath,
      dateCreated: this.clock.now().toISOString(),
    };
  }

  private indexOf(description: string): number {
    return this.tasks.findIndex((task) => matchesDescription(task, description));
  }

  private find(description: string): MutableTask | undefined {
    return this.tasks[this.indexOf(description)];
  }
}
