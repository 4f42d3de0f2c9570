/**
 * Task Refiner
 *
 * Background pass that asks a backend to fill in missing task details
 * (duration, difficulty, category) through the task update tools. A value
 * the user has already set is never replaced: calls aimed at a filled field
 * are answered as skipped without running.
 *
 * The pass has its own short conversation and never touches the chat
 * history.
 */

import { z } from 'zod';
import { failureOutcome, type BackendAdapter, type BackendOutcome } from '../backends/types.js';
import {
  assistantToolCalls,
  systemMessage,
  toolMessage,
  userMessage,
  type Message,
  type ToolCallRequest,
} from '../conversation/message.js';
import { ConfigurationError, errorMessage, type BackendFailureKind } from '../errors.js';
import { createSilentLogger, type StructuredLogger } from '../observability/logger.js';
import type { MetricsCollector } from '../observability/metrics.js';
import { withSpan } from '../observability/tracing.js';
import { matchesDescription, type Task, type TaskStore } from '../services/tasks.js';
import { ToolExecutor } from '../tools/executor.js';
import type { ToolDefinition, ToolRegistry } from '../tools/registry.js';

// =============================================================================
// Types
// =============================================================================

export const REFINEMENT_TOOLS = ['updateTaskEstimatedDuration', 'updateTaskDifficulty', 'updateTaskCategory'] as const;

export type RefinementTool = (typeof REFINEMENT_TOOLS)[number];

type RefinedField = 'estimatedDuration' | 'difficulty' | 'category';

const FIELD_BY_TOOL: Record<RefinementTool, RefinedField> = {
  updateTaskEstimatedDuration: 'estimatedDuration',
  updateTaskDifficulty: 'difficulty',
  updateTaskCategory: 'category',
};

const FIELD_LABELS: Record<RefinedField, string> = {
  estimatedDuration: 'duration',
  difficulty: 'difficulty',
  category: 'category',
};

export const REFINEMENT_PROMPT =
  'You review the to-do list of someone with ADHD and fill in missing details so the tasks are easier ' +
  "to plan. For each task below, set only the fields marked 'Not set': an estimated duration that adds a " +
  "buffer for time blindness (for example '25 min + 5 min buffer'), a difficulty of Low, Medium or High, " +
  'and a time-blocking category such as Deep Work, Admin, Creative, Social or Physical. Use the update ' +
  "tools with each task's exact text. When you are done, reply with a short note on which tasks are " +
  'quick wins and which need a focus block.';

export type RefinementStatus = 'nothing_to_refine' | 'completed' | 'round_limit' | 'failed' | 'cancelled';

export interface RefinementReport {
  status: RefinementStatus;
  /** Open tasks that were missing a detail when the pass started */
  candidates: number;
  /** Result text of each update that ran and succeeded */
  applied: string[];
  /** Calls answered without running because the field was already set */
  skipped: number;
  /** Closing note from the backend */
  summary: string | null;
  failure?: { kind: BackendFailureKind; message: string } | undefined;
}

export interface TaskRefinerOptions {
  tasks: TaskStore;
  registry: ToolRegistry;
  /** Tried in order for every send; the first that does not fail answers */
  adapters: readonly BackendAdapter[];
  /** Tool rounds allowed per pass (default: 3) */
  maxRounds?: number | undefined;
  toolTimeoutMs?: number | undefined;
  logger?: StructuredLogger | undefined;
  metrics?: MetricsCollector | undefined;
}

export interface RefineOptions {
  signal?: AbortSignal | undefined;
}

// =============================================================================
// Task Selection
// =============================================================================

function isUnset(value: string | undefined): boolean {
  return value === undefined || value.trim() === '';
}

function isRefinementTool(name: string): name is RefinementTool {
  return REFINEMENT_TOOLS.some((tool) => tool === name);
}

/**
 * Open tasks missing a duration, difficulty or category
 */
export function needsRefinement(task: Task): boolean {
  return !task.isDone && (isUnset(task.estimatedDuration) || isUnset(task.difficulty) || isUnset(task.category));
}

export function describeTaskForRefinement(task: Task): string {
  return [
    `Task: ${task.text}`,
    `Estimated Duration: ${task.estimatedDuration ?? 'Not set'}`,
    `Difficulty: ${task.difficulty ?? 'Not set'}`,
    `Category: ${task.category ?? 'Not set'}`,
    `Project: ${task.projectOrPath ?? 'None'}`,
  ].join('\n');
}

const TargetSchema = z.object({ taskDescription: z.string() });

function readTarget(argumentsJSON: string): string | undefined {
  try {
    const parsed = TargetSchema.safeParse(JSON.parse(argumentsJSON));
    return parsed.success ? parsed.data.taskDescription : undefined;
  } catch {
    // the registry answers unreadable arguments itself
    return undefined;
  }
}

// =============================================================================
// TaskRefiner
// =============================================================================

export class TaskRefiner {
  private readonly tasks: TaskStore;
  private readonly adapters: readonly BackendAdapter[];
  private readonly tools: ToolDefinition[];
  private readonly allowed: ReadonlySet<string>;
  private readonly executor: ToolExecutor;
  private readonly maxRounds: number;
  private readonly logger: StructuredLogger;

  private running: Promise<RefinementReport> | undefined;

  /**
   * @throws ConfigurationError without adapters, with a non-positive round
   * limit, or when the registry lacks an update tool
   */
  constructor(options: TaskRefinerOptions) {
    this.tasks = options.tasks;
    this.adapters = [...options.adapters];
    this.maxRounds = options.maxRounds ?? 3;
    this.logger = options.logger ?? createSilentLogger();

    if (this.adapters.length === 0) {
      throw new ConfigurationError('Task refinement needs at least one backend adapter');
    }
    if (this.maxRounds < 1) {
      throw new ConfigurationError('maxRounds must be at least 1');
    }

    this.tools = options.registry.definitions(REFINEMENT_TOOLS);
    this.allowed = new Set(this.tools.map((tool) => tool.name));
    this.executor = new ToolExecutor(options.registry, {
      timeoutMs: options.toolTimeoutMs,
      logger: this.logger.child('tools'),
      metrics: options.metrics,
    });
  }

  isRunning(): boolean {
    return this.running !== undefined;
  }

  /**
   * Run one pass. Calling again while a pass runs joins that pass.
   */
  refineTasks(options: RefineOptions = {}): Promise<RefinementReport> {
    if (!this.running) {
      this.running = withSpan('focus.refine', {}, async (span) => {
        const report = await this.runPass(options.signal);
        span.setAttribute('refine.status', report.status);
        span.setAttribute('refine.applied', report.applied.length);
        return report;
      }).finally(() => {
        this.running = undefined;
      });
    }
    return this.running;
  }

  /**
   * Start a pass every `intervalMs`, skipping a beat while one is still
   * running. The timer does not keep the process alive.
   *
   * @returns Stops the schedule
   */
  schedule(intervalMs: number): () => void {
    const timer = setInterval(() => {
      if (this.running) {
        return;
      }
      void this.refineTasks().catch((error: unknown) => {
        this.logger.error('Scheduled refinement failed', { error: errorMessage(error) });
      });
    }, intervalMs);
    timer.unref();
    this.logger.info('Refinement scheduled', { intervalMs });
    return () => clearInterval(timer);
  }

  private async runPass(signal?: AbortSignal): Promise<RefinementReport> {
    const candidates = (await this.tasks.list()).filter(needsRefinement);
    const report: RefinementReport = {
      status: 'nothing_to_refine',
      candidates: candidates.length,
      applied: [],
      skipped: 0,
      summary: null,
    };
    if (candidates.length === 0) {
      this.logger.debug('No tasks need refinement');
      return report;
    }

    this.logger.info('Refinement started', { candidates: candidates.length });
    const window: Message[] = [
      systemMessage(REFINEMENT_PROMPT),
      userMessage(`Here are the tasks missing details:\n\n${candidates.map(describeTaskForRefinement).join('\n\n')}`),
    ];

    let rounds = 0;
    for (;;) {
      if (signal?.aborted) {
        return this.finish(report, 'cancelled');
      }

      const outcome = await this.sendFirstAvailable(window, signal);
      if (signal?.aborted) {
        return this.finish(report, 'cancelled');
      }

      switch (outcome.kind) {
        case 'text':
          report.summary = outcome.text;
          return this.finish(report, 'completed');

        case 'failure':
          report.failure = { kind: outcome.failure, message: outcome.message };
          return this.finish(report, 'failed');

        case 'tool_calls': {
          if (rounds >= this.maxRounds) {
            return this.finish(report, 'round_limit');
          }
          rounds++;
          window.push(assistantToolCalls(outcome.toolCalls, outcome.text));
          window.push(...(await this.applyCalls(outcome.toolCalls, report, signal)));
          break;
        }
      }
    }
  }

  private async sendFirstAvailable(window: readonly Message[], signal?: AbortSignal): Promise<BackendOutcome> {
    let last: BackendOutcome = failureOutcome('BackendUnavailable', 'no backend answered');
    for (const adapter of this.adapters) {
      const outcome = await adapter.send({ window, tools: this.tools, tierLabel: `refine:${adapter.id}`, signal });
      if (outcome.kind !== 'failure' || signal?.aborted) {
        return outcome;
      }
      this.logger.warning('Refinement send failed', {
        backend: adapter.id,
        failure: outcome.failure,
        message: outcome.message,
      });
      last = outcome;
    }
    return last;
  }

  /**
   * Answer every call: skipped ones without running, the rest through the
   * executor limited to the update tools.
   */
  private async applyCalls(
    calls: readonly ToolCallRequest[],
    report: RefinementReport,
    signal?: AbortSignal
  ): Promise<Message[]> {
    const tasks = await this.tasks.list();
    const answers = new Map<ToolCallRequest, string>();

    const runnable: ToolCallRequest[] = [];
    for (const call of calls) {
      const reason = this.skipReason(call, tasks);
      if (reason === undefined) {
        runnable.push(call);
      } else {
        report.skipped++;
        answers.set(call, reason);
      }
    }

    for (const { call, result } of await this.executor.executeAll(runnable, { signal, allowed: this.allowed })) {
      if (!result.isError) {
        report.applied.push(result.text);
      }
      answers.set(call, result.text);
    }

    return calls.map((call) => toolMessage(call, answers.get(call) ?? 'not run'));
  }

  private skipReason(call: ToolCallRequest, tasks: readonly Task[]): string | undefined {
    if (!isRefinementTool(call.name)) {
      return undefined;
    }
    const description = readTarget(call.argumentsJSON);
    const task = description === undefined ? undefined : tasks.find((t) => matchesDescription(t, description));
    if (!task) {
      return undefined;
    }
    const field = FIELD_BY_TOOL[call.name];
    if (isUnset(task[field])) {
      return undefined;
    }
    return `Skipped: '${task.text}' already has a ${FIELD_LABELS[field]}`;
  }

  private finish(report: RefinementReport, status: RefinementStatus): RefinementReport {
    report.status = status;
    const data = {
      status,
      candidates: report.candidates,
      applied: report.applied.length,
      skipped: report.skipped,
      ...(report.failure ? { failure: report.failure.kind } : {}),
    };
    if (status === 'failed') {
      this.logger.warning('Refinement failed', data);
    } else {
      this.logger.info('Refinement finished', data);
    }
    return report;
  }
}
