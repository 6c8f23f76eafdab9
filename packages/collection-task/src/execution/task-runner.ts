/**
 * Task Runner
 *
 * Fans a task list out to a bounded pool of workers and collects per-task
 * outcomes. A worker usually drives one external transform process, so the
 * pool bound is the number of concurrent processes.
 *
 * DESIGN:
 * - Failure isolation: a thrown error or `{ ok: false }` is recorded for that
 *   task only; the rest of the pool keeps going
 * - Empty input is a distinct `noop` result, no pool is started
 * - The runner never decides exit status; callers inspect the counts
 */

import { availableParallelism } from 'node:os';
import { ConfigurationError, errorMessage } from '../core/errors.js';
import { createSilentLogger, type Logger } from '../core/utils/logger.js';
import {
  taskId,
  type CompletedRun,
  type Task,
  type TaskFailure,
  type TaskList,
  type TaskOutcome,
  type TaskRunResult,
} from '../core/types.js';
import { silentProgress, type ProgressReporter } from '../observability/progress.js';
import { mapBounded } from '../resilience/concurrency-limiter.js';

/**
 * Work for one task; resolving without a value counts as success
 */
export type TaskWorker = (task: Task) => Promise<TaskOutcome | undefined>;

export interface TaskRunOptions {
  /** Pool size (default: available parallelism of the host) */
  readonly maxWorkers?: number;

  /** Progress label (default "tasks") */
  readonly label?: string;
}

export interface TaskRunnerConfig {
  readonly logger?: Logger;
  readonly progress?: ProgressReporter;
}

type SlotResult = { readonly ok: true } | { readonly ok: false; readonly failure: TaskFailure };

function failureFor(task: Task, message: string): TaskFailure {
  return { taskId: taskId(task), dataset: task.dataset, resource: task.resource, message };
}

export class TaskRunner {
  private readonly logger: Logger;
  private readonly progress: ProgressReporter;

  constructor(config: TaskRunnerConfig = {}) {
    this.logger = config.logger ?? createSilentLogger();
    this.progress = config.progress ?? silentProgress;
  }

  /**
   * Run `worker` over every task with at most `maxWorkers` in flight
   */
  async run(tasks: TaskList, worker: TaskWorker, options: TaskRunOptions = {}): Promise<TaskRunResult> {
    if (tasks.length === 0) {
      return { kind: 'noop' };
    }

    const maxWorkers = options.maxWorkers ?? availableParallelism();
    if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
      throw new ConfigurationError(`maxWorkers must be a positive integer, got ${maxWorkers}`);
    }
    this.logger.info(`Using ${maxWorkers} worker processes`);

    const tracker = this.progress.begin(options.label ?? 'tasks', tasks.length);
    let slots: SlotResult[];
    try {
      slots = await mapBounded(
        tasks,
        maxWorkers,
        async (task): Promise<SlotResult> => {
          try {
            const outcome = await worker(task);
            if (outcome !== undefined && !outcome.ok) {
              this.logger.error(`Error processing ${task.resource} for dataset ${task.dataset}: ${outcome.message}`);
              return { ok: false, failure: failureFor(task, outcome.message) };
            }
            return { ok: true };
          } catch (error) {
            const message = errorMessage(error);
            this.logger.error(`Error processing ${task.resource} for dataset ${task.dataset}: ${message}`);
            return { ok: false, failure: failureFor(task, message) };
          } finally {
            tracker.advance();
          }
        },
        'task-runner'
      );
    } finally {
      tracker.done();
    }

    const errors: TaskFailure[] = [];
    for (const slot of slots) {
      if (!slot.ok) errors.push(slot.failure);
    }
    const result: CompletedRun = {
      kind: 'completed',
      successful: slots.length - errors.length,
      failed: errors.length,
      errors,
    };

    this.logSummary(result);
    return result;
  }

  private logSummary(result: CompletedRun): void {
    this.logger.info(`Processing complete: ${result.successful} successful, ${result.failed} failed`);
    if (result.errors.length > 0) {
      this.logger.error('Failed resources:');
      for (const failure of result.errors) {
        this.logger.error(`  - ${failure.taskId}: ${failure.message}`);
      }
    }
  }
}
