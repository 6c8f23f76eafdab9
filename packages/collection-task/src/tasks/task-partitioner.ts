/**
 * Task Partitioner
 *
 * Offset/limit window over the canonical task order. Contiguous windows
 * (0,n), (n,m), ... from separate invocations cover the list exactly once.
 */

import { ConfigurationError, TaskRangeError } from '../core/errors.js';
import type { TaskList } from '../core/types.js';

export interface SliceOptions {
  /** Leading tasks to drop */
  readonly offset?: number;

  /** Maximum tasks to keep after the offset */
  readonly limit?: number;

  /** Echoed in range errors, usually the dataset filter */
  readonly contextLabel?: string;
}

function assertCount(name: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Apply offset and limit to a task list
 *
 * @throws TaskRangeError when `offset >= tasks.length`
 * @throws ConfigurationError when offset or limit is negative or fractional
 */
export function sliceTasks(tasks: TaskList, options: SliceOptions = {}): TaskList {
  const { offset, limit, contextLabel } = options;
  assertCount('offset', offset);
  assertCount('limit', limit);

  let sliced = tasks;

  if (offset !== undefined) {
    if (offset >= tasks.length) {
      throw new TaskRangeError(offset, tasks.length, contextLabel);
    }
    sliced = sliced.slice(offset);
  }

  if (limit !== undefined) {
    sliced = sliced.slice(0, limit);
  }

  return sliced;
}
