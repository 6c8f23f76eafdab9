/**
 * Shard planning shared by every workflow
 *
 * Builds the canonical task list and applies the offset/limit window before
 * any staleness, retirement or redirect filtering, so that independently
 * started workers partition the same list.
 */

import { ShardSchema, parseOptions, type ShardOptions } from '../core/config.js';
import type { CollectionIndex, TaskList } from '../core/types.js';
import { buildTaskList } from '../tasks/task-set-builder.js';
import { sliceTasks } from '../tasks/task-partitioner.js';

export interface ShardPlan {
  /** Size of the canonical list before slicing */
  readonly total: number;

  /** This worker's window */
  readonly tasks: TaskList;
}

/**
 * @throws ConfigurationError for invalid shard options
 * @throws TaskRangeError when the offset is past the end of the list
 */
export function planShard(index: CollectionIndex, raw: Partial<ShardOptions> = {}): ShardPlan {
  const shard = parseOptions(ShardSchema, raw);
  const all = buildTaskList(index, shard.dataset);
  const tasks = sliceTasks(all, {
    offset: shard.offset,
    limit: shard.limit,
    contextLabel: shard.dataset,
  });
  return { total: all.length, tasks };
}
