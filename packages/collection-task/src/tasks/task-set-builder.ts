/**
 * Task Set Builder
 *
 * Produces the canonical (dataset, resource) task list from a collection
 * index. The order is a pure function of the index contents and the dataset
 * filter, which is what lets independent shard invocations agree on it.
 */

import type { CollectionIndex, DatasetName, ResourceId, Task, TaskList } from '../core/types.js';

/**
 * Code-unit comparison, independent of locale and ICU data
 */
export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function isMapIndex(
  index: CollectionIndex
): index is ReadonlyMap<DatasetName, ReadonlySet<ResourceId> | readonly ResourceId[]> {
  return index instanceof Map;
}

function datasetNames(index: CollectionIndex): DatasetName[] {
  return isMapIndex(index) ? [...index.keys()] : Object.keys(index);
}

function resourcesOf(index: CollectionIndex, dataset: DatasetName): Iterable<ResourceId> | undefined {
  if (isMapIndex(index)) {
    return index.get(dataset);
  }
  return Object.prototype.hasOwnProperty.call(index, dataset) ? index[dataset] : undefined;
}

/**
 * Build the canonical task list
 *
 * Datasets in lexicographic order (only `dataset` when given), resources
 * within each in lexicographic order, one task per membership. A resource in
 * two datasets yields two tasks. An unknown `dataset` yields an empty list.
 *
 * @example
 * ```typescript
 * buildTaskList({ 'ds-a': ['r3', 'r1'], 'ds-b': ['r1'] });
 * // [{ds-a,r1}, {ds-a,r3}, {ds-b,r1}]
 * ```
 */
export function buildTaskList(index: CollectionIndex, dataset?: DatasetName): TaskList {
  const datasets = dataset !== undefined ? [dataset] : datasetNames(index).sort(compareIds);
  const tasks: Task[] = [];

  for (const ds of datasets) {
    const resources = resourcesOf(index, ds);
    if (resources === undefined) continue;

    const unique = [...new Set(resources)].sort(compareIds);
    for (const resource of unique) {
      tasks.push({ dataset: ds, resource });
    }
  }

  return tasks;
}

/**
 * Distinct requested resources across a task list, in first-seen order
 *
 * A resource shared by several datasets only needs fetching once.
 */
export function uniqueResources(tasks: TaskList): ResourceId[] {
  return [...new Set(tasks.map((task) => task.resource))];
}
