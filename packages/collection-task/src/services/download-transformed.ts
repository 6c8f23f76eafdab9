/**
 * Download Transformed
 *
 * Fetches the artifacts a previous run produced for this worker's shard, so
 * that package assembly can run without transforming again. Five files per
 * (dataset, resource) task, each stored remotely under the same relative
 * path it has locally:
 *
 *   <transformed-dir>/<dataset>/<resource>.parquet
 *   <issue-dir>/<dataset>/<resource>.csv
 *   <column-field-dir>/<dataset>/<resource>.csv
 *   <dataset-resource-dir>/<dataset>/<resource>.csv
 *   <converted-resource-dir>/<dataset>/<resource>.csv
 *
 * Retired (status 410) resources produced nothing and are skipped.
 */

import {
  TransformDirsSchema,
  joinDir,
  parseOptions,
  type ShardOptions,
  type TransformDirs,
} from '../core/config.js';
import type { Task } from '../core/types.js';
import { createSilentLogger, type Logger } from '../core/utils/logger.js';
import type { Collection } from '../collection/collection-loader.js';
import type { ConcurrentFetcher } from '../acquisition/concurrent-fetcher.js';
import type { RemoteLocation } from '../acquisition/remote-location.js';
import { RedirectResolver } from '../tasks/redirect-resolver.js';
import { planShard } from './shard.js';

export interface DownloadTransformedOptions extends Partial<ShardOptions> {
  readonly collection: Collection;
  readonly remote: RemoteLocation;
  readonly fetcher: ConcurrentFetcher;
  readonly dirs?: Partial<TransformDirs>;
  readonly logger?: Logger;
  readonly maxThreads?: number;
}

export interface DownloadTransformedResult {
  readonly totalTasks: number;
  readonly shardTasks: number;

  /** Tasks skipped as retired */
  readonly retired: number;

  readonly files: number;
}

/**
 * Relative paths of the artifacts one task produces
 */
export function transformedArtifactPaths(task: Task, dirs: TransformDirs): string[] {
  const { dataset, resource } = task;
  return [
    joinDir(dirs.transformedDir, dataset, `${resource}.parquet`),
    joinDir(dirs.issueDir, dataset, `${resource}.csv`),
    joinDir(dirs.columnFieldDir, dataset, `${resource}.csv`),
    joinDir(dirs.datasetResourceDir, dataset, `${resource}.csv`),
    joinDir(dirs.convertedResourceDir, dataset, `${resource}.csv`),
  ];
}

/**
 * @throws AggregateFetchError when any artifact could not be fetched
 */
export async function downloadTransformed(options: DownloadTransformedOptions): Promise<DownloadTransformedResult> {
  const { collection, remote, fetcher } = options;
  const logger = options.logger ?? createSilentLogger();
  const dirs = parseOptions(TransformDirsSchema, options.dirs ?? {});

  const plan = planShard(collection.datasetResourceMap(), {
    dataset: options.dataset,
    offset: options.offset,
    limit: options.limit,
  });
  logger.info(
    `Downloading transformed files for ${plan.tasks.length} transformation tasks (out of ${plan.total} total)`
  );

  const retiredSet = RedirectResolver.fromEntries(collection.oldResourceEntries()).retiredSet();
  const urlMap = new Map<string, string>();
  let retired = 0;

  for (const task of plan.tasks) {
    if (retiredSet.has(task.resource)) {
      logger.info(`Skipping retired resource (status 410): ${task.resource}`);
      retired++;
      continue;
    }
    for (const path of transformedArtifactPaths(task, dirs)) {
      urlMap.set(remote.url(path), path);
    }
  }

  const active = plan.tasks.length - retired;
  const perTask = active > 0 ? Math.floor(urlMap.size / active) : 0;
  logger.info(
    `Downloading ${urlMap.size} files (${perTask} per transformation task) from ${remote.sourceType}...`
  );

  await fetcher.fetchAll(urlMap, { maxParallelism: options.maxThreads, label: 'files' });
  logger.info('Download complete!');

  return {
    totalTasks: plan.total,
    shardTasks: plan.tasks.length,
    retired,
    files: urlMap.size,
  };
}
