/**
 * Download Dataset Resource Logs
 *
 * Fetches the fingerprint log of every (dataset, resource) pair before a
 * transform run, so the staleness check can skip pairs that are already up
 * to date. Pairs never processed have no remote log; those misses are
 * expected, get one attempt each and never fail the batch.
 */

import { DEFAULT_DIRS, joinDir } from '../core/config.js';
import { createSilentLogger, type Logger } from '../core/utils/logger.js';
import type { Collection } from '../collection/collection-loader.js';
import type { ConcurrentFetcher } from '../acquisition/concurrent-fetcher.js';
import type { RemoteLocation } from '../acquisition/remote-location.js';
import { planShard } from './shard.js';

export interface DownloadDatasetResourceOptions {
  readonly collection: Collection;
  readonly remote: RemoteLocation;
  readonly fetcher: ConcurrentFetcher;
  readonly datasetResourceDir?: string;
  readonly dataset?: string;
  readonly logger?: Logger;
  readonly maxThreads?: number;
}

export interface DownloadDatasetResourceResult {
  readonly downloaded: number;
  readonly notFound: number;
}

export async function downloadDatasetResourceLogs(
  options: DownloadDatasetResourceOptions
): Promise<DownloadDatasetResourceResult> {
  const { collection, remote, fetcher } = options;
  const logger = options.logger ?? createSilentLogger();
  const datasetResourceDir = options.datasetResourceDir ?? DEFAULT_DIRS.datasetResourceDir;

  const { tasks } = planShard(collection.datasetResourceMap(), { dataset: options.dataset });
  logger.info(`Downloading dataset resource logs for ${tasks.length} resources...`);

  const urlMap = new Map<string, string>();
  for (const task of tasks) {
    const path = joinDir(datasetResourceDir, task.dataset, `${task.resource}.csv`);
    urlMap.set(remote.url(path), path);
  }

  const results = await fetcher.fetchEach(urlMap, {
    maxParallelism: options.maxThreads,
    maxRetries: 1,
    label: 'dataset resource logs',
  });

  const downloaded = results.filter(Boolean).length;
  const notFound = tasks.length - downloaded;
  logger.info(
    `Downloaded ${downloaded} dataset resource logs (${notFound} not found - these resources will be processed)`
  );

  return { downloaded, notFound };
}
