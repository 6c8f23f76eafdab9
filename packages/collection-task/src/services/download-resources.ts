/**
 * Download Resources
 *
 * Fetches the raw resource files this worker's shard needs into the local
 * collection directory. A resource shared by several datasets is fetched
 * once; redirected resources are fetched under their current identifier and
 * removed ones are skipped.
 *
 * Remote layout: <root>/<collection>-collection/collection/resource/<id>
 * Local layout:  <collection-dir>/resource/<id>
 */

import type { ShardOptions } from '../core/config.js';
import { createSilentLogger, type Logger } from '../core/utils/logger.js';
import type { Collection } from '../collection/collection-loader.js';
import type { ConcurrentFetcher } from '../acquisition/concurrent-fetcher.js';
import type { RemoteLocation } from '../acquisition/remote-location.js';
import { REMOVED, RedirectResolver } from '../tasks/redirect-resolver.js';
import { uniqueResources } from '../tasks/task-set-builder.js';
import { planShard } from './shard.js';

export interface DownloadResourcesOptions extends Partial<ShardOptions> {
  readonly collection: Collection;
  readonly remote: RemoteLocation;
  readonly fetcher: ConcurrentFetcher;
  readonly logger?: Logger;
  readonly maxThreads?: number;
}

export interface DownloadResourcesResult {
  /** Tasks in the canonical list before slicing */
  readonly totalTasks: number;

  /** Tasks in this shard */
  readonly shardTasks: number;

  /** Distinct files requested */
  readonly files: number;

  /** Requested resources skipped because they were removed */
  readonly removed: readonly string[];
}

/**
 * @throws AggregateFetchError when any resource could not be fetched
 */
export async function downloadResources(options: DownloadResourcesOptions): Promise<DownloadResourcesResult> {
  const { collection, remote, fetcher } = options;
  const logger = options.logger ?? createSilentLogger();

  const plan = planShard(collection.datasetResourceMap(), {
    dataset: options.dataset,
    offset: options.offset,
    limit: options.limit,
  });
  logger.info(
    `Downloading resources for ${plan.tasks.length} transformation tasks (out of ${plan.total} total)`
  );

  const resolver = RedirectResolver.fromEntries(collection.oldResourceEntries());
  const urlMap = new Map<string, string>();
  const removed: string[] = [];

  for (const requested of uniqueResources(plan.tasks)) {
    const resource = resolver.resolve(requested);
    if (resource === REMOVED) {
      logger.info(`Skipping removed resource: ${requested}`);
      removed.push(requested);
      continue;
    }
    urlMap.set(remote.resourceUrl(resource), collection.resourcePath(resource));
  }

  logger.info(`Downloading ${urlMap.size} resources from ${remote.sourceType}...`);
  await fetcher.fetchAll(urlMap, { maxParallelism: options.maxThreads, label: 'resources' });

  return {
    totalTasks: plan.total,
    shardTasks: plan.tasks.length,
    files: urlMap.size,
    removed,
  };
}
