/**
 * collection-task
 *
 * Builds, shards, fetches and transforms the (dataset, resource) work items
 * of an open-data collection.
 *
 * @example
 * ```typescript
 * import {
 *   ConcurrentFetcher,
 *   RemoteLocation,
 *   createDefaultTransports,
 *   createLogger,
 *   downloadResources,
 *   loadCollection,
 * } from 'collection-task';
 *
 * const logger = createLogger({ module: 'download' });
 * const fetcher = new ConcurrentFetcher({ transports: createDefaultTransports(), logger });
 * await downloadResources({
 *   collection: await loadCollection('collection/'),
 *   remote: RemoteLocation.from({ bucket: 'example-bucket', collectionName: 'example' }),
 *   fetcher,
 *   logger,
 *   offset: 0,
 *   limit: 100,
 * });
 * ```
 */

// Core
export * from './core/types.js';
export * from './core/errors.js';
export * from './core/config.js';
export { Logger, createLogger, createSilentLogger, parseLogLevel } from './core/utils/logger.js';
export type { LogLevel, LogMetadata, LogSink, LoggerConfig } from './core/utils/logger.js';
export { atomicWriteFile, ensureParentDir, withAtomicFile } from './core/utils/atomic-write.js';
export { hashDirectory } from './core/utils/hash-directory.js';

// Tasks
export { buildTaskList, compareIds, uniqueResources } from './tasks/task-set-builder.js';
export { sliceTasks, type SliceOptions } from './tasks/task-partitioner.js';
export { REMOVED, RETIRED_STATUS, RedirectResolver, type Removed } from './tasks/redirect-resolver.js';
export {
  DEFAULT_MAX_CONCURRENT_READS,
  FINGERPRINT_COLUMNS,
  StalenessFilter,
  computeFingerprint,
  fingerprintsEqual,
  type FilterResult,
  type StalenessFilterConfig,
  type StoredFingerprint,
} from './tasks/staleness-filter.js';

// Collection
export { Collection, loadCollection } from './collection/collection-loader.js';

// Acquisition
export * from './acquisition/transports/index.js';
export { RemoteLocation } from './acquisition/remote-location.js';
export {
  ConcurrentFetcher,
  type ConcurrentFetcherConfig,
  type FetchBatchOptions,
  type FetchOneOptions,
  type UrlMap,
} from './acquisition/concurrent-fetcher.js';

// Resilience
export {
  RetryExhaustedError,
  exponentialBackoff,
  fixedBackoff,
  withRetry,
  type BackoffPolicy,
  type RetryAttempt,
  type RetryOptions,
} from './resilience/retry.js';
export { ConcurrencyLimiter, mapBounded, type LimiterStats } from './resilience/concurrency-limiter.js';

// Observability
export * from './observability/progress.js';

// Execution
export { TaskRunner, type TaskRunOptions, type TaskRunnerConfig, type TaskWorker } from './execution/task-runner.js';

// Transformation
export {
  DigitalLandTransform,
  buildPipelineArgs,
  type DigitalLandTransformConfig,
  type TransformEngine,
  type TransformRequest,
} from './transformation/transform-engine.js';

// Workflows
export { planShard, type ShardPlan } from './services/shard.js';
export { downloadResources, type DownloadResourcesOptions, type DownloadResourcesResult } from './services/download-resources.js';
export {
  downloadTransformed,
  transformedArtifactPaths,
  type DownloadTransformedOptions,
  type DownloadTransformedResult,
} from './services/download-transformed.js';
export {
  downloadDatasetResourceLogs,
  type DownloadDatasetResourceOptions,
  type DownloadDatasetResourceResult,
} from './services/download-dataset-resource.js';
export {
  buildTransformRequest,
  transformResources,
  type TransformResourcesOptions,
  type TransformResourcesResult,
} from './services/transform-resources.js';
