/**
 * Transform Resources
 *
 * Runs the transform engine over this worker's shard:
 *
 *   canonical list → offset/limit → staleness (unless reprocessing)
 *     → redirect resolution → TaskRunner (one engine run per task)
 *
 * Outputs and metadata are keyed by the requested resource; only the input
 * file follows redirects. A successful task records the current fingerprint
 * so the next run can skip it.
 */

import { mkdir } from 'node:fs/promises';
import {
  TransformDirsSchema,
  joinDir,
  parseOptions,
  type ShardOptions,
  type TransformDirs,
} from '../core/config.js';
import { taskId, type ResourceId, type Task, type TaskRunResult } from '../core/types.js';
import { createSilentLogger, type Logger } from '../core/utils/logger.js';
import type { Collection } from '../collection/collection-loader.js';
import { TaskRunner } from '../execution/task-runner.js';
import type { ProgressReporter } from '../observability/progress.js';
import { REMOVED, RedirectResolver } from '../tasks/redirect-resolver.js';
import { StalenessFilter, computeFingerprint } from '../tasks/staleness-filter.js';
import type { TransformEngine, TransformRequest } from '../transformation/transform-engine.js';
import { planShard } from './shard.js';

export interface TransformResourcesOptions extends Partial<ShardOptions> {
  readonly collection: Collection;
  readonly engine: TransformEngine;
  readonly dirs?: Partial<TransformDirs>;

  /** Run every task even when its recorded fingerprint matches */
  readonly reprocess?: boolean;

  readonly maxWorkers?: number;
  readonly logger?: Logger;
  readonly progress?: ProgressReporter;
}

export interface TransformResourcesResult {
  /** Tasks in the canonical list before slicing */
  readonly totalTasks: number;

  /** Tasks in this shard */
  readonly shardTasks: number;

  /** Shard tasks already up to date */
  readonly upToDate: number;

  /** Shard tasks whose resource was removed */
  readonly removed: number;

  readonly run: TaskRunResult;
}

export interface PlannedTask {
  readonly task: Task;
  readonly physical: ResourceId;
}

/**
 * Engine request for one task
 */
export function buildTransformRequest(
  planned: PlannedTask,
  collection: Collection,
  dirs: TransformDirs
): TransformRequest {
  const { task, physical } = planned;
  const { dataset, resource } = task;

  return {
    dataset,
    inputPath: collection.resourcePath(physical),
    outputPath: joinDir(dirs.transformedDir, dataset, `${resource}.csv`),
    resource: physical !== resource ? resource : undefined,
    pipelineDir: dirs.pipelineDir,
    specificationDir: dirs.specificationDir,
    collectionDir: collection.directory,
    cacheDir: dirs.cacheDir,
    issueDir: joinDir(dirs.issueDir, dataset),
    operationalIssueDir: dirs.operationalIssueDir,
    outputLogDir: dirs.outputLogDir,
    columnFieldDir: joinDir(dirs.columnFieldDir, dataset),
    datasetResourceDir: joinDir(dirs.datasetResourceDir, dataset),
    convertedResourceDir: joinDir(dirs.convertedResourceDir, dataset),
    configPath: joinDir(dirs.cacheDir, 'config.sqlite3'),
    organisationPath: joinDir(dirs.cacheDir, 'organisation.csv'),
    endpoints: collection.resourceEndpoints(resource),
    organisations: collection.resourceOrganisations(resource),
    entryDate: collection.resourceStartDate(resource),
  };
}

async function createOutputDirs(dataset: string, dirs: TransformDirs): Promise<void> {
  const paths = [
    joinDir(dirs.transformedDir, dataset),
    joinDir(dirs.issueDir, dataset),
    dirs.operationalIssueDir,
    dirs.outputLogDir,
    joinDir(dirs.columnFieldDir, dataset),
    joinDir(dirs.datasetResourceDir, dataset),
    joinDir(dirs.convertedResourceDir, dataset),
  ];
  await Promise.all(paths.map((path) => mkdir(path, { recursive: true })));
}

export async function transformResources(options: TransformResourcesOptions): Promise<TransformResourcesResult> {
  const { collection, engine } = options;
  const logger = options.logger ?? createSilentLogger();
  const dirs = parseOptions(TransformDirsSchema, options.dirs ?? {});

  const plan = planShard(collection.datasetResourceMap(), {
    dataset: options.dataset,
    offset: options.offset,
    limit: options.limit,
  });

  const fingerprint = await computeFingerprint({
    pipelineDir: dirs.pipelineDir,
    specificationDir: dirs.specificationDir,
    codeVersion: await engine.version(),
  });
  const staleness = new StalenessFilter(dirs.datasetResourceDir);

  let candidates = plan.tasks;
  if (!options.reprocess) {
    const { pending, skipped } = await staleness.filterTasks(plan.tasks, fingerprint);
    logger.info(`Skipping ${skipped.length} already up-to-date resources, ${pending.length} to process`);
    candidates = pending;
  }
  const upToDate = plan.tasks.length - candidates.length;

  const resolver = RedirectResolver.fromEntries(collection.oldResourceEntries());
  const planned = new Map<string, PlannedTask>();
  let removed = 0;

  for (const task of candidates) {
    const physical = resolver.resolve(task.resource);
    if (physical === REMOVED) {
      logger.info(`Skipping removed resource: ${task.resource}`);
      removed++;
      continue;
    }
    planned.set(taskId(task), { task, physical });
  }

  logger.info(`Processing ${planned.size} of ${plan.total} total tasks`);
  if (planned.size === 0) {
    logger.warn('No transformation tasks to process after applying filters');
  }

  const runner = new TaskRunner({ logger, progress: options.progress });
  const tasks = [...planned.values()].map((entry) => entry.task);

  const run = await runner.run(
    tasks,
    async (task) => {
      const entry = planned.get(taskId(task));
      if (entry === undefined) {
        return { ok: false, message: `No plan for task ${taskId(task)}` };
      }
      await createOutputDirs(task.dataset, dirs);
      await engine.run(buildTransformRequest(entry, collection, dirs));
      await staleness.record(task.dataset, task.resource, fingerprint);
      return { ok: true };
    },
    { maxWorkers: options.maxWorkers, label: 'transformation tasks' }
  );

  return {
    totalTasks: plan.total,
    shardTasks: plan.tasks.length,
    upToDate,
    removed,
    run,
  };
}
