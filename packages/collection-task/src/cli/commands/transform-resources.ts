/**
 * Transform Resources Command
 *
 * Usage:
 *   collection-task transform-resources --collection-dir <dir> [options]
 *
 * Options:
 *   --dataset, --offset, --limit   Shard selection
 *   --max-workers <n>              Concurrent transform processes (default: CPU count)
 *   --reprocess                    Ignore recorded fingerprints
 *   --code-version <v>             Version to record instead of asking digital-land
 *   directory flags                See --help
 *
 * Exits 1 when any task failed, 2 on invalid options or an offset past the
 * end of the task list.
 */

import type { Command } from 'commander';
import { transformResources } from '../../services/transform-resources.js';
import { EXIT_CODES, runCommand, type CliDependencies } from '../lib/context.js';
import {
  DIRECTORY_FLAGS,
  addDirectoryOptions,
  addLoggingOptions,
  addShardOptions,
  parseInteger,
  type DirectoryFlag,
  type LoggingFlags,
  type ShardFlags,
} from '../lib/options.js';

type DirectoryValues = { readonly [K in DirectoryFlag]: string };

interface TransformResourcesFlags extends LoggingFlags, ShardFlags, DirectoryValues {
  readonly collectionDir: string;
  readonly maxWorkers?: number;
  readonly reprocess?: boolean;
  readonly codeVersion?: string;
}

const ALL_DIRECTORY_FLAGS = Object.keys(DIRECTORY_FLAGS).filter(
  (key): key is DirectoryFlag => key in DIRECTORY_FLAGS
);

export function registerTransformResourcesCommand(parent: Command, deps: CliDependencies): void {
  const command = parent
    .command('transform-resources')
    .description('Transform a shard of the collection through the pipeline engine')
    .requiredOption('--collection-dir <path>', 'Path to the collection directory');

  addShardOptions(command);
  addDirectoryOptions(command, ALL_DIRECTORY_FLAGS);
  command
    .option('--max-workers <n>', 'Number of concurrent transform processes', parseInteger)
    .option('--reprocess', 'Reprocess all resources, even those already up to date')
    .option('--code-version <version>', 'Code version recorded in dataset resource logs');
  addLoggingOptions(command);

  command.action(async (flags: TransformResourcesFlags) => {
    await runCommand(flags, deps, async ({ logger, progress }) => {
      const collection = await deps.loadCollection(flags.collectionDir);
      const result = await transformResources({
        collection,
        engine: deps.createEngine({ codeVersion: flags.codeVersion }),
        logger,
        progress,
        dataset: flags.dataset,
        offset: flags.offset,
        limit: flags.limit,
        maxWorkers: flags.maxWorkers,
        reprocess: flags.reprocess,
        dirs: {
          pipelineDir: flags.pipelineDir,
          specificationDir: flags.specificationDir,
          cacheDir: flags.cacheDir,
          transformedDir: flags.transformedDir,
          issueDir: flags.issueDir,
          operationalIssueDir: flags.operationalIssueDir,
          outputLogDir: flags.outputLogDir,
          columnFieldDir: flags.columnFieldDir,
          datasetResourceDir: flags.datasetResourceDir,
          convertedResourceDir: flags.convertedResourceDir,
        },
      });

      if (result.run.kind === 'noop') {
        logger.info('No transformation tasks to process');
        return EXIT_CODES.SUCCESS;
      }
      return result.run.failed > 0 ? EXIT_CODES.FAILURES : EXIT_CODES.SUCCESS;
    });
  });
}
