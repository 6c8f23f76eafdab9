/**
 * Download Resources Command
 *
 * Usage:
 *   collection-task download-resources --collection-dir <dir> [options]
 *
 * Options:
 *   --bucket <name> | --base-url <url>   Remote source (one is required)
 *   --collection-name <name>             Defaults to $COLLECTION_NAME
 *   --dataset, --offset, --limit         Shard selection
 *   --max-threads <n>                    Concurrent downloads (default: 4)
 *
 * Examples:
 *   collection-task download-resources --collection-dir collection/ \
 *     --bucket example-collection-data --collection-name example --offset 0 --limit 50
 */

import type { Command } from 'commander';
import { downloadResources } from '../../services/download-resources.js';
import { EXIT_CODES, remoteFromFlags, runCommand, type CliDependencies } from '../lib/context.js';
import {
  addLoggingOptions,
  addRemoteOptions,
  addShardOptions,
  addThreadsOption,
  type LoggingFlags,
  type RemoteFlags,
  type ShardFlags,
} from '../lib/options.js';

interface DownloadResourcesFlags extends LoggingFlags, RemoteFlags, ShardFlags {
  readonly collectionDir: string;
  readonly maxThreads: number;
}

export function registerDownloadResourcesCommand(parent: Command, deps: CliDependencies): void {
  const command = parent
    .command('download-resources')
    .description('Download the raw resource files for a shard of the collection')
    .requiredOption('--collection-dir <path>', 'Path to the collection directory');

  addRemoteOptions(command);
  addShardOptions(command);
  addThreadsOption(command);
  addLoggingOptions(command);

  command.action(async (flags: DownloadResourcesFlags) => {
    await runCommand(flags, deps, async ({ logger, fetcher }) => {
      const remote = remoteFromFlags(flags);
      const collection = await deps.loadCollection(flags.collectionDir);
      await downloadResources({
        collection,
        remote,
        fetcher,
        logger,
        dataset: flags.dataset,
        offset: flags.offset,
        limit: flags.limit,
        maxThreads: flags.maxThreads,
      });
      return EXIT_CODES.SUCCESS;
    });
  });
}
