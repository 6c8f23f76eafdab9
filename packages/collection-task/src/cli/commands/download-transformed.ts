/**
 * Download Transformed Command
 *
 * Usage:
 *   collection-task download-transformed --collection-dir <dir> [options]
 *
 * Fetches the five per-task artifacts of a previous transform run so that
 * package assembly can proceed without transforming again.
 */

import type { Command } from 'commander';
import { downloadTransformed } from '../../services/download-transformed.js';
import { EXIT_CODES, remoteFromFlags, runCommand, type CliDependencies } from '../lib/context.js';
import {
  addDirectoryOptions,
  addLoggingOptions,
  addRemoteOptions,
  addShardOptions,
  addThreadsOption,
  type LoggingFlags,
  type RemoteFlags,
  type ShardFlags,
} from '../lib/options.js';

interface DownloadTransformedFlags extends LoggingFlags, RemoteFlags, ShardFlags {
  readonly collectionDir: string;
  readonly maxThreads: number;
  readonly transformedDir: string;
  readonly issueDir: string;
  readonly columnFieldDir: string;
  readonly datasetResourceDir: string;
  readonly convertedResourceDir: string;
}

export function registerDownloadTransformedCommand(parent: Command, deps: CliDependencies): void {
  const command = parent
    .command('download-transformed')
    .description('Download transformed artifacts for a shard of the collection')
    .requiredOption('--collection-dir <path>', 'Path to the collection directory');

  addRemoteOptions(command);
  addShardOptions(command);
  addDirectoryOptions(command, [
    'transformedDir',
    'issueDir',
    'columnFieldDir',
    'datasetResourceDir',
    'convertedResourceDir',
  ]);
  addThreadsOption(command);
  addLoggingOptions(command);

  command.action(async (flags: DownloadTransformedFlags) => {
    await runCommand(flags, deps, async ({ logger, fetcher }) => {
      const remote = remoteFromFlags(flags);
      const collection = await deps.loadCollection(flags.collectionDir);
      await downloadTransformed({
        collection,
        remote,
        fetcher,
        logger,
        dataset: flags.dataset,
        offset: flags.offset,
        limit: flags.limit,
        maxThreads: flags.maxThreads,
        dirs: {
          transformedDir: flags.transformedDir,
          issueDir: flags.issueDir,
          columnFieldDir: flags.columnFieldDir,
          datasetResourceDir: flags.datasetResourceDir,
          convertedResourceDir: flags.convertedResourceDir,
        },
      });
      return EXIT_CODES.SUCCESS;
    });
  });
}
