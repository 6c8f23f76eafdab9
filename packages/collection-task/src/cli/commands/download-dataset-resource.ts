/**
 * Download Dataset Resource Command
 *
 * Usage:
 *   collection-task download-dataset-resource --collection-dir <dir> [options]
 *
 * Run before transform-resources so already up-to-date resources are
 * skipped. Missing logs are expected for never-processed resources and do
 * not fail the command.
 */

import type { Command } from 'commander';
import { downloadDatasetResourceLogs } from '../../services/download-dataset-resource.js';
import { EXIT_CODES, remoteFromFlags, runCommand, type CliDependencies } from '../lib/context.js';
import {
  addDirectoryOptions,
  addLoggingOptions,
  addRemoteOptions,
  addThreadsOption,
  type LoggingFlags,
  type RemoteFlags,
} from '../lib/options.js';

interface DownloadDatasetResourceFlags extends LoggingFlags, RemoteFlags {
  readonly collectionDir: string;
  readonly dataset?: string;
  readonly datasetResourceDir: string;
  readonly maxThreads: number;
}

export function registerDownloadDatasetResourceCommand(parent: Command, deps: CliDependencies): void {
  const command = parent
    .command('download-dataset-resource')
    .description('Download dataset resource logs used to skip up-to-date resources')
    .requiredOption('--collection-dir <path>', 'Path to the collection directory')
    .option('--dataset <name>', 'Filter downloads to only this dataset');

  addRemoteOptions(command);
  addDirectoryOptions(command, ['datasetResourceDir']);
  addThreadsOption(command);
  addLoggingOptions(command);

  command.action(async (flags: DownloadDatasetResourceFlags) => {
    await runCommand(flags, deps, async ({ logger, fetcher }) => {
      const remote = remoteFromFlags(flags);
      const collection = await deps.loadCollection(flags.collectionDir);
      const { downloaded, notFound } = await downloadDatasetResourceLogs({
        collection,
        remote,
        fetcher,
        logger,
        dataset: flags.dataset,
        datasetResourceDir: flags.datasetResourceDir,
        maxThreads: flags.maxThreads,
      });
      logger.info(`Done: ${downloaded} logs downloaded, ${notFound} not found (will be processed)`);
      return EXIT_CODES.SUCCESS;
    });
  });
}
