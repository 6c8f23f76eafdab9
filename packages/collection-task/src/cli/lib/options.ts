/**
 * Shared CLI option definitions and parsers
 *
 * Every command takes the same logging flags, and most take the same remote
 * and shard flags; they are declared once here and added per command.
 *
 * @module cli/lib/options
 */

import { InvalidArgumentError, Option, type Command } from 'commander';
import { DEFAULT_DIRS, DEFAULT_MAX_THREADS } from '../../core/config.js';

// ============================================================================
// Flag shapes (as commander hands them to actions)
// ============================================================================

export interface LoggingFlags {
  readonly quiet?: boolean;
  readonly debug?: boolean;
  readonly json?: boolean;
}

export interface RemoteFlags {
  readonly bucket?: string;
  readonly baseUrl?: string;
  readonly collectionName?: string;
}

export interface ShardFlags {
  readonly dataset?: string;
  readonly offset?: number;
  readonly limit?: number;
}

// ============================================================================
// Parsers
// ============================================================================

/**
 * Integer option parser for commander
 */
export function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError(`Not an integer: ${value}`);
  }
  return Number.parseInt(value, 10);
}

// ============================================================================
// Option groups
// ============================================================================

export function addLoggingOptions(command: Command): Command {
  return command
    .option('--quiet', 'Suppress progress output (only show warnings and errors)')
    .option('--debug', 'Enable debug logging')
    .option('--json', 'Log as JSON lines');
}

export function addRemoteOptions(command: Command): Command {
  return command
    .option('--bucket <name>', 'S3 bucket name to download from (constructs s3:// URLs)')
    .option('--base-url <url>', 'Base URL for HTTP(S) downloads')
    .addOption(
      new Option('--collection-name <name>', 'Collection name used in remote paths').env('COLLECTION_NAME')
    );
}

export function addShardOptions(command: Command): Command {
  return command
    .option('--dataset <name>', 'Filter resources to only this dataset')
    .option('--offset <n>', 'Offset into the task list', parseInteger)
    .option('--limit <n>', 'Maximum number of tasks', parseInteger);
}

export function addThreadsOption(command: Command): Command {
  return command.option(
    '--max-threads <n>',
    'Maximum number of concurrent downloads',
    parseInteger,
    DEFAULT_MAX_THREADS
  );
}

/**
 * Directory flags shared by transform and download-transformed
 */
export const DIRECTORY_FLAGS = {
  transformedDir: ['--transformed-dir <path>', 'Transformed output directory', DEFAULT_DIRS.transformedDir],
  issueDir: ['--issue-dir <path>', 'Issue directory', DEFAULT_DIRS.issueDir],
  columnFieldDir: ['--column-field-dir <path>', 'Column field directory', DEFAULT_DIRS.columnFieldDir],
  datasetResourceDir: ['--dataset-resource-dir <path>', 'Dataset resource log directory', DEFAULT_DIRS.datasetResourceDir],
  convertedResourceDir: ['--converted-resource-dir <path>', 'Converted resource directory', DEFAULT_DIRS.convertedResourceDir],
  pipelineDir: ['--pipeline-dir <path>', 'Pipeline configuration directory', DEFAULT_DIRS.pipelineDir],
  specificationDir: ['--specification-dir <path>', 'Specification directory', DEFAULT_DIRS.specificationDir],
  cacheDir: ['--cache-dir <path>', 'Cache directory', DEFAULT_DIRS.cacheDir],
  operationalIssueDir: ['--operational-issue-dir <path>', 'Operational issue directory', DEFAULT_DIRS.operationalIssueDir],
  outputLogDir: ['--output-log-dir <path>', 'Output log directory', DEFAULT_DIRS.outputLogDir],
} as const;

export type DirectoryFlag = keyof typeof DIRECTORY_FLAGS;

export function addDirectoryOptions(command: Command, flags: readonly DirectoryFlag[]): Command {
  for (const flag of flags) {
    const [spec, description, defaultValue] = DIRECTORY_FLAGS[flag];
    command.option(spec, description, defaultValue);
  }
  return command;
}
