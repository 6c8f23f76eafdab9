/**
 * Commands Index
 *
 * Registers every collection-task subcommand:
 * - download-resources: raw resource files for a shard
 * - download-transformed: transformed artifacts for a shard
 * - download-dataset-resource: fingerprint logs for the staleness check
 * - transform-resources: run the pipeline engine over a shard
 */

import type { Command } from 'commander';
import type { CliDependencies } from '../lib/context.js';
import { registerDownloadDatasetResourceCommand } from './download-dataset-resource.js';
import { registerDownloadResourcesCommand } from './download-resources.js';
import { registerDownloadTransformedCommand } from './download-transformed.js';
import { registerTransformResourcesCommand } from './transform-resources.js';

export function registerCommands(program: Command, deps: CliDependencies): void {
  registerDownloadResourcesCommand(program, deps);
  registerDownloadTransformedCommand(program, deps);
  registerDownloadDatasetResourceCommand(program, deps);
  registerTransformResourcesCommand(program, deps);
}

export {
  registerDownloadDatasetResourceCommand,
  registerDownloadResourcesCommand,
  registerDownloadTransformedCommand,
  registerTransformResourcesCommand,
};
