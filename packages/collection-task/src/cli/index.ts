/**
 * collection-task CLI
 *
 * @module cli
 */

import { Command } from 'commander';
import { registerCommands } from './commands/index.js';
import { defaultDependencies, type CliDependencies } from './lib/context.js';

export const CLI_NAME = 'collection-task';

export function createProgram(deps: CliDependencies = defaultDependencies, version = '0.0.0'): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Shard, fetch and transform the resources of an open-data collection')
    .version(version, '-V, --version', 'Output the version number');

  registerCommands(program, deps);
  return program;
}

export { EXIT_CODES, exitCodeForError, type CliDependencies, type ExitCode } from './lib/context.js';
