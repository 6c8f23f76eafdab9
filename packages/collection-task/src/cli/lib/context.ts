/**
 * CLI runtime context
 *
 * Builds the process-wide logger, progress reporter, transports and fetcher
 * once per command invocation, and maps command outcomes to exit codes. The
 * library below never exits the process; only `runCommand` sets the code.
 *
 * @module cli/lib/context
 */

import { ConcurrentFetcher } from '../../acquisition/concurrent-fetcher.js';
import { RemoteLocation } from '../../acquisition/remote-location.js';
import { createDefaultTransports } from '../../acquisition/transports/index.js';
import type { TransportSet } from '../../acquisition/transports/transport.js';
import { loadCollection, type Collection } from '../../collection/collection-loader.js';
import { errorMessage, isCollectionTaskError } from '../../core/errors.js';
import { createLogger, type Logger } from '../../core/utils/logger.js';
import {
  selectProgressReporter,
  silentProgress,
  type ProgressReporter,
  type ProgressStream,
} from '../../observability/progress.js';
import { DigitalLandTransform, type TransformEngine } from '../../transformation/transform-engine.js';
import type { LoggingFlags, RemoteFlags } from './options.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURES: 1,
  CONFIG_ERROR: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code for an error that escaped a command
 */
export function exitCodeForError(error: unknown): ExitCode {
  if (isCollectionTaskError(error) && (error.code === 'CONFIGURATION' || error.code === 'RANGE')) {
    return EXIT_CODES.CONFIG_ERROR;
  }
  return EXIT_CODES.FAILURES;
}

// ============================================================================
// Context
// ============================================================================

export interface CommandContext {
  readonly logger: Logger;
  readonly progress: ProgressReporter;
  readonly fetcher: ConcurrentFetcher;
}

/**
 * Seams the commands reach the outside world through
 */
export interface CliDependencies {
  readonly stream: ProgressStream;
  readonly createLogger: (flags: LoggingFlags) => Logger;
  readonly createTransports: () => TransportSet;
  readonly loadCollection: (collectionDir: string) => Promise<Collection>;
  readonly createEngine: (options: { readonly codeVersion?: string }) => TransformEngine;
  readonly setExitCode: (code: ExitCode) => void;
}

export const defaultDependencies: CliDependencies = {
  stream: process.stderr,
  createLogger: (flags) =>
    createLogger({
      level: flags.debug ? 'debug' : flags.quiet ? 'warn' : undefined,
      pretty: flags.json ? false : undefined,
    }),
  createTransports: () => createDefaultTransports(),
  loadCollection,
  createEngine: (options) => new DigitalLandTransform({ codeVersion: options.codeVersion }),
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

export function createCommandContext(flags: LoggingFlags, deps: CliDependencies): CommandContext {
  const logger = deps.createLogger(flags);
  const progress = flags.quiet
    ? silentProgress
    : selectProgressReporter(deps.stream, logger, { forceLog: flags.json });
  const fetcher = new ConcurrentFetcher({
    transports: deps.createTransports(),
    logger: logger.child('fetch'),
    progress,
  });
  return { logger, progress, fetcher };
}

/**
 * Remote location from flags
 *
 * @throws ConfigurationError when neither --bucket nor --base-url is given
 */
export function remoteFromFlags(flags: RemoteFlags): RemoteLocation {
  return RemoteLocation.from({
    bucket: flags.bucket,
    baseUrl: flags.baseUrl,
    collectionName: flags.collectionName,
  });
}

/**
 * Run a command body, logging any escaped error and setting the exit code
 */
export async function runCommand(
  flags: LoggingFlags,
  deps: CliDependencies,
  body: (context: CommandContext) => Promise<ExitCode>
): Promise<void> {
  const context = createCommandContext(flags, deps);
  try {
    deps.setExitCode(await body(context));
  } catch (error) {
    context.logger.error(`Error: ${errorMessage(error)}`);
    deps.setExitCode(exitCodeForError(error));
  }
}
