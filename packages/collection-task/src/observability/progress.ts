/**
 * Progress Reporting
 *
 * A redrawn bar on an interactive terminal, or periodic log lines at 10%
 * completion steps when output is piped to a log collector. The choice is
 * made once at startup and injected.
 *
 * @module observability/progress
 */

import type { Logger } from '../core/utils/logger.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Progress of one batch
 */
export interface ProgressTracker {
  /** Record one completed item (success or failure) */
  advance(): void;

  /** Close the batch */
  done(): void;
}

export interface ProgressReporter {
  begin(label: string, total: number): ProgressTracker;
}

/**
 * Minimal writable surface (process.stdout, process.stderr, test buffers)
 */
export interface ProgressStream {
  write(chunk: string): boolean;
  readonly isTTY?: boolean;
}

// ============================================================================
// Periodic log reporter
// ============================================================================

/**
 * Percentage step between progress log lines
 */
export const LOG_INTERVAL_PERCENT = 10;

export class LogProgressReporter implements ProgressReporter {
  constructor(private readonly logger: Logger) {}

  begin(label: string, total: number): ProgressTracker {
    const logger = this.logger;
    let completed = 0;
    let lastLoggedPercent = 0;

    logger.info(`Starting ${label}: ${total} items`);

    return {
      advance(): void {
        completed++;
        const percent = total > 0 ? Math.floor((completed * 100) / total) : 100;
        if (percent >= lastLoggedPercent + LOG_INTERVAL_PERCENT || completed === total) {
          logger.info(`Progress: ${completed}/${total} ${label} (${percent}%)`);
          lastLoggedPercent = percent;
        }
      },
      done(): void {
        logger.info(`Completed ${label}: ${completed} of ${total} complete`);
      },
    };
  }
}

// ============================================================================
// Live bar reporter
// ============================================================================

const BAR_WIDTH = 30;

/**
 * Render a progress bar line (without carriage return)
 */
export function renderBar(current: number, total: number, label?: string): string {
  const ratio = total > 0 ? Math.min(1, current / total) : 1;
  const percent = Math.round(ratio * 100);
  const filled = Math.round(ratio * BAR_WIDTH);
  const bar = `[${'='.repeat(filled)}${' '.repeat(BAR_WIDTH - filled)}]`;
  const labelStr = label ? ` ${label}` : '';
  return `${bar} ${percent}% (${current}/${total})${labelStr}`;
}

export class LiveProgressReporter implements ProgressReporter {
  constructor(private readonly stream: ProgressStream) {}

  begin(label: string, total: number): ProgressTracker {
    const stream = this.stream;
    let completed = 0;
    let closed = false;

    stream.write(`\r${renderBar(0, total, label)}`);

    return {
      advance(): void {
        completed++;
        stream.write(`\r${renderBar(completed, total, label)}`);
      },
      done(): void {
        if (closed) return;
        closed = true;
        stream.write('\n');
      },
    };
  }
}

// ============================================================================
// Selection
// ============================================================================

/**
 * Reporter that records nothing (library default)
 */
export const silentProgress: ProgressReporter = {
  begin(): ProgressTracker {
    return { advance() {}, done() {} };
  },
};

/**
 * Pick the reporter for this process: live bar on a TTY, log lines otherwise
 */
export function selectProgressReporter(
  stream: ProgressStream,
  logger: Logger,
  options: { readonly forceLog?: boolean } = {}
): ProgressReporter {
  if (stream.isTTY && !options.forceLog) {
    return new LiveProgressReporter(stream);
  }
  return new LogProgressReporter(logger);
}
