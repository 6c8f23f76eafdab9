/**
 * Concurrent Fetcher
 *
 * Executes URL → local path fetches in parallel with bounded retry, then
 * reports every failure at once. Scheme dispatch, retry and concurrency are
 * separate pieces composed here:
 *
 *   selectTransport  → which client handles the URL
 *   withRetry        → how many attempts, with what backoff
 *   mapBounded       → how many fetches in flight
 *
 * DESIGN:
 * - A single item never throws unless asked to (`raiseOnError`); batch
 *   failures surface as one AggregateFetchError after all items ran
 * - Results are position-stable with the input map's iteration order
 * - Each failed attempt is logged at error level with its URL
 */

import { DEFAULT_MAX_RETRIES, DEFAULT_MAX_THREADS } from '../core/config.js';
import { AggregateFetchError, ConfigurationError, errorMessage } from '../core/errors.js';
import { ensureParentDir } from '../core/utils/atomic-write.js';
import { createSilentLogger, type Logger } from '../core/utils/logger.js';
import { silentProgress, type ProgressReporter } from '../observability/progress.js';
import { mapBounded } from '../resilience/concurrency-limiter.js';
import {
  RetryExhaustedError,
  fixedBackoff,
  withRetry,
  type BackoffPolicy,
} from '../resilience/retry.js';
import { selectTransport, type TransportSet } from './transports/transport.js';

// ============================================================================
// Types
// ============================================================================

/**
 * URL → local path; a Map or a plain record
 */
export type UrlMap = ReadonlyMap<string, string> | Readonly<Record<string, string>>;

export interface FetchOneOptions {
  /** Total attempts (default 5) */
  readonly maxRetries?: number;

  /** Propagate the last error instead of returning false */
  readonly raiseOnError?: boolean;
}

export interface FetchBatchOptions {
  /** Fetches in flight at once (default 4) */
  readonly maxParallelism?: number;

  /** Attempts per URL (default 5) */
  readonly maxRetries?: number;

  /** Progress label (default "files") */
  readonly label?: string;
}

export interface ConcurrentFetcherConfig {
  readonly transports: TransportSet;
  readonly logger?: Logger;
  readonly progress?: ProgressReporter;
  readonly backoff?: BackoffPolicy;

  /** Injected for tests */
  readonly sleep?: (ms: number) => Promise<void>;
}

function isMap(urlMap: UrlMap): urlMap is ReadonlyMap<string, string> {
  return urlMap instanceof Map;
}

function toEntries(urlMap: UrlMap): Array<readonly [string, string]> {
  if (isMap(urlMap)) {
    return [...urlMap.entries()];
  }
  return Object.entries(urlMap);
}

function requirePositiveInt(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

// ============================================================================
// Fetcher
// ============================================================================

export class ConcurrentFetcher {
  private readonly transports: TransportSet;
  private readonly logger: Logger;
  private readonly progress: ProgressReporter;
  private readonly backoff: BackoffPolicy;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(config: ConcurrentFetcherConfig) {
    this.transports = config.transports;
    this.logger = config.logger ?? createSilentLogger();
    this.progress = config.progress ?? silentProgress;
    this.backoff = config.backoff ?? fixedBackoff();
    this.sleep = config.sleep;
  }

  /**
   * Fetch one URL to `localPath`
   *
   * @returns true on success, false once the attempt budget is spent
   * @throws the last underlying error, only when `raiseOnError` is set
   */
  async fetchOne(url: string, localPath: string, options: FetchOneOptions = {}): Promise<boolean> {
    const maxAttempts = requirePositiveInt('maxRetries', options.maxRetries ?? DEFAULT_MAX_RETRIES);

    try {
      const transport = selectTransport(this.transports, url);
      await ensureParentDir(localPath);
      await withRetry(() => transport.download(url, localPath), {
        maxAttempts,
        backoff: this.backoff,
        sleep: this.sleep,
        onAttemptFailed: (attempt) => {
          this.logger.error(`Error downloading file from url ${url}: ${attempt.error.message}`, {
            url,
            attempt: attempt.attemptNumber,
            maxAttempts,
          });
        },
      });
      return true;
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        if (options.raiseOnError) throw error.lastError;
        return false;
      }
      // Failures before the first attempt (scheme, directory) are not retried
      this.logger.error(`Error downloading file from url ${url}: ${errorMessage(error)}`, { url });
      if (options.raiseOnError) throw error;
      return false;
    }
  }

  /**
   * Fetch every entry, failing the batch if any item failed
   *
   * @throws AggregateFetchError listing every failed URL, after all items ran
   */
  async fetchAll(urlMap: UrlMap, options: FetchBatchOptions = {}): Promise<boolean[]> {
    const entries = toEntries(urlMap);
    const results = await this.runBatch(entries, options);

    const failedUrls = entries.filter((_, index) => !results[index]).map(([url]) => url);
    if (failedUrls.length > 0) {
      const error = new AggregateFetchError(failedUrls, entries.length);
      this.logger.error(error.message);
      throw error;
    }
    return results;
  }

  /**
   * Fetch every entry and report per-item success; never raises for item
   * failures (optional files such as fingerprint logs)
   */
  async fetchEach(urlMap: UrlMap, options: FetchBatchOptions = {}): Promise<boolean[]> {
    return this.runBatch(toEntries(urlMap), options);
  }

  private async runBatch(
    entries: ReadonlyArray<readonly [string, string]>,
    options: FetchBatchOptions
  ): Promise<boolean[]> {
    const maxParallelism = requirePositiveInt(
      'maxParallelism',
      options.maxParallelism ?? DEFAULT_MAX_THREADS
    );
    const tracker = this.progress.begin(options.label ?? 'files', entries.length);

    try {
      return await mapBounded(
        entries,
        maxParallelism,
        async ([url, localPath]) => {
          try {
            return await this.fetchOne(url, localPath, { maxRetries: options.maxRetries });
          } finally {
            tracker.advance();
          }
        },
        'fetch'
      );
    } finally {
      tracker.done();
    }
  }
}
