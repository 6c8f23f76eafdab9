/**
 * Collection Task Error Types
 *
 * Every failure the core raises carries a stable `code` so the CLI can map
 * it to an exit status without string matching.
 *
 * RECOVERY:
 * - CONFIGURATION / RANGE: fix the flags and rerun
 * - TRANSPORT / AGGREGATE_FETCH: rerun; completed files are skipped by
 *   idempotent writes, retries are internal
 * - TRANSFORM: rerun; the staleness check skips already-processed resources
 */

export type CollectionTaskErrorCode =
  | 'CONFIGURATION'
  | 'RANGE'
  | 'TRANSPORT'
  | 'AGGREGATE_FETCH'
  | 'TRANSFORM'
  | 'COLLECTION_LOAD';

/**
 * Base class for all collection task errors
 */
export class CollectionTaskError extends Error {
  readonly code: CollectionTaskErrorCode;

  constructor(code: CollectionTaskErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CollectionTaskError';
    this.code = code;

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Invalid or missing options, detected before any work starts
 */
export class ConfigurationError extends CollectionTaskError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION', message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Offset points past the end of the task list
 *
 * Almost always a misconfigured shard count, so it is never clamped.
 */
export class TaskRangeError extends CollectionTaskError {
  readonly offset: number;
  readonly total: number;
  readonly contextLabel?: string;

  constructor(offset: number, total: number, contextLabel?: string) {
    const context = contextLabel ? ` (filtering by dataset '${contextLabel}')` : '';
    super(
      'RANGE',
      `Offset ${offset} is beyond the total number of transformation tasks (${total})${context}`
    );
    this.name = 'TaskRangeError';
    this.offset = offset;
    this.total = total;
    this.contextLabel = contextLabel;
  }
}

/**
 * A single fetch attempt failed
 */
export class TransportError extends CollectionTaskError {
  readonly url: string;
  readonly statusCode?: number;

  constructor(url: string, message: string, options?: { statusCode?: number; cause?: unknown }) {
    super('TRANSPORT', message, { cause: options?.cause });
    this.name = 'TransportError';
    this.url = url;
    this.statusCode = options?.statusCode;
  }
}

/**
 * URL scheme that no transport handles
 */
export class UnsupportedSchemeError extends CollectionTaskError {
  readonly url: string;

  constructor(url: string) {
    super('CONFIGURATION', `Unsupported URL scheme: ${url} (expected s3://, http:// or https://)`);
    this.name = 'UnsupportedSchemeError';
    this.url = url;
  }
}

/**
 * One or more fetches in a batch failed after all items were attempted
 */
export class AggregateFetchError extends CollectionTaskError {
  readonly failedUrls: readonly string[];
  readonly total: number;

  constructor(failedUrls: readonly string[], total: number) {
    super(
      'AGGREGATE_FETCH',
      `Failed to download ${failedUrls.length} of ${total} file(s):\n${failedUrls.join('\n')}`
    );
    this.name = 'AggregateFetchError';
    this.failedUrls = failedUrls;
    this.total = total;
  }
}

/**
 * The external transform process failed
 */
export class TransformError extends CollectionTaskError {
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(message: string, exitCode: number | null, stderr = '') {
    super('TRANSFORM', message);
    this.name = 'TransformError';
    this.exitCode = exitCode;
    this.stderr = stderr.slice(-2000);
  }
}

/**
 * Collection directory could not be read
 */
export class CollectionLoadError extends CollectionTaskError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super('COLLECTION_LOAD', `Failed to load collection at ${path}: ${message}`, options);
    this.name = 'CollectionLoadError';
    this.path = path;
  }
}

/**
 * Type guard for collection task errors
 */
export function isCollectionTaskError(error: unknown): error is CollectionTaskError {
  return error instanceof CollectionTaskError;
}

/**
 * Normalise anything thrown into a message string
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * True for a filesystem ENOENT error
 */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
