/**
 * Staleness Filter
 *
 * Decides whether a (dataset, resource) pair needs transforming again by
 * comparing the fingerprint recorded after its last successful run with the
 * current one. The record is the dataset-resource log CSV:
 *
 *   <dataset-resource-dir>/<dataset>/<resource>.csv
 *
 * with `code-version`, `config-hash` and `specification-hash` columns. The
 * transform engine writes further columns into the same file; `record()`
 * keeps them.
 *
 * A pair is skipped only when all three components match.
 */

import { readFile } from 'node:fs/promises';
import Papa from 'papaparse';
import { joinDir } from '../core/config.js';
import { isNotFoundError } from '../core/errors.js';
import { atomicWriteFile } from '../core/utils/atomic-write.js';
import { hashDirectory } from '../core/utils/hash-directory.js';
import type { DatasetName, Fingerprint, ResourceId, Task, TaskList } from '../core/types.js';
import { mapBounded } from '../resilience/concurrency-limiter.js';

/**
 * Log reads in flight at once while filtering
 */
export const DEFAULT_MAX_CONCURRENT_READS = 64;

export const FINGERPRINT_COLUMNS = {
  codeVersion: 'code-version',
  configHash: 'config-hash',
  specificationHash: 'specification-hash',
} as const;

type LogRow = Record<string, string>;

/**
 * Fingerprint lookup result: absent file and unreadable columns are distinct
 */
export type StoredFingerprint =
  | { readonly status: 'missing' }
  | { readonly status: 'incomplete' }
  | { readonly status: 'present'; readonly fingerprint: Fingerprint };

export interface FilterResult {
  readonly pending: TaskList;
  readonly skipped: TaskList;
}

function parseLog(text: string): { fields: string[]; rows: LogRow[] } {
  const parsed = Papa.parse<LogRow>(text, { header: true, skipEmptyLines: true });
  return { fields: parsed.meta.fields ?? [], rows: parsed.data };
}

export function fingerprintsEqual(a: Fingerprint, b: Fingerprint): boolean {
  return (
    a.configHash === b.configHash &&
    a.specificationHash === b.specificationHash &&
    a.codeVersion === b.codeVersion
  );
}

export interface StalenessFilterConfig {
  /** Log reads in flight at once (default 64) */
  readonly maxConcurrentReads?: number;
}

export class StalenessFilter {
  private readonly datasetResourceDir: string;
  private readonly maxConcurrentReads: number;

  constructor(datasetResourceDir: string, config: StalenessFilterConfig = {}) {
    this.datasetResourceDir = datasetResourceDir;
    this.maxConcurrentReads = config.maxConcurrentReads ?? DEFAULT_MAX_CONCURRENT_READS;
  }

  logPath(dataset: DatasetName, resource: ResourceId): string {
    return joinDir(this.datasetResourceDir, dataset, `${resource}.csv`);
  }

  private async readLog(dataset: DatasetName, resource: ResourceId): Promise<{ fields: string[]; rows: LogRow[] } | null> {
    try {
      const text = await readFile(this.logPath(dataset, resource), 'utf-8');
      return parseLog(text);
    } catch (error) {
      if (isNotFoundError(error)) return null;
      throw error;
    }
  }

  /**
   * Read the recorded fingerprint for a pair
   */
  async readFingerprint(dataset: DatasetName, resource: ResourceId): Promise<StoredFingerprint> {
    const log = await this.readLog(dataset, resource);
    if (log === null) return { status: 'missing' };

    const row = log.rows[0];
    const codeVersion = row?.[FINGERPRINT_COLUMNS.codeVersion];
    const configHash = row?.[FINGERPRINT_COLUMNS.configHash];
    const specificationHash = row?.[FINGERPRINT_COLUMNS.specificationHash];

    if (codeVersion === undefined || configHash === undefined || specificationHash === undefined) {
      return { status: 'incomplete' };
    }

    return { status: 'present', fingerprint: { codeVersion, configHash, specificationHash } };
  }

  /**
   * True when never processed, or when any fingerprint component changed
   */
  async needsProcessing(dataset: DatasetName, resource: ResourceId, current: Fingerprint): Promise<boolean> {
    const stored = await this.readFingerprint(dataset, resource);
    if (stored.status !== 'present') return true;
    return !fingerprintsEqual(stored.fingerprint, current);
  }

  /**
   * Split a task list into tasks to run and tasks already up to date
   *
   * Order within each half follows the input. At most `maxConcurrentReads`
   * logs are open at once.
   */
  async filterTasks(tasks: TaskList, current: Fingerprint): Promise<FilterResult> {
    const verdicts = await mapBounded(
      tasks,
      this.maxConcurrentReads,
      (task) => this.needsProcessing(task.dataset, task.resource, current),
      'staleness'
    );

    const pending: Task[] = [];
    const skipped: Task[] = [];
    tasks.forEach((task, i) => (verdicts[i] ? pending : skipped).push(task));

    return { pending, skipped };
  }

  /**
   * Write (or overwrite) the fingerprint for a pair after a successful run
   *
   * Columns the transform engine already wrote into the log are preserved.
   */
  async record(dataset: DatasetName, resource: ResourceId, fingerprint: Fingerprint): Promise<void> {
    const existing = await this.readLog(dataset, resource);
    const fields = existing?.fields.length ? [...existing.fields] : ['dataset', 'resource'];

    for (const column of Object.values(FINGERPRINT_COLUMNS)) {
      if (!fields.includes(column)) fields.push(column);
    }

    const base: LogRow = existing?.rows[0] ?? { dataset, resource };
    const row: LogRow = {
      ...base,
      [FINGERPRINT_COLUMNS.codeVersion]: fingerprint.codeVersion,
      [FINGERPRINT_COLUMNS.configHash]: fingerprint.configHash,
      [FINGERPRINT_COLUMNS.specificationHash]: fingerprint.specificationHash,
    };

    const csv = Papa.unparse([row], { columns: fields, newline: '\n' });
    await atomicWriteFile(this.logPath(dataset, resource), `${csv}\n`);
  }
}

/**
 * Fingerprint of the current pipeline configuration, specification and code
 */
export async function computeFingerprint(options: {
  readonly pipelineDir: string;
  readonly specificationDir: string;
  readonly codeVersion: string;
}): Promise<Fingerprint> {
  const [configHash, specificationHash] = await Promise.all([
    hashDirectory(options.pipelineDir),
    hashDirectory(options.specificationDir),
  ]);
  return { configHash, specificationHash, codeVersion: options.codeVersion };
}
