/**
 * Test Fixtures
 *
 * Temp directories and in-memory collections.
 */

import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { Collection } from '../../collection/collection-loader.js';
import type { RedirectEntry, ResourceMetadata } from '../../core/types.js';

/**
 * Fresh temp directory; pair with `removeTempDir` in afterEach
 */
export async function createTempDir(prefix = 'collection-task-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Write a file, creating parent directories
 */
export async function writeFixture(path: string, contents: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, contents);
}

/**
 * The small collection used across workflow tests
 */
export const SAMPLE_INDEX: Readonly<Record<string, readonly string[]>> = {
  'ds-a': ['r3', 'r1'],
  'ds-b': ['r1'],
};

export function makeCollection(options: {
  readonly index: Readonly<Record<string, readonly string[]>>;
  readonly redirects?: readonly RedirectEntry[];
  readonly metadata?: Readonly<Record<string, ResourceMetadata>>;
  readonly directory?: string;
}): Collection {
  const datasets = new Map<string, ReadonlySet<string>>();
  for (const [dataset, resources] of Object.entries(options.index)) {
    datasets.set(dataset, new Set(resources));
  }
  return new Collection(
    options.directory ?? 'collection/',
    datasets,
    new Map(Object.entries(options.metadata ?? {})),
    options.redirects ?? []
  );
}
