/**
 * Staleness Filter Tests
 *
 * Validates fingerprint comparison against dataset resource logs on disk.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Fingerprint, Task } from '../../../core/types.js';
import { hashDirectory } from '../../../core/utils/hash-directory.js';
import {
  StalenessFilter,
  computeFingerprint,
  fingerprintsEqual,
} from '../../../tasks/staleness-filter.js';
import { createTempDir, removeTempDir, writeFixture } from '../../utils/index.js';

const CURRENT: Fingerprint = {
  codeVersion: '1.0.0',
  configHash: 'config-abc',
  specificationHash: 'spec-def',
};

describe('StalenessFilter', () => {
  let dir: string;
  let filter: StalenessFilter;

  beforeEach(async () => {
    dir = await createTempDir();
    filter = new StalenessFilter(join(dir, 'var/dataset-resource'));
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should place logs under <dir>/<dataset>/<resource>.csv', () => {
    expect(filter.logPath('ds-a', 'r1')).toBe(join(dir, 'var/dataset-resource/ds-a/r1.csv'));
  });

  it('should need processing when never run', async () => {
    expect(await filter.readFingerprint('ds-a', 'r1')).toEqual({ status: 'missing' });
    expect(await filter.needsProcessing('ds-a', 'r1', CURRENT)).toBe(true);
  });

  it('should not need processing after recording the same fingerprint', async () => {
    await filter.record('ds-a', 'r1', CURRENT);
    expect(await filter.needsProcessing('ds-a', 'r1', CURRENT)).toBe(false);
  });

  it.each([
    ['codeVersion', { ...CURRENT, codeVersion: '1.0.1' }],
    ['configHash', { ...CURRENT, configHash: 'config-changed' }],
    ['specificationHash', { ...CURRENT, specificationHash: 'spec-changed' }],
  ])('should need processing when %s changes', async (_name, changed) => {
    await filter.record('ds-a', 'r1', CURRENT);
    expect(await filter.needsProcessing('ds-a', 'r1', changed)).toBe(true);
  });

  it('should treat a log without fingerprint columns as a mismatch', async () => {
    await writeFixture(filter.logPath('ds-a', 'r1'), 'dataset,resource\nds-a,r1\n');

    expect(await filter.readFingerprint('ds-a', 'r1')).toEqual({ status: 'incomplete' });
    expect(await filter.needsProcessing('ds-a', 'r1', CURRENT)).toBe(true);
  });

  it('should read a fingerprint written by another tool', async () => {
    await writeFixture(
      filter.logPath('ds-a', 'r1'),
      'dataset,resource,code-version,config-hash,specification-hash,line-count\n' +
        'ds-a,r1,1.0.0,config-abc,spec-def,42\n'
    );

    expect(await filter.readFingerprint('ds-a', 'r1')).toEqual({ status: 'present', fingerprint: CURRENT });
  });

  it('should preserve other columns when recording', async () => {
    await writeFixture(filter.logPath('ds-a', 'r1'), 'dataset,resource,line-count\nds-a,r1,42\n');

    await filter.record('ds-a', 'r1', CURRENT);

    const text = await readFile(filter.logPath('ds-a', 'r1'), 'utf-8');
    expect(text).toBe(
      'dataset,resource,line-count,code-version,config-hash,specification-hash\n' +
        'ds-a,r1,42,1.0.0,config-abc,spec-def\n'
    );
  });

  it('should write a fresh log with dataset and resource columns', async () => {
    await filter.record('ds-b', 'r9', CURRENT);

    const text = await readFile(filter.logPath('ds-b', 'r9'), 'utf-8');
    expect(text).toBe(
      'dataset,resource,code-version,config-hash,specification-hash\n' +
        'ds-b,r9,1.0.0,config-abc,spec-def\n'
    );
  });

  it('should split tasks into pending and skipped in input order', async () => {
    await filter.record('ds-a', 'r3', CURRENT);

    const result = await filter.filterTasks(
      [
        { dataset: 'ds-a', resource: 'r1' },
        { dataset: 'ds-a', resource: 'r3' },
        { dataset: 'ds-b', resource: 'r1' },
      ],
      CURRENT
    );

    expect(result.pending).toEqual([
      { dataset: 'ds-a', resource: 'r1' },
      { dataset: 'ds-b', resource: 'r1' },
    ]);
    expect(result.skipped).toEqual([{ dataset: 'ds-a', resource: 'r3' }]);
  });

  it('should filter thousands of existing logs', async () => {
    const tasks: Task[] = Array.from({ length: 3000 }, (_, i) => ({ dataset: 'ds', resource: `r${i}` }));
    for (const task of tasks) {
      await filter.record(task.dataset, task.resource, CURRENT);
    }

    const result = await filter.filterTasks(tasks, CURRENT);

    expect(result.pending).toEqual([]);
    expect(result.skipped).toHaveLength(3000);
  }, 60_000);

  it('should keep log reads in flight under the configured cap', async () => {
    let active = 0;
    let peak = 0;

    class CountingFilter extends StalenessFilter {
      override async needsProcessing(dataset: string, resource: string, current: Fingerprint): Promise<boolean> {
        active++;
        peak = Math.max(peak, active);
        try {
          await new Promise((resolve) => setTimeout(resolve, 1));
          return await super.needsProcessing(dataset, resource, current);
        } finally {
          active--;
        }
      }
    }

    const counting = new CountingFilter(join(dir, 'var/dataset-resource'), { maxConcurrentReads: 8 });
    const tasks: Task[] = Array.from({ length: 50 }, (_, i) => ({ dataset: 'ds', resource: `r${i}` }));

    const result = await counting.filterTasks(tasks, CURRENT);

    expect(result.pending).toHaveLength(50);
    expect(peak).toBe(8);
  });
});

describe('fingerprintsEqual', () => {
  it('should compare all three components', () => {
    expect(fingerprintsEqual(CURRENT, { ...CURRENT })).toBe(true);
    expect(fingerprintsEqual(CURRENT, { ...CURRENT, configHash: 'x' })).toBe(false);
  });
});

describe('computeFingerprint', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should hash the pipeline and specification directories', async () => {
    await writeFixture(join(dir, 'pipeline/column.csv'), 'dataset,column\n');
    await writeFixture(join(dir, 'specification/field.csv'), 'field\n');

    const fingerprint = await computeFingerprint({
      pipelineDir: join(dir, 'pipeline'),
      specificationDir: join(dir, 'specification'),
      codeVersion: '2.0.0',
    });

    expect(fingerprint).toEqual({
      configHash: await hashDirectory(join(dir, 'pipeline')),
      specificationHash: await hashDirectory(join(dir, 'specification')),
      codeVersion: '2.0.0',
    });
  });

  it('should change when a pipeline file changes', async () => {
    await writeFixture(join(dir, 'pipeline/column.csv'), 'dataset,column\n');
    const options = {
      pipelineDir: join(dir, 'pipeline'),
      specificationDir: join(dir, 'specification'),
      codeVersion: '2.0.0',
    };
    const before = await computeFingerprint(options);

    await writeFixture(join(dir, 'pipeline/column.csv'), 'dataset,column,extra\n');
    const after = await computeFingerprint(options);

    expect(after.configHash).not.toBe(before.configHash);
    expect(after.specificationHash).toBe(before.specificationHash);
  });
});
