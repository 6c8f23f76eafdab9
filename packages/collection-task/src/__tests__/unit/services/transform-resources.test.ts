/**
 * Transform Resources Workflow Tests
 *
 * Shard window, staleness skipping, redirect handling and fingerprint
 * recording, with an in-process engine.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import type { TransformDirs } from '../../../core/config.js';
import { TaskRangeError } from '../../../core/errors.js';
import { buildTransformRequest, transformResources } from '../../../services/transform-resources.js';
import { StalenessFilter } from '../../../tasks/staleness-filter.js';
import {
  FakeEngine,
  SAMPLE_INDEX,
  createRecordingLogger,
  createTempDir,
  makeCollection,
  removeTempDir,
} from '../../utils/index.js';

function dirsIn(root: string): TransformDirs {
  return {
    pipelineDir: join(root, 'pipeline'),
    specificationDir: join(root, 'specification'),
    cacheDir: join(root, 'var/cache'),
    transformedDir: join(root, 'transformed'),
    issueDir: join(root, 'issue'),
    operationalIssueDir: join(root, 'performance/operational_issue'),
    outputLogDir: join(root, 'log'),
    columnFieldDir: join(root, 'var/column-field'),
    datasetResourceDir: join(root, 'var/dataset-resource'),
    convertedResourceDir: join(root, 'var/converted-resource'),
  };
}

describe('transformResources', () => {
  let dir: string;
  let dirs: TransformDirs;

  beforeEach(async () => {
    dir = await createTempDir();
    dirs = dirsIn(dir);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should skip removed resources and process the rest', async () => {
    const collection = makeCollection({
      index: SAMPLE_INDEX,
      redirects: [{ oldResource: 'r1', resource: '', status: '410' }],
      directory: join(dir, 'collection'),
    });
    const engine = new FakeEngine();
    const { logger, messages } = createRecordingLogger();

    const result = await transformResources({ collection, engine, dirs, logger, maxWorkers: 2 });

    expect(result).toEqual({
      totalTasks: 3,
      shardTasks: 3,
      upToDate: 0,
      removed: 2,
      run: { kind: 'completed', successful: 1, failed: 0, errors: [] },
    });
    expect(engine.requests.map((request) => request.inputPath)).toEqual([join(dir, 'collection/resource/r3')]);
    expect(messages('info')).toContain('Processing 1 of 3 total tasks');
    expect(messages('info')).toContain('Skipping removed resource: r1');
  });

  it('should slice the canonical list before filtering', async () => {
    const collection = makeCollection({ index: SAMPLE_INDEX, directory: join(dir, 'collection') });
    const engine = new FakeEngine();

    const result = await transformResources({ collection, engine, dirs, offset: 1, limit: 1, maxWorkers: 1 });

    expect(result.shardTasks).toBe(1);
    expect(engine.requests.map((request) => `${request.dataset}:${request.outputPath}`)).toEqual([
      `ds-a:${join(dir, 'transformed/ds-a/r3.csv')}`,
    ]);
  });

  it('should skip up-to-date tasks on a second run', async () => {
    const collection = makeCollection({ index: SAMPLE_INDEX, directory: join(dir, 'collection') });
    const engine = new FakeEngine();
    await transformResources({ collection, engine, dirs, maxWorkers: 2 });
    const { logger, messages } = createRecordingLogger();

    const second = await transformResources({ collection, engine, dirs, logger, maxWorkers: 2 });

    expect(second.upToDate).toBe(3);
    expect(second.run).toEqual({ kind: 'noop' });
    expect(engine.requests).toHaveLength(3);
    expect(messages('info')).toContain('Skipping 3 already up-to-date resources, 0 to process');
    expect(messages('warn')).toEqual(['No transformation tasks to process after applying filters']);
  });

  it('should run everything again when reprocessing', async () => {
    const collection = makeCollection({ index: SAMPLE_INDEX, directory: join(dir, 'collection') });
    const engine = new FakeEngine();
    await transformResources({ collection, engine, dirs, maxWorkers: 2 });

    const again = await transformResources({ collection, engine, dirs, reprocess: true, maxWorkers: 2 });

    expect(again.upToDate).toBe(0);
    expect(again.run).toEqual({ kind: 'completed', successful: 3, failed: 0, errors: [] });
  });

  it('should rerun tasks after the code version changes', async () => {
    const collection = makeCollection({ index: SAMPLE_INDEX, directory: join(dir, 'collection') });
    await transformResources({ collection, engine: new FakeEngine({ codeVersion: '1.0.0' }), dirs, maxWorkers: 2 });

    const upgraded = new FakeEngine({ codeVersion: '1.1.0' });
    const result = await transformResources({ collection, engine: upgraded, dirs, maxWorkers: 2 });

    expect(result.upToDate).toBe(0);
    expect(upgraded.requests).toHaveLength(3);
  });

  it('should record fingerprints only for successful tasks', async () => {
    const collection = makeCollection({ index: SAMPLE_INDEX, directory: join(dir, 'collection') });
    const engine = new FakeEngine({ failingDatasets: ['ds-b'] });

    const result = await transformResources({ collection, engine, dirs, maxWorkers: 2 });

    expect(result.run).toEqual({
      kind: 'completed',
      successful: 2,
      failed: 1,
      errors: [{ taskId: 'ds-b/r1', dataset: 'ds-b', resource: 'r1', message: 'pipeline failed for ds-b' }],
    });
    const staleness = new StalenessFilter(dirs.datasetResourceDir);
    expect((await staleness.readFingerprint('ds-a', 'r1')).status).toBe('present');
    expect((await staleness.readFingerprint('ds-b', 'r1')).status).toBe('missing');
  });

  it('should read redirected input but name outputs after the requested resource', async () => {
    const collection = makeCollection({
      index: { 'ds-a': ['r1'] },
      redirects: [{ oldResource: 'r1', resource: 'r9', status: '301' }],
      metadata: { r1: { endpoints: ['e1'], organisations: ['org-1'], startDate: '2024-01-01' } },
      directory: join(dir, 'collection'),
    });
    const engine = new FakeEngine();

    await transformResources({ collection, engine, dirs, maxWorkers: 1 });

    expect(engine.requests).toHaveLength(1);
    expect(engine.requests[0]).toMatchObject({
      dataset: 'ds-a',
      inputPath: join(dir, 'collection/resource/r9'),
      outputPath: join(dir, 'transformed/ds-a/r1.csv'),
      resource: 'r1',
      endpoints: ['e1'],
      organisations: ['org-1'],
      entryDate: '2024-01-01',
    });
  });

  it('should raise TaskRangeError for an offset past the end', async () => {
    const collection = makeCollection({ index: SAMPLE_INDEX, directory: join(dir, 'collection') });

    await expect(
      transformResources({ collection, engine: new FakeEngine(), dirs, offset: 3 })
    ).rejects.toBeInstanceOf(TaskRangeError);
  });
});

describe('buildTransformRequest', () => {
  it('should derive per-dataset directories and cache paths', () => {
    const collection = makeCollection({ index: SAMPLE_INDEX });
    const dirs = dirsIn('/work');

    const request = buildTransformRequest(
      { task: { dataset: 'ds-a', resource: 'r3' }, physical: 'r3' },
      collection,
      dirs
    );

    expect(request).toEqual({
      dataset: 'ds-a',
      inputPath: 'collection/resource/r3',
      outputPath: '/work/transformed/ds-a/r3.csv',
      resource: undefined,
      pipelineDir: '/work/pipeline',
      specificationDir: '/work/specification',
      collectionDir: 'collection/',
      cacheDir: '/work/var/cache',
      issueDir: '/work/issue/ds-a',
      operationalIssueDir: '/work/performance/operational_issue',
      outputLogDir: '/work/log',
      columnFieldDir: '/work/var/column-field/ds-a',
      datasetResourceDir: '/work/var/dataset-resource/ds-a',
      convertedResourceDir: '/work/var/converted-resource/ds-a',
      configPath: '/work/var/cache/config.sqlite3',
      organisationPath: '/work/var/cache/organisation.csv',
      endpoints: [],
      organisations: [],
      entryDate: '',
    });
  });
});
