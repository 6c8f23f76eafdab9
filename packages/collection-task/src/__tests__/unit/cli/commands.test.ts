/**
 * CLI Command Tests
 *
 * Drives the commander program with injected dependencies and checks the
 * exit code each outcome maps to.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import type { Command } from 'commander';
import { createProgram, EXIT_CODES, type CliDependencies, type ExitCode } from '../../../cli/index.js';
import {
  FakeEngine,
  FakeTransport,
  MemoryStream,
  SAMPLE_INDEX,
  createRecordingLogger,
  createTempDir,
  fakeTransportSet,
  makeCollection,
  removeTempDir,
} from '../../utils/index.js';

interface Harness {
  readonly program: Command;
  readonly transport: FakeTransport;
  readonly engine: FakeEngine;
  readonly codes: ExitCode[];
  readonly messages: () => string[];
  readonly run: (...args: string[]) => Promise<void>;
}

function createHarness(engine = new FakeEngine()): Harness {
  const transport = new FakeTransport();
  const recording = createRecordingLogger();
  const codes: ExitCode[] = [];

  const deps: CliDependencies = {
    stream: new MemoryStream(false),
    createLogger: () => recording.logger,
    createTransports: () => fakeTransportSet(transport),
    loadCollection: async (collectionDir) => makeCollection({ index: SAMPLE_INDEX, directory: collectionDir }),
    createEngine: () => engine,
    setExitCode: (code) => {
      codes.push(code);
    },
  };

  const program = createProgram(deps, '1.2.3');
  for (const command of [program, ...program.commands]) {
    command.exitOverride();
    command.configureOutput({ writeOut: () => {}, writeErr: () => {} });
  }

  return {
    program,
    transport,
    engine,
    codes,
    messages: () => recording.messages(),
    run: async (...args) => {
      await program.parseAsync(['node', 'collection-task', ...args]);
    },
  };
}

function directoryArgs(root: string): string[] {
  return [
    '--pipeline-dir', join(root, 'pipeline'),
    '--specification-dir', join(root, 'specification'),
    '--cache-dir', join(root, 'var/cache'),
    '--transformed-dir', join(root, 'transformed'),
    '--issue-dir', join(root, 'issue'),
    '--operational-issue-dir', join(root, 'performance/operational_issue'),
    '--output-log-dir', join(root, 'log'),
    '--column-field-dir', join(root, 'var/column-field'),
    '--dataset-resource-dir', join(root, 'var/dataset-resource'),
    '--converted-resource-dir', join(root, 'var/converted-resource'),
  ];
}

describe('collection-task CLI', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should register every subcommand', () => {
    const { program } = createHarness();

    expect(program.commands.map((command) => command.name()).sort()).toEqual([
      'download-dataset-resource',
      'download-resources',
      'download-transformed',
      'transform-resources',
    ]);
  });

  describe('download-resources', () => {
    it('should download the shard and exit 0', async () => {
      const harness = createHarness();

      await harness.run(
        'download-resources',
        '--collection-dir', join(dir, 'collection'),
        '--bucket', 'open-data',
        '--collection-name', 'tree'
      );

      expect(harness.codes).toEqual([EXIT_CODES.SUCCESS]);
      expect(harness.transport.urls().sort()).toEqual([
        's3://open-data/tree-collection/collection/resource/r1',
        's3://open-data/tree-collection/collection/resource/r3',
      ]);
    });

    it('should exit 2 without a bucket or base URL', async () => {
      const harness = createHarness();

      await harness.run('download-resources', '--collection-dir', join(dir, 'collection'), '--collection-name', 'tree');

      expect(harness.codes).toEqual([EXIT_CODES.CONFIG_ERROR]);
      expect(harness.messages()).toContain('Error: Either bucket or base URL must be provided');
      expect(harness.transport.calls).toHaveLength(0);
    });

    it('should reject a non-integer offset before running', async () => {
      const harness = createHarness();

      await expect(
        harness.run('download-resources', '--collection-dir', dir, '--bucket', 'b', '--offset', 'abc')
      ).rejects.toThrow('Not an integer: abc');
      expect(harness.codes).toEqual([]);
    });
  });

  describe('transform-resources', () => {
    it('should exit 2 for an offset past the end of the task list', async () => {
      const harness = createHarness();

      await harness.run('transform-resources', '--collection-dir', join(dir, 'collection'), '--offset', '5');

      expect(harness.codes).toEqual([EXIT_CODES.CONFIG_ERROR]);
      expect(harness.messages()).toContain(
        'Error: Offset 5 is beyond the total number of transformation tasks (3)'
      );
      expect(harness.engine.requests).toHaveLength(0);
    });

    it('should exit 1 when any task failed', async () => {
      const harness = createHarness(new FakeEngine({ failingDatasets: ['ds-b'] }));

      await harness.run(
        'transform-resources',
        '--collection-dir', join(dir, 'collection'),
        '--max-workers', '2',
        ...directoryArgs(dir)
      );

      expect(harness.codes).toEqual([EXIT_CODES.FAILURES]);
      expect(harness.engine.requests).toHaveLength(3);
    });

    it('should exit 0 when every task succeeded', async () => {
      const harness = createHarness();

      await harness.run(
        'transform-resources',
        '--collection-dir', join(dir, 'collection'),
        '--dataset', 'ds-a',
        ...directoryArgs(dir)
      );

      expect(harness.codes).toEqual([EXIT_CODES.SUCCESS]);
      expect(harness.engine.requests.map((request) => request.outputPath)).toEqual(
        expect.arrayContaining([
          join(dir, 'transformed/ds-a/r1.csv'),
          join(dir, 'transformed/ds-a/r3.csv'),
        ])
      );
    });

    it('should exit 0 with nothing to do', async () => {
      const harness = createHarness();

      await harness.run(
        'transform-resources',
        '--collection-dir', join(dir, 'collection'),
        '--dataset', 'no-such-dataset',
        ...directoryArgs(dir)
      );

      expect(harness.codes).toEqual([EXIT_CODES.SUCCESS]);
      expect(harness.messages()).toContain('No transformation tasks to process');
    });
  });

  describe('download-dataset-resource', () => {
    it('should exit 0 and report logs that were downloaded', async () => {
      const harness = createHarness();

      await harness.run(
        'download-dataset-resource',
        '--collection-dir', join(dir, 'collection'),
        '--base-url', 'https://files.example.test',
        '--collection-name', 'tree',
        '--dataset-resource-dir', join(dir, 'var/dataset-resource')
      );

      expect(harness.codes).toEqual([EXIT_CODES.SUCCESS]);
      expect(harness.messages()).toContain('Done: 3 logs downloaded, 0 not found (will be processed)');
    });
  });
});
