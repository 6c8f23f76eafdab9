/**
 * Task Runner Tests
 *
 * Failure isolation, pool bound, noop detection and summary logging.
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../../core/errors.js';
import type { Task } from '../../../core/types.js';
import { TaskRunner } from '../../../execution/task-runner.js';
import { createRecordingLogger } from '../../utils/index.js';

const TASKS: Task[] = [
  { dataset: 'ds-a', resource: 'r1' },
  { dataset: 'ds-a', resource: 'r3' },
  { dataset: 'ds-b', resource: 'r1' },
];

describe('TaskRunner', () => {
  it('should return noop without calling the worker for an empty list', async () => {
    const runner = new TaskRunner();
    let calls = 0;

    const result = await runner.run([], async () => {
      calls++;
      return undefined;
    });

    expect(result).toEqual({ kind: 'noop' });
    expect(calls).toBe(0);
  });

  it('should count every task as successful when workers resolve', async () => {
    const runner = new TaskRunner();
    const seen: string[] = [];

    const result = await runner.run(
      TASKS,
      async (task) => {
        seen.push(`${task.dataset}/${task.resource}`);
        return { ok: true };
      },
      { maxWorkers: 2 }
    );

    expect(result).toEqual({ kind: 'completed', successful: 3, failed: 0, errors: [] });
    expect(seen.sort()).toEqual(['ds-a/r1', 'ds-a/r3', 'ds-b/r1']);
  });

  it('should isolate thrown errors and reported failures', async () => {
    const { logger, messages } = createRecordingLogger();
    const runner = new TaskRunner({ logger });

    const result = await runner.run(
      TASKS,
      async (task) => {
        if (task.dataset === 'ds-b') throw new Error('engine crashed');
        if (task.resource === 'r3') return { ok: false, message: 'bad input' };
        return undefined;
      },
      { maxWorkers: 1 }
    );

    expect(result).toEqual({
      kind: 'completed',
      successful: 1,
      failed: 2,
      errors: [
        { taskId: 'ds-a/r3', dataset: 'ds-a', resource: 'r3', message: 'bad input' },
        { taskId: 'ds-b/r1', dataset: 'ds-b', resource: 'r1', message: 'engine crashed' },
      ],
    });
    expect(messages()).toEqual([
      'Using 1 worker processes',
      'Error processing r3 for dataset ds-a: bad input',
      'Error processing r1 for dataset ds-b: engine crashed',
      'Processing complete: 1 successful, 2 failed',
      'Failed resources:',
      '  - ds-a/r3: bad input',
      '  - ds-b/r1: engine crashed',
    ]);
  });

  it('should never run more than maxWorkers at once', async () => {
    const runner = new TaskRunner();
    let active = 0;
    let peak = 0;
    const tasks = Array.from({ length: 7 }, (_, i) => ({ dataset: 'd', resource: `r${i}` }));

    await runner.run(
      tasks,
      async () => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active--;
        return undefined;
      },
      { maxWorkers: 2 }
    );

    expect(peak).toBe(2);
  });

  it('should reject an invalid pool size', async () => {
    const runner = new TaskRunner();

    await expect(runner.run(TASKS, async () => undefined, { maxWorkers: 0 })).rejects.toBeInstanceOf(
      ConfigurationError
    );
  });
});
