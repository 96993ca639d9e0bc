/**
 * Bounded async worker pool for ingestion.
 */
import * as os from 'node:os';
import type { Deadline } from '../deadline.js';
import { DeadlineError } from '../../utils/errors.js';

/**
 * 75% of available CPUs, clamped to [2, 16].
 */
export function defaultConcurrency(): number {
  return Math.min(Math.max(Math.floor(os.cpus().length * 0.75), 2), 16);
}

/**
 * Run `worker` over every item with at most `concurrency` calls in flight.
 * Each result lands in the slot of its item, so output order never depends
 * on completion order.
 *
 * The deadline is checked before each item is scheduled and again once all
 * items are done. When it passes while work is in flight the pool rejects
 * with a DeadlineError right away; in-flight work is abandoned and nothing
 * further is scheduled. A worker error stops scheduling and is rethrown after
 * in-flight work settles. Partial results are never returned.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  deadline?: Deadline
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let cursor = 0;
  let abandoned = false;
  const failures: unknown[] = [];

  const runWorker = async (): Promise<void> => {
    while (!abandoned && failures.length === 0 && cursor < items.length) {
      const index = cursor++;
      try {
        deadline?.check('ingestion');
        results[index] = await worker(items[index], index);
      } catch (error) {
        failures.push(error);
      }
    }
  };

  const workerCount = Math.max(1, Math.min(concurrency, items.length));
  const work = Promise.all(Array.from({ length: workerCount }, runWorker));

  if (deadline) {
    await raceDeadline(work, deadline, () => {
      abandoned = true;
    });
  } else {
    await work;
  }

  if (failures.length > 0) {
    throw failures[0];
  }
  deadline?.check('ingestion');
  return results;
}

async function raceDeadline(work: Promise<unknown>, deadline: Deadline, onExpire: () => void): Promise<void> {
  const remaining = deadline.remainingMs();
  if (remaining === undefined) {
    await work;
    return;
  }

  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const expiry = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      onExpire();
      reject(new DeadlineError('ingestion', deadline.elapsedMs()));
    }, remaining);
  });

  try {
    await Promise.race([work, expiry]);
  } finally {
    clearTimeout(timeoutId);
  }
}
