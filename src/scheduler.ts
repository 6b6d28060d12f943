/**
 * Bounded-concurrency batch runner.
 *
 * Work items are dispatched in submission order with at most `concurrency`
 * in flight. Each task carries its submission index, and results are rebuilt
 * in submission order from those tags, never from arrival order.
 */

import { ConfigurationError } from "./errors.js";

/**
 * `pool` keeps up to `concurrency` tasks running and refills as each one
 * finishes. `chunked` runs fixed chunks of `concurrency` tasks and waits for
 * a whole chunk before starting the next.
 */
export type Discipline = "pool" | "chunked";

export const DISCIPLINES: readonly Discipline[] = ["pool", "chunked"];

export interface BatchOptions {
  concurrency: number;
  discipline?: Discipline;
  onSettled?: (completed: number, total: number) => void;
}

export type Worker<T, R> = (item: T, index: number) => Promise<R>;

type Outcome<R> =
  | { index: number; ok: true; value: R }
  | { index: number; ok: false; error: unknown };

async function settle<T, R>(item: T, index: number, worker: Worker<T, R>): Promise<Outcome<R>> {
  try {
    return { index, ok: true, value: await worker(item, index) };
  } catch (error) {
    return { index, ok: false, error };
  }
}

export function isDiscipline(value: string): value is Discipline {
  return DISCIPLINES.some((d) => d === value);
}

/**
 * Run `worker` over every item and resolve with the results in submission
 * order. The first failure stops further dispatch; tasks already running are
 * awaited, their results and errors dropped, and the batch rejects with that
 * first failure.
 */
export async function runBatch<T, R>(
  items: readonly T[],
  worker: Worker<T, R>,
  options: BatchOptions,
): Promise<R[]> {
  const { concurrency, discipline = "pool", onSettled } = options;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigurationError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const results = new Map<number, { value: R }>();
  const failures: unknown[] = [];
  let completed = 0;

  const record = (outcome: Outcome<R>): void => {
    completed++;
    if (!outcome.ok) {
      failures.push(outcome.error);
    } else if (failures.length === 0) {
      results.set(outcome.index, { value: outcome.value });
    }
    onSettled?.(completed, items.length);
  };

  if (discipline === "chunked") {
    for (let start = 0; start < items.length && failures.length === 0; start += concurrency) {
      const chunk = items.slice(start, start + concurrency);
      await Promise.all(chunk.map((item, i) => settle(item, start + i, worker).then(record)));
    }
  } else {
    let next = 0;
    const running = new Set<Promise<void>>();

    while ((next < items.length && failures.length === 0) || running.size > 0) {
      // Fill up to concurrency limit
      while (next < items.length && failures.length === 0 && running.size < concurrency) {
        const index = next++;
        const promise: Promise<void> = settle(items[index], index, worker).then((outcome) => {
          running.delete(promise);
          record(outcome);
        });
        running.add(promise);
      }

      if (running.size > 0) {
        await Promise.race(running);
      }
    }
  }

  if (failures.length > 0) {
    throw failures[0];
  }

  return items.map((_, index) => {
    const slot = results.get(index);
    if (!slot) {
      throw new Error(`no result recorded for work item ${index}`);
    }
    return slot.value;
  });
}
