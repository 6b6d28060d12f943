import { describe, it, expect } from "vitest";
import { runBatch, isDiscipline, type Discipline } from "../scheduler.js";
import { ConfigurationError } from "../errors.js";

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function tracker() {
  let inFlight = 0;
  let maxInFlight = 0;
  const started: number[] = [];
  const finished = new Set<number>();
  const finishedBeforeStart = new Map<number, number>();

  return {
    started,
    finished,
    finishedBeforeStart,
    get maxInFlight() {
      return maxInFlight;
    },
    async run(item: number, index: number, ms: number): Promise<number> {
      started.push(index);
      finishedBeforeStart.set(index, finished.size);
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await delay(ms);
      inFlight--;
      finished.add(index);
      return item * 10;
    },
  };
}

describe("runBatch", () => {
  const disciplines: Discipline[] = ["pool", "chunked"];

  for (const discipline of disciplines) {
    describe(`${discipline} discipline`, () => {
      for (const [count, concurrency] of [
        [1, 1],
        [7, 3],
        [10, 10],
        [5, 20],
      ]) {
        it(`returns ${count} results in submission order with concurrency ${concurrency}`, async () => {
          const t = tracker();
          const items = Array.from({ length: count }, (_, i) => i + 1);

          // Later items finish first
          const results = await runBatch(items, (item, index) => t.run(item, index, (count - index) * 3), {
            concurrency,
            discipline,
          });

          expect(results).toEqual(items.map((i) => i * 10));
          expect(t.maxInFlight).toBeLessThanOrEqual(concurrency);
          expect(t.maxInFlight).toBe(Math.min(count, concurrency));
        });
      }

      it("dispatches in submission order", async () => {
        const t = tracker();
        await runBatch([1, 2, 3, 4, 5, 6], (item, index) => t.run(item, index, 2), {
          concurrency: 2,
          discipline,
        });
        expect(t.started).toEqual([0, 1, 2, 3, 4, 5]);
      });

      it("surfaces the first failure and drops sibling results", async () => {
        const failure = new Error("trial 2 failed");
        const settled: number[] = [];

        const promise = runBatch(
          [1, 2, 3, 4, 5, 6],
          async (item) => {
            if (item === 2) {
              await delay(1);
              throw failure;
            }
            if (item === 1) {
              await delay(15);
              throw new Error("later failure");
            }
            await delay(5);
            return item;
          },
          { concurrency: 2, discipline, onSettled: (completed) => settled.push(completed) },
        );

        await expect(promise).rejects.toBe(failure);
        // Items 1 and 2 were in flight; nothing was dispatched after the failure
        expect(settled).toEqual([1, 2]);
      });

      it("reports progress once per item", async () => {
        const progress: Array<[number, number]> = [];
        await runBatch([1, 2, 3], async (item) => item, {
          concurrency: 2,
          discipline,
          onSettled: (completed, total) => progress.push([completed, total]),
        });
        expect(progress).toEqual([
          [1, 3],
          [2, 3],
          [3, 3],
        ]);
      });
    });
  }

  it("keeps the pool full as soon as a slot frees up", async () => {
    const t = tracker();
    const durations = [30, 5, 30, 30];
    await runBatch([1, 2, 3, 4], (item, index) => t.run(item, index, durations[index]), {
      concurrency: 2,
      discipline: "pool",
    });
    // Item 2 starts when item 1 (5ms) is done, while item 0 is still running
    expect(t.finishedBeforeStart.get(2)).toBe(1);
  });

  it("waits for a whole chunk before starting the next", async () => {
    const t = tracker();
    const durations = [30, 5, 5, 5, 5, 5, 5];
    await runBatch([1, 2, 3, 4, 5, 6, 7], (item, index) => t.run(item, index, durations[index]), {
      concurrency: 3,
      discipline: "chunked",
    });
    expect(t.finishedBeforeStart.get(3)).toBe(3);
    expect(t.finishedBeforeStart.get(5)).toBe(3);
    expect(t.finishedBeforeStart.get(6)).toBe(6);
  });

  it("returns an empty result for an empty batch", async () => {
    await expect(runBatch([], async (item: number) => item, { concurrency: 4 })).resolves.toEqual([]);
  });

  it("preserves results that are themselves undefined", async () => {
    const results = await runBatch([1, 2], async () => undefined, { concurrency: 2 });
    expect(results).toEqual([undefined, undefined]);
  });

  it("rejects a concurrency below one", async () => {
    await expect(runBatch([1], async (item) => item, { concurrency: 0 })).rejects.toBeInstanceOf(
      ConfigurationError,
    );
    await expect(runBatch([1], async (item) => item, { concurrency: 1.5 })).rejects.toBeInstanceOf(
      ConfigurationError,
    );
  });
});

describe("isDiscipline", () => {
  it("accepts only known disciplines", () => {
    expect(isDiscipline("pool")).toBe(true);
    expect(isDiscipline("chunked")).toBe(true);
    expect(isDiscipline("lifo")).toBe(false);
  });
});
