import { describe, expect, it } from "vitest";
import { Semaphore, runSlidingWindow } from "../scheduler";

/** A promise the test resolves by hand. */
function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("Semaphore", () => {
  it("runs at most `limit` tasks at once", async () => {
    const pool = new Semaphore(2);
    let active = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 6 }, () =>
        pool.run(async () => {
          active++;
          peak = Math.max(peak, active);
          await tick();
          active--;
        }),
      ),
    );

    expect(peak).toBe(2);
  });
});

describe("runSlidingWindow", () => {
  it("processes every item and reports results in completion order", async () => {
    const gates = [deferred<void>(), deferred<void>(), deferred<void>()];
    const results: number[] = [];

    const run = runSlidingWindow(
      [0, 1, 2],
      async (i) => {
        await gates[i]?.promise;
        return i * 10;
      },
      (_item, value) => {
        results.push(value);
      },
      { maxWorkers: 3, maxInFlight: 3 },
    );

    gates[2]?.resolve();
    await tick();
    gates[0]?.resolve();
    await tick();
    gates[1]?.resolve();

    await run;
    expect(results).toEqual([20, 0, 10]);
  });

  it("admits the next item as soon as one completes", async () => {
    const gates = Array.from({ length: 5 }, () => deferred<void>());
    const started: number[] = [];

    const run = runSlidingWindow(
      [0, 1, 2, 3, 4],
      async (i) => {
        started.push(i);
        await gates[i]?.promise;
      },
      () => {},
      { maxWorkers: 2, maxInFlight: 2 },
    );

    await tick();
    expect(started).toEqual([0, 1]);

    // Finishing one task opens one slot, without waiting for the other
    gates[1]?.resolve();
    await tick();
    expect(started).toEqual([0, 1, 2]);

    for (const gate of gates) gate.resolve();
    await run;
    expect(started).toEqual([0, 1, 2, 3, 4]);
  });

  it("never runs more than maxWorkers tasks even with a wider window", async () => {
    let active = 0;
    let peak = 0;
    let completed = 0;

    await runSlidingWindow(
      Array.from({ length: 20 }, (_, i) => i),
      async () => {
        active++;
        peak = Math.max(peak, active);
        await tick();
        active--;
      },
      () => {
        completed++;
      },
      { maxWorkers: 3, maxInFlight: 8 },
    );

    expect(peak).toBe(3);
    expect(completed).toBe(20);
  });

  it("stops admitting after a failure, drains in-flight work and rethrows", async () => {
    const started: number[] = [];
    const finished: number[] = [];

    const run = runSlidingWindow(
      [0, 1, 2, 3, 4, 5],
      async (i) => {
        started.push(i);
        if (i === 0) throw new Error("token rejected");
        await tick();
        finished.push(i);
      },
      () => {},
      { maxWorkers: 3, maxInFlight: 3 },
    );

    await expect(run).rejects.toThrow("token rejected");
    // 1 and 2 were in flight with the failing task; nothing after was started
    expect(started).toEqual([0, 1, 2]);
    expect(finished).toEqual([1, 2]);
  });

  it("skips admitted tasks still waiting for a worker once one fails", async () => {
    const started: number[] = [];
    const results: number[] = [];

    const run = runSlidingWindow(
      [0, 1, 2, 3, 4, 5],
      async (i) => {
        started.push(i);
        if (i === 0) throw new Error("token rejected");
        return i;
      },
      (_item, value) => {
        results.push(value);
      },
      { maxWorkers: 1, maxInFlight: 4 },
    );

    await expect(run).rejects.toThrow("token rejected");
    // 1, 2 and 3 were admitted but queued behind the single worker
    expect(started).toEqual([0]);
    expect(results).toEqual([]);
  });

  it("treats an onResult error as a failure", async () => {
    const run = runSlidingWindow(
      [1, 2],
      async (i) => i,
      () => {
        throw new Error("disk full");
      },
      { maxWorkers: 1, maxInFlight: 1 },
    );

    await expect(run).rejects.toThrow("disk full");
  });
});
