/**
 * Sliding-window fetch scheduler.
 *
 * A pool of `maxWorkers` runs the tasks; up to `maxInFlight` tasks are
 * admitted at once. Each completion immediately admits the next pending item,
 * so the window stays full instead of draining batch by batch. Results are
 * handed to `onResult` in completion order.
 *
 * There is no cancellation of running work. If a task throws, admission
 * stops, tasks still waiting for a worker are skipped, running ones drain, and
 * the first error is rethrown.
 */

export interface SchedulerOptions {
  maxWorkers: number;
  maxInFlight: number;
}

type Settled<T, R> =
  | { id: number; item: T; status: "done"; value: R }
  | { id: number; item: T; status: "failed" }
  | { id: number; item: T; status: "skipped" };

// ---------------------------------------------------------------------------
// Worker pool
// ---------------------------------------------------------------------------

export class Semaphore {
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(private readonly limit: number) {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new RangeError(`Semaphore limit must be a positive integer (got ${limit})`);
    }
  }

  async run<R>(task: () => Promise<R>): Promise<R> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.limit) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  private release(): void {
    const next = this.waiters.shift();
    // Hand the slot straight to the next waiter
    if (next) next();
    else this.active--;
  }
}

// ---------------------------------------------------------------------------
// Scheduler
// ---------------------------------------------------------------------------

export async function runSlidingWindow<T, R>(
  items: Iterable<T>,
  work: (item: T) => Promise<R>,
  onResult: (item: T, result: R) => void | Promise<void>,
  options: SchedulerOptions,
): Promise<void> {
  if (!Number.isInteger(options.maxInFlight) || options.maxInFlight <= 0) {
    throw new RangeError(`maxInFlight must be a positive integer (got ${options.maxInFlight})`);
  }

  const iterator = items[Symbol.iterator]();
  const pool = new Semaphore(options.maxWorkers);
  const inFlight = new Map<number, Promise<Settled<T, R>>>();
  let failure: { error: unknown } | null = null;
  let nextId = 0;

  // Runs inside the worker slot: the failure is recorded before the slot is
  // handed on, so queued tasks see it when their turn comes
  const guarded = async (id: number, item: T): Promise<Settled<T, R>> => {
    if (failure) return { id, item, status: "skipped" };
    try {
      return { id, item, status: "done", value: await work(item) };
    } catch (error) {
      failure ??= { error };
      return { id, item, status: "failed" };
    }
  };

  const admit = (): boolean => {
    if (failure) return false;
    const step = iterator.next();
    if (step.done) return false;

    const id = nextId++;
    const item = step.value;
    inFlight.set(id, pool.run(() => guarded(id, item)));
    return true;
  };

  // Prime the window
  for (let i = 0; i < options.maxInFlight; i++) {
    if (!admit()) break;
  }

  while (inFlight.size > 0) {
    const settled = await Promise.race(inFlight.values());
    inFlight.delete(settled.id);

    if (settled.status === "done") {
      try {
        await onResult(settled.item, settled.value);
      } catch (error) {
        failure ??= { error };
      }
    }

    admit();
  }

  if (failure) throw failure.error;
}
