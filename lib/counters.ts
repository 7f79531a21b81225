/**
 * Run counters: failure categories and live progress.
 *
 * Workers only touch these from synchronous code between awaits, so each
 * increment is atomic with respect to the event loop.
 */

// ---------------------------------------------------------------------------
// Error categories
// ---------------------------------------------------------------------------

export class ErrorCounter {
  private readonly counts = new Map<string, number>();

  inc(category: string, by = 1): void {
    this.counts.set(category, (this.counts.get(category) ?? 0) + by);
  }

  /** Snapshot sorted by category name. */
  entries(): Array<[string, number]> {
    return [...this.counts.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  total(): number {
    let sum = 0;
    for (const value of this.counts.values()) sum += value;
    return sum;
  }
}

// ---------------------------------------------------------------------------
// Progress
// ---------------------------------------------------------------------------

export type ProgressKey = "processed" | "ok" | "total" | "added" | "updated" | "errors";

export type ProgressState = Record<ProgressKey, number>;

export interface ProgressReporterOptions {
  label: string;
  /** Where the live line goes. Defaults to stderr when it is a TTY. */
  write?: ((text: string) => void) | null;
  /** Minimum gap between two renders, except the final one */
  intervalMs?: number;
  now?: () => number;
}

export class ProgressReporter {
  private readonly state: ProgressState = {
    processed: 0,
    ok: 0,
    total: 0,
    added: 0,
    updated: 0,
    errors: 0,
  };
  private readonly label: string;
  private readonly write: ((text: string) => void) | null;
  private readonly intervalMs: number;
  private readonly now: () => number;
  private lastRender = Number.NEGATIVE_INFINITY;

  constructor(options: ProgressReporterOptions) {
    this.label = options.label;
    this.write =
      options.write !== undefined
        ? options.write
        : process.stderr.isTTY
          ? (text) => process.stderr.write(text)
          : null;
    this.intervalMs = options.intervalMs ?? 100;
    this.now = options.now ?? (() => Date.now());
  }

  set(key: ProgressKey, value: number): void {
    this.state[key] = value;
  }

  inc(key: ProgressKey, by = 1): void {
    this.state[key] += by;
  }

  render(): string {
    const s = this.state;
    return `[${this.label}] ${s.processed}/${s.total} | ok=${s.ok} | added=${s.added} | updated=${s.updated} | errors=${s.errors}`;
  }

  /** Redraw the live line in place. Throttled unless `force` is set. */
  print(force = false): void {
    if (!this.write) return;
    const now = this.now();
    if (!force && now - this.lastRender < this.intervalMs) return;
    this.lastRender = now;
    this.write(`\r${this.render()}`);
  }

  /** Final render followed by a newline so later logs start clean. */
  finish(): void {
    if (!this.write) return;
    this.print(true);
    this.write("\n");
  }
}
