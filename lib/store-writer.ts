/**
 * Atomic merge of a store: retained lines and fresh rows are written to
 * `<store>.tmp`, which is then renamed over the store.
 *
 * rename() is only atomic within one filesystem, so the temp file always sits
 * in the store's own directory. Until commit() readers see the old store;
 * after it they see the new one. abort() removes the temp file and leaves the
 * store untouched.
 */

import * as fs from "fs";
import type { FileHandle } from "fs/promises";
import * as path from "path";
import { parseRecord, readLines, serializeRecord, type JsonRecord } from "./ndjson";
import { encodeKey, type IdentityKey } from "./types";

const COPY_CHUNK_BYTES = 64 * 1024;

export interface RetainResult {
  /** Lines copied through unchanged */
  retained: number;
  /** Lines left out because their key is being refetched */
  replaced: number;
  /** Unparseable or key-less lines dropped */
  skipped: number;
}

export class AtomicMergeWriter {
  readonly storePath: string;
  readonly tmpPath: string;
  private handle: FileHandle | null;
  // Every append goes through this chain so lines never interleave
  private chain: Promise<void> = Promise.resolve();
  private appended = 0;

  private constructor(storePath: string, handle: FileHandle) {
    this.storePath = storePath;
    this.tmpPath = `${storePath}.tmp`;
    this.handle = handle;
  }

  /** Create (or truncate a leftover) temp file beside the store. */
  static async open(storePath: string): Promise<AtomicMergeWriter> {
    await fs.promises.mkdir(path.dirname(storePath), { recursive: true });
    const handle = await fs.promises.open(`${storePath}.tmp`, "w");
    return new AtomicMergeWriter(storePath, handle);
  }

  /** Rows appended so far */
  get appendedLines(): number {
    return this.appended;
  }

  /**
   * Copy every store line whose key is not in `replace`, byte for byte.
   * Must run before any append.
   */
  async copyRetained(
    keyOf: (record: JsonRecord) => IdentityKey | null,
    replace: ReadonlySet<string>,
  ): Promise<RetainResult> {
    const result: RetainResult = { retained: 0, replaced: 0, skipped: 0 };
    if (!fs.existsSync(this.storePath)) return result;

    let buffer: string[] = [];
    let bufferBytes = 0;

    for await (const line of readLines(this.storePath)) {
      if (line.trim() === "") continue;

      const record = parseRecord(line);
      const key = record ? keyOf(record) : null;
      if (!key) {
        result.skipped++;
        continue;
      }
      if (replace.has(encodeKey(key))) {
        result.replaced++;
        continue;
      }

      buffer.push(`${line}\n`);
      bufferBytes += line.length + 1;
      result.retained++;

      if (bufferBytes >= COPY_CHUNK_BYTES) {
        await this.write(buffer.join(""));
        buffer = [];
        bufferBytes = 0;
      }
    }

    if (buffer.length > 0) await this.write(buffer.join(""));
    return result;
  }

  /** Append projected rows as one serialized write. */
  append(rows: readonly JsonRecord[]): Promise<void> {
    if (rows.length === 0) return this.chain;
    const text = rows.map(serializeRecord).join("");
    this.appended += rows.length;
    const next = this.chain.then(() => this.write(text));
    this.chain = next;
    return next;
  }

  /** Flush, fsync and rename the temp file over the store. */
  async commit(): Promise<void> {
    const handle = this.requireHandle();
    await this.chain;
    await handle.sync();
    await handle.close();
    this.handle = null;
    await fs.promises.rename(this.tmpPath, this.storePath);
  }

  /** Drop the temp file; the store keeps its pre-run content. */
  async abort(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    if (handle) {
      // A failed append must not stop the cleanup
      await this.chain.catch((error: unknown) => {
        console.warn(`[store] Discarding failed write to ${this.tmpPath}:`, error);
      });
      await handle.close();
    }
    await fs.promises.rm(this.tmpPath, { force: true });
  }

  private async write(text: string): Promise<void> {
    await this.requireHandle().appendFile(text, "utf-8");
  }

  private requireHandle(): FileHandle {
    if (!this.handle) {
      throw new Error(`Store writer for ${this.storePath} is already closed`);
    }
    return this.handle;
  }
}
