/**
 * NDJSON store helpers: one compact JSON object per line, UTF-8.
 */

import * as fs from "fs";
import * as readline from "readline";

/** A parsed store line or a projected row. Field values are whatever JSON held. */
export type JsonRecord = Record<string, unknown>;

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Parse one store line. Returns null for anything that is not a JSON object. */
export function parseRecord(line: string): JsonRecord | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  return isPlainObject(parsed) ? parsed : null;
}

export function serializeRecord(record: JsonRecord): string {
  return `${JSON.stringify(record)}\n`;
}

/**
 * Stream a file line by line without its trailing newline.
 * Blank lines are yielded too; callers decide whether they count.
 */
export async function* readLines(filePath: string): AsyncGenerator<string> {
  const input = fs.createReadStream(filePath, { encoding: "utf-8" });
  const lines = readline.createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of lines) {
      yield line;
    }
  } finally {
    lines.close();
    input.destroy();
  }
}
