/**
 * Building blocks for per-entity projections. All of them are total: any
 * input shape yields a value, absent fields become null and non-list fields
 * become empty lists.
 */

import { isPlainObject, type JsonRecord } from "./ndjson";

/** Top-level field of a payload, null when the payload or the field is absent. */
export function field(raw: unknown, name: string): unknown {
  if (!isPlainObject(raw)) return null;
  const value = raw[name];
  return value === undefined ? null : value;
}

/** Copy the named fields, in order. */
export function pick(raw: unknown, names: readonly string[]): JsonRecord {
  const out: JsonRecord = {};
  for (const name of names) out[name] = field(raw, name);
  return out;
}

/** Allow-listed sub-keys of every object item; non-object items are dropped. */
export function selectList(list: unknown, keys: readonly string[]): JsonRecord[] {
  if (!Array.isArray(list)) return [];
  const out: JsonRecord[] = [];
  for (const item of list) {
    if (isPlainObject(item)) out.push(pick(item, keys));
  }
  return out;
}

/**
 * Like selectList, but an item missing any `required` sub-key (absent or
 * null) is dropped.
 */
export function selectStrictList(
  list: unknown,
  keys: readonly string[],
  required: readonly string[],
): JsonRecord[] {
  if (!Array.isArray(list)) return [];
  const out: JsonRecord[] = [];
  for (const item of list) {
    if (!isPlainObject(item)) continue;
    if (required.some((key) => item[key] === undefined || item[key] === null)) continue;
    out.push(pick(item, keys));
  }
  return out;
}

/** Array field as-is, or [] when it is not an array. */
export function listField(raw: unknown, name: string): unknown[] {
  const value = field(raw, name);
  return Array.isArray(value) ? value : [];
}

/** Nested object field, or null. */
export function objectField(raw: unknown, name: string): JsonRecord | null {
  const value = field(raw, name);
  return isPlainObject(value) ? value : null;
}
