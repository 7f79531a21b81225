/**
 * Scan of the current store: which keys exist and which are due for refresh.
 */

import * as fs from "fs";
import type { ErrorCounter } from "./counters";
import { parseRecord, readLines } from "./ndjson";
import { isDueFromRecord } from "./refresh-policy";
import { encodeKey, type EntityDescriptor, type IdentityKey } from "./types";

export const MALFORMED_LOCAL_RECORD = "malformed_local_record";

export interface ExistingState {
  /** Encoded keys of every valid stored line */
  keys: Set<string>;
  /** Keys the policy selected for refresh, by encoded form */
  due: Map<string, IdentityKey>;
  /** Valid lines seen */
  lines: number;
}

/**
 * Stream the store once. Lines that are not JSON objects or carry no
 * identity key are skipped and counted under `malformed_local_record`.
 * A missing store is an empty one.
 */
export async function scanExistingStore(
  storePath: string,
  entity: Pick<EntityDescriptor, "keyOf" | "refresh">,
  today: number,
  warnings: ErrorCounter,
): Promise<ExistingState> {
  const state: ExistingState = { keys: new Set(), due: new Map(), lines: 0 };
  if (!fs.existsSync(storePath)) return state;

  for await (const line of readLines(storePath)) {
    if (line.trim() === "") continue;

    const record = parseRecord(line);
    const key = record ? entity.keyOf(record) : null;
    if (!record || !key) {
      warnings.inc(MALFORMED_LOCAL_RECORD);
      continue;
    }

    const encoded = encodeKey(key);
    state.keys.add(encoded);
    state.lines++;

    if (isDueFromRecord(entity.refresh, record, today)) {
      state.due.set(encoded, key);
    }
  }

  return state;
}
