/**
 * Reconcile candidates with the existing store into one deduplicated work list.
 */

import type { ExistingState } from "./existing-state";
import { isDueFromCandidate } from "./refresh-policy";
import { encodeKey, type Candidate, type RefreshPolicy, type Target } from "./types";

export interface TargetSet {
  targets: Target[];
  /** Encoded keys of every target, for the merge writer's retain filter */
  keys: Set<string>;
  willAdd: number;
  willUpdate: number;
}

/**
 * Candidates come first, in order: absent keys as "new", present keys whose
 * parent date is in window as "stale". Keys the scan marked due follow.
 * Due keys no longer listed upstream are still refreshed.
 */
export function buildTargets(
  candidates: readonly Candidate[],
  existing: ExistingState,
  policy: RefreshPolicy,
  today: number,
): TargetSet {
  const targets: Target[] = [];
  const keys = new Set<string>();
  let willAdd = 0;
  let willUpdate = 0;

  for (const candidate of candidates) {
    const encoded = encodeKey(candidate.key);
    if (keys.has(encoded)) continue;

    if (!existing.keys.has(encoded)) {
      keys.add(encoded);
      targets.push({ key: candidate.key, kind: "new" });
      willAdd++;
    } else if (isDueFromCandidate(policy, candidate, today)) {
      keys.add(encoded);
      targets.push({ key: candidate.key, kind: "stale" });
      willUpdate++;
    }
  }

  for (const [encoded, key] of existing.due) {
    if (keys.has(encoded)) continue;
    keys.add(encoded);
    targets.push({ key, kind: "stale" });
    willUpdate++;
  }

  return { targets, keys, willAdd, willUpdate };
}
