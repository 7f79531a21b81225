/**
 * Refresh decisions for records already in a store.
 *
 * window and status policies read the stored record itself, so they are
 * evaluated while scanning. A parent policy needs the parent's date, which
 * only the candidate carries, so it is evaluated when targets are built.
 */

import { isWithinWindow } from "./dates";
import type { JsonRecord } from "./ndjson";
import type { Candidate, RefreshPolicy } from "./types";

/** Whether the stored record is due for refresh, judged from its own fields. */
export function isDueFromRecord(
  policy: RefreshPolicy,
  record: JsonRecord,
  today: number,
): boolean {
  switch (policy.kind) {
    case "window":
      return isWithinWindow(record[policy.dateField], today, policy.windowDays);
    case "status": {
      const status = record[policy.statusField];
      const window =
        typeof status === "string" && Object.hasOwn(policy.windows, status)
          ? policy.windows[status]
          : policy.defaultWindowDays;
      if (window === "always") return true;
      return isWithinWindow(record[policy.dateField], today, window);
    }
    case "parent":
    case "never":
    case "rebuild":
      return false;
  }
}

/** Whether an existing key is due, judged from the candidate's parent date. */
export function isDueFromCandidate(
  policy: RefreshPolicy,
  candidate: Candidate,
  today: number,
): boolean {
  if (policy.kind !== "parent") return false;
  return isWithinWindow(candidate.refDate, today, policy.windowDays);
}

export function describePolicy(policy: RefreshPolicy): string {
  switch (policy.kind) {
    case "window":
      return `${policy.windowDays}d window on ${policy.dateField}`;
    case "status":
      return `status table on ${policy.statusField} (default ${policy.defaultWindowDays}d on ${policy.dateField})`;
    case "parent":
      return `${policy.windowDays}d window on parent date`;
    case "never":
      return "new keys only";
    case "rebuild":
      return "full rebuild";
  }
}
