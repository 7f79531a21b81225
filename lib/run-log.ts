/**
 * Per-entity run log: one appended summary line per run.
 *
 *   18/10/2026 : added 3 movie_details / updated 1 movie_details / errors 2 / 404=1 ; HTTP_500=1 / total : 120
 */

import * as fs from "fs";
import * as path from "path";
import { formatRunDate } from "./dates";
import type { RunSummary } from "./types";

function formatCounts(entries: Array<[string, number]>): string {
  return entries.map(([key, value]) => `${key}=${value}`).join(" ; ");
}

export function formatSummaryLine(summary: RunSummary, date: Date): string {
  const entity = summary.entity;
  const errorTotal = summary.errors.reduce((sum, [, count]) => sum + count, 0);
  const errorsPart =
    errorTotal > 0 ? `errors ${errorTotal} / ${formatCounts(summary.errors)}` : "errors 0";

  let line = `${formatRunDate(date)} : added ${summary.added} ${entity} / updated ${summary.updated} ${entity} / ${errorsPart} / total : ${summary.total}`;
  if (summary.warnings.length > 0) {
    line += ` / warnings ${formatCounts(summary.warnings)}`;
  }
  return line;
}

export async function appendSummaryLog(
  logPath: string,
  summary: RunSummary,
  date: Date,
): Promise<string> {
  const line = formatSummaryLine(summary, date);
  await fs.promises.mkdir(path.dirname(logPath), { recursive: true });
  await fs.promises.appendFile(logPath, `${line}\n`, "utf-8");
  return line;
}
