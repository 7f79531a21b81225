/**
 * Calendar-day helpers. TMDB dates are plain `YYYY-MM-DD` strings and are
 * compared as UTC day numbers so a run's "today" does not drift with the
 * local timezone.
 */

const MS_PER_DAY = 86_400_000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Days since the epoch for a `YYYY-MM-DD` string, or null if it is not one. */
export function parseDay(value: unknown): number | null {
  if (typeof value !== "string") return null;
  const match = ISO_DATE.exec(value.trim());
  if (!match) return null;
  const [, y, m, d] = match;
  const year = Number(y);
  const month = Number(m);
  const day = Number(d);
  const ms = Date.UTC(year, month - 1, day);
  const check = new Date(ms);
  // Reject rollovers such as 2024-02-31
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day
  ) {
    return null;
  }
  return Math.floor(ms / MS_PER_DAY);
}

export function dayOf(date: Date): number {
  return Math.floor(date.getTime() / MS_PER_DAY);
}

/** `today − windowDays ≤ date ≤ today`, inclusive on both ends. */
export function isWithinWindow(date: unknown, today: number, windowDays: number): boolean {
  const day = parseDay(date);
  if (day === null) return false;
  return day >= today - windowDays && day <= today;
}

/** DD/MM/YYYY, the run-log date format. */
export function formatRunDate(date: Date): string {
  const dd = String(date.getDate()).padStart(2, "0");
  const mm = String(date.getMonth() + 1).padStart(2, "0");
  return `${dd}/${mm}/${date.getFullYear()}`;
}
