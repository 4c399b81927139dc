import type { WeeklyCount } from "../shared/types.js";
import { parseTimestamp, weekStart } from "../shared/timestamps.js";

/**
 * Build a weekly count series from a list of dates.
 * Weeks start on Monday (UTC); only weeks with at least one date appear,
 * sorted chronologically.
 */
export function buildWeeklySeries(dates: Date[]): WeeklyCount[] {
  const weekMap = new Map<string, number>();
  for (const d of dates) {
    const week = weekStart(d);
    weekMap.set(week, (weekMap.get(week) ?? 0) + 1);
  }

  return [...weekMap.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([week, count]) => ({ week, count }));
}

/**
 * Weekly counts over raw timestamps. Missing or unparseable values are
 * skipped.
 */
export function weeklyCounts(timestamps: Array<string | Date | null>): WeeklyCount[] {
  const dates: Date[] = [];
  for (const ts of timestamps) {
    const parsed = parseTimestamp(ts);
    if (parsed) dates.push(parsed);
  }
  return buildWeeklySeries(dates);
}
