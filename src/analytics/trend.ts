import type { IncidentRecord, TrendField, WeeklyTrendResult } from "../shared/types.js";
import { parseTimestamp } from "../shared/timestamps.js";
import { buildWeeklySeries } from "./series.js";
import { rollingMean } from "./stats.js";

/** Buckets in the rolling window, the current one included. */
export const ROLLING_WINDOW = 3;

/** A week spikes when its count is strictly above this multiple of its rolling average. */
export const SPIKE_FACTOR = 1.5;

function trendTimestamp(incident: IncidentRecord, field: TrendField): Date | null {
  return parseTimestamp(field === "detection_time" ? incident.detection_time : incident.open_time);
}

/**
 * Weekly incident volume with a trailing rolling average and spike flags.
 */
export function computeWeeklyTrend(
  incidents: readonly IncidentRecord[],
  dateField: TrendField = "open_time"
): WeeklyTrendResult {
  const dates: Date[] = [];
  let excludedRecords = 0;
  for (const incident of incidents) {
    const ts = trendTimestamp(incident, dateField);
    if (ts) dates.push(ts);
    else excludedRecords++;
  }

  if (excludedRecords > 0) {
    console.warn(
      `[trend] ${excludedRecords} record(s) without a usable ${dateField} excluded from the weekly trend`
    );
  }

  const series = buildWeeklySeries(dates);
  const averages = rollingMean(
    series.map((w) => w.count),
    ROLLING_WINDOW
  );

  const buckets = series.map((w, i) => ({
    week: w.week,
    count: w.count,
    rollingAvg: averages[i],
    spike: w.count > averages[i] * SPIKE_FACTOR,
  }));
  const spikeWeeks = buckets.filter((b) => b.spike).map((b) => b.week);

  return {
    buckets,
    spikeWeeks,
    explanation: explainSpikeWeeks(spikeWeeks),
    excludedRecords,
  };
}

/**
 * One-sentence explanation of the spike weeks.
 */
export function explainSpikeWeeks(spikeWeeks: readonly string[]): string {
  if (spikeWeeks.length === 0) {
    return "No spikes were detected in incident volume.";
  }
  return `Spikes were detected during the following weeks: ${spikeWeeks.join(", ")}.`;
}
