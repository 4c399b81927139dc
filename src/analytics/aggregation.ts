import type {
  AggregationResult,
  BreachCombination,
  BreachDetail,
  InconsistencyRecord,
  SeverityCount,
} from "../shared/types.js";
import { weeklyCounts } from "./series.js";
import { packKey } from "./sla_table.js";

/** Size of the top breaching (priority, impact) ranking. */
export const TOP_COMBINATIONS = 3;

/**
 * Breach counts per (priority, impact) pair, descending by count.
 * Equal counts are ordered by priority, then impact.
 */
export function breachDistribution(details: readonly BreachDetail[]): BreachCombination[] {
  const comboMap = new Map<number, BreachCombination>();
  for (const d of details) {
    // impact is a table level, so the key stays unique for any integer priority
    const key = packKey(d.priority, d.impact);
    const entry = comboMap.get(key) ?? { priority: d.priority, impact: d.impact, breachCount: 0 };
    entry.breachCount++;
    comboMap.set(key, entry);
  }

  return [...comboMap.values()].sort(
    (a, b) => b.breachCount - a.breachCount || a.priority - b.priority || a.impact - b.impact
  );
}

/**
 * Occurrences per severity tier, descending by count.
 */
export function severityDistribution<S extends string>(
  records: readonly { severity: S }[]
): SeverityCount<S>[] {
  const severityMap = new Map<S, number>();
  for (const r of records) {
    severityMap.set(r.severity, (severityMap.get(r.severity) ?? 0) + 1);
  }
  return [...severityMap.entries()]
    .sort(([, a], [, b]) => b - a)
    .map(([severity, count]) => ({ severity, count }));
}

/**
 * Distributions, rankings and weekly series over breach details and
 * inconsistencies.
 */
export function aggregateFindings(
  details: readonly BreachDetail[],
  inconsistencies: readonly InconsistencyRecord[]
): AggregationResult {
  const distribution = breachDistribution(details);

  return {
    breachDistribution: distribution,
    topBreachingCombinations: distribution.slice(0, TOP_COMBINATIONS),
    timeSeries: {
      breaches: weeklyCounts(details.map((d) => d.breachTime)),
      inconsistencies: weeklyCounts(inconsistencies.map((i) => i.detectedAt)),
    },
    severityDistribution: {
      breaches: severityDistribution(details),
      inconsistencies: severityDistribution(inconsistencies),
    },
  };
}
