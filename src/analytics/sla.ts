import type {
  BreachDetail,
  BreachIndicator,
  BreachIndicatorSummary,
  BreachSeverity,
  IncidentRecord,
  SlaEvaluation,
} from "../shared/types.js";
import { parseTimestamp } from "../shared/timestamps.js";
import { firstMatch } from "./rules.js";
import type { Rule } from "./rules.js";
import type { SlaTable } from "./sla_table.js";
import { percentage, round } from "./stats.js";

/** Severity by breach ratio (handle time / SLA), first match wins. */
export const BREACH_SEVERITY_RULES: readonly Rule<number, BreachSeverity>[] = [
  { when: (ratio) => ratio > 2.0, result: "Critical" },
  { when: (ratio) => ratio > 1.5, result: "High" },
  { when: (ratio) => ratio > 1.2, result: "Medium" },
];

export function gradeBreachSeverity(ratio: number): BreachSeverity {
  return firstMatch(BREACH_SEVERITY_RULES, ratio, "Low");
}

/** Handle time over SLA duration; unbounded for a zero-hour SLA. */
export function breachRatio(handleTimeHrs: number, slaHours: number): number {
  return slaHours > 0 ? handleTimeHrs / slaHours : Number.POSITIVE_INFINITY;
}

/**
 * Evaluate every incident against the SLA table.
 *
 * Incidents whose (impact, urgency) pair has no SLA, or that lack a handle
 * time or a parseable open time, are exempt: they count toward
 * `totalIncidentsAnalyzed` but produce no indicator.
 */
export function checkSlaBreaches(
  incidents: readonly IncidentRecord[],
  slaTable: SlaTable
): SlaEvaluation {
  const breaches: BreachIndicator[] = [];
  const breachedDetails: BreachDetail[] = [];
  let exemptIncidents = 0;

  for (const inc of incidents) {
    const slaHours = slaTable.get(inc.impact, inc.urgency);
    const openTime = parseTimestamp(inc.open_time);
    const handleTime = inc.handle_time_hrs;

    if (
      slaHours === undefined ||
      openTime === null ||
      typeof handleTime !== "number" ||
      !Number.isFinite(handleTime)
    ) {
      exemptIncidents++;
      continue;
    }

    const breachTime = openTime.toISOString();
    const breach = handleTime > slaHours;

    if (breach) {
      const ratio = breachRatio(handleTime, slaHours);
      breachedDetails.push({
        incidentId: inc.incident_id,
        impact: inc.impact,
        urgency: inc.urgency,
        priority: inc.priority,
        handleTimeHrs: handleTime,
        slaDurationHrs: slaHours,
        breachTime,
        severity: gradeBreachSeverity(ratio),
        breachRatio: round(ratio, 2),
      });
    }

    breaches.push({ incidentId: inc.incident_id, breach, breachTime });
  }

  const totalIncidentsAnalyzed = incidents.length;
  const totalSlaBreaches = breachedDetails.length;

  return {
    totalIncidentsAnalyzed,
    totalSlaBreaches,
    slaBreachPercentage: percentage(totalSlaBreaches, totalIncidentsAnalyzed),
    exemptIncidents,
    breaches,
    breachedDetails,
  };
}

/**
 * Breach rate over evaluated (non-exempt) incidents only.
 */
export function summarizeBreachIndicators(
  indicators: readonly BreachIndicator[]
): BreachIndicatorSummary {
  const totalIncidents = indicators.length;
  const totalBreaches = indicators.filter((b) => b.breach).length;
  return {
    totalIncidents,
    totalBreaches,
    breachPercentage: percentage(totalBreaches, totalIncidents),
  };
}
