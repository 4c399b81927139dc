import type {
  InconsistencyRecord,
  InconsistencySeverity,
  IncidentRecord,
} from "../shared/types.js";
import { toIsoTimestamp } from "../shared/timestamps.js";
import { firstMatch } from "./rules.js";
import type { Rule } from "./rules.js";

export const INCONSISTENCY_DESCRIPTION =
  "Potential misalignment between Impact, Urgency, and Priority.";

interface LevelTriple {
  impact: number;
  urgency: number;
  priority: number;
}

/**
 * An incident with this impact and urgency must carry `expectedPriority`.
 */
export interface PriorityRule {
  impact: number;
  urgency: number;
  expectedPriority: number;
}

export const PRIORITY_RULES: readonly PriorityRule[] = [
  { impact: 3, urgency: 1, expectedPriority: 1 },
  { impact: 1, urgency: 3, expectedPriority: 3 },
];

/**
 * Severity of a flagged incident by its impact/urgency pair.
 *
 * Only (3,1) and (1,3) are ever flagged, so the High and Medium rows never
 * match today and every inconsistency grades Low. Kept as-is until the rule
 * set is revised.
 */
export const INCONSISTENCY_SEVERITY_RULES: readonly Rule<LevelTriple, InconsistencySeverity>[] = [
  { when: ({ impact, urgency }) => impact === 3 && urgency === 3, result: "High" },
  {
    when: ({ impact, urgency }) =>
      (impact === 3 && urgency === 2) || (impact === 2 && urgency === 3),
    result: "Medium",
  },
];

export function isPriorityInconsistent(levels: LevelTriple): boolean {
  return PRIORITY_RULES.some(
    (rule) =>
      levels.impact === rule.impact &&
      levels.urgency === rule.urgency &&
      levels.priority !== rule.expectedPriority
  );
}

export function gradeInconsistencySeverity(levels: LevelTriple): InconsistencySeverity {
  return firstMatch(INCONSISTENCY_SEVERITY_RULES, levels, "Low");
}

/**
 * Flag incidents whose priority contradicts their impact and urgency.
 * The detection timestamp falls back to the open time and is null when
 * neither parses.
 */
export function detectPriorityInconsistencies(
  incidents: readonly IncidentRecord[]
): InconsistencyRecord[] {
  const inconsistencies: InconsistencyRecord[] = [];

  for (const inc of incidents) {
    if (!isPriorityInconsistent(inc)) continue;

    inconsistencies.push({
      incidentId: inc.incident_id,
      impact: inc.impact,
      urgency: inc.urgency,
      priority: inc.priority,
      description: INCONSISTENCY_DESCRIPTION,
      detectedAt: toIsoTimestamp(inc.detection_time) ?? toIsoTimestamp(inc.open_time),
      severity: gradeInconsistencySeverity(inc),
    });
  }

  return inconsistencies;
}
