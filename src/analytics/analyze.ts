/**
 * Incident analysis entry point.
 *
 * Runs categorization, weekly trend, SLA evaluation and the consistency
 * check as independent computations over the same snapshot, then joins the
 * SLA and consistency outputs through the aggregation step. A component
 * that throws only fails its own section.
 */

import { v4 as uuidv4 } from "uuid";
import { contentHash } from "../shared/hash.js";
import { InputShapeError } from "../shared/errors.js";
import type {
  AnalysisReport,
  AnalyzeOptions,
  CategorizationSummary,
  CategoryMapping,
  IncidentRecord,
  InconsistencyRecord,
  InconsistencySummary,
  SectionResult,
  SlaEvaluation,
  SlaSummary,
} from "../shared/types.js";
import { aggregateFindings } from "./aggregation.js";
import { DEFAULT_TOP_N, decodeCategories, topCodes } from "./categories.js";
import { detectPriorityInconsistencies } from "./consistency.js";
import { checkSlaBreaches, summarizeBreachIndicators } from "./sla.js";
import { DEFAULT_SLA_TABLE } from "./sla_table.js";
import type { SlaTable } from "./sla_table.js";
import { computeWeeklyTrend } from "./trend.js";

const LEVEL_FIELDS = ["impact", "urgency", "priority"] as const;

/**
 * Precondition check on the snapshot. Throws InputShapeError when a record
 * lacks a usable identifier or level, when an identifier repeats, or when
 * no record carries a handle time field at all.
 */
export function assertSnapshotShape(incidents: readonly IncidentRecord[]): void {
  const seen = new Set<string | number>();

  incidents.forEach((inc, index) => {
    const id = inc.incident_id;
    const validId =
      (typeof id === "string" && id.trim() !== "") ||
      (typeof id === "number" && Number.isFinite(id));
    if (!validId) {
      throw new InputShapeError(
        `Incident record ${index} is missing required field "incident_id"`,
        "incident_id",
        index
      );
    }
    if (seen.has(id)) {
      throw new InputShapeError(
        `Incident record ${index} repeats incident_id "${id}"`,
        "incident_id",
        index
      );
    }
    seen.add(id);

    for (const field of LEVEL_FIELDS) {
      if (!Number.isInteger(inc[field])) {
        throw new InputShapeError(
          `Incident record ${index} (${id}) has no integer "${field}" (got ${String(inc[field])})`,
          field,
          index
        );
      }
    }
  });

  if (incidents.length > 0 && !incidents.some((inc) => Object.hasOwn(inc, "handle_time_hrs"))) {
    throw new InputShapeError(
      'Incident snapshot has no "handle_time_hrs" field on any record',
      "handle_time_hrs"
    );
  }
}

function runSection<T>(name: string, compute: () => T): SectionResult<T> {
  try {
    return { status: "ok", data: compute() };
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err);
    console.warn(`[analyze] ${name} section failed: ${error}`);
    return { status: "failed", error };
  }
}

function okOrEmpty<T>(section: SectionResult<T[]>): T[] {
  return section.status === "ok" ? section.data : [];
}

/**
 * Analyze a snapshot of incident records.
 */
export function analyze(
  incidents: readonly IncidentRecord[],
  categoryMapping: CategoryMapping,
  slaTable: SlaTable = DEFAULT_SLA_TABLE,
  options: AnalyzeOptions = {}
): AnalysisReport {
  assertSnapshotShape(incidents);

  const topN = options.topN ?? DEFAULT_TOP_N;
  const trendField = options.trendField ?? "open_time";

  // ── Independent computations ───────────────────────────────────────
  const weeklyTrend = runSection("trend", () => computeWeeklyTrend(incidents, trendField));

  const categorization = runSection<CategorizationSummary>("categorization", () => ({
    topCategories: topCodes(incidents, "category_code", categoryMapping.categories, topN),
    topSubcategories: topCodes(incidents, "subcategory_code", categoryMapping.subcategories, topN),
    decoded: decodeCategories(incidents, categoryMapping),
    weeklyTrend,
  }));

  const evaluation = runSection<SlaEvaluation>("sla", () => checkSlaBreaches(incidents, slaTable));
  const flagged = runSection<InconsistencyRecord[]>("inconsistencies", () =>
    detectPriorityInconsistencies(incidents)
  );

  // ── Join ───────────────────────────────────────────────────────────
  const aggregation = runSection("aggregation", () =>
    aggregateFindings(
      evaluation.status === "ok" ? evaluation.data.breachedDetails : [],
      okOrEmpty(flagged)
    )
  );

  let sla: SectionResult<SlaSummary>;
  if (evaluation.status === "failed") {
    sla = evaluation;
  } else if (aggregation.status === "failed") {
    sla = aggregation;
  } else {
    sla = {
      status: "ok",
      data: {
        ...evaluation.data,
        indicatorSummary: summarizeBreachIndicators(evaluation.data.breaches),
        breachDistribution: aggregation.data.breachDistribution,
        topBreachingCombinations: aggregation.data.topBreachingCombinations,
        timeSeries: aggregation.data.timeSeries.breaches,
        severityDistribution: aggregation.data.severityDistribution.breaches,
      },
    };
  }

  let inconsistencies: SectionResult<InconsistencySummary>;
  if (flagged.status === "failed") {
    inconsistencies = flagged;
  } else if (aggregation.status === "failed") {
    inconsistencies = aggregation;
  } else {
    inconsistencies = {
      status: "ok",
      data: {
        inconsistencies: flagged.data,
        totalInconsistencies: flagged.data.length,
        timeSeries: aggregation.data.timeSeries.inconsistencies,
        severityDistribution: aggregation.data.severityDistribution.inconsistencies,
      },
    };
  }

  return {
    meta: {
      runId: uuidv4(),
      generatedAt: new Date().toISOString(),
      inputHash: contentHash(incidents),
      totalRecords: incidents.length,
    },
    categorization,
    sla,
    inconsistencies,
  };
}
