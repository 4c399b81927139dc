export { analyze, assertSnapshotShape } from "./analytics/analyze.js";
export { aggregateFindings, breachDistribution, severityDistribution } from "./analytics/aggregation.js";
export { decodeCategories, decodeCode, topCodes, UNKNOWN_LABEL, EMPTY_CATEGORY_MAPPING } from "./analytics/categories.js";
export { detectPriorityInconsistencies, isPriorityInconsistent, gradeInconsistencySeverity } from "./analytics/consistency.js";
export { checkSlaBreaches, summarizeBreachIndicators, gradeBreachSeverity, breachRatio } from "./analytics/sla.js";
export { SlaTable, DEFAULT_SLA_TABLE } from "./analytics/sla_table.js";
export type { SlaEntry } from "./analytics/sla_table.js";
export { computeWeeklyTrend, explainSpikeWeeks } from "./analytics/trend.js";
export { parseIncidentSnapshot, parseCategoryMapping, parseSlaTable } from "./ingest/schemas.js";
export { loadIncidentFile, loadCategoryMapping, loadSlaTable } from "./ingest/loader.js";
export { AnalysisError, InputShapeError, ConfigError } from "./shared/errors.js";
export type * from "./shared/types.js";
