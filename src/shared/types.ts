/** Raw timestamp as carried by an incident record. */
export type Timestamp = string | Date;

/** Which incident timestamp the weekly trend is bucketed on. */
export type TrendField = "open_time" | "detection_time";

/** Breach severity, graded from the breach ratio. */
export type BreachSeverity = "Critical" | "High" | "Medium" | "Low";

/** Inconsistency severity, graded from the impact/urgency pair. */
export type InconsistencySeverity = "High" | "Medium" | "Low";

/** Canonical incident record */
export interface IncidentRecord {
  incident_id: string | number;
  open_time: Timestamp | null;
  detection_time?: Timestamp | null;
  impact: number;
  urgency: number;
  priority: number;
  handle_time_hrs: number | null;
  category_code: number | null;
  subcategory_code: number | null;
  closure_code?: string | null;
}

/** Label lookups for encoded category / subcategory codes. */
export interface CategoryMapping {
  categories: ReadonlyMap<number, string>;
  subcategories: ReadonlyMap<number, string>;
}

// ── Categorization ─────────────────────────────────────────────────

export interface DecodedIncident {
  incidentId: string | number;
  categoryCode: number | null;
  category: string;
  subcategoryCode: number | null;
  subcategory: string;
}

export interface TopCodeEntry {
  code: number;
  label: string;
  count: number;
}

// ── Weekly trend ───────────────────────────────────────────────────

/** Incident count for one calendar week */
export interface WeeklyCount {
  week: string; // YYYY-MM-DD (Monday)
  count: number;
}

export interface WeeklyBucket extends WeeklyCount {
  rollingAvg: number;
  spike: boolean;
}

export interface WeeklyTrendResult {
  buckets: WeeklyBucket[];
  spikeWeeks: string[];
  explanation: string;
  /** Records left out because the trend timestamp was missing or unparseable. */
  excludedRecords: number;
}

// ── SLA ────────────────────────────────────────────────────────────

export interface BreachIndicator {
  incidentId: string | number;
  breach: boolean;
  breachTime: string;
}

export interface BreachDetail {
  incidentId: string | number;
  impact: number;
  urgency: number;
  priority: number;
  handleTimeHrs: number;
  slaDurationHrs: number;
  breachTime: string;
  severity: BreachSeverity;
  breachRatio: number;
}

export interface SlaEvaluation {
  totalIncidentsAnalyzed: number;
  totalSlaBreaches: number;
  slaBreachPercentage: number;
  exemptIncidents: number;
  breaches: BreachIndicator[];
  breachedDetails: BreachDetail[];
}

export interface BreachIndicatorSummary {
  totalIncidents: number;
  totalBreaches: number;
  breachPercentage: number;
}

// ── Consistency ────────────────────────────────────────────────────

export interface InconsistencyRecord {
  incidentId: string | number;
  impact: number;
  urgency: number;
  priority: number;
  description: string;
  detectedAt: string | null;
  severity: InconsistencySeverity;
}

// ── Aggregation ────────────────────────────────────────────────────

export interface BreachCombination {
  priority: number;
  impact: number;
  breachCount: number;
}

export interface SeverityCount<S extends string> {
  severity: S;
  count: number;
}

export interface AggregationResult {
  breachDistribution: BreachCombination[];
  topBreachingCombinations: BreachCombination[];
  timeSeries: {
    breaches: WeeklyCount[];
    inconsistencies: WeeklyCount[];
  };
  severityDistribution: {
    breaches: SeverityCount<BreachSeverity>[];
    inconsistencies: SeverityCount<InconsistencySeverity>[];
  };
}

// ── Report ─────────────────────────────────────────────────────────

/** Outcome of one independently computed report section. */
export type SectionResult<T> =
  | { status: "ok"; data: T }
  | { status: "failed"; error: string };

export interface CategorizationSummary {
  topCategories: TopCodeEntry[];
  topSubcategories: TopCodeEntry[];
  decoded: DecodedIncident[];
  weeklyTrend: SectionResult<WeeklyTrendResult>;
}

export interface SlaSummary extends SlaEvaluation {
  indicatorSummary: BreachIndicatorSummary;
  breachDistribution: BreachCombination[];
  topBreachingCombinations: BreachCombination[];
  timeSeries: WeeklyCount[];
  severityDistribution: SeverityCount<BreachSeverity>[];
}

export interface InconsistencySummary {
  inconsistencies: InconsistencyRecord[];
  totalInconsistencies: number;
  timeSeries: WeeklyCount[];
  severityDistribution: SeverityCount<InconsistencySeverity>[];
}

export interface ReportMeta {
  runId: string;
  generatedAt: string;
  inputHash: string;
  totalRecords: number;
}

export interface AnalysisReport {
  meta: ReportMeta;
  categorization: SectionResult<CategorizationSummary>;
  sla: SectionResult<SlaSummary>;
  inconsistencies: SectionResult<InconsistencySummary>;
}

export interface AnalyzeOptions {
  /** How many categories / subcategories to rank. */
  topN?: number;
  trendField?: TrendField;
}
