import { existsSync, writeFileSync } from "fs";
import { analyze } from "../analytics/analyze.js";
import { EMPTY_CATEGORY_MAPPING } from "../analytics/categories.js";
import { DEFAULT_SLA_TABLE } from "../analytics/sla_table.js";
import { loadCategoryMapping, loadIncidentFile, loadSlaTable } from "../ingest/loader.js";
import type { AnalysisConfig } from "../shared/run_config.js";
import type { AnalysisReport, SectionResult } from "../shared/types.js";

/** Category mapping used when none is configured, relative to the working directory. */
export const DEFAULT_MAPPING_PATH = "data/category_mappings.json";

/**
 * Load the configured inputs and analyze them. Without a configured mapping,
 * `defaultMappingPath` is used when it exists; otherwise every code decodes
 * to "Unknown".
 */
export function runAnalysis(
  config: AnalysisConfig,
  defaultMappingPath: string = DEFAULT_MAPPING_PATH
): AnalysisReport {
  const incidents = loadIncidentFile(config.incidentsPath);
  const mappingPath =
    config.mappingPath ?? (existsSync(defaultMappingPath) ? defaultMappingPath : undefined);
  const mapping = mappingPath ? loadCategoryMapping(mappingPath) : EMPTY_CATEGORY_MAPPING;
  const slaTable = config.slaPath ? loadSlaTable(config.slaPath) : DEFAULT_SLA_TABLE;

  return analyze(incidents, mapping, slaTable, {
    topN: config.topN,
    trendField: config.trendField,
  });
}

/**
 * JSON form of a report. Unbounded breach ratios (zero-hour SLAs) are
 * written as the string "Infinity".
 */
export function serializeReport(report: AnalysisReport): string {
  return JSON.stringify(
    report,
    (_key, value: unknown) =>
      typeof value === "number" && !Number.isFinite(value) ? String(value) : value,
    2
  );
}

function sectionLine<T>(label: string, section: SectionResult<T>, describe: (data: T) => string): string {
  const padded = `${label}:`.padEnd(16);
  return section.status === "ok"
    ? `  ${padded}${describe(section.data)}`
    : `  ${padded}FAILED (${section.error})`;
}

/**
 * Human-readable summary printed by the CLI.
 */
export function summaryLines(report: AnalysisReport): string[] {
  const lines = [
    `  Run:            ${report.meta.runId}`,
    `  Records:        ${report.meta.totalRecords}`,
    `  Input hash:     ${report.meta.inputHash.slice(0, 16)}...`,
    sectionLine("Categories", report.categorization, (c) =>
      c.topCategories.length > 0
        ? c.topCategories.map((t) => `${t.label} (${t.count})`).join(", ")
        : "none"
    ),
  ];

  if (report.categorization.status === "ok") {
    lines.push(
      sectionLine("Trend", report.categorization.data.weeklyTrend, (t) => t.explanation)
    );
  }

  lines.push(
    sectionLine(
      "SLA breaches",
      report.sla,
      (s) =>
        `${s.totalSlaBreaches} of ${s.totalIncidentsAnalyzed} (${s.slaBreachPercentage.toFixed(1)}%), ${s.exemptIncidents} exempt`
    ),
    sectionLine("Inconsistencies", report.inconsistencies, (i) => `${i.totalInconsistencies}`)
  );

  return lines;
}

export function writeReport(report: AnalysisReport, outPath: string): void {
  writeFileSync(outPath, serializeReport(report) + "\n", "utf-8");
}
