import { z } from "zod";
import { ConfigError, InputShapeError } from "../shared/errors.js";
import type { CategoryMapping, IncidentRecord } from "../shared/types.js";
import { SlaTable } from "../analytics/sla_table.js";
import { resolveColumn } from "./synonyms.js";
import type { CanonicalColumn } from "./synonyms.js";

// ── Field coercions ────────────────────────────────────────────────
// CSV exports carry every value as a string; JSON exports may carry
// numbers. Blank cells count as missing.

function isBlank(v: unknown): boolean {
  return v === undefined || v === null || (typeof v === "string" && v.trim() === "");
}

function toNumber(v: unknown): unknown {
  return typeof v === "string" ? Number(v.trim()) : v;
}

const level = z.preprocess(
  (v) => (isBlank(v) ? undefined : toNumber(v)),
  z.number({ required_error: "is required" }).int()
);

const optionalCode = z.preprocess((v) => {
  if (isBlank(v)) return null;
  const n = toNumber(v);
  return typeof n === "number" && Number.isNaN(n) ? null : n;
}, z.number().int().nullable());

// Unreadable or negative handle times leave the incident without one
const handleTime = z.preprocess((v) => {
  if (isBlank(v)) return null;
  const n = toNumber(v);
  return typeof n === "number" && (Number.isNaN(n) || n < 0) ? null : n;
}, z.number().nullable());

const timestamp = z.preprocess((v) => {
  if (isBlank(v)) return null;
  return typeof v === "number" ? new Date(v) : v;
}, z.union([z.string(), z.date()]).nullable());

// ── Canonical Incident Record ──────────────────────────────────────
export const IncidentRecordSchema: z.ZodType<IncidentRecord, z.ZodTypeDef, unknown> = z.object({
  incident_id: z.preprocess(
    (v) => (typeof v === "string" ? v.trim() : v),
    z.union([z.string().min(1), z.number()], {
      errorMap: () => ({ message: "must be a non-empty string or a number" }),
    })
  ),
  open_time: timestamp,
  detection_time: timestamp.optional(),
  impact: level,
  urgency: level,
  priority: level,
  handle_time_hrs: handleTime,
  category_code: optionalCode,
  subcategory_code: optionalCode,
  closure_code: z
    .preprocess((v) => (isBlank(v) ? null : typeof v === "number" ? String(v) : v), z.string().nullable())
    .optional(),
});

/** Columns that must appear on at least one record of a non-empty snapshot. */
export const REQUIRED_COLUMNS: readonly CanonicalColumn[] = [
  "incident_id",
  "impact",
  "urgency",
  "priority",
  "handle_time_hrs",
];

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Rename raw columns to canonical incident fields. Unknown columns are
 * dropped; when two headers map to the same field the first one wins.
 */
export function canonicalizeRow(row: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [header, value] of Object.entries(row)) {
    const column = resolveColumn(header);
    if (column && !(column in out)) out[column] = value;
  }
  return out;
}

/**
 * Turn a column-oriented table (`{ column: values[] }`) into rows.
 */
export function columnsToRows(columns: Record<string, unknown>): Record<string, unknown>[] {
  const entries = Object.entries(columns);
  let length = 0;
  for (const [name, values] of entries) {
    if (!Array.isArray(values)) {
      throw new InputShapeError(`Column "${name}" is not a list of values`, name);
    }
    length = Math.max(length, values.length);
  }

  const rows: Record<string, unknown>[] = [];
  for (let i = 0; i < length; i++) {
    const row: Record<string, unknown> = {};
    for (const [name, values] of entries) {
      if (Array.isArray(values)) row[name] = values[i];
    }
    rows.push(row);
  }
  return rows;
}

/**
 * Validate raw incident rows into canonical records.
 *
 * Throws InputShapeError when a required column is absent from every row
 * or when a row cannot be read.
 */
export function parseIncidentSnapshot(rows: readonly unknown[]): IncidentRecord[] {
  const canonicalRows = rows.map((row, index) => {
    if (!isPlainObject(row)) {
      throw new InputShapeError(`Incident record ${index} is not an object`, "*", index);
    }
    return canonicalizeRow(row);
  });

  if (canonicalRows.length > 0) {
    for (const column of REQUIRED_COLUMNS) {
      if (!canonicalRows.some((row) => column in row)) {
        throw new InputShapeError(
          `Required column "${column}" is absent from every incident record`,
          column
        );
      }
    }
  }

  return canonicalRows.map((row, index) => {
    const result = IncidentRecordSchema.safeParse(row);
    if (!result.success) {
      const field = String(result.error.issues[0]?.path[0] ?? "*");
      throw new InputShapeError(
        `Incident record ${index}: ${formatIssues(result.error)}`,
        field,
        index
      );
    }
    return result.data;
  });
}

// ── Category mapping ───────────────────────────────────────────────
const CodeLabelsSchema = z.record(
  z.string().regex(/^\d+$/, "code must be a non-negative integer"),
  z.string().min(1)
);

export const CategoryMappingFileSchema = z.object({
  CI_Cat: CodeLabelsSchema.optional(),
  CI_Subcat: CodeLabelsSchema.optional(),
  categories: CodeLabelsSchema.optional(),
  subcategories: CodeLabelsSchema.optional(),
});

function toLabelMap(labels: Record<string, string> = {}): Map<number, string> {
  return new Map(Object.entries(labels).map(([code, label]) => [Number(code), label]));
}

/**
 * Parse the text form of a category mapping. Either `CI_Cat` / `CI_Subcat`
 * or `categories` / `subcategories` may carry the labels; a missing
 * sub-mapping is empty.
 */
export function parseCategoryMapping(raw: unknown): CategoryMapping {
  const result = CategoryMappingFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid category mapping: ${formatIssues(result.error)}`);
  }
  const { CI_Cat, CI_Subcat, categories, subcategories } = result.data;
  return {
    categories: toLabelMap(CI_Cat ?? categories),
    subcategories: toLabelMap(CI_Subcat ?? subcategories),
  };
}

// ── SLA overrides ──────────────────────────────────────────────────
export const SlaOverridesSchema = z.record(z.string(), z.number().nonnegative().nullable());

/**
 * Parse the text form of an SLA table (`"<impact>_<urgency>": hours | null`).
 */
export function parseSlaTable(raw: unknown): SlaTable {
  const result = SlaOverridesSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid SLA table: ${formatIssues(result.error)}`);
  }
  return SlaTable.fromRecord(result.data);
}
