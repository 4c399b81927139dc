/**
 * Incident Loader: reads incident exports and configuration files from
 * disk and hands them to the engine as in-memory structures.
 */

import { existsSync, readFileSync } from "fs";
import path from "path";
import { parse } from "csv-parse/sync";

import { ConfigError } from "../shared/errors.js";
import type { CategoryMapping, IncidentRecord } from "../shared/types.js";
import type { SlaTable } from "../analytics/sla_table.js";
import { columnsToRows, parseCategoryMapping, parseIncidentSnapshot, parseSlaTable } from "./schemas.js";

/**
 * Parse CSV text with a header row into records.
 */
export function readCsvRows(text: string): Record<string, string>[] {
  const records: Record<string, string>[] = parse(text, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
    bom: true,
  });
  return records;
}

/**
 * Read a JSON file.
 */
function readJsonFile(filePath: string, what: string): unknown {
  if (!existsSync(filePath)) {
    throw new ConfigError(`${what} not found: ${filePath}`);
  }
  const text = readFileSync(filePath, "utf-8");
  try {
    return JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`${what} is not valid JSON (${filePath}): ${reason}`);
  }
}

/**
 * Rows of a JSON incident export: an array of records, or a column-oriented
 * object of equal-length arrays.
 */
export function jsonIncidentRows(raw: unknown): unknown[] {
  if (Array.isArray(raw)) return raw;
  if (typeof raw === "object" && raw !== null) {
    return columnsToRows(Object.fromEntries(Object.entries(raw)));
  }
  throw new ConfigError("Incident JSON must be an array of records or an object of columns");
}

/**
 * Load an incident snapshot from a .csv or .json export.
 */
export function loadIncidentFile(filePath: string): IncidentRecord[] {
  const ext = path.extname(filePath).toLowerCase();

  if (ext === ".csv") {
    if (!existsSync(filePath)) {
      throw new ConfigError(`Incident file not found: ${filePath}`);
    }
    return parseIncidentSnapshot(readCsvRows(readFileSync(filePath, "utf-8")));
  }

  if (ext === ".json") {
    return parseIncidentSnapshot(jsonIncidentRows(readJsonFile(filePath, "Incident file")));
  }

  throw new ConfigError(`Unsupported incident file type "${ext}" (expected .csv or .json)`);
}

export function loadCategoryMapping(filePath: string): CategoryMapping {
  return parseCategoryMapping(readJsonFile(filePath, "Category mapping"));
}

export function loadSlaTable(filePath: string): SlaTable {
  return parseSlaTable(readJsonFile(filePath, "SLA table"));
}
