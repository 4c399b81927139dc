import type {
  CategoryMapping,
  DecodedIncident,
  IncidentRecord,
  TopCodeEntry,
} from "../shared/types.js";

/** Label used for any code missing from the mapping. */
export const UNKNOWN_LABEL = "Unknown";

export const DEFAULT_TOP_N = 5;

export const EMPTY_CATEGORY_MAPPING: CategoryMapping = {
  categories: new Map(),
  subcategories: new Map(),
};

/**
 * Look up the label for an encoded code.
 */
export function decodeCode(table: ReadonlyMap<number, string>, code: number | null): string {
  if (code === null) return UNKNOWN_LABEL;
  return table.get(code) ?? UNKNOWN_LABEL;
}

/**
 * Decode the category and subcategory code of every incident.
 */
export function decodeCategories(
  incidents: readonly IncidentRecord[],
  mapping: CategoryMapping
): DecodedIncident[] {
  return incidents.map((inc) => ({
    incidentId: inc.incident_id,
    categoryCode: inc.category_code,
    category: decodeCode(mapping.categories, inc.category_code),
    subcategoryCode: inc.subcategory_code,
    subcategory: decodeCode(mapping.subcategories, inc.subcategory_code),
  }));
}

/**
 * Most frequent codes in a field, descending by count. Ties keep the order
 * in which the codes first appear; incidents without a code are skipped.
 */
export function topCodes(
  incidents: readonly IncidentRecord[],
  field: "category_code" | "subcategory_code",
  table: ReadonlyMap<number, string>,
  n: number = DEFAULT_TOP_N
): TopCodeEntry[] {
  const counts = new Map<number, number>();
  for (const inc of incidents) {
    const code = inc[field];
    if (code === null) continue;
    counts.set(code, (counts.get(code) ?? 0) + 1);
  }

  return [...counts.entries()]
    .sort(([, a], [, b]) => b - a)
    .slice(0, Math.max(0, n))
    .map(([code, count]) => ({ code, label: decodeCode(table, code), count }));
}
