/**
 * Column Name Synonym Dictionary
 *
 * Maps the column names seen in ITSM exports to canonical incident
 * fields. Matching ignores case and any non-alphanumeric characters, so
 * "Open_Time__", "open time" and "openTime" are the same header.
 */

import type { IncidentRecord } from "../shared/types.js";

export type CanonicalColumn = keyof IncidentRecord;

/** Synonyms grouped by canonical column name. */
export const COLUMN_SYNONYMS: Record<CanonicalColumn, string[]> = {
  incident_id: ["Incident_ID", "incident_number", "number", "ticket_id", "id"],
  open_time: ["Open_Time__", "Open_Time", "opened_at", "created_at", "open_date"],
  detection_time: ["Detected_At", "detected_at", "detection_date", "reported_at"],
  impact: ["Impact_enc", "impact_level"],
  urgency: ["Urgency_enc", "urgency_level"],
  priority: ["Priority_enc", "priority_level"],
  handle_time_hrs: ["Handle_Time_hrs", "handle_time", "handling_time_hours", "resolution_hours"],
  category_code: ["CI_Cat_enc", "category", "cat_code"],
  subcategory_code: ["CI_Subcat_enc", "subcategory", "subcat_code"],
  closure_code: ["Closure_Code", "resolution_code"],
};

/** Lowercase and strip everything but letters and digits. */
export function normalizeHeader(header: string): string {
  return header.toLowerCase().replace(/[^a-z0-9]/g, "");
}

const HEADER_LOOKUP = new Map<string, CanonicalColumn>();
for (const [canonical, synonyms] of Object.entries(COLUMN_SYNONYMS)) {
  if (!isCanonicalColumn(canonical)) continue;
  for (const name of [canonical, ...synonyms]) {
    HEADER_LOOKUP.set(normalizeHeader(name), canonical);
  }
}

function isCanonicalColumn(name: string): name is CanonicalColumn {
  return Object.prototype.hasOwnProperty.call(COLUMN_SYNONYMS, name);
}

/**
 * Canonical column for a raw header, or null when the header is not an
 * incident field.
 */
export function resolveColumn(header: string): CanonicalColumn | null {
  return HEADER_LOOKUP.get(normalizeHeader(header)) ?? null;
}
