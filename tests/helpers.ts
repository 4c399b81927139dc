import type { IncidentRecord } from "../src/shared/types.js";

/** Incident with neutral defaults: (2,2,2), 0.5h, opened Monday 2024-01-01. */
export function makeIncident(overrides: Partial<IncidentRecord> & { incident_id: string | number }): IncidentRecord {
  return {
    open_time: "2024-01-01T10:00:00Z",
    impact: 2,
    urgency: 2,
    priority: 2,
    handle_time_hrs: 0.5,
    category_code: 1,
    subcategory_code: 1,
    ...overrides,
  };
}

/** `count` incidents opened on the given day. */
export function incidentsOn(day: string, count: number, prefix: string): IncidentRecord[] {
  return Array.from({ length: count }, (_, i) =>
    makeIncident({ incident_id: `${prefix}-${i}`, open_time: `${day}T09:00:00Z` })
  );
}

/** Copy of `incident` that has no handle time field at all. */
export function withoutHandleTime(incident: IncidentRecord): IncidentRecord {
  const copy = { ...incident };
  Reflect.deleteProperty(copy, "handle_time_hrs");
  return copy;
}
