import { createHash } from "crypto";

/** SHA-256 of a UTF-8 string. */
export function sha256String(data: string): string {
  return createHash("sha256").update(data, "utf8").digest("hex");
}

/**
 * Canonical JSON stringify with deep-sorted keys.
 * Dates serialize as ISO strings so snapshots built from Date objects and
 * from their string form hash the same.
 */
export function canonicalJsonStringify(obj: unknown): string {
  return JSON.stringify(sortKeysDeep(obj));
}

function sortKeysDeep(obj: unknown): unknown {
  if (obj instanceof Date) return obj.toISOString();
  if (obj === null || typeof obj !== "object") return obj;
  if (Array.isArray(obj)) return obj.map(sortKeysDeep);
  const sorted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    sorted[key] = sortKeysDeep(value);
  }
  return sorted;
}

/** Compute SHA-256 of a canonical JSON representation. */
export function contentHash(obj: unknown): string {
  return sha256String(canonicalJsonStringify(obj));
}
