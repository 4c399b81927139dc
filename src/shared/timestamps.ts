/**
 * Timestamp parsing and calendar-week alignment.
 *
 * All arithmetic is done in UTC. Zone-less values are read as UTC so the
 * same export produces the same weeks on every host.
 */

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
// Fractions beyond milliseconds (e.g. microseconds) are truncated.
const ISO_DATE_TIME =
  /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?(Z|[+-]\d{2}:?\d{2})?$/;
// Month-first, as ITSM tool exports usually write it: 2/13/2012 14:05
const MONTH_FIRST = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

function validDate(d: Date): Date | null {
  return Number.isNaN(d.getTime()) ? null : d;
}

function fromParts(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0
): Date | null {
  if (month < 1 || month > 12 || day < 1 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  const d = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  // Reject rollover such as 2/30
  if (d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) return null;
  return d;
}

/**
 * Best-effort timestamp parse. Returns null for anything missing or
 * unrecognised; never throws.
 */
export function parseTimestamp(value: unknown): Date | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return validDate(new Date(value.getTime()));
  if (typeof value === "number") {
    return Number.isFinite(value) ? validDate(new Date(value)) : null;
  }
  if (typeof value !== "string") return null;

  const v = value.trim();
  if (v === "") return null;

  const dateOnly = DATE_ONLY.exec(v);
  if (dateOnly) {
    return fromParts(Number(dateOnly[1]), Number(dateOnly[2]), Number(dateOnly[3]));
  }

  const dateTime = ISO_DATE_TIME.exec(v);
  if (dateTime) {
    const [, y, mo, d, h, mi, sec = "00", fraction = "", zone = "Z"] = dateTime;
    const wallClock = fromParts(Number(y), Number(mo), Number(d), Number(h), Number(mi), Number(sec));
    if (!wallClock) return null;
    const ms = fraction.slice(0, 3).padEnd(3, "0");
    const offset = zone === "Z" ? zone : `${zone.slice(0, 3)}:${zone.slice(-2)}`;
    return validDate(new Date(`${y}-${mo}-${d}T${h}:${mi}:${sec}.${ms}${offset}`));
  }

  const monthFirst = MONTH_FIRST.exec(v);
  if (monthFirst) {
    return fromParts(
      Number(monthFirst[3]),
      Number(monthFirst[1]),
      Number(monthFirst[2]),
      Number(monthFirst[4] ?? 0),
      Number(monthFirst[5] ?? 0),
      Number(monthFirst[6] ?? 0)
    );
  }

  return null;
}

/**
 * Start of the calendar week (Monday 00:00 UTC) containing `date`,
 * as YYYY-MM-DD.
 */
export function weekStart(date: Date): string {
  const dayStart = Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
  const daysSinceMonday = (date.getUTCDay() + 6) % 7;
  return new Date(dayStart - daysSinceMonday * MS_PER_DAY).toISOString().slice(0, 10);
}

/** ISO-8601 rendering of a parseable timestamp, or null. */
export function toIsoTimestamp(value: unknown): string | null {
  const parsed = parseTimestamp(value);
  return parsed ? parsed.toISOString() : null;
}
