/**
 * SLA table keyed by the (impact, urgency) pair.
 *
 * Pairs are packed into a single integer key. A pair that is not in the
 * table has no SLA; a pair mapped to 0 hours has a zero-hour SLA.
 */

import { ConfigError } from "../shared/errors.js";

/** Highest impact / urgency level a key can hold. */
const MAX_LEVEL = 255;

const TEXT_KEY = /^(\d+)_(\d+)$/;

export interface SlaEntry {
  impact: number;
  urgency: number;
  hours: number;
}

function isLevel(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_LEVEL;
}

/** Single integer key for a level pair; `second` must be a level. */
export function packKey(first: number, second: number): number {
  return first * (MAX_LEVEL + 1) + second;
}

export class SlaTable {
  private readonly entriesByKey = new Map<number, SlaEntry>();

  constructor(entries: Iterable<SlaEntry> = []) {
    for (const entry of entries) {
      if (!isLevel(entry.impact) || !isLevel(entry.urgency)) {
        throw new ConfigError(
          `SLA entry (${entry.impact}, ${entry.urgency}) is not a pair of levels 0..${MAX_LEVEL}`
        );
      }
      if (!Number.isFinite(entry.hours) || entry.hours < 0) {
        throw new ConfigError(
          `SLA entry (${entry.impact}, ${entry.urgency}) has invalid duration ${entry.hours}`
        );
      }
      this.entriesByKey.set(packKey(entry.impact, entry.urgency), { ...entry });
    }
  }

  /**
   * Build a table from its text form: `"<impact>_<urgency>": hours`.
   * A `null` value leaves the pair without an SLA.
   */
  static fromRecord(record: Readonly<Record<string, number | null>>): SlaTable {
    const entries: SlaEntry[] = [];
    for (const [key, hours] of Object.entries(record)) {
      const match = TEXT_KEY.exec(key);
      if (!match) {
        throw new ConfigError(`Invalid SLA key "${key}"; expected "<impact>_<urgency>"`);
      }
      if (hours === null) continue;
      entries.push({ impact: Number(match[1]), urgency: Number(match[2]), hours });
    }
    return new SlaTable(entries);
  }

  /** Allowed hours for the pair, or undefined when the pair has no SLA. */
  get(impact: number, urgency: number): number | undefined {
    if (!isLevel(impact) || !isLevel(urgency)) return undefined;
    return this.entriesByKey.get(packKey(impact, urgency))?.hours;
  }

  has(impact: number, urgency: number): boolean {
    return this.get(impact, urgency) !== undefined;
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  entries(): SlaEntry[] {
    return [...this.entriesByKey.entries()]
      .sort(([a], [b]) => a - b)
      .map(([, entry]) => ({ ...entry }));
  }

  toRecord(): Record<string, number> {
    const record: Record<string, number> = {};
    for (const { impact, urgency, hours } of this.entries()) {
      record[`${impact}_${urgency}`] = hours;
    }
    return record;
  }
}

/** Built-in allowed hours for impact and urgency in 1..3. */
export const DEFAULT_SLA_TABLE = new SlaTable([
  { impact: 1, urgency: 1, hours: 0.25 },
  { impact: 1, urgency: 2, hours: 0.5 },
  { impact: 1, urgency: 3, hours: 1 },
  { impact: 2, urgency: 1, hours: 0.5 },
  { impact: 2, urgency: 2, hours: 1 },
  { impact: 2, urgency: 3, hours: 2 },
  { impact: 3, urgency: 1, hours: 1 },
  { impact: 3, urgency: 2, hours: 2 },
  { impact: 3, urgency: 3, hours: 4 },
]);
