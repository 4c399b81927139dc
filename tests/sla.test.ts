import { describe, it, expect } from "vitest";
import {
  breachRatio,
  checkSlaBreaches,
  gradeBreachSeverity,
  summarizeBreachIndicators,
} from "../src/analytics/sla.js";
import { DEFAULT_SLA_TABLE, SlaTable } from "../src/analytics/sla_table.js";
import { ConfigError } from "../src/shared/errors.js";
import { makeIncident, withoutHandleTime } from "./helpers.js";

describe("SLA table", () => {
  it("default table covers impact and urgency 1..3 only", () => {
    expect(DEFAULT_SLA_TABLE.size).toBe(9);
    expect(DEFAULT_SLA_TABLE.get(1, 1)).toBe(0.25);
    expect(DEFAULT_SLA_TABLE.get(2, 1)).toBe(0.5);
    expect(DEFAULT_SLA_TABLE.get(1, 2)).toBe(0.5);
    expect(DEFAULT_SLA_TABLE.get(3, 1)).toBe(1);
    expect(DEFAULT_SLA_TABLE.get(1, 3)).toBe(1);
    expect(DEFAULT_SLA_TABLE.get(2, 2)).toBe(1);
    expect(DEFAULT_SLA_TABLE.get(2, 3)).toBe(2);
    expect(DEFAULT_SLA_TABLE.get(3, 2)).toBe(2);
    expect(DEFAULT_SLA_TABLE.get(3, 3)).toBe(4);
    expect(DEFAULT_SLA_TABLE.get(0, 0)).toBeUndefined();
    expect(DEFAULT_SLA_TABLE.get(4, 1)).toBeUndefined();
    expect(DEFAULT_SLA_TABLE.get(5, 5)).toBeUndefined();
  });

  it("treats out-of-range pairs as absent", () => {
    expect(DEFAULT_SLA_TABLE.get(-1, 1)).toBeUndefined();
    expect(DEFAULT_SLA_TABLE.get(1.5, 1)).toBeUndefined();
    expect(DEFAULT_SLA_TABLE.has(1, 256)).toBe(false);
  });

  it("keeps a zero-hour SLA distinct from no SLA", () => {
    const table = new SlaTable([{ impact: 1, urgency: 1, hours: 0 }]);
    expect(table.has(1, 1)).toBe(true);
    expect(table.get(1, 1)).toBe(0);
    expect(table.has(1, 2)).toBe(false);
  });

  it("parses the text form, skipping null entries", () => {
    const table = SlaTable.fromRecord({ "1_1": 2, "2_2": null, "0_0": 8 });
    expect(table.get(1, 1)).toBe(2);
    expect(table.get(0, 0)).toBe(8);
    expect(table.has(2, 2)).toBe(false);
    expect(table.size).toBe(2);
  });

  it("rejects malformed keys and durations", () => {
    expect(() => SlaTable.fromRecord({ "1-1": 2 })).toThrow(ConfigError);
    expect(() => SlaTable.fromRecord({ "1_1": -1 })).toThrow(/invalid duration/);
    expect(() => new SlaTable([{ impact: 1, urgency: 300, hours: 1 }])).toThrow(ConfigError);
  });

  it("round-trips through the text form in (impact, urgency) order", () => {
    const record = DEFAULT_SLA_TABLE.toRecord();
    expect(Object.keys(record)).toEqual(["1_1", "1_2", "1_3", "2_1", "2_2", "2_3", "3_1", "3_2", "3_3"]);
    expect(SlaTable.fromRecord(record).entries()).toEqual(DEFAULT_SLA_TABLE.entries());
  });
});

describe("Breach severity", () => {
  it("grades by ratio with inclusive upper bounds", () => {
    expect(gradeBreachSeverity(1.0001)).toBe("Low");
    expect(gradeBreachSeverity(1.2)).toBe("Low");
    expect(gradeBreachSeverity(1.21)).toBe("Medium");
    expect(gradeBreachSeverity(1.5)).toBe("Medium");
    expect(gradeBreachSeverity(1.51)).toBe("High");
    expect(gradeBreachSeverity(2.0)).toBe("High");
    expect(gradeBreachSeverity(2.01)).toBe("Critical");
    expect(gradeBreachSeverity(Number.POSITIVE_INFINITY)).toBe("Critical");
  });

  it("breach ratio is unbounded for a zero-hour SLA", () => {
    expect(breachRatio(3, 1)).toBe(3);
    expect(breachRatio(1, 0)).toBe(Number.POSITIVE_INFINITY);
  });
});

describe("checkSlaBreaches", () => {
  it("flags a critical breach", () => {
    const result = checkSlaBreaches(
      [makeIncident({ incident_id: "INC1", impact: 3, urgency: 1, priority: 1, handle_time_hrs: 3.0 })],
      DEFAULT_SLA_TABLE
    );
    expect(result.totalSlaBreaches).toBe(1);
    expect(result.breachedDetails).toEqual([
      {
        incidentId: "INC1",
        impact: 3,
        urgency: 1,
        priority: 1,
        handleTimeHrs: 3,
        slaDurationHrs: 1,
        breachTime: "2024-01-01T10:00:00.000Z",
        severity: "Critical",
        breachRatio: 3,
      },
    ]);
    expect(result.breaches).toEqual([
      { incidentId: "INC1", breach: true, breachTime: "2024-01-01T10:00:00.000Z" },
    ]);
  });

  it("does not flag handling within the SLA", () => {
    const result = checkSlaBreaches(
      [makeIncident({ incident_id: "INC2", impact: 1, urgency: 1, handle_time_hrs: 0.1 })],
      DEFAULT_SLA_TABLE
    );
    expect(result.totalSlaBreaches).toBe(0);
    expect(result.breachedDetails).toEqual([]);
    expect(result.breaches).toEqual([
      { incidentId: "INC2", breach: false, breachTime: "2024-01-01T10:00:00.000Z" },
    ]);
  });

  it("handling exactly at the SLA is not a breach", () => {
    const result = checkSlaBreaches(
      [makeIncident({ incident_id: 1, impact: 2, urgency: 2, handle_time_hrs: 1 })],
      DEFAULT_SLA_TABLE
    );
    expect(result.breaches[0].breach).toBe(false);
  });

  it("exempts pairs without an SLA but counts them as analyzed", () => {
    const result = checkSlaBreaches(
      [makeIncident({ incident_id: 1, impact: 0, urgency: 0, handle_time_hrs: 50 })],
      DEFAULT_SLA_TABLE
    );
    expect(result.totalIncidentsAnalyzed).toBe(1);
    expect(result.totalSlaBreaches).toBe(0);
    expect(result.exemptIncidents).toBe(1);
    expect(result.breaches).toEqual([]);
  });

  it("exempts incidents without handle time or a readable open time", () => {
    const result = checkSlaBreaches(
      [
        makeIncident({ incident_id: 1, impact: 3, urgency: 1, handle_time_hrs: null }),
        makeIncident({ incident_id: 2, impact: 3, urgency: 1, handle_time_hrs: 9, open_time: "n/a" }),
        makeIncident({ incident_id: 3, impact: 3, urgency: 1, handle_time_hrs: 9, open_time: null }),
      ],
      DEFAULT_SLA_TABLE
    );
    expect(result.totalIncidentsAnalyzed).toBe(3);
    expect(result.exemptIncidents).toBe(3);
    expect(result.totalSlaBreaches).toBe(0);
    expect(result.slaBreachPercentage).toBe(0);
  });

  it("exempts a record whose handle time field is absent", () => {
    const result = checkSlaBreaches(
      [
        withoutHandleTime(makeIncident({ incident_id: 1, impact: 3, urgency: 1 })),
        makeIncident({ incident_id: 2, impact: 1, urgency: 1, handle_time_hrs: 0.5 }),
      ],
      DEFAULT_SLA_TABLE
    );
    expect(result.exemptIncidents).toBe(1);
    expect(result.breaches).toEqual([
      { incidentId: 2, breach: true, breachTime: "2024-01-01T10:00:00.000Z" },
    ]);
    expect(summarizeBreachIndicators(result.breaches).totalIncidents).toBe(1);
  });

  it("exempts infinite handle times", () => {
    const result = checkSlaBreaches(
      [makeIncident({ incident_id: 1, impact: 3, urgency: 1, handle_time_hrs: Number.POSITIVE_INFINITY })],
      DEFAULT_SLA_TABLE
    );
    expect(result.exemptIncidents).toBe(1);
    expect(result.breachedDetails).toEqual([]);
  });

  it("grades every breach from its ratio", () => {
    const result = checkSlaBreaches(
      [
        makeIncident({ incident_id: "low", impact: 1, urgency: 3, handle_time_hrs: 1.1 }),
        makeIncident({ incident_id: "medium", impact: 3, urgency: 3, handle_time_hrs: 6 }),
        makeIncident({ incident_id: "high", impact: 3, urgency: 3, handle_time_hrs: 7 }),
        makeIncident({ incident_id: "high-edge", impact: 3, urgency: 2, handle_time_hrs: 4 }),
      ],
      DEFAULT_SLA_TABLE
    );
    expect(result.breachedDetails.map((d) => [d.incidentId, d.severity, d.breachRatio])).toEqual([
      ["low", "Low", 1.1],
      ["medium", "Medium", 1.5],
      ["high", "High", 1.75],
      ["high-edge", "High", 2],
    ]);
    for (const d of result.breachedDetails) {
      expect(d.breachRatio).toBeGreaterThan(1);
    }
  });

  it("zero-hour SLA breaches with an unbounded ratio", () => {
    const table = new SlaTable([{ impact: 1, urgency: 1, hours: 0 }]);
    const result = checkSlaBreaches(
      [
        makeIncident({ incident_id: "late", impact: 1, urgency: 1, handle_time_hrs: 0.5 }),
        makeIncident({ incident_id: "instant", impact: 1, urgency: 1, handle_time_hrs: 0 }),
      ],
      table
    );
    expect(result.totalSlaBreaches).toBe(1);
    expect(result.breachedDetails[0].breachRatio).toBe(Number.POSITIVE_INFINITY);
    expect(result.breachedDetails[0].severity).toBe("Critical");
    expect(result.breaches.map((b) => b.breach)).toEqual([true, false]);
  });

  it("percentage is over all incidents, exempt ones included", () => {
    const result = checkSlaBreaches(
      [
        makeIncident({ incident_id: 1, impact: 3, urgency: 1, handle_time_hrs: 3 }),
        makeIncident({ incident_id: 2, impact: 1, urgency: 1, handle_time_hrs: 0.1 }),
        makeIncident({ incident_id: 3, impact: 0, urgency: 0, handle_time_hrs: 3 }),
      ],
      DEFAULT_SLA_TABLE
    );
    expect(result.totalSlaBreaches).toBeLessThanOrEqual(result.totalIncidentsAnalyzed);
    expect(result.slaBreachPercentage).toBeCloseTo(33.333, 2);
    expect(summarizeBreachIndicators(result.breaches)).toEqual({
      totalIncidents: 2,
      totalBreaches: 1,
      breachPercentage: 50,
    });
  });

  it("empty input yields zero totals", () => {
    const result = checkSlaBreaches([], DEFAULT_SLA_TABLE);
    expect(result).toEqual({
      totalIncidentsAnalyzed: 0,
      totalSlaBreaches: 0,
      slaBreachPercentage: 0,
      exemptIncidents: 0,
      breaches: [],
      breachedDetails: [],
    });
    expect(summarizeBreachIndicators([])).toEqual({
      totalIncidents: 0,
      totalBreaches: 0,
      breachPercentage: 0,
    });
  });
});
