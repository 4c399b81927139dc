import { describe, it, expect } from "vitest";
import { decodeCategories, decodeCode, topCodes, UNKNOWN_LABEL } from "../src/analytics/categories.js";
import type { CategoryMapping } from "../src/shared/types.js";
import { makeIncident } from "./helpers.js";

const mapping: CategoryMapping = {
  categories: new Map([
    [1, "computer"],
    [7, "software"],
  ]),
  subcategories: new Map([[6, "Laptop"]]),
};

describe("decodeCode", () => {
  it("returns the configured label for a known code", () => {
    expect(decodeCode(mapping.categories, 7)).toBe("software");
  });

  it("returns Unknown for any unmapped code", () => {
    expect(UNKNOWN_LABEL).toBe("Unknown");
    expect(decodeCode(mapping.categories, 99)).toBe("Unknown");
    expect(decodeCode(mapping.categories, -1)).toBe("Unknown");
    expect(decodeCode(mapping.categories, 1.5)).toBe("Unknown");
    expect(decodeCode(mapping.categories, Number.MAX_SAFE_INTEGER)).toBe("Unknown");
    expect(decodeCode(mapping.categories, null)).toBe("Unknown");
  });
});

describe("decodeCategories", () => {
  it("labels every incident", () => {
    const decoded = decodeCategories(
      [
        makeIncident({ incident_id: "A", category_code: 1, subcategory_code: 6 }),
        makeIncident({ incident_id: "B", category_code: 3, subcategory_code: null }),
      ],
      mapping
    );
    expect(decoded).toEqual([
      { incidentId: "A", categoryCode: 1, category: "computer", subcategoryCode: 6, subcategory: "Laptop" },
      { incidentId: "B", categoryCode: 3, category: "Unknown", subcategoryCode: null, subcategory: "Unknown" },
    ]);
  });

  it("returns nothing for no incidents", () => {
    expect(decodeCategories([], mapping)).toEqual([]);
  });
});

describe("topCodes", () => {
  const codes = [1, 7, 7, 3, 3, 3, null];
  const incidents = codes.map((code, i) => makeIncident({ incident_id: i, category_code: code }));

  it("ranks codes by frequency and skips missing codes", () => {
    expect(topCodes(incidents, "category_code", mapping.categories)).toEqual([
      { code: 3, label: "Unknown", count: 3 },
      { code: 7, label: "software", count: 2 },
      { code: 1, label: "computer", count: 1 },
    ]);
  });

  it("limits the ranking to n entries", () => {
    expect(topCodes(incidents, "category_code", mapping.categories, 1)).toEqual([
      { code: 3, label: "Unknown", count: 3 },
    ]);
  });

  it("keeps first-seen order for equal counts", () => {
    const tied = [5, 4, 4, 5].map((code, i) => makeIncident({ incident_id: i, subcategory_code: code }));
    expect(topCodes(tied, "subcategory_code", mapping.subcategories).map((t) => t.code)).toEqual([5, 4]);
  });
});
