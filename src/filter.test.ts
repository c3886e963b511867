/**
 * Scan Filters — Tests
 */

import { describe, it, expect } from "vitest";
import { buildPrefixFilter, collectRecords, matchesPolicyFilter } from "./filter.js";

describe("buildPrefixFilter", () => {
  it("requires pType and each value from the field offset", () => {
    expect(buildPrefixFilter("g", 0, ["alice", "data2_admin"])).toEqual({
      expression: "#pType = :pType AND #v0 = :v0 AND #v1 = :v1",
      expressionAttributeNames: { "#pType": "pType", "#v0": "v0", "#v1": "v1" },
      expressionAttributeValues: { ":pType": "g", ":v0": "alice", ":v1": "data2_admin" },
    });
  });

  it("offsets attribute names by the field index", () => {
    const filter = buildPrefixFilter("g", 1, ["data2_admin", "domain1"]);
    expect(filter?.expression).toBe("#pType = :pType AND #v1 = :v1 AND #v2 = :v2");
    expect(filter?.expressionAttributeValues).toEqual({ ":pType": "g", ":v1": "data2_admin", ":v2": "domain1" });
  });

  it("skips empty values instead of matching empty strings", () => {
    const filter = buildPrefixFilter("p", 0, ["", "data1", ""]);
    expect(filter?.expression).toBe("#pType = :pType AND #v1 = :v1");
    expect(filter?.expressionAttributeNames).toEqual({ "#pType": "pType", "#v1": "v1" });
  });

  it("builds nothing when a value falls past the last stored field", () => {
    expect(buildPrefixFilter("p", 5, ["x", "y"])).toBeUndefined();
    expect(buildPrefixFilter("p", 6, ["alice"])).toBeUndefined();
  });

  it("ignores empty values past the last stored field", () => {
    expect(buildPrefixFilter("p", 5, ["x", ""])?.expression).toBe("#pType = :pType AND #v5 = :v5");
  });

  it("rejects negative and fractional field indexes", () => {
    expect(() => buildPrefixFilter("p", -1, ["alice"])).toThrow(RangeError);
    expect(() => buildPrefixFilter("p", 1.5, ["alice"])).toThrow(
      "Field index must be a non-negative integer, got 1.5",
    );
  });
});

describe("matchesPolicyFilter", () => {
  const rule = ["alice", "domain1", "data1", "read"];

  it("matches when there are no patterns", () => {
    expect(matchesPolicyFilter(rule, undefined)).toBe(true);
    expect(matchesPolicyFilter(rule, [])).toBe(true);
  });

  it("treats empty patterns as wildcards", () => {
    expect(matchesPolicyFilter(rule, ["", "domain1"])).toBe(true);
    expect(matchesPolicyFilter(rule, ["", "domain2"])).toBe(false);
  });

  it("fails when a pattern reaches past the rule", () => {
    expect(matchesPolicyFilter(["alice", "admin"], ["", "", "domain1"])).toBe(false);
  });
});

describe("collectRecords", () => {
  it("drains an async iterable", async () => {
    async function* source() {
      yield { id: "a" };
      yield { id: "b" };
    }
    expect(await collectRecords(source())).toEqual([{ id: "a" }, { id: "b" }]);
  });
});
