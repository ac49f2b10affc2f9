import { describe, expect, it } from "vitest";
import { ValueConversionError } from "../src/core/errors.js";
import { cellToText, cleanRecord } from "../src/core/services/column-cleaner.js";
import { registryRows, rule, testRegistry } from "./fixtures.js";

const registry = testRegistry();
const controlRules = registry.rulesFor("control");
const context = { entityType: "control" as const, rowNumber: 7 };

describe("cleanRecord", () => {
  it("splits, trims and dedups list values keeping the first spelling", () => {
    const result = cleanRecord(
      { "SCF #": "GOV-01", "NIST 800-53 R5": "PM-1; PM-2; PM-1; pm-3" },
      controlRules,
      context
    );
    expect(result.record.nist_800_53_rev5).toEqual(["PM-1", "PM-2", "pm-3"]);
    expect(result.identifier).toBe("GOV-01");
    expect(result.errors).toEqual([]);
  });

  it("coerces booleans, numbers and enums", () => {
    const result = cleanRecord(
      { "SCF #": "GOV-01", Automated: "YES", Weight: " 1,250.5 ", Cadence: "quarterly" },
      controlRules,
      context
    );
    expect(result.record).toEqual({ control_id: "GOV-01", automated: true, weight: 1250.5, cadence: "Quarterly" });
  });

  it("treats a blank boolean as false", () => {
    const result = cleanRecord({ "SCF #": "GOV-01", Automated: "  " }, controlRules, context);
    expect(result.record.automated).toBe(false);
  });

  it("keeps native cell types", () => {
    const result = cleanRecord({ "SCF #": "GOV-01", Automated: true, Weight: 3 }, controlRules, context);
    expect(result.record).toEqual({ control_id: "GOV-01", automated: true, weight: 3 });
  });

  it("returns conversion errors and omits the failing fields", () => {
    const result = cleanRecord(
      { "SCF #": "GOV-01", Title: "Compliance", Automated: "maybe", Weight: "12abc", Cadence: "weekly" },
      controlRules,
      context
    );
    expect(result.record).toEqual({ control_id: "GOV-01", title: "Compliance" });
    expect(result.errors).toHaveLength(3);

    const [automated, weight, cadence] = result.errors;
    expect(automated).toBeInstanceOf(ValueConversionError);
    expect(automated).toMatchObject({
      entityType: "control",
      rowNumber: 7,
      column: "Automated",
      field: "automated",
      rawValue: "maybe",
      identifier: "GOV-01"
    });
    expect(automated?.message).toBe(
      'control row 7 (GOV-01), column "Automated": not a recognized boolean token (raw value: "maybe").'
    );
    expect(weight?.field).toBe("weight");
    expect(cadence?.message).toContain("expected one of Annual, Quarterly");
  });

  it("drops removed columns and blank values", () => {
    const result = cleanRecord(
      { "SCF #": "GOV-01", Title: "   ", Notes: "internal only", Threats: " ; ; " },
      controlRules,
      context
    );
    expect(result.record).toEqual({ control_id: "GOV-01" });
  });

  it("emits empty values under the empty blank policy", () => {
    const rows = [
      ...registryRows,
      rule("Tags", "control", "tags", "list", { delimiter: ",", blank_policy: "empty" }),
      rule("Owner", "control", "owner", "string", { blank_policy: "empty", casing: "upper" })
    ];
    const rules = testRegistry(rows).rulesFor("control");

    const blank = cleanRecord({ "SCF #": "GOV-01", Tags: "", Owner: "" }, rules, context);
    expect(blank.record).toEqual({ control_id: "GOV-01", tags: [], owner: "" });

    const filled = cleanRecord({ "SCF #": "GOV-01", Tags: "a, b", Owner: "risk team" }, rules, context);
    expect(filled.record).toEqual({ control_id: "GOV-01", tags: ["a", "b"], owner: "RISK TEAM" });
  });

  it("passes unmapped columns through untouched", () => {
    const result = cleanRecord({ "SCF #": "GOV-01", "Owner Team": "  Ops ", Reviewed: 0 }, controlRules, context);
    expect(result.unmapped).toEqual(["Owner Team", "Reviewed"]);
    expect(result.record).toEqual({ control_id: "GOV-01", owner_team: "  Ops ", reviewed: 0 });
  });

  it("strips invisible characters before trimming", () => {
    const result = cleanRecord({ "SCF #": "\uFEFFGOV-01", Title: "Com\u200bpliance\u0007 " }, controlRules, context);
    expect(result.identifier).toBe("GOV-01");
    expect(result.record.title).toBe("Compliance");
  });

  it("reports a missing identifier", () => {
    const result = cleanRecord({ "SCF #": "", Title: "Orphan" }, controlRules, context);
    expect(result.identifier).toBeUndefined();
    expect(result.record).toEqual({ title: "Orphan" });
  });

  it("skips declared columns the row does not carry", () => {
    const result = cleanRecord({ "SCF #": "GOV-01" }, controlRules, context);
    expect(result.record).toEqual({ control_id: "GOV-01" });
  });
});

describe("cellToText", () => {
  it("renders midnight dates as calendar days", () => {
    expect(cellToText(new Date("2024-03-01T00:00:00.000Z"))).toBe("2024-03-01");
    expect(cellToText(new Date("2024-03-01T10:30:00.000Z"))).toBe("2024-03-01T10:30:00.000Z");
    expect(cellToText(null)).toBe("");
    expect(cellToText(42)).toBe("42");
  });
});
