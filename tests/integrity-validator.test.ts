import { describe, expect, it } from "vitest";
import { evaluateIntegrity, summarizeViolations, validate } from "../src/core/services/integrity-validator.js";
import { RelationshipExtractor } from "../src/core/services/relationship-extractor.js";
import { SheetNormalizer } from "../src/core/services/sheet-normalizer.js";
import type { EntityTable, EntityType, LinkTable } from "../src/core/types/domain.js";
import { sampleExtraction, testRegistry } from "./fixtures.js";

const controls: EntityTable = {
  entityType: "control",
  identifierField: "control_id",
  linkFields: ["nist_800_53_rev5"],
  records: [{ control_id: "GOV-01" }]
};

const nistList: EntityTable = {
  entityType: "framework:nist_800_53_rev5",
  identifierField: "id",
  linkFields: [],
  records: [{ id: "PM-1" }, { id: "PM-2" }]
};

function nistLinks(targets: Array<[string, string]>): LinkTable {
  return {
    relationshipType: "scf_to_nist_800_53_rev5",
    kind: "framework",
    targetEntityType: "framework:nist_800_53_rev5",
    frameworkKey: "nist_800_53_rev5",
    sourceColumn: "control_id",
    targetColumn: "nist_800_53_rev5",
    links: targets.map(([sourceId, targetId]) => ({ relationshipType: "scf_to_nist_800_53_rev5", sourceId, targetId }))
  };
}

describe("validate", () => {
  it("warns once for an unknown framework target and keeps the link", () => {
    const tables = new Map<EntityType, EntityTable>([
      ["control", controls],
      ["framework:nist_800_53_rev5", nistList]
    ]);
    const table = nistLinks([
      ["GOV-01", "PM-1"],
      ["GOV-01", "XX-99"]
    ]);
    const links = new Map([[table.relationshipType, table]]);

    expect(validate(tables, links)).toEqual([
      {
        relationshipType: "scf_to_nist_800_53_rev5",
        sourceId: "GOV-01",
        targetId: "XX-99",
        targetEntityType: "framework:nist_800_53_rev5",
        severity: "warning",
        reason: "unknown_target"
      }
    ]);
    expect(table.links).toHaveLength(2);
  });

  it("reports unknown controls as errors", () => {
    const tables = new Map<EntityType, EntityTable>([
      ["control", controls],
      ["framework:nist_800_53_rev5", nistList]
    ]);
    const table = nistLinks([["ZZZ-01", "PM-2"]]);
    const violations = validate(tables, new Map([[table.relationshipType, table]]));
    expect(violations.map((violation) => [violation.severity, violation.reason])).toEqual([
      ["error", "unknown_control"]
    ]);
  });

  it("flags targets of a framework without an authoritative list", () => {
    const tables = new Map<EntityType, EntityTable>([["control", controls]]);
    const table = nistLinks([
      ["GOV-01", "PM-1"],
      ["ZZZ-01", "PM-2"]
    ]);
    const violations = validate(tables, new Map([[table.relationshipType, table]]));
    expect(violations.map((violation) => [violation.sourceId, violation.severity, violation.reason])).toEqual([
      ["GOV-01", "warning", "missing_target_table"],
      ["ZZZ-01", "error", "unknown_control"],
      ["ZZZ-01", "warning", "missing_target_table"]
    ]);
  });

  it("validates the sample pipeline tables", () => {
    const registry = testRegistry();
    const { tables } = new SheetNormalizer(registry).normalize(sampleExtraction());
    const { links } = new RelationshipExtractor(registry).extract(tables);
    const violations = validate(tables, links);

    expect(violations.filter((violation) => violation.reason === "unknown_target")).toEqual([
      {
        relationshipType: "scf_to_threat",
        sourceId: "IAC-02",
        targetId: "XT-9",
        targetEntityType: "threat",
        severity: "warning",
        reason: "unknown_target"
      }
    ]);
    expect(summarizeViolations(violations)).toEqual({
      errors: 0,
      warnings: 5,
      byRelationshipType: {
        scf_to_threat: { errors: 0, warnings: 1 },
        scf_to_nist_800_53_rev5: { errors: 0, warnings: 3 },
        scf_to_iso_27001: { errors: 0, warnings: 1 }
      }
    });
  });
});

describe("evaluateIntegrity", () => {
  const warning = {
    relationshipType: "scf_to_threat",
    sourceId: "GOV-01",
    targetId: "XT-9",
    targetEntityType: "threat" as const,
    severity: "warning" as const,
    reason: "unknown_target" as const
  };
  const error = { ...warning, sourceId: "ZZZ-01", severity: "error" as const, reason: "unknown_control" as const };

  it("closes on errors by default", () => {
    const decision = evaluateIntegrity([warning, error]);
    expect(decision.open).toBe(false);
    expect(decision.reasons).toEqual(["1 link(s) reference unknown controls"]);
  });

  it("lets errors through when the caller allows it", () => {
    expect(evaluateIntegrity([error], { failOnError: false }).open).toBe(true);
  });

  it("escalates warnings above the caller limit", () => {
    expect(evaluateIntegrity([warning, warning], { failOnError: true, maxWarnings: 2 }).open).toBe(true);
    const decision = evaluateIntegrity([warning, warning, warning], { failOnError: true, maxWarnings: 2 });
    expect(decision.open).toBe(false);
    expect(decision.reasons).toEqual(["3 warning(s) exceed the limit of 2"]);
    expect(decision.summary.warnings).toBe(3);
  });
});
