import { describe, expect, it } from "vitest";
import { RelationshipExtractor, listFrameworks } from "../src/core/services/relationship-extractor.js";
import { SheetNormalizer } from "../src/core/services/sheet-normalizer.js";
import type { EntityTable, EntityType, LinkTables } from "../src/core/types/domain.js";
import { registryRows, rule, sampleExtraction, testRegistry } from "./fixtures.js";

const registry = testRegistry();

function pairs(links: LinkTables, relationshipType: string): Array<[string, string]> {
  return (links.get(relationshipType)?.links ?? []).map((link) => [link.sourceId, link.targetId]);
}

function extractSample() {
  const { tables } = new SheetNormalizer(registry).normalize(sampleExtraction());
  return { tables, ...new RelationshipExtractor(registry).extract(tables) };
}

describe("RelationshipExtractor", () => {
  it("emits every declared relationship type plus the derived domain link", () => {
    const { links, issues } = extractSample();
    expect([...links.keys()]).toEqual([
      "scf_to_threat",
      "scf_to_nist_800_53_rev5",
      "scf_to_iso_27001",
      "scf_to_assessment_objective",
      "scf_to_domain"
    ]);
    expect(issues).toEqual([]);
  });

  it("keeps cleaner order for forward links", () => {
    const { links } = extractSample();
    expect(pairs(links, "scf_to_threat")).toEqual([
      ["GOV-01", "NT-1"],
      ["GOV-01", "MT-2"],
      ["IAC-02", "MT-2"],
      ["IAC-02", "XT-9"]
    ]);
    expect(pairs(links, "scf_to_nist_800_53_rev5")).toEqual([
      ["GOV-01", "PM-1"],
      ["GOV-01", "PM-2"],
      ["IAC-02", "IA-2"]
    ]);
  });

  it("reads reverse links from the auxiliary table", () => {
    const { links } = extractSample();
    expect(pairs(links, "scf_to_assessment_objective")).toEqual([
      ["GOV-01", "GOV-01_A01"],
      ["IAC-02", "IAC-02_A01"],
      ["GOV-01", "IAC-02_A01"]
    ]);
  });

  it("derives domains from the control id prefix", () => {
    const { links } = extractSample();
    expect(pairs(links, "scf_to_domain")).toEqual([
      ["GOV-01", "GOV"],
      ["IAC-02", "IAC"]
    ]);
    expect(links.get("scf_to_domain")).toMatchObject({
      kind: "entity",
      targetEntityType: "domain",
      sourceColumn: "control_id",
      targetColumn: "identifier",
      frameworkKey: null
    });

    const shortPrefix = new RelationshipExtractor(registry, { domainIdLength: 2 });
    const { tables } = new SheetNormalizer(registry).normalize(sampleExtraction());
    expect(pairs(shortPrefix.extract(tables).links, "scf_to_domain")).toEqual([
      ["GOV-01", "GO"],
      ["IAC-02", "IA"]
    ]);
  });

  it("uses a declared domain link instead of deriving one", () => {
    const rows = [
      ...registryRows,
      rule("Domain", "control", "domain_id", "string", { role: "entity_link", target_entity: "domain" })
    ];
    const withDomain = testRegistry(rows);
    const extraction = sampleExtraction();
    const controlSheet = extraction.sheets[0];
    if (controlSheet) {
      controlSheet.rows = controlSheet.rows.map((row) => ({ ...row, Domain: "IAC" }));
    }
    const { tables } = new SheetNormalizer(withDomain).normalize(extraction);
    const { links } = new RelationshipExtractor(withDomain).extract(tables);

    expect([...links.keys()].filter((type) => type === "scf_to_domain")).toHaveLength(1);
    expect(pairs(links, "scf_to_domain")).toEqual([
      ["GOV-01", "IAC"],
      ["IAC-02", "IAC"]
    ]);
  });

  it("describes framework link tables by their key", () => {
    const { links } = extractSample();
    expect(links.get("scf_to_iso_27001")).toEqual({
      relationshipType: "scf_to_iso_27001",
      kind: "framework",
      targetEntityType: "framework:iso_27001",
      frameworkKey: "iso_27001",
      sourceColumn: "control_id",
      targetColumn: "iso_27001",
      links: [{ relationshipType: "scf_to_iso_27001", sourceId: "GOV-01", targetId: "5.1" }]
    });
  });

  it("reports a missing source table for reverse links", () => {
    const { tables } = new SheetNormalizer(registry).normalize(sampleExtraction());
    const partial = new Map<EntityType, EntityTable>(
      [...tables].filter(([entityType]) => entityType !== "assessment_objective")
    );
    const { links, issues } = new RelationshipExtractor(registry).extract(partial);
    expect(links.get("scf_to_assessment_objective")?.links).toEqual([]);
    expect(issues).toEqual([
      {
        severity: "info",
        code: "relationship_source_missing",
        entityType: "assessment_objective",
        field: "scf_ids",
        message: "No assessment_objective table; scf_to_assessment_objective is empty."
      }
    ]);
  });
});

describe("listFrameworks", () => {
  it("summarizes framework link tables", () => {
    const { links, tables } = extractSample();
    expect(listFrameworks(links, tables)).toEqual([
      {
        frameworkKey: "nist_800_53_rev5",
        relationshipType: "scf_to_nist_800_53_rev5",
        linkCount: 3,
        controlCount: 2,
        hasAuthoritativeList: false
      },
      {
        frameworkKey: "iso_27001",
        relationshipType: "scf_to_iso_27001",
        linkCount: 1,
        controlCount: 1,
        hasAuthoritativeList: false
      }
    ]);
  });

  it("flags frameworks that ship an authoritative list", () => {
    const extraction = sampleExtraction();
    extraction.sheets.push({ name: "FW - ISO 27001", rows: [{ "Framework ID": "5.1", Title: "Leadership" }] });
    const { tables } = new SheetNormalizer(registry).normalize(extraction);
    const { links } = new RelationshipExtractor(registry).extract(tables);
    expect(listFrameworks(links, tables).map((summary) => summary.hasAuthoritativeList)).toEqual([false, true]);
  });
});
