import { createSchemaRegistry, type SchemaRegistry } from "../src/core/registry/schema-registry.js";
import type { RawExtraction } from "../src/core/types/domain.js";

type RuleOption =
  | "delimiter"
  | "blank_policy"
  | "casing"
  | "role"
  | "target_entity"
  | "enum_values"
  | "fill"
  | "group";

export function rule(
  raw_column: string,
  entity_type: string,
  target_field: string,
  value_type: string,
  extra: Partial<Record<RuleOption, string>> = {}
): Record<string, string> {
  return { raw_column, entity_type, target_field, value_type, ...extra };
}

export const registryRows: Array<Record<string, string>> = [
  rule("SCF #", "control", "control_id", "string", { role: "identifier" }),
  rule("Title", "control", "title", "string"),
  rule("Automated", "control", "automated", "boolean"),
  rule("Weight", "control", "weight", "number"),
  rule("Cadence", "control", "cadence", "enum", { enum_values: "Annual|Quarterly" }),
  rule("Notes", "control", "notes", "string", { role: "remove" }),
  rule("Threats", "control", "threat_ids", "list", { delimiter: ";", role: "entity_link", target_entity: "threat" }),
  rule("NIST 800-53 R5", "control", "nist_800_53_rev5", "list", { delimiter: ";", role: "framework_link" }),
  rule("ISO 27001", "control", "iso_27001", "list", { delimiter: ";", role: "framework_link" }),
  rule("Identifier", "domain", "identifier", "string", { role: "identifier" }),
  rule("Name", "domain", "name", "string"),
  rule("Grouping", "threat", "grouping", "string", { fill: "forward" }),
  rule("Threat #", "threat", "threat_id", "string", { role: "identifier" }),
  rule("Threat", "threat", "name", "string"),
  rule("AO #", "assessment_objective", "ao_id", "string", { role: "identifier" }),
  rule("SCF #", "assessment_objective", "scf_ids", "list", { delimiter: ";", role: "control_link" }),
  rule("Objective", "assessment_objective", "objective", "string"),
  rule("Framework ID", "framework", "id", "string", { role: "identifier" }),
  rule("Title", "framework", "title", "string")
];

export function testRegistry(rows: Array<Record<string, string>> = registryRows): SchemaRegistry {
  return createSchemaRegistry(rows);
}

export function sampleExtraction(): RawExtraction {
  return {
    sheets: [
      {
        name: "SCF 2025.1",
        rows: [
          {
            "SCF #": "GOV-01",
            Title: "Compliance",
            Automated: "x",
            Weight: "10",
            Cadence: "annual",
            Notes: "internal",
            Threats: "NT-1; MT-2",
            "NIST 800-53 R5": "PM-1; PM-2",
            "ISO 27001": "5.1",
            "Errata 2025.1": "changed"
          },
          {
            "SCF #": "IAC-02",
            Title: "Identification",
            Automated: "",
            Weight: "1,250",
            Cadence: "",
            Notes: "",
            Threats: "MT-2; XT-9",
            "NIST 800-53 R5": "IA-2",
            "ISO 27001": "",
            "Errata 2025.1": ""
          }
        ]
      },
      {
        name: "SCF Domains & Principles",
        rows: [
          { Identifier: "GOV", Name: "Governance" },
          { Identifier: "IAC", Name: "Identification & Authentication" }
        ]
      },
      {
        name: "Threat Catalog",
        rows: [
          { Grouping: "Natural", "Threat #": "NT-1", Threat: "Flood" },
          { Grouping: "Man-Made", "Threat #": "MT-2", Threat: "Phishing" },
          { Grouping: "", "Threat #": "MT-3", Threat: "Insider" }
        ]
      },
      {
        name: "Assessment Objectives",
        rows: [
          { "AO #": "GOV-01_A01", "SCF #": "GOV-01", Objective: "Policy exists" },
          { "AO #": "IAC-02_A01", "SCF #": "IAC-02; GOV-01", Objective: "Users are identified" }
        ]
      },
      { name: "Lists", rows: [{ Value: "ignored" }] }
    ]
  };
}
