import type { CatalogEntityType, EntityType, FrameworkEntityType } from "./types/domain.js";

export interface CatalogEntry {
  entityType: CatalogEntityType;
  mandatory: boolean;
  /** Sheet keys (see sheetKey) that resolve to this entity type. */
  sheetKeys: string[];
  /** Property name used when records of this type are embedded in a control document. */
  embedAs: string | null;
  embedMode: "single" | "list" | null;
}

export const entityCatalog: readonly CatalogEntry[] = [
  {
    entityType: "control",
    mandatory: true,
    sheetKeys: ["scf", "scf_controls", "controls"],
    embedAs: null,
    embedMode: null
  },
  {
    entityType: "domain",
    mandatory: true,
    sheetKeys: ["scf_domains_principles", "scf_domains", "domains"],
    embedAs: "domain",
    embedMode: "single"
  },
  {
    entityType: "assessment_objective",
    mandatory: false,
    sheetKeys: ["assessment_objectives", "scf_assessment_objectives"],
    embedAs: "assessment_objectives",
    embedMode: "list"
  },
  {
    entityType: "threat",
    mandatory: false,
    sheetKeys: ["threat_catalog", "threats"],
    embedAs: "threats",
    embedMode: "list"
  },
  { entityType: "risk", mandatory: false, sheetKeys: ["risk_catalog", "risks"], embedAs: "risks", embedMode: "list" },
  {
    entityType: "evidence_request",
    mandatory: false,
    sheetKeys: ["evidence_request_list", "evidence_requests"],
    embedAs: "evidence_requests",
    embedMode: "list"
  },
  {
    entityType: "data_privacy",
    mandatory: false,
    sheetKeys: ["data_privacy_mgmt_principles", "data_privacy_principles"],
    embedAs: "data_privacy_principles",
    embedMode: "list"
  }
];

/** Document keys filled by the assembler; control attributes never take these names. */
export const reservedDocumentKeys: ReadonlySet<string> = new Set([
  "_id",
  "control_id",
  "framework_mappings",
  ...entityCatalog.flatMap((entry) => (entry.embedAs ? [entry.embedAs] : []))
]);

/** Field name inside its document group: "pptdf_applicability_people" in "pptdf_applicability" is "people". */
export function groupMemberName(field: string, group: string): string {
  return field.startsWith(`${group}_`) ? field.slice(group.length + 1) : field;
}

const catalogByType = new Map<string, CatalogEntry>(entityCatalog.map((entry) => [entry.entityType, entry]));

export function isCatalogEntityType(value: string): value is CatalogEntityType {
  return catalogByType.has(value);
}

export function frameworkEntityType(frameworkKey: string): FrameworkEntityType {
  return `framework:${frameworkKey}`;
}

export function isFrameworkEntityType(entityType: EntityType): entityType is FrameworkEntityType {
  return entityType.startsWith("framework:");
}

export const relationshipPrefix = "scf_to_";

export function relationshipTypeFor(key: string): string {
  return `${relationshipPrefix}${key}`;
}
