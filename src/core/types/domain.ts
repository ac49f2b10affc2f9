export type CatalogEntityType =
  | "control"
  | "domain"
  | "assessment_objective"
  | "threat"
  | "risk"
  | "evidence_request"
  | "data_privacy";

export type FrameworkEntityType = `framework:${string}`;

export type EntityType = CatalogEntityType | FrameworkEntityType;

export type ValueType = "string" | "boolean" | "enum" | "number" | "list" | "passthrough";

export type FieldRole = "identifier" | "attribute" | "entity_link" | "framework_link" | "control_link" | "remove";

export type Casing = "preserve" | "lower" | "upper";

export type BlankPolicy = "absent" | "empty";

export interface FieldRule {
  rawColumn: string;
  /** Entity type the rule was declared under; framework tables share the "framework" template. */
  entityType: CatalogEntityType | "framework";
  targetField: string;
  valueType: ValueType;
  role: FieldRole;
  casing: Casing;
  blankPolicy: BlankPolicy;
  delimiter: string | null;
  enumValues: string[];
  targetEntity: CatalogEntityType | null;
  forwardFill: boolean;
  /** Document sub-object the field is nested under; null keeps it at the top level. */
  group: string | null;
  /** Position in the registry file (1-based data row). Fallback rules use 0. */
  registryRow: number;
}

export type FieldValue = string | number | boolean | string[];

export type EntityRecord = Record<string, FieldValue>;

export interface EntityTable {
  entityType: EntityType;
  identifierField: string;
  /** Fields holding relationship references; excluded from embedded document content. */
  linkFields: string[];
  /** Field -> document group, for grouped attribute fields only. */
  fieldGroups?: Record<string, string> | undefined;
  records: EntityRecord[];
}

export type NormalizedTables = ReadonlyMap<EntityType, EntityTable>;

export type RawCell = string | number | boolean | Date | null | undefined;

export type RawRow = Record<string, RawCell>;

export interface RawSheet {
  name: string;
  rows: RawRow[];
  /** Source row number of rows[0]; defaults to 2 (first line after the header). */
  firstRowNumber?: number | undefined;
}

export interface RawExtraction {
  sheets: RawSheet[];
}

export type RelationshipKind = "entity" | "framework";

export interface RelationshipDescriptor {
  relationshipType: string;
  kind: RelationshipKind;
  /** Table that carries the reference field: the control table, or the entity for reverse links. */
  sourceEntityType: CatalogEntityType | "framework";
  field: string;
  targetEntityType: EntityType;
  frameworkKey: string | null;
  direction: "forward" | "reverse" | "derived";
}

export interface LinkRecord {
  relationshipType: string;
  sourceId: string;
  targetId: string;
}

export interface LinkTable {
  relationshipType: string;
  kind: RelationshipKind;
  targetEntityType: EntityType;
  frameworkKey: string | null;
  sourceColumn: string;
  targetColumn: string;
  links: LinkRecord[];
}

export type LinkTables = ReadonlyMap<string, LinkTable>;

export type IssueSeverity = "info" | "warning" | "error";

export type PipelineIssueCode =
  | "value_conversion"
  | "missing_identifier"
  | "duplicate_identifier"
  | "unmapped_column"
  | "sheet_missing"
  | "sheet_ignored"
  | "sheet_unrecognized"
  | "duplicate_sheet"
  | "relationship_source_missing"
  | "reserved_field";

export interface PipelineIssue {
  severity: IssueSeverity;
  code: PipelineIssueCode;
  message: string;
  entityType?: string | undefined;
  sheet?: string | undefined;
  rowNumber?: number | undefined;
  identifier?: string | undefined;
  column?: string | undefined;
  field?: string | undefined;
  rawValue?: string | undefined;
}

export type ViolationSeverity = "error" | "warning";

export type ViolationReason = "unknown_control" | "unknown_target" | "missing_target_table";

export interface IntegrityViolation {
  relationshipType: string;
  sourceId: string;
  targetId: string;
  targetEntityType: EntityType;
  severity: ViolationSeverity;
  reason: ViolationReason;
}

export interface IntegritySummary {
  errors: number;
  warnings: number;
  byRelationshipType: Record<string, { errors: number; warnings: number }>;
}

export interface IntegrityPolicy {
  failOnError: boolean;
  maxWarnings?: number | undefined;
}

export type DocumentValue = string | number | boolean | DocumentValue[] | { [key: string]: DocumentValue };

export interface ControlDocument {
  _id: string;
  control_id: string;
  domain?: Record<string, DocumentValue>;
  assessment_objectives?: Array<Record<string, DocumentValue>>;
  threats?: Array<Record<string, DocumentValue>>;
  risks?: Array<Record<string, DocumentValue>>;
  evidence_requests?: Array<Record<string, DocumentValue>>;
  data_privacy_principles?: Array<Record<string, DocumentValue>>;
  framework_mappings?: Record<string, string[]>;
  [field: string]: DocumentValue | undefined;
}

export interface AssemblyFailure {
  controlId: string;
  code: string;
  message: string;
}

export interface FrameworkSummary {
  frameworkKey: string;
  relationshipType: string;
  linkCount: number;
  controlCount: number;
  hasAuthoritativeList: boolean;
}

export interface PipelineReport {
  generatedAt: string;
  registryDigest: string;
  frameworkFilter: string[];
  counts: {
    entities: Record<string, number>;
    links: Record<string, number>;
    documents: number;
  };
  issues: PipelineIssue[];
  violations: IntegrityViolation[];
  integrity: IntegritySummary;
  assemblyFailures: AssemblyFailure[];
}
