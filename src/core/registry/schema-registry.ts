import { readFileSync, statSync } from "node:fs";
import Papa from "papaparse";
import { digestOf } from "../../lib/hash.js";
import { stripInvisible, toSnakeCase } from "../../lib/text.js";
import { ConfigurationError } from "../errors.js";
import {
  frameworkEntityType,
  groupMemberName,
  isCatalogEntityType,
  isFrameworkEntityType,
  relationshipTypeFor,
  reservedDocumentKeys
} from "../entity-types.js";
import type { CatalogEntityType, EntityType, FieldRule, RelationshipDescriptor } from "../types/domain.js";
import { registryRowSchema, requiredRegistryColumns, type RegistryRow } from "../types/schemas.js";

type RuleOwner = CatalogEntityType | "framework";

/** Headers starting with these prefixes change every release and are never reported as unmapped. */
export const unreportedColumnPrefixes = ["Errata"];

const namedDelimiters: Record<string, string> = {
  "\\n": "\n",
  newline: "\n",
  "\\t": "\t",
  tab: "\t",
  semicolon: ";",
  comma: ",",
  pipe: "|"
};

export function decodeDelimiter(raw: string | undefined): string | null {
  if (raw === undefined) {
    return null;
  }
  const trimmed = raw.trim();
  return namedDelimiters[trimmed.toLowerCase()] ?? (trimmed.length > 0 ? trimmed : raw);
}

export function normalizeHeader(header: string): string {
  return stripInvisible(header).replace(/\s+/g, " ").trim().toLowerCase();
}

export function fallbackRule(rawColumn: string, entityType: RuleOwner): FieldRule {
  return {
    rawColumn,
    entityType,
    targetField: toSnakeCase(rawColumn) || "column",
    valueType: "passthrough",
    role: "attribute",
    casing: "preserve",
    blankPolicy: "absent",
    delimiter: null,
    enumValues: [],
    targetEntity: null,
    forwardFill: false,
    group: null,
    registryRow: 0
  };
}

function ownerOf(entityType: EntityType): RuleOwner {
  return isFrameworkEntityType(entityType) ? "framework" : entityType;
}

function toRule(row: RegistryRow, registryRow: number, owner: RuleOwner, problems: string[]): FieldRule | null {
  const where = `row ${registryRow} (${row.entity_type}.${row.target_field})`;
  const delimiter = decodeDelimiter(row.delimiter);
  const enumValues = (row.enum_values ?? "")
    .split("|")
    .map((value) => value.trim())
    .filter((value) => value.length > 0);

  let targetEntity: CatalogEntityType | null = null;
  if (row.target_entity !== undefined) {
    if (!isCatalogEntityType(row.target_entity) || row.target_entity === "control") {
      problems.push(`${where}: target_entity "${row.target_entity}" is not an auxiliary entity type`);
      return null;
    }
    targetEntity = row.target_entity;
  }

  const isLink = row.role === "entity_link" || row.role === "framework_link" || row.role === "control_link";
  if (row.value_type === "list" && delimiter === null) {
    problems.push(`${where}: list values need a delimiter`);
  }
  if (row.value_type === "enum" && enumValues.length === 0) {
    problems.push(`${where}: enum values need enum_values (pipe separated)`);
  }
  if (isLink && row.value_type !== "list" && row.value_type !== "string") {
    problems.push(`${where}: ${row.role} fields must be list or string values`);
  }
  if (row.role === "identifier" && row.value_type !== "string") {
    problems.push(`${where}: identifier fields must be string values`);
  }
  if ((row.role === "entity_link" || row.role === "framework_link") && owner !== "control") {
    problems.push(`${where}: ${row.role} is only valid on control columns`);
  }
  if (row.role === "control_link" && (owner === "control" || owner === "framework")) {
    problems.push(`${where}: control_link is only valid on auxiliary entity columns`);
  }
  if (row.role === "entity_link" && targetEntity === null) {
    problems.push(`${where}: entity_link needs target_entity`);
  }
  if (owner === "control" && row.role === "attribute" && reservedDocumentKeys.has(row.target_field)) {
    problems.push(`${where}: target field "${row.target_field}" is reserved in control documents`);
  }

  const group = row.group ?? null;
  if (group !== null && row.role !== "attribute") {
    problems.push(`${where}: group is only valid on attribute columns`);
  }
  if (group !== null && owner === "control" && reservedDocumentKeys.has(group)) {
    problems.push(`${where}: group "${group}" is reserved in control documents`);
  }

  return {
    rawColumn: row.raw_column,
    entityType: owner,
    targetField: row.target_field,
    valueType: row.value_type,
    role: row.role,
    casing: row.casing,
    blankPolicy: row.blank_policy,
    delimiter,
    enumValues,
    targetEntity,
    forwardFill: row.fill === "forward",
    group,
    registryRow
  };
}

function describeRelationship(rule: FieldRule, owner: RuleOwner): RelationshipDescriptor | null {
  if (rule.role === "framework_link") {
    return {
      relationshipType: relationshipTypeFor(rule.targetField),
      kind: "framework",
      sourceEntityType: owner,
      field: rule.targetField,
      targetEntityType: frameworkEntityType(rule.targetField),
      frameworkKey: rule.targetField,
      direction: "forward"
    };
  }
  if (rule.role === "entity_link" && rule.targetEntity) {
    return {
      relationshipType: relationshipTypeFor(rule.targetEntity),
      kind: "entity",
      sourceEntityType: owner,
      field: rule.targetField,
      targetEntityType: rule.targetEntity,
      frameworkKey: null,
      direction: "forward"
    };
  }
  if (rule.role === "control_link" && owner !== "framework" && owner !== "control") {
    return {
      relationshipType: relationshipTypeFor(owner),
      kind: "entity",
      sourceEntityType: owner,
      field: rule.targetField,
      targetEntityType: owner,
      frameworkKey: null,
      direction: "reverse"
    };
  }
  return null;
}

export class SchemaRegistry {
  private readonly rulesByOwner: ReadonlyMap<RuleOwner, readonly FieldRule[]>;
  private readonly rulesByHeader: ReadonlyMap<RuleOwner, ReadonlyMap<string, FieldRule>>;
  private readonly relationshipList: readonly RelationshipDescriptor[];
  readonly digest: string;

  private constructor(
    rulesByOwner: Map<RuleOwner, FieldRule[]>,
    relationships: RelationshipDescriptor[],
    digest: string
  ) {
    this.rulesByOwner = rulesByOwner;
    const byHeader = new Map<RuleOwner, Map<string, FieldRule>>();
    for (const [owner, rules] of rulesByOwner) {
      byHeader.set(owner, new Map(rules.map((rule) => [normalizeHeader(rule.rawColumn), rule])));
    }
    this.rulesByHeader = byHeader;
    this.relationshipList = relationships;
    this.digest = digest;
  }

  static fromRows(rawRows: ReadonlyArray<Record<string, unknown>>, source = "registry"): SchemaRegistry {
    const problems: string[] = [];
    const rulesByOwner = new Map<RuleOwner, FieldRule[]>();
    const parsedRows: RegistryRow[] = [];

    rawRows.forEach((rawRow, index) => {
      const registryRow = index + 1;
      const parsed = registryRowSchema.safeParse(rawRow);
      if (!parsed.success) {
        for (const issue of parsed.error.issues) {
          problems.push(`row ${registryRow}: ${issue.path.join(".") || "(row)"}: ${issue.message}`);
        }
        return;
      }
      const row = parsed.data;
      if (row.entity_type !== "framework" && !isCatalogEntityType(row.entity_type)) {
        problems.push(`row ${registryRow}: unknown entity_type "${row.entity_type}"`);
        return;
      }
      const owner: RuleOwner = row.entity_type === "framework" ? "framework" : row.entity_type;
      const rule = toRule(row, registryRow, owner, problems);
      if (!rule) {
        return;
      }
      parsedRows.push(row);
      const list = rulesByOwner.get(owner) ?? [];
      list.push(rule);
      rulesByOwner.set(owner, list);
    });

    for (const [owner, rules] of rulesByOwner) {
      const targets = new Set<string>();
      const headers = new Set<string>();
      for (const rule of rules) {
        const header = normalizeHeader(rule.rawColumn);
        if (headers.has(header)) {
          problems.push(`${owner}: raw column "${rule.rawColumn}" is declared more than once`);
        }
        headers.add(header);
        if (rule.role === "remove") {
          continue;
        }
        if (targets.has(rule.targetField)) {
          problems.push(`${owner}: target field "${rule.targetField}" is declared more than once`);
        }
        targets.add(rule.targetField);
      }
      const members = new Set<string>();
      for (const rule of rules) {
        if (rule.group === null) {
          continue;
        }
        if (targets.has(rule.group)) {
          problems.push(`${owner}: group "${rule.group}" collides with target field "${rule.group}"`);
        }
        const member = `${rule.group}.${groupMemberName(rule.targetField, rule.group)}`;
        if (members.has(member)) {
          problems.push(`${owner}: group member "${member}" is declared more than once`);
        }
        members.add(member);
      }
      const identifiers = rules.filter((rule) => rule.role === "identifier");
      if (identifiers.length !== 1) {
        problems.push(`${owner}: expected exactly one identifier rule, found ${identifiers.length}`);
      }
    }

    for (const mandatory of ["control", "domain"] as const) {
      if (!rulesByOwner.has(mandatory)) {
        problems.push(`${mandatory}: no rules declared for mandatory entity type`);
      }
    }

    const relationships: RelationshipDescriptor[] = [];
    const seenTypes = new Set<string>();
    const ordered = [...rulesByOwner.entries()]
      .flatMap(([owner, rules]) => rules.map((rule) => ({ owner, rule })))
      .sort((a, b) => a.rule.registryRow - b.rule.registryRow);
    for (const { owner, rule } of ordered) {
      const descriptor = describeRelationship(rule, owner);
      if (!descriptor) {
        continue;
      }
      if (seenTypes.has(descriptor.relationshipType)) {
        problems.push(`row ${rule.registryRow}: relationship type "${descriptor.relationshipType}" is produced twice`);
        continue;
      }
      seenTypes.add(descriptor.relationshipType);
      relationships.push(descriptor);
    }

    if (problems.length > 0) {
      throw new ConfigurationError(`Schema registry ${source} is malformed.`, problems);
    }

    return new SchemaRegistry(rulesByOwner, relationships, digestOf(parsedRows));
  }

  hasRulesFor(entityType: EntityType): boolean {
    return this.rulesByOwner.has(ownerOf(entityType));
  }

  rulesFor(entityType: EntityType): readonly FieldRule[] {
    return this.rulesByOwner.get(ownerOf(entityType)) ?? [];
  }

  ruleForColumn(entityType: EntityType, rawColumn: string): FieldRule {
    const owner = ownerOf(entityType);
    return this.rulesByHeader.get(owner)?.get(normalizeHeader(rawColumn)) ?? fallbackRule(rawColumn, owner);
  }

  identifierRule(entityType: EntityType): FieldRule {
    const rule = this.rulesFor(entityType).find((candidate) => candidate.role === "identifier");
    if (!rule) {
      throw new ConfigurationError(`No identifier rule declared for entity type "${entityType}".`);
    }
    return rule;
  }

  linkFields(entityType: EntityType): string[] {
    return this.rulesFor(entityType)
      .filter((rule) => rule.role === "entity_link" || rule.role === "framework_link" || rule.role === "control_link")
      .map((rule) => rule.targetField);
  }

  fieldGroups(entityType: EntityType): Record<string, string> {
    const groups: Record<string, string> = {};
    for (const rule of this.rulesFor(entityType)) {
      if (rule.group !== null) {
        groups[rule.targetField] = rule.group;
      }
    }
    return groups;
  }

  relationships(): readonly RelationshipDescriptor[] {
    return this.relationshipList;
  }

  frameworkKeys(): string[] {
    return this.relationshipList
      .filter((descriptor) => descriptor.kind === "framework")
      .flatMap((descriptor) => (descriptor.frameworkKey ? [descriptor.frameworkKey] : []));
  }

  isReportedUnmapped(rawColumn: string): boolean {
    const header = stripInvisible(rawColumn).trim();
    return !unreportedColumnPrefixes.some((prefix) => header.startsWith(prefix));
  }

  unregisteredColumns(entityType: EntityType, headers: Iterable<string>): string[] {
    const known = this.rulesByHeader.get(ownerOf(entityType));
    const out: string[] = [];
    for (const header of headers) {
      if (known?.has(normalizeHeader(header))) {
        continue;
      }
      if (this.isReportedUnmapped(header)) {
        out.push(header);
      }
    }
    return out;
  }
}

export function createSchemaRegistry(rows: ReadonlyArray<Record<string, unknown>>): SchemaRegistry {
  return SchemaRegistry.fromRows(rows);
}

export function loadSchemaRegistry(path: string): SchemaRegistry {
  let text: string;
  try {
    if (!statSync(path).isFile()) {
      throw new ConfigurationError(`Schema registry is not a file: ${path}`);
    }
    text = readFileSync(path, "utf8");
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw error;
    }
    throw new ConfigurationError(`Schema registry not found or unreadable: ${path}`, [], { cause: error });
  }

  const parsed = Papa.parse<Record<string, string>>(text.replace(/^\uFEFF/, ""), {
    header: true,
    skipEmptyLines: "greedy",
    transformHeader: (header) => header.trim().toLowerCase()
  });
  if (parsed.errors.length > 0) {
    throw new ConfigurationError(
      `Schema registry ${path} could not be parsed.`,
      parsed.errors.map((error) => `line ${(error.row ?? 0) + 2}: ${error.message}`)
    );
  }
  const columns = parsed.meta.fields ?? [];
  const missing = requiredRegistryColumns.filter((column) => !columns.includes(column));
  if (missing.length > 0) {
    throw new ConfigurationError(`Schema registry ${path} is missing required columns.`, missing);
  }

  return SchemaRegistry.fromRows(parsed.data, path);
}
