import { createLogger, type Logger } from "../../lib/logger.js";
import { relationshipTypeFor } from "../entity-types.js";
import type { SchemaRegistry } from "../registry/schema-registry.js";
import type {
  EntityTable,
  FieldValue,
  FrameworkSummary,
  LinkRecord,
  LinkTable,
  LinkTables,
  NormalizedTables,
  PipelineIssue,
  RelationshipDescriptor
} from "../types/domain.js";

export interface RelationshipExtractorOptions {
  /** Prefix length of a control id that names its domain ("GOV-01" -> "GOV"). */
  domainIdLength?: number | undefined;
  logger?: Logger | undefined;
}

export interface ExtractResult {
  links: LinkTables;
  issues: PipelineIssue[];
}

function referencesOf(value: FieldValue | undefined): string[] {
  if (Array.isArray(value)) {
    return value;
  }
  if (typeof value === "string" && value.length > 0) {
    return [value];
  }
  return [];
}

function identifierOf(table: EntityTable, index: number): string | null {
  const value = table.records[index]?.[table.identifierField];
  return typeof value === "string" ? value : null;
}

export class RelationshipExtractor {
  private readonly domainIdLength: number;
  private readonly logger: Logger;

  constructor(
    private readonly registry: SchemaRegistry,
    options: RelationshipExtractorOptions = {}
  ) {
    this.domainIdLength = options.domainIdLength ?? 3;
    this.logger = options.logger ?? createLogger();
  }

  descriptors(): RelationshipDescriptor[] {
    const declared = [...this.registry.relationships()];
    if (declared.some((descriptor) => descriptor.targetEntityType === "domain")) {
      return declared;
    }
    return [
      ...declared,
      {
        relationshipType: relationshipTypeFor("domain"),
        kind: "entity",
        sourceEntityType: "control",
        field: this.registry.identifierRule("control").targetField,
        targetEntityType: "domain",
        frameworkKey: null,
        direction: "derived"
      }
    ];
  }

  private sourceTable(tables: NormalizedTables, descriptor: RelationshipDescriptor): EntityTable | undefined {
    return descriptor.sourceEntityType === "framework" ? undefined : tables.get(descriptor.sourceEntityType);
  }

  extract(tables: NormalizedTables): ExtractResult {
    const issues: PipelineIssue[] = [];
    const links = new Map<string, LinkTable>();
    const controls = tables.get("control");
    const controlIdField = controls?.identifierField ?? this.registry.identifierRule("control").targetField;

    for (const descriptor of this.descriptors()) {
      const target = tables.get(descriptor.targetEntityType);
      const table: LinkTable = {
        relationshipType: descriptor.relationshipType,
        kind: descriptor.kind,
        targetEntityType: descriptor.targetEntityType,
        frameworkKey: descriptor.frameworkKey,
        sourceColumn: controlIdField,
        targetColumn: descriptor.frameworkKey ?? target?.identifierField ?? `${descriptor.targetEntityType}_id`,
        links: []
      };
      links.set(descriptor.relationshipType, table);

      const source = descriptor.direction === "reverse" ? this.sourceTable(tables, descriptor) : controls;
      if (!source) {
        issues.push({
          severity: "info",
          code: "relationship_source_missing",
          entityType: descriptor.sourceEntityType,
          field: descriptor.field,
          message: `No ${descriptor.sourceEntityType} table; ${descriptor.relationshipType} is empty.`
        });
        continue;
      }

      const seen = new Set<string>();
      const push = (sourceId: string, targetId: string) => {
        const key = `${sourceId}\u0000${targetId}`;
        if (seen.has(key)) {
          return;
        }
        seen.add(key);
        const link: LinkRecord = { relationshipType: descriptor.relationshipType, sourceId, targetId };
        table.links.push(link);
      };

      source.records.forEach((record, index) => {
        const id = identifierOf(source, index);
        if (id === null) {
          return;
        }
        if (descriptor.direction === "derived") {
          const domainId = id.slice(0, this.domainIdLength).trim();
          if (domainId.length > 0) {
            push(id, domainId);
          }
          return;
        }
        for (const reference of referencesOf(record[descriptor.field])) {
          if (descriptor.direction === "reverse") {
            push(reference, id);
          } else {
            push(id, reference);
          }
        }
      });

      this.logger.debug("relationship extracted", {
        relationshipType: descriptor.relationshipType,
        links: table.links.length
      });
    }

    this.logger.info("relationships extracted", {
      relationshipTypes: links.size,
      links: [...links.values()].reduce((sum, table) => sum + table.links.length, 0)
    });
    return { links, issues };
  }
}

export function listFrameworks(links: LinkTables, tables?: NormalizedTables | undefined): FrameworkSummary[] {
  const summaries: FrameworkSummary[] = [];
  for (const table of links.values()) {
    if (table.kind !== "framework" || table.frameworkKey === null) {
      continue;
    }
    summaries.push({
      frameworkKey: table.frameworkKey,
      relationshipType: table.relationshipType,
      linkCount: table.links.length,
      controlCount: new Set(table.links.map((link) => link.sourceId)).size,
      hasAuthoritativeList: tables?.has(table.targetEntityType) ?? false
    });
  }
  return summaries;
}
