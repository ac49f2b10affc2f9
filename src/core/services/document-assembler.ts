import { setImmediate as yieldToLoop } from "node:timers/promises";
import { entityCatalog, groupMemberName, relationshipPrefix, reservedDocumentKeys } from "../entity-types.js";
import { MissingControlError } from "../errors.js";
import type {
  AssemblyFailure,
  ControlDocument,
  DocumentValue,
  EntityRecord,
  EntityTable,
  EntityType,
  LinkTable,
  LinkTables,
  NormalizedTables
} from "../types/domain.js";

export interface AssembleAllOptions {
  concurrency?: number | undefined;
  frameworkFilter?: readonly string[] | undefined;
}

export interface AssembleAllResult {
  documents: ControlDocument[];
  failures: AssemblyFailure[];
}

interface TargetIndex {
  table: EntityTable;
  records: Map<string, EntityRecord>;
}

/** Accepts "nist_800_53_rev5" and "scf_to_nist_800_53_rev5" alike. */
export function normalizeFrameworkFilter(filter: readonly string[] | undefined): Set<string> {
  const keys = new Set<string>();
  for (const entry of filter ?? []) {
    const trimmed = entry.trim();
    const key = trimmed.startsWith(relationshipPrefix) ? trimmed.slice(relationshipPrefix.length) : trimmed;
    if (key.length > 0) {
      keys.add(key);
    }
  }
  return keys;
}

export function pruneEmpty(value: DocumentValue | undefined): DocumentValue | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === "string") {
    return value.length > 0 ? value : undefined;
  }
  if (Array.isArray(value)) {
    const items = value.flatMap((item) => {
      const pruned = pruneEmpty(item);
      return pruned === undefined ? [] : [pruned];
    });
    return items.length > 0 ? items : undefined;
  }
  if (typeof value === "object") {
    const out: { [key: string]: DocumentValue } = {};
    for (const [key, item] of Object.entries(value)) {
      const pruned = pruneEmpty(item);
      if (pruned !== undefined) {
        out[key] = pruned;
      }
    }
    return Object.keys(out).length > 0 ? out : undefined;
  }
  return value;
}

function isDocumentObject(value: DocumentValue | undefined): value is { [key: string]: DocumentValue } {
  return typeof value === "object" && !Array.isArray(value);
}

/**
 * Record fields as document content. Grouped fields nest under their group, which takes the position
 * of its first field; a group left empty after pruning is dropped.
 */
function recordContent(
  record: EntityRecord,
  exclude: ReadonlySet<string>,
  fieldGroups: Readonly<Record<string, string>> = {}
): Record<string, DocumentValue> {
  const groupNames = new Set(Object.values(fieldGroups));
  const out: { [key: string]: DocumentValue } = {};
  for (const [field, value] of Object.entries(record)) {
    if (exclude.has(field)) {
      continue;
    }
    const group = fieldGroups[field];
    if (group === undefined) {
      if (!groupNames.has(field)) {
        out[field] = value;
      }
      continue;
    }
    const current = out[group];
    const members: { [key: string]: DocumentValue } = isDocumentObject(current) ? current : {};
    members[groupMemberName(field, group)] = value;
    out[group] = members;
  }
  const pruned = pruneEmpty(out);
  return isDocumentObject(pruned) ? pruned : {};
}

function indexRecords(table: EntityTable): Map<string, EntityRecord> {
  const records = new Map<string, EntityRecord>();
  for (const record of table.records) {
    const id = record[table.identifierField];
    if (typeof id === "string" && !records.has(id)) {
      records.set(id, record);
    }
  }
  return records;
}

/**
 * Builds control documents from a fixed snapshot of tables and links. The index is built once;
 * every assemble call afterwards is read-only.
 */
export class DocumentAssembler {
  private readonly controls: TargetIndex;
  private readonly targets = new Map<EntityType, TargetIndex>();
  private readonly targetsBySource = new Map<string, Map<string, string[]>>();
  private readonly entityLinks: LinkTable[];
  private readonly frameworkLinks: LinkTable[];

  constructor(tables: NormalizedTables, links: LinkTables) {
    const controlTable = tables.get("control") ?? {
      entityType: "control",
      identifierField: "control_id",
      linkFields: [],
      records: []
    };
    this.controls = { table: controlTable, records: indexRecords(controlTable) };

    for (const [entityType, table] of tables) {
      if (entityType !== "control") {
        this.targets.set(entityType, { table, records: indexRecords(table) });
      }
    }

    for (const table of links.values()) {
      const bySource = new Map<string, string[]>();
      for (const link of table.links) {
        const list = bySource.get(link.sourceId) ?? [];
        list.push(link.targetId);
        bySource.set(link.sourceId, list);
      }
      this.targetsBySource.set(table.relationshipType, bySource);
    }

    const linkTables = [...links.values()];
    this.entityLinks = linkTables.filter((table) => table.kind === "entity");
    this.frameworkLinks = linkTables.filter((table) => table.kind === "framework");
  }

  controlIds(): string[] {
    return [...this.controls.records.keys()];
  }

  assemble(controlId: string, frameworkFilter?: readonly string[] | undefined): ControlDocument {
    const control = this.controls.records.get(controlId);
    if (!control) {
      throw new MissingControlError(controlId);
    }

    const document: ControlDocument = { _id: controlId, control_id: controlId };
    const controlTable = this.controls.table;
    const excluded = new Set([controlTable.identifierField, ...controlTable.linkFields, ...reservedDocumentKeys]);
    Object.assign(document, recordContent(control, excluded, controlTable.fieldGroups));

    for (const entry of entityCatalog) {
      if (!entry.embedAs || !entry.embedMode) {
        continue;
      }
      const embedded = this.embeddedRecords(controlId, entry.entityType);
      if (embedded.length === 0) {
        continue;
      }
      if (entry.embedMode === "single") {
        const first = embedded[0];
        if (first) {
          document[entry.embedAs] = first;
        }
      } else {
        document[entry.embedAs] = embedded;
      }
    }

    const filter = normalizeFrameworkFilter(frameworkFilter);
    const mappings: Record<string, string[]> = {};
    for (const table of this.frameworkLinks) {
      if (table.frameworkKey === null || (filter.size > 0 && !filter.has(table.frameworkKey))) {
        continue;
      }
      const ids = this.targetsBySource.get(table.relationshipType)?.get(controlId) ?? [];
      if (ids.length > 0) {
        mappings[table.frameworkKey] = [...ids];
      }
    }
    if (Object.keys(mappings).length > 0) {
      document.framework_mappings = mappings;
    }

    return document;
  }

  async assembleAll(controlIds: readonly string[], options: AssembleAllOptions = {}): Promise<AssembleAllResult> {
    const concurrency = Math.max(1, Math.min(options.concurrency ?? 8, Math.max(1, controlIds.length)));
    const slots = new Array<ControlDocument | AssemblyFailure | undefined>(controlIds.length).fill(undefined);
    let index = 0;

    const worker = async () => {
      while (index < controlIds.length) {
        const current = index;
        index += 1;
        const controlId = controlIds[current];
        if (controlId === undefined) {
          continue;
        }
        try {
          slots[current] = this.assemble(controlId, options.frameworkFilter);
        } catch (error) {
          if (!(error instanceof MissingControlError)) {
            throw error;
          }
          slots[current] = { controlId, code: error.code, message: error.message };
        }
        await yieldToLoop();
      }
    };

    await Promise.all(Array.from({ length: concurrency }, () => worker()));

    const documents: ControlDocument[] = [];
    const failures: AssemblyFailure[] = [];
    for (const slot of slots) {
      if (slot === undefined) {
        continue;
      }
      if ("_id" in slot) {
        documents.push(slot);
      } else {
        failures.push(slot);
      }
    }
    return { documents, failures };
  }

  private embeddedRecords(controlId: string, entityType: EntityType): Array<Record<string, DocumentValue>> {
    const target = this.targets.get(entityType);
    if (!target) {
      return [];
    }
    const excluded = new Set(target.table.linkFields);
    const out: Array<Record<string, DocumentValue>> = [];
    const seen = new Set<string>();
    for (const table of this.entityLinks) {
      if (table.targetEntityType !== entityType) {
        continue;
      }
      for (const targetId of this.targetsBySource.get(table.relationshipType)?.get(controlId) ?? []) {
        const record = target.records.get(targetId);
        if (!record || seen.has(targetId)) {
          continue;
        }
        seen.add(targetId);
        const content = recordContent(record, excluded, target.table.fieldGroups);
        if (Object.keys(content).length > 0) {
          out.push(content);
        }
      }
    }
    return out;
  }
}

export function assembleControlDocument(
  controlId: string,
  tables: NormalizedTables,
  links: LinkTables,
  frameworkFilter?: readonly string[] | undefined
): ControlDocument {
  return new DocumentAssembler(tables, links).assemble(controlId, frameworkFilter);
}
