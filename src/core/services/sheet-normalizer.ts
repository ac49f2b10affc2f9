import { createLogger, type Logger } from "../../lib/logger.js";
import { sheetKey, stripInvisible, toSnakeCase } from "../../lib/text.js";
import {
  entityCatalog,
  frameworkEntityType,
  isCatalogEntityType,
  reservedDocumentKeys
} from "../entity-types.js";
import { ConfigurationError, SheetNotFoundError } from "../errors.js";
import { normalizeHeader, type SchemaRegistry } from "../registry/schema-registry.js";
import type {
  EntityRecord,
  EntityTable,
  EntityType,
  NormalizedTables,
  PipelineIssue,
  RawExtraction,
  RawRow,
  RawSheet
} from "../types/domain.js";
import { cellToText, cleanRecord } from "./column-cleaner.js";

export type Strictness = "collect" | "fail_fast";

export interface SheetNormalizerOptions {
  strictness?: Strictness | undefined;
  /** Sheet names (or their keys) that are never read. */
  ignoreSheets?: string[] | undefined;
  /** Sheet name -> entity type ("threat", "framework:iso_27001"). Wins over naming conventions. */
  sheetAliases?: Record<string, string> | undefined;
  logger?: Logger | undefined;
}

export interface NormalizeResult {
  tables: NormalizedTables;
  issues: PipelineIssue[];
}

const frameworkSheetPattern = /^(?:fw|framework)\s*-\s*(.+)$/i;

function parseEntityType(value: string): EntityType | null {
  const normalized = value.trim().toLowerCase();
  if (isCatalogEntityType(normalized)) {
    return normalized;
  }
  if (normalized.startsWith("framework:") && normalized.length > "framework:".length) {
    return frameworkEntityType(normalized.slice("framework:".length));
  }
  return null;
}

// "r5", "rev5" and "v2022" mark the same version.
function withoutVersionMarkers(key: string): string {
  return key.replace(/(^|_)(?:rev|r|v)(?=\d)/g, "$1");
}

function isBlankRow(row: RawRow): boolean {
  return Object.values(row).every((cell) => stripInvisible(cellToText(cell)).trim().length === 0);
}

export class SheetNormalizer {
  private readonly strictness: Strictness;
  private readonly ignored: Set<string>;
  private readonly aliases: Map<string, EntityType>;
  private readonly logger: Logger;

  constructor(
    private readonly registry: SchemaRegistry,
    options: SheetNormalizerOptions = {}
  ) {
    this.strictness = options.strictness ?? "collect";
    this.ignored = new Set((options.ignoreSheets ?? ["Lists"]).map((name) => sheetKey(name)));
    this.logger = options.logger ?? createLogger();
    this.aliases = new Map();
    const invalid: string[] = [];
    for (const [sheet, target] of Object.entries(options.sheetAliases ?? {})) {
      const entityType = parseEntityType(target);
      if (!entityType) {
        invalid.push(`${sheet}=${target}`);
        continue;
      }
      this.aliases.set(sheetKey(sheet), entityType);
    }
    if (invalid.length > 0) {
      throw new ConfigurationError("Sheet aliases name unknown entity types.", invalid);
    }
  }

  resolveSheet(name: string): EntityType | "ignored" | null {
    const key = sheetKey(name);
    const alias = this.aliases.get(key);
    if (alias) {
      return alias;
    }
    if (this.ignored.has(key)) {
      return "ignored";
    }
    const framework = frameworkSheetPattern.exec(stripInvisible(name).trim());
    if (framework?.[1]) {
      const frameworkKey = this.frameworkKeyFor(framework[1]);
      return frameworkKey ? frameworkEntityType(frameworkKey) : null;
    }
    return entityCatalog.find((entry) => entry.sheetKeys.includes(key))?.entityType ?? null;
  }

  /**
   * Framework sheets keep their version in the key. A registry key that differs only in how the
   * version is marked ("R5" against "rev5") is preferred when exactly one matches.
   */
  private frameworkKeyFor(name: string): string {
    const key = toSnakeCase(name);
    const known = this.registry.frameworkKeys();
    if (known.includes(key)) {
      return key;
    }
    const loose = withoutVersionMarkers(key);
    const matches = known.filter((candidate) => withoutVersionMarkers(candidate) === loose);
    return matches.length === 1 && matches[0] !== undefined ? matches[0] : key;
  }

  normalize(extraction: RawExtraction): NormalizeResult {
    const issues: PipelineIssue[] = [];
    const sheetsByType = new Map<EntityType, RawSheet>();

    for (const sheet of extraction.sheets) {
      const resolved = this.resolveSheet(sheet.name);
      if (resolved === "ignored") {
        issues.push({
          severity: "info",
          code: "sheet_ignored",
          sheet: sheet.name,
          message: `Sheet "${sheet.name}" ignored.`
        });
        continue;
      }
      if (resolved === null || !this.registry.hasRulesFor(resolved)) {
        issues.push({
          severity: resolved === null ? "info" : "warning",
          code: "sheet_unrecognized",
          sheet: sheet.name,
          entityType: resolved ?? undefined,
          message:
            resolved === null
              ? `Sheet "${sheet.name}" does not match any entity type.`
              : `Sheet "${sheet.name}" resolves to ${resolved} but the registry declares no rules for it.`
        });
        continue;
      }
      const existing = sheetsByType.get(resolved);
      if (existing) {
        issues.push({
          severity: "warning",
          code: "duplicate_sheet",
          sheet: sheet.name,
          entityType: resolved,
          message: `Sheet "${sheet.name}" also resolves to ${resolved}; keeping "${existing.name}".`
        });
        continue;
      }
      sheetsByType.set(resolved, sheet);
    }

    const available = extraction.sheets.map((sheet) => sheet.name);
    const tables = new Map<EntityType, EntityTable>();

    for (const entry of entityCatalog) {
      const sheet = sheetsByType.get(entry.entityType);
      if (!sheet) {
        if (entry.mandatory) {
          throw new SheetNotFoundError(entry.entityType, available);
        }
        if (!this.registry.hasRulesFor(entry.entityType)) {
          continue;
        }
        issues.push({
          severity: "info",
          code: "sheet_missing",
          entityType: entry.entityType,
          message: `No sheet for ${entry.entityType}; continuing with an empty table.`
        });
        this.logger.warn("sheet missing, using empty table", { entityType: entry.entityType });
        tables.set(entry.entityType, this.emptyTable(entry.entityType));
        continue;
      }
      tables.set(entry.entityType, this.normalizeSheet(entry.entityType, sheet, issues));
    }

    for (const [entityType, sheet] of sheetsByType) {
      if (!tables.has(entityType)) {
        tables.set(entityType, this.normalizeSheet(entityType, sheet, issues));
      }
    }

    this.logger.info("sheets normalized", {
      tables: tables.size,
      records: [...tables.values()].reduce((sum, table) => sum + table.records.length, 0),
      issues: issues.length
    });
    return { tables, issues };
  }

  private emptyTable(entityType: EntityType): EntityTable {
    const table: EntityTable = {
      entityType,
      identifierField: this.registry.identifierRule(entityType).targetField,
      linkFields: this.registry.linkFields(entityType),
      records: []
    };
    const fieldGroups = this.registry.fieldGroups(entityType);
    if (Object.keys(fieldGroups).length > 0) {
      table.fieldGroups = fieldGroups;
    }
    return table;
  }

  private forwardFill(entityType: EntityType, rows: RawRow[]): RawRow[] {
    const columns = this.registry
      .rulesFor(entityType)
      .filter((rule) => rule.forwardFill)
      .map((rule) => rule.rawColumn);
    if (columns.length === 0) {
      return rows;
    }
    const last = new Map<string, RawRow[string]>();
    return rows.map((row) => {
      if (isBlankRow(row)) {
        return row;
      }
      const filled: RawRow = { ...row };
      for (const column of columns) {
        const wanted = normalizeHeader(column);
        const header = Object.keys(filled).find((candidate) => normalizeHeader(candidate) === wanted) ?? column;
        const cell = filled[header];
        if (stripInvisible(cellToText(cell)).trim().length > 0) {
          last.set(column, cell);
        } else if (last.has(column)) {
          filled[header] = last.get(column);
        }
      }
      return filled;
    });
  }

  private normalizeSheet(entityType: EntityType, sheet: RawSheet, issues: PipelineIssue[]): EntityTable {
    const table = this.emptyTable(entityType);
    const rules = this.registry.rulesFor(entityType);
    const firstRow = sheet.firstRowNumber ?? 2;
    const seen = new Map<string, number>();
    const unmapped = new Set<string>();

    this.forwardFill(entityType, sheet.rows).forEach((row, index) => {
      if (isBlankRow(row)) {
        return;
      }
      const rowNumber = firstRow + index;
      const result = cleanRecord(row, rules, { entityType, rowNumber });
      for (const column of result.unmapped) {
        unmapped.add(column);
      }

      for (const error of result.errors) {
        if (this.strictness === "fail_fast") {
          throw error;
        }
        issues.push({
          severity: "warning",
          code: "value_conversion",
          entityType,
          sheet: sheet.name,
          rowNumber,
          identifier: error.identifier,
          column: error.column,
          field: error.field,
          rawValue: error.rawValue,
          message: error.message
        });
      }

      if (result.identifier === undefined) {
        issues.push({
          severity: "warning",
          code: "missing_identifier",
          entityType,
          sheet: sheet.name,
          rowNumber,
          message: `${entityType} row ${rowNumber} has no ${table.identifierField}; row dropped.`
        });
        return;
      }

      const firstSeen = seen.get(result.identifier);
      if (firstSeen !== undefined) {
        issues.push({
          severity: "warning",
          code: "duplicate_identifier",
          entityType,
          sheet: sheet.name,
          rowNumber,
          identifier: result.identifier,
          message:
            `${entityType} ${result.identifier} at row ${rowNumber} duplicates row ${firstSeen}; ` +
            "keeping the first."
        });
        return;
      }
      seen.set(result.identifier, rowNumber);
      const record: EntityRecord = result.record;
      table.records.push(record);
    });

    for (const column of unmapped) {
      if (!this.registry.isReportedUnmapped(column)) {
        continue;
      }
      this.logger.debug("unmapped column passed through", { entityType, sheet: sheet.name, column });
      issues.push({
        severity: "info",
        code: "unmapped_column",
        entityType,
        sheet: sheet.name,
        column,
        message: `Column "${column}" on sheet "${sheet.name}" is not in the registry; passed through.`
      });
    }

    if (entityType === "control") {
      this.reportReservedFields(table, sheet, issues);
    }
    return table;
  }

  /** Pass-through control columns named like a document section stay in the table only. */
  private reportReservedFields(table: EntityTable, sheet: RawSheet, issues: PipelineIssue[]): void {
    const skipped = new Set([table.identifierField, ...table.linkFields]);
    const reserved = new Set<string>();
    for (const record of table.records) {
      for (const field of Object.keys(record)) {
        if (!skipped.has(field) && reservedDocumentKeys.has(field)) {
          reserved.add(field);
        }
      }
    }
    for (const field of reserved) {
      this.logger.warn("control field collides with a document section", { sheet: sheet.name, field });
      issues.push({
        severity: "warning",
        code: "reserved_field",
        entityType: table.entityType,
        sheet: sheet.name,
        field,
        message:
          `Field "${field}" on control collides with a document section; ` +
          "kept in the table, left out of documents."
      });
    }
  }
}
