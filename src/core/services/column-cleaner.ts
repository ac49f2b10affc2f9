import { stripInvisible } from "../../lib/text.js";
import { isFrameworkEntityType } from "../entity-types.js";
import { ValueConversionError } from "../errors.js";
import { fallbackRule, normalizeHeader } from "../registry/schema-registry.js";
import type { Casing, EntityRecord, EntityType, FieldRule, FieldValue, RawCell, RawRow } from "../types/domain.js";

export interface CleanContext {
  entityType: EntityType;
  rowNumber: number;
}

export interface CleanResult {
  record: EntityRecord;
  identifier: string | undefined;
  errors: ValueConversionError[];
  /** Raw headers of this row that no registry rule covers, in raw order. */
  unmapped: string[];
}

const truthy = new Set(["x", "yes", "y", "true", "1"]);
const falsy = new Set(["", "no", "n", "false", "0"]);
const decimal = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

class ConversionProblem extends Error {}

export function cellToText(cell: RawCell): string {
  if (cell === null || cell === undefined) {
    return "";
  }
  if (cell instanceof Date) {
    const iso = cell.toISOString();
    return iso.endsWith("T00:00:00.000Z") ? iso.slice(0, 10) : iso;
  }
  return String(cell);
}

function applyCasing(value: string, casing: Casing): string {
  if (casing === "lower") return value.toLowerCase();
  if (casing === "upper") return value.toUpperCase();
  return value;
}

function splitList(text: string, delimiter: string): string[] {
  const parts = delimiter === "\n" ? text.split(/\r\n|\r|\n/) : text.split(delimiter);
  const seen = new Set<string>();
  const out: string[] = [];
  for (const part of parts) {
    const item = part.trim();
    const key = item.toLowerCase();
    if (item.length === 0 || seen.has(key)) {
      continue;
    }
    seen.add(key);
    out.push(item);
  }
  return out;
}

function convert(cell: RawCell, rule: FieldRule): FieldValue | undefined {
  if (rule.valueType === "passthrough") {
    if (cell === null || cell === undefined) return undefined;
    if (typeof cell === "string") return cell.trim().length > 0 ? cell : undefined;
    if (cell instanceof Date) return cellToText(cell);
    return cell;
  }

  if (rule.valueType === "boolean" && typeof cell === "boolean") {
    return cell;
  }
  if (rule.valueType === "number" && typeof cell === "number") {
    if (!Number.isFinite(cell)) throw new ConversionProblem("not a finite number");
    return cell;
  }

  const text = applyCasing(stripInvisible(cellToText(cell)).trim(), rule.casing);

  switch (rule.valueType) {
    case "boolean": {
      const token = text.toLowerCase();
      if (truthy.has(token)) return true;
      if (falsy.has(token)) return false;
      throw new ConversionProblem("not a recognized boolean token");
    }
    case "number": {
      if (text.length === 0) return undefined;
      const compact = text.replace(/,/g, "");
      if (!decimal.test(compact)) throw new ConversionProblem("not a decimal number");
      const parsed = Number(compact);
      if (!Number.isFinite(parsed)) throw new ConversionProblem("not a finite number");
      return parsed;
    }
    case "enum": {
      if (text.length === 0) return undefined;
      const match = rule.enumValues.find((candidate) => candidate.toLowerCase() === text.toLowerCase());
      if (match === undefined) {
        throw new ConversionProblem(`expected one of ${rule.enumValues.join(", ")}`);
      }
      return applyCasing(match, rule.casing);
    }
    case "list": {
      const items = splitList(text, rule.delimiter ?? "\n");
      return items.length > 0 ? items : undefined;
    }
    default:
      return text.length > 0 ? text : undefined;
  }
}

function blankValue(rule: FieldRule): FieldValue | undefined {
  if (rule.blankPolicy !== "empty") return undefined;
  return rule.valueType === "list" ? [] : "";
}

/**
 * Cleans one raw row against the declared rules of its entity type. Conversion failures are
 * returned alongside the record and the failing field is left out.
 */
export function cleanRecord(raw: RawRow, rules: readonly FieldRule[], context: CleanContext): CleanResult {
  const owner = isFrameworkEntityType(context.entityType) ? "framework" : context.entityType;
  const headers = new Map<string, string>();
  for (const header of Object.keys(raw)) {
    const key = normalizeHeader(header);
    if (!headers.has(key)) headers.set(key, header);
  }

  const covered = new Set<string>();
  const applicable: Array<{ rule: FieldRule; header: string }> = [];
  for (const rule of rules) {
    const key = normalizeHeader(rule.rawColumn);
    const header = headers.get(key);
    covered.add(key);
    if (header !== undefined) applicable.push({ rule, header });
  }

  const unmapped: string[] = [];
  for (const header of Object.keys(raw)) {
    const key = normalizeHeader(header);
    if (covered.has(key) || key.length === 0) continue;
    covered.add(key);
    unmapped.push(header);
    applicable.push({ rule: fallbackRule(header, owner), header });
  }

  const identifierEntry = applicable.find((entry) => entry.rule.role === "identifier");
  const identifierText = identifierEntry
    ? applyCasing(stripInvisible(cellToText(raw[identifierEntry.header])).trim(), identifierEntry.rule.casing)
    : "";
  const identifier = identifierText.length > 0 ? identifierText : undefined;

  const record: EntityRecord = {};
  const errors: ValueConversionError[] = [];
  for (const { rule, header } of applicable) {
    if (rule.role === "remove") continue;
    if (rule.role === "identifier") {
      if (identifier !== undefined) record[rule.targetField] = identifier;
      continue;
    }
    if (Object.hasOwn(record, rule.targetField)) continue;

    const cell = raw[header];
    let value: FieldValue | undefined;
    try {
      value = convert(cell, rule);
    } catch (error) {
      if (!(error instanceof ConversionProblem)) throw error;
      errors.push(
        new ValueConversionError(
          {
            entityType: context.entityType,
            rowNumber: context.rowNumber,
            column: header,
            field: rule.targetField,
            rawValue: cellToText(cell),
            identifier
          },
          error.message
        )
      );
      continue;
    }

    const resolved = value ?? blankValue(rule);
    if (resolved !== undefined) record[rule.targetField] = resolved;
  }

  return { record, identifier, errors, unmapped };
}
