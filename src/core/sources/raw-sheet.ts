import { sheetKey, stripInvisible } from "../../lib/text.js";
import type { RawCell, RawRow, RawSheet } from "../types/domain.js";

export interface SheetReadOptions {
  /** Sheet names that are skipped entirely. */
  ignoreSheets?: string[] | undefined;
  /** Sheet name -> 1-based header row; catalogs with preamble rows put headers further down. */
  headerRows?: Record<string, number> | undefined;
}

/** Matches configured names by sheet key, so "Threat_Catalog" also covers "Threat Catalog v2". */
export function headerRowFor(sheetName: string, options: SheetReadOptions): number {
  const exact = options.headerRows?.[sheetName];
  if (exact !== undefined) {
    return exact;
  }
  const key = sheetKey(sheetName);
  const match = Object.entries(options.headerRows ?? {}).find(([name]) => sheetKey(name) === key);
  return match ? match[1] : 1;
}

export function isIgnoredSheet(sheetName: string, options: SheetReadOptions): boolean {
  const name = stripInvisible(sheetName).trim().toLowerCase();
  return (options.ignoreSheets ?? []).some((ignored) => ignored.trim().toLowerCase() === name);
}

/**
 * Turns a cell matrix (row-major, 0-based) into a raw sheet keyed by the header row. Columns with an
 * empty header are dropped; repeated headers get a numeric suffix.
 */
export function sheetFromMatrix(name: string, matrix: RawCell[][], headerRow: number): RawSheet {
  const headerCells = matrix[headerRow - 1] ?? [];
  const columns: Array<{ index: number; header: string }> = [];
  const used = new Map<string, number>();
  headerCells.forEach((cell, index) => {
    const text = cell === null || cell === undefined ? "" : stripInvisible(String(cell)).trim();
    if (text.length === 0) {
      return;
    }
    const count = (used.get(text) ?? 0) + 1;
    used.set(text, count);
    columns.push({ index, header: count === 1 ? text : `${text} ${count}` });
  });

  const rows: RawRow[] = matrix.slice(headerRow).map((cells) => {
    const row: RawRow = {};
    for (const column of columns) {
      row[column.header] = cells[column.index] ?? null;
    }
    return row;
  });

  return { name, rows, firstRowNumber: headerRow + 1 };
}
