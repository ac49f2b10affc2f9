import ExcelJS from "exceljs";
import type { CellValue, Worksheet } from "exceljs";
import { SourceReadError } from "../errors.js";
import type { RawCell, RawExtraction, RawSheet } from "../types/domain.js";
import { headerRowFor, isIgnoredSheet, sheetFromMatrix, type SheetReadOptions } from "./raw-sheet.js";

export type WorkbookSource = string | ArrayBuffer;

export function flattenCell(value: CellValue): RawCell {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean" || value instanceof Date) {
    return value;
  }
  if ("error" in value) {
    return null;
  }
  if ("richText" in value) {
    return value.richText.map((run) => run.text).join("");
  }
  if ("hyperlink" in value) {
    return value.text;
  }
  if ("formula" in value || "sharedFormula" in value) {
    return value.result === undefined ? null : flattenCell(value.result);
  }
  return null;
}

function readWorksheet(worksheet: Worksheet, headerRow: number): RawSheet {
  const matrix: RawCell[][] = [];
  const columnCount = worksheet.columnCount;
  for (let rowNumber = 1; rowNumber <= worksheet.rowCount; rowNumber += 1) {
    const row = worksheet.getRow(rowNumber);
    const cells: RawCell[] = [];
    for (let column = 1; column <= columnCount; column += 1) {
      cells.push(flattenCell(row.getCell(column).value));
    }
    matrix.push(cells);
  }
  return sheetFromMatrix(worksheet.name, matrix, headerRow);
}

export async function readWorkbook(source: WorkbookSource, options: SheetReadOptions = {}): Promise<RawExtraction> {
  const workbook = new ExcelJS.Workbook();
  try {
    if (typeof source === "string") {
      await workbook.xlsx.readFile(source);
    } else {
      await workbook.xlsx.load(source);
    }
  } catch (error) {
    const label = typeof source === "string" ? source : "buffer";
    throw new SourceReadError(`Unable to read workbook ${label}.`, { cause: error });
  }

  const sheets: RawSheet[] = [];
  for (const worksheet of workbook.worksheets) {
    if (isIgnoredSheet(worksheet.name, options)) {
      continue;
    }
    sheets.push(readWorksheet(worksheet, headerRowFor(worksheet.name, options)));
  }
  return { sheets };
}
