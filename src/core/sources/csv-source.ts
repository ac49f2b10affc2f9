import { readdir, readFile } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import Papa from "papaparse";
import { SourceReadError } from "../errors.js";
import type { RawCell, RawExtraction, RawSheet } from "../types/domain.js";
import { headerRowFor, isIgnoredSheet, sheetFromMatrix, type SheetReadOptions } from "./raw-sheet.js";

export function parseCsvSheet(name: string, text: string, headerRow = 1): RawSheet {
  const parsed = Papa.parse<string[]>(text.replace(/^\uFEFF/, ""), { header: false, skipEmptyLines: false });
  const matrix: RawCell[][] = parsed.data;
  // A trailing newline yields one empty record.
  const last = matrix[matrix.length - 1];
  if (last && last.length === 1 && last[0] === "") {
    matrix.pop();
  }
  return sheetFromMatrix(name, matrix, headerRow);
}

/** One sheet per `.csv` file, named after the file stem, read in file-name order. */
export async function readCsvDirectory(directory: string, options: SheetReadOptions = {}): Promise<RawExtraction> {
  let entries: string[];
  try {
    entries = await readdir(directory);
  } catch (error) {
    throw new SourceReadError(`Unable to read CSV directory ${directory}.`, { cause: error });
  }

  const sheets: RawSheet[] = [];
  for (const entry of entries.filter((file) => extname(file).toLowerCase() === ".csv").sort()) {
    const name = basename(entry, extname(entry));
    if (isIgnoredSheet(name, options)) {
      continue;
    }
    const text = await readFile(join(directory, entry), "utf8");
    sheets.push(parseCsvSheet(name, text, headerRowFor(name, options)));
  }
  return { sheets };
}
