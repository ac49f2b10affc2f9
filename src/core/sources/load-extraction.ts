import { stat } from "node:fs/promises";
import { SourceReadError } from "../errors.js";
import type { RawExtraction } from "../types/domain.js";
import { readCsvDirectory } from "./csv-source.js";
import type { SheetReadOptions } from "./raw-sheet.js";
import { readWorkbook } from "./workbook-source.js";

/** A directory is read as one CSV per sheet; anything else as an .xlsx workbook. */
export async function loadExtraction(input: string, options: SheetReadOptions = {}): Promise<RawExtraction> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(input)).isDirectory();
  } catch (error) {
    throw new SourceReadError(`Input not found: ${input}`, { cause: error });
  }
  return isDirectory ? readCsvDirectory(input, options) : readWorkbook(input, options);
}
