import { parseCsvToRows } from "./csv.js";
import type { RawRow } from "./csv.js";
import { datasetFromRows } from "./dataset.js";
import type { ColumnKind, Dataset, Wordlist } from "./types.js";
import { wordlistFromRows } from "./wordlist.js";
import { readXlsxToRows } from "./xlsx.js";

export * from "./types.js";
export * from "./errors.js";
export { cleanVariableSpelling, DEFAULT_SPELLING_OPTIONS } from "./cleanVariableSpelling.js";
export { cleanSpelling } from "./cleanSpelling.js";
export { findColumnKinds, inferColumnKind, isEligibleKind } from "./classify.js";
export { asEligibleColumn, datasetFromRows, datasetToRows, getColumn, isDataset, replaceColumn } from "./dataset.js";
export { DiagnosticsCollector, formatColumnLabels, formatReport } from "./diagnostics.js";
export { planColumnPasses } from "./plan.js";
export { resolveDictionary } from "./resolve.js";
export { assertNoGlobalDefault, toDictionaryBundle, validateBundle, validateDataset } from "./validate.js";
export {
  DEFAULT_KEY,
  GLOBAL_NAME,
  MISSING_KEY,
  isWordlist,
  sortWordlist,
  splitWordlist,
  wordlistFromRows,
} from "./wordlist.js";
export { parseCsvRaw, parseCsvToRows } from "./csv.js";
export type { RawRow } from "./csv.js";
export { readXlsxToRows } from "./xlsx.js";

export interface ReadTableOptions {
  sheet?: string;
}

/**
 * Read a CSV or spreadsheet file from bytes into header-keyed rows.
 * - `.xlsx` / `.xls` / `.ods`: parsed with SheetJS via `readXlsxToRows`.
 * - anything else is decoded as UTF-8 CSV.
 */
export async function readTableFromBuffer(
  fileBytes: ArrayBuffer,
  filename: string,
  options: ReadTableOptions = {}
): Promise<RawRow[]> {
  const lower = filename.toLowerCase();
  if (lower.endsWith(".xlsx") || lower.endsWith(".xls") || lower.endsWith(".ods")) {
    return readXlsxToRows(fileBytes, options.sheet);
  }
  const text = new TextDecoder("utf-8").decode(fileBytes);
  return parseCsvToRows(text);
}

/**
 * Load a wordlist file. Column order follows the file's header row.
 */
export async function readWordlistFromBuffer(
  fileBytes: ArrayBuffer,
  filename: string,
  options: ReadTableOptions = {}
): Promise<Wordlist> {
  const rows = await readTableFromBuffer(fileBytes, filename, options);
  return wordlistFromRows(rows);
}

export async function readDatasetFromBuffer(
  fileBytes: ArrayBuffer,
  filename: string,
  options: ReadTableOptions & { kinds?: Record<string, ColumnKind> } = {}
): Promise<Dataset> {
  const rows = await readTableFromBuffer(fileBytes, filename, options);
  return datasetFromRows(rows, options.kinds);
}
