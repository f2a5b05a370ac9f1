import * as XLSX from "xlsx";
import type { RawRow } from "./csv.js";
import type { Cell } from "./types.js";

/**
 * Read one sheet of a workbook into header-keyed rows.
 * - Uses `sheetName` when given and present, else a sheet named `wordlist`, else the first sheet.
 * - Empty cells become `null`; dates stay as spreadsheet serial numbers.
 */
export async function readXlsxToRows(fileBytes: ArrayBuffer, sheetName?: string): Promise<RawRow[]> {
  const data = new Uint8Array(fileBytes);
  const workbook = XLSX.read(data, { type: "array" });
  const sheet = workbook.Sheets[chooseSheet(workbook.SheetNames, sheetName)];
  if (!sheet) return [];

  const json = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: null });
  return json.map((row) => {
    const out: RawRow = {};
    for (const key of Object.keys(row)) {
      out[key] = toCell(row[key]);
    }
    return out;
  });
}

function chooseSheet(sheetNames: string[], requested?: string): string {
  if (requested && sheetNames.includes(requested)) return requested;
  const preferred = sheetNames.find((name) => name.toLowerCase() === "wordlist");
  return preferred ?? sheetNames[0];
}

function toCell(value: unknown): Cell {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") return value;
  return String(value);
}
