/**
 * Module: Dataset Container
 * Purpose: Column-major table used by the spelling engine. Columns are replaced
 * copy-on-write; untouched column objects are shared between input and output.
 */
import { inferColumnKind } from "./classify.js";
import type { RawRow } from "./csv.js";
import type { Column, ColumnKind, Dataset, EligibleColumn, EligibleKind } from "./types.js";

const COLUMN_KINDS: readonly ColumnKind[] = ["text", "factor", "number", "date", "logical", "other"];

const isRecord = (v: unknown): v is Record<string, unknown> => typeof v === "object" && v !== null;

/**
 * Structural check for values arriving from untyped callers.
 */
export function isDataset(value: unknown): value is Dataset {
  if (!isRecord(value)) return false;
  const { columns } = value;
  if (!Array.isArray(columns)) return false;
  return columns.every(
    (c: unknown) =>
      isRecord(c) &&
      typeof c.name === "string" &&
      typeof c.kind === "string" &&
      COLUMN_KINDS.some((k) => k === c.kind) &&
      Array.isArray(c.values) &&
      (c.kind !== "factor" || Array.isArray(c.levels))
  );
}

export function getColumn(dataset: Dataset, name: string): Column | undefined {
  return dataset.columns.find((c) => c.name === name);
}

/** Return a new dataset with `column` swapped in for the column of the same name. */
export function replaceColumn(dataset: Dataset, column: Column): Dataset {
  return {
    ...dataset,
    columns: dataset.columns.map((c) => (c.name === column.name ? column : c)),
  };
}

const toText = (v: unknown): string | null => {
  if (v === undefined || v === null) return null;
  if (typeof v === "number" && Number.isNaN(v)) return null;
  return String(v);
};

const distinctLevels = (values: readonly (string | null)[]): string[] => {
  const seen = new Set<string>();
  for (const v of values) {
    if (v !== null && v !== "") seen.add(v);
  }
  return Array.from(seen);
};

/**
 * View a column as text or factor. Columns of another kind are stringified, which
 * only happens when the caller's `kinds` mapping marks them as eligible.
 */
export function asEligibleColumn(column: Column, kind: EligibleKind): EligibleColumn {
  if (column.kind === "text" || column.kind === "factor") return column;
  const values = column.values.map(toText);
  if (kind === "factor") {
    return { name: column.name, kind: "factor", values, levels: distinctLevels(values) };
  }
  return { name: column.name, kind: "text", values };
}

function buildColumn(name: string, raw: unknown[], kind: ColumnKind): Column {
  const blankToNull = (v: unknown): unknown => (v === undefined || v === null || v === "" ? null : v);
  switch (kind) {
    case "text":
      return { name, kind: "text", values: raw.map(toText) };
    case "factor": {
      const values = raw.map(toText);
      return { name, kind: "factor", values, levels: distinctLevels(values) };
    }
    case "number":
      return {
        name,
        kind: "number",
        values: raw.map((v) => {
          const b = blankToNull(v);
          return b === null ? null : Number(b);
        }),
      };
    default:
      return { name, kind, values: raw.map(blankToNull) };
  }
}

/**
 * Build a dataset from loosely-typed rows (CSV/XLSX records).
 * Column order follows first appearance of each key. Kinds are inferred from the
 * values unless given in `kinds`; factor levels keep first-seen order.
 */
export function datasetFromRows(rows: RawRow[], kinds: Record<string, ColumnKind> = {}): Dataset {
  const names: string[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        names.push(key);
      }
    }
  }
  const columns = names.map((name) => {
    const raw = rows.map((row) => row[name] ?? null);
    return buildColumn(name, raw, kinds[name] ?? inferColumnKind(raw));
  });
  return { columns };
}

export function datasetToRows(dataset: Dataset): Record<string, unknown>[] {
  const length = dataset.columns.reduce((max, c) => Math.max(max, c.values.length), 0);
  const rows: Record<string, unknown>[] = [];
  for (let r = 0; r < length; r++) {
    const row: Record<string, unknown> = {};
    for (const column of dataset.columns) {
      row[column.name] = column.values[r] ?? null;
    }
    rows.push(row);
  }
  return rows;
}
