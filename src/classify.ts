/**
 * Module: Column Kind Classification
 * Purpose: Report the kind of each dataset column and decide which kinds the
 * spelling engine may rewrite. Also hosts the value-sampling heuristics used when
 * a dataset is built from loosely-typed rows.
 */
import type { ColumnKind, Dataset, EligibleKind } from "./types.js";

const NUMBER_RE = /^[-+]?\d+(?:\.\d+)?(?:e[-+]?\d+)?$/i;
const DATE_RES = [/^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2})?)?$/, /^\d{2}[\/-]\d{2}[\/-]\d{4}$/];

const isBlank = (v: unknown): boolean => v === undefined || v === null || (typeof v === "string" && v.trim() === "");

const looksNumber = (values: readonly unknown[]): boolean => {
  let total = 0;
  for (const v of values) {
    if (isBlank(v)) continue;
    total++;
    if (typeof v === "number") {
      if (!Number.isFinite(v)) return false;
      continue;
    }
    if (!NUMBER_RE.test(String(v).trim())) return false;
  }
  return total > 0;
};

const looksDate = (values: readonly unknown[]): boolean => {
  let total = 0;
  for (const v of values) {
    if (isBlank(v)) continue;
    total++;
    if (v instanceof Date) continue;
    const s = String(v).trim();
    if (!DATE_RES.some((re) => re.test(s))) return false;
  }
  return total > 0;
};

const looksLogical = (values: readonly unknown[]): boolean => {
  let total = 0;
  for (const v of values) {
    if (isBlank(v)) continue;
    total++;
    if (typeof v !== "boolean") return false;
  }
  return total > 0;
};

/**
 * Infer the kind of a raw column from its values. Every non-blank value must agree
 * for a column to be classed as number, date or logical; anything else is text.
 * A column of only blanks is text.
 */
export function inferColumnKind(values: readonly unknown[]): ColumnKind {
  if (looksLogical(values)) return "logical";
  if (looksNumber(values)) return "number";
  if (looksDate(values)) return "date";
  return "text";
}

export function isEligibleKind(kind: ColumnKind | undefined): kind is EligibleKind {
  return kind === "text" || kind === "factor";
}

/**
 * Map each column name to the kind it declares.
 */
export function findColumnKinds(dataset: Dataset): Record<string, ColumnKind> {
  const kinds: Record<string, ColumnKind> = {};
  for (const column of dataset.columns) {
    kinds[column.name] = column.kind;
  }
  return kinds;
}

/**
 * Names of the columns the engine may rewrite, in dataset order.
 */
export function eligibleColumnNames(dataset: Dataset, kinds: Record<string, ColumnKind>): string[] {
  return dataset.columns.map((c) => c.name).filter((name) => isEligibleKind(kinds[name]));
}
