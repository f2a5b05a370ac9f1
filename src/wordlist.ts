/**
 * Module: Wordlist Tables
 * Purpose: Build, check, sort and split lookup tables. Column 1 of a wordlist is
 * the source key and column 2 the canonical value; other columns (group, order)
 * are only read by the resolver.
 */
import type { RawRow } from "./csv.js";
import type { Cell, ColumnRef, NamedWordlist, ResolvedWordlist, Wordlist } from "./types.js";

export const DEFAULT_KEY = ".default";
export const MISSING_KEY = ".missing";
export const GLOBAL_NAME = ".global";

const isCell = (v: unknown): v is Cell =>
  v === null || typeof v === "string" || typeof v === "number" || typeof v === "boolean";

/**
 * Structural check: at least two named columns and rectangular rows of scalar cells.
 */
export function isWordlist(value: unknown): value is Wordlist {
  if (typeof value !== "object" || value === null) return false;
  if (!("columns" in value) || !("rows" in value)) return false;
  const { columns, rows } = value;
  if (!Array.isArray(columns) || columns.length < 2) return false;
  if (!columns.every((c: unknown) => typeof c === "string")) return false;
  if (!Array.isArray(rows)) return false;
  return rows.every((row: unknown) => Array.isArray(row) && row.length === columns.length && row.every(isCell));
}

/**
 * Build a wordlist from header-keyed records. Column order is `columns` when
 * given, otherwise the key order of the first record.
 */
export function wordlistFromRows(rows: RawRow[], columns?: string[]): Wordlist {
  const cols = columns ?? Object.keys(rows[0] ?? {});
  return {
    columns: [...cols],
    rows: rows.map((row) => cols.map((c) => row[c] ?? null)),
  };
}

/** String form used for all key and value comparisons; `null` never matches. */
export function keyOf(cell: Cell | undefined): string | null {
  if (cell === null || cell === undefined) return null;
  if (typeof cell === "number" && Number.isNaN(cell)) return null;
  return String(cell);
}

/**
 * Resolve a column reference to a 0-based index, or `null` when it names no column.
 * Numeric references are 1-based and must be whole numbers.
 */
export function resolveColumnIndex(table: Wordlist, ref: ColumnRef): number | null {
  if (typeof ref === "number") {
    if (!Number.isInteger(ref) || ref < 1 || ref > table.columns.length) return null;
    return ref - 1;
  }
  const idx = table.columns.indexOf(ref);
  return idx >= 0 ? idx : null;
}

const NUMERIC_RE = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:e[-+]?\d+)?$/i;

const numericValue = (cell: Cell): number | null => {
  if (typeof cell === "number") return Number.isNaN(cell) ? null : cell;
  if (typeof cell === "string" && NUMERIC_RE.test(cell.trim())) return Number(cell);
  if (typeof cell === "string" && /^[-+]?inf$/i.test(cell.trim())) {
    return cell.trim().startsWith("-") ? -Infinity : Infinity;
  }
  return null;
};

function compareCells(a: Cell, b: Cell): number {
  if (a === null || b === null) {
    if (a === b) return 0;
    return a === null ? 1 : -1;
  }
  const na = numericValue(a);
  const nb = numericValue(b);
  if (na !== null && nb !== null) return na === nb ? 0 : na < nb ? -1 : 1;
  return String(a).localeCompare(String(b));
}

/**
 * Stable ascending sort of the rows by `sortBy`. Tables without that column come
 * back unchanged (same object). Missing sort cells go last.
 */
export function sortWordlist(table: Wordlist, sortBy: ColumnRef | null | undefined): Wordlist {
  if (sortBy === null || sortBy === undefined) return table;
  const idx = resolveColumnIndex(table, sortBy);
  if (idx === null) return table;
  const rows = [...table.rows].sort((a, b) => compareCells(a[idx] ?? null, b[idx] ?? null));
  return { columns: table.columns, rows };
}

/**
 * Split a grouped table into one table per group value, in first-seen order.
 * Rows without a group are dropped.
 */
export function splitWordlist(table: Wordlist, groupIndex: number): NamedWordlist[] {
  const groups = new Map<string, Cell[][]>();
  for (const row of table.rows) {
    const name = keyOf(row[groupIndex]);
    if (name === null) continue;
    const bucket = groups.get(name);
    if (bucket) bucket.push(row);
    else groups.set(name, [row]);
  }
  return Array.from(groups, ([name, rows]) => ({ name, table: { columns: table.columns, rows } }));
}

export function resolveWordlist(table: Wordlist): ResolvedWordlist {
  const order: string[] = [];
  const seen = new Set<string>();
  for (const row of table.rows) {
    const value = keyOf(row[1]);
    if (value !== null && !seen.has(value)) {
      seen.add(value);
      order.push(value);
    }
  }
  return { columns: table.columns, rows: table.rows, canonicalOrder: order };
}

export function sourceKeys(table: Wordlist): Set<string> {
  const keys = new Set<string>();
  for (const row of table.rows) {
    const key = keyOf(row[0]);
    if (key !== null) keys.add(key);
  }
  return keys;
}

export function hasSourceKey(table: Wordlist, key: string): boolean {
  return table.rows.some((row) => keyOf(row[0]) === key);
}

/**
 * Rows of `table` whose source key is not in `keys`. Canonical order is
 * recomputed from the surviving rows.
 */
export function withoutSourceKeys(table: ResolvedWordlist, keys: Set<string>): ResolvedWordlist {
  const rows = table.rows.filter((row) => {
    const key = keyOf(row[0]);
    return key === null || !keys.has(key);
  });
  return resolveWordlist({ columns: table.columns, rows });
}
