/**
 * Module: Single-Column Substitution
 * Purpose: Default substitution primitive. Recodes one text or factor column with
 * one resolved wordlist by exact key lookup.
 * Keys:
 * - `.missing` replaces missing values (`null` and empty strings).
 * - `.default` replaces any value that is neither a key nor already canonical.
 * Results:
 * - `values` is `null` when nothing changed, or when the table has conflicting
 *   duplicate keys (reported in `errors`; the pass is skipped).
 * - `warnings` lists each distinct value left unmatched, with its count.
 */
import type { ColumnError, ColumnWarning, EligibleColumn, ResolvedWordlist, SubstitutionResult } from "./types.js";
import { DEFAULT_KEY, MISSING_KEY, keyOf } from "./wordlist.js";

type KeyMap = Map<string, string | null>;

const isMissing = (v: string | null): boolean => v === null || v === "";

function buildKeyMap(table: ResolvedWordlist): { map: KeyMap; errors: ColumnError[] } {
  const map: KeyMap = new Map();
  const conflicts = new Map<string, Set<string>>();
  for (const row of table.rows) {
    const key = keyOf(row[0]);
    if (key === null) continue;
    const value = keyOf(row[1]);
    if (!map.has(key)) {
      map.set(key, value);
      continue;
    }
    const prior = map.get(key) ?? null;
    if (prior === value) continue;
    const seen = conflicts.get(key) ?? new Set<string>([String(prior)]);
    seen.add(String(value));
    conflicts.set(key, seen);
  }
  const errors: ColumnError[] = Array.from(conflicts, ([key, values]) => {
    const list = Array.from(values);
    return {
      type: "duplicate_key",
      key,
      values: list,
      message: `duplicate key "${key}" maps to conflicting values: ${list.map((v) => `"${v}"`).join(", ")}`,
    };
  });
  return { map, errors };
}

export function cleanSpelling(column: EligibleColumn, table: ResolvedWordlist): SubstitutionResult {
  const { map, errors } = buildKeyMap(table);
  if (errors.length > 0) return { values: null, warnings: [], errors };

  const canonical = new Set(table.canonicalOrder);
  const hasDefault = map.has(DEFAULT_KEY);
  const hasMissing = map.has(MISSING_KEY);

  // Returns undefined when the value has no match at all
  const lookup = (v: string | null): string | null | undefined => {
    if (isMissing(v)) return hasMissing ? map.get(MISSING_KEY) ?? null : v;
    if (v === null) return v;
    if (v !== DEFAULT_KEY && v !== MISSING_KEY && map.has(v)) return map.get(v) ?? null;
    if (canonical.has(v)) return v;
    if (hasDefault) return map.get(DEFAULT_KEY) ?? null;
    return undefined;
  };

  const unmatched = new Map<string, number>();
  const values = column.values.map((v) => {
    const mapped = lookup(v);
    if (mapped !== undefined) return mapped;
    if (v !== null) unmatched.set(v, (unmatched.get(v) ?? 0) + 1);
    return v;
  });

  const warnings: ColumnWarning[] = Array.from(unmatched, ([value, count]) => ({
    type: "unmatched",
    value,
    count,
    message: `no match for "${value}" (n = ${count})`,
  }));

  const valuesChanged = values.some((v, i) => v !== column.values[i]);

  if (column.kind === "factor") {
    const levels = factorLevels(column.levels, values, table.canonicalOrder, lookup);
    const levelsChanged = levels.length !== column.levels.length || levels.some((l, i) => l !== column.levels[i]);
    if (!valuesChanged && !levelsChanged) return { values: null, warnings, errors };
    return { values, levels, warnings, errors };
  }

  return { values: valuesChanged ? values : null, warnings, errors };
}

/**
 * Labels present after recoding, in table order first, then any surviving old
 * labels in their previous order.
 */
function factorLevels(
  oldLevels: string[],
  values: (string | null)[],
  canonicalOrder: string[],
  lookup: (v: string | null) => string | null | undefined
): string[] {
  const present = new Set<string>();
  const mappedOld: string[] = [];
  for (const level of oldLevels) {
    const mapped = lookup(level);
    const label = mapped === undefined ? level : mapped;
    if (!isMissing(label) && label !== null) {
      present.add(label);
      mappedOld.push(label);
    }
  }
  for (const v of values) {
    if (!isMissing(v) && v !== null) present.add(v);
  }

  const levels: string[] = [];
  const added = new Set<string>();
  const add = (label: string) => {
    if (present.has(label) && !added.has(label)) {
      added.add(label);
      levels.push(label);
    }
  };
  canonicalOrder.forEach(add);
  mappedOld.forEach(add);
  values.forEach((v) => {
    if (v !== null) add(v);
  });
  return levels;
}
