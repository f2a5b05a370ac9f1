/**
 * Module: Dictionary Resolution
 * Purpose: Turn a validated bundle into one of two execution modes:
 * - `shared`: one table applied to every eligible column;
 * - `perColumn`: a table per column plus an optional `.global` fallback.
 * Sorting by `sortBy` happens here so that every resolved table carries its
 * canonical value order explicitly.
 */
import type { ColumnRef, DictionaryBundle, NamedWordlist, ResolvedDictionary, ResolvedWordlist, SpellingLogger } from "./types.js";
import { GLOBAL_NAME, resolveColumnIndex, resolveWordlist, sortWordlist, splitWordlist } from "./wordlist.js";

export interface ResolveOptions {
  eligible: readonly string[];
  sortBy?: ColumnRef | null;
  logger?: SpellingLogger;
}

export function resolveDictionary(bundle: DictionaryBundle, options: ResolveOptions): ResolvedDictionary {
  const { eligible, sortBy = null, logger = console } = options;

  if (bundle.type === "table") {
    const sorted = sortWordlist(bundle.table, sortBy);
    if (bundle.groupBy === null) {
      logger.warn("[wordlist] Using wordlist globally across all text/factor columns.");
      return { mode: "shared", table: resolveWordlist(sorted), columns: [...eligible] };
    }
    const groupIdx = resolveColumnIndex(sorted, bundle.groupBy);
    // validateBundle rejects unresolvable group references before this point
    const groups = groupIdx === null ? [] : splitWordlist(sorted, groupIdx);
    return resolvePerColumn(groups, eligible);
  }

  const entries = bundle.entries.map(({ name, table }) => ({ name, table: sortWordlist(table, sortBy) }));
  return resolvePerColumn(entries, eligible);
}

function resolvePerColumn(entries: NamedWordlist[], eligible: readonly string[]): ResolvedDictionary {
  let global: ResolvedWordlist | null = null;
  const tables = new Map<string, ResolvedWordlist>();
  const columns: string[] = [];

  for (const { name, table } of entries) {
    if (name === GLOBAL_NAME) {
      global = resolveWordlist(table);
    } else if (eligible.includes(name) && !tables.has(name)) {
      tables.set(name, resolveWordlist(table));
      columns.push(name);
    }
  }

  if (global) {
    for (const name of eligible) {
      if (!tables.has(name)) columns.push(name);
    }
  }
  return { mode: "perColumn", tables, global, columns };
}
