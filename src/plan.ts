import type { ResolvedDictionary, ResolvedWordlist } from "./types.js";
import { sourceKeys, withoutSourceKeys } from "./wordlist.js";

/**
 * Ordered tables to apply to one column. When a column has its own table and a
 * global table also exists, the global rows whose keys the column table does not
 * define run first, then the column table in full, so column definitions win.
 * An empty list leaves the column untouched.
 */
export function planColumnPasses(column: string, resolved: ResolvedDictionary): ResolvedWordlist[] {
  if (resolved.mode === "shared") return [resolved.table];

  const specific = resolved.tables.get(column);
  const { global } = resolved;
  if (!specific) return global ? [global] : [];
  if (!global) return [specific];

  const remainder = withoutSourceKeys(global, sourceKeys(specific));
  return remainder.rows.length > 0 ? [remainder, specific] : [specific];
}
