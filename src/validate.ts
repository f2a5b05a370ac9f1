/**
 * Module: Input Validation
 * Purpose: Pure checks run before any column is read. Every failure is a
 * `ConfigurationError`; nothing here touches the dataset values.
 */
import { isDataset } from "./dataset.js";
import { ConfigurationError } from "./errors.js";
import type { ColumnRef, Dataset, DictionaryBundle, NamedWordlist } from "./types.js";
import { DEFAULT_KEY, GLOBAL_NAME, hasSourceKey, isWordlist, keyOf, resolveColumnIndex } from "./wordlist.js";

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== null && !Array.isArray(v);

export function validateDataset(dataset: unknown): asserts dataset is Dataset {
  if (!isDataset(dataset) || dataset.columns.length === 0) {
    throw new ConfigurationError("invalid_dataset", "dataset must be a table with at least one column");
  }
  const names = new Set<string>();
  for (const column of dataset.columns) {
    if (names.has(column.name)) {
      throw new ConfigurationError("invalid_dataset", `dataset column names must be unique: "${column.name}"`);
    }
    names.add(column.name);
  }
}

function checkEntries(entries: unknown[]): NamedWordlist[] {
  if (entries.length === 0) {
    throw new ConfigurationError("invalid_wordlist", "wordlists must be a wordlist or a non-empty collection of wordlists");
  }
  return entries.map((entry, idx) => {
    const table = isRecord(entry) ? entry.table : undefined;
    const name = isRecord(entry) ? entry.name : undefined;
    if (!isWordlist(table)) {
      throw new ConfigurationError("invalid_wordlist", "everything in wordlists must be a wordlist", `entry ${idx + 1}`);
    }
    if (typeof name !== "string" || name.trim() === "") {
      throw new ConfigurationError("unnamed_wordlist", "all wordlists must be named", `entry ${idx + 1}`);
    }
    return { name, table };
  });
}

/**
 * Normalize the accepted wordlist inputs into a bundle:
 * - a bundle (`{ type: "table" | "collection", ... }`) is checked and kept;
 * - a bare wordlist becomes a table bundle split by `groupBy`;
 * - a plain object of wordlists becomes a collection keyed by property name.
 */
export function toDictionaryBundle(input: unknown, groupBy: ColumnRef | null): DictionaryBundle {
  if (isWordlist(input)) return { type: "table", table: input, groupBy };
  if (Array.isArray(input) && input.length > 0) {
    throw new ConfigurationError("unnamed_wordlist", "all wordlists must be named", "got an array of wordlists");
  }
  if (!isRecord(input)) {
    throw new ConfigurationError("invalid_wordlist", "wordlists must be a wordlist or a non-empty collection of wordlists");
  }
  if (input.type === "table") {
    const { table, groupBy: ref } = input;
    if (!isWordlist(table) || !(ref === null || typeof ref === "string" || typeof ref === "number")) {
      throw new ConfigurationError("invalid_wordlist", "table bundles need a wordlist and a group reference");
    }
    return { type: "table", table, groupBy: ref };
  }
  const { entries } = input;
  if (input.type === "collection" && Array.isArray(entries)) {
    return { type: "collection", entries: checkEntries(entries) };
  }
  return {
    type: "collection",
    entries: checkEntries(Object.entries(input).map(([name, table]) => ({ name, table }))),
  };
}

/**
 * Check that a bundle can be applied to a dataset with the given eligible columns.
 */
export function validateBundle(bundle: DictionaryBundle, eligible: readonly string[]): void {
  if (bundle.type === "table") {
    if (bundle.groupBy !== null && resolveColumnIndex(bundle.table, bundle.groupBy) === null) {
      throw new ConfigurationError(
        "invalid_group_ref",
        "groupBy must be the name or position of a column in the wordlist",
        `got ${JSON.stringify(bundle.groupBy)}; columns: ${bundle.table.columns.join(", ")}`
      );
    }
    return;
  }

  const seen = new Set<string>();
  const unknown: string[] = [];
  for (const { name } of bundle.entries) {
    if (seen.has(name)) {
      throw new ConfigurationError("duplicate_wordlist", `wordlist names must be unique: "${name}"`);
    }
    seen.add(name);
    if (name !== GLOBAL_NAME && !eligible.includes(name)) unknown.push(name);
  }
  if (unknown.length > 0) {
    throw new ConfigurationError(
      "unknown_column",
      "all wordlists must match a text or factor column in the data",
      unknown.join(", ")
    );
  }
}

/**
 * `.default` cannot be used in any table applied globally: the single table
 * without a group reference, or the `.global` entry or group.
 */
export function assertNoGlobalDefault(bundle: DictionaryBundle): void {
  let found = false;
  if (bundle.type === "collection") {
    found = bundle.entries.some((e) => e.name === GLOBAL_NAME && hasSourceKey(e.table, DEFAULT_KEY));
  } else if (bundle.groupBy === null) {
    found = hasSourceKey(bundle.table, DEFAULT_KEY);
  } else {
    const groupIdx = resolveColumnIndex(bundle.table, bundle.groupBy);
    found =
      groupIdx !== null &&
      bundle.table.rows.some((row) => keyOf(row[groupIdx]) === GLOBAL_NAME && keyOf(row[0]) === DEFAULT_KEY);
  }
  if (found) {
    throw new ConfigurationError("default_in_global", "the .default keyword cannot be used with .global");
  }
}
