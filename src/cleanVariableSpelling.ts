/**
 * Module: Multi-Column Spelling Engine
 * Purpose: Recode every eligible (text/factor) column of a dataset with the
 * wordlist that governs it.
 * Pipeline:
 * - validate the dataset and wordlists (throws `ConfigurationError`, no work done);
 * - resolve the wordlists into shared or per-column mode;
 * - run the planned substitution passes per column, in resolution order;
 * - optionally fold per-column diagnostics into one `SpellingWarning`.
 */
import { cleanSpelling } from "./cleanSpelling.js";
import { eligibleColumnNames, findColumnKinds, isEligibleKind } from "./classify.js";
import { asEligibleColumn, getColumn, replaceColumn } from "./dataset.js";
import { DiagnosticsCollector } from "./diagnostics.js";
import { SpellingWarning } from "./errors.js";
import { planColumnPasses } from "./plan.js";
import { resolveDictionary } from "./resolve.js";
import type {
  ColumnRef,
  Dataset,
  DiagnosticReport,
  EligibleColumn,
  SpellingOptions,
  SpellingResult,
  SubstitutionResult,
  WordlistInput,
} from "./types.js";
import { assertNoGlobalDefault, toDictionaryBundle, validateBundle, validateDataset } from "./validate.js";

export const DEFAULT_SPELLING_OPTIONS: {
  groupBy: ColumnRef | null;
  sortBy: ColumnRef | null;
  warn: boolean;
} = {
  groupBy: 3,
  sortBy: null,
  warn: false,
};

const emitProcessWarning = (warning: Error): void => {
  process.emitWarning(warning);
};

/**
 * A pass takes effect only when it reports no errors and returns one value per row;
 * anything else leaves the column as it was.
 */
function applyResult(column: EligibleColumn, result: SubstitutionResult): EligibleColumn {
  const { values } = result;
  if (values === null || result.errors.length > 0 || values.length !== column.values.length) return column;
  if (column.kind === "text") return { ...column, values };
  const levels = result.levels ?? [...column.levels];
  for (const v of values) {
    if (v !== null && v !== "" && !levels.includes(v)) levels.push(v);
  }
  return { ...column, values, levels };
}

/**
 * Clean spelling or codes across the columns of a dataset.
 *
 * Parameters:
 * - `dataset`: table to clean; only text and factor columns are rewritten.
 * - `wordlists`: one grouped wordlist, a record of wordlists keyed by column
 *   name (with an optional `.global` entry), or an explicit bundle.
 * - `options.groupBy`: group column of a single wordlist (name or 1-based
 *   position, default `3`); `null` applies the wordlist to every eligible column.
 * - `options.sortBy`: wordlist column that orders canonical values (factor levels).
 * - `options.kinds`: column kinds overriding those declared by the dataset.
 * - `options.warn`: collect diagnostics into one report and emit it as a warning.
 *
 * Returns `{ data, report }`; `report` is `null` unless `warn` is set and at least
 * one column produced a warning or error. The input dataset is never mutated.
 */
export function cleanVariableSpelling(
  dataset: Dataset,
  wordlists: WordlistInput,
  options: SpellingOptions = {}
): SpellingResult {
  validateDataset(dataset);

  const groupBy = options.groupBy === undefined ? DEFAULT_SPELLING_OPTIONS.groupBy : options.groupBy;
  const sortBy = options.sortBy ?? DEFAULT_SPELLING_OPTIONS.sortBy;
  const warn = options.warn ?? DEFAULT_SPELLING_OPTIONS.warn;
  const substitute = options.substitute ?? cleanSpelling;
  const kinds = options.kinds ?? findColumnKinds(dataset);
  const eligible = eligibleColumnNames(dataset, kinds);

  const bundle = toDictionaryBundle(wordlists, groupBy);
  validateBundle(bundle, eligible);
  assertNoGlobalDefault(bundle);

  const resolved = resolveDictionary(bundle, { eligible, sortBy, logger: options.logger });
  const collector = new DiagnosticsCollector();
  let data = dataset;

  for (const name of resolved.columns) {
    const original = getColumn(data, name);
    const kind = kinds[name];
    if (!original || !isEligibleKind(kind)) continue;

    let column = asEligibleColumn(original, kind);
    let changed = false;
    for (const table of planColumnPasses(name, resolved)) {
      const result = substitute(column, table);
      if (warn) collector.record(name, result.warnings, result.errors);
      const next = applyResult(column, result);
      if (next === column) continue;
      column = next;
      changed = true;
    }
    if (changed) data = replaceColumn(data, column);
  }

  let report: DiagnosticReport | null = null;
  if (warn) {
    report = collector.toReport(resolved.columns);
    if (report) {
      const onWarning = options.onWarning ?? emitProcessWarning;
      onWarning(new SpellingWarning(report.message, report.columns.map((c) => c.column)));
    }
  }
  return { data, report };
}
