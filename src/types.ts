/**
 * Module: Public Types & Engine Version
 * Purpose: Define the dataset, wordlist and bundle contracts, the substitution
 * result shape, option objects, and the engine version exposed in reports.
 */
export type Cell = string | number | boolean | null;

export type ColumnKind = "text" | "factor" | "number" | "date" | "logical" | "other";
export type EligibleKind = "text" | "factor";

export interface TextColumn {
  name: string;
  kind: "text";
  values: (string | null)[];
}

// Categorical column; `levels` fixes the label order
export interface FactorColumn {
  name: string;
  kind: "factor";
  values: (string | null)[];
  levels: string[];
}

export interface OtherColumn {
  name: string;
  kind: "number" | "date" | "logical" | "other";
  values: readonly unknown[];
}

export type Column = TextColumn | FactorColumn | OtherColumn;
export type EligibleColumn = TextColumn | FactorColumn;

export interface Dataset {
  columns: Column[];
}

/** Name or 1-based position of a wordlist column. */
export type ColumnRef = string | number;

// Column 1 holds source keys, column 2 canonical values
export interface Wordlist {
  columns: string[];
  rows: Cell[][];
}

export interface ResolvedWordlist extends Wordlist {
  // Distinct canonical values in row order, used to order factor levels
  canonicalOrder: string[];
}

export interface NamedWordlist {
  name: string;
  table: Wordlist;
}

export type DictionaryBundle =
  | { type: "table"; table: Wordlist; groupBy: ColumnRef | null }
  | { type: "collection"; entries: NamedWordlist[] };

export type WordlistInput = DictionaryBundle | Wordlist | Record<string, Wordlist>;

export type ResolvedDictionary =
  | { mode: "shared"; table: ResolvedWordlist; columns: string[] }
  | {
      mode: "perColumn";
      tables: Map<string, ResolvedWordlist>;
      global: ResolvedWordlist | null;
      columns: string[];
    };

export interface ColumnWarning {
  type: "unmatched";
  value: string;
  count: number; // occurrences in the column
  message: string;
}

export interface ColumnError {
  type: "duplicate_key";
  key: string;
  values: string[];
  message: string;
}

export interface SubstitutionResult {
  values: (string | null)[] | null; // null when nothing changed or the pass was skipped
  levels?: string[];
  warnings: ColumnWarning[];
  errors: ColumnError[];
}

export type SubstitutionFn = (column: EligibleColumn, table: ResolvedWordlist) => SubstitutionResult;

export interface ColumnDiagnostics {
  column: string;
  label: string;
  warnings: ColumnWarning[];
  errors: ColumnError[];
}

export interface DiagnosticReport {
  columns: ColumnDiagnostics[];
  message: string;
  engineVersion: string;
}

export type SpellingLogger = Pick<Console, "warn">;

export interface SpellingOptions {
  groupBy?: ColumnRef | null;
  sortBy?: ColumnRef | null;
  kinds?: Record<string, ColumnKind>;
  warn?: boolean;
  substitute?: SubstitutionFn;
  logger?: SpellingLogger;
  onWarning?: (warning: Error) => void;
}

export interface SpellingResult {
  data: Dataset;
  report: DiagnosticReport | null;
}

export const ENGINE_VERSION = "0.1.0";
