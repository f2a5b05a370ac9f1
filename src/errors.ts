export type ConfigurationErrorCode =
  | "invalid_dataset"
  | "invalid_wordlist"
  | "invalid_group_ref"
  | "unnamed_wordlist"
  | "duplicate_wordlist"
  | "unknown_column"
  | "default_in_global";

/**
 * Raised before any column is touched when the dataset or wordlists cannot be used.
 */
export class ConfigurationError extends Error {
  code: ConfigurationErrorCode;
  details?: string;

  constructor(code: ConfigurationErrorCode, message: string, details?: string) {
    super(message);
    this.name = "ConfigurationError";
    this.code = code;
    this.details = details;
  }
}

/**
 * Consolidated per-column diagnostics from one run, emitted as a process warning.
 */
export class SpellingWarning extends Error {
  columns: string[];

  constructor(message: string, columns: string[]) {
    super(message);
    this.name = "SpellingWarning";
    this.columns = columns;
  }
}
