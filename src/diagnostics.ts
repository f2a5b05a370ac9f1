/**
 * Module: Diagnostics Aggregation
 * Purpose: Label per-column substitution warnings/errors and fold them into one
 * report. Labels are padded to a common width with spaces turned into `_`, so
 * report lines line up.
 */
import type { ColumnDiagnostics, ColumnError, ColumnWarning, DiagnosticReport } from "./types.js";
import { ENGINE_VERSION } from "./types.js";

export function formatColumnLabels(names: readonly string[]): Map<string, string> {
  const width = names.reduce((max, n) => Math.max(max, n.length), 0);
  return new Map(names.map((n) => [n, n.padEnd(width).replace(/\s/g, "_")]));
}

/**
 * Accumulates diagnostics per column in the order columns are first recorded.
 */
export class DiagnosticsCollector {
  private readonly byColumn = new Map<string, { warnings: ColumnWarning[]; errors: ColumnError[] }>();

  record(column: string, warnings: readonly ColumnWarning[], errors: readonly ColumnError[]): void {
    const entry = this.byColumn.get(column) ?? { warnings: [], errors: [] };
    entry.warnings.push(...warnings);
    entry.errors.push(...errors);
    this.byColumn.set(column, entry);
  }

  /**
   * Merge everything recorded into one report, or `null` when nothing was recorded.
   * Columns follow `order`; columns with no records are left out.
   */
  toReport(order: readonly string[]): DiagnosticReport | null {
    const labels = formatColumnLabels(order);
    const columns: ColumnDiagnostics[] = [];
    for (const column of order) {
      const entry = this.byColumn.get(column);
      if (!entry || (entry.warnings.length === 0 && entry.errors.length === 0)) continue;
      columns.push({
        column,
        label: labels.get(column) ?? column,
        warnings: entry.warnings,
        errors: entry.errors,
      });
    }
    if (columns.length === 0) return null;
    return { columns, message: formatReport(columns), engineVersion: ENGINE_VERSION };
  }
}

export function formatReport(columns: readonly ColumnDiagnostics[]): string {
  const warnLines = columns.flatMap((c) => c.warnings.map((w) => `${c.label} : ${w.message}`));
  const errLines = columns.flatMap((c) => c.errors.map((e) => `${c.label} : ${e.message}`));
  const sections: string[] = [];
  if (warnLines.length > 0) sections.push(["The following warnings were found...", ...warnLines].join("\n"));
  if (errLines.length > 0) sections.push(["The following errors were found...", ...errLines].join("\n"));
  return sections.join("\n\n");
}
