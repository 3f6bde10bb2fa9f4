import type { PipelineLogger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { makeWarning } from "./report.js";
import {
  REQUIRED_COLUMNS,
  type RawTable,
  type RemediationWarning,
  type TableFormat,
} from "./types.js";

/**
 * Module: Schema Validation & Format Detection
 * Purpose: Guarantee the identifying columns exist before reshaping, and decide whether a
 * table still carries repeating group columns.
 * Notes:
 * - Missing identifying columns are synthesized with 0; the run never aborts on them.
 * - Format detection looks at header names only, never at cell values.
 */

/**
 * Add every absent identifying column with a default of 0.
 *
 * Returns a new table (existing columns untouched, new ones appended in `REQUIRED_COLUMNS`
 * order) and one `W_MISSING_COLUMN` warning per synthesized column.
 */
export function ensureRequiredColumns(
  table: RawTable,
  logger: PipelineLogger = silentLogger
): { table: RawTable; warnings: RemediationWarning[] } {
  const present = new Set(table.columns);
  const missing = REQUIRED_COLUMNS.filter((col) => !present.has(col));
  if (!missing.length) {
    return { table: { columns: [...table.columns], rows: table.rows.map((r) => ({ ...r })) }, warnings: [] };
  }

  const warnings: RemediationWarning[] = [];
  for (const col of missing) {
    const warning = makeWarning(
      "W_MISSING_COLUMN",
      col,
      table.rows.length,
      `Required column '${col}' is missing; filled with default 0`
    );
    warnings.push(warning);
    logger.warn(warning.message, { code: warning.code, column: col, count: warning.count });
  }

  const rows = table.rows.map((r) => {
    const out = { ...r };
    for (const col of missing) out[col] = 0;
    return out;
  });
  return { table: { columns: [...table.columns, ...missing], rows }, warnings };
}

/**
 * Group columns in header order: every column whose name starts with `prefix`.
 */
export function listGroupColumns(columns: readonly string[], prefix: string): string[] {
  return columns.filter((c) => c.startsWith(prefix));
}

/**
 * Classify a table as `wide` when the sentinel group column is present, otherwise `long`.
 */
export function detectTableFormat(columns: readonly string[], sentinelColumn: string): TableFormat {
  return columns.includes(sentinelColumn) ? "wide" : "long";
}
