import type { PipelineLogger } from "./logger.js";
import type { RawRow, RemediationReport, RemediationWarning, SampledRow, WarningCode } from "./types.js";

export function createReport(): RemediationReport {
  return { warnings: [] };
}

/**
 * Take at most `size` affected rows, in table order, as audit evidence.
 */
export function sampleRows(rows: readonly RawRow[], indices: readonly number[], size: number): SampledRow[] {
  return indices.slice(0, Math.max(0, size)).map((index) => ({ index, row: { ...rows[index] } }));
}

export function makeWarning(
  code: WarningCode,
  column: string,
  count: number,
  message: string,
  sample: SampledRow[] = []
): RemediationWarning {
  return { code, column, count, message, sample };
}

/**
 * Append a warning to the report and mirror it to the logger.
 */
export function recordWarning(
  report: RemediationReport,
  warning: RemediationWarning,
  logger: PipelineLogger
): void {
  report.warnings.push(warning);
  logger.warn(warning.message, {
    code: warning.code,
    column: warning.column,
    count: warning.count,
    sample: warning.sample,
  });
}

/** Total affected rows per warning code, for summaries. */
export function summarizeReport(report: RemediationReport): Partial<Record<WarningCode, number>> {
  const out: Partial<Record<WarningCode, number>> = {};
  for (const w of report.warnings) out[w.code] = (out[w.code] ?? 0) + w.count;
  return out;
}
