import type { PipelineLogger } from "./logger.js";
import { normalizeReportCore } from "./normalizeReportCore.js";
import { readTableFromBuffer } from "./reader.js";
import type { NormalizedReportResult, PipelineOptions } from "./types.js";

export * from "./types.js";
export * from "./errors.js";
export { classifyCell, coerceNumber, isMissing } from "./cells.js";
export { parseCsvRaw, parseCsvToTable, serializeCsv } from "./csv.js";
export { readXlsxToTable, writeXlsxFromMatrix } from "./xlsx.js";
export { ensureRequiredColumns, detectTableFormat, listGroupColumns } from "./schema.js";
export { unpivotRow, unpivotRowAdaptive, unpivotRowTriplets, unpivotTable } from "./unpivot.js";
export type { UnpivotOptions } from "./unpivot.js";
export * from "./sanitize.js";
export { summarizeReport } from "./report.js";
export { readTableFile, readTableFromBuffer } from "./reader.js";
export { recordsToCsv, toOutputMatrix, writeResultFile } from "./writer.js";
export {
  CLEANED_DATA_FILE,
  SERIES_OUTPUT_FILE,
  buildDailySalesSeries,
  describeForecast,
  horizonDates,
} from "./forecast.js";
export type { ForecastPoint, ForecastRequest, ForecastingConfig } from "./forecast.js";
export { loadConfig, resolveConfig } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger, silentLogger, ReportLogger } from "./logger.js";
export type { LogLevel, PipelineLogger } from "./logger.js";
export { normalizeReportCore };

/**
 * Module: Report Normalizer Entry Point
 * Purpose: Normalize a wide marketing summary report (CSV or XLSX) into remediated
 * long-format records with an audit report and run metadata.
 * Notes:
 * - Accepts bytes so callers decide where files come from.
 * - Wide vs long is detected from headers; long tables skip the unpivot.
 */
/**
 * Normalize a report file from bytes.
 *
 * Parameters:
 * - `fileBytes`: raw file contents.
 * - `filename`: original filename (used to pick the CSV or XLSX reader).
 * - `options`: pipeline options (`strategy`, `keepBareRegions`, `validRegionCount`, ...).
 * - `logger`: receives stage progress and every remediation warning; silent by default.
 *
 * Returns: `NormalizedReportResult`
 * - `records`: remediated rows, no missing values in typed fields.
 * - `report`: every warning in pass order, with counts and bounded samples.
 * - `meta`: format, strategy, group columns, row counts, inferred region vocabulary.
 */
export function normalizeReportFromBuffer(
  fileBytes: ArrayBuffer | Uint8Array,
  filename: string,
  options?: PipelineOptions,
  logger?: PipelineLogger
): NormalizedReportResult {
  const table = readTableFromBuffer(fileBytes, filename);
  return normalizeReportCore({ table, options, logger });
}
