import type { PipelineLogger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { createReport } from "./report.js";
import { remediateTable } from "./sanitize.js";
import { detectTableFormat, ensureRequiredColumns, listGroupColumns } from "./schema.js";
import {
  ENGINE_VERSION,
  resolvePipelineOptions,
  type NormalizedReportResult,
  type PipelineOptions,
  type RawTable,
} from "./types.js";
import { unpivotTable } from "./unpivot.js";

interface NormalizeReportCoreInput {
  table: RawTable;
  options?: PipelineOptions;
  logger?: PipelineLogger;
}

/**
 * Module: Core Normalization Pipeline
 * Purpose: Turn one raw report table into remediated long records.
 * Design:
 * - raw → validated (required columns) → unpivoted when wide → remediated.
 * - Each stage returns a new table; the caller's table is never modified.
 * - Warnings from schema validation and remediation share one report, in pass order.
 * Meta:
 * - Emits `format`, `strategy`, `groupColumns`, row counts, `validRegions`, `engineVersion`.
 */
export function normalizeReportCore(input: NormalizeReportCoreInput): NormalizedReportResult {
  const opts = resolvePipelineOptions(input.options);
  const logger = input.logger ?? silentLogger;

  const validated = ensureRequiredColumns(input.table, logger);
  const format = detectTableFormat(validated.table.columns, opts.wideSentinelColumn);
  const groupColumns = format === "wide" ? listGroupColumns(validated.table.columns, opts.groupPrefix) : [];
  logger.info("Detected table format", {
    format,
    rows: validated.table.rows.length,
    groupColumns: groupColumns.length,
  });

  const long =
    format === "wide"
      ? unpivotTable(validated.table, {
          groupPrefix: opts.groupPrefix,
          strategy: opts.strategy,
          keepBareRegions: opts.keepBareRegions,
        })
      : validated.table;
  if (format === "wide") {
    logger.info("Unpivoted wide rows", { strategy: opts.strategy, records: long.rows.length });
  }

  const remediated = remediateTable(
    long,
    {
      validRegionCount: opts.validRegionCount,
      unknownRegion: opts.unknownRegion,
      sampleSize: opts.sampleSize,
      dayFirst: opts.dayFirst,
    },
    logger
  );

  // Both stages already logged their warnings
  const report = createReport();
  report.warnings.push(...validated.warnings, ...remediated.report.warnings);

  return {
    records: remediated.records,
    report,
    meta: {
      format,
      strategy: opts.strategy,
      groupColumns,
      totalRows: input.table.rows.length,
      unpivotedRows: long.rows.length,
      outputRows: remediated.records.length,
      droppedRows: remediated.droppedRows,
      validRegions: remediated.validRegions,
      engineVersion: ENGINE_VERSION,
    },
  };
}
