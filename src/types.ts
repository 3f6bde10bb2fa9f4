/**
 * Module: Public Types & Engine Version
 * Purpose: Define the raw table shape, the canonical long record, the remediation report,
 * pipeline options and the engine version banner exposed in `meta` for diagnostics.
 */
export type CellValue = string | number | boolean | null;

// One input row keyed by header. Group columns hold heterogeneous cells.
export type RawRow = Record<string, CellValue>;

export interface RawTable {
  columns: string[];
  rows: RawRow[];
}

// Classified once at ingestion; the unpivot state machine transitions on `kind`.
export type TaggedCell =
  | { kind: "text"; value: string }
  | { kind: "number"; value: number };

export const REQUIRED_COLUMNS = [
  "date",
  "users_active",
  "total_sales",
  "new_customers",
  "report_generated",
] as const;

export type IdentifyingField = (typeof REQUIRED_COLUMNS)[number];

export const GROUP_FIELDS = ["region", "regional_sales", "product_id"] as const;

export type GroupField = (typeof GROUP_FIELDS)[number];

export const OUTPUT_COLUMNS = [...REQUIRED_COLUMNS, ...GROUP_FIELDS] as const;

export type OutputColumn = (typeof OUTPUT_COLUMNS)[number];

// Canonical output unit after remediation
export interface LongRecord {
  date: string; // ISO yyyy-MM-dd
  users_active: number;
  total_sales: number;
  new_customers: number;
  report_generated: CellValue;
  region: string;
  regional_sales: number;
  product_id: number;
}

export type TableFormat = "wide" | "long";
export type UnpivotStrategy = "adaptive" | "triplet";

export type WarningCode =
  | "W_MISSING_COLUMN"
  | "W_EMPTY_TABLE"
  | "W_DATE_UNPARSEABLE"
  | "W_REGION_UNRECOGNIZED"
  | "W_NON_NUMERIC";

export interface SampledRow {
  index: number; // 0-based position in the table the pass received
  row: RawRow;
}

export interface RemediationWarning {
  code: WarningCode;
  column: string;
  count: number;
  message: string;
  sample: SampledRow[];
}

export interface RemediationReport {
  warnings: RemediationWarning[];
}

export interface PipelineOptions {
  groupPrefix?: string;
  wideSentinelColumn?: string;
  strategy?: UnpivotStrategy;
  keepBareRegions?: boolean;
  validRegionCount?: number;
  unknownRegion?: string;
  sampleSize?: number;
  dayFirst?: boolean;
}

export type ResolvedPipelineOptions = Required<PipelineOptions>;

export const DEFAULT_PIPELINE_OPTIONS: ResolvedPipelineOptions = {
  groupPrefix: "col_",
  wideSentinelColumn: "col_1",
  strategy: "adaptive",
  keepBareRegions: true,
  validRegionCount: 4,
  unknownRegion: "Unknown",
  sampleSize: 10,
  dayFirst: false,
};

export function resolvePipelineOptions(options: PipelineOptions = {}): ResolvedPipelineOptions {
  const d = DEFAULT_PIPELINE_OPTIONS;
  return {
    groupPrefix: options.groupPrefix ?? d.groupPrefix,
    wideSentinelColumn: options.wideSentinelColumn ?? d.wideSentinelColumn,
    strategy: options.strategy ?? d.strategy,
    keepBareRegions: options.keepBareRegions ?? d.keepBareRegions,
    validRegionCount: options.validRegionCount ?? d.validRegionCount,
    unknownRegion: options.unknownRegion ?? d.unknownRegion,
    sampleSize: options.sampleSize ?? d.sampleSize,
    dayFirst: options.dayFirst ?? d.dayFirst,
  };
}

export interface NormalizedReportResult {
  records: LongRecord[];
  report: RemediationReport;
  meta: {
    format: TableFormat;
    strategy: UnpivotStrategy;
    groupColumns: string[];
    totalRows: number;      // Raw rows found (excluding header)
    unpivotedRows: number;  // Rows entering remediation
    outputRows: number;     // Rows that survived remediation
    droppedRows: number;
    validRegions: string[];
    engineVersion: string;
  };
}

export const ENGINE_VERSION = "0.1.0";
