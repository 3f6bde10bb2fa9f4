import { classifyCell, coerceNumber, isMissing } from "./cells.js";
import type { PipelineLogger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { createReport, makeWarning, recordWarning, sampleRows } from "./report.js";
import {
  OUTPUT_COLUMNS,
  type CellValue,
  type LongRecord,
  type RawRow,
  type RawTable,
  type RemediationReport,
  type RemediationWarning,
} from "./types.js";

/**
 * Module: Data Quality Remediation
 * Purpose: Detect, report and repair corrupted values in a long-format table so that every
 * output record carries a valid date, a trusted region and typed numerics.
 * Passes (in order, each returning a new table):
 * - empty-table guard → date repair (drop) → region repair (rewrite) → numeric coercion →
 *   defaulting → integer finalization.
 * Every repair is reported with an affected-row count and a bounded sample.
 */

export interface RemediationOptions {
  validRegionCount: number;
  unknownRegion: string;
  sampleSize: number;
  dayFirst: boolean;
}

export interface PassResult {
  table: RawTable;
  warnings: RemediationWarning[];
}

export interface RemediationResult {
  records: LongRecord[];
  report: RemediationReport;
  validRegions: string[];
  droppedRows: number;
}

export const NUMERIC_FIELDS = [
  "users_active",
  "total_sales",
  "new_customers",
  "regional_sales",
  "product_id",
] as const;

export type NumericField = (typeof NUMERIC_FIELDS)[number];

const INTEGER_FIELDS = new Set<NumericField>(["users_active", "new_customers", "product_id"]);

export const NUMERIC_DEFAULTS: Record<NumericField, number> = {
  users_active: 0,
  total_sales: 0,
  new_customers: 0,
  regional_sales: 0,
  product_id: -1,
};

const MONTH_NAMES = [
  "january", "february", "march", "april", "may", "june",
  "july", "august", "september", "october", "november", "december",
];

// Full or abbreviated (3+ letters) month name → 1..12
const monthFromToken = (t: string): number | undefined => {
  const name = t.replace(/\.$/, "");
  if (name.length < 3 || !/^[a-z]+$/.test(name)) return undefined;
  const idx = MONTH_NAMES.findIndex((full) => full.startsWith(name));
  return idx >= 0 ? idx + 1 : undefined;
};

const expandYear = (y: string): number => {
  const n = Number(y);
  if (y.length !== 2) return n;
  return n < 70 ? 2000 + n : 1900 + n;
};

const toIsoDate = (y: number, m: number, d: number): string | undefined => {
  if (!Number.isInteger(y) || !Number.isInteger(m) || !Number.isInteger(d)) return undefined;
  if (y < 1900 || y > 2100 || m < 1 || m > 12) return undefined;
  const daysInMonth = new Date(Date.UTC(y, m, 0)).getUTCDate();
  if (d < 1 || d > daysInMonth) return undefined;
  return `${y}-${String(m).padStart(2, "0")}-${String(d).padStart(2, "0")}`;
};

const excelSerialToIso = (serial: number): string | undefined => {
  if (!Number.isFinite(serial) || serial <= 59 || serial >= 400000) return undefined;
  const base = Date.UTC(1899, 11, 31);
  const whole = Math.floor(serial);
  const adj = whole > 60 ? whole - 1 : whole;
  const dt = new Date(base + adj * 86400000);
  return toIsoDate(dt.getUTCFullYear(), dt.getUTCMonth() + 1, dt.getUTCDate());
};

const TIME_SUFFIX = String.raw`(?:[T ]\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:\s?[AaPp][Mm])?(?:Z|[+-]\d{2}:?\d{2})?)?`;
const YMD_RE = new RegExp(String.raw`^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})${TIME_SUFFIX}$`);
const DMY_OR_MDY_RE = new RegExp(String.raw`^(\d{1,2})([-/.])(\d{1,2})\2(\d{4}|\d{2})${TIME_SUFFIX}$`);

/**
 * Parse common report date formats into ISO `YYYY-MM-DD`.
 * Supports:
 * - `YYYY-MM-DD`, `YYYY/MM/DD`, `YYYY.MM.DD` with an optional time part (dropped)
 * - `MM/DD/YYYY` (or `DD/MM/YYYY` with `dayFirst`); a component above 12 forces the other
 *   reading; `DD.MM.YYYY` is always day-first; two-digit years map to 1970–2069
 * - `YYYYMMDD`, a bare `YYYY` (January 1st)
 * - Excel serials: numeric cells, or five-digit strings
 * - Month names: `Jan 5 2024`, `5 Jan 2024`, `January 5, 2024`, `Jan 2024`
 * Returns `undefined` for anything else, including calendar-invalid dates.
 */
export function parseDateLenient(value: CellValue | undefined, dayFirst = false): string | undefined {
  if (isMissing(value)) return undefined;
  if (typeof value === "number") {
    if (Number.isInteger(value) && value >= 19000101 && value <= 21001231) {
      return parseDateLenient(String(value), dayFirst);
    }
    return excelSerialToIso(value);
  }
  if (typeof value !== "string") return undefined;
  const s = value.trim();

  let m = YMD_RE.exec(s);
  if (m) return toIsoDate(Number(m[1]), Number(m[2]), Number(m[3]));

  m = DMY_OR_MDY_RE.exec(s);
  if (m) {
    const a = Number(m[1]);
    const b = Number(m[3]);
    const year = expandYear(m[4]);
    let dayFirstHere = dayFirst || m[2] === ".";
    if (a > 12 && b <= 12) dayFirstHere = true;
    else if (b > 12 && a <= 12) dayFirstHere = false;
    return dayFirstHere ? toIsoDate(year, b, a) : toIsoDate(year, a, b);
  }

  if (/^\d{8}$/.test(s)) return toIsoDate(Number(s.slice(0, 4)), Number(s.slice(4, 6)), Number(s.slice(6, 8)));
  if (/^\d{4}$/.test(s)) return toIsoDate(Number(s), 1, 1);
  if (/^\d{5}(?:\.\d+)?$/.test(s)) return excelSerialToIso(Number(s));

  const parts = s.toLowerCase().split(/[\s,\-\/]+/).filter(Boolean);
  if (parts.length === 3) {
    const [p0, p1, p2] = parts;
    const m0 = monthFromToken(p0);
    if (m0 && /^\d{1,2}(?:st|nd|rd|th)?$/.test(p1) && /^\d{4}$/.test(p2)) {
      return toIsoDate(Number(p2), m0, parseInt(p1, 10));
    }
    const m1 = monthFromToken(p1);
    if (m1 && /^\d{1,2}(?:st|nd|rd|th)?$/.test(p0) && /^\d{4}$/.test(p2)) {
      return toIsoDate(Number(p2), m1, parseInt(p0, 10));
    }
  }
  if (parts.length === 2) {
    const m0 = monthFromToken(parts[0]);
    if (m0 && /^\d{4}$/.test(parts[1])) return toIsoDate(Number(parts[1]), m0, 1);
  }
  return undefined;
}

/**
 * The `count` most frequent distinct text regions, most frequent first; ties keep
 * first-encountered order. The sentinel label is never counted.
 */
export function inferValidRegions(rows: readonly RawRow[], count: number, unknownRegion: string): string[] {
  const freq = new Map<string, number>();
  for (const row of rows) {
    const cell = classifyCell(row.region);
    if (!cell || cell.kind !== "text" || cell.value === unknownRegion) continue;
    freq.set(cell.value, (freq.get(cell.value) ?? 0) + 1);
  }
  return Array.from(freq.entries())
    .sort((a, b) => b[1] - a[1])
    .slice(0, Math.max(0, count))
    .map(([region]) => region);
}

export function guardEmpty(table: RawTable): RemediationWarning | undefined {
  if (table.rows.length > 0) return undefined;
  return makeWarning("W_EMPTY_TABLE", "*", 0, "Table has no rows; remediation skipped");
}

/**
 * Normalize `date` to ISO and drop rows whose date cannot be parsed.
 */
export function repairDates(table: RawTable, options: RemediationOptions): PassResult {
  const rows: RawRow[] = [];
  const failed: number[] = [];
  table.rows.forEach((row, idx) => {
    const iso = parseDateLenient(row.date, options.dayFirst);
    if (iso === undefined) failed.push(idx);
    else rows.push({ ...row, date: iso });
  });
  const warnings = failed.length
    ? [
        makeWarning(
          "W_DATE_UNPARSEABLE",
          "date",
          failed.length,
          `Dropped ${failed.length} row(s) with an unparseable 'date'`,
          sampleRows(table.rows, failed, options.sampleSize)
        ),
      ]
    : [];
  return { table: { columns: [...table.columns], rows }, warnings };
}

/**
 * Rewrite regions outside the inferred vocabulary to the sentinel label.
 * Missing regions are left for `applyDefaults`.
 */
export function repairRegions(
  table: RawTable,
  options: RemediationOptions
): PassResult & { validRegions: string[] } {
  const validRegions = inferValidRegions(table.rows, options.validRegionCount, options.unknownRegion);
  const vocabulary = new Set([...validRegions, options.unknownRegion]);
  const rewritten: number[] = [];
  const rows = table.rows.map((row, idx) => {
    if (isMissing(row.region)) return { ...row };
    const cell = classifyCell(row.region);
    if (cell?.kind === "text" && vocabulary.has(cell.value)) return { ...row, region: cell.value };
    rewritten.push(idx);
    return { ...row, region: options.unknownRegion };
  });
  const warnings = rewritten.length
    ? [
        makeWarning(
          "W_REGION_UNRECOGNIZED",
          "region",
          rewritten.length,
          `Rewrote ${rewritten.length} unrecognized 'region' value(s) to '${options.unknownRegion}'`,
          sampleRows(table.rows, rewritten, options.sampleSize)
        ),
      ]
    : [];
  return { table: { columns: ensureColumn(table.columns, "region"), rows }, warnings, validRegions };
}

/**
 * Coerce every numeric field. Values present before coercion and missing after are
 * corrupted and reported per field; values already missing are not.
 */
export function repairNumerics(table: RawTable, options: RemediationOptions): PassResult {
  const corrupted = new Map<NumericField, number[]>();
  const rows = table.rows.map((row, idx) => {
    const out: RawRow = { ...row };
    for (const field of NUMERIC_FIELDS) {
      const before = row[field];
      const n = coerceNumber(before);
      if (n === undefined && !isMissing(before)) {
        const list = corrupted.get(field) ?? [];
        list.push(idx);
        corrupted.set(field, list);
      }
      out[field] = n ?? null;
    }
    return out;
  });
  const warnings: RemediationWarning[] = [];
  for (const field of NUMERIC_FIELDS) {
    const list = corrupted.get(field);
    if (!list) continue;
    warnings.push(
      makeWarning(
        "W_NON_NUMERIC",
        field,
        list.length,
        `Found ${list.length} non-numeric value(s) in '${field}'`,
        sampleRows(table.rows, list, options.sampleSize)
      )
    );
  }
  let columns = [...table.columns];
  for (const field of NUMERIC_FIELDS) columns = ensureColumn(columns, field);
  return { table: { columns, rows }, warnings };
}

/**
 * Fill remaining gaps with fixed defaults (0 for counts and sales, -1 for product id,
 * the sentinel label for region).
 */
export function applyDefaults(table: RawTable, options: RemediationOptions): RawTable {
  const rows = table.rows.map((row) => {
    const out: RawRow = { ...row };
    for (const field of NUMERIC_FIELDS) {
      if (isMissing(out[field])) out[field] = NUMERIC_DEFAULTS[field];
    }
    if (isMissing(out.region)) out.region = options.unknownRegion;
    return out;
  });
  return { columns: ensureColumn(table.columns, "region"), rows };
}

/**
 * Emit strict records; integer fields are truncated toward zero.
 */
export function finalizeTypes(table: RawTable, options: RemediationOptions): LongRecord[] {
  const num = (row: RawRow, field: NumericField): number => {
    const n = coerceNumber(row[field]) ?? NUMERIC_DEFAULTS[field];
    // `+ 0` turns -0 into 0
    return INTEGER_FIELDS.has(field) ? Math.trunc(n) + 0 : n;
  };
  return table.rows.map((row) => ({
    date: String(row.date ?? ""),
    users_active: num(row, "users_active"),
    total_sales: num(row, "total_sales"),
    new_customers: num(row, "new_customers"),
    report_generated: row.report_generated ?? null,
    region: isMissing(row.region) ? options.unknownRegion : String(row.region),
    regional_sales: num(row, "regional_sales"),
    product_id: num(row, "product_id"),
  }));
}

export function recordToRow(record: LongRecord): RawRow {
  return {
    date: record.date,
    users_active: record.users_active,
    total_sales: record.total_sales,
    new_customers: record.new_customers,
    report_generated: record.report_generated,
    region: record.region,
    regional_sales: record.regional_sales,
    product_id: record.product_id,
  };
}

export function recordsToTable(records: readonly LongRecord[]): RawTable {
  return { columns: [...OUTPUT_COLUMNS], rows: records.map(recordToRow) };
}

function ensureColumn(columns: readonly string[], col: string): string[] {
  return columns.includes(col) ? [...columns] : [...columns, col];
}

/**
 * Run every remediation pass over a long-format table.
 *
 * Returns the strict records plus the append-only report; each warning is also logged
 * at `warn`. An empty table short-circuits after the guard.
 */
export function remediateTable(
  table: RawTable,
  options: RemediationOptions,
  logger: PipelineLogger = silentLogger
): RemediationResult {
  const report = createReport();
  const empty = guardEmpty(table);
  if (empty) {
    recordWarning(report, empty, logger);
    return { records: [], report, validRegions: [], droppedRows: 0 };
  }

  const dated = repairDates(table, options);
  dated.warnings.forEach((w) => recordWarning(report, w, logger));

  const regions = repairRegions(dated.table, options);
  regions.warnings.forEach((w) => recordWarning(report, w, logger));

  const numerics = repairNumerics(regions.table, options);
  numerics.warnings.forEach((w) => recordWarning(report, w, logger));

  const defaulted = applyDefaults(numerics.table, options);
  const records = finalizeTypes(defaulted, options);
  logger.debug("Remediation complete", {
    inputRows: table.rows.length,
    outputRows: records.length,
    validRegions: regions.validRegions,
  });
  return {
    records,
    report,
    validRegions: regions.validRegions,
    droppedRows: table.rows.length - dated.table.rows.length,
  };
}
