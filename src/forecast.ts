import { coerceNumber } from "./cells.js";
import { parseDateLenient } from "./sanitize.js";
import type { RawRow } from "./types.js";

/**
 * Module: Forecast Series Preparation
 * Purpose: Shape a cleaned long table into the one-point-per-day series the forecasting
 * collaborator consumes, and describe the horizon it must predict. The model itself
 * lives outside this package.
 */

export interface ForecastPoint {
  ds: string; // ISO yyyy-MM-dd
  y: number;
}

// File names under `processedDataPath` / `outputPath` when `series` is given no paths
export const CLEANED_DATA_FILE = "marketing_summary_cleaned.csv";
export const SERIES_OUTPUT_FILE = "daily_sales_series.csv";

export interface ForecastingConfig {
  processedDataPath: string;
  predictionPeriods: number;
  outputPath: string;
  plotTitle: string;
  plotXLabel: string;
  plotYLabel: string;
}

/**
 * One point per distinct date, `y` taken from the first `total_sales` seen for that date
 * (the value repeats on every record of a report day). Rows without a parseable date or
 * numeric total are skipped. Sorted by date.
 */
export function buildDailySalesSeries(rows: readonly RawRow[], dayFirst = false): ForecastPoint[] {
  const byDate = new Map<string, number>();
  for (const row of rows) {
    const ds = parseDateLenient(row.date, dayFirst);
    const y = coerceNumber(row.total_sales);
    if (ds === undefined || y === undefined || byDate.has(ds)) continue;
    byDate.set(ds, y);
  }
  return Array.from(byDate.entries())
    .sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
    .map(([ds, y]) => ({ ds, y }));
}

/**
 * The `periods` daily dates following the last point of the series.
 */
export function horizonDates(series: readonly ForecastPoint[], periods: number): string[] {
  const last = series[series.length - 1];
  if (!last || periods <= 0) return [];
  const start = Date.parse(`${last.ds}T00:00:00.000Z`);
  const out: string[] = [];
  for (let i = 1; i <= periods; i++) {
    out.push(new Date(start + i * 86400000).toISOString().slice(0, 10));
  }
  return out;
}

// What the forecasting collaborator needs beside the series itself
export interface ForecastRequest {
  points: number;
  periods: number;
  horizonStart: string | null;
  horizonEnd: string | null;
  plot: { title: string; xLabel: string; yLabel: string };
}

export function describeForecast(series: readonly ForecastPoint[], config: ForecastingConfig): ForecastRequest {
  const horizon = horizonDates(series, config.predictionPeriods);
  return {
    points: series.length,
    periods: config.predictionPeriods,
    horizonStart: horizon[0] ?? null,
    horizonEnd: horizon[horizon.length - 1] ?? null,
    plot: { title: config.plotTitle, xLabel: config.plotXLabel, yLabel: config.plotYLabel },
  };
}
