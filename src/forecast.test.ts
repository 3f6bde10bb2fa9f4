import { describe, expect, test } from "vitest";
import { DEFAULT_FORECASTING_CONFIG } from "./config.js";
import { buildDailySalesSeries, describeForecast, horizonDates } from "./forecast.js";

describe("buildDailySalesSeries", () => {
  test("one point per date from the first total seen, sorted", () => {
    const series = buildDailySalesSeries([
      { date: "2024-01-02", total_sales: "700" },
      { date: "2024-01-01", total_sales: "500" },
      { date: "2024-01-01", total_sales: "999" },
      { date: "bad", total_sales: "1" },
      { date: "2024-01-03", total_sales: "N/A" },
    ]);
    expect(series).toEqual([
      { ds: "2024-01-01", y: 500 },
      { ds: "2024-01-02", y: 700 },
    ]);
  });
});

describe("horizonDates", () => {
  test("continues daily after the last point, across month ends", () => {
    expect(horizonDates([{ ds: "2024-01-30", y: 1 }], 3)).toEqual(["2024-01-31", "2024-02-01", "2024-02-02"]);
  });

  test("is empty without data or periods", () => {
    expect(horizonDates([], 5)).toEqual([]);
    expect(horizonDates([{ ds: "2024-01-30", y: 1 }], 0)).toEqual([]);
  });
});

describe("day-first dates", () => {
  test("follow the configured reading", () => {
    const rows = [{ date: "02/01/2024", total_sales: "500" }];
    expect(buildDailySalesSeries(rows)).toEqual([{ ds: "2024-02-01", y: 500 }]);
    expect(buildDailySalesSeries(rows, true)).toEqual([{ ds: "2024-01-02", y: 500 }]);
  });
});

describe("describeForecast", () => {
  test("carries the horizon and plot labels", () => {
    const request = describeForecast([{ ds: "2024-01-30", y: 1 }], {
      ...DEFAULT_FORECASTING_CONFIG,
      predictionPeriods: 3,
      plotTitle: "Weekly Sales",
    });
    expect(request).toEqual({
      points: 1,
      periods: 3,
      horizonStart: "2024-01-31",
      horizonEnd: "2024-02-02",
      plot: { title: "Weekly Sales", xLabel: "Date", yLabel: "Total Sales" },
    });
  });

  test("an empty series has no horizon", () => {
    expect(describeForecast([], DEFAULT_FORECASTING_CONFIG)).toMatchObject({ points: 0, horizonStart: null, horizonEnd: null });
  });
});
