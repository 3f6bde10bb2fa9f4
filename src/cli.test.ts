import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { EXIT_CODES, STDOUT_TARGET, createProgram, requestPathFor, runNormalize, runSeries } from "./cli.js";
import { createLogger, type LogLevel } from "./logger.js";

interface Captured {
  level: LogLevel;
  entry: Record<string, unknown>;
}

const capture = () => {
  const lines: Captured[] = [];
  const logger = createLogger({
    json: true,
    write: (level, line) => {
      lines.push({ level, entry: JSON.parse(line) });
    },
  });
  return { logger, lines };
};

const WIDE_CSV = [
  "date,users_active,total_sales,new_customers,report_generated,col_1,col_2,col_3,col_4,col_5,col_6",
  "2024-01-02,11,700,3,True,East,100,5,West,200,7",
  "2024-01-01,10,N/A,2,True,East,,5",
].join("\n");

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "report-normalize-cli-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("runNormalize", () => {
  test("writes the normalized CSV and reports success", async () => {
    const input = join(dir, "report.csv");
    const output = join(dir, "out", "long.csv");
    await writeFile(input, WIDE_CSV);
    const { logger, lines } = capture();

    const code = await runNormalize(input, output, {}, logger);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(await readFile(output, "utf-8")).toBe(
      [
        "date,users_active,total_sales,new_customers,report_generated,region,regional_sales,product_id",
        "2024-01-02,11,700,3,True,East,100,5",
        "2024-01-02,11,700,3,True,West,200,7",
        "2024-01-01,10,0,2,True,East,0,5",
        "",
      ].join("\n")
    );
    const summary = lines.find((l) => l.entry.message === "Wrote normalized report");
    expect(summary?.entry).toMatchObject({ rows: 3, dropped: 0, warnings: { W_NON_NUMERIC: 1 } });
    expect(lines[lines.length - 1].entry.message).toBe("Command completed");
  });

  test("a missing input exits with INPUT_NOT_FOUND and logs the path", async () => {
    const input = join(dir, "missing.csv");
    const { logger, lines } = capture();

    const code = await runNormalize(input, join(dir, "out.csv"), {}, logger);

    expect(code).toBe(EXIT_CODES.INPUT_NOT_FOUND);
    const errors = lines.filter((l) => l.level === "error").map((l) => l.entry.message);
    expect(errors).toEqual([`Input file not found: ${input}`, "Command failed"]);
  });

  test("a missing config file exits with CONFIG_ERROR", async () => {
    const input = join(dir, "report.csv");
    await writeFile(input, WIDE_CSV);
    const { logger } = capture();
    const code = await runNormalize(input, join(dir, "out.csv"), { config: join(dir, "nope.yaml") }, logger);
    expect(code).toBe(EXIT_CODES.CONFIG_ERROR);
  });

  test("an unsupported output extension exits with FAILURE", async () => {
    const input = join(dir, "report.csv");
    await writeFile(input, WIDE_CSV);
    const { logger, lines } = capture();
    const code = await runNormalize(input, join(dir, "out.json"), {}, logger);
    expect(code).toBe(EXIT_CODES.FAILURE);
    expect(lines.some((l) => String(l.entry.message).startsWith("Run aborted: Unsupported file type"))).toBe(true);
  });
});

const LONG_CSV = "date,total_sales,region\n2024-01-02,700,East\n2024-01-01,500,East\n2024-01-01,500,West\n";
const SERIES_CSV = "ds,y\n2024-01-01,500\n2024-01-02,700\n";

describe("runSeries", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("prints the daily series to stdout", async () => {
    const input = join(dir, "long.csv");
    await writeFile(input, LONG_CSV);
    const out: string[] = [];
    const { logger, lines } = capture();

    const code = await runSeries(input, STDOUT_TARGET, {}, logger, { stdout: (text) => out.push(text) });

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(out.join("")).toBe(SERIES_CSV);
    const prepared = lines.find((l) => l.entry.message === "Prepared forecast series");
    expect(prepared?.entry).toMatchObject({ points: 2, horizonStart: "2024-01-03", output: STDOUT_TARGET });
  });

  test("keeps log lines off stdout when the series is printed", async () => {
    const input = join(dir, "long.csv");
    await writeFile(input, LONG_CSV);
    const stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);

    const code = await runSeries(input, STDOUT_TARGET);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(stdout.mock.calls.map(([chunk]) => String(chunk)).join("")).toBe(SERIES_CSV);
    expect(info).not.toHaveBeenCalled();
    const logged = stderr.mock.calls.map(([chunk]) => String(chunk)).join("");
    expect(logged).toContain("Prepared forecast series");
    expect(logged).toContain("Command completed");
  });

  test("defaults both paths from the discovered config and writes the forecast request", async () => {
    await writeFile(
      join(dir, "report-normalize.config.yaml"),
      [
        "processed_data_path: processed",
        "output_path: results",
        "forecasting:",
        "  prediction_periods: 2",
        "  plot_title: Weekly Sales",
        "",
      ].join("\n")
    );
    await mkdir(join(dir, "processed"));
    await writeFile(join(dir, "processed", "marketing_summary_cleaned.csv"), LONG_CSV);
    const { logger, lines } = capture();

    const previous = process.cwd();
    process.chdir(dir);
    const code = await runSeries(undefined, undefined, {}, logger).finally(() => process.chdir(previous));

    expect(code).toBe(EXIT_CODES.SUCCESS);
    const seriesPath = join(dir, "results", "daily_sales_series.csv");
    expect(await readFile(seriesPath, "utf-8")).toBe(SERIES_CSV);
    expect(JSON.parse(await readFile(join(dir, "results", "daily_sales_series.request.json"), "utf-8"))).toEqual({
      points: 2,
      periods: 2,
      horizonStart: "2024-01-03",
      horizonEnd: "2024-01-04",
      plot: { title: "Weekly Sales", xLabel: "Date", yLabel: "Total Sales" },
    });
    const prepared = lines.find((l) => l.entry.message === "Prepared forecast series");
    expect(prepared?.entry).toMatchObject({ plot: { title: "Weekly Sales" } });
  });

  test("a missing default input exits with INPUT_NOT_FOUND", async () => {
    const configPath = join(dir, "report-normalize.config.yaml");
    await writeFile(configPath, "processed_data_path: nowhere\n");
    const { logger } = capture();
    const code = await runSeries(undefined, undefined, { config: configPath }, logger);
    expect(code).toBe(EXIT_CODES.INPUT_NOT_FOUND);
  });
});

describe("requestPathFor", () => {
  test("swaps the extension for .request.json", () => {
    expect(requestPathFor(join("out", "daily_sales_series.csv"))).toBe(join("out", "daily_sales_series.request.json"));
  });
});

describe("createProgram", () => {
  test("registers normalize as the default command and series", () => {
    const program = createProgram();
    expect(program.name()).toBe("report-normalize");
    expect(program.commands.map((c) => c.name())).toEqual(["normalize", "series"]);
  });
});
