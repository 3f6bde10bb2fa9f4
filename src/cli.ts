/**
 * Report Normalizer CLI
 *
 * `normalize <input> <output>` (default command) runs the full pipeline;
 * `series [input] [output]` prepares the daily sales series for forecasting; paths default to
 * the configured `processed_data_path` / `output_path`, and `-` as output prints to stdout.
 * Failures are reported through the logger and mapped to exit codes; nothing is re-thrown.
 *
 * @module cli
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname, extname, resolve } from "node:path";
import { Command, Option } from "commander";
import { z } from "zod";
import { loadConfig, type AppConfig } from "./config.js";
import { serializeCsv } from "./csv.js";
import { ConfigError, InputNotFoundError, describeError } from "./errors.js";
import {
  CLEANED_DATA_FILE,
  SERIES_OUTPUT_FILE,
  buildDailySalesSeries,
  describeForecast,
} from "./forecast.js";
import { createLogger, type ReportLogger } from "./logger.js";
import { normalizeReportCore } from "./normalizeReportCore.js";
import { readTableFile } from "./reader.js";
import { summarizeReport } from "./report.js";
import { ENGINE_VERSION } from "./types.js";
import { writeResultFile } from "./writer.js";

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  INPUT_NOT_FOUND: 2,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export const CliOptionsSchema = z.object({
  config: z.string().optional(),
  strategy: z.enum(["adaptive", "triplet"]).optional(),
  json: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export interface CliIO {
  stdout: (text: string) => void;
}

const defaultIO: CliIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
};

export const STDOUT_TARGET = "-";

function loggerFor(options: CliOptions, toStderr = false): ReportLogger {
  return createLogger({
    level: options.verbose ? "debug" : "info",
    json: options.json ?? false,
    // stdout carries the data
    write: toStderr
      ? (_level, line) => {
          process.stderr.write(`${line}\n`);
        }
      : undefined,
  });
}

// Sidecar beside the series file: `daily_sales_series.csv` → `daily_sales_series.request.json`
export function requestPathFor(seriesPath: string): string {
  return `${seriesPath.slice(0, seriesPath.length - extname(seriesPath).length)}.request.json`;
}

function failureCode(error: unknown): ExitCode {
  if (error instanceof InputNotFoundError) return EXIT_CODES.INPUT_NOT_FOUND;
  if (error instanceof ConfigError) return EXIT_CODES.CONFIG_ERROR;
  return EXIT_CODES.FAILURE;
}

function reportFailure(logger: ReportLogger, error: unknown): ExitCode {
  if (error instanceof InputNotFoundError) {
    logger.error(error.message, { path: error.path });
  } else {
    logger.error(`Run aborted: ${describeError(error)}`, {
      error: error instanceof Error ? error.name : typeof error,
    });
  }
  logger.commandEnd(false);
  return failureCode(error);
}

/**
 * Read, normalize and write one report.
 */
export async function runNormalize(
  input: string,
  output: string,
  options: CliOptions = {},
  logger: ReportLogger = loggerFor(options)
): Promise<ExitCode> {
  logger.commandStart("normalize", { input, output });
  try {
    const config: AppConfig = loadConfig({ configPath: options.config });
    const pipeline = { ...config.pipeline, ...(options.strategy ? { strategy: options.strategy } : {}) };
    if (config.configPath) logger.debug("Loaded configuration", { configPath: config.configPath });

    const table = await readTableFile(input);
    logger.info("Loaded input table", { rows: table.rows.length, columns: table.columns.length });

    const result = normalizeReportCore({ table, options: pipeline, logger });
    await writeResultFile(output, result.records);
    logger.info("Wrote normalized report", {
      output,
      rows: result.meta.outputRows,
      dropped: result.meta.droppedRows,
      warnings: summarizeReport(result.report),
    });
    logger.commandEnd(true);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportFailure(logger, error);
  }
}

/**
 * Build the daily `(ds, y)` series from a normalized table and write it as CSV, together with
 * the forecast request (horizon and plot labels) as a JSON sidecar.
 *
 * Relative config paths resolve against the config file's directory.
 */
export async function runSeries(
  input: string | undefined,
  output: string | undefined,
  options: CliOptions = {},
  logger: ReportLogger = loggerFor(options, output === STDOUT_TARGET),
  io: CliIO = defaultIO
): Promise<ExitCode> {
  logger.commandStart("series", { input, output });
  try {
    const config = loadConfig({ configPath: options.config });
    const baseDir = config.configPath ? dirname(config.configPath) : process.cwd();
    const source = input ?? resolve(baseDir, config.forecasting.processedDataPath, CLEANED_DATA_FILE);
    const target = output ?? resolve(baseDir, config.forecasting.outputPath, SERIES_OUTPUT_FILE);

    const table = await readTableFile(source);
    const series = buildDailySalesSeries(table.rows, config.pipeline.dayFirst);
    const request = describeForecast(series, config.forecasting);
    const csv = serializeCsv([["ds", "y"], ...series.map((p) => [p.ds, p.y])]);
    if (target === STDOUT_TARGET) {
      io.stdout(csv);
    } else {
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, csv);
      await writeFile(requestPathFor(target), `${JSON.stringify(request, null, 2)}\n`);
    }
    logger.info("Prepared forecast series", { input: source, output: target, ...request });
    logger.commandEnd(true);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportFailure(logger, error);
  }
}

function withCommonOptions(command: Command): Command {
  return command
    .option("--config <path>", "Path to config file (default: report-normalize.config.yaml)")
    .option("--json", "Log as JSON lines")
    .option("-v, --verbose", "Enable debug logging");
}

function parseCliOptions(raw: unknown): CliOptions {
  const parsed = CliOptionsSchema.safeParse(raw);
  if (parsed.success) return parsed.data;
  throw new ConfigError("Invalid command-line options", null, parsed.error.issues);
}

export function createProgram(io: CliIO = defaultIO): Command {
  const program = new Command();
  program
    .name("report-normalize")
    .description("Normalize wide marketing summary reports into a long-format table")
    .version(ENGINE_VERSION, "-V, --version", "Output the version number");

  withCommonOptions(
    program
      .command("normalize <input> <output>", { isDefault: true })
      .description("Unpivot and remediate a report (CSV or XLSX) and write the long table")
      .addOption(new Option("--strategy <name>", "Unpivot strategy").choices(["adaptive", "triplet"]))
  ).action(async (input: string, output: string, rawOptions: unknown) => {
    process.exitCode = await runNormalize(input, output, parseCliOptions(rawOptions));
  });

  withCommonOptions(
    program
      .command("series [input] [output]")
      .description("Build the daily total-sales series consumed by the forecaster ('-' as output prints it)")
  ).action(async (input: string | undefined, output: string | undefined, rawOptions: unknown) => {
    const options = parseCliOptions(rawOptions);
    process.exitCode = await runSeries(input, output, options, loggerFor(options, output === STDOUT_TARGET), io);
  });

  return program;
}
