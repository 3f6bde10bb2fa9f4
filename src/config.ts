/**
 * Report Normalizer Configuration
 *
 * Loads an optional YAML (or JSON) file, validates it and merges it over defaults.
 *
 * Precedence (highest to lowest):
 * 1. Command-line options (applied by the CLI on top of the result)
 * 2. Config file (`--config <path>` or the first `report-normalize.config.*` found
 *    walking up from the working directory)
 * 3. Default values
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { ForecastingConfig } from "./forecast.js";
import { resolvePipelineOptions, type ResolvedPipelineOptions } from "./types.js";

export const CONFIG_FILE_NAMES = [
  "report-normalize.config.yaml",
  "report-normalize.config.yml",
  "report-normalize.config.json",
];

const PipelineSectionSchema = z
  .object({
    group_prefix: z.string().min(1).optional(),
    wide_sentinel_column: z.string().min(1).optional(),
    strategy: z.enum(["adaptive", "triplet"]).optional(),
    keep_bare_regions: z.boolean().optional(),
    valid_region_count: z.number().int().positive().optional(),
    unknown_region: z.string().min(1).optional(),
    sample_size: z.number().int().nonnegative().optional(),
    day_first: z.boolean().optional(),
  })
  .strict();

const ForecastingSectionSchema = z
  .object({
    prediction_periods: z.number().int().positive().optional(),
    plot_title: z.string().optional(),
    plot_xlabel: z.string().optional(),
    plot_ylabel: z.string().optional(),
  })
  .strict();

// Unknown top-level keys (e.g. paths used by other tools) are tolerated
export const ConfigFileSchema = z.object({
  version: z.number().int().positive().optional(),
  processed_data_path: z.string().min(1).optional(),
  output_path: z.string().min(1).optional(),
  pipeline: PipelineSectionSchema.optional(),
  forecasting: ForecastingSectionSchema.optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface AppConfig {
  readonly pipeline: ResolvedPipelineOptions;
  readonly forecasting: ForecastingConfig;
  /** Resolved config file path, null when running on defaults */
  readonly configPath: string | null;
}

export const DEFAULT_FORECASTING_CONFIG: ForecastingConfig = {
  processedDataPath: "data/processed",
  predictionPeriods: 30,
  outputPath: "output",
  plotTitle: "Daily Sales Forecast",
  plotXLabel: "Date",
  plotYLabel: "Total Sales",
};

export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);
  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) return filePath;
    }
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

function parseConfigFile(filePath: string): unknown {
  const content = readFileSync(filePath, "utf-8");
  try {
    if (filePath.endsWith(".json")) return JSON.parse(content);
    return parseYaml(content) ?? {};
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to parse config file ${filePath}: ${reason}`, filePath);
  }
}

/**
 * Validate raw file content and merge it over the defaults.
 */
export function resolveConfig(raw: unknown, configPath: string | null = null): AppConfig {
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration${configPath ? ` in ${configPath}` : ""}`, configPath, parsed.error.issues);
  }
  const file = parsed.data;
  const p = file.pipeline ?? {};
  const f = file.forecasting ?? {};
  return {
    pipeline: resolvePipelineOptions({
      groupPrefix: p.group_prefix,
      wideSentinelColumn: p.wide_sentinel_column,
      strategy: p.strategy,
      keepBareRegions: p.keep_bare_regions,
      validRegionCount: p.valid_region_count,
      unknownRegion: p.unknown_region,
      sampleSize: p.sample_size,
      dayFirst: p.day_first,
    }),
    forecasting: {
      processedDataPath: file.processed_data_path ?? DEFAULT_FORECASTING_CONFIG.processedDataPath,
      predictionPeriods: f.prediction_periods ?? DEFAULT_FORECASTING_CONFIG.predictionPeriods,
      outputPath: file.output_path ?? DEFAULT_FORECASTING_CONFIG.outputPath,
      plotTitle: f.plot_title ?? DEFAULT_FORECASTING_CONFIG.plotTitle,
      plotXLabel: f.plot_xlabel ?? DEFAULT_FORECASTING_CONFIG.plotXLabel,
      plotYLabel: f.plot_ylabel ?? DEFAULT_FORECASTING_CONFIG.plotYLabel,
    },
    configPath,
  };
}

/**
 * Load configuration from an explicit path, or discover one from `cwd`.
 * A missing explicit path is an error; no discovered file means defaults.
 */
export function loadConfig(options: { configPath?: string; cwd?: string } = {}): AppConfig {
  if (options.configPath) {
    const filePath = resolve(options.cwd ?? process.cwd(), options.configPath);
    if (!existsSync(filePath)) {
      throw new ConfigError(`Config file not found: ${filePath}`, filePath);
    }
    return resolveConfig(parseConfigFile(filePath), filePath);
  }
  const found = findConfigFile(options.cwd ?? process.cwd());
  if (!found) return resolveConfig({});
  return resolveConfig(parseConfigFile(found), found);
}
