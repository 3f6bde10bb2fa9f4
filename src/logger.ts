/**
 * Module: Structured Logging
 * Purpose: Leveled logger with human-readable and JSON-line output. Library code depends on
 * the `PipelineLogger` interface only; the CLI supplies a concrete `ReportLogger`.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogMetadata {
  readonly [key: string]: unknown;
}

export interface PipelineLogger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;
}

export interface LoggerConfig {
  /** Minimum level to output */
  readonly level: LogLevel;
  /** Emit one JSON object per line instead of colored text */
  readonly json: boolean;
  readonly service?: string;
  /** Line sink; defaults to the console method matching the level */
  readonly write?: (level: LogLevel, line: string) => void;
}

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: "DEBUG",
  info: "INFO ",
  warn: "WARN ",
  error: "ERROR",
};

const consoleWrite = (level: LogLevel, line: string): void => {
  switch (level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.info(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
};

export class ReportLogger implements PipelineLogger {
  private readonly config: LoggerConfig;
  private startTime: number;

  constructor(config: LoggerConfig) {
    this.config = { ...config, service: config.service ?? "report-normalize" };
    this.startTime = Date.now();
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private formatJson(level: LogLevel, message: string, metadata?: LogMetadata): string {
    return JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(this.config.service ? { service: this.config.service } : {}),
      ...(metadata ?? {}),
    });
  }

  private formatHuman(level: LogLevel, message: string, metadata?: LogMetadata): string {
    let line = `${COLORS.dim}${new Date().toISOString()}${COLORS.reset} `;
    line += `${LEVEL_COLORS[level]}${LEVEL_LABELS[level]}${COLORS.reset} `;
    line += message;
    if (metadata && Object.keys(metadata).length > 0) {
      const metaStr = Object.entries(metadata)
        .map(([key, value]) => {
          const valueStr = typeof value === "object" ? JSON.stringify(value) : String(value);
          return `${COLORS.cyan}${key}${COLORS.reset}=${valueStr}`;
        })
        .join(" ");
      line += ` ${COLORS.dim}(${metaStr})${COLORS.reset}`;
    }
    return line;
  }

  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(level)) return;
    const line = this.config.json
      ? this.formatJson(level, message, metadata)
      : this.formatHuman(level, message, metadata);
    (this.config.write ?? consoleWrite)(level, line);
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log("debug", message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log("info", message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log("warn", message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log("error", message, metadata);
  }

  commandStart(command: string, metadata?: LogMetadata): void {
    this.startTime = Date.now();
    this.info(`Starting ${command}`, metadata);
  }

  commandEnd(success: boolean, metadata?: LogMetadata): void {
    const meta = { duration_ms: Date.now() - this.startTime, ...metadata };
    if (success) this.info("Command completed", meta);
    else this.error("Command failed", meta);
  }
}

export function createLogger(config: Partial<LoggerConfig> = {}): ReportLogger {
  return new ReportLogger({
    level: config.level ?? "info",
    json: config.json ?? false,
    service: config.service,
    write: config.write,
  });
}

const noop = (): void => {};

// Default for library callers that did not opt into logging
export const silentLogger: PipelineLogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
