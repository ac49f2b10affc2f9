import winston from "winston";
import type { Logger } from "winston";

export type { Logger } from "winston";

export type LogLevel = "error" | "warn" | "info" | "debug";

export interface LoggerOptions {
  level?: LogLevel | undefined;
  format?: "json" | "pretty" | undefined;
  silent?: boolean | undefined;
}

function runningUnderTest(): boolean {
  return process.env.VITEST === "true" || process.env.NODE_ENV === "test";
}

export function createLogger(options?: LoggerOptions): Logger {
  const format =
    options?.format === "json"
      ? winston.format.combine(winston.format.timestamp(), winston.format.json())
      : winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(({ level, message, ...meta }) => {
            const details = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
            return `${level}: ${String(message)}${details}`;
          })
        );

  return winston.createLogger({
    level: options?.level ?? "info",
    silent: options?.silent ?? runningUnderTest(),
    format,
    // Diagnostics go to stderr so stdout stays free for command output.
    transports: [new winston.transports.Console({ stderrLevels: ["error", "warn", "info", "debug"] })]
  });
}
