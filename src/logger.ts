import winston from "winston";
import type { LogLevel } from "./config.js";

export type Logger = winston.Logger;

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    return JSON.stringify({ timestamp, level, message, ...meta });
  }),
);

/**
 * Every level goes to stderr: stdout belongs to the MCP stdio transport
 * (and to query output in the CLI).
 */
export function createLogger(level: LogLevel = "info"): Logger {
  return winston.createLogger({
    level,
    format: logFormat,
    defaultMeta: { service: "duckdb-query-gateway" },
    transports: [
      new winston.transports.Console({
        stderrLevels: ["error", "warn", "info", "http", "verbose", "debug", "silly"],
      }),
    ],
  });
}

/** A logger that drops everything, for tests and embedding. */
export function createSilentLogger(): Logger {
  return winston.createLogger({
    silent: true,
    transports: [new winston.transports.Console({ silent: true })],
  });
}
