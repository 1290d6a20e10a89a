/**
 * Console logger backed by Winston.
 *
 * Every subsystem takes a Logger by injection, so tests can pass
 * vi.fn() stubs while the CLI passes this one.
 */

import winston from "winston";
import type { Logger } from "./types.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface MigrateLoggerOptions {
  /** Prefix for all log lines. Default: "claw-migrate". */
  prefix?: string;
  /** Minimum log level. Default: "info". */
  level?: LogLevel;
  /** Print a timestamp before each line. Default: true. */
  timestamps?: boolean;
}

export function isLogLevel(v: unknown): v is LogLevel {
  return v === "debug" || v === "info" || v === "warn" || v === "error";
}

export function createMigrateLogger(opts?: MigrateLoggerOptions): Logger {
  const prefix = opts?.prefix ?? "claw-migrate";
  const minLevel = opts?.level ?? "info";
  const timestamps = opts?.timestamps ?? true;

  const winstonLogger = winston.createLogger({
    level: minLevel,
    format: winston.format.combine(
      winston.format.timestamp({ format: "YYYY-MM-DDTHH:mm:ss.SSSZ" }),
      winston.format.printf(({ timestamp, level, message }) =>
        timestamps
          ? `${String(timestamp)} [${prefix}:${level}] ${String(message)}`
          : `[${prefix}:${level}] ${String(message)}`
      ),
    ),
    transports: [
      new winston.transports.Console({ forceConsole: true }),
    ],
  });

  return {
    info: (msg: string) => winstonLogger.info(msg),
    warn: (msg: string) => winstonLogger.warn(msg),
    error: (msg: string) => winstonLogger.error(msg),
    debug: (msg: string) => winstonLogger.debug(msg),
  };
}
