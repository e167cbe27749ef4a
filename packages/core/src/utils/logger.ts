/**
 * Shared winston logger
 *
 * Log calls take a message and an optional metadata object:
 *   log.info("Search completed", { query, results: 5 })
 *
 * Level comes from LOG_LEVEL (default: info). Setting LOG_FILE adds a
 * file transport next to the console one.
 */

import winston from "winston";

const { combine, timestamp, printf, colorize } = winston.format;

const logFormat = printf(
  ({ level, message, timestamp: ts, module: mod, ...meta }) => {
    const moduleTag = typeof mod === "string" ? ` [${mod}]` : "";
    const metaStr =
      Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    return `${String(ts)} ${level}${moduleTag} ${String(message)}${metaStr}`;
  }
);

function buildTransports(): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      // Keep stdout free for the brief itself
      stderrLevels: ["error", "warn", "info", "debug"],
      format: combine(
        colorize(),
        timestamp({ format: "HH:mm:ss.SSS" }),
        logFormat
      ),
    }),
  ];

  if (process.env.LOG_FILE) {
    transports.push(
      new winston.transports.File({
        filename: process.env.LOG_FILE,
        maxsize: 10_000_000, // 10MB
        maxFiles: 3,
      })
    );
  }

  return transports;
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  format: combine(timestamp({ format: "HH:mm:ss.SSS" }), logFormat),
  transports: buildTransports(),
});

export type Logger = winston.Logger;

export function createModuleLogger(moduleName: string): Logger {
  return logger.child({ module: moduleName });
}

/**
 * Pull a printable message out of anything that was thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
