import winston from "winston";

const { colorize, combine, errors, json, printf, timestamp } = winston.format;

const consoleLine = printf(({ level, message, timestamp: ts, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${String(ts)} ${level} ${String(message)}${extra}`;
});

/**
 * Process-wide logger. Structured JSON in production, a colorized single line
 * per entry otherwise. Call as `logger.warn("message", { meta })`.
 */
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  format:
    process.env.NODE_ENV === "production"
      ? combine(errors({ stack: true }), timestamp(), json())
      : combine(errors({ stack: true }), colorize(), timestamp({ format: "HH:mm:ss" }), consoleLine),
  transports: [new winston.transports.Console({ stderrLevels: ["error", "warn"] })],
  silent: process.env.NODE_ENV === "test",
});

/** Adjust verbosity after configuration has been loaded. */
export function setLogLevel(level: string): void {
  logger.level = level;
}
