import winston from "winston";
import { config } from "./index.js";

export type LogLevel = "error" | "warn" | "info" | "debug";

const LEVELS: LogLevel[] = ["error", "warn", "info", "debug"];

/** Error instances serialize to `{}` through JSON.stringify; flatten them for the console line. */
export function serializeMeta(meta: Record<string, unknown>): string {
  const keys = Object.keys(meta);
  if (keys.length === 0) return "";
  const flat: Record<string, unknown> = {};
  for (const key of keys) {
    const value = meta[key];
    flat[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return ` ${JSON.stringify(flat)}`;
}

const lineFormat = winston.format.printf(({ level, message, timestamp, ...meta }) => {
  return `${String(timestamp)} ${level} ${String(message)}${serializeMeta(meta)}`;
});

// Everything goes to stderr so prompts and tables on stdout stay clean.
const consoleTransport = new winston.transports.Console({
  stderrLevels: LEVELS,
});

export const logger = winston.createLogger({
  level: config.nodeEnv === "test" ? "error" : config.logLevel,
  format: winston.format.combine(
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    winston.format.colorize(),
    lineFormat,
  ),
  transports: [consoleTransport],
  exitOnError: false,
});

/** Change verbosity at runtime (used by `--verbose`). */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
  consoleTransport.level = level;
}
