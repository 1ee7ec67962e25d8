import { REPORT_ENV_VARIABLES } from "../constants.js";

export type LogLevel = "info" | "warn" | "error" | "debug";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const verbose = env[REPORT_ENV_VARIABLES.verbose];
  if (verbose === "1" || verbose?.toLowerCase() === "true") {
    return "debug";
  }
  const requested = env[REPORT_ENV_VARIABLES.logLevel]?.toLowerCase();
  return isLogLevel(requested) ? requested : "info";
}

let activeLevel: LogLevel = resolveLogLevel();

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[activeLevel];
}

export function formatLine(level: LogLevel, message: string, meta: Record<string, unknown> = {}): string {
  const payload = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `[${level.toUpperCase()}] ${message}${payload}`;
}

export function log(level: LogLevel, message: string, meta: Record<string, unknown> = {}): void {
  if (!shouldLog(level)) {
    return;
  }
  console[level === "error" ? "error" : level === "warn" ? "warn" : "log"](formatLine(level, message, meta));
}

export const logger = {
  debug: (message: string, meta: Record<string, unknown> = {}) => log("debug", message, meta),
  info: (message: string, meta: Record<string, unknown> = {}) => log("info", message, meta),
  warn: (message: string, meta: Record<string, unknown> = {}) => log("warn", message, meta),
  error: (message: string, meta: Record<string, unknown> = {}) => log("error", message, meta)
};
