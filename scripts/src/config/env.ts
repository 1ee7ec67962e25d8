import { REPORT_ENV_VARIABLES } from "../constants.js";
import { logger, resolveLogLevel, type LogLevel } from "../utils/logger.js";

export interface ReportRuntimeConfig {
  logLevel: LogLevel;
  thresholdsPath: string | null;
  minScore: number;
}

export function parseNonNegativeInteger(value: string | undefined): number | null {
  if (value === undefined || !/^\s*\d+\s*$/.test(value)) {
    return null;
  }
  return Number.parseInt(value, 10);
}

export function resolveRuntimeConfig(env: NodeJS.ProcessEnv = process.env): ReportRuntimeConfig {
  const rawMinScore = env[REPORT_ENV_VARIABLES.minScore];
  let minScore = parseNonNegativeInteger(rawMinScore);
  if (rawMinScore !== undefined && minScore === null) {
    logger.warn("Ignoring unparseable minimum score", {
      variable: REPORT_ENV_VARIABLES.minScore,
      value: rawMinScore
    });
  }
  minScore ??= 0;

  const thresholdsPath = env[REPORT_ENV_VARIABLES.thresholdsPath];

  return {
    logLevel: resolveLogLevel(env),
    thresholdsPath: thresholdsPath && thresholdsPath.trim() !== "" ? thresholdsPath : null,
    minScore
  };
}
