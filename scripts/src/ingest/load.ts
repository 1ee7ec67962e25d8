import { resolve } from "node:path";
import fg from "fast-glob";

import type { MetricRecord } from "lib/report/types.js";

import { validateMetricBatch } from "../contracts/validators.js";
import { InputError } from "../utils/errors.js";
import { isErrnoException, pathExists, readTextFile } from "../utils/fs.js";
import { logger } from "../utils/logger.js";
import { dedupe } from "../utils/path.js";

export interface LoadedBatch {
  files: string[];
  records: MetricRecord[];
}

/**
 * Expand literal paths and glob patterns into absolute file paths. Patterns
 * keep their command-line order; matches of one glob are sorted.
 */
export async function resolveInputPaths(patterns: readonly string[], cwd: string = process.cwd()): Promise<string[]> {
  const resolved: string[] = [];

  for (const pattern of patterns) {
    if (fg.isDynamicPattern(pattern)) {
      const matches = await fg(pattern, { cwd, absolute: true, onlyFiles: true, dot: false });
      if (matches.length === 0) {
        throw new InputError(`No input files match ${pattern}`, "INPUT_NOT_FOUND");
      }
      resolved.push(...[...matches].sort((a, b) => a.localeCompare(b)));
      continue;
    }

    const absolute = resolve(cwd, pattern);
    if (!(await pathExists(absolute))) {
      throw new InputError(`Input file '${pattern}' does not exist`, "INPUT_NOT_FOUND");
    }
    resolved.push(absolute);
  }

  return dedupe(resolved);
}

export async function readMetricFile(path: string): Promise<MetricRecord[]> {
  let raw: string | null;
  try {
    raw = await readTextFile(path);
  } catch (error) {
    const reason = isErrnoException(error) ? error.code ?? error.message : String(error);
    throw new InputError(`Unable to read input file ${path}`, "INPUT_UNREADABLE", [reason]);
  }
  if (raw === null) {
    throw new InputError(`Input file '${path}' does not exist`, "INPUT_NOT_FOUND");
  }

  let data: unknown;
  try {
    data = JSON.parse(raw.replace(/^\uFEFF/, ""));
  } catch (error) {
    throw new InputError(`Unable to parse JSON file ${path}`, "INPUT_MALFORMED", [
      error instanceof Error ? error.message : String(error)
    ]);
  }

  const batch = await validateMetricBatch(data);
  if (!batch.ok) {
    throw new InputError(`Input file ${path} does not hold an array of metric records`, "INPUT_MALFORMED", batch.errors);
  }
  return batch.value;
}

export async function loadMetricBatch(patterns: readonly string[], cwd: string = process.cwd()): Promise<LoadedBatch> {
  const files = await resolveInputPaths(patterns, cwd);
  const records: MetricRecord[] = [];

  for (const file of files) {
    const fileRecords = await readMetricFile(file);
    logger.debug("Loaded metric file", { file, records: fileRecords.length });
    records.push(...fileRecords);
  }

  return { files, records };
}
