#!/usr/bin/env node
/**
 * generate_report.ts — CLI that turns a batch of precomputed audio metrics
 * into a ranked quality report.
 *
 * Usage:
 *   npx tsx scripts/src/generate_report.ts <input...> [--out <csv>] [--min-score <n>]
 *     [--thresholds <yaml>] [--summary <yaml>] [--show-stats] [--show-incomplete] [--timing]
 *
 * Example:
 *   npx tsx scripts/src/generate_report.ts analysis_data.json \
 *     --out audio_quality_report.csv --min-score 60 --show-stats
 *
 * Inputs are JSON files holding arrays of metric records; globs are expanded
 * and all records are scored as one batch. Nothing is written when any input
 * fails to load.
 */

import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";

import type { QualityReport, QualityThresholds, ReportSummary, RunStats } from "lib/report/types.js";

import { DEFAULT_REPORT_PATH } from "./constants.js";
import { parseNonNegativeInteger, resolveRuntimeConfig, type ReportRuntimeConfig } from "./config/env.js";
import { loadThresholds } from "./config/thresholds.js";
import { loadMetricBatch } from "./ingest/load.js";
import { assembleReport } from "./report/assemble.js";
import { renderCsv } from "./report/csv.js";
import { computeSha256, stringifyDeterministic } from "./report/deterministic.js";
import { logIncomplete, logSummary, summarizeReport } from "./report/summary.js";
import { evaluateBatch } from "./scoring/evaluate.js";
import { UsageError, describeError } from "./utils/errors.js";
import { writeTextFile } from "./utils/fs.js";
import { logger, setLogLevel } from "./utils/logger.js";

export interface ReportCliOptions {
  inputs: string[];
  outPath: string;
  minScore: number;
  thresholdsPath: string | null;
  summaryPath: string | null;
  showStats: boolean;
  showIncomplete: boolean;
  timing: boolean;
}

export interface ReportRunResult {
  files: string[];
  report: QualityReport | null;
  summary: ReportSummary | null;
  stats: RunStats;
  outPath: string | null;
}

export const USAGE =
  `Usage: generate_report <input...> [options]\n\n` +
  `  <input...>             JSON metric files or glob patterns\n` +
  `  --out, -o <csv>        Output CSV path (default: ${DEFAULT_REPORT_PATH})\n` +
  `  --min-score <n>        Drop rows scoring below n\n` +
  `  --thresholds <yaml>    Threshold overrides file\n` +
  `  --summary <yaml>       Write a run summary as YAML\n` +
  `  --show-stats           Log the status distribution and top files\n` +
  `  --show-incomplete      Log every incomplete record\n` +
  `  --timing               Include elapsed time in the summary file\n` +
  `  --help, -h             Show this message\n`;

export function parseCliArgs(
  argv: string[],
  runtime: ReportRuntimeConfig = resolveRuntimeConfig()
): ReportCliOptions | "help" {
  let parsed: ReturnType<typeof parseCliTokens>;
  try {
    parsed = parseCliTokens(argv);
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
  const { values, positionals } = parsed;

  if (values.help) {
    return "help";
  }
  if (positionals.length === 0) {
    throw new UsageError("At least one input file is required. Use --help for usage.");
  }

  let minScore = runtime.minScore;
  if (values["min-score"] !== undefined) {
    const parsedScore = parseNonNegativeInteger(values["min-score"]);
    if (parsedScore === null) {
      throw new UsageError(`--min-score expects a non-negative integer, got '${values["min-score"]}'`);
    }
    minScore = parsedScore;
  }

  return {
    inputs: positionals,
    outPath: values.out ?? DEFAULT_REPORT_PATH,
    minScore,
    thresholdsPath: values.thresholds ?? runtime.thresholdsPath,
    summaryPath: values.summary ?? null,
    showStats: values["show-stats"] ?? false,
    showIncomplete: values["show-incomplete"] ?? false,
    timing: values.timing ?? false
  };
}

function parseCliTokens(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      out: { type: "string", short: "o" },
      "min-score": { type: "string" },
      thresholds: { type: "string" },
      summary: { type: "string" },
      "show-stats": { type: "boolean" },
      "show-incomplete": { type: "boolean" },
      timing: { type: "boolean" },
      help: { type: "boolean", short: "h" }
    }
  });
}

export async function runReport(options: ReportCliOptions): Promise<ReportRunResult> {
  const thresholds = await loadThresholds(options.thresholdsPath);
  const { files, records } = await loadMetricBatch(options.inputs);

  if (records.length === 0) {
    logger.info("Input holds no metric records; nothing to analyze", { files: files.length });
    return {
      files,
      report: null,
      summary: null,
      stats: { totalRecords: 0, processedRecords: 0, elapsedMs: 0 },
      outPath: null
    };
  }

  logger.info(`Scoring ${records.length} files`, { inputs: files.length });

  logger.info("Step 1/2: classifying and scoring records");
  const { schema, evaluations, stats } = evaluateBatch(records, thresholds);

  logger.info("Step 2/2: ranking and formatting");
  const report = assembleReport(evaluations, schema, { minScore: options.minScore });
  if (options.minScore > 0 && report.filteredCount > 0) {
    logger.info(`Filtered out ${report.filteredCount} low-scoring files (< ${options.minScore})`);
  }

  const csv = renderCsv(report);
  await writeTextFile(options.outPath, csv);
  logger.info("Quality report written", { path: options.outPath, rows: report.rows.length });

  const summary = summarizeReport(report, evaluations, { includeIncomplete: options.showIncomplete });
  if (options.showStats) {
    logSummary(summary);
  }
  if (options.showIncomplete) {
    logIncomplete(summary.incomplete ?? []);
  }
  if (options.summaryPath) {
    await writeTextFile(
      options.summaryPath,
      stringifyDeterministic(buildSummaryDocument(summary, stats, thresholds, csv, options.timing))
    );
    logger.info("Run summary written", { path: options.summaryPath });
  }

  logger.info("Analysis finished", { processed: stats.processedRecords, elapsedMs: stats.elapsedMs });
  return { files, report, summary, stats, outPath: options.outPath };
}

export function buildSummaryDocument(
  summary: ReportSummary,
  stats: RunStats,
  thresholds: QualityThresholds,
  csv: string,
  includeTiming: boolean
): Record<string, unknown> {
  return {
    ...summary,
    stats: includeTiming
      ? stats
      : { totalRecords: stats.totalRecords, processedRecords: stats.processedRecords },
    thresholds,
    reportSha256: computeSha256(csv)
  };
}

async function main(): Promise<void> {
  const runtime = resolveRuntimeConfig();
  setLogLevel(runtime.logLevel);

  const options = parseCliArgs(process.argv.slice(2), runtime);
  if (options === "help") {
    console.log(USAGE);
    return;
  }
  await runReport(options);
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  return entry !== undefined && import.meta.url === pathToFileURL(entry).href;
}

if (isEntryPoint()) {
  void main().catch((error: unknown) => {
    logger.error("Quality report failed", describeError(error));
    process.exitCode = 1;
  });
}
