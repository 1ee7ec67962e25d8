import type {
  IncompleteDetail,
  QualityReport,
  QualityStatus,
  RankedFile,
  RecordEvaluation,
  ReportSummary,
  StatusShare
} from "lib/report/types.js";

import { DEFAULT_TOP_N, QUALITY_STATUSES } from "../constants.js";
import { logger } from "../utils/logger.js";
import { displayName } from "../utils/path.js";

export interface SummaryOptions {
  topN?: number;
  includeIncomplete?: boolean;
}

function isQualityStatus(value: unknown): value is QualityStatus {
  return typeof value === "string" && QUALITY_STATUSES.some((status) => status === value);
}

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Status histogram over the reported rows. Percentages are relative to the
 * whole input batch, so filtered rows still count in the denominator.
 */
export function statusDistribution(report: QualityReport, totalRecords: number): StatusShare[] {
  const counts = new Map<QualityStatus, number>();
  for (const row of report.rows) {
    if (isQualityStatus(row.status)) {
      counts.set(row.status, (counts.get(row.status) ?? 0) + 1);
    }
  }

  return [...counts.entries()]
    .sort(([a, countA], [b, countB]) => countB - countA || QUALITY_STATUSES.indexOf(a) - QUALITY_STATUSES.indexOf(b))
    .map(([status, count]) => ({
      status,
      count,
      percentage: totalRecords === 0 ? 0 : roundTo((count / totalRecords) * 100, 1)
    }));
}

export function topFiles(report: QualityReport, topN: number = DEFAULT_TOP_N): RankedFile[] {
  return report.rows.slice(0, Math.max(0, topN)).map((row, index) => ({
    rank: index + 1,
    score: typeof row.score === "number" ? row.score : 0,
    fileName: typeof row.filePath === "string" ? displayName(row.filePath) : "unknown"
  }));
}

export function incompleteDetails(evaluations: readonly RecordEvaluation[]): IncompleteDetail[] {
  return evaluations
    .filter((evaluation) => evaluation.classification.status === "incomplete")
    .map((evaluation) => ({
      filePath: evaluation.record.filePath,
      missingCount: evaluation.audit.missingCount,
      missingFields: [...evaluation.audit.missingFields]
    }));
}

export function summarizeReport(
  report: QualityReport,
  evaluations: readonly RecordEvaluation[],
  options: SummaryOptions = {}
): ReportSummary {
  const totalRecords = evaluations.length;
  return {
    totalRecords,
    reportedRecords: report.rows.length,
    filteredCount: report.filteredCount,
    distribution: statusDistribution(report, totalRecords),
    top: topFiles(report, options.topN),
    ...(options.includeIncomplete ? { incomplete: incompleteDetails(evaluations) } : {})
  };
}

export function logSummary(summary: ReportSummary): void {
  logger.info("Quality status distribution");
  for (const share of summary.distribution) {
    logger.info(` - ${share.status}: ${share.count} files (${share.percentage.toFixed(1)}%)`);
  }

  logger.info(`Top ${summary.top.length} files by quality score`);
  for (const file of summary.top) {
    logger.info(` ${file.rank}. [score: ${file.score}] ${file.fileName}`);
  }
}

export function logIncomplete(details: readonly IncompleteDetail[]): void {
  if (details.length === 0) {
    logger.info("No incomplete records");
    return;
  }
  logger.info(`Incomplete records: ${details.length}`);
  for (const detail of details) {
    logger.info(` - ${detail.filePath}`, {
      missingCount: detail.missingCount,
      missingFields: detail.missingFields
    });
  }
}
