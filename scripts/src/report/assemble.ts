import type {
  BatchSchema,
  QualityReport,
  RecordEvaluation,
  ReportCell,
  ReportColumn
} from "lib/report/types.js";

import { SPECTRAL_REPORT_FIELDS } from "../constants.js";

export interface AssembleOptions {
  minScore?: number;
}

export function reportColumns(schema: BatchSchema): ReportColumn[] {
  const columns: ReportColumn[] = ["score", "status", "filePath", "notes"];
  if (schema.columns.has("lra")) {
    columns.push("lra");
  }
  if (schema.peakField) {
    columns.push(schema.peakField);
  }
  for (const field of SPECTRAL_REPORT_FIELDS) {
    if (schema.columns.has(field)) {
      columns.push(field);
    }
  }
  return columns;
}

/** Score descending; equal scores keep their input order. */
export function rankEvaluations(evaluations: readonly RecordEvaluation[]): RecordEvaluation[] {
  return [...evaluations].sort((a, b) => b.score - a.score || a.index - b.index);
}

function cellFor(evaluation: RecordEvaluation, column: ReportColumn): ReportCell {
  switch (column) {
    case "score":
      return evaluation.score;
    case "status":
      return evaluation.classification.status;
    case "filePath":
      return evaluation.record.filePath;
    case "notes":
      return evaluation.classification.notes;
    default:
      return evaluation.record[column] ?? null;
  }
}

export function assembleReport(
  evaluations: readonly RecordEvaluation[],
  schema: BatchSchema,
  options: AssembleOptions = {}
): QualityReport {
  const minScore = options.minScore ?? 0;
  const ranked = rankEvaluations(evaluations);
  const kept = minScore > 0 ? ranked.filter((evaluation) => evaluation.score >= minScore) : ranked;
  const columns = reportColumns(schema);

  return {
    columns,
    rows: kept.map((evaluation) => {
      const row: QualityReport["rows"][number] = {};
      for (const column of columns) {
        row[column] = cellFor(evaluation, column);
      }
      return row;
    }),
    filteredCount: ranked.length - kept.length
  };
}
