import { performance } from "node:perf_hooks";

import type {
  BatchSchema,
  MetricRecord,
  QualityThresholds,
  RecordEvaluation,
  RunStats
} from "lib/report/types.js";

import { DEFAULT_THRESHOLDS } from "../constants.js";
import { logger } from "../utils/logger.js";
import { classifyRecord } from "./classifier.js";
import { auditCompleteness, detectBatchSchema } from "./completeness.js";
import { scoreRecord } from "./scorer.js";

export interface BatchEvaluation {
  schema: BatchSchema;
  evaluations: RecordEvaluation[];
  stats: RunStats;
}

export function evaluateRecord(
  record: MetricRecord,
  index: number,
  schema: BatchSchema,
  thresholds: QualityThresholds = DEFAULT_THRESHOLDS
): RecordEvaluation {
  const audit = auditCompleteness(record, schema);
  const classification = classifyRecord({ record, schema, audit, thresholds });
  const breakdown = scoreRecord({ record, schema, audit, status: classification.status, thresholds });
  return {
    index,
    record,
    audit,
    classification,
    breakdown,
    score: breakdown.total
  };
}

export function evaluateBatch(
  records: readonly MetricRecord[],
  thresholds: QualityThresholds = DEFAULT_THRESHOLDS
): BatchEvaluation {
  const startedAt = performance.now();
  const schema = detectBatchSchema(records);

  logger.debug("Detected batch schema", {
    records: records.length,
    peakField: schema.peakField,
    columns: [...schema.columns].sort()
  });

  const evaluations = records.map((record, index) => evaluateRecord(record, index, schema, thresholds));

  const stats: RunStats = {
    totalRecords: records.length,
    processedRecords: evaluations.length,
    elapsedMs: Math.round(performance.now() - startedAt)
  };
  logger.debug("Batch scored", { ...stats });

  return { schema, evaluations, stats };
}
