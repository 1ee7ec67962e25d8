import type {
  BatchSchema,
  CompletenessAudit,
  MetricField,
  MetricRecord,
  PeakField
} from "lib/report/types.js";

import { INCOMPLETE_MISSING_COUNT, METRIC_FIELDS } from "../constants.js";

export const CRITICAL_FIELDS: readonly MetricField[] = ["rmsDbAbove18k", "lra"];

// Name reported for the peak slot when the batch carries neither peak column.
export const ABSENT_PEAK_LABEL = "peak";

export function detectBatchSchema(records: readonly MetricRecord[]): BatchSchema {
  const columns = new Set<MetricField>();
  for (const record of records) {
    for (const field of METRIC_FIELDS) {
      if (Object.prototype.hasOwnProperty.call(record, field)) {
        columns.add(field);
      }
    }
  }

  let peakField: PeakField | null = null;
  if (columns.has("peakAmplitudeDb")) {
    peakField = "peakAmplitudeDb";
  } else if (columns.has("peakAmplitude")) {
    peakField = "peakAmplitude";
  }

  return { columns, peakField };
}

/** Null, undefined and an exact 0.0 all count as a missing measurement. */
export function isMissingValue(value: number | null | undefined): value is null | undefined | 0 {
  return value === null || value === undefined || value === 0;
}

export function auditCompleteness(record: MetricRecord, schema: BatchSchema): CompletenessAudit {
  const missingFields: string[] = [];

  const fields: MetricField[] = schema.peakField ? [...CRITICAL_FIELDS, schema.peakField] : [...CRITICAL_FIELDS];
  for (const field of fields) {
    if (!schema.columns.has(field) || isMissingValue(record[field])) {
      missingFields.push(field);
    }
  }
  if (!schema.peakField) {
    missingFields.push(ABSENT_PEAK_LABEL);
  }

  const missingCount = missingFields.length;
  return {
    missingCount,
    missingFields,
    incomplete: missingCount >= INCOMPLETE_MISSING_COUNT
  };
}
