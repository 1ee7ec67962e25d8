import type {
  BatchSchema,
  ClassificationResult,
  CompletenessAudit,
  MetricRecord,
  QualityStatus,
  QualityThresholds
} from "lib/report/types.js";

import { MISSING_PEAK_DB, MISSING_PEAK_LINEAR, NOTES, NOTE_SEPARATOR } from "../constants.js";
import { formatOneDecimal } from "./numeric.js";

export interface RuleContext {
  record: MetricRecord;
  schema: BatchSchema;
  audit: CompletenessAudit;
  thresholds: QualityThresholds;
}

export interface RuleState {
  status: QualityStatus;
  noteFragments: string[];
}

export interface RuleOutcome {
  status?: QualityStatus;
  note?: string;
}

/**
 * One step of the status chain. `evaluate` sees the status left behind by
 * every earlier rule and returns null when the rule does not fire.
 */
export interface StatusRule {
  name: string;
  evaluate(context: RuleContext, state: Readonly<RuleState>): RuleOutcome | null;
}

function statusIsOneOf(state: Readonly<RuleState>, statuses: readonly QualityStatus[]): boolean {
  return statuses.includes(state.status);
}

/** rmsDbAbove18k with null read as 0, or null when the batch lacks the column. */
function spectralValue({ record, schema }: RuleContext): number | null {
  if (!schema.columns.has("rmsDbAbove18k")) {
    return null;
  }
  return record.rmsDbAbove18k ?? 0;
}

function lraValue({ record, schema }: RuleContext): number | null {
  if (!schema.columns.has("lra")) {
    return null;
  }
  return record.lra ?? 0;
}

function lraIsValid(context: RuleContext): boolean {
  const lra = lraValue(context);
  return lra !== null && lra > 0 && !context.audit.incomplete;
}

export const STATUS_RULES: readonly StatusRule[] = [
  {
    name: "incomplete",
    evaluate: ({ audit }) => (audit.incomplete ? { status: "incomplete", note: NOTES.incomplete } : null)
  },
  {
    name: "suspicious-fake",
    evaluate: (context) => {
      const rms = spectralValue(context);
      if (rms === null || context.audit.incomplete) {
        return null;
      }
      return rms < context.thresholds.spectrumFakeThreshold ? { status: "suspicious-fake", note: NOTES.fake } : null;
    }
  },
  {
    name: "suspected-processed",
    evaluate: (context, state) => {
      const rms = spectralValue(context);
      if (rms === null || context.audit.incomplete || state.status === "suspicious-fake") {
        return null;
      }
      const { spectrumFakeThreshold, spectrumProcessedThreshold } = context.thresholds;
      return rms >= spectrumFakeThreshold && rms < spectrumProcessedThreshold
        ? { status: "suspected-processed", note: NOTES.processed }
        : null;
    }
  },
  {
    name: "clipped",
    evaluate: ({ record, schema, audit, thresholds }, state) => {
      if (!schema.peakField || audit.incomplete || state.status === "suspicious-fake") {
        return null;
      }
      if (schema.peakField === "peakAmplitudeDb") {
        const peak = record.peakAmplitudeDb ?? MISSING_PEAK_DB;
        return peak >= thresholds.peakClippingDb
          ? { status: "clipped", note: `${NOTES.clipping}${NOTES.clippingDbSuffix}` }
          : null;
      }
      const peak = record.peakAmplitude ?? MISSING_PEAK_LINEAR;
      return peak >= thresholds.peakClippingLinear ? { status: "clipped", note: NOTES.clipping } : null;
    }
  },
  {
    // Deliberately allowed to replace "clipped".
    name: "severe-compression",
    evaluate: (context, state) => {
      const lra = lraValue(context);
      if (lra === null || !lraIsValid(context) || state.status === "suspicious-fake") {
        return null;
      }
      return lra < context.thresholds.lraPoorMax
        ? { status: "severe-compression", note: NOTES.severeCompression(formatOneDecimal(lra)) }
        : null;
    }
  },
  {
    name: "low-dynamic",
    evaluate: (context, state) => {
      const lra = lraValue(context);
      if (
        lra === null ||
        !lraIsValid(context) ||
        statusIsOneOf(state, ["suspicious-fake", "severe-compression", "clipped"])
      ) {
        return null;
      }
      const { lraPoorMax, lraLowMax } = context.thresholds;
      return lra >= lraPoorMax && lra < lraLowMax
        ? { status: "low-dynamic", note: NOTES.lowDynamic(formatOneDecimal(lra)) }
        : null;
    }
  },
  {
    // Advisory only: never changes the status.
    name: "too-high-dynamics",
    evaluate: (context, state) => {
      const lra = lraValue(context);
      if (
        lra === null ||
        !lraIsValid(context) ||
        statusIsOneOf(state, ["suspicious-fake", "severe-compression", "clipped", "low-dynamic"])
      ) {
        return null;
      }
      return lra > context.thresholds.lraTooHigh ? { note: NOTES.tooHigh(formatOneDecimal(lra)) } : null;
    }
  }
];

export function classifyRecord(
  context: RuleContext,
  rules: readonly StatusRule[] = STATUS_RULES
): ClassificationResult {
  const state: RuleState = { status: "good", noteFragments: [] };

  for (const rule of rules) {
    const outcome = rule.evaluate(context, state);
    if (!outcome) {
      continue;
    }
    if (outcome.status) {
      state.status = outcome.status;
    }
    if (outcome.note) {
      state.noteFragments.push(outcome.note);
    }
  }

  const noteFragments = state.noteFragments.length > 0 ? state.noteFragments : [NOTES.noIssues];
  return {
    status: state.status,
    noteFragments,
    notes: noteFragments.join(NOTE_SEPARATOR)
  };
}
