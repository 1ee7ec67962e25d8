import type {
  BatchSchema,
  CompletenessAudit,
  MetricRecord,
  QualityStatus,
  QualityThresholds,
  ScoreBreakdown
} from "lib/report/types.js";

import { SCORE_WEIGHTS, STATUS_CAPS } from "../constants.js";
import { mapToScore, roundHalfEven } from "./numeric.js";

export interface ScoreInput {
  record: MetricRecord;
  schema: BatchSchema;
  audit: CompletenessAudit;
  status: QualityStatus;
  thresholds: QualityThresholds;
}

/** Spectral part of the integrity score, from energy above 18 kHz (max 25). */
export function spectralIntegrityScore(rms18k: number | null | undefined, t: QualityThresholds): number {
  const rms = rms18k ?? 0;
  if (rms === 0) {
    return 0;
  }
  if (rms >= t.spectrumGoodThreshold) {
    return SCORE_WEIGHTS.spectralIntegrity;
  }
  if (rms >= t.spectrumProcessedThreshold) {
    return mapToScore(rms, t.spectrumProcessedThreshold, t.spectrumGoodThreshold, 15, 25);
  }
  if (rms >= t.spectrumFakeThreshold) {
    return mapToScore(rms, t.spectrumFakeThreshold, t.spectrumProcessedThreshold, 5, 15);
  }
  return 0;
}

/** Peak part of the integrity score in dBFS (max 15). */
export function peakDbIntegrityScore(peakDb: number | null | undefined, t: QualityThresholds): number {
  if (peakDb === null || peakDb === undefined) {
    return 0;
  }
  if (peakDb <= t.peakGoodDb) {
    return SCORE_WEIGHTS.peakIntegrity;
  }
  if (peakDb <= t.peakMediumDb) {
    return mapToScore(peakDb, t.peakGoodDb, t.peakMediumDb, 15, 10);
  }
  if (peakDb <= t.peakClippingDb) {
    return mapToScore(peakDb, t.peakMediumDb, t.peakClippingDb, 10, 3);
  }
  return 0;
}

/** Peak part of the integrity score on a linear 0..1 scale (max 15). */
export function peakLinearIntegrityScore(peak: number | null | undefined, t: QualityThresholds): number {
  if (peak === null || peak === undefined) {
    return 0;
  }
  if (peak <= t.peakGoodLinear) {
    return SCORE_WEIGHTS.peakIntegrity;
  }
  if (peak <= t.peakMediumLinear) {
    return mapToScore(peak, t.peakGoodLinear, t.peakMediumLinear, 15, 10);
  }
  if (peak <= t.peakClippingLinear) {
    return mapToScore(peak, t.peakMediumLinear, t.peakClippingLinear, 10, 3);
  }
  return 0;
}

export function integrityScore(record: MetricRecord, schema: BatchSchema, t: QualityThresholds): number {
  let score = 0;
  if (schema.columns.has("rmsDbAbove18k")) {
    score += spectralIntegrityScore(record.rmsDbAbove18k, t);
  }
  if (schema.peakField === "peakAmplitudeDb") {
    score += peakDbIntegrityScore(record.peakAmplitudeDb, t);
  } else if (schema.peakField === "peakAmplitude") {
    score += peakLinearIntegrityScore(record.peakAmplitude, t);
  }
  return score;
}

/** Dynamics score from the loudness range (max 30); non-positive LRA scores 0. */
export function dynamicsScore(lraValue: number | null | undefined, t: QualityThresholds): number {
  const lra = lraValue ?? 0;
  if (lra <= 0) {
    return 0;
  }
  if (lra >= t.lraExcellentMin && lra <= t.lraExcellentMax) {
    return SCORE_WEIGHTS.dynamics;
  }
  if (lra >= t.lraLowMax && lra < t.lraExcellentMin) {
    return mapToScore(lra, t.lraLowMax, t.lraExcellentMin, 20, 28);
  }
  if (lra > t.lraExcellentMax && lra <= t.lraAcceptableMax) {
    return mapToScore(lra, t.lraExcellentMax, t.lraAcceptableMax, 28, 22);
  }
  if (lra >= t.lraPoorMax && lra < t.lraLowMax) {
    return mapToScore(lra, t.lraPoorMax, t.lraLowMax, 10, 20);
  }
  if (lra < t.lraPoorMax) {
    return mapToScore(lra, 0, t.lraPoorMax, 0, 10);
  }
  if (lra > t.lraAcceptableMax) {
    return 18;
  }
  return 0;
}

/** Spectrum score from energy above 16 kHz (max 30); a missing value reads as the floor. */
export function spectrumScore(rms16k: number | null | undefined, t: QualityThresholds): number {
  const rms = rms16k === null || rms16k === undefined || rms16k === 0 ? t.spectrumFloorDb : rms16k;
  return mapToScore(rms, t.spectrumFloorDb, t.spectrumCeilingDb, 0, SCORE_WEIGHTS.spectrum);
}

export function applyStatusCap(total: number, status: QualityStatus): number {
  const cap = STATUS_CAPS[status];
  return cap === undefined ? total : Math.min(total, cap);
}

export function scoreRecord({ record, schema, audit, status, thresholds }: ScoreInput): ScoreBreakdown {
  const integrity = integrityScore(record, schema, thresholds);
  const dynamics = schema.columns.has("lra") ? dynamicsScore(record.lra, thresholds) : 0;
  const spectrum = schema.columns.has("rmsDbAbove16k") ? spectrumScore(record.rmsDbAbove16k, thresholds) : 0;
  const completenessPenalty = audit.missingCount * SCORE_WEIGHTS.missingFieldPenalty;

  const rawTotal = integrity + dynamics + spectrum - completenessPenalty;
  const total = applyStatusCap(Math.max(0, roundHalfEven(rawTotal)), status);

  return {
    integrityScore: integrity,
    dynamicsScore: dynamics,
    spectrumScore: spectrum,
    completenessPenalty,
    rawTotal,
    total
  };
}
