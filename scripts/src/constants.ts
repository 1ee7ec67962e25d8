import { fileURLToPath } from "node:url";

import type { MetricField, QualityStatus, QualityThresholds } from "lib/report/types.js";

const LIB_DIR = fileURLToPath(new URL("../../lib/", import.meta.url));

export const METRICS_SCHEMA_PATH = `${LIB_DIR}metrics.schema.json`;
export const THRESHOLDS_SCHEMA_PATH = `${LIB_DIR}thresholds.schema.json`;

export const DEFAULT_REPORT_PATH = "audio_quality_report.csv";
export const DEFAULT_TOP_N = 5;
export const CSV_BOM = "\uFEFF";
export const NOTE_SEPARATOR = " | ";

export const REPORT_ENV_VARIABLES = {
	logLevel: "LOG_LEVEL",
	verbose: "AUDIO_QUALITY_VERBOSE",
	thresholdsPath: "AUDIO_QUALITY_THRESHOLDS",
	minScore: "AUDIO_QUALITY_MIN_SCORE"
} as const;

export const DEFAULT_THRESHOLDS: Readonly<QualityThresholds> = Object.freeze({
	spectrumFakeThreshold: -85.0,
	spectrumProcessedThreshold: -80.0,
	spectrumGoodThreshold: -70.0,

	lraPoorMax: 3.0,
	lraLowMax: 6.0,
	lraExcellentMin: 8.0,
	lraExcellentMax: 12.0,
	lraAcceptableMax: 15.0,
	lraTooHigh: 20.0,

	peakClippingDb: -0.1,
	peakClippingLinear: 0.999,
	peakGoodDb: -6.0,
	peakMediumDb: -3.0,
	peakGoodLinear: 0.5,
	peakMediumLinear: 0.8,

	// rmsDbAbove16k range mapped onto the spectrum sub-score
	spectrumFloorDb: -90.0,
	spectrumCeilingDb: -55.0
});

export const SCORE_WEIGHTS = {
	integrity: 40,
	spectralIntegrity: 25,
	peakIntegrity: 15,
	dynamics: 30,
	spectrum: 30,
	missingFieldPenalty: 10
} as const;

export const STATUS_CAPS: Partial<Record<QualityStatus, number>> = {
	"suspicious-fake": 20,
	incomplete: 40
};

export const INCOMPLETE_MISSING_COUNT = 2;

// Stand-ins for an absent peak when testing the clipping cutoff.
export const MISSING_PEAK_DB = -144.0;
export const MISSING_PEAK_LINEAR = 0.0;

export const QUALITY_STATUSES: readonly QualityStatus[] = [
	"good",
	"incomplete",
	"suspicious-fake",
	"suspected-processed",
	"clipped",
	"severe-compression",
	"low-dynamic"
];

export const METRIC_FIELDS: readonly MetricField[] = [
	"rmsDbAbove16k",
	"rmsDbAbove18k",
	"rmsDbAbove20k",
	"overallRmsDb",
	"lra",
	"peakAmplitudeDb",
	"peakAmplitude"
];

export const SPECTRAL_REPORT_FIELDS: readonly MetricField[] = [
	"rmsDbAbove16k",
	"rmsDbAbove18k",
	"rmsDbAbove20k",
	"overallRmsDb"
];

export const NOTES = {
	incomplete: "critical data missing, analysis may be inaccurate",
	fake: "hard spectral cutoff near 18kHz, strongly suspected fake/upsampled",
	processed: "low energy near 18kHz, possible soft cutoff",
	clipping: "severe digital clipping risk",
	clippingDbSuffix: " (peak near 0dB)",
	severeCompression: (lra: string) => `dynamic range extremely low (LRA: ${lra} LU), severely over-compressed`,
	lowDynamic: (lra: string) => `dynamic range too low (LRA: ${lra} LU), possibly over-compressed`,
	tooHigh: (lra: string) => `dynamic range too high (LRA: ${lra} LU), may need compression`,
	noIssues: "no obvious hard technical issues found"
} as const;
