export type MetricField =
  | "rmsDbAbove16k"
  | "rmsDbAbove18k"
  | "rmsDbAbove20k"
  | "overallRmsDb"
  | "lra"
  | "peakAmplitudeDb"
  | "peakAmplitude";

export type PeakField = "peakAmplitudeDb" | "peakAmplitude";

export interface MetricRecord {
  filePath: string;
  rmsDbAbove16k?: number | null;
  rmsDbAbove18k?: number | null;
  rmsDbAbove20k?: number | null;
  overallRmsDb?: number | null;
  lra?: number | null;
  peakAmplitudeDb?: number | null;
  peakAmplitude?: number | null;
  [extra: string]: unknown;
}

export interface BatchSchema {
  columns: ReadonlySet<MetricField>;
  peakField: PeakField | null;
}

export type QualityStatus =
  | "good"
  | "incomplete"
  | "suspicious-fake"
  | "suspected-processed"
  | "clipped"
  | "severe-compression"
  | "low-dynamic";

export interface QualityThresholds {
  spectrumFakeThreshold: number;
  spectrumProcessedThreshold: number;
  spectrumGoodThreshold: number;

  lraPoorMax: number;
  lraLowMax: number;
  lraExcellentMin: number;
  lraExcellentMax: number;
  lraAcceptableMax: number;
  lraTooHigh: number;

  peakClippingDb: number;
  peakClippingLinear: number;
  peakGoodDb: number;
  peakMediumDb: number;
  peakGoodLinear: number;
  peakMediumLinear: number;

  spectrumFloorDb: number;
  spectrumCeilingDb: number;
}

export interface CompletenessAudit {
  missingCount: number;
  missingFields: string[];
  incomplete: boolean;
}

export interface ClassificationResult {
  status: QualityStatus;
  noteFragments: string[];
  notes: string;
}

export interface ScoreBreakdown {
  integrityScore: number;
  dynamicsScore: number;
  spectrumScore: number;
  completenessPenalty: number;
  rawTotal: number;
  total: number;
}

export interface RecordEvaluation {
  index: number;
  record: MetricRecord;
  audit: CompletenessAudit;
  classification: ClassificationResult;
  breakdown: ScoreBreakdown;
  score: number;
}

export interface RunStats {
  totalRecords: number;
  processedRecords: number;
  elapsedMs: number;
}

export type ReportColumn =
  | "score"
  | "status"
  | "filePath"
  | "notes"
  | MetricField;

export type ReportCell = string | number | null;

export interface QualityReport {
  columns: ReportColumn[];
  rows: Array<Partial<Record<ReportColumn, ReportCell>>>;
  filteredCount: number;
}

export interface StatusShare {
  status: QualityStatus;
  count: number;
  percentage: number;
}

export interface RankedFile {
  rank: number;
  score: number;
  fileName: string;
}

export interface IncompleteDetail {
  filePath: string;
  missingCount: number;
  missingFields: string[];
}

export interface ReportSummary {
  totalRecords: number;
  reportedRecords: number;
  filteredCount: number;
  distribution: StatusShare[];
  top: RankedFile[];
  incomplete?: IncompleteDetail[];
}
