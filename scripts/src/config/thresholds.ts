import { load } from "js-yaml";

import type { QualityThresholds } from "lib/report/types.js";

import { DEFAULT_THRESHOLDS } from "../constants.js";
import { validateThresholdOverrides } from "../contracts/validators.js";
import { readTextFile } from "../utils/fs.js";
import { ConfigError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";

/**
 * Ordering constraints the rule chain and the scoring bands rely on. Each
 * entry is checked against the merged thresholds; a violation makes the bands
 * overlap or invert.
 */
const ORDERING_CHECKS: Array<{
  description: string;
  holds: (t: QualityThresholds) => boolean;
}> = [
  {
    description: "spectrumFakeThreshold must be below spectrumProcessedThreshold",
    holds: (t) => t.spectrumFakeThreshold < t.spectrumProcessedThreshold
  },
  {
    description: "spectrumProcessedThreshold must be below spectrumGoodThreshold",
    holds: (t) => t.spectrumProcessedThreshold < t.spectrumGoodThreshold
  },
  {
    description: "lraPoorMax must be below lraLowMax",
    holds: (t) => t.lraPoorMax < t.lraLowMax
  },
  {
    description: "lraLowMax must not exceed lraExcellentMin",
    holds: (t) => t.lraLowMax <= t.lraExcellentMin
  },
  {
    description: "lraExcellentMin must not exceed lraExcellentMax",
    holds: (t) => t.lraExcellentMin <= t.lraExcellentMax
  },
  {
    description: "lraExcellentMax must not exceed lraAcceptableMax",
    holds: (t) => t.lraExcellentMax <= t.lraAcceptableMax
  },
  {
    description: "peakGoodDb must be below peakMediumDb",
    holds: (t) => t.peakGoodDb < t.peakMediumDb
  },
  {
    description: "peakMediumDb must not exceed peakClippingDb",
    holds: (t) => t.peakMediumDb <= t.peakClippingDb
  },
  {
    description: "peakGoodLinear must be below peakMediumLinear",
    holds: (t) => t.peakGoodLinear < t.peakMediumLinear
  },
  {
    description: "peakMediumLinear must not exceed peakClippingLinear",
    holds: (t) => t.peakMediumLinear <= t.peakClippingLinear
  },
  {
    description: "spectrumFloorDb must be below spectrumCeilingDb",
    holds: (t) => t.spectrumFloorDb < t.spectrumCeilingDb
  }
];

export function checkThresholdOrdering(thresholds: QualityThresholds): string[] {
  return ORDERING_CHECKS.filter((check) => !check.holds(thresholds)).map((check) => check.description);
}

export function mergeThresholds(overrides: Partial<QualityThresholds> = {}): Readonly<QualityThresholds> {
  const merged: QualityThresholds = { ...DEFAULT_THRESHOLDS, ...overrides };
  const violations = checkThresholdOrdering(merged);
  if (violations.length > 0) {
    throw new ConfigError("Quality thresholds are inconsistent", violations);
  }
  return Object.freeze(merged);
}

export async function loadThresholds(path: string | null): Promise<Readonly<QualityThresholds>> {
  if (!path) {
    return DEFAULT_THRESHOLDS;
  }

  const raw = await readTextFile(path);
  if (raw === null) {
    throw new ConfigError(`Thresholds file missing at ${path}`);
  }

  let parsed: unknown;
  try {
    parsed = load(raw) ?? {};
  } catch (error) {
    throw new ConfigError(`Thresholds file ${path} is not valid YAML`, [
      error instanceof Error ? error.message : String(error)
    ]);
  }

  const overrides = await validateThresholdOverrides(parsed);
  if (!overrides.ok) {
    throw new ConfigError(`Thresholds file ${path} failed schema validation`, overrides.errors);
  }

  const thresholds = mergeThresholds(overrides.value);
  logger.debug("Loaded quality thresholds", { path, overrides: Object.keys(overrides.value) });
  return thresholds;
}
