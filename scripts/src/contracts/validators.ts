import { promises as fs } from "node:fs";

import Ajv, { type ErrorObject, type SchemaObject, type ValidateFunction } from "ajv";

import type { MetricRecord, QualityThresholds } from "lib/report/types.js";

import { METRICS_SCHEMA_PATH, THRESHOLDS_SCHEMA_PATH } from "../constants.js";

export type ContractResult<T> = { ok: true; value: T } | { ok: false; errors: string[] };

const ajv = new Ajv({ allErrors: true, strict: false, allowUnionTypes: true });

let metricsValidator: ValidateFunction<MetricRecord[]> | null = null;
let thresholdsValidator: ValidateFunction<Partial<QualityThresholds>> | null = null;

export async function validateMetricBatch(data: unknown): Promise<ContractResult<MetricRecord[]>> {
  if (!metricsValidator) {
    metricsValidator = ajv.compile<MetricRecord[]>(await loadSchema(METRICS_SCHEMA_PATH));
  }
  if (metricsValidator(data)) {
    return { ok: true, value: data };
  }
  return { ok: false, errors: formatErrors(metricsValidator.errors) };
}

export async function validateThresholdOverrides(
  data: unknown
): Promise<ContractResult<Partial<QualityThresholds>>> {
  if (!thresholdsValidator) {
    thresholdsValidator = ajv.compile<Partial<QualityThresholds>>(await loadSchema(THRESHOLDS_SCHEMA_PATH));
  }
  if (thresholdsValidator(data)) {
    return { ok: true, value: data };
  }
  return { ok: false, errors: formatErrors(thresholdsValidator.errors) };
}

async function loadSchema(path: string): Promise<SchemaObject> {
  const raw = await fs.readFile(path, "utf8");
  const schema: SchemaObject = JSON.parse(raw);
  return schema;
}

export function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors) {
    return ["Unknown validation error"];
  }
  return errors.map((error) => `${error.instancePath || "/"} ${error.message ?? "invalid"}`);
}
