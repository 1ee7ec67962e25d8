import crypto from "node:crypto";
import { dump } from "js-yaml";

export function normalizeForOutput(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => normalizeForOutput(item));
  }

  if (value instanceof Set) {
    return [...value].map((item) => normalizeForOutput(item)).sort();
  }

  if (value && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, child]) => child !== undefined)
      .map(([key, child]) => [key, normalizeForOutput(child)] as const)
      .sort(([a], [b]) => a.localeCompare(b));
    return Object.fromEntries(entries);
  }

  if (typeof value === "number" && !Number.isFinite(value)) {
    return null;
  }

  return value;
}

export function stringifyDeterministic(data: unknown): string {
  const yaml = dump(normalizeForOutput(data), {
    noRefs: true,
    sortKeys: true,
    lineWidth: 120,
    noCompatMode: true
  });
  return ensureLf(ensureTrailingNewline(yaml));
}

export function ensureTrailingNewline(input: string): string {
  return input.endsWith("\n") ? input : `${input}\n`;
}

export function ensureLf(input: string): string {
  return input.replace(/\r\n/g, "\n");
}

export function computeSha256(content: string): string {
  return crypto.createHash("sha256").update(content, "utf8").digest("hex");
}
