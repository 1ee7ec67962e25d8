import type { QualityReport, ReportCell } from "lib/report/types.js";

import { CSV_BOM } from "../constants.js";

const NEEDS_QUOTING = /[",\r\n]/;

export function formatCell(value: ReportCell | undefined): string {
  if (value === null || value === undefined) {
    return "";
  }
  const text = typeof value === "number" ? String(value) : value;
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function renderCsv(report: QualityReport, options: { bom?: boolean } = {}): string {
  const lines = [report.columns.map((column) => formatCell(column)).join(",")];
  for (const row of report.rows) {
    lines.push(report.columns.map((column) => formatCell(row[column])).join(","));
  }
  const body = `${lines.join("\n")}\n`;
  return options.bom === false ? body : `${CSV_BOM}${body}`;
}
