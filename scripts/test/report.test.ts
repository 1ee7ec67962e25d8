import { fileURLToPath } from "node:url";
import { beforeAll, describe, expect, it } from "vitest";

import type { RecordEvaluation } from "lib/report/types.js";

import { loadMetricBatch } from "../src/ingest/load.js";
import { assembleReport, rankEvaluations, reportColumns } from "../src/report/assemble.js";
import { formatCell, renderCsv } from "../src/report/csv.js";
import { incompleteDetails, statusDistribution, summarizeReport, topFiles } from "../src/report/summary.js";
import { evaluateBatch, type BatchEvaluation } from "../src/scoring/evaluate.js";

const FIXTURE = fileURLToPath(new URL("./fixtures/metrics_batch.json", import.meta.url));

const HEADER = "score,status,filePath,notes,lra,peakAmplitudeDb,rmsDbAbove16k,rmsDbAbove18k";
const ROW_A = "100,good,/music/a.flac,no obvious hard technical issues found,10,-10,-55,-60";
const ROW_C = "100,good,/music/c.flac,no obvious hard technical issues found,10,-10,-55,-65";
const ROW_D = '25,incomplete,/music/d.flac,"critical data missing, analysis may be inaccurate",,-10,-55,';
const ROW_B =
  '20,suspicious-fake,"/music/b, live.flac","hard spectral cutoff near 18kHz, strongly suspected fake/upsampled",10,-10,-55,-90';

let batch: BatchEvaluation;

beforeAll(async () => {
  const { records } = await loadMetricBatch([FIXTURE]);
  batch = evaluateBatch(records);
});

describe("evaluateBatch", () => {
  it("scores every record and reports counts", () => {
    expect(batch.evaluations.map((evaluation) => evaluation.score)).toEqual([100, 20, 100, 25]);
    expect(batch.stats.totalRecords).toBe(4);
    expect(batch.stats.processedRecords).toBe(4);
    expect(batch.stats.elapsedMs).toBeGreaterThanOrEqual(0);
  });
});

describe("reportColumns", () => {
  it("lists the fixed columns, then loudness, peak and spectral columns present in the batch", () => {
    expect(reportColumns(batch.schema)).toEqual(HEADER.split(","));
  });

  it("omits columns the batch does not carry", () => {
    expect(reportColumns({ columns: new Set(["overallRmsDb"]), peakField: null })).toEqual([
      "score",
      "status",
      "filePath",
      "notes",
      "overallRmsDb",
    ]);
  });
});

describe("rankEvaluations", () => {
  it("orders by score and keeps input order for ties", () => {
    const ranked = rankEvaluations(batch.evaluations);
    expect(ranked.map((evaluation: RecordEvaluation) => evaluation.index)).toEqual([0, 2, 3, 1]);
  });
});

describe("assembleReport and renderCsv", () => {
  it("renders every row with quoting and blank missing cells", () => {
    const report = assembleReport(batch.evaluations, batch.schema);

    expect(report.filteredCount).toBe(0);
    expect(renderCsv(report)).toBe(`\uFEFF${[HEADER, ROW_A, ROW_C, ROW_D, ROW_B].join("\n")}\n`);
  });

  it("drops rows below the minimum score", () => {
    const report = assembleReport(batch.evaluations, batch.schema, { minScore: 30 });

    expect(report.filteredCount).toBe(2);
    expect(renderCsv(report, { bom: false })).toBe(`${[HEADER, ROW_A, ROW_C].join("\n")}\n`);
  });

  it("keeps the header when every row is filtered out", () => {
    const report = assembleReport(batch.evaluations, batch.schema, { minScore: 101 });

    expect(report.rows).toEqual([]);
    expect(renderCsv(report, { bom: false })).toBe(`${HEADER}\n`);
  });
});

describe("formatCell", () => {
  it("quotes separators, quotes and line breaks", () => {
    expect(formatCell('say "hi"')).toBe('"say ""hi"""');
    expect(formatCell("a\nb")).toBe('"a\nb"');
    expect(formatCell("plain")).toBe("plain");
  });

  it("writes numbers as-is and nulls as empty", () => {
    expect(formatCell(-0.5)).toBe("-0.5");
    expect(formatCell(null)).toBe("");
  });
});

describe("summary", () => {
  it("counts statuses with shares of the whole batch", () => {
    const report = assembleReport(batch.evaluations, batch.schema);

    expect(statusDistribution(report, 4)).toEqual([
      { status: "good", count: 2, percentage: 50 },
      { status: "incomplete", count: 1, percentage: 25 },
      { status: "suspicious-fake", count: 1, percentage: 25 },
    ]);
  });

  it("rounds shares to one decimal", () => {
    const report = assembleReport(batch.evaluations, batch.schema, { minScore: 30 });

    expect(statusDistribution(report, 3)).toEqual([{ status: "good", count: 2, percentage: 66.7 }]);
  });

  it("lists the top files by bare file name", () => {
    const report = assembleReport(batch.evaluations, batch.schema);

    expect(topFiles(report, 2)).toEqual([
      { rank: 1, score: 100, fileName: "a.flac" },
      { rank: 2, score: 100, fileName: "c.flac" },
    ]);
    expect(topFiles(report).map((file) => file.fileName)).toEqual(["a.flac", "c.flac", "d.flac", "b, live.flac"]);
  });

  it("details incomplete records", () => {
    expect(incompleteDetails(batch.evaluations)).toEqual([
      { filePath: "/music/d.flac", missingCount: 2, missingFields: ["rmsDbAbove18k", "lra"] },
    ]);
  });

  it("includes incomplete details only when asked", () => {
    const report = assembleReport(batch.evaluations, batch.schema, { minScore: 30 });

    const plain = summarizeReport(report, batch.evaluations);
    expect(plain).toMatchObject({ totalRecords: 4, reportedRecords: 2, filteredCount: 2 });
    expect(plain.incomplete).toBeUndefined();

    const detailed = summarizeReport(report, batch.evaluations, { includeIncomplete: true });
    expect(detailed.incomplete).toHaveLength(1);
  });
});
