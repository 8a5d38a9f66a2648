import { existsSync } from "fs";
import { readFile } from "fs/promises";

import { joinFields, renderRows, splitFields, splitRows } from "./csv";
import { getRunMetricsPaths } from "./extract-run";
import { writeFileAtomic } from "./io";
import { readSummaryDataRow, SUMMARY_COLUMNS } from "./record";

export const BATCH_DETAIL_HEADER = "model_name,backend,unit_identifier,duration_ms";

export type BatchRunRows = {
  summaryRow: string | null;
  detailRows: string[];
};

/** Rows a single run contributes to the batch tables. */
export function collectRunRows(params: { summaryText: string; detailText: string | null; model: string; backend: string }): BatchRunRows {
  const [, dataRow] = splitRows(params.summaryText);
  const summaryRow = dataRow !== undefined && dataRow.trim() !== "" ? dataRow : null;

  const detailRows: string[] = [];
  if (params.detailText !== null) {
    const [, ...rows] = splitRows(params.detailText);
    for (const row of rows) {
      if (!row.trim()) continue;
      const [unitId = "", durationMs = ""] = splitFields(row);
      detailRows.push(joinFields([params.model, params.backend, unitId, durationMs]));
    }
  }

  return { summaryRow, detailRows };
}

export type BatchRun = {
  runId: string;
  metricsDir: string;
};

export type BatchSkip = {
  runId: string;
  reason: string;
};

export type CompileBatchResult = {
  summaryPath: string;
  detailPath: string;
  runCount: number;
  detailRowCount: number;
  skipped: BatchSkip[];
};

export function getBatchPaths(outputPrefix: string): { summaryPath: string; detailPath: string } {
  return {
    summaryPath: `${outputPrefix}_metrics.csv`,
    detailPath: `${outputPrefix}_input_times.csv`,
  };
}

export async function compileBatch(params: { runs: readonly BatchRun[]; outputPrefix: string }): Promise<CompileBatchResult> {
  const { summaryPath, detailPath } = getBatchPaths(params.outputPrefix);
  const summaryRows: string[] = [joinFields(SUMMARY_COLUMNS)];
  const detailRows: string[] = [BATCH_DETAIL_HEADER];
  const skipped: BatchSkip[] = [];
  let runCount = 0;

  for (const run of params.runs) {
    const paths = getRunMetricsPaths(run.metricsDir);
    if (!existsSync(paths.summaryPath)) {
      skipped.push({ runId: run.runId, reason: `No metrics CSV found for run: ${run.runId}` });
      continue;
    }

    const summaryText = await readFile(paths.summaryPath, "utf8");
    const fields = readSummaryDataRow(summaryText);
    if (!fields) {
      skipped.push({ runId: run.runId, reason: `Metrics CSV contains only header, no data (${run.runId})` });
      continue;
    }

    const detailText = existsSync(paths.detailPath) ? await readFile(paths.detailPath, "utf8") : null;
    const rows = collectRunRows({
      summaryText,
      detailText,
      model: fields.model ?? "",
      backend: fields.backend ?? "",
    });
    if (rows.summaryRow === null) continue;

    summaryRows.push(rows.summaryRow);
    detailRows.push(...rows.detailRows);
    runCount += 1;
  }

  await writeFileAtomic(summaryPath, renderRows(summaryRows));
  await writeFileAtomic(detailPath, renderRows(detailRows));

  return {
    summaryPath,
    detailPath,
    runCount,
    detailRowCount: detailRows.length - 1,
    skipped,
  };
}
