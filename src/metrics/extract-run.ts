import { existsSync } from "fs";
import { readFile } from "fs/promises";
import { join } from "path";

import { parseBandwidthSummary } from "./bandwidth";
import { buildMetricsSummary, computeUnitStats } from "./core";
import { MetricsError } from "./errors";
import { extractPhaseDuration, extractTotalInference, extractUnitDurations } from "./extract";
import { readLogText, writeFileAtomic } from "./io";
import { compileMarkerSet, DEFAULT_MARKER_SET } from "./markers";
import { normalizeLogText } from "./normalize";
import { mergeSummaryRecord, renderDetailTable, summaryFieldValues } from "./record";
import { scanLog } from "./scan";
import type { Diagnostic, MarkerSet, PhaseDurations, RunMetricsResult } from "./types";

export const LOG_FILE_NAME = "qnn_output.txt";
export const SUMMARY_FILE_NAME = "metrics.csv";
export const DETAIL_FILE_NAME = "input_times.csv";

export type RunMetricsPaths = {
  logPath: string;
  summaryPath: string;
  detailPath: string;
};

export function getRunMetricsPaths(metricsDir: string): RunMetricsPaths {
  return {
    logPath: join(metricsDir, LOG_FILE_NAME),
    summaryPath: join(metricsDir, SUMMARY_FILE_NAME),
    detailPath: join(metricsDir, DETAIL_FILE_NAME),
  };
}

export function computeRunMetrics(logText: string, options: { markers?: MarkerSet } = {}): RunMetricsResult {
  const lines = normalizeLogText(logText);
  const scan = scanLog(lines, compileMarkerSet(options.markers ?? DEFAULT_MARKER_SET));
  const diagnostics: Diagnostic[] = [];

  const units = extractUnitDurations(scan);
  diagnostics.push(...units.diagnostics);
  const stats = computeUnitStats(units.value);

  const backendCreation = extractPhaseDuration(scan, "backendCreation");
  const graphComposition = extractPhaseDuration(scan, "graphComposition");
  const graphFinalization = extractPhaseDuration(scan, "graphFinalization");
  const graphExecution = extractPhaseDuration(scan, "graphExecution");
  const totalInference = extractTotalInference(scan);
  for (const extracted of [backendCreation, graphComposition, graphFinalization, graphExecution, totalInference]) {
    diagnostics.push(...extracted.diagnostics);
  }

  const phases: PhaseDurations = {
    backendCreationMs: backendCreation.value,
    graphCompositionMs: graphComposition.value,
    graphFinalizationMs: graphFinalization.value,
    graphExecutionMs: graphExecution.value,
    totalInferenceMs: totalInference.value,
  };

  const bandwidth = parseBandwidthSummary(scan);
  diagnostics.push(...bandwidth.diagnostics);

  if (scan.exitCode !== null && scan.exitCode !== 0) {
    diagnostics.push({ code: "inference_exit_nonzero", severity: "warn", message: `Inference exited with code ${scan.exitCode}` });
  }

  return {
    summary: buildMetricsSummary({ stats, phases, bandwidth: bandwidth.value }),
    units: units.value,
    diagnostics,
  };
}

export type ExtractRunMetricsResult = RunMetricsResult & RunMetricsPaths;

/**
 * Reads the run log and the existing summary record, merges the computed metrics
 * into the record and writes a fresh detail table. Nothing is written on failure.
 */
export async function extractRunMetrics(params: RunMetricsPaths & { markers?: MarkerSet }): Promise<ExtractRunMetricsResult> {
  const log = await readLogText({ path: params.logPath });
  if (log.missing) {
    throw new MetricsError("E_LOG_MISSING", `QNN output file not found: ${params.logPath}`);
  }
  if (log.error) {
    throw new MetricsError("E_LOG_MISSING", `Failed to read QNN output file ${params.logPath}: ${log.error}`);
  }

  if (!existsSync(params.summaryPath)) {
    throw new MetricsError("E_SUMMARY_MISSING", `Metrics CSV not found: ${params.summaryPath}`);
  }
  const summaryText = await readFile(params.summaryPath, "utf8");

  const result = computeRunMetrics(log.text, { markers: params.markers });
  const merged = mergeSummaryRecord(summaryText, summaryFieldValues(result.summary));

  await writeFileAtomic(params.detailPath, renderDetailTable(result.units));
  await writeFileAtomic(params.summaryPath, merged);

  return {
    ...result,
    logPath: params.logPath,
    summaryPath: params.summaryPath,
    detailPath: params.detailPath,
  };
}
