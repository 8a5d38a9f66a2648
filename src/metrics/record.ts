import { joinFields, renderRows, splitFields } from "./csv";
import { MetricsError } from "./errors";
import type { MetricsSummary, UnitExecution } from "./types";

export const RUN_COLUMNS = [
  "timestamp",
  "run_id",
  "model",
  "backend",
  "device",
  "perf_profile",
  "success",
  "total_time_seconds",
  "output_files_count",
] as const;

export const METRIC_COLUMNS = [
  "minimum_unit_inference_time_ms",
  "minimum_unit_inference_file",
  "maximum_unit_inference_time_ms",
  "maximum_unit_inference_file",
  "median_unit_inference_time_ms",
  "average_unit_inference_time_ms",
  "backend_creation_ms",
  "graph_composition_ms",
  "graph_finalization_ms",
  "graph_execution_ms",
  "total_inference_ms",
  "ddr_spill_B",
  "ddr_fill_B",
  "ddr_write_total_B",
  "ddr_read_total_B",
] as const;

export const SUMMARY_COLUMNS = [...RUN_COLUMNS, ...METRIC_COLUMNS] as const;

export type RunColumn = (typeof RUN_COLUMNS)[number];
export type MetricColumn = (typeof METRIC_COLUMNS)[number];
export type SummaryColumn = (typeof SUMMARY_COLUMNS)[number];

export const DETAIL_HEADER = "unit_identifier,duration_ms";

export function formatMs(value: number): string {
  return value.toFixed(2);
}

/** Up to three decimals, trailing zeros dropped. */
export function formatDetailMs(value: number): string {
  return String(Number(value.toFixed(3)));
}

export function summaryFieldValues(summary: MetricsSummary): Record<MetricColumn, string> {
  return {
    minimum_unit_inference_time_ms: formatMs(summary.minMs),
    minimum_unit_inference_file: summary.minUnitId,
    maximum_unit_inference_time_ms: formatMs(summary.maxMs),
    maximum_unit_inference_file: summary.maxUnitId,
    median_unit_inference_time_ms: formatMs(summary.medianMs),
    average_unit_inference_time_ms: formatMs(summary.meanMs),
    backend_creation_ms: formatMs(summary.backendCreationMs),
    graph_composition_ms: formatMs(summary.graphCompositionMs),
    graph_finalization_ms: formatMs(summary.graphFinalizationMs),
    graph_execution_ms: formatMs(summary.graphExecutionMs),
    total_inference_ms: formatMs(summary.totalInferenceMs),
    ddr_spill_B: String(summary.spillBytes),
    ddr_fill_B: String(summary.fillBytes),
    ddr_write_total_B: String(summary.writeTotalBytes),
    ddr_read_total_B: String(summary.readTotalBytes),
  };
}

function columnPosition(column: SummaryColumn): number {
  return SUMMARY_COLUMNS.indexOf(column);
}

type DataRowSpan = {
  start: number;
  end: number;
  fields: string[];
  lineEnding: string;
};

/** Locates row 2 without touching the bytes around it. */
function findDataRow(text: string): DataRowSpan | null {
  const headerEnd = text.indexOf("\n");
  if (headerEnd < 0) return null;

  const start = headerEnd + 1;
  const newline = text.indexOf("\n", start);
  const end = newline < 0 ? text.length : newline;
  const raw = text.slice(start, end);
  const lineEnding = raw.endsWith("\r") ? "\r" : "";
  const row = lineEnding ? raw.slice(0, -1) : raw;
  if (row.trim() === "") return null;

  return { start, end, fields: splitFields(row), lineEnding };
}

/**
 * Overwrites fields of the data row (row 2) at their fixed column positions.
 * Every other byte of the record, line endings included, is left as it was.
 */
export function mergeSummaryRecord(text: string, values: Partial<Record<SummaryColumn, string>>): string {
  const dataRow = findDataRow(text);
  if (!dataRow) {
    throw new MetricsError("E_SUMMARY_NO_DATA_ROW", "Metrics CSV has no data rows");
  }

  const fields = [...dataRow.fields];
  for (const column of SUMMARY_COLUMNS) {
    const value = values[column];
    if (value === undefined) continue;
    const position = columnPosition(column);
    while (fields.length <= position) fields.push("");
    fields[position] = value;
  }

  return `${text.slice(0, dataRow.start)}${joinFields(fields)}${dataRow.lineEnding}${text.slice(dataRow.end)}`;
}

export function readSummaryDataRow(text: string): Partial<Record<SummaryColumn, string>> | null {
  const dataRow = findDataRow(text);
  if (!dataRow) return null;

  const out: Partial<Record<SummaryColumn, string>> = {};
  for (const column of SUMMARY_COLUMNS) {
    const value = dataRow.fields[columnPosition(column)];
    if (value !== undefined) out[column] = value;
  }
  return out;
}

export function renderDetailTable(units: readonly UnitExecution[]): string {
  const sorted = [...units].sort((a, b) => a.index - b.index);
  return renderRows([DETAIL_HEADER, ...sorted.map((unit) => joinFields([unit.unitId, formatDetailMs(unit.durationMs)]))]);
}

export type RunRecordInfo = {
  timestamp: string;
  runId: string;
  model: string;
  backend: string;
  device: string;
  perfProfile: string;
  success?: string;
  totalTimeSeconds?: number;
  outputFilesCount?: number;
};

const METRIC_PLACEHOLDERS: Record<MetricColumn, string> = {
  minimum_unit_inference_time_ms: "0",
  minimum_unit_inference_file: "input_0",
  maximum_unit_inference_time_ms: "0",
  maximum_unit_inference_file: "input_0",
  median_unit_inference_time_ms: "0",
  average_unit_inference_time_ms: "0",
  backend_creation_ms: "0",
  graph_composition_ms: "0",
  graph_finalization_ms: "0",
  graph_execution_ms: "0",
  total_inference_ms: "0",
  ddr_spill_B: "0",
  ddr_fill_B: "0",
  ddr_write_total_B: "0",
  ddr_read_total_B: "0",
};

export function createInitialSummaryRecord(info: RunRecordInfo): string {
  const run: Record<RunColumn, string> = {
    timestamp: info.timestamp,
    run_id: info.runId,
    model: info.model,
    backend: info.backend,
    device: info.device,
    perf_profile: info.perfProfile,
    success: info.success ?? "pending",
    total_time_seconds: String(info.totalTimeSeconds ?? 0),
    output_files_count: String(info.outputFilesCount ?? 0),
  };

  const data = [...RUN_COLUMNS.map((column) => run[column]), ...METRIC_COLUMNS.map((column) => METRIC_PLACEHOLDERS[column])];
  return renderRows([joinFields(SUMMARY_COLUMNS), joinFields(data)]);
}
