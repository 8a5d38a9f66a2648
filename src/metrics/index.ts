export { parseBandwidthSummary, ZERO_BANDWIDTH } from "./bandwidth";
export { BATCH_DETAIL_HEADER, collectRunRows, compileBatch, getBatchPaths, type BatchRun, type CompileBatchResult } from "./batch";
export { buildMetricsSummary, computeUnitStats, median } from "./core";
export { isMetricsError, MetricsError, type MetricsErrorCode } from "./errors";
export { extractPhaseDuration, extractTotalInference, extractUnitDurations, unitIdFor } from "./extract";
export {
  computeRunMetrics,
  DETAIL_FILE_NAME,
  extractRunMetrics,
  getRunMetricsPaths,
  LOG_FILE_NAME,
  SUMMARY_FILE_NAME,
  type ExtractRunMetricsResult,
  type RunMetricsPaths,
} from "./extract-run";
export { compileMarkerSet, DEFAULT_MARKER_SET, loadMarkerSet, mergeMarkerSet, parseMarkerSet } from "./markers";
export { cleanTimestampToken, normalizeLogText, parseLeadingTimestamp, splitLogText } from "./normalize";
export {
  createInitialSummaryRecord,
  DETAIL_HEADER,
  mergeSummaryRecord,
  renderDetailTable,
  SUMMARY_COLUMNS,
  summaryFieldValues,
  type RunRecordInfo,
  type SummaryColumn,
} from "./record";
export { scanLog } from "./scan";
export type {
  BandwidthCounters,
  Diagnostic,
  DiagnosticCode,
  Extracted,
  LogLine,
  LogScan,
  MarkerSet,
  MetricsSummary,
  PhaseDurations,
  RunMetricsResult,
  UnitExecution,
  UnitStats,
} from "./types";
