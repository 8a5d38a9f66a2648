export type LogLine = {
  index: number;
  text: string;
  timestampMs: number | null;
};

export type MarkerKind = "start" | "end";

export type PhaseName = "backendCreation" | "graphComposition" | "graphFinalization" | "graphExecution";

export const PHASE_NAMES: readonly PhaseName[] = [
  "backendCreation",
  "graphComposition",
  "graphFinalization",
  "graphExecution",
] as const;

export type MarkerPair = {
  start: string;
  end: string;
};

export type MarkerSet = {
  phases: Record<PhaseName, MarkerPair>;
  unit: MarkerPair;
  exitSentinel: string;
  teardown: string[];
  bandwidthHeader: string;
};

/** Label of the repeated per-unit marker pair in scanned events. */
export const UNIT_LABEL = "unit";

export type EventMarker = {
  label: PhaseName | typeof UNIT_LABEL;
  kind: MarkerKind;
  pattern: string;
};

export type MarkerEvent = {
  label: EventMarker["label"];
  kind: MarkerKind;
  timestampMs: number | null;
  lineIndex: number;
};

export type LogScan = {
  events: MarkerEvent[];
  lineCount: number;
  firstTimestampMs: number | null;
  /** Last `[INFO]`/`[WARNING]`/`[ERROR]` line with a timestamp, before the exit sentinel. */
  lastSeverityTimestampMs: number | null;
  lastTeardownTimestampMs: number | null;
  lastTimestampBeforeExitMs: number | null;
  exitCode: number | null;
  /** Lines from the bandwidth header up to (not including) the next blank line; null when absent. */
  bandwidthBlock: string[] | null;
};

export type DiagnosticCode =
  | "phase_marker_missing"
  | "phase_timestamp_invalid"
  | "phase_duration_negative"
  | "total_inference_unavailable"
  | "unit_count_mismatch"
  | "unit_duration_invalid"
  | "bandwidth_block_missing"
  | "bandwidth_counter_missing"
  | "bandwidth_counter_out_of_range"
  | "inference_exit_nonzero";

export type Diagnostic = {
  code: DiagnosticCode;
  severity: "warn";
  message: string;
};

export type Extracted<T> = {
  value: T;
  diagnostics: Diagnostic[];
};

export type UnitExecution = {
  /** 1-based position of the start/end pair in the log. */
  index: number;
  unitId: string;
  durationMs: number;
};

export type UnitStats = {
  count: number;
  minMs: number;
  minUnitId: string;
  maxMs: number;
  maxUnitId: string;
  medianMs: number;
  meanMs: number;
};

export type PhaseDurations = {
  backendCreationMs: number;
  graphCompositionMs: number;
  graphFinalizationMs: number;
  graphExecutionMs: number;
  totalInferenceMs: number;
};

export type BandwidthCounters = {
  spillBytes: number;
  fillBytes: number;
  writeTotalBytes: number;
  readTotalBytes: number;
};

export type MetricsSummary = Readonly<UnitStats & PhaseDurations & BandwidthCounters>;

export type RunMetricsResult = {
  summary: MetricsSummary;
  units: UnitExecution[];
  diagnostics: Diagnostic[];
};
