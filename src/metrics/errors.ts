export type MetricsErrorCode =
  | "E_LOG_MISSING"
  | "E_SUMMARY_MISSING"
  | "E_SUMMARY_NO_DATA_ROW"
  | "E_NO_UNIT_DURATIONS"
  | "E_MARKERS_INVALID";

export class MetricsError extends Error {
  readonly code: MetricsErrorCode;

  constructor(code: MetricsErrorCode, message: string) {
    super(message);
    this.name = "MetricsError";
    this.code = code;
  }
}

export function isMetricsError(error: unknown): error is MetricsError {
  return error instanceof MetricsError;
}
