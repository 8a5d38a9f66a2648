import { UNIT_LABEL, type Diagnostic, type Extracted, type LogScan, type MarkerEvent, type PhaseName, type UnitExecution } from "./types";

const PHASE_TITLES: Record<PhaseName, string> = {
  backendCreation: "backend creation",
  graphComposition: "graph composition",
  graphFinalization: "graph finalization",
  graphExecution: "graph execution",
};

export function unitIdFor(index: number): string {
  return `input_${index}`;
}

function warn(code: Diagnostic["code"], message: string): Diagnostic {
  return { code, severity: "warn", message };
}

function firstEvent(events: readonly MarkerEvent[], label: MarkerEvent["label"], kind: MarkerEvent["kind"]): MarkerEvent | null {
  return events.find((event) => event.label === label && event.kind === kind) ?? null;
}

/**
 * First start marker and first end marker of a phase, looked up independently:
 * the end marker is not required to follow the start marker.
 */
export function extractPhaseDuration(scan: LogScan, phase: PhaseName): Extracted<number> {
  const title = PHASE_TITLES[phase];
  const start = firstEvent(scan.events, phase, "start");
  const end = firstEvent(scan.events, phase, "end");

  if (!start || !end) {
    const missing = [!start ? "start" : null, !end ? "end" : null].filter(Boolean).join("/");
    return { value: 0, diagnostics: [warn("phase_marker_missing", `No ${missing} marker found for ${title}`)] };
  }

  if (start.timestampMs === null || end.timestampMs === null) {
    return {
      value: 0,
      diagnostics: [warn("phase_timestamp_invalid", `Unparseable timestamp on ${title} marker (lines ${start.lineIndex + 1}/${end.lineIndex + 1})`)],
    };
  }

  const delta = end.timestampMs - start.timestampMs;
  if (!Number.isFinite(delta) || delta < 0) {
    return { value: 0, diagnostics: [warn("phase_duration_negative", `Negative ${title} duration (${start.timestampMs}ms -> ${end.timestampMs}ms)`)] };
  }

  return { value: delta, diagnostics: [] };
}

export function extractTotalInference(scan: LogScan): Extracted<number> {
  const first = scan.firstTimestampMs;
  const last = scan.lastSeverityTimestampMs ?? scan.lastTeardownTimestampMs ?? scan.lastTimestampBeforeExitMs;

  if (first === null || last === null || last < first) {
    return {
      value: 0,
      diagnostics: [
        warn("total_inference_unavailable", `Could not extract total inference time (first=${first ?? "none"}, last=${last ?? "none"})`),
      ],
    };
  }

  return { value: last - first, diagnostics: [] };
}

/**
 * Positional pairing: the k-th start marker pairs with the k-th end marker.
 * Assumes the log comes from a single sequential execution loop; interleaved units would mispair.
 */
export function extractUnitDurations(scan: LogScan): Extracted<UnitExecution[]> {
  const starts: number[] = [];
  const ends: number[] = [];
  for (const event of scan.events) {
    if (event.label !== UNIT_LABEL || event.timestampMs === null) continue;
    if (event.kind === "start") starts.push(event.timestampMs);
    else ends.push(event.timestampMs);
  }

  const diagnostics: Diagnostic[] = [];
  if (starts.length !== ends.length) {
    diagnostics.push(warn("unit_count_mismatch", `Mismatch in start/end execution times (${starts.length}/${ends.length})`));
  }

  const units: UnitExecution[] = [];
  const pairCount = Math.min(starts.length, ends.length);
  for (let i = 0; i < pairCount; i += 1) {
    const index = i + 1;
    const durationMs = (ends[i] ?? NaN) - (starts[i] ?? NaN);
    if (!Number.isFinite(durationMs) || durationMs < 0) {
      diagnostics.push(warn("unit_duration_invalid", `Invalid execution time calculated for ${unitIdFor(index)}`));
      continue;
    }
    units.push({ index, unitId: unitIdFor(index), durationMs });
  }

  return { value: units, diagnostics };
}
