import { existsSync, readFileSync } from "fs";

import { MetricsError } from "./errors";
import { formatSchemaIssues, getMarkerSetValidator } from "./schema";
import { PHASE_NAMES, UNIT_LABEL, type EventMarker, type MarkerPair, type MarkerSet, type PhaseName } from "./types";

export const DEFAULT_MARKER_SET: MarkerSet = {
  phases: {
    backendCreation: { start: "QnnBackend_create started", end: "QnnBackend_create done successfully" },
    graphComposition: { start: "Composing Graphs", end: "Graphs Finalized" },
    graphFinalization: { start: "Finalizing Graphs", end: "Graphs Finalized" },
    graphExecution: { start: "Executing Graphs", end: "Executed Graph" },
  },
  unit: { start: "QnnGraph_execute started", end: "QnnGraph_execute done" },
  exitSentinel: "INFERENCE_EXIT_CODE",
  teardown: ["QnnBackend_free", "QnnDevice_free"],
  bandwidthHeader: "====== DDR bandwidth summary ======",
};

export type CompiledMarkers = {
  markers: EventMarker[];
  exitSentinel: string;
  teardown: string[];
  bandwidthHeader: string;
};

export function compileMarkerSet(set: MarkerSet = DEFAULT_MARKER_SET): CompiledMarkers {
  const markers: EventMarker[] = [];
  for (const phase of PHASE_NAMES) {
    const pair = set.phases[phase];
    markers.push({ label: phase, kind: "start", pattern: pair.start });
    markers.push({ label: phase, kind: "end", pattern: pair.end });
  }
  markers.push({ label: UNIT_LABEL, kind: "start", pattern: set.unit.start });
  markers.push({ label: UNIT_LABEL, kind: "end", pattern: set.unit.end });

  return {
    markers,
    exitSentinel: set.exitSentinel,
    teardown: [...set.teardown],
    bandwidthHeader: set.bandwidthHeader,
  };
}

type MarkerSetOverrides = {
  phases?: Partial<Record<PhaseName, MarkerPair>>;
  unit?: MarkerPair;
  exitSentinel?: string;
  teardown?: string[];
  bandwidthHeader?: string;
};

function isMarkerSetOverrides(value: unknown): value is MarkerSetOverrides {
  return getMarkerSetValidator()(value);
}

export function mergeMarkerSet(overrides: MarkerSetOverrides, base: MarkerSet = DEFAULT_MARKER_SET): MarkerSet {
  return {
    phases: { ...base.phases, ...overrides.phases },
    unit: overrides.unit ?? base.unit,
    exitSentinel: overrides.exitSentinel ?? base.exitSentinel,
    teardown: overrides.teardown ?? base.teardown,
    bandwidthHeader: overrides.bandwidthHeader ?? base.bandwidthHeader,
  };
}

export function parseMarkerSet(value: unknown, source = "marker set"): MarkerSet {
  if (!isMarkerSetOverrides(value)) {
    const issues = formatSchemaIssues(getMarkerSetValidator().errors);
    throw new MetricsError("E_MARKERS_INVALID", `Invalid ${source}: ${issues}`);
  }
  return mergeMarkerSet(value);
}

export function loadMarkerSet(path: string): MarkerSet {
  if (!existsSync(path)) {
    throw new MetricsError("E_MARKERS_INVALID", `Marker set file not found: ${path}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new MetricsError("E_MARKERS_INVALID", `Marker set file is not valid JSON (${path}): ${message}`);
  }

  return parseMarkerSet(parsed, `marker set ${path}`);
}
