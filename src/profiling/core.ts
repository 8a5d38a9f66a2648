import { getDefaultProfilePatterns, MAX_COUNTER_VALUE, MAX_TIMING_VALUE, SEARCH_OFFSETS } from "./patterns";
import type { DerivedMetrics, ProfileExtractionDetail, ProfileMetricPattern, ProfilingReport } from "./types";

const VERSION_STRING = /v\d+\.\d+\.\d+/;
const GRAPH_NAME_MARKERS = ["_quantized_htp", "_quantized_cpu", "_quantized_gpu"];

function isPrintable(byte: number): boolean {
  return byte >= 0x20 && byte <= 0x7e;
}

/** Every run of printable ASCII of at least `minLength` bytes, with all of its start offsets. */
export function extractPrintableStrings(data: Uint8Array, minLength = 3): Map<string, number[]> {
  const found = new Map<string, number[]>();
  let start = -1;

  const flush = (end: number) => {
    if (start < 0) return;
    if (end - start >= minLength) {
      const value = Buffer.from(data.subarray(start, end)).toString("latin1");
      const positions = found.get(value);
      if (positions) positions.push(start);
      else found.set(value, [start]);
    }
    start = -1;
  };

  for (let i = 0; i < data.length; i += 1) {
    const byte = data[i] ?? 0;
    if (isPrintable(byte)) {
      if (start < 0) start = i;
    } else {
      flush(i);
    }
  }
  flush(data.length);

  return found;
}

export function readUint32LE(data: Uint8Array, position: number, offset: number): number | null {
  const at = position + offset;
  if (at < 0 || at > data.length - 4) return null;
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength).readUInt32LE(at);
}

function withinLimit(pattern: ProfileMetricPattern, value: number): boolean {
  return pattern.type === "counter" ? value <= MAX_COUNTER_VALUE : value <= MAX_TIMING_VALUE;
}

export function findMetricValue(
  data: Uint8Array,
  positions: readonly number[],
  pattern: ProfileMetricPattern
): { value: number; offset: number } | null {
  for (const position of positions) {
    for (const offset of SEARCH_OFFSETS) {
      const value = readUint32LE(data, position, offset);
      if (value === null || !withinLimit(pattern, value)) continue;
      return { value, offset };
    }
  }
  return null;
}

export function parseProfilingDump(
  data: Uint8Array,
  path: string,
  patterns: readonly ProfileMetricPattern[] = getDefaultProfilePatterns()
): ProfilingReport {
  const strings = extractPrintableStrings(data);

  let backendVersion = "";
  let graphName = "";
  for (const value of strings.keys()) {
    if (VERSION_STRING.test(value)) backendVersion = value;
    else if (GRAPH_NAME_MARKERS.some((marker) => value.includes(marker))) graphName = value;
  }

  const metrics: Record<string, number> = {};
  const details: ProfileExtractionDetail[] = [];
  const failedExtractions: string[] = [];

  for (const pattern of patterns) {
    const positions = strings.get(pattern.pattern);
    if (!positions || positions.length === 0) continue;

    const found = findMetricValue(data, positions, pattern);
    if (!found) {
      failedExtractions.push(pattern.pattern);
      continue;
    }

    const stringPosition = positions[0] ?? 0;
    metrics[pattern.key] = found.value;
    details.push({
      pattern: pattern.pattern,
      key: pattern.key,
      value: found.value,
      stringPosition,
      offsetUsed: found.offset,
      extractionPosition: stringPosition + found.offset,
      unit: pattern.unit,
      type: pattern.type,
    });
  }

  return {
    fileInfo: {
      path,
      sizeBytes: data.length,
      backendVersion,
      graphName,
    },
    extraction: {
      stringsFound: strings.size,
      metricsExtracted: details.length,
      failedExtractions,
    },
    metrics,
    details,
  };
}

// Derived values that come out of a division; they render as reals even when whole.
const FRACTIONAL_DERIVED_KEYS: ReadonlySet<string> = new Set([
  "throughput_inferences_per_second",
  "avg_time_per_inference_us",
  "avg_execution_time_us",
  "avg_finalize_time_us",
  "avg_deinit_time_us",
  "accelerator_efficiency_percent",
  "rpc_overhead_ratio",
]);

export function isFractionalDerivedMetric(key: string): boolean {
  return FRACTIONAL_DERIVED_KEYS.has(key);
}

function sum(values: readonly number[]): number {
  return values.reduce((acc, value) => acc + value, 0);
}

export function calculateDerivedMetrics(metrics: Readonly<Record<string, number>>): DerivedMetrics {
  const derived: DerivedMetrics = {};

  const primary = metrics.qnn_execute_time_us ?? metrics.accelerator_execute_time_us;
  if (primary !== undefined) derived.primary_execution_time_us = primary;

  const inferences = metrics.num_inferences;
  if (primary !== undefined && inferences !== undefined && primary > 0 && inferences > 0) {
    derived.throughput_inferences_per_second = (1_000_000 * inferences) / primary;
    derived.avg_time_per_inference_us = primary / inferences;
  }

  const execute: number[] = [];
  const finalize: number[] = [];
  const deinit: number[] = [];
  for (const [key, value] of Object.entries(metrics)) {
    if (!key.includes("time_us")) continue;
    if (key.includes("execute")) execute.push(value);
    else if (key.includes("finalize")) finalize.push(value);
    else if (key.includes("deinit")) deinit.push(value);
  }

  const groups: Array<[string, number[]]> = [
    ["execution", execute],
    ["finalize", finalize],
    ["deinit", deinit],
  ];
  for (const [name, values] of groups) {
    if (values.length === 0) continue;
    derived[`total_${name}_time_us`] = sum(values);
    derived[`avg_${name}_time_us`] = sum(values) / values.length;
  }

  const qnnExecute = metrics.qnn_execute_time_us;
  const acceleratorExecute = metrics.accelerator_execute_time_us;
  if (acceleratorExecute !== undefined && qnnExecute !== undefined && qnnExecute > 0) {
    derived.accelerator_efficiency_percent = (acceleratorExecute / qnnExecute) * 100;
  }

  const rpcExecute = metrics.rpc_execute_time_us;
  if (rpcExecute !== undefined && acceleratorExecute !== undefined && acceleratorExecute > 0) {
    derived.rpc_overhead_ratio = rpcExecute / acceleratorExecute;
  }

  return derived;
}
