import { MetricsError } from "./errors";
import type { BandwidthCounters, MetricsSummary, PhaseDurations, UnitExecution, UnitStats } from "./types";

export function median(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) return sorted[mid] ?? NaN;
  return ((sorted[mid - 1] ?? NaN) + (sorted[mid] ?? NaN)) / 2;
}

export function computeUnitStats(units: readonly UnitExecution[]): UnitStats {
  const [first, ...rest] = units;
  if (!first) {
    throw new MetricsError("E_NO_UNIT_DURATIONS", "No execution times found");
  }

  let min = first;
  let max = first;
  let sum = first.durationMs;
  for (const unit of rest) {
    // Strict comparisons keep the first unit on ties.
    if (unit.durationMs < min.durationMs) min = unit;
    if (unit.durationMs > max.durationMs) max = unit;
    sum += unit.durationMs;
  }

  return {
    count: units.length,
    minMs: min.durationMs,
    minUnitId: min.unitId,
    maxMs: max.durationMs,
    maxUnitId: max.unitId,
    medianMs: median(units.map((unit) => unit.durationMs)),
    meanMs: sum / units.length,
  };
}

export function buildMetricsSummary(params: {
  stats: UnitStats;
  phases: PhaseDurations;
  bandwidth: BandwidthCounters;
}): MetricsSummary {
  return Object.freeze({ ...params.stats, ...params.phases, ...params.bandwidth });
}
