import { formatMs } from "./record";
import type { MetricsSummary, UnitExecution } from "./types";

export function formatUnitLines(units: readonly UnitExecution[]): string[] {
  return units.map((unit) => `Input ${unit.index}: ${formatMs(unit.durationMs)}ms`);
}

export function formatSummaryLines(summary: MetricsSummary): string[] {
  return [
    `Statistics: Min=${formatMs(summary.minMs)}ms (${summary.minUnitId}), Max=${formatMs(summary.maxMs)}ms (${summary.maxUnitId})`,
    `           Med=${formatMs(summary.medianMs)}ms, Avg=${formatMs(summary.meanMs)}ms (${summary.count} inputs)`,
    `Backend creation: ${formatMs(summary.backendCreationMs)}ms`,
    `Graph composition: ${formatMs(summary.graphCompositionMs)}ms`,
    `Graph finalization: ${formatMs(summary.graphFinalizationMs)}ms`,
    `Graph execution: ${formatMs(summary.graphExecutionMs)}ms`,
    `Total inference: ${formatMs(summary.totalInferenceMs)}ms`,
    `DDR spill: ${summary.spillBytes}B`,
    `DDR fill: ${summary.fillBytes}B`,
    `DDR write total: ${summary.writeTotalBytes}B`,
    `DDR read total: ${summary.readTotalBytes}B`,
  ];
}
