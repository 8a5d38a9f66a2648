import { describe, expect, test } from "vitest";

import { buildMetricsSummary, computeUnitStats, median } from "../metrics/core";
import { MetricsError } from "../metrics/errors";
import type { UnitExecution } from "../metrics/types";

function units(durations: number[]): UnitExecution[] {
  return durations.map((durationMs, i) => ({ index: i + 1, unitId: `input_${i + 1}`, durationMs }));
}

describe("metrics core", () => {
  test("median takes the middle value for odd counts and the central mean for even counts", () => {
    expect(median([9, 2, 5])).toBe(5);
    expect(median([12, 2, 9, 5])).toBe(7);
  });

  test("computes min, max, median and mean with their unit labels", () => {
    const stats = computeUnitStats(units([10, 20, 30]));

    expect(stats).toEqual({
      count: 3,
      minMs: 10,
      minUnitId: "input_1",
      maxMs: 30,
      maxUnitId: "input_3",
      medianMs: 20,
      meanMs: 20,
    });
  });

  test("ties resolve to the first unit", () => {
    const stats = computeUnitStats(units([4, 1, 9, 1, 9]));

    expect(stats.minUnitId).toBe("input_2");
    expect(stats.maxUnitId).toBe("input_3");
  });

  test("an empty duration sequence is fatal", () => {
    expect(() => computeUnitStats([])).toThrow(MetricsError);
    try {
      computeUnitStats([]);
    } catch (error) {
      expect(error instanceof MetricsError ? error.code : null).toBe("E_NO_UNIT_DURATIONS");
    }
  });

  test("the summary is a frozen projection of stats, phases and counters", () => {
    const summary = buildMetricsSummary({
      stats: computeUnitStats(units([2, 5, 9])),
      phases: {
        backendCreationMs: 1,
        graphCompositionMs: 2,
        graphFinalizationMs: 3,
        graphExecutionMs: 4,
        totalInferenceMs: 5,
      },
      bandwidth: { spillBytes: 6, fillBytes: 7, writeTotalBytes: 8, readTotalBytes: 9 },
    });

    expect(Object.isFrozen(summary)).toBe(true);
    expect(summary.medianMs).toBe(5);
    expect(summary.graphFinalizationMs).toBe(3);
    expect(summary.readTotalBytes).toBe(9);
  });
});
