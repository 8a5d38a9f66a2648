import { describe, expect, test } from "vitest";

import { MetricsError } from "../metrics/errors";
import {
  createInitialSummaryRecord,
  formatDetailMs,
  mergeSummaryRecord,
  readSummaryDataRow,
  renderDetailTable,
  SUMMARY_COLUMNS,
  summaryFieldValues,
} from "../metrics/record";
import type { MetricsSummary } from "../metrics/types";
import { readFixture } from "./helpers";

const SUMMARY: MetricsSummary = {
  count: 3,
  minMs: 5.5,
  minUnitId: "input_2",
  maxMs: 12,
  maxUnitId: "input_3",
  medianMs: 10,
  meanMs: 27.5 / 3,
  backendCreationMs: 5.5,
  graphCompositionMs: 19.25,
  graphFinalizationMs: 15.25,
  graphExecutionMs: 31,
  totalInferenceMs: 61.5,
  spillBytes: 1024,
  fillBytes: 2048,
  writeTotalBytes: 40960,
  readTotalBytes: 81920,
};

describe("summary record", () => {
  test("has 24 columns in the fixed order", () => {
    expect(SUMMARY_COLUMNS.length).toBe(24);
    expect(SUMMARY_COLUMNS[9]).toBe("minimum_unit_inference_time_ms");
    expect(SUMMARY_COLUMNS[23]).toBe("ddr_read_total_B");
  });

  test("formats milliseconds to two decimals and bytes as integers", () => {
    const values = summaryFieldValues(SUMMARY);

    expect(values.average_unit_inference_time_ms).toBe("9.17");
    expect(values.graph_composition_ms).toBe("19.25");
    expect(values.maximum_unit_inference_time_ms).toBe("12.00");
    expect(values.ddr_write_total_B).toBe("40960");
  });

  test("overwrites columns 10-24 and leaves the caller's columns 1-9 untouched", () => {
    const merged = mergeSummaryRecord(readFixture("metrics.csv"), summaryFieldValues(SUMMARY));
    const [header, data] = merged.split("\n");

    expect(header).toBe(SUMMARY_COLUMNS.join(","));
    expect(data).toBe(
      "SENTINEL_TS,SENTINEL_RUN,SENTINEL_MODEL,SENTINEL_BACKEND,SENTINEL_DEVICE,SENTINEL_PROFILE,SENTINEL_SUCCESS,SENTINEL_TIME,SENTINEL_COUNT," +
        "5.50,input_2,12.00,input_3,10.00,9.17,5.50,19.25,15.25,31.00,61.50,1024,2048,40960,81920"
    );
  });

  test("pads a short data row when the header only carries the run columns", () => {
    const merged = mergeSummaryRecord("a,b\nx,y\n", { minimum_unit_inference_time_ms: "1.00", ddr_spill_B: "7" });

    expect(merged).toBe("a,b\nx,y,,,,,,,,1.00,,,,,,,,,,,7\n");
  });

  test("keeps rows after the data row", () => {
    const merged = mergeSummaryRecord("h\nrow\nextra\n", {});

    expect(merged).toBe("h\nrow\nextra\n");
  });

  test("keeps CRLF line endings and every row other than the data row byte-for-byte", () => {
    const merged = mergeSummaryRecord("h1,h2\r\nd1,d2\r\nextra\r\n", { ddr_read_total_B: "9" });

    expect(merged).toBe(`h1,h2\r\nd1,d2${",".repeat(22)}9\r\nextra\r\n`);
  });

  test("writes metric columns at their fixed positions whatever the header says", () => {
    const header = ["note", ...SUMMARY_COLUMNS].join(",");
    const data = new Array<string>(24).fill("x").join(",");

    const merged = mergeSummaryRecord(`${header}\n${data}\n`, {
      minimum_unit_inference_time_ms: "1.00",
      maximum_unit_inference_time_ms: "2.00",
    });
    const fields = merged.split("\n")[1]?.split(",") ?? [];

    expect(fields.length).toBe(24);
    expect(fields[9]).toBe("1.00");
    expect(fields[11]).toBe("2.00");
    expect(fields.filter((field) => field === "x").length).toBe(22);
  });

  test("a record without a data row is rejected", () => {
    expect(() => mergeSummaryRecord(`${SUMMARY_COLUMNS.join(",")}\n`, {})).toThrow(MetricsError);
    expect(() => mergeSummaryRecord("", {})).toThrow("Metrics CSV has no data rows");
  });

  test("reads the data row by column position", () => {
    const fields = readSummaryDataRow(readFixture("metrics.csv"));

    expect(fields?.model).toBe("SENTINEL_MODEL");
    expect(fields?.backend).toBe("SENTINEL_BACKEND");
    expect(readSummaryDataRow("only,header\n")).toBeNull();
  });

  test("creates the initial record with placeholders for the metric columns", () => {
    const text = createInitialSummaryRecord({
      timestamp: "2026-01-02T03:04:05.000Z",
      runId: "qnn_run_1",
      model: "model.bin",
      backend: "htp",
      device: "device-1",
      perfProfile: "burst",
    });

    expect(text).toBe(
      `${SUMMARY_COLUMNS.join(",")}\n` +
        "2026-01-02T03:04:05.000Z,qnn_run_1,model.bin,htp,device-1,burst,pending,0,0,0,input_0,0,input_0,0,0,0,0,0,0,0,0,0,0,0\n"
    );
  });
});

describe("detail table", () => {
  test("writes one row per unit in identifier order", () => {
    const text = renderDetailTable([
      { index: 3, unitId: "input_3", durationMs: 12 },
      { index: 1, unitId: "input_1", durationMs: 10 },
      { index: 2, unitId: "input_2", durationMs: 5.5 },
    ]);

    expect(text).toBe("unit_identifier,duration_ms\ninput_1,10\ninput_2,5.5\ninput_3,12\n");
  });

  test("rounds floating point noise to three decimals", () => {
    expect(formatDetailMs(12.3 - 10.1)).toBe("2.2");
    expect(formatDetailMs(0.12345)).toBe("0.123");
  });
});
