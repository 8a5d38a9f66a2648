import { readFileSync } from "fs";
import { rm } from "fs/promises";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

import { BATCH_DETAIL_HEADER, collectRunRows, compileBatch } from "../metrics/batch";
import { SUMMARY_COLUMNS } from "../metrics/record";
import { makeTempDir, readFixture, writeRunFiles } from "./helpers";

describe("collectRunRows", () => {
  test("prefixes detail rows with the run's model and backend", () => {
    const rows = collectRunRows({
      summaryText: "h\nr1\n",
      detailText: "unit_identifier,duration_ms\ninput_1,10\n\ninput_2,5.5\n",
      model: "model.bin",
      backend: "htp",
    });

    expect(rows).toEqual({
      summaryRow: "r1",
      detailRows: ["model.bin,htp,input_1,10", "model.bin,htp,input_2,5.5"],
    });
  });

  test("a run without a detail table contributes only its summary row", () => {
    expect(collectRunRows({ summaryText: "h\nr1\n", detailText: null, model: "m", backend: "b" })).toEqual({
      summaryRow: "r1",
      detailRows: [],
    });
  });
});

describe("compileBatch", () => {
  let root = "";

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  test("concatenates run records and skips runs without data", async () => {
    const first = await writeRunFiles(root, "qnn_run_a", {
      "metrics.csv": readFixture("metrics.csv"),
      "input_times.csv": "unit_identifier,duration_ms\ninput_1,10\ninput_2,5.5\n",
    });
    const headerOnly = await writeRunFiles(root, "qnn_run_b", {
      "metrics.csv": `${SUMMARY_COLUMNS.join(",")}\n`,
    });
    const empty = await writeRunFiles(root, "qnn_run_c", {});

    const result = await compileBatch({
      runs: [
        { runId: "qnn_run_a", metricsDir: first },
        { runId: "qnn_run_b", metricsDir: headerOnly },
        { runId: "qnn_run_c", metricsDir: empty },
      ],
      outputPrefix: join(root, "batch"),
    });

    expect(result.runCount).toBe(1);
    expect(result.detailRowCount).toBe(2);
    expect(result.skipped).toEqual([
      { runId: "qnn_run_b", reason: "Metrics CSV contains only header, no data (qnn_run_b)" },
      { runId: "qnn_run_c", reason: "No metrics CSV found for run: qnn_run_c" },
    ]);
    expect(result.summaryPath).toBe(join(root, "batch_metrics.csv"));

    const summaryLines = readFileSync(result.summaryPath, "utf8").split("\n");
    expect(summaryLines[0]).toBe(SUMMARY_COLUMNS.join(","));
    expect(summaryLines[1]?.startsWith("SENTINEL_TS,SENTINEL_RUN,SENTINEL_MODEL")).toBe(true);
    expect(summaryLines.length).toBe(3);

    expect(readFileSync(result.detailPath, "utf8")).toBe(
      `${BATCH_DETAIL_HEADER}\nSENTINEL_MODEL,SENTINEL_BACKEND,input_1,10\nSENTINEL_MODEL,SENTINEL_BACKEND,input_2,5.5\n`
    );
  });
});
