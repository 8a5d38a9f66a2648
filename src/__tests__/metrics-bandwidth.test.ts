import { describe, expect, test } from "vitest";

import { parseBandwidthSummary } from "../metrics/bandwidth";
import { normalizeLogText } from "../metrics/normalize";
import { scanLog } from "../metrics/scan";

function parse(lines: string[]) {
  return parseBandwidthSummary(scanLog(normalizeLogText(lines.join("\n"))));
}

describe("DDR bandwidth summary", () => {
  test("reads the four counters from the block", () => {
    const result = parse([
      "12.0ms [INFO] done",
      "====== DDR bandwidth summary ======",
      "  spill_bytes=100",
      "  fill_bytes=200 B",
      "  write_total_bytes=300",
      "  read_total_bytes=400",
      "",
    ]);

    expect(result).toEqual({
      value: { spillBytes: 100, fillBytes: 200, writeTotalBytes: 300, readTotalBytes: 400 },
      diagnostics: [],
    });
  });

  test("an absent block yields zeros without failing", () => {
    const result = parse(["1.0ms [INFO] no summary here"]);

    expect(result.value).toEqual({ spillBytes: 0, fillBytes: 0, writeTotalBytes: 0, readTotalBytes: 0 });
    expect(result.diagnostics.map((d) => d.code)).toEqual(["bandwidth_block_missing"]);
  });

  test("the block ends at the first blank line and missing labels stay zero", () => {
    const result = parse([
      "====== DDR bandwidth summary ======",
      "spill_bytes=5",
      "",
      "fill_bytes=999",
    ]);

    expect(result.value).toEqual({ spillBytes: 5, fillBytes: 0, writeTotalBytes: 0, readTotalBytes: 0 });
    expect(result.diagnostics.map((d) => d.message)).toEqual([
      "No fill_bytes value in DDR bandwidth summary",
      "No write_total_bytes value in DDR bandwidth summary",
      "No read_total_bytes value in DDR bandwidth summary",
    ]);
  });

  test("labels do not match inside longer labels", () => {
    const result = parse([
      "====== DDR bandwidth summary ======",
      "prefill_bytes=77",
      "fill_bytes=12",
      "",
    ]);

    expect(result.value.fillBytes).toBe(12);
  });

  test("reads each counter from its own pair when a line holds several", () => {
    const result = parse([
      "====== DDR bandwidth summary ======",
      "spill_bytes=1024 fill_bytes=2048",
      "write_total_bytes=10, read_total_bytes=20",
      "",
    ]);

    expect(result).toEqual({
      value: { spillBytes: 1024, fillBytes: 2048, writeTotalBytes: 10, readTotalBytes: 20 },
      diagnostics: [],
    });
  });

  test("a counter too large to hold exactly is reported as out of range, not missing", () => {
    const result = parse([
      "====== DDR bandwidth summary ======",
      "spill_bytes=99999999999999999999",
      "fill_bytes=1",
      "write_total_bytes=2",
      "read_total_bytes=3",
      "",
    ]);

    expect(result.value.spillBytes).toBe(0);
    expect(result.diagnostics).toEqual([
      {
        code: "bandwidth_counter_out_of_range",
        severity: "warn",
        message: "DDR bandwidth spill_bytes value 99999999999999999999 is too large to record exactly",
      },
    ]);
  });
});
