import type { BandwidthCounters, Diagnostic, Extracted, LogScan } from "./types";

const COUNTER_LABELS: ReadonlyArray<[keyof BandwidthCounters, string]> = [
  ["spillBytes", "spill_bytes"],
  ["fillBytes", "fill_bytes"],
  ["writeTotalBytes", "write_total_bytes"],
  ["readTotalBytes", "read_total_bytes"],
];

export const ZERO_BANDWIDTH: Readonly<BandwidthCounters> = Object.freeze({
  spillBytes: 0,
  fillBytes: 0,
  writeTotalBytes: 0,
  readTotalBytes: 0,
});

type CounterRead = { kind: "value"; value: number } | { kind: "missing" } | { kind: "out_of_range"; raw: string };

function readCounter(block: readonly string[], label: string): CounterRead {
  const pattern = new RegExp(`(?:^|[^A-Za-z0-9_])${label}=\\s*(\\d+)`);
  for (const line of block) {
    const match = pattern.exec(line);
    if (!match) continue;
    const raw = match[1] ?? "";
    const value = Number(raw);
    return Number.isSafeInteger(value) ? { kind: "value", value } : { kind: "out_of_range", raw };
  }
  return { kind: "missing" };
}

export function parseBandwidthSummary(scan: LogScan): Extracted<BandwidthCounters> {
  const block = scan.bandwidthBlock;
  if (!block) {
    return {
      value: { ...ZERO_BANDWIDTH },
      diagnostics: [{ code: "bandwidth_block_missing", severity: "warn", message: "DDR bandwidth summary not found" }],
    };
  }

  const counters: BandwidthCounters = { ...ZERO_BANDWIDTH };
  const diagnostics: Diagnostic[] = [];
  for (const [key, label] of COUNTER_LABELS) {
    const read = readCounter(block, label);
    if (read.kind === "missing") {
      diagnostics.push({ code: "bandwidth_counter_missing", severity: "warn", message: `No ${label} value in DDR bandwidth summary` });
      continue;
    }
    if (read.kind === "out_of_range") {
      diagnostics.push({
        code: "bandwidth_counter_out_of_range",
        severity: "warn",
        message: `DDR bandwidth ${label} value ${read.raw} is too large to record exactly`,
      });
      continue;
    }
    counters[key] = read.value;
  }

  return { value: counters, diagnostics };
}
