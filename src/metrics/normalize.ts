import type { LogLine } from "./types";

const LEADING_TOKEN = /^\s*(\S*?)ms/;
const DECIMAL = /^\d+(?:\.\d*)?$/;

export function splitLogText(text: string): string[] {
  const lines = text.replace(/\r/g, "").split("\n");
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/** Keeps digits and the first decimal point. */
export function cleanTimestampToken(token: string): string {
  let out = "";
  let sawDot = false;
  for (const ch of token) {
    if (ch >= "0" && ch <= "9") {
      out += ch;
    } else if (ch === "." && !sawDot) {
      out += ch;
      sawDot = true;
    }
  }
  return out;
}

export function parseLeadingTimestamp(text: string): number | null {
  const match = LEADING_TOKEN.exec(text);
  if (!match) return null;
  const cleaned = cleanTimestampToken(match[1] ?? "");
  if (!DECIMAL.test(cleaned)) return null;
  const value = Number(cleaned);
  if (!Number.isFinite(value) || value < 0) return null;
  return value;
}

export function normalizeLogText(text: string): LogLine[] {
  return splitLogText(text).map((line, index) => ({
    index,
    text: line,
    timestampMs: parseLeadingTimestamp(line),
  }));
}
