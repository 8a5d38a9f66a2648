import { compileMarkerSet, type CompiledMarkers } from "./markers";
import type { LogLine, LogScan, MarkerEvent } from "./types";

const SEVERITY_TAG = /\[\s*(?:INFO|WARNING|ERROR)\s*\]/;
const EXIT_CODE = /[:=]\s*(-?\d+)/;

function parseExitCode(text: string, sentinel: string): number | null {
  const tail = text.slice(text.indexOf(sentinel) + sentinel.length);
  const match = EXIT_CODE.exec(tail);
  if (!match) return null;
  const value = Number(match[1]);
  return Number.isInteger(value) ? value : null;
}

/**
 * Single linear pass over the normalized log.
 *
 * Every line is tested against every marker, so one line can close more than one
 * phase. Everything after the exit sentinel still produces marker events, but it no
 * longer counts toward the "last timestamp" figures used for total inference time.
 */
export function scanLog(lines: readonly LogLine[], compiled: CompiledMarkers = compileMarkerSet()): LogScan {
  const events: MarkerEvent[] = [];
  let firstTimestampMs: number | null = null;
  let lastSeverityTimestampMs: number | null = null;
  let lastTeardownTimestampMs: number | null = null;
  let lastTimestampBeforeExitMs: number | null = null;
  let exitCode: number | null = null;
  let sawExit = false;
  let bandwidthBlock: string[] | null = null;
  let inBandwidthBlock = false;

  for (const line of lines) {
    const { text, timestampMs } = line;

    if (inBandwidthBlock) {
      if (text.trim() === "") {
        inBandwidthBlock = false;
      } else {
        bandwidthBlock?.push(text);
      }
    } else if (bandwidthBlock === null && text.includes(compiled.bandwidthHeader)) {
      bandwidthBlock = [text];
      inBandwidthBlock = true;
    }

    if (firstTimestampMs === null && timestampMs !== null) firstTimestampMs = timestampMs;

    if (!sawExit && text.includes(compiled.exitSentinel)) {
      sawExit = true;
      exitCode = parseExitCode(text, compiled.exitSentinel);
    }

    if (!sawExit && timestampMs !== null) {
      lastTimestampBeforeExitMs = timestampMs;
      if (SEVERITY_TAG.test(text)) lastSeverityTimestampMs = timestampMs;
    }

    if (compiled.teardown.some((pattern) => text.includes(pattern))) {
      if (timestampMs !== null) lastTeardownTimestampMs = timestampMs;
    }

    for (const marker of compiled.markers) {
      if (!text.includes(marker.pattern)) continue;
      events.push({ label: marker.label, kind: marker.kind, timestampMs, lineIndex: line.index });
    }
  }

  return {
    events,
    lineCount: lines.length,
    firstTimestampMs,
    lastSeverityTimestampMs,
    lastTeardownTimestampMs,
    lastTimestampBeforeExitMs,
    exitCode,
    bandwidthBlock,
  };
}
