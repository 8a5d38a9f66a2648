import { calculateDerivedMetrics, isFractionalDerivedMetric } from "./core";
import type { DerivedMetrics, ProfileExtractionDetail, ProfilingReport } from "./types";

function formatOffset(offset: number): string {
  return offset >= 0 ? `+${offset}` : String(offset);
}

function formatHex(position: number): string {
  return `0x${position.toString(16).padStart(4, "0")}`;
}

function formatDerivedValue(key: string, value: number): string {
  return isFractionalDerivedMetric(key) ? value.toFixed(3) : String(value);
}

/** Plain decimal form; fractional derived values keep a `.0` when whole. */
function formatCsvValue(key: string, value: number, derived: boolean): string {
  if (derived && isFractionalDerivedMetric(key) && Number.isInteger(value)) return `${value}.0`;
  return String(value);
}

function byKey(a: { key: string }, b: { key: string }): number {
  return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
}

function derivedFor(report: ProfilingReport, includeDerived: boolean): DerivedMetrics {
  if (!includeDerived || Object.keys(report.metrics).length === 0) return {};
  return calculateDerivedMetrics(report.metrics);
}

function formatDetailLine(detail: ProfileExtractionDetail): string {
  return (
    `DETAIL: pattern='${detail.pattern}' key=${detail.key} value=${detail.value} ` +
    `string_pos=${formatHex(detail.stringPosition)} offset=${formatOffset(detail.offsetUsed)} ` +
    `extract_pos=${formatHex(detail.extractionPosition)} type=${detail.type}`
  );
}

export function formatProfilingText(report: ProfilingReport, options: { includeDerived: boolean; rawDetails: boolean }): string {
  const lines: string[] = [];
  lines.push("QNN_PROFILING_PARSE_RESULTS");
  lines.push("=".repeat(60));
  lines.push(`FILE_INFO: path = ${report.fileInfo.path}`);
  lines.push(`FILE_INFO: size_bytes = ${report.fileInfo.sizeBytes}`);
  lines.push(`FILE_INFO: backend_version = ${report.fileInfo.backendVersion || "unknown"}`);
  lines.push(`FILE_INFO: graph_name = ${report.fileInfo.graphName || "unknown"}`);
  lines.push(`EXTRACT_INFO: strings_found = ${report.extraction.stringsFound}`);
  lines.push(`EXTRACT_INFO: metrics_extracted = ${report.extraction.metricsExtracted}`);
  lines.push(`EXTRACT_INFO: failed_extractions = ${report.extraction.failedExtractions.length}`);

  if (report.details.length > 0) {
    lines.push("");
    lines.push("EXTRACTED_METRICS:");
    lines.push("-".repeat(30));
    const timing = report.details.filter((detail) => detail.type === "timing").sort(byKey);
    const counters = report.details.filter((detail) => detail.type === "counter").sort(byKey);
    for (const detail of timing) {
      lines.push(`TIMING_METRIC: ${detail.key} = ${detail.value} ${detail.unit} [offset=${formatOffset(detail.offsetUsed)}]`);
    }
    for (const detail of counters) {
      lines.push(`COUNTER_METRIC: ${detail.key} = ${detail.value} ${detail.unit} [offset=${formatOffset(detail.offsetUsed)}]`);
    }
  }

  const derived = derivedFor(report, options.includeDerived);
  const derivedKeys = Object.keys(derived).sort();
  if (derivedKeys.length > 0) {
    lines.push("");
    lines.push("DERIVED_METRICS:");
    lines.push("-".repeat(20));
    for (const key of derivedKeys) {
      lines.push(`DERIVED_METRIC: ${key} = ${formatDerivedValue(key, derived[key] ?? 0)}`);
    }
  }

  if (report.extraction.failedExtractions.length > 0) {
    lines.push("");
    lines.push("FAILED_EXTRACTIONS:");
    lines.push("-".repeat(25));
    for (const failed of report.extraction.failedExtractions) {
      lines.push(`FAILED_EXTRACTION: ${failed}`);
    }
  }

  if (options.rawDetails) {
    lines.push("");
    lines.push("RAW_EXTRACTION_DETAILS:");
    lines.push("-".repeat(30));
    for (const detail of report.details) lines.push(formatDetailLine(detail));
  }

  return `${lines.join("\n")}\n`;
}

export function formatProfilingJson(report: ProfilingReport, options: { includeDerived: boolean }): string {
  const derived = derivedFor(report, options.includeDerived);
  const output = {
    file_info: {
      path: report.fileInfo.path,
      size_bytes: report.fileInfo.sizeBytes,
      backend_version: report.fileInfo.backendVersion,
      graph_name: report.fileInfo.graphName,
    },
    extraction_info: {
      strings_found: report.extraction.stringsFound,
      metrics_extracted: report.extraction.metricsExtracted,
      failed_extractions: report.extraction.failedExtractions,
    },
    metrics: report.metrics,
    raw_extraction_details: report.details.map((detail) => ({
      pattern: detail.pattern,
      key: detail.key,
      value: detail.value,
      string_position: formatHex(detail.stringPosition),
      offset_used: detail.offsetUsed,
      extraction_position: formatHex(detail.extractionPosition),
      unit: detail.unit,
      type: detail.type,
    })),
    ...(options.includeDerived && Object.keys(report.metrics).length > 0 ? { derived_metrics: derived } : {}),
  };
  return `${JSON.stringify(output, null, 2)}\n`;
}

export function formatProfilingCsv(report: ProfilingReport, options: { includeDerived: boolean }): string {
  const derived = derivedFor(report, options.includeDerived);
  const all: Record<string, number> = { ...report.metrics, ...derived };
  const headers = Object.keys(all).sort();
  if (headers.length === 0) return "";
  const values = headers.map((key) => formatCsvValue(key, all[key] ?? 0, key in derived));
  return `${headers.join(",")}\n${values.join(",")}\n`;
}
