export { calculateDerivedMetrics, extractPrintableStrings, findMetricValue, isFractionalDerivedMetric, parseProfilingDump, readUint32LE } from "./core";
export { getDefaultProfilePatterns, parseProfilePatterns, SEARCH_OFFSETS } from "./patterns";
export { formatProfilingCsv, formatProfilingJson, formatProfilingText } from "./render";
export type { DerivedMetrics, ProfileExtractionDetail, ProfileMetricPattern, ProfilingReport } from "./types";
