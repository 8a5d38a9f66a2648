import { readFileSync } from "fs";

import { formatSchemaIssues, getSchemaValidator } from "../metrics/schema";
import type { ProfileMetricPattern } from "./types";

const PATTERNS_SCHEMA = "profile-patterns.schema.json";

// Offsets (in bytes, relative to the string start) where the 32-bit value tends to sit.
export const SEARCH_OFFSETS: readonly number[] = [
  16, 20, 28, 36, 40, 52, 56, 64,
  -12, -16, -20, -28, -36, -40, -52, -56, -64, -68, -72, -76, -80, -84, -88, -92, -96, -100,
  8, 12, 24, 32, 44, 48, 60, 68, 72, 76, 80, 84, 88, 92, 96, 100,
];

export const MAX_COUNTER_VALUE = 1_000_000;
export const MAX_TIMING_VALUE = 10_000_000;

function isPatternList(value: unknown): value is ProfileMetricPattern[] {
  return getSchemaValidator(PATTERNS_SCHEMA)(value);
}

export function parseProfilePatterns(value: unknown, source = "profile patterns"): ProfileMetricPattern[] {
  if (!isPatternList(value)) {
    throw new Error(`Invalid ${source}: ${formatSchemaIssues(getSchemaValidator(PATTERNS_SCHEMA).errors)}`);
  }
  return value;
}

let defaultPatterns: ProfileMetricPattern[] | null = null;

export function getDefaultProfilePatterns(): ProfileMetricPattern[] {
  if (defaultPatterns) return defaultPatterns;
  const url = new URL("../../data/profile-patterns.json", import.meta.url);
  defaultPatterns = parseProfilePatterns(JSON.parse(readFileSync(url, "utf8")), url.pathname);
  return defaultPatterns;
}
