import { existsSync, readFileSync } from "fs";
import { isAbsolute, join } from "path";

export interface ToolkitConfig {
  /** Project name under `<root>/projects/`. */
  projectName: string | null;
  /** Marker set file used by `extract`, relative to the config file's directory. */
  markersPath: string | null;
}

const DEFAULT_CONFIG: ToolkitConfig = {
  projectName: null,
  markersPath: null,
};

export const CONFIG_FILE_NAME = "config.json";

function toNonEmptyStringOrNull(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function warnInvalid(field: string, raw: unknown): void {
  console.warn(`[qnn-metrics] Invalid config ${field}=${JSON.stringify(raw)}; ignoring`);
}

export function parseToolkitConfig(raw: unknown, baseDir: string): ToolkitConfig {
  if (!isRecord(raw)) {
    warnInvalid("(root)", raw);
    return { ...DEFAULT_CONFIG };
  }

  const config: ToolkitConfig = { ...DEFAULT_CONFIG };

  const names = raw.names;
  if (isRecord(names)) {
    const projectName = toNonEmptyStringOrNull(names.project);
    // jq prints "null" for a missing key, and older setups wrote that string back.
    if (projectName && projectName !== "null") config.projectName = projectName;
    else if (names.project !== undefined) warnInvalid("names.project", names.project);
  } else if (names !== undefined) {
    warnInvalid("names", names);
  }

  const metrics = raw.metrics;
  if (isRecord(metrics)) {
    const markersPath = toNonEmptyStringOrNull(metrics.markersPath);
    if (markersPath) config.markersPath = isAbsolute(markersPath) ? markersPath : join(baseDir, markersPath);
    else if (metrics.markersPath !== undefined) warnInvalid("metrics.markersPath", metrics.markersPath);
  } else if (metrics !== undefined) {
    warnInvalid("metrics", metrics);
  }

  return config;
}

export function loadToolkitConfig(cwd: string = process.cwd()): ToolkitConfig {
  const path = join(cwd, CONFIG_FILE_NAME);
  if (!existsSync(path)) return { ...DEFAULT_CONFIG };

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[qnn-metrics] Failed to parse ${path}: ${message}`);
    return { ...DEFAULT_CONFIG };
  }

  return parseToolkitConfig(parsed, cwd);
}
