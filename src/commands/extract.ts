import { existsSync, statSync } from "fs";

import { loadToolkitConfig } from "../config";
import { StatusLogger } from "../logging";
import { extractRunMetrics, getRunMetricsPaths, isMetricsError, loadMarkerSet, type MarkerSet } from "../metrics";
import { formatSummaryLines, formatUnitLines } from "../metrics/render";
import { getRunMetricsDir, resolveProjectRoot } from "../paths";
import { parseArgs } from "./args";

export function buildExtractUsage(): string {
  return [
    "Usage:",
    "  qnn-metrics extract <run-folder> [-v|--verbose] [--markers <file>]",
    "",
    "Parses <project>/outputs/<run-folder>/metrics/qnn_output.txt, merges the timing,",
    "statistics and DDR bandwidth columns into metrics.csv and writes input_times.csv.",
    "",
    "Options:",
    "  -v, --verbose      Print per-input times and every extracted value.",
    "  --markers <file>   JSON marker set overriding the default log markers.",
  ].join("\n");
}

export type CommandContext = {
  args: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  logger?: StatusLogger;
};

export async function runExtractCommand(ctx: CommandContext): Promise<number> {
  const parsed = parseArgs(ctx.args, {
    valueOptions: ["--markers"],
    flags: ["--verbose"],
    aliases: { "-v": "--verbose" },
  });
  const logger = ctx.logger ?? new StatusLogger({ verbose: parsed.flags.has("--verbose") });

  if (parsed.invalid.length > 0) {
    logger.error(`Unknown option: ${parsed.invalid.join(", ")}`);
    logger.plain(buildExtractUsage());
    return 1;
  }

  const [runFolder, ...extra] = parsed.positionals;
  if (!runFolder) {
    logger.error("QNN run folder not specified");
    logger.plain(buildExtractUsage());
    return 1;
  }
  if (extra.length > 0) {
    logger.error("Too many arguments");
    logger.plain(buildExtractUsage());
    return 1;
  }

  const cwd = ctx.cwd ?? process.cwd();
  logger.info("Setting up environment");
  const config = loadToolkitConfig(cwd);
  const projectRoot = resolveProjectRoot({ config, env: ctx.env, cwd });
  if (!projectRoot) {
    logger.error("PROJECT_ROOT not set and could not determine from config.json");
    return 1;
  }
  logger.success("Environment configured");

  logger.info("Validating inputs");
  const metricsDir = getRunMetricsDir(projectRoot, runFolder);
  if (!existsSync(metricsDir) || !statSync(metricsDir).isDirectory()) {
    logger.error(`Metrics directory not found: ${metricsDir}`);
    return 1;
  }
  const paths = getRunMetricsPaths(metricsDir);
  if (!existsSync(paths.logPath)) {
    logger.error(`QNN output file not found: ${paths.logPath}`);
    return 1;
  }
  if (!existsSync(paths.summaryPath)) {
    logger.error(`Metrics CSV not found: ${paths.summaryPath}`);
    return 1;
  }
  logger.success("All inputs validated");

  try {
    const markersPath = parsed.values.get("--markers") ?? config.markersPath;
    let markers: MarkerSet | undefined;
    if (markersPath) {
      markers = loadMarkerSet(markersPath);
      logger.detail(`Using marker set: ${markersPath}`);
    }

    const result = await extractRunMetrics({ ...paths, markers });

    for (const line of formatUnitLines(result.units)) logger.detail(line);
    logger.success(`Extracted ${result.units.length} execution times`);
    for (const diagnostic of result.diagnostics) logger.warn(diagnostic.message);
    for (const line of formatSummaryLines(result.summary)) logger.detail(line);

    logger.success("Metrics extraction completed successfully");
    logger.info(`Updated: ${result.summaryPath}`);
    logger.info(`Created: ${result.detailPath}`);
    return 0;
  } catch (error) {
    if (isMetricsError(error)) {
      logger.error(error.message);
    } else {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Metrics extraction failed: ${message}`);
    }
    return 1;
  }
}
