import { existsSync } from "fs";
import { mkdir } from "fs/promises";

import { loadToolkitConfig } from "../config";
import { StatusLogger } from "../logging";
import { createInitialSummaryRecord, getRunMetricsPaths } from "../metrics";
import { writeFileAtomic } from "../metrics/io";
import { getRunMetricsDir, resolveProjectRoot } from "../paths";
import { parseArgs } from "./args";
import type { CommandContext } from "./extract";

export function buildInitUsage(): string {
  return [
    "Usage:",
    "  qnn-metrics init <run-folder> --model <name> --backend <name> --device <id> [--perf-profile <name>] [--force]",
    "",
    "Creates <project>/outputs/<run-folder>/metrics/metrics.csv with the run columns filled",
    "in and placeholders for the metrics that `extract` fills later.",
    "",
    "Options:",
    "  --perf-profile <name>   Performance profile recorded for the run (default: default).",
    "  --force                 Overwrite an existing metrics.csv.",
  ].join("\n");
}

export async function runInitCommand(ctx: CommandContext & { now?: Date }): Promise<number> {
  const parsed = parseArgs(ctx.args, {
    valueOptions: ["--model", "--backend", "--device", "--perf-profile"],
    flags: ["--force"],
  });
  const logger = ctx.logger ?? new StatusLogger();

  if (parsed.invalid.length > 0) {
    logger.error(`Unknown option: ${parsed.invalid.join(", ")}`);
    logger.plain(buildInitUsage());
    return 1;
  }

  const [runFolder, ...extra] = parsed.positionals;
  const model = parsed.values.get("--model");
  const backend = parsed.values.get("--backend");
  const device = parsed.values.get("--device");
  if (!runFolder || extra.length > 0 || !model || !backend || !device) {
    logger.error("init requires <run-folder>, --model, --backend and --device");
    logger.plain(buildInitUsage());
    return 1;
  }

  const cwd = ctx.cwd ?? process.cwd();
  const projectRoot = resolveProjectRoot({ config: loadToolkitConfig(cwd), env: ctx.env, cwd });
  if (!projectRoot) {
    logger.error("PROJECT_ROOT not set and could not determine from config.json");
    return 1;
  }

  const metricsDir = getRunMetricsDir(projectRoot, runFolder);
  const { summaryPath } = getRunMetricsPaths(metricsDir);
  if (existsSync(summaryPath) && !parsed.flags.has("--force")) {
    logger.error(`Metrics CSV already exists: ${summaryPath} (use --force to overwrite)`);
    return 1;
  }

  logger.info("Creating initial CSV structure");
  await mkdir(metricsDir, { recursive: true });
  const now = ctx.now ?? new Date();
  await writeFileAtomic(
    summaryPath,
    createInitialSummaryRecord({
      timestamp: now.toISOString(),
      runId: runFolder,
      model,
      backend,
      device,
      perfProfile: parsed.values.get("--perf-profile") ?? "default",
    })
  );
  logger.success(`Initial CSV structure created: ${summaryPath}`);
  return 0;
}
