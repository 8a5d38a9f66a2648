import { dirname, isAbsolute, join } from "path";
import { mkdir } from "fs/promises";

import { loadToolkitConfig } from "../config";
import { StatusLogger } from "../logging";
import { compileBatch } from "../metrics";
import { getRunMetricsDir, resolveProjectRoot } from "../paths";
import { parseArgs } from "./args";
import type { CommandContext } from "./extract";

export function buildCollectUsage(): string {
  return [
    "Usage:",
    "  qnn-metrics collect <run-folder>... --output <prefix>",
    "",
    "Compiles the metrics.csv data row and input_times.csv rows of each run into",
    "<prefix>_metrics.csv and <prefix>_input_times.csv.",
  ].join("\n");
}

export async function runCollectCommand(ctx: CommandContext): Promise<number> {
  const parsed = parseArgs(ctx.args, {
    valueOptions: ["--output"],
    aliases: { "-o": "--output" },
  });
  const logger = ctx.logger ?? new StatusLogger();

  if (parsed.invalid.length > 0) {
    logger.error(`Unknown option: ${parsed.invalid.join(", ")}`);
    logger.plain(buildCollectUsage());
    return 1;
  }

  const outputRaw = parsed.values.get("--output");
  if (parsed.positionals.length === 0 || !outputRaw) {
    logger.error("collect requires at least one <run-folder> and --output");
    logger.plain(buildCollectUsage());
    return 1;
  }

  const cwd = ctx.cwd ?? process.cwd();
  const projectRoot = resolveProjectRoot({ config: loadToolkitConfig(cwd), env: ctx.env, cwd });
  if (!projectRoot) {
    logger.error("PROJECT_ROOT not set and could not determine from config.json");
    return 1;
  }

  const outputPrefix = isAbsolute(outputRaw) ? outputRaw : join(cwd, outputRaw);
  await mkdir(dirname(outputPrefix), { recursive: true });

  const result = await compileBatch({
    runs: parsed.positionals.map((runId) => ({ runId, metricsDir: getRunMetricsDir(projectRoot, runId) })),
    outputPrefix,
  });

  for (const skip of result.skipped) logger.warn(skip.reason);
  logger.success(`Compiled ${result.runCount} run(s), ${result.detailRowCount} input time row(s)`);
  logger.info(`Metrics: ${result.summaryPath}`);
  logger.info(`Input times: ${result.detailPath}`);
  return result.runCount > 0 ? 0 : 1;
}
