import { existsSync } from "fs";
import { readFile } from "fs/promises";
import { isAbsolute, join } from "path";

import { StatusLogger } from "../logging";
import { formatProfilingCsv, formatProfilingJson, formatProfilingText, parseProfilingDump } from "../profiling";
import { parseArgs } from "./args";
import type { CommandContext } from "./extract";

export function buildProfileUsage(): string {
  return [
    "Usage:",
    "  qnn-metrics profile <file> [--json|--csv] [--no-derived] [--raw-details]",
    "",
    "Extracts timing and counter values from a binary profiling dump.",
    "",
    "Options:",
    "  --json          Emit JSON.",
    "  --csv           Emit one CSV header row and one value row.",
    "  --no-derived    Skip derived metrics (throughput, efficiency, overhead).",
    "  --raw-details   Append the string/offset each value was read from (text output).",
  ].join("\n");
}

export async function runProfileCommand(ctx: CommandContext): Promise<number> {
  const parsed = parseArgs(ctx.args, {
    flags: ["--json", "--csv", "--no-derived", "--raw-details"],
  });
  const logger = ctx.logger ?? new StatusLogger();

  const [file, ...extra] = parsed.positionals;
  if (parsed.invalid.length > 0 || !file || extra.length > 0 || (parsed.flags.has("--json") && parsed.flags.has("--csv"))) {
    logger.plain(buildProfileUsage());
    return 1;
  }

  const cwd = ctx.cwd ?? process.cwd();
  const path = isAbsolute(file) ? file : join(cwd, file);
  if (!existsSync(path)) {
    logger.error(`File ${file} does not exist`);
    return 1;
  }

  const report = parseProfilingDump(await readFile(path), file);
  const includeDerived = !parsed.flags.has("--no-derived");

  let output: string;
  if (parsed.flags.has("--json")) output = formatProfilingJson(report, { includeDerived });
  else if (parsed.flags.has("--csv")) output = formatProfilingCsv(report, { includeDerived });
  else output = formatProfilingText(report, { includeDerived, rawDetails: parsed.flags.has("--raw-details") });

  if (output) logger.plain(output.replace(/\n$/, ""));
  return 0;
}
