import { readFileSync } from "fs";

import { buildCollectUsage, runCollectCommand } from "./commands/collect";
import { buildExtractUsage, runExtractCommand } from "./commands/extract";
import { buildInitUsage, runInitCommand } from "./commands/init";
import { buildProfileUsage, runProfileCommand } from "./commands/profile";

function getVersion(): string {
  try {
    const pkgPath = new URL("../package.json", import.meta.url);
    const raw = readFileSync(pkgPath, "utf8");
    const parsed: unknown = JSON.parse(raw);
    if (parsed && typeof parsed === "object" && "version" in parsed && typeof parsed.version === "string") return parsed.version;
  } catch (error) {
    console.warn(`[qnn-metrics] Could not read package version: ${error instanceof Error ? error.message : String(error)}`);
  }
  return "unknown";
}

export function buildGlobalHelp(): string {
  return [
    "QNN metrics (qnn-metrics)",
    "",
    "Usage:",
    "  qnn-metrics extract <run-folder> [-v]      Parse a run log into metrics.csv and input_times.csv",
    "  qnn-metrics init <run-folder> ...          Create the initial metrics.csv for a run",
    "  qnn-metrics collect <run-folder>... -o P   Compile runs into batch CSV files",
    "  qnn-metrics profile <file> [--json|--csv]  Parse a binary profiling dump",
    "",
    "Options:",
    "  -h, --help                                 Show help (also: qnn-metrics help [command])",
    "  --version                                  Print version and exit",
    "",
    "Environment:",
    "  PROJECT_ROOT    Project directory (otherwise names.project from ./config.json)",
    "  QUALCOMM_ROOT   Toolkit root holding projects/<name>",
    "  NO_COLOR        Disable colored status output",
  ].join("\n");
}

const COMMAND_USAGE: Record<string, () => string> = {
  extract: buildExtractUsage,
  init: buildInitUsage,
  collect: buildCollectUsage,
  profile: buildProfileUsage,
};

export function buildCommandHelp(command: string): string {
  const usage = COMMAND_USAGE[command];
  return usage ? usage() : buildGlobalHelp();
}

export async function main(args: string[]): Promise<number> {
  const cmd = args[0];
  const rest = args.slice(1);
  const hasHelpFlag = args.includes("-h") || args.includes("--help");

  if (args.includes("--version")) {
    console.log(getVersion());
    return 0;
  }

  if (cmd === "help") {
    const target = rest[0];
    console.log(!target || target.startsWith("-") ? buildGlobalHelp() : buildCommandHelp(target));
    return 0;
  }

  if (!cmd || cmd.startsWith("-")) {
    if (hasHelpFlag) {
      console.log(buildGlobalHelp());
      return 0;
    }
    console.error(buildGlobalHelp());
    return 1;
  }

  if (hasHelpFlag) {
    console.log(buildCommandHelp(cmd));
    return 0;
  }

  switch (cmd) {
    case "extract":
      console.log("");
      console.log("=========================");
      console.log("QNN Metrics Extraction :");
      console.log("=========================");
      return await runExtractCommand({ args: rest });
    case "init":
      return await runInitCommand({ args: rest });
    case "collect":
      return await runCollectCommand({ args: rest });
    case "profile":
      return await runProfileCommand({ args: rest });
    default:
      console.error(`[qnn-metrics] Unknown command: ${cmd}`);
      console.error(buildGlobalHelp());
      return 1;
  }
}
