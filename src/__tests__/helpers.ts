import { readFileSync } from "fs";
import { mkdir, mkdtemp, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

import { StatusLogger } from "../logging";

export function readFixture(name: string): string {
  return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), "utf8");
}

export async function makeTempDir(prefix = "qnn-metrics-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/** Creates `<root>/outputs/<runFolder>/metrics` holding the given files. */
export async function writeRunFiles(root: string, runFolder: string, files: Record<string, string>): Promise<string> {
  const metricsDir = join(root, "outputs", runFolder, "metrics");
  await mkdir(metricsDir, { recursive: true });
  for (const [name, contents] of Object.entries(files)) {
    await writeFile(join(metricsDir, name), contents, "utf8");
  }
  return metricsDir;
}

export function captureLogger(options: { verbose?: boolean } = {}): { logger: StatusLogger; out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  const logger = new StatusLogger({
    verbose: options.verbose,
    sink: {
      out: (line) => out.push(line),
      err: (line) => err.push(line),
    },
  });
  return { logger, out, err };
}

export function logLines(lines: string[]): string {
  return `${lines.join("\n")}\n`;
}
