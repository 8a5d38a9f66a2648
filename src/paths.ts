import { isAbsolute, join } from "path";

import type { ToolkitConfig } from "./config";

function resolveFromCwd(raw: string, cwd: string): string {
  return isAbsolute(raw) ? raw : join(cwd, raw);
}

/**
 * `PROJECT_ROOT` wins; otherwise the configured project name is placed under
 * `$QUALCOMM_ROOT/projects` (or `../projects` relative to the working directory).
 */
export function resolveProjectRoot(params: {
  config: ToolkitConfig;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}): string | null {
  const env = params.env ?? process.env;
  const cwd = params.cwd ?? process.cwd();

  const explicit = env.PROJECT_ROOT?.trim();
  if (explicit) return resolveFromCwd(explicit, cwd);

  const projectName = params.config.projectName;
  if (!projectName) return null;

  const toolkitRoot = env.QUALCOMM_ROOT?.trim();
  if (toolkitRoot) return join(resolveFromCwd(toolkitRoot, cwd), "projects", projectName);
  return join(cwd, "..", "projects", projectName);
}

export function getRunMetricsDir(projectRoot: string, runFolder: string): string {
  return join(projectRoot, "outputs", runFolder, "metrics");
}
