import { randomUUID } from "crypto";
import { createReadStream, existsSync } from "fs";
import { rename, rm, writeFile } from "fs/promises";
import { basename, dirname, join } from "path";

export type LogTextResult = {
  text: string;
  missing: boolean;
  error?: string;
};

export async function readLogText(params: { path: string }): Promise<LogTextResult> {
  const result: LogTextResult = {
    text: "",
    missing: false,
  };

  if (!existsSync(params.path)) {
    result.missing = true;
    return result;
  }

  const chunks: string[] = [];

  return await new Promise<LogTextResult>((resolve) => {
    let resolved = false;
    const stream = createReadStream(params.path, { encoding: "utf8" });

    const finalize = () => {
      if (resolved) return;
      resolved = true;
      result.text = result.error === undefined ? chunks.join("") : "";
      resolve(result);
    };

    stream.on("data", (chunk: string | Buffer) => {
      chunks.push(typeof chunk === "string" ? chunk : chunk.toString("utf8"));
    });

    stream.on("error", (err: unknown) => {
      result.error = err instanceof Error ? err.message : String(err);
      finalize();
    });

    stream.on("end", finalize);
  });
}

/** Writes through a sibling temp file and renames it into place; the temp file never outlives the call. */
export async function writeFileAtomic(path: string, contents: string): Promise<void> {
  const tempPath = join(dirname(path), `.${basename(path)}.${randomUUID()}.tmp`);
  try {
    await writeFile(tempPath, contents, "utf8");
    await rename(tempPath, path);
  } finally {
    await rm(tempPath, { force: true });
  }
}
