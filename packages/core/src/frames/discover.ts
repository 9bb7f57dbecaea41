import fs from "fs/promises";
import path from "path";
import { DEFAULT_VIDEO_EXTENSIONS } from "@vidx/contracts";
import { fail, ok, toPipelineError, type Result } from "../errors";

/**
 * List video files directly inside `dir` (not recursive), sorted by path.
 */
export async function findVideos(
  dir: string,
  extensions: readonly string[] = DEFAULT_VIDEO_EXTENSIONS,
): Promise<Result<string[]>> {
  const wanted = new Set(extensions.map((e) => e.toLowerCase()));
  const entries = await fs
    .readdir(dir, { withFileTypes: true })
    .catch((err: unknown) => (err instanceof Error ? err : new Error(String(err))));
  if (entries instanceof Error) {
    if ("code" in entries && (entries.code === "ENOENT" || entries.code === "ENOTDIR")) {
      return fail("input_not_found", `Directory not found: ${dir}`, { details: { directory: dir } });
    }
    return { ok: false, error: toPipelineError("input_not_found", entries, { directory: dir }) };
  }

  const videos = entries
    .filter((e) => e.isFile() && wanted.has(path.extname(e.name).toLowerCase()))
    .map((e) => path.join(dir, e.name))
    .sort();
  return ok(videos);
}
