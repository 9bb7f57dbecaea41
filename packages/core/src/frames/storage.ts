import fs from "fs/promises";
import path from "path";

/**
 * Where matched frames get written. One directory per query under `baseDir`.
 */
export interface MatchedFrameStore {
  dirFor(query: string): string;
  save(query: string, fileName: string, data: Buffer): Promise<string>;
}

/**
 * Replace path-unsafe characters (separators, whitespace, reserved punctuation) with `_`.
 */
export function sanitizeQueryDir(query: string): string {
  const cleaned = query.trim().replace(/[\s/\\:*?"<>|\x00-\x1f]/g, "_");
  if (!cleaned || /^\.+$/.test(cleaned)) return "query";
  return cleaned;
}

export function matchedFrameFileName(rank: number, frameId: string, similarity: number): string {
  return `${String(rank).padStart(2, "0")}_${frameId}_similarity_${similarity.toFixed(3)}.jpg`;
}

export class LocalMatchedFrameStore implements MatchedFrameStore {
  constructor(private readonly baseDir: string) {}

  dirFor(query: string): string {
    return path.join(this.baseDir, sanitizeQueryDir(query));
  }

  async save(query: string, fileName: string, data: Buffer): Promise<string> {
    const dir = this.dirFor(query);
    await fs.mkdir(dir, { recursive: true });
    const filePath = path.join(dir, fileName);
    await fs.writeFile(filePath, data);
    return filePath;
  }
}

export function createMatchedFrameStore(baseDir?: string): MatchedFrameStore {
  const dir = baseDir || process.env.VIDX_MATCHED_DIR || "matched_imgs";
  return new LocalMatchedFrameStore(dir);
}
