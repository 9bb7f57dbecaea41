import { IndexingConfigSchema, type IndexingConfig } from "@vidx/contracts";
import { getVidxDefault } from "./defaults";

function clean(s: unknown): string {
  return typeof s === "string" ? s.trim() : "";
}

function parseNumberList(raw: string): number[] {
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean)
    .map(Number);
}

function parseBool(raw: string): boolean | undefined {
  const v = raw.toLowerCase();
  if (v === "1" || v === "true" || v === "yes") return true;
  if (v === "0" || v === "false" || v === "no") return false;
  return undefined;
}

function parseOptionalNumber(raw: string): number | undefined {
  return raw ? Number(raw) : undefined;
}

/**
 * Read indexing settings from env, falling back to .env / .env.example defaults.
 * Throws a ZodError on malformed values.
 */
export function loadIndexingConfig(
  env: Record<string, string | undefined> = process.env,
  overrides?: Partial<IndexingConfig>,
): IndexingConfig {
  const thresholdsRaw = clean(env.VIDX_SCENE_THRESHOLDS);
  const clampRaw = clean(env.VIDX_SAMPLE_CLAMP);
  const dedupeRaw = clean(env.VIDX_SAMPLE_DEDUPE);
  const clamp = clampRaw ? parseBool(clampRaw) : undefined;
  const dedupe = dedupeRaw ? parseBool(dedupeRaw) : undefined;
  if (clampRaw && clamp === undefined) throw new Error(`invalid VIDX_SAMPLE_CLAMP: ${clampRaw}`);
  if (dedupeRaw && dedupe === undefined) throw new Error(`invalid VIDX_SAMPLE_DEDUPE: ${dedupeRaw}`);

  return IndexingConfigSchema.parse({
    collection: clean(env.VIDX_COLLECTION) || getVidxDefault("VIDX_COLLECTION"),
    sceneThresholds: thresholdsRaw ? parseNumberList(thresholdsRaw) : undefined,
    minSceneLength: parseOptionalNumber(clean(env.VIDX_MIN_SCENE_LENGTH)),
    sampling: {
      count: parseOptionalNumber(clean(env.VIDX_SAMPLES_PER_SCENE)),
      clamp,
      dedupe,
    },
    duplicatePolicy: clean(env.VIDX_DUPLICATE_POLICY) || undefined,
    dimensions: Number(clean(env.VIDX_EMBED_DIMENSIONS) || getVidxDefault("VIDX_EMBED_DIMENSIONS")),
    matchedDir: clean(env.VIDX_MATCHED_DIR) || getVidxDefault("VIDX_MATCHED_DIR"),
    ...overrides,
  });
}
