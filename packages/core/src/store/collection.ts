import type {
  CollectionInfo,
  DuplicatePolicy,
  FailureKind,
  FrameMetadataFilter,
  FrameRecord,
  InsertOutcome,
  QueryResult,
  VideoSummary,
} from "@vidx/contracts";
import { fail, ok, toPipelineError, type Result } from "../errors";
import type { Logger } from "../logger";
import type { CollectionRow, FrameEmbeddingRepo } from "../repos/frame-embeddings";
import { withRetry, type RetryOpts } from "../util/retry";

type WriteStep =
  | { kind: "rejected"; duplicates: string[] }
  | { kind: "written"; written: number; countBefore: number; countAfter: number; replaced: string[] };

export type FrameCollectionOpts = {
  name: string;
  dimensions: number;
  duplicatePolicy?: DuplicatePolicy;
  retry?: RetryOpts;
  logger?: Logger;
};

/**
 * Store adapter for one named collection. Every entry point resolves to a
 * Result; storage errors never escape as exceptions.
 */
export class FrameCollection {
  readonly name: string;
  readonly dimensions: number;
  readonly duplicatePolicy: DuplicatePolicy;
  private readonly retry: RetryOpts | undefined;
  private readonly logger: Logger | undefined;
  private collection: Promise<CollectionRow> | null = null;

  constructor(
    private readonly repo: FrameEmbeddingRepo,
    opts: FrameCollectionOpts,
  ) {
    this.name = opts.name;
    this.dimensions = opts.dimensions;
    this.duplicatePolicy = opts.duplicatePolicy ?? "upsert";
    this.retry = opts.retry;
    this.logger = opts.logger;
  }

  private call<T>(fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, {
      ...this.retry,
      onRetry: (attempt, error, delayMs) => {
        this.logger?.warn({ collection: this.name, attempt, delayMs, err: error.message }, "Retrying store call");
        this.retry?.onRetry?.(attempt, error, delayMs);
      },
    });
  }

  // Created on first access; a failed attempt is not cached.
  private ensure(): Promise<CollectionRow> {
    if (!this.collection) {
      this.collection = this.call(() => this.repo.ensureCollection(this.name, this.dimensions)).catch((err: unknown) => {
        this.collection = null;
        throw err;
      });
    }
    return this.collection;
  }

  private async guarded<T>(kind: FailureKind, details: Record<string, unknown>, fn: () => Promise<T>): Promise<Result<T>> {
    try {
      const row = await this.ensure();
      if (row.dimensions !== this.dimensions) {
        return fail(kind, `collection ${this.name} holds ${row.dimensions}-dim vectors, configured for ${this.dimensions}`, {
          details: { collection: this.name, ...details },
        });
      }
      return ok(await fn());
    } catch (err) {
      this.logger?.error({ collection: this.name, kind, err: err instanceof Error ? err.message : String(err) }, "Store call failed");
      return { ok: false, error: toPipelineError(kind, err, { collection: this.name, ...details }) };
    }
  }

  private checkVector(vector: readonly number[]): string | null {
    if (vector.length !== this.dimensions) return `expected ${this.dimensions} dims, got ${vector.length}`;
    if (!vector.every((x) => Number.isFinite(x))) return "vector contains non-finite values";
    return null;
  }

  async insert(records: FrameRecord[]): Promise<Result<InsertOutcome>> {
    const ids = records.map((r) => r.id);
    if (records.length === 0) {
      this.logger?.info({ collection: this.name }, "No embeddings to insert");
      const counted = await this.count();
      if (!counted.ok) return counted;
      return ok({ acted: false, written: 0, count_before: counted.value, count_after: counted.value, replaced_ids: [] });
    }

    const seen = new Set<string>();
    const repeated = new Set<string>();
    for (const id of ids) {
      if (seen.has(id)) repeated.add(id);
      seen.add(id);
    }
    if (repeated.size > 0) {
      return fail("store_write_failure", `batch contains repeated ids: ${[...repeated].join(", ")}`, {
        details: { collection: this.name, duplicate_ids: [...repeated] },
      });
    }
    for (const r of records) {
      const problem = this.checkVector(r.embedding);
      if (problem) {
        return fail("store_write_failure", `invalid embedding for ${r.id}: ${problem}`, {
          details: { collection: this.name, ids: [r.id] },
        });
      }
    }

    const step = await this.guarded("store_write_failure", { ids }, async (): Promise<WriteStep> => {
      const countBefore = await this.call(() => this.repo.countFrames(this.name));
      if (this.duplicatePolicy === "reject") {
        const existing = await this.call(() => this.repo.findExistingIds(this.name, ids));
        if (existing.length > 0) return { kind: "rejected", duplicates: existing };
      }
      const upsert = this.duplicatePolicy === "upsert";
      const replaced = upsert ? await this.call(() => this.repo.findReplacedIds(this.name, records)) : [];
      const written = await this.call(() => this.repo.writeFrames(this.name, records, upsert ? "upsert" : "insert"));
      const countAfter = await this.call(() => this.repo.countFrames(this.name));
      return { kind: "written", written, countBefore, countAfter, replaced };
    });
    if (!step.ok) return step;

    const v = step.value;
    if (v.kind === "rejected") {
      this.logger?.warn({ collection: this.name, duplicates: v.duplicates.length }, "Rejected insert with existing ids");
      return fail("store_write_failure", `${v.duplicates.length} id(s) already exist in ${this.name}`, {
        details: { collection: this.name, duplicate_ids: v.duplicates },
      });
    }

    if (v.replaced.length > 0) {
      this.logger?.warn(
        { collection: this.name, replaced: v.replaced.length, ids: v.replaced.slice(0, 10) },
        "Upsert overwrote frames stored for another video",
      );
    }
    this.logger?.info(
      { collection: this.name, written: v.written, before: v.countBefore, after: v.countAfter },
      "Inserted embeddings",
    );
    return ok({
      acted: true,
      written: v.written,
      count_before: v.countBefore,
      count_after: v.countAfter,
      replaced_ids: v.replaced,
    });
  }

  async queryByVector(vector: number[], k: number, where?: FrameMetadataFilter): Promise<Result<QueryResult>> {
    if (!Number.isInteger(k) || k < 1) return fail("store_query_failure", `k must be a positive integer, got ${k}`);
    const problem = this.checkVector(vector);
    if (problem) return fail("store_query_failure", `invalid query vector: ${problem}`, { details: { collection: this.name } });
    return this.guarded("store_query_failure", { k, where }, () =>
      this.call(() => this.repo.nearestFrames(this.name, vector, k, where)),
    );
  }

  async queryByMetadata(where: FrameMetadataFilter, k: number): Promise<Result<QueryResult>> {
    if (!Number.isInteger(k) || k < 1) return fail("store_query_failure", `k must be a positive integer, got ${k}`);
    return this.guarded("store_query_failure", { k, where }, () =>
      this.call(() => this.repo.findFramesByMetadata(this.name, where, k)),
    );
  }

  async get(ids: string[]): Promise<Result<FrameRecord[]>> {
    if (ids.length === 0) return ok([]);
    return this.guarded("store_query_failure", { ids }, () => this.call(() => this.repo.getFrames(this.name, ids)));
  }

  async getAll(): Promise<Result<FrameRecord[]>> {
    return this.guarded("store_query_failure", {}, () => this.call(() => this.repo.getFrames(this.name)));
  }

  async delete(ids: string[]): Promise<Result<number>> {
    if (ids.length === 0) return ok(0);
    const res = await this.guarded("store_write_failure", { ids }, () =>
      this.call(() => this.repo.deleteFrames(this.name, ids)),
    );
    if (res.ok) this.logger?.info({ collection: this.name, deleted: res.value }, "Deleted embeddings");
    return res;
  }

  async clear(): Promise<Result<number>> {
    const res = await this.guarded("store_write_failure", {}, () => this.call(() => this.repo.deleteAllFrames(this.name)));
    if (res.ok) this.logger?.info({ collection: this.name, deleted: res.value }, "Cleared collection");
    return res;
  }

  async count(): Promise<Result<number>> {
    return this.guarded("store_query_failure", {}, () => this.call(() => this.repo.countFrames(this.name)));
  }

  async info(): Promise<Result<CollectionInfo>> {
    return this.guarded("store_query_failure", {}, async () => {
      const row = await this.ensure();
      const total = await this.call(() => this.repo.countFrames(this.name));
      return {
        name: row.name,
        dimensions: row.dimensions,
        total_embeddings: total,
        database: this.repo.describe(),
        created_at: row.created_at,
      };
    });
  }

  async summarizeVideos(videoName?: string): Promise<Result<VideoSummary[]>> {
    const all = await this.getAll();
    if (!all.ok) return all;
    const records = videoName ? all.value.filter((r) => r.metadata.video_name === videoName) : all.value;
    return ok(summarizeVideos(records));
  }
}

/**
 * Group records by video, then by scene, keeping frame ids in frame_idx order.
 */
export function summarizeVideos(records: readonly FrameRecord[]): VideoSummary[] {
  const videos = new Map<string, { path: string; scenes: Map<number, Array<{ frameIdx: number; id: string }>> }>();
  for (const r of records) {
    const m = r.metadata;
    let video = videos.get(m.video_name);
    if (!video) {
      video = { path: m.video_path, scenes: new Map() };
      videos.set(m.video_name, video);
    }
    const frames = video.scenes.get(m.scene_idx) ?? [];
    frames.push({ frameIdx: m.frame_idx, id: r.id });
    video.scenes.set(m.scene_idx, frames);
  }

  return [...videos.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([videoName, v]) => {
      const scenes = [...v.scenes.entries()]
        .sort(([a], [b]) => a - b)
        .map(([sceneIdx, frames]) => ({
          scene_idx: sceneIdx,
          frame_ids: frames.sort((a, b) => a.frameIdx - b.frameIdx).map((f) => f.id),
        }));
      return {
        video_name: videoName,
        video_path: v.path,
        frames: scenes.reduce((n, s) => n + s.frame_ids.length, 0),
        scenes,
      };
    });
}
