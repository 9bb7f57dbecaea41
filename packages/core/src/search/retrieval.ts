import type { FrameMetadataFilter, QueryHit, RankedHit, SavedFrame, SearchOutcome, SkippedHit } from "@vidx/contracts";
import type { EmbeddingExtractor } from "../embeddings/extractor";
import { fail, ok, toPipelineError, type Result } from "../errors";
import type { VideoDecoder } from "../frames/decoder";
import { parseFrameId } from "../frames/identity";
import { matchedFrameFileName, type MatchedFrameStore } from "../frames/storage";
import type { Logger } from "../logger";
import type { Metrics } from "../metrics/metrics";
import type { FrameCollection } from "../store/collection";

export type RetrievalDeps = {
  extractor: EmbeddingExtractor;
  collection: FrameCollection;
  decoder: VideoDecoder;
  frameStore: MatchedFrameStore;
  logger?: Logger;
  metrics?: Metrics;
};

export type TextSearchOpts = {
  k?: number;
  persistImages?: boolean;
  /** Restrict hits to one video (matched on basename) */
  videoName?: string;
};

function rankHits(hits: readonly QueryHit[]): RankedHit[] {
  const ranked: RankedHit[] = [];
  for (const h of hits) {
    if (h.distance === null) continue;
    ranked.push({
      rank: ranked.length + 1,
      id: h.id,
      distance: h.distance,
      similarity: 1 - h.distance,
      metadata: h.metadata,
    });
  }
  return ranked;
}

export class RetrievalEngine {
  constructor(private readonly deps: RetrievalDeps) {}

  /**
   * Text → vector → nearest frames. Hits keep the store's ascending-distance order.
   * With `persistImages`, each matched frame is re-decoded and written under the
   * query's directory; a hit that cannot be saved lands in `skipped`.
   */
  async searchByText(query: string, opts?: TextSearchOpts): Promise<Result<SearchOutcome>> {
    return this.count(await this.textSearch(query, opts));
  }

  private async textSearch(query: string, opts?: TextSearchOpts): Promise<Result<SearchOutcome>> {
    const k = opts?.k ?? 10;
    const persistImages = opts?.persistImages ?? true;
    const log = this.deps.logger;

    const embedding = await this.deps.extractor.textEmbedding(query);
    if (!embedding.ok) return embedding;

    const where: FrameMetadataFilter | undefined = opts?.videoName ? { video_name: opts.videoName } : undefined;
    const result = await this.deps.collection.queryByVector(embedding.value, k, where);
    if (!result.ok) return result;

    const hits = rankHits(result.value);
    log?.info({ query, k, hits: hits.length, video: opts?.videoName ?? null }, "Text search");

    if (hits.length === 0) {
      return ok({ query, output_dir: null, hits, saved: [], skipped: [], empty: true });
    }

    if (!persistImages) {
      return ok({ query, output_dir: null, hits, saved: [], skipped: [], empty: false });
    }

    const { saved, skipped } = await this.persist(query, hits);
    return ok({ query, output_dir: this.deps.frameStore.dirFor(query), hits, saved, skipped, empty: false });
  }

  /**
   * Nearest stored neighbours of an already indexed frame, itself excluded.
   */
  async searchSimilarToFrame(frameId: string, k = 10): Promise<Result<RankedHit[]>> {
    return this.count(await this.similarSearch(frameId, k));
  }

  private async similarSearch(frameId: string, k: number): Promise<Result<RankedHit[]>> {
    if (!Number.isInteger(k) || k < 1) return fail("store_query_failure", `k must be a positive integer, got ${k}`);
    const parsed = parseFrameId(frameId);
    if (!parsed) {
      return fail("empty_input", `not a frame id: ${frameId}`, { details: { id: frameId } });
    }
    const found = await this.deps.collection.get([frameId]);
    if (!found.ok) return found;
    const source = found.value.find((r) => r.id === frameId);
    if (!source) {
      return fail("empty_input", `frame not found: ${frameId}`, { details: { id: frameId } });
    }

    // One extra so the frame itself can be dropped.
    const result = await this.deps.collection.queryByVector(source.embedding, k + 1);
    if (!result.ok) return result;
    const hits = rankHits(result.value.filter((h) => h.id !== frameId).slice(0, k));
    this.deps.logger?.info({ frameId, scene: parsed.scene_idx, k, hits: hits.length }, "Frame similarity search");
    return ok(hits);
  }

  private async persist(query: string, hits: readonly RankedHit[]): Promise<{ saved: SavedFrame[]; skipped: SkippedHit[] }> {
    const saved: SavedFrame[] = [];
    const skipped: SkippedHit[] = [];
    for (const hit of hits) {
      try {
        const source = await this.deps.decoder.open(hit.metadata.video_path);
        let image: Buffer;
        try {
          image = await source.readFrame(hit.metadata.frame_sample);
        } finally {
          await source.close();
        }
        const filePath = await this.deps.frameStore.save(
          query,
          matchedFrameFileName(hit.rank, hit.id, hit.similarity),
          image,
        );
        saved.push({ rank: hit.rank, id: hit.id, file_path: filePath });
      } catch (err) {
        const error = toPipelineError("decode_failure", err, {
          id: hit.id,
          video_path: hit.metadata.video_path,
          frame_sample: hit.metadata.frame_sample,
        });
        this.deps.logger?.warn({ id: hit.id, kind: error.kind, err: error.message }, "Could not save matched frame");
        skipped.push({ id: hit.id, error: error.toFailure() });
      }
    }
    return { saved, skipped };
  }

  private count<T>(res: Result<T>): Result<T> {
    this.deps.metrics?.searchesTotal.inc({ status: res.ok ? "ok" : "error" });
    return res;
  }
}
