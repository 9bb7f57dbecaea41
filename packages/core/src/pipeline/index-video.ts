import fs from "fs/promises";
import path from "path";
import type { BatchSummary, FrameRecord, IndexingConfig, SkippedFrame, VideoOutcome } from "@vidx/contracts";
import type { EmbeddingExtractor } from "../embeddings/extractor";
import { PipelineError, errorMessage, toPipelineError } from "../errors";
import type { VideoDecoder, VideoSource } from "../frames/decoder";
import { findVideos } from "../frames/discover";
import { buildFrameId, buildFrameMetadata } from "../frames/identity";
import { sampleScene } from "../frames/sample";
import { segmentVideo, type Segmentation } from "../frames/segment";
import type { Logger } from "../logger";
import type { Metrics } from "../metrics/metrics";
import type { FrameCollection } from "../store/collection";

export type IndexingDeps = {
  decoder: VideoDecoder;
  extractor: EmbeddingExtractor;
  collection: FrameCollection;
  config: Pick<IndexingConfig, "sceneThresholds" | "minSceneLength" | "sampling">;
  logger?: Logger;
  metrics?: Metrics;
};

type Progress = {
  segmentation: Segmentation | null;
  embeddings: number;
  skipped: SkippedFrame[];
  replaced: string[];
};

/**
 * Drives segment → sample → embed → store for one video at a time.
 * Every failure ends up in a VideoOutcome; nothing here throws for bad input.
 */
export class IndexingPipeline {
  constructor(private readonly deps: IndexingDeps) {}

  async indexVideo(videoPath: string): Promise<VideoOutcome> {
    const startedAt = Date.now();
    const outcome = await this.run(videoPath);
    const status = outcome.success ? "ok" : "error";
    this.deps.metrics?.videosIndexedTotal.inc({ status });
    this.deps.metrics?.indexDurationMs.observe({ status }, Date.now() - startedAt);
    return outcome;
  }

  /**
   * Sequential; a failing video is recorded and the batch moves on.
   */
  async indexVideos(videoPaths: readonly string[]): Promise<BatchSummary> {
    const log = this.deps.logger;
    const outcomes: VideoOutcome[] = [];
    for (const [i, videoPath] of videoPaths.entries()) {
      log?.info({ video: videoPath, position: i + 1, total: videoPaths.length }, "Indexing video");
      outcomes.push(await this.indexVideo(videoPath));
    }

    const counted = await this.deps.collection.count();
    if (!counted.ok) log?.warn({ err: counted.error.message }, "Could not read collection total");
    const summary: BatchSummary = {
      videos_total: outcomes.length,
      videos_succeeded: outcomes.filter((o) => o.success).length,
      videos_failed: outcomes.filter((o) => !o.success).length,
      embeddings_total: outcomes.reduce((n, o) => n + o.embeddings_count, 0),
      collection_total: counted.ok ? counted.value : null,
      outcomes,
    };
    log?.info(
      {
        videos: summary.videos_total,
        succeeded: summary.videos_succeeded,
        failed: summary.videos_failed,
        embeddings: summary.embeddings_total,
      },
      "Batch complete",
    );
    return summary;
  }

  /**
   * Index every video file directly inside `dir`. A missing directory is thrown
   * as an input_not_found PipelineError since there is no per-video outcome to carry it.
   */
  async indexDirectory(dir: string, extensions?: readonly string[]): Promise<BatchSummary> {
    const found = await findVideos(dir, extensions);
    if (!found.ok) throw found.error;
    if (found.value.length === 0) this.deps.logger?.warn({ directory: dir }, "No video files found");
    return this.indexVideos(found.value);
  }

  private async run(videoPath: string): Promise<VideoOutcome> {
    const progress: Progress = { segmentation: null, embeddings: 0, skipped: [], replaced: [] };
    try {
      return await this.process(videoPath, progress);
    } catch (err) {
      const error = toPipelineError("decode_failure", err, { video_path: videoPath });
      return this.failed(videoPath, progress, error);
    }
  }

  private async process(videoPath: string, progress: Progress): Promise<VideoOutcome> {
    const { decoder, collection, config } = this.deps;
    const log = this.deps.logger?.child({ video: path.basename(videoPath) });

    const stat = await fs.stat(videoPath).catch(() => null);
    if (!stat || !stat.isFile()) {
      throw new PipelineError("input_not_found", `Video file not found: ${videoPath}`, {
        details: { video_path: videoPath },
      });
    }

    const source = await decoder.open(videoPath);
    const { probe } = source;
    log?.info(
      { frames: probe.frameCount, fps: probe.fps, width: probe.width, height: probe.height, durationSec: probe.durationSec },
      "Opened video",
    );
    let records: FrameRecord[];
    try {
      const segmented = await segmentVideo(source, {
        thresholds: config.sceneThresholds,
        minSceneLength: config.minSceneLength,
        logger: log,
      });
      if (!segmented.ok) throw segmented.error;
      progress.segmentation = segmented.value;
      if (segmented.value.fallback) {
        log?.warn(
          { kind: "no_scenes_detected", thresholds: config.sceneThresholds },
          "Falling back to a single scene",
        );
      }
      log?.info(
        { scenes: segmented.value.scenes.length, threshold: segmented.value.threshold, frames: segmented.value.totalFrames },
        "Segmented video",
      );
      // Container frame counts are estimates; the scored total is what gets sampled.
      if (probe.frameCount > 0 && probe.frameCount !== segmented.value.totalFrames) {
        log?.warn(
          { probed: probe.frameCount, scored: segmented.value.totalFrames },
          "Decoded frame count differs from the container's",
        );
      }
      records = await this.embedScenes(source, segmented.value, progress, log);
    } finally {
      await source.close();
    }

    if (records.length === 0) {
      throw new PipelineError("empty_input", `no frames could be embedded for ${videoPath}`, {
        details: { video_path: videoPath, skipped: progress.skipped.length },
      });
    }

    const inserted = await collection.insert(records);
    if (!inserted.ok) throw inserted.error;
    progress.embeddings = inserted.value.written;
    progress.replaced = inserted.value.replaced_ids;
    if (progress.replaced.length > 0) {
      log?.warn(
        { replaced: progress.replaced.length, ids: progress.replaced.slice(0, 10) },
        "Frames from another video were overwritten",
      );
    }
    this.deps.metrics?.framesIndexedTotal.inc({ collection: collection.name }, inserted.value.written);

    const info = await collection.info();
    if (!info.ok) log?.warn({ err: info.error.message }, "Could not snapshot collection");

    log?.info(
      { embeddings: inserted.value.written, skipped: progress.skipped.length, total: inserted.value.count_after },
      "Indexed video",
    );
    return {
      ...this.base(videoPath, progress),
      success: true,
      error: null,
      collection_snapshot: info.ok ? info.value : null,
    };
  }

  private async embedScenes(
    source: VideoSource,
    segmentation: Segmentation,
    progress: Progress,
    log: Logger | undefined,
  ): Promise<FrameRecord[]> {
    const { extractor, config } = this.deps;
    const records: FrameRecord[] = [];

    for (const [sceneIdx, scene] of segmentation.scenes.entries()) {
      const samples = sampleScene(scene, config.sampling);
      for (const [frameIdx, frameSample] of samples.entries()) {
        const skip = (error: PipelineError): void => {
          log?.warn({ scene: sceneIdx, frame: frameSample, kind: error.kind, err: error.message }, "Skipping frame");
          this.deps.metrics?.framesSkippedTotal.inc({ reason: error.kind });
          progress.skipped.push({ scene_idx: sceneIdx, frame_idx: frameIdx, frame_sample: frameSample, error: error.toFailure() });
        };

        let image: Buffer;
        try {
          image = await source.readFrame(frameSample);
        } catch (err) {
          skip(toPipelineError("decode_failure", err, { frame_sample: frameSample }));
          continue;
        }

        const embedding = await extractor.imageEmbedding(image);
        if (!embedding.ok) {
          // encoder_unavailable is fatal for the whole video.
          if (embedding.error.kind === "encoder_unavailable") throw embedding.error;
          skip(embedding.error);
          continue;
        }

        records.push({
          id: buildFrameId(sceneIdx, frameIdx, frameSample),
          embedding: embedding.value,
          metadata: buildFrameMetadata(source.path, sceneIdx, frameIdx, frameSample),
        });
      }
    }
    return records;
  }

  private base(videoPath: string, progress: Progress) {
    return {
      video_path: videoPath,
      video_name: path.basename(videoPath) || videoPath,
      embeddings_count: progress.embeddings,
      scenes_count: progress.segmentation?.scenes.length ?? 0,
      threshold_used: progress.segmentation?.threshold ?? null,
      fallback_scene: progress.segmentation?.fallback ?? false,
      skipped_frames: progress.skipped,
      replaced_ids: progress.replaced,
    };
  }

  private failed(videoPath: string, progress: Progress, error: PipelineError): VideoOutcome {
    this.deps.logger?.error({ video: videoPath, kind: error.kind, err: errorMessage(error) }, "Video failed");
    return {
      ...this.base(videoPath, progress),
      success: false,
      error: error.toFailure(),
      collection_snapshot: null,
    };
  }
}
