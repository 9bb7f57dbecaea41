import type { SceneBoundary } from "@vidx/contracts";
import { fail, ok, toPipelineError, type Result } from "../errors";
import type { Logger } from "../logger";
import type { VideoSource } from "./decoder";
import type { FrameScore } from "./scores";

export type SegmentationOpts = {
  /** Tried in order; the first one producing at least one scene wins */
  thresholds: readonly number[];
  /** Minimum frames between two cuts (default 15) */
  minSceneLength?: number;
  logger?: Logger;
};

export type Segmentation = {
  scenes: SceneBoundary[];
  totalFrames: number;
  /** Threshold that produced the scenes; null when the fallback scene was used or the video is empty */
  threshold: number | null;
  fallback: boolean;
};

/**
 * Cut points for one threshold. Frame 0 never cuts; a cut closer than
 * `minSceneLength` frames to the previous one is ignored.
 */
export function detectCuts(scores: readonly FrameScore[], threshold: number, minSceneLength = 15): number[] {
  const cuts: number[] = [];
  let last = 0;
  for (const f of scores) {
    if (f.n <= 0) continue;
    if (f.score >= threshold && f.n - last >= minSceneLength) {
      cuts.push(f.n);
      last = f.n;
    }
  }
  return cuts;
}

export function cutsToScenes(cuts: readonly number[], totalFrames: number): SceneBoundary[] {
  if (cuts.length === 0) return [];
  const bounds = [0, ...cuts.filter((c) => c > 0 && c < totalFrames), totalFrames];
  const scenes: SceneBoundary[] = [];
  for (let i = 0; i < bounds.length - 1; i++) {
    scenes.push({ start_frame: bounds[i], end_frame: bounds[i + 1] });
  }
  return scenes;
}

/**
 * Ordered-fallback scene search over pre-computed scores: strict thresholds first,
 * then looser ones, then a single scene spanning the whole video.
 */
export function segmentScores(
  scores: readonly FrameScore[],
  opts: SegmentationOpts,
): Segmentation {
  if (opts.thresholds.length === 0) throw new Error("at least one scene threshold is required");
  const totalFrames = scores.reduce((max, s) => Math.max(max, s.n + 1), 0);
  if (totalFrames === 0) return { scenes: [], totalFrames: 0, threshold: null, fallback: false };

  for (const threshold of opts.thresholds) {
    const scenes = cutsToScenes(detectCuts(scores, threshold, opts.minSceneLength), totalFrames);
    opts.logger?.debug({ threshold, scenes: scenes.length }, "Scene detection pass");
    if (scenes.length > 0) return { scenes, totalFrames, threshold, fallback: false };
  }

  opts.logger?.info(
    { thresholds: opts.thresholds, totalFrames },
    "No scenes detected at any threshold; using whole video as one scene",
  );
  return {
    scenes: [{ start_frame: 0, end_frame: totalFrames }],
    totalFrames,
    threshold: null,
    fallback: true,
  };
}

export async function segmentVideo(source: VideoSource, opts: SegmentationOpts): Promise<Result<Segmentation>> {
  let scores: FrameScore[];
  try {
    scores = await source.sceneScores();
  } catch (err) {
    return { ok: false, error: toPipelineError("decode_failure", err, { video_path: source.path }) };
  }
  const result = segmentScores(scores, opts);
  if (result.totalFrames === 0) {
    return fail("empty_input", `video has no decodable frames: ${source.path}`, {
      details: { video_path: source.path },
    });
  }
  return ok(result);
}
