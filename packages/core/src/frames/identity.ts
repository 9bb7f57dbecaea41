import path from "path";
import type { FrameMetadata } from "@vidx/contracts";

function assertIndex(name: string, v: number): void {
  if (!Number.isInteger(v) || v < 0) throw new Error(`${name} must be a non-negative integer, got ${v}`);
}

/**
 * Stable id for a sampled frame. Same video + same sampling parameters → same ids,
 * which is what makes re-indexing idempotent under the upsert policy.
 */
export function buildFrameId(sceneIdx: number, frameIdx: number, frameSample: number): string {
  assertIndex("scene_idx", sceneIdx);
  assertIndex("frame_idx", frameIdx);
  assertIndex("frame_sample", frameSample);
  return `scene_${sceneIdx}_frame_${frameIdx}_sample_${frameSample}`;
}

const FRAME_ID_RE = /^scene_(\d+)_frame_(\d+)_sample_(\d+)$/;

export function parseFrameId(id: string): { scene_idx: number; frame_idx: number; frame_sample: number } | null {
  const m = FRAME_ID_RE.exec(id);
  if (!m) return null;
  return { scene_idx: Number(m[1]), frame_idx: Number(m[2]), frame_sample: Number(m[3]) };
}

export function buildFrameMetadata(
  videoPath: string,
  sceneIdx: number,
  frameIdx: number,
  frameSample: number,
): FrameMetadata {
  assertIndex("scene_idx", sceneIdx);
  assertIndex("frame_idx", frameIdx);
  assertIndex("frame_sample", frameSample);
  if (!videoPath) throw new Error("video_path must not be empty");
  return {
    video_path: videoPath,
    video_name: path.basename(videoPath),
    scene_idx: sceneIdx,
    frame_idx: frameIdx,
    frame_sample: frameSample,
  };
}
