import type { SamplingPolicy, SceneBoundary } from "@vidx/contracts";

/**
 * Round half to even: 2.5 → 2, 3.5 → 4.
 */
export function roundHalfEven(x: number): number {
  const floor = Math.floor(x);
  const diff = x - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Pick representative frame numbers for one scene.
 *
 * stride = round(|end - start| / count); samples are start + stride * k for k in [0, count).
 * With `clamp`, samples never pass the scene's last frame. With `dedupe`, repeated
 * values are dropped, so short or empty scenes yield fewer than `count` samples.
 */
export function sampleScene(
  scene: SceneBoundary,
  policy: Pick<SamplingPolicy, "count"> & Partial<Pick<SamplingPolicy, "clamp" | "dedupe">>,
): number[] {
  const { count } = policy;
  if (!Number.isInteger(count) || count < 1) throw new Error(`sample count must be a positive integer, got ${count}`);
  const clamp = policy.clamp ?? true;
  const dedupe = policy.dedupe ?? true;

  const start = scene.start_frame;
  const sceneLength = Math.abs(scene.end_frame - scene.start_frame);
  const stride = roundHalfEven(sceneLength / count);
  const last = Math.max(start, scene.end_frame - 1);

  const samples: number[] = [];
  for (let k = 0; k < count; k++) {
    const raw = start + stride * k;
    const value = clamp ? Math.min(raw, last) : raw;
    if (dedupe && samples.includes(value)) continue;
    samples.push(value);
  }
  return samples;
}
