import { z } from "zod";

export interface VideoProbe {
  /** Container-reported frame count, or duration × fps when the container has none */
  frameCount: number;
  fps: number | null;
  width: number | null;
  height: number | null;
  durationSec: number | null;
}

const NumericString = z.union([z.string(), z.number()]).optional();

const FfprobeOutputSchema = z.object({
  streams: z
    .array(
      z.object({
        width: z.number().int().optional(),
        height: z.number().int().optional(),
        avg_frame_rate: z.string().optional(),
        r_frame_rate: z.string().optional(),
        nb_frames: NumericString,
        duration: NumericString,
      }),
    )
    .default([]),
  format: z.object({ duration: NumericString }).optional(),
});

export function parseFrameRate(raw: string | undefined): number | null {
  if (!raw) return null;
  const [numRaw, denRaw] = raw.split("/");
  const num = Number(numRaw);
  const den = denRaw === undefined ? 1 : Number(denRaw);
  if (!Number.isFinite(num) || !Number.isFinite(den) || den === 0 || num <= 0) return null;
  return num / den;
}

function toNumber(v: string | number | undefined): number | null {
  if (v === undefined) return null;
  const n = typeof v === "number" ? v : Number(v);
  return Number.isFinite(n) ? n : null;
}

/**
 * Parse `ffprobe -show_entries stream=... -of json` output for the first video stream.
 * Returns null when the file carries no video stream.
 */
export function parseProbeOutput(stdout: string): VideoProbe | null {
  const parsed = FfprobeOutputSchema.parse(JSON.parse(stdout));
  const stream = parsed.streams[0];
  if (!stream) return null;

  const fps = parseFrameRate(stream.avg_frame_rate) ?? parseFrameRate(stream.r_frame_rate);
  const durationSec = toNumber(stream.duration) ?? toNumber(parsed.format?.duration);
  const nbFrames = toNumber(stream.nb_frames);

  let frameCount = 0;
  if (nbFrames !== null && nbFrames > 0) frameCount = Math.floor(nbFrames);
  else if (fps !== null && durationSec !== null) frameCount = Math.max(0, Math.round(durationSec * fps));

  return {
    frameCount,
    fps,
    width: stream.width ?? null,
    height: stream.height ?? null,
    durationSec,
  };
}
