/**
 * Parse per-frame scene-change scores from ffmpeg `scdet` + `metadata=print` stderr.
 * The metadata filter prints one header per frame followed by its keys:
 *   [Parsed_metadata_1 @ 0x...] frame:12   pts:12288   pts_time:0.4
 *   [Parsed_metadata_1 @ 0x...] lavfi.scd.mafd=3.112
 *   [Parsed_metadata_1 @ 0x...] lavfi.scd.score=1.804
 */

export interface FrameScore {
  /** Absolute frame number (decode order) */
  n: number;
  /** Presentation time in milliseconds */
  timestampMs: number;
  /** Content-change score against the previous frame, 0–100 */
  score: number;
}

const FRAME_RE = /\bframe:\s*(\d+)\s+pts:\s*\S+\s+pts_time:\s*(-?[\d.]+)/;
const SCORE_RE = /\blavfi\.scd\.score=\s*(-?[\d.]+|nan|inf)/i;

export function parseFrameHeader(line: string): { n: number; timestampMs: number } | null {
  const match = FRAME_RE.exec(line);
  if (!match) return null;
  const n = parseInt(match[1], 10);
  const ptsTime = parseFloat(match[2]);
  if (!Number.isFinite(n)) return null;
  return { n, timestampMs: Number.isFinite(ptsTime) ? Math.round(ptsTime * 1000) : 0 };
}

export function parseSceneScores(stderr: string): FrameScore[] {
  const byFrame = new Map<number, FrameScore>();
  let current: FrameScore | null = null;

  for (const line of stderr.split("\n")) {
    const header = parseFrameHeader(line);
    if (header) {
      current = { ...header, score: 0 };
      byFrame.set(current.n, current);
      continue;
    }
    const scoreMatch = SCORE_RE.exec(line);
    if (scoreMatch && current) {
      const score = parseFloat(scoreMatch[1]);
      current.score = Number.isFinite(score) ? score : 0;
    }
  }

  return [...byFrame.values()].sort((a, b) => a.n - b.n);
}
