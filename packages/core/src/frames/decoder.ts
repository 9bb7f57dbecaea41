import { execFile } from "child_process";
import { promisify } from "util";
import { PipelineError, errorMessage } from "../errors";
import { parseProbeOutput, type VideoProbe } from "./probe";
import { parseSceneScores, type FrameScore } from "./scores";

const execFileAsync = promisify(execFile);

/**
 * An opened video. Acquired per video and released with close(), even on failure.
 */
export interface VideoSource {
  readonly path: string;
  readonly probe: VideoProbe;
  /** Content-change score for every decoded frame, computed once per handle */
  sceneScores(): Promise<FrameScore[]>;
  /** Decode one frame by absolute frame number as JPEG bytes */
  readFrame(frameNumber: number): Promise<Buffer>;
  close(): Promise<void>;
}

export interface VideoDecoder {
  open(videoPath: string): Promise<VideoSource>;
}

export type FfmpegDecoderOpts = {
  ffmpegPath?: string;
  ffprobePath?: string;
  /** Timeout for the full-decode scene scoring pass */
  scoreTimeoutMs?: number;
  /** Timeout for a single frame decode */
  frameTimeoutMs?: number;
  jpegQuality?: number;
};

class FfmpegVideoSource implements VideoSource {
  private scores: Promise<FrameScore[]> | null = null;
  private closed = false;

  constructor(
    readonly path: string,
    readonly probe: VideoProbe,
    private readonly opts: Required<FfmpegDecoderOpts>,
  ) {}

  private assertOpen(): void {
    if (this.closed) throw new PipelineError("decode_failure", `video handle already closed: ${this.path}`);
  }

  sceneScores(): Promise<FrameScore[]> {
    this.assertOpen();
    if (!this.scores) this.scores = this.computeScores();
    return this.scores;
  }

  private async computeScores(): Promise<FrameScore[]> {
    // scdet with threshold 0 and sc_pass 0 scores every frame and drops none,
    // so the metadata printer's frame counter is the absolute frame number.
    try {
      const { stderr } = await execFileAsync(
        this.opts.ffmpegPath,
        [
          "-hide_banner",
          "-nostats",
          "-i", this.path,
          "-an", "-sn",
          "-vf", "scdet=threshold=0:sc_pass=0,metadata=mode=print",
          "-f", "null",
          "-",
        ],
        { timeout: this.opts.scoreTimeoutMs, maxBuffer: 512 * 1024 * 1024 },
      );
      return parseSceneScores(stderr);
    } catch (err) {
      throw new PipelineError("decode_failure", `scene scoring failed for ${this.path}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  async readFrame(frameNumber: number): Promise<Buffer> {
    this.assertOpen();
    if (!Number.isInteger(frameNumber) || frameNumber < 0) {
      throw new PipelineError("decode_failure", `invalid frame number: ${frameNumber}`);
    }
    const qscale = Math.max(1, Math.round(((100 - this.opts.jpegQuality) * 31) / 100));
    let stdout: Buffer;
    try {
      ({ stdout } = await execFileAsync(
        this.opts.ffmpegPath,
        [
          "-hide_banner",
          "-v", "error",
          "-i", this.path,
          "-an", "-sn",
          "-vf", `select='eq(n\\,${frameNumber})'`,
          "-fps_mode", "passthrough",
          "-frames:v", "1",
          "-q:v", String(qscale),
          "-f", "image2pipe",
          "-c:v", "mjpeg",
          "-",
        ],
        { encoding: "buffer", timeout: this.opts.frameTimeoutMs, maxBuffer: 64 * 1024 * 1024 },
      ));
    } catch (err) {
      throw new PipelineError("decode_failure", `failed to decode frame ${frameNumber}: ${errorMessage(err)}`, {
        details: { frame_sample: frameNumber },
        cause: err,
      });
    }
    if (stdout.length === 0) {
      throw new PipelineError("decode_failure", `frame ${frameNumber} not found in ${this.path}`, {
        details: { frame_sample: frameNumber },
      });
    }
    return stdout;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.scores = null;
  }
}

export class FfmpegVideoDecoder implements VideoDecoder {
  private readonly opts: Required<FfmpegDecoderOpts>;

  constructor(opts?: FfmpegDecoderOpts) {
    this.opts = {
      ffmpegPath: opts?.ffmpegPath ?? process.env.VIDX_FFMPEG_PATH ?? "ffmpeg",
      ffprobePath: opts?.ffprobePath ?? process.env.VIDX_FFPROBE_PATH ?? "ffprobe",
      scoreTimeoutMs: opts?.scoreTimeoutMs ?? 1_800_000,
      frameTimeoutMs: opts?.frameTimeoutMs ?? 120_000,
      jpegQuality: opts?.jpegQuality ?? 90,
    };
  }

  async open(videoPath: string): Promise<VideoSource> {
    let stdout: string;
    try {
      ({ stdout } = await execFileAsync(
        this.opts.ffprobePath,
        [
          "-v", "error",
          "-select_streams", "v:0",
          "-show_entries", "stream=width,height,avg_frame_rate,r_frame_rate,nb_frames,duration:format=duration",
          "-of", "json",
          videoPath,
        ],
        { timeout: 60_000, maxBuffer: 4 * 1024 * 1024 },
      ));
    } catch (err) {
      throw new PipelineError("decode_failure", `could not open video ${videoPath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const probe = parseProbeOutput(stdout);
    if (!probe) throw new PipelineError("decode_failure", `no video stream in ${videoPath}`);
    return new FfmpegVideoSource(videoPath, probe, this.opts);
  }
}
