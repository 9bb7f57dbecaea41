import { embedImageWithClip, embedTextWithClip } from "./clip";
import { getVidxDefault } from "../config/defaults";
import { withRetry, type RetryOpts } from "../util/retry";

export type EncoderProvider = "http" | "disabled";

export type EncoderStatus = {
  enabled: boolean;
  provider: EncoderProvider | null;
  model_id: string | null;
  dimensions: number | null;
  reason: string | null;
};

/**
 * Vision-language encoder. Both branches map into the same vector space.
 */
export type Encoder = {
  provider: Exclude<EncoderProvider, "disabled">;
  model_id: string;
  dimensions: number;
  embedImage: (image: Buffer) => Promise<number[]>;
  embedText: (text: string) => Promise<number[]>;
};

function clean(s: unknown): string {
  return typeof s === "string" ? s.trim() : "";
}

export function getEncoderStatus(env: Record<string, string | undefined> = process.env): EncoderStatus {
  const providerRaw = clean(env.VIDX_ENCODER_PROVIDER).toLowerCase();
  const provider: EncoderProvider = providerRaw === "disabled" ? "disabled" : "http";

  if (provider === "disabled") {
    return { enabled: false, provider: "disabled", model_id: null, dimensions: null, reason: "encoder disabled" };
  }
  if (providerRaw && providerRaw !== "http") {
    return { enabled: false, provider: null, model_id: null, dimensions: null, reason: `unknown encoder provider: ${providerRaw}` };
  }

  const dimsRaw = clean(env.VIDX_EMBED_DIMENSIONS) || getVidxDefault("VIDX_EMBED_DIMENSIONS");
  const dims = Number(dimsRaw);
  if (!Number.isInteger(dims) || dims <= 0) {
    return { enabled: false, provider: "http", model_id: null, dimensions: null, reason: "invalid VIDX_EMBED_DIMENSIONS" };
  }

  const model = clean(env.VIDX_ENCODER_MODEL) || getVidxDefault("VIDX_ENCODER_MODEL");
  return { enabled: true, provider: "http", model_id: model, dimensions: dims, reason: null };
}

export function createEncoderFromEnv(
  env: Record<string, string | undefined> = process.env,
  opts?: { retry?: RetryOpts; timeoutMs?: number; fetchImpl?: typeof fetch },
): Encoder {
  const status = getEncoderStatus(env);
  if (!status.enabled || status.provider !== "http" || !status.model_id || !status.dimensions) {
    throw new Error(status.reason || "encoder disabled");
  }

  const baseUrl = clean(env.VIDX_ENCODER_URL) || getVidxDefault("VIDX_ENCODER_URL");
  const model = status.model_id;
  const timeoutMs = opts?.timeoutMs;
  const fetchImpl = opts?.fetchImpl;
  return {
    provider: "http",
    model_id: model,
    dimensions: status.dimensions,
    embedImage: (image: Buffer) =>
      withRetry(() => embedImageWithClip({ baseUrl, model, image, timeoutMs, fetchImpl }), opts?.retry),
    embedText: (text: string) =>
      withRetry(() => embedTextWithClip({ baseUrl, model, text, timeoutMs, fetchImpl }), opts?.retry),
  };
}
