import { fail, ok, toPipelineError, type Result } from "../errors";
import type { Encoder } from "./provider";

export function l2Norm(v: readonly number[]): number {
  let sum = 0;
  for (const x of v) sum += x * x;
  return Math.sqrt(sum);
}

/**
 * Scale to unit length. Returns null for a zero or non-finite vector.
 */
export function l2Normalize(v: readonly number[]): number[] | null {
  const norm = l2Norm(v);
  if (!Number.isFinite(norm) || norm === 0) return null;
  return v.map((x) => x / norm);
}

/**
 * Encoder adapter: every vector leaving here is unit-length and of the
 * encoder's declared dimensionality, or the call fails with encoder_unavailable.
 */
export class EmbeddingExtractor {
  constructor(private readonly encoder: Encoder) {}

  get dimensions(): number {
    return this.encoder.dimensions;
  }

  get modelId(): string {
    return this.encoder.model_id;
  }

  imageEmbedding(image: Buffer): Promise<Result<number[]>> {
    if (image.length === 0) return Promise.resolve(fail("decode_failure", "empty image"));
    return this.run("image", () => this.encoder.embedImage(image));
  }

  textEmbedding(text: string): Promise<Result<number[]>> {
    if (!text.trim()) return Promise.resolve(fail("empty_input", "query text is empty"));
    return this.run("text", () => this.encoder.embedText(text));
  }

  private async run(branch: "image" | "text", call: () => Promise<number[]>): Promise<Result<number[]>> {
    let raw: number[];
    try {
      raw = await call();
    } catch (err) {
      return { ok: false, error: toPipelineError("encoder_unavailable", err, { branch, model_id: this.encoder.model_id }) };
    }

    if (raw.length !== this.encoder.dimensions) {
      return fail("encoder_unavailable", `encoder returned ${raw.length} dims, expected ${this.encoder.dimensions}`, {
        details: { branch, model_id: this.encoder.model_id },
      });
    }
    const normalized = l2Normalize(raw);
    if (!normalized) {
      return fail("encoder_unavailable", "encoder returned a zero or non-finite vector", {
        details: { branch, model_id: this.encoder.model_id },
      });
    }
    return ok(normalized);
  }
}
