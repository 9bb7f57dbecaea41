import { z } from "zod";

/** Non-2xx response from the encoder service */
export class EncoderRequestError extends Error {
  constructor(
    readonly status: number,
    body: string,
  ) {
    super(`Encoder request failed: ${status} ${body}`.trim());
    this.name = "EncoderRequestError";
  }
}

const EmbeddingResponseSchema = z.object({
  embedding: z.array(z.number()).min(1),
});

async function postEmbedding(opts: {
  baseUrl: string;
  path: string;
  body: Record<string, unknown>;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}): Promise<number[]> {
  const timeoutMs = opts.timeoutMs ?? 30_000;
  const fetchImpl = opts.fetchImpl ?? fetch;
  const ac = new AbortController();
  const timer = setTimeout(() => ac.abort(), timeoutMs);

  try {
    const url = `${opts.baseUrl.replace(/\/$/, "")}${opts.path}`;
    const res = await fetchImpl(url, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(opts.body),
      signal: ac.signal,
    });
    if (!res.ok) {
      const txt = await res.text().catch(() => "");
      throw new EncoderRequestError(res.status, txt);
    }
    const json = EmbeddingResponseSchema.parse(await res.json());
    return json.embedding;
  } catch (err: unknown) {
    if (err instanceof Error && err.name === "AbortError") {
      throw new Error(`Encoder request timed out after ${timeoutMs}ms`);
    }
    throw err;
  } finally {
    clearTimeout(timer);
  }
}

export async function embedImageWithClip(opts: {
  baseUrl: string;
  model: string;
  image: Buffer;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}): Promise<number[]> {
  return postEmbedding({
    baseUrl: opts.baseUrl,
    path: "/v1/embeddings/image",
    body: { model: opts.model, image_base64: opts.image.toString("base64") },
    timeoutMs: opts.timeoutMs,
    fetchImpl: opts.fetchImpl,
  });
}

export async function embedTextWithClip(opts: {
  baseUrl: string;
  model: string;
  text: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}): Promise<number[]> {
  return postEmbedding({
    baseUrl: opts.baseUrl,
    path: "/v1/embeddings/text",
    body: { model: opts.model, text: opts.text },
    timeoutMs: opts.timeoutMs,
    fetchImpl: opts.fetchImpl,
  });
}
