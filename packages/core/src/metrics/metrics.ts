import client from "prom-client";

export type Metrics = {
  register: client.Registry;
  videosIndexedTotal: client.Counter<"status">;
  framesIndexedTotal: client.Counter<"collection">;
  framesSkippedTotal: client.Counter<"reason">;
  indexDurationMs: client.Histogram<"status">;
  searchesTotal: client.Counter<"status">;
};

declare global {
  var __vidx_metrics__: Metrics | undefined;
}

/**
 * Fresh registry; tests use this to avoid sharing counters.
 */
export function createMetrics(opts?: { collectDefaults?: boolean }): Metrics {
  const register = new client.Registry();
  if (opts?.collectDefaults) client.collectDefaultMetrics({ register });

  const videosIndexedTotal = new client.Counter({
    name: "vidx_videos_indexed_total",
    help: "Videos processed by the indexing pipeline",
    labelNames: ["status"] as const,
    registers: [register],
  });

  const framesIndexedTotal = new client.Counter({
    name: "vidx_frames_indexed_total",
    help: "Frame embeddings written to the store",
    labelNames: ["collection"] as const,
    registers: [register],
  });

  const framesSkippedTotal = new client.Counter({
    name: "vidx_frames_skipped_total",
    help: "Sampled frames skipped during indexing",
    labelNames: ["reason"] as const,
    registers: [register],
  });

  const indexDurationMs = new client.Histogram({
    name: "vidx_index_duration_ms",
    help: "Per-video indexing duration in ms",
    labelNames: ["status"] as const,
    buckets: [250, 500, 1_000, 2_500, 5_000, 10_000, 30_000, 60_000, 120_000, 300_000, 600_000],
    registers: [register],
  });

  const searchesTotal = new client.Counter({
    name: "vidx_searches_total",
    help: "Text and frame similarity searches",
    labelNames: ["status"] as const,
    registers: [register],
  });

  return { register, videosIndexedTotal, framesIndexedTotal, framesSkippedTotal, indexDurationMs, searchesTotal };
}

export function initMetrics(): Metrics {
  if (globalThis.__vidx_metrics__) return globalThis.__vidx_metrics__;
  const m = createMetrics({ collectDefaults: true });
  globalThis.__vidx_metrics__ = m;
  return m;
}
