import type { BatchSummary, RankedHit, VideoOutcome } from "@vidx/contracts";

export function formatMs(ms: number): string {
  const total = Math.max(0, Math.floor(ms));
  if (total < 1000) return `${total}ms`;
  const s = Math.floor(total / 1000);
  const m = Math.floor(s / 60);
  const ss = s % 60;
  if (m > 0) return `${m}m${String(ss).padStart(2, "0")}s`;
  return `${(total / 1000).toFixed(1)}s`;
}

export function padRight(s: string, n: number): string {
  if (s.length >= n) return s;
  return s + " ".repeat(n - s.length);
}

export function truncate(s: string, n: number): string {
  if (s.length <= n) return s;
  if (n <= 3) return s.slice(0, Math.max(0, n));
  return s.slice(0, Math.max(0, n - 3)) + "...";
}

type TableValue = string | number | boolean | null | undefined;

function asCell(value: TableValue): string {
  if (value === null || value === undefined) return "";
  return String(value);
}

/**
 * Header, separator and one line per row. Columns come from the first row.
 */
export function formatTable(rows: Array<Record<string, TableValue>>): string[] {
  if (rows.length === 0) return [];
  const cols = Object.keys(rows[0] ?? {});
  const widths = new Map<string, number>();
  for (const c of cols) widths.set(c, c.length);
  for (const r of rows) {
    for (const c of cols) widths.set(c, Math.max(widths.get(c) ?? 0, asCell(r[c]).length));
  }
  const line = (cells: string[]) =>
    cells
      .map((cell, i) => padRight(cell, widths.get(cols[i] ?? "") ?? 0))
      .join("  ")
      .trimEnd();
  return [
    line(cols),
    line(cols.map((c) => "-".repeat(widths.get(c) ?? c.length))),
    ...rows.map((r) => line(cols.map((c) => asCell(r[c])))),
  ];
}

export function printTable(rows: Array<Record<string, TableValue>>): void {
  for (const l of formatTable(rows)) console.log(l);
}

export function hitRow(hit: RankedHit): Record<string, TableValue> {
  return {
    rank: hit.rank,
    id: hit.id,
    similarity: hit.similarity.toFixed(3),
    video: truncate(hit.metadata.video_name, 40),
    scene: hit.metadata.scene_idx,
    frame: hit.metadata.frame_sample,
  };
}

export function outcomeRow(o: VideoOutcome): Record<string, TableValue> {
  return {
    video: truncate(o.video_name, 40),
    status: o.success ? "ok" : o.error?.kind ?? "failed",
    scenes: o.scenes_count,
    embeddings: o.embeddings_count,
    skipped: o.skipped_frames.length,
    threshold: o.fallback_scene ? "fallback" : o.threshold_used,
  };
}

export function formatReplaced(o: VideoOutcome): string | null {
  if (o.replaced_ids.length === 0) return null;
  return `${o.video_name}: overwrote ${o.replaced_ids.length} frame(s) stored for another video`;
}

export function formatBatchSummary(s: BatchSummary): string {
  const total = s.collection_total === null ? "unknown" : String(s.collection_total);
  return `${s.videos_succeeded}/${s.videos_total} videos indexed, ${s.embeddings_total} embeddings written, collection total ${total}`;
}
