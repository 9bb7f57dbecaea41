import type pg from "pg";
import {
  FrameMetadataFilterSchema,
  type FrameMetadata,
  type FrameMetadataField,
  type FrameMetadataFilter,
  type FrameRecord,
  type QueryHit,
} from "@vidx/contracts";

export type CollectionRow = {
  name: string;
  dimensions: number;
  created_at: string | null;
};

/**
 * Data access for one database holding many named frame collections.
 * Implementations throw on storage errors; FrameCollection turns those into results.
 */
export interface FrameEmbeddingRepo {
  ensureCollection(name: string, dimensions: number): Promise<CollectionRow>;
  countFrames(collection: string): Promise<number>;
  findExistingIds(collection: string, ids: string[]): Promise<string[]>;
  /** Ids among `records` already stored under a different video_path */
  findReplacedIds(collection: string, records: FrameRecord[]): Promise<string[]>;
  /** `upsert` replaces rows with the same id; `insert` fails on an existing id */
  writeFrames(collection: string, records: FrameRecord[], mode: "upsert" | "insert"): Promise<number>;
  nearestFrames(collection: string, vector: number[], k: number, where?: FrameMetadataFilter): Promise<QueryHit[]>;
  findFramesByMetadata(collection: string, where: FrameMetadataFilter, k: number): Promise<QueryHit[]>;
  getFrames(collection: string, ids?: string[]): Promise<FrameRecord[]>;
  deleteFrames(collection: string, ids: string[]): Promise<number>;
  deleteAllFrames(collection: string): Promise<number>;
  /** Connection target shown in collection info */
  describe(): string | null;
}

/** The slice of pg.Pool the repository uses */
export interface PgQueryable {
  query<R extends pg.QueryResultRow = pg.QueryResultRow>(text: string, values?: unknown[]): Promise<pg.QueryResult<R>>;
}

export interface PgPoolLike extends PgQueryable {
  connect(): Promise<PgQueryable & { release(err?: Error | boolean): void }>;
}

export function toPgVector(v: readonly number[]): string {
  // pgvector accepts a string literal in the form: '[1,2,3]'.
  return `[${v.join(",")}]`;
}

export function parsePgVector(raw: string): number[] {
  const inner = raw.trim().replace(/^\[/, "").replace(/\]$/, "");
  if (!inner) return [];
  return inner.split(",").map((s) => Number(s));
}

// Metadata keys map 1:1 to columns; only these names ever reach SQL text.
const METADATA_COLUMNS: readonly FrameMetadataField[] = [
  "video_path",
  "video_name",
  "scene_idx",
  "frame_idx",
  "frame_sample",
];

/**
 * Build `AND col = $n` predicates for a metadata equality filter.
 * Parameter numbering starts at `firstParam`.
 */
export function buildMetadataWhere(
  filter: FrameMetadataFilter | undefined,
  firstParam: number,
): { sql: string; params: Array<string | number> } {
  if (!filter) return { sql: "", params: [] };
  const parsed = FrameMetadataFilterSchema.parse(filter);
  const clauses: string[] = [];
  const params: Array<string | number> = [];
  for (const col of METADATA_COLUMNS) {
    const value = parsed[col];
    if (value === undefined) continue;
    params.push(value);
    clauses.push(`${col} = $${firstParam + params.length - 1}`);
  }
  return { sql: clauses.map((c) => ` AND ${c}`).join(""), params };
}

type FrameRow = {
  id: string;
  video_path: string;
  video_name: string;
  scene_idx: number;
  frame_idx: number;
  frame_sample: number;
};

function toMetadata(r: FrameRow): FrameMetadata {
  return {
    video_path: r.video_path,
    video_name: r.video_name,
    scene_idx: r.scene_idx,
    frame_idx: r.frame_idx,
    frame_sample: r.frame_sample,
  };
}

const FRAME_COLUMNS = "id, video_path, video_name, scene_idx, frame_idx, frame_sample";

export class PgFrameEmbeddingRepo implements FrameEmbeddingRepo {
  constructor(
    private readonly pool: PgPoolLike,
    private readonly database: string | null = null,
  ) {}

  describe(): string | null {
    return this.database;
  }

  async ensureCollection(name: string, dimensions: number): Promise<CollectionRow> {
    await this.pool.query(
      `INSERT INTO frame_collections (name, dimensions, description)
       VALUES ($1, $2, 'Image embeddings for sampled video frames')
       ON CONFLICT (name) DO NOTHING`,
      [name, dimensions],
    );
    const res = await this.pool.query<CollectionRow>(
      `SELECT name, dimensions, created_at::text FROM frame_collections WHERE name = $1`,
      [name],
    );
    const row = res.rows[0];
    if (!row) throw new Error(`collection ${name} could not be created`);
    return row;
  }

  async countFrames(collection: string): Promise<number> {
    const res = await this.pool.query<{ n: string }>(
      `SELECT count(*)::text AS n FROM frame_embeddings WHERE collection = $1`,
      [collection],
    );
    return Number(res.rows[0]?.n || 0);
  }

  async findExistingIds(collection: string, ids: string[]): Promise<string[]> {
    if (ids.length === 0) return [];
    const res = await this.pool.query<{ id: string }>(
      `SELECT id FROM frame_embeddings WHERE collection = $1 AND id = ANY($2::text[]) ORDER BY id`,
      [collection, ids],
    );
    return res.rows.map((r) => r.id);
  }

  async findReplacedIds(collection: string, records: FrameRecord[]): Promise<string[]> {
    if (records.length === 0) return [];
    const res = await this.pool.query<{ id: string }>(
      `SELECT e.id
       FROM frame_embeddings e
       JOIN unnest($2::text[], $3::text[]) AS incoming(id, video_path) ON incoming.id = e.id
       WHERE e.collection = $1 AND e.video_path <> incoming.video_path
       ORDER BY e.id`,
      [collection, records.map((r) => r.id), records.map((r) => r.metadata.video_path)],
    );
    return res.rows.map((r) => r.id);
  }

  async writeFrames(collection: string, records: FrameRecord[], mode: "upsert" | "insert"): Promise<number> {
    if (records.length === 0) return 0;
    const conflict =
      mode === "upsert"
        ? `ON CONFLICT (collection, id) DO UPDATE SET
             embedding = EXCLUDED.embedding,
             video_path = EXCLUDED.video_path,
             video_name = EXCLUDED.video_name,
             scene_idx = EXCLUDED.scene_idx,
             frame_idx = EXCLUDED.frame_idx,
             frame_sample = EXCLUDED.frame_sample,
             updated_at = now()`
        : "";

    const client = await this.pool.connect();
    // Set when the connection can no longer be trusted; release(err) discards it.
    let broken: Error | undefined;
    try {
      await client.query("BEGIN");
      const batchSize = 200;
      let written = 0;
      for (let i = 0; i < records.length; i += batchSize) {
        const batch = records.slice(i, i + batchSize);
        const values: Array<string | number> = [];
        const placeholders: string[] = [];
        let p = 1;
        for (const r of batch) {
          placeholders.push(`($${p++}, $${p++}, $${p++}::vector, $${p++}, $${p++}, $${p++}, $${p++}, $${p++})`);
          values.push(
            collection,
            r.id,
            toPgVector(r.embedding),
            r.metadata.video_path,
            r.metadata.video_name,
            r.metadata.scene_idx,
            r.metadata.frame_idx,
            r.metadata.frame_sample,
          );
        }
        const res = await client.query(
          `INSERT INTO frame_embeddings (collection, id, embedding, video_path, video_name, scene_idx, frame_idx, frame_sample)
           VALUES ${placeholders.join(", ")}
           ${conflict}`,
          values,
        );
        written += res.rowCount ?? 0;
      }
      await client.query("COMMIT");
      return written;
    } catch (err) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackErr) {
        broken = rollbackErr instanceof Error ? rollbackErr : new Error(String(rollbackErr));
      }
      throw err;
    } finally {
      client.release(broken);
    }
  }

  async nearestFrames(
    collection: string,
    vector: number[],
    k: number,
    where?: FrameMetadataFilter,
  ): Promise<QueryHit[]> {
    const filter = buildMetadataWhere(where, 4);
    const res = await this.pool.query<FrameRow & { distance: number }>(
      `SELECT ${FRAME_COLUMNS}, (embedding <=> $2::vector) AS distance
       FROM frame_embeddings
       WHERE collection = $1${filter.sql}
       ORDER BY embedding <=> $2::vector ASC, id ASC
       LIMIT $3`,
      [collection, toPgVector(vector), k, ...filter.params],
    );
    return res.rows.map((r) => ({ id: r.id, distance: Number(r.distance), metadata: toMetadata(r) }));
  }

  async findFramesByMetadata(collection: string, where: FrameMetadataFilter, k: number): Promise<QueryHit[]> {
    const filter = buildMetadataWhere(where, 3);
    const res = await this.pool.query<FrameRow>(
      `SELECT ${FRAME_COLUMNS}
       FROM frame_embeddings
       WHERE collection = $1${filter.sql}
       ORDER BY video_name ASC, scene_idx ASC, frame_idx ASC, id ASC
       LIMIT $2`,
      [collection, k, ...filter.params],
    );
    return res.rows.map((r) => ({ id: r.id, distance: null, metadata: toMetadata(r) }));
  }

  async getFrames(collection: string, ids?: string[]): Promise<FrameRecord[]> {
    const res = await this.pool.query<FrameRow & { embedding: string }>(
      `SELECT ${FRAME_COLUMNS}, embedding::text AS embedding
       FROM frame_embeddings
       WHERE collection = $1 AND ($2::text[] IS NULL OR id = ANY($2::text[]))
       ORDER BY video_name ASC, scene_idx ASC, frame_idx ASC, id ASC`,
      [collection, ids ?? null],
    );
    return res.rows.map((r) => ({ id: r.id, embedding: parsePgVector(r.embedding), metadata: toMetadata(r) }));
  }

  async deleteFrames(collection: string, ids: string[]): Promise<number> {
    if (ids.length === 0) return 0;
    const res = await this.pool.query(
      `DELETE FROM frame_embeddings WHERE collection = $1 AND id = ANY($2::text[])`,
      [collection, ids],
    );
    return res.rowCount ?? 0;
  }

  async deleteAllFrames(collection: string): Promise<number> {
    const res = await this.pool.query(`DELETE FROM frame_embeddings WHERE collection = $1`, [collection]);
    return res.rowCount ?? 0;
  }
}
