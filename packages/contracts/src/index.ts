import { z } from "zod";

export const IdSchema = z.string().min(1);
export type Id = z.infer<typeof IdSchema>;

export const FrameNumberSchema = z.number().int().nonnegative();
export type FrameNumber = z.infer<typeof FrameNumberSchema>;

export const IsoDateTimeSchema = z.string().min(1);
export type IsoDateTime = z.infer<typeof IsoDateTimeSchema>;

// ─── Failures ────────────────────────────────────────────────────────────────

export const FailureKindSchema = z.enum([
  "input_not_found",
  "decode_failure",
  "no_scenes_detected",
  "encoder_unavailable",
  "store_write_failure",
  "store_query_failure",
  "empty_input",
]);
export type FailureKind = z.infer<typeof FailureKindSchema>;

export const FailureSchema = z.object({
  kind: FailureKindSchema,
  message: z.string().min(1),
  details: z.unknown().optional(),
});
export type Failure = z.infer<typeof FailureSchema>;

// ─── Scenes & samples ────────────────────────────────────────────────────────

export const SceneBoundarySchema = z
  .object({
    start_frame: FrameNumberSchema,
    // Exclusive.
    end_frame: FrameNumberSchema,
  })
  .refine((s) => s.start_frame <= s.end_frame, { message: "start_frame must be <= end_frame" });
export type SceneBoundary = z.infer<typeof SceneBoundarySchema>;

export const SamplingPolicySchema = z.object({
  count: z.number().int().min(1).max(100).default(3),
  clamp: z.boolean().default(true),
  dedupe: z.boolean().default(true),
});
export type SamplingPolicy = z.infer<typeof SamplingPolicySchema>;

// ─── Frame records ───────────────────────────────────────────────────────────

export const FrameMetadataSchema = z.object({
  video_path: z.string().min(1),
  video_name: z.string().min(1),
  scene_idx: FrameNumberSchema,
  frame_idx: FrameNumberSchema,
  frame_sample: FrameNumberSchema,
});
export type FrameMetadata = z.infer<typeof FrameMetadataSchema>;

export const FrameMetadataFieldSchema = FrameMetadataSchema.keyof();
export type FrameMetadataField = z.infer<typeof FrameMetadataFieldSchema>;

// Equality predicates; every key present must match.
export const FrameMetadataFilterSchema = FrameMetadataSchema.partial().strict();
export type FrameMetadataFilter = z.infer<typeof FrameMetadataFilterSchema>;

export const EmbeddingSchema = z.array(z.number()).min(1);
export type Embedding = z.infer<typeof EmbeddingSchema>;

export const FrameRecordSchema = z.object({
  id: IdSchema,
  embedding: EmbeddingSchema,
  metadata: FrameMetadataSchema,
});
export type FrameRecord = z.infer<typeof FrameRecordSchema>;

export const QueryHitSchema = z.object({
  id: IdSchema,
  // null for metadata-only queries.
  distance: z.number().nullable(),
  metadata: FrameMetadataSchema,
});
export type QueryHit = z.infer<typeof QueryHitSchema>;

export const QueryResultSchema = z.array(QueryHitSchema);
export type QueryResult = z.infer<typeof QueryResultSchema>;

// ─── Collections ─────────────────────────────────────────────────────────────

export const DuplicatePolicySchema = z.enum(["upsert", "reject"]);
export type DuplicatePolicy = z.infer<typeof DuplicatePolicySchema>;

export const CollectionInfoSchema = z.object({
  name: z.string().min(1),
  dimensions: z.number().int().positive(),
  total_embeddings: z.number().int().nonnegative(),
  database: z.string().nullable(),
  created_at: IsoDateTimeSchema.nullable(),
});
export type CollectionInfo = z.infer<typeof CollectionInfoSchema>;

export const InsertOutcomeSchema = z.object({
  // false when there was nothing to insert.
  acted: z.boolean(),
  written: z.number().int().nonnegative(),
  count_before: z.number().int().nonnegative(),
  count_after: z.number().int().nonnegative(),
  // Ids that were stored under another video before this upsert overwrote them.
  replaced_ids: z.array(IdSchema),
});
export type InsertOutcome = z.infer<typeof InsertOutcomeSchema>;

export const SceneSummarySchema = z.object({
  scene_idx: FrameNumberSchema,
  frame_ids: z.array(IdSchema),
});
export type SceneSummary = z.infer<typeof SceneSummarySchema>;

export const VideoSummarySchema = z.object({
  video_name: z.string().min(1),
  video_path: z.string().min(1),
  frames: z.number().int().nonnegative(),
  scenes: z.array(SceneSummarySchema),
});
export type VideoSummary = z.infer<typeof VideoSummarySchema>;

// ─── Indexing outcomes ───────────────────────────────────────────────────────

export const SkippedFrameSchema = z.object({
  scene_idx: FrameNumberSchema,
  frame_idx: FrameNumberSchema,
  frame_sample: FrameNumberSchema,
  error: FailureSchema,
});
export type SkippedFrame = z.infer<typeof SkippedFrameSchema>;

export const VideoOutcomeSchema = z.object({
  video_path: z.string().min(1),
  video_name: z.string().min(1),
  success: z.boolean(),
  embeddings_count: z.number().int().nonnegative(),
  scenes_count: z.number().int().nonnegative(),
  threshold_used: z.number().nullable(),
  fallback_scene: z.boolean(),
  skipped_frames: z.array(SkippedFrameSchema),
  replaced_ids: z.array(IdSchema),
  error: FailureSchema.nullable(),
  collection_snapshot: CollectionInfoSchema.nullable(),
});
export type VideoOutcome = z.infer<typeof VideoOutcomeSchema>;

export const BatchSummarySchema = z.object({
  videos_total: z.number().int().nonnegative(),
  videos_succeeded: z.number().int().nonnegative(),
  videos_failed: z.number().int().nonnegative(),
  embeddings_total: z.number().int().nonnegative(),
  collection_total: z.number().int().nonnegative().nullable(),
  outcomes: z.array(VideoOutcomeSchema),
});
export type BatchSummary = z.infer<typeof BatchSummarySchema>;

// ─── Search ──────────────────────────────────────────────────────────────────

export const SearchRequestSchema = z.object({
  query: z.string().trim().min(1),
  k: z.number().int().min(1).max(1000).default(10),
  persist_images: z.boolean().default(true),
  video_name: z.string().min(1).optional(),
});
export type SearchRequest = z.infer<typeof SearchRequestSchema>;

export const RankedHitSchema = z.object({
  rank: z.number().int().positive(),
  id: IdSchema,
  distance: z.number(),
  similarity: z.number(),
  metadata: FrameMetadataSchema,
});
export type RankedHit = z.infer<typeof RankedHitSchema>;

export const SavedFrameSchema = z.object({
  rank: z.number().int().positive(),
  id: IdSchema,
  file_path: z.string().min(1),
});
export type SavedFrame = z.infer<typeof SavedFrameSchema>;

export const SkippedHitSchema = z.object({
  id: IdSchema,
  error: FailureSchema,
});
export type SkippedHit = z.infer<typeof SkippedHitSchema>;

export const SearchOutcomeSchema = z.object({
  query: z.string(),
  output_dir: z.string().nullable(),
  hits: z.array(RankedHitSchema),
  saved: z.array(SavedFrameSchema),
  skipped: z.array(SkippedHitSchema),
  empty: z.boolean(),
});
export type SearchOutcome = z.infer<typeof SearchOutcomeSchema>;

// ─── Configuration ───────────────────────────────────────────────────────────

export const IndexingConfigSchema = z.object({
  collection: z.string().trim().min(1).default("video_embeddings"),
  // Ordered strict → loose, on the 0–100 scene-change score scale.
  sceneThresholds: z.array(z.number().min(0).max(100)).min(1).default([15, 10, 5, 2]),
  minSceneLength: z.number().int().min(1).default(15),
  sampling: SamplingPolicySchema.default({}),
  duplicatePolicy: DuplicatePolicySchema.default("upsert"),
  dimensions: z.number().int().positive().default(512),
  matchedDir: z.string().min(1).default("matched_imgs"),
});
export type IndexingConfig = z.infer<typeof IndexingConfigSchema>;

export const VideoExtensionsSchema = z.array(z.string().regex(/^\.[a-z0-9]+$/i)).min(1);
export const DEFAULT_VIDEO_EXTENSIONS = [".mp4", ".avi", ".mov", ".mkv", ".wmv", ".flv", ".webm"] as const;
