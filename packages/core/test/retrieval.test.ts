import test from "node:test";
import assert from "node:assert/strict";
import type { FrameRecord } from "@vidx/contracts";
import { EmbeddingExtractor } from "../src/embeddings/extractor";
import { buildFrameId, buildFrameMetadata } from "../src/frames/identity";
import { createMetrics } from "../src/metrics/metrics";
import { RetrievalEngine } from "../src/search/retrieval";
import { FrameCollection } from "../src/store/collection";
import {
  FakeVideoDecoder,
  MemoryFrameEmbeddingRepo,
  MemoryMatchedFrameStore,
  makeEncoder,
  scoresWithCuts,
  unitVector,
} from "./helpers/fakes";

const DIMS = 8;

function record(videoPath: string, scene: number, frame: number, sample: number, embedding: number[]): FrameRecord {
  return { id: buildFrameId(scene, frame, sample), embedding, metadata: buildFrameMetadata(videoPath, scene, frame, sample) };
}

const KITCHEN = record("/videos/a.mp4", 0, 0, 0, unitVector(DIMS, 0));
const STOVE = record("/videos/a.mp4", 1, 0, 90, [0.8, 0.6, 0, 0, 0, 0, 0, 0]);
const GARDEN = record("/videos/b.mp4", 0, 0, 10, unitVector(DIMS, 1));

async function setup(opts?: { records?: FrameRecord[]; failText?: Error }) {
  const repo = new MemoryFrameEmbeddingRepo();
  const collection = new FrameCollection(repo, { name: "frames", dimensions: DIMS });
  const inserted = await collection.insert(opts?.records ?? [KITCHEN, STOVE, GARDEN]);
  assert.equal(inserted.ok, true);

  const decoder = new FakeVideoDecoder({ "/videos/a.mp4": { scores: scoresWithCuts(200, {}) } });
  const frameStore = new MemoryMatchedFrameStore();
  const metrics = createMetrics();
  const engine = new RetrievalEngine({
    extractor: new EmbeddingExtractor(
      makeEncoder({ dims: DIMS, text: () => unitVector(DIMS, 0), failText: opts?.failText }),
    ),
    collection,
    decoder,
    frameStore,
    metrics,
  });
  return { engine, repo, decoder, frameStore, metrics };
}

async function searchCount(metrics: ReturnType<typeof createMetrics>, status: string): Promise<number> {
  const metric = await metrics.searchesTotal.get();
  return metric.values.find((v) => v.labels.status === status)?.value ?? 0;
}

test("searchByText ranks by ascending distance and saves matched frames", async () => {
  const { engine, decoder, frameStore } = await setup();
  const res = await engine.searchByText("kitchen scene", { k: 3 });
  assert.equal(res.ok, true);
  if (!res.ok) return;
  const out = res.value;

  assert.deepEqual(
    out.hits.map((h) => [h.rank, h.id]),
    [
      [1, "scene_0_frame_0_sample_0"],
      [2, "scene_1_frame_0_sample_90"],
      [3, "scene_0_frame_0_sample_10"],
    ],
  );
  for (let i = 1; i < out.hits.length; i++) {
    assert.ok((out.hits[i]?.distance ?? 0) >= (out.hits[i - 1]?.distance ?? 0));
  }
  for (const h of out.hits) {
    assert.ok(h.similarity >= -1 && h.similarity <= 1);
    assert.ok(Math.abs(h.similarity - (1 - h.distance)) < 1e-12);
  }

  assert.equal(out.output_dir, "out/kitchen_scene");
  assert.deepEqual(out.saved, [
    { rank: 1, id: "scene_0_frame_0_sample_0", file_path: "out/kitchen_scene/01_scene_0_frame_0_sample_0_similarity_1.000.jpg" },
    { rank: 2, id: "scene_1_frame_0_sample_90", file_path: "out/kitchen_scene/02_scene_1_frame_0_sample_90_similarity_0.800.jpg" },
  ]);
  assert.equal(frameStore.files.get("out/kitchen_scene/01_scene_0_frame_0_sample_0_similarity_1.000.jpg")?.toString(), "/videos/a.mp4#0");
  assert.deepEqual(decoder.reads, [
    { path: "/videos/a.mp4", frame: 0 },
    { path: "/videos/a.mp4", frame: 90 },
  ]);
  assert.deepEqual(decoder.closed, ["/videos/a.mp4", "/videos/a.mp4"]);

  // b.mp4 is not decodable here, so its hit is reported rather than aborting the search.
  assert.equal(out.skipped.length, 1);
  assert.equal(out.skipped[0]?.id, "scene_0_frame_0_sample_10");
  assert.equal(out.skipped[0]?.error.kind, "decode_failure");
  assert.equal(out.skipped[0]?.error.message, "could not open video /videos/b.mp4");
  assert.equal(out.empty, false);
});

test("a frame that cannot be written is skipped, the rest are saved", async () => {
  const { engine, frameStore } = await setup({ records: [KITCHEN, STOVE] });
  frameStore.failFor = "scene_0_frame_0_sample_0";
  const res = await engine.searchByText("kitchen scene", { k: 2 });
  assert.equal(res.ok, true);
  if (!res.ok) return;
  assert.deepEqual(res.value.saved.map((s) => s.id), ["scene_1_frame_0_sample_90"]);
  assert.deepEqual(res.value.skipped.map((s) => s.id), ["scene_0_frame_0_sample_0"]);
});

test("searchByText without persisting writes nothing", async () => {
  const { engine, decoder, frameStore } = await setup();
  const res = await engine.searchByText("kitchen scene", { k: 2, persistImages: false });
  assert.equal(res.ok, true);
  if (!res.ok) return;
  assert.equal(res.value.hits.length, 2);
  assert.equal(res.value.output_dir, null);
  assert.deepEqual(res.value.saved, []);
  assert.equal(frameStore.files.size, 0);
  assert.deepEqual(decoder.opened, []);
});

test("searchByText can be scoped to one video", async () => {
  const { engine } = await setup();
  const res = await engine.searchByText("kitchen scene", { k: 5, persistImages: false, videoName: "b.mp4" });
  assert.equal(res.ok, true);
  if (res.ok) assert.deepEqual(res.value.hits.map((h) => h.id), ["scene_0_frame_0_sample_10"]);
});

test("an empty collection gives an informative empty outcome", async () => {
  const { engine } = await setup({ records: [] });
  const res = await engine.searchByText("anything");
  assert.deepEqual(res, {
    ok: true,
    value: { query: "anything", output_dir: null, hits: [], saved: [], skipped: [], empty: true },
  });
});

test("encoder failures are reported and counted", async () => {
  const { engine, metrics } = await setup({ failText: new Error("connect ECONNREFUSED 127.0.0.1:48600") });
  const res = await engine.searchByText("kitchen scene", { k: 1, persistImages: false });
  assert.equal(res.ok, false);
  if (!res.ok) assert.equal(res.error.kind, "encoder_unavailable");
  assert.equal(await searchCount(metrics, "error"), 1);
  assert.equal(await searchCount(metrics, "ok"), 0);
});

test("searchSimilarToFrame excludes the frame itself", async () => {
  const { engine, metrics } = await setup();
  const res = await engine.searchSimilarToFrame("scene_0_frame_0_sample_0", 2);
  assert.equal(res.ok, true);
  if (res.ok) {
    assert.deepEqual(
      res.value.map((h) => [h.rank, h.id]),
      [
        [1, "scene_1_frame_0_sample_90"],
        [2, "scene_0_frame_0_sample_10"],
      ],
    );
  }
  assert.equal(await searchCount(metrics, "ok"), 1);
});

test("searchSimilarToFrame with an unknown id is empty_input", async () => {
  const { engine } = await setup();
  const res = await engine.searchSimilarToFrame("scene_9_frame_9_sample_9", 3);
  assert.equal(res.ok, false);
  if (!res.ok) {
    assert.equal(res.error.kind, "empty_input");
    assert.equal(res.error.message, "frame not found: scene_9_frame_9_sample_9");
  }
});

test("searchSimilarToFrame refuses ids that are not frame ids without querying the store", async () => {
  const { engine, repo } = await setup();
  const before = repo.calls;
  const res = await engine.searchSimilarToFrame("holiday.mp4", 3);
  assert.equal(res.ok, false);
  if (!res.ok) {
    assert.equal(res.error.kind, "empty_input");
    assert.equal(res.error.message, "not a frame id: holiday.mp4");
  }
  assert.equal(repo.calls, before);
});
