import test from "node:test";
import assert from "node:assert/strict";
import { ZodError } from "zod";
import { loadIndexingConfig } from "../src/config/indexing";
import { parseDotEnv } from "../src/config/defaults";

test("loadIndexingConfig applies defaults", () => {
  const cfg = loadIndexingConfig({ VIDX_COLLECTION: "video_embeddings", VIDX_EMBED_DIMENSIONS: "512", VIDX_MATCHED_DIR: "matched_imgs" });
  assert.deepEqual(cfg, {
    collection: "video_embeddings",
    sceneThresholds: [15, 10, 5, 2],
    minSceneLength: 15,
    sampling: { count: 3, clamp: true, dedupe: true },
    duplicatePolicy: "upsert",
    dimensions: 512,
    matchedDir: "matched_imgs",
  });
});

test("loadIndexingConfig reads indexing settings from env", () => {
  const cfg = loadIndexingConfig({
    VIDX_COLLECTION: "clips",
    VIDX_SCENE_THRESHOLDS: "30, 20 ,8",
    VIDX_MIN_SCENE_LENGTH: "5",
    VIDX_SAMPLES_PER_SCENE: "4",
    VIDX_SAMPLE_CLAMP: "false",
    VIDX_SAMPLE_DEDUPE: "no",
    VIDX_DUPLICATE_POLICY: "reject",
    VIDX_EMBED_DIMENSIONS: "768",
    VIDX_MATCHED_DIR: "/tmp/out",
  });
  assert.equal(cfg.collection, "clips");
  assert.deepEqual(cfg.sceneThresholds, [30, 20, 8]);
  assert.equal(cfg.minSceneLength, 5);
  assert.deepEqual(cfg.sampling, { count: 4, clamp: false, dedupe: false });
  assert.equal(cfg.duplicatePolicy, "reject");
  assert.equal(cfg.dimensions, 768);
  assert.equal(cfg.matchedDir, "/tmp/out");
});

test("loadIndexingConfig overrides win over env", () => {
  const cfg = loadIndexingConfig({ VIDX_COLLECTION: "clips" }, { collection: "other" });
  assert.equal(cfg.collection, "other");
});

test("loadIndexingConfig rejects malformed values", () => {
  assert.throws(() => loadIndexingConfig({ VIDX_SAMPLE_CLAMP: "maybe" }), /invalid VIDX_SAMPLE_CLAMP: maybe/);
  assert.throws(() => loadIndexingConfig({ VIDX_DUPLICATE_POLICY: "skip" }), ZodError);
  assert.throws(() => loadIndexingConfig({ VIDX_SCENE_THRESHOLDS: "150" }), ZodError);
  assert.throws(() => loadIndexingConfig({ VIDX_SCENE_THRESHOLDS: "," }), ZodError);
  assert.throws(() => loadIndexingConfig({ VIDX_SAMPLES_PER_SCENE: "0" }), ZodError);
});

test("parseDotEnv handles comments, quotes and junk lines", () => {
  const env = parseDotEnv(
    ["# comment", "", "VIDX_COLLECTION=clips", 'VIDX_ENCODER_URL="http://encoder:8000"', "VIDX_MATCHED_DIR='out dir'", "not a pair"].join("\n"),
  );
  assert.deepEqual(env, {
    VIDX_COLLECTION: "clips",
    VIDX_ENCODER_URL: "http://encoder:8000",
    VIDX_MATCHED_DIR: "out dir",
  });
});
