import test from "node:test";
import assert from "node:assert/strict";
import { buildFrameId, buildFrameMetadata, parseFrameId } from "../src/frames/identity";

test("buildFrameId is deterministic", () => {
  assert.equal(buildFrameId(2, 1, 130), "scene_2_frame_1_sample_130");
  assert.equal(buildFrameId(2, 1, 130), buildFrameId(2, 1, 130));
  assert.notEqual(buildFrameId(2, 1, 130), buildFrameId(2, 2, 130));
});

test("parseFrameId reverses buildFrameId", () => {
  assert.deepEqual(parseFrameId("scene_2_frame_1_sample_130"), { scene_idx: 2, frame_idx: 1, frame_sample: 130 });
  assert.equal(parseFrameId("scene_2_frame_1"), null);
  assert.equal(parseFrameId("scene_a_frame_1_sample_2"), null);
});

test("buildFrameMetadata derives video_name from the path", () => {
  assert.deepEqual(buildFrameMetadata("/videos/trips/beach day.mp4", 0, 2, 60), {
    video_path: "/videos/trips/beach day.mp4",
    video_name: "beach day.mp4",
    scene_idx: 0,
    frame_idx: 2,
    frame_sample: 60,
  });
});

test("identity builders reject invalid input", () => {
  assert.throws(() => buildFrameId(-1, 0, 0), /scene_idx must be a non-negative integer/);
  assert.throws(() => buildFrameId(0, 0.5, 0), /frame_idx/);
  assert.throws(() => buildFrameMetadata("", 0, 0, 0), /video_path must not be empty/);
});
