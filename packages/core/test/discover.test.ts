import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { findVideos } from "../src/frames/discover";

async function makeDir(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "vidx-discover-"));
  await fs.writeFile(path.join(dir, "b.mkv"), "");
  await fs.writeFile(path.join(dir, "a.MP4"), "");
  await fs.writeFile(path.join(dir, "notes.txt"), "");
  await fs.mkdir(path.join(dir, "nested.mp4"));
  return dir;
}

test("findVideos lists video files case-insensitively and sorted", async () => {
  const dir = await makeDir();
  try {
    const res = await findVideos(dir);
    assert.equal(res.ok, true);
    if (res.ok) assert.deepEqual(res.value, [path.join(dir, "a.MP4"), path.join(dir, "b.mkv")]);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

test("findVideos honours custom extensions", async () => {
  const dir = await makeDir();
  try {
    const res = await findVideos(dir, [".txt"]);
    assert.equal(res.ok, true);
    if (res.ok) assert.deepEqual(res.value, [path.join(dir, "notes.txt")]);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

test("findVideos reports a missing directory as input_not_found", async () => {
  const res = await findVideos(path.join(os.tmpdir(), "vidx-does-not-exist-7f3a"));
  assert.equal(res.ok, false);
  if (!res.ok) {
    assert.equal(res.error.kind, "input_not_found");
    assert.match(res.error.message, /^Directory not found: /);
  }
});
