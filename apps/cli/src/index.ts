#!/usr/bin/env -S node --import tsx
import { Command } from "commander";
import { ZodError } from "zod";
import { SearchRequestSchema, VideoExtensionsSchema, type BatchSummary } from "@vidx/contracts";
import { PipelineError, closePool, getPool, logger, migrateDb } from "@vidx/core";
import { formatBatchSummary, formatMs, formatReplaced, hitRow, outcomeRow, printTable, truncate } from "./format.js";
import { Runtime } from "./runtime.js";

type GlobalOpts = { collection?: string; json: boolean; metrics: boolean };

function asInt(input: string, fallback: number): number {
  const n = Number(input);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

function handleErr(err: unknown): never {
  if (err instanceof PipelineError) {
    console.error(`error: ${err.kind}: ${err.message}`);
    process.exit(1);
  }
  if (err instanceof ZodError) {
    const issues = err.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    console.error(`error: invalid input: ${issues}`);
    process.exit(1);
  }
  if (err instanceof Error) {
    console.error(`error: ${err.message}`);
    process.exit(1);
  }
  console.error(`error: ${String(err)}`);
  process.exit(1);
}

const program = new Command();
program
  .name("vidx")
  .description("Index video frames by scene and search them with natural language")
  .option("--collection <name>", "Collection name (or env VIDX_COLLECTION)")
  .option("--json", "Machine-friendly JSON output", false)
  .option("--metrics", "Print Prometheus metrics to stderr when done", false);

function printOutcomeNotes(summary: BatchSummary): void {
  for (const o of summary.outcomes) {
    if (o.error) console.log(`${o.video_name}: ${o.error.kind}: ${o.error.message}`);
    const replaced = formatReplaced(o);
    if (replaced) console.log(replaced);
  }
}

async function withRuntime(fn: (rt: Runtime, opts: GlobalOpts) => Promise<void>): Promise<void> {
  const opts = program.opts<GlobalOpts>();
  const rt = new Runtime({ collection: opts.collection });
  try {
    await fn(rt, opts);
    if (opts.metrics) console.error(await rt.metrics.register.metrics());
  } finally {
    await rt.close();
  }
}

program
  .command("index")
  .description("Segment, sample, embed and store one or more videos")
  .argument("<videos...>", "Video file paths")
  .action(async (videos: string[]) => {
    await withRuntime(async (rt, opts) => {
      const startedAt = Date.now();
      const summary = await rt.pipeline().indexVideos(videos);
      if (summary.videos_failed > 0) process.exitCode = 1;
      if (opts.json) {
        console.log(JSON.stringify(summary, null, 2));
        return;
      }
      printTable(summary.outcomes.map(outcomeRow));
      printOutcomeNotes(summary);
      console.log(`${formatBatchSummary(summary)} in ${formatMs(Date.now() - startedAt)}`);
    });
  });

program
  .command("index-dir")
  .description("Index every video file in a directory")
  .argument("<dir>", "Directory containing videos")
  .option("--ext <csv>", "Comma-separated extensions (default .mp4,.avi,.mov,.mkv,.wmv,.flv,.webm)")
  .action(async (dir: string, cmd: { ext?: string }) => {
    await withRuntime(async (rt, opts) => {
      const extensions = cmd.ext
        ? VideoExtensionsSchema.parse(
            cmd.ext
              .split(",")
              .map((s) => s.trim())
              .filter(Boolean)
              .map((e) => (e.startsWith(".") ? e : `.${e}`)),
          )
        : undefined;
      const summary = await rt.pipeline().indexDirectory(dir, extensions);
      if (summary.videos_failed > 0) process.exitCode = 1;
      if (opts.json) {
        console.log(JSON.stringify(summary, null, 2));
        return;
      }
      if (summary.videos_total === 0) {
        console.log(`no videos found in ${dir}`);
        return;
      }
      printTable(summary.outcomes.map(outcomeRow));
      printOutcomeNotes(summary);
      console.log(formatBatchSummary(summary));
    });
  });

program
  .command("search")
  .description("Find frames matching a text query")
  .argument("<query...>", "Query text")
  .option("--k <n>", "Number of results", "10")
  .option("--video <name>", "Only search frames from this video (file name)")
  .option("--no-save", "Do not write matched frames to disk")
  .action(async (words: string[], cmd: { k: string; video?: string; save: boolean }) => {
    await withRuntime(async (rt, opts) => {
      const req = SearchRequestSchema.parse({
        query: words.join(" "),
        k: Number(cmd.k),
        persist_images: cmd.save,
        video_name: cmd.video,
      });
      const res = await rt.retrieval().searchByText(req.query, {
        k: req.k,
        persistImages: req.persist_images,
        videoName: req.video_name,
      });
      if (!res.ok) throw res.error;
      const out = res.value;
      if (opts.json) {
        console.log(JSON.stringify(out, null, 2));
        return;
      }
      if (out.empty) {
        console.log(`no matches for "${truncate(req.query, 60)}"`);
        return;
      }
      printTable(out.hits.map(hitRow));
      if (out.output_dir) console.log(`saved ${out.saved.length} frame(s) to ${out.output_dir}`);
      for (const s of out.skipped) console.log(`skipped ${s.id}: ${s.error.message}`);
    });
  });

program
  .command("similar")
  .description("Find frames similar to an indexed frame")
  .argument("<frameId>", "Frame id, e.g. scene_0_frame_1_sample_30")
  .option("--k <n>", "Number of results", "10")
  .action(async (frameId: string, cmd: { k: string }) => {
    await withRuntime(async (rt, opts) => {
      const res = await rt.retrieval().searchSimilarToFrame(frameId, asInt(cmd.k, 10));
      if (!res.ok) throw res.error;
      if (opts.json) {
        console.log(JSON.stringify({ id: frameId, hits: res.value }, null, 2));
        return;
      }
      if (res.value.length === 0) {
        console.log("no similar frames");
        return;
      }
      printTable(res.value.map(hitRow));
    });
  });

program
  .command("videos")
  .description("List indexed videos")
  .action(async () => {
    await withRuntime(async (rt, opts) => {
      const res = await rt.collection.summarizeVideos();
      if (!res.ok) throw res.error;
      if (opts.json) {
        console.log(JSON.stringify({ videos: res.value }, null, 2));
        return;
      }
      if (res.value.length === 0) {
        console.log("no videos indexed");
        return;
      }
      printTable(
        res.value.map((v) => ({
          video: truncate(v.video_name, 40),
          scenes: v.scenes.length,
          frames: v.frames,
          path: v.video_path,
        })),
      );
    });
  });

program
  .command("scenes")
  .description("List indexed scenes and their frame ids")
  .option("--video <name>", "Only this video (file name)")
  .action(async (cmd: { video?: string }) => {
    await withRuntime(async (rt, opts) => {
      const res = await rt.collection.summarizeVideos(cmd.video);
      if (!res.ok) throw res.error;
      if (opts.json) {
        console.log(JSON.stringify({ videos: res.value }, null, 2));
        return;
      }
      const rows = res.value.flatMap((v) =>
        v.scenes.map((s) => ({
          video: truncate(v.video_name, 40),
          scene: s.scene_idx,
          frames: s.frame_ids.length,
          ids: s.frame_ids.join(" "),
        })),
      );
      if (rows.length === 0) {
        console.log(cmd.video ? `no scenes indexed for ${cmd.video}` : "no scenes indexed");
        return;
      }
      printTable(rows);
    });
  });

program
  .command("info")
  .description("Show collection information")
  .action(async () => {
    await withRuntime(async (rt, opts) => {
      const res = await rt.collection.info();
      if (!res.ok) throw res.error;
      if (opts.json) {
        console.log(JSON.stringify(res.value, null, 2));
        return;
      }
      console.log(`collection: ${res.value.name}`);
      console.log(`dimensions: ${res.value.dimensions}`);
      console.log(`embeddings: ${res.value.total_embeddings}`);
      console.log(`database: ${res.value.database ?? "unknown"}`);
      if (res.value.created_at) console.log(`created_at: ${res.value.created_at}`);
    });
  });

program
  .command("delete")
  .description("Delete frame embeddings by id")
  .argument("<ids...>", "Frame ids")
  .action(async (ids: string[]) => {
    await withRuntime(async (rt, opts) => {
      const res = await rt.collection.delete(ids);
      if (!res.ok) throw res.error;
      if (opts.json) console.log(JSON.stringify({ deleted: res.value }, null, 2));
      else console.log(`deleted ${res.value} of ${ids.length} frame(s)`);
    });
  });

program
  .command("clear")
  .description("Delete every embedding in the collection")
  .option("--yes", "Confirm", false)
  .action(async (cmd: { yes: boolean }) => {
    if (!cmd.yes) handleErr(new Error("refusing to clear the collection without --yes"));
    await withRuntime(async (rt, opts) => {
      const res = await rt.collection.clear();
      if (!res.ok) throw res.error;
      if (opts.json) console.log(JSON.stringify({ deleted: res.value }, null, 2));
      else console.log(`cleared ${rt.collection.name}: ${res.value} embedding(s) deleted`);
    });
  });

program
  .command("migrate")
  .description("Apply database migrations")
  .action(async () => {
    try {
      const res = await migrateDb({ pool: getPool(), logger });
      const opts = program.opts<GlobalOpts>();
      if (opts.json) console.log(JSON.stringify({ ok: true, applied: res.applied }, null, 2));
      else console.log(res.applied.length ? `applied ${res.applied.join(", ")}` : "database is up to date");
    } finally {
      await closePool();
    }
  });

program.parseAsync(process.argv).catch(handleErr);
