import {
  EmbeddingExtractor,
  FfmpegVideoDecoder,
  FrameCollection,
  IndexingPipeline,
  PgFrameEmbeddingRepo,
  RetrievalEngine,
  closePool,
  createEncoderFromEnv,
  createLogger,
  createMatchedFrameStore,
  describeDatabase,
  getPool,
  getVidxDefault,
  initMetrics,
  loadIndexingConfig,
  type Logger,
  type Metrics,
} from "@vidx/core";
import type { IndexingConfig } from "@vidx/contracts";

export type RuntimeOpts = {
  collection?: string;
  env?: Record<string, string | undefined>;
  logger?: Logger;
};

/**
 * Everything a command needs, built once per process. The encoder is only
 * created when a command asks for it, so store-only commands work without one.
 */
export class Runtime {
  readonly config: IndexingConfig;
  readonly logger: Logger;
  readonly metrics: Metrics;
  readonly collection: FrameCollection;
  private readonly env: Record<string, string | undefined>;
  private extractor: EmbeddingExtractor | null = null;
  private readonly decoder = new FfmpegVideoDecoder();

  constructor(opts?: RuntimeOpts) {
    this.env = opts?.env ?? process.env;
    this.logger = opts?.logger ?? createLogger({ stderr: true });
    this.config = loadIndexingConfig(this.env, opts?.collection ? { collection: opts.collection } : undefined);
    this.metrics = initMetrics();

    const pool = getPool(this.env);
    const database = describeDatabase(this.env.DATABASE_URL || getVidxDefault("DATABASE_URL"));
    this.collection = new FrameCollection(new PgFrameEmbeddingRepo(pool, database), {
      name: this.config.collection,
      dimensions: this.config.dimensions,
      duplicatePolicy: this.config.duplicatePolicy,
      logger: this.logger,
    });
  }

  private getExtractor(): EmbeddingExtractor {
    if (!this.extractor) {
      this.extractor = new EmbeddingExtractor(
        createEncoderFromEnv(this.env, {
          retry: {
            onRetry: (attempt, err, delayMs) =>
              this.logger.warn({ attempt, delayMs, err: err.message }, "Retrying encoder call"),
          },
        }),
      );
    }
    return this.extractor;
  }

  pipeline(): IndexingPipeline {
    return new IndexingPipeline({
      decoder: this.decoder,
      extractor: this.getExtractor(),
      collection: this.collection,
      config: this.config,
      logger: this.logger,
      metrics: this.metrics,
    });
  }

  retrieval(): RetrievalEngine {
    return new RetrievalEngine({
      extractor: this.getExtractor(),
      collection: this.collection,
      decoder: this.decoder,
      frameStore: createMatchedFrameStore(this.config.matchedDir),
      logger: this.logger,
      metrics: this.metrics,
    });
  }

  async close(): Promise<void> {
    await closePool();
  }
}
