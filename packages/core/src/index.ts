export * from "./errors";
export * from "./logger";

export * from "./config/defaults";
export * from "./config/indexing";

export * from "./db/pool";
export * from "./db/migrate";

export * from "./metrics/metrics";
export * from "./util/retry";

export * from "./frames/scores";
export * from "./frames/probe";
export * from "./frames/decoder";
export * from "./frames/segment";
export * from "./frames/sample";
export * from "./frames/identity";
export * from "./frames/discover";
export * from "./frames/storage";

export * from "./embeddings/clip";
export * from "./embeddings/provider";
export * from "./embeddings/extractor";

export * from "./repos/frame-embeddings";
export * from "./store/collection";

export * from "./search/retrieval";
export * from "./pipeline/index-video";
