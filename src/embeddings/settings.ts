import type {
  EmbeddingProviderConfig,
  EmbeddingsConfig,
  SimilarityMetric,
} from "../config/types.embeddings.js";

export type ChunkOptions = {
  maxChars: number;
  overlap: number;
};

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export type EmbeddingSettings = {
  model: string;
  dimension: number;
  metric: SimilarityMetric;
  provider: EmbeddingProviderConfig;
  chunk: ChunkOptions;
  retry: RetryPolicy;
  concurrency: number;
};

export const DEFAULT_EMBEDDING_SETTINGS: EmbeddingSettings = {
  model: "feature-hash-v1",
  dimension: 256,
  metric: "cosine",
  provider: { kind: "hashing" },
  chunk: { maxChars: 1200, overlap: 200 },
  retry: { maxAttempts: 5, baseDelayMs: 500, maxDelayMs: 30_000 },
  concurrency: 2,
};

export function resolveEmbeddingSettings(cfg: EmbeddingsConfig = {}): EmbeddingSettings {
  const defaults = DEFAULT_EMBEDDING_SETTINGS;
  const maxChars = cfg.chunk?.maxChars ?? defaults.chunk.maxChars;
  return {
    model: cfg.model ?? defaults.model,
    dimension: cfg.dimension ?? defaults.dimension,
    metric: cfg.metric ?? defaults.metric,
    provider: cfg.provider ?? defaults.provider,
    chunk: {
      maxChars,
      overlap: Math.min(cfg.chunk?.overlap ?? defaults.chunk.overlap, Math.floor(maxChars / 2)),
    },
    retry: {
      maxAttempts: cfg.retry?.maxAttempts ?? defaults.retry.maxAttempts,
      baseDelayMs: cfg.retry?.baseDelayMs ?? defaults.retry.baseDelayMs,
      maxDelayMs: cfg.retry?.maxDelayMs ?? defaults.retry.maxDelayMs,
    },
    concurrency: cfg.concurrency ?? defaults.concurrency,
  };
}
