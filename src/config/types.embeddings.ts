export type SimilarityMetric = "cosine" | "dot";

export type EmbeddingProviderConfig =
  | { kind: "hashing" }
  | { kind: "http"; url: string; apiKey?: string; timeoutMs?: number };

export type EmbeddingsConfig = {
  model?: string;
  dimension?: number;
  metric?: SimilarityMetric;
  provider?: EmbeddingProviderConfig;
  chunk?: {
    maxChars?: number;
    overlap?: number;
  };
  retry?: {
    maxAttempts?: number;
    baseDelayMs?: number;
    maxDelayMs?: number;
  };
  concurrency?: number;
};
