export type EmbeddingChunk = {
  id: string;
  articleId: string;
  chunkIndex: number;
  chunkText: string;
  embedding: number[];
  dimension: number;
  embeddingModel: string;
  createdAt: string;
};

/** All chunks of one article embedded by one model. */
export type EmbeddingGeneration = {
  model: string;
  dimension: number;
  /** Hash of the article body the generation was built from; null when chunks were indexed directly. */
  contentHash: string | null;
  chunks: EmbeddingChunk[];
  updatedAt: string;
};

export type EmbeddingsDocument = {
  version: 1;
  articleId: string;
  /**
   * Body hash recorded by the last content edit. Generations built from any other body are
   * dropped on edit and refused afterwards.
   */
  currentContentHash?: string;
  generations: Record<string, EmbeddingGeneration>;
};

export type SearchFilters = {
  model?: string;
  articleIds?: string[];
  createdAfter?: string | Date;
};

export type SearchHit = {
  chunkId: string;
  articleId: string;
  chunkIndex: number;
  chunkText: string;
  model: string;
  createdAt: string;
  score: number;
};
