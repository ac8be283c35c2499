import type { SimilarityMetric } from "../config/types.embeddings.js";
import type { EmbeddingChunk, EmbeddingsDocument, SearchHit } from "./types.js";
import { normalizeTimestamp } from "../market/series/observation.js";
import { assertVector, similarity } from "./vector.js";

export type RankParams = {
  queryVector: number[];
  topK: number;
  metric: SimilarityMetric;
  model: string;
  dimension: number;
  createdAfter?: string | Date;
};

/** Score desc, then newest first, then article id and chunk index for a stable order. */
export function compareHits(a: SearchHit, b: SearchHit): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  if (a.createdAt !== b.createdAt) {
    return a.createdAt < b.createdAt ? 1 : -1;
  }
  if (a.articleId !== b.articleId) {
    return a.articleId < b.articleId ? -1 : 1;
  }
  return a.chunkIndex - b.chunkIndex;
}

/** Inserts into a list kept sorted and capped at `limit`. */
export function pushBounded(hits: SearchHit[], hit: SearchHit, limit: number): void {
  if (hits.length >= limit && compareHits(hit, hits[hits.length - 1]) >= 0) {
    return;
  }
  let lo = 0;
  let hi = hits.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (compareHits(hits[mid], hit) <= 0) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  hits.splice(lo, 0, hit);
  if (hits.length > limit) {
    hits.pop();
  }
}

function toHit(chunk: EmbeddingChunk, score: number): SearchHit {
  return {
    chunkId: chunk.id,
    articleId: chunk.articleId,
    chunkIndex: chunk.chunkIndex,
    chunkText: chunk.chunkText,
    model: chunk.embeddingModel,
    createdAt: chunk.createdAt,
    score,
  };
}

/** Ranks the chunks of one model generation across documents. */
export function rankChunks(docs: EmbeddingsDocument[], params: RankParams): SearchHit[] {
  assertVector(params.queryVector, params.dimension, `query for ${params.model}`);
  const limit = Math.floor(params.topK);
  if (!(limit > 0)) {
    return [];
  }
  const after = params.createdAfter ? normalizeTimestamp(params.createdAfter) : null;
  const hits: SearchHit[] = [];
  for (const doc of docs) {
    const generation = doc.generations[params.model];
    if (!generation) {
      continue;
    }
    for (const chunk of generation.chunks) {
      if (after && chunk.createdAt <= after) {
        continue;
      }
      if (chunk.embedding.length !== params.dimension) {
        continue;
      }
      pushBounded(hits, toHit(chunk, similarity(params.metric, params.queryVector, chunk.embedding)), limit);
    }
  }
  return hits;
}

/** Keeps each article's best chunk. Input must already be ranked. */
export function bestPerArticle(hits: SearchHit[], topK: number): SearchHit[] {
  const seen = new Set<string>();
  const best: SearchHit[] = [];
  for (const hit of hits) {
    if (seen.has(hit.articleId)) {
      continue;
    }
    seen.add(hit.articleId);
    best.push(hit);
    if (best.length >= topK) {
      break;
    }
  }
  return best;
}
