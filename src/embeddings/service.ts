import crypto from "node:crypto";
import type { MarketloreConfig } from "../config/config.js";
import type { EmbeddingChunk, EmbeddingGeneration, SearchFilters, SearchHit } from "./types.js";
import { resolveStateDir } from "../config/paths.js";
import { EmbeddingDimensionError, EmbeddingUnavailableError } from "../errors.js";
import { createSubsystemLogger } from "../logging.js";
import { chunkText } from "./chunker.js";
import { createEmbeddingProvider, type EmbeddingProvider } from "./provider.js";
import { bestPerArticle, rankChunks } from "./search.js";
import { resolveEmbeddingSettings, type EmbeddingSettings } from "./settings.js";
import {
  listEmbeddingDocuments,
  readEmbeddings,
  removeEmbeddings,
  replaceGeneration,
  upsertChunk,
  type ChunkInput,
  type UpsertChunkResult,
} from "./store.js";
import { assertVector } from "./vector.js";

const log = createSubsystemLogger("embeddings");

export type EmbeddableArticle = {
  id: string;
  content: string;
  contentHash: string;
};

export type ChunkAndEmbedResult = {
  articleId: string;
  model: string;
  chunks: number;
  embedded: number;
  reused: number;
  removed: number;
  /** The article body changed while embedding; nothing was written. */
  stale: boolean;
};

export type EmbeddingIndexParams = {
  cfg?: MarketloreConfig;
  settings?: EmbeddingSettings;
  provider?: EmbeddingProvider;
  stateDir?: string;
  now?: () => Date;
};

export function createEmbeddingIndex(params: EmbeddingIndexParams = {}) {
  const settings = params.settings ?? resolveEmbeddingSettings(params.cfg?.embeddings);
  const provider = params.provider ?? createEmbeddingProvider(settings);
  const stateDir = params.stateDir ?? resolveStateDir();
  const now = params.now ?? (() => new Date());

  if (provider.model !== settings.model || provider.dimension !== settings.dimension) {
    throw new EmbeddingDimensionError(
      settings.dimension,
      provider.dimension,
      `provider ${provider.model} does not match configured model ${settings.model}`,
    );
  }

  async function embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    const vectors = await provider.embed(texts);
    if (vectors.length !== texts.length) {
      throw new EmbeddingUnavailableError("provider returned the wrong number of vectors", {
        details: { expected: texts.length, actual: vectors.length, model: provider.model },
      });
    }
    vectors.forEach((vector, idx) => assertVector(vector, settings.dimension, `${provider.model}[${idx}]`));
    return vectors;
  }

  /**
   * Re-chunks the article and replaces the configured model's generation in one write.
   * Vectors of chunk texts that did not change are reused; chunk indices that no longer
   * exist are dropped.
   */
  async function chunkAndEmbed(article: EmbeddableArticle): Promise<ChunkAndEmbedResult> {
    const texts = chunkText(article.content, settings.chunk);
    const previous = (await readEmbeddings(article.id, stateDir)).generations[settings.model];
    const known = new Map<string, number[]>();
    if (previous && previous.dimension === settings.dimension) {
      for (const chunk of previous.chunks) {
        known.set(chunk.chunkText, chunk.embedding);
      }
    }
    const missing = [...new Set(texts.filter((text) => !known.has(text)))];
    const fresh = await embedTexts(missing);
    missing.forEach((text, idx) => known.set(text, fresh[idx]));

    const createdAt = now().toISOString();
    const chunks: EmbeddingChunk[] = texts.map((text, chunkIndex) => {
      const same = previous?.chunks.find(
        (chunk) => chunk.chunkIndex === chunkIndex && chunk.chunkText === text,
      );
      if (same && previous?.dimension === settings.dimension) {
        return same;
      }
      const embedding = known.get(text) ?? [];
      return {
        id: crypto.randomUUID(),
        articleId: article.id,
        chunkIndex,
        chunkText: text,
        embedding,
        dimension: embedding.length,
        embeddingModel: settings.model,
        createdAt,
      };
    });
    const generation: EmbeddingGeneration = {
      model: settings.model,
      dimension: settings.dimension,
      contentHash: article.contentHash,
      chunks,
      updatedAt: createdAt,
    };
    const { stale } = await replaceGeneration(article.id, generation, stateDir);
    if (stale) {
      log.info("article body changed while embedding, discarding chunks", { articleId: article.id });
      return { articleId: article.id, model: settings.model, chunks: 0, embedded: 0, reused: 0, removed: 0, stale };
    }
    const removed = Math.max(0, (previous?.chunks.length ?? 0) - chunks.length);
    log.debug("article embedded", {
      articleId: article.id,
      model: settings.model,
      chunks: chunks.length,
      embedded: missing.length,
      removed,
    });
    return {
      articleId: article.id,
      model: settings.model,
      chunks: chunks.length,
      embedded: missing.length,
      reused: texts.length - missing.length,
      removed,
      stale,
    };
  }

  /** Idempotent on (articleId, chunkIndex, model): same text is a no-op, new text replaces. */
  async function indexChunk(
    input: Omit<ChunkInput, "model"> & { model?: string },
  ): Promise<UpsertChunkResult> {
    const model = input.model ?? settings.model;
    if (model === settings.model) {
      assertVector(input.vector, settings.dimension, `chunk ${input.articleId}#${input.chunkIndex}`);
    }
    return await upsertChunk({ ...input, model }, stateDir, now());
  }

  async function resolveDimension(model: string, articleIds?: string[]): Promise<number | null> {
    if (model === settings.model) {
      return settings.dimension;
    }
    for (const doc of await listEmbeddingDocuments(stateDir, articleIds)) {
      const generation = doc.generations[model];
      if (generation) {
        return generation.dimension;
      }
    }
    return null;
  }

  async function rank(queryVector: number[], topK: number, filters: SearchFilters): Promise<SearchHit[]> {
    const model = filters.model ?? settings.model;
    const dimension = await resolveDimension(model, filters.articleIds);
    if (dimension === null) {
      return [];
    }
    const docs = await listEmbeddingDocuments(stateDir, filters.articleIds);
    return rankChunks(docs, {
      queryVector,
      topK,
      metric: settings.metric,
      model,
      dimension,
      createdAfter: filters.createdAfter,
    });
  }

  async function search(queryVector: number[], topK: number, filters: SearchFilters = {}): Promise<SearchHit[]> {
    return await rank(queryVector, topK, filters);
  }

  async function searchArticles(
    queryVector: number[],
    topK: number,
    filters: SearchFilters = {},
  ): Promise<SearchHit[]> {
    if (!(topK > 0)) {
      return [];
    }
    return bestPerArticle(await rank(queryVector, Number.POSITIVE_INFINITY, filters), topK);
  }

  async function embedQuery(text: string): Promise<number[]> {
    const [vector] = await embedTexts([text]);
    return vector;
  }

  async function getChunks(articleId: string, model: string = settings.model): Promise<EmbeddingChunk[]> {
    return (await readEmbeddings(articleId, stateDir)).generations[model]?.chunks ?? [];
  }

  async function deleteArticleEmbeddings(articleId: string): Promise<boolean> {
    return await removeEmbeddings(articleId, stateDir);
  }

  return {
    settings,
    provider,
    chunkAndEmbed,
    indexChunk,
    search,
    searchArticles,
    embedQuery,
    getChunks,
    deleteArticleEmbeddings,
  };
}

export type EmbeddingIndex = ReturnType<typeof createEmbeddingIndex>;
