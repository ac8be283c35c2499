import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { EmbeddingChunk, EmbeddingGeneration, EmbeddingsDocument } from "./types.js";
import { resolveStateDir } from "../config/paths.js";
import { EmbeddingDimensionError } from "../errors.js";
import { assertVector } from "./vector.js";
import {
  readJsonDocument,
  removeDocument,
  updateJsonDocument,
  withFileLock,
  type DocumentCodec,
} from "../state/json-store.js";

export const EMBEDDINGS_DIR = "embeddings";

function embeddingsCodec(articleId: string): DocumentCodec<EmbeddingsDocument> {
  return {
    empty: () => ({ version: 1, articleId, generations: {} }),
    parse: (value) => {
      const doc = value as EmbeddingsDocument | null;
      if (!doc || doc.version !== 1 || doc.articleId !== articleId || typeof doc.generations !== "object") {
        return null;
      }
      return doc;
    },
  };
}

export function resolveEmbeddingsDir(stateDir: string = resolveStateDir()): string {
  return path.join(stateDir, EMBEDDINGS_DIR);
}

export function resolveEmbeddingsPath(articleId: string, stateDir: string = resolveStateDir()): string {
  return path.join(resolveEmbeddingsDir(stateDir), `${articleId}.json`);
}

export async function readEmbeddings(
  articleId: string,
  stateDir: string = resolveStateDir(),
): Promise<EmbeddingsDocument> {
  return await readJsonDocument(resolveEmbeddingsPath(articleId, stateDir), embeddingsCodec(articleId));
}

export async function listEmbeddedArticleIds(stateDir: string = resolveStateDir()): Promise<string[]> {
  try {
    const names = await fs.promises.readdir(resolveEmbeddingsDir(stateDir));
    return names
      .filter((name) => name.endsWith(".json"))
      .map((name) => path.basename(name, ".json"))
      .sort();
  } catch (err) {
    if ((err as { code?: string }).code === "ENOENT") {
      return [];
    }
    throw err;
  }
}

export async function listEmbeddingDocuments(
  stateDir: string = resolveStateDir(),
  articleIds?: string[],
): Promise<EmbeddingsDocument[]> {
  const ids = articleIds ?? (await listEmbeddedArticleIds(stateDir));
  const docs: EmbeddingsDocument[] = [];
  for (const articleId of ids) {
    const doc = await readEmbeddings(articleId, stateDir);
    if (Object.keys(doc.generations).length > 0) {
      docs.push(doc);
    }
  }
  return docs;
}

function isStale(doc: EmbeddingsDocument, generation: EmbeddingGeneration): boolean {
  return (
    doc.currentContentHash !== undefined &&
    generation.contentHash !== null &&
    generation.contentHash !== doc.currentContentHash
  );
}

/**
 * Swaps in a whole generation in one write; chunk indices missing from it are gone. A generation
 * built from a body the article no longer has is not written and comes back as `stale`.
 */
export async function replaceGeneration(
  articleId: string,
  generation: EmbeddingGeneration,
  stateDir: string = resolveStateDir(),
): Promise<{ previous: EmbeddingGeneration | null; stale: boolean }> {
  return await updateJsonDocument<EmbeddingsDocument, { previous: EmbeddingGeneration | null; stale: boolean }>(
    resolveEmbeddingsPath(articleId, stateDir),
    embeddingsCodec(articleId),
    async (doc) => {
      const previous = doc.generations[generation.model] ?? null;
      if (isStale(doc, generation)) {
        return { next: null, result: { previous, stale: true } };
      }
      return {
        next: { ...doc, generations: { ...doc.generations, [generation.model]: generation } },
        result: { previous, stale: false },
      };
    },
  );
}

/**
 * Records the article's new body hash and drops every generation built from another body.
 * Returns the dropped models.
 */
export async function invalidateEmbeddings(
  articleId: string,
  contentHash: string,
  stateDir: string = resolveStateDir(),
): Promise<string[]> {
  return await updateJsonDocument(
    resolveEmbeddingsPath(articleId, stateDir),
    embeddingsCodec(articleId),
    async (doc) => {
      const marked: EmbeddingsDocument = { ...doc, currentContentHash: contentHash };
      const generations: Record<string, EmbeddingGeneration> = {};
      const dropped: string[] = [];
      for (const [model, generation] of Object.entries(doc.generations)) {
        if (isStale(marked, generation)) {
          dropped.push(model);
        } else {
          generations[model] = generation;
        }
      }
      return { next: { ...marked, generations }, result: dropped.sort() };
    },
  );
}

export type ChunkInput = {
  articleId: string;
  chunkIndex: number;
  chunkText: string;
  vector: number[];
  model: string;
};

export type UpsertChunkResult = {
  status: "inserted" | "replaced" | "unchanged";
  chunk: EmbeddingChunk;
};

/** Writes one chunk keyed by (articleId, chunkIndex, model). */
export async function upsertChunk(
  input: ChunkInput,
  stateDir: string = resolveStateDir(),
  now: Date = new Date(),
): Promise<UpsertChunkResult> {
  return await updateJsonDocument<EmbeddingsDocument, UpsertChunkResult>(
    resolveEmbeddingsPath(input.articleId, stateDir),
    embeddingsCodec(input.articleId),
    async (doc) => {
      const generation: EmbeddingGeneration = doc.generations[input.model] ?? {
        model: input.model,
        dimension: input.vector.length,
        contentHash: null,
        chunks: [],
        updatedAt: now.toISOString(),
      };
      const context = `chunk ${input.articleId}#${input.chunkIndex} (${input.model})`;
      if (input.vector.length === 0) {
        throw new EmbeddingDimensionError(generation.dimension, 0, context);
      }
      assertVector(input.vector, generation.dimension, context);
      const existing = generation.chunks.find((chunk) => chunk.chunkIndex === input.chunkIndex);
      if (existing && existing.chunkText === input.chunkText) {
        return { next: null, result: { status: "unchanged", chunk: existing } };
      }
      const chunk: EmbeddingChunk = {
        id: crypto.randomUUID(),
        articleId: input.articleId,
        chunkIndex: input.chunkIndex,
        chunkText: input.chunkText,
        embedding: input.vector,
        dimension: input.vector.length,
        embeddingModel: input.model,
        createdAt: now.toISOString(),
      };
      const chunks = [
        ...generation.chunks.filter((entry) => entry.chunkIndex !== input.chunkIndex),
        chunk,
      ].sort((a, b) => a.chunkIndex - b.chunkIndex);
      const next: EmbeddingsDocument = {
        ...doc,
        generations: {
          ...doc.generations,
          [input.model]: { ...generation, chunks, updatedAt: now.toISOString() },
        },
      };
      return { next, result: { status: existing ? "replaced" : "inserted", chunk } };
    },
  );
}

export async function removeEmbeddings(
  articleId: string,
  stateDir: string = resolveStateDir(),
): Promise<boolean> {
  const filePath = resolveEmbeddingsPath(articleId, stateDir);
  return await withFileLock(filePath, async () => await removeDocument(filePath));
}
