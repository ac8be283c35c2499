import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { EmbeddingUnavailableError } from "../errors.js";
import { createContentStore, type ContentStore } from "../news/store.js";
import { createHashingEmbedder, type EmbeddingProvider } from "./provider.js";
import { backoffDelayMs, createEmbeddingQueue } from "./queue.js";
import { createEmbeddingIndex } from "./service.js";
import { DEFAULT_EMBEDDING_SETTINGS } from "./settings.js";

const SETTINGS = { ...DEFAULT_EMBEDDING_SETTINGS, dimension: 32, concurrency: 1 };

function flakyProvider(failures: number, makeError: () => Error): EmbeddingProvider & { calls: number } {
  const inner = createHashingEmbedder({ model: SETTINGS.model, dimension: SETTINGS.dimension });
  let remaining = failures;
  const provider: EmbeddingProvider & { calls: number } = {
    ...inner,
    calls: 0,
    embed: async (texts) => {
      provider.calls += 1;
      if (remaining > 0) {
        remaining -= 1;
        throw makeError();
      }
      return await inner.embed(texts);
    },
  };
  return provider;
}

describe("backoffDelayMs", () => {
  it("doubles up to the cap", () => {
    const policy = { maxAttempts: 10, baseDelayMs: 500, maxDelayMs: 30_000 };
    expect([1, 2, 3, 7].map((attempt) => backoffDelayMs(policy, attempt))).toEqual([
      500, 1_000, 2_000, 30_000,
    ]);
  });
});

describe("embedding queue", () => {
  let stateDir: string;
  let store: ContentStore;
  let sleeps: number[];
  const sleep = async (ms: number) => {
    sleeps.push(ms);
  };

  beforeEach(async () => {
    stateDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "marketlore-queue-"));
    store = createContentStore({ stateDir });
    sleeps = [];
  });

  afterEach(async () => {
    await fs.promises.rm(stateDir, { recursive: true, force: true });
  });

  async function insert(url: string, content: string): Promise<string> {
    const result = await store.insertArticle({ sourceName: "Reuters", title: "Markets wrap", url, content });
    if (result.status !== "inserted") {
      throw new Error(`insert failed: ${result.status}`);
    }
    return result.article.id;
  }

  it("retries unavailable embeddings with backoff and marks the article processed", async () => {
    const provider = flakyProvider(2, () => new EmbeddingUnavailableError("offline"));
    const index = createEmbeddingIndex({ settings: SETTINGS, provider, stateDir });
    const queue = createEmbeddingQueue({ index, store, sleep });
    const articleId = await insert("https://reuters.com/a", "Bitcoin steadied after a volatile week.");

    const result = await queue.enqueue(articleId);
    expect(result).toEqual({ status: "embedded", articleId, chunks: 1, attempts: 3 });
    expect(sleeps).toEqual([500, 1_000]);
    expect((await store.getArticle(articleId))?.isProcessed).toBe(true);
  });

  it("gives up after the last attempt and leaves the article readable", async () => {
    const provider = flakyProvider(10, () => new EmbeddingUnavailableError("offline"));
    const index = createEmbeddingIndex({ settings: SETTINGS, provider, stateDir });
    const queue = createEmbeddingQueue({
      index,
      store,
      sleep,
      retry: { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 150 },
    });
    const articleId = await insert("https://reuters.com/b", "Ether funding rates turned negative.");

    const result = await queue.enqueue(articleId);
    expect(result.status).toBe("failed");
    expect(result).toMatchObject({ attempts: 3 });
    expect(sleeps).toEqual([100, 150]);
    const article = await store.getArticle(articleId);
    expect(article?.isProcessed).toBe(false);
    expect(article?.content).toBe("Ether funding rates turned negative.");
  });

  it("does not retry errors that are not retryable", async () => {
    const provider = flakyProvider(1, () => new Error("bad request"));
    const index = createEmbeddingIndex({ settings: SETTINGS, provider, stateDir });
    const queue = createEmbeddingQueue({ index, store, sleep });
    const articleId = await insert("https://reuters.com/c", "Solana fees fell.");

    expect(await queue.enqueue(articleId)).toEqual({
      status: "failed",
      articleId,
      attempts: 1,
      error: "Error: bad request",
    });
    expect(sleeps).toEqual([]);
  });

  it("reports articles that no longer exist", async () => {
    const provider = flakyProvider(0, () => new Error());
    const index = createEmbeddingIndex({ settings: SETTINGS, provider, stateDir });
    const queue = createEmbeddingQueue({ index, store, sleep });
    expect(await queue.enqueue("0000000000000000")).toEqual({
      status: "missing",
      articleId: "0000000000000000",
    });
  });

  it("coalesces waiting jobs for the same article", async () => {
    const provider = flakyProvider(0, () => new Error());
    const index = createEmbeddingIndex({ settings: SETTINGS, provider, stateDir });
    const queue = createEmbeddingQueue({ index, store, sleep });
    const first = await insert("https://reuters.com/d", "First article body.");
    const second = await insert("https://reuters.com/e", "Second article body.");

    const running = queue.enqueue(first);
    const waiting = queue.enqueue(second);
    expect(queue.enqueue(second)).toBe(waiting);
    expect(queue.size()).toBe(1);

    await queue.onIdle();
    expect((await running).status).toBe("embedded");
    expect((await waiting).status).toBe("embedded");
    expect(provider.calls).toBe(2);
    expect(queue.active()).toBe(0);
  });

  it("re-embeds an article after its content is edited", async () => {
    const provider = flakyProvider(0, () => new Error());
    const index = createEmbeddingIndex({ settings: SETTINGS, provider, stateDir });
    const queue = createEmbeddingQueue({ index, store, sleep });
    const articleId = await insert("https://reuters.com/f", "Original body text.");
    await queue.enqueue(articleId);

    const edited = await store.updateArticleContent(articleId, { content: "Revised body text." });
    expect(edited?.isProcessed).toBe(false);
    await queue.enqueue(articleId);

    expect((await store.getArticle(articleId))?.isProcessed).toBe(true);
    expect((await index.getChunks(articleId)).map((chunk) => chunk.chunkText)).toEqual([
      "Revised body text.",
    ]);
  });
});
