import { setTimeout as delay } from "node:timers/promises";
import type { ContentStore } from "../news/store.js";
import type { EmbeddingIndex } from "./service.js";
import type { RetryPolicy } from "./settings.js";
import { isRetryableError } from "../errors.js";
import { createSubsystemLogger } from "../logging.js";

const log = createSubsystemLogger("embeddings/queue");

export type EmbedJobResult =
  | { status: "embedded"; articleId: string; chunks: number; attempts: number }
  | { status: "missing"; articleId: string }
  | { status: "failed"; articleId: string; attempts: number; error: string };

export type EmbeddingQueueParams = {
  index: EmbeddingIndex;
  store: Pick<ContentStore, "getArticle" | "setProcessed">;
  concurrency?: number;
  retry?: RetryPolicy;
  sleep?: (ms: number) => Promise<unknown>;
};

type Job = {
  articleId: string;
  promise: Promise<EmbedJobResult>;
  resolve: (result: EmbedJobResult) => void;
};

export function backoffDelayMs(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** Math.max(0, attempt - 1));
}

/**
 * Embeds articles off the ingestion path. Enqueuing an article that is already waiting joins
 * the waiting job; an article being embedded right now is queued again behind it. Jobs never
 * reject: failures come back as a `failed` result once retries are spent.
 */
export function createEmbeddingQueue(params: EmbeddingQueueParams) {
  const concurrency = Math.max(1, params.concurrency ?? params.index.settings.concurrency);
  const retry = params.retry ?? params.index.settings.retry;
  const sleep = params.sleep ?? delay;
  const waiting: Job[] = [];
  const running = new Set<string>();
  let idleWaiters: Array<() => void> = [];

  function settleIdle(): void {
    if (waiting.length > 0 || running.size > 0) {
      return;
    }
    const waiters = idleWaiters;
    idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  async function process(articleId: string): Promise<EmbedJobResult> {
    for (let attempt = 1; ; attempt += 1) {
      try {
        const article = await params.store.getArticle(articleId);
        if (!article) {
          return { status: "missing", articleId };
        }
        const result = await params.index.chunkAndEmbed(article);
        if (result.stale) {
          if (attempt >= retry.maxAttempts) {
            log.error("article kept changing while embedding", { articleId, attempts: attempt });
            return { status: "failed", articleId, attempts: attempt, error: "content changed while embedding" };
          }
          continue;
        }
        await params.store.setProcessed(articleId, true, article.contentHash);
        return { status: "embedded", articleId, chunks: result.chunks, attempts: attempt };
      } catch (err) {
        if (!isRetryableError(err) || attempt >= retry.maxAttempts) {
          log.error("embedding failed", { articleId, attempts: attempt, error: String(err) });
          return { status: "failed", articleId, attempts: attempt, error: String(err) };
        }
        const waitMs = backoffDelayMs(retry, attempt);
        log.warn("embedding unavailable, backing off", { articleId, attempt, waitMs });
        await sleep(waitMs);
      }
    }
  }

  function pump(): void {
    while (running.size < concurrency) {
      const index = waiting.findIndex((job) => !running.has(job.articleId));
      if (index === -1) {
        break;
      }
      const [job] = waiting.splice(index, 1);
      running.add(job.articleId);
      process(job.articleId)
        .catch((err: unknown): EmbedJobResult => {
          log.error("embedding job crashed", { articleId: job.articleId, error: String(err) });
          return { status: "failed", articleId: job.articleId, attempts: 0, error: String(err) };
        })
        .then((result) => {
          running.delete(job.articleId);
          job.resolve(result);
          pump();
          settleIdle();
        });
    }
  }

  function enqueue(articleId: string): Promise<EmbedJobResult> {
    const pending = waiting.find((job) => job.articleId === articleId);
    if (pending) {
      return pending.promise;
    }
    let resolve: (result: EmbedJobResult) => void = () => undefined;
    const promise = new Promise<EmbedJobResult>((res) => {
      resolve = res;
    });
    waiting.push({ articleId, promise, resolve });
    pump();
    return promise;
  }

  function onIdle(): Promise<void> {
    if (waiting.length === 0 && running.size === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      idleWaiters.push(resolve);
    });
  }

  return {
    enqueue,
    onIdle,
    size: () => waiting.length,
    active: () => running.size,
  };
}

export type EmbeddingQueue = ReturnType<typeof createEmbeddingQueue>;
