import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { NewsConfig } from "../config/types.market.js";
import type { NewsCategory, NewsSource } from "../catalog/types.js";
import type {
  Article,
  ArticleDocument,
  InsertArticleResult,
  Mention,
  MentionInput,
  NewsFeedItem,
  SentimentLabel,
} from "./types.js";
import { findByName, resolveNewsCategories, resolveNewsSources } from "../catalog/store.js";
import { resolveStateDir } from "../config/paths.js";
import { invalidateEmbeddings, removeEmbeddings } from "../embeddings/store.js";
import { createSubsystemLogger } from "../logging.js";
import { normalizeTimestamp } from "../market/series/observation.js";
import {
  readJsonDocument,
  removeDocument,
  updateJsonDocument,
  withFileLock,
  type DocumentCodec,
} from "../state/json-store.js";

const log = createSubsystemLogger("news");

export const NEWS_ARTICLES_DIR = path.join("news", "articles");

const ARTICLE_CODEC: DocumentCodec<ArticleDocument | null> = {
  empty: () => null,
  parse: (value) => {
    const doc = value as ArticleDocument | null;
    if (!doc || doc.version !== 1 || !doc.article?.id || !Array.isArray(doc.mentions)) {
      return null;
    }
    return { ...doc, categoryIds: Array.isArray(doc.categoryIds) ? doc.categoryIds : [] };
  },
};

const TRACKING_PARAMS = new Set([
  "utm_source",
  "utm_medium",
  "utm_campaign",
  "utm_term",
  "utm_content",
  "gclid",
  "fbclid",
  "mc_cid",
  "mc_eid",
]);

export function canonicalizeUrl(raw: string): string {
  try {
    const url = new URL(raw.trim());
    url.hash = "";
    url.hostname = url.hostname.toLowerCase();
    const params = Array.from(url.searchParams.entries()).filter(
      ([key]) => !TRACKING_PARAMS.has(key.toLowerCase()),
    );
    url.search = "";
    for (const [key, value] of params.sort()) {
      url.searchParams.append(key, value);
    }
    if (url.pathname !== "/" && url.pathname.endsWith("/")) {
      url.pathname = url.pathname.slice(0, -1);
    }
    return url.toString();
  } catch {
    return raw.trim();
  }
}

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}

export function hashText(text: string): string {
  return crypto.createHash("sha256").update(text).digest("hex");
}

/** Article ids are derived from the canonical URL, so the id doubles as the dedup key. */
export function createArticleId(canonicalUrl: string): string {
  return hashText(canonicalUrl).slice(0, 16);
}

export function summarizeText(text: string): string {
  const trimmed = text.replace(/\s+/g, " ").trim();
  if (trimmed.length <= 240) {
    return trimmed;
  }
  return `${trimmed.slice(0, 237)}...`;
}

export function resolveArticlesDir(stateDir: string = resolveStateDir()): string {
  return path.join(stateDir, NEWS_ARTICLES_DIR);
}

export function resolveArticlePath(articleId: string, stateDir: string = resolveStateDir()): string {
  return path.join(resolveArticlesDir(stateDir), `${articleId}.json`);
}

function byPublishedDesc(a: Article, b: Article): number {
  const aKey = a.publishedDate ?? a.fetchDate;
  const bKey = b.publishedDate ?? b.fetchDate;
  if (aKey !== bKey) {
    return aKey < bKey ? 1 : -1;
  }
  return a.id.localeCompare(b.id);
}

function mergeMentions(articleId: string, existing: Mention[], incoming: MentionInput[]): Mention[] {
  const merged = existing.map((entry) => ({ ...entry }));
  for (const input of incoming) {
    const symbol = input.assetSymbol.trim().toUpperCase();
    if (!symbol || !Number.isInteger(input.mentionCount) || input.mentionCount < 1) {
      continue;
    }
    const match = merged.find(
      (entry) => entry.assetType === input.assetType && entry.assetSymbol === symbol,
    );
    if (match) {
      match.mentionCount += input.mentionCount;
      match.isPrimary = match.isPrimary || input.isPrimary;
    } else {
      merged.push({ ...input, articleId, assetSymbol: symbol });
    }
  }
  return merged;
}

export type ContentStoreParams = {
  news?: NewsConfig;
  stateDir?: string;
  now?: () => Date;
};

export type ArticleEdit = {
  content: string;
  title?: string;
  summary?: string | null;
};

export function createContentStore(params: ContentStoreParams = {}) {
  const stateDir = params.stateDir ?? resolveStateDir();
  const now = params.now ?? (() => new Date());
  const sources: NewsSource[] = resolveNewsSources(params.news);
  const categories: NewsCategory[] = resolveNewsCategories(params.news);

  async function readArticleDocument(articleId: string): Promise<ArticleDocument | null> {
    return await readJsonDocument(resolveArticlePath(articleId, stateDir), ARTICLE_CODEC);
  }

  async function updateArticle<R>(
    articleId: string,
    fn: (doc: ArticleDocument) => { next: ArticleDocument | null; result: R },
  ): Promise<R | null> {
    return await updateJsonDocument(
      resolveArticlePath(articleId, stateDir),
      ARTICLE_CODEC,
      async (doc): Promise<{ next: ArticleDocument | null; result: R | null }> =>
        doc ? fn(doc) : { next: null, result: null },
    );
  }

  async function insertArticle(item: NewsFeedItem): Promise<InsertArticleResult> {
    const source = findByName(sources, item.sourceName);
    if (!source) {
      return { status: "rejected", reason: `unknown source "${item.sourceName}"` };
    }
    const title = item.title.replace(/\s+/g, " ").trim();
    if (!title) {
      return { status: "rejected", reason: "missing title" };
    }
    const url = canonicalizeUrl(item.url);
    if (!isHttpUrl(url)) {
      return { status: "rejected", reason: `invalid url "${item.url}"` };
    }
    let publishedDate: string | null = null;
    if (item.publishedDate) {
      publishedDate = normalizeTimestamp(item.publishedDate);
      if (!publishedDate) {
        return { status: "rejected", reason: "invalid publishedDate" };
      }
    }
    const categoryIds: number[] = [];
    for (const name of item.categories ?? []) {
      const category = findByName(categories, name);
      if (!category) {
        log.debug("ignoring unknown category", { category: name, url });
      } else if (!categoryIds.includes(category.id)) {
        categoryIds.push(category.id);
      }
    }
    const content = item.content.trim();
    const articleId = createArticleId(url);
    return await updateJsonDocument(
      resolveArticlePath(articleId, stateDir),
      ARTICLE_CODEC,
      async (existing): Promise<{ next: ArticleDocument | null; result: InsertArticleResult }> => {
        if (existing) {
          return { next: null, result: { status: "duplicate", articleId, url } };
        }
        const article: Article = {
          id: articleId,
          sourceId: source.id,
          title,
          url,
          publishedDate,
          fetchDate: now().toISOString(),
          summary: item.summary?.trim() || (content ? summarizeText(content) : null),
          content,
          contentHash: hashText(content),
          imageUrl: item.imageUrl?.trim() || null,
          imageAlt: item.imageAlt?.trim() || null,
          sentimentScore: null,
          sentimentLabel: null,
          isProcessed: false,
        };
        return {
          next: { version: 1, article, categoryIds, mentions: [] },
          result: { status: "inserted", article },
        };
      },
    );
  }

  async function getArticle(articleId: string): Promise<Article | null> {
    return (await readArticleDocument(articleId))?.article ?? null;
  }

  async function getArticleByUrl(url: string): Promise<Article | null> {
    return await getArticle(createArticleId(canonicalizeUrl(url)));
  }

  async function listArticleDocuments(): Promise<ArticleDocument[]> {
    const dir = resolveArticlesDir(stateDir);
    let names: string[];
    try {
      names = await fs.promises.readdir(dir);
    } catch (err) {
      if ((err as { code?: string }).code === "ENOENT") {
        return [];
      }
      throw err;
    }
    const docs: ArticleDocument[] = [];
    for (const name of names.filter((entry) => entry.endsWith(".json")).sort()) {
      const doc = await readArticleDocument(path.basename(name, ".json"));
      if (doc) {
        docs.push(doc);
      }
    }
    return docs.sort((a, b) => byPublishedDesc(a.article, b.article));
  }

  async function listArticles(opts: { processed?: boolean; limit?: number } = {}): Promise<Article[]> {
    const articles = (await listArticleDocuments())
      .map((doc) => doc.article)
      .filter((article) => opts.processed === undefined || article.isProcessed === opts.processed);
    return opts.limit === undefined ? articles : articles.slice(0, Math.max(0, opts.limit));
  }

  async function countArticles(): Promise<number> {
    return (await listArticleDocuments()).length;
  }

  async function getMentions(articleId: string): Promise<Mention[]> {
    return (await readArticleDocument(articleId))?.mentions ?? [];
  }

  async function getArticleCategories(articleId: string): Promise<NewsCategory[]> {
    const doc = await readArticleDocument(articleId);
    if (!doc) {
      return [];
    }
    return categories.filter((category) => doc.categoryIds.includes(category.id));
  }

  /** Upsert-with-increment per (assetType, assetSymbol). Returns null for an unknown article. */
  async function recordMentions(articleId: string, mentions: MentionInput[]): Promise<Mention[] | null> {
    return await updateArticle(articleId, (doc) => {
      const merged = mergeMentions(articleId, doc.mentions, mentions);
      return { next: { ...doc, mentions: merged }, result: merged };
    });
  }

  async function applySentiment(
    articleId: string,
    sentiment: { score: number; label: SentimentLabel },
  ): Promise<Article | null> {
    return await updateArticle(articleId, (doc) => {
      const article: Article = {
        ...doc.article,
        sentimentScore: sentiment.score,
        sentimentLabel: sentiment.label,
      };
      return { next: { ...doc, article }, result: article };
    });
  }

  /**
   * Explicit content edit. A changed body clears `isProcessed` and drops the chunks of the old
   * body before the new body is written, so search never mixes the two.
   */
  async function updateArticleContent(articleId: string, edit: ArticleEdit): Promise<Article | null> {
    return await updateJsonDocument(
      resolveArticlePath(articleId, stateDir),
      ARTICLE_CODEC,
      async (doc): Promise<{ next: ArticleDocument | null; result: Article | null }> => {
        if (!doc) {
          return { next: null, result: null };
        }
        const content = edit.content.trim();
        const contentHash = hashText(content);
        const changed = contentHash !== doc.article.contentHash;
        const article: Article = {
          ...doc.article,
          title: edit.title?.trim() || doc.article.title,
          summary: edit.summary === undefined ? doc.article.summary : edit.summary,
          content,
          contentHash,
          isProcessed: changed ? false : doc.article.isProcessed,
          updatedAt: now().toISOString(),
        };
        if (changed) {
          const dropped = await invalidateEmbeddings(articleId, contentHash, stateDir);
          log.info("article content changed", { articleId, droppedModels: dropped });
        }
        return { next: { ...doc, article }, result: article };
      },
    );
  }

  /**
   * Flips the processed flag. With `contentHash`, the flag is only set when the stored body still
   * matches what the caller processed.
   */
  async function setProcessed(
    articleId: string,
    processed: boolean,
    contentHash?: string,
  ): Promise<Article | null> {
    return await updateArticle(articleId, (doc) => {
      if (contentHash !== undefined && contentHash !== doc.article.contentHash) {
        return { next: null, result: doc.article };
      }
      if (doc.article.isProcessed === processed) {
        return { next: null, result: doc.article };
      }
      const article: Article = { ...doc.article, isProcessed: processed };
      return { next: { ...doc, article }, result: article };
    });
  }

  /** Deletes the article with its mentions, categories and embeddings. */
  async function deleteArticle(articleId: string): Promise<boolean> {
    const filePath = resolveArticlePath(articleId, stateDir);
    return await withFileLock(filePath, async () => {
      await removeEmbeddings(articleId, stateDir);
      const removed = await removeDocument(filePath);
      if (removed) {
        log.info("article deleted", { articleId });
      }
      return removed;
    });
  }

  return {
    sources,
    categories,
    insertArticle,
    getArticle,
    getArticleByUrl,
    listArticleDocuments,
    listArticles,
    countArticles,
    getMentions,
    getArticleCategories,
    recordMentions,
    applySentiment,
    updateArticleContent,
    setProcessed,
    deleteArticle,
  };
}

export type ContentStore = ReturnType<typeof createContentStore>;
