import type { Asset } from "../catalog/types.js";
import type { EmbeddingIndex } from "../embeddings/service.js";
import type { SignalRow } from "../market/series/types.js";
import type { SignalEngine } from "../market/signals/engine.js";
import type { AssetType, SentimentLabel } from "../news/types.js";
import type { ContentStore } from "../news/store.js";
import { getAssetBySymbol, listAssets } from "../catalog/store.js";
import { resolveStateDir } from "../config/paths.js";
import { EmbeddingUnavailableError } from "../errors.js";
import { tokenize } from "../embeddings/provider.js";
import { createSubsystemLogger } from "../logging.js";

const log = createSubsystemLogger("views");

export type RecentNewsRow = {
  id: string;
  source: string;
  title: string;
  url: string;
  publishedDate: string | null;
  summary: string | null;
  sentimentLabel: SentimentLabel | null;
  fetchDate: string;
  isProcessed: boolean;
};

export type AssetNewsRow = {
  assetType: AssetType;
  assetSymbol: string;
  articleId: string;
  source: string;
  title: string;
  url: string;
  publishedDate: string | null;
  sentimentLabel: SentimentLabel | null;
  mentionCount: number;
  isPrimary: boolean;
};

export type NewsSearchResult = {
  articleId: string;
  title: string;
  url: string;
  source: string;
  summary: string | null;
  publishedDate: string | null;
  score: number;
  /** Best matching chunk; null for keyword matches. */
  chunkText: string | null;
  match: "vector" | "keyword";
};

export type TrendOutlook = "bullish" | "bearish" | "neutral";

export type TrendAnalysis =
  | { status: "ok"; symbol: string; outlook: TrendOutlook; signal: SignalRow; summary: string }
  | { status: "no-data"; symbol: string; summary: string };

export type QueryViewParams = {
  engine: SignalEngine;
  content: ContentStore;
  index: EmbeddingIndex;
  stateDir?: string;
};

function outlookFor(signal: SignalRow): TrendOutlook {
  if (signal.signal === "buy" || signal.signal === "strong_buy") {
    return "bullish";
  }
  if (signal.signal === "sell" || signal.signal === "strong_sell") {
    return "bearish";
  }
  return "neutral";
}

/** Read-only projections over the stores; nothing here writes. */
export function createQueryViews(params: QueryViewParams) {
  const { engine, content, index } = params;
  const stateDir = params.stateDir ?? resolveStateDir();

  function sourceName(sourceId: number): string {
    return content.sources.find((source) => source.id === sourceId)?.name ?? `source-${sourceId}`;
  }

  async function latestSignal(symbol: string): Promise<SignalRow | null> {
    const asset = await getAssetBySymbol(symbol, stateDir);
    return asset ? await engine.latestSignal(asset.id) : null;
  }

  async function assets(): Promise<Asset[]> {
    const described: Asset[] = [];
    for (const asset of await listAssets(stateDir)) {
      described.push(await engine.describeAsset(asset));
    }
    return described;
  }

  async function recentNews(limit = 20): Promise<RecentNewsRow[]> {
    return (await content.listArticles({ limit })).map((article) => ({
      id: article.id,
      source: sourceName(article.sourceId),
      title: article.title,
      url: article.url,
      publishedDate: article.publishedDate,
      summary: article.summary,
      sentimentLabel: article.sentimentLabel,
      fetchDate: article.fetchDate,
      isProcessed: article.isProcessed,
    }));
  }

  async function assetNews(
    symbol: string,
    opts: { assetType?: AssetType; limit?: number } = {},
  ): Promise<AssetNewsRow[]> {
    const wanted = symbol.trim().toUpperCase();
    const rows: AssetNewsRow[] = [];
    for (const doc of await content.listArticleDocuments()) {
      for (const mention of doc.mentions) {
        if (mention.assetSymbol !== wanted || (opts.assetType && mention.assetType !== opts.assetType)) {
          continue;
        }
        rows.push({
          assetType: mention.assetType,
          assetSymbol: mention.assetSymbol,
          articleId: doc.article.id,
          source: sourceName(doc.article.sourceId),
          title: doc.article.title,
          url: doc.article.url,
          publishedDate: doc.article.publishedDate,
          sentimentLabel: doc.article.sentimentLabel,
          mentionCount: mention.mentionCount,
          isPrimary: mention.isPrimary,
        });
      }
    }
    return opts.limit === undefined ? rows : rows.slice(0, Math.max(0, opts.limit));
  }

  async function assetsMentionedIn(articleId: string): Promise<Array<{ assetType: AssetType; assetSymbol: string }>> {
    return (await content.getMentions(articleId))
      .map(({ assetType, assetSymbol }) => ({ assetType, assetSymbol }))
      .sort((a, b) => a.assetType.localeCompare(b.assetType) || a.assetSymbol.localeCompare(b.assetSymbol));
  }

  /** Term overlap over title, summary and body; serves articles that are not embedded yet. */
  async function keywordSearch(text: string, topK: number): Promise<NewsSearchResult[]> {
    const terms = [...new Set(tokenize(text))];
    if (terms.length === 0 || !(topK > 0)) {
      return [];
    }
    const scored: NewsSearchResult[] = [];
    for (const article of await content.listArticles()) {
      const haystack = new Set(tokenize(`${article.title} ${article.summary ?? ""} ${article.content}`));
      const hits = terms.filter((term) => haystack.has(term)).length;
      if (hits === 0) {
        continue;
      }
      scored.push({
        articleId: article.id,
        title: article.title,
        url: article.url,
        source: sourceName(article.sourceId),
        summary: article.summary,
        publishedDate: article.publishedDate,
        score: hits / terms.length,
        chunkText: null,
        match: "keyword",
      });
    }
    // listArticles is newest first and the sort is stable, so ties keep that order.
    return scored.sort((a, b) => b.score - a.score).slice(0, topK);
  }

  async function searchNews(text: string, topK = 5): Promise<NewsSearchResult[]> {
    let vector: number[];
    try {
      vector = await index.embedQuery(text);
    } catch (err) {
      if (err instanceof EmbeddingUnavailableError) {
        log.warn("embedding unavailable, falling back to keyword search", { error: err.message });
        return await keywordSearch(text, topK);
      }
      throw err;
    }
    const results: NewsSearchResult[] = [];
    for (const hit of await index.searchArticles(vector, topK)) {
      const article = await content.getArticle(hit.articleId);
      if (!article) {
        continue;
      }
      results.push({
        articleId: article.id,
        title: article.title,
        url: article.url,
        source: sourceName(article.sourceId),
        summary: article.summary,
        publishedDate: article.publishedDate,
        score: hit.score,
        chunkText: hit.chunkText,
        match: "vector",
      });
    }
    return results;
  }

  async function analyzeTrend(symbol: string): Promise<TrendAnalysis> {
    const normalized = symbol.trim().toUpperCase();
    const signal = await latestSignal(normalized);
    if (!signal) {
      return { status: "no-data", symbol: normalized, summary: `No signal available for ${normalized}.` };
    }
    const outlook = outlookFor(signal);
    const rsi = signal.rsi === null ? "n/a" : signal.rsi.toFixed(1);
    const summary =
      outlook === "neutral"
        ? `Neutral signals for ${normalized} at the moment (RSI ${rsi}).`
        : `${outlook === "bullish" ? "Bullish" : "Bearish"} outlook for ${normalized} (${signal.signal}, RSI ${rsi}).`;
    return { status: "ok", symbol: normalized, outlook, signal, summary };
  }

  return {
    latestSignal,
    assets,
    recentNews,
    assetNews,
    assetsMentionedIn,
    searchNews,
    keywordSearch,
    analyzeTrend,
  };
}

export type QueryViews = ReturnType<typeof createQueryViews>;
