import type { AssetRecord } from "../catalog/types.js";
import type { InsertArticleResult, Mention, NewsFeedItem } from "./types.js";
import type { ContentStore } from "./store.js";
import { extractMentions } from "./mentions.js";
import { scoreSentiment, type SentimentScore } from "./sentiment.js";

export type NewsIngestOutcome = {
  result: InsertArticleResult;
  mentions: Mention[];
  sentiment: SentimentScore | null;
};

/**
 * Stores a feed item and, when it is new, records asset mentions and a sentiment score.
 * Known URLs come back as duplicates without touching the stored article.
 */
export async function ingestNewsItem(
  store: ContentStore,
  item: NewsFeedItem,
  assets: Array<Pick<AssetRecord, "symbol" | "name">>,
): Promise<NewsIngestOutcome> {
  const result = await store.insertArticle(item);
  if (result.status !== "inserted") {
    return { result, mentions: [], sentiment: null };
  }
  const { article } = result;
  const mentions =
    (await store.recordMentions(article.id, extractMentions(article, assets))) ?? [];
  const sentiment = scoreSentiment(`${article.title}\n\n${article.content}`);
  const scored = await store.applySentiment(article.id, sentiment);
  return { result: { status: "inserted", article: scored ?? article }, mentions, sentiment };
}
