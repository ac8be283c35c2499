import type { NewsConfig, NewsFeedConfig } from "../config/types.market.js";
import type { NewsFeedItem } from "./types.js";
import { createSubsystemLogger } from "../logging.js";
import { extractReadableArticle } from "./extract.js";
import {
  DEFAULT_FETCH_LIMITS,
  fetchWithLimits,
  type FetchLimits,
  type FetchResult,
  type RateLimiter,
} from "./fetch.js";
import { parseRss } from "./rss.js";
import { canonicalizeUrl } from "./store.js";

const log = createSubsystemLogger("news/feed");

export type Fetcher = (url: string, limits: FetchLimits) => Promise<FetchResult>;

export type CollectFeedParams = {
  limits: FetchLimits;
  rateLimiter: RateLimiter;
  maxItems: number;
  /** Lets the caller skip articles it already stores before paying for the page fetch. */
  isKnown: (canonicalUrl: string) => Promise<boolean>;
  fetcher?: Fetcher;
};

export type CollectFeedResult = {
  items: NewsFeedItem[];
  fetched: number;
  known: number;
  failures: number;
};

export function resolveFetchLimits(news: NewsConfig = {}): FetchLimits {
  return {
    timeoutMs: news.fetchTimeoutMs ?? DEFAULT_FETCH_LIMITS.timeoutMs,
    maxBytes: news.maxArticleBytes ?? DEFAULT_FETCH_LIMITS.maxBytes,
    userAgent: news.userAgent ?? DEFAULT_FETCH_LIMITS.userAgent,
    rateLimitPerHostPerMinute:
      news.rateLimitPerHostPerMinute ?? DEFAULT_FETCH_LIMITS.rateLimitPerHostPerMinute,
  };
}

async function limitedFetch(url: string, params: CollectFeedParams): Promise<FetchResult | null> {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    log.warn("skipping malformed url", { url });
    return null;
  }
  await params.rateLimiter(parsed, params.limits.rateLimitPerHostPerMinute);
  return await (params.fetcher ?? fetchWithLimits)(url, params.limits);
}

/** Reads one RSS/Atom feed and turns its new entries into feed items with extracted bodies. */
export async function collectFeedItems(
  feed: NewsFeedConfig,
  params: CollectFeedParams,
): Promise<CollectFeedResult> {
  const result: CollectFeedResult = { items: [], fetched: 0, known: 0, failures: 0 };
  const res = await limitedFetch(feed.url, params);
  if (!res?.ok) {
    result.failures += 1;
    return result;
  }
  for (const item of parseRss(res.body).slice(0, params.maxItems)) {
    if (await params.isKnown(canonicalizeUrl(item.url))) {
      result.known += 1;
      continue;
    }
    const page = await limitedFetch(item.url, params);
    result.fetched += 1;
    const extracted = page?.ok ? extractReadableArticle(page.body, item.url) : null;
    if (!extracted) {
      result.failures += 1;
      continue;
    }
    result.items.push({
      sourceName: feed.source ?? feed.name,
      title: item.title,
      url: item.url,
      publishedDate: item.publishedAt ?? null,
      content: extracted.text,
      summary: item.summary ?? extracted.summary,
      categories: [...(feed.categories ?? []), ...item.categories],
      imageUrl: extracted.imageUrl ?? item.imageUrl ?? null,
      imageAlt: extracted.imageAlt,
    });
  }
  return result;
}
