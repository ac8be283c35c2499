export type NewsSourceConfig = {
  name: string;
  baseUrl?: string;
  description?: string;
};

export type NewsFeedConfig = {
  name: string;
  url: string;
  source?: string;
  categories?: string[];
};

export type NewsConfig = {
  sources?: NewsSourceConfig[];
  categories?: string[];
  rssFeeds?: NewsFeedConfig[];
  maxItemsPerFeed?: number;
  fetchTimeoutMs?: number;
  maxArticleBytes?: number;
  userAgent?: string;
  rateLimitPerHostPerMinute?: number;
};

export type MarketFeedKind = "coingecko";

export type MarketFeedConfig = {
  symbols?: string[];
  kind?: MarketFeedKind;
  coinIds?: Record<string, string>;
  timeoutMs?: number;
};
