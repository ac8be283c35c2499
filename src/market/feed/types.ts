import type { MarketTick } from "../ingest.js";

export type MarketFeedFetchParams = {
  symbols: string[];
  timeoutMs: number;
  coinIds?: Record<string, string>;
  userAgent?: string;
};

export type MarketFeedHandler = (params: MarketFeedFetchParams) => Promise<MarketTick[]>;
