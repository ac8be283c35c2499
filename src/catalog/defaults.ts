import type { NewsSourceConfig } from "../config/types.market.js";

export const DEFAULT_NEWS_SOURCES: NewsSourceConfig[] = [
  {
    name: "Yahoo Finance",
    baseUrl: "https://finance.yahoo.com",
    description: "Yahoo Finance RSS feed",
  },
  { name: "Reuters", baseUrl: "https://www.reuters.com", description: "Reuters Business news" },
];

export const DEFAULT_NEWS_CATEGORIES = [
  "Business",
  "Markets",
  "Economy",
  "Technology",
  "Companies",
  "Commodities",
  "Stocks",
  "Cryptocurrencies",
];
