export type AssetType = "stock" | "crypto";

export type SentimentLabel = "positive" | "neutral" | "negative";

export type Article = {
  id: string;
  sourceId: number;
  title: string;
  /** Canonical URL; the dedup key. */
  url: string;
  publishedDate: string | null;
  fetchDate: string;
  summary: string | null;
  content: string;
  contentHash: string;
  imageUrl: string | null;
  imageAlt: string | null;
  sentimentScore: number | null;
  sentimentLabel: SentimentLabel | null;
  isProcessed: boolean;
  updatedAt?: string;
};

export type Mention = {
  articleId: string;
  assetType: AssetType;
  assetSymbol: string;
  mentionCount: number;
  isPrimary: boolean;
};

export type MentionInput = Omit<Mention, "articleId">;

export type ArticleDocument = {
  version: 1;
  article: Article;
  categoryIds: number[];
  mentions: Mention[];
};

/** What a news feed hands to the content store. */
export type NewsFeedItem = {
  sourceName: string;
  title: string;
  url: string;
  publishedDate?: string | Date | null;
  content: string;
  summary?: string | null;
  categories?: string[];
  imageUrl?: string | null;
  imageAlt?: string | null;
};

export type InsertArticleResult =
  | { status: "inserted"; article: Article }
  | { status: "duplicate"; articleId: string; url: string }
  | { status: "rejected"; reason: string };
