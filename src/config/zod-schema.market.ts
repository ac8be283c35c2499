import { z } from "zod";

const NewsSourceSchema = z
  .object({
    name: z.string().min(1),
    baseUrl: z.string().url().optional(),
    description: z.string().optional(),
  })
  .strict();

const NewsFeedSchema = z
  .object({
    name: z.string().min(1),
    url: z.string().url(),
    source: z.string().optional(),
    categories: z.array(z.string()).optional(),
  })
  .strict();

export const NewsSchema = z
  .object({
    sources: z.array(NewsSourceSchema).optional(),
    categories: z.array(z.string().min(1)).optional(),
    rssFeeds: z.array(NewsFeedSchema).optional(),
    maxItemsPerFeed: z.number().int().positive().optional(),
    fetchTimeoutMs: z.number().int().positive().optional(),
    maxArticleBytes: z.number().int().positive().optional(),
    userAgent: z.string().optional(),
    rateLimitPerHostPerMinute: z.number().nonnegative().optional(),
  })
  .strict()
  .optional();

export const MarketFeedSchema = z
  .object({
    symbols: z.array(z.string().min(1)).optional(),
    kind: z.literal("coingecko").optional(),
    coinIds: z.record(z.string(), z.string()).optional(),
    timeoutMs: z.number().int().positive().optional(),
  })
  .strict()
  .optional();
