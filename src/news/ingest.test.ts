import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ingestNewsItem } from "./ingest.js";
import { createContentStore, type ContentStore } from "./store.js";

const ASSETS = [
  { symbol: "BTC", name: "Bitcoin" },
  { symbol: "ETH", name: "Ethereum" },
];

const ITEM = {
  sourceName: "Reuters",
  title: "Bitcoin rallies as ETH lags",
  url: "https://reuters.com/markets/crypto-wrap",
  content: "BTC rose 5% on Monday. Analysts said bitcoin demand stayed firm while $AAPL fell.",
};

describe("ingestNewsItem", () => {
  let stateDir: string;
  let store: ContentStore;

  beforeEach(async () => {
    stateDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "marketlore-news-ingest-"));
    store = createContentStore({ stateDir });
  });

  afterEach(async () => {
    await fs.promises.rm(stateDir, { recursive: true, force: true });
  });

  it("records mentions and sentiment for new articles", async () => {
    const outcome = await ingestNewsItem(store, ITEM, ASSETS);
    expect(outcome.result.status).toBe("inserted");
    if (outcome.result.status !== "inserted") {
      return;
    }
    expect(outcome.result.article.sentimentLabel).toBe("positive");
    expect(outcome.result.article.sentimentScore).toBe(1);
    expect(outcome.mentions.map((mention) => [mention.assetSymbol, mention.mentionCount])).toEqual([
      ["BTC", 3],
      ["AAPL", 1],
      ["ETH", 1],
    ]);
  });

  it("leaves a re-delivered article untouched", async () => {
    const first = await ingestNewsItem(store, ITEM, ASSETS);
    if (first.result.status !== "inserted") {
      throw new Error("insert failed");
    }
    const again = await ingestNewsItem(store, { ...ITEM, title: "Rewritten headline" }, ASSETS);
    expect(again).toEqual({
      result: { status: "duplicate", articleId: first.result.article.id, url: ITEM.url },
      mentions: [],
      sentiment: null,
    });
    const mentions = await store.getMentions(first.result.article.id);
    expect(mentions.find((mention) => mention.assetSymbol === "BTC")?.mentionCount).toBe(3);
    expect((await store.getArticle(first.result.article.id))?.title).toBe(ITEM.title);
  });
});
