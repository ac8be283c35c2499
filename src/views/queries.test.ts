import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { EmbeddingProvider } from "../embeddings/provider.js";
import { upsertAsset } from "../catalog/store.js";
import { createHashingEmbedder } from "../embeddings/provider.js";
import { createEmbeddingIndex } from "../embeddings/service.js";
import { DEFAULT_EMBEDDING_SETTINGS, type EmbeddingSettings } from "../embeddings/settings.js";
import { EmbeddingUnavailableError } from "../errors.js";
import { createSignalEngine } from "../market/signals/engine.js";
import { DEFAULT_SIGNAL_SETTINGS } from "../market/signals/settings.js";
import { createContentStore, type ContentStore } from "../news/store.js";
import type { Article } from "../news/types.js";
import { createQueryViews } from "./queries.js";

const FIXED_NOW = new Date("2024-08-03T00:00:00.000Z");
const SETTINGS: EmbeddingSettings = { ...DEFAULT_EMBEDDING_SETTINGS, dimension: 64 };

function day(n: number): string {
  return new Date(Date.UTC(2024, 0, n)).toISOString();
}

async function insert(store: ContentStore, item: Parameters<ContentStore["insertArticle"]>[0]): Promise<Article> {
  const result = await store.insertArticle(item);
  if (result.status !== "inserted") {
    throw new Error(`insert failed: ${result.status}`);
  }
  return result.article;
}

describe("query views", () => {
  let stateDir: string;
  let content: ContentStore;
  let miners: Article;
  let upgrade: Article;

  function views(provider: EmbeddingProvider = createHashingEmbedder(SETTINGS)) {
    const engine = createSignalEngine({ stateDir, settings: DEFAULT_SIGNAL_SETTINGS, now: () => FIXED_NOW });
    const index = createEmbeddingIndex({ stateDir, settings: SETTINGS, provider, now: () => FIXED_NOW });
    return { engine, index, views: createQueryViews({ engine, content, index, stateDir }) };
  }

  beforeEach(async () => {
    stateDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "marketlore-views-"));
    content = createContentStore({ stateDir, now: () => FIXED_NOW });
    miners = await insert(content, {
      sourceName: "Reuters",
      title: "Bitcoin miners expand",
      url: "https://reuters.com/a",
      publishedDate: "2024-08-01T08:00:00.000Z",
      content: "Bitcoin miners expanded capacity in Texas as hashrate climbed.",
    });
    upgrade = await insert(content, {
      sourceName: "Yahoo Finance",
      title: "Ethereum upgrade scheduled",
      url: "https://finance.yahoo.com/b",
      publishedDate: "2024-08-02T08:00:00.000Z",
      content: "Ethereum developers scheduled a network upgrade for the spring.",
    });
    await content.recordMentions(miners.id, [
      { assetType: "crypto", assetSymbol: "BTC", mentionCount: 2, isPrimary: true },
    ]);
    await content.recordMentions(upgrade.id, [
      { assetType: "crypto", assetSymbol: "ETH", mentionCount: 1, isPrimary: true },
      { assetType: "crypto", assetSymbol: "BTC", mentionCount: 1, isPrimary: false },
    ]);
  });

  afterEach(async () => {
    await fs.promises.rm(stateDir, { recursive: true, force: true });
  });

  it("lists recent news newest first with source names", async () => {
    const rows = await views().views.recentNews(10);
    expect(rows.map((row) => [row.id, row.source, row.publishedDate, row.isProcessed])).toEqual([
      [upgrade.id, "Yahoo Finance", "2024-08-02T08:00:00.000Z", false],
      [miners.id, "Reuters", "2024-08-01T08:00:00.000Z", false],
    ]);
    expect(rows[1].summary).toBe("Bitcoin miners expanded capacity in Texas as hashrate climbed.");
    expect(await views().views.recentNews(1)).toHaveLength(1);
  });

  it("joins mentions into asset news rows", async () => {
    const rows = await views().views.assetNews("btc");
    expect(rows).toEqual([
      {
        assetType: "crypto",
        assetSymbol: "BTC",
        articleId: upgrade.id,
        source: "Yahoo Finance",
        title: "Ethereum upgrade scheduled",
        url: "https://finance.yahoo.com/b",
        publishedDate: "2024-08-02T08:00:00.000Z",
        sentimentLabel: null,
        mentionCount: 1,
        isPrimary: false,
      },
      {
        assetType: "crypto",
        assetSymbol: "BTC",
        articleId: miners.id,
        source: "Reuters",
        title: "Bitcoin miners expand",
        url: "https://reuters.com/a",
        publishedDate: "2024-08-01T08:00:00.000Z",
        sentimentLabel: null,
        mentionCount: 2,
        isPrimary: true,
      },
    ]);
    expect(await views().views.assetNews("BTC", { assetType: "stock" })).toEqual([]);
  });

  it("returns the assets mentioned in an article", async () => {
    expect(await views().views.assetsMentionedIn(upgrade.id)).toEqual([
      { assetType: "crypto", assetSymbol: "BTC" },
      { assetType: "crypto", assetSymbol: "ETH" },
    ]);
    expect(await views().views.assetsMentionedIn("missing")).toEqual([]);
  });

  it("ranks embedded articles for a text query", async () => {
    const { index, views: query } = views();
    await index.chunkAndEmbed(miners);
    await index.chunkAndEmbed(upgrade);
    const results = await query.searchNews("Ethereum network upgrade", 5);
    expect(results[0]).toMatchObject({
      articleId: upgrade.id,
      title: "Ethereum upgrade scheduled",
      source: "Yahoo Finance",
      chunkText: "Ethereum developers scheduled a network upgrade for the spring.",
      match: "vector",
    });
    expect(await query.searchNews("Ethereum network upgrade", 0)).toEqual([]);
  });

  it("stops returning an article's old chunks as soon as its content is edited", async () => {
    const { index, views: query } = views();
    await index.chunkAndEmbed(miners);
    await index.chunkAndEmbed(upgrade);

    const edited = await content.updateArticleContent(miners.id, {
      content: "Solana validators shipped a new client release.",
    });
    expect(edited?.isProcessed).toBe(false);
    const beforeReembed = await query.searchNews("Bitcoin miners Texas", 5);
    expect(beforeReembed.map((result) => result.articleId)).toEqual([upgrade.id]);

    if (!edited) {
      throw new Error("edit failed");
    }
    await index.chunkAndEmbed(edited);
    const [top] = await query.searchNews("Solana validators client release", 1);
    expect(top).toMatchObject({
      articleId: miners.id,
      chunkText: "Solana validators shipped a new client release.",
    });
  });

  it("falls back to keyword matching when embeddings are unavailable", async () => {
    const offline: EmbeddingProvider = {
      model: SETTINGS.model,
      dimension: SETTINGS.dimension,
      embed: async () => {
        throw new EmbeddingUnavailableError("provider offline");
      },
    };
    const results = await views(offline).views.searchNews("ethereum upgrade", 5);
    expect(results).toEqual([
      {
        articleId: upgrade.id,
        title: "Ethereum upgrade scheduled",
        url: "https://finance.yahoo.com/b",
        source: "Yahoo Finance",
        summary: "Ethereum developers scheduled a network upgrade for the spring.",
        publishedDate: "2024-08-02T08:00:00.000Z",
        score: 1,
        chunkText: null,
        match: "keyword",
      },
    ]);
  });

  it("derives a trend from the latest signal", async () => {
    const { engine, views: query } = views();
    const btc = (await upsertAsset({ symbol: "BTC", name: "Bitcoin" }, stateDir, FIXED_NOW)).asset.id;
    const eth = (await upsertAsset({ symbol: "ETH", name: "Ethereum" }, stateDir, FIXED_NOW)).asset.id;
    const prices = [100, 102, 101, 105, 103, 107, 110];
    for (const [idx, priceUsd] of prices.entries()) {
      await engine.ingest(btc, { timestamp: day(idx + 1), priceUsd });
    }
    await engine.ingest(eth, { timestamp: day(1), priceUsd: 2000 });

    expect((await query.latestSignal("btc"))?.timestamp).toBe(day(7));
    const bearish = await query.analyzeTrend("btc");
    expect(bearish.status).toBe("ok");
    if (bearish.status === "ok") {
      expect(bearish.outlook).toBe("bearish");
      expect(bearish.signal.signal).toBe("sell");
      expect(bearish.summary.startsWith("Bearish outlook for BTC (sell, RSI ")).toBe(true);
    }

    const neutral = await query.analyzeTrend("ETH");
    expect(neutral.status === "ok" && neutral.outlook).toBe("neutral");
    expect(neutral.summary).toBe("Neutral signals for ETH at the moment (RSI n/a).");

    expect(await query.analyzeTrend("doge")).toEqual({
      status: "no-data",
      symbol: "DOGE",
      summary: "No signal available for DOGE.",
    });
  });

  it("describes assets with their observed bounds", async () => {
    const { engine, views: query } = views();
    const btc = (await upsertAsset({ symbol: "BTC", name: "Bitcoin" }, stateDir, FIXED_NOW)).asset.id;
    await engine.ingest(btc, { timestamp: day(2), priceUsd: 100 });
    await engine.ingest(btc, { timestamp: day(1), priceUsd: 99 });
    const [asset] = await query.assets();
    expect(asset).toMatchObject({ symbol: "BTC", firstSeen: day(1), lastSeen: day(2) });
  });
});
