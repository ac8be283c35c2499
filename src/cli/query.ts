#!/usr/bin/env node
import { Command } from "commander";
import { loadConfig } from "../config/config.js";
import { resolveStateDir } from "../config/paths.js";
import { createEmbeddingIndex } from "../embeddings/service.js";
import { setLogLevel } from "../logging.js";
import { createSignalEngine } from "../market/signals/engine.js";
import { createContentStore } from "../news/store.js";
import { readRunRecords } from "../ops/runs.js";
import { createQueryViews } from "../views/queries.js";
import { VERSION } from "../version.js";

function parseCount(raw: string): number {
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`expected a non-negative integer, got "${raw}"`);
  }
  return value;
}

function print(value: unknown, json: boolean, render: () => string): void {
  console.log(json ? JSON.stringify(value, null, 2) : render());
}

const cfg = loadConfig();
setLogLevel(cfg.logging?.level ?? "warn");
const stateDir = resolveStateDir();
const views = createQueryViews({
  engine: createSignalEngine({ cfg, stateDir }),
  content: createContentStore({ news: cfg.news, stateDir }),
  index: createEmbeddingIndex({ cfg, stateDir }),
  stateDir,
});

const program = new Command()
  .name("marketlore")
  .description("Query signals, news and the embedding index")
  .version(VERSION)
  .option("--json", "print raw JSON", false);

const json = () => program.opts<{ json: boolean }>().json;

program
  .command("assets")
  .description("List tracked assets with their observation range")
  .action(async () => {
    const assets = await views.assets();
    print(assets, json(), () =>
      assets
        .map((asset) => `${asset.symbol}\t${asset.status}\t${asset.firstSeen ?? "-"} .. ${asset.lastSeen ?? "-"}`)
        .join("\n"),
    );
  });

program
  .command("latest-signal <symbol>")
  .description("Latest computed signal for an asset")
  .action(async (symbol: string) => {
    const signal = await views.latestSignal(symbol);
    print(signal, json(), () =>
      signal
        ? `${signal.timestamp} ${signal.signal} ma7=${signal.ma7d.toFixed(2)} rsi=${signal.rsi?.toFixed(1) ?? "n/a"}`
        : `no signal for ${symbol.toUpperCase()}`,
    );
  });

program
  .command("trend <symbol>")
  .description("Bullish/bearish outlook from the latest signal")
  .action(async (symbol: string) => {
    const trend = await views.analyzeTrend(symbol);
    print(trend, json(), () => trend.summary);
  });

program
  .command("search <text>")
  .description("Search news by similarity to the query text")
  .option("-k, --top <count>", "number of articles", parseCount, 5)
  .option("--keyword", "match terms instead of embeddings (covers articles not embedded yet)", false)
  .action(async (text: string, opts: { top: number; keyword: boolean }) => {
    const results = opts.keyword ? await views.keywordSearch(text, opts.top) : await views.searchNews(text, opts.top);
    print(results, json(), () =>
      results
        .map((result) => `${result.score.toFixed(3)}  ${result.title}  (${result.source})\n       ${result.url}`)
        .join("\n"),
    );
  });

program
  .command("mentions <articleId>")
  .description("Assets mentioned in an article")
  .action(async (articleId: string) => {
    const assets = await views.assetsMentionedIn(articleId);
    print(assets, json(), () => assets.map((asset) => `${asset.assetType}:${asset.assetSymbol}`).join("\n"));
  });

program
  .command("recent")
  .description("Most recent news articles")
  .option("-n, --limit <count>", "number of articles", parseCount, 20)
  .action(async (opts: { limit: number }) => {
    const rows = await views.recentNews(opts.limit);
    print(rows, json(), () =>
      rows
        .map((row) => `${row.publishedDate ?? row.fetchDate}  [${row.sentimentLabel ?? "-"}] ${row.title} (${row.source})`)
        .join("\n"),
    );
  });

program
  .command("asset-news <symbol>")
  .description("News that mentions an asset")
  .option("-n, --limit <count>", "number of articles", parseCount)
  .option("-t, --type <type>", "stock or crypto")
  .action(async (symbol: string, opts: { limit?: number; type?: string }) => {
    const assetType = opts.type === "stock" || opts.type === "crypto" ? opts.type : undefined;
    if (opts.type && !assetType) {
      throw new Error(`unknown asset type "${opts.type}"`);
    }
    const rows = await views.assetNews(symbol, { assetType, limit: opts.limit });
    print(rows, json(), () =>
      rows
        .map((row) => `${row.publishedDate ?? "-"}  ${row.isPrimary ? "*" : " "}${row.mentionCount}x  ${row.title}`)
        .join("\n"),
    );
  });

program
  .command("runs")
  .description("Recent job run records")
  .option("-j, --job <job>", "filter by job name")
  .option("-n, --limit <count>", "number of records", parseCount, 10)
  .action(async (opts: { job?: string; limit: number }) => {
    const records = await readRunRecords({ job: opts.job, limit: opts.limit }, stateDir);
    print(records, json(), () =>
      records
        .map((record) => `${record.finishedAt} ${record.job} ${record.status} ${JSON.stringify(record.counts ?? {})}`)
        .join("\n"),
    );
  });

program.parseAsync(process.argv).catch((err) => {
  console.error(String(err));
  process.exitCode = 1;
});
