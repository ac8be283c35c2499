import { listAssets } from "../src/catalog/store.js";
import { loadConfig } from "../src/config/config.js";
import { resolveStateDir } from "../src/config/paths.js";
import { createEmbeddingIndex } from "../src/embeddings/service.js";
import { createEmbeddingQueue, type EmbedJobResult } from "../src/embeddings/queue.js";
import { setLogLevel } from "../src/logging.js";
import { collectFeedItems, resolveFetchLimits } from "../src/news/feed.js";
import { createRateLimiter } from "../src/news/fetch.js";
import { ingestNewsItem } from "../src/news/ingest.js";
import { createArticleId, createContentStore } from "../src/news/store.js";
import { recordRun } from "../src/ops/runs.js";

const cfg = loadConfig();
setLogLevel(cfg.logging?.level);
const newsCfg = cfg.news ?? {};
const stateDir = resolveStateDir();
const store = createContentStore({ news: newsCfg, stateDir });
const index = createEmbeddingIndex({ cfg, stateDir });
const queue = createEmbeddingQueue({ index, store });
const limits = resolveFetchLimits(newsCfg);
const rateLimiter = createRateLimiter();

const counts = await recordRun(
  "news_ingest",
  async (counts) => {
    Object.assign(counts, { feeds: 0, fetched: 0, known: 0, saved: 0, duplicates: 0, rejected: 0, failures: 0 });
    const assets = await listAssets(stateDir);
    const jobs: Array<Promise<EmbedJobResult>> = [];
    for (const feed of newsCfg.rssFeeds ?? []) {
      const collected = await collectFeedItems(feed, {
        limits,
        rateLimiter,
        maxItems: newsCfg.maxItemsPerFeed ?? 10,
        isKnown: async (canonicalUrl) => (await store.getArticle(createArticleId(canonicalUrl))) !== null,
      });
      counts.feeds += 1;
      counts.fetched += collected.fetched;
      counts.known += collected.known;
      counts.failures += collected.failures;
      for (const item of collected.items) {
        const { result } = await ingestNewsItem(store, item, assets);
        if (result.status === "inserted") {
          counts.saved += 1;
          jobs.push(queue.enqueue(result.article.id));
        } else if (result.status === "duplicate") {
          counts.duplicates += 1;
        } else {
          counts.rejected += 1;
        }
      }
    }
    const results = await Promise.all(jobs);
    counts.embedded = results.filter((result) => result.status === "embedded").length;
    counts.embedFailures = results.filter((result) => result.status === "failed").length;
    return counts;
  },
  { stateDir },
);

console.log(
  [
    "News ingest summary",
    `feeds: ${counts.feeds}`,
    `saved: ${counts.saved}`,
    `dedupe hits: ${counts.known + counts.duplicates}`,
    `embedded: ${counts.embedded} (failed ${counts.embedFailures})`,
    `failures: ${counts.failures + counts.rejected}`,
  ].join("\n"),
);
