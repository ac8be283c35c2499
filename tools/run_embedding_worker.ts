import { loadConfig } from "../src/config/config.js";
import { resolveStateDir } from "../src/config/paths.js";
import { createEmbeddingIndex } from "../src/embeddings/service.js";
import { createEmbeddingQueue } from "../src/embeddings/queue.js";
import { setLogLevel } from "../src/logging.js";
import { createContentStore } from "../src/news/store.js";
import { recordRun } from "../src/ops/runs.js";

// Picks up articles whose ingest finished but whose embeddings never landed.
const cfg = loadConfig();
setLogLevel(cfg.logging?.level);
const stateDir = resolveStateDir();
const store = createContentStore({ news: cfg.news, stateDir });
const index = createEmbeddingIndex({ cfg, stateDir });
const queue = createEmbeddingQueue({ index, store });

const counts = await recordRun(
  "embedding_worker",
  async (counts) => {
    const pending = await store.listArticles({ processed: false });
    counts.pending = pending.length;
    const results = await Promise.all(pending.map((article) => queue.enqueue(article.id)));
    counts.embedded = results.filter((result) => result.status === "embedded").length;
    counts.missing = results.filter((result) => result.status === "missing").length;
    counts.failed = results.filter((result) => result.status === "failed").length;
    for (const result of results) {
      if (result.status === "failed") {
        console.error(`${result.articleId}: ${result.error} after ${result.attempts} attempts`);
      }
    }
    return counts;
  },
  { stateDir },
);

console.log(
  `Embedding worker: ${counts.embedded}/${counts.pending} embedded, ${counts.failed} failed, ${counts.missing} missing`,
);
if (counts.failed > 0) {
  process.exitCode = 1;
}
