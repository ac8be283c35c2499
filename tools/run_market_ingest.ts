import { loadConfig } from "../src/config/config.js";
import { resolveStateDir } from "../src/config/paths.js";
import { fetchCoingeckoTicks } from "../src/market/feed/coingecko.js";
import { ingestMarketTick } from "../src/market/ingest.js";
import { createSignalEngine } from "../src/market/signals/engine.js";
import { setLogLevel } from "../src/logging.js";
import { recordRun } from "../src/ops/runs.js";

const cfg = loadConfig();
setLogLevel(cfg.logging?.level);
const marketCfg = cfg.market ?? {};
const symbols = marketCfg.symbols?.length ? marketCfg.symbols : ["BTC", "ETH"];
const stateDir = resolveStateDir();
const engine = createSignalEngine({ cfg, stateDir });

const lines = await recordRun(
  "market_ingest",
  async (counts) => {
    const ticks = await fetchCoingeckoTicks({
      symbols,
      timeoutMs: marketCfg.timeoutMs ?? 10_000,
      coinIds: marketCfg.coinIds,
      userAgent: cfg.news?.userAgent,
    });
    counts.fetched = ticks.length;
    counts.inserted = 0;
    counts.late = 0;
    counts.duplicates = 0;
    counts.rejected = 0;
    const summary: string[] = [];
    for (const tick of ticks) {
      const outcome = await ingestMarketTick(engine, tick, stateDir);
      if (outcome.status === "rejected") {
        counts.rejected += 1;
        summary.push(`${outcome.symbol || "?"}: rejected (${outcome.reason})`);
        continue;
      }
      if (outcome.status === "duplicate") {
        counts.duplicates += 1;
        continue;
      }
      counts.inserted += 1;
      if (outcome.late) {
        counts.late += 1;
      }
      const rsi = outcome.signal.rsi === null ? "n/a" : outcome.signal.rsi.toFixed(1);
      summary.push(
        `${outcome.symbol}: ${tick.priceUsd.toFixed(2)} USD, ma7 ${outcome.signal.ma7d.toFixed(2)}, ` +
          `rsi ${rsi}, ${outcome.signal.signal}`,
      );
    }
    counts.inactive = (await engine.markStaleAssets()).length;
    return summary;
  },
  { stateDir },
);

console.log(["Market ingest summary", ...lines].join("\n"));
