import { Command } from "commander";
import { getAssetBySymbol, listAssets } from "../src/catalog/store.js";
import { loadConfig } from "../src/config/config.js";
import { resolveStateDir } from "../src/config/paths.js";
import { setLogLevel } from "../src/logging.js";
import { createSignalEngine } from "../src/market/signals/engine.js";
import { recordRun } from "../src/ops/runs.js";

const program = new Command()
  .name("signal-backfill")
  .description("Recompute rolling signals from stored observations")
  .option("-s, --symbol <symbol...>", "only these assets (default: all)")
  .option("--from-scratch", "ignore any pending resume marker", false)
  .option("--checkpoint-every <n>", "commit a checkpoint every n timestamps", (raw) => Number.parseInt(raw, 10))
  .parse(process.argv);

const opts = program.opts<{ symbol?: string[]; fromScratch: boolean; checkpointEvery?: number }>();

const cfg = loadConfig();
setLogLevel(cfg.logging?.level);
const stateDir = resolveStateDir();
const engine = createSignalEngine({ cfg, stateDir });

const controller = new AbortController();
process.once("SIGINT", () => {
  console.error("stopping at the next checkpoint...");
  controller.abort();
});

const lines = await recordRun(
  "signal_backfill",
  async (counts) => {
    const assets = opts.symbol?.length
      ? await Promise.all(
          opts.symbol.map(async (symbol) => {
            const asset = await getAssetBySymbol(symbol, stateDir);
            if (!asset) {
              throw new Error(`unknown asset ${symbol}`);
            }
            return asset;
          }),
        )
      : await listAssets(stateDir);
    counts.assets = 0;
    counts.recomputed = 0;
    counts.aborted = 0;
    const summary: string[] = [];
    for (const asset of assets) {
      const result = await engine.recompute(asset.id, {
        signal: controller.signal,
        checkpointEvery: opts.checkpointEvery,
        fromScratch: opts.fromScratch,
      });
      counts.assets += 1;
      counts.recomputed += result.recomputed;
      if (result.status === "aborted") {
        counts.aborted += 1;
        summary.push(`${asset.symbol}: aborted after ${result.recomputed}, resumes from ${result.resumeFrom}`);
        break;
      }
      summary.push(`${asset.symbol}: ${result.recomputed} signals`);
    }
    return summary;
  },
  { stateDir },
);

console.log(["Signal backfill", ...lines].join("\n"));
