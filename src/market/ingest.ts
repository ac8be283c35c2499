import type { ObservationInput, SignalRow } from "./series/types.js";
import type { SignalEngine } from "./signals/engine.js";
import { getAssetBySymbol, normalizeAssetSymbol, upsertAsset } from "../catalog/store.js";
import { InvalidObservationError } from "../errors.js";
import { normalizeObservation } from "./series/observation.js";

export type MarketTick = ObservationInput & {
  symbol: string;
  name?: string;
  slug?: string;
};

export type TickOutcome =
  | { status: "inserted"; symbol: string; assetId: number; signal: SignalRow; late: boolean }
  | { status: "duplicate"; symbol: string; assetId: number; signal: SignalRow | null }
  | { status: "rejected"; symbol: string; reason: string };

/**
 * Feed boundary: resolves (or registers) the asset by symbol and hands the observation to
 * the engine. Validation failures come back as a rejected outcome instead of throwing.
 */
export async function ingestMarketTick(
  engine: SignalEngine,
  tick: MarketTick,
  stateDir: string,
): Promise<TickOutcome> {
  const symbol = normalizeAssetSymbol(tick.symbol);
  if (!symbol) {
    return { status: "rejected", symbol, reason: "missing symbol" };
  }
  const { symbol: _symbol, name, slug, ...observation } = tick;
  try {
    normalizeObservation(observation);
    const known = await getAssetBySymbol(symbol, stateDir);
    const asset =
      known && (!name || name === known.name)
        ? known
        : (await upsertAsset({ symbol, name, slug }, stateDir)).asset;
    const result = await engine.ingest(asset.id, observation);
    if (result.status === "inserted") {
      return {
        status: "inserted",
        symbol,
        assetId: asset.id,
        signal: result.signal,
        late: result.late,
      };
    }
    return { status: "duplicate", symbol, assetId: asset.id, signal: result.signal };
  } catch (err) {
    if (err instanceof InvalidObservationError) {
      return { status: "rejected", symbol, reason: err.message };
    }
    throw err;
  }
}
