import { z } from "zod";
import type { MarketTick } from "../ingest.js";
import type { MarketFeedHandler } from "./types.js";
import { createSubsystemLogger } from "../../logging.js";

const log = createSubsystemLogger("feed/coingecko");

const BASE_URL = "https://api.coingecko.com/api/v3";

export const DEFAULT_COIN_IDS: Record<string, string> = {
  BTC: "bitcoin",
  ETH: "ethereum",
  SOL: "solana",
  XRP: "ripple",
  ADA: "cardano",
};

const nullableNumber = z.number().nullable().optional();

const CoinMarketSchema = z.object({
  id: z.string(),
  symbol: z.string(),
  name: z.string(),
  current_price: z.number().nullable(),
  market_cap: nullableNumber,
  total_volume: nullableNumber,
  price_change_percentage_1h_in_currency: nullableNumber,
  price_change_percentage_24h_in_currency: nullableNumber,
  price_change_percentage_7d_in_currency: nullableNumber,
  circulating_supply: nullableNumber,
  total_supply: nullableNumber,
  max_supply: nullableNumber,
  last_updated: z.string().nullable().optional(),
});

const CoinMarketsSchema = z.array(CoinMarketSchema);

export type CoinMarketRow = z.infer<typeof CoinMarketSchema>;

export function toMarketTick(row: CoinMarketRow, fetchedAt: Date): MarketTick | null {
  if (row.current_price === null) {
    return null;
  }
  return {
    symbol: row.symbol.toUpperCase(),
    name: row.name,
    slug: row.id,
    timestamp: row.last_updated ?? fetchedAt.toISOString(),
    priceUsd: row.current_price,
    marketCapUsd: row.market_cap ?? null,
    volume24hUsd: row.total_volume ?? null,
    percentChange1h: row.price_change_percentage_1h_in_currency ?? null,
    percentChange24h: row.price_change_percentage_24h_in_currency ?? null,
    percentChange7d: row.price_change_percentage_7d_in_currency ?? null,
    circulatingSupply: row.circulating_supply ?? null,
    totalSupply: row.total_supply ?? null,
    maxSupply: row.max_supply ?? null,
  };
}

export function parseCoinMarkets(payload: unknown, fetchedAt: Date): MarketTick[] {
  const parsed = CoinMarketsSchema.safeParse(payload);
  if (!parsed.success) {
    log.warn("unexpected coin markets payload", { issues: parsed.error.issues.length });
    return [];
  }
  const ticks: MarketTick[] = [];
  for (const row of parsed.data) {
    const tick = toMarketTick(row, fetchedAt);
    if (tick) {
      ticks.push(tick);
    }
  }
  return ticks;
}

export const fetchCoingeckoTicks: MarketFeedHandler = async ({
  symbols,
  timeoutMs,
  coinIds,
  userAgent,
}) => {
  const idMap = { ...DEFAULT_COIN_IDS, ...coinIds };
  const ids = symbols
    .map((symbol) => idMap[symbol.toUpperCase()])
    .filter((id): id is string => Boolean(id));
  if (ids.length === 0) {
    return [];
  }
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const url =
      `${BASE_URL}/coins/markets?vs_currency=usd&ids=${encodeURIComponent(ids.join(","))}` +
      "&price_change_percentage=1h,24h,7d";
    const res = await fetch(url, {
      signal: controller.signal,
      headers: { "user-agent": userAgent ?? "MarketloreBot/1.0" },
    });
    if (!res.ok) {
      log.warn("coin markets request failed", { status: res.status });
      return [];
    }
    return parseCoinMarkets(await res.json(), new Date());
  } catch (err) {
    log.warn("coin markets request errored", { error: String(err) });
    return [];
  } finally {
    clearTimeout(timeout);
  }
};
