import type { StdDevMode } from "../../config/types.signals.js";
import type { Observation, SignalLabel, SignalRow } from "../series/types.js";
import type { SignalSettings, SignalThresholds } from "./settings.js";

export function mean(values: number[]): number {
  if (values.length === 0) {
    return Number.NaN;
  }
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

export function standardDeviation(values: number[], mode: StdDevMode): number | null {
  const divisor = mode === "sample" ? values.length - 1 : values.length;
  if (divisor <= 0) {
    return null;
  }
  const avg = mean(values);
  let squared = 0;
  for (const value of values) {
    squared += (value - avg) ** 2;
  }
  return Math.sqrt(squared / divisor);
}

export function simpleReturn(previous: number | null, current: number): number | null {
  if (previous === null || previous <= 0) {
    return null;
  }
  return (current - previous) / previous;
}

/**
 * RSI over consecutive price changes. With fewer changes than the configured period the
 * average runs over what is available. No losses saturates at 100.
 */
export function relativeStrengthIndex(prices: number[]): number | null {
  if (prices.length < 2) {
    return null;
  }
  let gains = 0;
  let losses = 0;
  for (let i = 1; i < prices.length; i += 1) {
    const delta = prices[i] - prices[i - 1];
    if (delta > 0) {
      gains += delta;
    } else {
      losses -= delta;
    }
  }
  const changes = prices.length - 1;
  const avgGain = gains / changes;
  const avgLoss = losses / changes;
  if (avgLoss === 0) {
    return 100;
  }
  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}

export function classifySignal(
  params: { price: number; ma: number; dailyReturn: number | null; rsi: number | null },
  thresholds: SignalThresholds,
): SignalLabel {
  if (params.rsi === null) {
    return "hold";
  }
  const deviationPct = params.ma > 0 ? ((params.price - params.ma) / params.ma) * 100 : 0;
  const change = params.dailyReturn ?? 0;
  if (params.rsi < thresholds.rsiOversold) {
    return deviationPct <= -thresholds.trendBandPct && change >= 0 ? "strong_buy" : "buy";
  }
  if (params.rsi > thresholds.rsiOverbought) {
    return deviationPct >= thresholds.trendBandPct && change <= 0 ? "strong_sell" : "sell";
  }
  return "hold";
}

function trailing<T>(items: T[], endIndex: number, count: number): T[] {
  return items.slice(Math.max(0, endIndex - count + 1), endIndex + 1);
}

function signalFromPrices(
  assetId: number,
  timestamp: string,
  prices: number[],
  index: number,
  settings: SignalSettings,
): SignalRow {
  const price = prices[index];
  const windowPrices = trailing(prices, index, settings.window);
  const rsiPrices = trailing(prices, index, settings.rsiPeriod + 1);
  const previous = index > 0 ? prices[index - 1] : null;
  const ma7d = mean(windowPrices);
  const dailyReturn = simpleReturn(previous, price);
  const rsi = relativeStrengthIndex(rsiPrices);
  return {
    assetId,
    timestamp,
    dailyReturn,
    ma7d,
    std7d: standardDeviation(windowPrices, settings.stdDevMode),
    rsi,
    signal: classifySignal({ price, ma: ma7d, dailyReturn, rsi }, settings.thresholds),
  };
}

/** Derives the signal row for `observations[index]` from that point's trailing history only. */
export function computeSignalAt(
  assetId: number,
  observations: Observation[],
  index: number,
  settings: SignalSettings,
): SignalRow {
  const prices = trailing(observations, index, Math.max(settings.window, settings.rsiPeriod + 1)).map(
    (entry) => entry.priceUsd,
  );
  return signalFromPrices(
    assetId,
    observations[index].timestamp,
    prices,
    prices.length - 1,
    settings,
  );
}

export function computeSignals(
  assetId: number,
  observations: Observation[],
  settings: SignalSettings,
  fromIndex = 0,
  toIndex = observations.length,
): SignalRow[] {
  const prices = observations.map((entry) => entry.priceUsd);
  const rows: SignalRow[] = [];
  for (let index = Math.max(0, fromIndex); index < toIndex; index += 1) {
    rows.push(signalFromPrices(assetId, observations[index].timestamp, prices, index, settings));
  }
  return rows;
}
