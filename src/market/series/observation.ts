import type { Observation, ObservationInput } from "./types.js";
import { InvalidObservationError } from "../../errors.js";

export function normalizeTimestamp(raw: string | Date): string | null {
  const date = raw instanceof Date ? raw : new Date(raw);
  const ms = date.getTime();
  if (!Number.isFinite(ms)) {
    return null;
  }
  return date.toISOString();
}

function optionalNumber(
  field: keyof ObservationInput,
  value: number | null | undefined,
  opts: { allowNegative: boolean },
): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (!Number.isFinite(value) || (!opts.allowNegative && value < 0)) {
    throw new InvalidObservationError(`${field} must be a ${opts.allowNegative ? "" : "non-negative "}finite number`, {
      field,
      value,
    });
  }
  return value;
}

export function normalizeObservation(input: ObservationInput, now: Date = new Date()): Observation {
  const timestamp = normalizeTimestamp(input.timestamp);
  if (!timestamp) {
    throw new InvalidObservationError("timestamp does not parse", { timestamp: String(input.timestamp) });
  }
  if (!Number.isFinite(input.priceUsd) || input.priceUsd <= 0) {
    throw new InvalidObservationError("priceUsd must be a positive number", {
      timestamp,
      priceUsd: input.priceUsd,
    });
  }
  return {
    timestamp,
    priceUsd: input.priceUsd,
    marketCapUsd: optionalNumber("marketCapUsd", input.marketCapUsd, { allowNegative: false }),
    volume24hUsd: optionalNumber("volume24hUsd", input.volume24hUsd, { allowNegative: false }),
    percentChange1h: optionalNumber("percentChange1h", input.percentChange1h, { allowNegative: true }),
    percentChange24h: optionalNumber("percentChange24h", input.percentChange24h, {
      allowNegative: true,
    }),
    percentChange7d: optionalNumber("percentChange7d", input.percentChange7d, { allowNegative: true }),
    circulatingSupply: optionalNumber("circulatingSupply", input.circulatingSupply, {
      allowNegative: false,
    }),
    totalSupply: optionalNumber("totalSupply", input.totalSupply, { allowNegative: false }),
    maxSupply: optionalNumber("maxSupply", input.maxSupply, { allowNegative: false }),
    ingestedAt: now.toISOString(),
  };
}

export function timestampMs(value: string): number {
  return new Date(value).getTime();
}

/** Index of the first observation whose timestamp is not before `timestamp`. */
export function lowerBound(observations: Observation[], timestamp: string): number {
  const target = timestampMs(timestamp);
  let lo = 0;
  let hi = observations.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (timestampMs(observations[mid].timestamp) < target) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}
