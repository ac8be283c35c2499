import { setTimeout as delay } from "node:timers/promises";
import { createSubsystemLogger } from "../logging.js";

const log = createSubsystemLogger("news/fetch");

export type FetchLimits = {
  timeoutMs: number;
  maxBytes: number;
  userAgent: string;
  rateLimitPerHostPerMinute: number;
};

export type FetchResult = {
  ok: boolean;
  status: number;
  body: string;
  bytes: number;
  truncated: boolean;
  error?: string;
};

export const DEFAULT_FETCH_LIMITS: FetchLimits = {
  timeoutMs: 12_000,
  maxBytes: 1_000_000,
  userAgent: "MarketloreBot/1.0",
  rateLimitPerHostPerMinute: 30,
};

function resolveMinIntervalMs(rateLimitPerHostPerMinute: number): number {
  if (!Number.isFinite(rateLimitPerHostPerMinute) || rateLimitPerHostPerMinute <= 0) {
    return 0;
  }
  return Math.ceil(60_000 / rateLimitPerHostPerMinute);
}

export type RateLimiter = (url: URL, rateLimitPerHostPerMinute: number) => Promise<void>;

/** Spaces requests to the same host; hosts are tracked independently. */
export function createRateLimiter(
  clock: () => number = Date.now,
  sleep: (ms: number) => Promise<unknown> = delay,
): RateLimiter {
  const lastFetchAt = new Map<string, number>();
  return async (url, rateLimitPerHostPerMinute) => {
    const host = url.host;
    const minInterval = resolveMinIntervalMs(rateLimitPerHostPerMinute);
    if (!host || minInterval === 0) {
      return;
    }
    const previous = lastFetchAt.get(host);
    if (previous !== undefined) {
      const elapsed = clock() - previous;
      if (elapsed < minInterval) {
        await sleep(minInterval - elapsed);
      }
    }
    lastFetchAt.set(host, clock());
  };
}

export async function fetchWithLimits(url: string, limits: FetchLimits): Promise<FetchResult> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), limits.timeoutMs);
  try {
    const res = await fetch(url, {
      signal: controller.signal,
      headers: { "user-agent": limits.userAgent },
    });
    const arrayBuf = await res.arrayBuffer();
    const bytes = arrayBuf.byteLength;
    const truncated = bytes > limits.maxBytes;
    const body = Buffer.from(truncated ? arrayBuf.slice(0, limits.maxBytes) : arrayBuf).toString("utf8");
    if (!res.ok) {
      log.warn("fetch returned non-ok status", { url, status: res.status });
    }
    return { ok: res.ok, status: res.status, body, bytes, truncated };
  } catch (err) {
    const error = controller.signal.aborted ? `timed out after ${limits.timeoutMs}ms` : String(err);
    log.warn("fetch failed", { url, error });
    return { ok: false, status: 0, body: "", bytes: 0, truncated: false, error };
  } finally {
    clearTimeout(timeout);
  }
}
