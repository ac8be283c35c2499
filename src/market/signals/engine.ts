import { setImmediate as yieldToLoop, setTimeout as delay } from "node:timers/promises";
import type { MarketloreConfig } from "../../config/config.js";
import type { Asset, AssetRecord } from "../../catalog/types.js";
import type { Observation, ObservationInput, SeriesDocument, SignalRow } from "../series/types.js";
import { getAssetById, listAssets, removeAssetRecord, setAssetStatus } from "../../catalog/store.js";
import { resolveStateDir } from "../../config/paths.js";
import {
  InconsistentBackfillError,
  InvalidObservationError,
  StaleWindowConflictError,
  UnknownAssetError,
} from "../../errors.js";
import { createSubsystemLogger } from "../../logging.js";
import { createKeyedSerializer } from "../../state/serial.js";
import { isLockContention } from "../../state/json-store.js";
import { lowerBound, normalizeObservation, normalizeTimestamp, timestampMs } from "../series/observation.js";
import { readSeries, removeSeries, withSeriesLock, type SeriesTransaction } from "../series/store.js";
import { computeSignals } from "./indicators.js";
import { resolveSignalSettings, type SignalSettings } from "./settings.js";

const log = createSubsystemLogger("signals");

export type IngestResult =
  | { status: "inserted"; signal: SignalRow; recomputed: number; late: boolean }
  | { status: "duplicate"; signal: SignalRow | null };

export type RecomputeResult =
  | { status: "completed"; recomputed: number }
  | { status: "aborted"; recomputed: number; resumeFrom: string };

export type ObservationCorrection = Partial<Omit<ObservationInput, "timestamp">>;

export type SignalEngineParams = {
  cfg?: MarketloreConfig;
  settings?: SignalSettings;
  stateDir?: string;
  now?: () => Date;
};

/** Signals that are safe to serve: everything before a pending backfill marker. */
function servedSignals(doc: SeriesDocument): SignalRow[] {
  if (!doc.backfill) {
    return doc.signals;
  }
  const cutoff = timestampMs(doc.backfill.resumeFrom);
  return doc.signals.filter((row) => timestampMs(row.timestamp) < cutoff);
}

function seriesBounds(doc: SeriesDocument): { firstSeen: string | null; lastSeen: string | null } {
  return {
    firstSeen: doc.observations[0]?.timestamp ?? null,
    lastSeen: doc.observations.at(-1)?.timestamp ?? null,
  };
}

export function createSignalEngine(params: SignalEngineParams = {}) {
  const settings = params.settings ?? resolveSignalSettings(params.cfg?.signals);
  const stateDir = params.stateDir ?? resolveStateDir();
  const now = params.now ?? (() => new Date());
  const serializer = createKeyedSerializer();

  async function requireAsset(assetId: number): Promise<AssetRecord> {
    const asset = await getAssetById(assetId, stateDir);
    if (!asset) {
      throw new UnknownAssetError(assetId);
    }
    return asset;
  }

  /**
   * Serializes work per asset inside this process, holds the series file lock across
   * processes, and retries when the window changed underneath us.
   */
  async function runExclusive<T>(assetId: number, fn: (tx: SeriesTransaction) => Promise<T>): Promise<T> {
    return await serializer.run(String(assetId), async () => {
      for (let attempt = 0; ; attempt += 1) {
        try {
          return await withSeriesLock(assetId, stateDir, fn);
        } catch (err) {
          const conflict =
            err instanceof StaleWindowConflictError
              ? err
              : isLockContention(err)
                ? new StaleWindowConflictError(assetId, { cause: err })
                : null;
          if (!conflict) {
            throw err;
          }
          if (attempt >= settings.conflictRetries) {
            throw conflict;
          }
          log.warn("signal window conflict, retrying", { assetId, attempt: attempt + 1 });
          await delay(50 * 2 ** attempt);
        }
      }
    });
  }

  /** Rewrites signals from `fromIndex` to the end and clears any backfill marker. */
  function recomputeForward(
    doc: SeriesDocument,
    fromIndex: number,
  ): { next: SeriesDocument; from: number } {
    let start = fromIndex;
    if (doc.backfill) {
      start = Math.min(start, lowerBound(doc.observations, doc.backfill.resumeFrom));
    }
    start = Math.min(start, doc.signals.length);
    const prefix = doc.signals.slice(0, start);
    const rows = computeSignals(doc.assetId, doc.observations, settings, start);
    return { next: { ...doc, signals: [...prefix, ...rows], backfill: null }, from: start };
  }

  async function reactivate(asset: AssetRecord): Promise<void> {
    if (asset.status === "inactive") {
      await setAssetStatus(asset.id, "active", stateDir, now());
      log.info("asset reactivated", { assetId: asset.id, symbol: asset.symbol });
    }
  }

  async function ingest(assetId: number, input: ObservationInput): Promise<IngestResult> {
    const observation = normalizeObservation(input, now());
    const asset = await requireAsset(assetId);
    const result = await runExclusive(assetId, async (tx): Promise<IngestResult> => {
      const doc = tx.current;
      const index = lowerBound(doc.observations, observation.timestamp);
      const existing = doc.observations[index];
      if (existing && existing.timestamp === observation.timestamp) {
        if (!doc.backfill) {
          return { status: "duplicate", signal: doc.signals[index] ?? null };
        }
        const resumed = await tx.commit(recomputeForward(doc, doc.observations.length).next);
        return { status: "duplicate", signal: resumed.signals[index] ?? null };
      }
      const late = index < doc.observations.length;
      const observations = [
        ...doc.observations.slice(0, index),
        observation,
        ...doc.observations.slice(index),
      ];
      const { next, from } = recomputeForward({ ...doc, observations }, index);
      const committed = await tx.commit(next);
      const recomputed = committed.signals.length - from;
      if (late) {
        log.info("late observation, recomputed forward", {
          assetId,
          timestamp: observation.timestamp,
          recomputed,
        });
      }
      return { status: "inserted", signal: committed.signals[index], recomputed, late };
    });
    if (result.status === "inserted") {
      await reactivate(asset);
    }
    return result;
  }

  async function correctObservation(
    assetId: number,
    timestamp: string | Date,
    patch: ObservationCorrection,
  ): Promise<SignalRow> {
    const normalized = normalizeTimestamp(timestamp);
    if (!normalized) {
      throw new InvalidObservationError("timestamp does not parse", { timestamp: String(timestamp) });
    }
    await requireAsset(assetId);
    return await runExclusive(assetId, async (tx) => {
      const doc = tx.current;
      const index = lowerBound(doc.observations, normalized);
      const existing = doc.observations[index];
      if (!existing || existing.timestamp !== normalized) {
        throw new InvalidObservationError("no observation to correct at timestamp", {
          assetId,
          timestamp: normalized,
        });
      }
      const corrected: Observation = {
        ...normalizeObservation({ ...existing, ...patch, timestamp: normalized }, now()),
        ingestedAt: existing.ingestedAt,
        correctedAt: now().toISOString(),
      };
      const observations = [...doc.observations];
      observations[index] = corrected;
      const committed = await tx.commit(recomputeForward({ ...doc, observations }, index).next);
      log.info("observation corrected", { assetId, timestamp: normalized });
      return committed.signals[index];
    });
  }

  /**
   * Recomputes every signal for the asset, committing a checkpoint every
   * `checkpointEvery` timestamps. An abort leaves the committed prefix plus a marker that
   * the next ingest or recompute resumes from.
   */
  async function recompute(
    assetId: number,
    opts: { signal?: AbortSignal; checkpointEvery?: number; fromScratch?: boolean } = {},
  ): Promise<RecomputeResult> {
    await requireAsset(assetId);
    const step = Math.max(1, opts.checkpointEvery ?? settings.checkpointEvery);
    return await runExclusive(assetId, async (tx) => {
      const startedAt = tx.current.backfill?.startedAt ?? now().toISOString();
      const { observations } = tx.current;
      let start = 0;
      if (tx.current.backfill && !opts.fromScratch) {
        start = Math.min(lowerBound(observations, tx.current.backfill.resumeFrom), tx.current.signals.length);
      }
      let signals = tx.current.signals.slice(0, start);
      let recomputed = 0;
      for (let cursor = start; cursor < observations.length; cursor += step) {
        if (opts.signal?.aborted) {
          const resumeFrom = observations[cursor].timestamp;
          await tx.commit({ ...tx.current, signals, backfill: { resumeFrom, startedAt } });
          log.warn("recompute aborted at checkpoint", { assetId, resumeFrom, recomputed });
          return { status: "aborted", recomputed, resumeFrom };
        }
        const end = Math.min(cursor + step, observations.length);
        signals = [...signals, ...computeSignals(assetId, observations, settings, cursor, end)];
        recomputed += end - cursor;
        if (end < observations.length) {
          await tx.commit({
            ...tx.current,
            signals,
            backfill: { resumeFrom: observations[end].timestamp, startedAt },
          });
          await yieldToLoop();
        }
      }
      await tx.commit({ ...tx.current, signals, backfill: null });
      log.info("recompute completed", { assetId, recomputed });
      return { status: "completed", recomputed };
    });
  }

  async function getSignals(assetId: number): Promise<SignalRow[]> {
    return servedSignals(await readSeries(assetId, stateDir));
  }

  async function getSignal(assetId: number, timestamp: string | Date): Promise<SignalRow | null> {
    const normalized = normalizeTimestamp(timestamp);
    if (!normalized) {
      return null;
    }
    const signals = await getSignals(assetId);
    return signals.find((row) => row.timestamp === normalized) ?? null;
  }

  async function latestSignal(assetId: number): Promise<SignalRow | null> {
    const doc = await readSeries(assetId, stateDir);
    if (doc.backfill) {
      return null;
    }
    return doc.signals.at(-1) ?? null;
  }

  async function getObservations(assetId: number): Promise<Observation[]> {
    return (await readSeries(assetId, stateDir)).observations;
  }

  async function assertConsistent(assetId: number): Promise<void> {
    const doc = await readSeries(assetId, stateDir);
    if (doc.backfill) {
      throw new InconsistentBackfillError(assetId, doc.backfill.resumeFrom);
    }
  }

  async function describeAsset(asset: AssetRecord): Promise<Asset> {
    const doc = await readSeries(asset.id, stateDir);
    return { ...asset, ...seriesBounds(doc) };
  }

  async function markStaleAssets(at: Date = now()): Promise<AssetRecord[]> {
    const cutoff = at.getTime() - settings.staleAfterHours * 3_600_000;
    const marked: AssetRecord[] = [];
    for (const asset of await listAssets(stateDir)) {
      if (asset.status !== "active") {
        continue;
      }
      const { lastSeen } = seriesBounds(await readSeries(asset.id, stateDir));
      if (!lastSeen || timestampMs(lastSeen) >= cutoff) {
        continue;
      }
      const updated = await setAssetStatus(asset.id, "inactive", stateDir, at);
      if (updated) {
        marked.push(updated);
        log.info("asset marked inactive", { assetId: asset.id, symbol: asset.symbol, lastSeen });
      }
    }
    return marked;
  }

  async function pruneObservations(assetId: number, before: Date): Promise<number> {
    await requireAsset(assetId);
    const cutoff = before.getTime();
    return await runExclusive(assetId, async (tx) => {
      const observations = tx.current.observations.filter(
        (entry) => timestampMs(entry.timestamp) >= cutoff,
      );
      const removed = tx.current.observations.length - observations.length;
      if (removed === 0) {
        return 0;
      }
      await tx.commit({
        ...tx.current,
        observations,
        signals: computeSignals(assetId, observations, settings),
        backfill: null,
      });
      log.info("pruned observations", { assetId, removed, before: before.toISOString() });
      return removed;
    });
  }

  async function deleteAsset(assetId: number): Promise<boolean> {
    return await serializer.run(String(assetId), async () => {
      await removeSeries(assetId, stateDir);
      return await removeAssetRecord(assetId, stateDir);
    });
  }

  return {
    settings,
    ingest,
    correctObservation,
    recompute,
    getSignals,
    getSignal,
    latestSignal,
    getObservations,
    assertConsistent,
    describeAsset,
    markStaleAssets,
    pruneObservations,
    deleteAsset,
  };
}

export type SignalEngine = ReturnType<typeof createSignalEngine>;
