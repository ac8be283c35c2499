import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { SignalRow } from "../series/types.js";
import { getAssetById, upsertAsset } from "../../catalog/store.js";
import { InconsistentBackfillError, InvalidObservationError, UnknownAssetError } from "../../errors.js";
import { readSeries, withSeriesLock } from "../series/store.js";
import { createSignalEngine, type SignalEngine } from "./engine.js";
import { computeSignals } from "./indicators.js";
import { DEFAULT_SIGNAL_SETTINGS } from "./settings.js";

const FIXED_NOW = new Date("2024-02-01T00:00:00.000Z");
const SCENARIO = [100, 102, 101, 105, 103, 107, 110];

function day(n: number): string {
  return new Date(Date.UTC(2024, 0, n)).toISOString();
}

function withoutAsset(rows: SignalRow[]) {
  return rows.map(({ assetId: _assetId, ...rest }) => rest);
}

describe("signal engine", () => {
  let stateDir: string;
  let engine: SignalEngine;
  let btc: number;

  beforeEach(async () => {
    stateDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "marketlore-signals-"));
    engine = createSignalEngine({
      stateDir,
      settings: DEFAULT_SIGNAL_SETTINGS,
      now: () => FIXED_NOW,
    });
    btc = (await upsertAsset({ symbol: "btc", name: "Bitcoin" }, stateDir, FIXED_NOW)).asset.id;
  });

  afterEach(async () => {
    await fs.promises.rm(stateDir, { recursive: true, force: true });
  });

  async function ingestDays(assetId: number, days: number[], prices: number[]) {
    for (const n of days) {
      await engine.ingest(assetId, { timestamp: day(n), priceUsd: prices[n - 1] });
    }
  }

  it("derives signals as observations arrive", async () => {
    await ingestDays(btc, [1, 2, 3, 4, 5, 6], SCENARIO);
    const result = await engine.ingest(btc, { timestamp: day(7), priceUsd: 110 });
    expect(result.status).toBe("inserted");
    if (result.status !== "inserted") {
      return;
    }
    expect(result.late).toBe(false);
    expect(result.recomputed).toBe(1);
    expect(result.signal.timestamp).toBe(day(7));
    expect(result.signal.ma7d).toBeCloseTo(104, 10);
    expect(result.signal.dailyReturn).toBeCloseTo(3 / 107, 12);
    expect(result.signal.rsi).toBeCloseTo(81.25, 10);
    expect(result.signal.signal).toBe("sell");
    expect(await engine.latestSignal(btc)).toEqual(result.signal);
  });

  it("treats a repeated timestamp as a no-op", async () => {
    await ingestDays(btc, [1, 2, 3], SCENARIO);
    const before = await readSeries(btc, stateDir);
    const result = await engine.ingest(btc, { timestamp: day(3), priceUsd: 999 });
    expect(result.status).toBe("duplicate");
    expect(result.signal).toEqual(before.signals[2]);
    const after = await readSeries(btc, stateDir);
    expect(after.revision).toBe(before.revision);
    expect(after.observations.map((entry) => entry.priceUsd)).toEqual([100, 102, 101]);
  });

  it("rejects invalid observations", async () => {
    await expect(engine.ingest(btc, { timestamp: day(1), priceUsd: 0 })).rejects.toBeInstanceOf(
      InvalidObservationError,
    );
    await expect(engine.ingest(btc, { timestamp: day(1), priceUsd: -5 })).rejects.toBeInstanceOf(
      InvalidObservationError,
    );
    await expect(
      engine.ingest(btc, { timestamp: "not-a-date", priceUsd: 100 }),
    ).rejects.toBeInstanceOf(InvalidObservationError);
    await expect(engine.ingest(999, { timestamp: day(1), priceUsd: 100 })).rejects.toBeInstanceOf(
      UnknownAssetError,
    );
    expect((await readSeries(btc, stateDir)).observations).toHaveLength(0);
  });

  it("recomputes forward when a late observation lands", async () => {
    await ingestDays(btc, [1, 2, 3, 5, 6, 7], SCENARIO);
    const before = await engine.getSignals(btc);
    expect(before.find((row) => row.timestamp === day(5))?.ma7d).toBeCloseTo(101.5, 10);

    const result = await engine.ingest(btc, { timestamp: day(4), priceUsd: 105 });
    expect(result.status).toBe("inserted");
    if (result.status !== "inserted") {
      return;
    }
    expect(result.late).toBe(true);
    expect(result.recomputed).toBe(4);

    const after = await engine.getSignals(btc);
    expect(after).toHaveLength(7);
    expect(after.slice(0, 3)).toEqual(before.slice(0, 3));
    expect(after[4].ma7d).toBeCloseTo(102.2, 10);
    expect(after[5].ma7d).toBeCloseTo(103, 10);
    expect(after[6].ma7d).toBeCloseTo(104, 10);
    expect(after).toEqual(computeSignals(btc, await engine.getObservations(btc), engine.settings));
  });

  it("produces the same signals regardless of delivery order", async () => {
    const eth = (await upsertAsset({ symbol: "ETH", name: "Ethereum" }, stateDir)).asset.id;
    await ingestDays(btc, [1, 2, 3, 4, 5, 6, 7], SCENARIO);
    await ingestDays(eth, [7, 3, 5, 1, 6, 2, 4], SCENARIO);
    expect(withoutAsset(await engine.getSignals(eth))).toEqual(
      withoutAsset(await engine.getSignals(btc)),
    );
  });

  it("serializes concurrent ingests for one asset", async () => {
    const eth = (await upsertAsset({ symbol: "ETH", name: "Ethereum" }, stateDir)).asset.id;
    const order = [4, 1, 7, 2, 6, 3, 5];
    await Promise.all([
      ...order.map((n) => engine.ingest(btc, { timestamp: day(n), priceUsd: SCENARIO[n - 1] })),
      ...order.map((n) => engine.ingest(eth, { timestamp: day(n), priceUsd: SCENARIO[n - 1] })),
    ]);
    const observations = await engine.getObservations(btc);
    expect(observations.map((entry) => entry.timestamp)).toEqual([1, 2, 3, 4, 5, 6, 7].map(day));
    expect(await engine.getSignals(btc)).toEqual(computeSignals(btc, observations, engine.settings));
    expect((await engine.getSignals(eth)).at(-1)?.ma7d).toBeCloseTo(104, 10);
  });

  it("matches a from-scratch recompute", async () => {
    await ingestDays(btc, [7, 1, 2, 6, 3, 4, 5], SCENARIO);
    const incremental = await engine.getSignals(btc);
    const result = await engine.recompute(btc, { fromScratch: true, checkpointEvery: 3 });
    expect(result).toEqual({ status: "completed", recomputed: 7 });
    expect(JSON.stringify(await engine.getSignals(btc))).toBe(JSON.stringify(incremental));
  });

  it("hides signals past a backfill checkpoint until the backfill resumes", async () => {
    const prices = [100, 102, 101, 105, 103, 107, 110, 108, 111, 115];
    await ingestDays(btc, [1, 2, 3, 4, 5, 6, 7, 8, 9, 10], prices);
    const complete = await engine.getSignals(btc);
    await withSeriesLock(btc, stateDir, async (tx) => {
      await tx.commit({
        ...tx.current,
        signals: tx.current.signals.slice(0, 4),
        backfill: { resumeFrom: day(5), startedAt: FIXED_NOW.toISOString() },
      });
    });

    expect(await engine.getSignals(btc)).toHaveLength(4);
    expect(await engine.getSignal(btc, day(6))).toBeNull();
    expect(await engine.latestSignal(btc)).toBeNull();
    await expect(engine.assertConsistent(btc)).rejects.toBeInstanceOf(InconsistentBackfillError);

    const result = await engine.recompute(btc);
    expect(result).toEqual({ status: "completed", recomputed: 6 });
    await expect(engine.assertConsistent(btc)).resolves.toBeUndefined();
    expect(await engine.getSignals(btc)).toEqual(complete);
  });

  it("leaves a resumable marker when a recompute is aborted", async () => {
    await ingestDays(btc, [1, 2, 3, 4, 5, 6, 7], SCENARIO);
    const complete = await engine.getSignals(btc);
    const controller = new AbortController();
    controller.abort();

    const result = await engine.recompute(btc, { signal: controller.signal, fromScratch: true });
    expect(result).toEqual({ status: "aborted", recomputed: 0, resumeFrom: day(1) });
    expect(await engine.getSignals(btc)).toEqual([]);
    expect((await readSeries(btc, stateDir)).backfill?.resumeFrom).toBe(day(1));

    const duplicate = await engine.ingest(btc, { timestamp: day(3), priceUsd: 101 });
    expect(duplicate.status).toBe("duplicate");
    expect(duplicate.signal).toEqual(complete[2]);
    expect(await engine.getSignals(btc)).toEqual(complete);
    expect((await readSeries(btc, stateDir)).backfill).toBeNull();
  });

  it("recomputes from the corrected observation onward", async () => {
    await ingestDays(btc, [1, 2, 3, 4, 5, 6, 7], SCENARIO);
    const before = await engine.getSignals(btc);
    const row = await engine.correctObservation(btc, day(4), { priceUsd: 120 });
    expect(row.timestamp).toBe(day(4));

    const observations = await engine.getObservations(btc);
    expect(observations[3].priceUsd).toBe(120);
    expect(observations[3].correctedAt).toBe(FIXED_NOW.toISOString());
    const after = await engine.getSignals(btc);
    expect(after.slice(0, 3)).toEqual(before.slice(0, 3));
    expect(after[6].ma7d).toBeCloseTo(743 / 7, 10);
    expect(after).toEqual(computeSignals(btc, observations, engine.settings));
    await expect(
      engine.correctObservation(btc, day(20), { priceUsd: 1 }),
    ).rejects.toBeInstanceOf(InvalidObservationError);
  });

  it("marks quiet assets inactive and reactivates them on new data", async () => {
    await engine.ingest(btc, { timestamp: day(1), priceUsd: 100 });
    const marked = await engine.markStaleAssets(new Date(day(10)));
    expect(marked.map((asset) => asset.id)).toEqual([btc]);
    expect((await getAssetById(btc, stateDir))?.status).toBe("inactive");

    await engine.ingest(btc, { timestamp: day(11), priceUsd: 101 });
    expect((await getAssetById(btc, stateDir))?.status).toBe("active");

    const asset = await getAssetById(btc, stateDir);
    if (!asset) {
      throw new Error("asset missing");
    }
    const described = await engine.describeAsset(asset);
    expect(described.firstSeen).toBe(day(1));
    expect(described.lastSeen).toBe(day(11));
  });

  it("prunes old observations and rederives the remaining window", async () => {
    await ingestDays(btc, [1, 2, 3, 4, 5, 6, 7], SCENARIO);
    expect(await engine.pruneObservations(btc, new Date(day(3)))).toBe(2);
    const signals = await engine.getSignals(btc);
    expect(signals).toHaveLength(5);
    expect(signals[0].timestamp).toBe(day(3));
    expect(signals[0].dailyReturn).toBeNull();
    expect(await engine.pruneObservations(btc, new Date(day(3)))).toBe(0);
  });

  it("deletes an asset with its series", async () => {
    await ingestDays(btc, [1, 2], SCENARIO);
    expect(await engine.deleteAsset(btc)).toBe(true);
    expect(await getAssetById(btc, stateDir)).toBeNull();
    expect((await readSeries(btc, stateDir)).observations).toEqual([]);
    expect(await engine.deleteAsset(btc)).toBe(false);
  });
});
