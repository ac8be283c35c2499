import path from "node:path";
import type { SeriesDocument } from "./types.js";
import { resolveStateDir } from "../../config/paths.js";
import { StaleWindowConflictError } from "../../errors.js";
import {
  readJsonDocument,
  removeDocument,
  withFileLock,
  writeJsonDocument,
  type DocumentCodec,
  type LockLease,
} from "../../state/json-store.js";

export const SERIES_DIR = path.join("market", "series");

function seriesCodec(assetId: number): DocumentCodec<SeriesDocument> {
  return {
    empty: () => ({
      version: 1,
      assetId,
      revision: 0,
      observations: [],
      signals: [],
      backfill: null,
      updatedAt: null,
    }),
    parse: (value) => {
      const doc = value as SeriesDocument | null;
      if (
        !doc ||
        doc.version !== 1 ||
        doc.assetId !== assetId ||
        !Array.isArray(doc.observations) ||
        !Array.isArray(doc.signals)
      ) {
        return null;
      }
      return { ...doc, backfill: doc.backfill ?? null };
    },
  };
}

export function resolveSeriesPath(assetId: number, stateDir: string = resolveStateDir()): string {
  return path.join(stateDir, SERIES_DIR, `${assetId}.json`);
}

export async function readSeries(
  assetId: number,
  stateDir: string = resolveStateDir(),
): Promise<SeriesDocument> {
  return await readJsonDocument(resolveSeriesPath(assetId, stateDir), seriesCodec(assetId));
}

export type SeriesTransaction = {
  readonly current: SeriesDocument;
  lease: LockLease;
  /** Persists a new revision of the document while the lock is still held. */
  commit: (next: SeriesDocument) => Promise<SeriesDocument>;
};

/**
 * Runs `fn` holding the asset's series lock. `commit` may be called more than once, which is how
 * long recomputes checkpoint their progress.
 */
export async function withSeriesLock<T>(
  assetId: number,
  stateDir: string,
  fn: (tx: SeriesTransaction) => Promise<T>,
): Promise<T> {
  const filePath = resolveSeriesPath(assetId, stateDir);
  const codec = seriesCodec(assetId);
  return await withFileLock(filePath, async (lease) => {
    let current = await readJsonDocument(filePath, codec);
    const commit = async (next: SeriesDocument): Promise<SeriesDocument> => {
      const onDisk = await readJsonDocument(filePath, codec);
      const lost = lease.compromised();
      if (lost || onDisk.revision !== current.revision) {
        throw new StaleWindowConflictError(assetId, {
          details: { expectedRevision: current.revision, foundRevision: onDisk.revision },
          cause: lost ?? undefined,
        });
      }
      const stamped: SeriesDocument = {
        ...next,
        revision: current.revision + 1,
        updatedAt: new Date().toISOString(),
      };
      await writeJsonDocument(filePath, stamped);
      current = stamped;
      return stamped;
    };
    return await fn({
      get current() {
        return current;
      },
      lease,
      commit,
    });
  });
}

export async function removeSeries(
  assetId: number,
  stateDir: string = resolveStateDir(),
): Promise<boolean> {
  const filePath = resolveSeriesPath(assetId, stateDir);
  return await withFileLock(filePath, async () => await removeDocument(filePath));
}
