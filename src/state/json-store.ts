import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import lockfile from "proper-lockfile";
import { createSubsystemLogger } from "../logging.js";

const log = createSubsystemLogger("state");

export const STATE_LOCK_OPTIONS = {
  retries: {
    retries: 8,
    factor: 2,
    minTimeout: 25,
    maxTimeout: 2_000,
    randomize: true,
  },
  stale: 30_000,
  realpath: false,
} as const;

export type LockLease = {
  /** Set when proper-lockfile reports the lock was lost (stale takeover, mtime update failure). */
  compromised: () => Error | null;
};

export type DocumentCodec<T> = {
  empty: () => T;
  parse: (value: unknown) => T | null;
};

export function isLockContention(err: unknown): boolean {
  return (err as { code?: string } | null)?.code === "ELOCKED";
}

function safeParseJson(raw: string): unknown {
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    return null;
  }
}

export async function ensureDir(filePath: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true, mode: 0o700 });
}

export async function readJsonDocument<T>(filePath: string, codec: DocumentCodec<T>): Promise<T> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(filePath, "utf-8");
  } catch (err) {
    const code = (err as { code?: string }).code;
    if (code === "ENOENT") {
      return codec.empty();
    }
    throw err;
  }
  const parsed = codec.parse(safeParseJson(raw));
  if (!parsed) {
    log.warn("unreadable state document, treating as empty", { filePath });
    return codec.empty();
  }
  return parsed;
}

export async function writeJsonDocument(filePath: string, value: unknown): Promise<void> {
  await ensureDir(filePath);
  const dir = path.dirname(filePath);
  const tmp = path.join(dir, `${path.basename(filePath)}.${crypto.randomUUID()}.tmp`);
  await fs.promises.writeFile(tmp, `${JSON.stringify(value)}\n`, { encoding: "utf-8", mode: 0o600 });
  try {
    await fs.promises.rename(tmp, filePath);
  } catch (err) {
    await fs.promises.rm(tmp, { force: true });
    throw err;
  }
}

export async function removeDocument(filePath: string): Promise<boolean> {
  try {
    await fs.promises.unlink(filePath);
    return true;
  } catch (err) {
    if ((err as { code?: string }).code === "ENOENT") {
      return false;
    }
    throw err;
  }
}

export async function withFileLock<T>(
  filePath: string,
  fn: (lease: LockLease) => Promise<T>,
): Promise<T> {
  await ensureDir(filePath);
  let compromised: Error | null = null;
  const release = await lockfile.lock(filePath, {
    ...STATE_LOCK_OPTIONS,
    onCompromised: (err) => {
      compromised = err;
      log.warn("state lock compromised", { filePath, error: err.message });
    },
  });
  try {
    return await fn({ compromised: () => compromised });
  } finally {
    try {
      await release();
    } catch (err) {
      log.warn("failed to release state lock", { filePath, error: String(err) });
    }
  }
}

export async function updateJsonDocument<T, R>(
  filePath: string,
  codec: DocumentCodec<T>,
  updater: (current: T, lease: LockLease) => Promise<{ next: T | null; result: R }>,
): Promise<R> {
  return await withFileLock(filePath, async (lease) => {
    const current = await readJsonDocument(filePath, codec);
    const { next, result } = await updater(current, lease);
    if (next) {
      await writeJsonDocument(filePath, next);
    }
    return result;
  });
}
