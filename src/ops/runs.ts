import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { resolveStateDir } from "../config/paths.js";
import { createSubsystemLogger } from "../logging.js";
import { VERSION } from "../version.js";

const log = createSubsystemLogger("ops");

export type RunStatus = "ok" | "failed";

export type RunRecord = {
  runId: string;
  job: string;
  status: RunStatus;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  counts?: Record<string, number>;
  error?: string;
  provenance: { runId: string; job: string; version: string };
};

export const OPS_RUNS_PATH = path.join("ops", "runs.ndjson");

export function resolveOpsRunsPath(stateDir: string = resolveStateDir()): string {
  return path.join(stateDir, OPS_RUNS_PATH);
}

export function buildRunRecord(params: {
  runId: string;
  job: string;
  startedAt: string;
  finishedAt: string;
  status?: RunStatus;
  counts?: Record<string, number>;
  error?: string;
}): RunRecord {
  const durationMs = new Date(params.finishedAt).getTime() - new Date(params.startedAt).getTime();
  return {
    runId: params.runId,
    job: params.job,
    status: params.status ?? "ok",
    startedAt: params.startedAt,
    finishedAt: params.finishedAt,
    durationMs: Math.max(0, durationMs),
    counts: params.counts,
    error: params.error,
    provenance: {
      runId: params.runId,
      job: params.job,
      version: VERSION,
    },
  };
}

export async function appendRunRecord(record: RunRecord, stateDir: string = resolveStateDir()): Promise<void> {
  const filePath = resolveOpsRunsPath(stateDir);
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true, mode: 0o700 });
  const handle = await fs.promises.open(filePath, "a", 0o600);
  try {
    await handle.writeFile(`${JSON.stringify(record)}\n`, { encoding: "utf-8" });
  } finally {
    await handle.close();
  }
}

/** Newest last. Lines that do not parse are skipped. */
export async function readRunRecords(
  opts: { job?: string; limit?: number } = {},
  stateDir: string = resolveStateDir(),
): Promise<RunRecord[]> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(resolveOpsRunsPath(stateDir), "utf8");
  } catch (err) {
    if ((err as { code?: string }).code === "ENOENT") {
      return [];
    }
    throw err;
  }
  const records: RunRecord[] = [];
  for (const line of raw.split("\n")) {
    if (!line.trim()) {
      continue;
    }
    let record: RunRecord;
    try {
      record = JSON.parse(line) as RunRecord;
    } catch (err) {
      log.warn("skipping unreadable run record", { error: String(err) });
      continue;
    }
    if (!opts.job || record.job === opts.job) {
      records.push(record);
    }
  }
  return opts.limit === undefined ? records : records.slice(Math.max(0, records.length - opts.limit));
}

/**
 * Runs a job and appends its run record, including on failure. The callback fills `counts`
 * as it goes; a failed run keeps whatever it counted before throwing.
 */
export async function recordRun<T>(
  job: string,
  fn: (counts: Record<string, number>) => Promise<T>,
  opts: { stateDir?: string; now?: () => Date } = {},
): Promise<T> {
  const now = opts.now ?? (() => new Date());
  const runId = crypto.randomUUID();
  const startedAt = now().toISOString();
  const counts: Record<string, number> = {};
  try {
    const result = await fn(counts);
    await appendRunRecord(
      buildRunRecord({ runId, job, startedAt, finishedAt: now().toISOString(), counts }),
      opts.stateDir,
    );
    return result;
  } catch (err) {
    await appendRunRecord(
      buildRunRecord({
        runId,
        job,
        startedAt,
        finishedAt: now().toISOString(),
        status: "failed",
        counts,
        error: String(err),
      }),
      opts.stateDir,
    );
    throw err;
  }
}
