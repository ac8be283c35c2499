import path from "node:path";
import type { NewsConfig } from "../config/types.market.js";
import type {
  AssetMetadata,
  AssetRecord,
  AssetStatus,
  CatalogDocument,
  NewsCategory,
  NewsSource,
} from "./types.js";
import { resolveStateDir } from "../config/paths.js";
import { readJsonDocument, updateJsonDocument, type DocumentCodec } from "../state/json-store.js";
import { DEFAULT_NEWS_CATEGORIES, DEFAULT_NEWS_SOURCES } from "./defaults.js";

export const CATALOG_PATH = path.join("catalog", "assets.json");

const CATALOG_CODEC: DocumentCodec<CatalogDocument> = {
  empty: () => ({ version: 1, nextAssetId: 1, assets: [], metadata: [] }),
  parse: (value) => {
    const doc = value as CatalogDocument | null;
    if (!doc || doc.version !== 1 || !Array.isArray(doc.assets)) {
      return null;
    }
    return { ...doc, metadata: Array.isArray(doc.metadata) ? doc.metadata : [] };
  },
};

export function resolveCatalogPath(stateDir: string = resolveStateDir()): string {
  return path.join(stateDir, CATALOG_PATH);
}

export function normalizeAssetSymbol(raw: string): string {
  return raw.trim().toUpperCase();
}

export function slugify(raw: string): string {
  return raw
    .normalize("NFKD")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

export async function readCatalog(stateDir: string = resolveStateDir()): Promise<CatalogDocument> {
  return await readJsonDocument(resolveCatalogPath(stateDir), CATALOG_CODEC);
}

export async function listAssets(stateDir: string = resolveStateDir()): Promise<AssetRecord[]> {
  const doc = await readCatalog(stateDir);
  return [...doc.assets].sort((a, b) => a.id - b.id);
}

export async function getAssetBySymbol(
  symbol: string,
  stateDir: string = resolveStateDir(),
): Promise<AssetRecord | null> {
  const normalized = normalizeAssetSymbol(symbol);
  const doc = await readCatalog(stateDir);
  return doc.assets.find((entry) => entry.symbol === normalized) ?? null;
}

export async function getAssetById(
  assetId: number,
  stateDir: string = resolveStateDir(),
): Promise<AssetRecord | null> {
  const doc = await readCatalog(stateDir);
  return doc.assets.find((entry) => entry.id === assetId) ?? null;
}

function resolveSlug(doc: CatalogDocument, name: string, symbol: string, requested?: string): string {
  const base = slugify(requested ?? name) || slugify(symbol);
  const taken = doc.assets.some((entry) => entry.slug === base && entry.symbol !== symbol);
  return taken ? `${base}-${slugify(symbol)}` : base;
}

export type UpsertAssetInput = {
  symbol: string;
  name?: string;
  slug?: string;
  status?: AssetStatus;
};

/**
 * Registers an asset by symbol. An existing symbol keeps its id and slug; only the display
 * name (and status, when given) is updated.
 */
export async function upsertAsset(
  input: UpsertAssetInput,
  stateDir: string = resolveStateDir(),
  now: Date = new Date(),
): Promise<{ asset: AssetRecord; created: boolean }> {
  const symbol = normalizeAssetSymbol(input.symbol);
  if (!symbol) {
    throw new Error("asset symbol is required");
  }
  return await updateJsonDocument<CatalogDocument, { asset: AssetRecord; created: boolean }>(resolveCatalogPath(stateDir), CATALOG_CODEC, async (doc) => {
    const index = doc.assets.findIndex((entry) => entry.symbol === symbol);
    if (index !== -1) {
      const existing = doc.assets[index];
      const name = input.name?.trim() || existing.name;
      const status = input.status ?? existing.status;
      if (name === existing.name && status === existing.status) {
        return { next: null, result: { asset: existing, created: false } };
      }
      const updated: AssetRecord = {
        ...existing,
        name,
        status,
        statusChangedAt: status === existing.status ? existing.statusChangedAt : now.toISOString(),
      };
      doc.assets[index] = updated;
      return { next: doc, result: { asset: updated, created: false } };
    }
    const name = input.name?.trim() || symbol;
    const asset: AssetRecord = {
      id: doc.nextAssetId,
      symbol,
      name,
      slug: resolveSlug(doc, name, symbol, input.slug),
      status: input.status ?? "active",
      createdAt: now.toISOString(),
    };
    doc.assets.push(asset);
    doc.nextAssetId += 1;
    return { next: doc, result: { asset, created: true } };
  });
}

export async function setAssetStatus(
  assetId: number,
  status: AssetStatus,
  stateDir: string = resolveStateDir(),
  now: Date = new Date(),
): Promise<AssetRecord | null> {
  return await updateJsonDocument(resolveCatalogPath(stateDir), CATALOG_CODEC, async (doc) => {
    const index = doc.assets.findIndex((entry) => entry.id === assetId);
    if (index === -1) {
      return { next: null, result: null };
    }
    const existing = doc.assets[index];
    if (existing.status === status) {
      return { next: null, result: existing };
    }
    const updated = { ...existing, status, statusChangedAt: now.toISOString() };
    doc.assets[index] = updated;
    return { next: doc, result: updated };
  });
}

export async function upsertAssetMetadata(
  metadata: AssetMetadata,
  stateDir: string = resolveStateDir(),
): Promise<AssetMetadata | null> {
  return await updateJsonDocument(resolveCatalogPath(stateDir), CATALOG_CODEC, async (doc) => {
    if (!doc.assets.some((entry) => entry.id === metadata.assetId)) {
      return { next: null, result: null };
    }
    const index = doc.metadata.findIndex((entry) => entry.assetId === metadata.assetId);
    const merged: AssetMetadata = index === -1 ? metadata : { ...doc.metadata[index], ...metadata };
    if (index === -1) {
      doc.metadata.push(merged);
    } else {
      doc.metadata[index] = merged;
    }
    return { next: doc, result: merged };
  });
}

export async function getAssetMetadata(
  assetId: number,
  stateDir: string = resolveStateDir(),
): Promise<AssetMetadata | null> {
  const doc = await readCatalog(stateDir);
  return doc.metadata.find((entry) => entry.assetId === assetId) ?? null;
}

/** Removes the registry row and its metadata. The caller owns the series document. */
export async function removeAssetRecord(
  assetId: number,
  stateDir: string = resolveStateDir(),
): Promise<boolean> {
  return await updateJsonDocument(resolveCatalogPath(stateDir), CATALOG_CODEC, async (doc) => {
    const before = doc.assets.length;
    doc.assets = doc.assets.filter((entry) => entry.id !== assetId);
    doc.metadata = doc.metadata.filter((entry) => entry.assetId !== assetId);
    if (doc.assets.length === before) {
      return { next: null, result: false };
    }
    return { next: doc, result: true };
  });
}

export function resolveNewsSources(news: NewsConfig = {}): NewsSource[] {
  const seen = new Set<string>();
  const sources: NewsSource[] = [];
  for (const entry of [...DEFAULT_NEWS_SOURCES, ...(news.sources ?? [])]) {
    const key = entry.name.trim().toLowerCase();
    if (!key || seen.has(key)) {
      continue;
    }
    seen.add(key);
    sources.push({
      id: sources.length + 1,
      name: entry.name.trim(),
      baseUrl: entry.baseUrl ?? null,
      description: entry.description ?? null,
    });
  }
  return sources;
}

export function resolveNewsCategories(news: NewsConfig = {}): NewsCategory[] {
  const seen = new Set<string>();
  const categories: NewsCategory[] = [];
  for (const name of [...DEFAULT_NEWS_CATEGORIES, ...(news.categories ?? [])]) {
    const key = name.trim().toLowerCase();
    if (!key || seen.has(key)) {
      continue;
    }
    seen.add(key);
    categories.push({ id: categories.length + 1, name: name.trim() });
  }
  return categories;
}

export function findByName<T extends { name: string }>(entries: T[], name: string): T | null {
  const key = name.trim().toLowerCase();
  return entries.find((entry) => entry.name.toLowerCase() === key) ?? null;
}
