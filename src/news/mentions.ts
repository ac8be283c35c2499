import type { AssetRecord } from "../catalog/types.js";
import type { MentionInput } from "./types.js";

type MentionTally = MentionInput & { titleHits: number };

const CASHTAG = /\$([A-Z]{1,5})\b/g;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}

function assetPatterns(asset: Pick<AssetRecord, "symbol" | "name">): RegExp[] {
  const patterns: RegExp[] = [];
  if (asset.symbol.length >= 2) {
    patterns.push(new RegExp(`\\b${escapeRegExp(asset.symbol)}\\b`, "g"));
  }
  const name = asset.name.trim();
  if (name && name.toUpperCase() !== asset.symbol) {
    patterns.push(new RegExp(`\\b${escapeRegExp(name)}\\b`, "gi"));
  }
  return patterns;
}

/**
 * Finds crypto assets by symbol (case-sensitive) or name, and stock cashtags such as `$AAPL`.
 * The primary mention is the one named in the title, then the most frequent.
 */
export function extractMentions(
  article: { title: string; content: string },
  assets: Array<Pick<AssetRecord, "symbol" | "name">>,
): MentionInput[] {
  const tallies: MentionTally[] = [];
  const known = new Set(assets.map((asset) => asset.symbol));
  for (const asset of assets) {
    let titleHits = 0;
    let total = 0;
    for (const pattern of assetPatterns(asset)) {
      const inTitle = countMatches(article.title, pattern);
      titleHits += inTitle;
      total += inTitle + countMatches(article.content, pattern);
    }
    if (total > 0) {
      tallies.push({
        assetType: "crypto",
        assetSymbol: asset.symbol,
        mentionCount: total,
        isPrimary: false,
        titleHits,
      });
    }
  }
  const cashtags = new Map<string, { total: number; titleHits: number }>();
  for (const [field, text] of [
    ["title", article.title],
    ["content", article.content],
  ] as const) {
    for (const match of text.matchAll(CASHTAG)) {
      const symbol = match[1];
      if (known.has(symbol)) {
        continue;
      }
      const entry = cashtags.get(symbol) ?? { total: 0, titleHits: 0 };
      entry.total += 1;
      if (field === "title") {
        entry.titleHits += 1;
      }
      cashtags.set(symbol, entry);
    }
  }
  for (const [symbol, entry] of cashtags) {
    tallies.push({
      assetType: "stock",
      assetSymbol: symbol,
      mentionCount: entry.total,
      isPrimary: false,
      titleHits: entry.titleHits,
    });
  }
  if (tallies.length === 0) {
    return [];
  }
  const primary = [...tallies].sort(
    (a, b) =>
      Number(b.titleHits > 0) - Number(a.titleHits > 0) ||
      b.mentionCount - a.mentionCount ||
      a.assetSymbol.localeCompare(b.assetSymbol),
  )[0];
  primary.isPrimary = true;
  return tallies
    .sort((a, b) => b.mentionCount - a.mentionCount || a.assetSymbol.localeCompare(b.assetSymbol))
    .map(({ titleHits: _titleHits, ...mention }) => mention);
}
