import { DOMParser } from "linkedom";
import { normalizeTimestamp } from "../market/series/observation.js";

export type RssItem = {
  title: string;
  url: string;
  publishedAt?: string;
  summary?: string;
  categories: string[];
  imageUrl?: string;
};

function textContent(node: Element | null | undefined): string {
  if (!node) {
    return "";
  }
  return (node.textContent ?? "").replace(/\s+/g, " ").trim();
}

function stripMarkup(raw: string): string {
  if (!raw.includes("<")) {
    return raw;
  }
  const doc = new DOMParser().parseFromString(`<body>${raw}</body>`, "text/html");
  return (doc.body?.textContent ?? "").replace(/\s+/g, " ").trim();
}

function resolveItemLink(item: Element): string {
  const link = textContent(item.querySelector("link"));
  if (link) {
    return link;
  }
  const linkEl = item.querySelector("link[href]") as Element | null;
  return linkEl?.getAttribute("href")?.trim() ?? "";
}

function resolvePublishedAt(item: Element): string | undefined {
  for (const tag of ["pubDate", "published", "updated"]) {
    const raw = textContent(item.querySelector(tag));
    const normalized = raw ? normalizeTimestamp(raw) : null;
    if (normalized) {
      return normalized;
    }
  }
  return undefined;
}

function resolveSummary(item: Element): string | undefined {
  const raw = textContent(item.querySelector("description")) || textContent(item.querySelector("summary"));
  const summary = stripMarkup(raw);
  return summary || undefined;
}

function resolveCategories(item: Element): string[] {
  const names = Array.from(item.querySelectorAll("category")).map(
    (node) => textContent(node) || node.getAttribute("term")?.trim() || "",
  );
  return [...new Set(names.filter(Boolean))];
}

function resolveImage(item: Element): string | undefined {
  const enclosure = item.querySelector("enclosure[url]") as Element | null;
  const type = enclosure?.getAttribute("type") ?? "";
  if (enclosure && (!type || type.startsWith("image/"))) {
    return enclosure.getAttribute("url")?.trim() || undefined;
  }
  return undefined;
}

function extractItems(doc: Document): Element[] {
  const rssItems = Array.from(doc.querySelectorAll("item"));
  if (rssItems.length > 0) {
    return rssItems as Element[];
  }
  return Array.from(doc.querySelectorAll("entry")) as Element[];
}

export function parseRss(xml: string): RssItem[] {
  const parser = new DOMParser();
  const doc = parser.parseFromString(xml, "text/xml");
  if (!doc) {
    return [];
  }
  const results: RssItem[] = [];
  for (const item of extractItems(doc)) {
    const title = textContent(item.querySelector("title"));
    const url = resolveItemLink(item);
    if (!title || !url) {
      continue;
    }
    results.push({
      title,
      url,
      publishedAt: resolvePublishedAt(item),
      summary: resolveSummary(item),
      categories: resolveCategories(item),
      imageUrl: resolveImage(item),
    });
  }
  return results;
}
