import { Readability } from "@mozilla/readability";
import { DOMParser } from "linkedom";

export type ExtractedArticle = {
  text: string;
  lang: string | null;
  title: string | null;
  /** Meta description, falling back to the first paragraph. */
  summary: string | null;
  imageUrl: string | null;
  imageAlt: string | null;
};

function collapse(value: string | null | undefined): string {
  return (value ?? "").replace(/\s+/g, " ").trim();
}

function fallbackText(doc: Document): string {
  return collapse(doc.body?.textContent);
}

function metaContent(doc: Document, selector: string): string {
  return collapse(doc.querySelector(selector)?.getAttribute("content"));
}

function resolveAgainst(raw: string, base: string): string | null {
  try {
    return new URL(raw, base).toString();
  } catch {
    return null;
  }
}

function extractSummary(doc: Document): string | null {
  const meta =
    metaContent(doc, 'meta[name="description"]') || metaContent(doc, 'meta[property="og:description"]');
  if (meta) {
    return meta;
  }
  return collapse(doc.querySelector("p")?.textContent) || null;
}

function extractImage(doc: Document, url: string): { imageUrl: string | null; imageAlt: string | null } {
  const ogImage = metaContent(doc, 'meta[property="og:image"]');
  if (ogImage) {
    return { imageUrl: resolveAgainst(ogImage, url), imageAlt: null };
  }
  const img = doc.querySelector("img[src]");
  const src = collapse(img?.getAttribute("src"));
  if (!src) {
    return { imageUrl: null, imageAlt: null };
  }
  return { imageUrl: resolveAgainst(src, url), imageAlt: collapse(img?.getAttribute("alt")) || null };
}

export function extractReadableArticle(html: string, url: string): ExtractedArticle | null {
  const parser = new DOMParser();
  const doc = parser.parseFromString(html, "text/html");
  if (!doc) {
    return null;
  }
  // Readability mutates the document, so page metadata is read first.
  const summary = extractSummary(doc);
  const image = extractImage(doc, url);
  const lang = doc.documentElement?.getAttribute("lang")?.trim() || null;
  const pageTitle = collapse(doc.title);
  const article = new Readability(doc, { debug: false }).parse();
  const text = collapse(article?.textContent) || fallbackText(doc);
  if (!text) {
    return null;
  }
  return {
    text,
    lang,
    title: collapse(article?.title) || pageTitle || null,
    summary,
    ...image,
  };
}
