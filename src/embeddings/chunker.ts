import type { ChunkOptions } from "./settings.js";

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Splits text into windows of at most `maxChars`, cutting at the last space inside the window
 * when there is one. Each chunk after the first starts up to `overlap` characters before the
 * previous one ended, aligned to a word start.
 */
export function chunkText(content: string, opts: ChunkOptions): string[] {
  const text = normalizeWhitespace(content);
  const maxChars = Math.max(1, Math.floor(opts.maxChars));
  const overlap = Math.max(0, Math.min(Math.floor(opts.overlap), maxChars - 1));
  const chunks: string[] = [];
  let start = 0;
  while (start < text.length) {
    let end = Math.min(start + maxChars, text.length);
    if (end < text.length) {
      const cut = text.lastIndexOf(" ", end);
      if (cut > start) {
        end = cut;
      }
    }
    chunks.push(text.slice(start, end).trim());
    if (end >= text.length) {
      break;
    }
    let next = end - overlap;
    if (next <= start) {
      next = end;
    } else {
      const space = text.indexOf(" ", next);
      if (space !== -1 && space < end) {
        next = space + 1;
      }
    }
    while (text[next] === " ") {
      next += 1;
    }
    start = next;
  }
  return chunks.filter(Boolean);
}
