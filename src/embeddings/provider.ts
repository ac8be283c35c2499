import { z } from "zod";
import type { EmbeddingSettings } from "./settings.js";
import { EmbeddingUnavailableError } from "../errors.js";
import { createSubsystemLogger } from "../logging.js";
import { assertVector, normalizeVector } from "./vector.js";

const log = createSubsystemLogger("embeddings/provider");

/** Maps texts to fixed-dimension vectors under one model identifier. */
export type EmbeddingProvider = {
  model: string;
  dimension: number;
  embed: (texts: string[]) => Promise<number[][]>;
};

function fnv1a(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i += 1) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

/** Signed feature hashing over unigrams and bigrams, L2-normalized. Runs locally. */
export function hashingVector(text: string, dimension: number): number[] {
  const vector = new Array<number>(dimension).fill(0);
  const tokens = tokenize(text);
  const features = [...tokens, ...tokens.slice(1).map((token, idx) => `${tokens[idx]} ${token}`)];
  for (const feature of features) {
    const hash = fnv1a(feature);
    vector[hash % dimension] += (hash & 0x80000000) === 0 ? 1 : -1;
  }
  return normalizeVector(vector);
}

export function createHashingEmbedder(params: { model: string; dimension: number }): EmbeddingProvider {
  return {
    model: params.model,
    dimension: params.dimension,
    embed: async (texts) => texts.map((text) => hashingVector(text, params.dimension)),
  };
}

const EmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      embedding: z.array(z.number()),
    }),
  ),
});

export type HttpEmbedderParams = {
  url: string;
  model: string;
  dimension: number;
  apiKey?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

/** Client for an OpenAI-compatible `POST /embeddings` endpoint. Every failure is retryable. */
export function createHttpEmbedder(params: HttpEmbedderParams): EmbeddingProvider {
  const fetchImpl = params.fetchImpl ?? fetch;
  const timeoutMs = params.timeoutMs ?? 30_000;
  return {
    model: params.model,
    dimension: params.dimension,
    embed: async (texts) => {
      if (texts.length === 0) {
        return [];
      }
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), timeoutMs);
      let payload: unknown;
      try {
        const res = await fetchImpl(params.url, {
          method: "POST",
          signal: controller.signal,
          headers: {
            "content-type": "application/json",
            ...(params.apiKey ? { authorization: `Bearer ${params.apiKey}` } : {}),
          },
          body: JSON.stringify({ model: params.model, input: texts }),
        });
        if (!res.ok) {
          throw new EmbeddingUnavailableError(`embedding endpoint returned ${res.status}`, {
            details: { status: res.status, model: params.model },
          });
        }
        payload = await res.json();
      } catch (err) {
        if (err instanceof EmbeddingUnavailableError) {
          throw err;
        }
        log.warn("embedding request failed", { model: params.model, error: String(err) });
        throw new EmbeddingUnavailableError("embedding request failed", { cause: err });
      } finally {
        clearTimeout(timeout);
      }
      const parsed = EmbeddingResponseSchema.safeParse(payload);
      if (!parsed.success || parsed.data.data.length !== texts.length) {
        throw new EmbeddingUnavailableError("embedding endpoint returned an unexpected payload", {
          details: { model: params.model, expected: texts.length },
        });
      }
      const vectors = [...parsed.data.data].sort((a, b) => a.index - b.index).map((row) => row.embedding);
      vectors.forEach((vector, idx) => assertVector(vector, params.dimension, `${params.model}[${idx}]`));
      return vectors;
    },
  };
}

export function createEmbeddingProvider(settings: EmbeddingSettings): EmbeddingProvider {
  const { provider } = settings;
  if (provider.kind === "http") {
    return createHttpEmbedder({
      url: provider.url,
      apiKey: provider.apiKey,
      timeoutMs: provider.timeoutMs,
      model: settings.model,
      dimension: settings.dimension,
    });
  }
  return createHashingEmbedder({ model: settings.model, dimension: settings.dimension });
}
