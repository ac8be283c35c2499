import type { SimilarityMetric } from "../config/types.embeddings.js";
import { EmbeddingDimensionError } from "../errors.js";

export function dot(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    sum += a[i] * b[i];
  }
  return sum;
}

export function norm(vector: number[]): number {
  return Math.sqrt(dot(vector, vector));
}

/** Zero vectors have no direction; their similarity to anything is 0. */
export function cosineSimilarity(a: number[], b: number[]): number {
  const denom = norm(a) * norm(b);
  return denom === 0 ? 0 : dot(a, b) / denom;
}

export function similarity(metric: SimilarityMetric, a: number[], b: number[]): number {
  return metric === "dot" ? dot(a, b) : cosineSimilarity(a, b);
}

export function normalizeVector(vector: number[]): number[] {
  const length = norm(vector);
  return length === 0 ? vector.map(() => 0) : vector.map((value) => value / length);
}

export function assertVector(vector: number[], dimension: number, context: string): void {
  if (vector.length !== dimension) {
    throw new EmbeddingDimensionError(dimension, vector.length, context);
  }
  if (!vector.every((value) => Number.isFinite(value))) {
    throw new EmbeddingDimensionError(dimension, vector.length, `${context} (non-finite component)`);
  }
}
