import { z } from "zod";

const ProviderSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("hashing") }).strict(),
  z
    .object({
      kind: z.literal("http"),
      url: z.string().url(),
      apiKey: z.string().optional(),
      timeoutMs: z.number().int().positive().optional(),
    })
    .strict(),
]);

export const EmbeddingsSchema = z
  .object({
    model: z.string().min(1).optional(),
    dimension: z.number().int().positive().optional(),
    metric: z.union([z.literal("cosine"), z.literal("dot")]).optional(),
    provider: ProviderSchema.optional(),
    chunk: z
      .object({
        maxChars: z.number().int().positive().optional(),
        overlap: z.number().int().nonnegative().optional(),
      })
      .strict()
      .optional(),
    retry: z
      .object({
        maxAttempts: z.number().int().positive().optional(),
        baseDelayMs: z.number().int().nonnegative().optional(),
        maxDelayMs: z.number().int().nonnegative().optional(),
      })
      .strict()
      .optional(),
    concurrency: z.number().int().positive().optional(),
  })
  .strict()
  .optional();
