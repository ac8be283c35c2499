import { z } from "zod";
import { DEFAULT_SIGNAL_SETTINGS } from "../market/signals/settings.js";

const DEFAULT_THRESHOLDS = DEFAULT_SIGNAL_SETTINGS.thresholds;

const ThresholdsSchema = z
  .object({
    rsiOverbought: z.number().min(0).max(100).optional(),
    rsiOversold: z.number().min(0).max(100).optional(),
    trendBandPct: z.number().nonnegative().optional(),
  })
  .strict()
  // A one-sided override is checked against the default on the other side.
  .refine(
    (value) =>
      (value.rsiOversold ?? DEFAULT_THRESHOLDS.rsiOversold) <
      (value.rsiOverbought ?? DEFAULT_THRESHOLDS.rsiOverbought),
    { message: "rsiOversold must be below rsiOverbought" },
  );

export const SignalsSchema = z
  .object({
    window: z.number().int().min(2).optional(),
    rsiPeriod: z.number().int().min(1).optional(),
    stdDevMode: z.union([z.literal("sample"), z.literal("population")]).optional(),
    thresholds: ThresholdsSchema.optional(),
    staleAfterHours: z.number().positive().optional(),
    checkpointEvery: z.number().int().positive().optional(),
    conflictRetries: z.number().int().nonnegative().optional(),
  })
  .strict()
  .optional();
