import type { SignalsConfig, StdDevMode } from "../../config/types.signals.js";
import { ConfigError } from "../../errors.js";

export type SignalThresholds = {
  rsiOverbought: number;
  rsiOversold: number;
  trendBandPct: number;
};

export type SignalSettings = {
  window: number;
  rsiPeriod: number;
  stdDevMode: StdDevMode;
  thresholds: SignalThresholds;
  staleAfterHours: number;
  checkpointEvery: number;
  conflictRetries: number;
};

export const DEFAULT_SIGNAL_SETTINGS: SignalSettings = {
  window: 7,
  rsiPeriod: 14,
  stdDevMode: "sample",
  thresholds: {
    rsiOverbought: 70,
    rsiOversold: 30,
    trendBandPct: 5,
  },
  staleAfterHours: 72,
  checkpointEvery: 500,
  conflictRetries: 3,
};

export function resolveSignalSettings(cfg: SignalsConfig = {}): SignalSettings {
  const defaults = DEFAULT_SIGNAL_SETTINGS;
  const settings: SignalSettings = {
    window: cfg.window ?? defaults.window,
    rsiPeriod: cfg.rsiPeriod ?? defaults.rsiPeriod,
    stdDevMode: cfg.stdDevMode ?? defaults.stdDevMode,
    thresholds: {
      rsiOverbought: cfg.thresholds?.rsiOverbought ?? defaults.thresholds.rsiOverbought,
      rsiOversold: cfg.thresholds?.rsiOversold ?? defaults.thresholds.rsiOversold,
      trendBandPct: cfg.thresholds?.trendBandPct ?? defaults.thresholds.trendBandPct,
    },
    staleAfterHours: cfg.staleAfterHours ?? defaults.staleAfterHours,
    checkpointEvery: cfg.checkpointEvery ?? defaults.checkpointEvery,
    conflictRetries: cfg.conflictRetries ?? defaults.conflictRetries,
  };
  const { rsiOversold, rsiOverbought } = settings.thresholds;
  if (rsiOversold >= rsiOverbought) {
    throw new ConfigError(
      `signals.thresholds: rsiOversold (${rsiOversold}) must be below rsiOverbought (${rsiOverbought})`,
      { rsiOversold, rsiOverbought },
    );
  }
  return settings;
}
