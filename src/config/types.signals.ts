export type StdDevMode = "sample" | "population";

export type SignalThresholdsConfig = {
  rsiOverbought?: number;
  rsiOversold?: number;
  /** Percent distance from the moving average that upgrades a bias to a strong signal. */
  trendBandPct?: number;
};

export type SignalsConfig = {
  window?: number;
  rsiPeriod?: number;
  stdDevMode?: StdDevMode;
  thresholds?: SignalThresholdsConfig;
  staleAfterHours?: number;
  checkpointEvery?: number;
  conflictRetries?: number;
};
