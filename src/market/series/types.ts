export type Observation = {
  timestamp: string;
  priceUsd: number;
  marketCapUsd: number | null;
  volume24hUsd: number | null;
  percentChange1h: number | null;
  percentChange24h: number | null;
  percentChange7d: number | null;
  circulatingSupply: number | null;
  totalSupply: number | null;
  maxSupply: number | null;
  ingestedAt: string;
  correctedAt?: string;
};

export type ObservationInput = {
  timestamp: string | Date;
  priceUsd: number;
  marketCapUsd?: number | null;
  volume24hUsd?: number | null;
  percentChange1h?: number | null;
  percentChange24h?: number | null;
  percentChange7d?: number | null;
  circulatingSupply?: number | null;
  totalSupply?: number | null;
  maxSupply?: number | null;
};

export type SignalLabel = "strong_buy" | "buy" | "hold" | "sell" | "strong_sell";

export type SignalRow = {
  assetId: number;
  timestamp: string;
  dailyReturn: number | null;
  ma7d: number;
  std7d: number | null;
  rsi: number | null;
  signal: SignalLabel;
};

export type BackfillMarker = {
  /** Signals at or after this timestamp are not valid until a recompute completes. */
  resumeFrom: string;
  startedAt: string;
};

export type SeriesDocument = {
  version: 1;
  assetId: number;
  revision: number;
  observations: Observation[];
  signals: SignalRow[];
  backfill: BackfillMarker | null;
  updatedAt: string | null;
};
