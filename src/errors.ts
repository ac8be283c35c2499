export type ErrorCode =
  | "invalid-observation"
  | "embedding-unavailable"
  | "embedding-dimension"
  | "stale-window-conflict"
  | "inconsistent-backfill"
  | "unknown-asset"
  | "config";

export class MarketloreError extends Error {
  readonly code: ErrorCode;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    options: { retryable?: boolean; details?: Record<string, unknown>; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.retryable = options.retryable ?? false;
    this.details = options.details;
  }
}

/** Non-positive price or a timestamp that does not parse. Never retried. */
export class InvalidObservationError extends MarketloreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("invalid-observation", message, { details });
  }
}

export class EmbeddingUnavailableError extends MarketloreError {
  constructor(message: string, options: { details?: Record<string, unknown>; cause?: unknown } = {}) {
    super("embedding-unavailable", message, { ...options, retryable: true });
  }
}

export class EmbeddingDimensionError extends MarketloreError {
  constructor(expected: number, actual: number, context: string) {
    super("embedding-dimension", `${context}: expected dimension ${expected}, got ${actual}`, {
      details: { expected, actual },
    });
  }
}

/** Another writer holds or replaced the asset's window while we were recomputing it. */
export class StaleWindowConflictError extends MarketloreError {
  constructor(assetId: number, options: { details?: Record<string, unknown>; cause?: unknown } = {}) {
    super("stale-window-conflict", `signal window for asset ${assetId} changed under recompute`, {
      ...options,
      details: { assetId, ...options.details },
      retryable: true,
    });
  }
}

export class InconsistentBackfillError extends MarketloreError {
  constructor(assetId: number, resumeFrom: string) {
    super(
      "inconsistent-backfill",
      `signals for asset ${assetId} are incomplete from ${resumeFrom}; run a recompute`,
      { details: { assetId, resumeFrom } },
    );
  }
}

export class UnknownAssetError extends MarketloreError {
  constructor(ref: string | number) {
    super("unknown-asset", `unknown asset: ${ref}`, { details: { ref } });
  }
}

export class ConfigError extends MarketloreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("config", message, { details });
  }
}

export function isRetryableError(err: unknown): boolean {
  return err instanceof MarketloreError && err.retryable;
}
