export type MarketErrorCode =
  | "FETCH_FAILED"
  | "INSUFFICIENT_DATA"
  | "DEGENERATE_BASELINE"
  | "MALFORMED_SERIES"
  | "LISTING_UNAVAILABLE"
  | "EXPORT_FAILED"
  | "INVALID_CONFIG";

export class MarketError extends Error {
  readonly code: MarketErrorCode;

  constructor(code: MarketErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
* A single instrument could not be retrieved. Recovered by skipping the instrument.
*/
export class FetchError extends MarketError {
  readonly symbol: string;
  readonly reason: string;

  constructor(symbol: string, reason: string, options?: { cause?: unknown }) {
    super("FETCH_FAILED", `[market:fetch] ${symbol}: ${reason}`, options);
    this.symbol = symbol;
    this.reason = reason;
  }
}

export class InsufficientDataError extends MarketError {
  constructor(symbol: string) {
    super("INSUFFICIENT_DATA", `No bars returned for ${symbol}`);
  }
}

export class DegenerateBaselineError extends MarketError {
  constructor(symbol: string) {
    super("DEGENERATE_BASELINE", `First close for ${symbol} is 0; returns are undefined`);
  }
}

export class MalformedSeriesError extends MarketError {
  constructor(symbol: string, detail: string) {
    super("MALFORMED_SERIES", `Malformed series for ${symbol}: ${detail}`);
  }
}

export class ListingUnavailableError extends MarketError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super("LISTING_UNAVAILABLE", `[market:listing] Listing snapshot unavailable: ${reason}`, options);
  }
}

export class ExportError extends MarketError {
  readonly path: string;

  constructor(filePath: string, reason: string, options?: { cause?: unknown }) {
    super("EXPORT_FAILED", `[market:export] Failed writing ${filePath}: ${reason}`, options);
    this.path = filePath;
  }
}

export class ConfigError extends MarketError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INVALID_CONFIG", message, options);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof FetchError) {
    return error.reason;
  }
  return error instanceof Error ? error.message : String(error);
}

export function errorKind(error: unknown): string {
  return error instanceof Error ? error.name : "UnknownError";
}
