import {
  DegenerateBaselineError,
  InsufficientDataError,
  MalformedSeriesError,
  type MarketError
} from "./errors";
import type { ReturnStats, TimeSeriesRecord } from "./types";

export type ReturnStatsResult =
  | { status: "ok"; stats: ReturnStats }
  | { status: "failed"; error: MarketError };

const SERIES_FIELDS = [
  "open",
  "high",
  "low",
  "close",
  "volume",
  "amount",
  "amplitudePct",
  "changePct",
  "change",
  "turnoverRatePct"
] as const;

function findMalformation(series: TimeSeriesRecord): string | null {
  const n = series.dates.length;
  for (const field of SERIES_FIELDS) {
    if (series[field].length !== n) {
      return `${field} has ${series[field].length} values for ${n} dates`;
    }
  }

  for (let i = 1; i < n; i += 1) {
    if (series.dates[i - 1] >= series.dates[i]) {
      return `dates not strictly increasing at ${series.dates[i]}`;
    }
  }

  for (const field of ["high", "low", "close", "volume"] as const) {
    const bad = series[field].findIndex((v) => !Number.isFinite(v));
    if (bad !== -1) {
      return `non-finite ${field} on ${series.dates[bad]}`;
    }
  }

  return null;
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  const sum = values.reduce((acc, v) => acc + v, 0);
  return sum / values.length;
}

export function median(values: readonly number[]): number | null {
  const sorted = values.slice().sort((a, b) => a - b);
  if (sorted.length === 0) {
    return null;
  }

  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 0) {
    return (sorted[mid - 1] + sorted[mid]) / 2;
  }
  return sorted[mid];
}

export function computeReturnStats(series: TimeSeriesRecord): ReturnStatsResult {
  const n = series.dates.length;
  if (n === 0) {
    return { status: "failed", error: new InsufficientDataError(series.symbol) };
  }

  const malformation = findMalformation(series);
  if (malformation !== null) {
    return { status: "failed", error: new MalformedSeriesError(series.symbol, malformation) };
  }

  const startClose = series.close[0];
  const endClose = series.close[n - 1];
  if (startClose === 0) {
    return { status: "failed", error: new DegenerateBaselineError(series.symbol) };
  }

  const periodHigh = Math.max(...series.high);
  const periodLow = Math.min(...series.low);
  if (periodHigh < periodLow) {
    return {
      status: "failed",
      error: new MalformedSeriesError(series.symbol, `max(high) ${periodHigh} < min(low) ${periodLow}`)
    };
  }

  const volatilityPct = ((periodHigh - periodLow) / startClose) * 100;
  if (volatilityPct < 0) {
    return {
      status: "failed",
      error: new MalformedSeriesError(series.symbol, `negative baseline close ${startClose}`)
    };
  }

  const stats: ReturnStats = Object.freeze({
    code: series.symbol,
    name: series.name,
    changePct: ((endClose - startClose) / startClose) * 100,
    volatilityPct,
    avgVolume: mean(series.volume) ?? 0,
    startClose,
    endClose,
    periodHigh,
    periodLow,
    bars: n
  });

  return { status: "ok", stats };
}
