import YahooFinance from "yahoo-finance2";

import { formatDateYYYYMMDD, MARKET_TIME_ZONE } from "../../lib/date";
import { fromCompactDate, parseIsoDateYmd } from "../date";
import { FetchError } from "../errors";
import type { FetchSeriesOptions, InstrumentKind, PriceAdjustment, SeriesFetcher, TimeSeriesRecord } from "../types";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
* Yahoo lists Shanghai instruments under `.SS` and Shenzhen under `.SZ`.
* Beijing exchange codes are not covered.
*/
export function toYahooSymbol(code: string, kind: InstrumentKind): string {
  if (!/^\d{6}$/.test(code)) {
    throw new Error(`Expected a 6-digit A-share code, got ${code}`);
  }

  if (kind === "index") {
    return code.startsWith("399") ? `${code}.SZ` : `${code}.SS`;
  }
  if (code.startsWith("6")) {
    return `${code}.SS`;
  }
  if (code.startsWith("0") || code.startsWith("3")) {
    return `${code}.SZ`;
  }
  throw new Error(`No Yahoo listing for ${code}`);
}

type DailyBar = {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
};

/**
* The subset of a Yahoo chart quote used here; any field may be missing on halted days.
*/
export type YahooQuote = {
  date: Date;
  open?: number | null;
  high?: number | null;
  low?: number | null;
  close?: number | null;
  volume?: number | null;
  adjclose?: number | null;
};

function isFiniteNumber(value: number | null | undefined): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

export function toDailyBars(quotes: readonly YahooQuote[], adjust: PriceAdjustment): DailyBar[] {
  const byDate = new Map<string, DailyBar>();

  for (const { date, open, high, low, close, volume, adjclose } of quotes) {
    if (
      !isFiniteNumber(open) ||
      !isFiniteNumber(high) ||
      !isFiniteNumber(low) ||
      !isFiniteNumber(close) ||
      !isFiniteNumber(volume)
    ) {
      continue;
    }

    // `adjclose` is already rescaled to the latest price, which is the forward-adjusted view.
    const factor =
      adjust === "qfq" && isFiniteNumber(adjclose) && close !== 0
        ? adjclose / close
        : 1;

    const day = formatDateYYYYMMDD(date, MARKET_TIME_ZONE);
    byDate.set(day, {
      date: day,
      open: open * factor,
      high: high * factor,
      low: low * factor,
      close: close * factor,
      volume
    });
  }

  return Array.from(byDate.values()).sort((a, b) => a.date.localeCompare(b.date));
}

function toUtcDate(compact: string): Date {
  const { year, month, day } = parseIsoDateYmd(fromCompactDate(compact));
  return new Date(Date.UTC(year, month - 1, day));
}

/**
* Series-only source; the listing snapshot still comes from Eastmoney. Turnover amounts
* and the derived daily figures are not reported, so those columns are all `null`.
*/
export class YahooMarketDataProvider implements SeriesFetcher {
  readonly provider = "yahoo-finance";
  readonly #yf: InstanceType<typeof YahooFinance>;

  constructor() {
    this.#yf = new YahooFinance();
  }

  async fetchSeries(code: string, opts: FetchSeriesOptions): Promise<TimeSeriesRecord> {
    let bars: DailyBar[];
    try {
      const symbol = toYahooSymbol(code, opts.kind);
      const period1 = toUtcDate(opts.startDate);
      // `period2` is exclusive.
      const period2 = new Date(toUtcDate(opts.endDate).getTime() + DAY_MS);

      const res = await this.#yf.chart(symbol, { interval: "1d", period1, period2 });
      bars = toDailyBars(res.quotes, opts.kind === "index" ? "none" : opts.adjust);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new FetchError(code, message, { cause: error });
    }

    return {
      symbol: code,
      name: opts.name,
      kind: opts.kind,
      dates: bars.map((b) => b.date),
      open: bars.map((b) => b.open),
      high: bars.map((b) => b.high),
      low: bars.map((b) => b.low),
      close: bars.map((b) => b.close),
      volume: bars.map((b) => b.volume),
      amount: bars.map(() => null),
      amplitudePct: bars.map(() => null),
      changePct: bars.map(() => null),
      change: bars.map(() => null),
      turnoverRatePct: bars.map(() => null)
    };
  }
}
