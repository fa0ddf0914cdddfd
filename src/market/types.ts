export type InstrumentKind = "index" | "equity";

export const PRICE_ADJUSTMENTS = ["none", "qfq"] as const;

/**
* `qfq` is forward-adjusted: history is rescaled so the latest bar keeps its traded price.
*/
export type PriceAdjustment = (typeof PRICE_ADJUSTMENTS)[number];

/**
* Hard cap on the number of names in each leaderboard.
*/
export const REPORT_LEADERBOARD_SIZE = 10;

/**
* Listing sums are reported in 亿元 (hundred-million CNY).
*/
export const REPORT_AMOUNT_UNIT = 1e8;

/**
* Daily OHLCV series for one instrument, stored as parallel arrays.
*
* Every array has the same length as `dates`, and `dates` (`YYYY-MM-DD`) is strictly
* increasing. A zero-length record is a valid "no data" result.
*/
export type TimeSeriesRecord = {
  symbol: string;
  name: string;
  kind: InstrumentKind;
  dates: string[];
  open: number[];
  high: number[];
  low: number[];
  close: number[];
  volume: number[];
  /**
  * Turnover in CNY; `null` where the provider does not report it.
  */
  amount: Array<number | null>;
  /**
  * Provider-reported daily figures, kept for export only; `null` where not reported.
  */
  amplitudePct: Array<number | null>;
  changePct: Array<number | null>;
  change: Array<number | null>;
  turnoverRatePct: Array<number | null>;
};

export type ReturnStats = Readonly<{
  code: string;
  name: string;
  changePct: number;
  volatilityPct: number;
  avgVolume: number;
  startClose: number;
  endClose: number;
  periodHigh: number;
  periodLow: number;
  bars: number;
}>;

/**
* One row of the spot quote listing. Every quoted field is `null` when the instrument
* has no quote (suspended, pre-listing).
*/
export type ListingRow = {
  code: string;
  name: string;
  price: number | null;
  changePct: number | null;
  change: number | null;
  volume: number | null;
  turnoverAmount: number | null;
  amplitudePct: number | null;
  high: number | null;
  low: number | null;
  open: number | null;
  prevClose: number | null;
  turnoverRatePct: number | null;
  peDynamic: number | null;
  pb: number | null;
  totalMarketCap: number | null;
  floatMarketCap: number | null;
};

export type ListingSnapshot = {
  fetchedAt: string;
  rows: ListingRow[];
};

export type InstrumentRef = {
  code: string;
  name: string;
};

export type IndexInstrument = InstrumentRef;

export type ReportWindow = {
  startDate: string;
  endDate: string;
};

export type FetchSeriesOptions = ReportWindow & {
  kind: InstrumentKind;
  name: string;
  adjust: PriceAdjustment;
};

export interface SeriesFetcher {
  readonly provider: string;
  fetchSeries(code: string, opts: FetchSeriesOptions): Promise<TimeSeriesRecord>;
}

export interface ListingProvider {
  fetchListing(): Promise<ListingSnapshot>;
}

export type FailureStage = "fetch" | "stats";

export type EntityFailure = {
  code: string;
  name: string;
  stage: FailureStage;
  kind: string;
  reason: string;
};

export type IndexSectionEntry = {
  name: string;
  stats: ReturnStats;
};

export type LeaderboardEntry = Pick<ReturnStats, "code" | "name" | "changePct">;

export type EquitySection = {
  analyzed: number;
  topGainers: LeaderboardEntry[];
  topLosers: LeaderboardEntry[];
  meanChangePct: number | null;
  medianChangePct: number | null;
  gainersCount: number;
  losersCount: number;
  flatCount: number;
  volatility: {
    mean: number | null;
    max: number | null;
    min: number | null;
  };
};

export type MarketTotals = {
  totalMarketCap: number;
  totalTurnover: number;
  listedCount: number;
};

export type MarketReport = {
  generatedAt: string;
  window: ReportWindow;
  indices: IndexSectionEntry[];
  equities: EquitySection;
  market: MarketTotals;
  coverage: {
    requestedIndices: number;
    requestedEquities: number;
    failures: EntityFailure[];
  };
};
