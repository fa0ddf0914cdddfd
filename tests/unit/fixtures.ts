import type {
  FetchSeriesOptions,
  InstrumentKind,
  ListingRow,
  ListingSnapshot,
  ReturnStats,
  SeriesFetcher,
  TimeSeriesRecord
} from '../../src/market/types';

export function makeSeries(
  symbol: string,
  bars: { close: number[]; high?: number[]; low?: number[]; volume?: number[] },
  opts: { name?: string; kind?: InstrumentKind } = {}
): TimeSeriesRecord {
  const n = bars.close.length;
  const dates = Array.from({ length: n }, (_, i) => {
    const d = new Date(Date.UTC(2024, 0, 2 + i));
    return d.toISOString().slice(0, 10);
  });

  return {
    symbol,
    name: opts.name ?? `name-${symbol}`,
    kind: opts.kind ?? 'equity',
    dates,
    open: bars.close.slice(),
    high: bars.high ?? bars.close.slice(),
    low: bars.low ?? bars.close.slice(),
    close: bars.close,
    volume: bars.volume ?? bars.close.map(() => 1000),
    amount: bars.close.map(() => null),
    amplitudePct: bars.close.map(() => null),
    changePct: bars.close.map(() => null),
    change: bars.close.map(() => null),
    turnoverRatePct: bars.close.map(() => null),
  };
}

export function makeStats(code: string, changePct: number, volatilityPct = 10): ReturnStats {
  return {
    code,
    name: `name-${code}`,
    changePct,
    volatilityPct,
    avgVolume: 1000,
    startClose: 10,
    endClose: 10 * (1 + changePct / 100),
    periodHigh: 12,
    periodLow: 9,
    bars: 2,
  };
}

export function makeListing(rows: Array<Partial<ListingRow> & { code: string }>): ListingSnapshot {
  return {
    fetchedAt: '2024-12-31T07:00:00.000Z',
    rows: rows.map((r) => ({
      name: `name-${r.code}`,
      price: null,
      changePct: null,
      change: null,
      volume: null,
      turnoverAmount: null,
      amplitudePct: null,
      high: null,
      low: null,
      open: null,
      prevClose: null,
      turnoverRatePct: null,
      peDynamic: null,
      pb: null,
      totalMarketCap: null,
      floatMarketCap: null,
      ...r,
    })),
  };
}

type Scripted = TimeSeriesRecord | Error | ((opts: FetchSeriesOptions) => TimeSeriesRecord);

/**
* In-process fetcher that answers from a code-keyed script. Unknown codes reject.
*/
export class ScriptedFetcher implements SeriesFetcher {
  readonly provider = 'scripted';
  readonly calls: Array<{ code: string; opts: FetchSeriesOptions }> = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(
    private readonly script: Record<string, Scripted>,
    private readonly delayMs = 0
  ) {}

  async fetchSeries(code: string, opts: FetchSeriesOptions): Promise<TimeSeriesRecord> {
    this.calls.push({ code, opts });
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.delayMs > 0) {
        await new Promise((r) => setTimeout(r, this.delayMs));
      }

      const entry = this.script[code];
      if (entry === undefined) {
        throw new Error(`unknown code ${code}`);
      }
      if (entry instanceof Error) {
        throw entry;
      }
      return typeof entry === 'function' ? entry(opts) : entry;
    } finally {
      this.inFlight -= 1;
    }
  }
}
