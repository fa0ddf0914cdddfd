import { FetchError } from "../errors";
import type {
  FetchSeriesOptions,
  InstrumentKind,
  ListingProvider,
  ListingRow,
  ListingSnapshot,
  PriceAdjustment,
  SeriesFetcher,
  TimeSeriesRecord
} from "../types";
import { DEFAULT_HEADERS, DEFAULT_REQUEST_TIMEOUT_MS, buildUrl, fetchJson, isRecord } from "./http";

const PROVIDER = "eastmoney";

const LISTING_URL = "https://82.push2.eastmoney.com/api/qt/clist/get";
const KLINE_URL = "https://push2his.eastmoney.com/api/qt/stock/kline/get";

// Shanghai main board + STAR, Shenzhen main board + ChiNext, Beijing exchange.
const A_SHARE_FILTER = "m:0 t:6,m:0 t:80,m:1 t:2,m:1 t:23,m:0 t:81 s:2048";

// f2 last price, f3 change %, f4 change, f5 volume, f6 turnover amount, f7 amplitude %,
// f8 turnover rate %, f9 dynamic P/E, f12 code, f14 name, f15 high, f16 low, f17 open,
// f18 previous close, f20 total market cap, f21 float market cap, f23 P/B.
const LISTING_FIELDS = "f2,f3,f4,f5,f6,f7,f8,f9,f12,f14,f15,f16,f17,f18,f20,f21,f23";

// date, open, close, high, low, volume, amount, amplitude %, change %, change, turnover rate %.
const KLINE_FIELDS = "f51,f52,f53,f54,f55,f56,f57,f58,f59,f60,f61";

const MAX_LISTING_PAGES = 200;

function adjustParam(adjust: PriceAdjustment): string {
  switch (adjust) {
    case "none":
      return "0";
    case "qfq":
      return "1";
  }
}

/**
* Maps a 6-digit code to the `<market>.<code>` id the endpoints expect.
*
* Index and equity codes overlap (`000001` is both 上证指数 and 平安银行), so the kind decides.
*/
export function toSecId(code: string, kind: InstrumentKind): string {
  if (!/^\d{6}$/.test(code)) {
    throw new Error(`Expected a 6-digit A-share code, got ${code}`);
  }

  if (kind === "index") {
    return code.startsWith("399") || code.startsWith("899") ? `0.${code}` : `1.${code}`;
  }
  return code.startsWith("6") ? `1.${code}` : `0.${code}`;
}

function toNullableNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  // Missing quotes come back as "-".
  if (typeof value === "string" && value.trim() !== "" && value !== "-") {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

export function parseListingRow(raw: unknown): ListingRow | null {
  if (!isRecord(raw)) {
    return null;
  }

  const code = raw.f12;
  const name = raw.f14;
  if (typeof code !== "string" || typeof name !== "string" || code === "") {
    return null;
  }

  return {
    code,
    name,
    price: toNullableNumber(raw.f2),
    changePct: toNullableNumber(raw.f3),
    change: toNullableNumber(raw.f4),
    volume: toNullableNumber(raw.f5),
    turnoverAmount: toNullableNumber(raw.f6),
    amplitudePct: toNullableNumber(raw.f7),
    high: toNullableNumber(raw.f15),
    low: toNullableNumber(raw.f16),
    open: toNullableNumber(raw.f17),
    prevClose: toNullableNumber(raw.f18),
    turnoverRatePct: toNullableNumber(raw.f8),
    peDynamic: toNullableNumber(raw.f9),
    pb: toNullableNumber(raw.f23),
    totalMarketCap: toNullableNumber(raw.f20),
    floatMarketCap: toNullableNumber(raw.f21)
  };
}

/**
* Past the last page the endpoint answers with `data: null` or an empty `diff`.
*/
function isExhaustedListingPage(json: unknown): boolean {
  if (!isRecord(json)) {
    return false;
  }
  if (json.data === null || json.data === undefined) {
    return true;
  }
  if (!isRecord(json.data)) {
    return false;
  }

  const diff = json.data.diff;
  if (diff === null || diff === undefined) {
    return true;
  }
  if (Array.isArray(diff)) {
    return diff.length === 0;
  }
  return isRecord(diff) && Object.keys(diff).length === 0;
}

function parseListingPage(json: unknown): { total: number; rows: ListingRow[] } {
  if (!isRecord(json) || !isRecord(json.data)) {
    throw new Error("listing response has no data");
  }

  const total = json.data.total;
  const diff = json.data.diff;
  if (typeof total !== "number" || !Number.isFinite(total)) {
    throw new Error("listing response has no total");
  }

  // With `np=1` the page is an array; older deployments returned an index-keyed object.
  const items = Array.isArray(diff) ? diff : isRecord(diff) ? Object.values(diff) : [];
  const rows: ListingRow[] = [];
  for (const item of items) {
    const row = parseListingRow(item);
    if (row) {
      rows.push(row);
    }
  }

  return { total, rows };
}

type KlineBar = {
  open: number;
  close: number;
  high: number;
  low: number;
  volume: number;
  amount: number;
  amplitudePct: number | null;
  changePct: number | null;
  change: number | null;
  turnoverRatePct: number | null;
};

/**
* Parses `date,open,close,high,low,volume,amount[,amplitude,change%,change,turnover%]` kline
* rows. Rows with a bad date or core value are dropped; the trailing figures are optional.
* The result is sorted by date with later duplicates winning.
*/
export function parseKlines(
  symbol: string,
  name: string,
  kind: InstrumentKind,
  klines: unknown
): TimeSeriesRecord {
  const byDate = new Map<string, KlineBar>();

  if (Array.isArray(klines)) {
    for (const line of klines) {
      if (typeof line !== "string") {
        continue;
      }

      const [date, ...rest] = line.split(",");
      if (!date || !/^\d{4}-\d{2}-\d{2}$/.test(date) || rest.length < 6) {
        continue;
      }

      const values = rest.slice(0, 6).map(Number);
      if (!values.every(Number.isFinite)) {
        continue;
      }

      const [open, close, high, low, volume, amount] = values;
      const [amplitudePct, changePct, change, turnoverRatePct] = [6, 7, 8, 9].map((i) => toNullableNumber(rest[i]));
      byDate.set(date, { open, close, high, low, volume, amount, amplitudePct, changePct, change, turnoverRatePct });
    }
  }

  const dates = Array.from(byDate.keys()).sort();
  const record: TimeSeriesRecord = {
    symbol,
    name,
    kind,
    dates,
    open: [],
    high: [],
    low: [],
    close: [],
    volume: [],
    amount: [],
    amplitudePct: [],
    changePct: [],
    change: [],
    turnoverRatePct: []
  };

  for (const date of dates) {
    const bar = byDate.get(date);
    if (!bar) {
      continue;
    }
    record.open.push(bar.open);
    record.close.push(bar.close);
    record.high.push(bar.high);
    record.low.push(bar.low);
    record.volume.push(bar.volume);
    record.amount.push(bar.amount);
    record.amplitudePct.push(bar.amplitudePct);
    record.changePct.push(bar.changePct);
    record.change.push(bar.change);
    record.turnoverRatePct.push(bar.turnoverRatePct);
  }

  return record;
}

export class EastmoneyMarketDataProvider implements SeriesFetcher, ListingProvider {
  readonly provider = PROVIDER;
  readonly #timeoutMs: number;
  readonly #pageSize: number;

  constructor(opts: { timeoutMs?: number; pageSize?: number } = {}) {
    this.#timeoutMs = opts.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.#pageSize = opts.pageSize ?? 100;
  }

  async fetchListing(): Promise<ListingSnapshot> {
    const fetchedAt = new Date().toISOString();
    const byCode = new Map<string, ListingRow>();

    try {
      for (let page = 1; page <= MAX_LISTING_PAGES; page += 1) {
        const url = buildUrl(LISTING_URL, {
          pn: String(page),
          pz: String(this.#pageSize),
          po: "1",
          np: "1",
          ut: "bd1d9ddb04089700cf9c27f6f7426281",
          fltt: "2",
          invt: "2",
          fid: "f12",
          fs: A_SHARE_FILTER,
          fields: LISTING_FIELDS
        });

        const json = await fetchJson(url, { headers: DEFAULT_HEADERS }, this.#timeoutMs);
        if (page > 1 && isExhaustedListingPage(json)) {
          break;
        }

        const { total, rows } = parseListingPage(json);
        for (const row of rows) {
          byCode.set(row.code, row);
        }

        // Dropped or repeated rows never count toward `total`, so the page count decides too.
        if (rows.length === 0 || byCode.size >= total || page * this.#pageSize >= total) {
          break;
        }
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new FetchError("listing", message, { cause: error });
    }

    if (byCode.size === 0) {
      throw new FetchError("listing", "listing snapshot is empty");
    }

    return { fetchedAt, rows: Array.from(byCode.values()) };
  }

  async fetchSeries(code: string, opts: FetchSeriesOptions): Promise<TimeSeriesRecord> {
    let json: unknown;
    try {
      const url = buildUrl(KLINE_URL, {
        fields1: "f1,f2,f3,f4,f5,f6",
        fields2: KLINE_FIELDS,
        ut: "7eea3edcaed734bea9cbfc24409ed989",
        klt: "101",
        // Index klines are never adjusted.
        fqt: opts.kind === "index" ? "0" : adjustParam(opts.adjust),
        secid: toSecId(code, opts.kind),
        beg: opts.startDate,
        end: opts.endDate
      });
      json = await fetchJson(url, { headers: DEFAULT_HEADERS }, this.#timeoutMs);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new FetchError(code, message, { cause: error });
    }

    if (!isRecord(json)) {
      throw new FetchError(code, "kline response is not an object");
    }

    // Unknown or delisted codes come back with `data: null`.
    if (json.data === null || json.data === undefined) {
      throw new FetchError(code, "no kline data for code");
    }
    if (!isRecord(json.data)) {
      throw new FetchError(code, "kline response has malformed data");
    }

    const name = typeof json.data.name === "string" && opts.name === "" ? json.data.name : opts.name;
    return parseKlines(code, name, opts.kind, json.data.klines);
  }
}
