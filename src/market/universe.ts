import type { InstrumentRef, ListingRow, ListingSnapshot } from "./types";

export const DEFAULT_UNIVERSE_SIZE = 100;

/**
* Ascending by UTF-16 code unit, independent of the runtime locale.
*/
export function compareCodes(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

function compareByMarketCapDesc(a: ListingRow, b: ListingRow): number {
  // Rows without a market cap (suspended, delisting) rank after every quoted row.
  if (a.totalMarketCap === null || b.totalMarketCap === null) {
    if (a.totalMarketCap === b.totalMarketCap) {
      return compareCodes(a.code, b.code);
    }
    return a.totalMarketCap === null ? 1 : -1;
  }

  if (a.totalMarketCap !== b.totalMarketCap) {
    return b.totalMarketCap - a.totalMarketCap;
  }
  return compareCodes(a.code, b.code);
}

export function rankByMarketCap(listing: ListingSnapshot): ListingRow[] {
  return listing.rows.slice().sort(compareByMarketCapDesc);
}

export function selectUniverse(listing: ListingSnapshot, size = DEFAULT_UNIVERSE_SIZE): InstrumentRef[] {
  if (!Number.isInteger(size) || size < 0) {
    throw new Error(`Universe size must be a non-negative integer, got ${size}`);
  }

  return rankByMarketCap(listing)
    .slice(0, size)
    .map((row) => ({ code: row.code, name: row.name }));
}
