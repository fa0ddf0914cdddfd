import { formatDateYYYYMMDD, MARKET_TIME_ZONE } from "../lib/date";
import type { ReportWindow } from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;

export type IsoDateYmd = {
  year: number;
  month: number;
  day: number;
};

export function parseIsoDateYmd(date: string): IsoDateYmd {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(date)) {
    throw new Error(`Invalid date: ${date}. Expected YYYY-MM-DD.`);
  }

  const [yearStr, monthStr, dayStr] = date.split("-");
  const year = Number(yearStr);
  const month = Number(monthStr);
  const day = Number(dayStr);

  const parsed = new Date(Date.UTC(year, month - 1, day));
  if (
    !Number.isFinite(parsed.getTime()) ||
    parsed.getUTCFullYear() !== year ||
    parsed.getUTCMonth() !== month - 1 ||
    parsed.getUTCDate() !== day
  ) {
    throw new Error(`Invalid date: ${date}. Expected a real calendar day (YYYY-MM-DD).`);
  }

  return { year, month, day };
}

/**
* `YYYY-MM-DD` -> `YYYYMMDD`, the form the data source and the report header use.
*/
export function toCompactDate(date: string): string {
  parseIsoDateYmd(date);
  return date.replace(/-/g, "");
}

/**
* `YYYYMMDD` -> `YYYY-MM-DD`.
*/
export function fromCompactDate(date: string): string {
  if (!/^\d{8}$/.test(date)) {
    throw new Error(`Invalid date: ${date}. Expected YYYYMMDD.`);
  }

  const iso = `${date.slice(0, 4)}-${date.slice(4, 6)}-${date.slice(6, 8)}`;
  parseIsoDateYmd(iso);
  return iso;
}

/**
* Trailing window ending on `now`'s calendar day in `timeZone`, both ends as `YYYYMMDD`.
*/
export function resolveReportWindow(
  now: Date,
  lookbackDays: number,
  timeZone = MARKET_TIME_ZONE
): ReportWindow {
  if (!Number.isInteger(lookbackDays) || lookbackDays <= 0) {
    throw new Error(`lookbackDays must be a positive integer, got ${lookbackDays}`);
  }

  const start = new Date(now.getTime() - lookbackDays * DAY_MS);
  return {
    startDate: toCompactDate(formatDateYYYYMMDD(start, timeZone)),
    endDate: toCompactDate(formatDateYYYYMMDD(now, timeZone))
  };
}
