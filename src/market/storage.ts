import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";

import * as XLSX from "xlsx";

import { ExportError } from "./errors";
import type { ListingRow, ListingSnapshot, MarketReport, TimeSeriesRecord } from "./types";

export const WORKBOOK_FILE = "A股年度数据汇总.xlsx";
export const REPORT_TEXT_FILE = "分析报告.txt";
export const REPORT_JSON_FILE = "report.json";

export const SHEET_REPORT = "分析报告";
export const SHEET_INDEX_PREFIX = "指数_";
export const SHEET_EQUITY_HISTORY = "个股历史数据";
export const SHEET_LISTING = "股票列表";

// Instrument names are cut to this many characters before the sheet prefix is added.
const SHEET_NAME_BODY_MAX = 10;
// Hard limit of the xlsx format.
const SHEET_NAME_MAX = 31;

const SERIES_HEADER = ["日期", "开盘", "收盘", "最高", "最低", "成交量", "成交额", "振幅", "涨跌幅", "涨跌额", "换手率"];

const LISTING_COLUMNS: ReadonlyArray<readonly [string, keyof ListingRow]> = [
  ["代码", "code"],
  ["名称", "name"],
  ["最新价", "price"],
  ["涨跌幅", "changePct"],
  ["涨跌额", "change"],
  ["成交量", "volume"],
  ["成交额", "turnoverAmount"],
  ["振幅", "amplitudePct"],
  ["最高", "high"],
  ["最低", "low"],
  ["今开", "open"],
  ["昨收", "prevClose"],
  ["换手率", "turnoverRatePct"],
  ["市盈率-动态", "peDynamic"],
  ["市净率", "pb"],
  ["总市值", "totalMarketCap"],
  ["流通市值", "floatMarketCap"]
];

export type ExportPaths = {
  workbook: string;
  text: string;
  json: string;
};

export type ReportArtifacts = {
  report: MarketReport;
  reportText: string;
  indexSeries: ReadonlyMap<string, TimeSeriesRecord>;
  equitySeries: readonly TimeSeriesRecord[];
  listing: ListingSnapshot;
};

export function getExportPaths(outputDir: string): ExportPaths {
  return {
    workbook: path.join(outputDir, WORKBOOK_FILE),
    text: path.join(outputDir, REPORT_TEXT_FILE),
    json: path.join(outputDir, REPORT_JSON_FILE)
  };
}

export function toSheetName(prefix: string, name: string): string {
  const body = Array.from(name.replace(/[\\/?*:[\]]/g, "_")).slice(0, SHEET_NAME_BODY_MAX).join("");
  return Array.from(`${prefix}${body}`).slice(0, SHEET_NAME_MAX).join("");
}

function uniqueSheetName(candidate: string, taken: Set<string>): string {
  let name = candidate;
  for (let n = 2; taken.has(name.toLowerCase()); n += 1) {
    const suffix = `_${n}`;
    name = `${Array.from(candidate).slice(0, SHEET_NAME_MAX - suffix.length).join("")}${suffix}`;
  }
  taken.add(name.toLowerCase());
  return name;
}

function seriesRows(series: TimeSeriesRecord): Array<Array<string | number | null>> {
  return series.dates.map((date, i) => [
    date,
    series.open[i],
    series.close[i],
    series.high[i],
    series.low[i],
    series.volume[i],
    series.amount[i],
    series.amplitudePct[i],
    series.changePct[i],
    series.change[i],
    series.turnoverRatePct[i]
  ]);
}

export function buildWorkbook(artifacts: ReportArtifacts): XLSX.WorkBook {
  const wb = XLSX.utils.book_new();
  const taken = new Set<string>();
  const append = (rows: unknown[][], name: string) => {
    XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet(rows), uniqueSheetName(name, taken));
  };

  append([[SHEET_REPORT], ...artifacts.reportText.split("\n").map((line) => [line])], SHEET_REPORT);

  for (const [name, series] of artifacts.indexSeries) {
    append([SERIES_HEADER, ...seriesRows(series)], toSheetName(SHEET_INDEX_PREFIX, name));
  }

  const equityRows: unknown[][] = [["股票代码", "股票名称", ...SERIES_HEADER]];
  for (const series of artifacts.equitySeries) {
    for (const row of seriesRows(series)) {
      equityRows.push([series.symbol, series.name, ...row]);
    }
  }
  append(equityRows, SHEET_EQUITY_HISTORY);

  append(
    [
      LISTING_COLUMNS.map(([header]) => header),
      ...artifacts.listing.rows.map((row) => LISTING_COLUMNS.map(([, key]) => row[key]))
    ],
    SHEET_LISTING
  );

  return wb;
}

async function writeAtomic(filePath: string, data: string | Buffer): Promise<void> {
  const tmp = `${filePath}.tmp`;
  try {
    await rm(tmp, { force: true });
    await writeFile(tmp, data);
    await rename(tmp, filePath);
  } catch (error) {
    await rm(tmp, { force: true });
    const message = error instanceof Error ? error.message : String(error);
    throw new ExportError(filePath, message, { cause: error });
  }
}

/**
* Writes the workbook, the plain-text report and a JSON copy of the structured report.
* Each file is swapped in atomically; any failure is an `ExportError`.
*/
export async function writeReportArtifacts(outputDir: string, artifacts: ReportArtifacts): Promise<ExportPaths> {
  const paths = getExportPaths(outputDir);

  try {
    await mkdir(outputDir, { recursive: true });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ExportError(outputDir, message, { cause: error });
  }

  let buffer: Buffer;
  try {
    buffer = XLSX.write(buildWorkbook(artifacts), { type: "buffer", bookType: "xlsx" });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ExportError(paths.workbook, message, { cause: error });
  }

  await writeAtomic(paths.workbook, buffer);
  await writeAtomic(paths.text, artifacts.reportText);
  await writeAtomic(paths.json, `${JSON.stringify(artifacts.report, null, 2)}\n`);

  console.log(`[market:export] wrote ${paths.workbook}`);
  console.log(`[market:export] wrote ${paths.text}`);
  return paths;
}
