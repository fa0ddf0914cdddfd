import { mean, median } from "./stats";
import type {
  EntityFailure,
  EquitySection,
  IndexSectionEntry,
  LeaderboardEntry,
  ListingSnapshot,
  MarketReport,
  MarketTotals,
  ReportWindow,
  ReturnStats
} from "./types";
import { REPORT_AMOUNT_UNIT, REPORT_LEADERBOARD_SIZE } from "./types";
import { compareCodes } from "./universe";

const SECTION_RULE = "-".repeat(40);

function toLeaderboardEntry(stats: ReturnStats): LeaderboardEntry {
  return { code: stats.code, name: stats.name, changePct: stats.changePct };
}

// Ties on changePct break by code ascending so equal floats never depend on input order.
function compareGainers(a: ReturnStats, b: ReturnStats): number {
  if (a.changePct !== b.changePct) {
    return b.changePct - a.changePct;
  }
  return compareCodes(a.code, b.code);
}

function compareLosers(a: ReturnStats, b: ReturnStats): number {
  if (a.changePct !== b.changePct) {
    return a.changePct - b.changePct;
  }
  return compareCodes(a.code, b.code);
}

export function rankLeaderboards(
  table: readonly ReturnStats[],
  size = REPORT_LEADERBOARD_SIZE
): { topGainers: LeaderboardEntry[]; topLosers: LeaderboardEntry[] } {
  return {
    topGainers: table.slice().sort(compareGainers).slice(0, size).map(toLeaderboardEntry),
    topLosers: table.slice().sort(compareLosers).slice(0, size).map(toLeaderboardEntry)
  };
}

export function summarizeEquities(table: readonly ReturnStats[]): EquitySection {
  const changes = table.map((s) => s.changePct);
  const volatilities = table.map((s) => s.volatilityPct);

  return {
    analyzed: table.length,
    ...rankLeaderboards(table),
    meanChangePct: mean(changes),
    medianChangePct: median(changes),
    gainersCount: changes.filter((c) => c > 0).length,
    losersCount: changes.filter((c) => c < 0).length,
    // Exact equality: only a bit-identical start/end close counts as flat.
    flatCount: changes.filter((c) => c === 0).length,
    volatility: {
      mean: mean(volatilities),
      max: volatilities.length > 0 ? Math.max(...volatilities) : null,
      min: volatilities.length > 0 ? Math.min(...volatilities) : null
    }
  };
}

export function summarizeListing(listing: ListingSnapshot): MarketTotals {
  let marketCap = 0;
  let turnover = 0;
  for (const row of listing.rows) {
    marketCap += row.totalMarketCap ?? 0;
    turnover += row.turnoverAmount ?? 0;
  }

  return {
    totalMarketCap: marketCap / REPORT_AMOUNT_UNIT,
    totalTurnover: turnover / REPORT_AMOUNT_UNIT,
    listedCount: listing.rows.length
  };
}

export function buildMarketReport(args: {
  window: ReportWindow;
  indexStats: ReadonlyMap<string, ReturnStats>;
  equityTable: readonly ReturnStats[];
  listing: ListingSnapshot;
  failures?: EntityFailure[];
  requested?: { indices: number; equities: number };
  generatedAt?: string;
}): MarketReport {
  const indices: IndexSectionEntry[] = Array.from(args.indexStats, ([name, stats]) => ({ name, stats }));
  const failures = args.failures ?? [];

  return {
    generatedAt: args.generatedAt ?? new Date().toISOString(),
    window: args.window,
    indices,
    equities: summarizeEquities(args.equityTable),
    market: summarizeListing(args.listing),
    coverage: {
      requestedIndices: args.requested?.indices ?? indices.length,
      requestedEquities: args.requested?.equities ?? args.equityTable.length,
      failures
    }
  };
}

function fixed2(value: number): string {
  return value.toFixed(2);
}

function signed2(value: number): string {
  return `${value >= 0 ? "+" : ""}${value.toFixed(2)}`;
}

function pct(value: number | null): string {
  return value === null ? "N/A" : `${fixed2(value)}%`;
}

const wholeNumber = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

function renderIndexSection(report: MarketReport, lines: string[]): void {
  lines.push("【一、主要指数表现】");
  lines.push(SECTION_RULE);

  if (report.indices.length === 0) {
    lines.push("");
    lines.push("无可用指数数据 (0)");
    return;
  }

  for (const { name, stats } of report.indices) {
    lines.push("");
    lines.push(`${name} (${stats.code}):`);
    lines.push(`  期初收盘: ${fixed2(stats.startClose)}`);
    lines.push(`  期末收盘: ${fixed2(stats.endClose)}`);
    lines.push(`  涨跌幅: ${signed2(stats.changePct)}%`);
    lines.push(`  年内最高: ${fixed2(stats.periodHigh)}`);
    lines.push(`  年内最低: ${fixed2(stats.periodLow)}`);
    lines.push(`  波动幅度: ${fixed2(stats.volatilityPct)}%`);
  }
}

function renderLeaderboard(title: string, entries: LeaderboardEntry[], lines: string[]): void {
  lines.push("");
  lines.push(`${title}:`);
  if (entries.length === 0) {
    lines.push("  (无)");
    return;
  }
  for (const e of entries) {
    lines.push(`  ${e.code} ${e.name}: ${signed2(e.changePct)}%`);
  }
}

function renderEquitySection(equities: EquitySection, lines: string[]): void {
  lines.push("【二、个股表现统计】");
  lines.push(SECTION_RULE);

  renderLeaderboard(`涨幅榜 TOP${REPORT_LEADERBOARD_SIZE}`, equities.topGainers, lines);
  renderLeaderboard(`跌幅榜 TOP${REPORT_LEADERBOARD_SIZE}`, equities.topLosers, lines);

  lines.push("");
  lines.push("整体统计:");
  lines.push(`  平均涨跌幅: ${pct(equities.meanChangePct)}`);
  lines.push(`  涨跌幅中位数: ${pct(equities.medianChangePct)}`);
  lines.push(`  上涨股票数: ${equities.gainersCount}`);
  lines.push(`  下跌股票数: ${equities.losersCount}`);
  lines.push(`  平盘股票数: ${equities.flatCount}`);

  lines.push("");
  lines.push("波动率分析:");
  lines.push(`  平均波动率: ${pct(equities.volatility.mean)}`);
  lines.push(`  最大波动率: ${pct(equities.volatility.max)}`);
  lines.push(`  最小波动率: ${pct(equities.volatility.min)}`);
}

function renderMarketSection(market: MarketTotals, lines: string[]): void {
  lines.push("【三、市场概况】");
  lines.push(SECTION_RULE);
  lines.push(`A股总市值: ${wholeNumber.format(market.totalMarketCap)} 亿元`);
  lines.push(`上市公司数: ${market.listedCount} 家`);
  lines.push(`总成交额: ${wholeNumber.format(market.totalTurnover)} 亿元`);
}

function renderFailureSection(failures: EntityFailure[], lines: string[]): void {
  lines.push("【四、数据缺失】");
  lines.push(SECTION_RULE);
  for (const f of failures) {
    const stage = f.stage === "fetch" ? "获取失败" : "无法计算";
    lines.push(`  ${f.code} ${f.name} [${stage}] ${f.reason}`);
  }
}

export function renderReportText(report: MarketReport): string {
  const { window, coverage } = report;
  const lines: string[] = [];

  lines.push(`分析时间范围: ${window.startDate} 至 ${window.endDate}`);
  lines.push(`分析股票数量: ${report.equities.analyzed}`);
  lines.push(
    `数据覆盖: 指数 ${report.indices.length}/${coverage.requestedIndices}, 个股 ${report.equities.analyzed}/${coverage.requestedEquities}, 跳过 ${coverage.failures.length}`
  );
  lines.push("");

  renderIndexSection(report, lines);

  lines.push("");
  lines.push("");
  renderEquitySection(report.equities, lines);

  lines.push("");
  lines.push("");
  renderMarketSection(report.market, lines);

  if (coverage.failures.length > 0) {
    lines.push("");
    lines.push("");
    renderFailureSection(coverage.failures, lines);
  }

  return lines.join("\n");
}
