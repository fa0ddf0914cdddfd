import { describe, it, expect } from 'vitest';

import {
  buildMarketReport,
  rankLeaderboards,
  renderReportText,
  summarizeEquities,
  summarizeListing,
} from '../../src/market/report';
import { computeReturnStats } from '../../src/market/stats';
import type { ReturnStats } from '../../src/market/types';
import { makeListing, makeSeries, makeStats } from './fixtures';

const window = { startDate: '20240101', endDate: '20241231' };
const RULE = '-'.repeat(40);

function indexStats(code: string, close: number[], high: number[], low: number[]): ReturnStats {
  const res = computeReturnStats(makeSeries(code, { close, high, low }, { kind: 'index' }));
  if (res.status !== 'ok') {
    throw new Error(`fixture for ${code} did not compute`);
  }
  return res.stats;
}

describe('rankLeaderboards', () => {
  it('breaks changePct ties by code ascending', () => {
    const { topGainers, topLosers } = rankLeaderboards([makeStats('000002', 5.0), makeStats('000001', 5.0)]);
    expect(topGainers.map((e) => e.code)).toEqual(['000001', '000002']);
    expect(topLosers.map((e) => e.code)).toEqual(['000001', '000002']);
  });

  it('compares tied codes by code unit, not locale', () => {
    const { topGainers } = rankLeaderboards([makeStats('a00001', 1), makeStats('B00001', 1)]);
    expect(topGainers.map((e) => e.code)).toEqual(['B00001', 'a00001']);
  });

  it('sorts gainers descending, losers ascending, and caps both at 10', () => {
    const table = Array.from({ length: 12 }, (_, i) => makeStats(`6000${String(i).padStart(2, '0')}`, i * 3 - 15));
    const { topGainers, topLosers } = rankLeaderboards(table);

    expect(topGainers).toHaveLength(10);
    expect(topLosers).toHaveLength(10);
    expect(topGainers[0]).toEqual({ code: '600011', name: 'name-600011', changePct: 18 });
    expect(topLosers[0]).toEqual({ code: '600000', name: 'name-600000', changePct: -15 });
    for (let i = 1; i < 10; i += 1) {
      expect(topGainers[i - 1].changePct).toBeGreaterThanOrEqual(topGainers[i].changePct);
      expect(topLosers[i - 1].changePct).toBeLessThanOrEqual(topLosers[i].changePct);
    }
  });

  it('returns every row when there are fewer than 10', () => {
    const { topGainers } = rankLeaderboards([makeStats('600000', 1), makeStats('600001', 2), makeStats('600002', 3)]);
    expect(topGainers.map((e) => e.code)).toEqual(['600002', '600001', '600000']);
  });
});

describe('summarizeEquities', () => {
  it('counts gainers, losers and exactly-flat rows', () => {
    const table = [
      makeStats('600000', 1.5, 12),
      makeStats('600001', -2, 30),
      makeStats('600002', 0, 8),
      makeStats('600003', 0, 10),
      makeStats('600004', 3, 40),
    ];
    const s = summarizeEquities(table);

    expect(s.gainersCount).toBe(2);
    expect(s.losersCount).toBe(1);
    expect(s.flatCount).toBe(2);
    expect(s.gainersCount + s.losersCount + s.flatCount).toBe(table.length);
    expect(s.meanChangePct).toBe(0.5);
    expect(s.medianChangePct).toBe(0);
    expect(s.volatility).toEqual({ mean: 20, max: 40, min: 8 });
  });

  it('does not treat a tiny nonzero change as flat', () => {
    const s = summarizeEquities([makeStats('600000', 1e-12)]);
    expect(s.flatCount).toBe(0);
    expect(s.gainersCount).toBe(1);
  });

  it('returns zero counts and nulls for an empty table', () => {
    expect(summarizeEquities([])).toEqual({
      analyzed: 0,
      topGainers: [],
      topLosers: [],
      meanChangePct: null,
      medianChangePct: null,
      gainersCount: 0,
      losersCount: 0,
      flatCount: 0,
      volatility: { mean: null, max: null, min: null },
    });
  });
});

describe('summarizeListing', () => {
  it('sums caps and turnover in hundred-million units, skipping missing values', () => {
    const listing = makeListing([
      { code: '600519', totalMarketCap: 1e12, turnoverAmount: 2e10 },
      { code: '601398', totalMarketCap: 5e11, turnoverAmount: null },
      { code: '000001', totalMarketCap: null, turnoverAmount: 1e9 },
    ]);

    expect(summarizeListing(listing)).toEqual({ totalMarketCap: 15000, totalTurnover: 210, listedCount: 3 });
  });
});

describe('buildMarketReport / renderReportText', () => {
  it('renders every section', () => {
    const report = buildMarketReport({
      window,
      indexStats: new Map([['上证指数', indexStats('000001', [3000, 3300], [3050, 3400], [2950, 3250])]]),
      equityTable: [makeStats('600519', 10, 20), makeStats('000858', -10, 30)],
      listing: makeListing([
        { code: '600519', totalMarketCap: 1e12, turnoverAmount: 2e10 },
        { code: '601398', totalMarketCap: 5e11, turnoverAmount: null },
        { code: '000858', totalMarketCap: null, turnoverAmount: 1e9 },
      ]),
      failures: [{ code: '601398', name: '工商银行', stage: 'fetch', kind: 'FetchError', reason: 'HTTP 502' }],
      requested: { indices: 6, equities: 3 },
      generatedAt: '2024-12-31T08:00:00.000Z',
    });

    expect(renderReportText(report).split('\n')).toEqual([
      '分析时间范围: 20240101 至 20241231',
      '分析股票数量: 2',
      '数据覆盖: 指数 1/6, 个股 2/3, 跳过 1',
      '',
      '【一、主要指数表现】',
      RULE,
      '',
      '上证指数 (000001):',
      '  期初收盘: 3000.00',
      '  期末收盘: 3300.00',
      '  涨跌幅: +10.00%',
      '  年内最高: 3400.00',
      '  年内最低: 2950.00',
      '  波动幅度: 15.00%',
      '',
      '',
      '【二、个股表现统计】',
      RULE,
      '',
      '涨幅榜 TOP10:',
      '  600519 name-600519: +10.00%',
      '  000858 name-000858: -10.00%',
      '',
      '跌幅榜 TOP10:',
      '  000858 name-000858: -10.00%',
      '  600519 name-600519: +10.00%',
      '',
      '整体统计:',
      '  平均涨跌幅: 0.00%',
      '  涨跌幅中位数: 0.00%',
      '  上涨股票数: 1',
      '  下跌股票数: 1',
      '  平盘股票数: 0',
      '',
      '波动率分析:',
      '  平均波动率: 25.00%',
      '  最大波动率: 30.00%',
      '  最小波动率: 20.00%',
      '',
      '',
      '【三、市场概况】',
      RULE,
      'A股总市值: 15,000 亿元',
      '上市公司数: 3 家',
      '总成交额: 210 亿元',
      '',
      '',
      '【四、数据缺失】',
      RULE,
      '  601398 工商银行 [获取失败] HTTP 502',
    ]);
  });

  it('keeps the caller-given index order', () => {
    const report = buildMarketReport({
      window,
      indexStats: new Map([
        ['深证成指', indexStats('399001', [9000, 9900], [9100, 10000], [8800, 9500])],
        ['上证指数', indexStats('000001', [3000, 3300], [3050, 3400], [2950, 3250])],
      ]),
      equityTable: [],
      listing: makeListing([]),
    });

    expect(report.indices.map((i) => i.name)).toEqual(['深证成指', '上证指数']);
  });

  it('renders an empty equity table with zero counts and no leaderboard entries', () => {
    const report = buildMarketReport({ window, indexStats: new Map(), equityTable: [], listing: makeListing([]) });
    const lines = renderReportText(report).split('\n');

    expect(report.equities.topGainers).toEqual([]);
    expect(report.equities.topLosers).toEqual([]);
    expect(lines).toContain('分析股票数量: 0');
    expect(lines).toContain('无可用指数数据 (0)');
    expect(lines).toContain('  上涨股票数: 0');
    expect(lines).toContain('  下跌股票数: 0');
    expect(lines).toContain('  平盘股票数: 0');
    expect(lines).toContain('  平均涨跌幅: N/A');
    expect(lines).toContain('  最大波动率: N/A');
    expect(lines).toContain('A股总市值: 0 亿元');
    expect(lines.filter((l) => l === '  (无)')).toHaveLength(2);
    expect(lines).not.toContain('【四、数据缺失】');
  });

  it('defaults coverage counts to what was analysed', () => {
    const report = buildMarketReport({
      window,
      indexStats: new Map(),
      equityTable: [makeStats('600000', 1)],
      listing: makeListing([]),
    });

    expect(report.coverage).toEqual({ requestedIndices: 0, requestedEquities: 1, failures: [] });
  });
});
