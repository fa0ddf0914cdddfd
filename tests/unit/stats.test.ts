import { describe, it, expect } from 'vitest';

import {
  DegenerateBaselineError,
  InsufficientDataError,
  MalformedSeriesError,
} from '../../src/market/errors';
import { computeReturnStats, mean, median } from '../../src/market/stats';
import { makeSeries } from './fixtures';

describe('computeReturnStats', () => {
  it('computes change and volatility from the first close', () => {
    const series = makeSeries('600000', {
      close: [10.0, 12.0],
      high: [10.0, 13.0],
      low: [9.0, 11.0],
      volume: [100, 300],
    });

    const res = computeReturnStats(series);
    expect(res.status).toBe('ok');
    if (res.status !== 'ok') return;

    expect(res.stats).toEqual({
      code: '600000',
      name: 'name-600000',
      changePct: 20.0,
      volatilityPct: 40.0,
      avgVolume: 200,
      startClose: 10,
      endClose: 12,
      periodHigh: 13,
      periodLow: 9,
      bars: 2,
    });
    expect(Object.isFrozen(res.stats)).toBe(true);
  });

  it('is deterministic across calls', () => {
    const series = makeSeries('000333', { close: [50, 47.5, 55], high: [51, 49, 56], low: [49, 46, 54] });
    expect(computeReturnStats(series)).toEqual(computeReturnStats(series));
  });

  it('fails with InsufficientDataError on an empty series', () => {
    const res = computeReturnStats(makeSeries('600519', { close: [] }));
    expect(res.status).toBe('failed');
    if (res.status !== 'failed') return;
    expect(res.error).toBeInstanceOf(InsufficientDataError);
    expect(res.error.code).toBe('INSUFFICIENT_DATA');
  });

  it('fails with DegenerateBaselineError when the first close is zero', () => {
    const res = computeReturnStats(makeSeries('601398', { close: [0.0, 5.0], high: [1, 6], low: [0, 4] }));
    expect(res.status).toBe('failed');
    if (res.status !== 'failed') return;
    expect(res.error).toBeInstanceOf(DegenerateBaselineError);
  });

  it('rejects inputs that would give negative volatility', () => {
    const inverted = computeReturnStats(makeSeries('601318', { close: [10, 11], high: [8, 8], low: [9, 9] }));
    expect(inverted.status).toBe('failed');
    if (inverted.status === 'failed') {
      expect(inverted.error).toBeInstanceOf(MalformedSeriesError);
    }

    const negativeBase = computeReturnStats(makeSeries('601318', { close: [-10, 11], high: [12, 12], low: [-11, 9] }));
    expect(negativeBase.status).toBe('failed');
    if (negativeBase.status === 'failed') {
      expect(negativeBase.error).toBeInstanceOf(MalformedSeriesError);
    }
  });

  it('rejects misaligned arrays and non-finite prices', () => {
    const misaligned = makeSeries('000858', { close: [10, 11] });
    misaligned.high = [10];
    const res = computeReturnStats(misaligned);
    expect(res.status).toBe('failed');
    if (res.status === 'failed') {
      expect(res.error.message).toBe('Malformed series for 000858: high has 1 values for 2 dates');
    }

    const nan = makeSeries('000858', { close: [10, Number.NaN] });
    expect(computeReturnStats(nan).status).toBe('failed');
  });

  it('rejects dates that are not strictly increasing', () => {
    const series = makeSeries('002594', { close: [10, 11] });
    series.dates = ['2024-01-03', '2024-01-03'];
    const res = computeReturnStats(series);
    expect(res.status).toBe('failed');
    if (res.status === 'failed') {
      expect(res.error).toBeInstanceOf(MalformedSeriesError);
    }
  });
});

describe('mean / median', () => {
  it('returns null for empty input', () => {
    expect(mean([])).toBeNull();
    expect(median([])).toBeNull();
  });

  it('takes the middle pair for even lengths', () => {
    expect(median([4, 1, 3, 2])).toBe(2.5);
    expect(median([5, -1, 3])).toBe(3);
    expect(mean([1, 2, 3, 6])).toBe(3);
  });
});
