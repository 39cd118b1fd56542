import { describe, it, expect } from 'vitest';
import { analyzeTrend, classifySlope, fitSlope } from './trend.js';

const DAY = 24 * 60 * 60 * 1000;
const NOW = Date.UTC(2024, 5, 30);

function daysAgo(n: number): string {
  return new Date(NOW - n * DAY).toISOString();
}

describe('analyzeTrend', () => {
  it('classifies strictly increasing prices as increasing', () => {
    const result = analyzeTrend([{ price: 100 }, { price: 110 }, { price: 120 }, { price: 130 }], { now: NOW });

    // slope = 10 per step, mean = 115
    expect(result.trend).toBe('increasing');
    expect(result.slope).toBeCloseTo(10, 10);
    expect(result.priceChange).toBe(30);
    expect(result.priceChangePercent).toBeCloseTo(30, 10);
    expect(result.trendStrength).toBeCloseTo((10 / 115) * 100, 10);
    expect(result.dataPoints).toBe(4);
  });

  it('keeps rows dated in compact YYYYMMDD form inside the window', () => {
    const result = analyzeTrend(
      [
        { price: 130, date: '20261016' },
        { price: 100, date: '20261010' },
        { price: 120, date: '20261014' },
        { price: 110, date: '20261012' },
      ],
      { now: Date.UTC(2026, 9, 19) },
    );

    expect(result.dataPoints).toBe(4);
    expect(result.trend).toBe('increasing');
    expect(result.priceChange).toBe(30);
  });

  it('classifies flat prices as stable with zero slope', () => {
    const result = analyzeTrend([{ price: 100, name: 'a' }, { price: 100, name: 'b' }, { price: 100, name: 'c' }]);
    expect(result.trend).toBe('stable');
    expect(result.slope).toBe(0);
    expect(result.volatility).toBe(0);
    expect(result.trendStrength).toBe(0);
  });

  it('classifies falling prices as decreasing', () => {
    const result = analyzeTrend([{ price: '₹900' }, { price: '₹800' }, { price: '₹700' }]);
    expect(result.trend).toBe('decreasing');
    expect(result.slope).toBeCloseTo(-100, 10);
    expect(result.priceChange).toBe(-200);
  });

  it('treats a slope under 1% of the mean as stable', () => {
    // slope = 0.5, mean = 100.5 -> 0.5 < 1.005
    const result = analyzeTrend([{ price: 100 }, { price: 100.5 }, { price: 101 }]);
    expect(result.trend).toBe('stable');
    expect(result.slope).toBeCloseTo(0.5, 10);
  });

  it('returns the stable result for fewer than two points', () => {
    expect(analyzeTrend([])).toEqual({
      trend: 'stable',
      trendStrength: 0,
      priceChange: 0,
      priceChangePercent: 0,
      volatility: 0,
      slope: 0,
      dataPoints: 0,
    });
    expect(analyzeTrend([{ price: 50 }, { price: 'n/a' }]).dataPoints).toBe(1);
  });

  it('only uses points inside the window, in date order', () => {
    const records = [
      { price: 130, date: daysAgo(1) },
      { price: 500, date: daysAgo(45) },
      { price: 110, date: daysAgo(20) },
      { price: 120, date: daysAgo(10) },
      { price: 100, date: daysAgo(29) },
    ];

    const result = analyzeTrend(records, { now: NOW, windowDays: 30 });
    // window keeps 100, 110, 120, 130 in date order
    expect(result.dataPoints).toBe(4);
    expect(result.trend).toBe('increasing');
    expect(result.priceChange).toBe(30);
  });

  it('returns stable when the window leaves fewer than two points', () => {
    const result = analyzeTrend(
      [
        { price: 100, date: daysAgo(60) },
        { price: 200, date: daysAgo(40) },
        { price: 300, date: daysAgo(2) },
      ],
      { now: NOW, windowDays: 30 },
    );
    expect(result.trend).toBe('stable');
    expect(result.dataPoints).toBe(1);
  });

  it('drops undated rows when a date column exists', () => {
    const result = analyzeTrend(
      [
        { price: 100, date: daysAgo(3) },
        { price: 999, date: 'unknown' },
        { price: 90, date: daysAgo(1) },
      ],
      { now: NOW },
    );
    expect(result.dataPoints).toBe(2);
    expect(result.trend).toBe('decreasing');
  });

  it('computes volatility as the coefficient of variation in percent', () => {
    const result = analyzeTrend([
      { price: 90, name: 'a' },
      { price: 110, name: 'b' },
      { price: 90, name: 'c' },
      { price: 110, name: 'd' },
    ]);
    // mean 100, population std dev 10
    expect(result.volatility).toBeCloseTo(10, 10);
  });
});

describe('fitSlope', () => {
  it('fits against the observation index', () => {
    expect(fitSlope([1, 3, 5, 7])).toBeCloseTo(2, 10);
    expect(fitSlope([4])).toBe(0);
  });
});

describe('classifySlope', () => {
  it('uses the stable ratio as the tie-break', () => {
    expect(classifySlope(1, 100, 0.01)).toBe('increasing');
    expect(classifySlope(0.99, 100, 0.01)).toBe('stable');
    expect(classifySlope(-1, 100, 0.01)).toBe('decreasing');
    expect(classifySlope(0, 0, 0.01)).toBe('stable');
  });
});
