import { describe, it, expect } from 'vitest';
import {
  analyzeCompetitivePosition,
  filterRelevantCompetitors,
  pricePositionBucket,
} from './competitive.js';

describe('pricePositionBucket', () => {
  it('is low when below every competitor', () => {
    expect(pricePositionBucket(50, [100, 200, 300])).toBe('low');
  });

  it('is high when above every competitor', () => {
    expect(pricePositionBucket(500, [100, 200, 300])).toBe('high');
  });

  it('is middle when half the competitors are strictly below', () => {
    // 100 and 200 are below 250 -> 2 / 4 = 0.5
    expect(pricePositionBucket(250, [100, 200, 300, 400])).toBe('middle');
  });

  it('counts only strictly lower prices', () => {
    // nothing is strictly below 100 -> 0
    expect(pricePositionBucket(100, [100, 100, 100, 100])).toBe('low');
    // 1 / 4 = 0.25 is not < 0.25
    expect(pricePositionBucket(150, [100, 200, 300, 400])).toBe('middle');
    // 3 / 4 = 0.75 is not < 0.75
    expect(pricePositionBucket(350, [100, 200, 300, 400])).toBe('high');
  });

  it('is unknown without competitors', () => {
    expect(pricePositionBucket(100, [])).toBe('unknown');
  });
});

describe('analyzeCompetitivePosition', () => {
  it('reports lowest and highest at the edges', () => {
    expect(analyzeCompetitivePosition(80, [100, 200]).position).toBe('lowest');
    expect(analyzeCompetitivePosition(200, [100, 200]).position).toBe('highest');
  });

  it('buckets by the share of prices at or below the target', () => {
    const prices = [100, 200, 300, 400, 500];
    // 1/5 = 20%
    expect(analyzeCompetitivePosition(150, prices).position).toBe('low');
    // 2/5 = 40%
    expect(analyzeCompetitivePosition(250, prices).position).toBe('below_average');
    // 3/5 = 60%
    expect(analyzeCompetitivePosition(350, prices).position).toBe('above_average');
    // 4/5 = 80%
    expect(analyzeCompetitivePosition(450, prices).position).toBe('high');
  });

  it('computes gaps and market stats', () => {
    const result = analyzeCompetitivePosition(250, [100, 200, 300, 400]);
    expect(result.percentile).toBe(50);
    expect(result.priceGaps).toEqual({ toLowest: 150, toHighest: 150, toAverage: 0, toMedian: 0 });
    expect(result.marketStats).toEqual({ min: 100, max: 400, average: 250, median: 250, spread: 300 });
  });

  it('is unknown when there are no usable prices', () => {
    expect(analyzeCompetitivePosition(100, [0, Number.NaN])).toEqual({
      position: 'unknown',
      percentile: null,
      priceGaps: null,
      marketStats: null,
    });
  });
});

describe('filterRelevantCompetitors', () => {
  const listings = [
    { name: 'Apple iPhone 15 128GB', price: 799 },
    { name: 'NEW Apple iPhone 15 128GB', price: 779 },
    { productName: 'Apple iPhone 15 Pro Max 256GB', price: 1199 },
    { title: 'Samsung Galaxy S24', price: 699 },
    { price: 10 },
  ];

  it('keeps listings similar to the target name', () => {
    const relevant = filterRelevantCompetitors(listings, 'Apple iPhone 15 128GB');
    expect(relevant.map((l) => l.price)).toEqual([799, 779]);
  });

  it('accepts a lower threshold', () => {
    // {apple, iphone, 15, pro, max, 256gb} vs {apple, iphone, 15, 128gb} -> 3 / 7
    const relevant = filterRelevantCompetitors(listings, 'Apple iPhone 15 128GB', 0.4);
    expect(relevant.map((l) => l.price)).toEqual([799, 779, 1199]);
  });

  it('returns nothing for a blank target', () => {
    expect(filterRelevantCompetitors(listings, '  ')).toEqual([]);
  });
});
