import { describe, it, expect } from 'vitest';
import { cleanSeries, extractPrice } from './cleaner.js';

describe('cleanSeries', () => {
  it('returns an empty series for empty input', () => {
    const series = cleanSeries([]);
    expect(series.rows).toEqual([]);
    expect(series.priceFields).toEqual([]);
    expect(series.sortedBy).toBeNull();
  });

  it('parses every recognized price column and nulls unreadable values', () => {
    const series = cleanSeries([
      { name: 'A', price: '₹1,200', original_price: '₹1,500' },
      { name: 'B', price: 'N/A', original_price: 0 },
    ]);

    expect(series.priceFields).toEqual(['price', 'original_price']);
    expect(series.rows).toEqual([
      { name: 'A', price: 1200, original_price: 1500 },
      { name: 'B', price: null, original_price: null },
    ]);
    // "N/A" and 0 both present but unreadable
    expect(series.unparseablePrices).toBe(2);
  });

  it('fills a price column missing from some records with null', () => {
    const series = cleanSeries([{ price: 10 }, { sale_price: '9.50' }]);
    expect(series.rows).toEqual([
      { price: 10, sale_price: null },
      { price: null, sale_price: 9.5 },
    ]);
    expect(series.unparseablePrices).toBe(0);
  });

  it('parses dates and sorts ascending by the preferred date column', () => {
    const series = cleanSeries([
      { price: 30, scraped_at: '2024-01-03T00:00:00Z', date: '2024-01-03T00:00:00Z' },
      { price: 10, scraped_at: '2024-01-01T00:00:00Z', date: '2024-01-01T00:00:00Z' },
      { price: 20, scraped_at: '2024-01-02T00:00:00Z', date: '2024-01-02T00:00:00Z' },
    ]);

    expect(series.dateFields).toEqual(['date', 'scraped_at']);
    expect(series.sortedBy).toBe('date');
    expect(series.rows.map(extractPrice)).toEqual([10, 20, 30]);
    expect(series.rows[0].date).toBe(Date.UTC(2024, 0, 1));
  });

  it('puts rows with unreadable dates last, keeping their order', () => {
    const series = cleanSeries([
      { price: 1, timestamp: 'soon' },
      { price: 2, timestamp: '2024-05-02T00:00:00Z' },
      { price: 3, timestamp: null },
      { price: 4, timestamp: '2024-05-01T00:00:00Z' },
    ]);

    expect(series.rows.map(extractPrice)).toEqual([4, 2, 1, 3]);
    expect(series.unparseableDates).toBe(1);
  });

  it('keeps insertion order when no date column exists', () => {
    const series = cleanSeries([{ price: 3 }, { price: 1 }, { price: 2 }]);
    expect(series.sortedBy).toBeNull();
    expect(series.rows.map(extractPrice)).toEqual([3, 1, 2]);
  });

  it('drops rows that are equal after cleaning', () => {
    const series = cleanSeries([
      { name: 'Store', price: '₹1,000' },
      { name: 'Store', price: 1000 },
      { name: 'Store', price: 1001 },
    ]);

    expect(series.rows).toHaveLength(2);
    expect(series.duplicatesRemoved).toBe(1);
  });

  it('does not mutate the input records', () => {
    const record = { price: '$5.00', date: '2024-01-01T00:00:00Z' };
    cleanSeries([record]);
    expect(record).toEqual({ price: '$5.00', date: '2024-01-01T00:00:00Z' });
  });
});

describe('extractPrice', () => {
  it('prefers price, then current_price, sale_price, original_price', () => {
    expect(extractPrice({ price: null, current_price: 12, original_price: 20 })).toBe(12);
    expect(extractPrice({ original_price: 20, sale_price: 15 })).toBe(15);
    expect(extractPrice({ name: 'x' })).toBeNull();
  });
});
