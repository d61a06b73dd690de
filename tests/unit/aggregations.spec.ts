import { test, expect } from '@playwright/test';
import type { Dataset } from '@/lib/types';
import {
  SALES_SOURCE,
  aggregateByGroup,
  aggregateByMonth,
  computeSalesKpis,
  monthStart,
  safeDivide,
  sampleDataset,
  sortByValueDesc,
  valueCounts,
} from '@/lib/data';
import { InvalidPredicateError } from '@/lib/errors';
import { EMPTY_SALES, SMALL_SALES } from '../fixtures/sales';

test.describe('aggregateByGroup', () => {
  test('sums units per category', () => {
    const view = aggregateByGroup(SMALL_SALES, ['category'], {
      total_units: { field: 'units_sold', reducer: 'sum' },
    });
    expect(view.records).toEqual([
      { category: 'A', total_units: 5 },
      { category: 'B', total_units: 10 },
    ]);
    expect(view.schema).toEqual({ category: 'categorical', total_units: 'numeric' });
  });

  test('applies several reducers per group', () => {
    const view = aggregateByGroup(SMALL_SALES, ['category'], {
      avg_price: { field: 'price', reducer: 'mean' },
      sales: { field: 'model', reducer: 'count' },
    });
    expect(view.records[0]).toEqual({ category: 'A', avg_price: 625, sales: 2 });
    expect(view.records[1].category).toBe('B');
    expect(view.records[1].avg_price).toBeCloseTo(3700 / 3, 10);
    expect(view.records[1].sales).toBe(3);
  });

  test('groups by a tuple of fields with unique, ordered keys', () => {
    const view = aggregateByGroup(SMALL_SALES, ['category', 'model'], {
      total_units: { field: 'units_sold', reducer: 'sum' },
    });
    expect(view.records).toEqual([
      { category: 'A', model: 'X', total_units: 2 },
      { category: 'A', model: 'Y', total_units: 3 },
      { category: 'B', model: 'X', total_units: 5 },
      { category: 'B', model: 'Y', total_units: 5 },
    ]);
  });

  test('no group fields is a single group over the whole dataset', () => {
    const sales = sampleDataset(SALES_SOURCE, 300, 11);
    const view = aggregateByGroup(sales, [], {
      total: { field: 'total_sales_usd', reducer: 'sum' },
    });
    const expected = sales.records.reduce((sum, r) => sum + r.total_sales_usd, 0);
    expect(view.records).toHaveLength(1);
    expect(view.records[0].total).toBe(expected);
  });

  test('empty input produces no groups', () => {
    const view = aggregateByGroup(EMPTY_SALES, ['category'], {
      total_units: { field: 'units_sold', reducer: 'sum' },
    });
    expect(view.records).toEqual([]);
  });

  test('rejects unknown and mistyped fields', () => {
    expect(() => aggregateByGroup(SMALL_SALES, ['colour'], {})).toThrow(InvalidPredicateError);
    expect(() => aggregateByGroup(SMALL_SALES, ['category'], {
      total: { field: 'model', reducer: 'sum' },
    })).toThrow(InvalidPredicateError);
    expect(() => aggregateByGroup(SMALL_SALES, ['category'], {
      category: { field: 'units_sold', reducer: 'sum' },
    })).toThrow(InvalidPredicateError);
  });
});

test.describe('aggregateByMonth', () => {
  test('averages per (group, month) and omits empty buckets', () => {
    expect(aggregateByMonth(SMALL_SALES, 'category', 'date', 'price')).toEqual([
      { group: 'A', month: '2024-01-01', mean: 500 },
      { group: 'A', month: '2024-02-01', mean: 750 },
      { group: 'B', month: '2024-01-01', mean: 850 },
      { group: 'B', month: '2024-03-01', mean: 2000 },
    ]);
  });

  test('orders months across a year boundary', () => {
    const dataset: Dataset = {
      schema: SMALL_SALES.schema,
      records: [
        { model: 'X', category: 'A', price: 300, units_sold: 1, date: '2024-01-01' },
        { model: 'X', category: 'A', price: 100, units_sold: 1, date: '2023-12-31' },
        { model: 'X', category: 'A', price: 200, units_sold: 1, date: '2023-12-01' },
      ],
    };
    expect(aggregateByMonth(dataset, 'category', 'date', 'price')).toEqual([
      { group: 'A', month: '2023-12-01', mean: 150 },
      { group: 'A', month: '2024-01-01', mean: 300 },
    ]);
  });

  test('empty input gives an empty sequence', () => {
    expect(aggregateByMonth(EMPTY_SALES, 'category', 'date', 'price')).toEqual([]);
  });

  test('requires a date field and a numeric value field', () => {
    expect(() => aggregateByMonth(SMALL_SALES, 'category', 'price', 'price')).toThrow(InvalidPredicateError);
    expect(() => aggregateByMonth(SMALL_SALES, 'category', 'date', 'model')).toThrow(InvalidPredicateError);
  });

  test('monthStart normalizes to the first of the UTC month', () => {
    expect(monthStart('2024-02-29')).toBe(Date.UTC(2024, 1, 1));
    expect(monthStart(Date.UTC(2024, 11, 31, 23, 59))).toBe(Date.UTC(2024, 11, 1));
    expect(monthStart('not a date')).toBeNull();
  });
});

test.describe('valueCounts', () => {
  test('counts categorical values in ascending order', () => {
    expect(Array.from(valueCounts(SMALL_SALES, 'category'))).toEqual([['A', 2], ['B', 3]]);
  });

  test('orders numeric values numerically', () => {
    expect(Array.from(valueCounts(SMALL_SALES, 'price'))).toEqual([
      [500, 2],
      [750, 1],
      [1200, 1],
      [2000, 1],
    ]);
  });

  test('empty input gives an empty mapping', () => {
    expect(valueCounts(EMPTY_SALES, 'category').size).toBe(0);
  });
});

test.describe('KPIs and division guard', () => {
  const summarySchema = { total_units: 'numeric', total_revenue: 'numeric' } as const;

  test('safeDivide treats a zero denominator as 1', () => {
    expect(safeDivide(100, 4)).toBe(25);
    expect(safeDivide(100, 0)).toBe(100);
    expect(safeDivide(0, 0)).toBe(0);
  });

  test('computes totals and average price per unit', () => {
    const kpis = computeSalesKpis({
      schema: summarySchema,
      records: [
        { total_units: 10, total_revenue: 5000 },
        { total_units: 0, total_revenue: 0 },
      ],
    });
    expect(kpis).toEqual({
      total_revenue: 5000,
      total_units: 10,
      avg_price_per_unit: 500,
      record_count: 2,
    });
  });

  test('zero units passes revenue through as the average', () => {
    const kpis = computeSalesKpis({
      schema: summarySchema,
      records: [{ total_units: 0, total_revenue: 1234 }],
    });
    expect(kpis.avg_price_per_unit).toBe(1234);
  });

  test('empty summary gives zeros', () => {
    expect(computeSalesKpis({ schema: summarySchema, records: [] })).toEqual({
      total_revenue: 0,
      total_units: 0,
      avg_price_per_unit: 0,
      record_count: 0,
    });
  });

  test('sortByValueDesc orders largest first without mutating', () => {
    const rows = [{ k: 'a', v: 1 }, { k: 'b', v: 3 }, { k: 'c', v: 2 }];
    expect(sortByValueDesc(rows, 'v').map(r => r.k)).toEqual(['b', 'c', 'a']);
    expect(rows.map(r => r.k)).toEqual(['a', 'b', 'c']);
  });
});
