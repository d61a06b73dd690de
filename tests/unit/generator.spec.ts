import { test, expect } from '@playwright/test';
import {
  SALES_SOURCE,
  categorical,
  createDatasetGenerator,
  createRandom,
  dayOffset,
  isValidSeed,
  randomSeed,
  roundedNormal,
  sampleDataset,
  uniformInt,
  type Random,
} from '@/lib/data';
import { ALL_BIKE_MODELS, ALL_CATEGORIES, ALL_REGIONS } from '@/lib/constants/dimensions';
import { DatasetConfigError } from '@/lib/errors';

// Replays a fixed list of draws
function sequence(...values: number[]): Random {
  let i = 0;
  return () => values[i++ % values.length];
}

test.describe('Random samplers', () => {
  test('createRandom is reproducible and stays in [0, 1)', () => {
    const a = createRandom(42);
    const b = createRandom(42);
    for (let i = 0; i < 1000; i++) {
      const value = a();
      expect(value).toBe(b());
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  test('weighted categorical follows cumulative weights', () => {
    const sample = categorical(['a', 'b', 'c'], [0.2, 0.3, 0.5]);
    const random = sequence(0.1, 0.2, 0.49, 0.5, 0.99);
    expect([1, 2, 3, 4, 5].map(() => sample(random))).toEqual(['a', 'b', 'b', 'c', 'c']);
  });

  test('uniform categorical splits [0, 1) evenly', () => {
    const sample = categorical(['x', 'y', 'z', 'w']);
    const random = sequence(0, 0.25, 0.5, 0.75, 0.999);
    expect([1, 2, 3, 4, 5].map(() => sample(random))).toEqual(['x', 'y', 'z', 'w', 'w']);
  });

  test('weights just under 1 never fall back to a zero-weight value', () => {
    const sample = categorical(['a', 'b', 'c'], [0.5, 0.4999999, 0]);
    expect(sample(sequence(0.99999995))).toBe('b');
  });

  test('randomSeed draws a valid 32-bit seed', () => {
    for (let i = 0; i < 100; i++) {
      expect(isValidSeed(randomSeed())).toBe(true);
    }
  });

  test('rejects bad vocabularies and weights', () => {
    expect(() => categorical([])).toThrow(DatasetConfigError);
    expect(() => categorical(['a', 'b'], [0.5])).toThrow(DatasetConfigError);
    expect(() => categorical(['a', 'b'], [0.6, 0.6])).toThrow(DatasetConfigError);
    expect(() => categorical(['a', 'b'], [-0.5, 1.5])).toThrow(DatasetConfigError);
  });

  test('roundedNormal rounds to the step', () => {
    // u1 = 1 - 0 = 1 gives a zero normal draw, so the result is the rounded mean
    const sample = roundedNormal({ mean: 1803, stdDev: 700, step: 10, min: 500, max: 6000 });
    expect(sample(sequence(0, 0.25))).toBe(1800);
  });

  test('roundedNormal clamps after rounding', () => {
    const low = roundedNormal({ mean: 504, stdDev: 100, step: 10, min: 503, max: 6000 });
    expect(low(sequence(0, 0.25))).toBe(503);

    const high = roundedNormal({ mean: 7000, stdDev: 100, step: 10, min: 500, max: 6000 });
    expect(high(sequence(0, 0.25))).toBe(6000);
  });

  test('uniformInt covers both ends', () => {
    const sample = uniformInt(1, 49);
    expect(sample(sequence(0))).toBe(1);
    expect(sample(sequence(0.999999))).toBe(49);
  });

  test('dayOffset stays within the year from the epoch', () => {
    const sample = dayOffset('2024-01-01', 365);
    expect(sample(sequence(0))).toBe('2024-01-01');
    expect(sample(sequence(0.5))).toBe('2024-07-01');
    expect(sample(sequence(0.9999999))).toBe('2024-12-30');
  });

  test('dayOffset rejects an invalid epoch', () => {
    expect(() => dayOffset('not-a-date', 365)).toThrow(DatasetConfigError);
  });
});

test.describe('Sales dataset sampling', () => {
  for (const seed of [1, 7, 42, 2024]) {
    for (const rows of [0, 1, 250]) {
      test(`fields stay in bounds (seed ${seed}, ${rows} rows)`, () => {
        const { records } = sampleDataset(SALES_SOURCE, rows, seed);
        expect(records).toHaveLength(rows);

        for (const record of records) {
          expect(record.price_usd).toBeGreaterThanOrEqual(500);
          expect(record.price_usd).toBeLessThanOrEqual(6000);
          expect(record.price_usd % 10).toBe(0);
          expect(Number.isInteger(record.units_sold)).toBe(true);
          expect(record.units_sold).toBeGreaterThanOrEqual(1);
          expect(record.units_sold).toBeLessThanOrEqual(49);
          expect(record.total_sales_usd).toBe(record.price_usd * record.units_sold);
          expect(record.date >= '2024-01-01' && record.date <= '2024-12-30').toBe(true);
          expect(ALL_BIKE_MODELS).toContain(record.bike_model);
          expect(ALL_CATEGORIES).toContain(record.category);
          expect(ALL_REGIONS).toContain(record.region);
        }
      });
    }
  }

  test('same seed gives identical datasets', () => {
    expect(sampleDataset(SALES_SOURCE, 100, 42)).toEqual(sampleDataset(SALES_SOURCE, 100, 42));
  });

  test('different seeds give different datasets', () => {
    expect(sampleDataset(SALES_SOURCE, 100, 1)).not.toEqual(sampleDataset(SALES_SOURCE, 100, 2));
  });

  test('records are ordered by date', () => {
    const { records } = sampleDataset(SALES_SOURCE, 300, 5);
    for (let i = 1; i < records.length; i++) {
      expect(records[i - 1].date <= records[i].date).toBe(true);
    }
  });
});

test.describe('Dataset generator cache', () => {
  test('identical parameters return the cached dataset object', () => {
    const generator = createDatasetGenerator(SALES_SOURCE);
    const first = generator.generate({ rows: 50, seed: 3 });
    expect(generator.generate({ rows: 50, seed: 3 })).toBe(first);
    expect(first.seed).toBe(3);
    expect(generator.cacheSize).toBe(1);
  });

  test('different parameters get their own entries', () => {
    const generator = createDatasetGenerator(SALES_SOURCE);
    const a = generator.generate({ rows: 50, seed: 3 });
    const b = generator.generate({ rows: 60, seed: 3 });
    const c = generator.generate({ rows: 50, seed: 4 });
    expect(b).not.toBe(a);
    expect(c).not.toBe(a);
    expect(b.records).toHaveLength(60);
    expect(generator.cacheSize).toBe(3);
  });

  test('clearCache forces a new sample; a seed reproduces it', () => {
    const generator = createDatasetGenerator(SALES_SOURCE);
    const before = generator.generate({ rows: 40, seed: 9 });
    generator.clearCache();
    expect(generator.cacheSize).toBe(0);

    const after = generator.generate({ rows: 40, seed: 9 });
    expect(after).not.toBe(before);
    expect(after.records).toEqual(before.records);
  });

  test('unseeded calls are memoized, then resampled after clearing', () => {
    const generator = createDatasetGenerator(SALES_SOURCE);
    const first = generator.generate({ rows: 200 });
    expect(generator.generate({ rows: 200 })).toBe(first);

    generator.clearCache();
    const second = generator.generate({ rows: 200 });
    expect(second).not.toBe(first);
    expect(second.seed).not.toBe(first.seed);
    expect(second.records).not.toEqual(first.records);
  });

  test('rejects invalid parameters', () => {
    const generator = createDatasetGenerator(SALES_SOURCE);
    expect(() => generator.generate({ rows: -1 })).toThrow(DatasetConfigError);
    expect(() => generator.generate({ rows: 1.5 })).toThrow(DatasetConfigError);
    expect(() => generator.generate({ rows: 10, seed: 0.5 })).toThrow(DatasetConfigError);
    expect(generator.cacheSize).toBe(0);
  });

  test('seeds outside the 32-bit range are rejected', () => {
    const generator = createDatasetGenerator(SALES_SOURCE);
    expect(() => generator.generate({ rows: 5, seed: -1 })).toThrow(DatasetConfigError);
    expect(() => generator.generate({ rows: 5, seed: 2 ** 32 })).toThrow(DatasetConfigError);
    expect(() => generator.generate({ rows: 5, seed: 2 ** 32 + 1 })).toThrow(DatasetConfigError);
    expect(generator.generate({ rows: 5, seed: 2 ** 32 - 1 }).seed).toBe(2 ** 32 - 1);
    expect(generator.generate({ rows: 5, seed: 0 }).seed).toBe(0);
  });
});
