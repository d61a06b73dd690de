/**
 * Synthetic dataset generator with an explicit, owned cache
 * Repeated calls with identical parameters return the cached Dataset object
 */

import type { DataRow, Dataset, DatasetSchema } from '../types';
import { DatasetConfigError } from '../errors';
import { createRandom, isValidSeed, randomSeed, type Random } from './random';
import { compareValues } from './schema';

export interface DatasetSource<T extends DataRow> {
  name: string;
  schema: DatasetSchema;
  createRecord: (random: Random) => T;
  // Field to order records by, ascending (stable for ties)
  sortBy?: keyof T & string;
}

export interface GenerateParams {
  rows: number;
  seed?: number;
}

export interface GeneratedDataset<T extends DataRow> extends Dataset<T> {
  seed: number;
  generatedAt: string;
}

export interface DatasetGenerator<T extends DataRow> {
  generate(params: GenerateParams): GeneratedDataset<T>;
  clearCache(): void;
  readonly cacheSize: number;
}

function cacheKey(name: string, { rows, seed }: GenerateParams): string {
  return `${name}:${rows}:${seed ?? 'random'}`;
}

function validateParams({ rows, seed }: GenerateParams): void {
  if (!Number.isInteger(rows) || rows < 0) {
    throw new DatasetConfigError(`rows must be a non-negative integer, got ${rows}`);
  }
  if (seed !== undefined && !isValidSeed(seed)) {
    throw new DatasetConfigError(`seed must be an integer in [0, 2^32), got ${seed}`);
  }
}

/**
 * Build `rows` records from a fresh Random
 * Pure: never touches the cache
 */
export function sampleDataset<T extends DataRow>(
  source: DatasetSource<T>,
  rows: number,
  seed: number
): Dataset<T> {
  const random = createRandom(seed);
  const records: T[] = [];
  for (let i = 0; i < rows; i++) {
    records.push(source.createRecord(random));
  }

  const { sortBy } = source;
  if (sortBy) {
    records.sort((a, b) => compareValues(a[sortBy], b[sortBy]));
  }

  return { schema: source.schema, records };
}

/**
 * Create a generator that memoizes datasets per (source, rows, seed)
 * Unseeded calls share one cache entry, so a process keeps a single random sample
 */
export function createDatasetGenerator<T extends DataRow>(
  source: DatasetSource<T>
): DatasetGenerator<T> {
  const cache = new Map<string, GeneratedDataset<T>>();

  return {
    generate(params: GenerateParams): GeneratedDataset<T> {
      validateParams(params);

      const key = cacheKey(source.name, params);
      const cached = cache.get(key);
      if (cached) {
        return cached;
      }

      const seed = params.seed ?? randomSeed();
      const dataset: GeneratedDataset<T> = {
        ...sampleDataset(source, params.rows, seed),
        seed,
        generatedAt: new Date().toISOString(),
      };
      cache.set(key, dataset);

      console.log(`Dataset: generated ${params.rows} ${source.name} rows (seed ${seed})`);
      return dataset;
    },

    clearCache(): void {
      console.log(`Dataset: cleared ${cache.size} cached ${source.name} dataset(s)`);
      cache.clear();
    },

    get cacheSize(): number {
      return cache.size;
    },
  };
}
