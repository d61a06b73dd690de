/**
 * Pure filter functions over datasets
 * Predicates combine with AND; the source dataset is never mutated
 */

import type { DataRow, Dataset, FieldValue, NumericRange, Predicate } from '../types';
import { InvalidPredicateError } from '../errors';
import { assertField, compareValues, numberValue } from './schema';

/**
 * Record value must be one of `values` (an empty list matches nothing)
 */
export function membership(field: string, values: readonly FieldValue[]): Predicate {
  return { kind: 'membership', field, values };
}

/**
 * Record value must be >= `value` (inclusive)
 */
export function minimum(field: string, value: number): Predicate {
  return { kind: 'minimum', field, value };
}

function compile(dataset: Dataset, predicate: Predicate): (row: DataRow) => boolean {
  const { field } = predicate;

  if (predicate.kind === 'membership') {
    assertField(dataset.schema, field);
    const allowed = new Set<FieldValue>(predicate.values);
    return row => allowed.has(row[field]);
  }

  assertField(dataset.schema, field, 'numeric');
  if (!Number.isFinite(predicate.value)) {
    throw new InvalidPredicateError(field, `threshold must be a finite number, got ${predicate.value}`);
  }
  const threshold = predicate.value;
  return row => numberValue(row, field) >= threshold;
}

/**
 * Apply all predicates to a dataset
 * No predicates returns the input as-is; no matches returns an empty dataset
 */
export function filterDataset<T extends DataRow>(
  dataset: Dataset<T>,
  predicates: readonly Predicate[]
): Dataset<T> {
  if (predicates.length === 0) {
    return dataset;
  }

  // Validate every predicate up front, even when the dataset is empty
  const tests = predicates.map(p => compile(dataset, p));

  return {
    schema: dataset.schema,
    records: dataset.records.filter(row => tests.every(test => test(row))),
  };
}

/**
 * Min and max of a numeric field (null for an empty dataset)
 */
export function fieldRange(dataset: Dataset, field: string): NumericRange | null {
  assertField(dataset.schema, field, 'numeric');
  if (dataset.records.length === 0) {
    return null;
  }

  let min = Infinity;
  let max = -Infinity;
  for (const row of dataset.records) {
    const value = numberValue(row, field);
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return { min, max };
}

/**
 * Distinct values of a field, ascending
 */
export function distinctValues(dataset: Dataset, field: string): FieldValue[] {
  assertField(dataset.schema, field);
  const seen = new Set<FieldValue>();
  for (const row of dataset.records) {
    seen.add(row[field]);
  }
  return Array.from(seen).sort(compareValues);
}

/**
 * Clamp a value into a numeric range
 */
export function clampToRange(value: number, range: NumericRange): number {
  return Math.min(range.max, Math.max(range.min, value));
}
