/**
 * Schema checks and value helpers shared by filters and aggregations
 */

import type { DataRow, DatasetSchema, FieldKind, FieldValue } from '../types';
import { InvalidPredicateError } from '../errors';

/**
 * Throw unless `field` is in the schema (and of `kind`, when given)
 */
export function assertField(schema: DatasetSchema, field: string, kind?: FieldKind): FieldKind {
  if (!Object.prototype.hasOwnProperty.call(schema, field)) {
    throw new InvalidPredicateError(field);
  }
  const actual = schema[field];
  if (kind && actual !== kind) {
    throw new InvalidPredicateError(field, `expected a ${kind} field, got ${actual}`);
  }
  return actual;
}

export function numberValue(row: DataRow, field: string): number {
  const value = row[field];
  return typeof value === 'number' ? value : Number(value);
}

export function stringValue(row: DataRow, field: string): string {
  return String(row[field]);
}

/**
 * Ascending order: numbers numerically, anything else by code point
 * (locale-independent so group order is stable across hosts)
 */
export function compareValues(a: FieldValue, b: FieldValue): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  const sa = String(a);
  const sb = String(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

export function compareKeys(a: readonly FieldValue[], b: readonly FieldValue[]): number {
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    const comparison = compareValues(a[i], b[i]);
    if (comparison !== 0) return comparison;
  }
  return a.length - b.length;
}
