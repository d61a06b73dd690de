/**
 * Aggregation functions for filtered datasets
 * Group-by roll-ups, monthly trend buckets, value counts and KPI totals
 */

import type {
  AggregateView,
  DataRow,
  Dataset,
  FieldKind,
  FieldValue,
  MonthlyTrendPoint,
  ReducerSpec,
  SalesKpis,
} from '../types';
import { InvalidPredicateError } from '../errors';
import { assertField, compareKeys, compareValues, numberValue } from './schema';

/**
 * Division guard: a zero denominator is treated as 1,
 * so the numerator passes through unchanged
 */
export function safeDivide(numerator: number, denominator: number): number {
  return numerator / (denominator === 0 ? 1 : denominator);
}

function reduce(rows: readonly DataRow[], { field, reducer }: ReducerSpec): number {
  if (reducer === 'count') {
    return rows.length;
  }
  const sum = rows.reduce((total, row) => total + numberValue(row, field), 0);
  // Groups are never empty, so the mean is always defined
  return reducer === 'mean' ? sum / rows.length : sum;
}

/**
 * Group records by the tuple of `groupFields` and apply each reducer per group
 * Only groups with records are emitted, ordered by key ascending
 */
export function aggregateByGroup(
  dataset: Dataset,
  groupFields: readonly string[],
  reducers: Readonly<Record<string, ReducerSpec>>
): AggregateView {
  const schema: Record<string, FieldKind> = {};
  for (const field of groupFields) {
    schema[field] = assertField(dataset.schema, field);
  }

  const outputs = Object.entries(reducers);
  for (const [name, spec] of outputs) {
    if (groupFields.includes(name)) {
      throw new InvalidPredicateError(name, 'output name collides with a group field');
    }
    assertField(dataset.schema, spec.field, spec.reducer === 'count' ? undefined : 'numeric');
    schema[name] = 'numeric';
  }

  const groups = new Map<string, { key: FieldValue[]; rows: DataRow[] }>();
  for (const row of dataset.records) {
    const key = groupFields.map(field => row[field]);
    // JSON keeps 1 and "1" apart
    const id = JSON.stringify(key);
    const group = groups.get(id);
    if (group) {
      group.rows.push(row);
    } else {
      groups.set(id, { key, rows: [row] });
    }
  }

  const records = Array.from(groups.values())
    .sort((a, b) => compareKeys(a.key, b.key))
    .map(({ key, rows }) => {
      const out: DataRow = {};
      groupFields.forEach((field, i) => {
        out[field] = key[i];
      });
      for (const [name, spec] of outputs) {
        out[name] = reduce(rows, spec);
      }
      return out;
    });

  return { schema, records };
}

/**
 * First day of the UTC month containing `value`, or null when it is not a date
 */
export function monthStart(value: FieldValue): number | null {
  const time = typeof value === 'number'
    ? value
    : Date.parse(/^\d{4}-\d{2}-\d{2}$/.test(value) ? `${value}T00:00:00Z` : value);
  if (Number.isNaN(time)) {
    return null;
  }
  const date = new Date(time);
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), 1);
}

/**
 * Mean of `valueField` per (group, calendar month)
 * Ordered by group, then month ascending; empty buckets are omitted
 */
export function aggregateByMonth(
  dataset: Dataset,
  groupField: string,
  dateField: string,
  valueField: string
): MonthlyTrendPoint[] {
  assertField(dataset.schema, groupField);
  assertField(dataset.schema, dateField, 'date');
  assertField(dataset.schema, valueField, 'numeric');

  const buckets = new Map<string, { group: FieldValue; month: number; sum: number; count: number }>();
  for (const row of dataset.records) {
    const month = monthStart(row[dateField]);
    if (month === null) continue;

    const group = row[groupField];
    const id = JSON.stringify([group, month]);
    const bucket = buckets.get(id);
    const value = numberValue(row, valueField);
    if (bucket) {
      bucket.sum += value;
      bucket.count++;
    } else {
      buckets.set(id, { group, month, sum: value, count: 1 });
    }
  }

  return Array.from(buckets.values())
    .sort((a, b) => compareValues(a.group, b.group) || a.month - b.month)
    .map(b => ({
      group: b.group,
      month: new Date(b.month).toISOString().slice(0, 10),
      mean: b.sum / b.count,
    }));
}

/**
 * Occurrences of each distinct value of `field`, ordered by value ascending
 */
export function valueCounts(dataset: Dataset, field: string): Map<FieldValue, number> {
  assertField(dataset.schema, field);

  const counts = new Map<FieldValue, number>();
  for (const row of dataset.records) {
    const value = row[field];
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  return new Map(Array.from(counts.entries()).sort((a, b) => compareValues(a[0], b[0])));
}

/**
 * Return rows ordered by a numeric field, largest first
 */
export function sortByValueDesc<T extends DataRow>(rows: readonly T[], field: string): T[] {
  return [...rows].sort((a, b) => numberValue(b, field) - numberValue(a, field));
}

/**
 * Headline totals for a sales roll-up
 * Average price per unit uses the division guard when no units were sold
 */
export function computeSalesKpis(
  summary: Dataset,
  revenueField = 'total_revenue',
  unitsField = 'total_units'
): SalesKpis {
  const [totals] = aggregateByGroup(summary, [], {
    total_revenue: { field: revenueField, reducer: 'sum' },
    total_units: { field: unitsField, reducer: 'sum' },
  }).records;

  const totalRevenue = totals ? numberValue(totals, 'total_revenue') : 0;
  const totalUnits = totals ? numberValue(totals, 'total_units') : 0;

  return {
    total_revenue: totalRevenue,
    total_units: totalUnits,
    avg_price_per_unit: safeDivide(totalRevenue, totalUnits),
    record_count: summary.records.length,
  };
}
