/**
 * Dashboard pipeline: filter state -> predicates -> aggregate views
 * Recomputed on every filter change; nothing here is cached
 */

import type {
  DashboardData,
  Dataset,
  FilterState,
  Predicate,
  PriceBucket,
  SaleRecord,
} from '../types';
import {
  aggregateByGroup,
  aggregateByMonth,
  computeSalesKpis,
  sortByValueDesc,
  valueCounts,
} from './aggregations';
import { distinctValues, fieldRange, filterDataset, membership, minimum } from './filters';
import { buildSalesSummary, toSummaryRows } from './sales';
import { numberValue, stringValue } from './schema';

/**
 * Membership predicates for the selected dimensions
 * These apply to both raw sales and the summary roll-up
 */
export function buildDimensionPredicates(filters: FilterState): Predicate[] {
  const predicates: Predicate[] = [];
  if (filters.categories.length > 0) {
    predicates.push(membership('category', filters.categories));
  }
  if (filters.regions.length > 0) {
    predicates.push(membership('region', filters.regions));
  }
  if (filters.models.length > 0) {
    predicates.push(membership('bike_model', filters.models));
  }
  return predicates;
}

/**
 * All predicates for the summary roll-up, including the revenue threshold
 */
export function buildPredicates(filters: FilterState): Predicate[] {
  const predicates = buildDimensionPredicates(filters);
  if (filters.minRevenue !== null) {
    predicates.push(minimum('total_revenue', filters.minRevenue));
  }
  return predicates;
}

/**
 * Run the full pipeline for one filter state
 */
export function buildDashboard(sales: Dataset<SaleRecord>, filters: FilterState): DashboardData {
  const summary = buildSalesSummary(sales);
  const filteredSummary = filterDataset(summary, buildPredicates(filters));

  // Trend and distribution read raw sales; the revenue threshold is a roll-up measure
  const filteredSales = filterDataset(sales, buildDimensionPredicates(filters));

  const unitsByCategory = sortByValueDesc(
    aggregateByGroup(filteredSummary, ['category'], {
      total_units: { field: 'total_units', reducer: 'sum' },
    }).records,
    'total_units'
  );

  const revenueByRegion = aggregateByGroup(filteredSummary, ['region'], {
    total_revenue: { field: 'total_revenue', reducer: 'sum' },
  }).records;

  const priceDistribution: PriceBucket[] = Array.from(
    valueCounts(filteredSales, 'price_usd'),
    ([price, count]) => ({ price_usd: Number(price), count })
  );

  return {
    filters,
    kpis: computeSalesKpis(filteredSummary),
    summary_rows: toSummaryRows(filteredSummary),
    units_by_category: unitsByCategory.map(row => ({
      category: stringValue(row, 'category'),
      total_units: numberValue(row, 'total_units'),
    })),
    revenue_by_region: revenueByRegion.map(row => ({
      region: stringValue(row, 'region'),
      total_revenue: numberValue(row, 'total_revenue'),
    })),
    monthly_price_trend: aggregateByMonth(filteredSales, 'category', 'date', 'price_usd'),
    price_distribution: priceDistribution,
    revenue_bounds: fieldRange(summary, 'total_revenue'),
    // Options come from the unfiltered roll-up, like the sidebar's multiselects
    options: {
      categories: distinctValues(summary, 'category').map(String),
      regions: distinctValues(summary, 'region').map(String),
      models: distinctValues(summary, 'bike_model').map(String),
    },
  };
}
