// API types - dashboard payload returned by /api/sales-data
import type { FilterState, SalesSummaryRow } from './core';
import type { MonthlyTrendPoint, NumericRange } from './dataset';

export interface SalesKpis {
  total_revenue: number;
  total_units: number;
  avg_price_per_unit: number;
  record_count: number;
}

export interface UnitsByCategoryRow {
  category: string;
  total_units: number;
}

export interface RevenueByRegionRow {
  region: string;
  total_revenue: number;
}

export interface PriceBucket {
  price_usd: number;
  count: number;
}

export interface FilterOptions {
  categories: string[];
  regions: string[];
  models: string[];
}

export interface DashboardData {
  filters: FilterState;
  kpis: SalesKpis;
  summary_rows: SalesSummaryRow[];
  units_by_category: UnitsByCategoryRow[];
  revenue_by_region: RevenueByRegionRow[];
  monthly_price_trend: MonthlyTrendPoint[];
  price_distribution: PriceBucket[];
  revenue_bounds: NumericRange | null;
  options: FilterOptions;
}

export interface DatasetInfo {
  rows: number;
  seed: number;
  generated_at: string;
}

export interface SalesDataResponse extends DashboardData {
  dataset: DatasetInfo;
}

export interface ErrorResponse {
  error: string;
  details?: string;
}
