/**
 * Bike sales dataset: record sampling, the shared generator and the
 * model/category/region roll-up the dashboard filters on
 */

import type { AggregateView, Dataset, FieldKind, SaleRecord, SalesSummaryRow } from '../types';
import {
  ALL_BIKE_MODELS,
  ALL_CATEGORIES,
  ALL_REGIONS,
  BIKE_MODEL_WEIGHTS,
  DATE_RANGE,
  PRICE_DISTRIBUTION,
  UNITS_RANGE,
} from '../constants/dimensions';
import { loadConfig } from '../config';
import { aggregateByGroup } from './aggregations';
import { createDatasetGenerator, type DatasetSource, type GeneratedDataset } from './generator';
import { categorical, dayOffset, roundedNormal, uniformInt, type Random } from './random';
import { numberValue, stringValue } from './schema';

export const SALES_SCHEMA = {
  bike_model: 'categorical',
  category: 'categorical',
  region: 'categorical',
  price_usd: 'numeric',
  units_sold: 'numeric',
  total_sales_usd: 'numeric',
  date: 'date',
} as const satisfies Record<keyof SaleRecord, FieldKind>;

// Each field is drawn independently of the others
const sampleModel = categorical(ALL_BIKE_MODELS, BIKE_MODEL_WEIGHTS);
const sampleCategory = categorical(ALL_CATEGORIES);
const sampleRegion = categorical(ALL_REGIONS);
const samplePrice = roundedNormal({
  mean: PRICE_DISTRIBUTION.MEAN,
  stdDev: PRICE_DISTRIBUTION.STD_DEV,
  step: PRICE_DISTRIBUTION.STEP,
  min: PRICE_DISTRIBUTION.MIN,
  max: PRICE_DISTRIBUTION.MAX,
});
const sampleUnits = uniformInt(UNITS_RANGE.MIN, UNITS_RANGE.MAX);
const sampleDate = dayOffset(DATE_RANGE.EPOCH, DATE_RANGE.SPAN_DAYS);

export function createSaleRecord(random: Random): SaleRecord {
  const bike_model = sampleModel(random);
  const category = sampleCategory(random);
  const price_usd = samplePrice(random);
  const units_sold = sampleUnits(random);
  const region = sampleRegion(random);
  const date = sampleDate(random);

  return {
    bike_model,
    category,
    region,
    price_usd,
    units_sold,
    total_sales_usd: price_usd * units_sold,
    date,
  };
}

export const SALES_SOURCE: DatasetSource<SaleRecord> = {
  name: 'bike-sales',
  schema: SALES_SCHEMA,
  createRecord: createSaleRecord,
  sortBy: 'date',
};

export const salesGenerator = createDatasetGenerator(SALES_SOURCE);

/**
 * Sales dataset for this process, sized and seeded from the environment
 */
export function getSalesDataset(): GeneratedDataset<SaleRecord> {
  const { datasetRows, datasetSeed } = loadConfig();
  return salesGenerator.generate({ rows: datasetRows, seed: datasetSeed });
}

/**
 * Total units and revenue per (bike_model, category, region)
 */
export function buildSalesSummary(sales: Dataset<SaleRecord>): AggregateView {
  return aggregateByGroup(sales, ['bike_model', 'category', 'region'], {
    total_units: { field: 'units_sold', reducer: 'sum' },
    total_revenue: { field: 'total_sales_usd', reducer: 'sum' },
  });
}

export function toSummaryRows(summary: AggregateView): SalesSummaryRow[] {
  return summary.records.map(row => ({
    bike_model: stringValue(row, 'bike_model'),
    category: stringValue(row, 'category'),
    region: stringValue(row, 'region'),
    total_units: numberValue(row, 'total_units'),
    total_revenue: numberValue(row, 'total_revenue'),
  }));
}
