/**
 * Data utilities - generator, filters, aggregations, URL params
 * Re-exports all data transformation functions
 */

// Random sampling
export {
  createRandom,
  randomSeed,
  isValidSeed,
  SEED_LIMIT,
  categorical,
  roundedNormal,
  uniformInt,
  dayOffset,
} from './random';
export type { Random, Sampler } from './random';

// Generator
export { createDatasetGenerator, sampleDataset } from './generator';
export type { DatasetGenerator, DatasetSource, GenerateParams, GeneratedDataset } from './generator';

// Bike sales dataset
export {
  SALES_SCHEMA,
  SALES_SOURCE,
  salesGenerator,
  getSalesDataset,
  createSaleRecord,
  buildSalesSummary,
  toSummaryRows,
} from './sales';

// Filter functions
export {
  membership,
  minimum,
  filterDataset,
  fieldRange,
  distinctValues,
  clampToRange,
} from './filters';

// Aggregation functions
export {
  safeDivide,
  aggregateByGroup,
  aggregateByMonth,
  monthStart,
  valueCounts,
  sortByValueDesc,
  computeSalesKpis,
} from './aggregations';

// Dashboard pipeline
export {
  buildDimensionPredicates,
  buildPredicates,
  buildDashboard,
} from './pipeline';

// URL parameter utilities
export {
  EMPTY_FILTERS,
  parseCategoriesFromURL,
  parseRegionsFromURL,
  parseModelsFromURL,
  parseFiltersFromURL,
  buildFilterURL,
  parseFilterBody,
} from './url-params';
export type { FilterBodyResult } from './url-params';
