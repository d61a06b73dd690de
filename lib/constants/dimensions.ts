/**
 * Centralized dimension vocabularies - Single source of truth
 * Used by: dataset generator, API routes, frontend filters
 */

import type { BikeModel, Category, Region } from '../types';

// Bike models, sampled with non-uniform weights
export const ALL_BIKE_MODELS: BikeModel[] = [
  'Speedster 3000',
  'Trail King Pro',
  'City Commuter E-3',
  'Gravel Explorer',
  'Aero Blade Race',
];
export const BIKE_MODEL_WEIGHTS: number[] = [0.25, 0.20, 0.30, 0.15, 0.10];

// Categories and regions are sampled uniformly
export const ALL_CATEGORIES: Category[] = ['Road', 'Mountain', 'City', 'Electric', 'BMX'];
export const ALL_REGIONS: Region[] = ['North America', 'Europe', 'Asia', 'Oceania'];

// Price: normal around 1800 USD, rounded to tens, then clamped
export const PRICE_DISTRIBUTION = {
  MEAN: 1800,
  STD_DEV: 700,
  STEP: 10,
  MIN: 500,
  MAX: 6000,
} as const;

// Units per sale: uniform integer, both ends inclusive
export const UNITS_RANGE = {
  MIN: 1,
  MAX: 49,
} as const;

// Sale dates fall within one calendar year from the epoch
export const DATE_RANGE = {
  EPOCH: '2024-01-01',
  SPAN_DAYS: 365,
} as const;

export const DEFAULT_ROW_COUNT = 1000;

export function isBikeModel(value: string): value is BikeModel {
  return ALL_BIKE_MODELS.some(m => m === value);
}

export function isCategory(value: string): value is Category {
  return ALL_CATEGORIES.some(c => c === value);
}

export function isRegion(value: string): value is Region {
  return ALL_REGIONS.some(r => r === value);
}
