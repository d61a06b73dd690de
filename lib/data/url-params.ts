/**
 * URL parameter parsing and building utilities
 * For managing filter state in URL search params and request bodies
 */

import type { BikeModel, Category, FilterState, Region } from '../types';
import { isBikeModel, isCategory, isRegion } from '../constants/dimensions';

/** No dimension selected and no revenue threshold */
export const EMPTY_FILTERS: FilterState = {
  categories: [],
  regions: [],
  models: [],
  minRevenue: null,
};

/**
 * Parse a comma-separated list param, keeping only known values
 * No param or 'ALL' means no filter applied
 */
function parseListParam<T extends string>(
  searchParams: URLSearchParams,
  name: string,
  isKnown: (value: string) => value is T
): T[] {
  const param = searchParams.get(name);
  if (!param || param === 'ALL') {
    return [];
  }
  return param.split(',').map(v => v.trim()).filter(isKnown);
}

/**
 * Parse minimum revenue; missing or non-numeric means no threshold
 */
function parseMinRevenue(searchParams: URLSearchParams): number | null {
  const param = searchParams.get('minRevenue');
  if (param === null || param.trim() === '') {
    return null;
  }
  const value = Number(param);
  return Number.isFinite(value) ? value : null;
}

export function parseCategoriesFromURL(searchParams: URLSearchParams): Category[] {
  return parseListParam(searchParams, 'category', isCategory);
}

export function parseRegionsFromURL(searchParams: URLSearchParams): Region[] {
  return parseListParam(searchParams, 'region', isRegion);
}

export function parseModelsFromURL(searchParams: URLSearchParams): BikeModel[] {
  return parseListParam(searchParams, 'model', isBikeModel);
}

/**
 * Parse the full filter state from URL search params
 */
export function parseFiltersFromURL(searchParams: URLSearchParams): FilterState {
  return {
    categories: parseCategoriesFromURL(searchParams),
    regions: parseRegionsFromURL(searchParams),
    models: parseModelsFromURL(searchParams),
    minRevenue: parseMinRevenue(searchParams),
  };
}

/**
 * Build URL search params from all filters
 */
export function buildFilterURL(filters: FilterState): string {
  const params = new URLSearchParams();

  params.set('category', filters.categories.length === 0 ? 'ALL' : filters.categories.join(','));
  params.set('region', filters.regions.length === 0 ? 'ALL' : filters.regions.join(','));
  params.set('model', filters.models.length === 0 ? 'ALL' : filters.models.join(','));

  if (filters.minRevenue !== null) {
    params.set('minRevenue', String(filters.minRevenue));
  }

  return `?${params.toString()}`;
}

export type FilterBodyResult =
  | { ok: true; filters: FilterState }
  | { ok: false; error: string };

function readList<T extends string>(
  body: Record<string, unknown>,
  name: string,
  isKnown: (value: string) => value is T
): T[] | string {
  const value = body[name];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    return `${name} must be an array of strings`;
  }
  return value.filter(isKnown);
}

/**
 * Validate a JSON request body into a filter state
 * Unknown dimension values are dropped, as in the URL parser
 */
export function parseFilterBody(body: unknown): FilterBodyResult {
  if (body === null || typeof body !== 'object' || Array.isArray(body)) {
    return { ok: false, error: 'Request body must be a JSON object' };
  }
  const fields: Record<string, unknown> = { ...body };

  const categories = readList(fields, 'categories', isCategory);
  if (typeof categories === 'string') return { ok: false, error: categories };
  const regions = readList(fields, 'regions', isRegion);
  if (typeof regions === 'string') return { ok: false, error: regions };
  const models = readList(fields, 'models', isBikeModel);
  if (typeof models === 'string') return { ok: false, error: models };

  let minRevenue: number | null = null;
  const rawMin = fields.minRevenue;
  if (rawMin !== undefined && rawMin !== null) {
    if (typeof rawMin !== 'number' || !Number.isFinite(rawMin)) {
      return { ok: false, error: 'minRevenue must be a finite number or null' };
    }
    minRevenue = rawMin;
  }

  return { ok: true, filters: { categories, regions, models, minRevenue } };
}
