import { useState, useCallback } from 'react';
import type { BikeModel, Category, FilterState, Region } from '@/lib/types';
import { EMPTY_FILTERS } from '@/lib/data/url-params';

export interface UseFiltersResult {
  filters: FilterState;
  setCategories: (categories: Category[]) => void;
  setRegions: (regions: Region[]) => void;
  setModels: (models: BikeModel[]) => void;
  setMinRevenue: (minRevenue: number | null) => void;
  resetFilters: () => void;
}

/**
 * Custom hook for managing dashboard filter state
 */
export function useFilters(
  initialFilters: Partial<FilterState> = {}
): UseFiltersResult {
  const [filters, setFilters] = useState<FilterState>({
    ...EMPTY_FILTERS,
    ...initialFilters,
  });

  const update = useCallback((patch: Partial<FilterState>) => {
    setFilters(prev => ({ ...prev, ...patch }));
  }, []);

  const setCategories = useCallback((categories: Category[]) => update({ categories }), [update]);
  const setRegions = useCallback((regions: Region[]) => update({ regions }), [update]);
  const setModels = useCallback((models: BikeModel[]) => update({ models }), [update]);
  const setMinRevenue = useCallback((minRevenue: number | null) => update({ minRevenue }), [update]);
  const resetFilters = useCallback(() => update(EMPTY_FILTERS), [update]);

  return {
    filters,
    setCategories,
    setRegions,
    setModels,
    setMinRevenue,
    resetFilters,
  };
}
