import { useState, useMemo, useCallback } from 'react';
import type { FieldValue } from './types';

export type SortDirection = 'asc' | 'desc' | null;

export interface SortState<C extends string> {
  column: C | null;
  direction: SortDirection;
}

export interface UseSortableTableResult<T, C extends string> {
  sortedData: T[];
  sortState: SortState<C>;
  handleSort: (column: C) => void;
  getSortDirection: (column: C) => SortDirection;
}

/**
 * Custom hook for sortable tables
 * Click 1: ascending, Click 2: descending, Click 3: back to input order
 */
export function useSortableTable<T, C extends string>(
  data: T[],
  getColumnValue: (item: T, column: C) => FieldValue | null | undefined
): UseSortableTableResult<T, C> {
  const [sortState, setSortState] = useState<SortState<C>>({
    column: null,
    direction: null,
  });

  const handleSort = useCallback((column: C) => {
    setSortState(prev => {
      if (prev.column !== column) {
        return { column, direction: 'asc' };
      }
      if (prev.direction === 'asc') {
        return { column, direction: 'desc' };
      }
      return { column: null, direction: null };
    });
  }, []);

  const getSortDirection = useCallback((column: C): SortDirection => {
    return sortState.column === column ? sortState.direction : null;
  }, [sortState]);

  const sortedData = useMemo(() => {
    const { column, direction } = sortState;
    if (!column || !direction) {
      return data;
    }
    const sign = direction === 'asc' ? 1 : -1;

    return [...data].sort((a, b) => {
      const aVal = getColumnValue(a, column);
      const bVal = getColumnValue(b, column);

      // Missing values sort first ascending, last descending
      if (aVal == null && bVal == null) return 0;
      if (aVal == null) return -sign;
      if (bVal == null) return sign;

      if (typeof aVal === 'number' && typeof bVal === 'number') {
        return (aVal - bVal) * sign;
      }
      return String(aVal).localeCompare(String(bVal)) * sign;
    });
  }, [data, sortState, getColumnValue]);

  return { sortedData, sortState, handleSort, getSortDirection };
}
