'use client';

import type { SortDirection } from '@/lib/useSortableTable';

interface SortableHeaderProps<C extends string> {
  label: string;
  column: C;
  sortDirection: SortDirection;
  onSort: (column: C) => void;
  align?: 'left' | 'right';
}

/**
 * Table header cell that cycles its column's sort on click
 */
export default function SortableHeader<C extends string>({
  label,
  column,
  sortDirection,
  onSort,
  align = 'left',
}: SortableHeaderProps<C>) {
  return (
    <th
      className="sortable-header"
      style={{ textAlign: align }}
      aria-sort={sortDirection === 'asc' ? 'ascending' : sortDirection === 'desc' ? 'descending' : 'none'}
      onClick={() => onSort(column)}
    >
      {label}
      {sortDirection && (
        <span className="sort-arrow">{sortDirection === 'asc' ? ' ▲' : ' ▼'}</span>
      )}
    </th>
  );
}
