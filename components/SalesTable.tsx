'use client';

import type { SalesSummaryRow } from '@/lib/types';
import { formatCurrency, formatNumber } from '@/lib/formatters';
import { useSortableTable } from '@/lib/useSortableTable';
import SortableHeader from './SortableHeader';
import NoData from './NoData';

interface SalesTableProps {
  rows: SalesSummaryRow[];
}

type SalesColumn = keyof SalesSummaryRow;

const COLUMNS: { column: SalesColumn; label: string; numeric: boolean }[] = [
  { column: 'bike_model', label: 'Bike Model', numeric: false },
  { column: 'category', label: 'Category', numeric: false },
  { column: 'region', label: 'Region', numeric: false },
  { column: 'total_units', label: 'Total Units', numeric: true },
  { column: 'total_revenue', label: 'Total Revenue', numeric: true },
];

function getColumnValue(row: SalesSummaryRow, column: SalesColumn): string | number {
  return row[column];
}

export default function SalesTable({ rows }: SalesTableProps) {
  const { sortedData, handleSort, getSortDirection } = useSortableTable(rows, getColumnValue);

  return (
    <div className="table-card">
      <h2>Detailed Sales Records</h2>
      <p>
        <strong>Showing {rows.length} records</strong> (aggregated by Model, Category, and Region).
      </p>
      {rows.length === 0 ? (
        <NoData />
      ) : (
        <div className="table-scroll">
          <table className="sales-table">
            <thead>
              <tr>
                {COLUMNS.map(({ column, label, numeric }) => (
                  <SortableHeader
                    key={column}
                    label={label}
                    column={column}
                    sortDirection={getSortDirection(column)}
                    onSort={handleSort}
                    align={numeric ? 'right' : 'left'}
                  />
                ))}
              </tr>
            </thead>
            <tbody>
              {sortedData.map(row => (
                <tr key={`${row.bike_model}|${row.category}|${row.region}`}>
                  <td>{row.bike_model}</td>
                  <td>{row.category}</td>
                  <td>{row.region}</td>
                  <td className="num">{formatNumber(row.total_units)}</td>
                  <td className="num">{formatCurrency(row.total_revenue)}</td>
                </tr>
              ))}
            </tbody>
          </table>
        </div>
      )}
    </div>
  );
}
