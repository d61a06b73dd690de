'use client';

import {
  BarChart,
  Bar,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  ResponsiveContainer,
} from 'recharts';
import type { UnitsByCategoryRow } from '@/lib/types';
import { formatNumber } from '@/lib/formatters';
import NoData from './NoData';

interface UnitsByCategoryChartProps {
  data: UnitsByCategoryRow[];
  height?: number;
}

// Rows arrive sorted by units, largest first
export default function UnitsByCategoryChart({ data, height = 300 }: UnitsByCategoryChartProps) {
  return (
    <div className="chart-card" data-testid="units-by-category">
      <h3>Total Units Sold by Bike Category</h3>
      {data.length === 0 ? (
        <NoData message="No data matches the current filter criteria for charting." />
      ) : (
        <ResponsiveContainer width="100%" height={height}>
          <BarChart data={data} margin={{ top: 5, right: 20, left: 10, bottom: 5 }}>
            <CartesianGrid strokeDasharray="3 3" stroke="#e2e8f0" />
            <XAxis dataKey="category" stroke="#64748b" fontSize={12} />
            <YAxis
              tickFormatter={(value: number) => formatNumber(value)}
              stroke="#64748b"
              fontSize={12}
            />
            <Tooltip formatter={(value) => formatNumber(Number(value))} />
            <Bar dataKey="total_units" name="Total Units" fill="#3b82f6" radius={[4, 4, 0, 0]} />
          </BarChart>
        </ResponsiveContainer>
      )}
    </div>
  );
}
