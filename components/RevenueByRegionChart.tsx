'use client';

import { PieChart, Pie, Cell, Tooltip, Legend, ResponsiveContainer } from 'recharts';
import type { RevenueByRegionRow } from '@/lib/types';
import { formatCurrency } from '@/lib/formatters';
import NoData from './NoData';

interface RevenueByRegionChartProps {
  data: RevenueByRegionRow[];
  height?: number;
}

const REGION_COLORS = ['#3b82f6', '#10b981', '#f59e0b', '#ef4444', '#8b5cf6', '#64748b'];

/**
 * Donut of revenue share per region, largest slice first
 */
export default function RevenueByRegionChart({ data, height = 300 }: RevenueByRegionChartProps) {
  const ordered = [...data].sort((a, b) => b.total_revenue - a.total_revenue);

  return (
    <div className="chart-card" data-testid="revenue-by-region">
      <h3>Revenue Share by Region</h3>
      {ordered.length === 0 ? (
        <NoData message="No data to display in the chart." />
      ) : (
        <ResponsiveContainer width="100%" height={height}>
          <PieChart>
            <Pie
              data={ordered}
              dataKey="total_revenue"
              nameKey="region"
              innerRadius={50}
              outerRadius={120}
            >
              {ordered.map((row, index) => (
                <Cell key={row.region} fill={REGION_COLORS[index % REGION_COLORS.length]} />
              ))}
            </Pie>
            <Tooltip formatter={(value) => formatCurrency(Number(value))} />
            <Legend />
          </PieChart>
        </ResponsiveContainer>
      )}
    </div>
  );
}
