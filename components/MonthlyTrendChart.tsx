'use client';

import {
  LineChart,
  Line,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  Legend,
  ResponsiveContainer,
} from 'recharts';
import type { MonthlyTrendPoint } from '@/lib/types';
import { formatCurrency, formatMonth } from '@/lib/formatters';
import NoData from './NoData';

interface MonthlyTrendChartProps {
  data: MonthlyTrendPoint[];
  title?: string;
  height?: number;
}

type MonthRow = { month: string } & Record<string, number | string>;

const SERIES_COLORS = ['#3b82f6', '#10b981', '#f59e0b', '#ef4444', '#8b5cf6', '#0ea5e9'];

/**
 * Pivot (group, month, mean) points into one row per month with a column per group
 * Missing buckets stay absent so lines skip them instead of dropping to zero
 */
function pivotByMonth(points: MonthlyTrendPoint[]): { rows: MonthRow[]; groups: string[] } {
  const rows = new Map<string, MonthRow>();
  const groups: string[] = [];

  for (const point of points) {
    const group = String(point.group);
    if (!groups.includes(group)) groups.push(group);

    const row = rows.get(point.month) ?? { month: point.month };
    row[group] = point.mean;
    rows.set(point.month, row);
  }

  return {
    rows: Array.from(rows.values()).sort((a, b) => a.month.localeCompare(b.month)),
    groups,
  };
}

export default function MonthlyTrendChart({
  data,
  title = 'Average Price per Month by Category',
  height = 320,
}: MonthlyTrendChartProps) {
  const { rows, groups } = pivotByMonth(data);

  return (
    <div className="chart-card trend-chart" data-testid="monthly-trend">
      <h3>{title}</h3>
      {rows.length === 0 ? (
        <NoData />
      ) : (
        <ResponsiveContainer width="100%" height={height}>
          <LineChart data={rows} margin={{ top: 5, right: 30, left: 20, bottom: 5 }}>
            <CartesianGrid strokeDasharray="3 3" stroke="#e2e8f0" />
            <XAxis dataKey="month" tickFormatter={formatMonth} stroke="#64748b" fontSize={12} />
            <YAxis
              tickFormatter={(value: number) => formatCurrency(value)}
              stroke="#64748b"
              fontSize={12}
              width={80}
            />
            <Tooltip
              labelFormatter={(label) => formatMonth(String(label))}
              formatter={(value) => formatCurrency(Number(value))}
            />
            <Legend />
            {groups.map((group, index) => (
              <Line
                key={group}
                type="monotone"
                dataKey={group}
                name={group}
                stroke={SERIES_COLORS[index % SERIES_COLORS.length]}
                strokeWidth={2}
                dot={{ r: 3 }}
                activeDot={{ r: 5 }}
                connectNulls
              />
            ))}
          </LineChart>
        </ResponsiveContainer>
      )}
    </div>
  );
}
