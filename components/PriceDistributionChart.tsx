'use client';

import { BarChart, Bar, XAxis, YAxis, CartesianGrid, Tooltip, ResponsiveContainer } from 'recharts';
import type { PriceBucket } from '@/lib/types';
import { formatCurrency } from '@/lib/formatters';
import NoData from './NoData';

interface PriceDistributionChartProps {
  data: PriceBucket[];
  height?: number;
}

export default function PriceDistributionChart({ data, height = 260 }: PriceDistributionChartProps) {
  return (
    <div className="chart-card" data-testid="price-distribution">
      <h3>Sales by Unit Price</h3>
      {data.length === 0 ? (
        <NoData />
      ) : (
        <ResponsiveContainer width="100%" height={height}>
          <BarChart data={data} margin={{ top: 5, right: 20, left: 10, bottom: 5 }}>
            <CartesianGrid strokeDasharray="3 3" stroke="#e2e8f0" />
            <XAxis
              dataKey="price_usd"
              tickFormatter={(value: number) => formatCurrency(value)}
              stroke="#64748b"
              fontSize={12}
            />
            <YAxis allowDecimals={false} stroke="#64748b" fontSize={12} />
            <Tooltip labelFormatter={(label) => formatCurrency(Number(label))} />
            <Bar dataKey="count" name="Sales" fill="#10b981" />
          </BarChart>
        </ResponsiveContainer>
      )}
    </div>
  );
}
