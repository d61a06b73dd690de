'use client';

import type { NumericRange } from '@/lib/types';
import { formatCurrency } from '@/lib/formatters';
import { clampToRange } from '@/lib/data/filters';

interface RevenueSliderProps {
  bounds: NumericRange | null;
  value: number | null;
  onChange: (value: number | null) => void;
}

/**
 * Minimum total revenue slider
 * Sitting at the lower bound is reported as "no threshold"
 */
export default function RevenueSlider({ bounds, value, onChange }: RevenueSliderProps) {
  if (!bounds) {
    return null;
  }

  const threshold = value ?? bounds.min;
  // A threshold from the URL may lie outside the current bounds
  const position = clampToRange(threshold, bounds);

  return (
    <div className="filter-group">
      <label className="filter-label" htmlFor="min-revenue">
        Minimum Total Revenue: <strong>{formatCurrency(threshold)}</strong>
      </label>
      <input
        id="min-revenue"
        type="range"
        min={bounds.min}
        max={bounds.max}
        step={1}
        value={position}
        onChange={(e) => {
          const next = Number(e.target.value);
          onChange(next <= bounds.min ? null : next);
        }}
      />
      <div className="slider-bounds">
        <span>{formatCurrency(bounds.min)}</span>
        <span>{formatCurrency(bounds.max)}</span>
      </div>
    </div>
  );
}
