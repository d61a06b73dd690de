'use client';

import { useState, useEffect, Suspense } from 'react';
import { useRouter, useSearchParams } from 'next/navigation';
import type { ErrorResponse, FilterState, SalesDataResponse } from '@/lib/types';
import { ALL_BIKE_MODELS, ALL_CATEGORIES, ALL_REGIONS } from '@/lib/constants/dimensions';
import { buildFilterURL, parseFiltersFromURL } from '@/lib/data/url-params';
import { useFilters } from '@/lib/hooks/useFilters';
import DimensionFilter from '@/components/DimensionFilter';
import RevenueSlider from '@/components/RevenueSlider';
import SalesKPICards from '@/components/SalesKPICards';
import UnitsByCategoryChart from '@/components/UnitsByCategoryChart';
import RevenueByRegionChart from '@/components/RevenueByRegionChart';
import MonthlyTrendChart from '@/components/MonthlyTrendChart';
import PriceDistributionChart from '@/components/PriceDistributionChart';
import SalesTable from '@/components/SalesTable';

async function fetchSalesData(filters: FilterState, signal: AbortSignal): Promise<SalesDataResponse> {
  const response = await fetch('/api/sales-data', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(filters),
    signal,
  });
  if (!response.ok) {
    const body: ErrorResponse = await response.json();
    throw new Error(body.details ? `${body.error}: ${body.details}` : body.error);
  }
  return response.json();
}

function Dashboard() {
  const router = useRouter();
  const searchParams = useSearchParams();
  const { filters, setCategories, setRegions, setModels, setMinRevenue, resetFilters } =
    useFilters(parseFiltersFromURL(new URLSearchParams(searchParams.toString())));

  const [data, setData] = useState<SalesDataResponse | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [loading, setLoading] = useState(true);

  // Mirror filters into the URL and recompute on every change
  useEffect(() => {
    router.replace(buildFilterURL(filters), { scroll: false });

    const controller = new AbortController();
    setLoading(true);
    fetchSalesData(filters, controller.signal)
      .then((result) => {
        setData(result);
        setError(null);
      })
      .catch((err: unknown) => {
        if (controller.signal.aborted) return;
        console.error('Failed to load sales data:', err);
        setError(err instanceof Error ? err.message : String(err));
      })
      .finally(() => {
        if (!controller.signal.aborted) setLoading(false);
      });

    return () => controller.abort();
  }, [filters, router]);

  return (
    <div className="dashboard">
      <aside className="sidebar">
        <h2>Filter Sales Data</h2>
        <DimensionFilter
          label="Bike Category"
          allLabel="All Categories"
          options={ALL_CATEGORIES}
          selected={filters.categories}
          onChange={setCategories}
        />
        <DimensionFilter
          label="Region"
          allLabel="All Regions"
          options={ALL_REGIONS}
          selected={filters.regions}
          onChange={setRegions}
        />
        <DimensionFilter
          label="Bike Model"
          allLabel="All Models"
          options={ALL_BIKE_MODELS}
          selected={filters.models}
          onChange={setModels}
        />
        <RevenueSlider
          bounds={data?.revenue_bounds ?? null}
          value={filters.minRevenue}
          onChange={setMinRevenue}
        />
        <button className="reset-btn" onClick={resetFilters}>
          Reset Filters
        </button>
        {data && (
          <p className="dataset-info">
            {data.dataset.rows} generated sales (seed {data.dataset.seed})
          </p>
        )}
      </aside>

      <main className="content">
        <h1>Bikeroom Sales Dashboard</h1>
        <p className="intro">
          Sales analysis on generated bicycle data. Use the sidebar filters to explore revenue
          and unit sales by category and region.
        </p>

        {error && <div className="error-banner">{error}</div>}
        {loading && !data && <p className="loading">Loading sales data...</p>}

        {data && (
          <>
            <h2>Key Performance Indicators</h2>
            <SalesKPICards kpis={data.kpis} />

            <h2>Sales Distribution</h2>
            <div className="chart-grid">
              <UnitsByCategoryChart data={data.units_by_category} />
              <RevenueByRegionChart data={data.revenue_by_region} />
            </div>

            <h2>Price Trends</h2>
            <MonthlyTrendChart data={data.monthly_price_trend} />
            <PriceDistributionChart data={data.price_distribution} />

            <SalesTable rows={data.summary_rows} />
          </>
        )}
      </main>
    </div>
  );
}

export default function Home() {
  return (
    <Suspense fallback={<p className="loading">Loading...</p>}>
      <Dashboard />
    </Suspense>
  );
}
