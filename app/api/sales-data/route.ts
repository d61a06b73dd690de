import { NextResponse } from 'next/server';
import type { SalesDataResponse, FilterState } from '@/lib/types';
import { InvalidPredicateError, DatasetConfigError, errorMessage } from '@/lib/errors';
import { buildDashboard, getSalesDataset, parseFilterBody, parseFiltersFromURL } from '@/lib/data';

export const dynamic = 'force-dynamic';

/**
 * Bike Sales Dashboard API
 *
 * Runs the generate -> filter -> aggregate pipeline for one filter state:
 * - GET  /api/sales-data?category=Road,City&region=ALL&model=ALL&minRevenue=5000
 * - POST /api/sales-data  { categories, regions, models, minRevenue }
 *
 * The dataset is generated once per process (see DATASET_ROWS / DATASET_SEED)
 * and every request recomputes the filtered views.
 */
function respond(filters: FilterState) {
  try {
    const sales = getSalesDataset();
    const body: SalesDataResponse = {
      ...buildDashboard(sales, filters),
      dataset: {
        rows: sales.records.length,
        seed: sales.seed,
        generated_at: sales.generatedAt,
      },
    };
    return NextResponse.json(body);
  } catch (error) {
    if (error instanceof InvalidPredicateError) {
      return NextResponse.json({ error: error.message }, { status: 400 });
    }
    console.error('Sales data API error:', error);
    return NextResponse.json(
      {
        error: error instanceof DatasetConfigError ? 'Invalid dataset configuration' : 'Failed to build dashboard',
        details: errorMessage(error),
      },
      { status: 500 }
    );
  }
}

export async function GET(request: Request) {
  const { searchParams } = new URL(request.url);
  return respond(parseFiltersFromURL(searchParams));
}

export async function POST(request: Request) {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return NextResponse.json({ error: 'Request body must be valid JSON' }, { status: 400 });
  }

  const parsed = parseFilterBody(body);
  if (!parsed.ok) {
    return NextResponse.json({ error: parsed.error }, { status: 400 });
  }
  return respond(parsed.filters);
}
