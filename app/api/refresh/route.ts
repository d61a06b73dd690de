import { NextResponse } from 'next/server';
import { loadConfig } from '@/lib/config';
import { errorMessage } from '@/lib/errors';
import { getSalesDataset, salesGenerator } from '@/lib/data';

export const dynamic = 'force-dynamic';

export async function POST(request: Request) {
  // Check for API key if configured
  const { refreshApiKey } = loadConfig();
  if (refreshApiKey) {
    const authHeader = request.headers.get('authorization');
    if (authHeader !== `Bearer ${refreshApiKey}`) {
      return NextResponse.json(
        { error: 'Unauthorized' },
        { status: 401 }
      );
    }
  }

  try {
    // Drop the cached sample and draw a new one (same seed reproduces the same data)
    salesGenerator.clearCache();
    const sales = getSalesDataset();

    return NextResponse.json({
      success: true,
      message: 'Data refreshed successfully',
      rows: sales.records.length,
      seed: sales.seed,
      timestamp: sales.generatedAt,
    });
  } catch (error) {
    console.error('Refresh error:', error);
    return NextResponse.json(
      {
        error: 'Failed to refresh data',
        details: errorMessage(error),
      },
      { status: 500 }
    );
  }
}

export async function GET() {
  return NextResponse.json({
    endpoint: '/api/refresh',
    method: 'POST',
    description: 'Regenerates the cached sales dataset',
    auth: loadConfig().refreshApiKey ? 'Bearer token required' : 'No auth configured',
  });
}
