import { test, expect } from '@playwright/test';
import { GET, POST } from '@/app/api/refresh/route';
import { salesGenerator } from '@/lib/data';

const BASE_URL = 'http://localhost/api/refresh';

test.describe('Refresh API', () => {
  test.beforeEach(() => {
    process.env.DATASET_ROWS = '80';
    process.env.DATASET_SEED = '11';
    delete process.env.REFRESH_API_KEY;
    salesGenerator.clearCache();
  });

  test.afterAll(() => {
    delete process.env.DATASET_ROWS;
    delete process.env.DATASET_SEED;
    delete process.env.REFRESH_API_KEY;
    salesGenerator.clearCache();
  });

  test('POST regenerates the dataset without auth when no key is set', async () => {
    const response = await POST(new Request(BASE_URL, { method: 'POST' }));
    expect(response.status).toBe(200);

    const data = await response.json();
    expect(data.success).toBe(true);
    expect(data.message).toBe('Data refreshed successfully');
    expect(data.rows).toBe(80);
    expect(data.seed).toBe(11);
    expect(salesGenerator.cacheSize).toBe(1);
  });

  test('POST requires the bearer token when a key is set', async () => {
    process.env.REFRESH_API_KEY = 'test-secret';

    const missing = await POST(new Request(BASE_URL, { method: 'POST' }));
    expect(missing.status).toBe(401);
    expect(await missing.json()).toEqual({ error: 'Unauthorized' });

    const wrong = await POST(new Request(BASE_URL, {
      method: 'POST',
      headers: { authorization: 'Bearer not-it' },
    }));
    expect(wrong.status).toBe(401);

    const ok = await POST(new Request(BASE_URL, {
      method: 'POST',
      headers: { authorization: 'Bearer test-secret' },
    }));
    expect(ok.status).toBe(200);
  });

  test('GET describes the endpoint', async () => {
    const open = await (await GET()).json();
    expect(open).toEqual({
      endpoint: '/api/refresh',
      method: 'POST',
      description: 'Regenerates the cached sales dataset',
      auth: 'No auth configured',
    });

    process.env.REFRESH_API_KEY = 'test-secret';
    const secured = await (await GET()).json();
    expect(secured.auth).toBe('Bearer token required');
  });
});
