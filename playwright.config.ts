import { defineConfig } from '@playwright/test';

// Unit and route-handler tests run in-process: no browser, no server
export default defineConfig({
  testDir: './tests',
  timeout: 30000,
  fullyParallel: false,
  retries: 0,
  workers: 1,
  outputDir: 'tests/test-results',
  projects: [
    // Data pipeline tests
    {
      name: 'unit',
      testDir: './tests/unit',
    },
    // API route handler tests
    {
      name: 'api',
      testDir: './tests/api',
    },
  ],
});
