/**
 * Server-side configuration read from the environment
 * DATASET_ROWS   - number of generated sales (default 1000)
 * DATASET_SEED   - integer seed for a reproducible dataset (default: random per process)
 * REFRESH_API_KEY - bearer token required by POST /api/refresh when set
 */

import { DEFAULT_ROW_COUNT } from './constants/dimensions';
import { isValidSeed } from './data/random';

export interface AppConfig {
  datasetRows: number;
  datasetSeed: number | undefined;
  refreshApiKey: string | undefined;
}

function parseInteger(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    console.error(`Config: ignoring ${name}=${raw} (not an integer)`);
    return undefined;
  }
  return value;
}

function parseSeed(raw: string | undefined): number | undefined {
  const seed = parseInteger('DATASET_SEED', raw);
  if (seed !== undefined && !isValidSeed(seed)) {
    console.error(`Config: ignoring DATASET_SEED=${raw} (outside [0, 2^32))`);
    return undefined;
  }
  return seed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const rows = parseInteger('DATASET_ROWS', env.DATASET_ROWS);
  return {
    datasetRows: rows !== undefined && rows >= 0 ? rows : DEFAULT_ROW_COUNT,
    datasetSeed: parseSeed(env.DATASET_SEED),
    refreshApiKey: env.REFRESH_API_KEY || undefined,
  };
}
