/**
 * Seeded random sampling for synthetic datasets
 * Every generator call owns its own Random, so no state leaks between calls
 */

import { randomInt } from 'node:crypto';
import { DatasetConfigError } from '../errors';

/** Uniform float in [0, 1) */
export type Random = () => number;

/** Draws one field value from a Random */
export type Sampler<T> = (random: Random) => T;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Seeds are 32-bit: valid seeds are integers in [0, SEED_LIMIT) */
export const SEED_LIMIT = 2 ** 32;

export function isValidSeed(seed: number): boolean {
  return Number.isInteger(seed) && seed >= 0 && seed < SEED_LIMIT;
}

/**
 * Create a mulberry32 generator for a 32-bit seed
 */
export function createRandom(seed: number): Random {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Fresh 32-bit seed from the OS entropy source
 */
export function randomSeed(): number {
  return randomInt(SEED_LIMIT);
}

/**
 * Standard normal draw (Box-Muller)
 */
export function standardNormal(random: Random): number {
  const u1 = 1 - random(); // (0, 1], keeps log finite
  const u2 = random();
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

/**
 * Categorical sampler over a fixed vocabulary
 * Without weights every value is equally likely
 */
export function categorical<T extends string>(
  values: readonly T[],
  weights?: readonly number[]
): Sampler<T> {
  if (values.length === 0) {
    throw new DatasetConfigError('Categorical vocabulary must not be empty');
  }

  if (!weights) {
    return random => values[Math.floor(random() * values.length)];
  }

  if (weights.length !== values.length) {
    throw new DatasetConfigError(
      `Expected ${values.length} weights, got ${weights.length}`
    );
  }
  if (weights.some(w => !Number.isFinite(w) || w < 0)) {
    throw new DatasetConfigError('Weights must be non-negative numbers');
  }
  const total = weights.reduce((sum, w) => sum + w, 0);
  if (Math.abs(total - 1) > 1e-6) {
    throw new DatasetConfigError(`Weights must sum to 1, got ${total}`);
  }

  const cumulative: number[] = [];
  let running = 0;
  let lastPositive = 0;
  weights.forEach((w, i) => {
    running += w;
    cumulative.push(running);
    if (w > 0) lastPositive = i;
  });

  return random => {
    const u = random();
    const index = cumulative.findIndex(edge => u < edge);
    // Weights summing just under 1 can leave u above the last edge
    return values[index === -1 ? lastPositive : index];
  };
}

export interface RoundedNormalSpec {
  mean: number;
  stdDev: number;
  step: number;
  min: number;
  max: number;
}

/**
 * Normal draw rounded to the nearest multiple of `step`, then clamped to [min, max]
 */
export function roundedNormal({ mean, stdDev, step, min, max }: RoundedNormalSpec): Sampler<number> {
  if (min > max) {
    throw new DatasetConfigError(`Invalid bounds [${min}, ${max}]`);
  }
  if (step <= 0) {
    throw new DatasetConfigError(`Rounding step must be positive, got ${step}`);
  }

  return random => {
    const rounded = Math.round((mean + stdDev * standardNormal(random)) / step) * step;
    return Math.min(max, Math.max(min, rounded));
  };
}

/**
 * Uniform integer in [min, max], both ends inclusive
 */
export function uniformInt(min: number, max: number): Sampler<number> {
  if (!Number.isInteger(min) || !Number.isInteger(max) || min > max) {
    throw new DatasetConfigError(`Invalid integer range [${min}, ${max}]`);
  }
  return random => min + Math.floor(random() * (max - min + 1));
}

/**
 * Epoch date plus a uniform day offset in [0, spanDays), as YYYY-MM-DD
 */
export function dayOffset(epoch: string, spanDays: number): Sampler<string> {
  const start = Date.parse(`${epoch}T00:00:00Z`);
  if (Number.isNaN(start)) {
    throw new DatasetConfigError(`Invalid epoch date "${epoch}"`);
  }
  const offset = uniformInt(0, spanDays - 1);
  return random => new Date(start + offset(random) * MS_PER_DAY).toISOString().slice(0, 10);
}
