/**
 * Sample data generation.
 *
 * Fills a store with synthetic records drawn from a SampleDataConfig.
 * Inserts that the store rejects (an identifier already in use) are
 * skipped and counted, never raised.
 */

import { DEFAULT_SAMPLE_CONFIG, type SampleDataConfig } from "../config/sample/index.js";
import type { Logger } from "../logging/index.js";
import type { RecordStore } from "./store.js";

/**
 * Uniform random source in [0, 1).
 */
export type RandomSource = () => number;

export interface SampleOptions {
  /** Pools and ranges to draw from (default: DEFAULT_SAMPLE_CONFIG) */
  config?: Readonly<SampleDataConfig>;
  /** Random source (default: Math.random) */
  random?: RandomSource;
  logger?: Logger;
}

export interface SampleResult {
  requested: number;
  inserted: number;
  skipped: number;
}

function pick<T>(pool: readonly T[], random: RandomSource): T {
  const index = Math.min(Math.floor(random() * pool.length), pool.length - 1);
  const item = pool[index];
  if (item === undefined) {
    throw new RangeError("Cannot pick from an empty pool");
  }
  return item;
}

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Insert `count` generated records into `store`.
 *
 * Record i gets identifier `idBase + i`, a "<first> <last>" name, a score
 * drawn uniformly from the configured range and a category from the pool.
 */
export function generateSampleData(
  store: RecordStore,
  count: number,
  options: SampleOptions = {}
): SampleResult {
  const config = options.config ?? DEFAULT_SAMPLE_CONFIG;
  const random = options.random ?? Math.random;
  const { min, max } = config.scoreRange;
  const requested = Number.isFinite(count) ? Math.max(Math.floor(count), 0) : 0;

  let inserted = 0;
  let skipped = 0;

  for (let i = 0; i < requested; i++) {
    const id = config.idBase + i;
    const name = `${pick(config.firstNames, random)} ${pick(config.lastNames, random)}`;
    const score = roundTo(min + random() * (max - min), config.scoreDecimals);
    const category = pick(config.categories, random);

    if (store.insert(id, name, score, category).success) {
      inserted++;
    } else {
      skipped++;
    }
  }

  const result: SampleResult = { requested, inserted, skipped };
  options.logger?.info(`Generated ${inserted} sample records`, { ...result });
  return result;
}
