/**
 * Comparative timing for the store's indexed operations.
 *
 * measureLookupScaling() times identity lookups on two stores whose sizes
 * differ by `factor`, then times scanById() over the same records. With
 * Map-backed lookup the per-lookup cost stays flat, so the ratio stays far
 * below `factor`; the linear scan tracks it.
 */

import { performance } from "node:perf_hooks";
import type { StudentRecord } from "./record.js";
import { RecordStore, type Clock } from "./store.js";

export interface LookupScalingOptions {
  /** Records in the smaller store */
  baseSize: number;
  /** Size multiplier for the larger store (default 10) */
  factor?: number;
  /** Lookups timed per round (default 10000) */
  lookups?: number;
  /** Rounds per store; the fastest is kept (default 5) */
  rounds?: number;
  /** Linear scans timed per round (default 200) */
  scanLookups?: number;
  clock?: Clock;
}

export interface LookupScalingResult {
  baseSize: number;
  scaledSize: number;
  lookups: number;
  baseMs: number;
  scaledMs: number;
  /** scaledMs / baseMs */
  ratio: number;
  scanLookups: number;
  scanBaseMs: number;
  scanScaledMs: number;
  /** scanScaledMs / scanBaseMs */
  scanRatio: number;
}

export interface TopKComparison {
  k: number;
  size: number;
  topKMs: number;
  sortMs: number;
}

/**
 * Linear-scan identity lookup, the baseline indexed lookup replaces.
 */
export function scanById(records: Iterable<StudentRecord>, id: number): StudentRecord | undefined {
  for (const record of records) {
    if (record.id === id) {
      return record;
    }
  }
  return undefined;
}

/**
 * A store holding ids 0..size-1 with scores cycling through [0, 4].
 */
export function buildBenchmarkStore(size: number): RecordStore {
  const store = new RecordStore();
  for (let id = 0; id < size; id++) {
    store.insert(id, `Record ${id}`, (id % 401) / 100, "Benchmark");
  }
  return store;
}

function timeLookups(store: RecordStore, lookups: number, rounds: number, clock: Clock): number {
  const size = store.size;
  let best = Number.POSITIVE_INFINITY;

  for (let round = 0; round < rounds; round++) {
    const start = clock();
    for (let i = 0; i < lookups; i++) {
      // Stride through the key space so every lookup is a hit
      store.lookupById((i * 7919) % size);
    }
    best = Math.min(best, clock() - start);
  }

  return best;
}

function timeScans(store: RecordStore, lookups: number, rounds: number, clock: Clock): number {
  const records = store.records();
  const size = records.length;
  let best = Number.POSITIVE_INFINITY;

  for (let round = 0; round < rounds; round++) {
    const start = clock();
    for (let i = 0; i < lookups; i++) {
      scanById(records, (i * 7919) % size);
    }
    best = Math.min(best, clock() - start);
  }

  return best;
}

function requirePositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Time identity lookups and linear scans at `baseSize` and
 * `baseSize * factor` records.
 *
 * @throws RangeError if any size or count is not a positive integer
 */
export function measureLookupScaling(options: LookupScalingOptions): LookupScalingResult {
  const factor = options.factor ?? 10;
  const lookups = options.lookups ?? 10_000;
  const rounds = options.rounds ?? 5;
  const scanLookups = options.scanLookups ?? 200;
  const clock = options.clock ?? (() => performance.now());

  requirePositiveInteger("baseSize", options.baseSize);
  requirePositiveInteger("factor", factor);
  requirePositiveInteger("lookups", lookups);
  requirePositiveInteger("rounds", rounds);
  requirePositiveInteger("scanLookups", scanLookups);

  const scaledSize = options.baseSize * factor;
  const baseStore = buildBenchmarkStore(options.baseSize);
  const scaledStore = buildBenchmarkStore(scaledSize);

  // Warm both stores before measuring
  timeLookups(baseStore, lookups, 1, clock);
  timeLookups(scaledStore, lookups, 1, clock);

  const baseMs = timeLookups(baseStore, lookups, rounds, clock);
  const scaledMs = timeLookups(scaledStore, lookups, rounds, clock);

  timeScans(baseStore, scanLookups, 1, clock);
  timeScans(scaledStore, scanLookups, 1, clock);

  const scanBaseMs = timeScans(baseStore, scanLookups, rounds, clock);
  const scanScaledMs = timeScans(scaledStore, scanLookups, rounds, clock);

  return {
    baseSize: options.baseSize,
    scaledSize,
    lookups,
    baseMs,
    scaledMs,
    ratio: baseMs > 0 ? scaledMs / baseMs : 1,
    scanLookups,
    scanBaseMs,
    scanScaledMs,
    scanRatio: scanBaseMs > 0 ? scanScaledMs / scanBaseMs : 1,
  };
}

/**
 * Time `topK(k)` against a full sort reversed and sliced to `k`.
 */
export function compareTopKWithSort(
  store: RecordStore,
  k: number,
  clock: Clock = () => performance.now()
): TopKComparison {
  let start = clock();
  store.topK(k);
  const topKMs = clock() - start;

  start = clock();
  store.sortedByScore().slice().reverse().slice(0, Math.max(k, 0));
  const sortMs = clock() - start;

  return { k, size: store.size, topKMs, sortMs };
}
