/**
 * Benchmark helper tests, including the lookup scaling check.
 *
 * Run: node --import tsx src/records/benchmark.test.ts
 */

import { strict as assert } from "node:assert";

import {
  buildBenchmarkStore,
  compareTopKWithSort,
  measureLookupScaling,
  scanById,
} from "./benchmark.js";
import type { Clock } from "./store.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

/** Clock advancing 1 ms per reading. */
function tickingClock(): Clock {
  let now = 0;
  return () => ++now;
}

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

section("Helpers");

test("buildBenchmarkStore fills ids 0..size-1 with valid scores", () => {
  const store = buildBenchmarkStore(500);
  assert.equal(store.size, 500);
  assert.equal(store.lookupById(0)?.score, 0);
  assert.equal(store.lookupById(400)?.score, 4);
  assert.equal(store.lookupById(499)?.score, 0.98);
});

test("scanById finds records by walking the sequence", () => {
  const store = buildBenchmarkStore(20);
  assert.equal(scanById(store.records(), 13)?.name, "Record 13");
  assert.equal(scanById(store.records(), 20), undefined);
});

// ═══════════════════════════════════════════════════════════════════════════
// MEASUREMENTS
// ═══════════════════════════════════════════════════════════════════════════

section("Measurements");

test("measureLookupScaling reports sizes and the best round", () => {
  const result = measureLookupScaling({ baseSize: 10, clock: tickingClock() });
  assert.deepEqual(result, {
    baseSize: 10,
    scaledSize: 100,
    lookups: 10_000,
    baseMs: 1,
    scaledMs: 1,
    ratio: 1,
    scanLookups: 200,
    scanBaseMs: 1,
    scanScaledMs: 1,
    scanRatio: 1,
  });
});

test("measureLookupScaling rejects invalid sizes", () => {
  assert.throws(() => measureLookupScaling({ baseSize: 0 }), RangeError);
  assert.throws(() => measureLookupScaling({ baseSize: 10, factor: 0 }), RangeError);
});

test("measureLookupScaling rejects empty rounds and lookup counts", () => {
  assert.throws(
    () => measureLookupScaling({ baseSize: 10, rounds: 0 }),
    (err: unknown) =>
      err instanceof RangeError && err.message === "rounds must be a positive integer, got 0"
  );
  assert.throws(() => measureLookupScaling({ baseSize: 10, lookups: 0 }), RangeError);
  assert.throws(() => measureLookupScaling({ baseSize: 10, scanLookups: 0 }), RangeError);
  assert.throws(() => measureLookupScaling({ baseSize: 10, rounds: 1.5 }), RangeError);
});

test("compareTopKWithSort runs both paths on the store", () => {
  const store = buildBenchmarkStore(50);
  const comparison = compareTopKWithSort(store, 5, tickingClock());

  assert.deepEqual(comparison, { k: 5, size: 50, topKMs: 1, sortMs: 1 });
  const stats = store.statsSnapshot();
  assert.equal(stats.topKCount, 1);
  assert.equal(stats.sortCount, 1);
});

test("indexed lookup stays flat while the linear scan grows with N", () => {
  const result = measureLookupScaling({
    baseSize: 1_000,
    factor: 10,
    lookups: 20_000,
    rounds: 7,
    scanLookups: 200,
  });
  assert.equal(result.scaledSize, 10_000);
  assert.ok(
    result.ratio < 5,
    `lookups at 10N took ${result.ratio.toFixed(2)}x as long as at N`
  );
  assert.ok(
    result.scanRatio > 3,
    `scans at 10N took only ${result.scanRatio.toFixed(2)}x as long as at N`
  );
  assert.ok(result.scanRatio > result.ratio);
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
