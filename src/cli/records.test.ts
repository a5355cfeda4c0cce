/**
 * Tests for the records CLI.
 *
 * Run: node --import tsx src/cli/records.test.ts
 *
 * Tests cover:
 *   1. Argument parsing: defaults, numeric options, errors
 *   2. Execution: queries against a deterministic sample
 *   3. Rendering: text report layout
 *   4. Sample config files: loading and error paths
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { ConfigError, DEFAULT_SAMPLE_CONFIG, SampleConfigError } from "../config/index.js";
import {
  CliUsageError,
  isHelpRequest,
  parseCliArgs,
  readSampleConfig,
  renderReport,
  runRecords,
} from "./records.js";

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

const TEST_DIR = mkdtempSync(join(tmpdir(), "records-cli-"));
const lowest = (): number => 0;

// ═══════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════

section("Argument parsing");

test("defaults apply when no options are given", () => {
  assert.deepEqual(parseCliArgs([], 100), {
    count: 100,
    sampleConfig: undefined,
    id: undefined,
    search: undefined,
    category: undefined,
    top: undefined,
    sorted: false,
    benchmark: false,
    json: false,
    help: false,
  });
});

test("numeric and text options are parsed", () => {
  const args = parseCliArgs(
    ["--count", "5", "--top", "3", "--id", "1002", "--search", "ali", "--sorted", "-h"],
    100
  );
  assert.equal(args.count, 5);
  assert.equal(args.top, 3);
  assert.equal(args.id, 1002);
  assert.equal(args.search, "ali");
  assert.equal(args.sorted, true);
  assert.equal(args.help, true);
});

test("non-integer numbers are rejected", () => {
  assert.throws(
    () => parseCliArgs(["--top", "three"], 100),
    (err: unknown) => err instanceof ConfigError && err.message === "--top must be an integer, got: three"
  );
});

test("a count below 1 is rejected", () => {
  assert.throws(() => parseCliArgs(["--count", "0"], 100), ConfigError);
});

test("unknown options and stray arguments are usage errors", () => {
  for (const argv of [["--bogus"], ["extra"], ["--count"]]) {
    assert.throws(
      () => parseCliArgs(argv, 100),
      (err: unknown) => err instanceof CliUsageError && err instanceof ConfigError
    );
  }
});

test("help is detected without reading the environment", () => {
  assert.equal(isHelpRequest(["-h"]), true);
  assert.equal(isHelpRequest(["--help", "--count", "5"]), true);
  assert.equal(isHelpRequest(["--count", "5"]), false);
  assert.equal(isHelpRequest([]), false);
  assert.throws(() => isHelpRequest(["--bogus", "-h"]), CliUsageError);
});

// ═══════════════════════════════════════════════════════════════════════════
// EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

section("Execution");

test("runs every requested query against the sample", () => {
  const args = parseCliArgs(
    ["--count", "3", "--id", "1001", "--search", "alice", "--category", "computer science", "--top", "2", "--sorted"],
    100
  );
  const report = runRecords(args, { random: lowest });

  assert.deepEqual(report.sample, { requested: 3, inserted: 3, skipped: 0 });
  assert.equal(report.averageScore, 2);
  assert.deepEqual(report.lookup?.record, {
    id: 1001,
    name: "Alice Smith",
    score: 2,
    category: "Computer Science",
  });
  assert.equal(report.search?.records.length, 3);
  assert.equal(report.category?.records.length, 3);
  assert.equal(report.top?.records.length, 2);
  assert.equal(report.sorted?.length, 3);
  assert.equal(report.benchmark, undefined);

  assert.equal(report.stats.insertCount, 3);
  assert.equal(report.stats.lookupCount, 1);
  assert.equal(report.stats.sortCount, 1);
  assert.equal(report.stats.topKCount, 1);
});

test("a missing identifier is reported as null", () => {
  const report = runRecords(parseCliArgs(["--count", "1", "--id", "5"], 100), { random: lowest });
  assert.deepEqual(report.lookup, { id: 5, record: null });
});

// ═══════════════════════════════════════════════════════════════════════════
// RENDERING
// ═══════════════════════════════════════════════════════════════════════════

section("Rendering");

test("text report lists the lookup before the statistics", () => {
  const report = runRecords(parseCliArgs(["--count", "2", "--id", "1001"], 100), { random: lowest });
  const lines = renderReport(report).split("\n");

  assert.deepEqual(lines.slice(0, 7), [
    "Generated 2 sample records (0 skipped)",
    "Average score: 2.00",
    "",
    "Lookup 1001:",
    "1001 | Alice Smith | Score: 2.00 | Computer Science",
    "",
    "=== Performance Statistics ===",
  ]);
  assert.equal(lines[7], "Total records: 2");
});

test("benchmark section shows indexed and linear-scan timings", () => {
  const base = runRecords(parseCliArgs(["--count", "2"], 100), { random: lowest });
  const report = {
    ...base,
    benchmark: {
      lookup: {
        baseSize: 1000,
        scaledSize: 10000,
        lookups: 10000,
        baseMs: 0.5,
        scaledMs: 0.6,
        ratio: 1.2,
        scanLookups: 200,
        scanBaseMs: 0.25,
        scanScaledMs: 2.5,
        scanRatio: 10,
      },
      topK: { k: 10, size: 2, topKMs: 0.01, sortMs: 0.02 },
    },
  };
  const lines = renderReport(report).split("\n");

  assert.deepEqual(lines.slice(2, 7), [
    "",
    "=== Benchmark ===",
    "Lookup x10000: 1000 records 0.500 ms, 10000 records 0.600 ms (ratio 1.20)",
    "Linear scan x200: 1000 records 0.250 ms, 10000 records 2.500 ms (ratio 10.00)",
    "Top-10 of 2: heap 0.010 ms, full sort 0.020 ms",
  ]);
});

test("missing records and empty results have placeholders", () => {
  const report = runRecords(
    parseCliArgs(["--count", "1", "--id", "9", "--category", "Art"], 100),
    { random: lowest }
  );
  const lines = renderReport(report).split("\n");

  assert.deepEqual(lines.slice(3, 8), [
    "Lookup 9:",
    "Record not found",
    "",
    "Found 0 records in Art:",
    "(none)",
  ]);
});

// ═══════════════════════════════════════════════════════════════════════════
// SAMPLE CONFIG FILES
// ═══════════════════════════════════════════════════════════════════════════

section("Sample config files");

test("reads and validates a JSON file", () => {
  const path = join(TEST_DIR, "sample.json");
  writeFileSync(path, JSON.stringify({ ...DEFAULT_SAMPLE_CONFIG, categories: ["History"] }));
  const config = readSampleConfig(path);
  assert.deepEqual(config.categories, ["History"]);
  assert.ok(Object.isFrozen(config));
});

test("a missing file is a ConfigError", () => {
  assert.throws(() => readSampleConfig(join(TEST_DIR, "absent.json")), ConfigError);
});

test("malformed JSON is a ConfigError", () => {
  const path = join(TEST_DIR, "broken.json");
  writeFileSync(path, "{ not json");
  assert.throws(() => readSampleConfig(path), ConfigError);
});

test("invalid contents are a SampleConfigError", () => {
  const path = join(TEST_DIR, "invalid.json");
  writeFileSync(path, JSON.stringify({ ...DEFAULT_SAMPLE_CONFIG, scoreDecimals: 9 }));
  assert.throws(() => readSampleConfig(path), SampleConfigError);
});

// ═══════════════════════════════════════════════════════════════════════════
// CLEANUP & SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

rmSync(TEST_DIR, { recursive: true, force: true });

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
