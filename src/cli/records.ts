#!/usr/bin/env node
/**
 * CLI front end over the record store.
 *
 * Fills a fresh store with sample records, runs the requested queries and
 * prints the results followed by the store's performance statistics.
 *
 * Usage:
 *   npx tsx src/cli/records.ts [options]
 *   npm start -- [options]
 *
 * Options:
 *   --count <n>              Sample records to generate (default: SAMPLE_SIZE)
 *   --sample-config <path>   JSON file overriding the sample data configuration
 *   --id <n>                 Look up one record by identifier
 *   --search <text>          Case-insensitive name search
 *   --category <name>        Case-insensitive category filter
 *   --top <k>                Show the k highest-scoring records
 *   --sorted                 Show every record ordered by score
 *   --benchmark              Compare lookup cost at N and 10N, top-k against sort
 *   --json                   Output the report as JSON
 *   -h, --help               Show help
 *
 * Exit codes:
 *   0 - Success
 *   1 - Invalid arguments or configuration
 */

import { existsSync, readFileSync, realpathSync } from "node:fs";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";

import {
  ConfigError,
  DEFAULT_SAMPLE_CONFIG,
  loadConfig,
  loadSampleConfig,
  SampleConfigError,
  validateConfig,
  type SampleDataConfig,
} from "../config/index.js";
import { createLogger, initRunId, type Logger } from "../logging/index.js";
import {
  compareTopKWithSort,
  formatRecord,
  formatRecordList,
  formatStats,
  generateSampleData,
  measureLookupScaling,
  RecordStore,
  type LookupScalingResult,
  type RandomSource,
  type SampleResult,
  type StoreStats,
  type StudentRecord,
  type TopKComparison,
} from "../records/index.js";

// ============================================================
// Types
// ============================================================

export interface RecordsCliArgs {
  count: number;
  sampleConfig?: string;
  id?: number;
  search?: string;
  category?: string;
  top?: number;
  sorted: boolean;
  benchmark: boolean;
  json: boolean;
  help: boolean;
}

export interface RecordsReport {
  sample: SampleResult;
  averageScore: number;
  lookup?: { id: number; record: StudentRecord | null };
  search?: { query: string; records: ReadonlyArray<StudentRecord> };
  category?: { category: string; records: ReadonlyArray<StudentRecord> };
  top?: { k: number; records: ReadonlyArray<StudentRecord> };
  sorted?: ReadonlyArray<StudentRecord>;
  benchmark?: { lookup: LookupScalingResult; topK: TopKComparison };
  stats: StoreStats;
}

export interface RunOptions {
  sampleConfig?: Readonly<SampleDataConfig>;
  random?: RandomSource;
  logger?: Logger;
}

export const USAGE = `
Usage: student-records [options]

Options:
  --count <n>              Sample records to generate (default: SAMPLE_SIZE)
  --sample-config <path>   JSON file overriding the sample data configuration
  --id <n>                 Look up one record by identifier
  --search <text>          Case-insensitive name search
  --category <name>        Case-insensitive category filter
  --top <k>                Show the k highest-scoring records
  --sorted                 Show every record ordered by score
  --benchmark              Compare lookup cost at N and 10N, top-k against sort
  --json                   Output the report as JSON
  -h, --help               Show this help message
`;

// ============================================================
// CLI Parsing
// ============================================================

/**
 * Malformed command line: unknown option, missing value or stray argument.
 */
export class CliUsageError extends ConfigError {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

function parseOptions(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        count: { type: "string" },
        "sample-config": { type: "string" },
        id: { type: "string" },
        search: { type: "string" },
        category: { type: "string" },
        top: { type: "string" },
        sorted: { type: "boolean", default: false },
        benchmark: { type: "boolean", default: false },
        json: { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
    }).values;
  } catch (err) {
    throw new CliUsageError(err instanceof Error ? err.message : String(err));
  }
}

function parseInteger(option: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ConfigError(`--${option} must be an integer, got: ${value}`);
  }
  return parseInt(value, 10);
}

/**
 * Parse command-line arguments.
 *
 * @throws CliUsageError for options parseArgs rejects
 * @throws ConfigError for non-integer numeric options or a count below 1
 */
export function parseCliArgs(argv: string[], defaultCount: number): RecordsCliArgs {
  const values = parseOptions(argv);

  const count = parseInteger("count", values.count) ?? defaultCount;
  if (count < 1) {
    throw new ConfigError(`--count must be at least 1, got: ${count}`);
  }

  return {
    count,
    sampleConfig: values["sample-config"],
    id: parseInteger("id", values.id),
    search: values.search,
    category: values.category,
    top: parseInteger("top", values.top),
    sorted: values.sorted ?? false,
    benchmark: values.benchmark ?? false,
    json: values.json ?? false,
    help: values.help ?? false,
  };
}

/**
 * Check the command line and report whether only help was asked for.
 * Reads nothing from the environment.
 *
 * @throws CliUsageError for options parseArgs rejects
 */
export function isHelpRequest(argv: string[]): boolean {
  return parseCliArgs(argv, 1).help;
}

/**
 * Read and validate a sample data configuration file.
 *
 * @throws ConfigError if the file is missing or not JSON
 * @throws SampleConfigError if the contents fail validation
 */
export function readSampleConfig(path: string): Readonly<SampleDataConfig> {
  const fullPath = resolve(path);
  if (!existsSync(fullPath)) {
    throw new ConfigError(`Sample config file not found: ${fullPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(fullPath, "utf-8"));
  } catch (err) {
    throw new ConfigError(
      `Sample config file is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return loadSampleConfig(raw);
}

// ============================================================
// Execution
// ============================================================

/**
 * Build a store from sample data and run the requested queries.
 */
export function runRecords(args: RecordsCliArgs, options: RunOptions = {}): RecordsReport {
  const store = new RecordStore({ logger: options.logger?.child({ component: "store" }) });
  const sample = generateSampleData(store, args.count, {
    config: options.sampleConfig ?? DEFAULT_SAMPLE_CONFIG,
    random: options.random,
    logger: options.logger,
  });

  const report: RecordsReport = {
    sample,
    averageScore: store.averageScore(),
    stats: store.statsSnapshot(),
  };

  if (args.id !== undefined) {
    report.lookup = { id: args.id, record: store.lookupById(args.id) ?? null };
  }

  if (args.search !== undefined) {
    report.search = { query: args.search, records: store.lookupByNameSubstring(args.search) };
  }

  if (args.category !== undefined) {
    report.category = { category: args.category, records: store.filterByCategory(args.category) };
  }

  if (args.top !== undefined) {
    report.top = { k: args.top, records: store.topK(args.top) };
  }

  if (args.sorted) {
    report.sorted = store.sortedByScore();
  }

  if (args.benchmark) {
    report.benchmark = {
      lookup: measureLookupScaling({ baseSize: Math.max(store.size, 1) }),
      topK: compareTopKWithSort(store, args.top ?? 10),
    };
  }

  report.stats = store.statsSnapshot();
  return report;
}

// ============================================================
// Output
// ============================================================

/**
 * Render a report as text.
 */
export function renderReport(report: RecordsReport): string {
  const out: string[] = [];

  out.push(
    `Generated ${report.sample.inserted} sample records (${report.sample.skipped} skipped)`,
    `Average score: ${report.averageScore.toFixed(2)}`
  );

  if (report.lookup) {
    out.push("", `Lookup ${report.lookup.id}:`);
    out.push(report.lookup.record ? formatRecord(report.lookup.record) : "Record not found");
  }

  if (report.search) {
    out.push("", `Found ${report.search.records.length} records matching "${report.search.query}":`);
    out.push(formatRecordList(report.search.records, "(none)"));
  }

  if (report.category) {
    out.push(
      "",
      `Found ${report.category.records.length} records in ${report.category.category}:`
    );
    out.push(formatRecordList(report.category.records, "(none)"));
  }

  if (report.top) {
    out.push("", `Top ${report.top.k} records:`);
    out.push(formatRecordList(report.top.records, "(none)"));
  }

  if (report.sorted) {
    out.push("", "Records by score:");
    out.push(formatRecordList(report.sorted));
  }

  if (report.benchmark) {
    const { lookup, topK } = report.benchmark;
    out.push(
      "",
      "=== Benchmark ===",
      `Lookup x${lookup.lookups}: ${lookup.baseSize} records ${lookup.baseMs.toFixed(3)} ms, ` +
        `${lookup.scaledSize} records ${lookup.scaledMs.toFixed(3)} ms (ratio ${lookup.ratio.toFixed(2)})`,
      `Linear scan x${lookup.scanLookups}: ${lookup.baseSize} records ${lookup.scanBaseMs.toFixed(3)} ms, ` +
        `${lookup.scaledSize} records ${lookup.scanScaledMs.toFixed(3)} ms (ratio ${lookup.scanRatio.toFixed(2)})`,
      `Top-${topK.k} of ${topK.size}: heap ${topK.topKMs.toFixed(3)} ms, full sort ${topK.sortMs.toFixed(3)} ms`
    );
  }

  out.push("", formatStats(report.stats));
  return out.join("\n");
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<void> {
  const argv = process.argv.slice(2);

  if (isHelpRequest(argv)) {
    console.log(USAGE);
    return;
  }

  const runId = initRunId();
  const config = loadConfig();
  const level = validateConfig(config);

  const logger = createLogger({
    level,
    logDir: config.logDir,
    file: config.logToFile,
    bindings: { app: config.appName },
  });

  const args = parseCliArgs(argv, config.sampleSize);

  logger.debug("Starting records CLI", { runId, env: config.env, count: args.count });

  const sampleConfig = args.sampleConfig ? readSampleConfig(args.sampleConfig) : undefined;
  const report = runRecords(args, { sampleConfig, logger });

  if (args.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    console.log(renderReport(report));
  }
}

// Only run when executed directly (not imported by tests). The bin link
// resolves to this file, so compare real paths rather than names.
function isDirectExecution(): boolean {
  const entry = process.argv[1];
  if (entry === undefined || !existsSync(entry)) {
    return false;
  }
  return realpathSync(entry) === fileURLToPath(import.meta.url);
}

if (isDirectExecution()) {
  main().catch((err: unknown) => {
    if (err instanceof SampleConfigError) {
      console.error(err.format());
    } else if (err instanceof CliUsageError) {
      console.error(`Error: ${err.message}`);
      console.error(USAGE);
    } else if (err instanceof ConfigError) {
      console.error(`Configuration error: ${err.message}`);
    } else {
      console.error("Unexpected error:", err);
    }
    process.exit(1);
  });
}
