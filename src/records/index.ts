/**
 * Record store module.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * ARCHITECTURE OVERVIEW
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * 1. STORE: RecordStore owns a Map of frozen StudentRecords keyed by id and
 *    a counters block. Callers create and hold their own store values.
 *
 * 2. INSERTS: insert() checks duplicate id, score range and name, in that
 *    order, and returns a rejection value instead of throwing.
 *    insertOrThrow() wraps a rejection in RecordInsertError.
 *
 * 3. QUERIES: lookupById (O(1)), sortedByScore (O(n log n)),
 *    topK (O(n log k) through BoundedMinHeap), name search and category
 *    filter (O(n) scans), averageScore.
 *
 * 4. OBSERVABILITY: statsSnapshot() copies the counters; formatStats()
 *    renders them; measureLookupScaling() checks lookup cost stays flat.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * EXAMPLE USAGE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   import { RecordStore, generateSampleData, formatRecordList } from "./records/index.js";
 *
 *   const store = new RecordStore();
 *   generateSampleData(store, 500);
 *
 *   console.log(formatRecordList(store.topK(10)));
 */

export { SCORE_MIN, SCORE_MAX, isScoreInRange, type StudentRecord } from "./record.js";

export {
  RecordInsertError,
  formatRejection,
  duplicateIdentifier,
  scoreOutOfRange,
  emptyName,
  type InsertRejection,
  type InsertRejectionCode,
} from "./errors.js";

export { BoundedMinHeap, selectTopK, type Comparator } from "./heap.js";

export {
  RecordStore,
  type InsertResult,
  type StoreStats,
  type Clock,
  type RecordStoreOptions,
} from "./store.js";

export {
  generateSampleData,
  type SampleOptions,
  type SampleResult,
  type RandomSource,
} from "./sample.js";

export { formatRecord, formatRecordList, formatStats } from "./format.js";

export {
  measureLookupScaling,
  compareTopKWithSort,
  buildBenchmarkStore,
  scanById,
  type LookupScalingOptions,
  type LookupScalingResult,
  type TopKComparison,
} from "./benchmark.js";
