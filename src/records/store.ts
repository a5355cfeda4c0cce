/**
 * In-memory record store.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * INDEXED ACCESS AND ON-DEMAND ORDERING
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Records are held in a Map keyed by identifier, so identity lookup, insert
 * and remove are O(1). No ordering is maintained between operations:
 *
 * 1. FULL ORDERING: sortedByScore() copies the live records and sorts the
 *    copy with Array.prototype.sort, O(n log n) in the worst case.
 *
 * 2. TOP-K SELECTION: topK(k) feeds every record through a k-bounded
 *    min-heap, O(n log k), without ordering the remainder.
 *
 * 3. SCANS: name search, category filter and the average walk the map once.
 *
 * Every stored record is frozen, and every returned sequence is a fresh
 * frozen array, so callers cannot reach into the store's state.
 *
 * COUNTERS:
 *   lookupById, sortedByScore and topK record their duration in the counters
 *   block; statsSnapshot() returns a frozen copy of it.
 */

import { performance } from "node:perf_hooks";
import type { Logger } from "../logging/index.js";
import {
  duplicateIdentifier,
  emptyName,
  RecordInsertError,
  scoreOutOfRange,
  type InsertRejection,
} from "./errors.js";
import { selectTopK } from "./heap.js";
import { isScoreInRange, type StudentRecord } from "./record.js";

/**
 * Outcome of an insert.
 */
export type InsertResult =
  | { success: true; record: StudentRecord }
  | { success: false; error: InsertRejection };

/**
 * Counters block. Durations are milliseconds, null until the operation
 * has run once.
 */
export interface StoreStats {
  /** Live records at snapshot time */
  readonly recordCount: number;
  readonly insertCount: number;
  readonly lookupCount: number;
  readonly sortCount: number;
  readonly topKCount: number;
  readonly lastLookupMs: number | null;
  readonly lastSortMs: number | null;
  readonly lastTopKMs: number | null;
}

type MutableCounters = {
  -readonly [K in Exclude<keyof StoreStats, "recordCount">]: StoreStats[K];
};

/**
 * Monotonic clock returning milliseconds.
 */
export type Clock = () => number;

export interface RecordStoreOptions {
  /** Clock used for operation durations (default: performance.now) */
  clock?: Clock;
  /** Receives debug entries for rejected inserts and removals */
  logger?: Logger;
}

const byScoreAscending = (a: StudentRecord, b: StudentRecord): number => a.score - b.score;

/**
 * Keyed collection of student records.
 *
 * @example
 *   const store = new RecordStore();
 *   store.insert(1, "Alice", 3.5, "CS");
 *   store.insert(2, "Bob", 2.1, "Math");
 *
 *   store.lookupById(1);        // Alice
 *   store.topK(1);              // [Alice]
 *   store.filterByCategory("cs"); // [Alice]
 */
export class RecordStore {
  private readonly _records = new Map<number, StudentRecord>();

  private readonly _counters: MutableCounters = {
    insertCount: 0,
    lookupCount: 0,
    sortCount: 0,
    topKCount: 0,
    lastLookupMs: null,
    lastSortMs: null,
    lastTopKMs: null,
  };

  private readonly clock: Clock;
  private readonly logger: Logger | undefined;

  constructor(options: RecordStoreOptions = {}) {
    this.clock = options.clock ?? (() => performance.now());
    this.logger = options.logger;
  }

  // ============================================================
  // Mutations
  // ============================================================

  /**
   * Insert a new record.
   *
   * Checks run in order: duplicate identifier, score range, empty name.
   * A rejected insert leaves the store unchanged.
   */
  insert(id: number, name: string, score: number, category: string): InsertResult {
    const rejection = this.check(id, name, score);
    if (rejection) {
      this.logger?.debug("Insert rejected", { id, code: rejection.code });
      return { success: false, error: rejection };
    }

    const record: StudentRecord = Object.freeze({ id, name, score, category });
    this._records.set(id, record);
    this._counters.insertCount++;

    return { success: true, record };
  }

  /**
   * Insert a new record, throwing on rejection.
   *
   * @throws RecordInsertError if any precondition fails
   */
  insertOrThrow(id: number, name: string, score: number, category: string): StudentRecord {
    const result = this.insert(id, name, score, category);
    if (!result.success) {
      throw new RecordInsertError(result.error);
    }
    return result.record;
  }

  /**
   * Remove a record. Returns false when the identifier is absent.
   */
  remove(id: number): boolean {
    const removed = this._records.delete(id);
    if (removed) {
      this.logger?.debug("Record removed", { id });
    }
    return removed;
  }

  private check(id: number, name: string, score: number): InsertRejection | undefined {
    if (this._records.has(id)) {
      return duplicateIdentifier(id);
    }
    if (!isScoreInRange(score)) {
      return scoreOutOfRange(id, score);
    }
    if (name.trim() === "") {
      return emptyName(id);
    }
    return undefined;
  }

  // ============================================================
  // Queries
  // ============================================================

  /**
   * Number of live records.
   */
  get size(): number {
    return this._records.size;
  }

  has(id: number): boolean {
    return this._records.has(id);
  }

  /**
   * All live records in map order.
   */
  records(): ReadonlyArray<StudentRecord> {
    return Object.freeze([...this._records.values()]);
  }

  /**
   * Get a record by identifier.
   * Counts as a lookup and is timed, hit or miss.
   */
  lookupById(id: number): StudentRecord | undefined {
    const start = this.clock();
    const record = this._records.get(id);
    this._counters.lastLookupMs = this.clock() - start;
    this._counters.lookupCount++;
    return record;
  }

  /**
   * Records whose name contains `text`, ignoring case.
   * An empty or whitespace-only query matches nothing.
   */
  lookupByNameSubstring(text: string): ReadonlyArray<StudentRecord> {
    if (text.trim() === "") {
      return Object.freeze([]);
    }

    const needle = text.toLowerCase();
    const matches: StudentRecord[] = [];
    for (const record of this._records.values()) {
      if (record.name.toLowerCase().includes(needle)) {
        matches.push(record);
      }
    }
    return Object.freeze(matches);
  }

  /**
   * All records ordered by ascending score. Ties keep no particular order.
   */
  sortedByScore(): ReadonlyArray<StudentRecord> {
    const start = this.clock();
    const sorted = [...this._records.values()].sort(byScoreAscending);
    this._counters.lastSortMs = this.clock() - start;
    this._counters.sortCount++;
    return Object.freeze(sorted);
  }

  /**
   * The `k` highest-scoring records, highest first.
   * Returns an empty array for `k <= 0`.
   */
  topK(k: number): ReadonlyArray<StudentRecord> {
    const start = this.clock();
    const top = selectTopK(this._records.values(), k, byScoreAscending);
    this._counters.lastTopKMs = this.clock() - start;
    this._counters.topKCount++;
    return Object.freeze(top);
  }

  /**
   * Records whose category equals `category`, ignoring case.
   */
  filterByCategory(category: string): ReadonlyArray<StudentRecord> {
    const wanted = category.toLowerCase();
    const matches: StudentRecord[] = [];
    for (const record of this._records.values()) {
      if (record.category.toLowerCase() === wanted) {
        matches.push(record);
      }
    }
    return Object.freeze(matches);
  }

  /**
   * Mean score of all live records, 0 when the store is empty.
   */
  averageScore(): number {
    if (this._records.size === 0) {
      return 0;
    }

    let total = 0;
    for (const record of this._records.values()) {
      total += record.score;
    }
    return total / this._records.size;
  }

  /**
   * Frozen copy of the counters block.
   */
  statsSnapshot(): StoreStats {
    return Object.freeze({
      recordCount: this._records.size,
      ...this._counters,
    });
  }
}
