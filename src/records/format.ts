/**
 * Text rendering for records and store counters.
 */

import type { StudentRecord } from "./record.js";
import type { StoreStats } from "./store.js";

/**
 * One record as a display line, e.g. "1 | Alice | Score: 3.50 | CS".
 */
export function formatRecord(record: StudentRecord): string {
  return `${record.id} | ${record.name} | Score: ${record.score.toFixed(2)} | ${record.category}`;
}

/**
 * One line per record, or `emptyMessage` when there are none.
 */
export function formatRecordList(
  records: ReadonlyArray<StudentRecord>,
  emptyMessage = "No records in store"
): string {
  if (records.length === 0) {
    return emptyMessage;
  }
  return records.map(formatRecord).join("\n");
}

function formatDuration(ms: number): string {
  return `${ms.toFixed(6)} ms`;
}

/**
 * Render the counters block. Durations not yet measured are omitted.
 */
export function formatStats(stats: StoreStats): string {
  const lines = [
    "=== Performance Statistics ===",
    `Total records: ${stats.recordCount}`,
    `Insert operations: ${stats.insertCount}`,
    `Lookup operations: ${stats.lookupCount}`,
    `Sort operations: ${stats.sortCount}`,
    `Top-k operations: ${stats.topKCount}`,
  ];

  if (stats.lastLookupMs !== null) {
    lines.push(`Last lookup time: ${formatDuration(stats.lastLookupMs)}`);
  }
  if (stats.lastSortMs !== null) {
    lines.push(`Last sort time: ${formatDuration(stats.lastSortMs)}`);
  }
  if (stats.lastTopKMs !== null) {
    lines.push(`Last top-k time: ${formatDuration(stats.lastTopKMs)}`);
  }

  return lines.join("\n");
}
