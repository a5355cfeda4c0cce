/**
 * Insert rejections.
 *
 * A rejected insert is an ordinary outcome, returned to the caller as a
 * value. The store is left untouched whenever one is produced.
 */

import { SCORE_MAX, SCORE_MIN } from "./record.js";

/**
 * Rejection codes for programmatic handling.
 */
export type InsertRejectionCode = "DuplicateIdentifier" | "ScoreOutOfRange" | "EmptyName";

export interface InsertRejection {
  /** Which precondition failed */
  code: InsertRejectionCode;
  /** Human-readable explanation */
  message: string;
  /** Identifier of the rejected insert */
  id: number;
}

export function duplicateIdentifier(id: number): InsertRejection {
  return {
    code: "DuplicateIdentifier",
    message: `Record ID ${id} already exists`,
    id,
  };
}

export function scoreOutOfRange(id: number, score: number): InsertRejection {
  return {
    code: "ScoreOutOfRange",
    message: `Score must be between ${SCORE_MIN.toFixed(1)} and ${SCORE_MAX.toFixed(1)}, got ${score}`,
    id,
  };
}

export function emptyName(id: number): InsertRejection {
  return {
    code: "EmptyName",
    message: "Record name cannot be empty",
    id,
  };
}

/**
 * Render a rejection as a single line.
 */
export function formatRejection(rejection: InsertRejection): string {
  return `[${rejection.code}] ${rejection.message}`;
}

/**
 * Thrown by `RecordStore.insertOrThrow` when an insert is rejected.
 */
export class RecordInsertError extends Error {
  public readonly rejection: InsertRejection;

  constructor(rejection: InsertRejection) {
    super(rejection.message);
    this.name = "RecordInsertError";
    this.rejection = rejection;
  }

  /**
   * Format the error for display.
   */
  format(): string {
    return `Insert rejected for record ${this.rejection.id}: ${formatRejection(this.rejection)}`;
  }
}
