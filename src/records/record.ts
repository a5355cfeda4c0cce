/**
 * Student record definition.
 * A record is one identity-keyed entry in the store.
 */

/** Lowest accepted score. */
export const SCORE_MIN = 0.0;

/** Highest accepted score. */
export const SCORE_MAX = 4.0;

export interface StudentRecord {
  /** Caller-assigned identifier, unique among live records */
  readonly id: number;
  /** Display name, non-empty after trimming */
  readonly name: string;
  /** Grade point average in [SCORE_MIN, SCORE_MAX] */
  readonly score: number;
  /** Program or major; compared case-insensitively */
  readonly category: string;
}

/**
 * Check whether a score lies in the closed accepted range.
 * NaN is never in range.
 */
export function isScoreInRange(score: number): boolean {
  return score >= SCORE_MIN && score <= SCORE_MAX;
}
