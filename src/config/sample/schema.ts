/**
 * Sample data configuration schema.
 *
 * Governs the records the sample generator produces: where identifiers
 * start, the score range and precision, and the pools that names and
 * categories are drawn from. Scores must stay inside the range the
 * record store accepts.
 */

import { z } from "zod";
import { SCORE_MAX, SCORE_MIN } from "../../records/record.js";

const NonEmptyText = z.string().trim().min(1);

/**
 * Inclusive range generated scores are drawn from.
 */
export const ScoreRangeSchema = z
  .object({
    min: z.number().min(SCORE_MIN).max(SCORE_MAX).describe("Lowest generated score"),
    max: z.number().min(SCORE_MIN).max(SCORE_MAX).describe("Highest generated score"),
  })
  .strict()
  .refine((range) => range.min <= range.max, {
    message: "min must not exceed max",
    path: ["min"],
  });

export type ScoreRange = z.infer<typeof ScoreRangeSchema>;

export const SampleDataConfigSchema = z
  .object({
    /** First identifier; record i gets idBase + i */
    idBase: z
      .number()
      .int()
      .min(0)
      .describe("Identifier assigned to the first generated record"),

    scoreRange: ScoreRangeSchema,

    /** Decimal places generated scores are rounded to */
    scoreDecimals: z
      .number()
      .int()
      .min(0)
      .max(4)
      .describe("Decimal places generated scores are rounded to"),

    firstNames: z.array(NonEmptyText).min(1).describe("Pool of first names"),

    lastNames: z.array(NonEmptyText).min(1).describe("Pool of last names"),

    categories: z.array(NonEmptyText).min(1).describe("Pool of categories (majors)"),
  })
  .strict();

export type SampleDataConfig = z.infer<typeof SampleDataConfigSchema>;
