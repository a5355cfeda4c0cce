/**
 * Sample data configuration loader and validator.
 *
 * Validates input against the schema, reports every issue with its path,
 * and deep-freezes the result.
 */

import type { ZodIssue } from "zod";
import { SampleDataConfigSchema, type SampleDataConfig } from "./schema.js";

/**
 * Individual validation issue.
 */
export interface SampleConfigIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code: string;
}

/**
 * Structured validation error for sample data configuration.
 */
export class SampleConfigError extends Error {
  public readonly issues: SampleConfigIssue[];

  constructor(message: string, issues: SampleConfigIssue[]) {
    super(message);
    this.name = "SampleConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Sample data configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

function formatZodIssues(zodIssues: ZodIssue[]): SampleConfigIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  const values: unknown[] = Object.values(obj);
  for (const value of values) {
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/**
 * Validate and load sample data configuration.
 *
 * @param input - Raw configuration object, e.g. parsed JSON
 * @returns Validated and frozen configuration
 * @throws SampleConfigError if validation fails
 */
export function loadSampleConfig(input: unknown): Readonly<SampleDataConfig> {
  const result = SampleDataConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new SampleConfigError(
      `Invalid sample data configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Validate sample data configuration without throwing.
 */
export function validateSampleConfig(input: unknown): {
  success: boolean;
  config?: SampleDataConfig;
  errors?: SampleConfigIssue[];
} {
  const result = SampleDataConfigSchema.safeParse(input);

  if (result.success) {
    return { success: true, config: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}
