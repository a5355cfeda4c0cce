/**
 * Sample data configuration module.
 *
 * Usage:
 *   import { loadSampleConfig, DEFAULT_SAMPLE_CONFIG } from "./config/index.js";
 *
 *   const config = loadSampleConfig({
 *     ...DEFAULT_SAMPLE_CONFIG,
 *     categories: ["Biology", "History"],
 *   });
 */

export type { SampleDataConfig, ScoreRange } from "./schema.js";

export { SampleDataConfigSchema, ScoreRangeSchema } from "./schema.js";

export {
  loadSampleConfig,
  validateSampleConfig,
  SampleConfigError,
  type SampleConfigIssue,
} from "./loader.js";

export { DEFAULT_SAMPLE_CONFIG } from "./defaults.js";
