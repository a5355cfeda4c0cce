/**
 * Default sample data configuration.
 */

import type { SampleDataConfig } from "./schema.js";

export const DEFAULT_SAMPLE_CONFIG: SampleDataConfig = {
  idBase: 1000,

  scoreRange: { min: 2.0, max: 4.0 },
  scoreDecimals: 2,

  firstNames: [
    "Alice",
    "Bob",
    "Charlie",
    "David",
    "Emma",
    "Frank",
    "Grace",
    "Henry",
    "Iris",
    "Jack",
    "Kate",
    "Liam",
    "Maya",
    "Noah",
    "Olivia",
  ],

  lastNames: [
    "Smith",
    "Johnson",
    "Williams",
    "Brown",
    "Jones",
    "Garcia",
    "Miller",
    "Davis",
    "Rodriguez",
    "Martinez",
  ],

  categories: ["Computer Science", "Mathematics", "Engineering", "Physics", "Chemistry"],
};
