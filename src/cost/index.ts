/**
 * Cost Module - Public API
 */

// Types
export type {
  CostGroup,
  CostReport,
  DailyStandingCharge,
  IntervalCost,
} from "./schema.js";
export type { CostError } from "./errors.js";

// Error utilities
export { formatCostError } from "./errors.js";

// Service
export { computeCost } from "./service.js";

// Pure transformations
export { formatPounds } from "./transform.js";
