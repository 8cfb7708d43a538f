/**
 * Retry Module - Public API
 */

// Types
export type {
  RetryAttemptInfo,
  RetryOperation,
  RetryOptions,
  RetryOutcome,
} from "./schema.js";
export type { RetryError } from "./errors.js";

export { DEFAULT_MAX_DELAY_MS } from "./schema.js";

// Service functions
export { executeWithRetry, sleep } from "./service.js";

// Pure transformations
export {
  computeBackoffMs,
  describeUnknownError,
  formatRetryOutcome,
} from "./transform.js";
