/**
 * Retry Module - Pure Transformations
 *
 * Backoff calculation and error descriptions.
 */
import type { RetryOutcome } from "./schema.js";
import {
  DEFAULT_MAX_DELAY_MS,
  JITTER_MAX_FACTOR,
  JITTER_MIN_FACTOR,
} from "./schema.js";

/**
 * Wait before retry number `retry` (1 = first retry).
 *
 * Fixed: delayMs. Exponential: delayMs * 2^(retry-1), capped at maxDelayMs,
 * then scaled by a jitter factor in [0.5, 1.5) when jitter is on.
 */
export function computeBackoffMs(
  retry: number,
  options: Readonly<{
    delayMs: number;
    exponentialBackoff: boolean;
    jitter?: boolean;
    maxDelayMs?: number;
  }>,
  random: () => number = Math.random,
): number {
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;

  if (!options.exponentialBackoff) {
    return Math.min(options.delayMs, maxDelayMs);
  }

  const base = Math.min(options.delayMs * 2 ** (retry - 1), maxDelayMs);
  if (options.jitter === false) {
    return base;
  }

  const factor = JITTER_MIN_FACTOR + random() * (JITTER_MAX_FACTOR - JITTER_MIN_FACTOR);
  return Math.round(base * factor);
}

/**
 * Describe any thrown value or error payload.
 */
export function describeUnknownError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  if (
    typeof error === "object" &&
    error !== null &&
    "message" in error &&
    typeof error.message === "string"
  ) {
    return error.message;
  }
  return String(error);
}

/**
 * Build a frozen outcome.
 */
export function createOutcome(
  succeeded: boolean,
  attemptsMade: number,
  errors: ReadonlyArray<string>,
): RetryOutcome {
  return Object.freeze({
    succeeded,
    attemptsMade,
    errors: Object.freeze([...errors]),
  });
}

/**
 * Human-readable summary of an outcome.
 */
export function formatRetryOutcome(outcome: RetryOutcome): string {
  if (outcome.succeeded) {
    return `Success after ${outcome.attemptsMade} attempt(s)`;
  }
  const lastError = outcome.errors[outcome.errors.length - 1] ?? "unknown error";
  return `Failed after ${outcome.attemptsMade} attempt(s): ${lastError}`;
}
