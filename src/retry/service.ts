/**
 * Retry Module - Service Layer
 *
 * Drives a fallible operation to success or an exhausted retry budget,
 * sleeping between attempts. Waits are cancellable through an AbortSignal.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import { type RetryError, aborted } from "./errors.js";
import type { RetryOperation, RetryOptions, RetryOutcome } from "./schema.js";
import {
  computeBackoffMs,
  createOutcome,
  describeUnknownError,
} from "./transform.js";

const log = createLogger("retry");

// =============================================================================
// Cancellable Sleep
// =============================================================================

/**
 * Wait for `ms` milliseconds.
 *
 * @returns true when the full wait elapsed, false when the signal aborted it
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return Promise.resolve(false);
  }

  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

// =============================================================================
// Retry Driver
// =============================================================================

/**
 * Run one attempt and describe its failure.
 *
 * @returns null on success, otherwise the failure description
 */
async function runAttempt<E>(
  operation: RetryOperation<E>,
  describeError: (error: E) => string,
): Promise<string | null> {
  try {
    const result = await operation();
    return result.isOk() ? null : describeError(result.error);
  } catch (error) {
    return describeUnknownError(error);
  }
}

/**
 * Execute an operation with retries.
 *
 * The operation runs at most maxRetries + 1 times. Failures never propagate:
 * each one is described and collected in attempt order.
 *
 * @returns Outcome of the run, or ABORTED when the signal fired first
 * @throws RangeError when maxRetries is not a non-negative integer
 */
export async function executeWithRetry<E>(
  operation: RetryOperation<E>,
  options: RetryOptions<E>,
): Promise<Result<RetryOutcome, RetryError>> {
  const { maxRetries, signal, onRetry } = options;
  const describeError = options.describeError ?? describeUnknownError;
  const random = options.random ?? Math.random;

  if (!Number.isInteger(maxRetries) || maxRetries < 0) {
    throw new RangeError(`maxRetries must be a non-negative integer, got ${maxRetries}`);
  }

  const errors: string[] = [];
  const maxAttempts = maxRetries + 1;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) {
      return err(aborted(attempt - 1, errors));
    }

    const failure = await runAttempt(operation, describeError);

    if (failure === null) {
      if (attempt > 1) {
        log.info(
          { attempt, retries: attempt - 1 },
          `Operation succeeded after ${attempt - 1} retry attempt(s)`,
        );
      }
      return ok(createOutcome(true, attempt, errors));
    }

    errors.push(failure);

    if (signal?.aborted) {
      return err(aborted(attempt, errors));
    }

    if (attempt === maxAttempts) {
      break;
    }

    const waitMs = computeBackoffMs(attempt, options, random);
    log.warn(
      { attempt, maxAttempts, waitMs, error: failure },
      `Operation failed (attempt ${attempt}/${maxAttempts}), retrying in ${waitMs}ms`,
    );
    onRetry?.({ attempt, waitMs, error: failure });

    const completed = await sleep(waitMs, signal);
    if (!completed) {
      return err(aborted(attempt, errors));
    }
  }

  log.error(
    { attempts: maxAttempts, error: errors[errors.length - 1] },
    `Operation failed after ${maxAttempts} attempt(s)`,
  );
  return ok(createOutcome(false, maxAttempts, errors));
}
