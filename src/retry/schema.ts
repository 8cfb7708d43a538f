/**
 * Retry Module - Types
 *
 * Options and results for retrying a fallible async operation.
 */
import type { Result } from "neverthrow";

/**
 * A zero-argument fallible action. Failures are error results or thrown exceptions.
 */
export type RetryOperation<E> = () => Promise<Result<unknown, E>>;

/**
 * Details passed to the onRetry hook before each backoff wait.
 */
export type RetryAttemptInfo = Readonly<{
  /** Attempt that just failed (1 = first attempt) */
  attempt: number;
  /** Backoff before the next attempt */
  waitMs: number;
  /** Description of the failure */
  error: string;
}>;

export type RetryOptions<E> = Readonly<{
  /** Retries after the first attempt (0 = single attempt) */
  maxRetries: number;
  /** Base wait between attempts in ms */
  delayMs: number;
  /** Double the wait for every further retry */
  exponentialBackoff: boolean;
  /** Multiply exponential waits by a random factor in [0.5, 1.5) */
  jitter?: boolean;
  /** Upper bound for the computed wait before jitter */
  maxDelayMs?: number;
  /** Aborts pending waits; no attempt starts after an abort */
  signal?: AbortSignal;
  /** Random source in [0, 1) */
  random?: () => number;
  describeError?: (error: E) => string;
  onRetry?: (info: RetryAttemptInfo) => void;
}>;

/**
 * Result of a retry run that was not aborted.
 */
export type RetryOutcome = Readonly<{
  succeeded: boolean;
  attemptsMade: number;
  /** One entry per failed attempt, in attempt order */
  errors: ReadonlyArray<string>;
}>;

export const DEFAULT_MAX_DELAY_MS = 60_000;

export const JITTER_MIN_FACTOR = 0.5;
export const JITTER_MAX_FACTOR = 1.5;
