/**
 * Retry Module - Error Types
 */

/**
 * The run was cancelled through its abort signal before it could finish.
 */
export type RetryError = {
  readonly type: "ABORTED";
  readonly attemptsMade: number;
  readonly errors: ReadonlyArray<string>;
};

/**
 * Create an ABORTED error.
 */
export function aborted(
  attemptsMade: number,
  errors: ReadonlyArray<string>,
): RetryError {
  return { type: "ABORTED", attemptsMade, errors: [...errors] };
}
