/**
 * Schedule Module - Error Types
 */

export type ScheduleError = {
  readonly type: "INVALID_TIME_FORMAT";
  readonly input: string;
  readonly message: string;
};

/**
 * Create an INVALID_TIME_FORMAT error.
 */
export function invalidTimeFormat(input: string): ScheduleError {
  return {
    type: "INVALID_TIME_FORMAT",
    input,
    message: `Invalid time format: ${input}. Expected HH:MM`,
  };
}
