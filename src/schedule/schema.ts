/**
 * Schedule Module - Schemas and Types
 *
 * Day/night schedule shapes. A schedule is two times of day on a 24 hour
 * clock; the night window runs from nightStart up to (not including) dayStart
 * and may wrap past midnight.
 */
import { z } from "zod";

// =============================================================================
// Time of Day
// =============================================================================

/**
 * A wall-clock time without a date.
 */
export type TimeOfDay = Readonly<{
  hours: number;
  minutes: number;
  seconds: number;
}>;

/** HH:MM or HH:MM:SS, 24 hour clock */
export const TIME_OF_DAY_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)(?::([0-5]\d))?$/;

/**
 * Time-of-day string as it appears in configuration.
 */
export const TimeOfDayStringSchema = z
  .string()
  .regex(TIME_OF_DAY_PATTERN, "Expected time of day as HH:MM or HH:MM:SS");

// =============================================================================
// Schedule
// =============================================================================

/**
 * Schedule as configured (strings).
 */
export const ScheduleInputSchema = z.object({
  nightStart: TimeOfDayStringSchema.describe("Start of the night window"),
  dayStart: TimeOfDayStringSchema.describe("End of the night window"),
});

export type ScheduleInput = z.infer<typeof ScheduleInputSchema>;

/**
 * Parsed, immutable schedule.
 */
export type ScheduleConfig = Readonly<{
  nightStart: TimeOfDay;
  dayStart: TimeOfDay;
}>;
