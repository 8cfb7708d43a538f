/**
 * Schedule Module - Pure Transformations
 *
 * Time-of-day parsing and the day/night delay selection.
 * No side effects, no I/O - just data in, data out.
 */
import { type Result, err, ok } from "neverthrow";

import { type ScheduleError, invalidTimeFormat } from "./errors.js";
import type { ScheduleConfig, ScheduleInput, TimeOfDay } from "./schema.js";
import { TIME_OF_DAY_PATTERN } from "./schema.js";

// =============================================================================
// Time of Day
// =============================================================================

/**
 * Parse "HH:MM" or "HH:MM:SS" into a time of day.
 */
export function parseTimeOfDay(input: string): Result<TimeOfDay, ScheduleError> {
  const match = TIME_OF_DAY_PATTERN.exec(input.trim());
  if (!match) {
    return err(invalidTimeFormat(input));
  }

  return ok({
    hours: Number(match[1]),
    minutes: Number(match[2]),
    seconds: match[3] === undefined ? 0 : Number(match[3]),
  });
}

/**
 * Format a time of day as "HH:MM", or "HH:MM:SS" when seconds are set.
 */
export function formatTimeOfDay(time: TimeOfDay): string {
  const pad = (value: number): string => value.toString().padStart(2, "0");
  const base = `${pad(time.hours)}:${pad(time.minutes)}`;
  return time.seconds === 0 ? base : `${base}:${pad(time.seconds)}`;
}

/**
 * Local wall-clock time of a date.
 *
 * @throws RangeError when the date is invalid
 */
export function timeOfDayFromDate(date: Date): TimeOfDay {
  if (Number.isNaN(date.getTime())) {
    throw new RangeError("Expected a valid date");
  }

  return {
    hours: date.getHours(),
    minutes: date.getMinutes(),
    seconds: date.getSeconds(),
  };
}

/**
 * Seconds elapsed since midnight.
 */
export function toSecondOfDay(time: TimeOfDay): number {
  return time.hours * 3600 + time.minutes * 60 + time.seconds;
}

// =============================================================================
// Schedule
// =============================================================================

/**
 * Parse a configured schedule.
 */
export function parseSchedule(
  input: ScheduleInput,
): Result<ScheduleConfig, ScheduleError> {
  return parseTimeOfDay(input.nightStart).andThen((nightStart) =>
    parseTimeOfDay(input.dayStart).map((dayStart) => ({ nightStart, dayStart })),
  );
}

/**
 * Whether `now` falls in the night window [nightStart, dayStart).
 *
 * The window is circular: when nightStart is later than dayStart it wraps
 * past midnight. Equal start times give an empty night window.
 */
export function isNightTime(
  now: Date | TimeOfDay,
  schedule: ScheduleConfig,
): boolean {
  const current = toSecondOfDay(now instanceof Date ? timeOfDayFromDate(now) : now);
  const nightStart = toSecondOfDay(schedule.nightStart);
  const dayStart = toSecondOfDay(schedule.dayStart);

  if (nightStart <= dayStart) {
    return current >= nightStart && current < dayStart;
  }

  // Wraps past midnight (e.g. 22:00 -> 06:00)
  return current >= nightStart || current < dayStart;
}

/**
 * Select the delay for the current time of day.
 *
 * @param schedule - Day/night schedule; null means the day delay always applies
 * @returns nightDelay inside the night window, otherwise dayDelay
 */
export function getDelay<T>(
  now: Date | TimeOfDay,
  dayDelay: T,
  nightDelay: T,
  schedule: ScheduleConfig | null,
): T {
  if (schedule === null) {
    return dayDelay;
  }

  return isNightTime(now, schedule) ? nightDelay : dayDelay;
}
