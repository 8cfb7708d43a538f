/**
 * Schedule Module - Public API
 */

// Types
export type { ScheduleConfig, ScheduleInput, TimeOfDay } from "./schema.js";
export type { ScheduleError } from "./errors.js";

export { ScheduleInputSchema, TimeOfDayStringSchema } from "./schema.js";

// Pure transformations
export {
  formatTimeOfDay,
  getDelay,
  isNightTime,
  parseSchedule,
  parseTimeOfDay,
  timeOfDayFromDate,
  toSecondOfDay,
} from "./transform.js";
