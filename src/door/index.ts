/**
 * Door Module - Public API
 */

// Types
export type {
  DoorConfig,
  DoorEvent,
  DoorPhase,
  DoorSettings,
  DoorSnapshot,
  DoorState,
  DoorTiming,
  LockCycleOutcome,
  LockCycleResult,
  LockState,
  LockTrigger,
  SnoozeRequest,
} from "./schema.js";
export type { DoorError } from "./errors.js";
export type {
  DoorDevices,
  DoorStateStore,
  NotificationRequest,
  Notifier,
} from "./ports.js";
export type { DoorController, DoorControllerDeps } from "./controller.js";
export type { CountdownTimer } from "./timer.js";

// Schemas
export {
  DoorConfigSchema,
  DoorSettingsSchema,
  LockStateSchema,
  SNOOZE_MAX_MINUTES,
  SNOOZE_MIN_MINUTES,
  SnoozeRequestSchema,
} from "./schema.js";

// Errors
export { doorNotFound, formatDoorError } from "./errors.js";

// Controller
export { createDoorController } from "./controller.js";
export { createCountdownTimer } from "./timer.js";

// Pure transformations
export {
  buildFailureNotification,
  isQualifyingEvent,
  preconditionFailure,
  resolveDoorTiming,
} from "./transform.js";
