/**
 * Door Module - Pure Transformations
 *
 * Precondition checks, timing resolution and state projections.
 * No side effects, no I/O - just data in, data out.
 */
import { type Result, ok } from "neverthrow";

import { type ScheduleError, getDelay, parseSchedule } from "../schedule/index.js";
import type { NotificationRequest } from "./ports.js";
import type {
  DoorConfig,
  DoorEvent,
  DoorSettings,
  DoorSnapshot,
  DoorState,
  DoorTiming,
  LockState,
  LockTrigger,
} from "./schema.js";

const MS_PER_SECOND = 1000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;

export const FAILURE_HINT =
  "Likely cloud auth / integration issue. Check lock integration status.";

// =============================================================================
// Configuration
// =============================================================================

/**
 * Convert configured minutes/seconds to milliseconds and parse the schedule.
 */
export function resolveDoorTiming(
  config: DoorConfig,
): Result<DoorTiming, ScheduleError> {
  const base = {
    dayDelayMs: config.dayDelayMinutes * MS_PER_MINUTE,
    nightDelayMs: config.nightDelayMinutes * MS_PER_MINUTE,
    retryDelayMs: config.retryDelaySeconds * MS_PER_SECOND,
    verificationDelayMs: config.verificationDelaySeconds * MS_PER_SECOND,
  };

  if (config.schedule === undefined) {
    return ok({ ...base, schedule: null });
  }

  return parseSchedule(config.schedule).map((schedule) => ({ ...base, schedule }));
}

/**
 * Countdown length for an event observed at `now`.
 */
export function countdownDelayMs(timing: DoorTiming, now: Date): number {
  return getDelay(now, timing.dayDelayMs, timing.nightDelayMs, timing.schedule);
}

/**
 * Initial state from configuration and the persisted settings, if any.
 * An already expired snooze is dropped.
 */
export function createInitialState(
  config: DoorConfig,
  persisted: DoorSettings | undefined,
  now: number,
): DoorState {
  const persistedSnooze = persisted?.snoozedUntil ?? null;
  const snoozedUntil =
    persistedSnooze !== null && persistedSnooze > now ? persistedSnooze : null;

  return {
    doorId: config.doorId,
    enabled: persisted?.enabled ?? config.enableOnCreation,
    snoozedUntil,
    phase: "Idle",
    countdownDeadline: null,
    lastError: null,
  };
}

// =============================================================================
// Trigger Evaluation
// =============================================================================

export function isSnoozed(state: DoorSettings, now: number): boolean {
  return state.snoozedUntil !== null && now < state.snoozedUntil;
}

/**
 * Whether an event may start or restart a countdown.
 *
 * With a sensor the door closing is the trigger; without one the lock
 * being seen unlocked is.
 */
export function isQualifyingEvent(event: DoorEvent, hasSensor: boolean): boolean {
  if (hasSensor) {
    return event.type === "DOOR_SENSOR" && event.closed === true;
  }
  return event.type === "LOCK_STATE" && event.state === "unlocked";
}

/**
 * Why the door may not be locked right now.
 *
 * @returns null when the door part of the precondition holds
 */
export function doorFailure(hasSensor: boolean, closed: boolean | null): string | null {
  if (!hasSensor || closed === true) {
    return null;
  }
  return closed === false ? "Door is open" : "Door state unknown";
}

/**
 * Why a countdown may not run right now.
 *
 * @returns null when the door is closed (or has no sensor) and the lock is unlocked
 */
export function preconditionFailure(
  hasSensor: boolean,
  closed: boolean | null,
  lockState: LockState,
): string | null {
  const door = doorFailure(hasSensor, closed);
  if (door !== null) {
    return door;
  }
  return lockState === "unlocked" ? null : `Lock is ${lockState}`;
}

// =============================================================================
// Notifications
// =============================================================================

export function failureNotificationId(doorId: string, trigger: LockTrigger): string {
  return trigger === "auto"
    ? `autolock_${doorId}_failure`
    : `autolock_${doorId}_manual_failure`;
}

/**
 * Notification sent once per failed lock cycle.
 */
export function buildFailureNotification(
  config: DoorConfig,
  trigger: LockTrigger,
  error: string,
): NotificationRequest {
  const title =
    trigger === "auto"
      ? `AutoLock Failed: ${config.name}`
      : `Manual Lock Failed: ${config.name}`;

  const request = {
    title,
    message: `Failed to lock ${config.lockRef}: ${error}\n\n${FAILURE_HINT}`,
    persistentId: failureNotificationId(config.doorId, trigger),
  };

  return config.notifyTarget !== undefined
    ? { ...request, pushTarget: config.notifyTarget }
    : request;
}

// =============================================================================
// Projections
// =============================================================================

export function toSnapshot(state: DoorState, name: string, now: number): DoorSnapshot {
  const remainingMs =
    state.phase === "CountingDown" && state.countdownDeadline !== null
      ? Math.max(0, state.countdownDeadline - now)
      : null;

  return {
    ...state,
    name,
    snoozed: isSnoozed(state, now),
    remainingMs,
  };
}
