/**
 * Door Module - Schemas and Types
 *
 * Defines the data shapes for a single auto-locked door.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

import { ScheduleInputSchema } from "../schedule/index.js";
import type { ScheduleConfig } from "../schedule/index.js";

// =============================================================================
// Door Configuration
// =============================================================================

/**
 * One door as listed in the doors file.
 */
export const DoorConfigSchema = z.object({
  doorId: z
    .string()
    .min(1)
    .regex(/^[a-z0-9_-]+$/i, "doorId may only contain letters, digits, _ and -")
    .describe("Unique identifier"),
  name: z.string().min(1).describe("Display name used in notifications"),
  lockRef: z.string().min(1).describe("MQTT topic reporting the lock state"),
  sensorRef: z
    .string()
    .min(1)
    .optional()
    .describe("MQTT topic reporting the door contact sensor"),
  dayDelayMinutes: z.number().int().min(1).max(240).default(5),
  nightDelayMinutes: z.number().int().min(1).max(30).default(2),
  schedule: ScheduleInputSchema.optional().describe(
    "Night window; without it the day delay always applies",
  ),
  retryCount: z.number().int().min(0).max(5).default(3),
  retryDelaySeconds: z.number().int().min(3).max(60).default(5),
  verificationDelaySeconds: z.number().int().min(2).max(10).default(5),
  exponentialBackoff: z.boolean().default(true),
  enableOnCreation: z.boolean().default(true),
  notifyTarget: z
    .string()
    .min(1)
    .optional()
    .describe("Phone number for push notifications, overrides the default"),
});

export type DoorConfig = z.infer<typeof DoorConfigSchema>;

/**
 * Door timing in milliseconds with the parsed schedule.
 */
export type DoorTiming = Readonly<{
  dayDelayMs: number;
  nightDelayMs: number;
  schedule: ScheduleConfig | null;
  retryDelayMs: number;
  verificationDelayMs: number;
}>;

// =============================================================================
// Device Observations
// =============================================================================

export const LockStateSchema = z.enum(["locked", "unlocked", "jammed", "unknown"]);

export type LockState = z.infer<typeof LockStateSchema>;

/**
 * Device readings routed to a controller.
 */
export type DoorEvent =
  | Readonly<{ type: "DOOR_SENSOR"; closed: boolean | null }>
  | Readonly<{ type: "LOCK_STATE"; state: LockState }>;

// =============================================================================
// Controller State
// =============================================================================

export const DoorPhaseSchema = z.enum([
  "Idle",
  "CountingDown",
  "Locking",
  "Verifying",
  "Failed",
]);

export type DoorPhase = z.infer<typeof DoorPhaseSchema>;

/**
 * Settings that survive a restart.
 */
export const DoorSettingsSchema = z.object({
  enabled: z.boolean(),
  /** Epoch ms; triggers are ignored while now < snoozedUntil */
  snoozedUntil: z.number().int().nullable(),
});

export type DoorSettings = z.infer<typeof DoorSettingsSchema>;

/**
 * Full controller state, owned by exactly one controller.
 */
export type DoorState = Readonly<
  DoorSettings & {
    doorId: string;
    phase: DoorPhase;
    /** Epoch ms, only meaningful while CountingDown */
    countdownDeadline: number | null;
    lastError: string | null;
  }
>;

/**
 * Read-only view exposed by the service surface.
 */
export type DoorSnapshot = Readonly<
  DoorState & {
    name: string;
    snoozed: boolean;
    remainingMs: number | null;
  }
>;

// =============================================================================
// Lock Cycle
// =============================================================================

export type LockTrigger = "auto" | "manual";

export type LockCycleOutcome = "locked" | "failed" | "cancelled" | "already_locked";

export type LockCycleResult = Readonly<{
  outcome: LockCycleOutcome;
  attemptsMade: number;
  errors: ReadonlyArray<string>;
}>;

// =============================================================================
// Limits
// =============================================================================

/** Snooze length in whole minutes, up to one day */
export const SNOOZE_MIN_MINUTES = 1;
export const SNOOZE_MAX_MINUTES = 1440;

export const SnoozeRequestSchema = z.object({
  minutes: z.number().int().min(SNOOZE_MIN_MINUTES).max(SNOOZE_MAX_MINUTES),
});

export type SnoozeRequest = z.infer<typeof SnoozeRequestSchema>;
