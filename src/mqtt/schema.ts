/**
 * MQTT Module - Schemas and Types
 *
 * Defines the data shapes for lock and door sensor MQTT messages.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

import type { DoorEvent, LockState } from "../door/index.js";

// =============================================================================
// Lock Messages
// =============================================================================

/**
 * zigbee2mqtt-style lock report.
 * Example: {"lock_state": "locked", "state": "LOCK"}
 */
export const LockStateMessageSchema = z.object({
  lock_state: z.string().describe("locked | unlocked | not_fully_locked"),
});

/**
 * Lock report carrying only the command-style state.
 * Example: {"state": "UNLOCK"}
 */
export const LockCommandStateMessageSchema = z.object({
  state: z.string().describe("LOCK | UNLOCK"),
});

/**
 * Command published to `<lockRef><suffix>`.
 */
export const LOCK_COMMAND = { state: "LOCK" } as const;

// =============================================================================
// Door Sensor Messages
// =============================================================================

/**
 * Contact sensor report.
 * Example: {"contact": true} (true = closed)
 */
export const ContactMessageSchema = z.object({
  contact: z.boolean().describe("true when the door is closed"),
});

/**
 * Window/door sensor report.
 * Example: {"Window": 1, "Battery": 95} (1 = open)
 */
export const WindowMessageSchema = z.object({
  Window: z.number().describe("Door state: 0 = closed, 1 = open"),
  Battery: z.number().optional().describe("Battery percentage"),
});

// =============================================================================
// Subscriptions and Observed State
// =============================================================================

/**
 * Topics of one door.
 */
export type DoorTopics = Readonly<{
  doorId: string;
  lockRef: string;
  sensorRef?: string | undefined;
}>;

/**
 * What a topic reports, and for which door.
 */
export type TopicRoute = Readonly<{
  doorId: string;
  kind: "lock" | "sensor";
}>;

/**
 * Last observed value per door. Missing entries mean "not seen yet".
 */
export type ObservedState = Readonly<{
  locks: Readonly<Record<string, LockState>>;
  doors: Readonly<Record<string, boolean>>;
}>;

export const INITIAL_OBSERVED_STATE: ObservedState = {
  locks: {},
  doors: {},
};

/**
 * Outcome of routing one message.
 */
export type RoutedMessage = Readonly<{
  state: ObservedState;
  /** null when the message was unparseable or repeated the last value */
  event: DoorEvent | null;
}>;
