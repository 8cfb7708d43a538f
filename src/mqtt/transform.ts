/**
 * MQTT Module - Pure Transformations
 *
 * Pure functions for parsing lock and door sensor messages and turning them
 * into door events. No side effects, no I/O - just data in, data out.
 */
import { type LockState, LockStateSchema } from "../door/index.js";
import type {
  DoorTopics,
  ObservedState,
  RoutedMessage,
  TopicRoute,
} from "./schema.js";
import {
  ContactMessageSchema,
  LockCommandStateMessageSchema,
  LockStateMessageSchema,
  WindowMessageSchema,
} from "./schema.js";

// =============================================================================
// Payload Decoding
// =============================================================================

/**
 * Payload as trimmed text, or null for anything but a Buffer or string.
 */
export function payloadToText(payload: unknown): string | null {
  if (Buffer.isBuffer(payload)) {
    return payload.toString().trim();
  }
  if (typeof payload === "string") {
    return payload.trim();
  }
  return null;
}

/**
 * Parse JSON text; null when the text is not JSON.
 */
function parseJson(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return null;
  }
}

// =============================================================================
// Lock Parsing
// =============================================================================

/**
 * Map a reported lock value to a lock state.
 */
export function normalizeLockState(value: string): LockState {
  switch (value.trim().toLowerCase()) {
    case "locked":
    case "lock":
      return "locked";
    case "unlocked":
    case "unlock":
      return "unlocked";
    case "jammed":
    case "not_fully_locked":
      return "jammed";
    default:
      return "unknown";
  }
}

/**
 * Parse a lock message.
 *
 * Accepts {"lock_state": ...}, {"state": "LOCK" | "UNLOCK"} or a plain
 * locked/unlocked/jammed payload. lock_state wins when both are present.
 *
 * @returns Lock state, or null if the payload is not a lock report
 */
export function parseLockMessage(payload: unknown): LockState | null {
  const text = payloadToText(payload);
  if (text === null || text === "") return null;

  const data = parseJson(text);

  const lockState = LockStateMessageSchema.safeParse(data);
  if (lockState.success) {
    return normalizeLockState(lockState.data.lock_state);
  }

  const commandState = LockCommandStateMessageSchema.safeParse(data);
  if (commandState.success) {
    return normalizeLockState(commandState.data.state);
  }

  // Plain payload, bare or as a JSON string
  const plain = typeof data === "string" ? data : data === null ? text : null;
  if (plain === null) return null;

  const parsed = LockStateSchema.safeParse(plain.trim().toLowerCase());
  return parsed.success ? parsed.data : null;
}

// =============================================================================
// Door Sensor Parsing
// =============================================================================

/**
 * Parse a door sensor message.
 *
 * Accepts {"contact": boolean} (true = closed), {"Window": 0 | 1}
 * (1 = open) or a plain open/closed payload.
 *
 * @returns true when closed, false when open, null if unparseable
 */
export function parseDoorSensorMessage(payload: unknown): boolean | null {
  const text = payloadToText(payload);
  if (text === null || text === "") return null;

  const data = parseJson(text);

  const contact = ContactMessageSchema.safeParse(data);
  if (contact.success) {
    return contact.data.contact;
  }

  const window = WindowMessageSchema.safeParse(data);
  if (window.success) {
    return window.data.Window === 0;
  }

  const plain = (typeof data === "string" ? data : text).toLowerCase();
  if (plain === "closed" || plain === "close") return true;
  if (plain === "open") return false;
  return null;
}

// =============================================================================
// Routing
// =============================================================================

/**
 * Topic lookup for every configured door.
 */
export function buildTopicRoutes(
  doors: ReadonlyArray<DoorTopics>,
): ReadonlyMap<string, TopicRoute> {
  const routes = new Map<string, TopicRoute>();
  for (const door of doors) {
    routes.set(door.lockRef, { doorId: door.doorId, kind: "lock" });
    if (door.sensorRef !== undefined) {
      routes.set(door.sensorRef, { doorId: door.doorId, kind: "sensor" });
    }
  }
  return routes;
}

/**
 * Parse a message for its route and record it.
 * Emits an event only when the observed value changed.
 */
export function routeMessage(
  state: ObservedState,
  route: TopicRoute,
  payload: unknown,
): RoutedMessage {
  if (route.kind === "lock") {
    const lockState = parseLockMessage(payload);
    if (lockState === null || state.locks[route.doorId] === lockState) {
      return { state, event: null };
    }
    return {
      state: { ...state, locks: { ...state.locks, [route.doorId]: lockState } },
      event: { type: "LOCK_STATE", state: lockState },
    };
  }

  const closed = parseDoorSensorMessage(payload);
  if (closed === null || state.doors[route.doorId] === closed) {
    return { state, event: null };
  }
  return {
    state: { ...state, doors: { ...state.doors, [route.doorId]: closed } },
    event: { type: "DOOR_SENSOR", closed },
  };
}

/**
 * Topic the lock command is published to.
 */
export function commandTopic(lockRef: string, suffix: string): string {
  return `${lockRef}${suffix}`;
}
