/**
 * Door Module - Error Types
 *
 * Typed error unions for lock attempts and the door service surface.
 * Errors are values, not exceptions.
 */
import type { LockState } from "./schema.js";

/**
 * Errors that can occur while locking or addressing a door.
 */
export type DoorError =
  | {
      readonly type: "PRECONDITION_NOT_MET";
      readonly doorId: string;
      readonly message: string;
    }
  | {
      readonly type: "LOCK_CALL_FAILED";
      readonly doorId: string;
      readonly message: string;
    }
  | {
      readonly type: "VERIFICATION_FAILED";
      readonly doorId: string;
      readonly observed: LockState;
      readonly message: string;
    }
  | {
      readonly type: "RETRIES_EXHAUSTED";
      readonly doorId: string;
      readonly attemptsMade: number;
      readonly lastError: string;
      readonly message: string;
    }
  | {
      readonly type: "CANCELLED";
      readonly doorId: string;
      readonly message: string;
    }
  | {
      readonly type: "DOOR_NOT_FOUND";
      readonly doorId: string;
      readonly message: string;
    };

/**
 * Create a PRECONDITION_NOT_MET error.
 */
export function preconditionNotMet(doorId: string, message: string): DoorError {
  return { type: "PRECONDITION_NOT_MET", doorId, message };
}

/**
 * Create a LOCK_CALL_FAILED error.
 */
export function lockCallFailed(doorId: string, message: string): DoorError {
  return { type: "LOCK_CALL_FAILED", doorId, message };
}

/**
 * Create a VERIFICATION_FAILED error.
 */
export function verificationFailed(doorId: string, observed: LockState): DoorError {
  return {
    type: "VERIFICATION_FAILED",
    doorId,
    observed,
    message: `Lock state after verification: ${observed}`,
  };
}

/**
 * Create a RETRIES_EXHAUSTED error.
 */
export function retriesExhausted(
  doorId: string,
  attemptsMade: number,
  lastError: string,
): DoorError {
  return {
    type: "RETRIES_EXHAUSTED",
    doorId,
    attemptsMade,
    lastError,
    message: `Gave up after ${attemptsMade} attempt(s): ${lastError}`,
  };
}

/**
 * Create a CANCELLED error.
 */
export function cancelled(doorId: string): DoorError {
  return { type: "CANCELLED", doorId, message: "Lock cycle cancelled" };
}

/**
 * Create a DOOR_NOT_FOUND error.
 */
export function doorNotFound(doorId: string): DoorError {
  return { type: "DOOR_NOT_FOUND", doorId, message: `Unknown door: ${doorId}` };
}

/**
 * Format a DoorError for logging and for the attempt error list.
 */
export function formatDoorError(error: DoorError): string {
  switch (error.type) {
    case "PRECONDITION_NOT_MET":
      return `Precondition not met: ${error.message}`;
    case "LOCK_CALL_FAILED":
      return `Lock call failed: ${error.message}`;
    case "VERIFICATION_FAILED":
      return `Verification failed: lock is ${error.observed}`;
    case "RETRIES_EXHAUSTED":
      return `Retries exhausted: ${error.message}`;
    case "CANCELLED":
      return "Cancelled";
    case "DOOR_NOT_FOUND":
      return `Door not found: ${error.doorId}`;
  }
}
