/**
 * Door Module - Collaborator Interfaces
 *
 * The controller talks to devices, notifications and persistence only
 * through these interfaces; production wiring lives in index.ts.
 */
import type { Result } from "neverthrow";

import type { DoorSettings, LockState } from "./schema.js";

export interface DoorDevices {
  /** true = closed, false = open, null = unknown or no sensor reading yet */
  readDoorClosed(doorId: string): boolean | null;
  readLockState(doorId: string): LockState;
  /** Issue the lock command; resolves once the command was handed off */
  callLock(doorId: string): Promise<Result<void, string>>;
}

export type NotificationRequest = Readonly<{
  title: string;
  message: string;
  /** Same id replaces an earlier persistent notification */
  persistentId?: string;
  /** Phone number for the push channel; defaults to the configured one */
  pushTarget?: string;
}>;

export interface Notifier {
  /** Resolves true when at least one channel delivered. Never rejects. */
  sendNotification(request: NotificationRequest): Promise<boolean>;
}

export interface DoorStateStore {
  save(
    doorId: string,
    settings: DoorSettings,
  ): Promise<Result<void, { readonly message: string }>>;
}
