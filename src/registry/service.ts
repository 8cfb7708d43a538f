/**
 * Registry Module - Service Layer
 *
 * Loads the doors file and owns one controller per door. The service
 * surface addresses doors by id and answers DOOR_NOT_FOUND for unknown ones.
 */
import { readFile } from "node:fs/promises";

import { type Result, err, ok } from "neverthrow";

import {
  type DoorController,
  type DoorDevices,
  type DoorError,
  type DoorEvent,
  type DoorSettings,
  type DoorSnapshot,
  type DoorStateStore,
  type LockCycleResult,
  type Notifier,
  createDoorController,
  doorNotFound,
} from "../door/index.js";
import { createLogger } from "../logger.js";
import type { DoorTopics } from "../mqtt/index.js";
import { type RegistryError, configInvalid, configReadFailed } from "./errors.js";
import type { ResolvedDoor } from "./schema.js";
import { parseDoorsFile } from "./transform.js";

const log = createLogger("registry");

// =============================================================================
// Doors File
// =============================================================================

/**
 * Read and validate the doors file.
 */
export async function loadDoorsFile(
  path: string,
): Promise<Result<ReadonlyArray<ResolvedDoor>, RegistryError>> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    return err(configReadFailed(path, cause.message, cause));
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    return err(
      configInvalid(path, [error instanceof Error ? error.message : "Malformed JSON"]),
    );
  }

  const result = parseDoorsFile(data, path);
  if (result.isOk()) {
    log.info(
      { path, doors: result.value.map((door) => door.config.doorId) },
      `Loaded ${result.value.length} door(s)`,
    );
  }
  return result;
}

// =============================================================================
// Registry
// =============================================================================

export type DoorRegistryDeps = Readonly<{
  devices: DoorDevices;
  notifier: Notifier;
  store?: DoorStateStore;
  /** Persisted settings for a door, if any */
  loadSettings?: (doorId: string) => DoorSettings | undefined;
  random?: () => number;
}>;

export interface DoorRegistry {
  /** Topics for the device gateway */
  topics(): ReadonlyArray<DoorTopics>;
  list(): ReadonlyArray<DoorSnapshot>;
  get(doorId: string): Result<DoorController, DoorError>;
  snapshot(doorId: string): Result<DoorSnapshot, DoorError>;
  /** Route a device reading to its door; unknown doors are ignored */
  dispatch(doorId: string, event: DoorEvent): Promise<void>;
  lockNow(doorId: string): Promise<Result<LockCycleResult, DoorError>>;
  snooze(doorId: string, minutes: number): Promise<Result<DoorSnapshot, DoorError>>;
  enable(doorId: string): Promise<Result<DoorSnapshot, DoorError>>;
  disable(doorId: string): Promise<Result<DoorSnapshot, DoorError>>;
  dispose(): Promise<void>;
}

export function createDoorRegistry(
  doors: ReadonlyArray<ResolvedDoor>,
  deps: DoorRegistryDeps,
): DoorRegistry {
  const controllers = new Map<string, DoorController>();

  for (const { config, timing } of doors) {
    const settings = deps.loadSettings?.(config.doorId);
    const controller = createDoorController(config, timing, {
      devices: deps.devices,
      notifier: deps.notifier,
      ...(deps.store ? { store: deps.store } : {}),
      ...(settings ? { settings } : {}),
      ...(deps.random ? { random: deps.random } : {}),
    });
    controllers.set(config.doorId, controller);
    log.debug({ doorId: config.doorId, enabled: controller.getState().enabled }, "Door registered");
  }

  function get(doorId: string): Result<DoorController, DoorError> {
    const controller = controllers.get(doorId);
    return controller ? ok(controller) : err(doorNotFound(doorId));
  }

  async function withDoor<T>(
    doorId: string,
    action: (controller: DoorController) => Promise<T>,
  ): Promise<Result<T, DoorError>> {
    const controller = get(doorId);
    if (controller.isErr()) {
      return err(controller.error);
    }
    return ok(await action(controller.value));
  }

  return {
    topics() {
      return doors.map(({ config }) => ({
        doorId: config.doorId,
        lockRef: config.lockRef,
        sensorRef: config.sensorRef,
      }));
    },

    list() {
      return [...controllers.values()].map((controller) => controller.snapshot());
    },

    get,

    snapshot(doorId) {
      return get(doorId).map((controller) => controller.snapshot());
    },

    async dispatch(doorId, event) {
      const controller = controllers.get(doorId);
      if (!controller) {
        log.debug({ doorId }, "Event for unknown door ignored");
        return;
      }
      await controller.handleEvent(event);
    },

    async lockNow(doorId) {
      const controller = get(doorId);
      if (controller.isErr()) {
        return err(controller.error);
      }
      return controller.value.lockNow();
    },

    snooze(doorId, minutes) {
      return withDoor(doorId, (controller) => controller.snooze(minutes));
    },

    enable(doorId) {
      return withDoor(doorId, (controller) => controller.enable());
    },

    disable(doorId) {
      return withDoor(doorId, (controller) => controller.disable());
    },

    async dispose() {
      await Promise.all([...controllers.values()].map((controller) => controller.dispose()));
      log.info("All door controllers disposed");
    },
  };
}
