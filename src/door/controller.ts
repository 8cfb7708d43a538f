/**
 * Door Module - Controller
 *
 * State machine for one door: Idle -> CountingDown -> Locking -> Verifying
 * -> Idle | Failed. Device events and manual locks run through a serial
 * queue, so they are handled in arrival order and a lock cycle blocks later
 * events until its outcome is known. disable, snooze and dispose act
 * immediately and abort whatever wait is in progress.
 */
import { type Result, err, ok } from "neverthrow";

import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import {
  describeUnknownError,
  executeWithRetry,
  formatRetryOutcome,
  sleep,
} from "../retry/index.js";
import {
  type DoorError,
  cancelled,
  formatDoorError,
  lockCallFailed,
  preconditionNotMet,
  retriesExhausted,
  verificationFailed,
} from "./errors.js";
import type { DoorDevices, DoorStateStore, Notifier } from "./ports.js";
import {
  type DoorConfig,
  type DoorEvent,
  type DoorPhase,
  type DoorSettings,
  type DoorSnapshot,
  type DoorState,
  type DoorTiming,
  type LockCycleResult,
  type LockTrigger,
  SNOOZE_MAX_MINUTES,
  SNOOZE_MIN_MINUTES,
} from "./schema.js";
import { type CountdownTimer, createCountdownTimer } from "./timer.js";
import {
  buildFailureNotification,
  countdownDelayMs,
  createInitialState,
  doorFailure,
  isQualifyingEvent,
  isSnoozed,
  preconditionFailure,
  toSnapshot,
} from "./transform.js";

const baseLog = createLogger("door");

const MS_PER_MINUTE = 60_000;

export type DoorControllerDeps = Readonly<{
  devices: DoorDevices;
  notifier: Notifier;
  store?: DoorStateStore;
  /** Persisted enabled/snooze settings from a previous run */
  settings?: DoorSettings;
  /** Random source for retry jitter */
  random?: () => number;
  timer?: CountdownTimer;
}>;

export interface DoorController {
  readonly doorId: string;
  readonly config: DoorConfig;
  /** Queue a device reading; resolves once it has been handled */
  handleEvent(event: DoorEvent): Promise<void>;
  /** Lock now, joining a cycle already in flight */
  lockNow(): Promise<Result<LockCycleResult, DoorError>>;
  snooze(minutes: number): Promise<DoorSnapshot>;
  enable(): Promise<DoorSnapshot>;
  disable(): Promise<DoorSnapshot>;
  getState(): DoorState;
  snapshot(): DoorSnapshot;
  /** Stop all timers and waits, then drain pending notifications */
  dispose(): Promise<void>;
}

type ActiveCycle = {
  readonly promise: Promise<LockCycleResult>;
  readonly abort: AbortController;
};

/**
 * Create the controller for one door.
 */
export function createDoorController(
  config: DoorConfig,
  timing: DoorTiming,
  deps: DoorControllerDeps,
): DoorController {
  const { doorId } = config;
  const { devices, notifier, store } = deps;
  const random = deps.random ?? Math.random;
  const timer = deps.timer ?? createCountdownTimer();
  const hasSensor = config.sensorRef !== undefined;
  const log = baseLog.child({ doorId });

  let state: DoorState = createInitialState(config, deps.settings, Date.now());
  let queue: Promise<void> = Promise.resolve();
  let generation = 0;
  let activeCycle: ActiveCycle | null = null;
  let disposed = false;
  const deliveries = new Set<Promise<void>>();

  // ===========================================================================
  // Internal Helpers
  // ===========================================================================

  function update(patch: Partial<DoorState>): void {
    state = { ...state, ...patch };
  }

  /** Phase changes from inside a cycle are dropped once it was cancelled */
  function setCyclePhase(phase: DoorPhase, signal: AbortSignal): void {
    if (!signal.aborted) {
      update({ phase });
    }
  }

  function enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = queue.then(task);
    queue = run.then(
      () => undefined,
      (error: unknown) => {
        logOperationFailed(log, "queuedTask", error);
      },
    );
    return run;
  }

  function currentPreconditionFailure(): string | null {
    return preconditionFailure(
      hasSensor,
      devices.readDoorClosed(doorId),
      devices.readLockState(doorId),
    );
  }

  async function persist(): Promise<void> {
    if (!store) {
      return;
    }

    const result = await store.save(doorId, {
      enabled: state.enabled,
      snoozedUntil: state.snoozedUntil,
    });
    if (result.isErr()) {
      log.error({ error: result.error.message }, "Failed to persist door settings");
    }
  }

  function notifyFailure(trigger: LockTrigger, error: string): void {
    const request = buildFailureNotification(config, trigger, error);
    const delivery: Promise<void> = notifier
      .sendNotification(request)
      .then(
        (delivered) => {
          if (!delivered) {
            log.warn({ title: request.title }, "Failure notification was not delivered");
          }
        },
        (cause: unknown) => {
          logOperationFailed(log, "sendNotification", cause);
        },
      )
      .finally(() => {
        deliveries.delete(delivery);
      });
    deliveries.add(delivery);
  }

  // ===========================================================================
  // Countdown
  // ===========================================================================

  function cancelCountdown(reason: string): void {
    if (state.phase !== "CountingDown") {
      return;
    }
    timer.cancel();
    generation++;
    update({ phase: "Idle", countdownDeadline: null });
    log.info({ reason }, `Countdown cancelled: ${reason}`);
  }

  function startCountdown(now: number): void {
    const delayMs = countdownDelayMs(timing, new Date(now));
    const deadline = now + delayMs;
    const restarted = state.phase === "CountingDown";

    generation++;
    const token = generation;
    timer.arm(
      deadline,
      () => {
        enqueue(() => onCountdownExpired(token)).catch((error: unknown) => {
          logOperationFailed(log, "countdownExpired", error);
        });
      },
      now,
    );

    update({ phase: "CountingDown", countdownDeadline: deadline });
    log.info(
      { delayMs, deadline: new Date(deadline).toISOString() },
      restarted ? `Countdown restarted (${delayMs}ms)` : `Countdown armed (${delayMs}ms)`,
    );
  }

  async function onCountdownExpired(token: number): Promise<void> {
    if (token !== generation || state.phase !== "CountingDown") {
      log.debug({ token, generation }, "Ignoring stale countdown expiry");
      return;
    }

    const failure = currentPreconditionFailure();
    if (failure !== null) {
      cancelCountdown(failure);
      return;
    }

    await runLockCycle("auto");
  }

  function processEvent(event: DoorEvent): void {
    const now = Date.now();

    if (disposed || !state.enabled || isSnoozed(state, now)) {
      log.debug({ event, enabled: state.enabled }, "Event ignored");
      return;
    }

    const failure = currentPreconditionFailure();
    if (failure !== null) {
      cancelCountdown(failure);
      return;
    }

    if (isQualifyingEvent(event, hasSensor)) {
      startCountdown(now);
    }
  }

  // ===========================================================================
  // Lock Cycle
  // ===========================================================================

  /**
   * Settle with CANCELLED as soon as the signal aborts, without waiting for
   * the pending device call.
   */
  function untilAborted<T>(
    pending: Promise<T>,
    signal: AbortSignal,
  ): Promise<Result<T, DoorError>> {
    if (signal.aborted) {
      return Promise.resolve(err(cancelled(doorId)));
    }

    return new Promise((resolve, reject) => {
      const onAbort = (): void => {
        resolve(err(cancelled(doorId)));
      };
      signal.addEventListener("abort", onAbort, { once: true });

      pending.then(
        (value) => {
          signal.removeEventListener("abort", onAbort);
          resolve(ok(value));
        },
        (error: unknown) => {
          signal.removeEventListener("abort", onAbort);
          reject(error);
        },
      );
    });
  }

  /**
   * One lock attempt: lock call, verification wait, re-read.
   * A lock that is already locked counts as verified without a device call.
   */
  async function attemptLock(signal: AbortSignal): Promise<Result<void, DoorError>> {
    if (devices.readLockState(doorId) === "locked") {
      log.info("Lock already locked");
      return ok(undefined);
    }

    const door = doorFailure(hasSensor, devices.readDoorClosed(doorId));
    if (door !== null) {
      return err(preconditionNotMet(doorId, door));
    }

    setCyclePhase("Locking", signal);
    try {
      const call = await untilAborted(devices.callLock(doorId), signal);
      if (call.isErr()) {
        return err(call.error);
      }
      if (call.value.isErr()) {
        return err(lockCallFailed(doorId, call.value.error));
      }
    } catch (error) {
      return err(lockCallFailed(doorId, describeUnknownError(error)));
    }

    if (signal.aborted) {
      return err(cancelled(doorId));
    }

    setCyclePhase("Verifying", signal);
    const waited = await sleep(timing.verificationDelayMs, signal);
    if (!waited) {
      return err(cancelled(doorId));
    }

    const observed = devices.readLockState(doorId);
    return observed === "locked"
      ? ok(undefined)
      : err(verificationFailed(doorId, observed));
  }

  async function executeCycle(
    trigger: LockTrigger,
    signal: AbortSignal,
  ): Promise<LockCycleResult> {
    const startTime = Date.now();
    update({ phase: "Locking", countdownDeadline: null });
    logOperationStart(log, "lockCycle", { trigger });

    try {
      const result = await executeWithRetry(() => attemptLock(signal), {
        maxRetries: config.retryCount,
        delayMs: timing.retryDelayMs,
        exponentialBackoff: config.exponentialBackoff,
        jitter: true,
        signal,
        random,
        describeError: formatDoorError,
        onRetry: () => setCyclePhase("Locking", signal),
      });

      if (result.isErr()) {
        log.info({ trigger, attemptsMade: result.error.attemptsMade }, "Lock cycle cancelled");
        return {
          outcome: "cancelled",
          attemptsMade: result.error.attemptsMade,
          errors: result.error.errors,
        };
      }

      const outcome = result.value;
      if (outcome.succeeded) {
        update({ phase: "Idle", lastError: null });
        logOperationComplete(log, "lockCycle", startTime, {
          trigger,
          attemptsMade: outcome.attemptsMade,
          summary: formatRetryOutcome(outcome),
        });
        return { outcome: "locked", attemptsMade: outcome.attemptsMade, errors: outcome.errors };
      }

      const lastError = outcome.errors[outcome.errors.length - 1] ?? "Unknown error";
      update({ phase: "Failed", lastError });
      logOperationFailed(
        log,
        "lockCycle",
        formatDoorError(retriesExhausted(doorId, outcome.attemptsMade, lastError)),
        { trigger },
      );
      notifyFailure(trigger, lastError);
      return { outcome: "failed", attemptsMade: outcome.attemptsMade, errors: outcome.errors };
    } catch (error) {
      const message = describeUnknownError(error);
      update({ phase: "Failed", lastError: message });
      logOperationFailed(log, "lockCycle", error, { trigger });
      notifyFailure(trigger, message);
      return { outcome: "failed", attemptsMade: 0, errors: [message] };
    }
  }

  async function runLockCycle(trigger: LockTrigger): Promise<LockCycleResult> {
    const abort = new AbortController();
    const promise = executeCycle(trigger, abort.signal);
    const cycle: ActiveCycle = { promise, abort };
    activeCycle = cycle;

    try {
      return await promise;
    } finally {
      if (activeCycle === cycle) {
        activeCycle = null;
      }
    }
  }

  async function manualLock(): Promise<Result<LockCycleResult, DoorError>> {
    if (disposed) {
      return err(cancelled(doorId));
    }

    cancelCountdown("manual lock requested");

    if (devices.readLockState(doorId) === "locked") {
      log.info("Manual lock requested but lock is already locked");
      return ok({ outcome: "already_locked", attemptsMade: 0, errors: [] });
    }

    const door = doorFailure(hasSensor, devices.readDoorClosed(doorId));
    if (door !== null) {
      log.warn({ reason: door }, "Manual lock refused");
      return err(preconditionNotMet(doorId, door));
    }

    return ok(await runLockCycle("manual"));
  }

  // ===========================================================================
  // Immediate Controls
  // ===========================================================================

  /**
   * Cancel the countdown and abort any cycle in flight. The cancelled
   * episode sends no notification.
   */
  function halt(reason: string): void {
    timer.cancel();
    generation++;
    if (activeCycle !== null) {
      activeCycle.abort.abort();
      activeCycle = null;
      log.info({ reason }, "Lock cycle aborted");
    }
    update({ phase: "Idle", countdownDeadline: null });
  }

  return {
    doorId,
    config,

    handleEvent(event) {
      return enqueue(async () => processEvent(event));
    },

    lockNow() {
      if (activeCycle !== null) {
        log.info("Lock cycle already in progress, joining it");
        return activeCycle.promise.then(
          (result): Result<LockCycleResult, DoorError> => ok(result),
        );
      }
      return enqueue(manualLock);
    },

    async snooze(minutes) {
      if (
        !Number.isInteger(minutes) ||
        minutes < SNOOZE_MIN_MINUTES ||
        minutes > SNOOZE_MAX_MINUTES
      ) {
        throw new RangeError(
          `Snooze minutes must be an integer between ${SNOOZE_MIN_MINUTES} and ${SNOOZE_MAX_MINUTES}, got ${minutes}`,
        );
      }

      halt("snoozed");
      const snoozedUntil = Date.now() + minutes * MS_PER_MINUTE;
      update({ snoozedUntil });
      log.info({ minutes, snoozedUntil: new Date(snoozedUntil).toISOString() }, "Snoozed");
      await persist();
      return toSnapshot(state, config.name, Date.now());
    },

    async enable() {
      update({ enabled: true, snoozedUntil: null });
      log.info("Enabled");
      await persist();
      return toSnapshot(state, config.name, Date.now());
    },

    async disable() {
      halt("disabled");
      update({ enabled: false });
      log.info("Disabled");
      await persist();
      return toSnapshot(state, config.name, Date.now());
    },

    getState() {
      return state;
    },

    snapshot() {
      return toSnapshot(state, config.name, Date.now());
    },

    async dispose() {
      if (disposed) {
        return;
      }
      disposed = true;
      halt("disposed");
      await queue;
      await Promise.allSettled([...deliveries]);
      log.debug("Controller disposed");
    },
  };
}
