/**
 * API Routes Tests
 *
 * Runs the app against a real registry over in-process fake devices.
 */
import type { Hono } from "hono";
import { type Result, err } from "neverthrow";
import { type Mock, afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { DoorDevices, LockState } from "../../door/index.js";
import {
  clearNotifications,
  createPersistentNotification,
  listNotifications,
} from "../../notifications/index.js";
import { type DoorRegistry, createDoorRegistry, parseDoorsFile } from "../../registry/index.js";
import { createApp } from "../app.js";
import { doorErrorStatus } from "../routes.js";

const DOORS = parseDoorsFile(
  {
    doors: [
      {
        doorId: "front",
        name: "Front Door",
        lockRef: "locks/front",
        sensorRef: "contacts/front",
        retryCount: 0,
      },
    ],
  },
  "doors.json",
)._unsafeUnwrap();

type World = { closed: boolean | null; lock: LockState };

describe("API Routes", () => {
  let world: World;
  let callLock: Mock<(doorId: string) => Promise<Result<void, string>>>;
  let sendNotification: Mock<() => Promise<boolean>>;
  let registry: DoorRegistry;
  let app: Hono;

  beforeEach(() => {
    world = { closed: true, lock: "unlocked" };
    callLock = vi.fn(async (_doorId: string): Promise<Result<void, string>> => err("boom"));
    sendNotification = vi.fn(async () => true);

    const devices: DoorDevices = {
      readDoorClosed: () => world.closed,
      readLockState: () => world.lock,
      callLock,
    };

    registry = createDoorRegistry(DOORS, {
      devices,
      notifier: { sendNotification },
      random: () => 0.5,
    });
    app = createApp({ registry, isMqttConnected: () => true });
    clearNotifications();
  });

  afterEach(async () => {
    await registry.dispose();
    clearNotifications();
  });

  // ===========================================================================
  // Health & Tracing
  // ===========================================================================

  describe("GET /api/health", () => {
    it("reports status, door count and broker connection", async () => {
      const res = await app.request("/api/health");
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toMatchObject({ status: "ok", doors: 1, mqttConnected: true });
    });

    it("propagates an incoming request id", async () => {
      const res = await app.request("/api/health", {
        headers: { "x-request-id": "req-123" },
      });
      const body = await res.json();

      expect(res.headers.get("x-request-id")).toBe("req-123");
      expect(body).toMatchObject({ requestId: "req-123" });
    });

    it("generates a request id when none is sent", async () => {
      const res = await app.request("/api/health");

      expect(res.headers.get("x-request-id")).toMatch(/^[0-9a-f-]{36}$/);
    });
  });

  // ===========================================================================
  // Doors
  // ===========================================================================

  describe("GET /api/doors", () => {
    it("lists every door snapshot", async () => {
      const res = await app.request("/api/doors");
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toMatchObject({
        doors: [
          {
            doorId: "front",
            name: "Front Door",
            enabled: true,
            phase: "Idle",
            snoozed: false,
          },
        ],
      });
    });
  });

  describe("GET /api/doors/:doorId", () => {
    it("returns one door", async () => {
      const res = await app.request("/api/doors/front");
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toMatchObject({ door: { doorId: "front" } });
    });

    it("returns 404 for an unknown door", async () => {
      const res = await app.request("/api/doors/garage");
      const body = await res.json();

      expect(res.status).toBe(404);
      expect(body).toMatchObject({
        success: false,
        error: "DOOR_NOT_FOUND",
        message: "Door not found: garage",
      });
    });
  });

  describe("POST /api/doors/:doorId/lock", () => {
    it("reports already_locked without calling the lock", async () => {
      world.lock = "locked";

      const res = await app.request("/api/doors/front/lock", { method: "POST" });
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toMatchObject({
        success: true,
        outcome: "already_locked",
        attemptsMade: 0,
        errors: [],
      });
      expect(callLock).not.toHaveBeenCalled();
    });

    it("returns 409 when the door is open", async () => {
      world.closed = false;

      const res = await app.request("/api/doors/front/lock", { method: "POST" });
      const body = await res.json();

      expect(res.status).toBe(409);
      expect(body).toMatchObject({
        error: "PRECONDITION_NOT_MET",
        message: "Precondition not met: Door is open",
      });
    });

    it("returns the failed cycle when the lock call fails", async () => {
      const res = await app.request("/api/doors/front/lock", { method: "POST" });
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toMatchObject({
        success: false,
        outcome: "failed",
        attemptsMade: 1,
        errors: ["Lock call failed: boom"],
      });
      expect(callLock).toHaveBeenCalledWith("front");
    });

    it("returns 404 for an unknown door", async () => {
      const res = await app.request("/api/doors/garage/lock", { method: "POST" });

      expect(res.status).toBe(404);
    });
  });

  describe("POST /api/doors/:doorId/snooze", () => {
    const post = (doorId: string, body: string) =>
      app.request(`/api/doors/${doorId}/snooze`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body,
      });

    it("snoozes the door", async () => {
      const res = await post("front", JSON.stringify({ minutes: 30 }));
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toMatchObject({ success: true, door: { snoozed: true } });
      expect(registry.snapshot("front")._unsafeUnwrap().snoozed).toBe(true);
    });

    it.each([0, 1441, 2.5])("rejects %s minutes with 400", async (minutes) => {
      const res = await post("front", JSON.stringify({ minutes }));
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body).toMatchObject({ error: "VALIDATION_ERROR" });
      expect(registry.snapshot("front")._unsafeUnwrap().snoozed).toBe(false);
    });

    it("rejects a body that is not JSON", async () => {
      const res = await post("front", "thirty");
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body).toMatchObject({ message: "Body must be JSON" });
    });

    it("returns 404 for an unknown door", async () => {
      const res = await post("garage", JSON.stringify({ minutes: 30 }));

      expect(res.status).toBe(404);
    });
  });

  describe("POST /api/doors/:doorId/enable and /disable", () => {
    it("disables then enables the door", async () => {
      const disabled = await app.request("/api/doors/front/disable", { method: "POST" });
      expect(await disabled.json()).toMatchObject({ door: { enabled: false } });

      const enabled = await app.request("/api/doors/front/enable", { method: "POST" });
      expect(await enabled.json()).toMatchObject({ door: { enabled: true } });
    });

    it("enable clears a snooze", async () => {
      await registry.snooze("front", 30);

      const res = await app.request("/api/doors/front/enable", { method: "POST" });
      const body = await res.json();

      expect(body).toMatchObject({
        door: { enabled: true, snoozed: false, snoozedUntil: null },
      });
    });

    it("returns 404 for an unknown door", async () => {
      const res = await app.request("/api/doors/garage/disable", { method: "POST" });

      expect(res.status).toBe(404);
    });
  });

  // ===========================================================================
  // Notifications
  // ===========================================================================

  describe("notifications", () => {
    it("lists persistent notifications", async () => {
      createPersistentNotification({ title: "T", message: "M", persistentId: "n1" }, 1000);

      const res = await app.request("/api/notifications");
      const body = await res.json();

      expect(body).toMatchObject({
        notifications: [{ id: "n1", title: "T", message: "M", createdAt: 1000 }],
      });
    });

    it("dismisses a notification", async () => {
      createPersistentNotification({ title: "T", message: "M", persistentId: "n1" }, 1000);

      const res = await app.request("/api/notifications/n1", { method: "DELETE" });

      expect(res.status).toBe(200);
      expect(listNotifications()).toEqual([]);
    });

    it("returns 404 for an unknown notification", async () => {
      const res = await app.request("/api/notifications/nope", { method: "DELETE" });

      expect(res.status).toBe(404);
    });
  });

  // ===========================================================================
  // Error Mapping
  // ===========================================================================

  describe("doorErrorStatus", () => {
    it("maps door errors to status codes", () => {
      expect(doorErrorStatus({ type: "DOOR_NOT_FOUND", doorId: "x", message: "m" })).toBe(404);
      expect(doorErrorStatus({ type: "PRECONDITION_NOT_MET", doorId: "x", message: "m" })).toBe(409);
      expect(doorErrorStatus({ type: "CANCELLED", doorId: "x", message: "m" })).toBe(500);
    });
  });

  describe("error handler", () => {
    it("answers unhandled errors with JSON 500", async () => {
      vi.spyOn(registry, "list").mockImplementation(() => {
        throw new Error("registry exploded");
      });

      const res = await app.request("/api/doors", { headers: { "x-request-id": "req-9" } });
      const body = await res.json();

      expect(res.status).toBe(500);
      expect(body).toEqual({ error: "registry exploded", requestId: "req-9" });
    });
  });
});
