/**
 * API Routes - door status and control, notification list.
 */
import { Hono } from "hono";
import type { Context } from "hono";

import { config } from "../config.js";
import {
  type DoorError,
  SnoozeRequestSchema,
  formatDoorError,
} from "../door/index.js";
import { createLogger } from "../logger.js";
import { dismissNotification, listNotifications } from "../notifications/index.js";
import type { DoorRegistry } from "../registry/index.js";

const log = createLogger("api");

export type RouteDeps = Readonly<{
  registry: DoorRegistry;
  /** Broker connection state for the health check */
  isMqttConnected?: () => boolean;
}>;

/**
 * HTTP status for a door error.
 */
export function doorErrorStatus(error: DoorError): 404 | 409 | 500 {
  switch (error.type) {
    case "DOOR_NOT_FOUND":
      return 404;
    case "PRECONDITION_NOT_MET":
      return 409;
    default:
      return 500;
  }
}

function doorErrorResponse(c: Context, error: DoorError) {
  return c.json(
    {
      success: false,
      error: error.type,
      message: formatDoorError(error),
      requestId: c.get("requestId"),
    },
    doorErrorStatus(error),
  );
}

export function createRoutes(deps: RouteDeps): Hono {
  const { registry } = deps;
  const routes = new Hono();

  // ===========================================================================
  // Health
  // ===========================================================================

  routes.get("/api/health", (c) => {
    return c.json({
      status: "ok",
      appName: config.APP_NAME,
      doors: registry.list().length,
      mqttConnected: deps.isMqttConnected?.() ?? false,
      requestId: c.get("requestId"),
    });
  });

  // ===========================================================================
  // Doors
  // ===========================================================================

  routes.get("/api/doors", (c) => {
    return c.json({ doors: registry.list(), requestId: c.get("requestId") });
  });

  routes.get("/api/doors/:doorId", (c) => {
    const result = registry.snapshot(c.req.param("doorId"));
    if (result.isErr()) {
      return doorErrorResponse(c, result.error);
    }
    return c.json({ door: result.value, requestId: c.get("requestId") });
  });

  /**
   * Lock now, regardless of countdown, enabled flag or snooze.
   */
  routes.post("/api/doors/:doorId/lock", async (c) => {
    const requestId = c.get("requestId");
    const doorId = c.req.param("doorId");
    log.info({ requestId, doorId }, "POST /api/doors/:doorId/lock");

    const result = await registry.lockNow(doorId);
    if (result.isErr()) {
      log.warn(
        { requestId, doorId, error: formatDoorError(result.error) },
        "Manual lock rejected",
      );
      return doorErrorResponse(c, result.error);
    }

    const { outcome, attemptsMade, errors } = result.value;
    return c.json({
      success: outcome === "locked" || outcome === "already_locked",
      outcome,
      attemptsMade,
      errors,
      requestId,
    });
  });

  routes.post("/api/doors/:doorId/snooze", async (c) => {
    const requestId = c.get("requestId");
    const doorId = c.req.param("doorId");

    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(
        { success: false, error: "VALIDATION_ERROR", message: "Body must be JSON", requestId },
        400,
      );
    }

    const parsed = SnoozeRequestSchema.safeParse(body);
    if (!parsed.success) {
      const message = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
        .join("; ");
      return c.json({ success: false, error: "VALIDATION_ERROR", message, requestId }, 400);
    }

    const result = await registry.snooze(doorId, parsed.data.minutes);
    if (result.isErr()) {
      return doorErrorResponse(c, result.error);
    }
    log.info({ requestId, doorId, minutes: parsed.data.minutes }, "Door snoozed");
    return c.json({ success: true, door: result.value, requestId });
  });

  routes.post("/api/doors/:doorId/enable", async (c) => {
    const result = await registry.enable(c.req.param("doorId"));
    if (result.isErr()) {
      return doorErrorResponse(c, result.error);
    }
    return c.json({ success: true, door: result.value, requestId: c.get("requestId") });
  });

  routes.post("/api/doors/:doorId/disable", async (c) => {
    const result = await registry.disable(c.req.param("doorId"));
    if (result.isErr()) {
      return doorErrorResponse(c, result.error);
    }
    return c.json({ success: true, door: result.value, requestId: c.get("requestId") });
  });

  // ===========================================================================
  // Notifications
  // ===========================================================================

  routes.get("/api/notifications", (c) => {
    return c.json({ notifications: listNotifications(), requestId: c.get("requestId") });
  });

  routes.delete("/api/notifications/:id", (c) => {
    const requestId = c.get("requestId");
    const id = c.req.param("id");
    if (!dismissNotification(id)) {
      return c.json(
        { success: false, error: "NOT_FOUND", message: `Unknown notification: ${id}`, requestId },
        404,
      );
    }
    return c.json({ success: true, requestId });
  });

  return routes;
}
