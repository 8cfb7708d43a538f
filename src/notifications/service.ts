/**
 * Notifications Module - Service Layer
 *
 * Two channels: an in-process list of persistent notifications (shown and
 * dismissed through the API) and WhatsApp push through the WAHA API.
 */
import { type Result, err, ok } from "neverthrow";

import { getNotificationConfig } from "../config.js";
import type { NotificationRequest, Notifier } from "../door/index.js";
import { createLogger } from "../logger.js";
import {
  type NotificationError,
  formatNotificationError,
  networkError,
  notConfigured,
  sendFailed,
} from "./errors.js";
import type { DeliveryReport, PersistentNotification } from "./schema.js";
import {
  buildWahaRequest,
  formatPushText,
  phoneToWhatsAppId,
  removeNotification,
  upsertNotification,
} from "./transform.js";

const log = createLogger("notifications");

// =============================================================================
// Module State
// =============================================================================

let notifications: ReadonlyArray<PersistentNotification> = [];
let generatedIds = 0;

/**
 * Persistent notifications, newest first.
 */
export function listNotifications(): ReadonlyArray<PersistentNotification> {
  return notifications;
}

/**
 * Dismiss a persistent notification.
 *
 * @returns false when no notification has that id
 */
export function dismissNotification(id: string): boolean {
  const next = removeNotification(notifications, id);
  if (next.length === notifications.length) {
    return false;
  }
  notifications = next;
  log.info({ id }, "Notification dismissed");
  return true;
}

/**
 * Reset the persistent list (for testing).
 */
export function clearNotifications(): void {
  notifications = [];
  generatedIds = 0;
}

/**
 * Create or replace a persistent notification.
 */
export function createPersistentNotification(
  request: NotificationRequest,
  now = Date.now(),
): PersistentNotification {
  generatedIds++;
  const notification: PersistentNotification = {
    id: request.persistentId ?? `notification_${now}_${generatedIds}`,
    title: request.title,
    message: request.message,
    createdAt: now,
  };
  notifications = upsertNotification(notifications, notification);
  log.info({ id: notification.id, title: notification.title }, "Persistent notification created");
  return notification;
}

// =============================================================================
// WhatsApp Push
// =============================================================================

/**
 * Send a WhatsApp message via WAHA API.
 *
 * @param message - Message text to send
 * @param phone - Recipient; defaults to NOTIFICATION_PHONE
 */
export async function sendWhatsAppMessage(
  message: string,
  phone?: string,
): Promise<Result<void, NotificationError>> {
  const wahaConfig = getNotificationConfig();

  if (!wahaConfig) {
    return err(
      notConfigured("WhatsApp notifications not configured (WAHA_SERVER missing or disabled)"),
    );
  }

  const recipient = phone ?? wahaConfig.phoneNumber;
  if (recipient === undefined) {
    return err(notConfigured("No recipient: set NOTIFICATION_PHONE or a door notifyTarget"));
  }

  const chatId = phoneToWhatsAppId(recipient);
  const payload = buildWahaRequest(chatId, message);
  const url = `${wahaConfig.serverUrl}/api/sendText`;

  log.debug({ url, chatId }, "Sending WhatsApp notification...");

  try {
    const response = await fetch(url, {
      method: "POST",
      headers: {
        Accept: "application/json",
        "Content-Type": "application/json",
        ...(wahaConfig.apiKey ? { "X-API-Key": wahaConfig.apiKey } : {}),
      },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(wahaConfig.timeoutMs),
    });

    if (!response.ok) {
      const errorText = await response.text().catch(() => "Unknown error");
      log.error(
        { statusCode: response.status, error: errorText },
        "WAHA API request failed",
      );
      return err(
        sendFailed(
          `WAHA API returned ${response.status}: ${errorText}`,
          response.status,
        ),
      );
    }

    log.info({ chatId }, "WhatsApp notification sent successfully");
    return ok(undefined);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    log.error({ error: message }, "Failed to send WhatsApp notification");
    return err(
      networkError(message, error instanceof Error ? error : undefined),
    );
  }
}

// =============================================================================
// Combined Delivery
// =============================================================================

/**
 * Deliver on every channel and report each outcome.
 */
export async function deliverNotification(
  request: NotificationRequest,
): Promise<DeliveryReport> {
  createPersistentNotification(request);

  const push = await sendWhatsAppMessage(
    formatPushText(request.title, request.message),
    request.pushTarget,
  );
  if (push.isErr()) {
    const level = push.error.type === "NOT_CONFIGURED" ? "debug" : "warn";
    log[level]({ title: request.title }, `Push skipped: ${formatNotificationError(push.error)}`);
  }

  return { persistent: true, push: push.isOk() };
}

/**
 * Send a notification on all channels.
 *
 * @returns true when at least one channel delivered; never rejects
 */
export async function sendNotification(request: NotificationRequest): Promise<boolean> {
  try {
    const report = await deliverNotification(request);
    return report.persistent || report.push;
  } catch (error) {
    log.error(
      { title: request.title, error: error instanceof Error ? error.message : String(error) },
      "Notification delivery failed",
    );
    return false;
  }
}

/**
 * Notifier backed by this module, for door controllers.
 */
export const notifier: Notifier = { sendNotification };
