/**
 * Notifications Module - Pure Transformations
 *
 * Pure functions for building WAHA requests and maintaining the list of
 * persistent notifications.
 * No side effects, no I/O - just data in, data out.
 */
import type { PersistentNotification, WahaSendTextRequest } from "./schema.js";

// =============================================================================
// WAHA Request Building
// =============================================================================

/**
 * Build WAHA sendText request payload.
 *
 * @param chatId - WhatsApp chat ID (phone@c.us format)
 * @param message - Message text
 * @param session - WAHA session name
 */
export function buildWahaRequest(
  chatId: string,
  message: string,
  session = "default",
): WahaSendTextRequest {
  return {
    chatId,
    text: message,
    session,
  };
}

/**
 * Convert phone number to WhatsApp chat ID format.
 *
 * @param phone - Phone number (with or without + prefix)
 * @returns Chat ID in phone@c.us format
 */
export function phoneToWhatsAppId(phone: string): string {
  // Remove + prefix and any spaces/dashes
  const cleaned = phone.replace(/[\s+-]/g, "");
  return `${cleaned}@c.us`;
}

/**
 * Push text: bold title, blank line, body.
 */
export function formatPushText(title: string, message: string): string {
  return `*${title}*\n\n${message}`;
}

// =============================================================================
// Persistent Notification List
// =============================================================================

/**
 * Insert a notification, replacing any with the same id.
 * Newest first.
 */
export function upsertNotification(
  list: ReadonlyArray<PersistentNotification>,
  notification: PersistentNotification,
): ReadonlyArray<PersistentNotification> {
  return [notification, ...list.filter((n) => n.id !== notification.id)];
}

export function removeNotification(
  list: ReadonlyArray<PersistentNotification>,
  id: string,
): ReadonlyArray<PersistentNotification> {
  return list.filter((n) => n.id !== id);
}
