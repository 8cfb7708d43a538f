/**
 * Notifications Module - Public API
 *
 * Exports types, service functions, and transformations for the notifications module.
 */

// Types
export type {
  DeliveryReport,
  PersistentNotification,
  WahaSendTextRequest,
} from "./schema.js";

// Error types
export type { NotificationError } from "./errors.js";

export { formatNotificationError } from "./errors.js";

// Service functions
export {
  clearNotifications,
  createPersistentNotification,
  deliverNotification,
  dismissNotification,
  listNotifications,
  notifier,
  sendNotification,
  sendWhatsAppMessage,
} from "./service.js";

// Pure transformations (for testing and external use)
export {
  buildWahaRequest,
  formatPushText,
  phoneToWhatsAppId,
} from "./transform.js";
