/**
 * Notifications Module - Schemas and Types
 *
 * Defines the data shapes for persistent notifications and WAHA WhatsApp push.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// WAHA API Schemas
// =============================================================================

/**
 * WAHA sendText request payload.
 */
export const WahaSendTextRequestSchema = z.object({
  chatId: z.string().describe("WhatsApp chat ID (phone@c.us format)"),
  text: z.string().describe("Message text to send"),
  session: z.string().default("default").describe("WAHA session name"),
});

export type WahaSendTextRequest = z.infer<typeof WahaSendTextRequestSchema>;

// =============================================================================
// Persistent Notifications
// =============================================================================

/**
 * A notification kept in process until dismissed.
 * A new notification with the same id replaces the old one.
 */
export type PersistentNotification = Readonly<{
  id: string;
  title: string;
  message: string;
  /** Epoch ms of the latest create/replace */
  createdAt: number;
}>;

/**
 * Outcome per delivery channel.
 */
export type DeliveryReport = Readonly<{
  persistent: boolean;
  push: boolean;
}>;
