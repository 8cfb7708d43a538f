/**
 * Typed configuration - all config lives in the environment, parsed with Zod at startup.
 * App crashes immediately on invalid config - fail fast.
 *
 * Door auto-lock service configuration covering:
 * - Server settings
 * - Door definitions file and persisted door state
 * - MQTT broker for lock and door sensor devices
 * - WAHA push notifications
 *
 * Per-door timing (delays, schedule, retries) lives in the doors file,
 * see DoorConfigSchema in door/schema.ts.
 */
import { z } from "zod";

/**
 * Custom boolean parser for environment variables.
 * z.coerce.boolean() doesn't work with string "false" (it's truthy).
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined ? defaultValue : val.toLowerCase() === "true",
    );

/**
 * Parse optional URL - empty string becomes undefined
 */
const optionalUrl = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val : undefined));

export const ConfigSchema = z.object({
  // ==========================================================================
  // Server Configuration
  // ==========================================================================
  PORT: z.coerce.number().int().positive().default(8084).describe("HTTP server port"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("DoorAutoLock").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // Doors & State
  // ==========================================================================
  DOORS_CONFIG_PATH: z
    .string()
    .min(1)
    .default("./config/doors.json")
    .describe("JSON file listing the doors to manage"),
  STATE_PATH: z
    .string()
    .min(1)
    .default("./data/door-state.json")
    .describe("JSON file holding enabled/snooze state per door"),

  // ==========================================================================
  // MQTT Configuration
  // ==========================================================================
  MQTT_BROKER_URL: z
    .string()
    .min(1, "MQTT_BROKER_URL is required")
    .default("mqtt://localhost:1883")
    .describe("MQTT broker connection URL"),
  MQTT_COMMAND_SUFFIX: z
    .string()
    .default("/set")
    .describe("Suffix appended to a lock topic to publish commands"),
  MQTT_PUBLISH_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(10000)
    .describe("Time to wait for the broker to acknowledge a lock command (ms)"),

  // ==========================================================================
  // WhatsApp Notifications (WAHA)
  // ==========================================================================
  WAHA_SERVER: optionalUrl.describe("WAHA server endpoint"),
  WAHA_API_KEY: z.string().optional().describe("WAHA API key"),
  NOTIFICATION_PHONE: z
    .string()
    .optional()
    .describe("Default phone number for push notifications (WhatsApp format)"),
  NOTIFICATION_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(10000)
    .describe("HTTP timeout for notification delivery (ms)"),

  // ==========================================================================
  // Feature Flags
  // ==========================================================================
  ENABLE_NOTIFICATIONS: envBoolean(true).describe(
    "Enable WhatsApp push notifications",
  ),
});

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * WAHA notification configuration.
 * Returns null if push notifications are disabled or the server is not configured.
 * The phone number may be absent when every door names its own notify target.
 */
export function getNotificationConfig(): Readonly<{
  serverUrl: string;
  apiKey: string | undefined;
  phoneNumber: string | undefined;
  timeoutMs: number;
}> | null {
  if (!config.ENABLE_NOTIFICATIONS || !config.WAHA_SERVER) {
    return null;
  }

  return {
    serverUrl: config.WAHA_SERVER,
    apiKey: config.WAHA_API_KEY,
    phoneNumber: config.NOTIFICATION_PHONE,
    timeoutMs: config.NOTIFICATION_TIMEOUT_MS,
  };
}

/**
 * MQTT connection settings.
 */
export const mqttSettings = {
  brokerUrl: config.MQTT_BROKER_URL,
  commandSuffix: config.MQTT_COMMAND_SUFFIX,
  publishTimeoutMs: config.MQTT_PUBLISH_TIMEOUT_MS,
} as const;
