/**
 * MQTT Module - Service Layer
 *
 * MQTT client management and message handling.
 * Connects to broker, subscribes to every door's lock and sensor topics,
 * keeps the last observed values and publishes lock commands.
 */
import mqtt from "mqtt";
import type { MqttClient } from "mqtt";
import { type Result, err, ok } from "neverthrow";

import { mqttSettings } from "../config.js";
import type { DoorDevices, DoorEvent, LockState } from "../door/index.js";
import { createLogger } from "../logger.js";
import type { DoorTopics, ObservedState, TopicRoute } from "./schema.js";
import { INITIAL_OBSERVED_STATE, LOCK_COMMAND } from "./schema.js";
import { buildTopicRoutes, commandTopic, routeMessage } from "./transform.js";

const log = createLogger("mqtt");

// =============================================================================
// Module State
// =============================================================================

let mqttClient: MqttClient | null = null;
let observedState: ObservedState = INITIAL_OBSERVED_STATE;
let routes: ReadonlyMap<string, TopicRoute> = new Map();
let lockRefs: ReadonlyMap<string, string> = new Map();

/**
 * Callback types for MQTT events.
 */
export type MqttEventHandlers = {
  onDeviceEvent?: (doorId: string, event: DoorEvent) => void;
  onConnect?: () => void;
  onDisconnect?: () => void;
  onError?: (error: Error) => void;
};

let eventHandlers: MqttEventHandlers = {};

// =============================================================================
// Observed State Access
// =============================================================================

/**
 * Get last observed values (read-only).
 */
export function getObservedState(): ObservedState {
  return observedState;
}

/**
 * Last reported lock state; "unknown" before the first report.
 */
export function readLockState(doorId: string): LockState {
  return observedState.locks[doorId] ?? "unknown";
}

/**
 * Last reported door state; null before the first report.
 */
export function readDoorClosed(doorId: string): boolean | null {
  return observedState.doors[doorId] ?? null;
}

// =============================================================================
// MQTT Client Management
// =============================================================================

/**
 * Initialize and connect the MQTT client.
 *
 * @param doors - Doors whose topics to subscribe to
 * @param handlers - Event handlers for device updates
 * @returns true if connection initiated successfully
 */
export function initializeMqttClient(
  doors: ReadonlyArray<DoorTopics>,
  handlers: MqttEventHandlers = {},
): boolean {
  if (mqttClient) {
    log.warn("MQTT client already initialized");
    return true;
  }

  eventHandlers = handlers;
  routes = buildTopicRoutes(doors);
  lockRefs = new Map(doors.map((door) => [door.doorId, door.lockRef]));

  log.info({ broker: mqttSettings.brokerUrl }, "Connecting to MQTT broker...");

  try {
    mqttClient = mqtt.connect(mqttSettings.brokerUrl, {
      reconnectPeriod: 5000, // Reconnect every 5 seconds
      connectTimeout: 10000, // 10 second connection timeout
    });

    setupClientHandlers(mqttClient);

    return true;
  } catch (error) {
    log.error(
      { error: error instanceof Error ? error.message : String(error) },
      "Failed to initialize MQTT client",
    );
    return false;
  }
}

/**
 * Set up MQTT client event handlers.
 */
function setupClientHandlers(client: MqttClient): void {
  client.on("connect", () => {
    log.info("Connected to MQTT broker");

    subscribeToTopics(client);

    eventHandlers.onConnect?.();
  });

  client.on("message", (topic, message) => {
    handleMessage(topic, message);
  });

  client.on("error", (error) => {
    log.error({ error: error.message }, "MQTT client error");
    eventHandlers.onError?.(error);
  });

  client.on("close", () => {
    log.warn("MQTT connection closed");
    eventHandlers.onDisconnect?.();
  });

  client.on("reconnect", () => {
    log.info("Reconnecting to MQTT broker...");
  });

  client.on("offline", () => {
    log.warn("MQTT client offline");
  });
}

/**
 * Subscribe to every routed topic.
 */
function subscribeToTopics(client: MqttClient): void {
  for (const topic of routes.keys()) {
    client.subscribe(topic, (error) => {
      if (error) {
        log.error({ topic, error: error.message }, "Failed to subscribe to topic");
      } else {
        log.debug({ topic }, "Subscribed to topic");
      }
    });
  }
}

/**
 * Handle incoming MQTT message.
 */
export function handleMessage(topic: string, payload: Buffer | string): void {
  const route = routes.get(topic);
  if (!route) {
    log.debug({ topic }, "Message on unrouted topic");
    return;
  }

  const routed = routeMessage(observedState, route, payload);
  observedState = routed.state;

  if (routed.event === null) {
    log.trace({ topic }, "No change");
    return;
  }

  log.debug({ doorId: route.doorId, event: routed.event }, "Device state changed");
  eventHandlers.onDeviceEvent?.(route.doorId, routed.event);
}

// =============================================================================
// Lock Commands
// =============================================================================

/**
 * Publish the lock command for a door with QoS 1.
 *
 * @returns Ok once the broker acknowledged the publish, an error when it
 * failed or was not acknowledged within MQTT_PUBLISH_TIMEOUT_MS
 */
export function callLock(doorId: string): Promise<Result<void, string>> {
  const lockRef = lockRefs.get(doorId);
  if (lockRef === undefined) {
    return Promise.resolve(err(`No lock topic for door ${doorId}`));
  }

  const client = mqttClient;
  if (!client?.connected) {
    return Promise.resolve(err("MQTT client not connected"));
  }

  const topic = commandTopic(lockRef, mqttSettings.commandSuffix);
  log.info({ doorId, topic }, "Publishing lock command");

  return new Promise((resolve) => {
    const timeout = setTimeout(() => {
      log.error(
        { doorId, topic, timeoutMs: mqttSettings.publishTimeoutMs },
        "Lock command not acknowledged",
      );
      resolve(err("Lock command timed out"));
    }, mqttSettings.publishTimeoutMs);

    client.publish(topic, JSON.stringify(LOCK_COMMAND), { qos: 1 }, (error) => {
      clearTimeout(timeout);
      if (error) {
        log.error({ doorId, topic, error: error.message }, "Lock command publish failed");
        resolve(err(error.message));
        return;
      }
      resolve(ok(undefined));
    });
  });
}

/**
 * Device access for door controllers.
 */
export const devices: DoorDevices = {
  readDoorClosed,
  readLockState,
  callLock,
};

// =============================================================================
// Client Control
// =============================================================================

/**
 * Check if MQTT client is connected.
 */
export function isConnected(): boolean {
  return mqttClient?.connected ?? false;
}

/**
 * Disconnect and clean up MQTT client.
 */
export function disconnectMqttClient(): void {
  if (mqttClient) {
    log.info("Disconnecting MQTT client...");
    mqttClient.end(true);
    mqttClient = null;
  }
  observedState = INITIAL_OBSERVED_STATE;
  routes = new Map();
  lockRefs = new Map();
  eventHandlers = {};
}
