/**
 * MQTT Module - Public API
 *
 * Exports types, service functions, and transformations for the MQTT module.
 */

// Types
export type {
  DoorTopics,
  ObservedState,
  RoutedMessage,
  TopicRoute,
} from "./schema.js";

export { INITIAL_OBSERVED_STATE, LOCK_COMMAND } from "./schema.js";

// Service functions
export {
  callLock,
  devices,
  disconnectMqttClient,
  getObservedState,
  handleMessage,
  initializeMqttClient,
  isConnected,
  readDoorClosed,
  readLockState,
} from "./service.js";

export type { MqttEventHandlers } from "./service.js";

// Pure transformations (for testing)
export {
  buildTopicRoutes,
  commandTopic,
  normalizeLockState,
  parseDoorSensorMessage,
  parseLockMessage,
  routeMessage,
} from "./transform.js";
