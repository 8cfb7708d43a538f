/**
 * Door Auto-Lock Service - Application Entry Point
 *
 * Loads the doors file and persisted door state, connects the MQTT device
 * gateway, and serves the HTTP API. Exits with status 1 when the doors
 * file or the state file cannot be read.
 */
import { serve } from "@hono/node-server";

import { createApp } from "./api/app.js";
import { config, getNotificationConfig } from "./config.js";
import { createLogger } from "./logger.js";
import {
  devices,
  disconnectMqttClient,
  initializeMqttClient,
  isConnected,
} from "./mqtt/index.js";
import { notifier } from "./notifications/index.js";
import { createDoorRegistry, formatRegistryError, loadDoorsFile } from "./registry/index.js";
import { createFileStateStore, formatStoreError } from "./store/index.js";

const log = createLogger("api");

async function main(): Promise<void> {
  log.info(
    {
      port: config.PORT,
      env: config.NODE_ENV,
      doorsConfig: config.DOORS_CONFIG_PATH,
      statePath: config.STATE_PATH,
      mqttBroker: config.MQTT_BROKER_URL,
    },
    "Configuration loaded",
  );

  const notificationConfig = getNotificationConfig();
  if (notificationConfig) {
    log.info({ server: notificationConfig.serverUrl }, "WhatsApp notifications: ENABLED");
  } else {
    log.info("WhatsApp notifications: DISABLED");
  }

  // ===========================================================================
  // Doors & State
  // ===========================================================================

  const store = createFileStateStore(config.STATE_PATH);
  const loaded = await store.load();
  if (loaded.isErr()) {
    log.fatal(formatStoreError(loaded.error));
    process.exit(1);
  }

  const doors = await loadDoorsFile(config.DOORS_CONFIG_PATH);
  if (doors.isErr()) {
    log.fatal(formatRegistryError(doors.error));
    process.exit(1);
  }

  const registry = createDoorRegistry(doors.value, {
    devices,
    notifier,
    store,
    loadSettings: (doorId) => store.get(doorId),
  });

  // ===========================================================================
  // Device Gateway
  // ===========================================================================

  initializeMqttClient(registry.topics(), {
    onDeviceEvent: (doorId, event) => {
      registry.dispatch(doorId, event).catch((error: unknown) => {
        log.error(
          { doorId, error: error instanceof Error ? error.message : String(error) },
          "Device event handling failed",
        );
      });
    },
  });

  // ===========================================================================
  // HTTP Server
  // ===========================================================================

  const app = createApp({ registry, isMqttConnected: isConnected });

  const server = serve({ fetch: app.fetch, port: config.PORT, hostname: "0.0.0.0" }, (info) => {
    log.info({ port: info.port, appName: config.APP_NAME }, `${config.APP_NAME} listening`);
  });

  // ===========================================================================
  // Graceful Shutdown
  // ===========================================================================

  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    log.info({ signal }, `${signal} received. Shutting down gracefully...`);

    server.close();
    await registry.dispose();
    disconnectMqttClient();

    log.info("Shutdown complete");
    process.exit(0);
  };

  const onSignal = (signal: string) => () => {
    shutdown(signal).catch((error: unknown) => {
      log.error({ error: error instanceof Error ? error.message : String(error) }, "Shutdown failed");
      process.exit(1);
    });
  };

  process.on("SIGTERM", onSignal("SIGTERM"));
  process.on("SIGINT", onSignal("SIGINT"));
}

main().catch((error: unknown) => {
  log.fatal({ error: error instanceof Error ? error.message : String(error) }, "Startup failed");
  process.exit(1);
});
