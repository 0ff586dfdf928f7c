/**
 * MQTT Module - Service Layer
 *
 * MQTT client management and snapshot publishing.
 * Messages are retained with QoS 1 so a dashboard that connects later
 * still sees the latest snapshot. Publish failures are logged only.
 */
import mqtt from "mqtt";
import type { MqttClient } from "mqtt";

import type { Snapshot } from "../coordinator/index.js";
import { createLogger } from "../logger.js";
import type { MqttPublisherConfig } from "./schema.js";
import { buildSnapshotMessages } from "./transform.js";

const log = createLogger("mqtt");

// =============================================================================
// Module State
// =============================================================================

let mqttClient: MqttClient | null = null;
let topicPrefix = "";

// =============================================================================
// MQTT Client Management
// =============================================================================

/**
 * Initialize and connect the MQTT client.
 *
 * @returns true if connection initiated successfully
 */
export function initializeMqttPublisher(settings: MqttPublisherConfig): boolean {
  if (mqttClient) {
    log.warn("MQTT client already initialized");
    return true;
  }

  topicPrefix = settings.topicPrefix;
  log.info({ broker: settings.brokerUrl }, "Connecting to MQTT broker...");

  try {
    mqttClient = mqtt.connect(settings.brokerUrl, {
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
  });

  client.on("error", (error) => {
    log.error({ error: error.message }, "MQTT client error");
  });

  client.on("close", () => {
    log.warn("MQTT connection closed");
  });

  client.on("reconnect", () => {
    log.info("Reconnecting to MQTT broker...");
  });

  client.on("offline", () => {
    log.warn("MQTT client offline");
  });
}

// =============================================================================
// Publishing
// =============================================================================

/**
 * Publish every account of a snapshot.
 *
 * @returns Number of messages the broker accepted
 */
export async function publishSnapshot(
  snapshot: Snapshot,
  now: number = Date.now(),
): Promise<number> {
  const client = mqttClient;
  if (!client) {
    log.debug("MQTT publisher not initialized, skipping snapshot");
    return 0;
  }

  const messages = buildSnapshotMessages(
    snapshot,
    topicPrefix,
    new Date(now).toISOString(),
  );

  const outcomes = await Promise.all(
    messages.map(async ({ topic, payload }) => {
      try {
        await client.publishAsync(topic, payload, { qos: 1, retain: true });
        return true;
      } catch (error) {
        log.error(
          { topic, error: error instanceof Error ? error.message : String(error) },
          "Failed to publish message",
        );
        return false;
      }
    }),
  );

  const published = outcomes.filter(Boolean).length;
  log.debug({ published, total: messages.length }, "Snapshot published");
  return published;
}

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
export function disconnectMqttPublisher(): void {
  if (mqttClient) {
    log.info("Disconnecting MQTT client...");
    mqttClient.end(true);
    mqttClient = null;
  }
}
