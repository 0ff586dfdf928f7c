/**
 * MQTT Module - Public API
 *
 * Exports types, service functions, and transformations for the MQTT module.
 */

// Types
export type {
  AccountStateMessage,
  MqttPublisherConfig,
  OutboundMessage,
  PublishedMeter,
  TopicLeaf,
} from "./schema.js";

// Service functions
export {
  disconnectMqttPublisher,
  initializeMqttPublisher,
  isConnected,
  publishSnapshot,
} from "./service.js";

// Pure transformations (for testing)
export {
  accountTopic,
  buildSnapshotMessages,
  toStateMessage,
} from "./transform.js";
