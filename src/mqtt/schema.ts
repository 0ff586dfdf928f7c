/**
 * MQTT Module - Types
 *
 * Shapes of the retained messages published for the dashboard.
 */
import type { AccountSnapshot } from "../coordinator/index.js";
import type { MeterRecord } from "../normalize/index.js";

export type MqttPublisherConfig = Readonly<{
  brokerUrl: string;
  topicPrefix: string;
}>;

export type TopicLeaf = "state" | "sensors";

/**
 * One message ready for publishing.
 */
export type OutboundMessage = Readonly<{
  topic: string;
  payload: string;
}>;

/**
 * Meter as published on the state topic: the reading history is
 * replaced by its latest entry.
 */
export type PublishedMeter = Readonly<
  Omit<MeterRecord, "history"> & {
    currentValue: number | null;
    lastUpdate: string | null;
  }
>;

export type AccountStateMessage = Readonly<
  Omit<AccountSnapshot, "meters"> & {
    meters: Readonly<Record<string, PublishedMeter>>;
    publishedAt: string;
  }
>;
