/**
 * MQTT Module - Pure Transformations
 *
 * Topic naming and message building.
 * No side effects, no I/O - just data in, data out.
 */
import type { AccountSnapshot, Snapshot } from "../coordinator/index.js";
import type { MeterRecord } from "../normalize/index.js";
import { buildAccountSensors } from "../sensors/index.js";
import type {
  AccountStateMessage,
  OutboundMessage,
  PublishedMeter,
  TopicLeaf,
} from "./schema.js";

/**
 * @example
 * accountTopic("homelab/communal/", "a-1", "state") // "homelab/communal/a-1/state"
 */
export function accountTopic(
  prefix: string,
  accountId: string,
  leaf: TopicLeaf,
): string {
  return `${prefix.replace(/\/+$/, "")}/${accountId}/${leaf}`;
}

function toPublishedMeter(meter: MeterRecord): PublishedMeter {
  const { history, ...rest } = meter;
  const latest = history.at(-1);
  return {
    ...rest,
    currentValue: latest?.value ?? null,
    lastUpdate: latest?.date ?? null,
  };
}

/**
 * Account record for the state topic, without meter histories.
 */
export function toStateMessage(
  account: AccountSnapshot,
  publishedAt: string,
): AccountStateMessage {
  return {
    ...account,
    meters: Object.fromEntries(
      Object.entries(account.meters).map(([meterId, meter]) => [
        meterId,
        toPublishedMeter(meter),
      ]),
    ),
    publishedAt,
  };
}

/**
 * Two messages per account: its state and its sensor records.
 */
export function buildSnapshotMessages(
  snapshot: Snapshot,
  prefix: string,
  publishedAt: string,
): ReadonlyArray<OutboundMessage> {
  return Object.values(snapshot).flatMap((account) => [
    {
      topic: accountTopic(prefix, account.id, "state"),
      payload: JSON.stringify(toStateMessage(account, publishedAt)),
    },
    {
      topic: accountTopic(prefix, account.id, "sensors"),
      payload: JSON.stringify(buildAccountSensors(account)),
    },
  ]);
}
