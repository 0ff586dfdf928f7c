/**
 * Sensors Module - Types
 *
 * Dashboard-facing sensor records derived from an account snapshot.
 */

export type SensorState = string | number | null;

export type StateClass = "measurement" | "total_increasing";

export type SensorRecord = Readonly<{
  /** Stable per-account key, e.g. "meter_00112233_value" */
  key: string;
  /** Globally unique id: communal_<account suffix>_<key> */
  entityId: string;
  name: string;
  icon: string;
  state: SensorState;
  unit?: string;
  deviceClass?: string;
  stateClass?: StateClass;
  attributes: Readonly<Record<string, unknown>>;
}>;
