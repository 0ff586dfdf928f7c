/**
 * Sensors Module - Public API
 */

// Types
export type { SensorRecord, SensorState, StateClass } from "./schema.js";

// Pure transformations
export {
  accountSuffix,
  buildAccountSensors,
  meterNumber,
  roundValue,
} from "./transform.js";
