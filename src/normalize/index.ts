/**
 * Normalize Module - Public API
 *
 * Exports only what's needed by other modules.
 * Internal implementation details stay hidden.
 */

// Types
export type {
  Accrual,
  CalendarDate,
  CameraRecord,
  CommunalRequest,
  GuestPass,
  KnownRequestStatus,
  MainPass,
  MeterReading,
  MeterRecord,
  MeterTypeCode,
  MeterUnit,
} from "./schema.js";
export type { NormalizeError } from "./errors.js";

// Constants
export { METER_TYPE_CODES } from "./schema.js";

// Error utilities
export { formatNormalizeError } from "./errors.js";

// Pure transformations
export {
  UNKNOWN_ADDRESS,
  UNKNOWN_PAYMENT_STATUS,
  UNKNOWN_PERSONAL_ACCOUNT,
  buildMeterHistory,
  buildMeterRecord,
  extractAddress,
  extractCalibrationDate,
  extractPaymentStatus,
  extractPersonalAccountNumber,
  meterIdentity,
  meterTypeCode,
  meterUnit,
  parseAccruals,
  parseCamera,
  parseCommunalRequests,
  parseDecimal,
  parseGuestPasses,
  parseMainPass,
  parsePortalDate,
  stripMarkup,
} from "./transform.js";
