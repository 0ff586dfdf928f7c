/**
 * Portal Module - Public API
 *
 * Exports only what's needed by other modules.
 * Internal implementation details stay hidden.
 */

// Types
export type {
  AccountDetail,
  AuthTokens,
  CustomFieldRow,
  CustomFieldsBlock,
  GuestPassList,
  PortalImage,
  PortalTransport,
  RawAccount,
  RawAccrual,
  RawCamera,
  RawCommunalRequest,
  RawMainPass,
  RawMeter,
  RawMeterValue,
} from "./schema.js";
export type { PortalError } from "./errors.js";

// Error utilities
export { formatPortalError } from "./errors.js";

// Service functions (side effects)
export {
  authenticate,
  fetchImage,
  getAccountDetail,
  getMainPass,
  getMeterHistory,
  listAccounts,
  listCameras,
  listCommunalRequests,
  listGuestPasses,
  listMeters,
  resolveCameraStreamUrl,
} from "./service.js";

// Pure transformations
export {
  accrualsSince,
  buildAuthorizeData,
  buildEnvelope,
  buildObjectListQuery,
  normalizeLogin,
  sha256Hex,
} from "./transform.js";
