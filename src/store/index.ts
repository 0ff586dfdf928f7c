/**
 * Store Module - Public API
 */

// Types
export type { PersistedState } from "./schema.js";
export type { StoreError } from "./errors.js";

// Error utilities
export { formatStoreError } from "./errors.js";

// Service functions (side effects)
export {
  generateDeviceInstanceId,
  loadOrCreateState,
  readState,
  saveTokens,
  writeState,
} from "./service.js";
