/**
 * Coordinator Module - Public API
 *
 * Exports only what's needed by other modules.
 * Internal implementation details stay hidden.
 */

// Types
export type {
  AccountSnapshot,
  CoordinatorOptions,
  CoordinatorState,
  PortalApi,
  RefreshCoordinator,
  RefreshMode,
  RefreshResult,
  RefreshStatus,
  Snapshot,
  SnapshotListener,
  TokenSink,
} from "./schema.js";
export type { CoordinatorError, ImageError } from "./errors.js";

// Error utilities
export { formatCoordinatorError, formatImageError } from "./errors.js";

// Service
export { createRefreshCoordinator, deepFreeze } from "./service.js";
