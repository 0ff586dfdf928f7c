/**
 * Coordinator Module - Types
 *
 * The published snapshot and the coordinator's public surface.
 */
import type { Result } from "neverthrow";

import type {
  Accrual,
  CameraRecord,
  CommunalRequest,
  GuestPass,
  MainPass,
  MeterRecord,
} from "../normalize/index.js";
import type {
  AuthTokens,
  PortalImage,
  PortalTransport,
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
} from "../portal/index.js";
import type { CoordinatorError, ImageError } from "./errors.js";

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_AUTH_MAX_ATTEMPTS = 5;
export const DEFAULT_AUTH_RETRY_DELAY_MS = 15_000;
export const DEFAULT_SCAN_INTERVAL_MS = 12 * 60 * 60 * 1000;
export const DEFAULT_ACCRUALS_LOOKBACK_DAYS = 365;

// =============================================================================
// Snapshot
// =============================================================================

/**
 * Everything known about one communal account after a refresh.
 */
export type AccountSnapshot = Readonly<{
  id: string;
  title: string;
  personalAccountNumber: string;
  address: string;
  paymentStatus: string;
  notificationCount: number;
  accruals: ReadonlyArray<Accrual>;
  communalRequests: ReadonlyArray<CommunalRequest>;
  /** Keyed by meter id */
  meters: Readonly<Record<string, MeterRecord>>;
  cameras: ReadonlyArray<CameraRecord>;
  mainPass?: MainPass;
  guestPasses: ReadonlyArray<GuestPass>;
}>;

/**
 * Account snapshots keyed by account id. Replaced wholesale, never
 * mutated in place.
 */
export type Snapshot = Readonly<Record<string, AccountSnapshot>>;

// =============================================================================
// Refresh
// =============================================================================

/**
 * "full" fetches everything; "sensors" skips cameras and passes.
 */
export type RefreshMode = "full" | "sensors";

export type CoordinatorState = "idle" | "authenticating" | "fetching";

export type RefreshStatus = Readonly<{
  state: CoordinatorState;
  /** Set after authentication retries are exhausted, cleared by the next success */
  authRequired: boolean;
  lastRefresh?: Readonly<{
    mode: RefreshMode;
    at: string;
    accountCount: number;
  }>;
  lastFailure?: Readonly<{
    type: CoordinatorError["type"];
    message: string;
    at: string;
  }>;
}>;

export type SnapshotListener = (snapshot: Snapshot) => void | Promise<void>;

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Portal operations the coordinator calls. Defaults to the real portal
 * module; tests pass fakes.
 */
export type PortalApi = Readonly<{
  authenticate: typeof authenticate;
  listAccounts: typeof listAccounts;
  getAccountDetail: typeof getAccountDetail;
  listCommunalRequests: typeof listCommunalRequests;
  listMeters: typeof listMeters;
  getMeterHistory: typeof getMeterHistory;
  listCameras: typeof listCameras;
  resolveCameraStreamUrl: typeof resolveCameraStreamUrl;
  getMainPass: typeof getMainPass;
  listGuestPasses: typeof listGuestPasses;
  fetchImage: typeof fetchImage;
}>;

/**
 * Where freshly issued tokens are handed over for persistence.
 */
export type TokenSink = (tokens: AuthTokens) => Promise<void>;

export type CoordinatorOptions = Readonly<{
  transport: PortalTransport;
  login: string;
  password: string;
  deviceInstanceId: string;
  /** Tokens cached from a previous run, used until the first authentication */
  tokens?: AuthTokens;
  portal?: PortalApi;
  saveTokens?: TokenSink;
  maxAttempts?: number;
  retryDelayMs?: number;
  scanIntervalMs?: number;
  accrualsLookbackDays?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}>;

// =============================================================================
// Public Surface
// =============================================================================

export type RefreshResult = Result<Snapshot, CoordinatorError>;

export type RefreshCoordinator = Readonly<{
  getSnapshot: () => Snapshot;
  getAccount: (accountId: string) => AccountSnapshot | undefined;
  getStatus: () => RefreshStatus;
  /** Scheduled tick: full refresh */
  refresh: () => Promise<RefreshResult>;
  forceFullRefresh: () => Promise<RefreshResult>;
  forceSensorsRefresh: () => Promise<RefreshResult>;
  /** @returns Unsubscribe function */
  subscribe: (listener: SnapshotListener) => () => void;
  fetchCameraImage: (
    accountId: string,
    cameraId: string,
  ) => Promise<Result<PortalImage, ImageError>>;
  fetchMainPassQr: (accountId: string) => Promise<Result<PortalImage, ImageError>>;
  startSchedule: () => void;
  stopSchedule: () => void;
}>;
