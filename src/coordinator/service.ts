/**
 * Coordinator Module - Service Layer
 *
 * Owns the credentials and the published snapshot. A refresh
 * authenticates (bounded retry), walks every account sequentially,
 * normalizes the payloads and swaps the snapshot in one assignment.
 * Refreshes are serialized; a failed refresh never touches the snapshot.
 */
import { type Result, err, ok } from "neverthrow";

import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import {
  buildMeterRecord,
  extractAddress,
  extractPaymentStatus,
  extractPersonalAccountNumber,
  meterIdentity,
  parseAccruals,
  parseCamera,
  parseCommunalRequests,
  parseGuestPasses,
  parseMainPass,
} from "../normalize/index.js";
import type {
  CameraRecord,
  GuestPass,
  MainPass,
  MeterRecord,
} from "../normalize/index.js";
import type {
  AuthTokens,
  PortalImage,
  RawAccount,
} from "../portal/index.js";
import {
  accrualsSince,
  authenticate,
  fetchImage,
  formatPortalError,
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
import {
  authRequired,
  formatCoordinatorError,
  imageFetchFailed,
  imageNotFound,
  updateCrashed,
  updateFailed,
} from "./errors.js";
import { Mutex } from "./mutex.js";
import { retryWithDelay, sleep as defaultSleep } from "./retry.js";
import type {
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
} from "./schema.js";
import {
  DEFAULT_ACCRUALS_LOOKBACK_DAYS,
  DEFAULT_AUTH_MAX_ATTEMPTS,
  DEFAULT_AUTH_RETRY_DELAY_MS,
  DEFAULT_SCAN_INTERVAL_MS,
} from "./schema.js";

const log = createLogger("coordinator");

const DEFAULT_PORTAL_API: PortalApi = {
  authenticate,
  listAccounts,
  getAccountDetail,
  listCommunalRequests,
  listMeters,
  getMeterHistory,
  listCameras,
  resolveCameraStreamUrl,
  getMainPass,
  listGuestPasses,
  fetchImage,
};

type RefreshTrigger = "scheduled" | "manual";

/**
 * Freeze a value and everything reachable from it.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Create a refresh coordinator.
 *
 * The first snapshot is empty; nothing is fetched until `refresh()` or
 * `startSchedule()` is called.
 *
 * @example
 * const coordinator = createRefreshCoordinator({ transport, login, password, deviceInstanceId });
 * const result = await coordinator.refresh();
 */
export function createRefreshCoordinator(
  options: CoordinatorOptions,
): RefreshCoordinator {
  const { transport, login, password, deviceInstanceId } = options;
  const portal = options.portal ?? DEFAULT_PORTAL_API;
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? Date.now;
  const maxAttempts = options.maxAttempts ?? DEFAULT_AUTH_MAX_ATTEMPTS;
  const retryDelayMs = options.retryDelayMs ?? DEFAULT_AUTH_RETRY_DELAY_MS;
  const scanIntervalMs = options.scanIntervalMs ?? DEFAULT_SCAN_INTERVAL_MS;
  const lookbackDays =
    options.accrualsLookbackDays ?? DEFAULT_ACCRUALS_LOOKBACK_DAYS;

  const mutex = new Mutex();
  const listeners = new Set<SnapshotListener>();

  let tokens: AuthTokens | undefined = options.tokens;
  let snapshot: Snapshot = deepFreeze({});
  let status: RefreshStatus = { state: "idle", authRequired: false };
  let scheduled = false;
  let timer: ReturnType<typeof setTimeout> | undefined;

  function setState(state: CoordinatorState): void {
    status = { ...status, state };
  }

  function timestamp(): string {
    return new Date(now()).toISOString();
  }

  // ===========================================================================
  // Authentication
  // ===========================================================================

  async function persistTokens(issued: AuthTokens): Promise<void> {
    if (!options.saveTokens) return;
    try {
      await options.saveTokens(issued);
    } catch (error) {
      log.warn(
        { error: error instanceof Error ? error.message : String(error) },
        "Failed to persist tokens",
      );
    }
  }

  async function authenticateWithRetry(): Promise<
    Result<AuthTokens, CoordinatorError>
  > {
    setState("authenticating");
    const startTime = Date.now();
    logOperationStart(log, "authenticate", { maxAttempts });

    const outcome = await retryWithDelay(
      () => portal.authenticate(transport, login, password, deviceInstanceId),
      { maxAttempts, delayMs: retryDelayMs, sleep },
      (error, attempt) => {
        log.warn(
          { attempt, maxAttempts, retryDelayMs, error: formatPortalError(error) },
          `Authentication attempt ${attempt} of ${maxAttempts} failed, retrying`,
        );
      },
    );

    if (outcome.isErr()) {
      const error = authRequired(outcome.error.attempts, outcome.error.error);
      logOperationFailed(log, "authenticate", error.message);
      return err(error);
    }

    tokens = outcome.value;
    await persistTokens(outcome.value);
    logOperationComplete(log, "authenticate", startTime);
    return ok(outcome.value);
  }

  // ===========================================================================
  // Per-Account Fetching
  // ===========================================================================

  async function fetchMeters(
    accessToken: string,
    accountId: string,
  ): Promise<Result<Readonly<Record<string, MeterRecord>>, CoordinatorError>> {
    const list = await portal.listMeters(transport, accessToken, accountId);
    if (list.isErr()) return err(updateFailed(list.error));

    const meters: Record<string, MeterRecord> = {};

    for (const raw of list.value) {
      const identity = meterIdentity(raw);
      if (!identity) {
        log.warn({ accountId }, "Skipping meter without id");
        continue;
      }

      const history = await portal.getMeterHistory(
        transport,
        accessToken,
        identity.id,
      );
      if (history.isErr()) return err(updateFailed(history.error));

      const record = buildMeterRecord(raw, history.value);
      if (record.isErr()) return err(updateFailed(record.error));

      meters[identity.id] = record.value;
    }

    return ok(meters);
  }

  async function fetchCameras(
    accessToken: string,
    accountId: string,
  ): Promise<ReadonlyArray<CameraRecord>> {
    const list = await portal.listCameras(transport, accessToken, accountId);
    if (list.isErr()) {
      log.warn(
        { accountId, error: formatPortalError(list.error) },
        "Camera list unavailable",
      );
      return [];
    }

    // Stream lookups are independent; one failing resolves to ""
    return Promise.all(
      list.value.map(async (raw) => ({
        ...parseCamera(raw),
        streamUrl: await portal.resolveCameraStreamUrl(
          transport,
          accessToken,
          raw,
        ),
      })),
    );
  }

  async function fetchMainPass(
    accessToken: string,
    accountId: string,
  ): Promise<MainPass | undefined> {
    const pass = await portal.getMainPass(transport, accessToken, accountId);
    if (pass.isErr()) {
      log.warn(
        { accountId, error: formatPortalError(pass.error) },
        "Main pass unavailable",
      );
      return undefined;
    }
    return parseMainPass(pass.value);
  }

  async function fetchGuestPasses(
    accessToken: string,
    accountId: string,
  ): Promise<ReadonlyArray<GuestPass>> {
    const passes = await portal.listGuestPasses(
      transport,
      accessToken,
      accountId,
    );
    if (passes.isErr()) {
      log.warn(
        { accountId, error: formatPortalError(passes.error) },
        "Guest passes unavailable",
      );
      return [];
    }
    return parseGuestPasses(passes.value);
  }

  async function fetchAccount(
    accessToken: string,
    account: RawAccount,
    mode: RefreshMode,
    previous: AccountSnapshot | undefined,
  ): Promise<Result<AccountSnapshot, CoordinatorError>> {
    const accountId = account.objectId.id;

    const detail = await portal.getAccountDetail(
      transport,
      accessToken,
      accountId,
      accrualsSince(now(), lookbackDays),
    );
    if (detail.isErr()) return err(updateFailed(detail.error));

    const requests = await portal.listCommunalRequests(
      transport,
      accessToken,
      accountId,
    );
    if (requests.isErr()) return err(updateFailed(requests.error));

    const meters = await fetchMeters(accessToken, accountId);
    if (meters.isErr()) return err(meters.error);

    const base = {
      id: accountId,
      title: account.objectId.title ?? accountId,
      personalAccountNumber: extractPersonalAccountNumber(account.objectId.title),
      address: extractAddress(account),
      paymentStatus: extractPaymentStatus(detail.value.optionalObject),
      notificationCount:
        account.notificationCount ?? detail.value.notificationCount ?? 0,
      accruals: parseAccruals(detail.value.items),
      communalRequests: parseCommunalRequests(requests.value),
      meters: meters.value,
    };

    if (mode === "sensors") {
      // Keep what a sensors refresh does not fetch
      return ok({
        ...base,
        cameras: previous?.cameras ?? [],
        guestPasses: previous?.guestPasses ?? [],
        ...(previous?.mainPass ? { mainPass: previous.mainPass } : {}),
      });
    }

    const cameras = await fetchCameras(accessToken, accountId);
    const mainPass = await fetchMainPass(accessToken, accountId);
    const guestPasses = await fetchGuestPasses(accessToken, accountId);

    return ok({
      ...base,
      cameras,
      guestPasses,
      ...(mainPass ? { mainPass } : {}),
    });
  }

  // ===========================================================================
  // Refresh
  // ===========================================================================

  async function collect(mode: RefreshMode): Promise<Result<Snapshot, CoordinatorError>> {
    const auth = await authenticateWithRetry();
    if (auth.isErr()) return err(auth.error);

    setState("fetching");
    const { accessToken } = auth.value;

    const accounts = await portal.listAccounts(transport, accessToken);
    if (accounts.isErr()) return err(updateFailed(accounts.error));

    log.debug({ accountCount: accounts.value.length, mode }, "Fetching accounts");

    const next: Record<string, AccountSnapshot> = {};
    for (const account of accounts.value) {
      const accountId = account.objectId.id;
      const result = await fetchAccount(
        accessToken,
        account,
        mode,
        snapshot[accountId],
      );
      if (result.isErr()) return err(result.error);
      next[accountId] = result.value;
    }

    return ok(next);
  }

  function notify(published: Snapshot): void {
    for (const listener of listeners) {
      try {
        const pending = listener(published);
        if (pending instanceof Promise) {
          pending.catch((error: unknown) => {
            log.error(
              { error: error instanceof Error ? error.message : String(error) },
              "Snapshot listener failed",
            );
          });
        }
      } catch (error) {
        log.error(
          { error: error instanceof Error ? error.message : String(error) },
          "Snapshot listener failed",
        );
      }
    }
  }

  async function runRefresh(
    mode: RefreshMode,
    trigger: RefreshTrigger,
  ): Promise<RefreshResult> {
    const startTime = Date.now();
    logOperationStart(log, "refresh", { mode, trigger });

    let result: Result<Snapshot, CoordinatorError>;
    try {
      result = await collect(mode);
    } catch (thrown) {
      result = err(updateCrashed(thrown));
    } finally {
      setState("idle");
    }

    if (result.isErr()) {
      status = {
        ...status,
        authRequired: status.authRequired || result.error.type === "AUTH_REQUIRED",
        lastFailure: {
          type: result.error.type,
          message: result.error.message,
          at: timestamp(),
        },
      };
      logOperationFailed(log, "refresh", formatCoordinatorError(result.error), {
        mode,
        trigger,
      });
      return err(result.error);
    }

    snapshot = deepFreeze(result.value);
    const accountCount = Object.keys(snapshot).length;
    status = {
      ...status,
      authRequired: false,
      lastRefresh: { mode, at: timestamp(), accountCount },
    };
    logOperationComplete(log, "refresh", startTime, { mode, trigger, accountCount });

    notify(snapshot);
    return ok(snapshot);
  }

  // ===========================================================================
  // Schedule
  // ===========================================================================

  async function tick(): Promise<void> {
    if (status.authRequired) {
      log.warn("Re-authentication required, skipping scheduled refresh");
      return;
    }
    await mutex.run(() => runRefresh("full", "scheduled"));
  }

  function scheduleNext(): void {
    timer = setTimeout(() => {
      void tick()
        .catch((error: unknown) => {
          log.error(
            { error: error instanceof Error ? error.message : String(error) },
            "Scheduled refresh crashed",
          );
        })
        .finally(() => {
          if (scheduled) scheduleNext();
        });
    }, scanIntervalMs);
  }

  // ===========================================================================
  // Images
  // ===========================================================================

  async function fetchAccountImage(
    url: string | undefined,
    what: string,
  ): Promise<Result<PortalImage, ImageError>> {
    if (!url) return err(imageNotFound(`${what} has no image`));
    const image = await portal.fetchImage(transport, url, tokens?.accessToken);
    return image.mapErr(imageFetchFailed);
  }

  return {
    getSnapshot: () => snapshot,
    getAccount: (accountId) => snapshot[accountId],
    getStatus: () => status,

    refresh: () => mutex.run(() => runRefresh("full", "scheduled")),
    forceFullRefresh: () => mutex.run(() => runRefresh("full", "manual")),
    forceSensorsRefresh: () => mutex.run(() => runRefresh("sensors", "manual")),

    subscribe: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    fetchCameraImage: async (accountId, cameraId) => {
      const account = snapshot[accountId];
      if (!account) return err(imageNotFound(`Account ${accountId}`));
      const camera = account.cameras.find((entry) => entry.id === cameraId);
      if (!camera) {
        return err(imageNotFound(`Camera ${cameraId} of account ${accountId}`));
      }
      return fetchAccountImage(camera.previewUrl, `Camera ${cameraId}`);
    },

    fetchMainPassQr: async (accountId) => {
      const account = snapshot[accountId];
      if (!account) return err(imageNotFound(`Account ${accountId}`));
      return fetchAccountImage(account.mainPass?.qrUrl, `Main pass of ${accountId}`);
    },

    startSchedule: () => {
      if (scheduled) return;
      scheduled = true;
      log.info({ scanIntervalMs }, "Refresh schedule started");
      scheduleNext();
    },

    stopSchedule: () => {
      scheduled = false;
      if (timer) {
        clearTimeout(timer);
        timer = undefined;
      }
      log.info("Refresh schedule stopped");
    },
  };
}
