/**
 * Communal Bridge - Application Entry Point
 *
 * Sets up Hono server with:
 * - Health check and snapshot endpoints
 * - Manual refresh triggers
 * - Request ID tracing
 * - Global error handling
 * - Scheduled portal refresh and MQTT publishing
 */
import { serve } from "@hono/node-server";
import { Hono } from "hono";

import { errorHandler, notFoundHandler } from "./api/errorHandler.js";
import { requestIdMiddleware } from "./api/middleware/requestId.js";
import { createRoutes } from "./api/routes.js";
import { config, getMqttConfig, getScanIntervalMs } from "./config.js";
import {
  createRefreshCoordinator,
  formatCoordinatorError,
} from "./coordinator/index.js";
import { createLogger } from "./logger.js";
import {
  disconnectMqttPublisher,
  initializeMqttPublisher,
  publishSnapshot,
} from "./mqtt/index.js";
import type { AuthTokens, PortalTransport } from "./portal/index.js";
import { formatStoreError, loadOrCreateState, saveTokens } from "./store/index.js";

const log = createLogger("api");

// =============================================================================
// APPLICATION STARTUP BANNER
// =============================================================================

console.log("");
console.log("========================================");
console.log("  COMMUNAL BRIDGE");
console.log("========================================");
console.log("");

// Log configuration summary (non-sensitive values only)
log.info(
  {
    port: config.PORT,
    env: config.NODE_ENV,
    portalApi: config.PORTAL_API_URL,
    scanIntervalHours: config.SCAN_INTERVAL_HOURS,
    authMaxAttempts: config.AUTH_MAX_ATTEMPTS,
    stateFile: config.STATE_FILE,
    mqttBroker: config.MQTT_BROKER_URL,
  },
  "Configuration loaded",
);

// =============================================================================
// PERSISTED STATE
// =============================================================================

const stateResult = await loadOrCreateState(config.STATE_FILE);
if (stateResult.isErr()) {
  log.fatal({ error: formatStoreError(stateResult.error) }, "Cannot load state file");
  process.exit(1);
}
const state = stateResult.value;

const cachedTokens: AuthTokens | undefined =
  state.accessToken && state.refreshToken
    ? { accessToken: state.accessToken, refreshToken: state.refreshToken }
    : undefined;

// =============================================================================
// REFRESH COORDINATOR
// =============================================================================

const transport: PortalTransport = {
  fetch: globalThis.fetch,
  apiUrl: config.PORTAL_API_URL,
  namespace: config.PORTAL_NAMESPACE,
  timeoutMs: config.REQUEST_TIMEOUT_MS,
  secondaryTimeoutMs: config.SECONDARY_TIMEOUT_MS,
};

const coordinator = createRefreshCoordinator({
  transport,
  login: config.PORTAL_LOGIN,
  password: config.PORTAL_PASSWORD,
  deviceInstanceId: state.deviceInstanceId,
  tokens: cachedTokens,
  saveTokens: async (tokens) => {
    const saved = await saveTokens(config.STATE_FILE, state.deviceInstanceId, tokens);
    if (saved.isErr()) {
      log.warn({ error: formatStoreError(saved.error) }, "Failed to persist tokens");
    }
  },
  maxAttempts: config.AUTH_MAX_ATTEMPTS,
  retryDelayMs: config.AUTH_RETRY_DELAY_MS,
  scanIntervalMs: getScanIntervalMs(),
  accrualsLookbackDays: config.ACCRUALS_LOOKBACK_DAYS,
});

// =============================================================================
// MQTT PUBLISHING
// =============================================================================

const mqttConfig = getMqttConfig();
if (mqttConfig && initializeMqttPublisher(mqttConfig)) {
  coordinator.subscribe((snapshot) => publishSnapshot(snapshot).then(() => undefined));
  log.info({ topicPrefix: mqttConfig.topicPrefix }, "MQTT publishing: ENABLED");
} else {
  log.info("MQTT publishing: DISABLED");
}

// =============================================================================
// HONO SERVER SETUP
// =============================================================================

const app = new Hono();

// Global middleware
app.use("*", requestIdMiddleware);

// Error handlers
app.onError(errorHandler);
app.notFound(notFoundHandler);

// Mount routes
app.route("/", createRoutes(coordinator));

// =============================================================================
// FIRST REFRESH & SCHEDULE
// =============================================================================

// The server comes up even when the first refresh fails. After UPDATE_FAILED
// the schedule tries again; after AUTH_REQUIRED scheduled ticks are skipped
// until a manual refresh succeeds.
const firstRefresh = await coordinator.forceFullRefresh();
if (firstRefresh.isErr()) {
  log.error(
    { error: formatCoordinatorError(firstRefresh.error) },
    "Initial refresh failed",
  );
}
coordinator.startSchedule();

// =============================================================================
// START SERVER
// =============================================================================

const server = serve({ fetch: app.fetch, port: config.PORT, hostname: "0.0.0.0" }, (info) => {
  log.info(
    { port: info.port, env: config.NODE_ENV, appName: config.APP_NAME },
    `${config.APP_NAME} listening on port ${info.port}`,
  );
});

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const shutdown = (signal: string) => {
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  coordinator.stopSchedule();
  disconnectMqttPublisher();

  server.close(() => {
    log.info("Shutdown complete");
    process.exit(0);
  });
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
