/**
 * API routes for the communal bridge.
 *
 * Routes are organized by domain:
 * - /api/health - Health check and refresh status
 * - /api/accounts/* - Snapshot data, sensors and images
 * - /api/refresh/* - Manual refresh triggers
 */
import { Hono, type Context } from "hono";
import type { Result } from "neverthrow";

import {
  formatCoordinatorError,
  formatImageError,
  type AccountSnapshot,
  type ImageError,
  type RefreshCoordinator,
  type RefreshResult,
} from "../coordinator/index.js";
import { createLogger } from "../logger.js";
import { isConnected } from "../mqtt/index.js";
import type { PortalImage } from "../portal/index.js";
import { buildAccountSensors } from "../sensors/index.js";

const log = createLogger("api");

/**
 * Summary row for the account list.
 */
function toAccountSummary(account: AccountSnapshot) {
  return {
    id: account.id,
    title: account.title,
    personalAccountNumber: account.personalAccountNumber,
    address: account.address,
    paymentStatus: account.paymentStatus,
    meterCount: Object.keys(account.meters).length,
    cameraCount: account.cameras.length,
  };
}

function imageStatus(error: ImageError): 404 | 502 {
  return error.type === "NOT_FOUND" ? 404 : 502;
}

function imageResponse(image: PortalImage): Response {
  return new Response(image.body, {
    status: 200,
    headers: {
      "Content-Type": image.contentType,
      "Cache-Control": "no-store",
    },
  });
}

export function createRoutes(coordinator: RefreshCoordinator): Hono {
  const routes = new Hono();

  // ===========================================================================
  // Health Check
  // ===========================================================================

  routes.get("/api/health", (c) => {
    const requestId = c.get("requestId");
    log.debug({ requestId }, "Health check");

    const status = coordinator.getStatus();

    return c.json({
      status: status.authRequired ? "degraded" : "ok",
      timestamp: new Date().toISOString(),
      requestId,
      refresh: status,
      accountCount: Object.keys(coordinator.getSnapshot()).length,
      mqttConnected: isConnected(),
    });
  });

  // ===========================================================================
  // Snapshot Data
  // ===========================================================================

  routes.get("/api/accounts", (c) => {
    const accounts = Object.values(coordinator.getSnapshot()).map(toAccountSummary);
    return c.json({ accounts });
  });

  routes.get("/api/accounts/:accountId", (c) => {
    const account = coordinator.getAccount(c.req.param("accountId"));
    if (!account) {
      return c.json({ error: "Account not found" }, 404);
    }
    return c.json(account);
  });

  routes.get("/api/accounts/:accountId/sensors", (c) => {
    const account = coordinator.getAccount(c.req.param("accountId"));
    if (!account) {
      return c.json({ error: "Account not found" }, 404);
    }
    return c.json({ sensors: buildAccountSensors(account) });
  });

  // ===========================================================================
  // Images
  // ===========================================================================

  const sendImage = async (
    c: Context,
    lookup: Promise<Result<PortalImage, ImageError>>,
  ) => {
    const result = await lookup;
    if (result.isErr()) {
      const requestId = c.get("requestId");
      const message = formatImageError(result.error);
      log.warn({ requestId, error: message }, "Image lookup failed");
      return c.json({ error: message, requestId }, imageStatus(result.error));
    }
    return imageResponse(result.value);
  };

  routes.get("/api/accounts/:accountId/cameras/:cameraId/image", (c) =>
    sendImage(
      c,
      coordinator.fetchCameraImage(c.req.param("accountId"), c.req.param("cameraId")),
    ),
  );

  routes.get("/api/accounts/:accountId/main-pass/qr", (c) =>
    sendImage(c, coordinator.fetchMainPassQr(c.req.param("accountId"))),
  );

  // ===========================================================================
  // Manual Refresh
  // ===========================================================================

  const sendRefresh = (c: Context, result: RefreshResult) => {
    const requestId = c.get("requestId");

    if (result.isErr()) {
      log.warn({ requestId, errorType: result.error.type }, "Manual refresh failed");
      return c.json(
        {
          success: false,
          error: formatCoordinatorError(result.error),
          errorType: result.error.type,
          requestId,
        },
        result.error.type === "AUTH_REQUIRED" ? 401 : 503,
      );
    }

    return c.json({
      success: true,
      accountCount: Object.keys(result.value).length,
      refreshedAt: coordinator.getStatus().lastRefresh?.at ?? null,
      requestId,
    });
  };

  routes.post("/api/refresh", async (c) => {
    log.info({ requestId: c.get("requestId") }, "Manual full refresh requested");
    return sendRefresh(c, await coordinator.forceFullRefresh());
  });

  routes.post("/api/refresh/sensors", async (c) => {
    log.info({ requestId: c.get("requestId") }, "Manual sensors refresh requested");
    return sendRefresh(c, await coordinator.forceSensorsRefresh());
  });

  return routes;
}
