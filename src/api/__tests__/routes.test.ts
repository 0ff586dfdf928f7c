/**
 * API Routes Integration Tests
 *
 * Tests API endpoints against a fake coordinator.
 * Uses Hono's app.request() for realistic HTTP testing.
 */
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";

vi.mock("../../mqtt/index.js", () => ({
  isConnected: vi.fn(() => true),
}));

// Mock logger to prevent pino initialization issues
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
  logOperationStart: vi.fn(),
  logOperationComplete: vi.fn(),
  logOperationFailed: vi.fn(),
}));

// Now import the modules (after mocks are set up)
import { err, ok } from "neverthrow";

import type {
  AccountSnapshot,
  RefreshCoordinator,
  RefreshStatus,
} from "../../coordinator/index.js";
import { errorHandler, notFoundHandler } from "../errorHandler.js";
import { requestIdMiddleware } from "../middleware/requestId.js";
import { createRoutes } from "../routes.js";

// =============================================================================
// Fixtures
// =============================================================================

const ACCOUNT: AccountSnapshot = {
  id: "a-1",
  title: "Л/с №123456",
  personalAccountNumber: "123456",
  address: "ул. Тестовая, 1",
  paymentStatus: "Оплачено",
  notificationCount: 2,
  accruals: [],
  communalRequests: [],
  meters: {
    "m-1": {
      title: "ХВС №00112233",
      typeCode: "ColdWater",
      typeTitle: "Холодная вода",
      history: [{ date: "01.02.2024", value: 12 }],
    },
  },
  cameras: [
    { id: "7", title: "Entrance", previewUrl: "https://cdn.example.test/p.jpg", streamUrl: "" },
  ],
  guestPasses: [],
};

const IDLE_STATUS: RefreshStatus = {
  state: "idle",
  authRequired: false,
  lastRefresh: { mode: "full", at: "2023-11-14T22:13:20.000Z", accountCount: 1 },
};

const PORTAL_CAUSE = {
  type: "PROTOCOL_ERROR",
  operation: "authenticate",
  message: "Status code 401: Unauthorized",
  statusCode: 401,
} as const;

function createFakeCoordinator() {
  return {
    getSnapshot: vi.fn<RefreshCoordinator["getSnapshot"]>(() => ({ "a-1": ACCOUNT })),
    getAccount: vi.fn<RefreshCoordinator["getAccount"]>((id) =>
      id === "a-1" ? ACCOUNT : undefined,
    ),
    getStatus: vi.fn<RefreshCoordinator["getStatus"]>(() => IDLE_STATUS),
    refresh: vi.fn<RefreshCoordinator["refresh"]>(),
    forceFullRefresh: vi.fn<RefreshCoordinator["forceFullRefresh"]>(),
    forceSensorsRefresh: vi.fn<RefreshCoordinator["forceSensorsRefresh"]>(),
    subscribe: vi.fn<RefreshCoordinator["subscribe"]>(() => () => undefined),
    fetchCameraImage: vi.fn<RefreshCoordinator["fetchCameraImage"]>(),
    fetchMainPassQr: vi.fn<RefreshCoordinator["fetchMainPassQr"]>(),
    startSchedule: vi.fn<RefreshCoordinator["startSchedule"]>(),
    stopSchedule: vi.fn<RefreshCoordinator["stopSchedule"]>(),
  } satisfies RefreshCoordinator;
}

// Create a test app with the routes
function createTestApp(coordinator: RefreshCoordinator) {
  const app = new Hono();

  // Add minimal middleware for requestId
  app.use("*", async (c, next) => {
    c.set("requestId", "test-request-id");
    await next();
  });

  app.route("/", createRoutes(coordinator));
  return app;
}

describe("API Routes", () => {
  let coordinator: ReturnType<typeof createFakeCoordinator>;
  let app: Hono;

  beforeEach(() => {
    coordinator = createFakeCoordinator();
    app = createTestApp(coordinator);
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  // ===========================================================================
  // Health Check
  // ===========================================================================

  describe("GET /api/health", () => {
    test("returns 200 with refresh status", async () => {
      // Act
      const res = await app.request("/api/health");

      // Assert
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        status: "ok",
        requestId: "test-request-id",
        refresh: IDLE_STATUS,
        accountCount: 1,
        mqttConnected: true,
      });
    });

    test("reports degraded while re-authentication is required", async () => {
      coordinator.getStatus.mockReturnValue({ state: "idle", authRequired: true });

      const res = await app.request("/api/health");

      expect(await res.json()).toMatchObject({ status: "degraded" });
    });
  });

  // ===========================================================================
  // Snapshot Data
  // ===========================================================================

  describe("GET /api/accounts", () => {
    test("lists account summaries", async () => {
      const res = await app.request("/api/accounts");

      expect(await res.json()).toEqual({
        accounts: [
          {
            id: "a-1",
            title: "Л/с №123456",
            personalAccountNumber: "123456",
            address: "ул. Тестовая, 1",
            paymentStatus: "Оплачено",
            meterCount: 1,
            cameraCount: 1,
          },
        ],
      });
    });
  });

  describe("GET /api/accounts/:accountId", () => {
    test("returns the full account record", async () => {
      const res = await app.request("/api/accounts/a-1");

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual(ACCOUNT);
    });

    test("returns 404 for an unknown account", async () => {
      const res = await app.request("/api/accounts/missing");

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Account not found" });
    });
  });

  describe("GET /api/accounts/:accountId/sensors", () => {
    test("returns the sensor records", async () => {
      const res = await app.request("/api/accounts/a-1/sensors");

      expect(await res.json()).toMatchObject({
        sensors: expect.arrayContaining([
          {
            key: "address",
            entityId: "communal_123456_address",
            name: "Address",
            icon: "mdi:home",
            state: "ул. Тестовая, 1",
            attributes: {},
          },
        ]),
      });
    });
  });

  // ===========================================================================
  // Images
  // ===========================================================================

  describe("GET /api/accounts/:accountId/cameras/:cameraId/image", () => {
    test("returns the image bytes", async () => {
      // Arrange
      coordinator.fetchCameraImage.mockResolvedValue(
        ok({ contentType: "image/jpeg", body: new Uint8Array([255, 216, 255]) }),
      );

      // Act
      const res = await app.request("/api/accounts/a-1/cameras/7/image");

      // Assert
      expect(res.status).toBe(200);
      expect(res.headers.get("content-type")).toBe("image/jpeg");
      expect(Array.from(new Uint8Array(await res.arrayBuffer()))).toEqual([255, 216, 255]);
      expect(coordinator.fetchCameraImage).toHaveBeenCalledWith("a-1", "7");
    });

    test("returns 404 for an unknown camera", async () => {
      coordinator.fetchCameraImage.mockResolvedValue(
        err({ type: "NOT_FOUND", message: "Camera 9 not found" }),
      );

      const res = await app.request("/api/accounts/a-1/cameras/9/image");

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: "Image not found: Camera 9 not found",
        requestId: "test-request-id",
      });
    });
  });

  describe("GET /api/accounts/:accountId/main-pass/qr", () => {
    test("returns 502 when the portal fails", async () => {
      coordinator.fetchMainPassQr.mockResolvedValue(
        err({ type: "FETCH_FAILED", message: "HTTP 500", cause: PORTAL_CAUSE }),
      );

      const res = await app.request("/api/accounts/a-1/main-pass/qr");

      expect(res.status).toBe(502);
    });
  });

  // ===========================================================================
  // Manual Refresh
  // ===========================================================================

  describe("POST /api/refresh", () => {
    test("returns 200 after a successful full refresh", async () => {
      coordinator.forceFullRefresh.mockResolvedValue(ok({ "a-1": ACCOUNT }));

      const res = await app.request("/api/refresh", { method: "POST" });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        success: true,
        accountCount: 1,
        refreshedAt: "2023-11-14T22:13:20.000Z",
        requestId: "test-request-id",
      });
    });

    test("returns 401 when re-authentication is required", async () => {
      coordinator.forceFullRefresh.mockResolvedValue(
        err({
          type: "AUTH_REQUIRED",
          message: "Authentication failed after 5 attempts: x",
          attempts: 5,
          cause: PORTAL_CAUSE,
        }),
      );

      const res = await app.request("/api/refresh", { method: "POST" });

      expect(res.status).toBe(401);
      expect(await res.json()).toMatchObject({
        success: false,
        errorType: "AUTH_REQUIRED",
        error: "Re-authentication required: Authentication failed after 5 attempts: x",
      });
    });
  });

  describe("POST /api/refresh/sensors", () => {
    test("returns 503 when the update fails", async () => {
      coordinator.forceSensorsRefresh.mockResolvedValue(
        err({ type: "UPDATE_FAILED", message: "HTTP 502", cause: PORTAL_CAUSE }),
      );

      const res = await app.request("/api/refresh/sensors", { method: "POST" });

      expect(res.status).toBe(503);
      expect(coordinator.forceFullRefresh).not.toHaveBeenCalled();
    });
  });
});

// =============================================================================
// Middleware & Error Handling
// =============================================================================

describe("API plumbing", () => {
  function createPlumbedApp() {
    const app = new Hono();
    app.use("*", requestIdMiddleware);
    app.onError(errorHandler);
    app.notFound(notFoundHandler);
    app.get("/boom", () => {
      throw new Error("kaput");
    });
    app.get("/teapot", () => {
      throw new HTTPException(418, { message: "short and stout" });
    });
    return app;
  }

  test("propagates a valid incoming request id", async () => {
    const res = await createPlumbedApp().request("/missing", {
      headers: { "x-request-id": "req-42" },
    });

    expect(res.headers.get("x-request-id")).toBe("req-42");
  });

  test("replaces an unsafe request id", async () => {
    const res = await createPlumbedApp().request("/missing", {
      headers: { "x-request-id": "bad id with spaces" },
    });

    expect(res.headers.get("x-request-id")).toMatch(/^[0-9a-f-]{36}$/);
  });

  test("answers unknown routes with JSON 404", async () => {
    const res = await createPlumbedApp().request("/missing");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "No route for GET /missing" });
  });

  test("turns thrown errors into a 500 with the request id", async () => {
    const res = await createPlumbedApp().request("/boom", {
      headers: { "x-request-id": "req-1" },
    });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "kaput", requestId: "req-1" });
  });

  test("keeps the status of an HTTPException", async () => {
    const res = await createPlumbedApp().request("/teapot", {
      headers: { "x-request-id": "req-2" },
    });

    expect(res.status).toBe(418);
    expect(await res.json()).toEqual({ error: "short and stout", requestId: "req-2" });
  });
});
