/**
 * Portal Service Tests
 *
 * Tests portal operations against a fake fetch returning real Response
 * objects. No network.
 */
import { beforeEach, describe, expect, it, vi } from "vitest";

// Mock logger to reduce noise in tests
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
}));

// Import after mocks
import type { PortalTransport } from "../schema.js";
import {
  authenticate,
  fetchImage,
  getAccountDetail,
  listAccounts,
  listCameras,
  resolveCameraStreamUrl,
} from "../service.js";

const API_URL = "https://portal.example.test/api/rpc";
const NAMESPACE = "http://portal.example.test/cms";

function rpcResponse(data: unknown, statusCode = 200, message?: string): Response {
  return new Response(JSON.stringify({ statusCode, message, data }), {
    status: 200,
  });
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

function sentBody(init: RequestInit | undefined): unknown {
  return typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
}

describe("Portal Service", () => {
  const fetchMock = vi.fn<typeof fetch>();
  const transport: PortalTransport = {
    fetch: fetchMock,
    apiUrl: API_URL,
    namespace: NAMESPACE,
    timeoutMs: 30_000,
    secondaryTimeoutMs: 10_000,
  };

  beforeEach(() => {
    fetchMock.mockReset();
  });

  // ===========================================================================
  // authenticate
  // ===========================================================================

  describe("authenticate", () => {
    it("posts an Authorize envelope and returns the tokens", async () => {
      // Arrange
      fetchMock.mockResolvedValueOnce(
        rpcResponse({ accessToken: "access-1", refreshToken: "refresh-1" }),
      );

      // Act
      const result = await authenticate(transport, "+79990001122", "test-password", "dev-1");

      // Assert
      expect(result._unsafeUnwrap()).toEqual({
        accessToken: "access-1",
        refreshToken: "refresh-1",
      });

      const [url, init] = fetchMock.mock.calls[0] ?? [];
      expect(url).toBe(API_URL);
      expect(init?.method).toBe("POST");
      expect(sentBody(init)).toMatchObject({
        method: "Authorize",
        namespace: NAMESPACE,
        operation: "REQUEST",
        parameters: {},
        data: { device: { appInstanceId: "dev-1" }, userType: "CLIENT" },
      });
    });

    it("returns INVALID_RESPONSE when the token is empty", async () => {
      fetchMock.mockResolvedValueOnce(
        rpcResponse({ accessToken: "", refreshToken: "refresh-1" }),
      );

      const result = await authenticate(transport, "login", "test-password", "dev-1");

      expect(result._unsafeUnwrapErr().type).toBe("INVALID_RESPONSE");
    });

    it("returns PROTOCOL_ERROR with the application status code", async () => {
      fetchMock.mockResolvedValueOnce(rpcResponse(null, 401, "Unauthorized"));

      const error = (
        await authenticate(transport, "login", "test-password", "dev-1")
      )._unsafeUnwrapErr();

      expect(error).toEqual({
        type: "PROTOCOL_ERROR",
        operation: "authenticate",
        message: "Status code 401: Unauthorized",
        statusCode: 401,
      });
    });
  });

  // ===========================================================================
  // Error Mapping
  // ===========================================================================

  describe("error mapping", () => {
    it("maps a non-200 HTTP status to PROTOCOL_ERROR", async () => {
      fetchMock.mockResolvedValueOnce(new Response("oops", { status: 502 }));

      const error = (await listAccounts(transport, "tok"))._unsafeUnwrapErr();

      expect(error).toEqual({
        type: "PROTOCOL_ERROR",
        operation: "listAccounts",
        message: "HTTP 502",
        httpStatus: 502,
      });
    });

    it("maps a rejected fetch to TRANSPORT_ERROR", async () => {
      fetchMock.mockRejectedValueOnce(new Error("ECONNREFUSED"));

      const error = (await listAccounts(transport, "tok"))._unsafeUnwrapErr();

      expect(error.type).toBe("TRANSPORT_ERROR");
      expect(error.type === "TRANSPORT_ERROR" && error.timedOut).toBe(false);
    });

    it("flags timeouts", async () => {
      const timeout = new Error("The operation was aborted due to timeout");
      timeout.name = "TimeoutError";
      fetchMock.mockRejectedValueOnce(timeout);

      const error = (await listAccounts(transport, "tok"))._unsafeUnwrapErr();

      expect(error.type === "TRANSPORT_ERROR" && error.timedOut).toBe(true);
    });

    it("maps a non-JSON body to INVALID_RESPONSE", async () => {
      fetchMock.mockResolvedValueOnce(new Response("<html>", { status: 200 }));

      const error = (await listAccounts(transport, "tok"))._unsafeUnwrapErr();

      expect(error.type).toBe("INVALID_RESPONSE");
    });
  });

  // ===========================================================================
  // Data Operations
  // ===========================================================================

  describe("listAccounts", () => {
    it("returns the items and sends the token in parameters", async () => {
      fetchMock.mockResolvedValueOnce(
        rpcResponse({ items: [{ objectId: { id: "a-1", title: "Л/с №1" } }] }),
      );

      const accounts = (await listAccounts(transport, "tok"))._unsafeUnwrap();

      expect(accounts).toEqual([{ objectId: { id: "a-1", title: "Л/с №1" } }]);
      const [, init] = fetchMock.mock.calls[0] ?? [];
      expect(sentBody(init)).toMatchObject({
        parameters: { Authorization: "Bearer tok" },
        data: { type: "CommunalAccount" },
      });
      expect(init?.headers).not.toHaveProperty("Authorization");
    });
  });

  describe("getAccountDetail", () => {
    it("filters by account and accrual date", async () => {
      fetchMock.mockResolvedValueOnce(rpcResponse({ items: [], notificationCount: 2 }));

      const detail = (
        await getAccountDetail(transport, "tok", "a-1", 1_699_913_600)
      )._unsafeUnwrap();

      expect(detail.notificationCount).toBe(2);
      const [, init] = fetchMock.mock.calls[0] ?? [];
      expect(sentBody(init)).toMatchObject({
        data: {
          type: "CommunalAccountAccrual",
          query: {
            conditions: [
              { property: "communalAccountId", value: ["a-1"], comparisonOperator: "=" },
              { property: "date", value: [1_699_913_600], comparisonOperator: ">=" },
            ],
          },
        },
      });
    });
  });

  describe("listCameras", () => {
    it("sends the bearer header and returns cameras with string ids", async () => {
      fetchMock.mockResolvedValueOnce(
        rpcResponse({ cameras: [{ id: 7, title: "Entrance", preview: "p", videoUrl: "v" }] }),
      );

      const cameras = (await listCameras(transport, "tok", "a-1"))._unsafeUnwrap();

      expect(cameras).toEqual([{ id: "7", title: "Entrance", preview: "p", videoUrl: "v" }]);
      const [, init] = fetchMock.mock.calls[0] ?? [];
      expect(init?.headers).toMatchObject({ Authorization: "Bearer tok" });
      expect(sentBody(init)).toMatchObject({
        method: "StreamCameraList",
        data: { communalAccountId: "a-1" },
      });
    });
  });

  // ===========================================================================
  // Stream Resolution & Images
  // ===========================================================================

  describe("resolveCameraStreamUrl", () => {
    const camera = { id: "7", videoUrl: "https://video.example.test/7" };

    it("returns the url from the response body", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ url: "rtsp://stream.example.test/7" }));

      const url = await resolveCameraStreamUrl(transport, "tok", camera);

      expect(url).toBe("rtsp://stream.example.test/7");
      const [requested, init] = fetchMock.mock.calls[0] ?? [];
      expect(requested).toBe("https://video.example.test/7");
      expect(init?.method).toBe("GET");
    });

    it("returns an empty string on a non-200 status", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({}, 500));

      expect(await resolveCameraStreamUrl(transport, "tok", camera)).toBe("");
    });

    it("returns an empty string when fetch rejects", async () => {
      fetchMock.mockRejectedValueOnce(new Error("ECONNRESET"));

      expect(await resolveCameraStreamUrl(transport, "tok", camera)).toBe("");
    });

    it("does not call fetch without a videoUrl", async () => {
      expect(await resolveCameraStreamUrl(transport, "tok", { id: "8", videoUrl: null })).toBe("");
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe("fetchImage", () => {
    it("returns the bytes and content type", async () => {
      fetchMock.mockResolvedValueOnce(
        new Response(new Uint8Array([1, 2, 3]), {
          status: 200,
          headers: { "content-type": "image/png" },
        }),
      );

      const image = (await fetchImage(transport, "https://cdn.example.test/p.jpg"))._unsafeUnwrap();

      expect(image.contentType).toBe("image/png");
      expect(Array.from(image.body)).toEqual([1, 2, 3]);
    });

    it("returns PROTOCOL_ERROR for a missing image", async () => {
      fetchMock.mockResolvedValueOnce(new Response(null, { status: 404 }));

      const error = (await fetchImage(transport, "https://cdn.example.test/x.jpg"))._unsafeUnwrapErr();

      expect(error.type).toBe("PROTOCOL_ERROR");
    });
  });
});
