/**
 * Portal Module - Service Layer
 *
 * Side effects happen here: HTTP calls to the portal's JSON-RPC endpoint.
 * One function per remote operation, all stateless - the caller owns the
 * transport and the access token.
 */
import { type Result, err, ok } from "neverthrow";
import type { z } from "zod";

import { createLogger } from "../logger.js";
import type { PortalError } from "./errors.js";
import {
  applicationStatusError,
  formatPortalError,
  httpStatusError,
  invalidResponse,
  transportError,
} from "./errors.js";
import type {
  AccountDetail,
  AuthTokens,
  GuestPassList,
  PortalImage,
  PortalTransport,
  RawAccount,
  RawCamera,
  RawCommunalRequest,
  RawMainPass,
  RawMeter,
  RawMeterValue,
  RpcMethod,
} from "./schema.js";
import {
  AccountDetailSchema,
  AccountListDataSchema,
  AuthTokensSchema,
  CameraListDataSchema,
  CommunalRequestListDataSchema,
  GuestPassListDataSchema,
  MeterHistoryDataSchema,
  MeterListDataSchema,
  RawMainPassSchema,
  RpcResponseSchema,
  StreamUrlResponseSchema,
} from "./schema.js";
import {
  atLeast,
  buildAuthorizeData,
  buildEnvelope,
  buildHeaders,
  buildObjectListQuery,
  equals,
} from "./transform.js";

const log = createLogger("portal");

// =============================================================================
// RPC Core
// =============================================================================

type RpcCall = Readonly<{
  /** Name used in errors and logs */
  operation: string;
  method: RpcMethod;
  data: unknown;
  accessToken?: string;
  /** Also send the token as an HTTP Authorization header */
  bearerHeader?: boolean;
  timeoutMs: number;
}>;

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * POST one envelope and unwrap the response's data block.
 *
 * Non-200 HTTP status and non-200 statusCode become PROTOCOL_ERROR,
 * a body that does not match the schema becomes INVALID_RESPONSE.
 */
async function callRpc<S extends z.ZodTypeAny>(
  transport: PortalTransport,
  call: RpcCall,
  dataSchema: S,
): Promise<Result<z.infer<S>, PortalError>> {
  const envelope = buildEnvelope(
    transport.namespace,
    call.method,
    call.data,
    call.accessToken,
  );
  const headers = buildHeaders(call.bearerHeader ? call.accessToken : undefined);

  log.debug({ operation: call.operation, method: call.method }, "RPC call");

  let response: Response;
  try {
    response = await transport.fetch(transport.apiUrl, {
      method: "POST",
      headers,
      body: JSON.stringify(envelope),
      signal: AbortSignal.timeout(call.timeoutMs),
    });
  } catch (error) {
    const cause = toError(error);
    return err(transportError(call.operation, cause.message, cause));
  }

  if (response.status !== 200) {
    return err(httpStatusError(call.operation, response.status));
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    return err(
      invalidResponse(call.operation, `Body is not JSON: ${toError(error).message}`),
    );
  }

  const parsed = RpcResponseSchema.safeParse(body);
  if (!parsed.success) {
    return err(invalidResponse(call.operation, "Missing response envelope", body));
  }

  const { statusCode, message, data } = parsed.data;
  if (statusCode !== 200) {
    return err(
      applicationStatusError(
        call.operation,
        statusCode ?? undefined,
        message ?? undefined,
      ),
    );
  }

  const payload = dataSchema.safeParse(data);
  if (!payload.success) {
    return err(
      invalidResponse(
        call.operation,
        payload.error.issues.map((issue) => issue.message).join("; "),
        data,
      ),
    );
  }

  return ok(payload.data);
}

// =============================================================================
// Authentication
// =============================================================================

/**
 * Authenticate with hashed credentials and a stable device identifier.
 *
 * @returns Result with access and refresh tokens
 */
export async function authenticate(
  transport: PortalTransport,
  login: string,
  password: string,
  deviceInstanceId: string,
): Promise<Result<AuthTokens, PortalError>> {
  return callRpc(
    transport,
    {
      operation: "authenticate",
      method: "Authorize",
      data: buildAuthorizeData(login, password, deviceInstanceId),
      timeoutMs: transport.timeoutMs,
    },
    AuthTokensSchema,
  );
}

// =============================================================================
// Accounts
// =============================================================================

/**
 * List the communal accounts visible to the authenticated user.
 */
export async function listAccounts(
  transport: PortalTransport,
  accessToken: string,
): Promise<Result<ReadonlyArray<RawAccount>, PortalError>> {
  const result = await callRpc(
    transport,
    {
      operation: "listAccounts",
      method: "GetObjectList",
      data: buildObjectListQuery("CommunalAccount"),
      accessToken,
      timeoutMs: transport.timeoutMs,
    },
    AccountListDataSchema,
  );
  return result.map((data) => data.items);
}

/**
 * Account detail: accruals since the given moment plus the
 * payment-status block.
 *
 * @param since - Epoch seconds; older accruals are not requested
 */
export async function getAccountDetail(
  transport: PortalTransport,
  accessToken: string,
  accountId: string,
  since: number,
): Promise<Result<AccountDetail, PortalError>> {
  return callRpc(
    transport,
    {
      operation: "getAccountDetail",
      method: "GetObjectList",
      data: buildObjectListQuery("CommunalAccountAccrual", [
        equals("communalAccountId", accountId),
        atLeast("date", since),
      ]),
      accessToken,
      timeoutMs: transport.timeoutMs,
    },
    AccountDetailSchema,
  );
}

/**
 * List service tickets filed for an account.
 */
export async function listCommunalRequests(
  transport: PortalTransport,
  accessToken: string,
  accountId: string,
): Promise<Result<ReadonlyArray<RawCommunalRequest>, PortalError>> {
  const result = await callRpc(
    transport,
    {
      operation: "listCommunalRequests",
      method: "GetObjectList",
      data: buildObjectListQuery("CommunalRequest", [
        equals("communalAccountId", accountId),
      ]),
      accessToken,
      timeoutMs: transport.timeoutMs,
    },
    CommunalRequestListDataSchema,
  );
  return result.map((data) => data.items);
}

// =============================================================================
// Meters
// =============================================================================

/**
 * List the utility meters of an account.
 */
export async function listMeters(
  transport: PortalTransport,
  accessToken: string,
  accountId: string,
): Promise<Result<ReadonlyArray<RawMeter>, PortalError>> {
  const result = await callRpc(
    transport,
    {
      operation: "listMeters",
      method: "GetObjectList",
      data: buildObjectListQuery("Meter", [
        equals("communalAccountId", accountId),
      ]),
      accessToken,
      timeoutMs: transport.timeoutMs,
    },
    MeterListDataSchema,
  );
  return result.map((data) => data.items);
}

/**
 * Reading history of one meter, in whatever order the portal sends it.
 */
export async function getMeterHistory(
  transport: PortalTransport,
  accessToken: string,
  meterId: string,
): Promise<Result<ReadonlyArray<RawMeterValue>, PortalError>> {
  const result = await callRpc(
    transport,
    {
      operation: "getMeterHistory",
      method: "GetObjectList",
      data: buildObjectListQuery("MeterValue", [equals("meterId", meterId)]),
      accessToken,
      timeoutMs: transport.timeoutMs,
    },
    MeterHistoryDataSchema,
  );
  return result.map((data) => data.items);
}

// =============================================================================
// Cameras
// =============================================================================

/**
 * List the cameras attached to an account.
 */
export async function listCameras(
  transport: PortalTransport,
  accessToken: string,
  accountId: string,
): Promise<Result<ReadonlyArray<RawCamera>, PortalError>> {
  const result = await callRpc(
    transport,
    {
      operation: "listCameras",
      method: "StreamCameraList",
      data: { communalAccountId: accountId },
      accessToken,
      bearerHeader: true,
      timeoutMs: transport.timeoutMs,
    },
    CameraListDataSchema,
  );
  return result.map((data) => data.cameras);
}

/**
 * Resolve a camera's videoUrl into its playable stream URL.
 *
 * Best effort: a missing videoUrl, a network failure, a non-200 status or
 * an unparsable body all resolve to "" instead of an error.
 */
export async function resolveCameraStreamUrl(
  transport: PortalTransport,
  accessToken: string,
  camera: Pick<RawCamera, "id" | "videoUrl">,
): Promise<string> {
  if (!camera.videoUrl) {
    log.debug({ cameraId: camera.id }, "Camera has no videoUrl");
    return "";
  }

  try {
    const response = await transport.fetch(camera.videoUrl, {
      method: "GET",
      headers: buildHeaders(accessToken),
      signal: AbortSignal.timeout(transport.secondaryTimeoutMs),
    });

    if (response.status !== 200) {
      log.warn(
        { cameraId: camera.id, status: response.status },
        "Stream URL lookup failed",
      );
      return "";
    }

    const parsed = StreamUrlResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      log.warn({ cameraId: camera.id }, "Stream URL response has no url");
      return "";
    }

    return parsed.data.url ?? "";
  } catch (error) {
    log.warn(
      { cameraId: camera.id, error: toError(error).message },
      "Stream URL lookup failed",
    );
    return "";
  }
}

// =============================================================================
// Access Control
// =============================================================================

/**
 * Resident's main pass (PIN, QR code URL, description).
 */
export async function getMainPass(
  transport: PortalTransport,
  accessToken: string,
  accountId: string,
): Promise<Result<RawMainPass, PortalError>> {
  return callRpc(
    transport,
    {
      operation: "getMainPass",
      method: "GetMainPassData",
      data: { communalAccountId: accountId },
      accessToken,
      bearerHeader: true,
      timeoutMs: transport.secondaryTimeoutMs,
    },
    RawMainPassSchema,
  );
}

/**
 * Temporary guest passes issued for an account.
 */
export async function listGuestPasses(
  transport: PortalTransport,
  accessToken: string,
  accountId: string,
): Promise<Result<GuestPassList, PortalError>> {
  return callRpc(
    transport,
    {
      operation: "listGuestPasses",
      method: "GetObjectList",
      data: buildObjectListQuery("GuestPass", [
        equals("communalAccountId", accountId),
      ]),
      accessToken,
      bearerHeader: true,
      timeoutMs: transport.secondaryTimeoutMs,
    },
    GuestPassListDataSchema,
  );
}

// =============================================================================
// Images
// =============================================================================

/**
 * Download an image (camera preview, pass QR code) for on-demand display.
 */
export async function fetchImage(
  transport: PortalTransport,
  url: string,
  accessToken?: string,
): Promise<Result<PortalImage, PortalError>> {
  try {
    const response = await transport.fetch(url, {
      method: "GET",
      headers: { ...buildHeaders(accessToken), Accept: "image/*" },
      signal: AbortSignal.timeout(transport.secondaryTimeoutMs),
    });

    if (response.status !== 200) {
      const error = httpStatusError("fetchImage", response.status);
      log.warn({ url, error: formatPortalError(error) }, "Image fetch failed");
      return err(error);
    }

    const body = new Uint8Array(await response.arrayBuffer());
    return ok({
      contentType: response.headers.get("content-type") ?? "image/jpeg",
      body,
    });
  } catch (error) {
    const cause = toError(error);
    return err(transportError("fetchImage", cause.message, cause));
  }
}
