/**
 * Portal Module - Pure Transformations
 *
 * Request building for the portal's JSON-RPC endpoint.
 * No side effects, no I/O - just data in, data out.
 */
import { createHash } from "node:crypto";
import type {
  ObjectListQuery,
  PortalObjectType,
  QueryCondition,
  RpcEnvelope,
  RpcMethod,
} from "./schema.js";

// =============================================================================
// Constants
// =============================================================================

/**
 * The portal only answers clients that look like a browser.
 */
export const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/139.0.0.0 Safari/537.36";

/**
 * Device block sent with every Authorize call.
 * timeOffset is the client's UTC offset in seconds (Moscow time).
 */
export const DEVICE_PROFILE = {
  platform: "ANDROID",
  timeOffset: 10800,
  appType: "CLIENT",
  model: "sdk_gphone64_arm64",
} as const;

// =============================================================================
// Hashing & Credentials
// =============================================================================

/**
 * Generate SHA256 hash of content.
 */
export function sha256Hex(content: string): string {
  return createHash("sha256").update(content).digest("hex");
}

/**
 * Logins are phone numbers; the portal hashes them without the leading "+".
 *
 * @example
 * normalizeLogin("+79990001122") // "79990001122"
 */
export function normalizeLogin(login: string): string {
  return login.trim().replace(/^\++/, "");
}

/**
 * Format an access token as a bearer credential.
 */
export function bearer(accessToken: string): string {
  return `Bearer ${accessToken}`;
}

// =============================================================================
// Envelope Building
// =============================================================================

/**
 * Wrap operation data in the portal's RPC envelope.
 * The token, when given, travels in parameters.Authorization.
 */
export function buildEnvelope(
  namespace: string,
  method: RpcMethod,
  data: unknown,
  accessToken?: string,
): RpcEnvelope {
  return {
    data,
    method,
    namespace,
    operation: "REQUEST",
    parameters: accessToken ? { Authorization: bearer(accessToken) } : {},
  };
}

/**
 * Build an equality condition for a GetObjectList query.
 */
export function equals(property: string, value: string): QueryCondition {
  return { property, value: [value], comparisonOperator: "=" };
}

/**
 * Build a "greater or equal" condition for a GetObjectList query.
 */
export function atLeast(property: string, value: number): QueryCondition {
  return { property, value: [value], comparisonOperator: ">=" };
}

/**
 * Build the data block of a GetObjectList call.
 */
export function buildObjectListQuery(
  type: PortalObjectType,
  conditions: ReadonlyArray<QueryCondition> = [],
): ObjectListQuery {
  return {
    type,
    query: {
      conditions,
      sort: [],
      lastEditedPropertyType: null,
    },
    pageQuery: null,
  };
}

/**
 * Build the data block of an Authorize call.
 * Login and password never leave the process in clear text.
 */
export function buildAuthorizeData(
  login: string,
  password: string,
  deviceInstanceId: string,
): Readonly<Record<string, unknown>> {
  return {
    credentials: {
      loginSha256: sha256Hex(normalizeLogin(login)),
      password: sha256Hex(password),
    },
    device: {
      appInstanceId: deviceInstanceId,
      ...DEVICE_PROFILE,
    },
    userType: "CLIENT",
  };
}

/**
 * HTTP headers for portal calls. The bearer header is only sent by the
 * operations that require it (camera list, main pass, stream lookups).
 */
export function buildHeaders(accessToken?: string): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: "application/json",
    "Content-Type": "application/json",
    "User-Agent": USER_AGENT,
  };
  if (accessToken) {
    headers.Authorization = bearer(accessToken);
  }
  return headers;
}

// =============================================================================
// Accrual Window
// =============================================================================

/**
 * Epoch seconds of the start of the accrual lookback window.
 *
 * @example
 * accrualsSince(1_700_000_000_000, 1) // 1699913600
 */
export function accrualsSince(nowMs: number, lookbackDays: number): number {
  return Math.floor(nowMs / 1000) - lookbackDays * 24 * 60 * 60;
}
