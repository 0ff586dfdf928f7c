/**
 * Portal Module - Error Types
 *
 * Typed error unions for portal API operations.
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur while talking to the portal API.
 */
export type PortalError =
  | {
      readonly type: "TRANSPORT_ERROR";
      readonly operation: string;
      readonly message: string;
      readonly timedOut: boolean;
      readonly cause?: Error;
    }
  | {
      readonly type: "PROTOCOL_ERROR";
      readonly operation: string;
      readonly message: string;
      readonly httpStatus?: number;
      readonly statusCode?: number;
    }
  | {
      readonly type: "INVALID_RESPONSE";
      readonly operation: string;
      readonly message: string;
      readonly responseData?: unknown;
    };

/**
 * Create a TRANSPORT_ERROR (connection failure or timeout).
 */
export function transportError(
  operation: string,
  message: string,
  cause?: Error,
): PortalError {
  const timedOut =
    cause !== undefined &&
    (cause.name === "TimeoutError" || cause.name === "AbortError");
  if (cause) {
    return { type: "TRANSPORT_ERROR", operation, message, timedOut, cause };
  }
  return { type: "TRANSPORT_ERROR", operation, message, timedOut };
}

/**
 * Create a PROTOCOL_ERROR for a non-200 HTTP status.
 */
export function httpStatusError(
  operation: string,
  httpStatus: number,
): PortalError {
  return {
    type: "PROTOCOL_ERROR",
    operation,
    message: `HTTP ${httpStatus}`,
    httpStatus,
  };
}

/**
 * Create a PROTOCOL_ERROR for a non-200 application status code.
 */
export function applicationStatusError(
  operation: string,
  statusCode: number | undefined,
  message: string | undefined,
): PortalError {
  const text = `Status code ${statusCode ?? "missing"}: ${message ?? "Unknown error"}`;
  if (statusCode === undefined) {
    return { type: "PROTOCOL_ERROR", operation, message: text };
  }
  return { type: "PROTOCOL_ERROR", operation, message: text, statusCode };
}

/**
 * Create an INVALID_RESPONSE error.
 */
export function invalidResponse(
  operation: string,
  message: string,
  responseData?: unknown,
): PortalError {
  return { type: "INVALID_RESPONSE", operation, message, responseData };
}

/**
 * Format a PortalError for logging.
 */
export function formatPortalError(error: PortalError): string {
  switch (error.type) {
    case "TRANSPORT_ERROR":
      return `${error.operation}: ${error.timedOut ? "timed out" : "network error"} (${error.message})`;
    case "PROTOCOL_ERROR":
      return `${error.operation}: ${error.message}`;
    case "INVALID_RESPONSE":
      return `${error.operation}: invalid response (${error.message})`;
  }
}
