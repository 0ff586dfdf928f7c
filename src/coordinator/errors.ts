/**
 * Coordinator Module - Error Types
 *
 * AUTH_REQUIRED is fatal for scheduled refreshes; UPDATE_FAILED is
 * transient and leaves the published snapshot in place.
 */
import type { NormalizeError } from "../normalize/index.js";
import { formatNormalizeError } from "../normalize/index.js";
import type { PortalError } from "../portal/index.js";
import { formatPortalError } from "../portal/index.js";

export type CoordinatorError =
  | {
      readonly type: "AUTH_REQUIRED";
      readonly message: string;
      readonly attempts: number;
      readonly cause: PortalError;
    }
  | {
      readonly type: "UPDATE_FAILED";
      readonly message: string;
      /** Absent when the refresh threw instead of returning an error */
      readonly cause?: PortalError | NormalizeError;
    };

/**
 * Errors of the on-demand image lookups.
 */
export type ImageError =
  | { readonly type: "NOT_FOUND"; readonly message: string }
  | {
      readonly type: "FETCH_FAILED";
      readonly message: string;
      readonly cause: PortalError;
    };

/**
 * Create an AUTH_REQUIRED error after the last authentication attempt.
 */
export function authRequired(
  attempts: number,
  cause: PortalError,
): CoordinatorError {
  return {
    type: "AUTH_REQUIRED",
    message: `Authentication failed after ${attempts} attempts: ${formatPortalError(cause)}`,
    attempts,
    cause,
  };
}

/**
 * Create an UPDATE_FAILED error carrying the triggering failure.
 */
export function updateFailed(
  cause: PortalError | NormalizeError,
): CoordinatorError {
  const message =
    cause.type === "PARSE_ERROR"
      ? formatNormalizeError(cause)
      : formatPortalError(cause);
  return { type: "UPDATE_FAILED", message, cause };
}

/**
 * Create an UPDATE_FAILED error from an exception thrown mid-refresh.
 */
export function updateCrashed(thrown: unknown): CoordinatorError {
  const message = thrown instanceof Error ? thrown.message : String(thrown);
  return { type: "UPDATE_FAILED", message: `Unexpected error: ${message}` };
}

/**
 * Create a NOT_FOUND image error.
 */
export function imageNotFound(message: string): ImageError {
  return { type: "NOT_FOUND", message };
}

/**
 * Create a FETCH_FAILED image error.
 */
export function imageFetchFailed(cause: PortalError): ImageError {
  return { type: "FETCH_FAILED", message: formatPortalError(cause), cause };
}

/**
 * Format a CoordinatorError for logging.
 */
export function formatCoordinatorError(error: CoordinatorError): string {
  switch (error.type) {
    case "AUTH_REQUIRED":
      return `Re-authentication required: ${error.message}`;
    case "UPDATE_FAILED":
      return `Update failed: ${error.message}`;
  }
}

/**
 * Format an ImageError for logging.
 */
export function formatImageError(error: ImageError): string {
  switch (error.type) {
    case "NOT_FOUND":
      return `Image not found: ${error.message}`;
    case "FETCH_FAILED":
      return `Image fetch failed: ${error.message}`;
  }
}
