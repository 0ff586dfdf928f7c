/**
 * Normalize Module - Error Types
 *
 * Only meter history parsing can fail; every other extraction
 * degrades to a sentinel value.
 */

export type NormalizeError = {
  readonly type: "PARSE_ERROR";
  readonly field: string;
  readonly message: string;
  readonly value?: unknown;
};

/**
 * Create a PARSE_ERROR.
 */
export function parseError(
  field: string,
  message: string,
  value?: unknown,
): NormalizeError {
  return { type: "PARSE_ERROR", field, message, value };
}

/**
 * Format a NormalizeError for logging.
 */
export function formatNormalizeError(error: NormalizeError): string {
  return `Parse error in ${error.field}: ${error.message}`;
}
