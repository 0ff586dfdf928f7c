/**
 * Store Module - Error Types
 */

export type StoreError = {
  readonly type: "READ_FAILED" | "WRITE_FAILED" | "CORRUPT_STATE";
  readonly path: string;
  readonly message: string;
};

/**
 * Create a READ_FAILED or WRITE_FAILED error from a thrown fs error.
 */
export function ioError(
  type: "READ_FAILED" | "WRITE_FAILED",
  path: string,
  cause: unknown,
): StoreError {
  return {
    type,
    path,
    message: cause instanceof Error ? cause.message : String(cause),
  };
}

/**
 * Create a CORRUPT_STATE error.
 */
export function corruptState(path: string, message: string): StoreError {
  return { type: "CORRUPT_STATE", path, message };
}

/**
 * Format a StoreError for logging.
 */
export function formatStoreError(error: StoreError): string {
  switch (error.type) {
    case "READ_FAILED":
      return `Cannot read ${error.path}: ${error.message}`;
    case "WRITE_FAILED":
      return `Cannot write ${error.path}: ${error.message}`;
    case "CORRUPT_STATE":
      return `Corrupt state file ${error.path}: ${error.message}`;
  }
}
