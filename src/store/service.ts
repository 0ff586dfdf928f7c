/**
 * Store Module - Service Layer
 *
 * Reads and writes the JSON state file. Writes go to a temporary file
 * first and are renamed into place.
 */
import { randomBytes } from "node:crypto";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { type Result, err, ok } from "neverthrow";

import type { AuthTokens } from "../portal/index.js";
import { createLogger } from "../logger.js";
import type { StoreError } from "./errors.js";
import { corruptState, ioError } from "./errors.js";
import type { PersistedState } from "./schema.js";
import { PersistedStateSchema } from "./schema.js";

const log = createLogger("store");

/**
 * Generate a 16-character hex device identifier.
 */
export function generateDeviceInstanceId(): string {
  return randomBytes(8).toString("hex");
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

/**
 * Read the state file.
 *
 * @returns The state, null when the file does not exist
 */
export async function readState(
  path: string,
): Promise<Result<PersistedState | null, StoreError>> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    if (isMissingFile(error)) return ok(null);
    return err(ioError("READ_FAILED", path, error));
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    return err(
      corruptState(path, error instanceof Error ? error.message : String(error)),
    );
  }

  const parsed = PersistedStateSchema.safeParse(json);
  if (!parsed.success) {
    return err(
      corruptState(
        path,
        parsed.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join("; "),
      ),
    );
  }

  return ok(parsed.data);
}

/**
 * Write the state file, creating its directory when needed.
 */
export async function writeState(
  path: string,
  state: PersistedState,
): Promise<Result<void, StoreError>> {
  const tempPath = `${path}.tmp`;
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(tempPath, `${JSON.stringify(state, null, 2)}\n`, "utf8");
    await rename(tempPath, path);
    return ok(undefined);
  } catch (error) {
    return err(ioError("WRITE_FAILED", path, error));
  }
}

/**
 * Load the state file, creating it with a fresh device identifier on
 * first run.
 */
export async function loadOrCreateState(
  path: string,
): Promise<Result<PersistedState, StoreError>> {
  const existing = await readState(path);
  if (existing.isErr()) return err(existing.error);
  if (existing.value) {
    log.debug({ path }, "Loaded state file");
    return ok(existing.value);
  }

  const state: PersistedState = { deviceInstanceId: generateDeviceInstanceId() };
  log.info({ path }, "Creating state file with a new device identifier");

  const written = await writeState(path, state);
  return written.map(() => state);
}

/**
 * Replace the cached tokens, keeping the device identifier.
 */
export async function saveTokens(
  path: string,
  deviceInstanceId: string,
  tokens: AuthTokens,
): Promise<Result<void, StoreError>> {
  log.debug({ path }, "Saving tokens");
  return writeState(path, {
    deviceInstanceId,
    accessToken: tokens.accessToken,
    refreshToken: tokens.refreshToken,
  });
}
