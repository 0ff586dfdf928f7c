/**
 * Store Module - Schemas and Types
 */
import { z } from "zod";

/**
 * Persisted state. The device identifier must stay stable across
 * restarts; the portal ties issued tokens to it.
 */
export const PersistedStateSchema = z.object({
  deviceInstanceId: z.string().regex(/^[0-9a-f]{16}$/),
  accessToken: z.string().optional(),
  refreshToken: z.string().optional(),
});

export type PersistedState = z.infer<typeof PersistedStateSchema>;
