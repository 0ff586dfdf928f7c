/**
 * Typed configuration - all config lives in .env, parsed with Zod at startup.
 * App crashes immediately on invalid config - fail fast.
 *
 * Communal Bridge configuration covering:
 * - Server settings
 * - Portal API endpoint and credentials
 * - Refresh schedule and authentication retry policy
 * - MQTT publishing
 */
import { z } from "zod";

/**
 * Custom boolean parser for environment variables.
 * z.coerce.boolean() doesn't work with string "false" (it's truthy).
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined ? defaultValue : val.toLowerCase() === "true",
    );

/**
 * Parse optional URL - empty string becomes undefined
 */
const optionalUrl = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val : undefined));

const ConfigSchema = z.object({
  // ==========================================================================
  // Server Configuration
  // ==========================================================================
  PORT: z.coerce.number().default(8084).describe("HTTP server port"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("CommunalBridge").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // Portal API
  // ==========================================================================
  PORTAL_API_URL: z
    .string()
    .url()
    .default("https://mp.lsr.ru/api/rpc")
    .describe("JSON-RPC endpoint of the residential-services portal"),
  PORTAL_NAMESPACE: z
    .string()
    .default("http://www.lsr.ru/estate/headlessCMS")
    .describe("Namespace carried in every request envelope"),
  PORTAL_LOGIN: z
    .string()
    .min(1, "PORTAL_LOGIN is required")
    .describe("Portal login (phone number, leading + is stripped)"),
  PORTAL_PASSWORD: z
    .string()
    .min(1, "PORTAL_PASSWORD is required")
    .describe("Portal password"),
  REQUEST_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(30000)
    .describe("Timeout for primary data calls (ms)"),
  SECONDARY_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(10000)
    .describe("Timeout for stream, image and pass lookups (ms)"),
  ACCRUALS_LOOKBACK_DAYS: z.coerce
    .number()
    .int()
    .positive()
    .default(365)
    .describe("How far back accruals are requested"),

  // ==========================================================================
  // Refresh Schedule & Authentication
  // ==========================================================================
  SCAN_INTERVAL_HOURS: z.coerce
    .number()
    .positive()
    .default(12)
    .describe("Hours between scheduled refreshes"),
  AUTH_MAX_ATTEMPTS: z.coerce
    .number()
    .int()
    .positive()
    .default(5)
    .describe("Authentication attempts before re-authentication is required"),
  AUTH_RETRY_DELAY_MS: z.coerce
    .number()
    .nonnegative()
    .default(15000)
    .describe("Pause between authentication attempts (ms)"),
  STATE_FILE: z
    .string()
    .default("./data/state.json")
    .describe("State file holding the device identifier and cached tokens"),

  // ==========================================================================
  // MQTT Publishing
  // ==========================================================================
  MQTT_BROKER_URL: optionalUrl.describe("MQTT broker connection URL"),
  MQTT_TOPIC_PREFIX: z
    .string()
    .default("homelab/communal")
    .describe("Prefix for published account topics"),
  ENABLE_MQTT_PUBLISH: envBoolean(true).describe(
    "Enable publishing snapshots to MQTT",
  ),
});

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * MQTT publisher configuration.
 * Returns null if publishing is disabled or no broker is configured.
 */
export function getMqttConfig(): Readonly<{
  brokerUrl: string;
  topicPrefix: string;
}> | null {
  if (!config.ENABLE_MQTT_PUBLISH || !config.MQTT_BROKER_URL) {
    return null;
  }

  return {
    brokerUrl: config.MQTT_BROKER_URL,
    topicPrefix: config.MQTT_TOPIC_PREFIX,
  };
}

/**
 * Scheduled refresh interval in milliseconds.
 */
export function getScanIntervalMs(): number {
  return Math.round(config.SCAN_INTERVAL_HOURS * 60 * 60 * 1000);
}
