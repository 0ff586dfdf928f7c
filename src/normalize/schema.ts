/**
 * Normalize Module - Schemas and Types
 *
 * The stable internal shapes that raw portal objects are normalized into.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// Meters
// =============================================================================

export const METER_TYPE_CODES = [
  "HotWater",
  "ColdWater",
  "Heating",
  "Electricity",
  "Other",
] as const;

export const MeterTypeCodeSchema = z.enum(METER_TYPE_CODES);

export type MeterTypeCode = z.infer<typeof MeterTypeCodeSchema>;

/**
 * One dated reading. `date` is the canonical DD.MM.YYYY form.
 */
export const MeterReadingSchema = z.object({
  date: z.string().regex(/^\d{2}\.\d{2}\.\d{4}$/),
  value: z.number(),
});

export type MeterReading = Readonly<z.infer<typeof MeterReadingSchema>>;

export const MeterRecordSchema = z.object({
  title: z.string(),
  typeCode: MeterTypeCodeSchema,
  typeTitle: z.string(),
  /** ISO calendar date (YYYY-MM-DD) of the next calibration */
  calibrationDate: z.string().optional(),
  /** Ascending by date, one entry per date; the last entry is the current value */
  history: z.array(MeterReadingSchema),
});

export type MeterRecord = Readonly<
  Omit<z.infer<typeof MeterRecordSchema>, "history"> & {
    history: ReadonlyArray<MeterReading>;
  }
>;

/**
 * Unit and device class a meter type is reported in.
 */
export type MeterUnit = Readonly<{
  unit: "m³" | "Gcal" | "kWh";
  deviceClass: "volume" | "energy";
}>;

// =============================================================================
// Billing & Requests
// =============================================================================

export const AccrualSchema = z.object({
  id: z.string(),
  date: z.string(),
  amount: z.number().nullable(),
});

export type Accrual = Readonly<z.infer<typeof AccrualSchema>>;

/**
 * Status codes the portal uses for service tickets.
 */
export type KnownRequestStatus =
  | "WaitingForRegistration"
  | "AtWork"
  | "OnHold"
  | "Done";

export const CommunalRequestSchema = z.object({
  id: z.string(),
  title: z.string(),
  statusCode: z.string(),
});

export type CommunalRequest = Readonly<z.infer<typeof CommunalRequestSchema>>;

// =============================================================================
// Cameras
// =============================================================================

export const CameraRecordSchema = z.object({
  id: z.string(),
  title: z.string(),
  /** Preview image URL without its query string */
  previewUrl: z.string(),
  /** Absent until resolved, "" when resolution failed */
  streamUrl: z.string().optional(),
});

export type CameraRecord = Readonly<z.infer<typeof CameraRecordSchema>>;

// =============================================================================
// Access Control
// =============================================================================

export const MainPassSchema = z.object({
  pin: z.string(),
  qrUrl: z.string(),
  text: z.string(),
});

export type MainPass = Readonly<z.infer<typeof MainPassSchema>>;

export const GuestPassSchema = z.object({
  strategyTitle: z.string(),
  /** ISO timestamp, null when the portal sent none */
  validFrom: z.string().nullable(),
  validTo: z.string().nullable(),
  pin: z.string(),
  qrUrl: z.string(),
});

export type GuestPass = Readonly<z.infer<typeof GuestPassSchema>>;

// =============================================================================
// Dates
// =============================================================================

/**
 * A calendar date parsed from the portal's D.M.YYYY text.
 */
export type CalendarDate = Readonly<{
  day: number;
  month: number;
  year: number;
}>;
