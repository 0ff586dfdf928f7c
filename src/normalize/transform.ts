/**
 * Normalize Module - Pure Transformations
 *
 * Turns presentation-oriented portal fields (HTML fragments, localized
 * text, decimal commas) into typed values. Every regex and every bit of
 * markup stripping lives in this file.
 *
 * No side effects, no I/O - just data in, data out.
 */
import { type Result, err, ok } from "neverthrow";

import type {
  CustomFieldRow,
  CustomFieldsBlock,
  GuestPassList,
  RawAccount,
  RawAccrual,
  RawCamera,
  RawCommunalRequest,
  RawMainPass,
  RawMeter,
  RawMeterValue,
} from "../portal/index.js";
import { type NormalizeError, parseError } from "./errors.js";
import type {
  Accrual,
  CalendarDate,
  CameraRecord,
  CommunalRequest,
  GuestPass,
  MainPass,
  MeterReading,
  MeterRecord,
  MeterTypeCode,
  MeterUnit,
} from "./schema.js";
import { METER_TYPE_CODES } from "./schema.js";

// =============================================================================
// Sentinels
// =============================================================================

export const UNKNOWN_PAYMENT_STATUS = "Unknown";
export const UNKNOWN_ADDRESS = "unknown";
export const UNKNOWN_PERSONAL_ACCOUNT = "unknown";

// =============================================================================
// Markup
// =============================================================================

const SPAN_PATTERN = /<span[^>]*>(.*?)<\/span>/s;
const TAG_PATTERN = /<[^>]+>/g;

/**
 * Remove every HTML tag, keeping the text between them.
 *
 * @example
 * stripMarkup("<b>Дата поверки</b>: 01.02.2030") // "Дата поверки: 01.02.2030"
 */
export function stripMarkup(value: string): string {
  return value.replace(TAG_PATTERN, "");
}

/**
 * Inner text of the first <span>, or undefined when there is none.
 */
function spanText(value: string): string | undefined {
  return SPAN_PATTERN.exec(value)?.[1];
}

function firstCellValue(row: CustomFieldRow | undefined): string | undefined {
  return row?.cells?.[0]?.value ?? undefined;
}

// =============================================================================
// Numbers & Dates
// =============================================================================

const PORTAL_DATE_PATTERN = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/;

/**
 * Parse the portal's day.month.year date text.
 *
 * @returns The calendar date, or null when the text is not a real date
 */
export function parsePortalDate(text: string): CalendarDate | null {
  const match = PORTAL_DATE_PATTERN.exec(text.trim());
  if (!match) return null;

  const day = Number(match[1]);
  const month = Number(match[2]);
  const year = Number(match[3]);

  // Rejects 31.02.2024 and friends
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    return null;
  }

  return { day, month, year };
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

/**
 * @example
 * formatPortalDate({ day: 1, month: 2, year: 2024 }) // "01.02.2024"
 */
export function formatPortalDate(date: CalendarDate): string {
  return `${pad(date.day, 2)}.${pad(date.month, 2)}.${pad(date.year, 4)}`;
}

/**
 * @example
 * toIsoDate({ day: 1, month: 2, year: 2024 }) // "2024-02-01"
 */
export function toIsoDate(date: CalendarDate): string {
  return `${pad(date.year, 4)}-${pad(date.month, 2)}-${pad(date.day, 2)}`;
}

function dateOrdinal(date: CalendarDate): number {
  return Date.UTC(date.year, date.month - 1, date.day);
}

/**
 * Parse a decimal that may use a comma separator.
 *
 * @example
 * parseDecimal("10,5") // 10.5
 * parseDecimal("n/a") // null
 */
export function parseDecimal(value: string | number): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }

  const normalized = value.replace(/\s/g, "").replace(",", ".");
  if (normalized === "") return null;

  const parsed = Number(normalized);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Convert epoch seconds to an ISO timestamp. Values outside the range a
 * Date can hold give null.
 */
export function epochSecondsToIso(
  seconds: number | null | undefined,
): string | null {
  if (seconds === null || seconds === undefined || !Number.isFinite(seconds)) {
    return null;
  }
  const date = new Date(seconds * 1000);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

// =============================================================================
// Account Fields
// =============================================================================

/**
 * Payment status from the account detail's status block.
 *
 * The first row flagged visible wins; an enclosing <span> is stripped.
 * No visible row, or a visible row without text, yields "Unknown".
 */
export function extractPaymentStatus(
  block: CustomFieldsBlock | null | undefined,
): string {
  const visibleRow = (block?.rows ?? []).find((row) => row.isVisible === true);
  if (!visibleRow) return UNKNOWN_PAYMENT_STATUS;

  const value = firstCellValue(visibleRow) ?? "";
  const text = (spanText(value) ?? value).trim();
  return text === "" ? UNKNOWN_PAYMENT_STATUS : text;
}

/**
 * Address embedded as a <span> in the account's first custom field.
 */
export function extractAddress(account: Pick<RawAccount, "customFields">): string {
  const value = firstCellValue(account.customFields?.rows?.[0]);
  if (!value) return UNKNOWN_ADDRESS;

  const text = spanText(value)?.trim();
  return text ? text : UNKNOWN_ADDRESS;
}

/**
 * Personal-account number from an account title such as "Л/с №123456".
 */
export function extractPersonalAccountNumber(
  title: string | null | undefined,
): string {
  const match = /№\s*(\d+)/u.exec(title ?? "");
  return match?.[1] ?? UNKNOWN_PERSONAL_ACCOUNT;
}

// =============================================================================
// Meters
// =============================================================================

const CALIBRATION_KEYWORD = /поверк|calibration/iu;
const NOT_SPECIFIED = /^(не указана|not specified)$/iu;

/**
 * Calibration ("poverka") date from a meter's custom-field rows.
 *
 * @returns ISO date (YYYY-MM-DD), or undefined when absent, not
 *          specified or unparsable
 *
 * @example
 * extractCalibrationDate([{ cells: [{ value: "<b>Дата поверки</b>: 15.03.2031." }] }])
 * // "2031-03-15"
 */
export function extractCalibrationDate(
  rows: ReadonlyArray<CustomFieldRow> | null | undefined,
): string | undefined {
  const marker = (rows ?? [])
    .map(firstCellValue)
    .find((value) => value !== undefined && CALIBRATION_KEYWORD.test(value));
  if (marker === undefined) return undefined;

  const text = stripMarkup(marker);
  const separator = text.indexOf(": ");
  if (separator === -1) return undefined;

  const raw = text
    .slice(separator + 2)
    .trim()
    .replace(/\.+$/, "")
    .trim();
  if (raw === "" || NOT_SPECIFIED.test(raw)) return undefined;

  const date = parsePortalDate(raw);
  return date ? toIsoDate(date) : undefined;
}

/**
 * Merge a meter's history with its last-known reading.
 *
 * Entries are keyed by date; the last-known reading is merged last, so it
 * wins on a shared date. An unparsable date or value fails the whole
 * history - consumers rely on it being sortable.
 */
export function buildMeterHistory(
  items: ReadonlyArray<RawMeterValue>,
  lastValue: RawMeter["lastMeterValue"],
): Result<ReadonlyArray<MeterReading>, NormalizeError> {
  const entries: Array<{ date: unknown; value: unknown }> = items.map(
    (item) => ({ date: item.dateList, value: item.value1?.value }),
  );
  entries.push({ date: lastValue?.dateList, value: lastValue?.listValue });

  const byDate = new Map<string, { ordinal: number; value: number }>();

  for (const entry of entries) {
    if (typeof entry.date !== "string" || entry.date.trim() === "") continue;
    if (typeof entry.value !== "string" && typeof entry.value !== "number") {
      continue;
    }
    if (typeof entry.value === "string" && entry.value.trim() === "") continue;

    const date = parsePortalDate(entry.date);
    if (!date) {
      return err(
        parseError("history.date", `Unparsable reading date "${entry.date}"`, entry.date),
      );
    }

    const value = parseDecimal(entry.value);
    if (value === null) {
      return err(
        parseError("history.value", `Unparsable reading "${entry.value}"`, entry.value),
      );
    }

    byDate.set(formatPortalDate(date), { ordinal: dateOrdinal(date), value });
  }

  const history = [...byDate.entries()]
    .sort(([, a], [, b]) => a.ordinal - b.ordinal)
    .map(([date, { value }]) => ({ date, value }));

  return ok(history);
}

/**
 * Map the portal's meter type id onto the known type codes.
 */
export function meterTypeCode(typeId: string | null | undefined): MeterTypeCode {
  const known = METER_TYPE_CODES.find(
    (code) => code !== "Other" && code === typeId,
  );
  return known ?? "Other";
}

const METER_UNITS: Readonly<Record<MeterTypeCode, MeterUnit | null>> = {
  HotWater: { unit: "m³", deviceClass: "volume" },
  ColdWater: { unit: "m³", deviceClass: "volume" },
  Heating: { unit: "Gcal", deviceClass: "energy" },
  Electricity: { unit: "kWh", deviceClass: "energy" },
  Other: null,
};

/**
 * Unit and device class for a meter type; null when there is none.
 */
export function meterUnit(typeCode: MeterTypeCode): MeterUnit | null {
  return METER_UNITS[typeCode];
}

/**
 * Id and title of a meter, or null when the portal sent no id.
 */
export function meterIdentity(
  meter: RawMeter,
): Readonly<{ id: string; title: string }> | null {
  const id = meter.objectId?.id;
  if (!id) return null;
  return { id, title: meter.objectId?.title ?? "Unknown" };
}

/**
 * Build a meter record from the meter object and its reading history.
 */
export function buildMeterRecord(
  meter: RawMeter,
  historyItems: ReadonlyArray<RawMeterValue>,
): Result<MeterRecord, NormalizeError> {
  const typeCode = meterTypeCode(meter.type?.id);
  const calibrationDate = extractCalibrationDate(
    meter.dataTitleCustomFields?.rows,
  );

  return buildMeterHistory(historyItems, meter.lastMeterValue).map(
    (history) => ({
      title: meter.objectId?.title ?? "Unknown",
      typeCode,
      typeTitle: meter.type?.title ?? typeCode,
      ...(calibrationDate ? { calibrationDate } : {}),
      history,
    }),
  );
}

// =============================================================================
// Accruals & Requests
// =============================================================================

const ACCRUED_AMOUNT = /Начислено\s*([\d.,]+)/u;

/**
 * Accruals that belong to a titled communal account, in portal order.
 * Each contributes its stripped date cell and the "Начислено" amount.
 */
export function parseAccruals(
  items: ReadonlyArray<RawAccrual>,
): ReadonlyArray<Accrual> {
  return items.flatMap((item) => {
    const id = item.objectId?.id;
    if (!id || !item.communalAccount?.title) return [];

    const cells = item.listFields?.rows?.[0]?.cells ?? [];
    const date = stripMarkup(cells[0]?.value ?? "").trim();
    const amountText = stripMarkup(cells[1]?.value ?? "");
    const amountMatch = ACCRUED_AMOUNT.exec(amountText)?.[1];
    const amount = amountMatch
      ? parseDecimal(amountMatch.replace(/[.,]+$/, ""))
      : null;

    return [{ id, date, amount }];
  });
}

/**
 * Service tickets with their lifecycle status code.
 */
export function parseCommunalRequests(
  items: ReadonlyArray<RawCommunalRequest>,
): ReadonlyArray<CommunalRequest> {
  return items.flatMap((item) => {
    if (!item.objectId) return [];
    return [
      {
        id: item.objectId.id,
        title: item.objectId.title ?? "",
        statusCode: item.status?.id ?? "Unknown",
      },
    ];
  });
}

// =============================================================================
// Cameras
// =============================================================================

/**
 * @example
 * stripQueryString("https://cdn/preview.jpg?token=abc") // "https://cdn/preview.jpg"
 */
export function stripQueryString(url: string): string {
  return url.split("?")[0] ?? "";
}

/**
 * Camera record before stream resolution (streamUrl absent).
 */
export function parseCamera(camera: RawCamera): CameraRecord {
  return {
    id: camera.id,
    title: camera.title ?? `Camera ${camera.id}`,
    previewUrl: stripQueryString(camera.preview ?? ""),
  };
}

// =============================================================================
// Access Control
// =============================================================================

function scalarText(value: string | number | null | undefined): string {
  return value === null || value === undefined ? "" : String(value);
}

/**
 * Main pass, or undefined when the portal returned an empty object.
 */
export function parseMainPass(raw: RawMainPass): MainPass | undefined {
  const pass = {
    pin: scalarText(raw.pin),
    qrUrl: raw.qr ?? "",
    text: raw.text ?? "",
  };
  if (pass.pin === "" && pass.qrUrl === "" && pass.text === "") {
    return undefined;
  }
  return pass;
}

/**
 * Guest passes with their validity window as ISO timestamps.
 */
export function parseGuestPasses(
  list: GuestPassList,
): ReadonlyArray<GuestPass> {
  return list.items.map((item) => ({
    strategyTitle: item.strategy?.title ?? "",
    validFrom: epochSecondsToIso(item.dateFrom),
    validTo: epochSecondsToIso(item.dateTo),
    pin: scalarText(item.pin),
    qrUrl: item.qr ?? "",
  }));
}
