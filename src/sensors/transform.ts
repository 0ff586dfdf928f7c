/**
 * Sensors Module - Pure Transformations
 *
 * Presentation adapter: one account snapshot in, a flat list of sensor
 * records out. Meter units come from the normalizer's unit table.
 */
import type { AccountSnapshot } from "../coordinator/index.js";
import type { KnownRequestStatus, MeterRecord } from "../normalize/index.js";
import { UNKNOWN_PERSONAL_ACCOUNT, meterUnit } from "../normalize/index.js";
import type { SensorRecord, SensorState, StateClass } from "./schema.js";

type SensorInput = Readonly<{
  key: string;
  name: string;
  icon: string;
  state: SensorState;
  unit?: string;
  deviceClass?: string;
  stateClass?: StateClass;
  attributes?: Readonly<Record<string, unknown>>;
}>;

/**
 * Suffix that makes entity ids unique per account: the personal-account
 * number when known, else the tail of the account id.
 */
export function accountSuffix(
  account: Pick<AccountSnapshot, "id" | "personalAccountNumber">,
): string {
  return account.personalAccountNumber !== UNKNOWN_PERSONAL_ACCOUNT
    ? account.personalAccountNumber
    : account.id.slice(-8);
}

/**
 * Meter number from a title such as "ХВС №00112233", else the tail of
 * the meter id.
 */
export function meterNumber(meterId: string, title: string): string {
  return /№(\d+)/u.exec(title)?.[1] ?? meterId.slice(-8);
}

/**
 * @example
 * roundValue(12.345678) // 12.3457
 */
export function roundValue(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

function toEntityId(suffix: string, key: string): string {
  return `communal_${suffix}_${key}`.toLowerCase().replace(/[^a-z0-9_]/g, "_");
}

function meterSensor(meterId: string, meter: MeterRecord): SensorInput {
  const number = meterNumber(meterId, meter.title);
  const latest = meter.history.at(-1);
  const unit = meterUnit(meter.typeCode);

  return {
    key: `meter_${number}_value`,
    name: `Meter ${number}`,
    icon: "mdi:gauge",
    state: latest ? roundValue(latest.value) : null,
    ...(unit ? { unit: unit.unit, deviceClass: unit.deviceClass } : {}),
    stateClass: "total_increasing",
    attributes: {
      calibrationDate: meter.calibrationDate ?? null,
      lastUpdate: latest?.date ?? null,
      meterType: meter.typeTitle,
      meterId,
      title: meter.title,
    },
  };
}

function countByStatus(
  account: AccountSnapshot,
  status: KnownRequestStatus,
): number {
  return account.communalRequests.filter(
    (request) => request.statusCode === status,
  ).length;
}

function requestSensors(account: AccountSnapshot): SensorInput[] {
  const done = countByStatus(account, "Done");
  const atwork = countByStatus(account, "AtWork");
  const onhold = countByStatus(account, "OnHold");
  const waitingforregistration = countByStatus(account, "WaitingForRegistration");

  const counter = (suffix: string, name: string, icon: string, state: number) => ({
    key: `communalrequest_count_${suffix}`,
    name,
    icon,
    state,
    stateClass: "measurement" as const,
  });

  return [
    {
      ...counter("total", "Requests total", "mdi:playlist-check", account.communalRequests.length),
      attributes: { done, atwork, onhold, waitingforregistration },
    },
    counter("done", "Requests done", "mdi:check-circle", done),
    counter("atwork", "Requests at work", "mdi:progress-clock", atwork),
    counter("onhold", "Requests on hold", "mdi:pause-circle", onhold),
    counter(
      "waitingforregistration",
      "Requests awaiting registration",
      "mdi:clock-outline",
      waitingforregistration,
    ),
  ];
}

function paymentDueSensor(account: AccountSnapshot): SensorInput | null {
  const [latest] = account.accruals;
  if (!latest) return null;

  return {
    key: "payment_due",
    name: "Payment due",
    icon: "mdi:cash",
    state: latest.amount,
    stateClass: "measurement",
    attributes: Object.fromEntries(
      account.accruals.map((accrual) => [
        accrual.id,
        { date: accrual.date, amount: accrual.amount },
      ]),
    ),
  };
}

function accessSensor(account: AccountSnapshot): SensorInput | null {
  const { mainPass, guestPasses } = account;
  if (!mainPass && guestPasses.length === 0) return null;

  return {
    key: "access_pin",
    name: "Access PIN",
    icon: "mdi:qrcode",
    state: mainPass?.pin ? mainPass.pin : "none",
    attributes: {
      guestPassCount: guestPasses.length,
      guestPasses,
      mainPassText: mainPass?.text ?? "",
      mainPassQr: mainPass?.qrUrl ?? "",
    },
  };
}

/**
 * Build every sensor record of one account.
 */
export function buildAccountSensors(
  account: AccountSnapshot,
): ReadonlyArray<SensorRecord> {
  const meters = Object.entries(account.meters);

  const inputs: Array<SensorInput | null> = [
    { key: "address", name: "Address", icon: "mdi:home", state: account.address },
    {
      key: "personal_account_number",
      name: "Personal account",
      icon: "mdi:card-account-details-outline",
      state: account.personalAccountNumber,
    },
    {
      key: "payment_status",
      name: "Payment status",
      icon: "mdi:cash",
      state: account.paymentStatus,
    },
    {
      key: "notification_count",
      name: "Notifications",
      icon: "mdi:bell",
      state: account.notificationCount,
      stateClass: "measurement",
    },
    {
      key: "camera_count",
      name: "Cameras",
      icon: "mdi:camera",
      state: account.cameras.length,
      stateClass: "measurement",
    },
    {
      key: "meter_count",
      name: "Meters",
      icon: "mdi:counter",
      state: meters.length,
      stateClass: "measurement",
      attributes: {
        allMeters: meters.map(([, meter]) => `${meter.title} (${meter.typeTitle})`),
      },
    },
    ...meters.map(([meterId, meter]) => meterSensor(meterId, meter)),
    ...requestSensors(account),
    paymentDueSensor(account),
    accessSensor(account),
  ];

  const suffix = accountSuffix(account);

  return inputs
    .filter((input): input is SensorInput => input !== null)
    .map((input) => ({
      ...input,
      entityId: toEntityId(suffix, input.key),
      attributes: input.attributes ?? {},
    }));
}
