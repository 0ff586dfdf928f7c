/**
 * Portal Module - Schemas and Types
 *
 * Wire shapes of the portal's JSON-RPC endpoint. The portal returns
 * presentation-oriented objects, so nearly every field is optional here;
 * the normalizer decides what a missing field means.
 */
import { z } from "zod";

// =============================================================================
// Transport
// =============================================================================

/**
 * HTTP handle every portal operation runs against.
 */
export type PortalTransport = Readonly<{
  fetch: typeof fetch;
  apiUrl: string;
  namespace: string;
  /** Timeout for primary data calls (ms) */
  timeoutMs: number;
  /** Timeout for stream, image and pass lookups (ms) */
  secondaryTimeoutMs: number;
}>;

// =============================================================================
// Request Envelope
// =============================================================================

export type RpcMethod =
  | "Authorize"
  | "GetObjectList"
  | "StreamCameraList"
  | "GetMainPassData";

/**
 * Object types served by GetObjectList.
 */
export type PortalObjectType =
  | "CommunalAccount"
  | "CommunalAccountAccrual"
  | "CommunalRequest"
  | "Meter"
  | "MeterValue"
  | "GuestPass";

export type QueryCondition = Readonly<{
  property: string;
  value: ReadonlyArray<string | number>;
  comparisonOperator: "=" | ">=" | "<=";
}>;

export type ObjectListQuery = Readonly<{
  type: PortalObjectType;
  query: Readonly<{
    conditions: ReadonlyArray<QueryCondition>;
    sort: ReadonlyArray<never>;
    lastEditedPropertyType: null;
  }>;
  pageQuery: null;
}>;

export type RpcEnvelope = Readonly<{
  data: unknown;
  method: RpcMethod;
  namespace: string;
  operation: "REQUEST";
  parameters: Readonly<{ Authorization?: string }>;
}>;

/**
 * Response envelope. Anything but statusCode 200 is a protocol error.
 */
export const RpcResponseSchema = z.object({
  statusCode: z.number().nullish(),
  message: z.string().nullish(),
  data: z.unknown(),
});

// =============================================================================
// Shared Building Blocks
// =============================================================================

const NullableText = z.string().nullish();

/** Scalar that the portal sends as either a string or a number */
const LooseScalar = z.union([z.string(), z.number()]);

export const CustomFieldCellSchema = z.object({
  value: NullableText,
});

export const CustomFieldRowSchema = z.object({
  isVisible: z.boolean().nullish(),
  cells: z.array(CustomFieldCellSchema).nullish(),
});

/**
 * Markup-carrying "custom fields" block used all over the portal.
 */
export const CustomFieldsBlockSchema = z.object({
  rows: z.array(CustomFieldRowSchema).nullish(),
});

export type CustomFieldRow = z.infer<typeof CustomFieldRowSchema>;
export type CustomFieldsBlock = z.infer<typeof CustomFieldsBlockSchema>;

// =============================================================================
// Authorize
// =============================================================================

export const AuthTokensSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string(),
});

export type AuthTokens = z.infer<typeof AuthTokensSchema>;

// =============================================================================
// CommunalAccount
// =============================================================================

export const RawAccountSchema = z.object({
  objectId: z.object({
    id: z.string(),
    title: NullableText,
  }),
  notificationCount: z.number().nullish(),
  customFields: CustomFieldsBlockSchema.nullish(),
});

export type RawAccount = z.infer<typeof RawAccountSchema>;

export const AccountListDataSchema = z.object({
  items: z.array(RawAccountSchema).default([]),
});

// =============================================================================
// CommunalAccountAccrual (account detail)
// =============================================================================

export const RawAccrualSchema = z.object({
  objectId: z.object({ id: z.string() }).nullish(),
  communalAccount: z
    .object({
      id: NullableText,
      title: NullableText,
    })
    .nullish(),
  listFields: CustomFieldsBlockSchema.nullish(),
});

export type RawAccrual = z.infer<typeof RawAccrualSchema>;

export const AccountDetailSchema = z.object({
  items: z.array(RawAccrualSchema).default([]),
  optionalObject: CustomFieldsBlockSchema.nullish(),
  notificationCount: z.number().nullish(),
});

export type AccountDetail = z.infer<typeof AccountDetailSchema>;

// =============================================================================
// CommunalRequest
// =============================================================================

export const RawCommunalRequestSchema = z.object({
  objectId: z
    .object({
      id: z.string(),
      title: NullableText,
    })
    .nullish(),
  status: z
    .object({
      id: NullableText,
      title: NullableText,
    })
    .nullish(),
});

export type RawCommunalRequest = z.infer<typeof RawCommunalRequestSchema>;

export const CommunalRequestListDataSchema = z.object({
  items: z.array(RawCommunalRequestSchema).default([]),
});

// =============================================================================
// Meter / MeterValue
// =============================================================================

export const RawMeterSchema = z.object({
  objectId: z
    .object({
      id: NullableText,
      title: NullableText,
    })
    .nullish(),
  type: z
    .object({
      id: NullableText,
      title: NullableText,
    })
    .nullish(),
  lastMeterValue: z
    .object({
      listValue: LooseScalar.nullish(),
      dateList: NullableText,
    })
    .nullish(),
  dataTitleCustomFields: CustomFieldsBlockSchema.nullish(),
});

export type RawMeter = z.infer<typeof RawMeterSchema>;

export const MeterListDataSchema = z.object({
  items: z.array(RawMeterSchema).default([]),
});

export const RawMeterValueSchema = z.object({
  dateList: NullableText,
  value1: z
    .object({
      value: LooseScalar.nullish(),
    })
    .nullish(),
});

export type RawMeterValue = z.infer<typeof RawMeterValueSchema>;

export const MeterHistoryDataSchema = z.object({
  items: z.array(RawMeterValueSchema).default([]),
});

// =============================================================================
// Cameras
// =============================================================================

export const RawCameraSchema = z.object({
  id: LooseScalar.transform(String),
  title: NullableText,
  preview: NullableText,
  videoUrl: NullableText,
});

export type RawCamera = z.infer<typeof RawCameraSchema>;

export const CameraListDataSchema = z.object({
  cameras: z.array(RawCameraSchema).default([]),
});

/**
 * Body returned by a camera's videoUrl.
 */
export const StreamUrlResponseSchema = z.object({
  url: NullableText,
});

// =============================================================================
// Access Control
// =============================================================================

export const RawMainPassSchema = z.object({
  pin: LooseScalar.nullish(),
  qr: NullableText,
  text: NullableText,
});

export type RawMainPass = z.infer<typeof RawMainPassSchema>;

export const RawGuestPassSchema = z.object({
  strategy: z.object({ title: NullableText }).nullish(),
  /** Epoch seconds */
  dateFrom: z.number().nullish(),
  /** Epoch seconds */
  dateTo: z.number().nullish(),
  pin: LooseScalar.nullish(),
  qr: NullableText,
});

export type RawGuestPass = z.infer<typeof RawGuestPassSchema>;

export const GuestPassListDataSchema = z.object({
  count: z.number().nullish(),
  items: z.array(RawGuestPassSchema).default([]),
});

export type GuestPassList = z.infer<typeof GuestPassListDataSchema>;

// =============================================================================
// Images
// =============================================================================

/**
 * Image bytes fetched on demand (camera preview, QR code).
 */
export type PortalImage = Readonly<{
  contentType: string;
  body: Uint8Array;
}>;
