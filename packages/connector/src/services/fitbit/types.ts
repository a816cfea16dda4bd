/**
 * Fitbit - Shared types
 */

// =============================================================================
// Retrieval
// =============================================================================

/** Per-day resources fetched for every date of a run */
export const RESOURCE_KINDS = ["steps", "heart", "calories", "sleep", "spo2", "rate"] as const;

export type ResourceKind = (typeof RESOURCE_KINDS)[number];

/** Every kind a request can be counted under */
export type RequestKind = ResourceKind | "devices";

export interface QuotaState {
  limit: number;
  remaining: number;
  resetSeconds: number;
}

export interface ResourceRequest {
  readonly resource: ResourceKind;
  /** ISO date (YYYY-MM-DD) */
  readonly date: string;
}

/**
 * Raw API payloads of one run, one list per resource in date order.
 * Serialized as-is to fitbit_data.json.
 */
export type RawBundle = { device_id: string } & Record<ResourceKind, unknown[]>;

export interface Device {
  id: string;
  deviceVersion: string | null;
  type: string | null;
  lastSyncTime: string | null;
  batteryLevel: number | null;
}

// =============================================================================
// Normalized records
// =============================================================================

export type CellValue = string | number | boolean | null;

export type RecordKind =
  | "sleep"
  | "steps"
  | "calories"
  | "restingHeartRate"
  | "spo2"
  | "heartRateZones"
  | "averageRate";

/** One row per (device, date, resource) */
export interface NormalizedRecord {
  readonly deviceId: string;
  /** Display date (DD/MM/YYYY) */
  readonly date: string;
  readonly kind: RecordKind;
  readonly fields: Readonly<Record<string, CellValue>>;
}

/** One intraday heart-rate reading */
export interface Sample {
  /** Local clock time (HH:MM:SS) */
  time: string;
  value: number;
}

export type SegmentKind = "active" | "resting";

export interface Segment {
  kind: SegmentKind;
  startTime: string;
  endTime: string;
  durationSeconds: number;
}

/** Column names shared by every persisted table */
export const DEVICE_COLUMN = "Id_dispositivo";
export const DATE_COLUMN = "DateTime";
