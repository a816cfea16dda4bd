/**
 * Fitbit Service
 *
 * Retrieval from the Fitbit Web API, normalization of the raw payloads,
 * and CSV export of per-resource and merged tables.
 */

export { retrieveAndSave, processBundle, processDataset, normalizeAll, validateDateRange, resolveDateRange } from "./orchestrator.js";
export { FitbitApiClient, describeErrorBody, DEFAULT_MAX_RETRIES, DEFAULT_BACKOFF_FACTOR } from "./api-client.js";
export { QuotaTracker, DEFAULT_QUOTA, RATE_LIMIT_HEADERS } from "./quota-tracker.js";
export { retrieve, listDevices, selectDevice, buildEndpoint, enumerateDates } from "./retrieval.js";
export { FitbitAuth, TokenStore, getAccessToken, waitForAuthorizationCode, listenForAuthorizationCode } from "./auth.js";
export { DataStorage, listDatasets, loadBundle, toCsv } from "./storage.js";
export { combine, recordsToTable } from "./merge.js";
export { summarizeIntraday, calculatePeriodDurations, splitWindows, windowMeans } from "./segmentation.js";
export {
  normalizeSteps,
  normalizeCalories,
  normalizeRestingHeartRate,
  normalizeSpo2,
  normalizeHeartRateZones,
} from "./normalize-daily.js";
export { normalizeSleep } from "./normalize-sleep.js";
export { normalizeAverageRate } from "./normalize-intraday.js";

// Types
export type {
  ProcessResult,
  RetrieveAndSaveOptions,
  RetrieveAndSaveResult,
  DateRangeInput,
} from "./orchestrator.js";
export type { ApiClientOptions, RequestStats, SleepFn } from "./api-client.js";
export type { RetrieveOptions, ProgressFn } from "./retrieval.js";
export type { TokenData, AuthOptions, AccessTokenOptions, CallbackListener } from "./auth.js";
export type { Table, Row, MergeResult, CombinedRow } from "./merge.js";
export type {
  RawBundle,
  ResourceKind,
  RequestKind,
  QuotaState,
  Device,
  NormalizedRecord,
  RecordKind,
  CellValue,
  Sample,
  Segment,
  SegmentKind,
} from "./types.js";
