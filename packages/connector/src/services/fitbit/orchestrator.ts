/**
 * Fitbit - Orchestrator
 *
 * Two runs:
 * - retrieveAndSave: token -> device -> date range -> fetch -> fitbit_data.json/.txt
 * - processDataset:  fitbit_data.json -> per-resource CSVs -> Merged.csv / Registros_Incompletos.csv
 *
 * Requests run sequentially to respect the hourly quota (150 req/hour).
 */

import { AuthError } from "../../lib/errors.js";
import type { AppConfig } from "../../lib/config.js";
import { setupLogger } from "../../lib/logger.js";
import { FitbitApiClient, type RequestStats, type SleepFn } from "./api-client.js";
import { FitbitAuth, TokenStore, getAccessToken, type TokenData } from "./auth.js";
import { combine, recordsToTable } from "./merge.js";
import {
  normalizeCalories,
  normalizeHeartRateZones,
  normalizeRestingHeartRate,
  normalizeSpo2,
  normalizeSteps,
} from "./normalize-daily.js";
import { normalizeAverageRate } from "./normalize-intraday.js";
import { normalizeSleep } from "./normalize-sleep.js";
import { QuotaTracker } from "./quota-tracker.js";
import {
  listDevices,
  localIsoDate,
  parseIsoDate,
  retrieve,
  selectDevice,
  shiftIsoDate,
  type ProgressFn,
} from "./retrieval.js";
import { DataStorage, loadBundle } from "./storage.js";
import type { NormalizedRecord, RawBundle, RecordKind } from "./types.js";

const logger = setupLogger("fitbit-orchestrator");

const MIN_YEAR = 2000;
const DAY_MS = 24 * 60 * 60 * 1000;

/** Output file per record kind, in processing (and merge) order */
export const RECORD_FILES: ReadonlyArray<readonly [RecordKind, string]> = [
  ["sleep", "Sleep.csv"],
  ["steps", "Steps.csv"],
  ["calories", "Calories.csv"],
  ["restingHeartRate", "RestingHeartRate.csv"],
  ["spo2", "SPO2.csv"],
  ["heartRateZones", "HeartRateData.csv"],
  ["averageRate", "AverageRate.csv"],
];

export const MERGED_FILE = "Merged.csv";
export const INCOMPLETE_FILE = "Registros_Incompletos.csv";

// =============================================================================
// Processing
// =============================================================================

export function normalizeAll(bundle: RawBundle): Record<RecordKind, NormalizedRecord[]> {
  const deviceId = bundle.device_id;
  return {
    sleep: normalizeSleep(bundle.sleep, deviceId),
    steps: normalizeSteps(bundle.steps, deviceId),
    calories: normalizeCalories(bundle.calories, deviceId),
    restingHeartRate: normalizeRestingHeartRate(bundle.rate, deviceId),
    spo2: normalizeSpo2(bundle.spo2, deviceId),
    heartRateZones: normalizeHeartRateZones(bundle.heart, deviceId),
    averageRate: normalizeAverageRate(bundle.rate, deviceId),
  };
}

export interface ProcessResult {
  /** Paths written, in order */
  files: string[];
  /** Rows per record kind */
  counts: Record<RecordKind, number>;
  completeRows: number;
  incompleteRows: number;
}

/**
 * Write every per-resource table, then the merged tables.
 * The merged tables are skipped when there is no data at all.
 */
export async function processBundle(bundle: RawBundle, storage: DataStorage): Promise<ProcessResult> {
  logger.info("Processing data...");

  const records = normalizeAll(bundle);
  const files: string[] = [];

  for (const [kind, filename] of RECORD_FILES) {
    files.push(await storage.saveCsv(recordsToTable(records[kind]), filename));
  }

  const counts = {
    sleep: records.sleep.length,
    steps: records.steps.length,
    calories: records.calories.length,
    restingHeartRate: records.restingHeartRate.length,
    spo2: records.spo2.length,
    heartRateZones: records.heartRateZones.length,
    averageRate: records.averageRate.length,
  };

  const merged = combine(RECORD_FILES.map(([kind]) => records[kind]));
  if (merged === null) {
    return { files, counts, completeRows: 0, incompleteRows: 0 };
  }

  files.push(await storage.saveCsv(merged.complete, MERGED_FILE));
  logger.info("Complete data table saved successfully.");
  files.push(await storage.saveCsv(merged.incomplete, INCOMPLETE_FILE));
  logger.info("Incomplete data table saved successfully.");

  return {
    files,
    counts,
    completeRows: merged.complete.rows.length,
    incompleteRows: merged.incomplete.rows.length,
  };
}

/**
 * Process a saved dataset in place.
 *
 * @throws PayloadDecodeError if the dataset's bundle cannot be read
 */
export async function processDataset(datasetDir: string): Promise<ProcessResult> {
  const bundle = await loadBundle(datasetDir);
  const result = await processBundle(bundle, new DataStorage(datasetDir));
  logger.info("Data processed successfully.");
  return result;
}

// =============================================================================
// Retrieval
// =============================================================================

/**
 * Check an explicit date range.
 *
 * @param today - ISO date of the current day; the range must end before it
 * @returns Why the range is refused, or null when it is acceptable
 */
export function validateDateRange(
  startDate: string,
  endDate: string,
  today: string,
  maxDays: number
): string | null {
  const start = parseIsoDate(startDate);
  const end = parseIsoDate(endDate);
  if (!start || !end) {
    return "Invalid date format. Please use 'YYYY-MM-DD'.";
  }
  if (start.getUTCFullYear() < MIN_YEAR || end.getUTCFullYear() < MIN_YEAR) {
    return `Year must be greater than ${MIN_YEAR}.`;
  }
  if (endDate >= today) {
    return "End date cannot be in the future or today. Please enter a valid range.";
  }
  if (start > end) {
    return "Start date cannot be greater than end date. Please enter a valid range.";
  }
  if ((end.getTime() - start.getTime()) / DAY_MS > maxDays) {
    return `Date range must not exceed ${maxDays} days. Please enter a valid range.`;
  }
  return null;
}

export type DateRangeInput = { days: number } | { from: string; to: string };

/**
 * Resolve the requested range. A day count ends today; an explicit range
 * is validated first.
 *
 * @throws Error with the validation message
 */
export function resolveDateRange(
  input: DateRangeInput,
  today: string,
  maxDays: number
): { startDate: string; endDate: string } {
  if ("days" in input) {
    if (!Number.isInteger(input.days) || input.days <= 0) {
      throw new Error("Invalid number of days. Must be a positive integer.");
    }
    return { startDate: shiftIsoDate(today, -(input.days - 1)), endDate: today };
  }

  const reason = validateDateRange(input.from, input.to, today, maxDays);
  if (reason !== null) {
    throw new Error(reason);
  }
  return { startDate: input.from, endDate: input.to };
}

export interface RetrieveAndSaveOptions {
  config: AppConfig;
  range: DateRangeInput;
  /** Device id or 1-based position; optional with a single device */
  device?: string;
  /** Clock for "today" and the dataset directory name */
  now?: Date;
  /** Replaces the stored-token / OAuth resolution */
  getToken?: (quota: QuotaTracker) => Promise<TokenData>;
  sleep?: SleepFn;
  onProgress?: ProgressFn;
}

export interface RetrieveAndSaveResult {
  datasetDir: string;
  deviceId: string;
  bundle: RawBundle;
  stats: RequestStats;
}

function defaultGetToken(config: AppConfig): (quota: QuotaTracker) => Promise<TokenData> {
  return async (quota) => {
    if (config.clientId === null || config.clientSecret === null) {
      throw new AuthError("FITBIT_CLIENT_ID and FITBIT_CLIENT_SECRET are required");
    }
    const auth = new FitbitAuth({
      clientId: config.clientId,
      clientSecret: config.clientSecret,
      redirectUri: config.redirectUri,
      apiBase: config.apiBase,
      quota,
    });
    return getAccessToken(auth, new TokenStore(config.tokenDir), {
      account: config.account,
      port: config.port,
    });
  };
}

/**
 * Fetch a date range for one device and save the raw bundle.
 * Nothing is written unless the whole range was fetched.
 *
 * @throws QuotaExceededError if the range does not fit in the remaining quota
 * @throws AuthError if no token could be obtained
 */
export async function retrieveAndSave(options: RetrieveAndSaveOptions): Promise<RetrieveAndSaveResult> {
  const { config } = options;
  const now = options.now ?? new Date();
  const quota = new QuotaTracker();

  const token = await (options.getToken ?? defaultGetToken(config))(quota);
  const client = new FitbitApiClient({
    accessToken: token.access_token,
    quota,
    baseUrl: config.apiBase,
    sleep: options.sleep,
  });

  const devices = await listDevices(client, token.user_id);
  const device = selectDevice(devices, options.device);
  if (device === null) {
    throw new Error("Failed to retrieve device ID. Aborting data retrieval.");
  }
  logger.info(`Using device ${device.id} (${device.deviceVersion ?? "unknown model"})`);

  const { startDate, endDate } = resolveDateRange(options.range, localIsoDate(now), config.maxDays);

  const startTime = Date.now();
  const bundle = await retrieve(client, token.user_id, device.id, startDate, endDate, {
    onProgress: options.onProgress,
  });

  const storage = await DataStorage.create(config.dataDir, config.account, now);
  await storage.saveJson(bundle);
  await storage.saveText(bundle);
  client.summary();

  logger.info(`Fitbit retrieval completed in ${((Date.now() - startTime) / 1000).toFixed(2)}s`);

  return {
    datasetDir: storage.dataDir,
    deviceId: device.id,
    bundle,
    stats: client.getStats(),
  };
}
