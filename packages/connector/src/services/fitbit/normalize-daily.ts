/**
 * Fitbit - Daily resource normalizers
 *
 * One record per date for:
 * - Steps / Calories (activities time series, 1d)
 * - Resting heart rate (daily summary inside the intraday response)
 * - SpO2
 * - Heart rate zones
 */

import { setupLogger } from "../../lib/logger.js";
import { arrayAt, numberAt, stringAt } from "./accessors.js";
import { formatDisplayDate, roundHalfEven } from "./format.js";
import type { CellValue, NormalizedRecord, RecordKind } from "./types.js";

const logger = setupLogger("fitbit-normalize");

/** Placeholder for a missing date */
export const NO_DATE = "N/A";

export function makeRecord(
  deviceId: string,
  isoDate: string,
  kind: RecordKind,
  fields: Record<string, CellValue>
): NormalizedRecord {
  return { deviceId, date: formatDisplayDate(isoDate), kind, fields };
}

// =============================================================================
// Activity time series (steps, calories)
// =============================================================================

function normalizeTimeSeries(
  rawList: readonly unknown[],
  deviceId: string,
  responseKey: string,
  kind: RecordKind,
  column: string
): NormalizedRecord[] {
  const records: NormalizedRecord[] = [];
  for (const payload of rawList) {
    for (const entry of arrayAt(payload, [responseKey])) {
      const date = stringAt(entry, ["dateTime"], NO_DATE);
      const value = numberAt(entry, ["value"], 0);
      records.push(makeRecord(deviceId, date, kind, { [column]: Math.trunc(value) }));
    }
  }
  return records;
}

export function normalizeSteps(rawList: readonly unknown[], deviceId: string): NormalizedRecord[] {
  return normalizeTimeSeries(rawList, deviceId, "activities-steps", "steps", "TotalSteps");
}

export function normalizeCalories(rawList: readonly unknown[], deviceId: string): NormalizedRecord[] {
  return normalizeTimeSeries(
    rawList,
    deviceId,
    "activities-calories",
    "calories",
    "Values_calorias quemadas"
  );
}

// =============================================================================
// Resting heart rate
// =============================================================================

/**
 * Reads the "rate" (intraday) payloads. Dates without a resting value
 * are skipped.
 */
export function normalizeRestingHeartRate(
  rawList: readonly unknown[],
  deviceId: string
): NormalizedRecord[] {
  const records: NormalizedRecord[] = [];
  for (const payload of rawList) {
    for (const entry of arrayAt(payload, ["activities-heart"])) {
      const date = stringAt(entry, ["dateTime"], NO_DATE);
      const resting = numberAt(entry, ["value", "restingHeartRate"], null);
      if (resting === null) {
        logger.info(`No resting heart rate data available for ${date}.`);
        continue;
      }
      records.push(makeRecord(deviceId, date, "restingHeartRate", { RestingHeartRate: resting }));
    }
  }
  return records;
}

// =============================================================================
// SpO2
// =============================================================================

export function normalizeSpo2(rawList: readonly unknown[], deviceId: string): NormalizedRecord[] {
  const records: NormalizedRecord[] = [];
  for (const payload of rawList) {
    const date = stringAt(payload, ["dateTime"], null);
    if (date === null) {
      logger.debug("Skipping SpO2 payload without dateTime");
      continue;
    }
    records.push(
      makeRecord(deviceId, date, "spo2", {
        Average_SP02: numberAt(payload, ["value", "avg"], null),
        SPO2_Min: numberAt(payload, ["value", "min"], null),
        SPO2_Max: numberAt(payload, ["value", "max"], null),
      })
    );
  }
  return records;
}

// =============================================================================
// Heart rate zones
// =============================================================================

/**
 * Zone names lose their spaces ("Fat Burn" -> "FatBurn_Min", ...).
 */
export function normalizeHeartRateZones(
  rawList: readonly unknown[],
  deviceId: string
): NormalizedRecord[] {
  const records: NormalizedRecord[] = [];
  for (const payload of rawList) {
    for (const entry of arrayAt(payload, ["activities-heart"])) {
      const date = stringAt(entry, ["dateTime"], NO_DATE);
      const fields: Record<string, CellValue> = {};

      for (const zone of arrayAt(entry, ["value", "heartRateZones"])) {
        const name = stringAt(zone, ["name"], null);
        if (name === null) continue;
        const column = name.replace(/ /g, "");
        fields[`${column}_Min`] = numberAt(zone, ["min"], 0);
        fields[`${column}_Max`] = numberAt(zone, ["max"], 0);
        fields[`${column}_CaloriesOut`] = roundHalfEven(numberAt(zone, ["caloriesOut"], 0), 4);
        fields[`${column}_Minutes`] = numberAt(zone, ["minutes"], 0);
      }

      records.push(makeRecord(deviceId, date, "heartRateZones", fields));
    }
  }
  return records;
}
