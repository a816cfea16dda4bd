/**
 * Fitbit - Sleep normalizer
 *
 * Keeps the main sleep of each date (at most one record per date) and
 * flattens its stage summary.
 */

import { arrayAt, booleanAt, numberAt, recordAt, scalarAt, stringAt } from "./accessors.js";
import { formatMinutes, minutesToHours } from "./format.js";
import { makeRecord, NO_DATE } from "./normalize-daily.js";
import type { CellValue, NormalizedRecord } from "./types.js";

export const SLEEP_STAGES = ["deep", "wake", "light", "rem"] as const;

/** Minute columns that also get a "_readable" ("H hours M minutes") column */
const READABLE_COLUMNS = [
  "minutesAsleep",
  "minutesAwake",
  "timeInBed",
  "wake_minutes",
  "rem_minutes",
  "light_minutes",
  "deep_minutes",
] as const;

function sleepFields(entry: unknown): Record<string, CellValue> {
  const fields: Record<string, CellValue> = {
    logId: scalarAt(entry, ["logId"]) ?? NO_DATE,
    startTime: stringAt(entry, ["startTime"], NO_DATE),
    endTime: stringAt(entry, ["endTime"], NO_DATE),
    duration: numberAt(entry, ["duration"], 0),
    efficiency: numberAt(entry, ["efficiency"], 0),
    minutesAsleep: numberAt(entry, ["minutesAsleep"], 0),
    minutesAwake: numberAt(entry, ["minutesAwake"], 0),
    timeInBed: numberAt(entry, ["timeInBed"], 0),
    isMainSleep: booleanAt(entry, ["isMainSleep"], false),
    type: stringAt(entry, ["type"], NO_DATE),
  };

  const summary = recordAt(entry, ["levels", "summary"]);
  for (const stage of SLEEP_STAGES) {
    fields[`${stage}_minutes`] = numberAt(summary, [stage, "minutes"], 0);
    fields[`${stage}_count`] = numberAt(summary, [stage, "count"], 0);
    fields[`${stage}_thirtyDayAvgMinutes`] = numberAt(summary, [stage, "thirtyDayAvgMinutes"], 0);
  }

  fields.minutesAsleep_hours = minutesToHours(numberAt(fields, ["minutesAsleep"], 0));
  for (const column of READABLE_COLUMNS) {
    fields[`${column}_readable`] = formatMinutes(numberAt(fields, [column], 0));
  }

  return fields;
}

export function normalizeSleep(rawList: readonly unknown[], deviceId: string): NormalizedRecord[] {
  const records: NormalizedRecord[] = [];
  const processedDates = new Set<string>();

  for (const payload of rawList) {
    const entries = arrayAt(payload, ["sleep"]);

    // Last main sleep listed for a date wins
    const mainSleeps = new Map<string, unknown>();
    for (const entry of entries) {
      if (booleanAt(entry, ["isMainSleep"], false)) {
        mainSleeps.set(stringAt(entry, ["dateOfSleep"], NO_DATE), entry);
      }
    }

    for (const entry of entries) {
      const date = stringAt(entry, ["dateOfSleep"], NO_DATE);
      if (processedDates.has(date) || mainSleeps.get(date) !== entry) {
        continue;
      }
      processedDates.add(date);
      records.push(makeRecord(deviceId, date, "sleep", sleepFields(entry)));
    }
  }

  return records;
}
