/**
 * Fitbit - Intraday heart rate normalizer (AverageRate)
 *
 * One record per day that has an intraday dataset; see segmentation.ts
 * for the aggregation.
 */

import { setupLogger } from "../../lib/logger.js";
import { arrayAt, getPath, numberAt, recordAt, stringAt } from "./accessors.js";
import { makeRecord, NO_DATE } from "./normalize-daily.js";
import { isClockTime, summarizeIntraday } from "./segmentation.js";
import type { NormalizedRecord, Sample } from "./types.js";

const logger = setupLogger("fitbit-normalize-intraday");

const INTRADAY_KEY = "activities-heart-intraday";

/**
 * Keep dataset entries with an HH:MM:SS time and a numeric value.
 */
export function toSamples(dataset: readonly unknown[]): Sample[] {
  const samples: Sample[] = [];
  for (const entry of dataset) {
    const time = stringAt(entry, ["time"], null);
    const value = numberAt(entry, ["value"], null);
    if (time !== null && value !== null && isClockTime(time)) {
      samples.push({ time, value });
    }
  }
  if (samples.length < dataset.length) {
    logger.debug(`Dropped ${dataset.length - samples.length} malformed intraday samples`);
  }
  return samples;
}

export function normalizeAverageRate(rawList: readonly unknown[], deviceId: string): NormalizedRecord[] {
  const records: NormalizedRecord[] = [];

  for (const payload of rawList) {
    if (getPath(payload, [INTRADAY_KEY]) === undefined) {
      continue;
    }

    const [daily] = arrayAt(payload, ["activities-heart"]);
    const date = stringAt(daily, ["dateTime"], NO_DATE);
    const intraday = recordAt(payload, [INTRADAY_KEY]);
    const samples = toSamples(arrayAt(intraday, ["dataset"]));

    const summary = summarizeIntraday(
      samples,
      numberAt(intraday, ["datasetInterval"], 1),
      stringAt(intraday, ["datasetType"], "minute")
    );
    if (summary === null) {
      logger.debug(`No intraday samples for ${date}`);
      continue;
    }

    records.push(makeRecord(deviceId, date, "averageRate", summary));
  }

  return records;
}
