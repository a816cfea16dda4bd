/**
 * Fitbit - Intraday heart rate segmentation
 *
 * Splits one day of intraday samples into night (00:00-09:00) and day
 * (09:00 onwards) windows, measures active/resting runs, and computes
 * per-window means. A sample is active above 110 bpm.
 *
 * All functions are pure and synchronous.
 */

import { formatDuration, roundHalfEven } from "./format.js";
import type { CellValue, Sample, Segment, SegmentKind } from "./types.js";

export const ACTIVE_THRESHOLD = 110;
export const NIGHT_START = "00:00";
export const NIGHT_END = "09:00";
export const DEFAULT_ACTIVE_MEAN = 120;
export const DEFAULT_RESTING_MEAN = 80;

/** Placeholder for a missing clock time */
export const NO_TIME = "N/A";

const CLOCK_TIME = /^(\d{1,2}):(\d{2}):(\d{2})$/;
const DAY_SECONDS = 24 * 60 * 60;

export interface PeriodDurations {
  activeSeconds: number;
  restingSeconds: number;
  segments: Segment[];
}

export interface WindowMeans {
  /** 0 when the window is empty */
  mean: number;
  /** DEFAULT_ACTIVE_MEAN when no sample is active */
  activeMean: number;
  /** DEFAULT_RESTING_MEAN when no sample is resting */
  restingMean: number;
}

export interface Windows {
  day: Sample[];
  night: Sample[];
}

export function classify(value: number): SegmentKind {
  return value > ACTIVE_THRESHOLD ? "active" : "resting";
}

export function isClockTime(time: string): boolean {
  return CLOCK_TIME.test(time);
}

function parseClock(time: string): number {
  const match = time.match(CLOCK_TIME);
  if (!match) {
    throw new Error(`Invalid clock time: ${time}`);
  }
  const [, hours, minutes, seconds] = match;
  return Number(hours) * 3600 + Number(minutes) * 60 + Number(seconds);
}

/**
 * Seconds from start to end. An end earlier than start is read as the
 * next day; a missing time on either side gives 0.
 */
export function durationBetween(start: string | null, end: string | null): number {
  if (start === null || end === null || start === NO_TIME || end === NO_TIME) {
    return 0;
  }
  const startSeconds = parseClock(start);
  let endSeconds = parseClock(end);
  if (endSeconds < startSeconds) {
    endSeconds += DAY_SECONDS;
  }
  return endSeconds - startSeconds;
}

/**
 * Night and day windows. Both keep the input order.
 */
export function splitWindows(samples: readonly Sample[]): Windows {
  return {
    night: samples.filter((s) => NIGHT_START <= s.time && s.time < NIGHT_END),
    day: samples.filter((s) => NIGHT_END <= s.time),
  };
}

/**
 * Run-length segmentation into active/resting runs.
 *
 * A run spans from its first sample to its last sample; the gap to the
 * next run's first sample belongs to neither. A one-sample run lasts 0s.
 */
export function calculatePeriodDurations(samples: readonly Sample[]): PeriodDurations {
  const segments: Segment[] = [];
  let activeSeconds = 0;
  let restingSeconds = 0;

  const close = (kind: SegmentKind, startTime: string, endTime: string): void => {
    const durationSeconds = durationBetween(startTime, endTime);
    segments.push({ kind, startTime, endTime, durationSeconds });
    if (kind === "active") {
      activeSeconds += durationSeconds;
    } else {
      restingSeconds += durationSeconds;
    }
  };

  let runKind: SegmentKind | null = null;
  let runStart = "";

  for (let i = 0; i < samples.length; i++) {
    const kind = classify(samples[i].value);
    if (kind !== runKind) {
      if (runKind !== null) {
        close(runKind, runStart, samples[i - 1].time);
      }
      runKind = kind;
      runStart = samples[i].time;
    }
  }

  if (runKind !== null && samples.length > 0) {
    close(runKind, runStart, samples[samples.length - 1].time);
  }

  return { activeSeconds, restingSeconds, segments };
}

function mean(values: readonly number[], fallback: number): number {
  if (values.length === 0) return fallback;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function windowMeans(samples: readonly Sample[]): WindowMeans {
  const values = samples.map((s) => s.value);
  return {
    mean: mean(values, 0),
    activeMean: mean(values.filter((v) => v > ACTIVE_THRESHOLD), DEFAULT_ACTIVE_MEAN),
    restingMean: mean(values.filter((v) => v <= ACTIVE_THRESHOLD), DEFAULT_RESTING_MEAN),
  };
}

function clockRange(samples: readonly Sample[]): [string, string] | null {
  if (samples.length === 0) return null;
  let min = samples[0].time;
  let max = samples[0].time;
  for (const { time } of samples) {
    if (time < min) min = time;
    if (time > max) max = time;
  }
  return [min, max];
}

/**
 * Aggregate one day of intraday samples into a single record.
 * Returns null for an empty dataset.
 */
export function summarizeIntraday(
  samples: readonly Sample[],
  datasetInterval: CellValue,
  datasetType: CellValue
): Record<string, CellValue> | null {
  if (samples.length === 0) {
    return null;
  }

  const { day, night } = splitWindows(samples);

  const full = windowMeans(samples);
  const dayMeans = windowMeans(day);
  const nightMeans = windowMeans(night);

  // A day with complete readings in both windows and no active sample
  // reports the active defaults for the full day and the night.
  const noneZero = (window: readonly Sample[]) => window.every((s) => s.value !== 0);
  const noneActive = samples.every((s) => s.value <= ACTIVE_THRESHOLD);
  if (noneZero(day) && noneZero(night) && noneActive) {
    full.activeMean = DEFAULT_ACTIVE_MEAN;
    nightMeans.activeMean = DEFAULT_ACTIVE_MEAN;
  }

  const timeStart = samples[0].time;
  const timeEnd = samples[samples.length - 1].time;
  const dayRange = clockRange(day);
  const nightRange = clockRange(night);

  const dayPeriods = calculatePeriodDurations(day);
  const nightPeriods = calculatePeriodDurations(night);

  return {
    TimeStart: timeStart,
    TimeEnd: timeEnd,
    Duration: formatDuration(durationBetween(timeStart, timeEnd)),
    TimeStartDay: dayRange?.[0] ?? null,
    TimeEndDay: dayRange?.[1] ?? null,
    DurationDay: formatDuration(dayRange ? durationBetween(dayRange[0], dayRange[1]) : 0),
    TimeStartNight: nightRange?.[0] ?? null,
    TimeEndNight: nightRange?.[1] ?? null,
    DurationNight: formatDuration(nightRange ? durationBetween(nightRange[0], nightRange[1]) : 0),
    dataset_Interval: datasetInterval,
    dataset_type: datasetType,
    average_HeartValue: roundHalfEven(full.mean, 4),
    average_HeartValue_Activity: roundHalfEven(full.activeMean, 2),
    average_HeartValue_Resting: roundHalfEven(full.restingMean, 2),
    average_HeartValue_Day: roundHalfEven(dayMeans.mean, 2),
    average_HeartValue_Day_Activity: roundHalfEven(dayMeans.activeMean, 2),
    average_HeartValue_Day_Activity_Duration: formatDuration(dayPeriods.activeSeconds),
    average_HeartValue_Day_Resting: roundHalfEven(dayMeans.restingMean, 2),
    average_HeartValue_Day_Resting_Duration: formatDuration(dayPeriods.restingSeconds),
    average_HeartValue_Night: roundHalfEven(nightMeans.mean, 2),
    average_HeartValue_Night_Activity: roundHalfEven(nightMeans.activeMean, 2),
    average_HeartValue_Night_Activity_Duration: formatDuration(nightPeriods.activeSeconds),
    average_HeartValue_Night_Resting: roundHalfEven(nightMeans.restingMean, 2),
    average_HeartValue_Night_Resting_Duration: formatDuration(nightPeriods.restingSeconds),
    BloodPreassure: `${roundHalfEven(full.activeMean)} / ${roundHalfEven(full.restingMean)}`,
  };
}
