/**
 * Fitbit - Retrieval
 *
 * Expands (resources x date range) into single-day requests and
 * runs them sequentially through the API client.
 *
 * The whole batch is admitted against the remaining quota before the
 * first request; a range that cannot complete is refused up front.
 */

import { setupLogger } from "../../lib/logger.js";
import { numberAt, scalarAt, stringAt } from "./accessors.js";
import type { FitbitApiClient } from "./api-client.js";
import {
  RESOURCE_KINDS,
  type Device,
  type RawBundle,
  type ResourceKind,
  type ResourceRequest,
} from "./types.js";

const logger = setupLogger("fitbit-retrieval");

const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export type ProgressFn = (completed: number, total: number, request: ResourceRequest) => void;

export interface RetrieveOptions {
  resources?: readonly ResourceKind[];
  onProgress?: ProgressFn;
}

// =============================================================================
// Endpoints
// =============================================================================

export function buildEndpoint(userId: string, resource: ResourceKind, date: string): string {
  switch (resource) {
    case "steps":
    case "heart":
    case "calories":
      return `/1/user/${userId}/activities/${resource}/date/${date}/1d.json`;
    case "sleep":
      return `/1.2/user/${userId}/sleep/date/${date}.json`;
    case "spo2":
      return `/1/user/${userId}/spo2/date/${date}.json`;
    case "rate":
      return `/1/user/${userId}/activities/heart/date/${date}/1d/1sec.json`;
  }
}

export function devicesEndpoint(userId: string): string {
  return `/1/user/${userId}/devices.json`;
}

// =============================================================================
// Date utilities
// =============================================================================

/**
 * Parse an ISO calendar date as UTC midnight. Returns null for
 * malformed or impossible dates (e.g. 2023-02-30).
 */
export function parseIsoDate(value: string): Date | null {
  const match = value.match(ISO_DATE);
  if (!match) return null;
  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (date.toISOString().slice(0, 10) !== value) return null;
  return date;
}

export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Calendar date of `now` in local time.
 */
export function localIsoDate(now: Date): string {
  const month = String(now.getMonth() + 1).padStart(2, "0");
  const day = String(now.getDate()).padStart(2, "0");
  return `${now.getFullYear()}-${month}-${day}`;
}

export function shiftIsoDate(isoDate: string, days: number): string {
  const date = parseIsoDate(isoDate);
  if (!date) {
    throw new Error(`Invalid date: ${isoDate} (expected YYYY-MM-DD)`);
  }
  return formatIsoDate(new Date(date.getTime() + days * DAY_MS));
}

/**
 * Inclusive list of ISO dates from start to end.
 */
export function enumerateDates(startDate: string, endDate: string): string[] {
  const start = parseIsoDate(startDate);
  const end = parseIsoDate(endDate);
  if (!start || !end) {
    throw new Error(`Invalid date range: ${startDate} to ${endDate} (expected YYYY-MM-DD)`);
  }

  const dates: string[] = [];
  for (let time = start.getTime(); time <= end.getTime(); time += DAY_MS) {
    dates.push(formatIsoDate(new Date(time)));
  }
  return dates;
}

// =============================================================================
// Retrieval
// =============================================================================

function emptyBundle(deviceId: string): RawBundle {
  return {
    device_id: deviceId,
    steps: [],
    heart: [],
    calories: [],
    sleep: [],
    spo2: [],
    rate: [],
  };
}

function isEmptyPayload(payload: unknown): boolean {
  if (payload === null || payload === undefined) return true;
  if (Array.isArray(payload)) return payload.length === 0;
  if (typeof payload === "object") return Object.keys(payload).length === 0;
  return false;
}

/**
 * Fetch every resource for every date in [startDate, endDate].
 *
 * Order is dates outer, resources inner. A request that exhausts its
 * retries leaves that day out of the resource's list.
 *
 * @throws QuotaExceededError before any request if the batch exceeds the remaining quota
 */
export async function retrieve(
  client: FitbitApiClient,
  userId: string,
  deviceId: string,
  startDate: string,
  endDate: string,
  options: RetrieveOptions = {}
): Promise<RawBundle> {
  const resources = options.resources ?? RESOURCE_KINDS;
  const dates = enumerateDates(startDate, endDate);
  const total = dates.length * resources.length;

  client.quota.ensureCapacity(total);

  logger.info(`Fetching ${resources.length} resources for ${dates.length} days (${startDate} to ${endDate}, ${total} requests)`);

  const bundle = emptyBundle(deviceId);
  let completed = 0;

  for (const date of dates) {
    for (const resource of resources) {
      const payload = await client.fetch(buildEndpoint(userId, resource, date), resource);
      if (!isEmptyPayload(payload)) {
        bundle[resource].push(payload);
      }
      completed++;
      options.onProgress?.(completed, total, { resource, date });
    }
  }

  logger.info(`Fetched ${completed}/${total} requests`);
  return bundle;
}

// =============================================================================
// Devices
// =============================================================================

function toDevice(entry: unknown): Device | null {
  const id = scalarAt(entry, ["id"]);
  if (id === null || typeof id === "boolean") {
    return null;
  }
  return {
    id: String(id),
    deviceVersion: stringAt(entry, ["deviceVersion"], null),
    type: stringAt(entry, ["type"], null),
    lastSyncTime: stringAt(entry, ["lastSyncTime"], null),
    batteryLevel: numberAt(entry, ["batteryLevel"], null),
  };
}

/**
 * List the user's paired devices (one request, admission-checked).
 *
 * @throws Error if the devices request fails; nothing has been fetched yet
 */
export async function listDevices(client: FitbitApiClient, userId: string): Promise<Device[]> {
  client.quota.ensureCapacity(1);

  const payload = await client.fetch(devicesEndpoint(userId), "devices");
  if (payload === null) {
    throw new Error("Failed to retrieve devices");
  }
  if (!Array.isArray(payload)) {
    throw new Error("Unexpected devices response");
  }

  const devices = payload
    .map(toDevice)
    .filter((device): device is Device => device !== null);
  logger.debug(`Response: ${devices.length} devices`);
  return devices;
}

/**
 * Pick a device by 1-based list position or by id.
 * With no selector, the only device is chosen; otherwise none is.
 */
export function selectDevice(devices: readonly Device[], selector?: string): Device | null {
  if (devices.length === 0) {
    logger.warn("No devices found or failed to fetch devices.");
    return null;
  }

  if (selector === undefined) {
    if (devices.length === 1) {
      return devices[0];
    }
    logger.warn(`${devices.length} devices available, select one with --device`);
    return null;
  }

  const byId = devices.find((device) => device.id === selector);
  if (byId) return byId;

  if (/^\d+$/.test(selector)) {
    const index = parseInt(selector, 10) - 1;
    if (index >= 0 && index < devices.length) {
      return devices[index];
    }
  }

  logger.warn("Invalid device selection.");
  return null;
}
