/**
 * Fitbit API Client
 *
 * Issues single GET requests with bounded retries and keeps
 * per-resource success/failure counters.
 * Data fetching only, no normalization or file output.
 *
 * Retry policy per attempt:
 * - 200: return the parsed body; an unreadable body counts as a failed attempt
 * - 429: wait for the quota reset reported by the server (+1s), not a failure
 * - other status / network fault: wait (attempt + 1) * backoffFactor seconds
 * - after maxRetries attempts: give up, return null (the day is left out)
 */

import { setupLogger } from "../../lib/logger.js";
import { arrayAt, stringAt } from "./accessors.js";
import { QuotaTracker } from "./quota-tracker.js";
import { RESOURCE_KINDS, type QuotaState, type RequestKind } from "./types.js";

const logger = setupLogger("fitbit-api");

// Configuration
export const FITBIT_API_BASE = "https://api.fitbit.com";
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_BACKOFF_FACTOR = 1.5;

const REQUEST_KINDS: readonly RequestKind[] = [...RESOURCE_KINDS, "devices"];

// Types
export type SleepFn = (seconds: number) => Promise<void>;

export interface ApiClientOptions {
  accessToken: string;
  quota: QuotaTracker;
  baseUrl?: string;
  /** Injected for tests; defaults to a timer-based wait */
  sleep?: SleepFn;
}

export interface RequestStats {
  totalRequests: number;
  successful: Record<RequestKind, number>;
  failed: Record<RequestKind, number>;
  quota: Readonly<QuotaState>;
}

export const defaultSleep: SleepFn = (seconds) =>
  new Promise((resolve) => setTimeout(resolve, seconds * 1000));

function emptyCounters(): Record<RequestKind, number> {
  return {
    steps: 0,
    heart: 0,
    calories: 0,
    sleep: 0,
    spo2: 0,
    rate: 0,
    devices: 0,
  };
}

/**
 * Extract the error description from a Fitbit error body
 * ({"errors": [{"message": "..."}]}).
 */
export function describeErrorBody(body: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return "Failed to parse JSON response";
  }
  const messages = arrayAt(parsed, ["errors"])
    .map((entry) => stringAt(entry, ["message"], null))
    .filter((message): message is string => message !== null);
  return messages.length > 0 ? messages.join(", ") : "Unknown Error";
}

export class FitbitApiClient {
  readonly quota: QuotaTracker;
  private readonly accessToken: string;
  private readonly baseUrl: string;
  private readonly sleep: SleepFn;
  private totalRequests = 0;
  private readonly successful = emptyCounters();
  private readonly failed = emptyCounters();

  constructor(options: ApiClientOptions) {
    this.accessToken = options.accessToken;
    this.quota = options.quota;
    this.baseUrl = (options.baseUrl ?? FITBIT_API_BASE).replace(/\/+$/, "");
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Fetch one endpoint.
   *
   * @param endpoint - Path starting with "/" (e.g. "/1/user/-/devices.json")
   * @param resource - Counter the outcome is recorded under
   * @returns Parsed JSON body, or null when every attempt failed
   */
  async fetch(
    endpoint: string,
    resource: RequestKind,
    maxRetries: number = DEFAULT_MAX_RETRIES,
    backoffFactor: number = DEFAULT_BACKOFF_FACTOR
  ): Promise<unknown> {
    const url = `${this.baseUrl}${endpoint}`;
    let attempt = 0;

    while (attempt < maxRetries) {
      logger.debug(`GET ${endpoint} (attempt ${attempt + 1}/${maxRetries})`);

      let response: Response;
      try {
        response = await globalThis.fetch(url, {
          headers: { Authorization: `Bearer ${this.accessToken}` },
        });
      } catch (error) {
        logger.error(`Attempt ${attempt + 1}: Error fetching ${resource} - network error: ${error}`);
        this.totalRequests++;
        await this.sleep((attempt + 1) * backoffFactor);
        attempt++;
        continue;
      }

      this.quota.update(response.headers);

      if (response.status === 200) {
        this.totalRequests++;
        let body: unknown;
        try {
          body = JSON.parse(await response.text());
        } catch (error) {
          logger.error(`Attempt ${attempt + 1}: Error fetching ${resource} - unreadable response body: ${error}`);
          await this.sleep((attempt + 1) * backoffFactor);
          attempt++;
          continue;
        }
        this.successful[resource]++;
        return body;
      }

      if (response.status === 429) {
        const { resetSeconds } = this.quota.snapshot();
        const waitSeconds = Math.max(resetSeconds, 0) + 1;
        logger.warn(`Rate limit reached, resets in ${resetSeconds} seconds. Waiting ${waitSeconds}s...`);
        await this.sleep(waitSeconds);
        attempt++;
        continue;
      }

      const message = describeErrorBody(await response.text());
      logger.error(
        `Attempt ${attempt + 1}: Error fetching ${resource} - ${response.status} ${response.statusText} - ${message}`
      );
      this.totalRequests++;
      await this.sleep((attempt + 1) * backoffFactor);
      attempt++;
    }

    this.failed[resource]++;
    logger.error(`Failed to fetch ${resource} data after ${maxRetries} attempts.`);
    return null;
  }

  getStats(): RequestStats {
    return {
      totalRequests: this.totalRequests,
      successful: { ...this.successful },
      failed: { ...this.failed },
      quota: this.quota.snapshot(),
    };
  }

  /**
   * Log request counters and the last known quota.
   */
  summary(): void {
    const stats = this.getStats();
    logger.info("-".repeat(100));
    logger.info("Summary of API Requests:");
    logger.info(`Total requests: ${stats.totalRequests}`);
    for (const kind of REQUEST_KINDS) {
      const label = kind.charAt(0).toUpperCase() + kind.slice(1);
      logger.info(`${label}: Success: ${stats.successful[kind]}, Failed: ${stats.failed[kind]}`);
    }
    logger.info(`API Rate Limit: ${stats.quota.limit}`);
    logger.info(`API Rate Limit Remaining: ${stats.quota.remaining}`);
    logger.info(`API Rate Limit Reset (seconds): ${stats.quota.resetSeconds}`);
    logger.info("-".repeat(100));
  }
}
