/**
 * Fitbit - Rate limit quota
 *
 * Server-reported request budget, refreshed from the
 * Fitbit-Rate-Limit-* headers of every response.
 *
 * One tracker is shared by reference between the API client and the
 * retrieval run. Requests are issued one at a time, so the tracker is
 * never read and written concurrently.
 */

import { QuotaExceededError } from "../../lib/errors.js";
import type { QuotaState } from "./types.js";

export const RATE_LIMIT_HEADERS = {
  limit: "fitbit-rate-limit-limit",
  remaining: "fitbit-rate-limit-remaining",
  reset: "fitbit-rate-limit-reset",
} as const;

// Fitbit's documented per-user hourly budget
export const DEFAULT_QUOTA: Readonly<QuotaState> = {
  limit: 150,
  remaining: 150,
  resetSeconds: 0,
};

function parseHeader(headers: Headers, name: string): number | null {
  const raw = headers.get(name);
  if (raw === null) {
    return null;
  }
  const value = parseInt(raw, 10);
  return isNaN(value) ? null : value;
}

export class QuotaTracker {
  private state: QuotaState;

  constructor(initial: QuotaState = DEFAULT_QUOTA) {
    this.state = { ...initial };
  }

  /**
   * Refresh from response headers. A missing or unparsable header keeps
   * the previous value.
   */
  update(headers: Headers): void {
    this.state = {
      limit: parseHeader(headers, RATE_LIMIT_HEADERS.limit) ?? this.state.limit,
      remaining: parseHeader(headers, RATE_LIMIT_HEADERS.remaining) ?? this.state.remaining,
      resetSeconds: parseHeader(headers, RATE_LIMIT_HEADERS.reset) ?? this.state.resetSeconds,
    };
  }

  snapshot(): Readonly<QuotaState> {
    return Object.freeze({
      limit: this.state.limit,
      remaining: Math.max(this.state.remaining, 0),
      resetSeconds: this.state.resetSeconds,
    });
  }

  /**
   * Pre-flight admission check for a batch of `required` requests.
   *
   * @throws QuotaExceededError if the batch would not fit in the remaining quota
   */
  ensureCapacity(required: number): void {
    const { remaining, resetSeconds } = this.snapshot();
    if (required > remaining) {
      throw new QuotaExceededError(required, remaining, resetSeconds);
    }
  }
}
