/**
 * Common error classes
 *
 * Run-fatal conditions. Per-request failures are never thrown;
 * they surface as counters and log lines.
 */

// =============================================================================
// Error Classes
// =============================================================================

/**
 * Pre-flight admission denied: the planned batch needs more requests
 * than the server reports as remaining.
 */
export class QuotaExceededError extends Error {
  readonly required: number;
  readonly remaining: number;
  /** Seconds until the server resets the quota */
  readonly resetsInSeconds: number;

  constructor(required: number, remaining: number, resetsInSeconds: number) {
    super(
      `Remaining requests are ${remaining}, which is less than the total requests of ${required}. ` +
        `Quota resets in ${resetsInSeconds} seconds.`
    );
    this.name = "QuotaExceededError";
    this.required = required;
    this.remaining = remaining;
    this.resetsInSeconds = resetsInSeconds;
  }
}

/**
 * A saved bundle could not be parsed, or does not have the bundle shape.
 */
export class PayloadDecodeError extends Error {
  readonly path: string;

  constructor(path: string, detail: string) {
    super(`Error decoding JSON from ${path}: ${detail}`);
    this.name = "PayloadDecodeError";
    this.path = path;
  }
}

/**
 * OAuth flow or token store failure.
 */
export class AuthError extends Error {
  readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super(message);
    this.name = "AuthError";
    this.status = status;
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isQuotaExceededError(error: unknown): error is QuotaExceededError {
  return error instanceof QuotaExceededError;
}

export function isPayloadDecodeError(error: unknown): error is PayloadDecodeError {
  return error instanceof PayloadDecodeError;
}

export function isAuthError(error: unknown): error is AuthError {
  return error instanceof AuthError;
}
