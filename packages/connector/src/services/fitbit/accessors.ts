/**
 * Fitbit - Payload accessors
 *
 * Typed reads over untyped JSON payloads. Every accessor takes the
 * default it returns when the path is missing or holds the wrong type,
 * so each normalizer's defaulting policy is visible at the call site.
 */

export type JsonRecord = { [key: string]: unknown };

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Walk a key path. Returns undefined when any step is missing.
 */
export function getPath(value: unknown, path: readonly string[]): unknown {
  let current: unknown = value;
  for (const key of path) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

export function recordAt(value: unknown, path: readonly string[]): JsonRecord {
  const found = getPath(value, path);
  return isRecord(found) ? found : {};
}

export function arrayAt(value: unknown, path: readonly string[]): unknown[] {
  const found = getPath(value, path);
  return Array.isArray(found) ? found : [];
}

export function stringAt<D extends string | null>(
  value: unknown,
  path: readonly string[],
  fallback: D
): string | D {
  const found = getPath(value, path);
  return typeof found === "string" ? found : fallback;
}

/**
 * Numeric read. Numeric strings (Fitbit sends time-series values as
 * strings) are parsed.
 */
export function numberAt<D extends number | null>(
  value: unknown,
  path: readonly string[],
  fallback: D
): number | D {
  const found = getPath(value, path);
  if (typeof found === "number" && Number.isFinite(found)) {
    return found;
  }
  if (typeof found === "string" && found.trim() !== "") {
    const parsed = Number(found);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return fallback;
}

export function booleanAt(value: unknown, path: readonly string[], fallback: boolean): boolean {
  const found = getPath(value, path);
  return typeof found === "boolean" ? found : fallback;
}

/**
 * Scalar read that keeps the JSON type (ids may be numbers or strings).
 */
export function scalarAt(
  value: unknown,
  path: readonly string[]
): string | number | boolean | null {
  const found = getPath(value, path);
  if (typeof found === "string" || typeof found === "boolean") {
    return found;
  }
  if (typeof found === "number" && Number.isFinite(found)) {
    return found;
  }
  return null;
}
