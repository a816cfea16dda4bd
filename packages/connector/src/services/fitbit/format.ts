/**
 * Fitbit - Display formatting helpers
 */

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * YYYY-MM-DD -> DD/MM/YYYY. Anything else is returned unchanged.
 */
export function formatDisplayDate(isoDate: string): string {
  const match = isoDate.match(ISO_DATE);
  if (!match) return isoDate;
  const [, year, month, day] = match;
  return `${day}/${month}/${year}`;
}

/**
 * Round to `digits` decimals, ties to even (2.5 -> 2, 0.125 -> 0.12).
 *
 * A tie is decided on the exact binary value, so 1.115 (stored just
 * below the tie) rounds to 1.11.
 */
export function roundHalfEven(value: number, digits: number = 0): number {
  const magnitude = Math.abs(value);
  if (!Number.isFinite(value) || magnitude >= 1e21) {
    return value;
  }

  const exact = magnitude.toFixed(100);
  const cut = exact.indexOf(".") + 1 + digits;
  const kept = exact.slice(0, cut);
  const isTie = /^50*$/.test(exact.slice(cut));

  // toFixed rounds ties up; keep the truncated value when its last digit is even
  const lastDigit = Number(kept.replace(".", "").slice(-1));
  const rounded = isTie && lastDigit % 2 === 0 ? Number(kept) : Number(magnitude.toFixed(digits));
  return value < 0 ? -rounded : rounded;
}

/**
 * Seconds -> "H hours M minutes S seconds"
 */
export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.round(totalSeconds));
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return `${hours} hours ${minutes} minutes ${seconds % 60} seconds`;
}

/**
 * Minutes -> "H hours M minutes"; zero or negative reads as "0 hours 0 minutes".
 */
export function formatMinutes(totalMinutes: number): string {
  if (totalMinutes <= 0) {
    return "0 hours 0 minutes";
  }
  return `${Math.floor(totalMinutes / 60)} hours ${totalMinutes % 60} minutes`;
}

/**
 * Minutes -> hours with one decimal.
 */
export function minutesToHours(totalMinutes: number): number {
  return roundHalfEven(totalMinutes / 60, 1);
}
