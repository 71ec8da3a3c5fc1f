// ============================================================
// Value formats used on the wire: fixed-point decimals,
// wall-clock times and UTC timestamps
// ============================================================

import { Decimal } from 'decimal.js';

export const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;
export const INT_PATTERN = /^-?\d+$/;
export const CLOCK_PATTERN = /^\d{2}:\d{2}:\d{2}$/;
export const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

export type DecimalInput = Decimal.Value;

export function toDecimal(value: DecimalInput): Decimal {
  return value instanceof Decimal ? value : new Decimal(value);
}

/** Plain notation, never exponent form, so the daemon can read it back. */
export function formatDecimal(value: Decimal): string {
  // decimal.js keeps the sign of negative zero
  return value.isZero() ? '0' : value.toFixed();
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** `HH:MM:SS` in local time, the clock format the daemon stamps records with. */
export function formatClock(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/** `YYYY-MM-DD HH:MM:SS`, read as UTC. */
export function formatTimestamp(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} `
    + `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}

export function parseTimestamp(value: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(value);
  if (!match) {
    return null;
  }
  const [, year, month, day, hours, minutes, seconds] = match.map(Number);
  const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));
  // Reject rollovers such as 2024-02-31
  return formatTimestamp(date) === value ? date : null;
}
