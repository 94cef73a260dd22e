/**
 * Exact decimal arithmetic for spend amounts.
 *
 * Amounts are parsed into integer micro-units (1 unit = 1 000 000 micros,
 * the same scale Google Ads reports `cost_micros` in), summed as integers and
 * formatted back into fixed-point strings. No binary float ever touches a
 * running total, so 0.1 + 0.2 stays "0.30".
 */

import { ValidationError } from "./errors";
import type { Decimal } from "./types";

export const MICROS_PER_UNIT = 1_000_000;

const FRACTION_DIGITS = 6;
const DECIMAL_PATTERN = /^(\d+)(?:\.(\d+))?$/;

/**
 * Parses a non-negative amount ("12.34", 12.34) into integer micros.
 * Digits beyond the sixth decimal place are rounded half-up.
 */
export function toMicros(value: Decimal | number): number {
  const text = typeof value === "number" ? value.toFixed(FRACTION_DIGITS) : value.trim();
  const match = DECIMAL_PATTERN.exec(text);
  if (!match) {
    throw new ValidationError(`Invalid amount: "${value}". Expected a non-negative decimal.`);
  }

  const whole = match[1];
  const fraction = match[2] ?? "";
  let micros =
    Number(whole) * MICROS_PER_UNIT +
    Number(fraction.slice(0, FRACTION_DIGITS).padEnd(FRACTION_DIGITS, "0"));

  if (fraction.length > FRACTION_DIGITS && Number(fraction[FRACTION_DIGITS]) >= 5) {
    micros += 1;
  }

  return assertSafeMicros(micros, String(value));
}

/** Parses an integer micros value as reported by Google Ads (int64 as string) */
export function parseMicros(value: string | number): number {
  const text = String(value).trim();
  if (!/^\d+$/.test(text)) {
    throw new ValidationError(`Invalid micros amount: "${value}".`);
  }
  return assertSafeMicros(Number(text), text);
}

/** Formats micros as a decimal string with two to six fractional digits */
export function formatMicros(micros: number): Decimal {
  const whole = Math.floor(micros / MICROS_PER_UNIT);
  const fraction = String(micros % MICROS_PER_UNIT)
    .padStart(FRACTION_DIGITS, "0")
    .replace(/0+$/, "")
    .padEnd(2, "0");
  return `${whole}.${fraction}`;
}

/** Canonical form of an amount, e.g. "12.5" → "12.50" */
export function normalizeDecimal(value: Decimal | number): Decimal {
  return formatMicros(toMicros(value));
}

export function sumDecimals(values: Iterable<Decimal>): Decimal {
  let total = 0;
  for (const value of values) {
    total = addMicros(total, toMicros(value));
  }
  return formatMicros(total);
}

/** Adds two micros amounts; throws once the total no longer fits exactly */
export function addMicros(a: number, b: number): number {
  return assertSafeMicros(a + b, "sum");
}

/** Divides micros, rounding to the nearest micro; 0 for a zero divisor */
export function divideMicros(micros: number, divisor: number): number {
  if (divisor === 0) return 0;
  return Math.round(micros / divisor);
}

function assertSafeMicros(micros: number, source: string): number {
  if (!Number.isSafeInteger(micros)) {
    throw new ValidationError(`Amount out of range: "${source}".`);
  }
  return micros;
}
