// lib/money.ts
// Money moves through the core as integer micro-dollars (1e-6 USD), fine enough that
// hours × rate products stay exact for rates in cents and hours to four decimals.
// Nothing is rounded to the cent on the way: per-class values are rounded for display
// only, and totals are rounded to whole dollars once, after summing.

import type { Totals } from "../app/types";

export type Micros = number;

export const MICROS_PER_USD = 1_000_000;

export function usdToMicros(usd: number): Micros {
  return Math.round(usd * MICROS_PER_USD);
}

/** hours × hourly rate, unrounded at cent level. */
export function hoursToMicros(hours: number, ratePerHour: number): Micros {
  return Math.round(hours * ratePerHour * MICROS_PER_USD);
}

/** Dollars with cents, half away from zero. Display only; never summed. */
export function microsToUsd(m: Micros): number {
  return (Math.sign(m) * Math.round(Math.abs(m) / 10_000)) / 100;
}

/** Whole dollars, half away from zero. */
export function microsToWholeDollars(m: Micros): number {
  return Math.sign(m) * Math.round(Math.abs(m) / MICROS_PER_USD);
}

/** "$1,200" for whole dollars, "$402.50" otherwise. */
export function formatUsd(n: number): string {
  const digits = Number.isInteger(n) ? 0 : 2;
  return `$${n.toLocaleString("en-US", { minimumFractionDigits: digits, maximumFractionDigits: digits })}`;
}

/** "≥ $1,200" when open-ended, "$403" for a point value, "$150 – $500" for a range. */
export function formatTotals(t: Pick<Totals, "min" | "max" | "open_ended">): string {
  if (t.open_ended || t.max === null) return `≥ ${formatUsd(t.min)}`;
  if (t.min === t.max) return formatUsd(t.min);
  return `${formatUsd(t.min)} – ${formatUsd(t.max)}`;
}
