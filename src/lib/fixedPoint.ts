/**
 * Fixed-point integer arithmetic shared by every engine module.
 *
 * Amounts, share counts and prices are integers carried as Decimal values.
 * Prices are scaled by PRICE_SCALE (1e18 = 100%). Rates are parts-per-thousand.
 */

import { Decimal } from "decimal.js";
import { validationError } from "./errors";

// Products of two 1e18-scaled values stay well inside 80 significant digits,
// so every floor/ceil below operates on an exact quotient.
Decimal.set({
  precision: 80,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -80,
  toExpPos: 80,
});

export const ZERO = new Decimal(0);
export const ONE = new Decimal(1);
export const PRICE_SCALE = new Decimal("1e18");
export const PPT = new Decimal(1000);

export type DecimalInput = number | string | Decimal;

/**
 * Convert caller input into a non-negative integer Decimal.
 * @param field - name reported in the validation error
 */
export function toAmount(value: DecimalInput, field: string = "amount"): Decimal {
  let d: Decimal;
  try {
    d = value instanceof Decimal ? value : new Decimal(value);
  } catch {
    throw validationError("INVALID_AMOUNT", `${field} is not a number: ${String(value)}`);
  }
  if (!d.isFinite() || !d.isInteger() || d.isNegative()) {
    throw validationError("INVALID_AMOUNT", `${field} must be a non-negative integer, got ${d.toString()}`);
  }
  return d;
}

/** floor(a * b / d) */
export function mulDiv(a: Decimal, b: Decimal, d: Decimal): Decimal {
  return a.times(b).div(d).floor();
}

/** ceil(a * b / d) */
export function mulDivUp(a: Decimal, b: Decimal, d: Decimal): Decimal {
  return a.times(b).div(d).ceil();
}

/** floor(amount * ppt / 1000) */
export function applyRate(amount: Decimal, ppt: number): Decimal {
  return mulDiv(amount, new Decimal(ppt), PPT);
}

export function sum(values: readonly Decimal[]): Decimal {
  return values.reduce((acc, v) => acc.plus(v), ZERO);
}

export function formatPrice(price: Decimal, decimals = 4): string {
  return price.div(PRICE_SCALE).toDecimalPlaces(decimals).toString();
}
