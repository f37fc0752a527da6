/**
 * Bonding-curve pricing.
 *
 * An option's price is its share of pooled collateral:
 *
 *   price(o) = funds(o) * SCALE / totalFunds
 *
 * Buying along the curve adds the spent collateral to both the option and
 * the total, so the price rises towards (but never reaches) SCALE. All
 * functions here are pure and operate on integer Decimals.
 */

import { Decimal } from "decimal.js";
import { validationError } from "./errors";
import { PRICE_SCALE, ZERO, mulDiv } from "./fixedPoint";

export function currentPrice(optionFunds: Decimal, totalFunds: Decimal): Decimal {
  if (totalFunds.lte(0)) {
    throw validationError("DEGENERATE_POOL", "Pool holds no funds; price is undefined");
  }
  return mulDiv(optionFunds, PRICE_SCALE, totalFunds);
}

/**
 * Price after notionally adding `amount` to both the option and the total.
 */
export function impactedPrice(optionFunds: Decimal, totalFunds: Decimal, amount: Decimal): Decimal {
  return currentPrice(optionFunds.plus(amount), totalFunds.plus(amount));
}

/**
 * Minimum collateral that moves the price from `price` to at least `targetPrice`.
 *
 *   ceil((target * T - SCALE * f) / (SCALE - target))
 *
 * Rounding up guarantees the price actually reaches the target, which keeps
 * the sweep advancing even when the gap is smaller than one unit.
 */
export function amountRequired(
  price: Decimal,
  targetPrice: Decimal,
  optionFunds: Decimal,
  totalFunds: Decimal
): Decimal {
  if (totalFunds.lte(0)) {
    throw validationError("DEGENERATE_POOL", "Pool holds no funds; cannot price a purchase");
  }
  if (targetPrice.lt(price)) {
    throw validationError(
      "INVALID_TARGET_PRICE",
      `Target ${targetPrice.toString()} is below the current price ${price.toString()}`
    );
  }
  if (targetPrice.gte(PRICE_SCALE)) {
    throw validationError("INVALID_TARGET_PRICE", "Target price must stay below 100%");
  }

  const numerator = targetPrice.times(totalFunds).minus(PRICE_SCALE.times(optionFunds));
  if (numerator.lte(0)) return ZERO;
  return numerator.div(PRICE_SCALE.minus(targetPrice)).ceil();
}

/**
 * Shares issued for spending `amount` along the curve.
 *
 * Priced at the post-trade price, so larger purchases receive fewer shares
 * per unit of collateral.
 */
export function returnedShares(amount: Decimal, optionFunds: Decimal, totalFunds: Decimal): Decimal {
  if (amount.lte(0)) return ZERO;
  const postPrice = impactedPrice(optionFunds, totalFunds, amount);
  if (postPrice.isZero()) {
    throw validationError("DEGENERATE_POOL", "Post-trade price rounds to zero");
  }
  return mulDiv(amount, PRICE_SCALE, postPrice);
}

/** The first tick strictly above `price`. */
export function nextTick(price: Decimal, tickSpacing: Decimal): Decimal {
  return price.divToInt(tickSpacing).plus(1).times(tickSpacing);
}

export function isAlignedTick(price: Decimal, tickSpacing: Decimal): boolean {
  return price.mod(tickSpacing).isZero();
}
