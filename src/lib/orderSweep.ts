/**
 * Matching: resting-order fills, the drain loop and the entry sweep.
 *
 * Everything here works on a PoolState and records its side effects in a
 * SweepContext: events to publish and collateral to push out of the pool.
 * No ledger is touched, so the same code runs for execution and for quotes.
 */

import { Decimal } from "decimal.js";
import { amountRequired, currentPrice, nextTick, returnedShares } from "./bondingCurve";
import type { PoolConfig } from "./config";
import { stateError } from "./errors";
import { PRICE_SCALE, ZERO, applyRate, mulDiv, mulDivUp } from "./fixedPoint";
import type { EntryResult, OrderFill, RestingOrder, SweepStep } from "./pool-common";
import type { PoolEvent } from "./poolLogger";
import { addTo, type PoolState, untrackOrder } from "./poolState";

// ============================================================================
// Context
// ============================================================================

/** Collateral owed by the pool to an account once the call commits. */
export interface Payout {
  to: string;
  amount: Decimal;
}

export interface SweepContext {
  state: PoolState;
  config: PoolConfig;
  events: PoolEvent[];
  payouts: Payout[];
}

export function createSweepContext(state: PoolState, config: PoolConfig): SweepContext {
  return { state, config, events: [], payouts: [] };
}

function pay(ctx: SweepContext, to: string, amount: Decimal): void {
  if (amount.gt(0)) ctx.payouts.push({ to, amount });
}

/** Execution and creator fees withheld from the seller of `cost` worth of shares. */
function settleFees(ctx: SweepContext, cost: Decimal) {
  const executionFee = applyRate(cost, ctx.config.fees.executionFee);
  const creatorFee = applyRate(cost, ctx.config.fees.creatorFee);
  ctx.state.accruedExecutionFees = ctx.state.accruedExecutionFees.plus(executionFee);
  ctx.state.accruedCreatorFees = ctx.state.accruedCreatorFees.plus(creatorFee);
  return { executionFee, creatorFee, sellerProceeds: cost.minus(executionFee).minus(creatorFee) };
}

// ============================================================================
// Resting-Order Fills
// ============================================================================

/**
 * Taker spends up to `budget` collateral against a resting sell.
 * Returns null when the budget cannot buy a single share at the order's price.
 */
export function fillRestingSell(
  ctx: SweepContext,
  order: RestingOrder,
  taker: string,
  budget: Decimal
): OrderFill | null {
  const { state } = ctx;
  const n = state.numberOfOptions;
  const shares = Decimal.min(order.quantity, mulDiv(budget, PRICE_SCALE, order.price));
  if (shares.isZero()) return null;
  const cost = mulDivUp(shares, order.price, PRICE_SCALE);

  const updated = state.book.reduce(order, shares);
  const remaining = updated.quantity;
  addTo(state.sellEscrow, order.maker, order.option, shares.neg(), n);
  addTo(state.userVotes, taker, order.option, shares, n);
  if (remaining.isZero()) {
    state.book.removeOrder(updated);
    untrackOrder(state, order.maker, order.orderId);
  }

  const fees = settleFees(ctx, cost);
  pay(ctx, order.maker, fees.sellerProceeds);

  ctx.events.push({
    type: "SELL_ORDER_EXECUTED",
    data: {
      orderOption: order.option,
      orderPrice: order.price,
      optionAmount: shares,
      baseAmount: cost,
      orderId: order.orderId,
      maker: order.maker,
      taker,
      remaining,
    },
  });

  return {
    orderId: order.orderId,
    option: order.option,
    price: order.price,
    side: "SELL",
    maker: order.maker,
    taker,
    shares,
    collateral: cost,
    ...fees,
    remaining,
    dustRefund: ZERO,
  };
}

/**
 * Taker delivers up to `offered` shares into a resting buy. The taker's
 * shares must already be debited from their holdings.
 * Returns null when the order cannot afford a single share.
 */
export function fillRestingBuy(
  ctx: SweepContext,
  order: RestingOrder,
  taker: string,
  offered: Decimal
): OrderFill | null {
  const { state } = ctx;
  const n = state.numberOfOptions;
  const shares = Decimal.min(offered, mulDiv(order.quantity, PRICE_SCALE, order.price));
  if (shares.isZero()) return null;
  const cost = Decimal.min(mulDivUp(shares, order.price, PRICE_SCALE), order.quantity);

  let updated = state.book.reduce(order, cost);
  addTo(state.buyEscrow, order.maker, order.option, cost.neg(), n);
  addTo(state.userVotes, order.maker, order.option, shares, n);

  // A buy that can no longer afford one share leaves the book; its dust goes home.
  let dustRefund = ZERO;
  if (mulDiv(updated.quantity, PRICE_SCALE, order.price).isZero()) {
    dustRefund = updated.quantity;
    if (dustRefund.gt(0)) {
      updated = state.book.reduce(updated, dustRefund);
      addTo(state.buyEscrow, order.maker, order.option, dustRefund.neg(), n);
      pay(ctx, order.maker, dustRefund);
    }
    state.book.removeOrder(updated);
    untrackOrder(state, order.maker, order.orderId);
  }
  const remaining = updated.quantity;

  const fees = settleFees(ctx, cost);
  pay(ctx, taker, fees.sellerProceeds);

  ctx.events.push({
    type: "BUY_ORDER_EXECUTED",
    data: {
      orderOption: order.option,
      orderPrice: order.price,
      optionAmount: shares,
      baseAmount: cost,
      orderId: order.orderId,
      maker: order.maker,
      taker,
      remaining,
    },
  });

  return {
    orderId: order.orderId,
    option: order.option,
    price: order.price,
    side: "BUY",
    maker: order.maker,
    taker,
    shares,
    collateral: cost,
    ...fees,
    remaining,
    dustRefund,
  };
}

// ============================================================================
// Drain Loops
// ============================================================================

export interface DrainResult {
  /** Collateral (sell drain) or shares (buy drain) consumed */
  consumed: Decimal;
  /** Shares (sell drain) or collateral (buy drain) received */
  received: Decimal;
  fills: OrderFill[];
}

/**
 * Buy resting sells FIFO from the cheapest tick while `tick <= limitPrice`.
 */
export function drainSells(
  ctx: SweepContext,
  option: number,
  taker: string,
  budget: Decimal,
  limitPrice: Decimal
): DrainResult {
  const { book } = ctx.state;
  const fills: OrderFill[] = [];
  let consumed = ZERO;
  let received = ZERO;

  let tick = book.bestSellTick(option);
  while (tick !== null && tick.lte(limitPrice) && budget.minus(consumed).gt(0)) {
    const order = book.oldest("SELL", option, tick);
    if (!order) break;
    const fill = fillRestingSell(ctx, order, taker, budget.minus(consumed));
    if (!fill) break;
    fills.push(fill);
    consumed = consumed.plus(fill.collateral);
    received = received.plus(fill.shares);
    tick = book.bestSellTick(option);
  }
  return { consumed, received, fills };
}

/**
 * Sell `offered` shares into resting buys FIFO from the priciest tick while
 * `tick >= limitPrice`.
 */
export function drainBuys(
  ctx: SweepContext,
  option: number,
  taker: string,
  offered: Decimal,
  limitPrice: Decimal
): DrainResult {
  const { book } = ctx.state;
  const fills: OrderFill[] = [];
  let consumed = ZERO;
  let received = ZERO;

  let tick = book.bestBuyTick(option);
  while (tick !== null && tick.gte(limitPrice) && offered.minus(consumed).gt(0)) {
    const order = book.oldest("BUY", option, tick);
    if (!order) break;
    const fill = fillRestingBuy(ctx, order, taker, offered.minus(consumed));
    if (!fill) {
      // Only reachable for an order already below one share; clear it and move on.
      book.removeOrder(order);
      untrackOrder(ctx.state, order.maker, order.orderId);
      addTo(ctx.state.buyEscrow, order.maker, option, order.quantity.neg(), ctx.state.numberOfOptions);
      pay(ctx, order.maker, order.quantity);
    } else {
      fills.push(fill);
      consumed = consumed.plus(fill.shares);
      received = received.plus(fill.collateral);
    }
    tick = book.bestBuyTick(option);
  }
  return { consumed, received, fills };
}

// ============================================================================
// Entry Sweep
// ============================================================================

export type SweepMode = "CURVE" | "BOOK_ONLY";

/**
 * Spend `amount` on `option` for `wallet`.
 *
 * In CURVE mode resting sells at or below the live price are taken first,
 * then the curve is walked one tick at a time, taking any sells each step
 * exposes. BOOK_ONLY takes resting sells up to the price ceiling and never
 * touches the curve. Unspent collateral is queued back to the wallet.
 */
export function sweepEnter(
  ctx: SweepContext,
  option: number,
  wallet: string,
  amount: Decimal,
  mode: SweepMode
): EntryResult {
  const { state, config } = ctx;
  const slot = option - 1;
  const steps: SweepStep[] = [];
  const fills: OrderFill[] = [];

  let remaining = amount;
  let curveAmount = ZERO;
  let curveShares = ZERO;
  let bookAmount = ZERO;
  let bookShares = ZERO;

  const priceOf = () => currentPrice(state.optionFunds[slot], state.allFunds);
  const priceBefore = priceOf();

  const drain = (limit: Decimal) => {
    const result = drainSells(ctx, option, wallet, remaining, limit);
    for (const fill of result.fills) {
      fills.push(fill);
      steps.push({ kind: "BOOK", fill });
    }
    remaining = remaining.minus(result.consumed);
    bookAmount = bookAmount.plus(result.consumed);
    bookShares = bookShares.plus(result.received);
  };

  if (mode === "BOOK_ONLY") {
    drain(config.maxPrice);
  } else {
    drain(priceBefore);

    let price = priceOf();
    while (remaining.gt(0) && price.lt(config.maxPrice)) {
      const target = Decimal.min(nextTick(price, config.tickSpacing), config.maxPrice);
      const required = amountRequired(price, target, state.optionFunds[slot], state.allFunds);
      const spend = Decimal.min(required, remaining);
      if (spend.lte(0)) break;

      const shares = returnedShares(spend, state.optionFunds[slot], state.allFunds);
      state.optionFunds[slot] = state.optionFunds[slot].plus(spend);
      state.allFunds = state.allFunds.plus(spend);
      state.optionVotes[slot] = state.optionVotes[slot].plus(shares);
      state.allVotes = state.allVotes.plus(shares);
      addTo(state.userVotes, wallet, option, shares, state.numberOfOptions);

      const after = priceOf();
      steps.push({ kind: "CURVE", amount: spend, shares, priceBefore: price, priceAfter: after });
      remaining = remaining.minus(spend);
      curveAmount = curveAmount.plus(spend);
      curveShares = curveShares.plus(shares);
      price = after;

      if (remaining.gt(0)) drain(price);
    }
  }

  const shares = curveShares.plus(bookShares);
  if (shares.isZero()) {
    throw stateError("NOTHING_FILLED", `Entry of ${amount.toString()} into option ${option} acquired no shares`);
  }

  pay(ctx, wallet, remaining);
  const priceAfter = priceOf();
  const spent = amount.minus(remaining);

  ctx.events.push({
    type: "OPTION_ENTERED",
    data: { option, baseAmount: spent, optionAmount: shares, wallet, priceBefore, priceAfter },
  });

  return {
    option,
    wallet,
    amount,
    spent,
    refunded: remaining,
    curveAmount,
    curveShares,
    bookAmount,
    bookShares,
    shares,
    priceBefore,
    priceAfter,
    steps,
    fills,
  };
}

export function syncEvent(state: Pick<PoolState, "optionFunds" | "allFunds">): PoolEvent {
  return { type: "SYNC", data: { optionFunds: [...state.optionFunds], allFunds: state.allFunds } };
}
