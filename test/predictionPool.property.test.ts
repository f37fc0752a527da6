/**
 * Property-based tests for the pool using fast-check.
 *
 * Random sequences of entries, orders, cancels and deposits are replayed
 * against a fresh pool; after every step the accounting identities must
 * hold, and a rejected step must leave no trace.
 */

import { describe, it, expect } from "vitest";
import { Decimal } from "decimal.js";
import * as fc from "fast-check";
import { isPoolError } from "../src/lib/errors";
import { sum } from "../src/lib/fixedPoint";
import type { EntryResult, RestingOrder, Side } from "../src/lib/pool-common";
import type { PredictionPool } from "../src/lib/predictionPool";
import {
  STARTING_BALANCE,
  TRADERS,
  createHarness,
  createPool,
  tick,
  type Harness,
} from "./poolHarness";

// ============================================================================
// Arbitraries
// ============================================================================

const traderArbitrary = fc.constantFrom(...TRADERS);
const optionArbitrary = fc.integer({ min: 1, max: 3 });
const centsArbitrary = fc.integer({ min: 1, max: 99 });

type PoolCommand =
  | { type: "ENTER"; trader: string; option: number; amount: number }
  | { type: "SELL"; trader: string; option: number; cents: number; permille: number }
  | { type: "BUY"; trader: string; option: number; cents: number; amount: number }
  | { type: "CANCEL"; pick: number }
  | { type: "LIQUIDITY"; trader: string; amount: number };

const commandArbitrary: fc.Arbitrary<PoolCommand> = fc.oneof(
  fc.record({
    type: fc.constant("ENTER" as const),
    trader: traderArbitrary,
    option: optionArbitrary,
    amount: fc.integer({ min: 1, max: 5_000 }),
  }),
  fc.record({
    type: fc.constant("SELL" as const),
    trader: traderArbitrary,
    option: optionArbitrary,
    cents: centsArbitrary,
    permille: fc.integer({ min: 1, max: 1_000 }),
  }),
  fc.record({
    type: fc.constant("BUY" as const),
    trader: traderArbitrary,
    option: optionArbitrary,
    cents: centsArbitrary,
    amount: fc.integer({ min: 1, max: 3_000 }),
  }),
  fc.record({ type: fc.constant("CANCEL" as const), pick: fc.nat() }),
  fc.record({
    type: fc.constant("LIQUIDITY" as const),
    trader: traderArbitrary,
    amount: fc.integer({ min: 1, max: 2_000 }),
  })
);

// ============================================================================
// Replay Helpers
// ============================================================================

interface TrackedOrder {
  side: Side;
  option: number;
  price: Decimal;
  orderId: string;
  maker: string;
}

function track(order: RestingOrder): TrackedOrder {
  return { side: order.side, option: order.option, price: order.price, orderId: order.orderId, maker: order.maker };
}

function newThreeOptionPool(h: Harness): PredictionPool {
  return createPool(h, { numberOfOptions: 3, liquidityPercentages: [50, 30, 20], initialLiquidity: 30_000 });
}

function apply(pool: PredictionPool, command: PoolCommand, orders: TrackedOrder[]): void {
  switch (command.type) {
    case "ENTER":
      pool.enterOption(command.trader, command.option, command.amount);
      return;
    case "SELL": {
      const held = pool.votesOf(command.trader, command.option);
      const shares = Decimal.max(1, held.times(command.permille).divToInt(1000));
      const { resting } = pool.placeSellOrder(command.trader, command.option, tick(command.cents), shares);
      if (resting) orders.push(track(resting));
      return;
    }
    case "BUY": {
      const { resting } = pool.placeBuyOrder(command.trader, command.option, tick(command.cents), command.amount);
      if (resting) orders.push(track(resting));
      return;
    }
    case "CANCEL": {
      if (orders.length === 0) return;
      const order = orders[command.pick % orders.length];
      if (order.side === "SELL") {
        pool.cancelSellOrder(order.maker, order.option, order.price, order.orderId);
      } else {
        pool.cancelBuyOrder(order.maker, order.option, order.price, order.orderId);
      }
      return;
    }
    case "LIQUIDITY":
      pool.enterLiquidity(command.trader, command.amount);
      return;
  }
}

/** Everything observable about the pool and the traders' wallets. */
function fingerprint(h: Harness, pool: PredictionPool): string {
  const options = Array.from({ length: pool.numberOfOptions }, (_, i) => i + 1);
  return JSON.stringify({
    funds: pool.optionFunds().map(f => f.toFixed()),
    votes: pool.optionVotes().map(v => v.toFixed()),
    fees: [pool.accruedFees().execution.toFixed(), pool.accruedFees().creator.toFixed()],
    pool: h.ledger.balanceOf(pool.address).toFixed(),
    traders: TRADERS.map(t => ({
      balance: h.ledger.balanceOf(t).toFixed(),
      votes: options.map(o => pool.votesOf(t, o).toFixed()),
      escrow: pool.escrowOf(t).shares.concat(pool.escrowOf(t).collateral).map(x => x.toFixed()),
      orders: pool.activeOrderCount(t),
    })),
    depth: options.map(o => [pool.depth("SELL", o).length, pool.depth("BUY", o).length]),
  });
}

function checkInvariants(h: Harness, pool: PredictionPool): void {
  const status = pool.status();
  const funds = pool.optionFunds();
  const votes = pool.optionVotes();

  expect(sum(funds).eq(status.allFunds)).toBe(true);
  expect(sum(votes).eq(status.allVotes)).toBe(true);

  for (let option = 1; option <= pool.numberOfOptions; option++) {
    const held = sum(TRADERS.map(t => pool.votesOf(t, option).plus(pool.escrowOf(t).shares[option - 1])));
    expect(held.eq(votes[option - 1])).toBe(true);

    const restingShares = sum(pool.depth("SELL", option).map(l => l.quantity));
    const escrowedShares = sum(TRADERS.map(t => pool.escrowOf(t).shares[option - 1]));
    expect(restingShares.eq(escrowedShares)).toBe(true);

    const restingBids = sum(pool.depth("BUY", option).map(l => l.quantity));
    const escrowedBids = sum(TRADERS.map(t => pool.escrowOf(t).collateral[option - 1]));
    expect(restingBids.eq(escrowedBids)).toBe(true);
  }

  const fees = pool.accruedFees();
  const expectedBalance = status.allFunds.plus(pool.totalBuyEscrow()).plus(fees.execution).plus(fees.creator);
  expect(h.ledger.balanceOf(pool.address).eq(expectedBalance)).toBe(true);
  expect(h.ledger.totalSupply().eq(STARTING_BALANCE * TRADERS.length)).toBe(true);
}

function quoteOrNull(pool: PredictionPool, option: number, amount: number, trader: string): EntryResult | null {
  try {
    return pool.quoteEnterOption(option, amount, trader);
  } catch (error) {
    if (!isPoolError(error)) throw error;
    return null;
  }
}

/** Run a command; a rejection must be a PoolError and must leave nothing behind. */
function step(h: Harness, pool: PredictionPool, command: PoolCommand, orders: TrackedOrder[]): void {
  const before = fingerprint(h, pool);
  const logCount = h.logger.getLogs().length;
  try {
    apply(pool, command, orders);
  } catch (error) {
    if (!isPoolError(error)) throw error;
    expect(fingerprint(h, pool)).toBe(before);
    expect(h.logger.getLogs()).toHaveLength(logCount);
  }
}

// ============================================================================
// Properties
// ============================================================================

describe("PredictionPool: Properties", () => {
  it("accounting identities hold after every step", () => {
    fc.assert(
      fc.property(fc.array(commandArbitrary, { minLength: 1, maxLength: 40 }), commands => {
        const h = createHarness();
        const pool = newThreeOptionPool(h);
        const orders: TrackedOrder[] = [];
        for (const command of commands) {
          step(h, pool, command, orders);
          checkInvariants(h, pool);
        }
      }),
      { numRuns: 60 }
    );
  });

  it("a quote matches the entry it predicts", () => {
    fc.assert(
      fc.property(
        fc.array(commandArbitrary, { maxLength: 20 }),
        traderArbitrary,
        optionArbitrary,
        fc.integer({ min: 1, max: 20_000 }),
        (commands, trader, option, amount) => {
          const h = createHarness();
          const pool = newThreeOptionPool(h);
          const orders: TrackedOrder[] = [];
          for (const command of commands) step(h, pool, command, orders);

          const quote = quoteOrNull(pool, option, amount, trader);
          if (!quote) return;
          expect(pool.enterOption(trader, option, amount)).toEqual(quote);
        }
      ),
      { numRuns: 60 }
    );
  });

  it("claims never pay out more than the pool holds", () => {
    fc.assert(
      fc.property(
        fc.array(commandArbitrary, { minLength: 1, maxLength: 30 }),
        fc.integer({ min: 1, max: 3 }),
        (commands, winner) => {
          const h = createHarness();
          const pool = newThreeOptionPool(h);
          const orders: TrackedOrder[] = [];
          for (const command of commands) step(h, pool, command, orders);

          h.clock.set(2000);
          pool.closePool("carol");
          for (const order of orders) {
            if (!pool.getOrder(order.side, order.option, order.price, order.orderId)) continue;
            if (order.side === "SELL") pool.cancelSellOrder(order.maker, order.option, order.price, order.orderId);
            else pool.cancelBuyOrder(order.maker, order.option, order.price, order.orderId);
          }
          pool.chooseWinner("resolver", winner);
          h.clock.set(2000 + 7200);

          for (const trader of TRADERS) {
            try {
              pool.claim(trader);
            } catch (error) {
              if (!isPoolError(error, "NOTHING_TO_CLAIM")) throw error;
            }
          }
          // Each claimant loses less than one unit to each of two floors.
          const left = h.ledger.balanceOf(pool.address);
          expect(left.gte(0)).toBe(true);
          expect(left.lt(2 * TRADERS.length)).toBe(true);
        }
      ),
      { numRuns: 40 }
    );
  });
});
