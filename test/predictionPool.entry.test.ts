/**
 * Entering options and liquidity: curve walk, book interleave, fees,
 * quotes, window rules and call atomicity.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { isPoolError } from "../src/lib/errors";
import type { PredictionPool } from "../src/lib/predictionPool";
import {
  createHarness,
  createPool,
  expectDecimalEqual,
  expectPoolError,
  tick,
  type Harness,
} from "./poolHarness";

describe("PredictionPool: enterOption", () => {
  let h: Harness;
  let pool: PredictionPool;

  beforeEach(() => {
    h = createHarness();
    pool = createPool(h);
  });

  it("opens at the liquidity split", () => {
    expect(pool.prices().map(p => p.toFixed())).toEqual([tick(50).toFixed(), tick(50).toFixed()]);
    expectDecimalEqual(pool.votesOf("creator", 1), 10_000);
    expectDecimalEqual(pool.liquidityOf("creator"), 10_000);
    expectDecimalEqual(h.ledger.balanceOf(pool.address), 10_000);
  });

  it("buys along the curve within one tick", () => {
    const result = pool.enterOption("alice", 1, 100);

    expectDecimalEqual(result.shares, 198);
    expectDecimalEqual(result.curveShares, 198);
    expectDecimalEqual(result.spent, 100);
    expectDecimalEqual(result.refunded, 0);
    expectDecimalEqual(result.priceBefore, tick(50));
    expectDecimalEqual(result.priceAfter, "504950495049504950");
    expect(result.steps.map(s => s.kind)).toEqual(["CURVE"]);

    expect(pool.optionFunds().map(f => f.toNumber())).toEqual([5100, 5000]);
    expectDecimalEqual(pool.votesOf("alice", 1), 198);
    expectDecimalEqual(pool.status().allVotes, 20_198);
    expectDecimalEqual(h.ledger.balanceOf("alice"), 999_900);
    expectDecimalEqual(h.ledger.balanceOf(pool.address), 10_100);
  });

  it("logs the entry followed by a sync record", () => {
    pool.enterOption("alice", 1, 100);
    const entries = h.logger.getLogs().filter(e => e.poolAddress === pool.address);
    expect(entries.map(e => e.type)).toEqual(["LIQUIDITY_ENTERED", "SYNC", "OPTION_ENTERED", "SYNC"]);

    const [entered] = h.logger.ofType("OPTION_ENTERED");
    expect(entered.data.wallet).toBe("alice");
    expectDecimalEqual(entered.data.baseAmount, 100);
    expectDecimalEqual(entered.data.optionAmount, 198);

    const syncs = h.logger.ofType("SYNC");
    const last = syncs[syncs.length - 1];
    expect(last.data.optionFunds.map(f => f.toNumber())).toEqual([5100, 5000]);
    expectDecimalEqual(last.data.allFunds, 10_100);
  });

  it("walks several ticks with shrinking shares per unit", () => {
    const result = pool.enterOption("alice", 1, 1_000);
    const curve = result.steps.flatMap(s => (s.kind === "CURVE" ? [s] : []));

    expect(curve.length).toBeGreaterThan(2);
    expectDecimalEqual(curve[0].amount, 205);
    expectDecimalEqual(curve[0].shares, 401);
    for (let i = 0; i < curve.length - 1; i++) {
      // Every full step lands on or past the next tick.
      expect(curve[i].priceAfter.gte(tick(51 + i))).toBe(true);
      // shares/amount strictly falls: s[i+1] * a[i] < s[i] * a[i+1]
      if (i + 1 < curve.length - 1) {
        expect(curve[i + 1].shares.times(curve[i].amount).lt(curve[i].shares.times(curve[i + 1].amount))).toBe(true);
      }
    }
    expectDecimalEqual(result.curveAmount, 1_000);
    expectDecimalEqual(result.spent, 1_000);
  });

  it("takes a resting sell the curve walks into", () => {
    pool.placeSellOrder("creator", 1, tick(51), 100);
    const result = pool.enterOption("alice", 1, 300);

    expect(result.steps.map(s => s.kind)).toEqual(["CURVE", "BOOK", "CURVE"]);
    expectDecimalEqual(result.curveAmount, 249);
    expectDecimalEqual(result.curveShares, 486);
    expectDecimalEqual(result.bookAmount, 51);
    expectDecimalEqual(result.bookShares, 100);
    expectDecimalEqual(result.shares, 586);
    expect(result.fills).toHaveLength(1);
    expectDecimalEqual(result.fills[0].remaining, 0);

    expectDecimalEqual(h.ledger.balanceOf("creator"), 990_051);
    expectDecimalEqual(pool.optionVotes()[0], 10_486);
    expect(pool.depth("SELL", 1)).toEqual([]);
    expect(pool.activeOrderCount("creator")).toBe(0);
    expectDecimalEqual(h.ledger.balanceOf(pool.address), 10_249);
  });

  it("fills cheaper resting sells before touching the curve", () => {
    pool.placeSellOrder("creator", 1, tick(40), 1_000);
    const result = pool.enterOption("alice", 1, 500);

    expect(result.steps.map(s => s.kind)).toEqual(["BOOK", "CURVE"]);
    const [fill] = result.fills;
    expectDecimalEqual(fill.shares, 1_000);
    expectDecimalEqual(fill.collateral, 400);
    expectDecimalEqual(fill.executionFee, 4);
    expectDecimalEqual(fill.creatorFee, 4);
    expectDecimalEqual(fill.sellerProceeds, 392);
    expectDecimalEqual(result.curveShares, 198);
    expectDecimalEqual(result.shares, 1_198);

    expectDecimalEqual(h.ledger.balanceOf("creator"), 990_392);
    expectDecimalEqual(pool.accruedFees().execution, 4);
    expectDecimalEqual(pool.accruedFees().creator, 4);
    expectDecimalEqual(h.ledger.balanceOf(pool.address), 10_108);
    expectDecimalEqual(pool.status().allFunds, 10_100);
  });

  it("rejects bad amounts and options", () => {
    expectPoolError(() => pool.enterOption("alice", 1, 0), "ZERO_AMOUNT");
    expectPoolError(() => pool.enterOption("alice", 1, -5), "INVALID_AMOUNT");
    expectPoolError(() => pool.enterOption("alice", 1, 1.5), "INVALID_AMOUNT");
    expectPoolError(() => pool.enterOption("alice", 3, 100), "INVALID_OPTION");
    expectPoolError(() => pool.enterOption("dave", 1, 100), "INSUFFICIENT_BALANCE");
  });

  it("rejects entry before the sale opens", () => {
    const later = createPool(h, { startTime: 1500 });
    expectPoolError(() => later.enterOption("alice", 1, 100), "SALE_NOT_LIVE");
  });

  it("only takes resting sells once the sale window has ended", () => {
    pool.placeSellOrder("creator", 1, tick(90), 100);
    h.clock.set(2000);

    const result = pool.enterOption("alice", 1, 100);
    expectDecimalEqual(result.shares, 100);
    expectDecimalEqual(result.curveShares, 0);
    expectDecimalEqual(result.spent, 90);
    expectDecimalEqual(result.refunded, 10);
    expectDecimalEqual(result.priceAfter, tick(50));
    expectDecimalEqual(h.ledger.balanceOf("alice"), 999_910);
    expectDecimalEqual(h.ledger.balanceOf("creator"), 990_090);
  });

  it("rejects an entry that acquires nothing", () => {
    h.clock.set(2000);
    expectPoolError(() => pool.enterOption("alice", 1, 100), "NOTHING_FILLED");
    expectDecimalEqual(h.ledger.balanceOf("alice"), 1_000_000);
  });

  it("rejects entry after close", () => {
    h.clock.set(2000);
    pool.closePool("alice");
    expectPoolError(() => pool.enterOption("alice", 1, 100), "POOL_CLOSED");
  });
});

describe("PredictionPool: quoteEnterOption", () => {
  it("matches execution and changes nothing", () => {
    const h = createHarness();
    const pool = createPool(h);
    pool.placeSellOrder("creator", 1, tick(51), 100);
    const logCount = h.logger.getLogs().length;

    const quote = pool.quoteEnterOption(1, 300, "alice");
    expect(h.logger.getLogs()).toHaveLength(logCount);
    expect(pool.depth("SELL", 1)).toHaveLength(1);
    expectDecimalEqual(pool.currentPrice(1), tick(50));
    expectDecimalEqual(h.ledger.balanceOf("alice"), 1_000_000);

    const executed = pool.enterOption("alice", 1, 300);
    expect(executed).toEqual(quote);
  });
});

describe("PredictionPool: enterLiquidity", () => {
  let h: Harness;
  let pool: PredictionPool;

  beforeEach(() => {
    h = createHarness();
    pool = createPool(h, { liquidityPercentages: [30, 70] });
  });

  it("adds collateral in proportion and keeps prices", () => {
    const result = pool.enterLiquidity("alice", 1_000);

    expect(result.perOption.map(p => p.toNumber())).toEqual([300, 700]);
    expectDecimalEqual(result.votes, 1_000);
    expect(pool.prices().map(p => p.toFixed())).toEqual([tick(30).toFixed(), tick(70).toFixed()]);
    expectDecimalEqual(pool.votesOf("alice", 1), 1_000);
    expectDecimalEqual(pool.votesOf("alice", 2), 1_000);
    expectDecimalEqual(pool.liquidityOf("alice"), 1_000);

    const status = pool.status();
    expectDecimalEqual(status.totalLiquidity, 11_000);
    expectDecimalEqual(status.allFunds, 11_000);
    expectDecimalEqual(status.allVotes, 22_000);
  });

  it("logs the deposit", () => {
    pool.enterLiquidity("alice", 1_000);
    const [, entered] = h.logger.ofType("LIQUIDITY_ENTERED");
    expect(entered.data.wallet).toBe("alice");
    expectDecimalEqual(entered.data.baseAmount, 1_000);
  });

  it("is closed once the sale window ends", () => {
    h.clock.set(2000);
    expectPoolError(() => pool.enterLiquidity("alice", 1_000), "SALE_NOT_LIVE");
  });
});

describe("PredictionPool: Atomicity", () => {
  let h: Harness;
  let pool: PredictionPool;

  beforeEach(() => {
    h = createHarness();
    pool = createPool(h);
  });

  it("a rejected call leaves no log entries", () => {
    const logCount = h.logger.getLogs().length;
    expectPoolError(() => pool.placeBuyOrder("dave", 1, tick(40), 100), "INSUFFICIENT_BALANCE");
    expect(h.logger.getLogs()).toHaveLength(logCount);
  });

  it("blocks re-entry from a ledger hook", () => {
    let inner: unknown;
    const off = h.ledger.onTransfer(() => {
      off();
      try {
        pool.enterOption("bob", 1, 10);
      } catch (error) {
        inner = error;
      }
    });

    pool.enterOption("alice", 1, 100);
    expect(isPoolError(inner, "REENTRANT_CALL")).toBe(true);
    expectDecimalEqual(pool.votesOf("alice", 1), 198);
    expectDecimalEqual(pool.votesOf("bob", 1), 0);
  });

  it("reverses transfers when a collaborator fails mid-call", () => {
    const off = h.ledger.onTransfer(() => {
      off();
      throw new Error("hook failure");
    });

    const error = expectPoolError(() => pool.enterOption("alice", 1, 100), "TRANSFER_FAILED");
    expect(error.kind).toBe("EXTERNAL");
    expectDecimalEqual(h.ledger.balanceOf("alice"), 1_000_000);
    expectDecimalEqual(h.ledger.balanceOf(pool.address), 10_000);
    expectDecimalEqual(pool.currentPrice(1), tick(50));
    expectDecimalEqual(pool.votesOf("alice", 1), 0);
    expect(h.logger.ofType("OPTION_ENTERED")).toHaveLength(0);
  });
});
