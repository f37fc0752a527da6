/**
 * Shared fixtures for pool tests: in-process collaborators, a factory and
 * a default two-option private pool.
 */

import { expect } from "vitest";
import { Decimal } from "decimal.js";
import { ManualClock } from "../src/lib/clock";
import { VotingExternalSourceFactory } from "../src/lib/externalSource";
import { LedgerFeeBurner } from "../src/lib/feeBurner";
import { isPoolError, type PoolError, type PoolErrorCode } from "../src/lib/errors";
import { PRICE_SCALE } from "../src/lib/fixedPoint";
import { PoolFactory, type PoolParams } from "../src/lib/poolFactory";
import { PoolLogger } from "../src/lib/poolLogger";
import type { PredictionPool } from "../src/lib/predictionPool";
import { InMemoryTokenLedger } from "../src/lib/tokenLedger";

export const TRADERS = ["creator", "alice", "bob", "carol"] as const;
export const STARTING_BALANCE = 1_000_000;

export interface Harness {
  clock: ManualClock;
  ledger: InMemoryTokenLedger;
  logger: PoolLogger;
  oracles: VotingExternalSourceFactory;
  burner: LedgerFeeBurner;
  factory: PoolFactory;
}

export function createHarness(): Harness {
  const clock = new ManualClock(1000);
  const ledger = new InMemoryTokenLedger();
  const logger = new PoolLogger();
  const oracles = new VotingExternalSourceFactory({ ledger, logger, clock });
  const burner = new LedgerFeeBurner(ledger, { burnAccount: "burn" });
  const factory = new PoolFactory({
    ledger,
    logger,
    clock,
    oracleFactory: oracles,
    feeBurner: burner,
    platformAddress: "platform",
  });
  for (const id of TRADERS) ledger.mint(id, STARTING_BALANCE);
  return { clock, ledger, logger, oracles, burner, factory };
}

/** Two options, 10,000 initial liquidity split 50/50, sale window [1000, 2000). */
export function createPool(h: Harness, params: Partial<PoolParams> = {}): PredictionPool {
  return h.factory.createPool("creator", {
    numberOfOptions: 2,
    startTime: 1000,
    endTime: 2000,
    initialLiquidity: 10_000,
    liquidityPercentages: [50, 50],
    isPublic: false,
    resolver: "resolver",
    uri: "ipfs://test-pool",
    ...params,
  });
}

/** Price for a whole number of cents. */
export function tick(cents: number): Decimal {
  return PRICE_SCALE.times(cents).div(100);
}

export function expectDecimalEqual(actual: Decimal | number, expected: Decimal | number | string): void {
  expect(new Decimal(actual).toFixed()).toBe(new Decimal(expected).toFixed());
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected the call to throw");
}

export function expectPoolError(fn: () => unknown, code: PoolErrorCode): PoolError {
  const error = catchError(fn);
  if (!isPoolError(error)) {
    throw new Error(`Expected a PoolError with code ${code}, got ${String(error)}`);
  }
  expect(error.code).toBe(code);
  return error;
}
