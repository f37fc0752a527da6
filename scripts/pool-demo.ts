/**
 * Demo run for a prediction pool
 *
 * Creates a three-option private pool, trades against the curve and the
 * book, closes it, picks a winner and pays everybody out. Prints the book,
 * balances and the settlement split along the way, then writes the event log.
 */

import { writeFileSync } from "fs";
import { Decimal } from "decimal.js";
import { ManualClock } from "../src/lib/clock";
import { VotingExternalSourceFactory } from "../src/lib/externalSource";
import { LedgerFeeBurner } from "../src/lib/feeBurner";
import { PRICE_SCALE, formatPrice } from "../src/lib/fixedPoint";
import { PoolFactory } from "../src/lib/poolFactory";
import { PoolLogger, type OrderPlacedData } from "../src/lib/poolLogger";
import type { PredictionPool } from "../src/lib/predictionPool";
import { InMemoryTokenLedger } from "../src/lib/tokenLedger";

const clock = new ManualClock(1_000);
const ledger = new InMemoryTokenLedger();
const logger = new PoolLogger();
const factory = new PoolFactory({
  ledger,
  logger,
  clock,
  oracleFactory: new VotingExternalSourceFactory({ ledger, logger, clock }),
  feeBurner: new LedgerFeeBurner(ledger, { burnAccount: "burn" }),
  platformAddress: "platform",
});

const traders = ["creator", "alice", "bob", "carol"];
for (const id of traders) ledger.mint(id, 1_000_000);

const tick = (cents: number) => PRICE_SCALE.times(cents).div(100);

console.log("=== Prediction Pool Demo ===\n");

function displayPrices(pool: PredictionPool): void {
  const prices = pool.prices().map((p, i) => `option ${i + 1}: ${formatPrice(p)}`);
  console.log(`Prices  ${prices.join(" | ")}`);
}

function displayBook(pool: PredictionPool, option: number): void {
  console.log(`--- Book for option ${option} ---`);
  for (const level of pool.depth("SELL", option)) {
    console.log(`  SELL ${formatPrice(level.price, 2)}  qty ${level.quantity.toString()}  (${level.orderCount})`);
  }
  for (const level of pool.depth("BUY", option)) {
    console.log(`  BUY  ${formatPrice(level.price, 2)}  amt ${level.quantity.toString()}  (${level.orderCount})`);
  }
  console.log("");
}

function displayBalances(pool: PredictionPool): void {
  console.log("--- Balances ---");
  for (const id of traders) {
    const votes = [1, 2, 3].map(o => pool.votesOf(id, o).toString()).join("/");
    console.log(`${id.padEnd(8)} cash ${ledger.balanceOf(id).toString().padStart(8)}  votes ${votes}`);
  }
  console.log(`pool     cash ${ledger.balanceOf(pool.address).toString()}\n`);
}

const pool = factory.createPool("creator", {
  numberOfOptions: 3,
  startTime: 1_000,
  endTime: 5_000,
  initialLiquidity: 30_000,
  liquidityPercentages: [50, 30, 20],
  isPublic: false,
  resolver: "carol",
  uri: "ipfs://demo-market",
});

console.log(`Created ${pool.address}`);
displayPrices(pool);

console.log("\n1. Alice enters option 2 with 2,000");
const entry = pool.enterOption("alice", 2, 2_000);
console.log(`   ${entry.shares.toString()} shares over ${entry.steps.length} steps, refund ${entry.refunded.toString()}`);
displayPrices(pool);

console.log("\n2. The creator offers 1,000 option-2 shares at 0.40");
pool.placeSellOrder("creator", 2, tick(40), 1_000);
console.log("   Bob bids 300 for option 2 at 0.35");
pool.placeBuyOrder("bob", 2, tick(35), 300);
displayBook(pool, 2);

console.log("3. Bob enters option 2 with 4,000; the curve walks up into the 0.40 offer");
const bobEntry = pool.enterOption("bob", 2, 4_000);
console.log(`   curve ${bobEntry.curveShares.toString()} shares, book ${bobEntry.bookShares.toString()} shares`);
displayBook(pool, 2);

console.log("4. Resting orders are cancelled; time runs out and carol closes the pool");
for (const level of pool.depth("BUY", 2)) {
  for (const id of openOrderIds("BUY", level.price)) pool.cancelBuyOrder("bob", 2, level.price, id);
}
for (const level of pool.depth("SELL", 2)) {
  for (const id of openOrderIds("SELL", level.price)) pool.cancelSellOrder("creator", 2, level.price, id);
}
clock.set(5_000);
const shares = pool.closePool("carol");
console.log(`   platform ${shares.platformShare.toString()} at ${shares.platformFeeRate}‰, liquidity ${shares.liquidityShare.toString()}, creator ${shares.creatorShare.toString()}, resolver ${shares.resolverShare.toString()}, winners ${shares.winningShare.toString()}\n`);

console.log("5. Carol picks option 2 and the dispute window passes");
pool.chooseWinner("carol", 2);
clock.advance(pool.config.disputeWindow);

for (const id of traders) {
  const projection = pool.projectedPayout(id, 2);
  if (projection.totalReward.isZero()) continue;
  const result = pool.claim(id);
  console.log(`   ${id} claims ${result.totalReward.toString()} (liquidity ${result.liquidityReward.toString()}, winnings ${result.reward.toString()})`);
}
console.log("");
displayBalances(pool);

writeFileSync("pool-demo-log.json", logger.exportJson());
console.log(`Wrote ${logger.getLogs().length} log entries to pool-demo-log.json`);

/** Ids still resting on option 2 at `price`, recovered from the event log the way an indexer would. */
function openOrderIds(side: "BUY" | "SELL", price: Decimal): string[] {
  const placed: ReadonlyArray<{ poolAddress: string; data: OrderPlacedData }> =
    side === "BUY" ? logger.ofType("BUY_ORDER_PLACED") : logger.ofType("SELL_ORDER_PLACED");
  return placed
    .filter(e => e.poolAddress === pool.address && e.data.orderPrice.eq(price))
    .map(e => e.data.orderId)
    .filter(id => pool.getOrder(side, 2, price, id) !== undefined);
}
