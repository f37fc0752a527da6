/**
 * Shared types for the prediction pool engine.
 *
 * Every module (book, curve, sweep, settlement, pool) speaks in these
 * shapes so results can be compared and logged uniformly.
 */

import type { Decimal } from "decimal.js";

// ============================================================================
// Common Types
// ============================================================================

export type Side = "BUY" | "SELL";

/** Lifecycle phase of a pool as seen by callers. */
export type PoolPhase = "PENDING" | "OPEN" | "TRADING_ONLY" | "FINALIZED" | "DISPUTED" | "CLAIMABLE";

/**
 * An unmatched maker quantity resting in the book.
 * For SELL orders `quantity` is shares; for BUY orders it is collateral.
 */
export interface RestingOrder {
  orderId: string;
  option: number;
  price: Decimal;
  side: Side;
  maker: string;
  quantity: Decimal;
  placedAt: number;
  sequence: number;
}

/**
 * One resting-order execution.
 */
export interface OrderFill {
  orderId: string;
  option: number;
  price: Decimal;
  /** Side of the resting order that was hit */
  side: Side;
  maker: string;
  taker: string;
  shares: Decimal;
  /** Collateral paid by the buyer */
  collateral: Decimal;
  executionFee: Decimal;
  creatorFee: Decimal;
  /** Collateral received by the share seller after fees */
  sellerProceeds: Decimal;
  /** Resting quantity left on the order after this fill */
  remaining: Decimal;
  /** Dust collateral handed back to a buy maker whose order could no longer fill */
  dustRefund: Decimal;
}

/**
 * One segment of a sweep: either a resting fill or a curve purchase.
 */
export type SweepStep =
  | { kind: "BOOK"; fill: OrderFill }
  | { kind: "CURVE"; amount: Decimal; shares: Decimal; priceBefore: Decimal; priceAfter: Decimal };

export interface EntryResult {
  option: number;
  wallet: string;
  /** Collateral offered by the caller */
  amount: Decimal;
  /** Collateral actually used (curve + book) */
  spent: Decimal;
  refunded: Decimal;
  curveAmount: Decimal;
  curveShares: Decimal;
  bookAmount: Decimal;
  bookShares: Decimal;
  shares: Decimal;
  priceBefore: Decimal;
  priceAfter: Decimal;
  steps: SweepStep[];
  fills: OrderFill[];
}

export interface OrderPlacementResult {
  side: Side;
  option: number;
  price: Decimal;
  maker: string;
  fills: OrderFill[];
  /** Shares (sell) or collateral (buy) consumed by immediate fills */
  matched: Decimal;
  /** The remainder left resting, if any */
  resting: RestingOrder | null;
  /** Buy remainder too small to rest, returned to the caller */
  refunded: Decimal;
}

export interface CancelResult {
  order: RestingOrder;
  /** Account the escrowed quantity went back to (always the maker) */
  returnedTo: string;
  returned: Decimal;
}

export interface LiquidityResult {
  wallet: string;
  amount: Decimal;
  /** Collateral added to each option, index 0 = option 1 */
  perOption: Decimal[];
  /** Votes credited in every option */
  votes: Decimal;
}

/**
 * Collateral split locked in at close.
 */
export interface SettlementShares {
  platformFeeRate: number;
  platformShare: Decimal;
  liquidityShare: Decimal;
  creatorShare: Decimal;
  resolverShare: Decimal;
  winningShare: Decimal;
}

export interface ClaimResult {
  wallet: string;
  winnerOption: number;
  liquidityReward: Decimal;
  reward: Decimal;
  totalReward: Decimal;
}

export interface PayoutProjection {
  option: number;
  liquidityReward: Decimal;
  reward: Decimal;
  totalReward: Decimal;
}

export interface BookLevel {
  price: Decimal;
  quantity: Decimal;
  orderCount: number;
}

export interface EscrowSnapshot {
  /** Shares locked in resting sells, index 0 = option 1 */
  shares: Decimal[];
  /** Collateral locked in resting buys, index 0 = option 1 */
  collateral: Decimal[];
}

export interface PoolStatus {
  address: string;
  phase: PoolPhase;
  numberOfOptions: number;
  isPublic: boolean;
  startTime: number;
  endTime: number;
  finalized: boolean;
  winner: number;
  resolver: string;
  allFunds: Decimal;
  allVotes: Decimal;
  totalLiquidity: Decimal;
  disputed: boolean;
  resolved: boolean;
}
