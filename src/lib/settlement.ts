/**
 * Settlement math: fee tiers, the close-time share split, dispute sizing
 * and per-user payouts. Pure functions over config and pool state.
 */

import { Decimal } from "decimal.js";
import type { ExternalSource } from "./collaborators";
import type { FeeSchedule, PoolConfig } from "./config";
import { ZERO, applyRate, mulDiv } from "./fixedPoint";
import type { PayoutProjection, SettlementShares } from "./pool-common";
import { type PoolState, readVector } from "./poolState";

// ============================================================================
// Shares At Close
// ============================================================================

/** Platform rate for a pool holding `allFunds`: the last tier reached, else the base rate. */
export function platformRateFor(fees: FeeSchedule, allFunds: Decimal): number {
  let rate = fees.platformFee;
  for (const tier of fees.tiers) {
    if (allFunds.gte(tier.threshold)) rate = tier.platformFee;
  }
  return rate;
}

export function computeSettlementShares(fees: FeeSchedule, allFunds: Decimal): SettlementShares {
  const platformFeeRate = platformRateFor(fees, allFunds);
  const platformShare = applyRate(allFunds, platformFeeRate);
  const liquidityShare = applyRate(allFunds, fees.liquidityFee);
  const creatorShare = applyRate(allFunds, fees.creatorFee);
  const resolverShare = applyRate(allFunds, fees.resolverFee);
  const winningShare = allFunds.minus(platformShare).minus(liquidityShare).minus(creatorShare).minus(resolverShare);
  return { platformFeeRate, platformShare, liquidityShare, creatorShare, resolverShare, winningShare };
}

// ============================================================================
// Disputes
// ============================================================================

export function disputeFeeFor(config: PoolConfig, allFunds: Decimal): Decimal {
  return Decimal.min(applyRate(allFunds, config.disputeFeeRate), config.maxDisputeFee);
}

/** Larger fees seat more oracles, within [minOracles, maxOracles]. */
export function oracleCountFor(config: PoolConfig, fee: Decimal): number {
  const scaled = mulDiv(fee, new Decimal(config.maxOracles), config.maxDisputeFee).toNumber();
  return Math.min(config.maxOracles, Math.max(config.minOracles, scaled));
}

/**
 * An oracle is stalled once it has used up its extensions and its current
 * voting period has also passed without a winner.
 */
export function isStalled(oracle: ExternalSource, config: PoolConfig, now: number): boolean {
  if (oracle.winnerFinalized()) return false;
  return oracle.timeExtended() >= config.maxTimeExtensions && now > oracle.getExternalSource().endTime;
}

/** Option with the most funds; the lowest index wins ties. */
export function leadingOption(optionFunds: readonly Decimal[]): number {
  let best = 0;
  for (let i = 1; i < optionFunds.length; i++) {
    if (optionFunds[i].gt(optionFunds[best])) best = i;
  }
  return best + 1;
}

// ============================================================================
// Payouts
// ============================================================================

export function computePayout(
  state: PoolState,
  shares: SettlementShares,
  user: string,
  option: number
): PayoutProjection {
  const userLiquidity = state.userLiquidity.get(user) ?? ZERO;
  const liquidityReward = state.totalLiquidity.gt(0)
    ? mulDiv(shares.liquidityShare, userLiquidity, state.totalLiquidity)
    : ZERO;

  const optionVotes = state.optionVotes[option - 1];
  const userVotes = readVector(state.userVotes, user, option);
  const reward = optionVotes.gt(0) ? mulDiv(shares.winningShare, userVotes, optionVotes) : ZERO;

  return { option, liquidityReward, reward, totalReward: liquidityReward.plus(reward) };
}
