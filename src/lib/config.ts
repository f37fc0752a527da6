/**
 * Pool engine configuration.
 *
 * Defaults cover every field; callers pass a Partial and get back a
 * validated, fully-populated config.
 */

import { Decimal } from "decimal.js";
import { validationError } from "./errors";
import { PRICE_SCALE, type DecimalInput } from "./fixedPoint";

export const MIN_OPTIONS = 2;
export const MAX_OPTIONS = 50;
/** Finest tick allowed: at most 10,000 curve steps from 0 to 1. */
export const MIN_TICK_SPACING = new Decimal("1e14");

/**
 * Discounted platform rate that applies once pool funds reach `threshold`.
 */
export interface FeeTier {
  threshold: Decimal;
  platformFee: number;
}

/** All rates are parts-per-thousand. */
export interface FeeSchedule {
  platformFee: number;
  liquidityFee: number;
  creatorFee: number;
  resolverFee: number;
  /** Taken from the seller's proceeds on every resting-order fill */
  executionFee: number;
  tiers: FeeTier[];
}

export interface PoolConfig {
  /** Price quantum for resting orders, in PRICE_SCALE units */
  tickSpacing: Decimal;
  /** Highest curve price and highest order price */
  maxPrice: Decimal;
  fees: FeeSchedule;
  /** Seconds after a winner is chosen during which it may be disputed */
  disputeWindow: number;
  /** Dispute fee as ppt of pool funds, before the absolute cap */
  disputeFeeRate: number;
  maxDisputeFee: Decimal;
  minOracles: number;
  maxOracles: number;
  /** Voting period given to a spawned oracle, in seconds */
  oracleDuration: number;
  oracleFixedFee: Decimal;
  /** Extensions after which a non-final oracle counts as stalled */
  maxTimeExtensions: number;
}

export interface PoolConfigOverrides {
  tickSpacing?: DecimalInput;
  fees?: Partial<Omit<FeeSchedule, "tiers">> & {
    tiers?: Array<{ threshold: DecimalInput; platformFee: number }>;
  };
  disputeWindow?: number;
  disputeFeeRate?: number;
  maxDisputeFee?: DecimalInput;
  minOracles?: number;
  maxOracles?: number;
  oracleDuration?: number;
  oracleFixedFee?: DecimalInput;
  maxTimeExtensions?: number;
}

const DEFAULT_TICK_SPACING = new Decimal("1e16");

export const DEFAULT_FEE_SCHEDULE: FeeSchedule = {
  platformFee: 25,
  liquidityFee: 10,
  creatorFee: 10,
  resolverFee: 5,
  executionFee: 10,
  tiers: [
    { threshold: new Decimal("10000000000"), platformFee: 20 },
    { threshold: new Decimal("100000000000"), platformFee: 15 },
  ],
};

export const DEFAULT_POOL_CONFIG: PoolConfig = {
  tickSpacing: DEFAULT_TICK_SPACING,
  maxPrice: PRICE_SCALE.minus(DEFAULT_TICK_SPACING),
  fees: DEFAULT_FEE_SCHEDULE,
  disputeWindow: 7200,
  disputeFeeRate: 10,
  maxDisputeFee: new Decimal("1000000000"),
  minOracles: 3,
  maxOracles: 15,
  oracleDuration: 86400,
  oracleFixedFee: new Decimal(0),
  maxTimeExtensions: 3,
};

export function createPoolConfig(overrides: PoolConfigOverrides = {}): PoolConfig {
  const tickSpacing = overrides.tickSpacing !== undefined
    ? new Decimal(overrides.tickSpacing)
    : DEFAULT_POOL_CONFIG.tickSpacing;
  const baseFees = DEFAULT_POOL_CONFIG.fees;
  const feeOverrides = overrides.fees ?? {};

  const config: PoolConfig = {
    tickSpacing,
    maxPrice: PRICE_SCALE.minus(tickSpacing),
    fees: {
      platformFee: feeOverrides.platformFee ?? baseFees.platformFee,
      liquidityFee: feeOverrides.liquidityFee ?? baseFees.liquidityFee,
      creatorFee: feeOverrides.creatorFee ?? baseFees.creatorFee,
      resolverFee: feeOverrides.resolverFee ?? baseFees.resolverFee,
      executionFee: feeOverrides.executionFee ?? baseFees.executionFee,
      tiers: feeOverrides.tiers
        ? feeOverrides.tiers.map(t => ({ threshold: new Decimal(t.threshold), platformFee: t.platformFee }))
        : baseFees.tiers,
    },
    disputeWindow: overrides.disputeWindow ?? DEFAULT_POOL_CONFIG.disputeWindow,
    disputeFeeRate: overrides.disputeFeeRate ?? DEFAULT_POOL_CONFIG.disputeFeeRate,
    maxDisputeFee: overrides.maxDisputeFee !== undefined
      ? new Decimal(overrides.maxDisputeFee)
      : DEFAULT_POOL_CONFIG.maxDisputeFee,
    minOracles: overrides.minOracles ?? DEFAULT_POOL_CONFIG.minOracles,
    maxOracles: overrides.maxOracles ?? DEFAULT_POOL_CONFIG.maxOracles,
    oracleDuration: overrides.oracleDuration ?? DEFAULT_POOL_CONFIG.oracleDuration,
    oracleFixedFee: overrides.oracleFixedFee !== undefined
      ? new Decimal(overrides.oracleFixedFee)
      : DEFAULT_POOL_CONFIG.oracleFixedFee,
    maxTimeExtensions: overrides.maxTimeExtensions ?? DEFAULT_POOL_CONFIG.maxTimeExtensions,
  };

  validatePoolConfig(config);
  return config;
}

export function validatePoolConfig(config: PoolConfig): void {
  const { tickSpacing, fees } = config;

  if (!tickSpacing.isInteger() || tickSpacing.lte(0) || tickSpacing.gte(PRICE_SCALE)) {
    throw validationError("INVALID_CONFIG", `tickSpacing must be an integer in (0, ${PRICE_SCALE.toFixed()})`);
  }
  if (tickSpacing.lt(MIN_TICK_SPACING)) {
    throw validationError("INVALID_CONFIG", `tickSpacing must be at least ${MIN_TICK_SPACING.toFixed()}`);
  }
  if (!PRICE_SCALE.mod(tickSpacing).isZero()) {
    throw validationError("INVALID_CONFIG", "tickSpacing must divide PRICE_SCALE");
  }

  const rates: Array<[string, number]> = [
    ["platformFee", fees.platformFee],
    ["liquidityFee", fees.liquidityFee],
    ["creatorFee", fees.creatorFee],
    ["resolverFee", fees.resolverFee],
    ["executionFee", fees.executionFee],
    ["disputeFeeRate", config.disputeFeeRate],
    ...fees.tiers.map((t, i): [string, number] => [`tiers[${i}].platformFee`, t.platformFee]),
  ];
  for (const [name, rate] of rates) {
    if (!Number.isInteger(rate) || rate < 0 || rate > 1000) {
      throw validationError("INVALID_CONFIG", `${name} must be an integer between 0 and 1000`);
    }
  }

  const settlementTotal = fees.platformFee + fees.liquidityFee + fees.creatorFee + fees.resolverFee;
  if (settlementTotal >= 1000) {
    throw validationError("INVALID_CONFIG", "Settlement fees must leave a non-zero winning share");
  }
  if (fees.executionFee + fees.creatorFee >= 1000) {
    throw validationError("INVALID_CONFIG", "Fill fees must leave the seller non-zero proceeds");
  }

  for (let i = 1; i < fees.tiers.length; i++) {
    if (fees.tiers[i].threshold.lte(fees.tiers[i - 1].threshold)) {
      throw validationError("INVALID_CONFIG", "Fee tier thresholds must be strictly increasing");
    }
  }

  if (config.minOracles < 1 || config.maxOracles < config.minOracles) {
    throw validationError("INVALID_CONFIG", "Oracle bounds must satisfy 1 <= minOracles <= maxOracles");
  }
  if (config.maxDisputeFee.lte(0)) {
    throw validationError("INVALID_CONFIG", "maxDisputeFee must be positive");
  }
  for (const [name, value] of [
    ["disputeWindow", config.disputeWindow],
    ["oracleDuration", config.oracleDuration],
    ["maxTimeExtensions", config.maxTimeExtensions],
  ] as const) {
    if (!Number.isInteger(value) || value < 0) {
      throw validationError("INVALID_CONFIG", `${name} must be a non-negative integer`);
    }
  }
}
