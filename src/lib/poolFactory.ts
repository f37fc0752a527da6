/**
 * Pool registry and factory.
 *
 * Validates a creation bundle, moves the creator's initial liquidity onto
 * the new pool's address and keeps every pool it created addressable.
 */

import { Decimal } from "decimal.js";
import type { Clock } from "./clock";
import type { FeeBurner, OracleFactory, TokenLedger } from "./collaborators";
import { MAX_OPTIONS, MIN_OPTIONS, createPoolConfig, type PoolConfigOverrides } from "./config";
import { externalError, validationError } from "./errors";
import { mulDiv, toAmount, type DecimalInput } from "./fixedPoint";
import type { PoolLogger } from "./poolLogger";
import { PredictionPool } from "./predictionPool";
import { syncEvent } from "./orderSweep";

export interface PoolParams {
  numberOfOptions: number;
  startTime: number;
  endTime: number;
  initialLiquidity: DecimalInput;
  /** Opening split of the initial liquidity; integers >= 1 summing to 100 */
  liquidityPercentages: number[];
  isPublic: boolean;
  /** Required for private pools */
  resolver?: string;
  uri: string;
  config?: PoolConfigOverrides;
}

export interface PoolFactoryOptions {
  ledger: TokenLedger;
  logger: PoolLogger;
  clock: Clock;
  oracleFactory: OracleFactory;
  feeBurner: FeeBurner;
  platformAddress: string;
  address?: string;
  /** Applied beneath each pool's own overrides */
  defaults?: PoolConfigOverrides;
}

export class PoolFactory {
  readonly address: string;
  readonly platformAddress: string;

  private readonly options: PoolFactoryOptions;
  private pools = new Map<string, PredictionPool>();
  private counter = 0;

  constructor(options: PoolFactoryOptions) {
    this.options = options;
    this.address = options.address ?? "pool-factory";
    this.platformAddress = options.platformAddress;
  }

  createPool(creator: string, params: PoolParams): PredictionPool {
    const { ledger, logger, clock } = this.options;
    const liquidity = this.validateParams(params);
    const defaults = this.options.defaults ?? {};
    const config = createPoolConfig({
      ...defaults,
      ...params.config,
      fees: { ...defaults.fees, ...params.config?.fees },
    });

    const balance = ledger.balanceOf(creator);
    if (balance.lt(liquidity)) {
      throw validationError(
        "INSUFFICIENT_BALANCE",
        `${creator} holds ${balance.toString()}, needs ${liquidity.toString()} of initial liquidity`
      );
    }

    const address = `pool-${(this.counter + 1).toString().padStart(4, "0")}`;
    const pool = new PredictionPool(
      {
        address,
        creator,
        numberOfOptions: params.numberOfOptions,
        startTime: params.startTime,
        endTime: params.endTime,
        isPublic: params.isPublic,
        resolver: params.resolver ?? "",
        platformAddress: this.platformAddress,
        uri: params.uri,
        initialLiquidity: liquidity,
        liquidityPercentages: [...params.liquidityPercentages],
        config,
      },
      {
        ledger,
        logger,
        clock,
        oracleFactory: this.options.oracleFactory,
        feeBurner: this.options.feeBurner,
      }
    );

    this.forwardLiquidity(creator, address, liquidity);
    this.counter++;
    this.pools.set(address, pool);

    const now = clock.now();
    logger.record(this.address, now, [
      { type: "POOL_CREATED", data: { poolAddress: address, poolCreator: creator, uri: params.uri, isPublic: params.isPublic } },
    ]);
    logger.record(address, now, [
      { type: "LIQUIDITY_ENTERED", data: { baseAmount: liquidity, wallet: creator } },
      syncEvent({ optionFunds: pool.optionFunds(), allFunds: pool.status().allFunds }),
    ]);
    return pool;
  }

  getPool(address: string): PredictionPool | undefined {
    return this.pools.get(address);
  }

  listPools(): PredictionPool[] {
    return Array.from(this.pools.values());
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private validateParams(params: PoolParams): Decimal {
    const { numberOfOptions: n, liquidityPercentages: pcts } = params;
    const now = this.options.clock.now();

    if (!Number.isInteger(n) || n < MIN_OPTIONS || n > MAX_OPTIONS) {
      throw validationError("INVALID_PARAMS", `numberOfOptions must be an integer in ${MIN_OPTIONS}..${MAX_OPTIONS}`);
    }
    if (pcts.length !== n) {
      throw validationError("LENGTH_MISMATCH", `Expected ${n} liquidity percentages, got ${pcts.length}`);
    }
    if (pcts.some(p => !Number.isInteger(p) || p < 1)) {
      throw validationError("INVALID_PARAMS", "Liquidity percentages must be integers >= 1");
    }
    const total = pcts.reduce((acc, p) => acc + p, 0);
    if (total !== 100) {
      throw validationError("INVALID_PARAMS", `Liquidity percentages sum to ${total}, expected 100`);
    }
    if (!Number.isInteger(params.startTime) || !Number.isInteger(params.endTime) || params.startTime >= params.endTime) {
      throw validationError("INVALID_PARAMS", "startTime must be an integer before endTime");
    }
    if (params.endTime <= now) {
      throw validationError("INVALID_PARAMS", `endTime ${params.endTime} is not in the future`);
    }
    if (!params.isPublic && !params.resolver) {
      throw validationError("INVALID_PARAMS", "Private pools need a resolver");
    }

    const liquidity = toAmount(params.initialLiquidity, "initialLiquidity");
    if (liquidity.isZero()) {
      throw validationError("ZERO_AMOUNT", "initialLiquidity must be positive");
    }
    for (let i = 0; i < n - 1; i++) {
      if (mulDiv(liquidity, new Decimal(pcts[i]), new Decimal(100)).isZero()) {
        throw validationError(
          "INVALID_PARAMS",
          `Initial liquidity ${liquidity.toString()} leaves option ${i + 1} unfunded`
        );
      }
    }
    return liquidity;
  }

  private forwardLiquidity(creator: string, pool: string, amount: Decimal): void {
    const { ledger } = this.options;
    const before = ledger.balanceOf(pool);
    ledger.transfer(creator, pool, amount);
    const received = ledger.balanceOf(pool).minus(before);
    if (!received.eq(amount)) {
      throw externalError(
        "TRANSFER_MISMATCH",
        `Pool ${pool} received ${received.toString()} of ${amount.toString()}`
      );
    }
  }
}
