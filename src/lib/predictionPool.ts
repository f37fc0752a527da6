/**
 * Prediction Pool
 *
 * One market: options priced on a bonding curve by their share of pooled
 * collateral, a limit order book for trading option shares, and the
 * close → winner/dispute → claim settlement flow.
 *
 * Every public mutation runs through `_run`, which makes the call atomic:
 * state is snapshotted on entry, transfers made during the call are
 * journaled, and events are buffered. A thrown error restores the
 * snapshot, reverses the journal and drops the buffer. Only a committed
 * call reaches the logger or launches an oracle.
 */

import { Decimal } from "decimal.js";
import { amountRequired, currentPrice, impactedPrice } from "./bondingCurve";
import type { Clock } from "./clock";
import type { ExternalSource, FeeBurner, OracleFactory, TokenLedger } from "./collaborators";
import type { PoolConfig } from "./config";
import {
  authorizationError,
  externalError,
  isPoolError,
  stateError,
  validationError,
} from "./errors";
import { PRICE_SCALE, ZERO, mulDiv, sum, toAmount, type DecimalInput } from "./fixedPoint";
import { OrderBook } from "./orderBook";
import { createSweepContext, drainBuys, drainSells, sweepEnter, syncEvent, type SweepContext } from "./orderSweep";
import type {
  BookLevel,
  CancelResult,
  ClaimResult,
  EntryResult,
  EscrowSnapshot,
  LiquidityResult,
  OrderPlacementResult,
  PayoutProjection,
  PoolPhase,
  PoolStatus,
  RestingOrder,
  SettlementShares,
  Side,
} from "./pool-common";
import type { PoolEvent, PoolLogger } from "./poolLogger";
import {
  addTo,
  clonePoolState,
  createPoolState,
  hasOpenEscrow,
  readVector,
  stakeOf,
  trackOrder,
  untrackOrder,
  zeros,
  type DisputeRecord,
  type PoolState,
} from "./poolState";
import {
  computePayout,
  computeSettlementShares,
  disputeFeeFor,
  isStalled,
  leadingOption,
  oracleCountFor,
} from "./settlement";

// ============================================================================
// Construction Types
// ============================================================================

export interface PredictionPoolDeps {
  ledger: TokenLedger;
  logger: PoolLogger;
  clock: Clock;
  oracleFactory: OracleFactory;
  feeBurner: FeeBurner;
}

export interface PredictionPoolInit {
  address: string;
  creator: string;
  numberOfOptions: number;
  startTime: number;
  endTime: number;
  isPublic: boolean;
  /** Resolver of a private pool; ignored for public pools until close spawns an oracle */
  resolver: string;
  /** Receives the platform's fee share when the burner refuses it */
  platformAddress: string;
  uri: string;
  /** Already held by the pool's address on the ledger */
  initialLiquidity: Decimal;
  liquidityPercentages: number[];
  config: PoolConfig;
}

interface JournalEntry {
  from: string;
  to: string;
  amount: Decimal;
}

/** Per-call buffers. */
interface CallFrame {
  events: PoolEvent[];
  journal: JournalEntry[];
  /** Effects on collaborators held back until the call commits, and their undo. */
  onCommit: Array<() => void>;
  onAbort: Array<() => void>;
}

/** What the first successful claim does before paying out. */
type Resolution =
  | { kind: "ALREADY_RESOLVED"; winner: number; winningShare: Decimal }
  | { kind: "DIRECT"; winner: number; winningShare: Decimal }
  | {
      kind: "DISPUTE_FINAL";
      winner: number;
      winningShare: Decimal;
      outcome: "UPHELD" | "OVERTURNED";
      feeRecipient: string;
      dispute: DisputeRecord;
    }
  | { kind: "DISPUTE_STALLED"; winner: number; winningShare: Decimal; dispute: DisputeRecord }
  | { kind: "PUBLIC_FINAL"; winner: number; winningShare: Decimal }
  | { kind: "PUBLIC_STALLED"; winner: number; winningShare: Decimal; oracle: ExternalSource; refund: Decimal };

// ============================================================================
// Prediction Pool
// ============================================================================

export class PredictionPool {
  readonly address: string;
  readonly creator: string;
  readonly numberOfOptions: number;
  readonly startTime: number;
  readonly endTime: number;
  readonly isPublic: boolean;
  readonly platformAddress: string;
  readonly uri: string;
  readonly config: PoolConfig;

  private readonly deps: PredictionPoolDeps;
  private state: PoolState;
  private busy = false;
  /**
   * Oracle refunds already received. Kept outside the snapshot: a refund
   * cannot be taken back from the oracle, so a retried claim reuses it.
   */
  private readonly refunds = new Map<string, Decimal>();

  constructor(init: PredictionPoolInit, deps: PredictionPoolDeps) {
    this.address = init.address;
    this.creator = init.creator;
    this.numberOfOptions = init.numberOfOptions;
    this.startTime = init.startTime;
    this.endTime = init.endTime;
    this.isPublic = init.isPublic;
    this.platformAddress = init.platformAddress;
    this.uri = init.uri;
    this.config = init.config;
    this.deps = deps;

    if (init.initialLiquidity.lte(0)) {
      throw validationError("DEGENERATE_POOL", "Initial liquidity must be positive");
    }
    if (init.liquidityPercentages.length !== init.numberOfOptions) {
      throw validationError("LENGTH_MISMATCH", "One liquidity percentage is required per option");
    }

    const book = new OrderBook({
      numberOfOptions: init.numberOfOptions,
      tickSpacing: init.config.tickSpacing,
      maxPrice: init.config.maxPrice,
    });
    this.state = createPoolState(init.numberOfOptions, book, init.isPublic ? "" : init.resolver);
    this._seedLiquidity(init.initialLiquidity, init.liquidityPercentages);
  }

  // -------------------------------------------------------------------------
  // Entry
  // -------------------------------------------------------------------------

  /**
   * Buy shares of `option` with `amount` collateral, taking resting sells
   * and walking the curve. Once the sale window has closed only resting
   * sells can be taken.
   */
  enterOption(wallet: string, option: number, amount: DecimalInput): EntryResult {
    return this._run(frame => {
      const amt = this._positiveAmount(amount, "amount");
      this.state.book.validateOption(option);
      this._requireTrading();

      this._pull(frame, wallet, amt);
      const ctx = createSweepContext(this.state, this.config);
      const result = sweepEnter(ctx, option, wallet, amt, this._entryMode());
      this._settleContext(frame, ctx);
      return result;
    });
  }

  /** The result `enterOption` would return right now, without changing anything. */
  quoteEnterOption(option: number, amount: DecimalInput, wallet = "quote"): EntryResult {
    const amt = this._positiveAmount(amount, "amount");
    this.state.book.validateOption(option);
    this._requireTrading();
    const ctx = createSweepContext(clonePoolState(this.state), this.config);
    return sweepEnter(ctx, option, wallet, amt, this._entryMode());
  }

  /**
   * Add collateral to every option in proportion to current funds. The
   * wallet receives `amount` votes in each option and `amount` liquidity.
   */
  enterLiquidity(wallet: string, amount: DecimalInput): LiquidityResult {
    return this._run(frame => {
      const amt = this._positiveAmount(amount, "amount");
      this._requireSaleLive();

      this._pull(frame, wallet, amt);
      const perOption = this._splitProportionally(amt);
      this._creditCompleteSet(wallet, amt, perOption);

      frame.events.push({ type: "LIQUIDITY_ENTERED", data: { baseAmount: amt, wallet } });
      frame.events.push(syncEvent(this.state));
      return { wallet, amount: amt, perOption, votes: amt };
    });
  }

  // -------------------------------------------------------------------------
  // Limit Orders
  // -------------------------------------------------------------------------

  /**
   * Offer `shares` of `option` at `price`. Matches resting buys at or above
   * the price first; the remainder rests with its shares escrowed.
   */
  placeSellOrder(maker: string, option: number, price: DecimalInput, shares: DecimalInput): OrderPlacementResult {
    return this._run(frame => {
      const qty = this._positiveAmount(shares, "shares");
      const tick = toAmount(price, "price");
      const { book } = this.state;
      book.validateOption(option);
      book.validatePrice(tick);
      this._requireTrading();

      const held = readVector(this.state.userVotes, maker, option);
      if (held.lt(qty)) {
        throw validationError(
          "INSUFFICIENT_SHARES",
          `${maker} holds ${held.toString()} shares of option ${option}, cannot sell ${qty.toString()}`
        );
      }
      addTo(this.state.userVotes, maker, option, qty.neg(), this.numberOfOptions);

      const ctx = createSweepContext(this.state, this.config);
      const drained = drainBuys(ctx, option, maker, qty, tick);
      const rest = qty.minus(drained.consumed);

      let resting: RestingOrder | null = null;
      if (rest.gt(0)) {
        resting = book.placeSell(option, tick, rest, maker, this.deps.clock.now());
        addTo(this.state.sellEscrow, maker, option, rest, this.numberOfOptions);
        trackOrder(this.state, maker, resting.orderId);
        ctx.events.push({ type: "SELL_ORDER_PLACED", data: this._placedData(resting) });
      }

      this._settleContext(frame, ctx);
      return {
        side: "SELL",
        option,
        price: tick,
        maker,
        fills: drained.fills,
        matched: drained.consumed,
        resting,
        refunded: ZERO,
      };
    });
  }

  /**
   * Bid `amount` collateral for `option` shares at `price`. Matches resting
   * sells at or below the price first; a remainder that can still buy one
   * share rests with its collateral escrowed, a smaller one is refunded.
   */
  placeBuyOrder(maker: string, option: number, price: DecimalInput, amount: DecimalInput): OrderPlacementResult {
    return this._run(frame => {
      const amt = this._positiveAmount(amount, "amount");
      const tick = toAmount(price, "price");
      const { book } = this.state;
      book.validateOption(option);
      book.validatePrice(tick);
      this._requireTrading();

      this._pull(frame, maker, amt);
      const ctx = createSweepContext(this.state, this.config);
      const drained = drainSells(ctx, option, maker, amt, tick);
      const rest = amt.minus(drained.consumed);

      let resting: RestingOrder | null = null;
      let refunded = ZERO;
      if (rest.gt(0)) {
        const restable = mulDiv(rest, PRICE_SCALE, tick).gt(0);
        if (restable || drained.fills.length === 0) {
          // With nothing matched, placeBuy itself rejects a dust remainder.
          resting = book.placeBuy(option, tick, rest, maker, this.deps.clock.now());
          addTo(this.state.buyEscrow, maker, option, rest, this.numberOfOptions);
          trackOrder(this.state, maker, resting.orderId);
          ctx.events.push({ type: "BUY_ORDER_PLACED", data: this._placedData(resting) });
        } else {
          refunded = rest;
          ctx.payouts.push({ to: maker, amount: rest });
        }
      }

      this._settleContext(frame, ctx);
      return {
        side: "BUY",
        option,
        price: tick,
        maker,
        fills: drained.fills,
        matched: drained.consumed,
        resting,
        refunded,
      };
    });
  }

  /**
   * Cancel a resting sell. Any caller may do this; the escrowed shares
   * always return to the maker.
   */
  cancelSellOrder(caller: string, option: number, price: DecimalInput, orderId: string): CancelResult {
    return this._run(frame => this._cancel(frame, "SELL", caller, option, toAmount(price, "price"), orderId));
  }

  /** Cancel a resting buy. Only the maker may; the escrowed collateral is refunded. */
  cancelBuyOrder(caller: string, option: number, price: DecimalInput, orderId: string): CancelResult {
    return this._run(frame => this._cancel(frame, "BUY", caller, option, toAmount(price, "price"), orderId));
  }

  cancelSellOrders(
    caller: string,
    options: readonly number[],
    prices: readonly DecimalInput[],
    orderIds: readonly string[]
  ): CancelResult[] {
    return this._cancelBatch("SELL", caller, options, prices, orderIds);
  }

  cancelBuyOrders(
    caller: string,
    options: readonly number[],
    prices: readonly DecimalInput[],
    orderIds: readonly string[]
  ): CancelResult[] {
    return this._cancelBatch("BUY", caller, options, prices, orderIds);
  }

  // -------------------------------------------------------------------------
  // Settlement
  // -------------------------------------------------------------------------

  /**
   * Finalize the pool and lock in the settlement shares. Anyone may close
   * once the sale window has ended; before that only the creator or the
   * resolver may.
   */
  closePool(caller: string): SettlementShares {
    return this._run(frame => {
      const now = this.deps.clock.now();
      if (this.state.finalized) {
        throw stateError("POOL_CLOSED", "Pool is already closed");
      }
      if (now < this.endTime && caller !== this.creator && caller !== this.state.resolver) {
        throw authorizationError("NOT_AUTHORIZED", `${caller} may not close the pool before ${this.endTime}`);
      }

      const { state } = this;
      const shares = computeSettlementShares(this.config.fees, state.allFunds);
      state.shares = shares;
      state.finalized = true;
      state.closedAt = now;
      frame.events.push({
        type: "POOL_CLOSED",
        data: { poolStatus: "FINALIZED", allFunds: state.allFunds, closedBy: caller },
      });

      const creatorAmount = shares.creatorShare.plus(state.accruedCreatorFees);
      this._push(frame, this.creator, creatorAmount);
      frame.events.push({ type: "CREATOR_PAID", data: { wallet: this.creator, amount: creatorAmount } });

      if (this.isPublic) {
        const count = oracleCountFor(this.config, disputeFeeFor(this.config, state.allFunds));
        const oracle = this._spawnOracle(frame, count, shares.resolverShare);
        state.publicOracle = oracle;
        state.resolver = oracle.address;
      }

      const platformAmount = shares.platformShare.plus(state.accruedExecutionFees);
      state.accruedCreatorFees = ZERO;
      state.accruedExecutionFees = ZERO;
      this._disposePlatformShare(frame, platformAmount);
      return { ...shares };
    });
  }

  /** Private pools: the resolver names the winner once the pool is closed. */
  chooseWinner(caller: string, option: number): number {
    return this._run(frame => {
      const { state } = this;
      if (this.isPublic) {
        throw stateError("PUBLIC_POOL", "Public pools are resolved by their oracle");
      }
      if (caller !== state.resolver) {
        throw authorizationError("NOT_RESOLVER", `${caller} is not the resolver`);
      }
      const shares = this._requireClosed();
      if (state.winner !== 0) {
        throw stateError("WINNER_ALREADY_CHOSEN", `Option ${state.winner} was already chosen`);
      }
      if (state.dispute) {
        throw stateError("ALREADY_DISPUTED", "The pool is under dispute");
      }
      state.book.validateOption(option);

      state.winner = option;
      frame.events.push({
        type: "WINNER_CHOSEN",
        data: {
          winnerOption: option,
          platformShare: shares.platformShare,
          liquidityShare: shares.liquidityShare,
          winningShare: shares.winningShare,
        },
      });
      return option;
    });
  }

  /**
   * Private pools: a stakeholder challenges the chosen winner within the
   * dispute window. The fee is held by the pool and an oracle takes over
   * as resolver, funded with the resolver's share.
   */
  openDispute(caller: string): DisputeRecord {
    return this._run(frame => {
      const { state } = this;
      const now = this.deps.clock.now();
      if (this.isPublic) {
        throw stateError("PUBLIC_POOL", "Public pools cannot be disputed");
      }
      const shares = this._requireClosed();
      if (state.dispute) {
        throw stateError("ALREADY_DISPUTED", "The pool has already been disputed");
      }
      if (state.winner === 0) {
        throw stateError("WINNER_NOT_FINALIZED", "No winner has been chosen");
      }
      if (now >= state.closedAt + this.config.disputeWindow) {
        throw stateError("DISPUTE_WINDOW_CLOSED", "The dispute window has elapsed");
      }
      if (!this._hasStake(caller)) {
        throw stateError("NO_STAKE", `${caller} holds no votes or liquidity in this pool`);
      }

      const fee = disputeFeeFor(this.config, state.allFunds);
      if (fee.isZero()) {
        throw validationError("ZERO_AMOUNT", "Pool is too small to carry a dispute fee");
      }
      this._pull(frame, caller, fee);

      const oracle = this._spawnOracle(frame, oracleCountFor(this.config, fee), shares.resolverShare);
      const dispute: DisputeRecord = {
        disputedWinner: state.winner,
        disputer: caller,
        fee,
        originalResolver: state.resolver,
        oracle,
        openedAt: now,
      };
      frame.events.unshift({
        type: "DISPUTE_OPENED",
        data: { caller, currentWinner: state.winner, disputeFee: fee },
      });

      state.dispute = dispute;
      state.winner = 0;
      state.resolver = oracle.address;
      return { ...dispute };
    });
  }

  /**
   * Pay `caller` their share of the liquidity and winning pools. The first
   * successful claim also settles the resolver, the dispute fee and any
   * oracle refund.
   */
  claim(caller: string): ClaimResult {
    return this._run(frame => {
      const { state } = this;
      if (!state.finalized) {
        throw stateError("POOL_NOT_CLOSED", "Claims open once the pool is closed");
      }
      const resolution = this._planResolution();

      if (state.claimed.has(caller)) {
        throw stateError("ALREADY_CLAIMED", `${caller} has already claimed`);
      }
      if (hasOpenEscrow(state, caller)) {
        throw stateError("PENDING_ORDERS", `${caller} must cancel resting orders before claiming`);
      }
      const payout = computePayout(
        state,
        { ...this._lockedShares(), winningShare: resolution.winningShare },
        caller,
        resolution.winner
      );
      if (payout.totalReward.isZero()) {
        throw stateError("NOTHING_TO_CLAIM", `${caller} has nothing to claim`);
      }

      this._applyResolution(frame, resolution);
      state.claimed.add(caller);
      this._push(frame, caller, payout.totalReward);
      frame.events.push({
        type: "CLAIMED",
        data: {
          wallet: caller,
          winnerOption: resolution.winner,
          liquidityReward: payout.liquidityReward,
          reward: payout.reward,
          totalReward: payout.totalReward,
        },
      });
      return {
        wallet: caller,
        winnerOption: resolution.winner,
        liquidityReward: payout.liquidityReward,
        reward: payout.reward,
        totalReward: payout.totalReward,
      };
    });
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  currentPrice(option: number): Decimal {
    this.state.book.validateOption(option);
    return currentPrice(this.state.optionFunds[option - 1], this.state.allFunds);
  }

  prices(): Decimal[] {
    return this.state.optionFunds.map(f => currentPrice(f, this.state.allFunds));
  }

  impactedPrice(option: number, amount: DecimalInput): Decimal {
    this.state.book.validateOption(option);
    return impactedPrice(this.state.optionFunds[option - 1], this.state.allFunds, toAmount(amount));
  }

  /** Collateral needed to lift `option` to `targetPrice` along the curve. */
  amountRequired(option: number, targetPrice: DecimalInput): Decimal {
    const price = this.currentPrice(option);
    return amountRequired(price, toAmount(targetPrice, "targetPrice"), this.state.optionFunds[option - 1], this.state.allFunds);
  }

  /**
   * What `user` would receive if `option` won. Before close this uses the
   * shares the pool's current funds would lock in.
   */
  projectedPayout(user: string, option: number): PayoutProjection {
    this.state.book.validateOption(option);
    const shares = this.state.shares ?? computeSettlementShares(this.config.fees, this.state.allFunds);
    return computePayout(this.state, shares, user, option);
  }

  getOrder(side: Side, option: number, price: DecimalInput, orderId: string): RestingOrder | undefined {
    const order = this.state.book.lookup(side, option, toAmount(price, "price"), orderId);
    return order ? { ...order } : undefined;
  }

  depth(side: Side, option: number): BookLevel[] {
    this.state.book.validateOption(option);
    return this.state.book.depth(side, option);
  }

  escrowOf(user: string): EscrowSnapshot {
    return {
      shares: [...(this.state.sellEscrow.get(user) ?? zeros(this.numberOfOptions))],
      collateral: [...(this.state.buyEscrow.get(user) ?? zeros(this.numberOfOptions))],
    };
  }

  activeOrderCount(user: string): number {
    return this.state.openOrders.get(user)?.size ?? 0;
  }

  votesOf(user: string, option: number): Decimal {
    this.state.book.validateOption(option);
    return readVector(this.state.userVotes, user, option);
  }

  liquidityOf(user: string): Decimal {
    return this.state.userLiquidity.get(user) ?? ZERO;
  }

  optionFunds(): Decimal[] {
    return [...this.state.optionFunds];
  }

  optionVotes(): Decimal[] {
    return [...this.state.optionVotes];
  }

  accruedFees(): { execution: Decimal; creator: Decimal } {
    return { execution: this.state.accruedExecutionFees, creator: this.state.accruedCreatorFees };
  }

  /** Total collateral held in resting buy orders. */
  totalBuyEscrow(): Decimal {
    return sum(Array.from(this.state.buyEscrow.values()).flat());
  }

  settlementShares(): SettlementShares | null {
    return this.state.shares ? { ...this.state.shares } : null;
  }

  getDispute(): DisputeRecord | null {
    return this.state.dispute ? { ...this.state.dispute } : null;
  }

  getOracle(): ExternalSource | null {
    return this.state.dispute?.oracle ?? this.state.publicOracle;
  }

  hasClaimed(user: string): boolean {
    return this.state.claimed.has(user);
  }

  status(): PoolStatus {
    const { state } = this;
    return {
      address: this.address,
      phase: this._phase(),
      numberOfOptions: this.numberOfOptions,
      isPublic: this.isPublic,
      startTime: this.startTime,
      endTime: this.endTime,
      finalized: state.finalized,
      winner: state.winner,
      resolver: state.resolver,
      allFunds: state.allFunds,
      allVotes: state.allVotes,
      totalLiquidity: state.totalLiquidity,
      disputed: state.dispute !== null,
      resolved: state.resolved,
    };
  }

  // -------------------------------------------------------------------------
  // Atomic Call Wrapper
  // -------------------------------------------------------------------------

  private _run<T>(body: (frame: CallFrame) => T): T {
    if (this.busy) {
      throw stateError("REENTRANT_CALL", `Pool ${this.address} is already executing a call`);
    }
    this.busy = true;
    const snapshot = clonePoolState(this.state);
    const frame: CallFrame = { events: [], journal: [], onCommit: [], onAbort: [] };

    let result: T;
    try {
      result = body(frame);
    } catch (error) {
      this.state = snapshot;
      this._unwind(frame.journal);
      for (const undo of frame.onAbort) undo();
      throw error;
    } finally {
      this.busy = false;
    }

    for (const effect of frame.onCommit) effect();
    this.deps.logger.record(this.address, this.deps.clock.now(), frame.events);
    return result;
  }

  private _unwind(journal: JournalEntry[]): void {
    for (let i = journal.length - 1; i >= 0; i--) {
      const { from, to, amount } = journal[i];
      this.deps.ledger.transfer(to, from, amount);
    }
  }

  /** Move collateral and confirm both balances moved by exactly `amount`. */
  private _transfer(frame: CallFrame, from: string, to: string, amount: Decimal): void {
    if (amount.isZero() || from === to) return;
    const { ledger } = this.deps;
    const fromBefore = ledger.balanceOf(from);
    const toBefore = ledger.balanceOf(to);

    try {
      ledger.transfer(from, to, amount);
    } catch (error) {
      // A hook may throw after the ledger has already moved the funds.
      if (!ledger.balanceOf(from).eq(fromBefore)) frame.journal.push({ from, to, amount });
      if (isPoolError(error)) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw externalError("TRANSFER_FAILED", `Transfer of ${amount.toString()} from ${from} to ${to} failed: ${reason}`);
    }
    frame.journal.push({ from, to, amount });

    const sent = fromBefore.minus(ledger.balanceOf(from));
    const received = ledger.balanceOf(to).minus(toBefore);
    if (!sent.eq(amount) || !received.eq(amount)) {
      throw externalError(
        "TRANSFER_MISMATCH",
        `Expected ${amount.toString()} to move from ${from} to ${to}; sent ${sent.toString()}, received ${received.toString()}`
      );
    }
  }

  private _pull(frame: CallFrame, from: string, amount: Decimal): void {
    const balance = this.deps.ledger.balanceOf(from);
    if (balance.lt(amount)) {
      throw validationError(
        "INSUFFICIENT_BALANCE",
        `${from} holds ${balance.toString()}, needs ${amount.toString()}`
      );
    }
    this._transfer(frame, from, this.address, amount);
  }

  private _push(frame: CallFrame, to: string, amount: Decimal): void {
    this._transfer(frame, this.address, to, amount);
  }

  /** Execute a sweep's payouts and adopt its events, closing with a SYNC record. */
  private _settleContext(frame: CallFrame, ctx: SweepContext): void {
    for (const payout of ctx.payouts) this._push(frame, payout.to, payout.amount);
    frame.events.push(...ctx.events, syncEvent(this.state));
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private _seedLiquidity(liquidity: Decimal, percentages: readonly number[]): void {
    const perOption: Decimal[] = [];
    let allocated = ZERO;
    for (let i = 0; i < this.numberOfOptions; i++) {
      const share = i === this.numberOfOptions - 1
        ? liquidity.minus(allocated)
        : mulDiv(liquidity, new Decimal(percentages[i]), new Decimal(100));
      perOption.push(share);
      allocated = allocated.plus(share);
    }
    this._creditCompleteSet(this.creator, liquidity, perOption);
  }

  private _splitProportionally(amount: Decimal): Decimal[] {
    const { optionFunds, allFunds } = this.state;
    const perOption: Decimal[] = [];
    let allocated = ZERO;
    for (let i = 0; i < this.numberOfOptions; i++) {
      const share = i === this.numberOfOptions - 1
        ? amount.minus(allocated)
        : mulDiv(amount, optionFunds[i], allFunds);
      perOption.push(share);
      allocated = allocated.plus(share);
    }
    return perOption;
  }

  /** Fund every option and hand `wallet` `amount` votes in each plus `amount` liquidity. */
  private _creditCompleteSet(wallet: string, amount: Decimal, perOption: readonly Decimal[]): void {
    const { state } = this;
    for (let i = 0; i < this.numberOfOptions; i++) {
      state.optionFunds[i] = state.optionFunds[i].plus(perOption[i]);
      state.optionVotes[i] = state.optionVotes[i].plus(amount);
      addTo(state.userVotes, wallet, i + 1, amount, this.numberOfOptions);
    }
    state.allFunds = state.allFunds.plus(amount);
    state.allVotes = state.allVotes.plus(amount.times(this.numberOfOptions));
    state.userLiquidity.set(wallet, (state.userLiquidity.get(wallet) ?? ZERO).plus(amount));
    state.totalLiquidity = state.totalLiquidity.plus(amount);
  }

  private _cancel(
    frame: CallFrame,
    side: Side,
    caller: string,
    option: number,
    price: Decimal,
    orderId: string
  ): CancelResult {
    const { state } = this;
    const order = state.book.cancel(side, option, price, orderId, caller);
    untrackOrder(state, order.maker, order.orderId);

    if (side === "SELL") {
      addTo(state.sellEscrow, order.maker, option, order.quantity.neg(), this.numberOfOptions);
      addTo(state.userVotes, order.maker, option, order.quantity, this.numberOfOptions);
    } else {
      addTo(state.buyEscrow, order.maker, option, order.quantity.neg(), this.numberOfOptions);
      this._push(frame, order.maker, order.quantity);
    }

    frame.events.push({
      type: side === "SELL" ? "SELL_ORDER_CANCELLED" : "BUY_ORDER_CANCELLED",
      data: {
        orderOption: option,
        orderAmount: order.quantity,
        orderPrice: order.price,
        orderId: order.orderId,
        orderCreator: order.maker,
      },
    });
    return { order: { ...order }, returnedTo: order.maker, returned: order.quantity };
  }

  private _cancelBatch(
    side: Side,
    caller: string,
    options: readonly number[],
    prices: readonly DecimalInput[],
    orderIds: readonly string[]
  ): CancelResult[] {
    return this._run(frame => {
      if (options.length !== prices.length || options.length !== orderIds.length) {
        throw validationError(
          "LENGTH_MISMATCH",
          `Got ${options.length} options, ${prices.length} prices and ${orderIds.length} order ids`
        );
      }
      return options.map((option, i) =>
        this._cancel(frame, side, caller, option, toAmount(prices[i], "price"), orderIds[i])
      );
    });
  }

  private _spawnOracle(frame: CallFrame, oracleCount: number, reward: Decimal): ExternalSource {
    const { oracleFactory } = this.deps;
    const now = this.deps.clock.now();
    const oracle = oracleFactory.createExternalSource({
      requestor: this.address,
      oracleCount,
      reward,
      fixedFee: this.config.oracleFixedFee,
      creator: this.creator,
      endTime: now + this.config.oracleDuration,
      optionCount: this.numberOfOptions,
      metadataURI: this.uri,
    });
    frame.onCommit.push(() => oracleFactory.launch(oracle.address));
    frame.onAbort.push(() => oracleFactory.discard(oracle.address));
    this._push(frame, oracle.address, reward);
    frame.events.push(
      {
        type: "ORACLE_CREATED",
        data: { creatorContract: this.address, createdContract: oracle.address, oracleCount, reward },
      },
      { type: "RESOLVER_SET", data: { resolver: oracle.address } }
    );
    return oracle;
  }

  /**
   * Send the platform's take to the burner. A refused swap must leave the
   * pool's balance untouched, and the amount goes to the platform instead.
   */
  private _disposePlatformShare(frame: CallFrame, amount: Decimal): void {
    if (amount.isZero()) return;
    const { ledger, feeBurner } = this.deps;
    const before = ledger.balanceOf(this.address);
    const result = feeBurner.swapAndBurn(this.address, amount);
    const moved = before.minus(ledger.balanceOf(this.address));

    if (result.ok) {
      if (!moved.eq(amount)) {
        throw externalError("TRANSFER_MISMATCH", `Burner took ${moved.toString()} of ${amount.toString()}`);
      }
      frame.events.push({ type: "FEE_BURNED", data: { amountBurned: result.amountBurned } });
      return;
    }
    if (!moved.isZero()) {
      throw externalError("TRANSFER_MISMATCH", `Failed swap moved ${moved.toString()}: ${result.reason}`);
    }
    this._push(frame, this.platformAddress, amount);
    frame.events.push({ type: "PLATFORM_PAID", data: { wallet: this.platformAddress, amount } });
  }

  /** Decide the winner without side effects; throws while it cannot be decided yet. */
  private _planResolution(): Resolution {
    const { state, config } = this;
    const shares = this._lockedShares();
    const now = this.deps.clock.now();

    if (state.resolved) {
      return { kind: "ALREADY_RESOLVED", winner: state.winner, winningShare: shares.winningShare };
    }

    if (state.publicOracle) {
      const oracle = state.publicOracle;
      if (oracle.winnerFinalized()) {
        return { kind: "PUBLIC_FINAL", winner: oracle.winnerOption(), winningShare: shares.winningShare };
      }
      if (isStalled(oracle, config, now)) {
        const refund = this.refunds.get(oracle.address) ?? this.deps.ledger.balanceOf(oracle.address);
        return {
          kind: "PUBLIC_STALLED",
          winner: leadingOption(state.optionFunds),
          winningShare: shares.winningShare.plus(refund),
          oracle,
          refund,
        };
      }
      throw this._oracleNotFinalized(oracle);
    }

    if (state.dispute) {
      const { dispute } = state;
      const { oracle } = dispute;
      if (oracle.winnerFinalized()) {
        const winner = oracle.winnerOption();
        const upheld = winner === dispute.disputedWinner;
        return {
          kind: "DISPUTE_FINAL",
          winner,
          winningShare: shares.winningShare,
          outcome: upheld ? "UPHELD" : "OVERTURNED",
          feeRecipient: upheld ? dispute.originalResolver : dispute.disputer,
          dispute,
        };
      }
      if (isStalled(oracle, config, now)) {
        return { kind: "DISPUTE_STALLED", winner: dispute.disputedWinner, winningShare: shares.winningShare, dispute };
      }
      throw this._oracleNotFinalized(oracle);
    }

    if (state.winner === 0) {
      throw stateError("WINNER_NOT_FINALIZED", "The resolver has not chosen a winner");
    }
    if (now < state.closedAt + config.disputeWindow) {
      throw stateError("DISPUTE_WINDOW_OPEN", "The dispute window is still open");
    }
    return { kind: "DIRECT", winner: state.winner, winningShare: shares.winningShare };
  }

  private _applyResolution(frame: CallFrame, resolution: Resolution): void {
    const { state } = this;
    const shares = this._lockedShares();

    switch (resolution.kind) {
      case "ALREADY_RESOLVED":
        return;
      case "DIRECT":
        this._push(frame, state.resolver, shares.resolverShare);
        frame.events.push({ type: "RESOLVER_PAID", data: { wallet: state.resolver, amount: shares.resolverShare } });
        break;
      case "DISPUTE_FINAL": {
        const { dispute } = resolution;
        this._push(frame, resolution.feeRecipient, dispute.fee);
        frame.events.push({
          type: "DISPUTE_RESOLVED",
          data: {
            outcome: resolution.outcome,
            winnerOption: resolution.winner,
            feeRecipient: resolution.feeRecipient,
            disputeFee: dispute.fee,
          },
        });
        break;
      }
      case "DISPUTE_STALLED": {
        const { dispute } = resolution;
        const refunded = this._collectRefund(dispute.oracle);
        this._push(frame, dispute.originalResolver, refunded);
        frame.events.push({ type: "RESOLVER_PAID", data: { wallet: dispute.originalResolver, amount: refunded } });
        this._push(frame, dispute.disputer, dispute.fee);
        frame.events.push({
          type: "DISPUTE_RESOLVED",
          data: {
            outcome: "STALLED",
            winnerOption: resolution.winner,
            feeRecipient: dispute.disputer,
            disputeFee: dispute.fee,
          },
        });
        break;
      }
      case "PUBLIC_FINAL":
        break;
      case "PUBLIC_STALLED": {
        const refunded = this._collectRefund(resolution.oracle);
        if (!refunded.eq(resolution.refund)) {
          throw externalError(
            "TRANSFER_MISMATCH",
            `Oracle refunded ${refunded.toString()}, expected ${resolution.refund.toString()}`
          );
        }
        state.shares = { ...shares, winningShare: resolution.winningShare };
        break;
      }
    }

    state.winner = resolution.winner;
    state.resolved = true;
  }

  /** Ask an oracle for its escrow back, once, and confirm the pool received it. */
  private _collectRefund(oracle: ExternalSource): Decimal {
    const collected = this.refunds.get(oracle.address);
    if (collected) return collected;
    const { ledger } = this.deps;
    const before = ledger.balanceOf(this.address);
    const refunded = oracle.refund();
    const received = ledger.balanceOf(this.address).minus(before);
    if (!received.eq(refunded)) {
      throw externalError(
        "TRANSFER_MISMATCH",
        `Oracle reported a refund of ${refunded.toString()} but the pool received ${received.toString()}`
      );
    }
    this.refunds.set(oracle.address, refunded);
    return refunded;
  }

  private _oracleNotFinalized(oracle: ExternalSource) {
    return externalError(
      "ORACLE_NOT_FINALIZED",
      `Oracle ${oracle.address} has not finalized (extensions: ${oracle.timeExtended()})`,
      true
    );
  }

  private _lockedShares(): SettlementShares {
    if (!this.state.shares) {
      throw stateError("POOL_NOT_CLOSED", "Settlement shares are locked at close");
    }
    return this.state.shares;
  }

  private _requireClosed(): SettlementShares {
    if (!this.state.finalized) {
      throw stateError("POOL_NOT_CLOSED", "The pool has not been closed");
    }
    return this._lockedShares();
  }

  private _hasStake(user: string): boolean {
    if (this.liquidityOf(user).gt(0)) return true;
    for (let option = 1; option <= this.numberOfOptions; option++) {
      if (stakeOf(this.state, user, option).gt(0)) return true;
    }
    return false;
  }

  private _positiveAmount(value: DecimalInput, field: string): Decimal {
    const amount = toAmount(value, field);
    if (amount.isZero()) {
      throw validationError("ZERO_AMOUNT", `${field} must be positive`);
    }
    return amount;
  }

  /** Curve sale runs [startTime, endTime). */
  private _requireSaleLive(): void {
    this._requireTrading();
    if (this.deps.clock.now() >= this.endTime) {
      throw stateError("SALE_NOT_LIVE", `Sale window ended at ${this.endTime}`);
    }
  }

  /** Book trading runs from startTime until the pool is closed. */
  private _requireTrading(): void {
    if (this.state.finalized) {
      throw stateError("POOL_CLOSED", "Pool is closed");
    }
    if (this.deps.clock.now() < this.startTime) {
      throw stateError("SALE_NOT_LIVE", `Sale opens at ${this.startTime}`);
    }
  }

  private _entryMode(): "CURVE" | "BOOK_ONLY" {
    return this.deps.clock.now() < this.endTime ? "CURVE" : "BOOK_ONLY";
  }

  private _placedData(order: RestingOrder) {
    return {
      orderOption: order.option,
      orderPrice: order.price,
      orderAmount: order.quantity,
      orderId: order.orderId,
      maker: order.maker,
    };
  }

  private _phase(): PoolPhase {
    const { state } = this;
    const now = this.deps.clock.now();
    if (!state.finalized) {
      if (now < this.startTime) return "PENDING";
      return now < this.endTime ? "OPEN" : "TRADING_ONLY";
    }
    if (state.resolved) return "CLAIMABLE";
    if (state.dispute) return "DISPUTED";
    if (!this.isPublic && state.winner !== 0 && now >= state.closedAt + this.config.disputeWindow) {
      return "CLAIMABLE";
    }
    return "FINALIZED";
  }
}
