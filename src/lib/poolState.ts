/**
 * The single mutable record owned by one pool.
 *
 * Per-option arrays are indexed by `option - 1`. Everything a call can
 * change lives here, so a call snapshot is one `clonePoolState` and a
 * rollback is putting the snapshot back.
 */

import { Decimal } from "decimal.js";
import type { ExternalSource } from "./collaborators";
import { ZERO } from "./fixedPoint";
import { OrderBook } from "./orderBook";
import type { SettlementShares } from "./pool-common";

export interface DisputeRecord {
  disputedWinner: number;
  disputer: string;
  fee: Decimal;
  originalResolver: string;
  oracle: ExternalSource;
  openedAt: number;
}

export interface PoolState {
  numberOfOptions: number;
  optionFunds: Decimal[];
  optionVotes: Decimal[];
  allFunds: Decimal;
  allVotes: Decimal;

  userVotes: Map<string, Decimal[]>;
  userLiquidity: Map<string, Decimal>;
  totalLiquidity: Decimal;

  /** Shares locked in resting sells */
  sellEscrow: Map<string, Decimal[]>;
  /** Collateral locked in resting buys */
  buyEscrow: Map<string, Decimal[]>;
  openOrders: Map<string, Set<string>>;
  book: OrderBook;

  accruedExecutionFees: Decimal;
  accruedCreatorFees: Decimal;

  finalized: boolean;
  closedAt: number;
  shares: SettlementShares | null;
  resolver: string;
  winner: number;
  dispute: DisputeRecord | null;
  /** Oracle spawned at close for public pools */
  publicOracle: ExternalSource | null;
  resolved: boolean;
  claimed: Set<string>;
}

export function createPoolState(numberOfOptions: number, book: OrderBook, resolver: string): PoolState {
  return {
    numberOfOptions,
    optionFunds: zeros(numberOfOptions),
    optionVotes: zeros(numberOfOptions),
    allFunds: ZERO,
    allVotes: ZERO,
    userVotes: new Map(),
    userLiquidity: new Map(),
    totalLiquidity: ZERO,
    sellEscrow: new Map(),
    buyEscrow: new Map(),
    openOrders: new Map(),
    book,
    accruedExecutionFees: ZERO,
    accruedCreatorFees: ZERO,
    finalized: false,
    closedAt: 0,
    shares: null,
    resolver,
    winner: 0,
    dispute: null,
    publicOracle: null,
    resolved: false,
    claimed: new Set(),
  };
}

export function clonePoolState(state: PoolState): PoolState {
  return {
    ...state,
    optionFunds: [...state.optionFunds],
    optionVotes: [...state.optionVotes],
    userVotes: cloneVectorMap(state.userVotes),
    userLiquidity: new Map(state.userLiquidity),
    sellEscrow: cloneVectorMap(state.sellEscrow),
    buyEscrow: cloneVectorMap(state.buyEscrow),
    openOrders: new Map(Array.from(state.openOrders, ([user, ids]) => [user, new Set(ids)])),
    book: state.book.clone(),
    shares: state.shares ? { ...state.shares } : null,
    dispute: state.dispute ? { ...state.dispute } : null,
    claimed: new Set(state.claimed),
  };
}

// ----------------------------------------------------------------------------
// Per-user vectors
// ----------------------------------------------------------------------------

export function getVector(map: Map<string, Decimal[]>, user: string, numberOfOptions: number): Decimal[] {
  let vector = map.get(user);
  if (!vector) {
    vector = zeros(numberOfOptions);
    map.set(user, vector);
  }
  return vector;
}

export function readVector(map: Map<string, Decimal[]>, user: string, option: number): Decimal {
  return map.get(user)?.[option - 1] ?? ZERO;
}

export function addTo(map: Map<string, Decimal[]>, user: string, option: number, delta: Decimal, n: number): void {
  const vector = getVector(map, user, n);
  const next = vector[option - 1].plus(delta);
  if (next.isNegative()) {
    throw new Error(`Ledger underflow for ${user} on option ${option}`);
  }
  vector[option - 1] = next;
}

export function hasOpenEscrow(state: PoolState, user: string): boolean {
  const shares = state.sellEscrow.get(user) ?? [];
  const collateral = state.buyEscrow.get(user) ?? [];
  return shares.some(v => v.gt(0)) || collateral.some(v => v.gt(0));
}

/** Votes held plus votes locked in resting sells. */
export function stakeOf(state: PoolState, user: string, option: number): Decimal {
  return readVector(state.userVotes, user, option).plus(readVector(state.sellEscrow, user, option));
}

export function trackOrder(state: PoolState, maker: string, orderId: string): void {
  let ids = state.openOrders.get(maker);
  if (!ids) {
    ids = new Set();
    state.openOrders.set(maker, ids);
  }
  ids.add(orderId);
}

export function untrackOrder(state: PoolState, maker: string, orderId: string): void {
  const ids = state.openOrders.get(maker);
  if (!ids) return;
  ids.delete(orderId);
  if (ids.size === 0) state.openOrders.delete(maker);
}

export function zeros(n: number): Decimal[] {
  return new Array<Decimal>(n).fill(ZERO);
}

function cloneVectorMap(map: Map<string, Decimal[]>): Map<string, Decimal[]> {
  return new Map(Array.from(map, ([user, vector]) => [user, [...vector]]));
}
