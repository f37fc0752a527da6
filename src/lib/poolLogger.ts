/**
 * Structured event log for pools, the factory and spawned oracles.
 *
 * This is the only surface an external indexer reads. Pools stage their
 * records while a call runs and hand them over in one batch when the call
 * commits, so a rejected call leaves no trace here.
 */

import type { Decimal } from "decimal.js";

// ============================================================================
// Event Types
// ============================================================================

export interface OrderPlacedData {
  orderOption: number;
  orderPrice: Decimal;
  orderAmount: Decimal;
  orderId: string;
  maker: string;
}

export interface OrderExecutedData {
  orderOption: number;
  orderPrice: Decimal;
  optionAmount: Decimal;
  baseAmount: Decimal;
  orderId: string;
  maker: string;
  taker: string;
  /** Quantity still resting on the order */
  remaining: Decimal;
}

export interface OrderCancelledData {
  orderOption: number;
  orderAmount: Decimal;
  orderPrice: Decimal;
  orderId: string;
  orderCreator: string;
}

export interface PaymentData {
  wallet: string;
  amount: Decimal;
}

export type PoolEvent =
  | { type: "POOL_CREATED"; data: { poolAddress: string; poolCreator: string; uri: string; isPublic: boolean } }
  | {
      type: "OPTION_ENTERED";
      data: {
        option: number;
        baseAmount: Decimal;
        optionAmount: Decimal;
        wallet: string;
        priceBefore: Decimal;
        priceAfter: Decimal;
      };
    }
  | { type: "LIQUIDITY_ENTERED"; data: { baseAmount: Decimal; wallet: string } }
  | { type: "SELL_ORDER_PLACED"; data: OrderPlacedData }
  | { type: "BUY_ORDER_PLACED"; data: OrderPlacedData }
  | { type: "SELL_ORDER_EXECUTED"; data: OrderExecutedData }
  | { type: "BUY_ORDER_EXECUTED"; data: OrderExecutedData }
  | { type: "SELL_ORDER_CANCELLED"; data: OrderCancelledData }
  | { type: "BUY_ORDER_CANCELLED"; data: OrderCancelledData }
  | { type: "POOL_CLOSED"; data: { poolStatus: "FINALIZED"; allFunds: Decimal; closedBy: string } }
  | {
      type: "WINNER_CHOSEN";
      data: { winnerOption: number; platformShare: Decimal; liquidityShare: Decimal; winningShare: Decimal };
    }
  | { type: "DISPUTE_OPENED"; data: { caller: string; currentWinner: number; disputeFee: Decimal } }
  | {
      type: "DISPUTE_RESOLVED";
      data: {
        outcome: "UPHELD" | "OVERTURNED" | "STALLED";
        winnerOption: number;
        feeRecipient: string;
        disputeFee: Decimal;
      };
    }
  | {
      type: "ORACLE_CREATED";
      data: { creatorContract: string; createdContract: string; oracleCount: number; reward: Decimal };
    }
  | { type: "RESOLVER_SET"; data: { resolver: string } }
  | {
      type: "CLAIMED";
      data: { wallet: string; winnerOption: number; liquidityReward: Decimal; reward: Decimal; totalReward: Decimal };
    }
  | { type: "CREATOR_PAID"; data: PaymentData }
  | { type: "PLATFORM_PAID"; data: PaymentData }
  | { type: "RESOLVER_PAID"; data: PaymentData }
  | { type: "FEE_BURNED"; data: { amountBurned: Decimal } }
  | { type: "SYNC"; data: { optionFunds: Decimal[]; allFunds: Decimal } }
  | {
      type: "EXTERNAL_SOURCE_LAUNCHED";
      data: {
        noOfOracles: number;
        rewardPerOracle: Decimal;
        fixedFee: Decimal;
        totalReward: Decimal;
        startTime: number;
        endTime: number;
        numberOfOptions: number;
        externalSourceURI: string;
        creator: string;
      };
    }
  | { type: "VOTE_CAST"; data: { voter: string; option: number } }
  | { type: "WINNER_CALCULATED"; data: { caller: string; option: number } }
  | { type: "TIME_EXTENDED"; data: { oldEndTime: number; newEndTime: number } }
  | { type: "REFUND_CLAIMED"; data: { claimer: string; refundAmount: Decimal } }
  | { type: "REWARD_CLAIMED"; data: { claimer: string; reward: Decimal } };

export type PoolEventType = PoolEvent["type"];

export type PoolLogEntry = PoolEvent & {
  /** Emitter: pool, factory or oracle address */
  poolAddress: string;
  sequence: number;
  timestamp: number;
};

export type PoolLogListener = (entry: PoolLogEntry) => void;

// ============================================================================
// Pool Logger
// ============================================================================

export class PoolLogger {
  private logs: PoolLogEntry[] = [];
  private listeners: PoolLogListener[] = [];
  private sequence = 0;

  /** Append a batch of events from one emitter, in order. */
  record(poolAddress: string, timestamp: number, events: readonly PoolEvent[]): void {
    for (const event of events) {
      this.sequence++;
      const entry: PoolLogEntry = { ...event, poolAddress, sequence: this.sequence, timestamp };
      this.logs.push(entry);
      for (const listener of this.listeners) listener(entry);
    }
  }

  subscribe(listener: PoolLogListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  getLogs(): readonly PoolLogEntry[] {
    return this.logs;
  }

  ofType<T extends PoolEventType>(type: T): Array<Extract<PoolLogEntry, { type: T }>> {
    return this.logs.filter((e): e is Extract<PoolLogEntry, { type: T }> => e.type === type);
  }

  exportJson(): string {
    return JSON.stringify(this.logs, null, 2);
  }

  clear(): void {
    this.logs = [];
  }
}
