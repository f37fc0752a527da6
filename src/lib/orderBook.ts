/**
 * Per-pool limit order book.
 *
 * Every (option, price tick) pair owns a sell queue and a buy queue.
 * An existence index maps (option, tick, orderId) to the order's queue
 * handle. Per option the book remembers the cheapest tick with resting
 * sells and the priciest tick with resting buys; the pointers move eagerly
 * when an order improves them and lazily (skipping emptied ticks) when read.
 */

import { Decimal } from "decimal.js";
import { createHash } from "crypto";
import { authorizationError, stateError, validationError } from "./errors";
import { PRICE_SCALE, ZERO, mulDiv } from "./fixedPoint";
import { OrderQueue, type OrderHandle } from "./orderQueue";
import type { BookLevel, RestingOrder, Side } from "./pool-common";

interface TickLevel {
  sell: OrderQueue;
  buy: OrderQueue;
}

export interface OrderBookOptions {
  numberOfOptions: number;
  tickSpacing: Decimal;
  maxPrice: Decimal;
}

export class OrderBook {
  readonly numberOfOptions: number;
  readonly tickSpacing: Decimal;
  readonly maxPrice: Decimal;

  private levels = new Map<string, TickLevel>();
  private index = new Map<string, OrderHandle>();
  private bestSell: (Decimal | null)[];
  private bestBuy: (Decimal | null)[];
  private sequence = 0;

  constructor(options: OrderBookOptions) {
    this.numberOfOptions = options.numberOfOptions;
    this.tickSpacing = options.tickSpacing;
    this.maxPrice = options.maxPrice;
    this.bestSell = new Array<Decimal | null>(options.numberOfOptions).fill(null);
    this.bestBuy = new Array<Decimal | null>(options.numberOfOptions).fill(null);
  }

  // -------------------------------------------------------------------------
  // Validation
  // -------------------------------------------------------------------------

  validateOption(option: number): void {
    if (!Number.isInteger(option) || option < 1 || option > this.numberOfOptions) {
      throw validationError("INVALID_OPTION", `Option ${option} is outside 1..${this.numberOfOptions}`);
    }
  }

  validatePrice(price: Decimal): void {
    if (!price.isInteger() || price.lte(0) || price.gt(this.maxPrice)) {
      throw validationError(
        "INVALID_PRICE",
        `Price ${price.toString()} must be within (0, ${this.maxPrice.toString()}]`
      );
    }
    if (!price.mod(this.tickSpacing).isZero()) {
      throw validationError(
        "MISALIGNED_PRICE",
        `Price ${price.toString()} is not a multiple of tick spacing ${this.tickSpacing.toString()}`
      );
    }
  }

  // -------------------------------------------------------------------------
  // Placement
  // -------------------------------------------------------------------------

  placeSell(option: number, price: Decimal, shares: Decimal, maker: string, placedAt: number): RestingOrder {
    this.validateOption(option);
    this.validatePrice(price);
    if (shares.lte(0)) {
      throw validationError("ZERO_AMOUNT", "Sell order quantity must be positive");
    }
    return this.insert("SELL", option, price, shares, maker, placedAt);
  }

  placeBuy(option: number, price: Decimal, collateral: Decimal, maker: string, placedAt: number): RestingOrder {
    this.validateOption(option);
    this.validatePrice(price);
    if (collateral.lte(0)) {
      throw validationError("ZERO_AMOUNT", "Buy order amount must be positive");
    }
    if (mulDiv(collateral, PRICE_SCALE, price).isZero()) {
      throw validationError(
        "DUST_ORDER",
        `Buy amount ${collateral.toString()} cannot buy a single share at ${price.toString()}`
      );
    }
    return this.insert("BUY", option, price, collateral, maker, placedAt);
  }

  // -------------------------------------------------------------------------
  // Cancellation
  // -------------------------------------------------------------------------

  /**
   * Remove a resting order on behalf of `caller`.
   *
   * Buy orders may only be cancelled by their maker. Sell orders carry no
   * caller check: their escrowed shares always go back to the maker.
   */
  cancel(side: Side, option: number, price: Decimal, orderId: string, caller: string): RestingOrder {
    this.validateOption(option);
    this.validatePrice(price);
    const order = this.lookup(side, option, price, orderId);
    if (!order) {
      throw stateError("ORDER_NOT_FOUND", `No ${side} order ${orderId} for option ${option} at ${price.toString()}`);
    }
    if (side === "BUY" && order.maker !== caller) {
      throw authorizationError("NOT_MAKER", `Only ${order.maker} may cancel buy order ${orderId}`);
    }
    return this.removeOrder(order);
  }

  // -------------------------------------------------------------------------
  // Fills
  // -------------------------------------------------------------------------

  /** Decrement a resting order in place. */
  reduce(order: RestingOrder, amount: Decimal): RestingOrder {
    const handle = this.handleOf(order);
    return this.queueOf(order.side, order.option, order.price).reduce(handle, amount);
  }

  removeOrder(order: RestingOrder): RestingOrder {
    const handle = this.handleOf(order);
    const removed = this.queueOf(order.side, order.option, order.price).remove(handle);
    this.index.delete(this.indexKey(order.option, order.price, order.side, order.orderId));
    return removed;
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  lookup(side: Side, option: number, price: Decimal, orderId: string): RestingOrder | undefined {
    const handle = this.index.get(this.indexKey(option, price, side, orderId));
    if (!handle) return undefined;
    return this.levels.get(this.levelKey(option, price))?.[side === "SELL" ? "sell" : "buy"].get(handle);
  }

  /** Oldest live order at a tick. */
  oldest(side: Side, option: number, price: Decimal): RestingOrder | undefined {
    const queue = this.existingQueue(side, option, price);
    if (!queue) return undefined;
    const handle = queue.first();
    return handle ? queue.get(handle) : undefined;
  }

  ordersAt(side: Side, option: number, price: Decimal): RestingOrder[] {
    const queue = this.existingQueue(side, option, price);
    return queue ? Array.from(queue.orders()) : [];
  }

  quantityAt(side: Side, option: number, price: Decimal): Decimal {
    return this.existingQueue(side, option, price)?.totalQuantity() ?? ZERO;
  }

  /** Cheapest tick with live sell interest, or null. */
  bestSellTick(option: number): Decimal | null {
    const slot = option - 1;
    let tick = this.bestSell[slot];
    while (tick !== null && this.isEmptyAt("SELL", option, tick)) {
      const next = tick.plus(this.tickSpacing);
      tick = next.gt(this.maxPrice) ? null : next;
    }
    this.bestSell[slot] = tick;
    return tick;
  }

  /** Priciest tick with live buy interest, or null. */
  bestBuyTick(option: number): Decimal | null {
    const slot = option - 1;
    let tick = this.bestBuy[slot];
    while (tick !== null && this.isEmptyAt("BUY", option, tick)) {
      const next = tick.minus(this.tickSpacing);
      tick = next.lte(0) ? null : next;
    }
    this.bestBuy[slot] = tick;
    return tick;
  }

  /** Live levels for one side, best price first. */
  depth(side: Side, option: number): BookLevel[] {
    const levels: BookLevel[] = [];
    let tick = side === "SELL" ? this.bestSellTick(option) : this.bestBuyTick(option);
    while (tick !== null && tick.gt(0) && tick.lte(this.maxPrice)) {
      const queue = this.existingQueue(side, option, tick);
      if (queue && !queue.isEmpty()) {
        levels.push({ price: tick, quantity: queue.totalQuantity(), orderCount: queue.size });
      }
      tick = side === "SELL" ? tick.plus(this.tickSpacing) : tick.minus(this.tickSpacing);
    }
    return levels;
  }

  get liveOrderCount(): number {
    return this.index.size;
  }

  clone(): OrderBook {
    const copy = new OrderBook({
      numberOfOptions: this.numberOfOptions,
      tickSpacing: this.tickSpacing,
      maxPrice: this.maxPrice,
    });
    for (const [key, level] of this.levels) {
      copy.levels.set(key, { sell: level.sell.clone(), buy: level.buy.clone() });
    }
    copy.index = new Map(this.index);
    copy.bestSell = [...this.bestSell];
    copy.bestBuy = [...this.bestBuy];
    copy.sequence = this.sequence;
    return copy;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private insert(
    side: Side,
    option: number,
    price: Decimal,
    quantity: Decimal,
    maker: string,
    placedAt: number
  ): RestingOrder {
    const sequence = this.sequence + 1;
    const orderId = deriveOrderId(price, sequence, maker);
    const key = this.indexKey(option, price, side, orderId);
    if (this.index.has(key)) {
      throw stateError("DUPLICATE_ORDER_ID", `Order id ${orderId} already exists`);
    }
    this.sequence = sequence;

    const order: RestingOrder = { orderId, option, price, side, maker, quantity, placedAt, sequence };
    const handle = this.queueOf(side, option, price).append(order);
    this.index.set(key, handle);

    const slot = option - 1;
    if (side === "SELL") {
      const best = this.bestSell[slot];
      if (best === null || price.lt(best)) this.bestSell[slot] = price;
    } else {
      const best = this.bestBuy[slot];
      if (best === null || price.gt(best)) this.bestBuy[slot] = price;
    }
    return order;
  }

  /** Queue for a tick, creating and initializing the level on first use. */
  private queueOf(side: Side, option: number, price: Decimal): OrderQueue {
    const key = this.levelKey(option, price);
    let level = this.levels.get(key);
    if (!level) {
      level = { sell: new OrderQueue(), buy: new OrderQueue() };
      this.levels.set(key, level);
    }
    const queue = side === "SELL" ? level.sell : level.buy;
    if (!queue.isLive()) queue.initialize();
    return queue;
  }

  private existingQueue(side: Side, option: number, price: Decimal): OrderQueue | undefined {
    const level = this.levels.get(this.levelKey(option, price));
    if (!level) return undefined;
    return side === "SELL" ? level.sell : level.buy;
  }

  private isEmptyAt(side: Side, option: number, price: Decimal): boolean {
    const queue = this.existingQueue(side, option, price);
    return !queue || queue.isEmpty();
  }

  private handleOf(order: RestingOrder): OrderHandle {
    const handle = this.index.get(this.indexKey(order.option, order.price, order.side, order.orderId));
    if (!handle) {
      throw stateError("ORDER_NOT_FOUND", `Order ${order.orderId} is not resting`);
    }
    return handle;
  }

  private levelKey(option: number, price: Decimal): string {
    return `${option}:${price.toFixed()}`;
  }

  private indexKey(option: number, price: Decimal, side: Side, orderId: string): string {
    return `${option}:${price.toFixed()}:${side}:${orderId}`;
  }
}

/**
 * Order ids are a digest of price, book sequence and maker.
 */
export function deriveOrderId(price: Decimal, sequence: number, maker: string): string {
  return createHash("sha256")
    .update(`${price.toFixed()}:${sequence}:${maker}`)
    .digest("hex")
    .slice(0, 32);
}
