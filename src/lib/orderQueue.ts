/**
 * FIFO queue of resting orders at one price tick.
 *
 * Nodes live in an arena indexed by slot number. Slot 0 is the head
 * sentinel and slot 1 the tail sentinel; live orders sit between them in
 * insertion order. Freed slots are recycled through a free list and bump
 * their generation, so a handle taken before the slot was reused no longer
 * resolves.
 */

import { Decimal } from "decimal.js";
import { stateError } from "./errors";
import { ZERO } from "./fixedPoint";
import type { RestingOrder } from "./pool-common";

export interface OrderHandle {
  readonly index: number;
  readonly generation: number;
}

interface QueueNode {
  prev: number;
  next: number;
  generation: number;
  order: RestingOrder | null;
}

const HEAD = 0;
const TAIL = 1;
const NONE = -1;

export class OrderQueue {
  private nodes: QueueNode[] = [];
  private freeList: number[] = [];
  private live = false;
  private count = 0;
  private total: Decimal = ZERO;

  initialize(): void {
    if (this.live) {
      throw stateError("QUEUE_ALREADY_LIVE", "Queue is already initialized");
    }
    this.nodes = [
      { prev: NONE, next: TAIL, generation: 0, order: null },
      { prev: HEAD, next: NONE, generation: 0, order: null },
    ];
    this.freeList = [];
    this.count = 0;
    this.total = ZERO;
    this.live = true;
  }

  isLive(): boolean {
    return this.live;
  }

  isEmpty(): boolean {
    return !this.live || this.nodes[HEAD].next === TAIL;
  }

  get size(): number {
    return this.count;
  }

  /** Sum of live order quantities. */
  totalQuantity(): Decimal {
    return this.total;
  }

  append(order: RestingOrder): OrderHandle {
    this.assertLive();
    let index: number;
    const recycled = this.freeList.pop();
    if (recycled !== undefined) {
      index = recycled;
    } else {
      index = this.nodes.length;
      this.nodes.push({ prev: NONE, next: NONE, generation: 0, order: null });
    }

    const node = this.nodes[index];
    const last = this.nodes[TAIL].prev;
    node.prev = last;
    node.next = TAIL;
    node.order = order;
    this.nodes[last].next = index;
    this.nodes[TAIL].prev = index;

    this.count++;
    this.total = this.total.plus(order.quantity);
    return { index, generation: node.generation };
  }

  remove(handle: OrderHandle): RestingOrder {
    const node = this.resolve(handle);
    const order = node.order;
    if (!order) {
      throw stateError("INVALID_HANDLE", `Slot ${handle.index} holds no order`);
    }

    this.nodes[node.prev].next = node.next;
    this.nodes[node.next].prev = node.prev;
    node.prev = NONE;
    node.next = NONE;
    node.order = null;
    node.generation++;
    this.freeList.push(handle.index);

    this.count--;
    this.total = this.total.minus(order.quantity);
    return order;
  }

  /**
   * Decrement a live order's quantity. The order stays queued even at zero;
   * the caller decides when to remove it.
   */
  reduce(handle: OrderHandle, amount: Decimal): RestingOrder {
    const order = this.get(handle);
    if (!order) {
      throw stateError("INVALID_HANDLE", `Slot ${handle.index} holds no order`);
    }
    if (amount.gt(order.quantity)) {
      throw stateError("INVALID_HANDLE", `Cannot reduce order ${order.orderId} below zero`);
    }
    order.quantity = order.quantity.minus(amount);
    this.total = this.total.minus(amount);
    return order;
  }

  get(handle: OrderHandle): RestingOrder | undefined {
    if (!this.isValidHandle(handle)) return undefined;
    return this.nodes[handle.index].order ?? undefined;
  }

  first(): OrderHandle | null {
    if (this.isEmpty()) return null;
    return this.handleAt(this.nodes[HEAD].next);
  }

  next(handle: OrderHandle): OrderHandle | null {
    const node = this.resolve(handle);
    return node.next === TAIL ? null : this.handleAt(node.next);
  }

  /** Live orders, oldest first. */
  *orders(): IterableIterator<RestingOrder> {
    if (!this.live) return;
    let cursor = this.nodes[HEAD].next;
    while (cursor !== TAIL) {
      const node = this.nodes[cursor];
      if (node.order) yield node.order;
      cursor = node.next;
    }
  }

  clone(): OrderQueue {
    const copy = new OrderQueue();
    copy.nodes = this.nodes.map(n => ({
      prev: n.prev,
      next: n.next,
      generation: n.generation,
      order: n.order ? { ...n.order } : null,
    }));
    copy.freeList = [...this.freeList];
    copy.live = this.live;
    copy.count = this.count;
    copy.total = this.total;
    return copy;
  }

  private handleAt(index: number): OrderHandle {
    return { index, generation: this.nodes[index].generation };
  }

  private isValidHandle(handle: OrderHandle): boolean {
    return (
      this.live &&
      handle.index !== HEAD &&
      handle.index !== TAIL &&
      handle.index >= 0 &&
      handle.index < this.nodes.length &&
      this.nodes[handle.index].generation === handle.generation
    );
  }

  private resolve(handle: OrderHandle): QueueNode {
    this.assertLive();
    if (handle.index === HEAD || handle.index === TAIL) {
      throw stateError("INVALID_HANDLE", "Sentinel nodes cannot be addressed");
    }
    if (!this.isValidHandle(handle)) {
      throw stateError("INVALID_HANDLE", `Stale or unknown handle ${handle.index}@${handle.generation}`);
    }
    return this.nodes[handle.index];
  }

  private assertLive(): void {
    if (!this.live) {
      throw stateError("INVALID_HANDLE", "Queue has not been initialized");
    }
  }
}
