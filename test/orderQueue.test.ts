/**
 * FIFO queue: sentinels, ordering, handle generations.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { Decimal } from "decimal.js";
import { OrderQueue } from "../src/lib/orderQueue";
import type { RestingOrder } from "../src/lib/pool-common";
import { expectDecimalEqual, expectPoolError, tick } from "./poolHarness";

function order(orderId: string, quantity: number): RestingOrder {
  return {
    orderId,
    option: 1,
    price: tick(50),
    side: "SELL",
    maker: "alice",
    quantity: new Decimal(quantity),
    placedAt: 1000,
    sequence: 0,
  };
}

describe("OrderQueue: Lifecycle", () => {
  it("starts dead and empty", () => {
    const queue = new OrderQueue();
    expect(queue.isLive()).toBe(false);
    expect(queue.isEmpty()).toBe(true);
    expect(queue.first()).toBeNull();
  });

  it("refuses a second initialize", () => {
    const queue = new OrderQueue();
    queue.initialize();
    expect(queue.isLive()).toBe(true);
    expectPoolError(() => queue.initialize(), "QUEUE_ALREADY_LIVE");
  });

  it("refuses appends before initialize", () => {
    expectPoolError(() => new OrderQueue().append(order("a", 1)), "INVALID_HANDLE");
  });
});

describe("OrderQueue: FIFO", () => {
  let queue: OrderQueue;

  beforeEach(() => {
    queue = new OrderQueue();
    queue.initialize();
  });

  it("iterates oldest first", () => {
    queue.append(order("a", 1));
    queue.append(order("b", 2));
    queue.append(order("c", 3));

    expect(Array.from(queue.orders(), o => o.orderId)).toEqual(["a", "b", "c"]);
    expect(queue.size).toBe(3);
    expectDecimalEqual(queue.totalQuantity(), 6);
  });

  it("walks with first and next", () => {
    queue.append(order("a", 1));
    queue.append(order("b", 2));

    const first = queue.first();
    expect(first).not.toBeNull();
    if (!first) return;
    expect(queue.get(first)?.orderId).toBe("a");
    const second = queue.next(first);
    expect(second && queue.get(second)?.orderId).toBe("b");
    expect(second && queue.next(second)).toBeNull();
  });

  it("unlinks a removed order from the middle", () => {
    queue.append(order("a", 1));
    const b = queue.append(order("b", 2));
    queue.append(order("c", 3));

    const removed = queue.remove(b);
    expect(removed.orderId).toBe("b");
    expect(Array.from(queue.orders(), o => o.orderId)).toEqual(["a", "c"]);
    expectDecimalEqual(queue.totalQuantity(), 4);
  });

  it("is empty again once every order is removed", () => {
    const a = queue.append(order("a", 1));
    queue.remove(a);
    expect(queue.isEmpty()).toBe(true);
    expect(queue.size).toBe(0);
    expectDecimalEqual(queue.totalQuantity(), 0);
  });

  it("reduce keeps the order queued and the total in step", () => {
    const a = queue.append(order("a", 10));
    queue.append(order("b", 5));

    const reduced = queue.reduce(a, new Decimal(4));
    expectDecimalEqual(reduced.quantity, 6);
    expectDecimalEqual(queue.totalQuantity(), 11);
    expect(queue.size).toBe(2);
    expectPoolError(() => queue.reduce(a, new Decimal(7)), "INVALID_HANDLE");
  });
});

describe("OrderQueue: Handles", () => {
  let queue: OrderQueue;

  beforeEach(() => {
    queue = new OrderQueue();
    queue.initialize();
  });

  it("rejects the sentinels", () => {
    expectPoolError(() => queue.remove({ index: 0, generation: 0 }), "INVALID_HANDLE");
    expectPoolError(() => queue.remove({ index: 1, generation: 0 }), "INVALID_HANDLE");
  });

  it("a stale handle never reaches a recycled slot", () => {
    const a = queue.append(order("a", 1));
    queue.remove(a);
    const b = queue.append(order("b", 2));

    expect(b.index).toBe(a.index);
    expect(b.generation).toBe(a.generation + 1);
    expect(queue.get(a)).toBeUndefined();
    expectPoolError(() => queue.remove(a), "INVALID_HANDLE");
    expect(queue.get(b)?.orderId).toBe("b");
  });
});

describe("OrderQueue: Clone", () => {
  it("copies are independent", () => {
    const queue = new OrderQueue();
    queue.initialize();
    const a = queue.append(order("a", 10));

    const copy = queue.clone();
    copy.reduce(a, new Decimal(3));
    copy.append(order("b", 1));

    expectDecimalEqual(queue.get(a)?.quantity ?? new Decimal(-1), 10);
    expect(queue.size).toBe(1);
    expectDecimalEqual(copy.totalQuantity(), 8);
  });
});
