import type { Order } from "../models/index.js";

/**
 * One half of an order book.
 *
 * Prices are kept in a sorted array, best first, and each price owns a
 * level: a Map keyed by order id. Map iteration follows insertion order, so a
 * level is a FIFO of its orders and removal by id stays O(1).
 * A new price is placed by binary search; nothing is ever re-sorted.
 */
export class BookSide {
  private prices: number[] = [];
  private levels = new Map<number, Map<number, Order>>();
  private orderCount = 0;

  /** `better(a, b)` is true when price `a` must be walked before price `b`. */
  constructor(private readonly better: (a: number, b: number) => boolean) {}

  get size(): number {
    return this.orderCount;
  }

  insert(order: Order): void {
    let level = this.levels.get(order.price);
    if (!level) {
      level = new Map();
      this.levels.set(order.price, level);
      this.prices.splice(this.insertionIndex(order.price), 0, order.price);
    }
    level.set(order.orderId, order);
    this.orderCount++;
  }

  delete(order: Order): boolean {
    const level = this.levels.get(order.price);
    if (!level || !level.delete(order.orderId)) return false;
    this.orderCount--;
    if (level.size === 0) {
      this.levels.delete(order.price);
      this.prices.splice(this.insertionIndex(order.price), 1);
    }
    return true;
  }

  /** Orders in priority order: best price first, then arrival order. */
  *orders(): Generator<Readonly<Order>, void, undefined> {
    for (const price of this.prices) {
      const level = this.levels.get(price);
      if (level) yield* level.values();
    }
  }

  totalAmount(): number {
    let total = 0;
    for (const order of this.orders()) total += order.amount;
    return total;
  }

  /* ───────── Private helpers ───────── */

  // First index whose price is not better than `price`; for a price already
  // present this is its own slot.
  private insertionIndex(price: number): number {
    let lo = 0;
    let hi = this.prices.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.better(this.prices[mid], price)) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }
}
