import type { BookEntry, Order, OrderBookSnapshot, Side } from "../models/index.js";
import { BookSide } from "./bookSide.js";
import {
  DuplicateOrderError,
  InvalidOrderError,
  InvalidRequestError,
  OrderNotFoundError,
} from "./errors.js";

/**
 * In-memory order book for a single symbol.
 * Bid side: highest price first, then FIFO.
 * Ask side: lowest price first, then FIFO.
 */
export class OrderBook {
  public readonly symbol: string;
  private bids = new BookSide((a, b) => a > b);
  private asks = new BookSide((a, b) => a < b);
  private index = new Map<number, Order>();

  constructor(symbol: string) {
    this.symbol = symbol;
  }

  get size(): number {
    return this.index.size;
  }

  insert(order: Order): void {
    if (order.symbol !== this.symbol) {
      throw new InvalidOrderError(
        `Order symbol ${order.symbol} doesn't match book ${this.symbol}`,
        { orderId: order.orderId }
      );
    }
    if (!Number.isSafeInteger(order.amount) || order.amount <= 0) {
      throw new InvalidOrderError("Order amount must be a positive integer", {
        orderId: order.orderId,
        amount: order.amount,
      });
    }
    if (!Number.isSafeInteger(order.price) || order.price < 0) {
      throw new InvalidOrderError(
        "Order price must be a non-negative integer",
        { orderId: order.orderId, price: order.price }
      );
    }
    if (this.index.has(order.orderId)) {
      throw new DuplicateOrderError(order.orderId);
    }

    // the book owns its copy; callers never hold a live reference
    const resting: Order = { ...order };
    this.sideOf(resting.side).insert(resting);
    this.index.set(resting.orderId, resting);
  }

  remove(orderId: number): Order {
    const order = this.index.get(orderId);
    if (!order) throw new OrderNotFoundError(orderId);
    this.sideOf(order.side).delete(order);
    this.index.delete(orderId);
    return { ...order };
  }

  get(orderId: number): Order {
    const order = this.index.get(orderId);
    if (!order) throw new OrderNotFoundError(orderId);
    return { ...order };
  }

  has(orderId: number): boolean {
    return this.index.has(orderId);
  }

  /** Fresh lazy walk over one side in price-time priority. */
  peekSide(side: Side): Generator<Readonly<Order>, void, undefined> {
    return this.sideOf(side).orders();
  }

  /**
   * Take `quantity` off a resting order. The order keeps its place in the
   * queue while anything is left and is dropped once it reaches zero.
   * Returns the amount still resting.
   */
  reduce(orderId: number, quantity: number): number {
    const order = this.index.get(orderId);
    if (!order) throw new OrderNotFoundError(orderId);
    if (!Number.isSafeInteger(quantity) || quantity <= 0 || quantity > order.amount) {
      throw new InvalidRequestError(
        `Cannot reduce order ${orderId} by ${quantity}`,
        { orderId, quantity, amount: order.amount }
      );
    }

    order.amount -= quantity;
    if (order.amount === 0) {
      this.sideOf(order.side).delete(order);
      this.index.delete(orderId);
    }
    return order.amount;
  }

  totalAmount(side: Side): number {
    return this.sideOf(side).totalAmount();
  }

  snapshot(): OrderBookSnapshot {
    return {
      symbol: this.symbol,
      bids: this.entries("BUY"),
      asks: this.entries("SELL"),
    };
  }

  /* ───────── Private helpers ───────── */

  private sideOf(side: Side): BookSide {
    return side === "BUY" ? this.bids : this.asks;
  }

  private entries(side: Side): BookEntry[] {
    const entries: BookEntry[] = [];
    for (const { orderId, price, amount } of this.peekSide(side)) {
      entries.push({ orderId, price, amount });
    }
    return entries;
  }
}
