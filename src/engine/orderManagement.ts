import type { Order, OrderBookSnapshot, Side, Trade } from "../models/index.js";
import { createLogger, type Logger } from "../logger.js";
import { BookRegistry } from "./bookRegistry.js";
import {
  DuplicateOrderError,
  InvalidOrderError,
  InvalidRequestError,
  OrderNotFoundError,
  UnknownSymbolError,
} from "./errors.js";
import type { OrderBook } from "./orderBook.js";
import { calculatePrice } from "./priceCalculator.js";
import { TradeExecutor } from "./tradeExecutor.js";

export interface OrderManagementOptions {
  registry?: BookRegistry;
  executor?: TradeExecutor;
  logger?: Logger;
}

/**
 * Entry point to the engine: add and remove resting orders, quote and place
 * trades. Calls are synchronous; callers that interleave requests serialize
 * them per symbol through `registry.runExclusive(symbol, fn)`.
 */
export class OrderManagement {
  readonly registry: BookRegistry;
  private readonly executor: TradeExecutor;
  private readonly log: Logger;

  constructor(options: OrderManagementOptions = {}) {
    this.registry = options.registry ?? new BookRegistry();
    this.executor = options.executor ?? new TradeExecutor();
    this.log = options.logger ?? createLogger("engine");
  }

  addOrder(orderId: number, symbol: string, side: Side, amount: number, price: number): void {
    if (!Number.isSafeInteger(orderId)) {
      throw new InvalidOrderError("Order id must be an integer", { orderId });
    }
    if (symbol.length === 0) {
      throw new InvalidOrderError("Symbol must not be empty", { orderId });
    }
    if (!Number.isSafeInteger(amount) || amount <= 0) {
      throw new InvalidOrderError("Order amount must be a positive integer", { orderId, amount });
    }
    if (!Number.isSafeInteger(price) || price < 0) {
      throw new InvalidOrderError("Order price must be a non-negative integer", { orderId, price });
    }
    if (this.registry.symbolOf(orderId) !== undefined) {
      throw new DuplicateOrderError(orderId);
    }

    const book = this.registry.getOrCreateBook(symbol);
    book.insert({ orderId, symbol, side, amount, price });
    this.registry.track(orderId, symbol);
    this.log.debug({ orderId, symbol, side, amount, price }, "order added");
  }

  removeOrder(orderId: number): Order {
    const book = this.bookOfOrder(orderId);
    const order = book.remove(orderId);
    this.registry.untrack(orderId);
    this.log.debug({ orderId, symbol: order.symbol }, "order removed");
    return order;
  }

  calculatePrice(symbol: string, side: Side, amount: number): number {
    const book = this.requestBook(symbol, amount);
    const price = calculatePrice(book, side, amount);
    this.log.debug({ symbol, side, amount, price }, "price calculated");
    return price;
  }

  placeTrade(symbol: string, side: Side, amount: number): Trade {
    const book = this.requestBook(symbol, amount);
    const trade = this.executor.execute(book, side, amount);

    for (const fill of trade.fills) {
      if (!book.has(fill.orderId)) this.registry.untrack(fill.orderId);
    }

    this.log.debug(
      {
        tradeId: trade.tradeId,
        symbol,
        side,
        amount,
        totalPrice: trade.totalPrice,
        fills: trade.fills.length,
      },
      "trade executed"
    );
    return trade;
  }

  getOrder(orderId: number): Order {
    return this.bookOfOrder(orderId).get(orderId);
  }

  getOrderBook(symbol: string): OrderBookSnapshot {
    const book = this.registry.getBook(symbol);
    if (!book) throw new UnknownSymbolError(symbol);
    return book.snapshot();
  }

  symbolOf(orderId: number): string | undefined {
    return this.registry.symbolOf(orderId);
  }

  /* ───────── Private helpers ───────── */

  private bookOfOrder(orderId: number): OrderBook {
    const symbol = this.registry.symbolOf(orderId);
    const book = symbol === undefined ? undefined : this.registry.getBook(symbol);
    if (!book) throw new OrderNotFoundError(orderId);
    return book;
  }

  private requestBook(symbol: string, amount: number): OrderBook {
    const book = this.registry.getBook(symbol);
    if (!book) throw new UnknownSymbolError(symbol);
    if (!Number.isSafeInteger(amount) || amount <= 0) {
      throw new InvalidRequestError("Amount must be a positive integer", { symbol, amount });
    }
    return book;
  }
}
