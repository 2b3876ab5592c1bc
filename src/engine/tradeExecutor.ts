import { v4 as uuid } from "uuid";
import type { Side, Trade } from "../models/index.js";
import { InsufficientLiquidityError } from "./errors.js";
import type { OrderBook } from "./orderBook.js";
import { planFills } from "./priceCalculator.js";

export interface TradeExecutorOptions {
  now?: () => Date;
  newTradeId?: () => string;
}

/**
 * Executes trades against a book, all or nothing.
 * The whole fill plan is built before the first order is touched, so a
 * request the book cannot cover leaves it exactly as it was.
 */
export class TradeExecutor {
  private readonly now: () => Date;
  private readonly newTradeId: () => string;

  constructor(options: TradeExecutorOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.newTradeId = options.newTradeId ?? uuid;
  }

  execute(book: OrderBook, side: Side, amount: number): Trade {
    const plan = planFills(book, side, amount);
    if (plan.filled < amount) {
      throw new InsufficientLiquidityError(book.symbol, amount, plan.filled);
    }

    for (const fill of plan.fills) {
      book.reduce(fill.orderId, fill.filledAmount);
    }

    return Object.freeze({
      tradeId: this.newTradeId(),
      symbol: book.symbol,
      side,
      amount,
      totalPrice: plan.totalPrice,
      executedAt: this.now().toISOString(),
      fills: Object.freeze(plan.fills.map((fill) => Object.freeze({ ...fill }))),
    });
  }
}
