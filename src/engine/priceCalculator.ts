import { counterSide, type OrderFill, type Side } from "../models/index.js";
import { InsufficientLiquidityError, InvalidRequestError } from "./errors.js";
import type { OrderBook } from "./orderBook.js";

export interface FillPlan {
  fills: OrderFill[];
  totalPrice: number;
  filled: number;
}

/**
 * Walk the resting orders a `side` request consumes, best price first, and
 * work out which orders would fill `amount` and at what cost.
 * Stops as soon as `amount` is covered; `filled` is short of `amount` only
 * when the counter side ran dry. Never touches the book.
 */
export function planFills(book: OrderBook, side: Side, amount: number): FillPlan {
  const fills: OrderFill[] = [];
  let remaining = amount;
  let totalPrice = 0;

  for (const order of book.peekSide(counterSide(side))) {
    if (remaining === 0) break;
    const filledAmount = Math.min(remaining, order.amount);
    fills.push({ orderId: order.orderId, filledAmount, unitPrice: order.price });
    totalPrice += filledAmount * order.price;
    remaining -= filledAmount;
  }

  if (!Number.isSafeInteger(totalPrice)) {
    throw new InvalidRequestError(
      `Total price for ${amount} ${book.symbol} exceeds the representable range`,
      { symbol: book.symbol, amount }
    );
  }

  return { fills, totalPrice, filled: amount - remaining };
}

/** Cost of filling `amount` against the book, without filling it. */
export function calculatePrice(book: OrderBook, side: Side, amount: number): number {
  const plan = planFills(book, side, amount);
  if (plan.filled < amount) {
    throw new InsufficientLiquidityError(book.symbol, amount, plan.filled);
  }
  return plan.totalPrice;
}
