import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { OrderBook } from "../src/engine/orderBook.js";
import { TradeExecutor } from "../src/engine/tradeExecutor.js";
import { InsufficientLiquidityError, InvalidRequestError } from "../src/engine/errors.js";
import { calculatePrice } from "../src/engine/priceCalculator.js";
import { counterSide } from "../src/models/order.js";
import { bookFrom, orderSpecsArb, sideArb } from "./arbitraries.js";

const EXECUTED_AT = "2026-01-02T03:04:05.000Z";

function makeExecutor(): TradeExecutor {
  return new TradeExecutor({
    now: () => new Date(EXECUTED_AT),
    newTradeId: () => "trade-1",
  });
}

// asks: id 1 10@100, id 2 5@101; one bid that trades must never touch
function makeBook(): OrderBook {
  const book = new OrderBook("JPM");
  book.insert({ orderId: 1, symbol: "JPM", side: "SELL", amount: 10, price: 100 });
  book.insert({ orderId: 2, symbol: "JPM", side: "SELL", amount: 5, price: 101 });
  book.insert({ orderId: 3, symbol: "JPM", side: "BUY", amount: 50, price: 90 });
  return book;
}

describe("TradeExecutor", () => {
  it("removes an order whose amount is matched exactly", () => {
    const book = makeBook();
    const trade = makeExecutor().execute(book, "BUY", 10);

    expect(trade).toEqual({
      tradeId: "trade-1",
      symbol: "JPM",
      side: "BUY",
      amount: 10,
      totalPrice: 1000,
      executedAt: EXECUTED_AT,
      fills: [{ orderId: 1, filledAmount: 10, unitPrice: 100 }],
    });
    expect(book.has(1)).toBe(false);
    expect(book.snapshot().asks).toEqual([{ orderId: 2, price: 101, amount: 5 }]);
  });

  it("leaves a partially filled order in its place", () => {
    const book = makeBook();
    const trade = makeExecutor().execute(book, "BUY", 4);

    expect(trade.fills).toEqual([{ orderId: 1, filledAmount: 4, unitPrice: 100 }]);
    expect(trade.totalPrice).toBe(400);
    expect(book.snapshot().asks).toEqual([
      { orderId: 1, price: 100, amount: 6 },
      { orderId: 2, price: 101, amount: 5 },
    ]);
  });

  it("records one fill per order touched, in consumption order", () => {
    const book = makeBook();
    const trade = makeExecutor().execute(book, "BUY", 12);

    expect(trade.fills).toEqual([
      { orderId: 1, filledAmount: 10, unitPrice: 100 },
      { orderId: 2, filledAmount: 2, unitPrice: 101 },
    ]);
    expect(trade.totalPrice).toBe(1202);
    expect(book.snapshot().asks).toEqual([{ orderId: 2, price: 101, amount: 3 }]);
  });

  it("conserves amount and price across fills", () => {
    const book = makeBook();
    const before = book.totalAmount("SELL");
    const trade = makeExecutor().execute(book, "BUY", 13);

    const filled = trade.fills.reduce((sum, f) => sum + f.filledAmount, 0);
    const cost = trade.fills.reduce((sum, f) => sum + f.filledAmount * f.unitPrice, 0);
    expect(filled).toBe(13);
    expect(cost).toBe(trade.totalPrice);
    expect(book.totalAmount("SELL")).toBe(before - 13);
    expect(book.totalAmount("BUY")).toBe(50);
  });

  it("sells into bids, highest price first", () => {
    const book = makeBook();
    book.insert({ orderId: 4, symbol: "JPM", side: "BUY", amount: 5, price: 95 });
    const trade = makeExecutor().execute(book, "SELL", 8);

    expect(trade.fills).toEqual([
      { orderId: 4, filledAmount: 5, unitPrice: 95 },
      { orderId: 3, filledAmount: 3, unitPrice: 90 },
    ]);
    expect(trade.totalPrice).toBe(475 + 270);
    expect(book.get(3).amount).toBe(47);
  });

  it("leaves the book exactly as it was when liquidity is short", () => {
    const book = makeBook();
    const before = book.snapshot();

    expect(() => makeExecutor().execute(book, "BUY", 16)).toThrow(
      InsufficientLiquidityError
    );
    expect(book.snapshot()).toEqual(before);
  });

  it("conserves amount and price for any book it can fill", () => {
    fc.assert(
      fc.property(orderSpecsArb, sideArb, fc.nat(), (specs, side, seed) => {
        const book = bookFrom(specs);
        const consumed = counterSide(side);
        const available = book.totalAmount(consumed);
        fc.pre(available > 0);
        const amount = 1 + (seed % available);

        const quote = calculatePrice(book, side, amount);
        const walk = [...book.peekSide(consumed)].map((o) => o.orderId);
        const ownSide = book.snapshot()[side === "BUY" ? "bids" : "asks"];
        const trade = makeExecutor().execute(book, side, amount);

        const filled = trade.fills.reduce((sum, f) => sum + f.filledAmount, 0);
        const cost = trade.fills.reduce((sum, f) => sum + f.filledAmount * f.unitPrice, 0);
        expect(filled).toBe(amount);
        expect(trade.amount).toBe(amount);
        expect(trade.totalPrice).toBe(cost);
        expect(trade.totalPrice).toBe(quote);
        expect(trade.fills.map((f) => f.orderId)).toEqual(walk.slice(0, trade.fills.length));
        expect(book.totalAmount(consumed)).toBe(available - amount);
        expect(book.snapshot()[side === "BUY" ? "bids" : "asks"]).toEqual(ownSide);
      })
    );
  });

  it("leaves any book unchanged when asked for more than it holds", () => {
    fc.assert(
      fc.property(
        orderSpecsArb,
        sideArb,
        fc.integer({ min: 1, max: 100 }),
        (specs, side, extra) => {
          const book = bookFrom(specs);
          const before = book.snapshot();
          const amount = book.totalAmount(counterSide(side)) + extra;
          expect(() => makeExecutor().execute(book, side, amount)).toThrow(
            InsufficientLiquidityError
          );
          expect(book.snapshot()).toEqual(before);
        }
      )
    );
  });

  it("refuses a trade whose total leaves the safe integer range", () => {
    const book = new OrderBook("JPM");
    book.insert({ orderId: 1, symbol: "JPM", side: "SELL", amount: 2, price: 2 ** 52 });
    book.insert({ orderId: 2, symbol: "JPM", side: "SELL", amount: 2, price: 2 ** 52 });
    const before = book.snapshot();

    expect(() => makeExecutor().execute(book, "BUY", 3)).toThrow(InvalidRequestError);
    expect(book.snapshot()).toEqual(before);
  });

  it("returns a frozen trade", () => {
    const trade = makeExecutor().execute(makeBook(), "BUY", 12);
    expect(Object.isFrozen(trade)).toBe(true);
    expect(Object.isFrozen(trade.fills)).toBe(true);
    expect(Object.isFrozen(trade.fills[0])).toBe(true);
  });

  it("generates a uuid trade id by default", () => {
    const trade = new TradeExecutor().execute(makeBook(), "BUY", 1);
    expect(trade.tradeId).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/
    );
  });
});
