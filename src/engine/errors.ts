export type OrderBookErrorCode =
  | "INVALID_ORDER"
  | "DUPLICATE_ORDER"
  | "NOT_FOUND"
  | "UNKNOWN_SYMBOL"
  | "INVALID_REQUEST"
  | "INSUFFICIENT_LIQUIDITY";

/**
 * Base class for every condition the engine reports to its caller.
 * None of them are fatal; the book is never left half-mutated when one is thrown.
 */
export class OrderBookError extends Error {
  constructor(
    message: string,
    public readonly code: OrderBookErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "OrderBookError";
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: {
        code: this.code,
        message: this.message,
        details: this.details,
      },
    };
  }
}

export class InvalidOrderError extends OrderBookError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "INVALID_ORDER", details);
    this.name = "InvalidOrderError";
  }
}

export class DuplicateOrderError extends OrderBookError {
  constructor(orderId: number) {
    super(`Order with id ${orderId} already exists`, "DUPLICATE_ORDER", {
      orderId,
    });
    this.name = "DuplicateOrderError";
  }
}

export class OrderNotFoundError extends OrderBookError {
  constructor(orderId: number) {
    super(`Order with id ${orderId} not found`, "NOT_FOUND", { orderId });
    this.name = "OrderNotFoundError";
  }
}

export class UnknownSymbolError extends OrderBookError {
  constructor(symbol: string) {
    super(`No order book for symbol ${symbol}`, "UNKNOWN_SYMBOL", { symbol });
    this.name = "UnknownSymbolError";
  }
}

export class InvalidRequestError extends OrderBookError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "INVALID_REQUEST", details);
    this.name = "InvalidRequestError";
  }
}

export class InsufficientLiquidityError extends OrderBookError {
  constructor(symbol: string, requested: number, available: number) {
    super(
      `Insufficient liquidity for ${symbol}. Requested: ${requested}, Available: ${available}`,
      "INSUFFICIENT_LIQUIDITY",
      { symbol, requested, available }
    );
    this.name = "InsufficientLiquidityError";
  }
}

export function isOrderBookError(error: unknown): error is OrderBookError {
  return error instanceof OrderBookError;
}
