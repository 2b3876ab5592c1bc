export type Side = "BUY" | "SELL";

export interface Order {
  orderId: number; // unique across every book
  symbol: string;
  side: Side;
  amount: number; // remaining quantity, reduced by fills
  price: number; // integer price per unit, never amended
}

export interface OrderFill {
  orderId: number;
  filledAmount: number;
  unitPrice: number;
}

export interface Trade {
  tradeId: string;
  symbol: string;
  side: Side;
  amount: number;
  totalPrice: number;
  executedAt: string; // ISO 8601
  fills: readonly OrderFill[];
}

export interface BookEntry {
  orderId: number;
  price: number;
  amount: number;
}

export interface OrderBookSnapshot {
  symbol: string;
  bids: BookEntry[]; // highest price first
  asks: BookEntry[]; // lowest price first
}

/** The side whose resting orders an incoming request of `side` consumes. */
export function counterSide(side: Side): Side {
  return side === "BUY" ? "SELL" : "BUY";
}
