import { z } from "zod";

export const MAX_AMOUNT = 10_000_000;
export const MAX_PRICE = 10_000_000;

const SymbolSchema = z
  .string()
  .min(1)
  .max(10)
  .regex(/^[A-Z]+$/, "symbol must be upper-case letters");

const SideSchema = z.enum(["BUY", "SELL"]);

const OrderIdSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

export const CreateOrderSchema = z.object({
  orderId: OrderIdSchema,
  symbol: SymbolSchema,
  side: SideSchema,
  amount: z.number().int().positive().max(MAX_AMOUNT),
  price: z.number().int().nonnegative().max(MAX_PRICE),
});

export type CreateOrderInput = z.infer<typeof CreateOrderSchema>;

export const OrderParamsSchema = z.object({
  orderId: z.coerce.number().pipe(OrderIdSchema),
});

export type OrderParamsInput = z.infer<typeof OrderParamsSchema>;

// query strings arrive as text
export const PriceQuerySchema = z.object({
  symbol: SymbolSchema,
  side: SideSchema,
  amount: z.coerce.number().int().positive().max(MAX_AMOUNT),
});

export type PriceQueryInput = z.infer<typeof PriceQuerySchema>;

export const TradeSchema = z.object({
  symbol: SymbolSchema,
  side: SideSchema,
  amount: z.number().int().positive().max(MAX_AMOUNT),
});

export type TradeInput = z.infer<typeof TradeSchema>;

export const SymbolParamsSchema = z.object({
  symbol: SymbolSchema,
});
