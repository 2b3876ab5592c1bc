import type { FastifyInstance } from "fastify";
import type { OrderManagement } from "../engine/index.js";
import {
  CreateOrderSchema,
  OrderParamsSchema,
  PriceQuerySchema,
  SymbolParamsSchema,
  TradeSchema,
} from "./schemas.js";

export async function registerRoutes(
  app: FastifyInstance,
  engine: OrderManagement
): Promise<void> {
  const registry = engine.registry;

  // Add a resting order
  app.post("/orders", async (req, reply) => {
    const parsed = CreateOrderSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.status(400).send({
        error: "Validation failed",
        details: parsed.error.flatten(),
      });
    }
    const { orderId, symbol, side, amount, price } = parsed.data;
    await registry.runExclusive(symbol, () =>
      engine.addOrder(orderId, symbol, side, amount, price)
    );
    return reply.status(201).send({ orderId, symbol, side, amount, price });
  });

  // Remove a resting order
  app.delete("/orders/:orderId", async (req, reply) => {
    const parsed = OrderParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      return reply.status(400).send({
        error: "Validation failed",
        details: parsed.error.flatten(),
      });
    }
    const { orderId } = parsed.data;
    const symbol = engine.symbolOf(orderId);
    if (symbol === undefined) {
      engine.removeOrder(orderId); // throws NOT_FOUND
    } else {
      // the order may be consumed while we wait, removeOrder re-checks
      await registry.runExclusive(symbol, () => engine.removeOrder(orderId));
    }
    return reply.status(204).send();
  });

  // Quote the cost of a trade without placing it
  app.get("/price", async (req, reply) => {
    const parsed = PriceQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return reply.status(400).send({
        error: "Validation failed",
        details: parsed.error.flatten(),
      });
    }
    const { symbol, side, amount } = parsed.data;
    const price = await registry.runExclusive(symbol, () =>
      engine.calculatePrice(symbol, side, amount)
    );
    return reply.send({ price });
  });

  // Place a trade against resting liquidity
  app.post("/trades", async (req, reply) => {
    const parsed = TradeSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.status(400).send({
        error: "Validation failed",
        details: parsed.error.flatten(),
      });
    }
    const { symbol, side, amount } = parsed.data;
    const trade = await registry.runExclusive(symbol, () =>
      engine.placeTrade(symbol, side, amount)
    );
    return reply.status(201).send(trade);
  });

  // Get order book
  app.get("/orderbook/:symbol", async (req, reply) => {
    const parsed = SymbolParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      return reply.status(400).send({
        error: "Validation failed",
        details: parsed.error.flatten(),
      });
    }
    const { symbol } = parsed.data;
    const book = await registry.runExclusive(symbol, () =>
      engine.getOrderBook(symbol)
    );
    return reply.send(book);
  });

  // Health check
  app.get("/health", async (_req, reply) => {
    return reply.send({
      status: "ok",
      timestamp: Date.now(),
    });
  });
}
