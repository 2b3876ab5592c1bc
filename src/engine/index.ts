export { OrderBook } from "./orderBook.js";
export { BookSide } from "./bookSide.js";
export { BookLock } from "./bookLock.js";
export { BookRegistry } from "./bookRegistry.js";
export { calculatePrice, planFills } from "./priceCalculator.js";
export type { FillPlan } from "./priceCalculator.js";
export { TradeExecutor } from "./tradeExecutor.js";
export type { TradeExecutorOptions } from "./tradeExecutor.js";
export { OrderManagement } from "./orderManagement.js";
export type { OrderManagementOptions } from "./orderManagement.js";
export * from "./errors.js";
