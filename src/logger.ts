import { pino, type Logger } from "pino";
import { config } from "./config.js";

export const logger: Logger = pino({
  name: "order-book",
  level: config.logLevel,
  timestamp: pino.stdTimeFunctions.isoTime,
});

export function createLogger(component: string): Logger {
  return logger.child({ component });
}

export type { Logger };
