import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { config } from "../config.js";
import { OrderManagement } from "../engine/index.js";
import { errorHandler } from "./errorHandler.js";
import { registerRoutes } from "./routes.js";

export interface BuildAppOptions {
  engine?: OrderManagement;
  logger?: boolean;
  corsOrigins?: string[];
}

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger === false ? false : { level: config.logLevel },
  });

  await app.register(cors, {
    origin: options.corsOrigins ?? config.corsOrigins,
    credentials: true,
    methods: ["GET", "POST", "DELETE"],
    allowedHeaders: ["Content-Type", "Authorization"],
  });

  app.setErrorHandler(errorHandler);
  await registerRoutes(app, options.engine ?? new OrderManagement());

  return app;
}
