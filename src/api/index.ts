export { buildApp } from "./app.js";
export type { BuildAppOptions } from "./app.js";
export { registerRoutes } from "./routes.js";
export { errorHandler, statusForCode } from "./errorHandler.js";
