/**
 * Express application factory.
 *
 * Wires the shared SearchOrchestrator and the asset root into the routes and
 * installs the not-found and error middleware. Kept separate from server.ts
 * so tests can mount the app on an ephemeral port.
 */
import { errorHandler, notFoundHandler } from "@middleware/errorHandler";
import { registerRoutes, RouteDependencies } from "@routes/index";
import express, { Express } from "express";

export function createApp(deps: RouteDependencies): Express {
  const app = express();
  app.disable("x-powered-by");

  registerRoutes(app, deps);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
