/**
 * Express route registration for the Searchlight API and web page.
 *
 * - GET /api/health: liveness check
 * - GET /api/search: search with fallback links
 * - GET anything else: static assets from the asset root
 */
import type { SearchOrchestrator } from "@app/search/SearchUseCase";
import healthRouter from "@routes/public/health";
import { createSearchRouter } from "@routes/public/search";
import { createStaticRouter } from "@routes/public/static";
import type { Express } from "express";

export interface RouteDependencies {
  orchestrator: SearchOrchestrator;
  assetRoot: string;
}

export function registerRoutes(app: Express, deps: RouteDependencies): void {
  app.use("/api/health", healthRouter);
  app.use("/api/search", createSearchRouter(deps.orchestrator));
  app.use(createStaticRouter(deps.assetRoot));
}
