import type { SearchOrchestrator } from "@app/search/SearchUseCase";
import { createSearchController } from "@interfaces/http/SearchController";
import { Router } from "express";

/**
 *   GET /api/search?q=<text> -> { query, engine, elapsed_ms, results }
 */
export function createSearchRouter(orchestrator: SearchOrchestrator): Router {
  const router = Router();
  router.get("/", createSearchController(orchestrator));
  return router;
}
