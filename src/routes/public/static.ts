import { createStaticController } from "@interfaces/http/StaticController";
import { Router } from "express";

export function createStaticRouter(assetRoot: string): Router {
  const router = Router();
  router.get(/.*/, createStaticController(assetRoot));
  return router;
}
