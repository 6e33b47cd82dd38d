/**
 * Search HTTP controller.
 *
 * Express handler for GET /api/search:
 * - validates the `q` query parameter with Zod
 * - delegates to the shared SearchOrchestrator
 * - checks the SearchResponse against its schema and returns it as JSON
 */
import type { SearchOrchestrator } from "@app/search/SearchUseCase";
import {
  QUERY_REQUIRED_MESSAGE,
  SearchRequestSchema,
  SearchResponseSchema,
} from "@interfaces/http/search/schema";
import { InfrastructureError, ValidationError } from "@middleware/errorHandler";
import { Request, Response, NextFunction, RequestHandler } from "express";

export function createSearchController(
  orchestrator: Pick<SearchOrchestrator, "search">
): RequestHandler {
  return async function searchController(
    req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> {
    const parsed = SearchRequestSchema.safeParse(req.query);

    if (!parsed.success) {
      return next(
        new ValidationError(QUERY_REQUIRED_MESSAGE, {
          issues: parsed.error.issues,
        })
      );
    }

    try {
      const response = await orchestrator.search(parsed.data.q);

      const checked = SearchResponseSchema.safeParse(response);
      if (!checked.success) {
        return next(
          new InfrastructureError("Invalid search response", 500, {
            issues: checked.error.issues,
          })
        );
      }

      res.json(response);
    } catch (err: unknown) {
      next(err);
    }
  };
}
