import type { SearchUseCase } from "@app/search/SearchUseCase";
import { createSearchController } from "@interfaces/http/SearchController";
import { Router } from "express";

/**
 * Retrieval inspection:
 *   POST /api/v1/search { query, top_k? } -> { query, results, sources }
 */
export function searchRouter(search: SearchUseCase): Router {
  const router = Router();
  router.post("/", createSearchController(search));
  return router;
}
