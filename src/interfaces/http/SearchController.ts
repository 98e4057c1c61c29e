/**
 * HTTP boundary for the internal POST /search endpoint: raw retrieval
 * results for a query, with scores and metadata.
 */
import type { SearchUseCase } from "@app/search/SearchUseCase";
import {
  SearchRequestSchema,
  SearchResponseSchema,
} from "@interfaces/http/search/schema";
import { abortOnDisconnect } from "@interfaces/http/requestSignal";
import type { Request, RequestHandler, Response } from "express";

export function createSearchController(search: SearchUseCase): RequestHandler {
  return async (req: Request, res: Response): Promise<void> => {
    const { query, top_k: topK } = SearchRequestSchema.parse(req.body);

    const result = await search.search(query, topK, abortOnDisconnect(res));

    res.json(SearchResponseSchema.parse(result));
  };
}
