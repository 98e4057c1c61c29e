/**
 * Retrieval without generation, for inspecting what the index returns for a
 * query. Backs the internal /search endpoint.
 */
import type { RetrievedPassage } from "@domain/rag/ports";
import {
  dedupeSources,
  type RetrievalOrchestrator,
} from "@domain/rag/retrieval";

export interface SearchResult {
  query: string;
  results: RetrievedPassage[];
  sources: string[];
}

export class SearchUseCase {
  constructor(
    private readonly retrieval: RetrievalOrchestrator,
    private readonly defaultTopK: number
  ) {}

  async search(
    query: string,
    topK: number = this.defaultTopK,
    signal?: AbortSignal
  ): Promise<SearchResult> {
    const normalized = query.trim();
    const results = await this.retrieval.retrieve(normalized, topK, {
      signal,
    });

    return {
      query: normalized,
      results,
      sources: dedupeSources(results),
    };
  }
}
