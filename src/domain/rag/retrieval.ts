/**
 * Retrieval orchestrator: embeds a query, asks the vector store for its
 * nearest neighbours and maps the hits to passages, keeping the store's
 * ranking.
 *
 * Each collaborator call runs under its own deadline and the caller's abort
 * signal. Failures surface as UpstreamError (EmbeddingError / SearchError),
 * which are safe to retry since nothing is written.
 */
import type { EmbeddingPort } from "@domain/llm/ports";
import type {
  PointPayload,
  RetrievedPassage,
  ScoredPoint,
  VectorStore,
} from "@domain/rag/ports";
import { logEvent } from "@infrastructure/logging/Logger";
import {
  UpstreamError,
  ValidationError,
  type UpstreamErrorKind,
} from "@typesLocal/AppError";
import {
  DeadlineExceededError,
  RequestAbortedError,
  runWithDeadline,
} from "@utils/deadline";

export interface RetrievalSettings {
  timeoutMs: number;
  scoreThreshold?: number | undefined;
}

export interface RetrieveOptions {
  signal?: AbortSignal | undefined;
}

function toUpstreamError(
  kind: UpstreamErrorKind,
  error: unknown
): RequestAbortedError | UpstreamError {
  if (error instanceof RequestAbortedError || error instanceof UpstreamError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new UpstreamError(kind, `${kind}: ${message}`, {
    cause: error,
    timedOut: error instanceof DeadlineExceededError,
  });
}

function toMetadata(payload: PointPayload): Record<string, string> {
  const metadata: Record<string, string> = {};
  for (const [key, value] of Object.entries(payload)) {
    if (key !== "content") {
      metadata[key] = String(value);
    }
  }
  return metadata;
}

export function toPassage(point: ScoredPoint): RetrievedPassage {
  const content = point.payload.content;
  return {
    content: typeof content === "string" ? content : "",
    score: point.score,
    metadata: toMetadata(point.payload),
  };
}

/**
 * Citation label for a passage: the Pokémon it describes when known,
 * otherwise its source.
 */
export function sourceLabel(passage: RetrievedPassage): string | undefined {
  const pokemon = passage.metadata.pokemon;
  if (pokemon) {
    return `Pokemon: ${pokemon}`;
  }
  return passage.metadata.source || undefined;
}

/** Collapses passages from the same source into one label, first seen first. */
export function dedupeSources(passages: readonly RetrievedPassage[]): string[] {
  const seen = new Set<string>();
  for (const passage of passages) {
    const label = sourceLabel(passage);
    if (label !== undefined) {
      seen.add(label);
    }
  }
  return [...seen];
}

export class RetrievalOrchestrator {
  constructor(
    private readonly embedder: EmbeddingPort,
    private readonly store: VectorStore,
    private readonly settings: RetrievalSettings
  ) {}

  async retrieve(
    query: string,
    topK: number,
    options: RetrieveOptions = {}
  ): Promise<RetrievedPassage[]> {
    if (!query.trim()) {
      throw new ValidationError("query cannot be empty");
    }

    const limit = Math.max(1, Math.floor(topK));
    const startedAt = Date.now();

    const vector = await this.embedQuery(query, options.signal);

    let points: ScoredPoint[];
    try {
      points = await runWithDeadline(
        "vector search",
        () =>
          this.store.search(vector, limit, this.settings.scoreThreshold),
        { timeoutMs: this.settings.timeoutMs, signal: options.signal }
      );
    } catch (error: unknown) {
      throw toUpstreamError("SearchError", error);
    }

    const passages = points.map(toPassage);

    logEvent("RAG_RETRIEVE", {
      topK: limit,
      scoreThreshold: this.settings.scoreThreshold,
      returned: passages.length,
      topScore: passages[0]?.score,
      durationMs: Date.now() - startedAt,
    });

    return passages;
  }

  private async embedQuery(
    query: string,
    signal: AbortSignal | undefined
  ): Promise<number[]> {
    let vectors: number[][];
    try {
      vectors = await runWithDeadline(
        "query embedding",
        (deadline) => this.embedder.embed([query], deadline),
        { timeoutMs: this.settings.timeoutMs, signal }
      );
    } catch (error: unknown) {
      throw toUpstreamError("EmbeddingError", error);
    }

    const vector = vectors[0];
    if (!vector || vector.length === 0) {
      throw new UpstreamError(
        "EmbeddingError",
        "EmbeddingError: embedding service returned no vectors"
      );
    }
    return vector;
  }
}
