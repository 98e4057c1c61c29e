/**
 * Embedding provider backed by the OpenAI embeddings endpoint.
 *
 * Batches all texts into one request and returns one vector per input in
 * input order. An empty or short response is an error, never a partial
 * result.
 */
import { config } from "@config/index";
import type { EmbeddingPort } from "@domain/llm/ports";
import { withRetry } from "@infrastructure/llm/OpenAIAdapter";
import { logEvent } from "@infrastructure/logging/Logger";
import { InfrastructureError } from "@typesLocal/AppError";
import type OpenAI from "openai";

export class OpenAIEmbeddingProvider implements EmbeddingPort {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string = config.openai.embeddingModel
  ) {}

  async embed(
    texts: readonly string[],
    signal?: AbortSignal
  ): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const input = texts.map((t) => t.trim());
    if (input.some((t) => t.length === 0)) {
      throw new InfrastructureError("Cannot embed empty text", 400);
    }

    const startedAt = Date.now();

    try {
      const response = await withRetry(
        () =>
          this.client.embeddings.create(
            { model: this.model, input },
            { signal }
          ),
        "embeddings.create",
        { signal }
      );

      const vectors = [...response.data]
        .sort((a, b) => a.index - b.index)
        .map((item) => item.embedding);

      if (vectors.length !== input.length) {
        throw new InfrastructureError(
          `Embedding API returned ${vectors.length} vectors for ${input.length} inputs`,
          502
        );
      }

      logEvent("EMBEDDING_SUCCESS", {
        model: this.model,
        durationMs: Date.now() - startedAt,
        batchSize: input.length,
        vectorLength: vectors[0]?.length ?? 0,
      });

      return vectors;
    } catch (error: unknown) {
      logEvent("EMBEDDING_FAILURE", {
        model: this.model,
        durationMs: Date.now() - startedAt,
        batchSize: input.length,
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}
