/**
 * Ingestion pipeline for the vector index.
 *
 * Two kinds of input:
 * - a crawl request: Pokédex detail pages are crawled, rendered as sectioned
 *   text, chunked, embedded and upserted one Pokémon at a time
 * - a text document: markdown is reduced to plain text, then chunked,
 *   embedded and upserted as a single item
 *
 * Items are processed sequentially. A failing item is logged, counted and
 * skipped; the run only fails when no item succeeded.
 */
import crypto from "crypto";

import type { PokemonSource } from "@domain/ingest/ports";
import { formatPokemonForRag } from "@domain/ingest/pokemon";
import type { TextChunker } from "@domain/ingest/textChunker";
import type { EmbeddingPort } from "@domain/llm/ports";
import type { PointPayload, VectorPoint, VectorStore } from "@domain/rag/ports";
import { logEvent, logger } from "@infrastructure/logging/Logger";
import { IngestError } from "@typesLocal/AppError";
import { RequestAbortedError, runWithDeadline } from "@utils/deadline";
import MarkdownIt from "markdown-it";

export const POKEMONDB_SOURCE = "pokemondb";

export interface CrawlIngestRequest {
  source: "pokemondb";
  crawlLimit: number;
  startFrom: number;
}

export interface TextIngestRequest {
  source: "text";
  title: string;
  content: string;
  metadata?: Record<string, string> | undefined;
}

export type IngestRequest = CrawlIngestRequest | TextIngestRequest;

export interface IngestResult {
  successCount: number;
  failureCount: number;
  chunkCount: number;
}

export interface IngestDependencies {
  embedder: EmbeddingPort;
  store: VectorStore;
  chunker: TextChunker;
  pokemonSource: PokemonSource;
}

export interface IngestSettings {
  timeoutMs: number;
  maxCrawlLimit: number;
  newId?: () => string;
}

interface IngestItem {
  label: string;
  /** Produces the document text and the payload shared by all its chunks. */
  load(signal?: AbortSignal): Promise<{ text: string; payload: PointPayload }>;
}

const md = new MarkdownIt();

/** Plain text of a markdown document, one paragraph per block. */
export function markdownToText(raw: string): string {
  const blocks: string[] = [];

  for (const token of md.parse(raw, {})) {
    if (token.type === "inline") {
      const text = (token.children ?? [])
        .map((child) => {
          if (child.type === "softbreak" || child.type === "hardbreak") {
            return "\n";
          }
          return child.type === "text" || child.type === "code_inline"
            ? child.content
            : "";
        })
        .join("")
        .trim();
      if (text) blocks.push(text);
    } else if (token.type === "fence" || token.type === "code_block") {
      const code = token.content.trim();
      if (code) blocks.push(code);
    }
  }

  return blocks.join("\n\n");
}

export class IngestUseCase {
  private readonly newId: () => string;

  constructor(
    private readonly deps: IngestDependencies,
    private readonly settings: IngestSettings
  ) {
    this.newId = settings.newId ?? (() => crypto.randomUUID());
  }

  async ingest(
    request: IngestRequest,
    options: { signal?: AbortSignal | undefined } = {}
  ): Promise<IngestResult> {
    const { signal } = options;
    await this.deps.store.ensureCollection();

    const items =
      request.source === "pokemondb"
        ? await this.crawlItems(request, signal)
        : [this.textItem(request)];

    const result: IngestResult = {
      successCount: 0,
      failureCount: 0,
      chunkCount: 0,
    };

    for (const item of items) {
      try {
        result.chunkCount += await this.ingestItem(item, signal);
        result.successCount += 1;
      } catch (error: unknown) {
        if (error instanceof RequestAbortedError) {
          throw error;
        }

        result.failureCount += 1;
        logEvent("INGEST_ITEM_FAILURE", {
          item: item.label,
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }

    logEvent("INGEST_COMPLETED", {
      source: request.source,
      items: items.length,
      ...result,
    });

    if (result.successCount === 0) {
      throw new IngestError("Failed to ingest any items", {
        source: request.source,
        failureCount: result.failureCount,
      });
    }

    return result;
  }

  private async crawlItems(
    request: CrawlIngestRequest,
    signal?: AbortSignal
  ): Promise<IngestItem[]> {
    const limit = Math.min(
      Math.max(1, Math.floor(request.crawlLimit)),
      this.settings.maxCrawlLimit
    );

    let urls: string[];
    try {
      urls = await this.deps.pokemonSource.listPokemonUrls(limit, signal);
    } catch (error: unknown) {
      if (error instanceof RequestAbortedError) {
        throw error;
      }
      throw new IngestError("Failed to crawl the Pokédex list", {
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    const selected = urls.slice(Math.max(0, request.startFrom));
    logger.log("info", "INGEST_CRAWL_PLANNED", {
      listed: urls.length,
      selected: selected.length,
      startFrom: request.startFrom,
    });

    return selected.map((url) => ({
      label: url,
      load: async (itemSignal) => {
        const pokemon = await this.deps.pokemonSource.fetchPokemon(
          url,
          itemSignal
        );
        return {
          text: formatPokemonForRag(pokemon),
          payload: {
            source: POKEMONDB_SOURCE,
            pokemon: pokemon.name,
            number: pokemon.number,
            types: pokemon.types.join(","),
          },
        };
      },
    }));
  }

  private textItem(request: TextIngestRequest): IngestItem {
    return {
      label: request.title,
      load: async () => ({
        text: markdownToText(request.content),
        payload: { ...request.metadata, source: "text", title: request.title },
      }),
    };
  }

  /** Returns the number of chunks stored for the item. */
  private async ingestItem(
    item: IngestItem,
    signal?: AbortSignal
  ): Promise<number> {
    const { text, payload } = await item.load(signal);

    const chunks = this.deps.chunker.split(text);
    if (chunks.length === 0) {
      throw new Error(`no content to ingest for ${item.label}`);
    }

    const vectors = await runWithDeadline(
      `embed ${item.label}`,
      (deadline) => this.deps.embedder.embed(chunks, deadline),
      { timeoutMs: this.settings.timeoutMs, signal }
    );
    if (vectors.length !== chunks.length) {
      throw new Error(
        `expected ${chunks.length} embeddings, received ${vectors.length}`
      );
    }

    const points: VectorPoint[] = chunks.map((content, j) => ({
      id: this.newId(),
      vector: vectors[j] ?? [],
      payload: {
        ...payload,
        content,
        source: String(payload.source ?? "unknown"),
        chunk: `${j + 1}/${chunks.length}`,
      },
    }));

    await runWithDeadline(
      `upsert ${item.label}`,
      () => this.deps.store.upsert(points),
      { timeoutMs: this.settings.timeoutMs, signal }
    );

    return chunks.length;
  }
}
