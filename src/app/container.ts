/**
 * Composition root. Builds the use cases once per process from `config`;
 * the token estimator is chosen here and shared by every consumer.
 */
import { ChatUseCase } from "@app/chat/ChatUseCase";
import { IngestUseCase } from "@app/ingest/IngestUseCase";
import { SearchUseCase } from "@app/search/SearchUseCase";
import { config } from "@config/index";
import { ConversationValidator } from "@domain/conversation/conversationValidator";
import {
  createTokenEstimator,
  type TokenEstimator,
} from "@domain/conversation/tokenEstimator";
import type { PokemonSource } from "@domain/ingest/ports";
import { TextChunker } from "@domain/ingest/textChunker";
import {
  parseCompletionOptions,
  type CompletionPort,
  type EmbeddingPort,
} from "@domain/llm/ports";
import { PromptAssembler } from "@domain/prompt/promptAssembler";
import type { VectorStore } from "@domain/rag/ports";
import { RetrievalOrchestrator } from "@domain/rag/retrieval";
import { PokemonDbCrawler } from "@infrastructure/crawler/PokemonDbCrawler";
import { createPool, createSqlDatabase } from "@infrastructure/database/db";
import { PgVectorStore } from "@infrastructure/database/PgVectorStore";
import { OpenAIEmbeddingProvider } from "@infrastructure/llm/EmbeddingProvider";
import {
  OpenAICompletionAdapter,
  createOpenAIClient,
} from "@infrastructure/llm/OpenAIAdapter";
import { logEvent } from "@infrastructure/logging/Logger";

export interface ServicePorts {
  embedder: EmbeddingPort;
  completion: CompletionPort;
  store: VectorStore;
  pokemonSource: PokemonSource;
}

export interface AppServices {
  chat: ChatUseCase;
  ingest: IngestUseCase;
  search: SearchUseCase;
  estimator: TokenEstimator;
  close(): Promise<void>;
}

export function createEstimator(
  encoding: string = config.rag.tokenEncoding
): TokenEstimator {
  return createTokenEstimator(encoding, (reason) =>
    logEvent("TOKEN_ESTIMATOR_FALLBACK", { encoding, reason })
  );
}

export function buildServices(
  ports: ServicePorts,
  estimator: TokenEstimator = createEstimator(),
  close: () => Promise<void> = async () => {}
): AppServices {
  const retrieval = new RetrievalOrchestrator(ports.embedder, ports.store, {
    timeoutMs: config.openai.timeoutMs,
    scoreThreshold: config.rag.scoreThreshold,
  });

  const chat = new ChatUseCase(
    {
      validator: new ConversationValidator(estimator, config.conversation),
      retrieval,
      assembler: new PromptAssembler(estimator),
      completion: ports.completion,
    },
    {
      topK: config.rag.topK,
      maxPromptTokens: config.rag.maxPromptTokens,
      timeoutMs: config.openai.timeoutMs,
      completion: parseCompletionOptions({
        temperature: config.openai.temperature,
        topP: config.openai.topP,
      }),
    }
  );

  const ingest = new IngestUseCase(
    {
      embedder: ports.embedder,
      store: ports.store,
      chunker: new TextChunker({
        chunkSize: config.rag.chunkSize,
        chunkOverlap: config.rag.chunkOverlap,
      }),
      pokemonSource: ports.pokemonSource,
    },
    {
      timeoutMs: config.openai.timeoutMs,
      maxCrawlLimit: config.crawler.maxLimit,
    }
  );

  return {
    chat,
    ingest,
    search: new SearchUseCase(retrieval, config.rag.topK),
    estimator,
    close,
  };
}

/** Wires the production adapters: OpenAI, Postgres + pgvector, pokemondb. */
export function createServices(): AppServices {
  const client = createOpenAIClient();
  const pool = createPool();
  const db = createSqlDatabase(pool);

  return buildServices(
    {
      embedder: new OpenAIEmbeddingProvider(client),
      completion: new OpenAICompletionAdapter(client),
      store: new PgVectorStore(db, {
        collection: config.vectorStore.collection,
        vectorSize: config.vectorStore.vectorSize,
      }),
      pokemonSource: new PokemonDbCrawler({
        baseUrl: config.crawler.baseUrl,
        delayMs: config.crawler.delayMs,
        timeoutMs: config.crawler.timeoutMs,
      }),
    },
    createEstimator(),
    () => db.close()
  );
}
