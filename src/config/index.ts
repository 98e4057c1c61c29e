/**
 * Centralized configuration for the Pokédex RAG chatbot.
 *
 * Every tunable of the service is read once from the environment (optionally
 * through a local .env file) and exposed as a single frozen object:
 * - OpenAI-compatible provider settings (models, base URL, sampling, timeout)
 * - PostgreSQL + pgvector connection and collection parameters
 * - Retrieval and prompt-budget settings
 * - Conversation guard limits applied before any model call
 * - Crawler and observability settings
 */
import dotenv from "dotenv";

dotenv.config();

const openaiKey = process.env.OPENAI_API_KEY;

if (!openaiKey) {
  throw new Error(
    "OPENAI_API_KEY is missing. Please set it in your .env file."
  );
}

function readBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === "") {
    return fallback;
  }
  return value.toLowerCase() === "true" || value === "1";
}

const env = process.env.NODE_ENV || "development";

export const config = {
  env,

  port: Number(process.env.PORT || 8080),

  openai: {
    key: openaiKey,
    model: process.env.OPENAI_MODEL || "gpt-4o-mini",
    embeddingModel:
      process.env.OPENAI_EMBEDDING_MODEL || "text-embedding-3-small",
    baseUrl: process.env.OPENAI_BASE_URL || undefined,
    timeoutMs: Number(process.env.OPENAI_TIMEOUT_MS || 30000),
    temperature: Number(process.env.LLM_TEMPERATURE || 0.3),
    topP: Number(process.env.LLM_TOP_P || 0.9),
  },

  db: {
    host: process.env.DB_HOST || "localhost",
    port: Number(process.env.DB_PORT || 5432),
    user: process.env.DB_USER,
    password: process.env.DB_PASSWORD,
    database: process.env.DB_NAME,
    max: Number(process.env.DB_POOL_MAX || 10),
    idleTimeoutMs: Number(process.env.DB_IDLE_TIMEOUT_MS || 30000),
    connectionTimeoutMs: Number(process.env.DB_CONN_TIMEOUT_MS || 10000),
  },

  vectorStore: {
    collection: process.env.VECTOR_COLLECTION || "pokemon",
    vectorSize: Number(process.env.VECTOR_SIZE || 1536),
  },

  rag: {
    chunkSize: Number(process.env.RAG_CHUNK_SIZE || 1000),
    chunkOverlap: Number(process.env.RAG_CHUNK_OVERLAP || 200),
    topK: Number(process.env.RAG_TOP_K || 5),
    scoreThreshold: Number(process.env.RAG_SCORE_THRESHOLD || 0.3),
    maxPromptTokens: Number(process.env.RAG_MAX_PROMPT_TOKENS || 4000),
    tokenEncoding: process.env.TOKEN_ENCODING || "cl100k_base",
  },

  conversation: {
    maxTurns: Number(process.env.CHAT_MAX_TURNS || 15),
    maxMessageChars: Number(process.env.CHAT_MAX_MESSAGE_CHARS || 1000),
    maxHistoryMessageChars: Number(
      process.env.CHAT_MAX_HISTORY_MESSAGE_CHARS || 2000
    ),
    maxConversationTokens: Number(
      process.env.CHAT_MAX_CONVERSATION_TOKENS || 2500
    ),
    maxConsecutiveNewlines: 3,
  },

  crawler: {
    baseUrl: process.env.CRAWLER_BASE_URL || "https://pokemondb.net",
    delayMs: Number(process.env.CRAWLER_DELAY_MS || 500),
    timeoutMs: Number(process.env.CRAWLER_TIMEOUT_MS || 20000),
    maxLimit: 151,
  },

  observability: {
    logLevel: process.env.LOG_LEVEL || "info",
    logToFile: readBoolean(process.env.LOG_TO_FILE, env !== "test"),
  },
} as const;

export type AppConfig = typeof config;
