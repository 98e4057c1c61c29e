/**
 * OpenAI-compatible provider integration.
 *
 * - shared client configured from `config.openai` (base URL may point at any
 *   OpenAI-compatible endpoint)
 * - bounded retry helper for transient network / 429 / 5xx failures
 * - completion adapter implementing the domain CompletionPort
 */
import { config } from "@config/index";
import type { CompletionOptions, CompletionPort } from "@domain/llm/ports";
import { logEvent, logger } from "@infrastructure/logging/Logger";
import { sleep } from "@utils/deadline";
import OpenAI from "openai";

export function createOpenAIClient(): OpenAI {
  return new OpenAI({
    apiKey: config.openai.key,
    baseURL: config.openai.baseUrl,
    timeout: config.openai.timeoutMs,
    // withRetry owns retries.
    maxRetries: 0,
  });
}

const RETRYABLE_CODES = new Set(["ECONNRESET", "ETIMEDOUT"]);
const RETRYABLE_STATUSES = new Set([429, 500, 502, 503]);

function readField(source: unknown, key: string): unknown {
  if (source && typeof source === "object" && key in source) {
    return Object.getOwnPropertyDescriptor(source, key)?.value;
  }
  return undefined;
}

export function isRetryableError(error: unknown): boolean {
  const code =
    readField(error, "code") ?? readField(readField(error, "cause"), "code");
  if (typeof code === "string" && RETRYABLE_CODES.has(code)) {
    return true;
  }

  const status =
    readField(error, "status") ??
    readField(error, "statusCode") ??
    readField(readField(error, "response"), "status");

  return typeof status === "number" && RETRYABLE_STATUSES.has(status);
}

export interface RetryOptions {
  signal?: AbortSignal | undefined;
  delaysMs?: readonly number[];
}

export const DEFAULT_RETRY_DELAYS_MS: readonly number[] = [0, 200, 500];

/**
 * Runs `fn` up to `delaysMs.length` times. Only transient failures are
 * retried, and never once `signal` has aborted.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  operation: string,
  options: RetryOptions = {}
): Promise<T> {
  const delays = options.delaysMs ?? DEFAULT_RETRY_DELAYS_MS;
  const attempts = Math.max(1, delays.length);

  for (let attempt = 1; ; attempt += 1) {
    const delayMs = delays[attempt - 1] ?? 0;
    if (delayMs > 0) {
      await sleep(delayMs, options.signal);
    }

    try {
      return await fn();
    } catch (e: unknown) {
      if (
        attempt >= attempts ||
        options.signal?.aborted ||
        !isRetryableError(e)
      ) {
        throw e;
      }

      logger.log("warn", "LLM_RETRY", {
        attempt,
        operation,
        error: e instanceof Error ? e.message : String(e),
      });
    }
  }
}

export class OpenAICompletionAdapter implements CompletionPort {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string = config.openai.model
  ) {}

  async complete(
    prompt: string,
    options: CompletionOptions,
    signal?: AbortSignal
  ): Promise<string> {
    const startedAt = Date.now();

    try {
      const completion = await withRetry(
        () =>
          this.client.chat.completions.create(
            {
              model: this.model,
              messages: [{ role: "user", content: prompt }],
              temperature: options.temperature,
              top_p: options.topP,
            },
            { signal }
          ),
        "chat.completions.create",
        { signal }
      );

      const text = completion.choices[0]?.message?.content ?? "";
      if (!text.trim()) {
        throw new Error("completion returned no content");
      }

      logEvent("LLM_SUCCESS", {
        model: this.model,
        durationMs: Date.now() - startedAt,
        promptLength: prompt.length,
        responseLength: text.length,
      });

      return text;
    } catch (error: unknown) {
      logEvent("LLM_FAILURE", {
        model: this.model,
        durationMs: Date.now() - startedAt,
        message: error instanceof Error ? error.message : String(error),
        name: error instanceof Error ? error.name : undefined,
      });
      throw error;
    }
  }
}
