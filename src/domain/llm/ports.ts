/**
 * Domain ports for the model provider.
 *
 * Both calls accept an AbortSignal: the caller owns the deadline and the
 * cancellation of the inbound request, adapters only forward it.
 */
import { z } from "zod";

export const completionOptionsSchema = z.object({
  temperature: z.number().min(0).max(2),
  topP: z.number().gt(0).max(1),
});

export type CompletionOptions = z.infer<typeof completionOptionsSchema>;

export const DEFAULT_COMPLETION_OPTIONS: CompletionOptions = {
  temperature: 0.3,
  topP: 0.9,
};

/**
 * Parses untrusted option values (environment, request body) into a typed
 * options object. Throws a ZodError on out-of-range values.
 */
export function parseCompletionOptions(
  input: Partial<CompletionOptions> = {}
): CompletionOptions {
  return completionOptionsSchema.parse({
    temperature: input.temperature ?? DEFAULT_COMPLETION_OPTIONS.temperature,
    topP: input.topP ?? DEFAULT_COMPLETION_OPTIONS.topP,
  });
}

export interface EmbeddingPort {
  /** One vector per input text, same order. */
  embed(texts: readonly string[], signal?: AbortSignal): Promise<number[][]>;
}

export interface CompletionPort {
  complete(
    prompt: string,
    options: CompletionOptions,
    signal?: AbortSignal
  ): Promise<string>;
}
