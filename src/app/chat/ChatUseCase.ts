/**
 * Chat orchestration: validate → retrieve → assemble → complete.
 *
 * `validate` and `chat` are separate entry points so callers can reject a
 * request before any collaborator is touched. `chat` must only ever receive
 * the sanitized values `validate` returned.
 */
import type { ConversationValidator } from "@domain/conversation/conversationValidator";
import type { CompletionOptions, CompletionPort } from "@domain/llm/ports";
import type { PromptAssembler } from "@domain/prompt/promptAssembler";
import {
  dedupeSources,
  type RetrievalOrchestrator,
} from "@domain/rag/retrieval";
import { logEvent } from "@infrastructure/logging/Logger";
import {
  ConversationRejectedError,
  UpstreamError,
} from "@typesLocal/AppError";
import type {
  ChatHistory,
  UncheckedChatMessage,
} from "@typesLocal/ChatHistory";
import {
  DeadlineExceededError,
  RequestAbortedError,
  runWithDeadline,
} from "@utils/deadline";

export interface ChatSettings {
  topK: number;
  maxPromptTokens: number;
  timeoutMs: number;
  completion: CompletionOptions;
}

export interface ChatDependencies {
  validator: ConversationValidator;
  retrieval: RetrievalOrchestrator;
  assembler: PromptAssembler;
  completion: CompletionPort;
}

export interface ValidatedConversation {
  message: string;
  history: ChatHistory;
}

export interface ChatOptions {
  /** Per-request prompt budget; falls back to the configured default. */
  maxPromptTokens?: number | undefined;
  signal?: AbortSignal | undefined;
}

export interface ChatResult {
  response: string;
  sources: string[];
  /** Sanitized question, echoed back for follow-ups. */
  context: string;
}

export class ChatUseCase {
  constructor(
    private readonly deps: ChatDependencies,
    private readonly settings: ChatSettings
  ) {}

  /** Throws ConversationRejectedError on the first failed check. */
  validate(
    message: string,
    history: readonly UncheckedChatMessage[] = []
  ): ValidatedConversation {
    const result = this.deps.validator.validate(message, history);

    if (!result.ok) {
      logEvent("VALIDATION_REJECTED", {
        kind: result.kind,
        messageLength: result.sanitizedMessage.length,
        historyLength: history.length,
      });
      throw new ConversationRejectedError(result.kind, result.reason);
    }

    return { message: result.message, history: result.history };
  }

  async chat(
    message: string,
    history: ChatHistory,
    options: ChatOptions = {}
  ): Promise<ChatResult> {
    const passages = await this.deps.retrieval.retrieve(
      message,
      this.settings.topK,
      { signal: options.signal }
    );

    const prompt = this.deps.assembler.assemble({
      passages,
      question: message,
      history,
      maxTotalTokens: options.maxPromptTokens ?? this.settings.maxPromptTokens,
    });

    logEvent("PROMPT_ASSEMBLED", {
      budget: prompt.budget,
      estimatedTokens: prompt.estimatedTokens,
      passages: passages.length,
      keptHistoryTurns: prompt.keptHistoryTurns,
      historyTruncated: prompt.historyTruncated,
      contextTruncated: prompt.contextTruncated,
      overBudget: prompt.overBudget,
    });

    let response: string;
    try {
      response = await runWithDeadline(
        "completion",
        (signal) =>
          this.deps.completion.complete(
            prompt.text,
            this.settings.completion,
            signal
          ),
        { timeoutMs: this.settings.timeoutMs, signal: options.signal }
      );
    } catch (error: unknown) {
      if (error instanceof RequestAbortedError) {
        throw error;
      }
      throw new UpstreamError(
        "CompletionError",
        `CompletionError: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error, timedOut: error instanceof DeadlineExceededError }
      );
    }

    return {
      response,
      sources: dedupeSources(passages),
      context: message,
    };
  }

  async handle(
    message: string,
    history: readonly UncheckedChatMessage[],
    options: ChatOptions = {}
  ): Promise<ChatResult> {
    const conversation = this.validate(message, history);
    return this.chat(conversation.message, conversation.history, options);
  }
}
