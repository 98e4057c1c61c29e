/**
 * Guards an incoming chat request before any retrieval or model call.
 *
 * Checks run in a fixed order and stop at the first failure. The message and
 * every history entry are sanitized as they are inspected, and only the
 * sanitized values leave this module.
 */
import { isSuspicious } from "@domain/conversation/injectionDetector";
import {
  DEFAULT_MAX_CONSECUTIVE_NEWLINES,
  sanitize,
} from "@domain/conversation/sanitizer";
import type { TokenEstimator } from "@domain/conversation/tokenEstimator";
import {
  isChatRole,
  type ChatHistory,
  type ChatMessage,
  type UncheckedChatMessage,
} from "@typesLocal/ChatHistory";

export type ConversationErrorKind =
  | "EmptyMessage"
  | "MessageTooLong"
  | "PromptInjection"
  | "HistoryTooLong"
  | "InvalidRole"
  | "HistoryMessageTooLong"
  | "ConversationTooLong";

export interface ConversationLimits {
  maxMessageChars: number;
  maxTurns: number;
  maxHistoryMessageChars: number;
  maxConversationTokens: number;
  maxConsecutiveNewlines: number;
}

export const DEFAULT_CONVERSATION_LIMITS: ConversationLimits = {
  maxMessageChars: 1000,
  maxTurns: 15,
  maxHistoryMessageChars: 2000,
  maxConversationTokens: 2500,
  maxConsecutiveNewlines: DEFAULT_MAX_CONSECUTIVE_NEWLINES,
};

export type ValidationResult =
  | {
      ok: true;
      message: string;
      history: ChatHistory;
      estimatedTokens: number;
    }
  | {
      ok: false;
      kind: ConversationErrorKind;
      reason: string;
      /** Sanitized copy of the message, safe to log or echo. */
      sanitizedMessage: string;
    };

/**
 * Client-facing explanation per rejection kind. The PromptInjection text
 * never names the rule that matched.
 */
export function describeRejection(
  kind: ConversationErrorKind,
  limits: ConversationLimits
): string {
  switch (kind) {
    case "EmptyMessage":
      return "message cannot be empty";
    case "MessageTooLong":
      return `message too long (max ${limits.maxMessageChars} characters)`;
    case "PromptInjection":
      return "message contains suspicious patterns";
    case "HistoryTooLong":
      return `conversation history too long (max ${limits.maxTurns} messages)`;
    case "InvalidRole":
      return "invalid message type (must be 'user' or 'assistant')";
    case "HistoryMessageTooLong":
      return `conversation message too long (max ${limits.maxHistoryMessageChars} characters)`;
    case "ConversationTooLong":
      return "conversation is too long, please start a new session";
  }
}

export class ConversationValidator {
  private readonly limits: ConversationLimits;

  constructor(
    private readonly estimator: TokenEstimator,
    limits: Partial<ConversationLimits> = {}
  ) {
    this.limits = { ...DEFAULT_CONVERSATION_LIMITS, ...limits };
  }

  validate(
    rawMessage: string,
    rawHistory: readonly UncheckedChatMessage[] = []
  ): ValidationResult {
    const clean = (text: string): string =>
      sanitize(text, {
        maxConsecutiveNewlines: this.limits.maxConsecutiveNewlines,
      });

    const message = clean(rawMessage);
    const reject = (kind: ConversationErrorKind): ValidationResult => ({
      ok: false,
      kind,
      reason: describeRejection(kind, this.limits),
      sanitizedMessage: message,
    });

    if (message.length === 0) {
      return reject("EmptyMessage");
    }

    if (message.length > this.limits.maxMessageChars) {
      return reject("MessageTooLong");
    }

    if (isSuspicious(message)) {
      return reject("PromptInjection");
    }

    if (rawHistory.length > this.limits.maxTurns) {
      return reject("HistoryTooLong");
    }

    const history: ChatMessage[] = [];
    for (const turn of rawHistory) {
      if (!isChatRole(turn.role)) {
        return reject("InvalidRole");
      }

      const content = clean(turn.content);

      if (isSuspicious(content)) {
        return reject("PromptInjection");
      }

      if (content.length > this.limits.maxHistoryMessageChars) {
        return reject("HistoryMessageTooLong");
      }

      history.push({ role: turn.role, content });
    }

    const estimatedTokens = history.reduce(
      (total, turn) => total + this.estimator.estimate(turn.content),
      this.estimator.estimate(message)
    );

    if (estimatedTokens > this.limits.maxConversationTokens) {
      return reject("ConversationTooLong");
    }

    return { ok: true, message, history, estimatedTokens };
  }
}
