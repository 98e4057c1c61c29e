import { z } from "zod";

/**
 * Chat DTOs. Role and content of history entries are only shape-checked
 * here; their semantics belong to the conversation validator so rejections
 * carry a conversation error kind.
 */
export const ConversationMessageSchema = z.object({
  type: z.string(),
  content: z.string(),
});

export const ChatRequestSchema = z.object({
  message: z.string(),
  // Turn limits belong to the conversation validator.
  conversation_history: z.array(ConversationMessageSchema).default([]),
  max_prompt_tokens: z.number().int().min(512).max(32768).optional(),
});

export type ChatRequestBody = z.infer<typeof ChatRequestSchema>;

export const ChatResponseSchema = z.object({
  response: z.string(),
  sources: z.array(z.string()),
  context: z.string(),
});

export type ChatResponseBody = z.infer<typeof ChatResponseSchema>;
