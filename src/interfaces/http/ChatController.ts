/**
 * HTTP boundary for POST /chat: parse the DTO, run the conversation checks,
 * then the RAG pipeline.
 */
import type { ChatUseCase } from "@app/chat/ChatUseCase";
import {
  ChatRequestSchema,
  ChatResponseSchema,
  type ChatResponseBody,
} from "@interfaces/http/chat/schema";
import { abortOnDisconnect } from "@interfaces/http/requestSignal";
import type { Request, RequestHandler, Response } from "express";

export function createChatController(chat: ChatUseCase): RequestHandler {
  return async (req: Request, res: Response): Promise<void> => {
    const body = ChatRequestSchema.parse(req.body);

    const conversation = chat.validate(
      body.message,
      body.conversation_history.map((turn) => ({
        role: turn.type,
        content: turn.content,
      }))
    );

    const result = await chat.chat(
      conversation.message,
      conversation.history,
      {
        maxPromptTokens: body.max_prompt_tokens,
        signal: abortOnDisconnect(res),
      }
    );

    const payload: ChatResponseBody = ChatResponseSchema.parse(result);
    res.json(payload);
  };
}
