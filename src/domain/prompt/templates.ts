/**
 * Fixed prompt fragments. Each renderer returns an immutable string; the
 * assembler only concatenates them.
 */
import type { ChatMessage } from "@typesLocal/ChatHistory";

export const SYSTEM_PREAMBLE =
  "You are a helpful Pokemon expert assistant. Answer questions based on the provided context about Pokemon.\n\n";

export const INSTRUCTIONS_BLOCK = [
  "Instructions:",
  "- Answer based on the context above and conversation history",
  "- Use conversation context to understand references (it, that Pokemon, etc.)",
  "- Be specific and accurate about Pokemon stats, types, and abilities",
  "- If comparing Pokemon, use specific numbers when available",
  "- If the context doesn't contain the information, say so clearly",
  "- Keep your answer concise but informative",
  "",
  "Answer:",
].join("\n");

export const CONTEXT_HEADER = "Context Information:\n\n";
export const CONTEXT_HEADER_TRUNCATED = "Context Information (truncated):\n\n";
export const CONTEXT_TRUNCATION_MARKER = "\n[... context truncated ...]\n\n";

export const HISTORY_HEADER = "=== Recent Conversation ===\n";
export const HISTORY_TRUNCATION_NOTE =
  "(Earlier messages were omitted to fit the prompt budget.)\n";

export function renderQuestion(question: string): string {
  return `Current Question: ${question}\n\n`;
}

export function renderPassage(index: number, content: string): string {
  return `[${index + 1}] ${content}\n\n`;
}

export function renderHistoryTurn(turn: ChatMessage): string {
  const speaker = turn.role === "assistant" ? "Assistant" : "Human";
  return `${speaker}: ${turn.content}\n`;
}

export function renderHistoryBlock(
  turns: readonly ChatMessage[],
  truncated: boolean
): string {
  if (turns.length === 0 && !truncated) {
    return "";
  }

  return [
    HISTORY_HEADER,
    truncated ? HISTORY_TRUNCATION_NOTE : "",
    ...turns.map(renderHistoryTurn),
    "\n",
  ].join("");
}
