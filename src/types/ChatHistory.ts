export type ChatRole = "user" | "assistant";

export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
}

export type ChatHistory = readonly ChatMessage[];

/**
 * A history entry as received from a client, before its role is checked.
 */
export interface UncheckedChatMessage {
  role: string;
  content: string;
}

export function isChatRole(role: string): role is ChatRole {
  return role === "user" || role === "assistant";
}
