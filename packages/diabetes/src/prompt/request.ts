import { ASSISTANT_PREFILL, SYSTEM_MESSAGE } from "./system-message.js";
import { buildUserMessage, type PromptInput, type PromptOptions } from "./user-message.js";

export interface ChatMessage {
  role: "user" | "assistant";
  content: string;
}

/**
 * Provider-neutral completion request
 */
export interface CompletionRequest {
  system: string;
  messages: ChatMessage[];
}

export function buildCompletionRequest(
  input: PromptInput,
  options: PromptOptions = {}
): CompletionRequest {
  return {
    system: SYSTEM_MESSAGE,
    messages: [
      { role: "user", content: buildUserMessage(input, options) },
      { role: "assistant", content: ASSISTANT_PREFILL },
    ],
  };
}
