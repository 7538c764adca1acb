/**
 * @pump-advisor/diabetes - Prompt
 *
 * Turns parsed records and a settings schedule into a completion request
 */

export { SYSTEM_MESSAGE, ASSISTANT_PREFILL } from "./system-message.js";
export { formatTable, takeMostRecent, EMPTY_TABLE } from "./table.js";
export {
  buildUserMessage,
  DEFAULT_MAX_ROWS_PER_TABLE,
  type PromptInput,
  type PromptOptions,
} from "./user-message.js";
export {
  buildCompletionRequest,
  type ChatMessage,
  type CompletionRequest,
} from "./request.js";
